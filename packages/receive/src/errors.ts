/**
 * Receive errors
 *
 * `TransferError` is the only error the session raises for negotiation and
 * transfer failures. `ResponderError` is internal: it marks a local
 * rejection that has to be reported to the peer before the session fails.
 */

/** Where a transfer failure originated */
export type TransferErrorOrigin = 'local-rejection' | 'peer' | 'protocol';

export class TransferError extends Error {
  public readonly reason: string;
  public readonly origin: TransferErrorOrigin;

  constructor(reason: string, origin: TransferErrorOrigin = 'protocol') {
    super(reason);
    this.name = 'TransferError';
    this.reason = reason;
    this.origin = origin;
  }
}

/**
 * The two sides did not agree on the code. Raised by wormhole
 * implementations and propagated by the session unchanged.
 */
export class AuthenticationError extends Error {
  constructor(message = 'Key confirmation failed. Either you or your correspondent typed the code wrong, or a would-be man-in-the-middle attacker guessed incorrectly.') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/** Raised by `WormholeChannel.get()` once the peer has closed the channel */
export class WormholeClosedError extends Error {
  constructor(message = 'wormhole closed') {
    super(message);
    this.name = 'WormholeClosedError';
  }
}

export type DestinationKind = 'file' | 'directory';

/** The resolved destination already exists; nothing is ever overwritten */
export class DestinationExistsError extends Error {
  public readonly kind: DestinationKind;
  public readonly destName: string;

  constructor(kind: DestinationKind, destName: string) {
    super(`${kind} already exists`);
    this.name = 'DestinationExistsError';
    this.kind = kind;
    this.destName = destName;
  }
}

/** The peer proposed a name that cannot be used as a destination */
export class InvalidDestinationError extends Error {
  public readonly kind: DestinationKind;
  public readonly proposedName: string;

  constructor(kind: DestinationKind, proposedName: string) {
    super(`invalid ${kind} name`);
    this.name = 'InvalidDestinationError';
    this.kind = kind;
    this.proposedName = proposedName;
  }
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

export class ConfigError extends Error {
  public readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    super(`Invalid configuration: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * Local rejection that must be sent to the peer as `{"error": response}`
 * before the session fails. Never leaves the session.
 */
export class ResponderError extends Error {
  public readonly response: string;

  constructor(response: string) {
    super(response);
    this.name = 'ResponderError';
    this.response = response;
  }
}

/** Node system error (ENOENT, EEXIST, ...) */
export function isSystemError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}
