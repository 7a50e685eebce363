/**
 * Receive Session
 *
 * Turns a wormhole code into a delivered text message, file or directory.
 *
 * Lifecycle:
 *   awaiting-code -> verifying -> awaiting-message (loop) -> negotiating
 *   -> awaiting-consent -> establishing-transit -> transferring
 *   -> materializing -> closing -> succeeded | failed
 *
 * The session is one sequential flow. It suspends only on code entry,
 * wormhole verify/send/get, transit connect and the bulk transfer, and the
 * wormhole is closed exactly once on every exit path.
 */

import type { Logger } from 'pino';
import { validateReceiveConfig } from './config-loader.js';
import {
  CODE_PROMPT,
  COMPLETION_RECORD,
  TRANSIT_KEY_SUFFIX,
  ZERO_MODE_CODE,
} from './constants.js';
import { resolveDestination } from './destination.js';
import type { ResolvedDestination } from './destination.js';
import {
  AuthenticationError,
  ConfigError,
  DestinationExistsError,
  InvalidDestinationError,
  ResponderError,
  TransferError,
  WormholeClosedError,
  isSystemError,
} from './errors.js';
import type { DestinationKind } from './errors.js';
import { DirectoryTarget, FileTarget } from './materialize.js';
import type { TransferTarget } from './materialize.js';
import { decodeMessage, encodeMessage, transitMessage } from './messages.js';
import { PermissionGate } from './permission.js';
import type {
  DecodedOffer,
  DirectoryOffer,
  FileOffer,
  NegotiationMessage,
  OutboundMessage,
  ReceiveConfig,
  ReceiveRuntime,
  RecordPipe,
  SessionOutcome,
  SessionState,
  TransitChannel,
  TransitHintSet,
  WormholeChannel,
} from './types.js';

const completionRecord = new TextEncoder().encode(COMPLETION_RECORD);

export class ReceiveSession {
  private _state: SessionState = 'awaiting-code';
  private readonly config: ReceiveConfig;
  private readonly wormhole: WormholeChannel;
  private readonly runtime: ReceiveRuntime;
  private readonly logger: Logger;
  private readonly gate: PermissionGate;

  /** Built from the first `transit` message; later ones are ignored */
  private transit: TransitChannel | null = null;

  constructor(config: ReceiveConfig, wormhole: WormholeChannel, runtime: ReceiveRuntime) {
    this.config = config;
    this.wormhole = wormhole;
    this.runtime = runtime;
    this.logger = runtime.logger.child({ component: 'receive-session' });
    this.gate = new PermissionGate({
      autoAccept: config.acceptFile,
      prompt: runtime.prompt,
      stderr: runtime.stderr,
      logger: runtime.logger,
    });
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Run the whole receive pipeline.
   *
   * Resolves when the payload was delivered; rejects with the failure
   * otherwise. The wormhole is closed before either happens, and a failing
   * close is only logged.
   */
  async go(): Promise<void> {
    let failure: { error: unknown } | null = null;
    try {
      await this.run();
    } catch (err) {
      failure = { error: err };
    }

    this.setState('closing');
    try {
      await this.wormhole.close();
    } catch (closeErr) {
      this.logger.warn({ err: closeErr }, 'Failed to close wormhole');
    }

    if (failure) {
      this.setState('failed');
      this.logger.debug({ err: failure.error }, 'Receive failed');
      throw failure.error;
    }
    this.setState('succeeded');
  }

  // -------------------------------------------------------------------------
  // Pipeline
  // -------------------------------------------------------------------------

  private async run(): Promise<void> {
    const configErrors = validateReceiveConfig(this.config);
    if (configErrors.length > 0) {
      throw new ConfigError(configErrors);
    }

    await this.handleCode();
    await this.verify();

    for (;;) {
      this.setState('awaiting-message');
      const message = await this.nextMessage();
      this.setState('negotiating');
      switch (message.kind) {
        case 'error':
          throw new TransferError(message.reason, 'peer');

        case 'transit':
          await this.handleTransit(message.hints);
          continue;

        // The session ends with its one offer; nothing after it is read
        case 'offer':
          await this.dispatchOffer(message.offer);
          return;

        case 'unknown':
          this.logger.warn({ keys: message.keys }, 'Unrecognized negotiation message');
          throw new TransferError('expected offer, got none');
      }
    }
  }

  private async handleCode(): Promise<void> {
    this.setState('awaiting-code');
    const code = this.config.zeroMode ? ZERO_MODE_CODE : this.config.code;
    if (code) {
      this.wormhole.setCode(code);
    } else {
      await this.wormhole.inputCode(CODE_PROMPT, this.config.codeLength);
    }
  }

  private async verify(): Promise<void> {
    this.setState('verifying');
    const verifier = await this.wormhole.verify();
    if (this.config.verify) {
      this.print(`Verifier ${Buffer.from(verifier).toString('hex')}.`);
    }
  }

  private async nextMessage(): Promise<NegotiationMessage> {
    let bytes: Uint8Array;
    try {
      bytes = await this.wormhole.get();
    } catch (err) {
      if (err instanceof WormholeClosedError) {
        throw new TransferError('unexpected close');
      }
      throw err;
    }
    return decodeMessage(bytes);
  }

  private async send(message: OutboundMessage): Promise<void> {
    await this.wormhole.send(encodeMessage(message));
    this.logger.debug({ keys: Object.keys(message) }, 'Sent negotiation message');
  }

  // -------------------------------------------------------------------------
  // Transit
  // -------------------------------------------------------------------------

  private async handleTransit(hints: TransitHintSet): Promise<void> {
    if (this.transit) {
      this.logger.debug(
        { direct: hints.directHints.length, relay: hints.relayHints.length },
        'Ignoring additional transit hints'
      );
      return;
    }

    const transit = this.runtime.createTransit({
      transitHelper: this.config.transitHelper,
      noListen: this.config.noListen,
      logger: this.runtime.logger,
    });
    this.transit = transit;

    const key = this.wormhole.deriveKey(this.config.appId + TRANSIT_KEY_SUFFIX, transit.keyLength);
    transit.setTransitKey(key);
    transit.addPeerDirectHints(hints.directHints);
    transit.addPeerRelayHints(hints.relayHints);

    const directHints = await transit.ownDirectHints();
    const relayHints = await transit.ownRelayHints();
    await this.send(transitMessage({ directHints, relayHints }));
  }

  private async establishTransit(): Promise<RecordPipe> {
    this.setState('establishing-transit');
    if (!this.transit) {
      throw new TransferError('no transit hints received');
    }
    const pipe = await this.transit.connect();
    this.logger.info({ pipe: pipe.describe() }, 'Transit connected');
    return pipe;
  }

  // -------------------------------------------------------------------------
  // Offers
  // -------------------------------------------------------------------------

  /**
   * Process the offer. A local rejection is reported to the peer as
   * `{"error": reason}` and then fails the session with that reason.
   */
  private async dispatchOffer(offer: DecodedOffer): Promise<void> {
    try {
      await this.parseOffer(offer);
    } catch (err) {
      if (!(err instanceof ResponderError)) {
        throw err;
      }
      try {
        await this.send({ error: err.response });
      } catch (sendErr) {
        this.logger.warn({ err: sendErr, reason: err.response }, 'Failed to notify peer of rejection');
      }
      throw new TransferError(err.response, 'local-rejection');
    }
  }

  private async parseOffer(offer: DecodedOffer): Promise<void> {
    switch (offer.type) {
      case 'text':
        this.print(offer.body);
        await this.send({ answer: { message_ack: 'ok' } });
        return;

      case 'file': {
        const destination = await this.prepareFile(offer);
        const target = await FileTarget.create(destination, this.runtime.logger);
        await this.receivePayload(target, destination, offer.size);
        return;
      }

      case 'directory': {
        const destination = await this.prepareDirectory(offer);
        const target = await DirectoryTarget.create(destination, this.runtime.logger);
        await this.receivePayload(target, destination, offer.archiveSize);
        return;
      }

      case 'unsupported-directory':
        this.print(`Error: unknown directory-transfer mode '${offer.mode}'`);
        throw new ResponderError('unknown mode');

      case 'unknown':
        this.print("I don't know what they're offering");
        this.print(`Offer details: ${JSON.stringify(offer.raw)}`);
        throw new ResponderError('unknown offer type');
    }
  }

  private async prepareFile(offer: FileOffer): Promise<ResolvedDestination> {
    const destination = await this.decideDestination('file', offer.filename);
    this.print(`Receiving file (${offer.size} bytes) into: ${destination.name}`);
    await this.askPermission();
    return destination;
  }

  private async prepareDirectory(offer: DirectoryOffer): Promise<ResolvedDestination> {
    const destination = await this.decideDestination('directory', offer.dirname);
    this.print(`Receiving directory (${offer.archiveSize} bytes) into: ${destination.name}/`);
    this.print(`${offer.fileCount} files, ${offer.totalBytes} bytes (uncompressed)`);
    await this.askPermission();
    return destination;
  }

  private async decideDestination(kind: DestinationKind, proposedName: string): Promise<ResolvedDestination> {
    try {
      return await resolveDestination({
        kind,
        proposedName,
        outputFile: this.config.outputFile,
        cwd: this.config.cwd,
      });
    } catch (err) {
      throw this.asDestinationRejection(err);
    }
  }

  private asDestinationRejection(err: unknown): unknown {
    if (err instanceof DestinationExistsError) {
      this.print(`Error: refusing to overwrite existing ${err.kind} ${err.destName}`);
      return new ResponderError(err.message);
    }
    if (err instanceof InvalidDestinationError) {
      this.print(`Error: unusable ${err.kind} name '${err.proposedName}'`);
      return new ResponderError(err.message);
    }
    return err;
  }

  private async askPermission(): Promise<void> {
    this.setState('awaiting-consent');
    await this.gate.ask();
  }

  // -------------------------------------------------------------------------
  // Transfer and materialization
  // -------------------------------------------------------------------------

  private async receivePayload(
    target: TransferTarget,
    destination: ResolvedDestination,
    expectedSize: number
  ): Promise<void> {
    try {
      await this.send({ answer: { file_ack: 'ok' } });
      const pipe = await this.establishTransit();
      try {
        await this.transferData(pipe, target, expectedSize);
        await this.materialize(target, destination);

        this.setState('closing');
        await pipe.sendRecord(completionRecord);
        await pipe.close();
      } catch (err) {
        await this.closePipeQuietly(pipe);
        throw err;
      }
    } catch (err) {
      await this.discardQuietly(target);
      throw err;
    }
  }

  private async transferData(pipe: RecordPipe, target: TransferTarget, expectedSize: number): Promise<void> {
    this.setState('transferring');
    this.print(`Receiving (${pipe.describe()})..`);

    const startedAt = Date.now();
    let progressed = 0;
    const received = await pipe.writeToFile(target.sink, expectedSize, (bytes) => {
      progressed += bytes;
      this.runtime.onProgress?.(progressed, expectedSize);
    });
    this.logger.info({ received, expectedSize, durationMs: Date.now() - startedAt }, 'Payload received');

    if (received < expectedSize) {
      this.print('');
      this.print('Connection dropped before full file received');
      this.print(`got ${received} bytes, wanted ${expectedSize}`);
      throw new TransferError(
        `Connection dropped before full file received (got ${received} bytes, wanted ${expectedSize})`
      );
    }
    if (received > expectedSize) {
      throw new TransferError(
        `received more bytes than advertised (got ${received} bytes, wanted ${expectedSize})`
      );
    }
  }

  private async materialize(target: TransferTarget, destination: ResolvedDestination): Promise<void> {
    this.setState('materializing');
    if (destination.kind === 'directory') {
      this.print('Unpacking zipfile..');
    }
    try {
      await target.commit();
    } catch (err) {
      if (!(err instanceof DestinationExistsError)) throw err;
      // The offer was already answered with file_ack; the peer gets no second answer
      this.print(`Error: refusing to overwrite existing ${err.kind} ${err.destName}`);
      this.logger.warn({ destination: destination.absolutePath }, 'Destination appeared during transfer');
      throw new TransferError(err.message, 'local-rejection');
    }
    if (destination.kind === 'directory') {
      this.print(`Received files written to ${destination.name}/`);
    } else {
      this.print(`Received file written to ${destination.name}`);
    }
  }

  private async closePipeQuietly(pipe: RecordPipe): Promise<void> {
    try {
      await pipe.close();
    } catch (err) {
      this.logger.warn({ err }, 'Failed to close transit pipe');
    }
  }

  private async discardQuietly(target: TransferTarget): Promise<void> {
    try {
      await target.discard();
    } catch (err) {
      this.logger.warn({ err }, 'Failed to remove temporary transfer data');
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private print(line: string): void {
    this.runtime.stdout.write(line + '\n');
  }

  private setState(next: SessionState): void {
    if (this._state === next) return;
    this.logger.debug({ from: this._state, to: next }, 'Session state change');
    this._state = next;
  }
}

/**
 * Map a session failure onto a {@link SessionOutcome}.
 */
export function classifyFailure(err: unknown): SessionOutcome {
  if (err instanceof TransferError) {
    if (err.origin === 'local-rejection' || err.origin === 'peer') {
      return { status: 'rejected', reason: err.reason };
    }
    return { status: 'aborted', kind: 'transfer', message: err.reason };
  }
  if (err instanceof AuthenticationError) {
    return { status: 'aborted', kind: 'authentication', message: err.message };
  }
  if (err instanceof ConfigError) {
    return { status: 'aborted', kind: 'config', message: err.message };
  }
  if (isSystemError(err)) {
    return { status: 'aborted', kind: 'io', message: err.message };
  }
  return {
    status: 'aborted',
    kind: 'unexpected',
    message: err instanceof Error ? err.message : String(err),
  };
}

/**
 * Run one receive session and report how it ended. Never rejects.
 *
 * @example
 * ```ts
 * const outcome = await receive(config, wormhole, {
 *   createTransit: (options) => new TcpTransit(options),
 *   stdout: process.stdout,
 *   stderr: process.stderr,
 *   prompt: createReadlinePrompter(),
 *   logger: createLogger({ level: 'info' }),
 * });
 * if (outcome.status !== 'success') process.exitCode = 1;
 * ```
 */
export async function receive(
  config: ReceiveConfig,
  wormhole: WormholeChannel,
  runtime: ReceiveRuntime
): Promise<SessionOutcome> {
  const session = new ReceiveSession(config, wormhole, runtime);
  try {
    await session.go();
    return { status: 'success' };
  } catch (err) {
    return classifyFailure(err);
  }
}
