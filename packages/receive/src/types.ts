/**
 * Receive session types
 *
 * Offer and hint data decoded from negotiation messages, session
 * configuration, and the contracts of the three external channels the
 * session drives.
 */

import type { Writable } from 'node:stream';
import type { Logger } from 'pino';
import type { LOG_LEVELS } from './constants.js';

// ---------------------------------------------------------------------------
// Offers and hints
// ---------------------------------------------------------------------------

/** A text message offered by the peer */
export interface TextOffer {
  type: 'text';
  body: string;
}

/** A single file offered by the peer */
export interface FileOffer {
  type: 'file';
  filename: string;
  size: number;
}

/** A directory offered by the peer, sent as one archive */
export interface DirectoryOffer {
  type: 'directory';
  dirname: string;
  /** Size of the archive on the wire */
  archiveSize: number;
  fileCount: number;
  /** Uncompressed size of all files */
  totalBytes: number;
  /** Always `zipfile/deflated`; other modes decode as {@link UnsupportedDirectoryOffer} */
  mode: string;
}

/** Directory offer in an archive mode this receiver cannot unpack */
export interface UnsupportedDirectoryOffer {
  type: 'unsupported-directory';
  mode: string;
}

/** Offer with a shape this receiver does not know */
export interface UnknownOffer {
  type: 'unknown';
  raw: unknown;
}

export type TransferOffer = TextOffer | FileOffer | DirectoryOffer;

/** Anything an `offer` message can decode to */
export type DecodedOffer = TransferOffer | UnsupportedDirectoryOffer | UnknownOffer;

/**
 * Candidate network endpoint for the transit connection.
 *
 * Only `type` is interpreted here; the remaining fields are passed through
 * to the transit channel untouched.
 */
export interface EndpointDescriptor {
  type: string;
  [field: string]: unknown;
}

export interface TransitHintSet {
  directHints: EndpointDescriptor[];
  relayHints: EndpointDescriptor[];
}

/** Inbound negotiation message after decoding */
export type NegotiationMessage =
  | { kind: 'transit'; hints: TransitHintSet }
  | { kind: 'offer'; offer: DecodedOffer }
  | { kind: 'error'; reason: string }
  | { kind: 'unknown'; keys: string[] };

/** Outbound negotiation message */
export type OutboundMessage =
  | { transit: { direct_connection_hints: EndpointDescriptor[]; relay_connection_hints: EndpointDescriptor[] } }
  | { answer: { message_ack: 'ok' } | { file_ack: 'ok' } }
  | { error: string };

// ---------------------------------------------------------------------------
// Session outcome and state
// ---------------------------------------------------------------------------

export type AbortKind = 'authentication' | 'config' | 'transfer' | 'io' | 'unexpected';

export type SessionOutcome =
  | { status: 'success' }
  | { status: 'rejected'; reason: string }
  | { status: 'aborted'; kind: AbortKind; message: string };

export type SessionState =
  | 'awaiting-code'
  | 'verifying'
  | 'awaiting-message'
  | 'negotiating'
  | 'awaiting-consent'
  | 'establishing-transit'
  | 'transferring'
  | 'materializing'
  | 'closing'
  | 'succeeded'
  | 'failed';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Configuration of one receive session */
export interface ReceiveConfig {
  /** Application id used to scope derived keys */
  appId: string;

  /** Rendezvous relay URL handed to the wormhole factory */
  relayUrl: string;

  /** Transit relay helper hint, or null to use direct hints only */
  transitHelper: string | null;

  /** Pre-supplied code; prompts interactively when absent */
  code?: string;

  /** Number of code words for interactive entry */
  codeLength: number;

  /** Use the fixed "0-" code */
  zeroMode: boolean;

  /** Print the session verifier */
  verify: boolean;

  /** Suppress progress reporting */
  hideProgress: boolean;

  /** Skip the consent prompt */
  acceptFile: boolean;

  /** Override the destination name proposed by the peer */
  outputFile?: string;

  /** Absolute directory the destination is resolved against */
  cwd: string;

  /** Do not listen for inbound direct connections */
  noListen: boolean;

  logLevel: LogLevel;
}

// ---------------------------------------------------------------------------
// External channels
// ---------------------------------------------------------------------------

/**
 * Authenticated, encrypted message channel bootstrapped from a short code.
 *
 * `get()` rejects with `WormholeClosedError` once the peer has closed and
 * with `AuthenticationError` when the two sides used different codes.
 */
export interface WormholeChannel {
  setCode(code: string): void;
  inputCode(prompt: string, codeLength: number): Promise<void>;
  verify(): Promise<Uint8Array>;
  deriveKey(purpose: string, length: number): Uint8Array;
  send(data: Uint8Array): Promise<void>;
  get(): Promise<Uint8Array>;
  close(): Promise<void>;
}

/** Connected bulk duplex channel */
export interface RecordPipe {
  describe(): string;

  /**
   * Stream up to `expectedSize` payload bytes into `sink`, calling
   * `onProgress` with the size of each chunk written. Resolves with the
   * number of bytes actually received.
   */
  writeToFile(
    sink: Writable,
    expectedSize: number,
    onProgress: (bytes: number) => void
  ): Promise<number>;

  sendRecord(record: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/** Negotiates the bulk connection from exchanged hints */
export interface TransitChannel {
  /** Length in bytes of the key expected by {@link setTransitKey} */
  readonly keyLength: number;
  setTransitKey(key: Uint8Array): void;
  addPeerDirectHints(hints: EndpointDescriptor[]): void;
  addPeerRelayHints(hints: EndpointDescriptor[]): void;
  ownDirectHints(): Promise<EndpointDescriptor[]>;
  ownRelayHints(): Promise<EndpointDescriptor[]>;
  connect(): Promise<RecordPipe>;
}

export interface TransitOptions {
  transitHelper: string | null;
  noListen: boolean;
  logger: Logger;
}

export type TransitFactory = (options: TransitOptions) => TransitChannel;

/** Asks the operator a question and resolves with the trimmed answer */
export type Prompter = (question: string) => Promise<string>;

/** Minimal text sink for user-facing output */
export interface OutputStream {
  write(chunk: string): unknown;
}

/** Progress callback: bytes received so far out of the advertised total */
export type ProgressCallback = (received: number, total: number) => void;

/**
 * Everything a session needs from its host, passed in at construction.
 */
export interface ReceiveRuntime {
  createTransit: TransitFactory;
  stdout: OutputStream;
  stderr: OutputStream;
  prompt: Prompter;
  logger: Logger;
  onProgress?: ProgressCallback;
}
