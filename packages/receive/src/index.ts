/**
 * @codedrop/receive: receiving side of a code-authenticated transfer
 *
 * Drives a wormhole channel and a transit channel from an authenticated
 * code to a delivered text message, file or directory.
 *
 * @example
 * ```ts
 * import { buildReceiveConfig, receive, createLogger, createReadlinePrompter } from '@codedrop/receive';
 *
 * const config = buildReceiveConfig({}, { code: '7-guitarist-revenge', acceptFile: true });
 * const outcome = await receive(config, wormhole, {
 *   createTransit,
 *   stdout: process.stdout,
 *   stderr: process.stderr,
 *   prompt: createReadlinePrompter(),
 *   logger: createLogger({ level: config.logLevel }),
 * });
 * ```
 */

// Types
export type {
  TextOffer,
  FileOffer,
  DirectoryOffer,
  UnknownOffer,
  UnsupportedDirectoryOffer,
  DecodedOffer,
  TransferOffer,
  EndpointDescriptor,
  TransitHintSet,
  NegotiationMessage,
  OutboundMessage,
  AbortKind,
  SessionOutcome,
  SessionState,
  LogLevel,
  ReceiveConfig,
  WormholeChannel,
  RecordPipe,
  TransitChannel,
  TransitOptions,
  TransitFactory,
  Prompter,
  OutputStream,
  ProgressCallback,
  ReceiveRuntime,
} from './types.js';

// Session
export { ReceiveSession, receive, classifyFailure } from './receive-session.js';

// Components
export { resolveDestination, finalComponent, pathExists } from './destination.js';
export type { DestinationRequest, ResolvedDestination } from './destination.js';
export { PermissionGate, createReadlinePrompter } from './permission.js';
export type { PermissionGateOptions, ReadlinePrompter } from './permission.js';
export {
  FileTarget,
  DirectoryTarget,
  sanitizeEntryPath,
  confinedPath,
  extractArchive,
} from './materialize.js';
export type { TransferTarget } from './materialize.js';
export { decodeMessage, decodeOffer, decodeHints, encodeMessage, transitMessage } from './messages.js';

// Errors
export {
  TransferError,
  AuthenticationError,
  WormholeClosedError,
  DestinationExistsError,
  InvalidDestinationError,
  ConfigError,
  isSystemError,
} from './errors.js';
export type {
  TransferErrorOrigin,
  DestinationKind,
  ConfigValidationError,
} from './errors.js';

// Configuration and logging
export {
  loadConfig,
  loadConfigFromString,
  buildReceiveConfig,
  validateReceiveConfig,
  resolveEnvRef,
  DEFAULT_RECEIVE_CONFIG,
} from './config-loader.js';
export type { ReceiveFileConfig, ConfigLoadResult, ReceiveOverrides } from './config-loader.js';
export { createLogger, createSilentLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';

// CLI
export { createProgram, registerReceiveCommand } from './cli.js';
export type { ReceiveCommandDeps, ReceiveCommandOptions, WormholeOpenOptions } from './cli.js';

// Constants
export {
  APP_ID,
  DIRECTORY_MODE_ZIP,
  COMPLETION_RECORD,
  ZERO_MODE_CODE,
  DEFAULT_RELAY_URL,
  DEFAULT_TRANSIT_HELPER,
  DEFAULT_CODE_LENGTH,
  LOG_LEVELS,
} from './constants.js';
