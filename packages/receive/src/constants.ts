/**
 * Receive protocol constants
 *
 * Wire-level values shared with the sending side. Changing any of these
 * breaks compatibility with existing peers.
 */

/** Application id scoping every key derived from the wormhole */
export const APP_ID = 'lothar.com/wormhole/text-or-file-xfer' as const;

/** Suffix appended to the application id to derive the transit key */
export const TRANSIT_KEY_SUFFIX = '/transit-key' as const;

/** The only directory-transfer mode this receiver understands */
export const DIRECTORY_MODE_ZIP = 'zipfile/deflated' as const;

/** Record sent over the bulk pipe once the payload is safely on disk */
export const COMPLETION_RECORD = 'ok\n' as const;

/** Code used when zero mode is enabled (no real secret) */
export const ZERO_MODE_CODE = '0-' as const;

/** Suffix of the temporary sibling used while a file is being received */
export const TEMP_FILE_SUFFIX = '.tmp' as const;

/** Prompt shown when the code is entered interactively */
export const CODE_PROMPT = 'Enter receive code: ';

/** Prompt shown when asking for consent */
export const CONSENT_PROMPT = 'ok? (y/n): ';

/** Default rendezvous relay */
export const DEFAULT_RELAY_URL = 'ws://relay.magic-wormhole.io:4000/v1';

/** Default transit relay helper */
export const DEFAULT_TRANSIT_HELPER = 'tcp:transit.magic-wormhole.io:4001';

/** Default number of words in an interactively entered code */
export const DEFAULT_CODE_LENGTH = 2;

/** Log levels accepted by the config loader and the CLI */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
