/**
 * Negotiation message codec
 *
 * Inbound messages are UTF-8 JSON documents with a single meaningful
 * top-level key (`error`, `transit` or `offer`, checked in that order).
 * Decoding never performs I/O; anything that is not valid JSON object text
 * raises a TransferError.
 */

import { DIRECTORY_MODE_ZIP } from './constants.js';
import { TransferError } from './errors.js';
import type {
  DecodedOffer,
  EndpointDescriptor,
  NegotiationMessage,
  OutboundMessage,
  TransitHintSet,
} from './types.js';

const decoder = new TextDecoder('utf-8', { fatal: true });
const encoder = new TextEncoder();

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Decode one inbound negotiation message.
 *
 * @throws TransferError when the bytes are not a UTF-8 JSON object.
 */
export function decodeMessage(bytes: Uint8Array): NegotiationMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(bytes));
  } catch {
    throw new TransferError('malformed message');
  }
  if (!isObject(parsed)) {
    throw new TransferError('malformed message');
  }

  if ('error' in parsed) {
    const reason = parsed.error;
    return { kind: 'error', reason: typeof reason === 'string' ? reason : JSON.stringify(reason) };
  }
  if ('transit' in parsed) {
    return { kind: 'transit', hints: decodeHints(parsed.transit) };
  }
  if ('offer' in parsed) {
    return { kind: 'offer', offer: decodeOffer(parsed.offer) };
  }
  return { kind: 'unknown', keys: Object.keys(parsed) };
}

/** Extract the hint lists; a missing or malformed list counts as empty */
export function decodeHints(value: unknown): TransitHintSet {
  if (!isObject(value)) {
    return { directHints: [], relayHints: [] };
  }
  return {
    directHints: decodeHintList(value.direct_connection_hints),
    relayHints: decodeHintList(value.relay_connection_hints),
  };
}

function decodeHintList(value: unknown): EndpointDescriptor[] {
  if (!Array.isArray(value)) return [];
  const hints: EndpointDescriptor[] = [];
  for (const entry of value) {
    if (isObject(entry) && typeof entry.type === 'string') {
      hints.push({ ...entry, type: entry.type });
    }
  }
  return hints;
}

/**
 * Decode the body of an `offer` message.
 *
 * Shapes with missing or mistyped fields come back as `unknown`. A
 * directory `mode` other than `zipfile/deflated` is reported before any
 * other directory field is looked at.
 */
export function decodeOffer(value: unknown): DecodedOffer {
  if (!isObject(value)) {
    return { type: 'unknown', raw: value };
  }

  if ('message' in value) {
    if (typeof value.message === 'string') {
      return { type: 'text', body: value.message };
    }
    return { type: 'unknown', raw: value };
  }

  if ('file' in value) {
    const file = value.file;
    if (isObject(file) && typeof file.filename === 'string' && isCount(file.filesize)) {
      return { type: 'file', filename: file.filename, size: file.filesize };
    }
    return { type: 'unknown', raw: value };
  }

  if ('directory' in value) {
    const dir = value.directory;
    if (isObject(dir) && typeof dir.mode === 'string' && dir.mode !== DIRECTORY_MODE_ZIP) {
      return { type: 'unsupported-directory', mode: dir.mode };
    }
    if (
      isObject(dir) &&
      typeof dir.mode === 'string' &&
      typeof dir.dirname === 'string' &&
      isCount(dir.zipsize) &&
      isCount(dir.numfiles) &&
      isCount(dir.numbytes)
    ) {
      return {
        type: 'directory',
        mode: dir.mode,
        dirname: dir.dirname,
        archiveSize: dir.zipsize,
        fileCount: dir.numfiles,
        totalBytes: dir.numbytes,
      };
    }
    return { type: 'unknown', raw: value };
  }

  return { type: 'unknown', raw: value };
}

/** Encode an outbound negotiation message */
export function encodeMessage(message: OutboundMessage): Uint8Array {
  return encoder.encode(JSON.stringify(message));
}

export function transitMessage(hints: TransitHintSet): OutboundMessage {
  return {
    transit: {
      direct_connection_hints: hints.directHints,
      relay_connection_hints: hints.relayHints,
    },
  };
}
