/**
 * Destination Resolver
 *
 * Maps a peer-proposed name onto an absolute path under the working
 * directory. Only the final path component of the proposal is used, so
 * names like `~/.ssh/authorized_keys` or `../../etc/passwd` cannot leave
 * the working directory. Existing paths are never overwritten.
 */

import { lstat } from 'node:fs/promises';
import * as path from 'node:path';
import { DestinationExistsError, InvalidDestinationError, isSystemError } from './errors.js';
import type { DestinationKind } from './errors.js';

export interface DestinationRequest {
  kind: DestinationKind;
  /** Name proposed by the peer */
  proposedName: string;
  /** Caller-supplied name that replaces the proposal */
  outputFile?: string;
  /** Absolute working directory */
  cwd: string;
}

export interface ResolvedDestination {
  kind: DestinationKind;
  /** Final path component actually used */
  name: string;
  absolutePath: string;
}

/** Last component of a name, treating both `/` and `\` as separators */
export function finalComponent(name: string): string {
  const parts = name.split(/[\\/]+/);
  return parts[parts.length - 1] ?? '';
}

/** Whether anything (including a dangling symlink) exists at `target` */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await lstat(target);
    return true;
  } catch (err) {
    if (isSystemError(err) && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

/**
 * Resolve the destination for an offer.
 *
 * @throws InvalidDestinationError when the name reduces to nothing usable
 * @throws DestinationExistsError when the path is already taken
 */
export async function resolveDestination(request: DestinationRequest): Promise<ResolvedDestination> {
  const name = request.outputFile ?? finalComponent(request.proposedName);
  if (name === '' || name === '.' || name === '..') {
    throw new InvalidDestinationError(request.kind, request.proposedName);
  }

  const absolutePath = path.resolve(request.cwd, name);
  if (await pathExists(absolutePath)) {
    throw new DestinationExistsError(request.kind, name);
  }

  return { kind: request.kind, name, absolutePath };
}
