/**
 * Materialization
 *
 * Payload bytes never land at the final destination name while they are
 * still arriving. A file is received into a `.tmp` sibling and renamed into
 * place; a directory archive is spooled into a private temp directory and
 * extracted only after the transfer checks passed.
 */

import { mkdir, mkdtemp, open, readFile, rename, rm, writeFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import JSZip from 'jszip';
import type { Logger } from 'pino';
import { TEMP_FILE_SUFFIX } from './constants.js';
import type { ResolvedDestination } from './destination.js';
import { pathExists } from './destination.js';
import { DestinationExistsError } from './errors.js';

/** Where the record pipe writes, and how the result is moved into place */
export interface TransferTarget {
  readonly sink: Writable;
  /** Flush, sync and close the temporary store */
  finish(): Promise<void>;
  /** Move the payload to the destination */
  commit(): Promise<void>;
  /** Drop all temporary state; the destination stays absent */
  discard(): Promise<void>;
}

/**
 * Temporary store backed by an exclusively created file.
 */
abstract class SpooledTarget implements TransferTarget {
  readonly sink: Writable;
  protected readonly destination: ResolvedDestination;
  protected readonly logger: Logger;
  protected readonly spoolPath: string;
  private readonly handle: FileHandle;
  private closed = false;

  protected constructor(
    destination: ResolvedDestination,
    spoolPath: string,
    handle: FileHandle,
    logger: Logger
  ) {
    this.destination = destination;
    this.spoolPath = spoolPath;
    this.handle = handle;
    this.logger = logger;
    this.sink = handle.createWriteStream({ autoClose: false });
  }

  async finish(): Promise<void> {
    if (this.closed) return;
    this.sink.end();
    await finished(this.sink);
    await this.handle.sync();
    await this.closeHandle();
  }

  abstract commit(): Promise<void>;

  async discard(): Promise<void> {
    if (!this.sink.destroyed) {
      this.sink.destroy();
    }
    await this.closeHandle();
    await this.removeSpool();
  }

  protected abstract removeSpool(): Promise<void>;

  protected async assertDestinationAbsent(): Promise<void> {
    if (await pathExists(this.destination.absolutePath)) {
      throw new DestinationExistsError(this.destination.kind, this.destination.name);
    }
  }

  private async closeHandle(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

/**
 * Receives a single file into `<destination>.tmp`.
 */
export class FileTarget extends SpooledTarget {
  static async create(destination: ResolvedDestination, logger: Logger): Promise<FileTarget> {
    const tempPath = destination.absolutePath + TEMP_FILE_SUFFIX;
    const handle = await open(tempPath, 'wx');
    return new FileTarget(destination, tempPath, handle, logger.child({ component: 'file-target' }));
  }

  get tempPath(): string {
    return this.spoolPath;
  }

  async commit(): Promise<void> {
    await this.finish();
    await this.assertDestinationAbsent();
    await rename(this.spoolPath, this.destination.absolutePath);
    this.logger.debug({ from: this.spoolPath, to: this.destination.absolutePath }, 'File renamed into place');
  }

  protected async removeSpool(): Promise<void> {
    await rm(this.spoolPath, { force: true });
  }
}

/**
 * Spools a zip archive into a private temp directory and extracts it into
 * the destination directory on commit.
 */
export class DirectoryTarget extends SpooledTarget {
  private readonly spoolDir: string;

  private constructor(
    destination: ResolvedDestination,
    spoolDir: string,
    handle: FileHandle,
    logger: Logger
  ) {
    super(destination, path.join(spoolDir, 'payload.zip'), handle, logger);
    this.spoolDir = spoolDir;
  }

  static async create(
    destination: ResolvedDestination,
    logger: Logger,
    tempRoot: string = os.tmpdir()
  ): Promise<DirectoryTarget> {
    const spoolDir = await mkdtemp(path.join(tempRoot, 'codedrop-'));
    try {
      const handle = await open(path.join(spoolDir, 'payload.zip'), 'wx');
      return new DirectoryTarget(destination, spoolDir, handle, logger.child({ component: 'directory-target' }));
    } catch (err) {
      await rm(spoolDir, { recursive: true, force: true });
      throw err;
    }
  }

  async commit(): Promise<void> {
    await this.finish();
    try {
      const archive = await JSZip.loadAsync(await readFile(this.spoolPath));
      await this.assertDestinationAbsent();
      const written = await extractArchive(archive, this.destination.absolutePath);
      this.logger.debug({ destination: this.destination.absolutePath, entries: written }, 'Archive extracted');
    } finally {
      await this.removeSpool();
    }
  }

  protected async removeSpool(): Promise<void> {
    await rm(this.spoolDir, { recursive: true, force: true });
  }
}

/**
 * Reduce an archive entry name to a relative path with no empty, `.`, `..`
 * or drive-letter segments. Returns null when nothing is left.
 *
 * @example
 * sanitizeEntryPath('../../evil')    // => 'evil'
 * sanitizeEntryPath('/tmp/oops')     // => 'tmp/oops'
 * sanitizeEntryPath('C:\\x\\y.txt')  // => 'x/y.txt'
 */
export function sanitizeEntryPath(entryName: string): string | null {
  const segments = entryName
    .split(/[\\/]+/)
    .filter((segment) => segment !== '' && segment !== '.' && segment !== '..');
  if (segments.length > 0 && /^[A-Za-z]:$/.test(segments[0] ?? '')) {
    segments.shift();
  }
  return segments.length > 0 ? segments.join('/') : null;
}

/** Absolute path of an entry under `root`, or null if it would escape */
export function confinedPath(root: string, entryName: string): string | null {
  const relative = sanitizeEntryPath(entryName);
  if (relative === null) return null;
  const target = path.resolve(root, relative);
  const back = path.relative(root, target);
  if (back === '' || back === '..' || back.startsWith('..' + path.sep) || path.isAbsolute(back)) {
    return null;
  }
  return target;
}

/**
 * Extract every entry of `archive` under `root`, which must not exist yet.
 * A partially extracted tree is removed when extraction fails.
 *
 * @returns number of files written
 */
export async function extractArchive(archive: JSZip, root: string): Promise<number> {
  const entries = Object.values(archive.files);

  await mkdir(root);
  let written = 0;
  try {
    for (const entry of entries) {
      const target = confinedPath(root, entry.name);
      if (target === null) continue;

      if (entry.dir) {
        await mkdir(target, { recursive: true });
        continue;
      }
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, await entry.async('nodebuffer'));
      written++;
    }
  } catch (err) {
    await rm(root, { recursive: true, force: true });
    throw err;
  }
  return written;
}
