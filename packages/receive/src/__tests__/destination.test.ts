import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { finalComponent, pathExists, resolveDestination } from '../destination.js';
import { DestinationExistsError, InvalidDestinationError } from '../errors.js';

describe('finalComponent', () => {
  it.each([
    ['report.pdf', 'report.pdf'],
    ['../../etc/passwd', 'passwd'],
    ['~/.ssh/authorized_keys', 'authorized_keys'],
    ['C:\\Users\\me\\notes.txt', 'notes.txt'],
    ['dir/', ''],
  ])('%s -> %s', (input, expected) => {
    expect(finalComponent(input)).toBe(expected);
  });
});

describe('resolveDestination', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codedrop-dest-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('places the final component under the working directory', async () => {
    const dest = await resolveDestination({ kind: 'file', proposedName: '../../etc/passwd', cwd: tmpDir });
    expect(dest).toEqual({ kind: 'file', name: 'passwd', absolutePath: path.join(tmpDir, 'passwd') });
  });

  it('prefers the caller-supplied name', async () => {
    const dest = await resolveDestination({
      kind: 'directory',
      proposedName: 'photos',
      outputFile: 'holiday',
      cwd: tmpDir,
    });
    expect(dest.name).toBe('holiday');
    expect(dest.absolutePath).toBe(path.join(tmpDir, 'holiday'));
  });

  it.each(['', '.', '..', 'dir/'])('rejects the unusable name %j', async (proposedName) => {
    await expect(resolveDestination({ kind: 'file', proposedName, cwd: tmpDir })).rejects.toBeInstanceOf(
      InvalidDestinationError
    );
  });

  it('refuses an existing file', async () => {
    fs.writeFileSync(path.join(tmpDir, 'a.txt'), 'x');
    const promise = resolveDestination({ kind: 'file', proposedName: 'a.txt', cwd: tmpDir });
    await expect(promise).rejects.toBeInstanceOf(DestinationExistsError);
    await expect(resolveDestination({ kind: 'file', proposedName: 'a.txt', cwd: tmpDir })).rejects.toThrow(
      'file already exists'
    );
  });

  it('refuses an existing directory for a directory offer', async () => {
    fs.mkdirSync(path.join(tmpDir, 'photos'));
    await expect(resolveDestination({ kind: 'directory', proposedName: 'photos', cwd: tmpDir })).rejects.toThrow(
      'directory already exists'
    );
  });

  it('treats a dangling symlink as existing', async () => {
    fs.symlinkSync(path.join(tmpDir, 'nowhere'), path.join(tmpDir, 'link'));
    await expect(resolveDestination({ kind: 'file', proposedName: 'link', cwd: tmpDir })).rejects.toBeInstanceOf(
      DestinationExistsError
    );
  });
});

describe('pathExists', () => {
  it('returns false for a missing path', async () => {
    expect(await pathExists(path.join(os.tmpdir(), 'codedrop-definitely-missing', 'x'))).toBe(false);
  });

  it('returns true for the temp directory', async () => {
    expect(await pathExists(os.tmpdir())).toBe(true);
  });
});
