import * as fsSync from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';

/** The subset of `node:fs` the credentials file needs. Swappable in tests. */
export interface SyncFileSystem {
  existsSync(path: string): boolean;
  readFileSync(path: string, encoding: 'utf-8'): string;
  writeFileSync(path: string, data: string, options: { encoding: 'utf-8'; mode: number }): void;
  mkdirSync(path: string, options: { recursive: true; mode: number }): unknown;
  renameSync(oldPath: string, newPath: string): void;
  unlinkSync(path: string): void;
}

export const nodeFileSystem: SyncFileSystem = fsSync;

/** Owner read/write only. */
export const FILE_MODE = 0o600;
/** Owner read/write/search only. */
export const DIR_MODE = 0o700;

/** Failure at a named step, so callers can report which operation broke. */
export class AtomicWriteError extends Error {
  public readonly operation: 'create directory for' | 'write' | 'replace';
  /** Set when the temporary file could not be cleaned up after the failure. */
  public readonly leftoverTempPath?: string;

  constructor(operation: AtomicWriteError['operation'], cause: unknown, leftoverTempPath?: string) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'AtomicWriteError';
    this.operation = operation;
    this.leftoverTempPath = leftoverTempPath;
  }
}

/** Temporary sibling of `target`, unique per call. */
export function tempPathFor(target: string): string {
  const suffix = `${process.pid}.${randomBytes(6).toString('hex')}`;
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
}

/**
 * Replace `target` with `content` so that readers see either the previous
 * complete file or the new one.
 *
 * The parent directory is created first (mode 0700) if missing. Content is
 * written to a temporary file in the same directory with mode 0600 and then
 * renamed over the target. If any step fails the temporary file is removed
 * and the target is left untouched.
 *
 * @throws {AtomicWriteError}
 */
export function writeFileAtomicSync(
  target: string,
  content: string,
  fs: SyncFileSystem = nodeFileSystem,
): void {
  const dir = path.dirname(target);
  try {
    fs.mkdirSync(dir, { recursive: true, mode: DIR_MODE });
  } catch (err) {
    throw new AtomicWriteError('create directory for', err);
  }

  const tmpPath = tempPathFor(target);
  let step: AtomicWriteError['operation'] = 'write';
  try {
    fs.writeFileSync(tmpPath, content, { encoding: 'utf-8', mode: FILE_MODE });
    step = 'replace';
    fs.renameSync(tmpPath, target);
  } catch (err) {
    const removed = removeTempFile(fs, tmpPath);
    throw new AtomicWriteError(step, err, removed ? undefined : tmpPath);
  }
}

/** Returns false only when the file exists and could not be deleted. */
function removeTempFile(fs: SyncFileSystem, filePath: string): boolean {
  if (!fs.existsSync(filePath)) return true;
  try {
    fs.unlinkSync(filePath);
    return true;
  } catch {
    return false;
  }
}
