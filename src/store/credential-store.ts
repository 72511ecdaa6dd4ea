/**
 * File-backed credential store addressed by dotted keys (`section.key`).
 *
 * Each instance is an independent handle on one credentials file; there is
 * no process-wide store. Reads are served from an in-memory copy loaded on
 * first access. Writes reload the file first, apply the change and replace
 * the file atomically, so a second process never has its earlier write
 * silently overwritten by a stale in-memory copy of ours. Two processes
 * writing at the same moment still race: the later rename wins in full.
 *
 * All operations are synchronous, so a load-mutate-persist sequence cannot
 * interleave with another one in the same process.
 */

import { CredentialIOError, KeyNotFoundError } from '../errors.js';
import {
  cloneSection,
  parseCredentialFile,
  serializeCredentialFile,
  type CredentialFile,
  type Section,
} from '../format/toml.js';
import { parseDottedKey } from '../models/dotted-key.js';
import { Value, type ValueInput, type ValueType } from '../models/value.js';
import { resolveCredentialsPath } from '../paths.js';
import {
  AtomicWriteError,
  nodeFileSystem,
  writeFileAtomicSync,
  type SyncFileSystem,
} from '../storage/atomic-file.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CredentialStoreOptions {
  /** Explicit file path; takes precedence over `CREDKEEP_FILE`. */
  path?: string;
  /** Environment used for path resolution. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Re-read the file on every read instead of serving the cached copy. */
  alwaysReload?: boolean;
  /** File system used for all I/O. Defaults to `node:fs`. */
  fs?: SyncFileSystem;
}

export interface SectionListing {
  section: string;
  keys: string[];
}

// ---------------------------------------------------------------------------
// CredentialStore
// ---------------------------------------------------------------------------

export class CredentialStore {
  private explicitPath: string | undefined;
  private resolvedPath: string | null = null;
  private cache: CredentialFile | null = null;
  private readonly env: NodeJS.ProcessEnv | undefined;
  private readonly alwaysReload: boolean;
  private readonly fs: SyncFileSystem;

  constructor(options: CredentialStoreOptions = {}) {
    this.explicitPath = options.path;
    this.env = options.env;
    this.alwaysReload = options.alwaysReload ?? false;
    this.fs = options.fs ?? nodeFileSystem;
  }

  // -----------------------------------------------------------------------
  // Location
  // -----------------------------------------------------------------------

  /** Point this handle at another file, dropping anything cached. */
  init(filePath: string): void {
    this.explicitPath = filePath;
    this.resolvedPath = null;
    this.cache = null;
  }

  /** Absolute path of the backing file (resolved once, then cached). */
  path(): string {
    if (this.resolvedPath === null) {
      this.resolvedPath = resolveCredentialsPath(this.explicitPath, { env: this.env });
    }
    return this.resolvedPath;
  }

  exists(): boolean {
    return this.fs.existsSync(this.path());
  }

  /** Forget the cached contents; the next access re-reads the file. */
  reload(): void {
    this.cache = null;
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  /**
   * Look up a value by dotted key.
   *
   * With a `defaultValue` argument (even `undefined`), a missing section or
   * key returns it instead of throwing.
   *
   * @throws {InvalidKeyError} when the key is not `section.key`.
   * @throws {KeyNotFoundError} when absent and no default was passed.
   */
  get(dottedKey: string): ValueType;
  get<D>(dottedKey: string, defaultValue: D): ValueType | D;
  get<D>(dottedKey: string, ...fallback: [] | [D]): ValueType | D {
    const { section, key } = parseDottedKey(dottedKey);
    const value = this.read().get(section)?.get(key);
    if (value !== undefined) {
      return Value.copy(value);
    }
    if (fallback.length === 1) {
      return fallback[0];
    }
    throw new KeyNotFoundError(dottedKey);
  }

  /** Copy of one section's entries; empty when the section does not exist. */
  getSection(section: string): Section {
    const found = this.read().get(section);
    return found === undefined ? new Map() : cloneSection(found);
  }

  /** Every section with its key names, in file order. Values are not included. */
  listAll(): SectionListing[] {
    return [...this.read()].map(([section, entries]) => ({ section, keys: [...entries.keys()] }));
  }

  listSections(): string[] {
    return [...this.read().keys()];
  }

  /** Key names in `section`, in file order; empty when it does not exist. */
  listKeys(section: string): string[] {
    return [...(this.read().get(section)?.keys() ?? [])];
  }

  // -----------------------------------------------------------------------
  // Writes
  // -----------------------------------------------------------------------

  /**
   * Store a value, creating the section if needed. An existing key keeps its
   * position; a new key is appended to its section.
   *
   * @throws {InvalidKeyError} when the key is not `section.key`.
   * @throws {InvalidValueError} for non-finite floats or unsafe integers.
   */
  set(dottedKey: string, value: ValueInput): void {
    const { section, key } = parseDottedKey(dottedKey);
    const normalized = Value.from(value);

    const data = this.load();
    let entries = data.get(section);
    if (entries === undefined) {
      entries = new Map();
      data.set(section, entries);
    }
    entries.set(key, normalized);
    this.persist(data);
  }

  /**
   * Delete a key. A section left without keys is kept (as an empty
   * `[section]`), not deleted.
   *
   * @throws {InvalidKeyError} when the key is not `section.key`.
   * @throws {KeyNotFoundError} when the key does not exist.
   */
  remove(dottedKey: string): void {
    const { section, key } = parseDottedKey(dottedKey);

    const data = this.load();
    const entries = data.get(section);
    if (entries === undefined || !entries.delete(key)) {
      throw new KeyNotFoundError(dottedKey);
    }
    this.persist(data);
  }

  // -----------------------------------------------------------------------
  // Load / persist
  // -----------------------------------------------------------------------

  private read(): CredentialFile {
    if (this.cache === null || this.alwaysReload) {
      this.cache = this.load();
    }
    return this.cache;
  }

  /**
   * Fresh copy of the on-disk contents; a missing file is an empty one.
   * Mutating callers work on this copy so the cache only changes after a
   * successful persist.
   */
  private load(): CredentialFile {
    const filePath = this.path();
    if (!this.fs.existsSync(filePath)) {
      return new Map();
    }

    let source: string;
    try {
      source = this.fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new CredentialIOError(filePath, 'read', err);
    }
    return parseCredentialFile(source, filePath);
  }

  private persist(data: CredentialFile): void {
    const filePath = this.path();
    try {
      writeFileAtomicSync(filePath, serializeCredentialFile(data), this.fs);
    } catch (err) {
      if (err instanceof AtomicWriteError) {
        throw new CredentialIOError(filePath, err.operation, err.cause, err.leftoverTempPath);
      }
      throw err;
    }
    this.cache = data;
  }
}

/** Open a store on `filePath`, or on the resolved default location. */
export function openCredentialStore(filePath?: string): CredentialStore {
  return new CredentialStore({ path: filePath });
}
