/**
 * Error kinds raised by the credential store.
 *
 * Every error carries a `kind` so callers (the CLI in particular) can
 * branch on it without `instanceof` chains.
 */

export type CredentialErrorKind =
  | 'InvalidKey'
  | 'InvalidValue'
  | 'KeyNotFound'
  | 'ParseError'
  | 'IOError';

export abstract class CredentialStoreError extends Error {
  abstract readonly kind: CredentialErrorKind;
}

/** Dotted key has no `.` separator or an empty section/key component. */
export class InvalidKeyError extends CredentialStoreError {
  readonly kind = 'InvalidKey';
  public readonly key: string;

  constructor(key: string, reason: string) {
    super(`Invalid key ${JSON.stringify(key)}: ${reason}`);
    this.name = 'InvalidKeyError';
    this.key = key;
  }
}

/** Value cannot be represented in the credentials file. */
export class InvalidValueError extends CredentialStoreError {
  readonly kind = 'InvalidValue';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidValueError';
  }
}

export class KeyNotFoundError extends CredentialStoreError {
  readonly kind = 'KeyNotFound';
  public readonly key: string;

  constructor(key: string) {
    super(`Key '${key}' not found`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/** The credentials file is not a valid two-level TOML document. */
export class CredentialParseError extends CredentialStoreError {
  readonly kind = 'ParseError';
  public readonly filePath: string;

  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`Failed to parse ${filePath}: ${detail}`, options);
    this.name = 'CredentialParseError';
    this.filePath = filePath;
  }
}

/** A read, write, rename or mkdir against the credentials file failed. */
export class CredentialIOError extends CredentialStoreError {
  readonly kind = 'IOError';
  public readonly filePath: string;
  /** Temporary file a failed write could not remove; it may hold secrets. */
  public readonly leftoverTempPath?: string;

  constructor(filePath: string, operation: string, cause: unknown, leftoverTempPath?: string) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const leftover = leftoverTempPath ? ` (temporary file left at ${leftoverTempPath})` : '';
    super(`Failed to ${operation} ${filePath}: ${detail}${leftover}`, { cause });
    this.name = 'CredentialIOError';
    this.filePath = filePath;
    this.leftoverTempPath = leftoverTempPath;
  }
}

export function isCredentialStoreError(err: unknown): err is CredentialStoreError {
  return err instanceof CredentialStoreError;
}
