/**
 * credkeep — local per-user credential store.
 *
 * ```ts
 * import { openCredentialStore } from 'credkeep';
 *
 * const store = openCredentialStore();
 * store.set('database.password', 's3cret');
 * store.get('database.password'); // { kind: 'string', value: 's3cret' }
 * ```
 */

export {
  CredentialStore,
  openCredentialStore,
  type CredentialStoreOptions,
  type SectionListing,
} from './store/credential-store.js';
export {
  APP_NAME,
  CREDENTIALS_FILENAME,
  FILE_ENV_VAR,
  defaultConfigDir,
  expandHome,
  resolveCredentialsPath,
  type PathResolverOptions,
} from './paths.js';
export {
  Value,
  VALUE_KINDS,
  type ValueKind,
  type ValueType,
  type ValueInput,
  type StringValue,
  type IntegerValue,
  type FloatValue,
  type BooleanValue,
} from './models/value.js';
export { parseDottedKey, formatDottedKey, type DottedKey } from './models/dotted-key.js';
export {
  parseCredentialFile,
  serializeCredentialFile,
  type CredentialFile,
  type Section,
} from './format/toml.js';
export {
  CredentialStoreError,
  InvalidKeyError,
  InvalidValueError,
  KeyNotFoundError,
  CredentialParseError,
  CredentialIOError,
  isCredentialStoreError,
  type CredentialErrorKind,
} from './errors.js';
