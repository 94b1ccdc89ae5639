/**
 * devsecrets — development secrets kept outside the repository.
 *
 * Re-exports all public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Identifier
// ---------------------------------------------------------------------------

export { SecretsId } from './models/secrets-id.js';
export {
  ID_FILE_NAME,
  idFilePath,
  parseIdFileContent,
  readIdFile,
  readIdFileSync,
  writeIdFileIfAbsent,
  ensureIdFile,
  type EnsureIdFileResult,
} from './id-file.js';

// ---------------------------------------------------------------------------
// Configuration and paths
// ---------------------------------------------------------------------------

export {
  type ConfigOptions,
  type ResolvedConfig,
  DEVSECRETS_DIR_NAME,
  ROOT_ENV_VAR,
  defaultBaseRoot,
  resolveConfig,
} from './config.js';
export { resolveSecretsDir } from './paths.js';
export { findProjectRoot, findWorkspacePackage } from './project.js';

// ---------------------------------------------------------------------------
// Initialization
// ---------------------------------------------------------------------------

export {
  ensureDirectory,
  initRepository,
  lookupSecretsDir,
  type InitOptions,
  type InitResult,
} from './init.js';

// ---------------------------------------------------------------------------
// Access
// ---------------------------------------------------------------------------

export { DevSecrets, SecretSource, FormattedSecretSource } from './secrets.js';
export { type Format, jsonFormat, tomlFormat } from './format.js';

// ---------------------------------------------------------------------------
// Binding
// ---------------------------------------------------------------------------

export { bindId, renderBindingModule, writeBindingModule, DEFAULT_IMPORT_FROM } from './binder.js';

// ---------------------------------------------------------------------------
// Errors and logging
// ---------------------------------------------------------------------------

export {
  DevSecretsError,
  MalformedIdentifierError,
  MissingIdentifierError,
  SecretsIoError,
  InvalidSecretPathError,
  SecretNotFoundError,
  InvalidExtensionError,
  SecretParseError,
  NotInitializedError,
} from './errors.js';
export { type Logger, createLogger } from './logger.js';
