/**
 * Error types raised by devsecrets.
 *
 * Every error extends {@link DevSecretsError}. The "not yet initialized" state of a
 * secrets directory is deliberately absent here: `DevSecrets.fromId` reports it as `null`.
 */

/** Base class for all devsecrets errors. */
export class DevSecretsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DevSecretsError';
  }
}

/** The identifier file exists but does not hold exactly one well-formed identifier. */
export class MalformedIdentifierError extends DevSecretsError {
  public readonly path: string | null;
  public readonly content: string;

  constructor(content: string, path: string | null = null) {
    const where = path === null ? '' : ` in ${path}`;
    super(`Malformed devsecrets identifier${where}: ${JSON.stringify(content)}`);
    this.name = 'MalformedIdentifierError';
    this.path = path;
    this.content = content;
  }
}

/** The identifier file a binding needs does not exist. */
export class MissingIdentifierError extends DevSecretsError {
  public readonly path: string;

  constructor(path: string) {
    super(`Devsecrets identifier file not found: ${path} (run \`devsecrets init\`)`);
    this.name = 'MissingIdentifierError';
    this.path = path;
  }
}

/** A filesystem operation failed for a reason other than expected absence. */
export class SecretsIoError extends DevSecretsError {
  public readonly path: string;
  public readonly code: string | undefined;

  constructor(path: string, cause: unknown, detail?: string) {
    const reason = detail ?? (cause instanceof Error ? cause.message : String(cause));
    super(`File error at ${path}: ${reason}`, { cause });
    this.name = 'SecretsIoError';
    this.path = path;
    this.code = errnoCode(cause);
  }
}

/**
 * A relative secret name would leave the secrets directory.
 *
 * Names must be relative and made of normal segments only. On unix:
 *
 * - `"mysecret.txt"` is valid.
 * - `"a/b/c.txt"` is valid.
 * - `"/etc/passwd"` is invalid.
 * - `"../../anotherfile.txt"` is invalid.
 * - `"a/../d/e.txt"` is invalid.
 */
export class InvalidSecretPathError extends DevSecretsError {
  public readonly secretName: string;

  constructor(secretName: string, reason: string) {
    super(`Invalid secret path ${JSON.stringify(secretName)}: ${reason}`);
    this.name = 'InvalidSecretPathError';
    this.secretName = secretName;
  }
}

/** The requested file does not exist inside an existing secrets directory. */
export class SecretNotFoundError extends DevSecretsError {
  public readonly secretName: string;
  public readonly path: string;

  constructor(secretName: string, path: string) {
    super(`Secret ${JSON.stringify(secretName)} not found at ${path}`);
    this.name = 'SecretNotFoundError';
    this.secretName = secretName;
    this.path = path;
  }
}

/** A formatted read was asked of a file without the format's extension. */
export class InvalidExtensionError extends DevSecretsError {
  public readonly secretName: string;
  public readonly expected: string;

  constructor(secretName: string, expected: string) {
    super(`Secret ${JSON.stringify(secretName)} must have a .${expected} extension`);
    this.name = 'InvalidExtensionError';
    this.secretName = secretName;
    this.expected = expected;
  }
}

/** A secret file could not be decoded or parsed. */
export class SecretParseError extends DevSecretsError {
  public readonly secretName: string;

  constructor(secretName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not parse secret ${JSON.stringify(secretName)}: ${reason}`, { cause });
    this.name = 'SecretParseError';
    this.secretName = secretName;
  }
}

/** A project has no identifier file or no secrets directory yet. */
export class NotInitializedError extends DevSecretsError {
  public readonly projectRoot: string;

  constructor(projectRoot: string, detail: string) {
    super(`Devsecrets not initialized for ${projectRoot}: ${detail}`);
    this.name = 'NotInitializedError';
    this.projectRoot = projectRoot;
  }
}

/** The errno code of a Node filesystem error, if it has one. */
export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
