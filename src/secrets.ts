import * as fs from 'node:fs/promises';
import path from 'node:path';

import { type ConfigOptions, resolveConfig } from './config.js';
import {
  InvalidExtensionError,
  InvalidSecretPathError,
  SecretNotFoundError,
  SecretParseError,
  SecretsIoError,
  errnoCode,
} from './errors.js';
import type { Format } from './format.js';
import type { SecretsId } from './models/secrets-id.js';
import { resolveSecretsDir } from './paths.js';

const DRIVE_PREFIX = /^[a-zA-Z]:/;

/**
 * Split a relative secret name into its segments, rejecting anything that
 * could address a file outside the secrets directory.
 */
function secretSegments(name: string): string[] {
  if (name === '') {
    throw new InvalidSecretPathError(name, 'name must not be empty');
  }
  if (name.includes('\0')) {
    throw new InvalidSecretPathError(name, 'name must not contain NUL');
  }
  if (path.posix.isAbsolute(name) || path.win32.isAbsolute(name) || DRIVE_PREFIX.test(name)) {
    throw new InvalidSecretPathError(name, 'name must not be absolute');
  }
  const segments = name.split(/[\\/]/);
  for (const segment of segments) {
    if (segment === '' || segment === '.' || segment === '..') {
      throw new InvalidSecretPathError(
        name,
        `name has a non-normal segment ${JSON.stringify(segment)}`,
      );
    }
  }
  return segments;
}

/** ENOTDIR means a parent segment is a regular file, so the secret cannot exist either. */
function readError(name: string, full: string, e: unknown): Error {
  const code = errnoCode(e);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return new SecretNotFoundError(name, full);
  }
  return new SecretsIoError(full, e);
}

/**
 * Read access to the files inside a project's secrets directory.
 *
 * Obtained from {@link DevSecrets.fromId}, which only returns a handle when
 * the directory exists. Every name passed to a read is checked to stay inside
 * the directory before the filesystem is touched.
 *
 * This API does not write to the secrets directory; use `devsecrets init` and
 * put files there yourself.
 */
export class DevSecrets {
  private readonly dir: string;

  private constructor(dir: string) {
    this.dir = dir;
  }

  /**
   * Open the secrets directory bound to `id`.
   *
   * Returns `null` if the directory does not exist (the project has not been
   * initialized on this machine). Throws SecretsIoError for any other
   * filesystem failure.
   */
  static async fromId(id: SecretsId, options: ConfigOptions = {}): Promise<DevSecrets | null> {
    const dir = resolveSecretsDir(resolveConfig(options).root, id);
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(dir)).isDirectory();
    } catch (e: unknown) {
      if (errnoCode(e) === 'ENOENT') {
        return null;
      }
      throw new SecretsIoError(dir, e);
    }
    if (!isDirectory) {
      throw new SecretsIoError(dir, null, 'path exists and is not a directory');
    }
    return new DevSecrets(dir);
  }

  /** Absolute path of the secrets directory. */
  get path(): string {
    return this.dir;
  }

  /** Absolute path of the secret `name`, after checking it stays inside the directory. */
  resolve(name: string): string {
    const full = path.join(this.dir, ...secretSegments(name));
    const rel = path.relative(this.dir, full);
    if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      throw new InvalidSecretPathError(name, 'name resolves outside the secrets directory');
    }
    return full;
  }

  async read(name: string): Promise<Buffer> {
    const full = this.resolve(name);
    try {
      return await fs.readFile(full);
    } catch (e: unknown) {
      throw readError(name, full, e);
    }
  }

  /** Read a secret as UTF-8 text. Invalid UTF-8 is a SecretParseError. */
  async readText(name: string): Promise<string> {
    const bytes = await this.read(name);
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (e: unknown) {
      throw new SecretParseError(name, e);
    }
  }

  /** Whether the secret `name` exists as a regular file. */
  async has(name: string): Promise<boolean> {
    const full = this.resolve(name);
    try {
      return (await fs.stat(full)).isFile();
    } catch (e: unknown) {
      const code = errnoCode(e);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return false;
      }
      throw new SecretsIoError(full, e);
    }
  }

  /**
   * Start a read of `name`.
   *
   * ```ts
   * const creds = await secrets
   *   .readFrom('service.json')
   *   .withFormat(jsonFormat)
   *   .intoValue(parseServiceCredentials);
   * ```
   */
  readFrom(name: string): SecretSource {
    return new SecretSource(this, name);
  }
}

/** A pending read of one secret file, created by {@link DevSecrets.readFrom}. */
export class SecretSource {
  private readonly secrets: DevSecrets;
  readonly name: string;

  constructor(secrets: DevSecrets, name: string) {
    this.secrets = secrets;
    this.name = name;
  }

  toBytes(): Promise<Buffer> {
    return this.secrets.read(this.name);
  }

  toText(): Promise<string> {
    return this.secrets.readText(this.name);
  }

  /** Open the file for streaming reads. The caller closes the handle. */
  async open(): Promise<fs.FileHandle> {
    const full = this.secrets.resolve(this.name);
    try {
      return await fs.open(full, 'r');
    } catch (e: unknown) {
      throw readError(this.name, full, e);
    }
  }

  /** Parse the file with `format`. The name must carry the format's extension. */
  withFormat(format: Format): FormattedSecretSource {
    return new FormattedSecretSource(this.secrets, this.name, format);
  }
}

/** A secret read that parses the file, created by {@link SecretSource.withFormat}. */
export class FormattedSecretSource {
  private readonly secrets: DevSecrets;
  private readonly name: string;
  private readonly format: Format;

  constructor(secrets: DevSecrets, name: string, format: Format) {
    this.secrets = secrets;
    this.name = name;
    this.format = format;
  }

  /**
   * Read and parse the file. With `parse`, the parsed value is passed through
   * it; anything it throws becomes a SecretParseError.
   */
  intoValue(): Promise<unknown>;
  intoValue<T>(parse: (value: unknown) => T): Promise<T>;
  async intoValue<T>(parse?: (value: unknown) => T): Promise<T | unknown> {
    this.secrets.resolve(this.name);
    if (path.extname(this.name) !== `.${this.format.extension}`) {
      throw new InvalidExtensionError(this.name, this.format.extension);
    }

    const text = await this.secrets.readText(this.name);
    try {
      const value = this.format.parse(text);
      return parse === undefined ? value : parse(value);
    } catch (e: unknown) {
      throw new SecretParseError(this.name, e);
    }
  }
}
