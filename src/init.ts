import * as fs from 'node:fs/promises';

import { type ConfigOptions, resolveConfig } from './config.js';
import { NotInitializedError, SecretsIoError, errnoCode } from './errors.js';
import { ensureIdFile, idFilePath, readIdFile } from './id-file.js';
import { type Logger, defaultLogger } from './logger.js';
import type { SecretsId } from './models/secrets-id.js';
import { resolveSecretsDir } from './paths.js';

/**
 * Create `dir` and any missing parents. Succeeds if it already exists.
 *
 * @returns `dir`, now guaranteed to exist.
 */
export async function ensureDirectory(dir: string): Promise<string> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (e: unknown) {
    throw new SecretsIoError(dir, e);
  }

  const stat = await fs.stat(dir).catch((e: unknown) => {
    throw new SecretsIoError(dir, e);
  });
  if (!stat.isDirectory()) {
    throw new SecretsIoError(dir, null, 'path exists and is not a directory');
  }
  return dir;
}

export interface InitOptions extends ConfigOptions {
  /** Identifier factory for a first run. Defaults to {@link SecretsId.generate}. */
  newId?: () => SecretsId;
  logger?: Logger;
}

export interface InitResult {
  id: SecretsId;
  directory: string;
  /** Whether the identifier file was created by this run. */
  createdIdFile: boolean;
}

/**
 * Initialize devsecrets for a project.
 *
 * Loads the identifier (generating and persisting one on first run), then
 * ensures its secrets directory exists. Re-running never changes the
 * identifier and never removes existing secret files.
 */
export async function initRepository(
  projectRoot: string,
  options: InitOptions = {},
): Promise<InitResult> {
  const logger = options.logger ?? defaultLogger;
  const config = resolveConfig(options);

  const { id, created } = await ensureIdFile(projectRoot, options.newId);
  if (created) {
    logger.info({ path: idFilePath(projectRoot), id: id.asStr() }, 'created identifier file');
  } else {
    logger.debug({ path: idFilePath(projectRoot), id: id.asStr() }, 'using existing identifier');
  }

  const directory = await ensureDirectory(resolveSecretsDir(config.root, id));
  logger.debug({ directory }, 'secrets directory ready');

  return { id, directory, createdIdFile: created };
}

/**
 * Resolve the secrets directory of an initialized project without changing anything.
 *
 * Throws NotInitializedError if the identifier file or the directory is missing.
 */
export async function lookupSecretsDir(
  projectRoot: string,
  options: ConfigOptions = {},
): Promise<string> {
  const id = await readIdFile(idFilePath(projectRoot));
  if (id === null) {
    throw new NotInitializedError(projectRoot, 'no identifier file (run `devsecrets init`)');
  }

  const directory = resolveSecretsDir(resolveConfig(options).root, id);
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(directory)).isDirectory();
  } catch (e: unknown) {
    if (errnoCode(e) === 'ENOENT') {
      throw new NotInitializedError(
        projectRoot,
        `secrets directory ${directory} does not exist (run \`devsecrets init\`)`,
      );
    }
    throw new SecretsIoError(directory, e);
  }
  if (!isDirectory) {
    throw new SecretsIoError(directory, null, 'path exists and is not a directory');
  }
  return directory;
}
