/**
 * Binding a project's identifier into a program.
 *
 * A program must never run without a bound identifier, so both ways of binding
 * fail hard on a missing or malformed identifier file:
 *
 * - {@link bindId} at module load, for programs run from source:
 *   `export const SECRETS_ID = bindId(projectDir);`
 * - {@link writeBindingModule} as a build step (`devsecrets bind` in
 *   `prebuild`), which emits a module holding the identifier as a constant.
 */

import * as fs from 'node:fs/promises';
import path from 'node:path';

import { MissingIdentifierError, SecretsIoError, errnoCode } from './errors.js';
import { idFilePath, readIdFileSync } from './id-file.js';
import type { SecretsId } from './models/secrets-id.js';

/** Module specifier the generated binding imports `SecretsId` from by default. */
export const DEFAULT_IMPORT_FROM = 'devsecrets';

/**
 * Read and validate the identifier file of `projectRoot`.
 *
 * Throws MissingIdentifierError if the file does not exist and
 * MalformedIdentifierError if it is invalid. The result is never re-read.
 */
export function bindId(projectRoot: string): SecretsId {
  const filePath = idFilePath(projectRoot);
  const id = readIdFileSync(filePath);
  if (id === null) {
    throw new MissingIdentifierError(filePath);
  }
  return id;
}

/** Source text of a module exporting `id` as the constant `SECRETS_ID`. */
export function renderBindingModule(
  id: SecretsId,
  importFrom: string = DEFAULT_IMPORT_FROM,
): string {
  return [
    '// Generated by `devsecrets bind`. Do not edit.',
    `import { SecretsId } from ${JSON.stringify(importFrom)};`,
    '',
    `export const SECRETS_ID: SecretsId = SecretsId.parse(${JSON.stringify(id.asStr())});`,
    '',
  ].join('\n');
}

/**
 * Bind `projectRoot`'s identifier and write the binding module to `outFile`
 * (relative paths are taken from `projectRoot`).
 *
 * The file is only rewritten when its content changes, so watchers are not
 * triggered by every build.
 *
 * @returns the bound identifier and the absolute path written.
 */
export async function writeBindingModule(
  projectRoot: string,
  outFile: string,
  importFrom: string = DEFAULT_IMPORT_FROM,
): Promise<{ id: SecretsId; outFile: string }> {
  const id = bindId(projectRoot);
  const target = path.resolve(projectRoot, outFile);
  const content = renderBindingModule(id, importFrom);

  let current: string | null;
  try {
    current = await fs.readFile(target, 'utf-8');
  } catch (e: unknown) {
    if (errnoCode(e) !== 'ENOENT') {
      throw new SecretsIoError(target, e);
    }
    current = null;
  }

  if (current !== content) {
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf-8');
    } catch (e: unknown) {
      throw new SecretsIoError(target, e);
    }
  }
  return { id, outFile: target };
}
