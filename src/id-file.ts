import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';

import { MalformedIdentifierError, SecretsIoError, errnoCode } from './errors.js';
import { SecretsId } from './models/secrets-id.js';

/** Name of the identifier file kept at the project root. */
export const ID_FILE_NAME = '.devsecrets_id.txt';

/** `link` errors of filesystems without hard links. */
const LINK_UNSUPPORTED = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS', 'EXDEV']);

export function idFilePath(projectRoot: string): string {
  return path.join(projectRoot, ID_FILE_NAME);
}

/**
 * Parse identifier file content.
 *
 * The file holds exactly one identifier. A single trailing line ending is
 * accepted; any other surrounding text is malformed.
 */
export function parseIdFileContent(content: string, filePath: string | null = null): SecretsId {
  const line = content.endsWith('\r\n')
    ? content.slice(0, -2)
    : content.endsWith('\n')
      ? content.slice(0, -1)
      : content;
  if (!SecretsId.isValid(line)) {
    throw new MalformedIdentifierError(content, filePath);
  }
  return SecretsId.parse(line);
}

/**
 * Read the identifier file at `filePath`.
 *
 * Returns `null` if the file does not exist (the project was never initialized).
 */
export async function readIdFile(filePath: string): Promise<SecretsId | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (e: unknown) {
    if (errnoCode(e) === 'ENOENT') {
      return null;
    }
    throw new SecretsIoError(filePath, e);
  }
  return parseIdFileContent(content, filePath);
}

/** Synchronous {@link readIdFile}, for binding at startup. */
export function readIdFileSync(filePath: string): SecretsId | null {
  let content: string;
  try {
    content = fsSync.readFileSync(filePath, 'utf-8');
  } catch (e: unknown) {
    if (errnoCode(e) === 'ENOENT') {
      return null;
    }
    throw new SecretsIoError(filePath, e);
  }
  return parseIdFileContent(content, filePath);
}

/**
 * Create the identifier file only if it does not exist yet.
 *
 * The identifier is written to a temporary sibling and hard-linked into place;
 * `link` fails with EEXIST when the file already exists, so an existing file is
 * never overwritten and readers never observe a partially written one. Where
 * hard links are unsupported, the file is created with an exclusive write.
 *
 * @returns whether this call created the file.
 */
export async function writeIdFileIfAbsent(filePath: string, id: SecretsId): Promise<boolean> {
  const tmpPath = `${filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
  try {
    await fs.writeFile(tmpPath, id.asStr(), { encoding: 'utf-8', flag: 'wx' });
  } catch (e: unknown) {
    throw new SecretsIoError(tmpPath, e);
  }

  try {
    await fs.link(tmpPath, filePath);
    return true;
  } catch (e: unknown) {
    const code = errnoCode(e);
    if (code === 'EEXIST') {
      return false;
    }
    if (code !== undefined && LINK_UNSUPPORTED.has(code)) {
      return writeExclusive(filePath, id);
    }
    throw new SecretsIoError(filePath, e);
  } finally {
    await fs.rm(tmpPath, { force: true });
  }
}

async function writeExclusive(filePath: string, id: SecretsId): Promise<boolean> {
  try {
    await fs.writeFile(filePath, id.asStr(), { encoding: 'utf-8', flag: 'wx' });
    return true;
  } catch (e: unknown) {
    if (errnoCode(e) === 'EEXIST') {
      return false;
    }
    throw new SecretsIoError(filePath, e);
  }
}

export interface EnsureIdFileResult {
  id: SecretsId;
  /** Whether the identifier file was created by this call. */
  created: boolean;
}

/**
 * Load the project's identifier, generating and persisting one if absent.
 *
 * When another process creates the file first, its identifier is read back so
 * that both callers agree. `newId` is only called when no file exists.
 */
export async function ensureIdFile(
  projectRoot: string,
  newId: () => SecretsId = SecretsId.generate,
): Promise<EnsureIdFileResult> {
  const filePath = idFilePath(projectRoot);
  const existing = await readIdFile(filePath);
  if (existing !== null) {
    return { id: existing, created: false };
  }

  const id = newId();
  if (await writeIdFileIfAbsent(filePath, id)) {
    return { id, created: true };
  }

  const winner = await readIdFile(filePath);
  if (winner === null) {
    throw new SecretsIoError(filePath, null, 'identifier file vanished after a concurrent write');
  }
  return { id: winner, created: false };
}
