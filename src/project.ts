/**
 * Locating the project a command works on.
 *
 * A project is a directory holding a `package.json`. Inside an npm workspace a
 * member package can be selected by its name.
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import path from 'node:path';

import { DevSecretsError, SecretsIoError, errnoCode } from './errors.js';

const MANIFEST = 'package.json';

interface Manifest {
  name?: string;
  workspaces: string[];
}

function parseManifest(content: string, file: string): Manifest {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (e: unknown) {
    throw new DevSecretsError(`Invalid JSON in ${file}`, { cause: e });
  }
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new DevSecretsError(`${file} must contain a JSON object`);
  }

  const manifest: Manifest = { workspaces: [] };
  if ('name' in raw && typeof raw.name === 'string') {
    manifest.name = raw.name;
  }
  if ('workspaces' in raw) {
    // Either an array of patterns or `{ packages: [...] }`.
    const ws = raw.workspaces;
    const list =
      ws !== null && typeof ws === 'object' && !Array.isArray(ws) && 'packages' in ws
        ? ws.packages
        : ws;
    if (Array.isArray(list)) {
      manifest.workspaces = list.filter((p): p is string => typeof p === 'string');
    }
  }
  return manifest;
}

async function readManifest(dir: string): Promise<Manifest | null> {
  const file = path.join(dir, MANIFEST);
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (e: unknown) {
    const code = errnoCode(e);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return null;
    }
    throw new SecretsIoError(file, e);
  }
  return parseManifest(content, file);
}

/** Ancestors of `start`, nearest first, `start` included. */
function ancestors(start: string): string[] {
  const dirs: string[] = [];
  let dir = path.resolve(start);
  for (;;) {
    dirs.push(dir);
    const parent = path.dirname(dir);
    if (parent === dir) {
      return dirs;
    }
    dir = parent;
  }
}

/**
 * The nearest directory at or above `start` that holds a `package.json`.
 */
export async function findProjectRoot(start: string): Promise<string> {
  for (const dir of ancestors(start)) {
    if ((await readManifest(dir)) !== null) {
      return dir;
    }
  }
  throw new DevSecretsError(`Could not find ${MANIFEST} in ${path.resolve(start)} or any parent`);
}

/**
 * Expand workspace patterns relative to `root`.
 *
 * Supports plain directories (`tools/cli`) and a single trailing wildcard
 * segment (`packages/*`).
 */
async function expandWorkspaces(root: string, patterns: string[]): Promise<string[]> {
  const dirs: string[] = [];
  for (const pattern of patterns) {
    const normalized = pattern.replace(/\\/g, '/').replace(/\/+$/, '');
    if (!normalized.endsWith('/*')) {
      dirs.push(path.resolve(root, normalized));
      continue;
    }

    const parent = path.resolve(root, normalized.slice(0, -2));
    let entries: Dirent[];
    try {
      entries = await fs.readdir(parent, { withFileTypes: true });
    } catch (e: unknown) {
      if (errnoCode(e) === 'ENOENT') continue;
      throw new SecretsIoError(parent, e);
    }
    const names = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
    for (const name of names) {
      dirs.push(path.join(parent, name));
    }
  }
  return dirs;
}

/**
 * Find the directory of the workspace package called `name`.
 *
 * The workspace root is the nearest directory at or above `start` whose
 * `package.json` declares `workspaces`; the root package itself also matches.
 */
export async function findWorkspacePackage(start: string, name: string): Promise<string> {
  for (const dir of ancestors(start)) {
    const manifest = await readManifest(dir);
    if (manifest === null || manifest.workspaces.length === 0) {
      continue;
    }

    if (manifest.name === name) {
      return dir;
    }
    for (const member of await expandWorkspaces(dir, manifest.workspaces)) {
      const memberManifest = await readManifest(member);
      if (memberManifest?.name === name) {
        return member;
      }
    }
    throw new DevSecretsError(`No package named ${JSON.stringify(name)} in workspace ${dir}`);
  }
  throw new DevSecretsError(`No npm workspace found at or above ${path.resolve(start)}`);
}
