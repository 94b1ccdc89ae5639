/**
 * Implementations behind the `devsecrets` CLI commands.
 *
 * Each returns a JSON-serialisable result; `cli/main.ts` only parses
 * arguments and prints.
 */

import path from 'node:path';

import { writeBindingModule, DEFAULT_IMPORT_FROM } from '../binder.js';
import type { ConfigOptions } from '../config.js';
import { initRepository, lookupSecretsDir } from '../init.js';
import type { Logger } from '../logger.js';
import type { SecretsId } from '../models/secrets-id.js';
import { findProjectRoot, findWorkspacePackage } from '../project.js';

export interface ProjectOptions extends ConfigOptions {
  /** Project directory. Defaults to the nearest ancestor of cwd with a package.json. */
  project?: string;
  /** Name of an npm workspace package to work with instead. */
  package?: string;
}

/** Resolve the project directory a command applies to. */
export async function resolveProjectDir(opts: ProjectOptions): Promise<string> {
  const cwd = opts.cwd ?? process.cwd();
  const start = opts.project !== undefined ? path.resolve(cwd, opts.project) : cwd;
  if (opts.package !== undefined) {
    return findWorkspacePackage(start, opts.package);
  }
  return opts.project !== undefined ? start : findProjectRoot(start);
}

export interface InitOutput {
  id: string;
  directory: string;
  created_id_file: boolean;
}

export async function initCommand(
  opts: ProjectOptions & { newId?: () => SecretsId; logger?: Logger },
): Promise<InitOutput> {
  const projectDir = await resolveProjectDir(opts);
  const result = await initRepository(projectDir, opts);
  return {
    id: result.id.asStr(),
    directory: result.directory,
    created_id_file: result.createdIdFile,
  };
}

/** The secrets directory path of an initialized project. */
export async function pathCommand(opts: ProjectOptions): Promise<string> {
  const projectDir = await resolveProjectDir(opts);
  return lookupSecretsDir(projectDir, opts);
}

export interface BindOutput {
  id: string;
  out_file: string;
}

export async function bindCommand(
  opts: ProjectOptions & { out: string; importFrom?: string },
): Promise<BindOutput> {
  const projectDir = await resolveProjectDir(opts);
  const { id, outFile } = await writeBindingModule(
    projectDir,
    opts.out,
    opts.importFrom ?? DEFAULT_IMPORT_FROM,
  );
  return { id: id.asStr(), out_file: outFile };
}
