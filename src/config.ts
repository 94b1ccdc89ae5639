/**
 * Configuration for devsecrets.
 *
 * The only setting is the base root under which secrets directories live. It
 * defaults to a per-user, OS-appropriate local data directory and can be
 * overridden through `DEVSECRETS_ROOT` or an explicit option.
 */

import os from 'node:os';
import path from 'node:path';

/** Directory created under the OS local-data location. */
export const DEVSECRETS_DIR_NAME = 'devsecrets';

/** Environment variable overriding the base root. */
export const ROOT_ENV_VAR = 'DEVSECRETS_ROOT';

export interface ResolvedConfig {
  /** Absolute base root; each project's directory is `<root>/<identifier>`. */
  root: string;
}

export interface ConfigOptions {
  /** Explicit base root. Takes precedence over the environment. */
  root?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  platform?: NodeJS.Platform;
  home?: string;
}

/**
 * The default base root for a platform.
 *
 * - Linux and others: `$XDG_DATA_HOME/devsecrets`, or `~/.local/share/devsecrets`.
 * - macOS: `~/Library/Application Support/devsecrets`.
 * - Windows: `%LOCALAPPDATA%\devsecrets`, or `~\AppData\Local\devsecrets`.
 */
export function defaultBaseRoot(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
): string {
  if (platform === 'win32') {
    const localAppData = env.LOCALAPPDATA || path.win32.join(home, 'AppData', 'Local');
    return path.win32.join(localAppData, DEVSECRETS_DIR_NAME);
  }
  if (platform === 'darwin') {
    return path.posix.join(home, 'Library', 'Application Support', DEVSECRETS_DIR_NAME);
  }
  const xdgDataHome = env.XDG_DATA_HOME || path.posix.join(home, '.local', 'share');
  return path.posix.join(xdgDataHome, DEVSECRETS_DIR_NAME);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Resolve the configuration.
 *
 * Resolution order for the base root:
 * 1. `options.root`.
 * 2. `$DEVSECRETS_ROOT`.
 * 3. {@link defaultBaseRoot}.
 *
 * Relative overrides are resolved against `options.cwd` (default: the process cwd).
 */
export function resolveConfig(options: ConfigOptions = {}): ResolvedConfig {
  const env = options.env ?? process.env;
  const override = nonEmpty(options.root) ?? nonEmpty(env[ROOT_ENV_VAR]);
  if (override !== undefined) {
    return { root: path.resolve(options.cwd ?? process.cwd(), override) };
  }
  return { root: defaultBaseRoot(env, options.platform, options.home) };
}
