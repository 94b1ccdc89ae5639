import { describe, expect, it } from 'vitest';
import path from 'node:path';
import { DEVSECRETS_DIR_NAME, ROOT_ENV_VAR, defaultBaseRoot, resolveConfig } from './config.js';

describe('defaultBaseRoot', () => {
  it('uses XDG_DATA_HOME on linux when set', () => {
    expect(defaultBaseRoot({ XDG_DATA_HOME: '/data' }, 'linux', '/home/user')).toBe(
      '/data/devsecrets',
    );
  });

  it('falls back to ~/.local/share on linux', () => {
    expect(defaultBaseRoot({}, 'linux', '/home/user')).toBe('/home/user/.local/share/devsecrets');
  });

  it('ignores an empty XDG_DATA_HOME', () => {
    expect(defaultBaseRoot({ XDG_DATA_HOME: '' }, 'freebsd', '/home/user')).toBe(
      '/home/user/.local/share/devsecrets',
    );
  });

  it('uses Application Support on macOS', () => {
    expect(defaultBaseRoot({ XDG_DATA_HOME: '/data' }, 'darwin', '/Users/me')).toBe(
      '/Users/me/Library/Application Support/devsecrets',
    );
  });

  it('uses LOCALAPPDATA on windows', () => {
    expect(
      defaultBaseRoot({ LOCALAPPDATA: 'C:\\Users\\me\\AppData\\Local' }, 'win32', 'C:\\Users\\me'),
    ).toBe('C:\\Users\\me\\AppData\\Local\\devsecrets');
  });

  it('falls back to ~/AppData/Local on windows', () => {
    expect(defaultBaseRoot({}, 'win32', 'C:\\Users\\me')).toBe(
      'C:\\Users\\me\\AppData\\Local\\devsecrets',
    );
  });

  it('ends in the devsecrets directory', () => {
    expect(path.basename(defaultBaseRoot())).toBe(DEVSECRETS_DIR_NAME);
  });
});

describe('resolveConfig', () => {
  it('prefers an explicit root', () => {
    const config = resolveConfig({ root: '/explicit', env: { [ROOT_ENV_VAR]: '/from-env' } });
    expect(config.root).toBe('/explicit');
  });

  it('reads DEVSECRETS_ROOT', () => {
    expect(ROOT_ENV_VAR).toBe('DEVSECRETS_ROOT');
    expect(resolveConfig({ env: { DEVSECRETS_ROOT: '/from-env' } }).root).toBe('/from-env');
  });

  it('resolves a relative override against cwd', () => {
    expect(resolveConfig({ root: 'secrets', cwd: '/work' }).root).toBe('/work/secrets');
  });

  it('uses the platform default without overrides', () => {
    const config = resolveConfig({ env: {}, platform: 'linux', home: '/home/user' });
    expect(config.root).toBe('/home/user/.local/share/devsecrets');
  });

  it('treats an empty explicit root as unset', () => {
    const config = resolveConfig({ root: '', env: { DEVSECRETS_ROOT: '/from-env' } });
    expect(config.root).toBe('/from-env');
  });

  it('treats an empty DEVSECRETS_ROOT as unset', () => {
    const config = resolveConfig({
      env: { DEVSECRETS_ROOT: '' },
      platform: 'linux',
      home: '/home/user',
    });
    expect(config.root).toBe('/home/user/.local/share/devsecrets');
  });
});
