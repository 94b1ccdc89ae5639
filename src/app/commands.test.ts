import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { bindCommand, initCommand, pathCommand, resolveProjectDir } from './commands.js';
import { DEFAULT_IMPORT_FROM } from '../binder.js';
import { NotInitializedError } from '../errors.js';
import { idFilePath } from '../id-file.js';
import { createLogger } from '../logger.js';
import { SecretsId } from '../models/secrets-id.js';

const ID = SecretsId.parse('abcdef01-2345-4678-9abc-def012345678');
const logger = createLogger({ level: 'silent' });

describe('commands', () => {
  let tmpDir: string;
  let projectDir: string;
  let root: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'devsecrets-test-'));
    projectDir = path.join(tmpDir, 'project');
    root = path.join(tmpDir, 'root');
    await fs.mkdir(path.join(projectDir, 'src'), { recursive: true });
    await fs.writeFile(path.join(projectDir, 'package.json'), '{"name": "project"}');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('resolveProjectDir', () => {
    it('finds the project from a nested cwd', async () => {
      expect(await resolveProjectDir({ cwd: path.join(projectDir, 'src') })).toBe(projectDir);
    });

    it('uses --project as given', async () => {
      expect(await resolveProjectDir({ cwd: tmpDir, project: 'project/src' })).toBe(
        path.join(projectDir, 'src'),
      );
    });
  });

  describe('init', () => {
    it('reports the identifier and directory', async () => {
      const output = await initCommand({
        cwd: projectDir,
        root,
        newId: () => ID,
        logger,
      });
      expect(output).toEqual({
        id: ID.asStr(),
        directory: path.join(root, ID.asStr()),
        created_id_file: true,
      });
    });

    it('reports an existing identifier on re-run', async () => {
      await initCommand({ cwd: projectDir, root, newId: () => ID, logger });
      const output = await initCommand({ cwd: projectDir, root, logger });
      expect(output.created_id_file).toBe(false);
      expect(output.id).toBe(ID.asStr());
    });
  });

  describe('path', () => {
    it('fails before init', async () => {
      await expect(pathCommand({ cwd: projectDir, root })).rejects.toBeInstanceOf(
        NotInitializedError,
      );
    });

    it('prints the directory after init without changing the identifier file', async () => {
      await initCommand({ cwd: projectDir, root, newId: () => ID, logger });
      expect(await pathCommand({ cwd: projectDir, root })).toBe(path.join(root, ID.asStr()));
      expect(await fs.readFile(idFilePath(projectDir), 'utf-8')).toBe(ID.asStr());
    });
  });

  describe('bind', () => {
    it('writes the binding module', async () => {
      await fs.writeFile(idFilePath(projectDir), ID.asStr());
      const output = await bindCommand({
        cwd: projectDir,
        out: 'src/secrets-id.generated.ts',
        importFrom: '../index.js',
      });
      expect(output).toEqual({
        id: ID.asStr(),
        out_file: path.join(projectDir, 'src', 'secrets-id.generated.ts'),
      });
      const content = await fs.readFile(output.out_file, 'utf-8');
      expect(content.split('\n')[1]).toBe('import { SecretsId } from "../index.js";');
    });

    it('imports from the published package by default', async () => {
      await fs.writeFile(idFilePath(projectDir), ID.asStr());
      const output = await bindCommand({ cwd: projectDir, out: 'secrets-id.ts' });
      const content = await fs.readFile(output.out_file, 'utf-8');
      expect(DEFAULT_IMPORT_FROM).toBe('devsecrets');
      expect(content.split('\n')[1]).toBe('import { SecretsId } from "devsecrets";');
    });
  });
});
