#!/usr/bin/env node
import { Command } from 'commander';

import { DEFAULT_IMPORT_FROM } from '../binder.js';
import { bindCommand, initCommand, pathCommand, type ProjectOptions } from '../app/commands.js';
import { createLogger } from '../logger.js';

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

const logger = createLogger({ name: 'devsecrets-cli' });

async function run(fn: () => Promise<unknown>): Promise<void> {
  try {
    const result = await fn();
    console.log(JSON.stringify(result, null, 2));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.debug({ err }, 'command failed');
    console.log(JSON.stringify({ success: false, error: message }, null, 2));
    process.exitCode = 1;
  }
}

function projectOptions(): ProjectOptions {
  const opts = program.opts<{ project?: string; package?: string; root?: string }>();
  return { project: opts.project, package: opts.package, root: opts.root };
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('devsecrets')
  .description('Keep development secrets outside your repository')
  .version('0.1.0')
  .option('--project <dir>', 'project directory (default: nearest ancestor with a package.json)')
  .option('-p, --package <name>', 'npm workspace package to work with')
  .option('--root <dir>', 'base directory for secrets directories (overrides $DEVSECRETS_ROOT)');

program
  .command('init')
  .description('Create the identifier file and secrets directory for the project')
  .action(async () => {
    await run(() => initCommand({ ...projectOptions(), logger }));
  });

program
  .command('path')
  .description('Print the secrets directory path of the project')
  .action(async () => {
    try {
      console.log(await pathCommand(projectOptions()));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Unable to find devsecrets directory: ${message}`);
      process.exitCode = 1;
    }
  });

program
  .command('bind')
  .description('Write a module exporting the project identifier (run before building)')
  .requiredOption('--out <file>', 'module to write, relative to the project directory')
  .option('--import-from <specifier>', 'module SecretsId is imported from', DEFAULT_IMPORT_FROM)
  .action(async (opts: { out: string; importFrom: string }) => {
    await run(() => bindCommand({ ...projectOptions(), out: opts.out, importFrom: opts.importFrom }));
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);
