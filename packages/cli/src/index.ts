import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { logger, LogLevel } from '@package-graph/core';
import { withErrorHandling } from './utils/error-handling.js';
import { dumpCommand, showCommand, watchlistCommand } from './commands/graph-commands.js';

/**
 * package-graph CLI - thin front end over @package-graph/core
 */

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

interface GlobalOptions {
  cwd?: string;
  verbose?: boolean;
}

export function createProgram(write: (text: string) => void = (text) => process.stdout.write(text)): Command {
  const program = new Command();

  program
    .name('pkg-graph')
    .description('Inspect the dependency graph of an installed package tree')
    .version(getVersion())
    .option('--cwd <dir>', 'package root directory (defaults to the current directory)')
    .option('--verbose', 'log debug output');

  const rootDir = (): string => resolve(program.opts<GlobalOptions>().cwd ?? process.cwd());

  program.hook('preAction', () => {
    if (program.opts<GlobalOptions>().verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
    logger.debug(`Working directory: ${rootDir()}`);
  });

  program
    .command('dump')
    .description('print every package with its type, path and direct dependencies')
    .action(withErrorHandling(async () => {
      write(await dumpCommand(rootDir()));
    }));

  program
    .command('show')
    .argument('<package>', 'package name')
    .description('print one package of the graph')
    .action(withErrorHandling(async (packageName: string) => {
      write(await showCommand(rootDir(), packageName));
    }));

  program
    .command('watchlist')
    .description('print name and path of every package whose sources may change locally')
    .action(withErrorHandling(async () => {
      write(await watchlistCommand(rootDir()));
    }));

  return program;
}

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}
