/**
 * Command-line surface. `distship` with no command runs a full release.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { buildCommand } from './commands/build.js';
import { checkCommand } from './commands/check.js';
import { cleanCommand } from './commands/clean.js';
import { pushTagCommand } from './commands/push-tag.js';
import { releaseCommand } from './commands/release.js';
import { defaultDeps, type CommandDeps, type CommandOptions } from './commands/shared.js';
import { logger } from './lib/logger.js';

type CommandHandler = (options: CommandOptions, deps: CommandDeps) => Promise<number>;

export function readCliVersion(): string {
  try {
    const manifest: unknown = JSON.parse(
      readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf-8')
    );
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch (error) {
    logger.debug('Could not read CLI version', { error: String(error) });
  }
  return '0.0.0-dev';
}

function withSharedOptions(command: Command): Command {
  return command
    .option('-p, --path <path>', 'Project root (default: current directory)')
    .option('--json', 'Output the outcome as JSON')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--quiet', 'Suppress output except errors');
}

function action(handler: CommandHandler, deps: () => CommandDeps) {
  return async (options: CommandOptions) => {
    logger.configure({
      verbose: options.verbose,
      silent: options.quiet,
      json: options.json,
    });
    process.exitCode = await handler(options, deps());
  };
}

export function createProgram(deps: () => CommandDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('distship')
    .description('Clean, verify, build, publish and tag a Python distribution')
    .version(readCliVersion());

  withSharedOptions(
    program.command('release', { isDefault: true }).description('Clean, verify, build, then publish and tag')
  ).action(action(releaseCommand, deps));

  withSharedOptions(program.command('clean').description('Remove build and dist directories')).action(
    action(cleanCommand, deps)
  );

  withSharedOptions(
    program.command('check').description('Verify the version is ready to release without building')
  ).action(action(checkCommand, deps));

  withSharedOptions(program.command('build').description('Clean and build the sdist and wheel')).action(
    action(buildCommand, deps)
  );

  withSharedOptions(
    program.command('push-tag').description("Push the current version's tag (repairs a published-untagged release)")
  ).action(action(pushTagCommand, deps));

  return program;
}
