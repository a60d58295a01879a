/**
 * Plumbing shared by every command: context creation, interrupt handling
 * and reporting of outcomes and errors
 */

import pc from 'picocolors';
import {
  CommandAbortedError,
  PypiRegistry,
  ProcessRunner,
  detectIsolation,
  isReleaseError,
  loadConfig,
  outcomeExitCode,
  resolveTargetPath,
  INTERRUPTED_EXIT_CODE,
  type CommandRunner,
  type IsolationContext,
  type PackageRegistry,
  type ProgressCallback,
  type ReleaseConfig,
  type ReleaseContext,
  type ReleaseOutcome,
  type ReleaseState,
} from '@distship/core';
import { CLIError, ErrorCodes, fromReleaseError, wrapError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export interface CommandOptions {
  path?: string;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CommandDeps {
  runner: CommandRunner;
  env: NodeJS.ProcessEnv;
  /** Defaults to the PyPI JSON API at registry.url */
  registry?: PackageRegistry;
  /** Defaults to a signal aborted by SIGINT/SIGTERM */
  signal?: AbortSignal;
}

export function defaultDeps(): CommandDeps {
  return { runner: new ProcessRunner(), env: process.env };
}

function progressReporter(isolation: IsolationContext, config: ReleaseConfig): ProgressCallback {
  return (event) => {
    if (event.status !== 'started') {
      logger.debug(`${event.step} done`);
      return;
    }
    logger.step(event.index, event.total, event.message);
    if (event.step === 'build' && isolation.isolated) {
      logger.info(`Virtual environment detected (${isolation.path}). Adding packages: ${config.toolchain.tools.join(' ')}`);
    }
  };
}

export async function createContext(
  options: CommandOptions,
  deps: CommandDeps,
  signal: AbortSignal
): Promise<ReleaseContext> {
  const root = resolveTargetPath(options.path);
  const { config, source } = await loadConfig(root, deps.env);
  logger.debug('Loaded configuration', { root, source: source ?? '(defaults)' });

  const isolation = detectIsolation(deps.env);

  return {
    root,
    config,
    runner: deps.runner,
    registry: deps.registry ?? new PypiRegistry({ url: config.registry.url, timeout: config.registry.timeout }),
    isolation,
    signal,
    onProgress: progressReporter(isolation, config),
  };
}

export function printError(error: CLIError, verbose: boolean): void {
  if (logger.isJson) {
    console.error(JSON.stringify(error.toJSON()));
    return;
  }

  console.error(pc.red(`\n${error.toUserString(verbose)}\n`));

  const remediation = error.getRemediation();
  if (remediation) {
    console.error(pc.yellow('How to fix:'));
    for (const line of remediation.split('\n')) {
      console.error(pc.dim(`  ${line}`));
    }
    console.error('');
  }
}

function stateSummary(state: ReleaseState): Record<string, unknown> {
  return {
    version: state.version,
    tag: state.tag,
    artifacts: state.artifacts.map((artifact) => artifact.fileName),
    published: state.published,
    tagged: state.tagged,
  };
}

/**
 * Print an outcome and return the process exit code
 */
export function reportOutcome(
  outcome: ReleaseOutcome,
  options: CommandOptions,
  onCompleted: (state: ReleaseState) => void
): number {
  const exitCode = outcomeExitCode(outcome);

  if (logger.isJson) {
    const error =
      outcome.status === 'failed' || outcome.status === 'published-untagged'
        ? fromReleaseError(outcome.error, exitCode).toJSON()
        : undefined;
    console.log(JSON.stringify({ status: outcome.status, exitCode, ...stateSummary(outcome.state), error }));
    return exitCode;
  }

  switch (outcome.status) {
    case 'completed':
      onCompleted(outcome.state);
      break;
    case 'failed':
      logger.fail(`${outcome.step} failed`);
      printError(fromReleaseError(outcome.error, exitCode), options.verbose ?? false);
      break;
    case 'published-untagged': {
      const error = new CLIError(ErrorCodes.RELEASE_PUBLISHED_UNTAGGED, undefined, {
        details: stateSummary(outcome.state),
        cause: outcome.error,
        exitCode,
      });
      logger.fail(`Published ${outcome.state.version} but tag ${outcome.state.tag} was not pushed`);
      printError(error, true);
      break;
    }
    case 'interrupted': {
      const { published, version, tag } = outcome.state;
      if (published) {
        logger.fail(`Interrupted during ${outcome.step} after ${version} was published; tag ${tag} was not pushed`);
      } else {
        logger.fail(`Interrupted during ${outcome.step}`);
      }
      const error = new CLIError(ErrorCodes.RELEASE_INTERRUPTED, undefined, {
        exitCode,
        details: published ? stateSummary(outcome.state) : undefined,
        hint: published ? `The artifacts are on the registry. Run 'distship push-tag' to push tag ${tag}.` : undefined,
      });
      printError(error, published);
      break;
    }
  }
  return exitCode;
}

/**
 * Run a command body with an abortable signal and turn any error into an
 * exit code
 */
export async function runCommand(
  options: CommandOptions,
  deps: CommandDeps,
  body: (signal: AbortSignal) => Promise<number>
): Promise<number> {
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  if (!deps.signal) {
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  }

  try {
    return await body(deps.signal ?? controller.signal);
  } catch (error) {
    let cliError: CLIError;
    if (error instanceof CommandAbortedError) {
      cliError = new CLIError(ErrorCodes.RELEASE_INTERRUPTED, undefined, { exitCode: INTERRUPTED_EXIT_CODE });
    } else if (isReleaseError(error)) {
      cliError = fromReleaseError(error, error.reason === 'interrupted' ? INTERRUPTED_EXIT_CODE : error.exitCode);
    } else {
      cliError = wrapError(error, ErrorCodes.RELEASE_UNEXPECTED);
    }
    printError(cliError, options.verbose ?? false);
    return cliError.exitCode;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}
