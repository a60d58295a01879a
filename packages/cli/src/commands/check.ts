import { runSteps, verifyStep } from '@distship/core';
import { logger } from '../lib/logger.js';
import { createContext, defaultDeps, reportOutcome, runCommand, type CommandDeps, type CommandOptions } from './shared.js';

/**
 * Run the version gate alone. Nothing is built or published.
 */
export function checkCommand(options: CommandOptions, deps: CommandDeps = defaultDeps()): Promise<number> {
  return runCommand(options, deps, async (signal) => {
    const ctx = await createContext(options, deps, signal);
    const outcome = await runSteps([verifyStep], ctx);
    return reportOutcome(outcome, options, (state) => {
      logger.success(`Version ${state.version} is ready to release (tag ${state.tag})`);
    });
  });
}
