import { release } from '@distship/core';
import { logger } from '../lib/logger.js';
import { createContext, defaultDeps, reportOutcome, runCommand, type CommandDeps, type CommandOptions } from './shared.js';

/**
 * clean → verify → build → publish & tag
 */
export function releaseCommand(options: CommandOptions, deps: CommandDeps = defaultDeps()): Promise<number> {
  return runCommand(options, deps, async (signal) => {
    const ctx = await createContext(options, deps, signal);
    const outcome = await release(ctx);
    return reportOutcome(outcome, options, (state) => {
      logger.success(`Released ${state.version} (${state.artifacts.length} artifacts), tag ${state.tag} pushed`);
    });
  });
}
