import { cleanStep, runSteps } from '@distship/core';
import { logger } from '../lib/logger.js';
import { createContext, defaultDeps, reportOutcome, runCommand, type CommandDeps, type CommandOptions } from './shared.js';

export function cleanCommand(options: CommandOptions, deps: CommandDeps = defaultDeps()): Promise<number> {
  return runCommand(options, deps, async (signal) => {
    const ctx = await createContext(options, deps, signal);
    const outcome = await runSteps([cleanStep], ctx);
    return reportOutcome(outcome, options, () => {
      logger.success(`Workspace clean (${ctx.config.workspace.dirs.join(', ')})`);
    });
  });
}
