import { buildStep, cleanStep, runSteps } from '@distship/core';
import { logger } from '../lib/logger.js';
import { createContext, defaultDeps, reportOutcome, runCommand, type CommandDeps, type CommandOptions } from './shared.js';

export function buildCommand(options: CommandOptions, deps: CommandDeps = defaultDeps()): Promise<number> {
  return runCommand(options, deps, async (signal) => {
    const ctx = await createContext(options, deps, signal);
    const outcome = await runSteps([cleanStep, buildStep], ctx);
    return reportOutcome(outcome, options, (state) => {
      logger.success(`Built ${state.artifacts.length} artifacts`);
      for (const artifact of state.artifacts) {
        logger.info(`  ${artifact.kind.padEnd(5)} ${artifact.fileName}`);
      }
    });
  });
}
