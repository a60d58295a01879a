import { GitClient, pushReleaseTag } from '@distship/core';
import { logger } from '../lib/logger.js';
import { createContext, defaultDeps, runCommand, type CommandDeps, type CommandOptions } from './shared.js';

/**
 * Push the current version's tag after a release that ended published but
 * untagged. Running it again once the tag is on the remote does nothing.
 */
export function pushTagCommand(options: CommandOptions, deps: CommandDeps = defaultDeps()): Promise<number> {
  return runCommand(options, deps, async (signal) => {
    const ctx = await createContext(options, deps, signal);
    const git = new GitClient(ctx.runner, { cwd: ctx.root, signal });
    const result = await pushReleaseTag({
      root: ctx.root,
      config: ctx.config,
      runner: ctx.runner,
      isolation: ctx.isolation,
      git,
      signal,
    });

    if (logger.isJson) {
      console.log(JSON.stringify({ status: result.status, exitCode: 0, tag: result.tag, commit: result.commit }));
    } else if (result.status === 'already-pushed') {
      logger.success(`Tag ${result.tag} is already on ${ctx.config.git.remote} at ${result.commit}`);
    } else {
      logger.success(`Pushed tag ${result.tag} (${result.commit}) to ${ctx.config.git.remote}`);
    }
    return 0;
  });
}
