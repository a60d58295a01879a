/**
 * Packaging toolchain: builds the sdist and wheel with `python -m build`
 */

import { BuildError } from './errors.js';
import { VENV_HINT, resolvePython } from './environment.js';
import type { CommandRunner } from './runner.js';
import { CommandNotFoundError, formatCommand } from './runner.js';
import type { Artifact, IsolationContext, ReleaseConfig } from './types.js';
import { collectArtifacts } from './workspace.js';

export interface BuildDependencies {
  root: string;
  config: ReleaseConfig;
  runner: CommandRunner;
  isolation: IsolationContext;
  signal?: AbortSignal;
}

export interface BuildResult {
  python: string;
  installedTools: string[];
  artifacts: Artifact[];
}

export function buildArgs(distDir: string): string[] {
  return ['-m', 'build', '--sdist', '--wheel', '--outdir', distDir];
}

export function installArgs(tools: readonly string[]): string[] {
  return ['-m', 'pip', 'install', '--quiet', '--upgrade', ...tools];
}

export async function buildArtifacts(deps: BuildDependencies): Promise<BuildResult> {
  const { root, config, runner, isolation, signal } = deps;
  const python = resolvePython(isolation, config.toolchain);
  // Outside a virtualenv every build failure suggests creating one
  const hint = isolation.isolated ? undefined : VENV_HINT;

  const run = async (args: string[]) => {
    try {
      return await runner.run(python, args, { cwd: root, signal });
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        throw new BuildError('toolchain-missing', `Python interpreter '${python}' was not found`, {
          cause: error,
          hint,
        });
      }
      throw error;
    }
  };

  let installedTools: string[] = [];
  if (isolation.isolated && config.toolchain.tools.length > 0) {
    const args = installArgs(config.toolchain.tools);
    const result = await run(args);
    if (result.exitCode !== 0) {
      throw new BuildError('install-failed', `${formatCommand(python, args)} exited with ${result.exitCode}`, {
        exitCode: result.exitCode,
      });
    }
    installedTools = [...config.toolchain.tools];
  }

  const args = buildArgs(config.workspace.distDir);
  const result = await run(args);
  if (result.exitCode !== 0) {
    throw new BuildError('build-failed', `${formatCommand(python, args)} exited with ${result.exitCode}`, {
      exitCode: result.exitCode,
      hint,
    });
  }

  const artifacts = await collectArtifacts(root, config.workspace.distDir);
  const hasSdist = artifacts.some((artifact) => artifact.kind === 'sdist');
  const hasWheel = artifacts.some((artifact) => artifact.kind === 'wheel');
  if (!hasSdist || !hasWheel) {
    throw new BuildError(
      'no-artifacts',
      `Build did not produce both an sdist and a wheel in ${config.workspace.distDir}`,
      { details: { found: artifacts.map((artifact) => artifact.fileName) } }
    );
  }

  return { python, installedTools, artifacts };
}
