/**
 * Release Orchestrator
 *
 * An ordered list of fallible steps. The first failure stops the run;
 * nothing is retried and nothing already published is rolled back.
 */

import { InterruptedError, ReleaseError, TagPushError } from './errors.js';
import { GitClient } from './git.js';
import {
  checkArtifacts,
  preflightTagPush,
  pushTag,
  uploadArtifacts,
  type PublishDependencies,
} from './publisher.js';
import type { PackageRegistry } from './registry.js';
import { CommandAbortedError, type CommandRunner } from './runner.js';
import { buildArtifacts } from './toolchain.js';
import type {
  Artifact,
  IsolationContext,
  ProgressCallback,
  ReleaseConfig,
  ReleaseOutcome,
  ReleaseState,
  StepName,
} from './types.js';
import { verifyVersion } from './verify.js';
import { cleanWorkspace } from './workspace.js';

export interface ReleaseContext {
  root: string;
  config: ReleaseConfig;
  runner: CommandRunner;
  registry: PackageRegistry;
  isolation: IsolationContext;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

export interface ReleaseStep {
  name: StepName;
  /** Progress line shown when the step starts */
  title: string;
  run(ctx: ReleaseContext, state: ReleaseState, git: GitClient): Promise<void>;
}

/** Exit code of the published-but-untagged end state */
export const PARTIAL_RELEASE_EXIT_CODE = 3;

/** Exit code after SIGINT/SIGTERM */
export const INTERRUPTED_EXIT_CODE = 130;

function publishDeps(ctx: ReleaseContext, git: GitClient): PublishDependencies {
  return {
    root: ctx.root,
    config: ctx.config,
    runner: ctx.runner,
    isolation: ctx.isolation,
    git,
    signal: ctx.signal,
  };
}

function requireVerified(state: ReleaseState): { version: string; tag: string } {
  if (state.version === undefined || state.tag === undefined) {
    throw new ReleaseError('tag-missing', 'Publishing requires a verified version', { step: 'publish' });
  }
  return { version: state.version, tag: state.tag };
}

function requireArtifacts(state: ReleaseState): Artifact[] {
  if (state.artifacts.length === 0) {
    throw new ReleaseError('no-artifacts', 'Publishing requires a built Artifact Set', { step: 'publish' });
  }
  return state.artifacts;
}

export const cleanStep: ReleaseStep = {
  name: 'clean',
  title: 'Cleaning workspace',
  async run(ctx) {
    await cleanWorkspace(ctx.root, ctx.config.workspace);
  },
};

export const verifyStep: ReleaseStep = {
  name: 'verify',
  title: 'Verifying version',
  async run(ctx, state, git) {
    const verified = await verifyVersion({
      root: ctx.root,
      config: ctx.config,
      git,
      registry: ctx.registry,
    });
    state.version = verified.version;
    state.tag = verified.tag;
  },
};

export const buildStep: ReleaseStep = {
  name: 'build',
  title: 'Building distributions',
  async run(ctx, state) {
    const result = await buildArtifacts({
      root: ctx.root,
      config: ctx.config,
      runner: ctx.runner,
      isolation: ctx.isolation,
      signal: ctx.signal,
    });
    state.artifacts = result.artifacts;
  },
};

export const publishStep: ReleaseStep = {
  name: 'publish',
  title: 'Publishing and tagging',
  async run(ctx, state, git) {
    const { tag } = requireVerified(state);
    const artifacts = requireArtifacts(state);
    const deps = publishDeps(ctx, git);

    await checkArtifacts(deps, artifacts);
    await preflightTagPush(deps, tag);
    await uploadArtifacts(deps, artifacts);
    state.published = true;
    await pushTag(deps, tag);
    state.tagged = true;
  },
};

export const RELEASE_STEPS: readonly ReleaseStep[] = [cleanStep, verifyStep, buildStep, publishStep];

function emptyState(): ReleaseState {
  return { artifacts: [], published: false, tagged: false };
}

export async function runSteps(steps: readonly ReleaseStep[], ctx: ReleaseContext): Promise<ReleaseOutcome> {
  const state = emptyState();
  const git = new GitClient(ctx.runner, { cwd: ctx.root, signal: ctx.signal });
  const total = steps.length;

  for (const [i, step] of steps.entries()) {
    const index = i + 1;
    if (ctx.signal?.aborted) {
      return { status: 'interrupted', step: step.name, state };
    }

    ctx.onProgress?.({ step: step.name, index, total, status: 'started', message: step.title });
    try {
      await step.run(ctx, state, git);
    } catch (error) {
      if (error instanceof CommandAbortedError || error instanceof InterruptedError || ctx.signal?.aborted) {
        return { status: 'interrupted', step: step.name, state };
      }
      if (error instanceof TagPushError && state.published) {
        return { status: 'published-untagged', error, state };
      }
      if (error instanceof ReleaseError) {
        return { status: 'failed', step: step.name, error, state };
      }
      throw error;
    }
    ctx.onProgress?.({ step: step.name, index, total, status: 'completed', message: step.title });
  }

  return { status: 'completed', state };
}

/** clean → verify → build → publish & tag */
export function release(ctx: ReleaseContext): Promise<ReleaseOutcome> {
  return runSteps(RELEASE_STEPS, ctx);
}

export function outcomeExitCode(outcome: ReleaseOutcome): number {
  switch (outcome.status) {
    case 'completed':
      return 0;
    case 'published-untagged':
      return PARTIAL_RELEASE_EXIT_CODE;
    case 'interrupted':
      return INTERRUPTED_EXIT_CODE;
    case 'failed': {
      const code = outcome.error.exitCode;
      // Keep the partial-release code unambiguous
      if (code === undefined || code === 0 || code === PARTIAL_RELEASE_EXIT_CODE) return 1;
      return code;
    }
  }
}
