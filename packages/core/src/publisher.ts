/**
 * Publish & tag
 *
 * Order: twine check, tag-push preflight, upload, tag push. The preflight
 * catches a rejected push before anything is published; a push that still
 * fails after the upload leaves the release published but untagged, which
 * pushReleaseTag repairs.
 */

import { PublishError, TagPushError, VersionError } from './errors.js';
import { resolvePython } from './environment.js';
import { GitClient, GitCommandError, tagName } from './git.js';
import { readDeclaredVersion } from './metadata.js';
import type { CommandRunner } from './runner.js';
import { CommandNotFoundError, formatCommand } from './runner.js';
import type { Artifact, IsolationContext, ReleaseConfig } from './types.js';
import { parseVersion } from './version.js';

export interface PublishDependencies {
  root: string;
  config: ReleaseConfig;
  runner: CommandRunner;
  isolation: IsolationContext;
  git: GitClient;
  signal?: AbortSignal;
}

export function twineArgs(
  action: 'check' | 'upload',
  artifacts: readonly Artifact[],
  repository?: string
): string[] {
  const args = ['-m', 'twine', action];
  if (action === 'upload' && repository) {
    args.push('--repository', repository);
  }
  return [...args, ...artifacts.map((artifact) => artifact.path)];
}

async function runTwine(
  deps: PublishDependencies,
  action: 'check' | 'upload',
  artifacts: readonly Artifact[]
): Promise<void> {
  const python = resolvePython(deps.isolation, deps.config.toolchain);
  const args = twineArgs(action, artifacts, deps.config.registry.repository);
  let exitCode: number;
  try {
    ({ exitCode } = await deps.runner.run(python, args, { cwd: deps.root, signal: deps.signal }));
  } catch (error) {
    if (error instanceof CommandNotFoundError) {
      throw new PublishError('uploader-missing', `Python interpreter '${python}' was not found`, { cause: error });
    }
    throw error;
  }
  if (exitCode !== 0) {
    throw new PublishError(
      action === 'check' ? 'check-failed' : 'upload-failed',
      `${formatCommand(python, args)} exited with ${exitCode}`,
      { exitCode }
    );
  }
}

function toTagPushError(
  error: unknown,
  reason: 'preflight-failed' | 'push-failed',
  tag: string
): unknown {
  if (error instanceof CommandNotFoundError) {
    return new TagPushError('git-missing', 'git is not installed or not on PATH', { cause: error });
  }
  if (error instanceof GitCommandError) {
    const verb = reason === 'preflight-failed' ? 'would be rejected' : 'failed';
    return new TagPushError(reason, `Pushing tag ${tag} ${verb}: ${error.message}`, {
      cause: error,
      exitCode: error.result.exitCode,
    });
  }
  return error;
}

export async function checkArtifacts(deps: PublishDependencies, artifacts: readonly Artifact[]): Promise<void> {
  await runTwine(deps, 'check', artifacts);
}

export async function preflightTagPush(deps: PublishDependencies, tag: string): Promise<void> {
  const { remote, branch } = deps.config.git;
  try {
    await deps.git.pushRelease(remote, branch, tag, { dryRun: true });
  } catch (error) {
    throw toTagPushError(error, 'preflight-failed', tag);
  }
}

export async function uploadArtifacts(deps: PublishDependencies, artifacts: readonly Artifact[]): Promise<void> {
  await runTwine(deps, 'upload', artifacts);
}

export async function pushTag(deps: PublishDependencies, tag: string): Promise<void> {
  const { remote, branch } = deps.config.git;
  try {
    await deps.git.pushRelease(remote, branch, tag);
  } catch (error) {
    throw toTagPushError(error, 'push-failed', tag);
  }
}

export type TagRepairResult = { status: 'pushed' | 'already-pushed'; tag: string; commit: string };

/**
 * Push the current version's tag on its own. Safe to repeat: a remote tag
 * already at the local tag's commit is left alone.
 */
export async function pushReleaseTag(deps: PublishDependencies): Promise<TagRepairResult> {
  const { root, config, git } = deps;
  const version = await readDeclaredVersion(root, config.versionFile);
  if (!parseVersion(version)) {
    throw new VersionError('malformed', `Malformed version '${version}' in ${config.versionFile}`);
  }
  const tag = tagName(config.git.tagPrefix, version);

  let localCommit: string | undefined;
  let remoteCommit: string | undefined;
  try {
    localCommit = await git.commitOf(tag);
    remoteCommit = localCommit ? await git.remoteTagCommit(config.git.remote, tag) : undefined;
  } catch (error) {
    throw toTagPushError(error, 'push-failed', tag);
  }

  if (!localCommit) {
    throw new VersionError('tag-missing', `Tag ${tag} does not exist locally`);
  }
  if (remoteCommit === localCommit) {
    return { status: 'already-pushed', tag, commit: localCommit };
  }
  if (remoteCommit) {
    throw new TagPushError(
      'remote-conflict',
      `Tag ${tag} on ${config.git.remote} points at ${remoteCommit}, local tag points at ${localCommit}`,
      { details: { tag, localCommit, remoteCommit } }
    );
  }

  try {
    await git.pushTag(config.git.remote, tag);
  } catch (error) {
    throw toTagPushError(error, 'push-failed', tag);
  }
  return { status: 'pushed', tag, commit: localCommit };
}
