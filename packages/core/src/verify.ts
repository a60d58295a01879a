/**
 * Version gate: nothing is built until the declared version passes every check
 */

import { VersionError } from './errors.js';
import { GitClient, GitCommandError, tagName } from './git.js';
import { readChangelogVersion, readDeclaredVersion, readPackageName } from './metadata.js';
import type { PackageRegistry } from './registry.js';
import { CommandNotFoundError } from './runner.js';
import type { ReleaseConfig } from './types.js';
import { compareVersions, isSameVersion, latestVersion, parseVersion } from './version.js';

export interface VerifyDependencies {
  root: string;
  config: ReleaseConfig;
  git: GitClient;
  registry: PackageRegistry;
}

export interface VerifiedVersion {
  version: string;
  tag: string;
  packageName: string;
}

/**
 * Map git failures during verification onto VersionError
 */
async function gitQuery<T>(query: () => Promise<T>, remote = false): Promise<T> {
  try {
    return await query();
  } catch (error) {
    if (error instanceof CommandNotFoundError) {
      throw new VersionError('git-unavailable', 'git is not installed or not on PATH', { cause: error });
    }
    if (error instanceof GitCommandError) {
      throw new VersionError(remote ? 'remote-unavailable' : 'git-unavailable', error.message, {
        cause: error,
        exitCode: error.result.exitCode,
      });
    }
    throw error;
  }
}

async function checkTagState(git: GitClient, tag: string, prefix: string): Promise<void> {
  const tagCommit = await gitQuery(() => git.commitOf(tag));
  if (!tagCommit) {
    throw new VersionError('tag-missing', `Tag ${tag} does not exist. Create it with: git tag ${tag}`);
  }

  const [latestTag] = await gitQuery(() => git.versionTags(prefix));
  if (latestTag !== tag) {
    throw new VersionError('tag-not-latest', `Tag ${tag} is not the latest version tag (latest: ${latestTag ?? 'none'})`, {
      details: { tag, latestTag },
    });
  }

  const head = await gitQuery(() => git.head());
  if (head !== tagCommit) {
    throw new VersionError('tag-not-at-head', `Tag ${tag} points at ${tagCommit}, but HEAD is ${head}`, {
      details: { tag, tagCommit, head },
    });
  }
}

async function checkRegistry(
  registry: PackageRegistry,
  packageName: string,
  version: string,
  requireNewer: boolean
): Promise<void> {
  let published: string[];
  try {
    published = await registry.publishedVersions(packageName);
  } catch (error) {
    throw new VersionError(
      'registry-unavailable',
      `Could not list published versions of ${packageName}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const declared = parseVersion(version);
  if (!declared) return;

  const duplicate = published.find((candidate) => {
    const parsed = parseVersion(candidate);
    return parsed ? isSameVersion(parsed, declared) : candidate === version;
  });
  if (duplicate !== undefined) {
    throw new VersionError('already-published', `${packageName} ${version} is already published`, {
      details: { packageName, version },
    });
  }

  const latest = latestVersion(published);
  if (requireNewer && latest && compareVersions(declared, latest) < 0) {
    throw new VersionError('not-newer', `${version} is older than the latest published version ${latest.raw}`, {
      details: { packageName, version, latest: latest.raw },
    });
  }
}

export async function verifyVersion(deps: VerifyDependencies): Promise<VerifiedVersion> {
  const { root, config, git, registry } = deps;

  const version = await readDeclaredVersion(root, config.versionFile);
  if (!parseVersion(version)) {
    throw new VersionError('malformed', `Malformed version '${version}' in ${config.versionFile}`, {
      details: { version },
    });
  }
  const tag = tagName(config.git.tagPrefix, version);

  if (config.verify.requireCleanWorktree) {
    const changes = await gitQuery(() => git.status());
    if (changes.length > 0) {
      throw new VersionError('dirty-worktree', 'Working tree has uncommitted changes', {
        details: { changes },
      });
    }
  }

  if (config.verify.changelog) {
    const entry = await readChangelogVersion(root, config.verify.changelog);
    if (entry !== version) {
      throw new VersionError(
        'changelog-mismatch',
        `Newest entry in ${config.verify.changelog} is '${entry ?? '(none)'}', expected '${version}'`,
        { details: { changelog: config.verify.changelog, entry, version } }
      );
    }
  }

  await checkTagState(git, tag, config.git.tagPrefix);

  const packageName = config.package ?? (await readPackageName(root));
  if (!packageName) {
    throw new VersionError(
      'unknown-package',
      'Could not determine the package name from pyproject.toml, setup.cfg or setup.py'
    );
  }
  await checkRegistry(registry, packageName, version, config.verify.requireNewer);

  const remoteCommit = await gitQuery(() => git.remoteTagCommit(config.git.remote, tag), true);
  if (remoteCommit) {
    throw new VersionError('tag-already-pushed', `Tag ${tag} already exists on ${config.git.remote}`, {
      details: { tag, remote: config.git.remote, remoteCommit },
    });
  }

  return { version, tag, packageName };
}
