import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG } from '../src/config.js';
import { GitClient } from '../src/git.js';
import { CommandNotFoundError } from '../src/runner.js';
import type { ReleaseConfig } from '../src/types.js';
import { verifyVersion } from '../src/verify.js';
import { FakeRunner, TAG_COMMIT, fakeRegistry, scriptGit, writeProject } from './helpers/fake-runner.js';

describe('verifyVersion', () => {
  let root: string;
  let runner: FakeRunner;
  const config: ReleaseConfig = { ...DEFAULT_CONFIG, package: 'sample-dist' };

  function verify(overrides: Partial<ReleaseConfig> = {}, published: string[] = ['1.2.2', '1.2.3']) {
    return verifyVersion({
      root,
      config: { ...config, ...overrides },
      git: new GitClient(runner, { cwd: root }),
      registry: fakeRegistry({ 'sample-dist': published }),
    });
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'distship-verify-'));
    writeProject(root, { VERSION: '1.3.0\n' });
    runner = scriptGit(new FakeRunner(), { tags: ['1.2.3', '1.3.0'], tag: '1.3.0' });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('passes an unpublished version tagged at HEAD', async () => {
    await expect(verify()).resolves.toEqual({ version: '1.3.0', tag: '1.3.0', packageName: 'sample-dist' });
  });

  it('fails when the version is already published', async () => {
    writeProject(root, { VERSION: '1.2.3\n' });
    runner = scriptGit(new FakeRunner(), { tags: ['1.2.3'], tag: '1.2.3' });

    await expect(verify()).rejects.toMatchObject({
      name: 'VersionError',
      reason: 'already-published',
      message: 'sample-dist 1.2.3 is already published',
    });
  });

  it('matches published versions after normalisation', async () => {
    writeProject(root, { VERSION: '2.0\n' });
    runner = scriptGit(new FakeRunner(), { tags: ['2.0'], tag: '2.0' });

    await expect(verify({}, ['2.0.0'])).rejects.toMatchObject({ reason: 'already-published' });
  });

  it('rejects a malformed version before touching git', async () => {
    writeProject(root, { VERSION: 'one-point-three\n' });

    await expect(verify()).rejects.toMatchObject({ reason: 'malformed' });
    expect(runner.calls).toEqual([]);
  });

  it('rejects a version older than the latest published one', async () => {
    await expect(verify({}, ['1.4.0'])).rejects.toMatchObject({ reason: 'not-newer' });
    await expect(
      verify({ verify: { ...config.verify, requireNewer: false } }, ['1.4.0'])
    ).resolves.toMatchObject({ version: '1.3.0' });
  });

  it('rejects a dirty working tree unless disabled', async () => {
    runner = scriptGit(new FakeRunner(), { tags: ['1.3.0'], tag: '1.3.0', status: ' M setup.py' });

    await expect(verify()).rejects.toMatchObject({ reason: 'dirty-worktree', details: { changes: [' M setup.py'] } });
    await expect(
      verify({ verify: { ...config.verify, requireCleanWorktree: false } })
    ).resolves.toMatchObject({ tag: '1.3.0' });
  });

  it('checks the newest changelog entry when configured', async () => {
    writeProject(root, { 'CHANGES.rst': 'Changelog\n\n1.2.3\n-----\n' });

    await expect(verify({ verify: { ...config.verify, changelog: 'CHANGES.rst' } })).rejects.toMatchObject({
      reason: 'changelog-mismatch',
      message: "Newest entry in CHANGES.rst is '1.2.3', expected '1.3.0'",
    });
  });

  it('requires the tag to exist', async () => {
    runner = scriptGit(new FakeRunner(), { tags: ['1.2.3'], tag: '1.2.3' });

    await expect(verify()).rejects.toMatchObject({
      reason: 'tag-missing',
      message: 'Tag 1.3.0 does not exist. Create it with: git tag 1.3.0',
    });
  });

  it('requires the tag to be the latest version tag', async () => {
    runner = scriptGit(new FakeRunner(), { tags: ['1.3.0', '1.4.0'], tag: '1.3.0' });

    await expect(verify()).rejects.toMatchObject({ reason: 'tag-not-latest', details: { latestTag: '1.4.0' } });
  });

  it('requires the tag to point at HEAD', async () => {
    runner = scriptGit(new FakeRunner(), { tags: ['1.3.0'], tag: '1.3.0', head: 'ffff' });

    await expect(verify()).rejects.toMatchObject({ reason: 'tag-not-at-head', details: { head: 'ffff' } });
  });

  it('rejects a tag that already exists on the remote', async () => {
    runner = scriptGit(new FakeRunner(), { tags: ['1.3.0'], tag: '1.3.0', remoteTagCommit: TAG_COMMIT });

    await expect(verify()).rejects.toMatchObject({ reason: 'tag-already-pushed' });
  });

  it('uses the tag prefix', async () => {
    runner = scriptGit(new FakeRunner(), { tags: ['v1.2.3', 'v1.3.0'], tag: 'v1.3.0' });

    await expect(verify({ git: { ...config.git, tagPrefix: 'v' } })).resolves.toEqual({
      version: '1.3.0',
      tag: 'v1.3.0',
      packageName: 'sample-dist',
    });
  });

  it('reads the package name from project metadata', async () => {
    writeProject(root, { 'setup.py': 'setup(name="sample-dist")\n' });

    await expect(verify({ package: undefined })).resolves.toMatchObject({ packageName: 'sample-dist' });
  });

  it('fails when no package name can be found', async () => {
    await expect(verify({ package: undefined })).rejects.toMatchObject({ reason: 'unknown-package' });
  });

  it('reports registry failures as registry-unavailable', async () => {
    await expect(
      verifyVersion({
        root,
        config,
        git: new GitClient(runner, { cwd: root }),
        registry: {
          publishedVersions: () => Promise.reject(new Error('getaddrinfo ENOTFOUND pypi.org')),
        },
      })
    ).rejects.toMatchObject({
      reason: 'registry-unavailable',
      message: 'Could not list published versions of sample-dist: getaddrinfo ENOTFOUND pypi.org',
    });
  });

  it('reports a missing git as git-unavailable', async () => {
    runner = new FakeRunner().on('git', new CommandNotFoundError('git'));

    await expect(verify()).rejects.toMatchObject({ reason: 'git-unavailable' });
  });

  it('reports an unreachable remote as remote-unavailable', async () => {
    runner.on('git ls-remote', { exitCode: 128, stderr: 'fatal: unable to access remote' });

    await expect(verify()).rejects.toMatchObject({ reason: 'remote-unavailable', exitCode: 128 });
  });
});
