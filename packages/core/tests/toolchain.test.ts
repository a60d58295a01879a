import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG } from '../src/config.js';
import { VENV_HINT } from '../src/environment.js';
import { CommandNotFoundError } from '../src/runner.js';
import { buildArtifacts } from '../src/toolchain.js';
import type { IsolationContext } from '../src/types.js';
import { FakeRunner, scriptBuild } from './helpers/fake-runner.js';

const OUTPUTS = ['sample_dist-1.3.0.tar.gz', 'sample_dist-1.3.0-py3-none-any.whl'];

describe('buildArtifacts', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'distship-build-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function build(runner: FakeRunner, isolation: IsolationContext) {
    return buildArtifacts({ root, config: DEFAULT_CONFIG, runner, isolation });
  }

  it('installs the tools first inside a virtualenv', async () => {
    const runner = scriptBuild(new FakeRunner(), 'python', OUTPUTS);

    const result = await build(runner, { isolated: true, path: '/env' });

    expect(runner.lines()).toEqual([
      'python -m pip install --quiet --upgrade build twine',
      'python -m build --sdist --wheel --outdir dist',
    ]);
    expect(result.python).toBe('python');
    expect(result.installedTools).toEqual(['build', 'twine']);
    expect(result.artifacts.map((artifact) => artifact.fileName)).toEqual(OUTPUTS);
  });

  it('builds with python3 and no install outside a virtualenv', async () => {
    const runner = scriptBuild(new FakeRunner(), 'python3', OUTPUTS);

    const result = await build(runner, { isolated: false });

    expect(runner.lines()).toEqual(['python3 -m build --sdist --wheel --outdir dist']);
    expect(result.installedTools).toEqual([]);
    expect(runner.calls[0]?.options.cwd).toBe(root);
  });

  it('fails with toolchain-missing and the venv hint when python is absent', async () => {
    const runner = new FakeRunner().on('python3', new CommandNotFoundError('python3'));

    await expect(build(runner, { isolated: false })).rejects.toMatchObject({
      name: 'BuildError',
      reason: 'toolchain-missing',
      step: 'build',
      hint: VENV_HINT,
    });
  });

  it('carries the exit code of a failed build', async () => {
    const runner = new FakeRunner().on('python3 -m build', { exitCode: 2 });

    await expect(build(runner, { isolated: false })).rejects.toMatchObject({
      reason: 'build-failed',
      exitCode: 2,
      hint: VENV_HINT,
      message: 'python3 -m build --sdist --wheel --outdir dist exited with 2',
    });
  });

  it('omits the venv hint inside a virtualenv', async () => {
    const runner = new FakeRunner().on('python -m build', { exitCode: 1 });

    const error: unknown = await build(runner, { isolated: true }).catch((caught: unknown) => caught);
    expect(error).toMatchObject({ reason: 'build-failed' });
    expect(error).toHaveProperty('hint', undefined);
  });

  it('stops when installing the tools fails', async () => {
    const runner = new FakeRunner().on('python -m pip', { exitCode: 1 });

    await expect(build(runner, { isolated: true })).rejects.toMatchObject({ reason: 'install-failed' });
    expect(runner.ran('python -m build')).toBe(false);
  });

  it('requires both an sdist and a wheel', async () => {
    const runner = scriptBuild(new FakeRunner(), 'python3', ['sample_dist-1.3.0.tar.gz']);

    await expect(build(runner, { isolated: false })).rejects.toMatchObject({
      reason: 'no-artifacts',
      details: { found: ['sample_dist-1.3.0.tar.gz'] },
    });
  });
});
