import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readChangelogVersion, readDeclaredVersion, readPackageName } from '../src/metadata.js';
import { writeProject } from './helpers/fake-runner.js';

describe('metadata', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'distship-meta-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('readDeclaredVersion', () => {
    it('reads and trims the version file', async () => {
      writeProject(root, { VERSION: '1.3.0\n' });
      expect(await readDeclaredVersion(root, 'VERSION')).toBe('1.3.0');
    });

    it('fails when the file is missing or empty', async () => {
      await expect(readDeclaredVersion(root, 'VERSION')).rejects.toMatchObject({ reason: 'missing', step: 'verify' });
      writeProject(root, { VERSION: '\n' });
      await expect(readDeclaredVersion(root, 'VERSION')).rejects.toThrow('Version file is empty: VERSION');
    });
  });

  describe('readPackageName', () => {
    it('reads [project] name from pyproject.toml', async () => {
      writeProject(root, {
        'pyproject.toml': '[build-system]\nrequires = ["setuptools"]\n\n[project]\nname = "sample-dist"\nversion = "1.0"\n',
      });
      expect(await readPackageName(root)).toBe('sample-dist');
    });

    it('finds the name after array-valued keys in [project]', async () => {
      writeProject(root, {
        'pyproject.toml': '[project]\ndynamic = ["version"]\nclassifiers = [\n  "Programming Language :: Python",\n]\nname = "sample-dist"\n',
      });
      expect(await readPackageName(root)).toBe('sample-dist');
    });

    it('does not take a name from a table after [project]', async () => {
      writeProject(root, {
        'pyproject.toml': '[project]\nversion = "1.0"\n\n[tool.poetry]\nname = "not-this"\n',
      });
      expect(await readPackageName(root)).toBeUndefined();
    });

    it('falls back to setup.cfg and then setup.py', async () => {
      writeProject(root, { 'setup.py': 'setup(\n    name="SampleDist",\n    version=version,\n)\n' });
      expect(await readPackageName(root)).toBe('SampleDist');

      writeProject(root, { 'setup.cfg': '[metadata]\nname = sample_cfg\n' });
      expect(await readPackageName(root)).toBe('sample_cfg');
    });

    it('ignores a pyproject.toml without a [project] table', async () => {
      writeProject(root, { 'pyproject.toml': '[tool.black]\nname = "not-this"\n' });
      expect(await readPackageName(root)).toBeUndefined();
    });
  });

  describe('readChangelogVersion', () => {
    it('returns the first line starting with a digit', async () => {
      writeProject(root, { 'doc/changes.rst': '=========\nChangelog\n=========\n\n1.3.0\n=====\n\n1.2.3\n=====\n' });
      expect(await readChangelogVersion(root, 'doc/changes.rst')).toBe('1.3.0');
    });

    it('returns undefined for a missing changelog', async () => {
      expect(await readChangelogVersion(root, 'CHANGES.rst')).toBeUndefined();
    });
  });
});
