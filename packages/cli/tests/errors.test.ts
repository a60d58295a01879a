import { describe, it, expect } from 'vitest';
import { BuildError, FilesystemError, TagPushError, VersionError } from '@distship/core';
import { CLIError, ErrorCodes, ErrorMessages, ErrorRemediation, fromReleaseError, wrapError } from '../src/lib/errors.js';

describe('CLIError', () => {
  it('has a message and remediation for every code', () => {
    for (const code of Object.values(ErrorCodes)) {
      expect(ErrorMessages[code]).toBeTruthy();
      expect(ErrorRemediation[code]).toBeTruthy();
    }
  });

  it('uses the default message when none is given', () => {
    const error = new CLIError(ErrorCodes.RELEASE_INTERRUPTED);

    expect(error.message).toBe('Release interrupted');
    expect(error.exitCode).toBe(1);
    expect(error.toUserString()).toBe('[DS_RELEASE_602] Release interrupted');
  });

  it('includes details and cause only when verbose', () => {
    const error = new CLIError(ErrorCodes.BUILD_FAILED, 'Build failed', {
      details: { exitCode: 2 },
      cause: new Error('setup.py crashed'),
    });

    expect(error.toUserString()).toBe('[DS_BUILD_303] Build failed');
    expect(error.toUserString(true)).toBe(
      '[DS_BUILD_303] Build failed\nDetails: {\n  "exitCode": 2\n}\nCaused by: setup.py crashed'
    );
  });
});

describe('fromReleaseError', () => {
  it('maps each reason to its code', () => {
    expect(fromReleaseError(new VersionError('already-published', 'x')).code).toBe('DS_VERSION_203');
    expect(fromReleaseError(new BuildError('toolchain-missing', 'x')).code).toBe('DS_BUILD_301');
    expect(fromReleaseError(new TagPushError('remote-conflict', 'x')).code).toBe('DS_TAG_503');
  });

  it('maps a clean permission error to DS_FS_101', () => {
    const error = fromReleaseError(
      new FilesystemError('permission-denied', 'Could not remove /srv/project/build', {
        details: { path: '/srv/project/build', code: 'EACCES' },
      })
    );

    expect(error.code).toBe('DS_FS_101');
    expect(error.toUserString()).toBe('[DS_FS_101] Could not remove /srv/project/build');
  });

  it('keeps the message, hint and exit code', () => {
    const error = fromReleaseError(new BuildError('build-failed', 'python3 -m build exited with 2', { hint: 'use a venv' }), 2);

    expect(error.message).toBe('python3 -m build exited with 2');
    expect(error.hint).toBe('use a venv');
    expect(error.exitCode).toBe(2);
  });
});

describe('wrapError', () => {
  it('returns CLIErrors unchanged', () => {
    const original = new CLIError(ErrorCodes.CONFIG_INVALID);
    expect(wrapError(original, ErrorCodes.RELEASE_UNEXPECTED)).toBe(original);
  });

  it('wraps non-Error values', () => {
    const wrapped = wrapError('boom', ErrorCodes.RELEASE_UNEXPECTED);

    expect(wrapped.code).toBe('DS_RELEASE_603');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause?.message).toBe('boom');
  });
});
