/**
 * Release error taxonomy
 *
 * Every step failure is one of these. The core never recovers from them;
 * the CLI maps each reason to a deterministic error code.
 */

import type { StepName } from './types.js';

export type FilesystemErrorReason = 'permission-denied' | 'io-failed';

export type VersionErrorReason =
  | 'missing'
  | 'malformed'
  | 'already-published'
  | 'not-newer'
  | 'dirty-worktree'
  | 'changelog-mismatch'
  | 'tag-missing'
  | 'tag-not-latest'
  | 'tag-not-at-head'
  | 'tag-already-pushed'
  | 'remote-unavailable'
  | 'git-unavailable'
  | 'unknown-package'
  | 'registry-unavailable';

export type BuildErrorReason = 'toolchain-missing' | 'install-failed' | 'build-failed' | 'no-artifacts';

export type PublishErrorReason = 'check-failed' | 'upload-failed' | 'uploader-missing';

export type TagPushErrorReason = 'preflight-failed' | 'push-failed' | 'remote-conflict' | 'git-missing';

export type ConfigErrorReason = 'invalid' | 'parse-failed';

export type ReleaseErrorReason =
  | FilesystemErrorReason
  | VersionErrorReason
  | BuildErrorReason
  | PublishErrorReason
  | TagPushErrorReason
  | ConfigErrorReason
  | 'interrupted';

interface ReleaseErrorOptions {
  step?: StepName;
  /** Exit code of the failing subprocess, when there was one */
  exitCode?: number;
  /** One-line remediation shown with the error */
  hint?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ReleaseError<R extends ReleaseErrorReason = ReleaseErrorReason> extends Error {
  public readonly reason: R;
  public readonly step?: StepName;
  public readonly exitCode?: number;
  public readonly hint?: string;
  public readonly details?: Record<string, unknown>;

  constructor(reason: R, message: string, options: ReleaseErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ReleaseError';
    this.reason = reason;
    this.step = options.step;
    this.exitCode = options.exitCode;
    this.hint = options.hint;
    this.details = options.details;
  }
}

export class FilesystemError extends ReleaseError<FilesystemErrorReason> {
  constructor(reason: FilesystemErrorReason, message: string, options: ReleaseErrorOptions = {}) {
    super(reason, message, { step: 'clean', ...options });
    this.name = 'FilesystemError';
  }
}

export class VersionError extends ReleaseError<VersionErrorReason> {
  constructor(reason: VersionErrorReason, message: string, options: ReleaseErrorOptions = {}) {
    super(reason, message, { step: 'verify', ...options });
    this.name = 'VersionError';
  }
}

export class BuildError extends ReleaseError<BuildErrorReason> {
  constructor(reason: BuildErrorReason, message: string, options: ReleaseErrorOptions = {}) {
    super(reason, message, { step: 'build', ...options });
    this.name = 'BuildError';
  }
}

export class PublishError extends ReleaseError<PublishErrorReason> {
  constructor(reason: PublishErrorReason, message: string, options: ReleaseErrorOptions = {}) {
    super(reason, message, { step: 'publish', ...options });
    this.name = 'PublishError';
  }
}

export class TagPushError extends ReleaseError<TagPushErrorReason> {
  constructor(reason: TagPushErrorReason, message: string, options: ReleaseErrorOptions = {}) {
    super(reason, message, { step: 'publish', ...options });
    this.name = 'TagPushError';
  }
}

export class ConfigError extends ReleaseError<ConfigErrorReason> {
  constructor(reason: ConfigErrorReason, message: string, options: ReleaseErrorOptions = {}) {
    super(reason, message, options);
    this.name = 'ConfigError';
  }
}

export class InterruptedError extends ReleaseError<'interrupted'> {
  constructor(step: StepName) {
    super('interrupted', `Interrupted during ${step}`, { step });
    this.name = 'InterruptedError';
  }
}

export function isReleaseError(error: unknown): error is ReleaseError {
  return error instanceof ReleaseError;
}
