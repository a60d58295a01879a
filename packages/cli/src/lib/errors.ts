/**
 * Deterministic Error Codes for the distship CLI
 *
 * Format: DS_<CATEGORY>_<NUMBER>
 *
 * Categories:
 * - CONFIG: Configuration errors
 * - FS: Workspace clean errors
 * - VERSION: Version gate failures
 * - BUILD: Packaging toolchain errors
 * - PUBLISH: Upload errors
 * - TAG: Tag push errors
 * - RELEASE: Outcomes spanning steps
 */

import type { ReleaseError, ReleaseErrorReason } from '@distship/core';

export const ErrorCodes = {
  // CONFIG errors (001-099)
  CONFIG_INVALID: 'DS_CONFIG_001',
  CONFIG_PARSE_ERROR: 'DS_CONFIG_002',

  // FS errors (100-199)
  FS_PERMISSION_DENIED: 'DS_FS_101',
  FS_IO_ERROR: 'DS_FS_102',

  // VERSION errors (200-299)
  VERSION_MISSING: 'DS_VERSION_201',
  VERSION_MALFORMED: 'DS_VERSION_202',
  VERSION_ALREADY_PUBLISHED: 'DS_VERSION_203',
  VERSION_NOT_NEWER: 'DS_VERSION_204',
  VERSION_DIRTY_WORKTREE: 'DS_VERSION_205',
  VERSION_CHANGELOG_MISMATCH: 'DS_VERSION_206',
  VERSION_TAG_MISSING: 'DS_VERSION_207',
  VERSION_TAG_NOT_LATEST: 'DS_VERSION_208',
  VERSION_TAG_NOT_AT_HEAD: 'DS_VERSION_209',
  VERSION_TAG_ALREADY_PUSHED: 'DS_VERSION_210',
  VERSION_REMOTE_UNAVAILABLE: 'DS_VERSION_211',
  VERSION_GIT_UNAVAILABLE: 'DS_VERSION_212',
  VERSION_UNKNOWN_PACKAGE: 'DS_VERSION_213',
  VERSION_REGISTRY_UNAVAILABLE: 'DS_VERSION_214',

  // BUILD errors (300-399)
  BUILD_TOOLCHAIN_MISSING: 'DS_BUILD_301',
  BUILD_INSTALL_FAILED: 'DS_BUILD_302',
  BUILD_FAILED: 'DS_BUILD_303',
  BUILD_NO_ARTIFACTS: 'DS_BUILD_304',

  // PUBLISH errors (400-499)
  PUBLISH_CHECK_FAILED: 'DS_PUBLISH_401',
  PUBLISH_UPLOAD_FAILED: 'DS_PUBLISH_402',
  PUBLISH_UPLOADER_MISSING: 'DS_PUBLISH_403',

  // TAG errors (500-599)
  TAG_PREFLIGHT_FAILED: 'DS_TAG_501',
  TAG_PUSH_FAILED: 'DS_TAG_502',
  TAG_REMOTE_CONFLICT: 'DS_TAG_503',
  TAG_GIT_MISSING: 'DS_TAG_504',

  // RELEASE outcomes (600-699)
  RELEASE_PUBLISHED_UNTAGGED: 'DS_RELEASE_601',
  RELEASE_INTERRUPTED: 'DS_RELEASE_602',
  RELEASE_UNEXPECTED: 'DS_RELEASE_603',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const REASON_CODES: Record<ReleaseErrorReason, ErrorCode> = {
  invalid: ErrorCodes.CONFIG_INVALID,
  'parse-failed': ErrorCodes.CONFIG_PARSE_ERROR,
  'permission-denied': ErrorCodes.FS_PERMISSION_DENIED,
  'io-failed': ErrorCodes.FS_IO_ERROR,
  missing: ErrorCodes.VERSION_MISSING,
  malformed: ErrorCodes.VERSION_MALFORMED,
  'already-published': ErrorCodes.VERSION_ALREADY_PUBLISHED,
  'not-newer': ErrorCodes.VERSION_NOT_NEWER,
  'dirty-worktree': ErrorCodes.VERSION_DIRTY_WORKTREE,
  'changelog-mismatch': ErrorCodes.VERSION_CHANGELOG_MISMATCH,
  'tag-missing': ErrorCodes.VERSION_TAG_MISSING,
  'tag-not-latest': ErrorCodes.VERSION_TAG_NOT_LATEST,
  'tag-not-at-head': ErrorCodes.VERSION_TAG_NOT_AT_HEAD,
  'tag-already-pushed': ErrorCodes.VERSION_TAG_ALREADY_PUSHED,
  'remote-unavailable': ErrorCodes.VERSION_REMOTE_UNAVAILABLE,
  'git-unavailable': ErrorCodes.VERSION_GIT_UNAVAILABLE,
  'unknown-package': ErrorCodes.VERSION_UNKNOWN_PACKAGE,
  'registry-unavailable': ErrorCodes.VERSION_REGISTRY_UNAVAILABLE,
  'toolchain-missing': ErrorCodes.BUILD_TOOLCHAIN_MISSING,
  'install-failed': ErrorCodes.BUILD_INSTALL_FAILED,
  'build-failed': ErrorCodes.BUILD_FAILED,
  'no-artifacts': ErrorCodes.BUILD_NO_ARTIFACTS,
  'check-failed': ErrorCodes.PUBLISH_CHECK_FAILED,
  'upload-failed': ErrorCodes.PUBLISH_UPLOAD_FAILED,
  'uploader-missing': ErrorCodes.PUBLISH_UPLOADER_MISSING,
  'preflight-failed': ErrorCodes.TAG_PREFLIGHT_FAILED,
  'push-failed': ErrorCodes.TAG_PUSH_FAILED,
  'remote-conflict': ErrorCodes.TAG_REMOTE_CONFLICT,
  'git-missing': ErrorCodes.TAG_GIT_MISSING,
  interrupted: ErrorCodes.RELEASE_INTERRUPTED,
};

/**
 * User-friendly error messages for each error code
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: 'Configuration file is invalid',
  [ErrorCodes.CONFIG_PARSE_ERROR]: 'Configuration file could not be parsed',

  [ErrorCodes.FS_PERMISSION_DENIED]: 'Permission denied while cleaning the workspace',
  [ErrorCodes.FS_IO_ERROR]: 'Could not clean the workspace',

  [ErrorCodes.VERSION_MISSING]: 'Version file is missing or empty',
  [ErrorCodes.VERSION_MALFORMED]: 'Version is malformed',
  [ErrorCodes.VERSION_ALREADY_PUBLISHED]: 'Version is already published',
  [ErrorCodes.VERSION_NOT_NEWER]: 'Version is older than the latest published version',
  [ErrorCodes.VERSION_DIRTY_WORKTREE]: 'Working tree has uncommitted changes',
  [ErrorCodes.VERSION_CHANGELOG_MISMATCH]: 'Changelog does not mention this version',
  [ErrorCodes.VERSION_TAG_MISSING]: 'Release tag does not exist',
  [ErrorCodes.VERSION_TAG_NOT_LATEST]: 'Release tag is not the latest version tag',
  [ErrorCodes.VERSION_TAG_NOT_AT_HEAD]: 'Release tag does not point at HEAD',
  [ErrorCodes.VERSION_TAG_ALREADY_PUSHED]: 'Release tag already exists on the remote',
  [ErrorCodes.VERSION_REMOTE_UNAVAILABLE]: 'Could not query the git remote',
  [ErrorCodes.VERSION_GIT_UNAVAILABLE]: 'Could not query git',
  [ErrorCodes.VERSION_UNKNOWN_PACKAGE]: 'Package name is unknown',
  [ErrorCodes.VERSION_REGISTRY_UNAVAILABLE]: 'Could not query the package registry',

  [ErrorCodes.BUILD_TOOLCHAIN_MISSING]: 'Python interpreter not found',
  [ErrorCodes.BUILD_INSTALL_FAILED]: 'Installing build tools failed',
  [ErrorCodes.BUILD_FAILED]: 'Build failed',
  [ErrorCodes.BUILD_NO_ARTIFACTS]: 'Build produced an incomplete Artifact Set',

  [ErrorCodes.PUBLISH_CHECK_FAILED]: 'Artifacts failed twine check',
  [ErrorCodes.PUBLISH_UPLOAD_FAILED]: 'Upload failed',
  [ErrorCodes.PUBLISH_UPLOADER_MISSING]: 'Python interpreter not found for upload',

  [ErrorCodes.TAG_PREFLIGHT_FAILED]: 'Tag push would be rejected',
  [ErrorCodes.TAG_PUSH_FAILED]: 'Tag push failed',
  [ErrorCodes.TAG_REMOTE_CONFLICT]: 'Remote tag points at a different commit',
  [ErrorCodes.TAG_GIT_MISSING]: 'git not found',

  [ErrorCodes.RELEASE_PUBLISHED_UNTAGGED]: 'Artifacts were published but the tag was not pushed',
  [ErrorCodes.RELEASE_INTERRUPTED]: 'Release interrupted',
  [ErrorCodes.RELEASE_UNEXPECTED]: 'Unexpected error during release',
};

/**
 * Remediation guidance for each error code
 */
export const ErrorRemediation: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: `
Check distship.config.yaml against the supported options:

  package, versionFile,
  workspace.{dirs,distDir}, toolchain.{python,tools},
  registry.{url,repository,timeout}, git.{remote,branch,tagPrefix},
  verify.{requireNewer,requireCleanWorktree,changelog}
`.trim(),

  [ErrorCodes.CONFIG_PARSE_ERROR]: `
The configuration file is not valid YAML/JSON. Run with --verbose to see the parser error.
`.trim(),

  [ErrorCodes.FS_PERMISSION_DENIED]: `
A build directory could not be removed. Check ownership:

  ls -ld build dist .eggs .tox

Directories created by a build run under sudo are a common cause.
`.trim(),

  [ErrorCodes.FS_IO_ERROR]: `
Check that workspace.dirs only names directories inside the project.
`.trim(),

  [ErrorCodes.VERSION_MISSING]: `
Write the version to release into the version file:

  echo 1.0.0 > VERSION
`.trim(),

  [ErrorCodes.VERSION_MALFORMED]: `
Use MAJOR.MINOR[.PATCH] with optional aN/bN/rcN, .postN or .devN, e.g. 1.3.0 or 2.0.0rc1.
`.trim(),

  [ErrorCodes.VERSION_ALREADY_PUBLISHED]: `
Registries never accept the same version twice. Bump the version file, commit, tag and retry.
`.trim(),

  [ErrorCodes.VERSION_NOT_NEWER]: `
Bump the version above the latest published one, or set verify.requireNewer: false
to release a fix for an older line.
`.trim(),

  [ErrorCodes.VERSION_DIRTY_WORKTREE]: `
Commit or stash your changes first:

  git status
`.trim(),

  [ErrorCodes.VERSION_CHANGELOG_MISMATCH]: `
Add an entry for this version at the top of the changelog and commit it.
`.trim(),

  [ErrorCodes.VERSION_TAG_MISSING]: `
Tag the release commit:

  git tag <version>
`.trim(),

  [ErrorCodes.VERSION_TAG_NOT_LATEST]: `
A newer version tag exists. Bump the version file past it, or remove the stray tag.
`.trim(),

  [ErrorCodes.VERSION_TAG_NOT_AT_HEAD]: `
The tag must mark the commit being released. Move it if it is not yet pushed:

  git tag -f <version>
`.trim(),

  [ErrorCodes.VERSION_TAG_ALREADY_PUSHED]: `
This version was already tagged on the remote. Bump the version to release again.
`.trim(),

  [ErrorCodes.VERSION_REMOTE_UNAVAILABLE]: `
Check network access and credentials for the remote:

  git ls-remote origin
`.trim(),

  [ErrorCodes.VERSION_GIT_UNAVAILABLE]: `
Run distship from inside a git repository with git on PATH.
`.trim(),

  [ErrorCodes.VERSION_UNKNOWN_PACKAGE]: `
Set the distribution name in distship.config.yaml:

  package: your-dist-name
`.trim(),

  [ErrorCodes.VERSION_REGISTRY_UNAVAILABLE]: `
Check network access to the registry, or point DISTSHIP_REGISTRY_URL at a reachable one.
`.trim(),

  [ErrorCodes.BUILD_TOOLCHAIN_MISSING]: `
Install Python 3, or set toolchain.python to the interpreter to use.
`.trim(),

  [ErrorCodes.BUILD_INSTALL_FAILED]: `
pip could not install the build tools into the virtualenv. Re-run it by hand to see why:

  python -m pip install --upgrade build twine
`.trim(),

  [ErrorCodes.BUILD_FAILED]: `
The build backend failed; its output is above. Reproduce with:

  python3 -m build --sdist --wheel
`.trim(),

  [ErrorCodes.BUILD_NO_ARTIFACTS]: `
Both an sdist and a wheel are required. Check the build backend configuration and workspace.distDir.
`.trim(),

  [ErrorCodes.PUBLISH_CHECK_FAILED]: `
twine rejected the package metadata (often the long description). Nothing was uploaded.
`.trim(),

  [ErrorCodes.PUBLISH_UPLOAD_FAILED]: `
Check TWINE_USERNAME / TWINE_PASSWORD or ~/.pypirc. The tag was not pushed.
`.trim(),

  [ErrorCodes.PUBLISH_UPLOADER_MISSING]: `
Install Python 3, or set toolchain.python to the interpreter to use.
`.trim(),

  [ErrorCodes.TAG_PREFLIGHT_FAILED]: `
The remote would reject the push, so nothing was uploaded. Pull and rebase, or check push access.
`.trim(),

  [ErrorCodes.TAG_PUSH_FAILED]: `
Retry the tag push on its own:

  distship push-tag
`.trim(),

  [ErrorCodes.TAG_REMOTE_CONFLICT]: `
The remote tag marks another commit. Resolve it by hand; distship never force-pushes tags.
`.trim(),

  [ErrorCodes.TAG_GIT_MISSING]: `
Install git and make sure it is on PATH.
`.trim(),

  [ErrorCodes.RELEASE_PUBLISHED_UNTAGGED]: `
The registry has the new version but the remote has no tag for it.
Once the remote is reachable, push the tag on its own:

  distship push-tag
`.trim(),

  [ErrorCodes.RELEASE_INTERRUPTED]: `
Re-run the command. Anything already uploaded stays published; if the tag is missing, run:

  distship push-tag
`.trim(),

  [ErrorCodes.RELEASE_UNEXPECTED]: `
Run with --verbose and report the output.
`.trim(),
};

interface CLIErrorOptions {
  details?: unknown;
  cause?: Error;
  hint?: string;
  exitCode?: number;
}

/**
 * Structured CLI Error with deterministic error code
 */
export class CLIError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly hint?: string;
  public readonly exitCode: number;
  public override readonly cause?: Error;

  constructor(code: ErrorCode, message?: string, options: CLIErrorOptions = {}) {
    super(message ?? ErrorMessages[code], { cause: options.cause });

    this.name = 'CLIError';
    this.code = code;
    this.details = options.details;
    this.hint = options.hint;
    this.exitCode = options.exitCode ?? 1;
    this.cause = options.cause;

    Error.captureStackTrace?.(this, CLIError);
  }

  getRemediation(): string {
    return ErrorRemediation[this.code];
  }

  /**
   * Format error for user display
   */
  toUserString(verbose = false): string {
    const parts: string[] = [`[${this.code}] ${this.message}`];

    if (this.hint) {
      parts.push(`\n${this.hint}`);
    }

    if (verbose && this.details) {
      parts.push(`\nDetails: ${JSON.stringify(this.details, null, 2)}`);
    }

    if (verbose && this.cause) {
      parts.push(`\nCaused by: ${this.cause.message}`);
    }

    return parts.join('');
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
      remediation: this.getRemediation(),
      details: this.details,
      cause: this.cause ? { message: this.cause.message } : undefined,
    };
  }
}

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Translate a core release error into its CLI code
 */
export function fromReleaseError(error: ReleaseError, exitCode = 1): CLIError {
  return new CLIError(REASON_CODES[error.reason], error.message, {
    details: error.details,
    cause: error.cause instanceof Error ? error.cause : undefined,
    hint: error.hint,
    exitCode,
  });
}

/**
 * Wrap an unknown error in a CLIError
 */
export function wrapError(error: unknown, code: ErrorCode, message?: string): CLIError {
  if (error instanceof CLIError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new CLIError(code, message ?? cause.message, { cause });
}
