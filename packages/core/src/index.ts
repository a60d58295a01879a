/**
 * @distship/core
 *
 * Release pipeline for Python distributions: clean, verify, build,
 * publish & tag. The CLI is a thin layer over these exports.
 */

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Configuration
export { loadConfig, resolveTargetPath, DEFAULT_CONFIG, CONFIG_FILE_NAMES, type LoadedConfig } from './config.js';

// Environment
export { detectIsolation, resolvePython, VENV_HINT } from './environment.js';

// Version descriptors
export { parseVersion, isValidVersion, compareVersions, latestVersion, type ParsedVersion } from './version.js';

// Collaborators
export {
  ProcessRunner,
  CommandNotFoundError,
  CommandAbortedError,
  formatCommand,
  type CommandRunner,
  type CommandResult,
  type RunOptions,
} from './runner.js';
export { PypiRegistry, RegistryRequestError, type PackageRegistry } from './registry.js';
export { GitClient, GitCommandError, tagName } from './git.js';

// Steps
export { cleanWorkspace, collectArtifacts } from './workspace.js';
export { verifyVersion, type VerifiedVersion } from './verify.js';
export { buildArtifacts, type BuildResult } from './toolchain.js';
export { pushReleaseTag, type TagRepairResult } from './publisher.js';

// Orchestrator
export {
  release,
  runSteps,
  outcomeExitCode,
  cleanStep,
  verifyStep,
  buildStep,
  publishStep,
  RELEASE_STEPS,
  PARTIAL_RELEASE_EXIT_CODE,
  INTERRUPTED_EXIT_CODE,
  type ReleaseContext,
  type ReleaseStep,
} from './pipeline.js';
