/**
 * Core types for the distship release pipeline
 */

import type { ReleaseError, TagPushError } from './errors.js';

// ============================================================================
// Configuration
// ============================================================================

export interface ReleaseConfig {
  /** Distribution name on the registry. Read from project metadata when unset. */
  package?: string;
  /** File holding the version descriptor, relative to the project root */
  versionFile: string;
  workspace: WorkspaceConfig;
  toolchain: ToolchainConfig;
  registry: RegistryConfig;
  git: GitConfig;
  verify: VerifyConfig;
}

export interface WorkspaceConfig {
  /** Transient directories removed by the clean step */
  dirs: string[];
  /** Where the toolchain writes the Artifact Set */
  distDir: string;
}

export interface ToolchainConfig {
  /** Interpreter override; defaults depend on the isolated environment */
  python?: string;
  /** Packages installed before building inside an isolated environment */
  tools: string[];
}

export interface RegistryConfig {
  url: string;
  /** twine --repository name */
  repository?: string;
  /** Timeout in ms for registry lookups */
  timeout: number;
}

export interface GitConfig {
  remote: string;
  branch: string;
  tagPrefix: string;
}

export interface VerifyConfig {
  requireNewer: boolean;
  requireCleanWorktree: boolean;
  /** Changelog whose newest entry must name the version */
  changelog?: string;
}

// ============================================================================
// Environment
// ============================================================================

export interface IsolationContext {
  isolated: boolean;
  /** Root of the active virtualenv */
  path?: string;
}

// ============================================================================
// Artifacts
// ============================================================================

export type ArtifactKind = 'sdist' | 'wheel';

export interface Artifact {
  kind: ArtifactKind;
  fileName: string;
  /** Absolute path */
  path: string;
}

// ============================================================================
// Pipeline
// ============================================================================

export type StepName = 'clean' | 'verify' | 'build' | 'publish';

export interface ProgressEvent {
  step: StepName;
  index: number;
  total: number;
  status: 'started' | 'completed';
  message: string;
}

export type ProgressCallback = (event: ProgressEvent) => void;

export interface ReleaseState {
  /** Set once by the verify step; later steps never re-read the version file */
  version?: string;
  tag?: string;
  artifacts: Artifact[];
  published: boolean;
  tagged: boolean;
}

export type ReleaseOutcome =
  | { status: 'completed'; state: ReleaseState }
  | { status: 'failed'; step: StepName; error: ReleaseError; state: ReleaseState }
  | { status: 'published-untagged'; error: TagPushError; state: ReleaseState }
  | { status: 'interrupted'; step: StepName; state: ReleaseState };
