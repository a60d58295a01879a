/**
 * Workspace State: the transient build/dist directories
 */

import { rm, readdir } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve } from 'node:path';
import { FilesystemError } from './errors.js';
import type { Artifact, ArtifactKind, WorkspaceConfig } from './types.js';

const SDIST_SUFFIXES = ['.tar.gz', '.zip'];
const WHEEL_SUFFIX = '.whl';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Resolve a workspace directory and refuse anything outside the project root
 */
function resolveInside(root: string, dir: string): string {
  const full = resolve(root, dir);
  const rel = relative(root, full);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    throw new FilesystemError('io-failed', `Refusing to clean '${dir}': not inside ${root}`);
  }
  return full;
}

/**
 * Remove every workspace directory. Missing directories are not an error,
 * so running this twice leaves the same empty state.
 */
export async function cleanWorkspace(root: string, workspace: WorkspaceConfig): Promise<string[]> {
  const removed: string[] = [];
  for (const dir of workspace.dirs) {
    const target = resolveInside(root, dir);
    try {
      await rm(target, { recursive: true, force: true });
      removed.push(target);
    } catch (error) {
      const code = errnoCode(error);
      const reason = code === 'EACCES' || code === 'EPERM' ? 'permission-denied' : 'io-failed';
      throw new FilesystemError(reason, `Could not remove ${target}`, {
        cause: error,
        details: { path: target, code },
      });
    }
  }
  return removed;
}

export function artifactKind(fileName: string): ArtifactKind | null {
  if (fileName.endsWith(WHEEL_SUFFIX)) return 'wheel';
  if (SDIST_SUFFIXES.some((suffix) => fileName.endsWith(suffix))) return 'sdist';
  return null;
}

/**
 * List the Artifact Set in the dist directory: source archives first,
 * then wheels, each sorted by name. Unrecognised files are ignored.
 */
export async function collectArtifacts(root: string, distDir: string): Promise<Artifact[]> {
  const dir = resolve(root, distDir);
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return [];
    throw error;
  }

  const artifacts: Artifact[] = [];
  for (const fileName of entries) {
    const kind = artifactKind(fileName);
    if (kind) {
      artifacts.push({ kind, fileName, path: join(dir, fileName) });
    }
  }

  const order: Record<ArtifactKind, number> = { sdist: 0, wheel: 1 };
  return artifacts.sort((a, b) => order[a.kind] - order[b.kind] || a.fileName.localeCompare(b.fileName));
}
