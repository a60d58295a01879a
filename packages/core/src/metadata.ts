/**
 * Project metadata: the declared version, the distribution name and the
 * changelog's newest entry.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { VersionError } from './errors.js';

export async function readDeclaredVersion(root: string, versionFile: string): Promise<string> {
  const path = join(root, versionFile);
  if (!existsSync(path)) {
    throw new VersionError('missing', `Version file not found: ${versionFile}`, { details: { path } });
  }
  const version = (await readFile(path, 'utf-8')).trim();
  if (version === '') {
    throw new VersionError('missing', `Version file is empty: ${versionFile}`, { details: { path } });
  }
  return version;
}

/**
 * Body of a `[table]` in an INI or TOML file, up to the next table header
 */
function tableBody(content: string, table: string): string | undefined {
  const lines = content.split(/\r?\n/);
  const start = lines.findIndex((line) => line.trim() === `[${table}]`);
  if (start === -1) return undefined;
  const rest = lines.slice(start + 1);
  const end = rest.findIndex((line) => line.startsWith('['));
  return (end === -1 ? rest : rest.slice(0, end)).join('\n');
}

/**
 * Sources tried in order when the config names no package
 */
const NAME_SOURCES: Array<{ file: string; table?: string; pattern: RegExp }> = [
  { file: 'pyproject.toml', table: 'project', pattern: /^name\s*=\s*["']([^"']+)["']/m },
  { file: 'setup.cfg', table: 'metadata', pattern: /^name\s*=\s*(\S+)/m },
  // setup(name="...")
  { file: 'setup.py', pattern: /\bname\s*=\s*["']([^"']+)["']/ },
];

export async function readPackageName(root: string): Promise<string | undefined> {
  for (const source of NAME_SOURCES) {
    const path = join(root, source.file);
    if (!existsSync(path)) continue;
    const content = await readFile(path, 'utf-8');
    const scope = source.table ? tableBody(content, source.table) : content;
    const match = scope?.match(source.pattern);
    if (match && match[1]) return match[1];
  }
  return undefined;
}

/**
 * The newest changelog entry is the first line that starts with a digit
 */
export async function readChangelogVersion(root: string, changelog: string): Promise<string | undefined> {
  const path = join(root, changelog);
  if (!existsSync(path)) return undefined;
  const content = await readFile(path, 'utf-8');
  const line = content.split(/\r?\n/).find((candidate) => /^[0-9]/.test(candidate));
  return line?.trim();
}
