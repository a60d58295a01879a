/**
 * Version Descriptor parsing and ordering
 *
 * Accepted form: MAJOR.MINOR[.PATCH], then an optional pre-release
 * (aN, bN, rcN, optionally joined with '-' or '.'), .postN and .devN.
 */

export type PreReleaseKind = 'a' | 'b' | 'rc';

export interface ParsedVersion {
  raw: string;
  release: number[];
  pre?: { kind: PreReleaseKind; number: number };
  post?: number;
  dev?: number;
}

const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?(?:[-.]?(a|b|rc)(\d+))?(?:\.post(\d+))?(?:\.dev(\d+))?$/;

const PRE_RANK: Record<PreReleaseKind, number> = { a: 0, b: 1, rc: 2 };

function isPreReleaseKind(value: string): value is PreReleaseKind {
  return value === 'a' || value === 'b' || value === 'rc';
}

export function parseVersion(input: string): ParsedVersion | null {
  const match = input.trim().match(VERSION_PATTERN);
  if (!match || !match[1] || !match[2]) return null;

  const release = [parseInt(match[1], 10), parseInt(match[2], 10)];
  if (match[3]) release.push(parseInt(match[3], 10));

  const parsed: ParsedVersion = { raw: input.trim(), release };
  if (match[4] && match[5] && isPreReleaseKind(match[4])) {
    parsed.pre = { kind: match[4], number: parseInt(match[5], 10) };
  }
  if (match[6]) parsed.post = parseInt(match[6], 10);
  if (match[7]) parsed.dev = parseInt(match[7], 10);
  return parsed;
}

export function isValidVersion(input: string): boolean {
  return parseVersion(input) !== null;
}

/**
 * Sort key below the release segment:
 * dev-only < pre-releases < final < post-releases
 */
function phaseKey(v: ParsedVersion): number[] {
  let pre = [3, 0];
  if (v.pre) {
    pre = [PRE_RANK[v.pre.kind], v.pre.number];
  } else if (v.dev !== undefined && v.post === undefined) {
    pre = [-1, 0];
  }
  const post = v.post ?? -1;
  const dev = v.dev ?? Number.POSITIVE_INFINITY;
  return [...pre, post, dev];
}

function compareArrays(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? 0;
    const right = b[i] ?? 0;
    if (left !== right) return left < right ? -1 : 1;
  }
  return 0;
}

export function compareVersions(a: ParsedVersion, b: ParsedVersion): number {
  return compareArrays(a.release, b.release) || compareArrays(phaseKey(a), phaseKey(b));
}

/**
 * Highest version among the inputs; unparseable entries are skipped
 */
export function latestVersion(versions: Iterable<string>): ParsedVersion | null {
  let latest: ParsedVersion | null = null;
  for (const candidate of versions) {
    const parsed = parseVersion(candidate);
    if (parsed && (!latest || compareVersions(parsed, latest) > 0)) {
      latest = parsed;
    }
  }
  return latest;
}

/**
 * Registries normalize "1.0" and "1.0.0" to the same release
 */
export function isSameVersion(a: ParsedVersion, b: ParsedVersion): boolean {
  return compareVersions(a, b) === 0;
}
