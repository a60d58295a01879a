/**
 * Version-control client: the git queries and pushes the release needs
 */

import type { CommandResult, CommandRunner } from './runner.js';
import { formatCommand } from './runner.js';
import { compareVersions, parseVersion } from './version.js';

export class GitCommandError extends Error {
  constructor(
    public readonly args: readonly string[],
    public readonly result: CommandResult
  ) {
    const output = result.stderr.trim() || result.stdout.trim();
    super(`${formatCommand('git', args)} exited with ${result.exitCode}${output ? `: ${output}` : ''}`);
    this.name = 'GitCommandError';
  }
}

export interface PushOptions {
  dryRun?: boolean;
}

export interface GitClientOptions {
  cwd: string;
  signal?: AbortSignal;
}

export function tagName(prefix: string, version: string): string {
  return `${prefix}${version}`;
}

export class GitClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: GitClientOptions
  ) {}

  private exec(args: string[]): Promise<CommandResult> {
    return this.runner.run('git', args, {
      cwd: this.options.cwd,
      capture: true,
      signal: this.options.signal,
    });
  }

  private async checked(args: string[]): Promise<string> {
    const result = await this.exec(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result);
    }
    return result.stdout;
  }

  /** Porcelain status lines; empty when the working tree is clean */
  async status(): Promise<string[]> {
    const output = await this.checked(['status', '--porcelain']);
    // Leading spaces are significant in porcelain output
    return output.split('\n').filter((line) => line.trim() !== '');
  }

  /**
   * Tags carrying the prefix whose remainder parses as a version,
   * newest first
   */
  async versionTags(prefix: string): Promise<string[]> {
    const output = await this.checked(['tag', '--list', `${prefix}*`]);
    const tags = output
      .split('\n')
      .map((line) => line.trim())
      .filter((tag) => tag.startsWith(prefix))
      .flatMap((tag) => {
        const parsed = parseVersion(tag.slice(prefix.length));
        return parsed ? [{ tag, parsed }] : [];
      });
    return tags.sort((a, b) => compareVersions(b.parsed, a.parsed)).map((entry) => entry.tag);
  }

  /** Commit a ref points at, or undefined when the ref does not exist */
  async commitOf(ref: string): Promise<string | undefined> {
    const result = await this.exec(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
    if (result.exitCode !== 0) return undefined;
    return result.stdout.trim();
  }

  async head(): Promise<string> {
    return (await this.checked(['rev-parse', 'HEAD'])).trim();
  }

  /**
   * Commit the remote's tag points at, or undefined when the remote has no
   * such tag. Annotated tags are peeled.
   */
  async remoteTagCommit(remote: string, tag: string): Promise<string | undefined> {
    const ref = `refs/tags/${tag}`;
    const output = await this.checked(['ls-remote', '--tags', remote, ref, `${ref}^{}`]);
    let direct: string | undefined;
    for (const line of output.split('\n')) {
      const [sha, name] = line.trim().split(/\s+/);
      if (!sha || !name) continue;
      if (name === `${ref}^{}`) return sha;
      if (name === ref) direct = sha;
    }
    return direct;
  }

  /**
   * Push the branch and the tag together; --atomic makes the remote accept
   * both refs or neither
   */
  async pushRelease(remote: string, branch: string, tag: string, options: PushOptions = {}): Promise<void> {
    const args = ['push', '--atomic'];
    if (options.dryRun) args.push('--dry-run');
    args.push(remote, branch, `refs/tags/${tag}`);
    await this.checked(args);
  }

  /** Push the tag ref alone, leaving the branch untouched */
  async pushTag(remote: string, tag: string): Promise<void> {
    await this.checked(['push', remote, `refs/tags/${tag}`]);
  }
}
