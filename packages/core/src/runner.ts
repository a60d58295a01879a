/**
 * Child process execution for the external collaborators
 * (packaging toolchain, uploader, git).
 */

import { spawn } from 'node:child_process';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Capture stdout/stderr instead of streaming them to the terminal */
  capture?: boolean;
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * Thrown when the executable itself cannot be found. Non-zero exits are
 * results, not errors.
 */
export class CommandNotFoundError extends Error {
  constructor(public readonly command: string) {
    super(`Command not found: ${command}`);
    this.name = 'CommandNotFoundError';
  }
}

export class CommandAbortedError extends Error {
  constructor(public readonly command: string) {
    super(`Command aborted: ${command}`);
    this.name = 'CommandAbortedError';
  }
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? `'${part}'` : part)).join(' ');
}

export class ProcessRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: options.capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
        signal: options.signal,
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.setEncoding('utf-8').on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.setEncoding('utf-8').on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          reject(new CommandNotFoundError(command));
        } else if (error.name === 'AbortError') {
          reject(new CommandAbortedError(command));
        } else {
          reject(error);
        }
      });

      child.on('close', (code, signal) => {
        if (options.signal?.aborted) {
          reject(new CommandAbortedError(command));
          return;
        }
        // code is null when the child was killed by a signal
        resolve({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
      });
    });
  }
}
