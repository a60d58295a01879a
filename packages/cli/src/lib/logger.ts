/**
 * Structured Logger for the distship CLI
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Verbose mode support
 * - Silent mode (errors and failures still print)
 * - JSON lines output
 * - Automatic redaction of sensitive data
 */

import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
  json?: boolean;
}

/**
 * Keys whose values never reach the terminal (twine credentials in particular)
 */
const SENSITIVE_PATTERNS = [/token/i, /password/i, /secret/i, /credential/i, /api[_-]?key/i];

/**
 * Prefixes that indicate sensitive values
 */
const SENSITIVE_PREFIXES = ['pypi-', 'Bearer ', 'Basic '];

export class Logger {
  private verbose = false;
  private silent = false;
  private json = false;

  configure(options: LoggerOptions): void {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.json = options.json ?? false;
  }

  get isJson(): boolean {
    return this.json;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose || this.silent) return;
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /**
   * Log a pipeline step (for progress indication)
   */
  step(step: number, total: number, message: string): void {
    if (this.silent) return;
    if (this.json) {
      this.emitJson('info', message, { step, total });
      return;
    }
    console.log(pc.dim(`[${step}/${total}]`), message);
  }

  success(message: string): void {
    if (this.silent) return;
    if (this.json) {
      this.emitJson('info', message);
      return;
    }
    console.log(pc.green('✓'), message);
  }

  fail(message: string): void {
    if (this.json) {
      this.emitJson('error', message);
      return;
    }
    console.error(pc.red('✗'), message);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (this.json) {
      this.emitJson(level, message, data);
      return;
    }

    const formattedMessage = `${this.getPrefix(level)} ${message}`;
    if (level === 'error' || level === 'warn') {
      console.error(formattedMessage);
    } else {
      console.log(formattedMessage);
    }

    if (this.verbose && data) {
      console.log(pc.dim(JSON.stringify(this.redact(data), null, 2)));
    }
  }

  private emitJson(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data && { data: this.redact(data) }),
    });
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return pc.dim('[DEBUG]');
      case 'info':
        return pc.blue('[INFO]');
      case 'warn':
        return pc.yellow('[WARN]');
      case 'error':
        return pc.red('[ERROR]');
    }
  }

  /**
   * Redact sensitive data from log output
   */
  redact(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
        redacted[key] = '[REDACTED]';
      } else if (typeof value === 'string' && SENSITIVE_PREFIXES.some((prefix) => value.startsWith(prefix))) {
        redacted[key] = value.length <= 8 ? '[REDACTED]' : `${value.slice(0, 4)}...${value.slice(-4)}`;
      } else if (isRecord(value)) {
        redacted[key] = this.redact(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Singleton logger instance
export const logger = new Logger();
