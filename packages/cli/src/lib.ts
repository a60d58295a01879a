/**
 * @distship/cli - Library exports
 *
 * Programmatic entry points for the distship commands. Each returns the
 * process exit code instead of exiting.
 */

export { releaseCommand } from './commands/release.js';
export { cleanCommand } from './commands/clean.js';
export { checkCommand } from './commands/check.js';
export { buildCommand } from './commands/build.js';
export { pushTagCommand } from './commands/push-tag.js';
export { defaultDeps, type CommandDeps, type CommandOptions } from './commands/shared.js';
export { createProgram } from './program.js';

// Error handling
export {
  CLIError,
  ErrorCodes,
  ErrorMessages,
  ErrorRemediation,
  fromReleaseError,
  isCLIError,
  wrapError,
  type ErrorCode,
} from './lib/errors.js';

// Logging
export { Logger, logger, type LoggerOptions, type LogLevel } from './lib/logger.js';
