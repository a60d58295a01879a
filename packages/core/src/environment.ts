/**
 * Isolated Environment Detection
 *
 * Detects whether an isolated dependency environment (a virtualenv) is
 * active and derives the interpreter the toolchain should run under.
 */

import type { IsolationContext, ToolchainConfig } from './types.js';

/** Interpreter used inside a virtualenv */
const ISOLATED_PYTHON = 'python';

/** Interpreter used outside a virtualenv */
const SYSTEM_PYTHON = 'python3';

export const VENV_HINT =
  "HELP: To avoid this error, use a virtual-env with 'python -m venv env && source env/bin/activate' instead.";

/**
 * Detect an active virtualenv from the environment
 */
export function detectIsolation(env: NodeJS.ProcessEnv = process.env): IsolationContext {
  const venv = env['VIRTUAL_ENV'];
  if (venv && venv.trim() !== '') {
    return { isolated: true, path: venv };
  }
  return { isolated: false };
}

/**
 * Resolve the interpreter: config override first, then the isolation default
 */
export function resolvePython(isolation: IsolationContext, toolchain: Pick<ToolchainConfig, 'python'>): string {
  if (toolchain.python) return toolchain.python;
  return isolation.isolated ? ISOLATED_PYTHON : SYSTEM_PYTHON;
}
