#!/usr/bin/env node

/**
 * distship CLI
 *
 * Release a Python distribution: clean, verify, build, publish & tag.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
