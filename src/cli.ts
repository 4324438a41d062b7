#!/usr/bin/env node

/**
 * readme-forge CLI
 */

import { createProgram } from './cli/program.js';
import { failCommand } from './core/index.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => failCommand('Unexpected failure', error));
