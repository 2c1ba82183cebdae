#!/usr/bin/env node
/**
 * depgraph CLI
 *
 * Command-line shell over the dependency explorer.
 */

import { loadCliConfig } from './context.js';
import { createProgram } from './program.js';

const config = loadCliConfig();
if (!config) {
  process.exit(1);
}

await createProgram(config).parseAsync();
