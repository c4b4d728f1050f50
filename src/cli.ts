#!/usr/bin/env node
/**
 * termdeck command line entry point.
 */

import { main } from './lifecycle.js';
import { formatError } from './utils.js';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`[termdeck] ${formatError(err)}`);
    process.exitCode = 1;
  },
);
