#!/usr/bin/env node
/**
 * Chart Options Generator CLI
 * @module cli
 *
 * Usage:
 *   generate-chart-options --file flags.txt
 *   generate-chart-options --command "./bin/controller --help"
 *   npm run generate -- --stdin --only configuration
 */

import { run } from './run.js';

run(process.argv.slice(2)).then(
  (status) => {
    process.exitCode = status;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  }
);
