#!/usr/bin/env node
/**
 * @fileoverview concord CLI
 *
 * Commands:
 *   concord recommend <intent>  - Rank candidate repositories for an intent
 *   concord objectives          - List the objective vocabulary
 *   concord conflicts           - List registered objective trade-offs
 *
 * @packageDocumentation
 */

import { runCli } from './run.js';
import { formatError } from './errors.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  });
