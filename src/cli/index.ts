#!/usr/bin/env node
/**
 * @fileoverview bibsearch CLI
 *
 *   bibsearch                 - Search every configured source interactively
 *   bibsearch -g [-f <file>]  - Write an example config file
 *   bibsearch -h              - Show help
 *
 * @packageDocumentation
 */

import { formatError, getExitCode } from './errors.js';
import { runCli } from './run.js';

// Remote lookups still in flight must not hold the process open after exit.
runCli(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exit(getExitCode(error));
  });
