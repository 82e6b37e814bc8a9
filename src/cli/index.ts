#!/usr/bin/env node
/**
 * @fileoverview langsense CLI
 *
 * Commands:
 *   langsense inspect <snapshot>  - Show a snapshot's module documentation and members
 *   langsense memlist <snapshot>  - Regenerate the member-list sidecar of a snapshot
 *   langsense help [command]      - Show help
 *
 * @packageDocumentation
 */

import { runCli } from './run.js';
import { formatError } from './errors.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  });
