#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   mac-enroll <import|add|list|send|config> [--config ./mac-enroll.json] ...
 */

import { runCli } from './run.js';

runCli(process.argv.slice(2), {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
  env: process.env,
  cwd: process.cwd(),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
);
