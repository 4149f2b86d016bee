#!/usr/bin/env -S node --import tsx
// ============================================================================
// @textprobe/cli — Executable entry
// ============================================================================

import { errorMessage } from '@textprobe/core';
import { runCli } from './cli.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  },
);
