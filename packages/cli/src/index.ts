#!/usr/bin/env -S npx tsx
import { runLog } from '@orgsim/core';
import { buildProgram } from './cli.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    runLog('cli', `Fatal error: ${message}`, 'error');
    process.exit(1);
  });
