#!/usr/bin/env node

// Main entry point - delegates to the CLI
import { run } from './cli';
import { formatError } from './errors';

run(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('❌ migrate failed:', formatError(error));
    process.exitCode = 1;
  });
