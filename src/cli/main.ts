#!/usr/bin/env tsx
import { runCli } from './cli';

runCli(process.argv.slice(2)).then(
  (code) => { process.exitCode = code; },
  (e: unknown) => {
    console.error('[cli] Unhandled error:', e);
    process.exitCode = 1;
  },
);
