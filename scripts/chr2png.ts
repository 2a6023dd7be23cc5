#!/usr/bin/env tsx
import { runCli } from '../src/cli/convert';

runCli(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error('[chr2png] Unhandled error:', e);
    process.exit(1);
  });
