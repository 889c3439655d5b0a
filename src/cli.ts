#!/usr/bin/env node

import { runCli } from './runCli.js';

async function main() {
  // Best-effort crash traces for anything runCli does not turn into an exit code.
  process.on('unhandledRejection', (err) => {
    // eslint-disable-next-line no-console
    console.error('[bindsmith] unhandledRejection', err);
  });

  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('[bindsmith] fatal', err);
  process.exitCode = 1;
});
