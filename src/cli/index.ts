#!/usr/bin/env node
import { runCli, EXIT_USAGE } from './run';

const controller = new AbortController();
let interrupted = false;

process.on('SIGINT', () => {
  if (interrupted) {
    process.exit(130);
  }
  interrupted = true;
  process.stderr.write('Interrupted, finishing with a partial report (Ctrl+C again to quit)\n');
  controller.abort();
});

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Audit failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = EXIT_USAGE;
  });
