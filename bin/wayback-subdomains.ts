#!/usr/bin/env node
import { runCli, EXIT_FAILURE } from '../lib/cli';

const controller = new AbortController();
const cancel = () => controller.abort();
process.once('SIGINT', cancel);
process.once('SIGTERM', cancel);

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`Unexpected error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = EXIT_FAILURE;
  })
  .finally(() => {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
  });
