#!/usr/bin/env node
import process from 'node:process';
import { pathToFileURL } from 'node:url';
import { runCli } from './index.js';
import { toErrorMessage } from './errors.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    process.stderr.write(`Error: ${toErrorMessage(error)}\n`);
    process.exit(1);
  });
}
