#!/usr/bin/env node
import { runCli } from './cli.js';
import { logError } from './services/logger.js';

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

try {
  process.exitCode = await runCli(process.argv.slice(2));
} catch (error) {
  const failure = error instanceof Error ? error : new Error(String(error));
  logError('link-unwrap failed', failure);
  process.stderr.write(`link-unwrap failed: ${failure.message}\n`);
  process.exitCode = 1;
}
