#!/usr/bin/env tsx
import './register';
import { getLogger, serializeError } from '@bloxstack/platform-core';
import { parseArgs, runCommand, USAGE } from './cli';

const logger = getLogger('stack-runner');

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  if ('help' in parsed) {
    console.log(USAGE);
    return 0;
  }
  if ('error' in parsed) {
    console.error(`${parsed.error}\n\n${USAGE}`);
    return 2;
  }
  return runCommand(parsed.command);
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Startup failed', { error: serializeError(error) });
    process.exitCode = 1;
  }
);
