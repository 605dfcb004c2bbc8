/**
 * Command dispatch for the stack-runner entry point. Each command returns the
 * process exit code.
 */

import { getLogger, serializeError, ShutdownSignalError } from '@bloxstack/platform-core';
import { seedBlobs } from '@bloxstack/api-server';
import { buildRoutingRules, renderCaddyfile } from '@bloxstack/load-balancer';
import { describeConfig, parseStackConfig, type StackConfig } from './config/environment';
import { buildStack, openBlobStore, type StackOptions } from './stack';

const logger = getLogger('stack-runner');

export type Command = 'serve' | 'config' | 'db-seed' | 'lb-config';

const FLAGS = new Map<string, Exclude<Command, 'serve'>>([
  ['--config', 'config'],
  ['--db-seed', 'db-seed'],
  ['--lb-config', 'lb-config'],
]);

export const USAGE = `Usage: bloxstack [flag]

Flags:
  --config      Print every configuration variable with its default and current value
  --db-seed     Seed the blob store with generated sample blobs
  --lb-config   Print the load balancer configuration (Caddyfile)
  --help        Show this help message

Without a flag the API server and the load balancer are started.`;

export type ParsedArgs = { command: Command } | { help: true } | { error: string };

export function parseArgs(args: readonly string[]): ParsedArgs {
  let command: Command = 'serve';
  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      return { help: true };
    }
    const flagged = FLAGS.get(arg);
    if (!flagged) {
      return { error: `unknown flag: ${arg}` };
    }
    if (command !== 'serve' && command !== flagged) {
      return { error: `--${command} and --${flagged} cannot be combined` };
    }
    command = flagged;
  }
  return { command };
}

export interface CommandIO {
  env: NodeJS.ProcessEnv;
  write: (line: string) => void;
  stack?: StackOptions;
}

const defaultIO = (): CommandIO => ({
  env: process.env,
  write: line => console.log(line),
  stack: { handleSignals: true },
});

async function seed(config: StackConfig, io: CommandIO): Promise<number> {
  const handle = await openBlobStore(config);
  try {
    if (!handle.persistent) {
      logger.warn('Seeding the in-memory blob store; set BLOXSTACK_DATABASE_URL to keep the blobs');
    }
    const result = await seedBlobs(handle.store);
    for (const detail of result.details ?? []) {
      io.write(detail);
    }
    io.write(`${result.created} created, ${result.updated} updated, ${result.skipped} skipped`);
    return 0;
  } finally {
    await handle.close();
  }
}

async function serve(config: StackConfig, io: CommandIO): Promise<number> {
  const handle = await openBlobStore(config);
  try {
    if (!handle.persistent) {
      const result = await seedBlobs(handle.store);
      logger.info('Seeded the in-memory blob store', { created: result.created });
    }
    const { group } = buildStack(config, handle.store, io.stack);
    await group.run();
    logger.info('Stack stopped');
    return 0;
  } catch (error) {
    if (error instanceof ShutdownSignalError) {
      logger.info('Stack stopped', { signal: error.signal });
      return 0;
    }
    logger.error('Stack failed', { error: serializeError(error) });
    return 1;
  } finally {
    await handle.close();
  }
}

export async function runCommand(command: Command, io: CommandIO = defaultIO()): Promise<number> {
  if (command === 'config') {
    for (const line of describeConfig(io.env)) {
      io.write(line);
    }
    return 0;
  }

  const config = parseStackConfig(io.env);
  switch (command) {
    case 'lb-config':
      io.write(
        renderCaddyfile(
          buildRoutingRules({
            listenAddress: config.loadBalancerAddress,
            upstreamAddress: config.serverAddress,
            staticRoot: config.rootPath,
          })
        )
      );
      return 0;
    case 'db-seed':
      return seed(config, io);
    case 'serve':
      return serve(config, io);
  }
}
