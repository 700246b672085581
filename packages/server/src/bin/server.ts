#!/usr/bin/env node

/**
 * Gateway Server CLI
 *
 * Usage:
 *   tollgate-server [--config <path>]
 *
 * The config path defaults to $TOLLGATE_CONFIG, then ./tollgate.yaml.
 */

import { loadConfig, logger } from '@tollgate/core';
import { GatewayServer } from '../server.js';

const DEFAULT_CONFIG_PATH = './tollgate.yaml';

const USAGE = `
Usage:
  tollgate-server [options]

Options:
  --config <path>   Configuration file (default: $TOLLGATE_CONFIG or ${DEFAULT_CONFIG_PATH})
  --help, -h        Show this help message
`;

interface CliArgs {
  configPath: string;
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    configPath: process.env.TOLLGATE_CONFIG || DEFAULT_CONFIG_PATH,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case '--config':
        if (next) {
          args.configPath = next;
          i++;
        }
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }

  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(USAGE);
    return;
  }

  const config = await loadConfig(args.configPath);
  const server = new GatewayServer({ config });
  await server.initialize();
  await server.start();

  const shutdown = (signal: string): void => {
    logger.info(`[server] Received ${signal}`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, '[server] Error during shutdown');
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, '[server] Fatal error');
  process.exit(1);
});
