#!/usr/bin/env node
/**
 * presence-relay CLI
 * Starts the relay with settings from flags, RELAY_* variables and .env
 */

import 'dotenv/config';

import { Command } from 'commander';
import chalk from 'chalk';
import { RelayServer } from './gateway/server.js';
import { ConfigError, errorMessage } from './lib/errors.js';
import { renderBanner } from './cli/banner.js';
import { parsePort, toConfigInput, type CliOptions } from './cli/options.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('presence-relay')
  .description('WebSocket relay broadcasting server rosters, presence and chat to clients')
  .version(VERSION)
  .option('-H, --host <host>', 'Interface to bind (default: 127.0.0.1)')
  .option('-p, --port <port>', 'Port to listen on (default: 3000)', parsePort)
  .option('--static-dir <dir>', 'Directory handed to the static_request handler')
  .option('--client-id <id>', 'Client id advertised for every server')
  .option('--no-simulation', 'Disable synthetic presence and chat activity')
  .action(async (opts: CliOptions) => {
    const relay = new RelayServer(toConfigInput(opts));
    await relay.start();
    renderBanner({
      version: VERSION,
      address: relay.address,
      httpUrl: `http://${relay.config.host}:${relay.port}`,
      servers: relay.registry.serverIds().length,
      simulation: relay.config.simulation.enabled,
      staticDir: relay.config.staticDir,
    });
    // already listening; runForever only waits for the signal
    await relay.runForever();
  });

program.parseAsync().catch((err) => {
  if (err instanceof ConfigError) {
    for (const problem of err.problems) console.error(chalk.red(`  ✗ ${problem}`));
  } else {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
  }
  process.exit(1);
});
