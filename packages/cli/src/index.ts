#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { FLEETMON_VERSION } from '@fleetmon/shared';
import { startCommand } from './commands/start.js';
import { nodesCommand, nodeCommand } from './commands/nodes.js';
import { socsCommand } from './commands/socs.js';
import { boardsCommand } from './commands/boards.js';
import { summaryCommand } from './commands/summary.js';
import { identityCommand } from './commands/identity.js';
import { setApiUrl } from './utils/client.js';

const program = new Command();

program
  .name('fleetmon')
  .version(FLEETMON_VERSION, '-v, --version')
  .description(chalk.bold('fleetmon') + ' - node, SoC and board telemetry rollups')
  .option('--api <url>', 'Daemon API URL (default: $FLEETMON_API_URL or http://127.0.0.1:9715)')
  .addCommand(startCommand)
  .addCommand(nodesCommand)
  .addCommand(nodeCommand)
  .addCommand(socsCommand)
  .addCommand(boardsCommand)
  .addCommand(summaryCommand)
  .addCommand(identityCommand);

program.hook('preAction', () => {
  setApiUrl(program.opts<{ api?: string }>().api);
});

// Default to 'summary' when no command given
program.action(async () => {
  await summaryCommand.parseAsync([], { from: 'user' });
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`Error: ${msg}`));
  process.exitCode = 1;
});
