import { Command } from 'commander';
import chalk from 'chalk';
import { deriveIdentity } from '@fleetmon/core';
import { renderIdentity } from '../ui/Table.js';

// Derived locally; no daemon needed
export const identityCommand = new Command('identity')
  .argument('<ip>', 'Node IPv4 address')
  .option('--json', 'Output as JSON')
  .description('Show the SoC and board an address belongs to')
  .action((ip: string, options: { json?: boolean }) => {
    try {
      const identity = deriveIdentity(ip);

      if (options.json) {
        console.log(JSON.stringify(identity, null, 2));
        return;
      }

      console.log(renderIdentity(ip, identity));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
