import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { socAggregateSchema } from '@fleetmon/shared';
import { apiRequest } from '../utils/client.js';
import { renderSocTable } from '../ui/Table.js';

export const socsCommand = new Command('socs')
  .option('--json', 'Output as JSON')
  .description('List SoC aggregates')
  .action(async (options: { json?: boolean }) => {
    try {
      const socs = await apiRequest('/api/v1/socs', z.array(socAggregateSchema));

      if (options.json) {
        console.log(JSON.stringify(socs, null, 2));
        return;
      }

      if (socs.length === 0) {
        console.log(chalk.gray('\n  No SoCs yet.\n'));
        return;
      }

      console.log(renderSocTable(socs));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
