import { Command } from 'commander';
import chalk from 'chalk';
import { fleetSummarySchema } from '@fleetmon/shared';
import { apiRequest } from '../utils/client.js';
import { renderSummary } from '../ui/Table.js';

export const summaryCommand = new Command('summary')
  .alias('status')
  .option('--json', 'Output as JSON')
  .description('Show fleet-wide totals')
  .action(async (options: { json?: boolean }) => {
    try {
      const summary = await apiRequest('/api/v1/summary', fleetSummarySchema);

      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      console.log(renderSummary(summary));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
