import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { boardAggregateSchema } from '@fleetmon/shared';
import { apiRequest } from '../utils/client.js';
import { renderBoardTable } from '../ui/Table.js';

export const boardsCommand = new Command('boards')
  .option('--json', 'Output as JSON')
  .description('List board aggregates')
  .action(async (options: { json?: boolean }) => {
    try {
      const boards = await apiRequest('/api/v1/boards', z.array(boardAggregateSchema));

      if (options.json) {
        console.log(JSON.stringify(boards, null, 2));
        return;
      }

      if (boards.length === 0) {
        console.log(chalk.gray('\n  No boards yet.\n'));
        return;
      }

      console.log(renderBoardTable(boards));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
