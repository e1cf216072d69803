import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { nodeRecordSchema } from '@fleetmon/shared';
import { apiRequest } from '../utils/client.js';
import { renderNodeInfo, renderNodeTable } from '../ui/Table.js';

export const nodesCommand = new Command('nodes')
  .alias('ls')
  .option('--json', 'Output as JSON')
  .description('List nodes with their latest utilization')
  .action(async (options: { json?: boolean }) => {
    try {
      const nodes = await apiRequest('/api/v1/nodes', z.array(nodeRecordSchema));

      if (options.json) {
        console.log(JSON.stringify(nodes, null, 2));
        return;
      }

      if (nodes.length === 0) {
        console.log(chalk.gray('\n  No nodes have reported yet.\n'));
        return;
      }

      console.log(renderNodeTable(nodes));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });

export const nodeCommand = new Command('node')
  .argument('<name>', 'Node name')
  .option('--json', 'Output as JSON')
  .description('Show the latest sample for one node')
  .action(async (name: string, options: { json?: boolean }) => {
    try {
      const node = await apiRequest(`/api/v1/nodes/${encodeURIComponent(name)}`, nodeRecordSchema);

      if (options.json) {
        console.log(JSON.stringify(node, null, 2));
        return;
      }

      console.log(renderNodeInfo(node));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
