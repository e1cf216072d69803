import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigValidationError, configureLogger } from '@fleetmon/shared';
import { FleetmonDaemon, loadConfig } from '@fleetmon/core';

export const startCommand = new Command('start')
  .option('-c, --config <path>', 'Config file (defaults to fleetmon.config.json in cwd)')
  .description('Run the fleetmon daemon in the foreground')
  .action(async (options: { config?: string }) => {
    try {
      const config = loadConfig({ path: options.config });
      configureLogger(config.log);

      const daemon = new FleetmonDaemon(config);
      await daemon.start();

      console.log(chalk.green(`\n  fleetmon daemon listening on ${daemon.getAddress()}\n`));
    } catch (err) {
      if (err instanceof ConfigValidationError) {
        console.error(chalk.red('Invalid configuration:'));
        for (const line of err.errors) {
          console.error(chalk.red(`  ${line}`));
        }
      } else {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(chalk.red(`Failed to start: ${msg}`));
      }
      process.exitCode = 1;
    }
  });
