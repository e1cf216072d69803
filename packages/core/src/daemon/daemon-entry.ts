import { configureLogger, getLogger } from '@fleetmon/shared';
import { loadConfig } from '../config/loadConfig.js';
import { FleetmonDaemon } from './Daemon.js';

async function main(): Promise<void> {
  const config = loadConfig({ path: process.env.FLEETMON_CONFIG });
  configureLogger(config.log);

  const daemon = new FleetmonDaemon(config);
  await daemon.start();
}

main().catch((err: unknown) => {
  getLogger().fatal({ err }, 'Fleetmon daemon failed to start');
  process.exit(1);
});
