import { homedir } from 'node:os';
import { join } from 'node:path';

export const FLEETMON_HOME = process.env.FLEETMON_HOME || join(homedir(), '.fleetmon');
export const FLEETMON_DB_FILE = join(FLEETMON_HOME, 'fleetmon.db');

export const FLEETMON_CONFIG_FILES = ['fleetmon.config.json', '.fleetmonrc.json'];

export const DEFAULT_API_HOST = '127.0.0.1';
export const DEFAULT_API_PORT = 9715;
export const DEFAULT_STREAM_CAPACITY = 1024;

export const NODE_KEY_PREFIX = 'monitoring/nodes/';
export const SOC_KEY_PREFIX = 'monitoring/socs/';
export const BOARD_KEY_PREFIX = 'monitoring/boards/';

export const FLEETMON_VERSION = '0.1.0';
