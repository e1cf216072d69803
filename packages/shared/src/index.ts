// Types
export type {
  NodeRecord,
  UtilizationSample,
  ContainerDescriptor,
  InventoryMessage,
  HierarchyIdentity,
  AggregateTotals,
  SocAggregate,
  BoardAggregate,
  FleetSummary,
  FleetSnapshot,
} from './types/index.js';

// Constants
export {
  FLEETMON_HOME,
  FLEETMON_DB_FILE,
  FLEETMON_CONFIG_FILES,
  DEFAULT_API_HOST,
  DEFAULT_API_PORT,
  DEFAULT_STREAM_CAPACITY,
  NODE_KEY_PREFIX,
  SOC_KEY_PREFIX,
  BOARD_KEY_PREFIX,
  FLEETMON_VERSION,
} from './constants.js';

// Schemas
export {
  utilizationSampleSchema,
  nodeRecordSchema,
  containerDescriptorSchema,
  inventoryMessageSchema,
  socAggregateSchema,
  boardAggregateSchema,
  hierarchyIdentitySchema,
  fleetSummarySchema,
} from './schemas/telemetry.schema.js';

export type {
  ValidatedUtilizationSample,
  ValidatedInventoryMessage,
} from './schemas/telemetry.schema.js';

export {
  fleetmonConfigSchema,
  apiConfigSchema,
  streamsConfigSchema,
  persistenceConfigSchema,
  logSettingsSchema,
  logLevelSchema,
} from './schemas/config.schema.js';

export type {
  FleetmonConfig,
  FleetmonConfigInput,
  PersistenceConfig,
} from './schemas/config.schema.js';

// Utilities
export {
  formatBytes,
  formatKilobytes,
  formatCpu,
  formatPercent,
  formatTimeAgo,
} from './utils/parser.js';

export { createLogger, getLogger, setDefaultLogger, configureLogger } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  FleetmonError,
  InvalidAddressError,
  NotFoundError,
  SerializationError,
  DeserializationError,
  TelemetryValidationError,
  ConfigValidationError,
  StreamClosedError,
  CounterOverflowError,
} from './utils/errors.js';
