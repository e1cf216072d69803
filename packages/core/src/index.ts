// Identity
export {
  parseIPv4,
  isValidIPv4,
  deriveSocId,
  deriveBoardId,
  deriveIdentity,
  boardIdForSocId,
} from './identity/IdentityDeriver.js';
export type { Octets } from './identity/IdentityDeriver.js';

// Aggregation
export { AggregateStore, recomputeTotals } from './store/AggregateStore.js';
export type { AggregateStoreOptions } from './store/AggregateStore.js';

// Gateway
export { Mutex } from './gateway/Mutex.js';
export { MessageStream } from './gateway/MessageStream.js';
export { ConcurrencyGateway } from './gateway/ConcurrencyGateway.js';
export type {
  ConcurrencyGatewayOptions,
  IngestResult,
  RejectionError,
} from './gateway/ConcurrencyGateway.js';

// Events
export { EventBus } from './events/EventBus.js';
export type {
  EventMap,
  EventName,
  EventEnvelope,
  UpsertedEvent,
  RejectedEvent,
  PersistenceErrorEvent,
} from './events/EventBus.js';

// Persistence
export { openDatabase } from './db/Database.js';
export { runMigrations, schemaMigrations, schemaVersion } from './db/migrations/index.js';
export type { KeyValuePair, KeyValueStore } from './persistence/KeyValueStore.js';
export { MemoryKeyValueStore } from './persistence/MemoryKeyValueStore.js';
export { SqliteKeyValueStore } from './persistence/SqliteKeyValueStore.js';
export {
  MonitoringRepository,
  nodeKey,
  socKey,
  boardKey,
} from './persistence/MonitoringRepository.js';

// Config
export { loadConfig, findConfigFile, applyEnvOverrides } from './config/loadConfig.js';
export type { LoadConfigOptions } from './config/loadConfig.js';

// HTTP API
export { HTTPServer } from './api/HTTPServer.js';
export type { HTTPServerOptions } from './api/HTTPServer.js';

// Daemon
export { FleetmonDaemon } from './daemon/Daemon.js';
export type { FleetmonDaemonOptions } from './daemon/Daemon.js';
