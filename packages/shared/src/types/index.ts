export type {
  NodeRecord,
  UtilizationSample,
  ContainerDescriptor,
  InventoryMessage,
} from './telemetry.js';

export type {
  HierarchyIdentity,
  AggregateTotals,
  SocAggregate,
  BoardAggregate,
  FleetSummary,
  FleetSnapshot,
} from './aggregate.js';
