import type { NodeRecord } from './telemetry.js';

export interface HierarchyIdentity {
  socId: string;
  boardId: string;
}

/**
 * Derived totals shared by SoC and board groups. `totalCpuUsage` and
 * `totalMemUsage` are means over members; every other field is a sum.
 */
export interface AggregateTotals {
  totalCpuUsage: number;
  totalMemUsage: number;
  totalCpuCount: number;
  totalGpuCount: number;
  totalUsedMemory: number;
  totalMemory: number;
  totalRxBytes: number;
  totalTxBytes: number;
  totalReadBytes: number;
  totalWriteBytes: number;
}

export interface SocAggregate extends AggregateTotals {
  socId: string;
  nodes: NodeRecord[];
  lastUpdated: Date;
}

export interface BoardAggregate extends AggregateTotals {
  boardId: string;
  nodes: NodeRecord[];
  socs: SocAggregate[];
  lastUpdated: Date;
}

export interface FleetSummary {
  nodeCount: number;
  socCount: number;
  boardCount: number;
  avgCpuUsage: number;
  avgMemUsage: number;
  totalCpuCount: number;
  totalGpuCount: number;
}

export interface FleetSnapshot {
  nodes: NodeRecord[];
  socs: SocAggregate[];
  boards: BoardAggregate[];
}
