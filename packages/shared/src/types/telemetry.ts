/**
 * Latest utilization sample reported by one compute node.
 * Memory figures are in kilobytes, network and disk counters in bytes.
 */
export interface NodeRecord {
  nodeName: string;
  ip: string;
  cpuUsage: number;
  cpuCount: number;
  gpuCount: number;
  usedMemory: number;
  totalMemory: number;
  memUsage: number;
  rxBytes: number;
  txBytes: number;
  readBytes: number;
  writeBytes: number;
  os: string;
  arch: string;
}

/** Inbound shape of a node sample; the store keeps it verbatim as the node's record. */
export type UtilizationSample = NodeRecord;

export interface ContainerDescriptor {
  id: string;
  names: string[];
  image: string;
}

export interface InventoryMessage {
  nodeName: string;
  containers: ContainerDescriptor[];
}
