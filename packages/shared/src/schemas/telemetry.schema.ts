import { z } from 'zod';

// Counters stay within the range a double represents exactly
const unsigned = z.number().int().nonnegative().safe();

export const utilizationSampleSchema = z.object({
  nodeName: z.string().min(1),
  ip: z.string(),
  cpuUsage: z.number(),
  cpuCount: unsigned,
  gpuCount: unsigned,
  usedMemory: unsigned,
  totalMemory: unsigned,
  memUsage: z.number(),
  rxBytes: unsigned,
  txBytes: unsigned,
  readBytes: unsigned,
  writeBytes: unsigned,
  os: z.string(),
  arch: z.string(),
});

export const nodeRecordSchema = utilizationSampleSchema;

export const containerDescriptorSchema = z.object({
  id: z.string(),
  names: z.array(z.string()),
  image: z.string(),
});

export const inventoryMessageSchema = z.object({
  nodeName: z.string().min(1),
  containers: z.array(containerDescriptorSchema),
});

const aggregateTotalsShape = {
  totalCpuUsage: z.number(),
  totalMemUsage: z.number(),
  totalCpuCount: unsigned,
  totalGpuCount: unsigned,
  totalUsedMemory: unsigned,
  totalMemory: unsigned,
  totalRxBytes: unsigned,
  totalTxBytes: unsigned,
  totalReadBytes: unsigned,
  totalWriteBytes: unsigned,
};

// lastUpdated travels as an ISO string once serialized
export const socAggregateSchema = z.object({
  socId: z.string().min(1),
  nodes: z.array(nodeRecordSchema),
  lastUpdated: z.coerce.date(),
  ...aggregateTotalsShape,
});

export const boardAggregateSchema = z.object({
  boardId: z.string().min(1),
  nodes: z.array(nodeRecordSchema),
  socs: z.array(socAggregateSchema),
  lastUpdated: z.coerce.date(),
  ...aggregateTotalsShape,
});

export const hierarchyIdentitySchema = z.object({
  socId: z.string(),
  boardId: z.string(),
});

export const fleetSummarySchema = z.object({
  nodeCount: unsigned,
  socCount: unsigned,
  boardCount: unsigned,
  avgCpuUsage: z.number(),
  avgMemUsage: z.number(),
  totalCpuCount: unsigned,
  totalGpuCount: unsigned,
});

export type ValidatedUtilizationSample = z.infer<typeof utilizationSampleSchema>;
export type ValidatedInventoryMessage = z.infer<typeof inventoryMessageSchema>;
