import { describe, it, expect } from 'vitest';
import {
  utilizationSampleSchema,
  inventoryMessageSchema,
  socAggregateSchema,
  boardAggregateSchema,
  fleetSummarySchema,
  hierarchyIdentitySchema,
} from '../schemas/telemetry.schema.js';

function sample(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    nodeName: 'node-a',
    ip: '10.0.0.201',
    cpuUsage: 50,
    cpuCount: 4,
    gpuCount: 1,
    usedMemory: 2048,
    totalMemory: 8192,
    memUsage: 25,
    rxBytes: 100,
    txBytes: 200,
    readBytes: 300,
    writeBytes: 400,
    os: 'Linux',
    arch: 'aarch64',
    ...overrides,
  };
}

function totals(): Record<string, number> {
  return {
    totalCpuUsage: 50,
    totalMemUsage: 25,
    totalCpuCount: 4,
    totalGpuCount: 1,
    totalUsedMemory: 2048,
    totalMemory: 8192,
    totalRxBytes: 100,
    totalTxBytes: 200,
    totalReadBytes: 300,
    totalWriteBytes: 400,
  };
}

describe('utilizationSampleSchema', () => {
  it('should accept a complete sample', () => {
    const result = utilizationSampleSchema.safeParse(sample());
    expect(result.success).toBe(true);
  });

  it('should not check address syntax', () => {
    expect(utilizationSampleSchema.safeParse(sample({ ip: '999.1.1.1' })).success).toBe(true);
  });

  it('should not check percentage plausibility', () => {
    expect(utilizationSampleSchema.safeParse(sample({ cpuUsage: 250 })).success).toBe(true);
  });

  it('should reject an empty node name', () => {
    expect(utilizationSampleSchema.safeParse(sample({ nodeName: '' })).success).toBe(false);
  });

  it('should reject negative or fractional counters', () => {
    expect(utilizationSampleSchema.safeParse(sample({ rxBytes: -1 })).success).toBe(false);
    expect(utilizationSampleSchema.safeParse(sample({ cpuCount: 1.5 })).success).toBe(false);
  });

  it('should accept counters up to the largest exact integer', () => {
    const result = utilizationSampleSchema.safeParse(
      sample({ rxBytes: Number.MAX_SAFE_INTEGER }),
    );
    expect(result.success).toBe(true);
  });

  it('should reject counters a double cannot hold exactly', () => {
    expect(utilizationSampleSchema.safeParse(sample({ rxBytes: 2 ** 60 })).success).toBe(false);
    expect(
      utilizationSampleSchema.safeParse(sample({ usedMemory: Number.MAX_SAFE_INTEGER + 1 }))
        .success,
    ).toBe(false);
  });

  it('should reject a missing field', () => {
    const { arch: _arch, ...rest } = sample();
    expect(utilizationSampleSchema.safeParse(rest).success).toBe(false);
  });
});

describe('inventoryMessageSchema', () => {
  it('should accept a container list', () => {
    const result = inventoryMessageSchema.safeParse({
      nodeName: 'node-a',
      containers: [{ id: 'c1', names: ['/web'], image: 'nginx:latest' }],
    });
    expect(result.success).toBe(true);
  });

  it('should accept an empty container list', () => {
    expect(inventoryMessageSchema.safeParse({ nodeName: 'node-a', containers: [] }).success).toBe(
      true,
    );
  });

  it('should reject descriptors without names array', () => {
    const result = inventoryMessageSchema.safeParse({
      nodeName: 'node-a',
      containers: [{ id: 'c1', names: '/web', image: 'nginx' }],
    });
    expect(result.success).toBe(false);
  });
});

describe('socAggregateSchema', () => {
  it('should revive lastUpdated from an ISO string', () => {
    const result = socAggregateSchema.parse({
      socId: '10.0.0.200',
      nodes: [sample()],
      lastUpdated: '2026-03-01T12:00:00.000Z',
      ...totals(),
    });
    expect(result.lastUpdated).toBeInstanceOf(Date);
    expect(result.lastUpdated.toISOString()).toBe('2026-03-01T12:00:00.000Z');
  });

  it('should reject a record missing its totals', () => {
    const result = socAggregateSchema.safeParse({
      socId: '10.0.0.200',
      nodes: [],
      lastUpdated: '2026-03-01T12:00:00.000Z',
    });
    expect(result.success).toBe(false);
  });
});

describe('boardAggregateSchema', () => {
  it('should validate nested SoC aggregates', () => {
    const result = boardAggregateSchema.safeParse({
      boardId: '10.0.0.200',
      nodes: [sample()],
      socs: [
        {
          socId: '10.0.0.200',
          nodes: [sample()],
          lastUpdated: '2026-03-01T12:00:00.000Z',
          ...totals(),
        },
      ],
      lastUpdated: '2026-03-01T12:00:00.000Z',
      ...totals(),
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.socs[0].lastUpdated).toBeInstanceOf(Date);
    }
  });
});

describe('fleetSummarySchema', () => {
  it('should accept a summary', () => {
    const summary = {
      nodeCount: 3,
      socCount: 2,
      boardCount: 1,
      avgCpuUsage: 43.5,
      avgMemUsage: 36.7,
      totalCpuCount: 12,
      totalGpuCount: 0,
    };
    expect(fleetSummarySchema.parse(summary)).toEqual(summary);
  });

  it('should reject a negative count', () => {
    const result = fleetSummarySchema.safeParse({
      nodeCount: -1,
      socCount: 0,
      boardCount: 0,
      avgCpuUsage: 0,
      avgMemUsage: 0,
      totalCpuCount: 0,
      totalGpuCount: 0,
    });
    expect(result.success).toBe(false);
  });
});

describe('hierarchyIdentitySchema', () => {
  it('should require both ids', () => {
    expect(hierarchyIdentitySchema.safeParse({ socId: '10.0.0.200' }).success).toBe(false);
  });
});
