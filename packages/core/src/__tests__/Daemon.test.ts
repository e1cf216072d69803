import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FleetmonConfig, NodeRecord } from '@fleetmon/shared';
import { fleetmonConfigSchema } from '@fleetmon/shared';
import { FleetmonDaemon } from '../daemon/Daemon.js';

function createSample(nodeName: string, ip: string): NodeRecord {
  return {
    nodeName,
    ip,
    cpuUsage: 35,
    cpuCount: 4,
    gpuCount: 1,
    usedMemory: 1024,
    totalMemory: 4096,
    memUsage: 25,
    rxBytes: 0,
    txBytes: 0,
    readBytes: 0,
    writeBytes: 0,
    os: 'linux',
    arch: 'aarch64',
  };
}

async function postSample(daemon: FleetmonDaemon, sample: NodeRecord): Promise<void> {
  const applied = new Promise<void>((resolve) => {
    daemon.getEventBus().once('telemetry:upserted', () => resolve());
  });
  const response = await fetch(`${daemon.getAddress()}/api/v1/telemetry/nodes`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(sample),
  });
  expect(response.status).toBe(202);
  await applied;
}

describe('FleetmonDaemon', () => {
  let dir: string;
  let config: FleetmonConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fleetmon-daemon-'));
    config = fleetmonConfigSchema.parse({
      api: { port: 0 },
      persistence: { backend: 'sqlite', path: join(dir, 'fleetmon.db') },
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should ingest over HTTP and restore nodes after a restart', async () => {
    const first = new FleetmonDaemon(config, { handleSignals: false });
    await first.start();
    await postSample(first, createSample('n1', '10.0.0.201'));
    await first.stop();

    const second = new FleetmonDaemon(config, { handleSignals: false });
    await second.start();
    try {
      const response = await fetch(`${second.getAddress()}/api/v1/socs/10.0.0.200`);
      expect(response.status).toBe(200);
      const soc: unknown = await response.json();
      expect(soc).toMatchObject({ socId: '10.0.0.200', totalCpuUsage: 35 });
    } finally {
      await second.stop();
    }
  });

  it('should run without persistence', async () => {
    const daemon = new FleetmonDaemon(
      fleetmonConfigSchema.parse({ api: { port: 0 }, persistence: { enabled: false } }),
      { handleSignals: false },
    );
    await daemon.start();
    try {
      await postSample(daemon, createSample('n1', '10.0.0.5'));
      const response = await fetch(`${daemon.getAddress()}/api/v1/summary`);
      const summary: unknown = await response.json();
      expect(summary).toMatchObject({ nodeCount: 1, boardCount: 1 });
    } finally {
      await daemon.stop();
    }
  });
});
