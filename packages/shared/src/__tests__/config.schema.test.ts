import { describe, it, expect } from 'vitest';
import {
  fleetmonConfigSchema,
  apiConfigSchema,
  streamsConfigSchema,
  persistenceConfigSchema,
  logSettingsSchema,
} from '../schemas/config.schema.js';

describe('apiConfigSchema', () => {
  it('should apply loopback defaults', () => {
    const result = apiConfigSchema.parse({});
    expect(result).toEqual({ host: '127.0.0.1', port: 9715 });
  });

  it('should reject ports outside the valid range', () => {
    expect(apiConfigSchema.safeParse({ port: 70000 }).success).toBe(false);
    expect(apiConfigSchema.safeParse({ port: -1 }).success).toBe(false);
  });

  it('should allow port 0 for an ephemeral port', () => {
    expect(apiConfigSchema.parse({ port: 0 }).port).toBe(0);
  });
});

describe('streamsConfigSchema', () => {
  it('should default capacity to 1024', () => {
    expect(streamsConfigSchema.parse({}).capacity).toBe(1024);
  });

  it('should reject a zero capacity', () => {
    expect(streamsConfigSchema.safeParse({ capacity: 0 }).success).toBe(false);
  });
});

describe('persistenceConfigSchema', () => {
  it('should default to an enabled sqlite backend without a path', () => {
    expect(persistenceConfigSchema.parse({})).toEqual({ enabled: true, backend: 'sqlite' });
  });

  it('should reject unknown backends', () => {
    expect(persistenceConfigSchema.safeParse({ backend: 'etcd' }).success).toBe(false);
  });
});

describe('logSettingsSchema', () => {
  it('should default to info without pretty printing', () => {
    expect(logSettingsSchema.parse({})).toEqual({ level: 'info', pretty: false });
  });

  it('should reject unknown levels', () => {
    expect(logSettingsSchema.safeParse({ level: 'verbose' }).success).toBe(false);
  });
});

describe('fleetmonConfigSchema', () => {
  it('should fill every section from an empty object', () => {
    const result = fleetmonConfigSchema.parse({});
    expect(result).toEqual({
      api: { host: '127.0.0.1', port: 9715 },
      streams: { capacity: 1024 },
      persistence: { enabled: true, backend: 'sqlite' },
      log: { level: 'info', pretty: false },
    });
  });

  it('should keep explicit values and default the rest of a section', () => {
    const result = fleetmonConfigSchema.parse({
      api: { port: 8080 },
      persistence: { backend: 'memory' },
    });
    expect(result.api).toEqual({ host: '127.0.0.1', port: 8080 });
    expect(result.persistence).toEqual({ enabled: true, backend: 'memory' });
  });

  it('should report the path of an invalid field', () => {
    const result = fleetmonConfigSchema.safeParse({ api: { port: 'abc' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['api', 'port']);
    }
  });
});
