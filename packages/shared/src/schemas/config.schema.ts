import { z } from 'zod';
import { DEFAULT_API_HOST, DEFAULT_API_PORT, DEFAULT_STREAM_CAPACITY } from '../constants.js';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const apiConfigSchema = z.object({
  host: z.string().min(1).default(DEFAULT_API_HOST),
  port: z.number().int().min(0).max(65535).default(DEFAULT_API_PORT),
});

export const streamsConfigSchema = z.object({
  capacity: z.number().int().positive().default(DEFAULT_STREAM_CAPACITY),
});

export const persistenceConfigSchema = z.object({
  enabled: z.boolean().default(true),
  backend: z.enum(['sqlite', 'memory']).default('sqlite'),
  path: z.string().min(1).optional(),
});

export const logSettingsSchema = z.object({
  level: logLevelSchema.default('info'),
  pretty: z.boolean().default(false),
});

export const fleetmonConfigSchema = z.object({
  api: apiConfigSchema.default({}),
  streams: streamsConfigSchema.default({}),
  persistence: persistenceConfigSchema.default({}),
  log: logSettingsSchema.default({}),
});

export type FleetmonConfig = z.infer<typeof fleetmonConfigSchema>;
export type FleetmonConfigInput = z.input<typeof fleetmonConfigSchema>;
export type PersistenceConfig = z.infer<typeof persistenceConfigSchema>;
