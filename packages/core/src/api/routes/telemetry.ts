import type { FastifyInstance, FastifyReply } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import type { InventoryMessage, UtilizationSample } from '@fleetmon/shared';
import {
  StreamClosedError,
  inventoryMessageSchema,
  utilizationSampleSchema,
} from '@fleetmon/shared';
import type { MessageStream } from '../../gateway/MessageStream.js';

async function accept<T>(
  body: unknown,
  schema: ZodType<T, ZodTypeDef, unknown>,
  stream: MessageStream<T>,
  reply: FastifyReply,
): Promise<Record<string, unknown>> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    reply.status(400);
    return {
      error: 'Invalid telemetry message',
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    };
  }

  try {
    // Waits while the stream is full
    await stream.push(parsed.data);
  } catch (err) {
    if (err instanceof StreamClosedError) {
      reply.status(503);
      return { error: err.message };
    }
    throw err;
  }

  reply.status(202);
  return { accepted: true };
}

/**
 * HTTP ingestion: validated messages are queued on the inbound streams and
 * applied by the gateway loops, not inline with the request.
 */
export function registerTelemetryRoutes(
  app: FastifyInstance,
  samples: MessageStream<UtilizationSample>,
  inventory: MessageStream<InventoryMessage>,
): void {
  app.post('/api/v1/telemetry/nodes', async (request, reply) => {
    return accept(request.body, utilizationSampleSchema, samples, reply);
  });

  app.post('/api/v1/telemetry/containers', async (request, reply) => {
    return accept(request.body, inventoryMessageSchema, inventory, reply);
  });
}
