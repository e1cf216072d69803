import type { FastifyInstance } from 'fastify';
import { InvalidAddressError } from '@fleetmon/shared';
import type { ConcurrencyGateway } from '../../gateway/ConcurrencyGateway.js';
import { deriveIdentity } from '../../identity/IdentityDeriver.js';

export function registerFleetRoutes(app: FastifyInstance, gateway: ConcurrencyGateway): void {
  app.get('/api/v1/nodes', async () => {
    return gateway.allNodes();
  });

  app.get<{ Params: { name: string } }>('/api/v1/nodes/:name', async (request, reply) => {
    const node = await gateway.getNode(request.params.name);
    if (!node) {
      reply.status(404);
      return { error: `Node not found: ${request.params.name}` };
    }
    return node;
  });

  app.get('/api/v1/socs', async () => {
    return gateway.allSocs();
  });

  app.get<{ Params: { id: string } }>('/api/v1/socs/:id', async (request, reply) => {
    const soc = await gateway.getSoc(request.params.id);
    if (!soc) {
      reply.status(404);
      return { error: `SoC not found: ${request.params.id}` };
    }
    return soc;
  });

  app.get('/api/v1/boards', async () => {
    return gateway.allBoards();
  });

  app.get<{ Params: { id: string } }>('/api/v1/boards/:id', async (request, reply) => {
    const board = await gateway.getBoard(request.params.id);
    if (!board) {
      reply.status(404);
      return { error: `Board not found: ${request.params.id}` };
    }
    return board;
  });

  app.get('/api/v1/summary', async () => {
    return gateway.summary();
  });

  // Pure derivation, no store access
  app.get<{ Params: { ip: string } }>('/api/v1/identity/:ip', async (request, reply) => {
    try {
      return deriveIdentity(request.params.ip);
    } catch (err) {
      if (err instanceof InvalidAddressError) {
        reply.status(400);
        return { error: err.message };
      }
      throw err;
    }
  });
}
