import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import type { InventoryMessage, UtilizationSample } from '@fleetmon/shared';
import { DEFAULT_API_HOST, DEFAULT_API_PORT, getLogger } from '@fleetmon/shared';
import type { ConcurrencyGateway } from '../gateway/ConcurrencyGateway.js';
import type { MessageStream } from '../gateway/MessageStream.js';
import type { EventBus, EventEnvelope } from '../events/EventBus.js';
import { registerFleetRoutes } from './routes/fleet.js';
import { registerTelemetryRoutes } from './routes/telemetry.js';

export interface HTTPServerOptions {
  gateway: ConcurrencyGateway;
  samples: MessageStream<UtilizationSample>;
  inventory: MessageStream<InventoryMessage>;
  eventBus: EventBus;
  port?: number;
  host?: string;
}

export class HTTPServer {
  private app: FastifyInstance;
  private port: number;
  private host: string;
  private eventBus: EventBus;
  private started = false;

  constructor(options: HTTPServerOptions) {
    this.port = options.port ?? DEFAULT_API_PORT;
    this.host = options.host ?? DEFAULT_API_HOST;
    this.eventBus = options.eventBus;

    this.app = Fastify({ logger: false });

    registerFleetRoutes(this.app, options.gateway);
    registerTelemetryRoutes(this.app, options.samples, options.inventory);

    this.app.get('/api/v1/health', async () => ({ status: 'ok', timestamp: new Date() }));
  }

  /** Registers plugins and the event feed; call before inject() or start(). */
  async ready(): Promise<FastifyInstance> {
    if (!this.started) {
      this.started = true;
      await this.app.register(cors, { origin: true });
      await this.app.register(websocket);

      this.app.get('/ws/events', { websocket: true }, (socket) => {
        const handler = (message: EventEnvelope) => {
          try {
            socket.send(JSON.stringify(message));
          } catch (err) {
            getLogger().debug({ err }, 'Event feed client went away');
          }
        };

        this.eventBus.onAny(handler);

        socket.on('close', () => {
          this.eventBus.offAny(handler);
        });
      });
    }
    await this.app.ready();
    return this.app;
  }

  async start(): Promise<void> {
    await this.ready();
    await this.app.listen({ port: this.port, host: this.host });
    // Port 0 binds an ephemeral port
    const address = this.app.server.address();
    if (address && typeof address === 'object') {
      this.port = address.port;
    }
    getLogger().info({ port: this.port, host: this.host }, 'HTTP server listening');
  }

  async stop(): Promise<void> {
    await this.app.close();
  }

  getAddress(): string {
    return `http://${this.host}:${this.port}`;
  }
}
