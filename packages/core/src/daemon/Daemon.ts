import type { FleetmonConfig, InventoryMessage, UtilizationSample } from '@fleetmon/shared';
import { getLogger } from '@fleetmon/shared';
import { openDatabase } from '../db/Database.js';
import { EventBus } from '../events/EventBus.js';
import { ConcurrencyGateway } from '../gateway/ConcurrencyGateway.js';
import { MessageStream } from '../gateway/MessageStream.js';
import type { KeyValueStore } from '../persistence/KeyValueStore.js';
import { MemoryKeyValueStore } from '../persistence/MemoryKeyValueStore.js';
import { MonitoringRepository } from '../persistence/MonitoringRepository.js';
import { SqliteKeyValueStore } from '../persistence/SqliteKeyValueStore.js';
import { HTTPServer } from '../api/HTTPServer.js';

export interface FleetmonDaemonOptions {
  /** Install SIGINT/SIGTERM handlers that stop the daemon and exit. */
  handleSignals?: boolean;
}

function openKeyValueStore(config: FleetmonConfig): KeyValueStore | null {
  const { persistence } = config;
  if (!persistence.enabled) return null;
  if (persistence.backend === 'memory') return new MemoryKeyValueStore();
  return new SqliteKeyValueStore(openDatabase(persistence.path));
}

export class FleetmonDaemon {
  private config: FleetmonConfig;
  private handleSignals: boolean;
  private eventBus: EventBus = new EventBus();
  private kv: KeyValueStore | null = null;
  private samples: MessageStream<UtilizationSample> | null = null;
  private inventory: MessageStream<InventoryMessage> | null = null;
  private gateway: ConcurrencyGateway | null = null;
  private httpServer: HTTPServer | null = null;
  private runPromise: Promise<void> | null = null;
  private signalHandler: (() => void) | null = null;
  private running = false;

  constructor(config: FleetmonConfig, options: FleetmonDaemonOptions = {}) {
    this.config = config;
    this.handleSignals = options.handleSignals ?? true;
  }

  async start(): Promise<void> {
    if (this.running) return;

    getLogger().info('Fleetmon daemon starting...');

    // 1. Persistence
    this.kv = openKeyValueStore(this.config);
    const repository = this.kv ? new MonitoringRepository(this.kv) : undefined;

    // 2. Streams and gateway
    const { capacity } = this.config.streams;
    this.samples = new MessageStream<UtilizationSample>('samples', capacity);
    this.inventory = new MessageStream<InventoryMessage>('inventory', capacity);
    this.gateway = new ConcurrencyGateway({
      samples: this.samples,
      inventory: this.inventory,
      eventBus: this.eventBus,
      repository,
    });

    // 3. Restore saved nodes
    if (repository) {
      await this.restore(this.gateway, repository);
    }

    this.runPromise = this.gateway.run();

    // 4. HTTP API
    this.httpServer = new HTTPServer({
      gateway: this.gateway,
      samples: this.samples,
      inventory: this.inventory,
      eventBus: this.eventBus,
      port: this.config.api.port,
      host: this.config.api.host,
    });
    await this.httpServer.start();

    if (this.handleSignals) {
      this.setupSignalHandlers();
    }

    this.running = true;
    getLogger().info(
      { pid: process.pid, address: this.httpServer.getAddress() },
      'Fleetmon daemon started',
    );
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    getLogger().info('Fleetmon daemon stopping...');
    this.running = false;

    if (this.signalHandler) {
      process.off('SIGINT', this.signalHandler);
      process.off('SIGTERM', this.signalHandler);
      this.signalHandler = null;
    }

    await this.httpServer?.stop();
    await this.gateway?.shutdown();
    await this.runPromise;

    this.kv?.close?.();
    this.eventBus.removeAllListeners();

    getLogger().info('Fleetmon daemon stopped');
  }

  getAddress(): string | null {
    return this.httpServer?.getAddress() ?? null;
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  private async restore(
    gateway: ConcurrencyGateway,
    repository: MonitoringRepository,
  ): Promise<void> {
    const nodes = await repository.listNodes();
    let restored = 0;
    for (const node of nodes) {
      const result = await gateway.ingestSample(node);
      if (result.ok) restored++;
    }
    if (nodes.length > 0) {
      getLogger().info({ restored, stored: nodes.length }, 'Restored node records');
    }
  }

  private setupSignalHandlers(): void {
    const handler = () => {
      this.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          getLogger().error({ err }, 'Daemon shutdown failed');
          process.exit(1);
        },
      );
    };
    this.signalHandler = handler;
    process.on('SIGINT', handler);
    process.on('SIGTERM', handler);
  }
}
