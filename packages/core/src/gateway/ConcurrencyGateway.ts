import type {
  BoardAggregate,
  FleetSnapshot,
  FleetSummary,
  HierarchyIdentity,
  InventoryMessage,
  NodeRecord,
  SocAggregate,
  UtilizationSample,
} from '@fleetmon/shared';
import {
  CounterOverflowError,
  InvalidAddressError,
  TelemetryValidationError,
  getLogger,
  inventoryMessageSchema,
  utilizationSampleSchema,
} from '@fleetmon/shared';
import type { ZodError } from 'zod';
import { deriveIdentity } from '../identity/IdentityDeriver.js';
import { AggregateStore } from '../store/AggregateStore.js';
import type { EventBus } from '../events/EventBus.js';
import type { MonitoringRepository } from '../persistence/MonitoringRepository.js';
import { Mutex } from './Mutex.js';
import type { MessageStream } from './MessageStream.js';

export type RejectionError = InvalidAddressError | TelemetryValidationError | CounterOverflowError;

export type IngestResult =
  | { ok: true; identity: HierarchyIdentity }
  | { ok: false; error: RejectionError };

export interface ConcurrencyGatewayOptions {
  samples: MessageStream<UtilizationSample>;
  inventory: MessageStream<InventoryMessage>;
  eventBus: EventBus;
  repository?: MonitoringRepository;
  now?: () => Date;
}

interface UpsertOutcome {
  identity: HierarchyIdentity;
  node: NodeRecord | undefined;
  // Every SoC and board the upsert recomputed, including ones the node left
  socs: SocAggregate[];
  boards: BoardAggregate[];
}

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function nodeNameOf(message: unknown): string {
  if (typeof message === 'object' && message !== null && 'nodeName' in message) {
    const { nodeName } = message;
    if (typeof nodeName === 'string') return nodeName;
  }
  return '(unknown)';
}

/**
 * Owns the AggregateStore and serializes all access to it behind one mutex.
 *
 * Two consumption loops run concurrently: one applies utilization samples
 * (exactly one upsert per message), the other logs container inventories.
 * Each loop ends when its stream is closed and drained.
 */
export class ConcurrencyGateway {
  private store: AggregateStore;
  private mutex: Mutex = new Mutex();
  private samples: MessageStream<UtilizationSample>;
  private inventory: MessageStream<InventoryMessage>;
  private eventBus: EventBus;
  private repository: MonitoringRepository | null;
  private runPromise: Promise<void> | null = null;
  private pendingWrites: Set<Promise<void>> = new Set();
  private now: () => Date;

  constructor(options: ConcurrencyGatewayOptions) {
    this.now = options.now ?? (() => new Date());
    this.store = new AggregateStore({ now: this.now });
    this.samples = options.samples;
    this.inventory = options.inventory;
    this.eventBus = options.eventBus;
    this.repository = options.repository ?? null;
  }

  /**
   * Start both loops. Resolves once both streams are closed and drained.
   * Calling it again returns the same promise.
   */
  run(): Promise<void> {
    if (!this.runPromise) {
      getLogger().info(
        { samples: this.samples.name, inventory: this.inventory.name },
        'Gateway consumption loops started',
      );
      this.runPromise = Promise.all([this.consumeSamples(), this.consumeInventory()]).then(() => {
        getLogger().info('Gateway consumption loops stopped');
        this.eventBus.emit('gateway:stopped', undefined);
      });
    }
    return this.runPromise;
  }

  /** Close both streams, wait for the loops to drain and for pending writes. */
  async shutdown(): Promise<void> {
    this.samples.close();
    this.inventory.close();
    if (this.runPromise) {
      await this.runPromise;
    }
    await this.flush();
  }

  /** Wait for every in-flight persistence write to settle. */
  async flush(): Promise<void> {
    await Promise.all(Array.from(this.pendingWrites));
  }

  async ingestSample(sample: unknown): Promise<IngestResult> {
    const parsed = utilizationSampleSchema.safeParse(sample);
    if (!parsed.success) {
      const error = new TelemetryValidationError(describeIssues(parsed.error));
      this.reject(nodeNameOf(sample), error);
      return { ok: false, error };
    }

    const record = parsed.data;
    let outcome: UpsertOutcome;
    try {
      outcome = await this.mutex.runExclusive(() => this.applyUnderLock(record));
    } catch (err) {
      if (err instanceof InvalidAddressError || err instanceof CounterOverflowError) {
        this.reject(record.nodeName, err);
        return { ok: false, error: err };
      }
      throw err;
    }

    const { identity } = outcome;
    getLogger().debug(
      { nodeName: record.nodeName, ip: record.ip, ...identity },
      'Applied node telemetry',
    );
    this.eventBus.emit('telemetry:upserted', {
      nodeName: record.nodeName,
      ip: record.ip,
      socId: identity.socId,
      boardId: identity.boardId,
      timestamp: this.now(),
    });

    this.persist(record.nodeName, outcome);
    return { ok: true, identity };
  }

  /** Container inventories are logged and published; they never touch the store. */
  observeInventory(message: unknown): boolean {
    const parsed = inventoryMessageSchema.safeParse(message);
    if (!parsed.success) {
      getLogger().warn(
        { nodeName: nodeNameOf(message), issues: describeIssues(parsed.error) },
        'Dropping malformed container inventory',
      );
      return false;
    }

    const inventory = parsed.data;
    getLogger().info(
      { nodeName: inventory.nodeName, containers: inventory.containers.length },
      'Received container inventory',
    );
    for (const container of inventory.containers) {
      getLogger().debug(
        {
          nodeName: inventory.nodeName,
          id: container.id,
          names: container.names,
          image: container.image,
        },
        'Container',
      );
    }
    this.eventBus.emit('inventory:received', inventory);
    return true;
  }

  getNode(nodeName: string): Promise<NodeRecord | undefined> {
    return this.mutex.runExclusive(() => this.store.getNode(nodeName));
  }

  getSoc(socId: string): Promise<SocAggregate | undefined> {
    return this.mutex.runExclusive(() => this.store.getSoc(socId));
  }

  getBoard(boardId: string): Promise<BoardAggregate | undefined> {
    return this.mutex.runExclusive(() => this.store.getBoard(boardId));
  }

  allNodes(): Promise<NodeRecord[]> {
    return this.mutex.runExclusive(() => this.store.allNodes());
  }

  allSocs(): Promise<SocAggregate[]> {
    return this.mutex.runExclusive(() => this.store.allSocs());
  }

  allBoards(): Promise<BoardAggregate[]> {
    return this.mutex.runExclusive(() => this.store.allBoards());
  }

  snapshot(): Promise<FleetSnapshot> {
    return this.mutex.runExclusive(() => this.store.snapshot());
  }

  summary(): Promise<FleetSummary> {
    return this.mutex.runExclusive(() => this.store.summary());
  }

  private async consumeSamples(): Promise<void> {
    for await (const sample of this.samples) {
      try {
        await this.ingestSample(sample);
      } catch (err) {
        getLogger().error({ err, nodeName: nodeNameOf(sample) }, 'Failed to apply node telemetry');
      }
    }
  }

  private async consumeInventory(): Promise<void> {
    for await (const message of this.inventory) {
      this.observeInventory(message);
    }
  }

  /** Runs with the mutex held; persisted copies must match a completed upsert. */
  private applyUnderLock(record: NodeRecord): UpsertOutcome {
    const previous = this.repository ? this.store.getNode(record.nodeName) : undefined;
    const identity = this.store.upsertNode(record);
    if (!this.repository) {
      return { identity, node: undefined, socs: [], boards: [] };
    }

    const socIds = new Set([identity.socId]);
    const boardIds = new Set([identity.boardId]);
    if (previous) {
      const before = deriveIdentity(previous.ip);
      socIds.add(before.socId);
      boardIds.add(before.boardId);
    }

    return {
      identity,
      node: this.store.getNode(record.nodeName),
      socs: this.snapshotsOf(socIds, (id) => this.store.getSoc(id)),
      boards: this.snapshotsOf(boardIds, (id) => this.store.getBoard(id)),
    };
  }

  private snapshotsOf<T>(ids: Set<string>, read: (id: string) => T | undefined): T[] {
    const snapshots: T[] = [];
    for (const id of ids) {
      const snapshot = read(id);
      if (snapshot) snapshots.push(snapshot);
    }
    return snapshots;
  }

  private reject(nodeName: string, error: RejectionError): void {
    getLogger().warn(
      { nodeName, code: error.code, reason: error.message },
      'Rejected node telemetry',
    );
    this.eventBus.emit('telemetry:rejected', {
      nodeName,
      code: error.code,
      reason: error.message,
      timestamp: this.now(),
    });
  }

  /** Best-effort durability: failures are reported, never rethrown or rolled back. */
  private persist(nodeName: string, outcome: UpsertOutcome): void {
    const repository = this.repository;
    const { node, socs, boards } = outcome;
    if (!repository || !node) return;

    const write: Promise<void> = Promise.all([
      repository.storeNode(node),
      ...socs.map((soc) => repository.storeSoc(soc)),
      ...boards.map((board) => repository.storeBoard(board)),
    ])
      .then(() => undefined)
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        getLogger().error({ err, nodeName }, 'Failed to persist monitoring data');
        this.eventBus.emit('persistence:error', {
          nodeName,
          error: message,
          timestamp: this.now(),
        });
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });

    this.pendingWrites.add(write);
  }
}
