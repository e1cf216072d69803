import type { ZodType, ZodTypeDef } from 'zod';
import type { BoardAggregate, NodeRecord, SocAggregate } from '@fleetmon/shared';
import {
  BOARD_KEY_PREFIX,
  NODE_KEY_PREFIX,
  SOC_KEY_PREFIX,
  DeserializationError,
  SerializationError,
  boardAggregateSchema,
  getLogger,
  nodeRecordSchema,
  socAggregateSchema,
} from '@fleetmon/shared';
import type { KeyValueStore } from './KeyValueStore.js';

// Input is unknown: stored aggregates carry lastUpdated as a string
type EntitySchema<T> = ZodType<T, ZodTypeDef, unknown>;

export const nodeKey = (nodeName: string): string => `${NODE_KEY_PREFIX}${nodeName}`;
export const socKey = (socId: string): string => `${SOC_KEY_PREFIX}${socId}`;
export const boardKey = (boardId: string): string => `${BOARD_KEY_PREFIX}${boardId}`;

function serialize(entity: string, value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch (err) {
    throw new SerializationError(entity, err instanceof Error ? err.message : String(err));
  }
}

function deserialize<T>(key: string, raw: string, schema: EntitySchema<T>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DeserializationError(key, err instanceof Error ? err.message : String(err));
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DeserializationError(key, detail);
  }
  return result.data;
}

/**
 * Stores nodes, SoCs and boards as JSON under the monitoring/ key namespaces.
 */
export class MonitoringRepository {
  private kv: KeyValueStore;

  constructor(kv: KeyValueStore) {
    this.kv = kv;
  }

  async storeNode(node: NodeRecord): Promise<void> {
    await this.kv.put(nodeKey(node.nodeName), serialize(`NodeRecord ${node.nodeName}`, node));
    getLogger().debug({ nodeName: node.nodeName }, 'Stored node record');
  }

  async storeSoc(soc: SocAggregate): Promise<void> {
    await this.kv.put(socKey(soc.socId), serialize(`SocAggregate ${soc.socId}`, soc));
    getLogger().debug({ socId: soc.socId }, 'Stored SoC aggregate');
  }

  async storeBoard(board: BoardAggregate): Promise<void> {
    await this.kv.put(boardKey(board.boardId), serialize(`BoardAggregate ${board.boardId}`, board));
    getLogger().debug({ boardId: board.boardId }, 'Stored board aggregate');
  }

  async getNode(nodeName: string): Promise<NodeRecord> {
    return this.getEntity(nodeKey(nodeName), nodeRecordSchema);
  }

  async getSoc(socId: string): Promise<SocAggregate> {
    return this.getEntity(socKey(socId), socAggregateSchema);
  }

  async getBoard(boardId: string): Promise<BoardAggregate> {
    return this.getEntity(boardKey(boardId), boardAggregateSchema);
  }

  async listNodes(): Promise<NodeRecord[]> {
    return this.listEntities(NODE_KEY_PREFIX, nodeRecordSchema);
  }

  async listSocs(): Promise<SocAggregate[]> {
    return this.listEntities(SOC_KEY_PREFIX, socAggregateSchema);
  }

  async listBoards(): Promise<BoardAggregate[]> {
    return this.listEntities(BOARD_KEY_PREFIX, boardAggregateSchema);
  }

  async deleteNode(nodeName: string): Promise<void> {
    await this.kv.delete(nodeKey(nodeName));
    getLogger().info({ nodeName }, 'Deleted stored node record');
  }

  async deleteSoc(socId: string): Promise<void> {
    await this.kv.delete(socKey(socId));
    getLogger().info({ socId }, 'Deleted stored SoC aggregate');
  }

  async deleteBoard(boardId: string): Promise<void> {
    await this.kv.delete(boardKey(boardId));
    getLogger().info({ boardId }, 'Deleted stored board aggregate');
  }

  private async getEntity<T>(key: string, schema: EntitySchema<T>): Promise<T> {
    const raw = await this.kv.get(key);
    return deserialize(key, raw, schema);
  }

  /** One corrupt record is logged and skipped; it never hides the rest. */
  private async listEntities<T>(prefix: string, schema: EntitySchema<T>): Promise<T[]> {
    const pairs = await this.kv.listByPrefix(prefix);
    const entities: T[] = [];

    for (const { key, value } of pairs) {
      try {
        entities.push(deserialize(key, value, schema));
      } catch (err) {
        if (!(err instanceof DeserializationError)) throw err;
        getLogger().warn({ key, err: err.message }, 'Skipping malformed stored record');
      }
    }

    return entities;
  }
}
