import type {
  AggregateTotals,
  BoardAggregate,
  FleetSnapshot,
  FleetSummary,
  HierarchyIdentity,
  NodeRecord,
  SocAggregate,
} from '@fleetmon/shared';
import { CounterOverflowError } from '@fleetmon/shared';
import { boardIdForSocId, deriveIdentity } from '../identity/IdentityDeriver.js';

export interface AggregateStoreOptions {
  now?: () => Date;
}

const SUMMED_FIELDS = [
  ['cpuCount', 'totalCpuCount'],
  ['gpuCount', 'totalGpuCount'],
  ['usedMemory', 'totalUsedMemory'],
  ['totalMemory', 'totalMemory'],
  ['rxBytes', 'totalRxBytes'],
  ['txBytes', 'totalTxBytes'],
  ['readBytes', 'totalReadBytes'],
  ['writeBytes', 'totalWriteBytes'],
] as const;

type CounterField = (typeof SUMMED_FIELDS)[number][0];

/** Exact integer sum of one counter; throws once it leaves the safe integer range. */
function sumCounter(
  members: readonly NodeRecord[],
  field: CounterField,
  group: string,
): number {
  let sum = 0;
  for (const node of members) {
    sum += node[field];
    if (!Number.isSafeInteger(sum)) {
      throw new CounterOverflowError(field, group);
    }
  }
  return sum;
}

function meanOf(members: readonly NodeRecord[], field: 'cpuUsage' | 'memUsage'): number {
  if (members.length === 0) return 0;
  let sum = 0;
  for (const node of members) {
    sum += node[field];
  }
  return sum / members.length;
}

/**
 * Derive SoC/board totals from the current member list. Always a full
 * re-derivation: callers never adjust a previous aggregate in place.
 */
export function recomputeTotals(
  members: readonly NodeRecord[],
  group = 'group',
): AggregateTotals {
  const totals: AggregateTotals = {
    totalCpuUsage: meanOf(members, 'cpuUsage'),
    totalMemUsage: meanOf(members, 'memUsage'),
    totalCpuCount: 0,
    totalGpuCount: 0,
    totalUsedMemory: 0,
    totalMemory: 0,
    totalRxBytes: 0,
    totalTxBytes: 0,
    totalReadBytes: 0,
    totalWriteBytes: 0,
  };

  for (const [field, total] of SUMMED_FIELDS) {
    totals[total] = sumCounter(members, field, group);
  }
  return totals;
}

/** Copy of `members` with `node` replacing its namesake or appended. */
function withMember(members: readonly NodeRecord[], node: NodeRecord): NodeRecord[] {
  const next = members.filter((m) => m.nodeName !== node.nodeName);
  next.push(node);
  return next;
}

function replaceOrAppend(members: NodeRecord[], node: NodeRecord): void {
  const index = members.findIndex((m) => m.nodeName === node.nodeName);
  if (index === -1) {
    members.push(node);
  } else {
    members[index] = node;
  }
}

function removeMember(members: NodeRecord[], nodeName: string): boolean {
  const index = members.findIndex((m) => m.nodeName === nodeName);
  if (index === -1) return false;
  members.splice(index, 1);
  return true;
}

/**
 * Holds the latest record per node and the SoC/board rollups derived from
 * them. Not synchronized; the ConcurrencyGateway owns the only instance a
 * running service uses and serializes every call.
 *
 * Everything handed out is a deep copy, so callers cannot reach store state.
 */
export class AggregateStore {
  private nodes: Map<string, NodeRecord> = new Map();
  private socs: Map<string, SocAggregate> = new Map();
  private boards: Map<string, BoardAggregate> = new Map();
  private now: () => Date;

  constructor(options: AggregateStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Insert or replace a node and refresh the SoC and board it belongs to.
   * Throws InvalidAddressError or CounterOverflowError before any mapping
   * is touched.
   */
  upsertNode(record: NodeRecord): HierarchyIdentity {
    const identity = deriveIdentity(record.ip);
    const node: NodeRecord = { ...record };
    this.assertExactTotals(node, identity);
    const timestamp = this.now();

    const previous = this.nodes.get(node.nodeName);
    this.nodes.set(node.nodeName, node);

    // A node that moved to another address band leaves its old groups
    if (previous && previous.ip !== node.ip) {
      const previousIdentity = deriveIdentity(previous.ip);
      this.detachFromPreviousGroups(node.nodeName, previousIdentity, identity, timestamp);
    }

    const soc = this.socs.get(identity.socId) ?? this.createSoc(identity.socId, timestamp);
    replaceOrAppend(soc.nodes, node);
    Object.assign(soc, recomputeTotals(soc.nodes, `soc ${soc.socId}`));
    soc.lastUpdated = timestamp;

    const board =
      this.boards.get(identity.boardId) ?? this.createBoard(identity.boardId, timestamp);
    replaceOrAppend(board.nodes, node);
    Object.assign(board, recomputeTotals(board.nodes, `board ${board.boardId}`));
    board.lastUpdated = timestamp;

    this.rebuildBoardSocs(identity.boardId);

    return identity;
  }

  getNode(name: string): NodeRecord | undefined {
    const node = this.nodes.get(name);
    return node ? structuredClone(node) : undefined;
  }

  getSoc(socId: string): SocAggregate | undefined {
    const soc = this.socs.get(socId);
    return soc ? structuredClone(soc) : undefined;
  }

  getBoard(boardId: string): BoardAggregate | undefined {
    const board = this.boards.get(boardId);
    return board ? structuredClone(board) : undefined;
  }

  allNodes(): NodeRecord[] {
    return Array.from(this.nodes.values(), (node) => structuredClone(node));
  }

  allSocs(): SocAggregate[] {
    return Array.from(this.socs.values(), (soc) => structuredClone(soc));
  }

  allBoards(): BoardAggregate[] {
    return Array.from(this.boards.values(), (board) => structuredClone(board));
  }

  snapshot(): FleetSnapshot {
    return { nodes: this.allNodes(), socs: this.allSocs(), boards: this.allBoards() };
  }

  /** Fleet-wide means and sums over every known node. */
  summary(): FleetSummary {
    const members = Array.from(this.nodes.values());
    return {
      nodeCount: this.nodes.size,
      socCount: this.socs.size,
      boardCount: this.boards.size,
      avgCpuUsage: meanOf(members, 'cpuUsage'),
      avgMemUsage: meanOf(members, 'memUsage'),
      totalCpuCount: sumCounter(members, 'cpuCount', 'fleet'),
      totalGpuCount: sumCounter(members, 'gpuCount', 'fleet'),
    };
  }

  /** Dry run of the totals an upsert would produce, including the fleet-wide counts. */
  private assertExactTotals(node: NodeRecord, identity: HierarchyIdentity): void {
    const socMembers = this.socs.get(identity.socId)?.nodes ?? [];
    recomputeTotals(withMember(socMembers, node), `soc ${identity.socId}`);

    const boardMembers = this.boards.get(identity.boardId)?.nodes ?? [];
    recomputeTotals(withMember(boardMembers, node), `board ${identity.boardId}`);

    const fleet = withMember(Array.from(this.nodes.values()), node);
    sumCounter(fleet, 'cpuCount', 'fleet');
    sumCounter(fleet, 'gpuCount', 'fleet');
  }

  private createSoc(socId: string, timestamp: Date): SocAggregate {
    const soc: SocAggregate = {
      socId,
      nodes: [],
      lastUpdated: timestamp,
      ...recomputeTotals([]),
    };
    this.socs.set(socId, soc);
    return soc;
  }

  private createBoard(boardId: string, timestamp: Date): BoardAggregate {
    const board: BoardAggregate = {
      boardId,
      nodes: [],
      socs: [],
      lastUpdated: timestamp,
      ...recomputeTotals([]),
    };
    this.boards.set(boardId, board);
    return board;
  }

  private detachFromPreviousGroups(
    nodeName: string,
    previous: HierarchyIdentity,
    next: HierarchyIdentity,
    timestamp: Date,
  ): void {
    if (previous.socId !== next.socId) {
      const oldSoc = this.socs.get(previous.socId);
      if (oldSoc && removeMember(oldSoc.nodes, nodeName)) {
        Object.assign(oldSoc, recomputeTotals(oldSoc.nodes, `soc ${oldSoc.socId}`));
        oldSoc.lastUpdated = timestamp;
      }
    }

    if (previous.boardId !== next.boardId) {
      const oldBoard = this.boards.get(previous.boardId);
      if (oldBoard && removeMember(oldBoard.nodes, nodeName)) {
        Object.assign(oldBoard, recomputeTotals(oldBoard.nodes, `board ${oldBoard.boardId}`));
        oldBoard.lastUpdated = timestamp;
      }
    }

    this.rebuildBoardSocs(previous.boardId);
  }

  /** Replace a board's SoC list with every SoC whose id bands into it. */
  private rebuildBoardSocs(boardId: string): void {
    const board = this.boards.get(boardId);
    if (!board) return;

    board.socs = Array.from(this.socs.values()).filter(
      (soc) => boardIdForSocId(soc.socId) === boardId,
    );
  }
}
