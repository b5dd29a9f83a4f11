import { HashAlgorithm, RingEntry } from '../types';
import { BalancerError } from '../utils/errorHandler';
import { DEFAULT_HASH_ALGORITHM, HashFunction, RING_HASH_BITS, createHashFunction } from './HashFunction';
import { VirtualNode, createVirtualNode } from './VirtualNode';

export const DEFAULT_VIRTUAL_NODES = 150;

const RING_SIZE = 2 ** RING_HASH_BITS;

export interface ConsistentHashRingOptions {
  /** Virtual nodes per unit of weight. */
  virtualNodes?: number;
  hashFunction?: HashFunction | HashAlgorithm;
}

interface RingMember {
  readonly weight: number;
  /** Insertion ordinal, first key of the collision tie-break. */
  readonly ordinal: number;
  readonly nodes: readonly VirtualNode[];
}

/**
 * Everything a lookup reads. Snapshots are never modified after they are
 * published; a mutation builds the next one and swaps the reference.
 */
interface RingSnapshot {
  readonly nodes: readonly VirtualNode[];
  readonly members: ReadonlyMap<string, RingMember>;
}

const EMPTY_SNAPSHOT: RingSnapshot = Object.freeze({
  nodes: Object.freeze([]),
  members: new Map<string, RingMember>()
});

export interface RingStats {
  totalVirtualNodes: number;
  servers: number;
  averageVirtualNodes: number;
  virtualNodesPerServer: Record<string, number>;
}

export function assertValidWeight(weight: number): void {
  if (!Number.isInteger(weight) || weight < 1) {
    throw new BalancerError(`Weight must be a positive integer, got ${weight}`, 'INVALID_WEIGHT');
  }
}

function checkedHashFunction(hashFunction: HashFunction): HashFunction {
  if (hashFunction.outputBits !== RING_HASH_BITS) {
    throw new BalancerError(
      `Hash function '${hashFunction.name}' produces ${hashFunction.outputBits}-bit values; the ring requires ${RING_HASH_BITS}-bit values`,
      'INVALID_HASH_FUNCTION'
    );
  }
  return {
    name: hashFunction.name,
    outputBits: hashFunction.outputBits,
    hash(input: string): number {
      const value = hashFunction.hash(input);
      if (!Number.isInteger(value) || value < 0 || value >= RING_SIZE) {
        throw new BalancerError(
          `Hash function '${hashFunction.name}' returned ${value}, outside [0, 2^${RING_HASH_BITS})`,
          'INVALID_HASH_FUNCTION'
        );
      }
      return value;
    }
  };
}

/**
 * Consistent hashing ring with weighted virtual nodes.
 *
 * A server of weight w occupies `w * virtualNodes` positions. A key is owned by
 * the first position clockwise from its hash, wrapping past the top of the
 * ring to the lowest position.
 */
export class ConsistentHashRing {
  private readonly hashFunction: HashFunction;
  private readonly virtualNodes: number;
  private snapshot: RingSnapshot = EMPTY_SNAPSHOT;
  private nextOrdinal: number = 0;

  constructor(options: ConsistentHashRingOptions = {}) {
    const virtualNodes = options.virtualNodes ?? DEFAULT_VIRTUAL_NODES;
    if (!Number.isInteger(virtualNodes) || virtualNodes < 1) {
      throw new BalancerError(`virtualNodes must be a positive integer, got ${virtualNodes}`, 'INVALID_CONFIG');
    }
    const hashFunction = options.hashFunction ?? DEFAULT_HASH_ALGORITHM;
    this.virtualNodes = virtualNodes;
    this.hashFunction = checkedHashFunction(
      typeof hashFunction === 'string' ? createHashFunction(hashFunction) : hashFunction
    );
  }

  get hashFunctionName(): string {
    return this.hashFunction.name;
  }

  get virtualNodesPerWeight(): number {
    return this.virtualNodes;
  }

  /** Number of physical servers on the ring. */
  get size(): number {
    return this.snapshot.members.size;
  }

  get virtualNodeCount(): number {
    return this.snapshot.nodes.length;
  }

  hashKey(key: string): number {
    return this.hashFunction.hash(key);
  }

  has(serverId: string): boolean {
    return this.snapshot.members.has(serverId);
  }

  getServerIds(): string[] {
    return Array.from(this.snapshot.members.keys());
  }

  getWeight(serverId: string): number | undefined {
    return this.snapshot.members.get(serverId)?.weight;
  }

  getVirtualNodes(serverId: string): readonly VirtualNode[] {
    return this.snapshot.members.get(serverId)?.nodes ?? [];
  }

  addServer(serverId: string, weight: number = 1): void {
    assertValidWeight(weight);
    const current = this.snapshot;
    if (current.members.has(serverId)) {
      throw new BalancerError(`Server ${serverId} is already on the ring`, 'DUPLICATE_SERVER');
    }

    const member = this.buildMember(serverId, weight, this.nextOrdinal++);
    const members = new Map(current.members);
    members.set(serverId, member);

    this.publish(this.mergeNodes(current.nodes, member.nodes, members), members);
  }

  removeServer(serverId: string): void {
    const current = this.snapshot;
    if (!current.members.has(serverId)) {
      throw new BalancerError(`Server ${serverId} is not on the ring`, 'SERVER_NOT_FOUND');
    }

    const members = new Map(current.members);
    members.delete(serverId);

    this.publish(current.nodes.filter(node => node.serverId !== serverId), members);
  }

  /**
   * Replaces a server's virtual nodes for a new weight in a single publish,
   * so lookups never see the server missing in between. The server keeps its
   * insertion ordinal.
   */
  setWeight(serverId: string, weight: number): void {
    assertValidWeight(weight);
    const current = this.snapshot;
    const existing = current.members.get(serverId);
    if (!existing) {
      throw new BalancerError(`Server ${serverId} is not on the ring`, 'SERVER_NOT_FOUND');
    }
    if (existing.weight === weight) {
      return;
    }

    const member = this.buildMember(serverId, weight, existing.ordinal);
    const members = new Map(current.members);
    members.set(serverId, member);

    const remaining = current.nodes.filter(node => node.serverId !== serverId);
    this.publish(this.mergeNodes(remaining, member.nodes, members), members);
  }

  lookup(key: string): string {
    const { nodes } = this.snapshot;
    if (nodes.length === 0) {
      throw new BalancerError('No servers on the ring', 'EMPTY_RING');
    }
    return nodes[this.successorIndex(nodes, this.hashKey(key))].serverId;
  }

  /**
   * Walks clockwise from the key's position and returns up to `count`
   * distinct server ids in ring order. The first entry is always `lookup(key)`.
   */
  lookupCandidates(key: string, count: number): string[] {
    const { nodes, members } = this.snapshot;
    if (nodes.length === 0 || count <= 0) {
      return [];
    }

    const wanted = Math.min(count, members.size);
    const start = this.successorIndex(nodes, this.hashKey(key));
    const result: string[] = [];
    const seen = new Set<string>();

    for (let i = 0; i < nodes.length && result.length < wanted; i++) {
      const { serverId } = nodes[(start + i) % nodes.length];
      if (!seen.has(serverId)) {
        seen.add(serverId);
        result.push(serverId);
      }
    }

    return result;
  }

  /** First `limit` positions in ring order. */
  sample(limit: number): RingEntry[] {
    return this.snapshot.nodes.slice(0, Math.max(0, limit)).map(node => ({
      hash: node.hash,
      serverId: node.serverId,
      replicaIndex: node.replicaIndex
    }));
  }

  getStats(): RingStats {
    const { nodes, members } = this.snapshot;
    const virtualNodesPerServer: Record<string, number> = {};
    for (const [serverId, member] of members) {
      virtualNodesPerServer[serverId] = member.nodes.length;
    }
    return {
      totalVirtualNodes: nodes.length,
      servers: members.size,
      averageVirtualNodes: members.size > 0 ? nodes.length / members.size : 0,
      virtualNodesPerServer
    };
  }

  private buildMember(serverId: string, weight: number, ordinal: number): RingMember {
    const count = weight * this.virtualNodes;
    const nodes: VirtualNode[] = [];
    for (let i = 0; i < count; i++) {
      nodes.push(createVirtualNode(serverId, i, this.hashFunction));
    }
    return { weight, ordinal, nodes: Object.freeze(nodes) };
  }

  private mergeNodes(
    existing: readonly VirtualNode[],
    added: readonly VirtualNode[],
    members: ReadonlyMap<string, RingMember>
  ): VirtualNode[] {
    const compare = (a: VirtualNode, b: VirtualNode) => this.compareNodes(a, b, members);
    const incoming = [...added].sort(compare);
    const merged: VirtualNode[] = new Array(existing.length + incoming.length);

    let i = 0;
    let j = 0;
    let k = 0;
    while (i < existing.length && j < incoming.length) {
      merged[k++] = compare(existing[i], incoming[j]) <= 0 ? existing[i++] : incoming[j++];
    }
    while (i < existing.length) merged[k++] = existing[i++];
    while (j < incoming.length) merged[k++] = incoming[j++];

    return merged;
  }

  // Equal hashes keep every node: earlier-added server first, then serverId, then replica.
  private compareNodes(a: VirtualNode, b: VirtualNode, members: ReadonlyMap<string, RingMember>): number {
    if (a.hash !== b.hash) {
      return a.hash < b.hash ? -1 : 1;
    }
    const ordinalA = members.get(a.serverId)?.ordinal ?? 0;
    const ordinalB = members.get(b.serverId)?.ordinal ?? 0;
    if (ordinalA !== ordinalB) {
      return ordinalA - ordinalB;
    }
    if (a.serverId !== b.serverId) {
      return a.serverId < b.serverId ? -1 : 1;
    }
    return a.replicaIndex - b.replicaIndex;
  }

  // Lower bound: first node with hash >= target, or 0 when target is past the last node.
  private successorIndex(nodes: readonly VirtualNode[], target: number): number {
    let low = 0;
    let high = nodes.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (nodes[mid].hash < target) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low === nodes.length ? 0 : low;
  }

  private publish(nodes: VirtualNode[], members: Map<string, RingMember>): void {
    this.snapshot = Object.freeze({ nodes: Object.freeze(nodes), members });
  }
}
