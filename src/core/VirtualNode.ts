import { HashFunction } from './HashFunction';

/** One position a physical server occupies on the ring. Frozen on creation. */
export interface VirtualNode {
  readonly serverId: string;
  readonly replicaIndex: number;
  readonly hash: number;
}

export function replicaKey(serverId: string, replicaIndex: number): string {
  return `${serverId}:${replicaIndex}`;
}

export function createVirtualNode(serverId: string, replicaIndex: number, hashFunction: HashFunction): VirtualNode {
  return Object.freeze({
    serverId,
    replicaIndex,
    hash: hashFunction.hash(replicaKey(serverId, replicaIndex))
  });
}
