import { createHash } from 'crypto';
import * as CRC32 from 'crc-32';
import * as murmurhash from 'murmurhash';
import { HashAlgorithm } from '../types';
import { BalancerError } from '../utils/errorHandler';

/** Width of every position on the ring; all built-in algorithms produce it. */
export const RING_HASH_BITS = 32;

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'murmur3';

export interface HashFunction {
  readonly name: string;
  /** Output lies in [0, 2^outputBits). */
  readonly outputBits: number;
  hash(input: string): number;
}

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(input: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

function djb2(input: string): number {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0; // hash * 33 + c
  }
  return hash;
}

function digestPrefix(algorithm: 'md5' | 'sha1', input: string): number {
  return createHash(algorithm).update(input, 'utf8').digest().readUInt32LE(0);
}

const ALGORITHMS: Record<HashAlgorithm, (input: string) => number> = {
  murmur3: (input) => murmurhash.v3(input, 0),
  fnv1a,
  djb2,
  md5: (input) => digestPrefix('md5', input),
  sha1: (input) => digestPrefix('sha1', input),
  crc32: (input) => CRC32.str(input) >>> 0
};

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['murmur3', 'fnv1a', 'djb2', 'md5', 'sha1', 'crc32'];

export function isHashAlgorithm(name: string): name is HashAlgorithm {
  return HASH_ALGORITHMS.some(algorithm => algorithm === name);
}

export function createHashFunction(name: string): HashFunction {
  if (!isHashAlgorithm(name)) {
    throw new BalancerError(
      `Unknown hash function '${name}'. Available: ${HASH_ALGORITHMS.join(', ')}`,
      'INVALID_HASH_FUNCTION'
    );
  }
  const hash = ALGORITHMS[name];
  return { name, outputBits: RING_HASH_BITS, hash };
}
