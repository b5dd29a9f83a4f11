import net from 'net';
import { HashFunction } from '../core/HashFunction';

/** Runs `fn` and returns what it threw; fails the test if nothing was thrown. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/** 32-bit hash function with fixed positions; unlisted inputs hash to `fallback`. */
export function tableHash(table: Record<string, number>, fallback: number = 0): HashFunction {
  return {
    name: 'table',
    outputBits: 32,
    hash: (input: string) => table[input] ?? fallback
  };
}

export function constantHash(value: number): HashFunction {
  return { name: 'constant', outputBits: 32, hash: () => value };
}

/** Listens on an ephemeral loopback port and resolves with it. */
export function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      resolve(address.port);
    });
  });
}

export function close(server: net.Server): Promise<void> {
  return new Promise(resolve => server.close(() => resolve()));
}
