import { ConfigurationError } from '../../utils/errors.js';

/**
 * Splits the configured keys between worker processes: worker `w` of `n`
 * owns every key whose position `i` satisfies `i % n === w`.
 */
export function partitionKeys(keys: string[], workerCount: number, workerIndex: number): string[] {
  if (workerCount < 1 || workerIndex < 0 || workerIndex >= workerCount) {
    throw new ConfigurationError('Invalid worker partition', { workerCount, workerIndex });
  }

  const owned = keys.filter((_, i) => i % workerCount === workerIndex);
  if (owned.length === 0) {
    throw new ConfigurationError(
      `Worker ${workerIndex} of ${workerCount} has no API keys; configure at least ${workerCount} keys`
    );
  }
  return owned;
}

/**
 * Round-robin over a fixed pool of API keys. `advance` moves the cursor first
 * and reads after, so the first key handed out is the one at position 1.
 * The update is synchronous: concurrent requests on the event loop cannot
 * interleave inside it.
 */
export class KeyRotator {
  private readonly keys: readonly string[];
  private cursor = 0;

  constructor(keys: string[]) {
    if (keys.length === 0) {
      throw new ConfigurationError('Credential pool is empty');
    }
    this.keys = Object.freeze([...keys]);
  }

  get size(): number {
    return this.keys.length;
  }

  get position(): number {
    return this.cursor;
  }

  advance(): string {
    this.cursor = (this.cursor + 1) % this.keys.length;
    return this.keys[this.cursor];
  }
}
