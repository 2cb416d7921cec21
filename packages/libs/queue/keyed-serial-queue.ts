import { Logger } from '@nestjs/common';

type Task<T> = () => Promise<T>;

/**
 * Runs tasks one at a time per key, in submission order.
 *
 * Different keys never wait on each other. The map only holds the tail of each
 * key's chain and is pruned once a chain drains, so idle keys cost nothing.
 */
export class KeyedSerialQueue<K = string> {
  private readonly logger = new Logger(KeyedSerialQueue.name);
  // Map<key, tail promise of the chain>
  private readonly tails = new Map<K, Promise<void>>();

  run<T>(key: K, task: Task<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The chain must keep going even when a task rejects; the rejection is
    // still delivered to this task's caller through `result`.
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
        this.logger.debug({ msg: 'chain drained', key });
      }
    });

    return result;
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }

  isBusy(key: K): boolean {
    return this.tails.has(key);
  }
}
