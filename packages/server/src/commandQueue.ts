// packages/server/src/commandQueue.ts

/**
 * Serializes tasks per key: a task starts only after every earlier task
 * queued under the same key has settled.
 */
export class CommandQueue {
  private readonly queues = new Map<string, Promise<unknown>>();

  enqueue<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();

    const run = previous
      .catch(() => undefined)
      .then(() => task());

    const settled = run.finally(() => {
      if (this.queues.get(key) === settled) {
        this.queues.delete(key);
      }
    });
    // the tail only orders later tasks; callers observe `run`
    settled.catch(() => undefined);
    this.queues.set(key, settled);

    return run;
  }

  pending(): number {
    return this.queues.size;
  }

  async drain(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.allSettled(Array.from(this.queues.values()));
    }
  }
}

export const STATE_QUEUE_KEY = "state";

export function pairingQueueKey(pairingId: string): string {
  return `pairing:${pairingId}`;
}
