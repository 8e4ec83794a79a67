import { RelayError } from "@gitrelay/core";

type Lane = {
  /** Settles when the last task queued on this lane settles */
  tail: Promise<void>;
  /** Running plus waiting tasks */
  depth: number;
};

export type KeyedSerialQueueOptions = {
  /** Tasks allowed to wait behind the running one, per key */
  maxWaiting?: number;
};

export type RunOptions = {
  /** Skip the waiting limit (used for cleanup work) */
  force?: boolean;
};

/**
 * FIFO lanes keyed by string. Tasks on one key never overlap; tasks on
 * different keys run concurrently.
 */
export class KeyedSerialQueue {
  private readonly lanes = new Map<string, Lane>();
  private readonly maxWaiting: number;

  constructor(options: KeyedSerialQueueOptions = {}) {
    this.maxWaiting = options.maxWaiting ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Runs `task` after every task already queued on `key`.
   * Rejects with ConcurrentBatchRejected when the lane is full.
   */
  run<T>(key: string, task: () => Promise<T>, options: RunOptions = {}) {
    const lane = this.lanes.get(key) ?? { tail: Promise.resolve(), depth: 0 };

    const waiting = Math.max(0, lane.depth - 1);
    if (!options.force && lane.depth > 0 && waiting >= this.maxWaiting) {
      return Promise.reject(
        new RelayError(
          "ConcurrentBatchRejected",
          `Too many batches queued for this session (${waiting} waiting)`
        )
      );
    }

    lane.depth += 1;
    this.lanes.set(key, lane);

    const result = lane.tail.then(task);
    lane.tail = result.then(
      () => undefined,
      () => undefined
    );

    return result.finally(() => {
      lane.depth -= 1;
      if (lane.depth === 0 && this.lanes.get(key) === lane) {
        this.lanes.delete(key);
      }
    });
  }

  /** Running plus waiting tasks on `key`. */
  size(key: string): number {
    return this.lanes.get(key)?.depth ?? 0;
  }

  /** Resolves once everything queued on `key` so far has settled. */
  settled(key: string): Promise<void> {
    return this.lanes.get(key)?.tail ?? Promise.resolve();
  }
}
