// src/services/upload/upload.locks.ts

import PQueue from "p-queue";

/**
 * One single-slot queue per uploadId. Queues are created on demand and
 * dropped once idle, so unrelated uploads never wait on each other.
 */
export class UploadLocks {
  private readonly queues = new Map<string, PQueue>();

  async run<T>(uploadId: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(uploadId);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(uploadId, queue);
    }

    try {
      return await queue.add<T>(task, { throwOnTimeout: true });
    } finally {
      if (queue.size === 0 && queue.pending === 0) {
        this.queues.delete(uploadId);
      }
    }
  }

  get activeKeys(): number {
    return this.queues.size;
  }
}

/**
 * Tracks positional writes in flight per upload so finalize can wait for
 * them, and refuses new writes while a session is sealed.
 */
export class InflightWrites {
  private readonly writes = new Map<string, Set<Promise<unknown>>>();
  private readonly sealed = new Set<string>();

  isSealed(uploadId: string): boolean {
    return this.sealed.has(uploadId);
  }

  /**
   * Must be called in the same tick as the `isSealed` check.
   */
  track<T>(uploadId: string, write: Promise<T>): Promise<T> {
    const existing = this.writes.get(uploadId);
    const set = existing ?? new Set<Promise<unknown>>();
    if (!existing) this.writes.set(uploadId, set);
    set.add(write);

    const release = () => {
      set.delete(write);
      if (set.size === 0 && this.writes.get(uploadId) === set) {
        this.writes.delete(uploadId);
      }
    };
    void write.then(release, release);

    return write;
  }

  async seal(uploadId: string): Promise<void> {
    this.sealed.add(uploadId);
    const pending = this.writes.get(uploadId);
    if (pending?.size) {
      await Promise.allSettled([...pending]);
    }
  }

  unseal(uploadId: string) {
    this.sealed.delete(uploadId);
  }
}
