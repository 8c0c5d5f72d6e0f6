import { Mutex, withTimeout } from "async-mutex";
import { AuctionLock } from "../../application/ports/services";
import { AppError } from "../../application/errors";

type Entry = {
  mutex: Mutex;
  holders: number;
};

/**
 * In-process lock with one mutex per resource key. Unrelated keys never wait
 * on each other; a key's mutex is dropped once nobody holds or awaits it.
 */
export class KeyedMutexLock implements AuctionLock {
  private readonly entries = new Map<string, Entry>();

  async withLock<T>(resource: string, timeoutMs: number, handler: () => Promise<T>): Promise<T> {
    const entry = this.acquireEntry(resource);
    const timeoutError = new AppError(`Timed out waiting for ${resource}`, 503, "LOCK_TIMEOUT");
    try {
      return await withTimeout(entry.mutex, timeoutMs, timeoutError).runExclusive(handler);
    } finally {
      this.releaseEntry(resource, entry);
    }
  }

  get activeKeys(): number {
    return this.entries.size;
  }

  private acquireEntry(resource: string): Entry {
    let entry = this.entries.get(resource);
    if (!entry) {
      entry = { mutex: new Mutex(), holders: 0 };
      this.entries.set(resource, entry);
    }
    entry.holders += 1;
    return entry;
  }

  private releaseEntry(resource: string, entry: Entry) {
    entry.holders -= 1;
    if (entry.holders === 0 && this.entries.get(resource) === entry) {
      this.entries.delete(resource);
    }
  }
}
