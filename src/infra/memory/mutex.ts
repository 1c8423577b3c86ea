import { StorageTimeoutError } from "../../common/errors";

type Waiter = {
  grant: () => void;
};

export type Release = () => void;

export class Mutex {
  private locked = false;
  private queue: Waiter[] = [];

  isLocked(): boolean {
    return this.locked || this.queue.length > 0;
  }

  /**
   * Resolves with a release function once the lock is held. With a timeout,
   * a waiter that is still queued when it expires leaves the queue and the
   * promise rejects with StorageTimeoutError.
   */
  lock(timeoutMs?: number): Promise<Release> {
    return new Promise((resolve, reject) => {
      let released = false;
      const release = () => {
        if (released) {
          return;
        }
        released = true;
        const next = this.queue.shift();
        if (next) {
          next.grant();
        } else {
          this.locked = false;
        }
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      let timer: NodeJS.Timeout | undefined;
      const waiter: Waiter = {
        grant: () => {
          if (timer) {
            clearTimeout(timer);
          }
          resolve(release);
        }
      };
      this.queue.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const index = this.queue.indexOf(waiter);
          if (index >= 0) {
            this.queue.splice(index, 1);
            reject(new StorageTimeoutError());
          }
        }, timeoutMs);
      }
    });
  }
}

export class MutexMap {
  private readonly map = new Map<string, { mutex: Mutex; lastUsed: number }>();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly TTL_MS = 5 * 60 * 1000;

  constructor(private readonly lockTimeoutMs?: number) {
    this.cleanupInterval = setInterval(() => this.cleanup(), 60_000);
    this.cleanupInterval.unref();
  }

  get(accountId: string): Mutex {
    const existing = this.map.get(accountId);
    if (existing) {
      existing.lastUsed = Date.now();
      return existing.mutex;
    }
    const created = { mutex: new Mutex(), lastUsed: Date.now() };
    this.map.set(accountId, created);
    return created.mutex;
  }

  /**
   * Locks every id in ascending lexicographic order, whatever order the
   * caller lists them in. Two units touching the same accounts therefore
   * always queue on the lower id first and cannot wait on each other.
   */
  async lockAll(accountIds: string[]): Promise<Release> {
    const ordered = [...new Set(accountIds)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    const releases: Release[] = [];
    const releaseAll = () => {
      for (const release of [...releases].reverse()) {
        release();
      }
    };
    try {
      for (const accountId of ordered) {
        releases.push(await this.get(accountId).lock(this.lockTimeoutMs));
      }
    } catch (error) {
      releaseAll();
      throw error;
    }
    return releaseAll;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, value] of this.map.entries()) {
      if (now - value.lastUsed > this.TTL_MS && !value.mutex.isLocked()) {
        this.map.delete(key);
      }
    }
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.map.clear();
  }
}
