import { Injectable, Logger } from "@nestjs/common";
import { UnavailableError } from "../../common/domain-errors";
import { getOrderServiceEnv } from "../../config/env";

type Waiter = {
  grant: () => void;
  timer?: ReturnType<typeof setTimeout>;
};

/**
 * Handed to the body of a `runExclusive` section. Stores take it on writes: a
 * commit must come from the section that holds the key, and only until that
 * section ends.
 */
export class LockLease {
  private ended = false;

  constructor(private readonly keys: ReadonlySet<string>) {}

  covers(key: string): boolean {
    return !this.ended && this.keys.has(key);
  }

  end(): void {
    this.ended = true;
  }
}

/**
 * Per-entity mutual exclusion. Each key has its own FIFO queue, so unrelated
 * orders and drivers never wait on each other. Multi-key sections always take
 * keys in sorted order; with `driver:` sorting before `order:` a joint
 * driver+order step cannot deadlock against another one.
 */
@Injectable()
export class EntityLockService {
  private readonly logger = new Logger(EntityLockService.name);
  private readonly held = new Set<string>();
  private readonly waiters = new Map<string, Waiter[]>();
  private readonly waitTimeoutMs: number;

  constructor() {
    this.waitTimeoutMs = getOrderServiceEnv().lockWaitTimeoutMs;
  }

  static orderKey(orderId: string): string {
    return `order:${orderId}`;
  }

  static driverKey(driverId: string): string {
    return `driver:${driverId}`;
  }

  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  async runExclusive<T>(keys: string[], work: (lease: LockLease) => Promise<T> | T): Promise<T> {
    const ordered = Array.from(new Set(keys)).sort();
    const acquired: string[] = [];
    const lease = new LockLease(new Set(ordered));

    try {
      for (const key of ordered) {
        await this.acquire(key);
        acquired.push(key);
      }
      return await work(lease);
    } finally {
      lease.end();
      for (const key of acquired.reverse()) this.release(key);
    }
  }

  private acquire(key: string): Promise<void> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          if (waiter.timer) clearTimeout(waiter.timer);
          resolve();
        },
      };
      waiter.timer = setTimeout(() => {
        this.removeWaiter(key, waiter);
        this.logger.warn(`Lock wait on ${key} exceeded ${this.waitTimeoutMs}ms`);
        reject(new UnavailableError(`Resource ${key} is busy; retry the request`, "LockTimeout"));
      }, this.waitTimeoutMs);

      const queue = this.waiters.get(key) || [];
      queue.push(waiter);
      this.waiters.set(key, queue);
    });
  }

  private release(key: string): void {
    const queue = this.waiters.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) this.waiters.delete(key);

    // Ownership passes straight to the next waiter; the key stays held.
    if (next) {
      next.grant();
      return;
    }
    this.held.delete(key);
  }

  private removeWaiter(key: string, waiter: Waiter): void {
    const queue = this.waiters.get(key);
    if (!queue) return;
    const index = queue.indexOf(waiter);
    if (index >= 0) queue.splice(index, 1);
    if (queue.length === 0) this.waiters.delete(key);
  }
}
