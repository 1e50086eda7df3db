import Redis from "ioredis";

type Logger = (message: string) => void;

type MemoryEntry = {
  encoded: string;
  // null = no expiry
  expiresAt: number | null;
};

export interface NamespacedStateOptions {
  namespace: string;
  redisUrl?: string;
  log?: Logger;
}

/**
 * JSON values under `<namespace>:state:<key>`. Memory always holds a copy;
 * Redis is written through and read first once `redisUrl` connects. Redis
 * failures are logged and served from memory.
 */
export class NamespacedState {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly log: Logger;
  private client: Redis | null = null;
  private connecting: Promise<void> | null = null;

  constructor(private readonly options: NamespacedStateOptions) {
    this.log = options.log ?? (() => undefined);
  }

  connect(): Promise<void> {
    if (!this.connecting) this.connecting = this.openRedis();
    return this.connecting;
  }

  usesRedis(): boolean {
    return this.client !== null;
  }

  async read<T>(key: string): Promise<T | null> {
    await this.connect();
    const fullKey = this.fullKey(key);

    if (this.client) {
      try {
        const stored = await this.client.get(fullKey);
        if (stored !== null) return this.decode<T>(stored);
      } catch (error) {
        this.log(`redis read of ${fullKey} failed, serving memory: ${String(error)}`);
      }
    }

    const entry = this.entries.get(fullKey);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.entries.delete(fullKey);
      return null;
    }
    return this.decode<T>(entry.encoded);
  }

  async write<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    await this.connect();
    const fullKey = this.fullKey(key);
    const encoded = JSON.stringify(value);
    const now = Date.now();
    this.sweepExpired(now);
    const expiresAt = ttlSeconds ? now + ttlSeconds * 1000 : null;
    this.entries.set(fullKey, { encoded, expiresAt });

    if (!this.client) return;
    try {
      await (ttlSeconds ? this.client.set(fullKey, encoded, "EX", ttlSeconds) : this.client.set(fullKey, encoded));
    } catch (error) {
      this.log(`redis write of ${fullKey} failed, kept in memory: ${String(error)}`);
    }
  }

  /** Entries held in memory, expired ones not yet swept included. */
  memorySize(): number {
    return this.entries.size;
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) await client.quit();
  }

  private async openRedis(): Promise<void> {
    const { redisUrl, namespace } = this.options;
    if (!redisUrl) return;

    const client = new Redis(redisUrl, { lazyConnect: true, maxRetriesPerRequest: 1 });
    try {
      await client.connect();
      this.client = client;
      this.log(`${namespace}: state mirrored to redis`);
    } catch (error) {
      client.disconnect();
      this.log(`${namespace}: redis unreachable, state stays in memory (${String(error)})`);
    }
  }

  // read() only evicts the key it touches.
  private sweepExpired(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) this.entries.delete(key);
    }
  }

  private decode<T>(encoded: string): T {
    const value: T = JSON.parse(encoded);
    return value;
  }

  private fullKey(key: string): string {
    return `${this.options.namespace}:state:${key}`;
  }
}
