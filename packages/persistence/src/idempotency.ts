import { NamespacedState } from "./state";

export interface IdempotencyStoreOptions {
  namespace: string;
  ttlSeconds?: number;
  redisUrl?: string;
  log?: (message: string) => void;
}

export interface IdempotencyRecord<TResponse> {
  key: string;
  response: TResponse;
  createdAtIso: string;
  expiresAtUnixMs: number;
}

const DEFAULT_TTL_SECONDS = 300;

/** Keys are compared trimmed and case-insensitively. */
export function normalizeIdempotencyKey(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Remembers the response of a keyed operation for `ttlSeconds`. A repeat of
 * the key gets the remembered response; a repeat that arrives while the first
 * run is still going waits for that run. Failed runs are not remembered.
 */
export class IdempotencyStore<TResponse = unknown> {
  private readonly ttlSeconds: number;
  private readonly state: NamespacedState;
  private readonly running = new Map<string, Promise<TResponse>>();

  constructor(options: IdempotencyStoreOptions) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    this.state = new NamespacedState({
      namespace: `${options.namespace}:idempotency`,
      redisUrl: options.redisUrl,
      log: options.log,
    });
  }

  execute(key: string, handler: () => Promise<TResponse> | TResponse): Promise<TResponse> {
    const normalized = normalizeIdempotencyKey(key);
    const pending = this.running.get(normalized);
    if (pending) return pending;

    // Registered before the first await so a concurrent repeat joins this run.
    const run = this.runOnce(normalized, handler).finally(() => this.running.delete(normalized));
    this.running.set(normalized, run);
    return run;
  }

  async get(key: string): Promise<IdempotencyRecord<TResponse> | null> {
    const record = await this.state.read<IdempotencyRecord<TResponse>>(this.recordKey(normalizeIdempotencyKey(key)));
    if (!record || record.expiresAtUnixMs <= Date.now()) return null;
    return record;
  }

  close(): Promise<void> {
    return this.state.close();
  }

  private async runOnce(normalized: string, handler: () => Promise<TResponse> | TResponse): Promise<TResponse> {
    const remembered = await this.get(normalized);
    if (remembered) return remembered.response;

    const response = await handler();
    const createdAt = Date.now();
    await this.state.write<IdempotencyRecord<TResponse>>(
      this.recordKey(normalized),
      {
        key: normalized,
        response,
        createdAtIso: new Date(createdAt).toISOString(),
        expiresAtUnixMs: createdAt + this.ttlSeconds * 1000,
      },
      this.ttlSeconds,
    );
    return response;
  }

  private recordKey(normalized: string): string {
    return `key:${normalized}`;
  }
}
