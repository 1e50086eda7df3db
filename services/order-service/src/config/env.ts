export interface OrderServiceEnv {
  port: number;
  jwtSecret: string;
  locationHistoryLimit: number;
  lockWaitTimeoutMs: number;
  allowZeroMarginQuotes: boolean;
  idempotencyTtlSeconds: number;
  redisUrl?: string;
  sentryDsn?: string;
}

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function asBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function getOrderServiceEnv(): OrderServiceEnv {
  return {
    port: asNumber(process.env.ORDER_SERVICE_PORT, 4002),
    jwtSecret: process.env.AUTH_JWT_SECRET || "change-me-in-production",
    locationHistoryLimit: Math.max(1, Math.floor(asNumber(process.env.LOCATION_HISTORY_LIMIT, 50))),
    lockWaitTimeoutMs: Math.max(1, asNumber(process.env.LOCK_WAIT_TIMEOUT_MS, 2000)),
    allowZeroMarginQuotes: asBoolean(process.env.ALLOW_ZERO_MARGIN_QUOTES, false),
    idempotencyTtlSeconds: asNumber(process.env.IDEMPOTENCY_TTL_SEC, 900),
    redisUrl: process.env.REDIS_URL,
    sentryDsn: process.env.SENTRY_DSN_BACKEND,
  };
}
