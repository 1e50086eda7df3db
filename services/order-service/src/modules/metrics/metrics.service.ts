import { Injectable } from "@nestjs/common";

export type RequestMetric = {
  method: string;
  route: string;
  status: number;
  durationMs: number;
  atUnixMs: number;
  /** Domain rejection code (e.g. `DriverUnavailable`), when the handler threw one. */
  errorCode?: string;
};

type LatencySummary = {
  requests: number;
  errors: number;
  errorRate: number;
  p50Ms: number;
  p95Ms: number;
};

type RouteSnapshot = LatencySummary & { key: string };

export type MetricsSnapshot = LatencySummary & {
  service: string;
  windowSeconds: number;
  rejections: Array<{ code: string; count: number }>;
  routes: RouteSnapshot[];
  alerts: string[];
  generatedAtIso: string;
};

// Rejections that mean callers lost a race for a driver or an entity lock.
const CONTENTION_CODES = new Set(["DriverUnavailable", "NoDriversAvailable", "LockTimeout", "Contention"]);
const MIN_REQUESTS_FOR_ALERTS = 20;

@Injectable()
export class MetricsService {
  private readonly serviceName = "order-service";
  private readonly maxPoints = 20000;
  private readonly metrics: RequestMetric[] = [];

  record(metric: RequestMetric): void {
    this.metrics.push(metric);
    if (this.metrics.length > this.maxPoints) {
      this.metrics.splice(0, this.metrics.length - this.maxPoints);
    }
  }

  snapshot(windowSeconds = 300, nowUnixMs = Date.now()): MetricsSnapshot {
    const start = nowUnixMs - (windowSeconds * 1000);
    const windowed = this.metrics.filter((m) => m.atUnixMs >= start);
    const overall = this.summarize(windowed);

    const byRoute = new Map<string, RequestMetric[]>();
    const byCode = new Map<string, number>();
    for (const point of windowed) {
      const key = `${point.method} ${point.route}`;
      byRoute.set(key, [...(byRoute.get(key) || []), point]);
      if (point.errorCode) byCode.set(point.errorCode, (byCode.get(point.errorCode) || 0) + 1);
    }

    const routes = Array.from(byRoute.entries())
      .map(([key, points]) => ({ key, ...this.summarize(points) }))
      .sort((a, b) => b.requests - a.requests)
      .slice(0, 20);
    const rejections = Array.from(byCode.entries())
      .map(([code, count]) => ({ code, count }))
      .sort((a, b) => b.count - a.count);

    const contended = rejections
      .filter((rejection) => CONTENTION_CODES.has(rejection.code))
      .reduce((sum, rejection) => sum + rejection.count, 0);

    const alerts: string[] = [];
    if (overall.requests >= MIN_REQUESTS_FOR_ALERTS) {
      if (overall.errorRate >= 0.05) alerts.push("HIGH_ERROR_RATE");
      if (overall.p95Ms >= 800) alerts.push("HIGH_P95_LATENCY");
      if (this.rate(contended, overall.requests) >= 0.2) alerts.push("HIGH_CONTENTION");
    }

    return {
      service: this.serviceName,
      windowSeconds,
      ...overall,
      rejections,
      routes,
      alerts,
      generatedAtIso: new Date(nowUnixMs).toISOString(),
    };
  }

  private summarize(points: RequestMetric[]): LatencySummary {
    const errors = points.filter((p) => p.status >= 500).length;
    const durations = points.map((p) => p.durationMs);
    return {
      requests: points.length,
      errors,
      errorRate: this.rate(errors, points.length),
      p50Ms: this.percentile(durations, 50),
      p95Ms: this.percentile(durations, 95),
    };
  }

  private rate(part: number, total: number): number {
    return total === 0 ? 0 : Number((part / total).toFixed(4));
  }

  private percentile(values: number[], p: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.min(sorted.length - 1, Math.max(0, Math.ceil((p / 100) * sorted.length) - 1));
    return sorted[idx];
  }
}
