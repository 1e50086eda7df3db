import { Controller, Get, Query } from "@nestjs/common";
import { MetricsService, MetricsSnapshot } from "./metrics.service";

@Controller("metrics")
export class MetricsController {
  constructor(private readonly metrics: MetricsService) {}

  @Get()
  metricsSnapshot(@Query("windowSec") windowSec?: string): MetricsSnapshot {
    const parsed = Number(windowSec || 300);
    return this.metrics.snapshot(Number.isFinite(parsed) && parsed > 0 ? parsed : 300);
  }
}
