import { Controller, Get } from "@nestjs/common";
import { ClockService } from "../../common/clock.service";

@Controller("health")
export class HealthController {
  constructor(private readonly clock: ClockService) {}

  @Get()
  getHealth(): { status: "ok"; service: string; timestamp: string } {
    return { status: "ok", service: "order-service", timestamp: this.clock.nowIso() };
  }
}
