import { Module } from "@nestjs/common";
import { APP_INTERCEPTOR } from "@nestjs/core";
import { ClockService } from "./common/clock.service";
import { IdService } from "./common/id.service";
import { AccessService } from "./modules/access/access.service";
import { ActorGuard } from "./modules/access/actor.guard";
import { ActorResolverService } from "./modules/access/actor-resolver.service";
import { AuditController } from "./modules/audit/audit.controller";
import { AuditService } from "./modules/audit/audit.service";
import { DispatchService } from "./modules/dispatch/dispatch.service";
import { DriverController } from "./modules/driver/driver.controller";
import { DriverService } from "./modules/driver/driver.service";
import { DriverStoreService } from "./modules/driver/storage/driver-store.service";
import { HealthController } from "./modules/health/health.controller";
import { LifecycleService } from "./modules/lifecycle/lifecycle.service";
import { EntityLockService } from "./modules/locking/entity-lock.service";
import { MetricsController } from "./modules/metrics/metrics.controller";
import { MetricsService } from "./modules/metrics/metrics.service";
import { RequestMetricsInterceptor } from "./modules/metrics/request-metrics.interceptor";
import { OrderController } from "./modules/order/order.controller";
import { OrderService } from "./modules/order/order.service";
import { OrderStoreService } from "./modules/order/storage/order-store.service";
import { PricingController } from "./modules/pricing/pricing.controller";
import { PricingService } from "./modules/pricing/pricing.service";
import { RealtimeEventsService } from "./modules/realtime/realtime-events.service";

/**
 * Everything except the socket gateway, so HTTP tests can boot the service
 * without a websocket server.
 */
@Module({
  controllers: [PricingController, OrderController, DriverController, AuditController, HealthController, MetricsController],
  providers: [
    ClockService,
    IdService,
    EntityLockService,
    OrderStoreService,
    DriverStoreService,
    PricingService,
    LifecycleService,
    AuditService,
    AccessService,
    ActorResolverService,
    ActorGuard,
    RealtimeEventsService,
    DispatchService,
    OrderService,
    DriverService,
    MetricsService,
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestMetricsInterceptor,
    },
  ],
  exports: [ActorResolverService, RealtimeEventsService],
})
export class CoreModule {}
