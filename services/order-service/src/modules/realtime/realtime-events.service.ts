import { Injectable } from "@nestjs/common";
import { DriverRecord, OrderRecord, RealtimeEvent, RealtimeOrderEvent } from "@dropline/types";
import { Subject } from "rxjs";
import { ClockService } from "../../common/clock.service";

export const ADMIN_ROOM = "admin:ops";

@Injectable()
export class RealtimeEventsService {
  private readonly eventsSubject = new Subject<RealtimeEvent>();
  readonly events$ = this.eventsSubject.asObservable();

  constructor(private readonly clock: ClockService) {}

  emit(event: RealtimeEvent): void {
    this.eventsSubject.next(event);
  }

  orderChanged(type: RealtimeOrderEvent["type"], order: OrderRecord): void {
    const targetActorKeys = [`customer:${order.customerId}`, ADMIN_ROOM];
    if (order.dispatch.kind === "assigned") targetActorKeys.push(`driver:${order.dispatch.driverId}`);

    this.emit({ type, order, emittedAtIso: this.clock.nowIso(), targetActorKeys });
  }

  driverChanged(driver: DriverRecord): void {
    this.emit({
      type: "driver.updated",
      driver,
      emittedAtIso: this.clock.nowIso(),
      targetActorKeys: [`driver:${driver.driverId}`, ADMIN_ROOM],
    });
  }
}
