import { Actor, DriverRecord } from "@dropline/types";
import { Injectable, Logger } from "@nestjs/common";
import { ClockService } from "../../common/clock.service";
import { ConflictError, ValidationError } from "../../common/domain-errors";
import { IdService } from "../../common/id.service";
import { AccessService } from "../access/access.service";
import { AuditService } from "../audit/audit.service";
import { RealtimeEventsService } from "../realtime/realtime-events.service";
import { DriverStoreService } from "./storage/driver-store.service";

const PHONE_PATTERN = /^\+?[0-9][0-9 ()-]{2,31}$/;

@Injectable()
export class DriverService {
  private readonly logger = new Logger(DriverService.name);

  constructor(
    private readonly drivers: DriverStoreService,
    private readonly access: AccessService,
    private readonly audit: AuditService,
    private readonly realtime: RealtimeEventsService,
    private readonly clock: ClockService,
    private readonly ids: IdService,
  ) {}

  async registerDriver(actor: Actor, name: string, phone: string): Promise<DriverRecord> {
    this.access.assertRole(actor, "driver.register", "driver");

    const trimmedName = name.trim();
    const trimmedPhone = phone.trim();
    if (!trimmedName) throw new ValidationError("name is required");
    if (!PHONE_PATTERN.test(trimmedPhone)) throw new ValidationError("phone is not a valid phone number");

    const nowIso = this.clock.nowIso();
    const driver = await this.drivers.insert({
      driverId: this.ids.driverId(),
      name: trimmedName,
      phone: trimmedPhone,
      isAvailable: true,
      currentOrderId: null,
      registeredAtIso: nowIso,
      assignedAtIso: null,
      availableAgainAtIso: null,
      updatedAtIso: nowIso,
    });

    this.audit.recordActor(actor, "driver.register", "SUCCESS", "driver", driver.driverId);
    this.logger.log(`Driver ${driver.driverId} registered`);
    this.realtime.driverChanged(driver);
    return driver;
  }

  listDrivers(actor: Actor): DriverRecord[] {
    this.access.assertRole(actor, "driver.list", "driver");
    return this.drivers.list();
  }

  getDriver(actor: Actor, driverId: string): DriverRecord {
    this.access.assertCanManageDriver(actor, driverId, "driver.view");
    return this.drivers.require(driverId);
  }

  /**
   * A driver holding an order cannot go available; going unavailable while
   * already unavailable (or busy) is a no-op.
   */
  async setAvailability(actor: Actor, driverId: string, available: boolean): Promise<DriverRecord> {
    this.access.assertCanManageDriver(actor, driverId, "driver.availability");

    const { driver, changed } = await this.drivers.update(driverId, (current) => {
      if (current.isAvailable === available) return current;
      const nowIso = this.clock.nowIso();
      if (!available) return { ...current, isAvailable: false, updatedAtIso: nowIso };

      if (current.currentOrderId !== null) {
        throw new ConflictError(`Driver ${driverId} is still delivering order ${current.currentOrderId}`, "DriverBusy");
      }
      return { ...current, isAvailable: true, availableAgainAtIso: nowIso, updatedAtIso: nowIso };
    });

    if (changed) {
      this.audit.recordActor(actor, "driver.availability", "SUCCESS", "driver", driverId, { available });
      this.logger.log(`Driver ${driverId} is now ${available ? "available" : "unavailable"}`);
      this.realtime.driverChanged(driver);
    }
    return driver;
  }
}
