import { DriverRecord } from "@dropline/types";
import { Injectable } from "@nestjs/common";
import { NotFoundError } from "../../../common/domain-errors";
import { EntityLockService, LockLease } from "../../locking/entity-lock.service";

export interface DriverUpdate {
  driver: DriverRecord;
  changed: boolean;
}

@Injectable()
export class DriverStoreService {
  // Insertion order is registration order; auto-dispatch relies on it.
  private readonly drivers = new Map<string, DriverRecord>();

  constructor(private readonly locks: EntityLockService) {}

  lockKey(driverId: string): string {
    return EntityLockService.driverKey(driverId);
  }

  async insert(driver: DriverRecord): Promise<DriverRecord> {
    return this.locks.runExclusive([this.lockKey(driver.driverId)], () => {
      if (this.drivers.has(driver.driverId)) {
        throw new Error(`Driver ${driver.driverId} already exists`);
      }
      this.assertConsistent(driver);
      this.drivers.set(driver.driverId, { ...driver });
      return { ...driver };
    });
  }

  find(driverId: string): DriverRecord | null {
    const driver = this.drivers.get(driverId);
    return driver ? { ...driver } : null;
  }

  require(driverId: string): DriverRecord {
    const driver = this.find(driverId);
    if (!driver) throw new NotFoundError(`Driver ${driverId} not found`, "DriverNotFound");
    return driver;
  }

  list(predicate: (driver: DriverRecord) => boolean = () => true): DriverRecord[] {
    return Array.from(this.drivers.values())
      .filter(predicate)
      .map((driver) => ({ ...driver }));
  }

  async update(driverId: string, mutate: (current: DriverRecord) => DriverRecord): Promise<DriverUpdate> {
    return this.locks.runExclusive([this.lockKey(driverId)], (lease) => {
      const current = this.require(driverId);
      const next = mutate(current);
      const changed = next !== current;
      if (changed) this.replace(next, lease);
      return { driver: { ...next }, changed };
    });
  }

  replace(driver: DriverRecord, lease: LockLease): void {
    if (!lease.covers(this.lockKey(driver.driverId))) {
      throw new Error(`Driver ${driver.driverId} written without holding its lock`);
    }
    if (!this.drivers.has(driver.driverId)) {
      throw new NotFoundError(`Driver ${driver.driverId} not found`, "DriverNotFound");
    }
    this.assertConsistent(driver);
    this.drivers.set(driver.driverId, { ...driver });
  }

  private assertConsistent(driver: DriverRecord): void {
    if (driver.isAvailable && driver.currentOrderId !== null) {
      throw new Error(`Driver ${driver.driverId} is available while holding order ${driver.currentOrderId}`);
    }
  }
}
