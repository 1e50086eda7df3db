import { Actor, DeliveryProof, DriverRecord, LocationAck, OrderRecord } from "@dropline/types";
import { Injectable, Logger } from "@nestjs/common";
import { ClockService } from "../../common/clock.service";
import {
  ConflictError,
  PreconditionFailedError,
  UnavailableError,
  ValidationError,
} from "../../common/domain-errors";
import { getOrderServiceEnv } from "../../config/env";
import { AccessService } from "../access/access.service";
import { AuditService } from "../audit/audit.service";
import { DriverStoreService } from "../driver/storage/driver-store.service";
import { LifecycleService } from "../lifecycle/lifecycle.service";
import { ACTIVE_DELIVERY_STATUSES } from "../lifecycle/order-transitions";
import { EntityLockService, LockLease } from "../locking/entity-lock.service";
import { OrderStoreService } from "../order/storage/order-store.service";
import { RealtimeEventsService } from "../realtime/realtime-events.service";

export type ClosingStatus = "delivered" | "cancelled";

export interface SettleOutcome {
  order: OrderRecord;
  releasedDriver: DriverRecord | null;
  changed: boolean;
}

type AssignOutcome = {
  order: OrderRecord;
  driver: DriverRecord | null;
};

const MAX_REBIND_ATTEMPTS = 3;

function isFree(driver: DriverRecord): boolean {
  return driver.isAvailable && driver.currentOrderId === null;
}

function boundDriverId(order: OrderRecord): string | null {
  return order.dispatch.kind === "assigned" ? order.dispatch.driverId : null;
}

/**
 * Binds confirmed orders to drivers and unbinds them again when the order
 * closes. Every step that touches both an order and a driver runs under both
 * entity locks and commits both records together, after all checks passed.
 */
@Injectable()
export class DispatchService {
  private readonly logger = new Logger(DispatchService.name);
  private readonly historyLimit = getOrderServiceEnv().locationHistoryLimit;

  constructor(
    private readonly orders: OrderStoreService,
    private readonly drivers: DriverStoreService,
    private readonly locks: EntityLockService,
    private readonly lifecycle: LifecycleService,
    private readonly access: AccessService,
    private readonly audit: AuditService,
    private readonly realtime: RealtimeEventsService,
    private readonly clock: ClockService,
  ) {}

  async assignDriver(actor: Actor, orderId: string, requestedDriverId?: string): Promise<OrderRecord> {
    this.access.assertRole(actor, "order.assign", "order", orderId);
    const order = this.orders.require(orderId);
    if (requestedDriverId !== undefined) this.drivers.require(requestedDriverId);

    const alreadyBound = this.checkAssignable(order, requestedDriverId);
    if (alreadyBound) return alreadyBound;

    // Auto-dispatch: earliest registered free driver first. The list is a
    // snapshot, so each candidate is re-checked under its lock.
    const candidates = requestedDriverId !== undefined
      ? [requestedDriverId]
      : this.drivers.list(isFree).map((driver) => driver.driverId);

    for (const driverId of candidates) {
      const outcome = await this.locks.runExclusive(
        [this.drivers.lockKey(driverId), this.orders.lockKey(orderId)],
        (lease) => this.bindUnderLock(lease, orderId, driverId, requestedDriverId),
      );
      if (!outcome) continue;
      if (!outcome.driver) return outcome.order;

      this.audit.recordActor(actor, "order.assign", "SUCCESS", "order", orderId, {
        driverId,
        mode: requestedDriverId !== undefined ? "manual" : "auto",
      });
      this.logger.log(`Order ${orderId} assigned to driver ${driverId}`);
      this.realtime.orderChanged("order.updated", outcome.order);
      this.realtime.driverChanged(outcome.driver);
      return outcome.order;
    }

    throw new UnavailableError("No available drivers", "NoDriversAvailable");
  }

  async reportLocation(
    actor: Actor,
    orderId: string,
    lat: number,
    lng: number,
    accuracy?: number | null,
  ): Promise<LocationAck> {
    if (!Number.isFinite(lat) || lat < -90 || lat > 90) throw new ValidationError("lat must be within [-90, 90]");
    if (!Number.isFinite(lng) || lng < -180 || lng > 180) throw new ValidationError("lng must be within [-180, 180]");
    if (accuracy !== undefined && accuracy !== null && (!Number.isFinite(accuracy) || accuracy < 0)) {
      throw new ValidationError("accuracy must be a non-negative number");
    }

    this.access.assertCanAct(actor, this.orders.require(orderId), "delivery.location");

    const { order: updated } = await this.orders.update(orderId, (current) => {
      if (!ACTIVE_DELIVERY_STATUSES.includes(current.status)) {
        throw new PreconditionFailedError(`Location updates are not accepted while order is ${current.status}`);
      }
      const recordedAtIso = this.clock.nowIso();
      const point = { lat, lng, accuracy: accuracy ?? null, recordedAtIso };
      const history = [...current.locationHistory, point];
      return {
        ...current,
        lastLocation: point,
        locationHistory: history.slice(Math.max(0, history.length - this.historyLimit)),
        updatedAtIso: recordedAtIso,
      };
    });

    const lastLocation = updated.lastLocation;
    if (!lastLocation) throw new Error(`Order ${orderId} has no location after an update`);

    this.realtime.orderChanged("order.updated", updated);
    return { orderId, lastLocation, historySize: updated.locationHistory.length };
  }

  async completeDelivery(
    actor: Actor,
    orderId: string,
    driverId: string,
    photoRef?: string,
    handedToCustomer?: boolean,
  ): Promise<OrderRecord> {
    const snapshot = this.orders.require(orderId);
    this.access.assertCanAct(actor, snapshot, "delivery.complete");
    this.access.assertDriverClaim(actor, snapshot, driverId, "delivery.complete");

    const outcome = await this.settle(orderId, "delivered", (current, now) => {
      if (!current.arrivedAtIso) {
        throw new PreconditionFailedError("Arrival must be recorded before completing delivery", "ArrivalMissing");
      }
      return {
        ...current,
        deliveryProof: this.deliveryProof(current, now, photoRef, handedToCustomer),
        deliveredAtIso: now.toISOString(),
        payoutsFinalized: this.finalizedPayouts(current),
      };
    });

    this.afterSettle(actor, "delivery.complete", outcome);
    return outcome.order;
  }

  /**
   * Moves an order into a terminal status outside the driver delivery flow
   * (customer/admin cancellation, admin override) and frees its driver.
   * `delivered` is held to the arrival and proof checks of `completeDelivery`.
   */
  async closeOrder(actor: Actor, orderId: string, target: ClosingStatus, action: "order.cancel" | "order.set_status"): Promise<SettleOutcome> {
    const outcome = await this.settle(orderId, target, (current, now) => {
      if (target === "cancelled") return { ...current, cancelledBy: actor.role };
      if (!current.arrivedAtIso) {
        throw new PreconditionFailedError("Arrival must be recorded before delivery", "ArrivalMissing");
      }
      if (!current.deliveryProof) {
        throw new PreconditionFailedError("Delivery proof must be recorded before delivery");
      }
      return {
        ...current,
        deliveredAtIso: now.toISOString(),
        payoutsFinalized: this.finalizedPayouts(current),
      };
    });

    this.afterSettle(actor, action, outcome);
    return outcome;
  }

  private checkAssignable(order: OrderRecord, requestedDriverId?: string): OrderRecord | null {
    if (order.dispatch.kind === "assigned") {
      const sameRequest = requestedDriverId === undefined || requestedDriverId === order.dispatch.driverId;
      if (order.status === "assigned" && sameRequest) return order;
      throw new ConflictError(
        `Order ${order.orderId} is already assigned to driver ${order.dispatch.driverId}`,
        "AlreadyAssigned",
      );
    }
    if (order.status !== "confirmed") {
      throw new PreconditionFailedError(`Order must be confirmed before assignment; it is ${order.status}`);
    }
    return null;
  }

  private bindUnderLock(
    lease: LockLease,
    orderId: string,
    driverId: string,
    requestedDriverId?: string,
  ): AssignOutcome | null {
    const order = this.orders.require(orderId);
    const alreadyBound = this.checkAssignable(order, requestedDriverId);
    if (alreadyBound) return { order: alreadyBound, driver: null };

    const driver = this.drivers.require(driverId);
    if (!isFree(driver)) {
      if (requestedDriverId !== undefined) {
        throw new ConflictError(`Driver ${driverId} is not available`, "DriverUnavailable");
      }
      return null;
    }

    const now = this.clock.now();
    const nowIso = now.toISOString();
    const { order: assigned } = this.lifecycle.transition(
      {
        ...order,
        dispatch: {
          kind: "assigned",
          driverId,
          driverPayout: order.quote.payouts.driverBase,
          platformPayout: order.quote.payouts.platformNet,
          assignedAtIso: nowIso,
        },
      },
      "assigned",
      now,
    );
    const busy: DriverRecord = {
      ...driver,
      isAvailable: false,
      currentOrderId: orderId,
      assignedAtIso: nowIso,
      updatedAtIso: nowIso,
    };

    this.orders.replace(assigned, lease);
    this.drivers.replace(busy, lease);
    return { order: assigned, driver: busy };
  }

  private async settle(
    orderId: string,
    target: ClosingStatus,
    prepare: (current: OrderRecord, now: Date) => OrderRecord,
  ): Promise<SettleOutcome> {
    for (let attempt = 0; attempt < MAX_REBIND_ATTEMPTS; attempt += 1) {
      const expectedDriverId = boundDriverId(this.orders.require(orderId));
      const keys = [this.orders.lockKey(orderId)];
      if (expectedDriverId) keys.push(this.drivers.lockKey(expectedDriverId));

      const outcome = await this.locks.runExclusive(keys, (lease): SettleOutcome | null => {
        const current = this.orders.require(orderId);
        if (current.status === target) return { order: current, releasedDriver: null, changed: false };

        // Assigned between the unlocked read and the lock; retry holding the driver too.
        const driverId = boundDriverId(current);
        if (driverId !== expectedDriverId) return null;

        this.lifecycle.assertTransition(current, target);
        const now = this.clock.now();
        const { order: next } = this.lifecycle.transition(prepare(current, now), target, now);
        const releasedDriver = driverId ? this.releasedDriver(driverId, orderId, now) : null;

        this.orders.replace(next, lease);
        if (releasedDriver) this.drivers.replace(releasedDriver, lease);
        return { order: next, releasedDriver, changed: true };
      });
      if (outcome) return outcome;
    }

    throw new UnavailableError(`Order ${orderId} changed concurrently; retry the request`, "Contention");
  }

  private releasedDriver(driverId: string, orderId: string, now: Date): DriverRecord | null {
    const driver = this.drivers.require(driverId);
    if (driver.currentOrderId !== orderId) return null;
    const nowIso = now.toISOString();
    return {
      ...driver,
      isAvailable: true,
      currentOrderId: null,
      availableAgainAtIso: nowIso,
      updatedAtIso: nowIso,
    };
  }

  private deliveryProof(order: OrderRecord, now: Date, photoRef?: string, handedToCustomer?: boolean): DeliveryProof {
    if (order.deliveryType === "leave_at_door") {
      const ref = photoRef?.trim();
      if (!ref) throw new ValidationError("A delivery photo is required for leave_at_door orders", "MissingProof");
      return { kind: "photo", photoRef: ref };
    }
    if (handedToCustomer !== true) {
      throw new ValidationError("Handoff to the customer must be confirmed", "MissingProof");
    }
    return { kind: "handoff", confirmedAtIso: now.toISOString() };
  }

  private finalizedPayouts(order: OrderRecord): OrderRecord["payoutsFinalized"] {
    if (order.dispatch.kind !== "assigned") return null;
    return { driverPayout: order.dispatch.driverPayout, platformPayout: order.dispatch.platformPayout };
  }

  private afterSettle(actor: Actor, action: string, outcome: SettleOutcome): void {
    if (!outcome.changed) return;
    this.audit.recordActor(actor, action, "SUCCESS", "order", outcome.order.orderId, { status: outcome.order.status });
    this.realtime.orderChanged("order.updated", outcome.order);
    if (outcome.releasedDriver) {
      this.logger.log(`Driver ${outcome.releasedDriver.driverId} released from order ${outcome.order.orderId}`);
      this.realtime.driverChanged(outcome.releasedDriver);
    }
  }
}
