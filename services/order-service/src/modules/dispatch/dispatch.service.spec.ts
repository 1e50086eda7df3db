import {
  ADMIN,
  Harness,
  START_ISO,
  STANDARD_ORDER,
  assignedOrder,
  confirmedOrder,
  createHarness,
  customer,
  driverActor,
  registerDriver,
} from "../../testing/harness";

async function driveToArrival(h: Harness, orderId: string, driverId: string): Promise<void> {
  const driver = driverActor(driverId);
  await h.orderService.confirmPickup(driver, orderId, driverId, "photos/pickup.jpg");
  await h.orderService.startDelivery(driver, orderId, driverId);
  await h.orderService.markArrival(driver, orderId);
}

describe("DispatchService", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe("assignDriver", () => {
    it("binds the requested driver and locks both payouts", async () => {
      const driver = await registerDriver(h);
      const confirmed = await confirmedOrder(h);
      h.clock.advance(60_000);

      const order = await h.dispatch.assignDriver(ADMIN, confirmed.orderId, driver.driverId);

      expect(order.status).toBe("assigned");
      expect(order.dispatch).toEqual({
        kind: "assigned",
        driverId: driver.driverId,
        driverPayout: 2,
        platformPayout: 3,
        assignedAtIso: "2026-03-02T09:01:00.000Z",
      });
      expect(order.statusTimestamps.assigned).toBe("2026-03-02T09:01:00.000Z");
      expect(h.drivers.require(driver.driverId)).toMatchObject({
        isAvailable: false,
        currentOrderId: order.orderId,
        assignedAtIso: "2026-03-02T09:01:00.000Z",
      });
    });

    it("auto-assigns the earliest registered free driver", async () => {
      const first = await registerDriver(h, "First");
      const second = await registerDriver(h, "Second");
      const third = await registerDriver(h, "Third");
      await h.driverService.setAvailability(ADMIN, first.driverId, false);
      const confirmed = await confirmedOrder(h);

      const order = await h.dispatch.assignDriver(ADMIN, confirmed.orderId);

      expect(order.dispatch.kind === "assigned" && order.dispatch.driverId).toBe(second.driverId);
      expect(h.drivers.require(third.driverId).isAvailable).toBe(true);
    });

    it("fails with NoDriversAvailable when nobody is free", async () => {
      const { driver } = await assignedOrder(h);
      const waiting = await confirmedOrder(h);

      await expect(h.dispatch.assignDriver(ADMIN, waiting.orderId)).rejects.toMatchObject({
        kind: "Unavailable",
        code: "NoDriversAvailable",
      });
      expect(h.orders.require(waiting.orderId).status).toBe("confirmed");
      expect(h.drivers.require(driver.driverId).currentOrderId).not.toBe(waiting.orderId);
    });

    it("treats re-assigning the same driver as a no-op", async () => {
      const { order, driver } = await assignedOrder(h);
      const assignEvents = h.audit.list(100, "order.assign").length;
      h.clock.advance(5_000);

      const again = await h.dispatch.assignDriver(ADMIN, order.orderId, driver.driverId);
      const auto = await h.dispatch.assignDriver(ADMIN, order.orderId);

      expect(again).toEqual(order);
      expect(auto).toEqual(order);
      expect(h.audit.list(100, "order.assign")).toHaveLength(assignEvents);
    });

    it("refuses to move a bound order to another driver", async () => {
      const { order } = await assignedOrder(h);
      const other = await registerDriver(h, "Other");

      await expect(h.dispatch.assignDriver(ADMIN, order.orderId, other.driverId)).rejects.toMatchObject({
        kind: "Conflict",
        code: "AlreadyAssigned",
      });
      expect(h.drivers.require(other.driverId).isAvailable).toBe(true);
    });

    it("requires a confirmed order", async () => {
      const driver = await registerDriver(h);
      const pending = await h.orderService.createOrder(customer(), STANDARD_ORDER);

      await expect(h.dispatch.assignDriver(ADMIN, pending.orderId, driver.driverId)).rejects.toMatchObject({
        kind: "PreconditionFailed",
      });
      expect(h.drivers.require(driver.driverId).isAvailable).toBe(true);
    });

    it("reports unknown orders and drivers", async () => {
      const confirmed = await confirmedOrder(h);

      await expect(h.dispatch.assignDriver(ADMIN, "ord_missing")).rejects.toMatchObject({ code: "OrderNotFound" });
      await expect(h.dispatch.assignDriver(ADMIN, confirmed.orderId, "drv_missing")).rejects.toMatchObject({
        code: "DriverNotFound",
      });
    });

    it("refuses an unavailable requested driver without touching the order", async () => {
      const driver = await registerDriver(h);
      await h.driverService.setAvailability(ADMIN, driver.driverId, false);
      const confirmed = await confirmedOrder(h);

      await expect(h.dispatch.assignDriver(ADMIN, confirmed.orderId, driver.driverId)).rejects.toMatchObject({
        kind: "Conflict",
        code: "DriverUnavailable",
      });
      expect(h.orders.require(confirmed.orderId)).toEqual(confirmed);
    });

    it("is admin only", async () => {
      const driver = await registerDriver(h);
      const confirmed = await confirmedOrder(h);

      await expect(h.dispatch.assignDriver(customer(), confirmed.orderId, driver.driverId)).rejects.toMatchObject({
        kind: "Forbidden",
        code: "RoleNotAllowed",
      });
      await expect(
        h.dispatch.assignDriver(driverActor(driver.driverId), confirmed.orderId, driver.driverId),
      ).rejects.toMatchObject({ kind: "Forbidden" });
    });

    it("lets exactly one of two concurrent assignments take the same driver", async () => {
      const driver = await registerDriver(h);
      const first = await confirmedOrder(h);
      const second = await confirmedOrder(h);

      const results = await Promise.allSettled([
        h.dispatch.assignDriver(ADMIN, first.orderId, driver.driverId),
        h.dispatch.assignDriver(ADMIN, second.orderId, driver.driverId),
      ]);

      expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
      const rejected = results[1];
      expect(rejected.status === "rejected" && rejected.reason).toMatchObject({
        kind: "Conflict",
        code: "DriverUnavailable",
      });
      expect(h.orders.require(second.orderId).status).toBe("confirmed");
      expect(h.drivers.require(driver.driverId).currentOrderId).toBe(first.orderId);
    });

    it("skips a candidate taken by a concurrent auto-assignment", async () => {
      const only = await registerDriver(h);
      const first = await confirmedOrder(h);
      const second = await confirmedOrder(h);

      const results = await Promise.allSettled([
        h.dispatch.assignDriver(ADMIN, first.orderId),
        h.dispatch.assignDriver(ADMIN, second.orderId),
      ]);

      expect(results[0].status).toBe("fulfilled");
      expect(results[1].status === "rejected" && results[1].reason).toMatchObject({ code: "NoDriversAvailable" });
      expect(h.drivers.require(only.driverId).currentOrderId).toBe(first.orderId);
    });
  });

  describe("reportLocation", () => {
    it("records the point and acknowledges it", async () => {
      const { order, driver } = await assignedOrder(h);

      const ack = await h.dispatch.reportLocation(driverActor(driver.driverId), order.orderId, 40.7, -73.9, 12);

      expect(ack).toEqual({
        orderId: order.orderId,
        lastLocation: { lat: 40.7, lng: -73.9, accuracy: 12, recordedAtIso: START_ISO },
        historySize: 1,
      });
      expect(h.orders.require(order.orderId).lastLocation).toEqual(ack.lastLocation);
    });

    it("evicts the oldest points beyond the history limit", async () => {
      const originalLimit = process.env.LOCATION_HISTORY_LIMIT;
      process.env.LOCATION_HISTORY_LIMIT = "3";
      try {
        h = createHarness();
        const { order, driver } = await assignedOrder(h);

        let ack = await h.dispatch.reportLocation(driverActor(driver.driverId), order.orderId, 1, 1);
        for (const lat of [2, 3, 4, 5]) {
          ack = await h.dispatch.reportLocation(driverActor(driver.driverId), order.orderId, lat, 1);
        }

        expect(ack.historySize).toBe(3);
        expect(h.orders.require(order.orderId).locationHistory.map((point) => point.lat)).toEqual([3, 4, 5]);
        expect(ack.lastLocation.lat).toBe(5);
      } finally {
        if (originalLimit === undefined) delete process.env.LOCATION_HISTORY_LIMIT;
        else process.env.LOCATION_HISTORY_LIMIT = originalLimit;
      }
    });

    it("rejects out-of-range coordinates", async () => {
      const { order, driver } = await assignedOrder(h);

      await expect(h.dispatch.reportLocation(driverActor(driver.driverId), order.orderId, 91, 0)).rejects.toMatchObject({
        kind: "ValidationError",
      });
      await expect(h.dispatch.reportLocation(driverActor(driver.driverId), order.orderId, 0, -180.5)).rejects.toMatchObject({
        kind: "ValidationError",
      });
      await expect(h.dispatch.reportLocation(driverActor(driver.driverId), order.orderId, 0, 0, -1)).rejects.toMatchObject({
        kind: "ValidationError",
      });
    });

    it("only accepts the bound driver", async () => {
      const { order } = await assignedOrder(h);
      const stranger = await registerDriver(h, "Stranger");

      await expect(h.dispatch.reportLocation(driverActor(stranger.driverId), order.orderId, 1, 1)).rejects.toMatchObject({
        kind: "Forbidden",
      });
    });

    it("refuses updates outside an active delivery", async () => {
      const confirmed = await confirmedOrder(h);

      await expect(h.dispatch.reportLocation(ADMIN, confirmed.orderId, 1, 1)).rejects.toMatchObject({
        kind: "PreconditionFailed",
      });
    });
  });

  describe("completeDelivery", () => {
    it("requires a recorded arrival", async () => {
      const { order, driver } = await assignedOrder(h);
      await h.orderService.confirmPickup(driverActor(driver.driverId), order.orderId, driver.driverId, "photos/pickup.jpg");
      await h.orderService.startDelivery(driverActor(driver.driverId), order.orderId, driver.driverId);

      await expect(
        h.dispatch.completeDelivery(driverActor(driver.driverId), order.orderId, driver.driverId, undefined, true),
      ).rejects.toMatchObject({ kind: "PreconditionFailed", code: "ArrivalMissing" });
    });

    it("requires the handoff to be confirmed for hand-to-customer orders", async () => {
      const { order, driver } = await assignedOrder(h);
      await driveToArrival(h, order.orderId, driver.driverId);

      await expect(
        h.dispatch.completeDelivery(driverActor(driver.driverId), order.orderId, driver.driverId),
      ).rejects.toMatchObject({ kind: "ValidationError", code: "MissingProof" });
      expect(h.orders.require(order.orderId).status).toBe("en_route");
      expect(h.drivers.require(driver.driverId).isAvailable).toBe(false);
    });

    it("requires a photo for leave-at-door orders", async () => {
      const { order, driver } = await assignedOrder(h, { ...STANDARD_ORDER, deliveryType: "leave_at_door" });
      await driveToArrival(h, order.orderId, driver.driverId);

      await expect(
        h.dispatch.completeDelivery(driverActor(driver.driverId), order.orderId, driver.driverId, "  ", true),
      ).rejects.toMatchObject({ code: "MissingProof" });

      const delivered = await h.dispatch.completeDelivery(
        driverActor(driver.driverId),
        order.orderId,
        driver.driverId,
        "photos/door.jpg",
      );
      expect(delivered.deliveryProof).toEqual({ kind: "photo", photoRef: "photos/door.jpg" });
    });

    it("finalizes the locked payouts and releases the driver", async () => {
      const { order, driver } = await assignedOrder(h);
      await driveToArrival(h, order.orderId, driver.driverId);
      h.clock.advance(120_000);

      const delivered = await h.dispatch.completeDelivery(
        driverActor(driver.driverId),
        order.orderId,
        driver.driverId,
        undefined,
        true,
      );

      expect(delivered.status).toBe("delivered");
      expect(delivered.deliveredAtIso).toBe("2026-03-02T09:02:00.000Z");
      expect(delivered.deliveryProof).toEqual({ kind: "handoff", confirmedAtIso: "2026-03-02T09:02:00.000Z" });
      expect(delivered.payoutsFinalized).toEqual({ driverPayout: 2, platformPayout: 3 });
      expect(h.drivers.require(driver.driverId)).toMatchObject({
        isAvailable: true,
        currentOrderId: null,
        availableAgainAtIso: "2026-03-02T09:02:00.000Z",
      });
    });

    it("is a no-op when repeated", async () => {
      const { order, driver } = await assignedOrder(h);
      await driveToArrival(h, order.orderId, driver.driverId);
      const delivered = await h.dispatch.completeDelivery(driverActor(driver.driverId), order.orderId, driver.driverId, undefined, true);
      h.clock.advance(30_000);

      const again = await h.dispatch.completeDelivery(driverActor(driver.driverId), order.orderId, driver.driverId, undefined, true);

      expect(again).toEqual(delivered);
    });

    it("rejects an admin naming the wrong driver", async () => {
      const { order, driver } = await assignedOrder(h);
      await driveToArrival(h, order.orderId, driver.driverId);

      await expect(h.dispatch.completeDelivery(ADMIN, order.orderId, "drv_other", undefined, true)).rejects.toMatchObject({
        kind: "Forbidden",
        code: "DriverMismatch",
      });
    });
  });

  describe("closeOrder", () => {
    it("releases the driver of a cancelled order and keeps the binding as history", async () => {
      const { order, driver } = await assignedOrder(h);

      const outcome = await h.dispatch.closeOrder(customer(), order.orderId, "cancelled", "order.cancel");

      expect(outcome.changed).toBe(true);
      expect(outcome.order.status).toBe("cancelled");
      expect(outcome.order.cancelledBy).toBe("customer");
      expect(outcome.order.dispatch).toEqual(order.dispatch);
      expect(outcome.releasedDriver).toMatchObject({ driverId: driver.driverId, isAvailable: true, currentOrderId: null });
    });

    it("emits realtime updates for the order and the released driver", async () => {
      const { order, driver } = await assignedOrder(h);
      h.events.length = 0;

      await h.dispatch.closeOrder(ADMIN, order.orderId, "cancelled", "order.set_status");

      expect(h.events.map((event) => event.type)).toEqual(["order.updated", "driver.updated"]);
      expect(h.events[0].targetActorKeys).toEqual(["customer:cust-1", "admin:ops", `driver:${driver.driverId}`]);
    });

    it("cannot cancel once the driver has picked up", async () => {
      const { order, driver } = await assignedOrder(h);
      await h.orderService.confirmPickup(driverActor(driver.driverId), order.orderId, driver.driverId, "photos/pickup.jpg");

      await expect(h.dispatch.closeOrder(ADMIN, order.orderId, "cancelled", "order.set_status")).rejects.toMatchObject({
        kind: "IllegalTransition",
      });
      expect(h.drivers.require(driver.driverId).isAvailable).toBe(false);
    });
  });
});
