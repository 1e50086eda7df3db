import {
  Actor,
  ArrivalAck,
  CreateOrderRequest,
  DELIVERY_TYPES,
  DeliveryType,
  OrderRecord,
  OrderStatus,
  Quote,
} from "@dropline/types";
import { IdempotencyStore } from "@dropline/persistence";
import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { ClockService } from "../../common/clock.service";
import { ForbiddenError, PreconditionFailedError, ValidationError } from "../../common/domain-errors";
import { IdService } from "../../common/id.service";
import { getOrderServiceEnv } from "../../config/env";
import { AccessService, ProtectedAction } from "../access/access.service";
import { AuditService } from "../audit/audit.service";
import { DispatchService } from "../dispatch/dispatch.service";
import { LifecycleService } from "../lifecycle/lifecycle.service";
import { PricingService } from "../pricing/pricing.service";
import { RealtimeEventsService } from "../realtime/realtime-events.service";
import { OrderStoreService } from "./storage/order-store.service";

type Prepare = (current: OrderRecord, now: Date) => OrderRecord;

function isDeliveryType(value: string): value is DeliveryType {
  return DELIVERY_TYPES.some((type) => type === value);
}

@Injectable()
export class OrderService implements OnModuleDestroy {
  private readonly logger = new Logger(OrderService.name);
  private readonly env = getOrderServiceEnv();
  private readonly idempotency = new IdempotencyStore<OrderRecord>({
    namespace: "order-service",
    ttlSeconds: this.env.idempotencyTtlSeconds,
    redisUrl: this.env.redisUrl,
    log: (message) => this.logger.log(message),
  });

  constructor(
    private readonly pricing: PricingService,
    private readonly orders: OrderStoreService,
    private readonly lifecycle: LifecycleService,
    private readonly dispatch: DispatchService,
    private readonly access: AccessService,
    private readonly audit: AuditService,
    private readonly realtime: RealtimeEventsService,
    private readonly clock: ClockService,
    private readonly ids: IdService,
  ) {}

  async onModuleDestroy(): Promise<void> {
    await this.idempotency.close();
  }

  /**
   * Creates a `pending` order with a frozen quote. With an idempotency key the
   * same customer gets the originally created order back for the key's TTL.
   */
  async createOrder(actor: Actor, request: CreateOrderRequest, idempotencyKey?: string): Promise<OrderRecord> {
    this.access.assertRole(actor, "order.create");

    const restaurantId = request.restaurantId?.trim();
    if (!restaurantId) throw new ValidationError("restaurantId is required");

    const deliveryType = request.deliveryType ?? "hand_to_customer";
    if (!isDeliveryType(deliveryType)) {
      throw new ValidationError(`deliveryType must be one of ${DELIVERY_TYPES.join(", ")}`);
    }

    const customerId = this.resolveCustomerId(actor, request.customerId);
    const quote = this.pricing.quote(request);

    const key = idempotencyKey?.trim();
    if (!key) return this.insertOrder(actor, restaurantId, customerId, deliveryType, quote);

    const created = await this.idempotency.execute(`create:${customerId}:${key}`, () =>
      this.insertOrder(actor, restaurantId, customerId, deliveryType, quote),
    );
    // A replayed record can name an order this process never held (Redis outlives it).
    return this.orders.find(created.orderId) ?? created;
  }

  getOrder(actor: Actor, orderId: string): OrderRecord {
    const order = this.orders.require(orderId);
    this.access.assertCanAct(actor, order, "order.view");
    return order;
  }

  listOrders(actor: Actor): OrderRecord[] {
    this.access.assertRole(actor, "order.list");
    return this.orders.list((order) => this.access.canAct(actor, order));
  }

  async confirmOrder(actor: Actor, orderId: string): Promise<OrderRecord> {
    this.access.assertCanAct(actor, this.orders.require(orderId), "order.confirm");
    return this.advance(actor, orderId, "confirmed", "order.confirm");
  }

  async cancelOrder(actor: Actor, orderId: string): Promise<OrderRecord> {
    this.access.assertCanAct(actor, this.orders.require(orderId), "order.cancel");
    const outcome = await this.dispatch.closeOrder(actor, orderId, "cancelled", "order.cancel");
    return outcome.order;
  }

  /**
   * Admin override. Still bound by the transition table and by the same
   * preconditions the driver flow meets: binding only happens through
   * assignment, `picked_up` needs the pickup photo, and `delivered` needs a
   * recorded arrival plus delivery proof.
   */
  async setStatus(actor: Actor, orderId: string, target: OrderStatus): Promise<OrderRecord> {
    this.access.assertRole(actor, "order.set_status", "order", orderId);
    const order = this.orders.require(orderId);

    if (target === "assigned") {
      if (order.status === "assigned") return order;
      throw new PreconditionFailedError("Orders become assigned only through driver assignment");
    }
    if (target === "delivered" || target === "cancelled") {
      const outcome = await this.dispatch.closeOrder(actor, orderId, target, "order.set_status");
      return outcome.order;
    }
    if (target === "picked_up") {
      return this.advance(actor, orderId, target, "order.set_status", (current) => {
        if (!current.pickupPhotoRef) {
          throw new PreconditionFailedError("A pickup photo must be recorded before pickup");
        }
        return current;
      });
    }
    return this.advance(actor, orderId, target, "order.set_status");
  }

  async confirmPickup(actor: Actor, orderId: string, driverId: string, photoRef?: string): Promise<OrderRecord> {
    const snapshot = this.orders.require(orderId);
    this.access.assertCanAct(actor, snapshot, "delivery.pickup");
    this.access.assertDriverClaim(actor, snapshot, driverId, "delivery.pickup");

    const ref = photoRef?.trim();
    if (!ref) throw new ValidationError("A pickup photo is required", "MissingProof");

    return this.advance(actor, orderId, "picked_up", "delivery.pickup", (current) => ({
      ...current,
      pickupPhotoRef: ref,
    }));
  }

  async startDelivery(actor: Actor, orderId: string, driverId: string): Promise<OrderRecord> {
    const snapshot = this.orders.require(orderId);
    this.access.assertCanAct(actor, snapshot, "delivery.start");
    this.access.assertDriverClaim(actor, snapshot, driverId, "delivery.start");

    return this.advance(actor, orderId, "en_route", "delivery.start", (current, now) => ({
      ...current,
      deliveryStartedAtIso: now.toISOString(),
    }));
  }

  async markArrival(actor: Actor, orderId: string): Promise<ArrivalAck> {
    this.access.assertCanAct(actor, this.orders.require(orderId), "delivery.arrive");

    const { order, changed } = await this.orders.update(orderId, (current) => {
      if (current.status !== "en_route") {
        throw new PreconditionFailedError(`Arrival can only be recorded en route; order is ${current.status}`);
      }
      if (current.arrivedAtIso) return current;
      const nowIso = this.clock.nowIso();
      return { ...current, arrivedAtIso: nowIso, updatedAtIso: nowIso };
    });

    const arrivedAtIso = order.arrivedAtIso;
    if (!arrivedAtIso) throw new Error(`Order ${orderId} has no arrival time after an update`);

    if (changed) {
      this.audit.recordActor(actor, "delivery.arrive", "SUCCESS", "order", orderId);
      this.realtime.orderChanged("order.updated", order);
    }
    return { orderId, status: order.status, arrivedAtIso };
  }

  private async advance(
    actor: Actor,
    orderId: string,
    target: OrderStatus,
    action: ProtectedAction,
    prepare?: Prepare,
  ): Promise<OrderRecord> {
    const { order, changed } = await this.orders.update(orderId, (current) => {
      if (current.status === target) return current;
      this.lifecycle.assertTransition(current, target);
      const now = this.clock.now();
      const prepared = prepare ? prepare(current, now) : current;
      return this.lifecycle.transition(prepared, target, now).order;
    });

    if (changed) {
      this.audit.recordActor(actor, action, "SUCCESS", "order", orderId, { status: target });
      this.logger.log(`Order ${orderId} moved to ${target}`);
      this.realtime.orderChanged("order.updated", order);
    }
    return order;
  }

  private resolveCustomerId(actor: Actor, requested?: string): string {
    const customerId = requested?.trim();
    if (actor.role === "admin") return customerId || actor.identity;
    if (customerId && customerId !== actor.identity) {
      this.audit.recordActor(actor, "order.create", "FAILURE", "order", undefined, { reason: "customer_mismatch" });
      throw new ForbiddenError("Customers can only create orders for themselves");
    }
    return actor.identity;
  }

  private async insertOrder(
    actor: Actor,
    restaurantId: string,
    customerId: string,
    deliveryType: DeliveryType,
    quote: Quote,
  ): Promise<OrderRecord> {
    const nowIso = this.clock.nowIso();
    const order = await this.orders.insert({
      orderId: this.ids.orderId(),
      restaurantId,
      customerId,
      status: "pending",
      quote,
      deliveryType,
      statusTimestamps: { pending: nowIso },
      dispatch: { kind: "unassigned" },
      pickupPhotoRef: null,
      deliveryStartedAtIso: null,
      arrivedAtIso: null,
      deliveryProof: null,
      deliveredAtIso: null,
      payoutsFinalized: null,
      cancelledBy: null,
      lastLocation: null,
      locationHistory: [],
      createdAtIso: nowIso,
      updatedAtIso: nowIso,
    });

    this.audit.recordActor(actor, "order.create", "SUCCESS", "order", order.orderId, {
      customerTotal: quote.customerTotal,
    });
    this.logger.log(`Order ${order.orderId} created for customer ${customerId}`);
    this.realtime.orderChanged("order.created", order);
    return order;
  }
}
