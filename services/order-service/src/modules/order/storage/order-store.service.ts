import { OrderRecord, OrderStatus } from "@dropline/types";
import { Injectable } from "@nestjs/common";
import { NotFoundError } from "../../../common/domain-errors";
import { EntityLockService, LockLease } from "../../locking/entity-lock.service";

export interface OrderUpdate {
  order: OrderRecord;
  changed: boolean;
}

const BOUND_STATUSES: readonly OrderStatus[] = ["assigned", "picked_up", "en_route", "delivered"];

/**
 * Owns every order record. Reads hand out copies; writes go through
 * `update` (takes the order lock itself) or `replace` (caller passes the
 * lease of a section holding it, e.g. a joint driver+order step).
 */
@Injectable()
export class OrderStoreService {
  private readonly orders = new Map<string, OrderRecord>();

  constructor(private readonly locks: EntityLockService) {}

  lockKey(orderId: string): string {
    return EntityLockService.orderKey(orderId);
  }

  async insert(order: OrderRecord): Promise<OrderRecord> {
    return this.locks.runExclusive([this.lockKey(order.orderId)], () => {
      if (this.orders.has(order.orderId)) {
        throw new Error(`Order ${order.orderId} already exists`);
      }
      this.assertConsistent(order);
      this.orders.set(order.orderId, structuredClone(order));
      return structuredClone(order);
    });
  }

  find(orderId: string): OrderRecord | null {
    const order = this.orders.get(orderId);
    return order ? structuredClone(order) : null;
  }

  require(orderId: string): OrderRecord {
    const order = this.find(orderId);
    if (!order) throw new NotFoundError(`Order ${orderId} not found`, "OrderNotFound");
    return order;
  }

  list(predicate: (order: OrderRecord) => boolean = () => true): OrderRecord[] {
    return Array.from(this.orders.values())
      .filter(predicate)
      .map((order) => structuredClone(order));
  }

  /**
   * Runs `mutate` on the current record while holding the order lock. Return
   * the same object to signal "nothing changed".
   */
  async update(orderId: string, mutate: (current: OrderRecord) => OrderRecord): Promise<OrderUpdate> {
    return this.locks.runExclusive([this.lockKey(orderId)], (lease) => {
      const current = this.require(orderId);
      const next = mutate(current);
      const changed = next !== current;
      if (changed) this.replace(next, lease);
      return { order: structuredClone(next), changed };
    });
  }

  replace(order: OrderRecord, lease: LockLease): void {
    if (!lease.covers(this.lockKey(order.orderId))) {
      throw new Error(`Order ${order.orderId} written without holding its lock`);
    }
    if (!this.orders.has(order.orderId)) {
      throw new NotFoundError(`Order ${order.orderId} not found`, "OrderNotFound");
    }
    this.assertConsistent(order);
    this.orders.set(order.orderId, structuredClone(order));
  }

  private assertConsistent(order: OrderRecord): void {
    const bound = order.dispatch.kind === "assigned";
    if (BOUND_STATUSES.includes(order.status) && !bound) {
      throw new Error(`Order ${order.orderId} is ${order.status} without a bound driver`);
    }
    if (bound && (order.status === "pending" || order.status === "confirmed")) {
      throw new Error(`Order ${order.orderId} is ${order.status} but bound to a driver`);
    }
  }
}
