import { OrderRecord, OrderStatus } from "@dropline/types";
import { Injectable } from "@nestjs/common";
import { IllegalTransitionError } from "../../common/domain-errors";
import { canTransition } from "./order-transitions";

export interface TransitionOutcome {
  order: OrderRecord;
  changed: boolean;
}

/**
 * Applies status changes against the transition table. It works on values
 * only; callers hold the order lock and commit the returned record.
 *
 * Re-requesting the status an order is already in is a no-op: the record is
 * returned untouched and no second timestamp is written.
 */
@Injectable()
export class LifecycleService {
  assertTransition(order: OrderRecord, target: OrderStatus): void {
    if (order.status === target) return;
    if (!canTransition(order.status, target)) {
      throw new IllegalTransitionError(order.status, target);
    }
  }

  transition(order: OrderRecord, target: OrderStatus, now: Date): TransitionOutcome {
    this.assertTransition(order, target);
    if (order.status === target) return { order, changed: false };

    const nowIso = now.toISOString();
    return {
      order: {
        ...order,
        status: target,
        statusTimestamps: { ...order.statusTimestamps, [target]: nowIso },
        updatedAtIso: nowIso,
      },
      changed: true,
    };
  }
}
