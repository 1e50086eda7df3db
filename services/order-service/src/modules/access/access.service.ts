import { Actor, ActorRole, OrderRecord } from "@dropline/types";
import { Injectable } from "@nestjs/common";
import { ForbiddenError } from "../../common/domain-errors";
import { AuditService } from "../audit/audit.service";

export type ProtectedAction =
  | "order.create"
  | "order.view"
  | "order.list"
  | "order.confirm"
  | "order.cancel"
  | "order.set_status"
  | "order.assign"
  | "delivery.location"
  | "delivery.pickup"
  | "delivery.start"
  | "delivery.arrive"
  | "delivery.complete"
  | "driver.register"
  | "driver.list"
  | "driver.view"
  | "driver.availability"
  | "audit.read";

const ROLE_GATES: Record<ProtectedAction, readonly ActorRole[]> = {
  "order.create": ["customer", "admin"],
  "order.view": ["customer", "driver", "admin"],
  "order.list": ["customer", "driver", "admin"],
  "order.confirm": ["customer", "admin"],
  "order.cancel": ["customer", "admin"],
  "order.set_status": ["admin"],
  "order.assign": ["admin"],
  "delivery.location": ["driver", "admin"],
  "delivery.pickup": ["driver", "admin"],
  "delivery.start": ["driver", "admin"],
  "delivery.arrive": ["driver", "admin"],
  "delivery.complete": ["driver", "admin"],
  "driver.register": ["admin"],
  "driver.list": ["admin"],
  "driver.view": ["driver", "admin"],
  "driver.availability": ["driver", "admin"],
  "audit.read": ["admin"],
};

/**
 * Decides who may see or move an order. Every denial is written to the audit
 * log before the `Forbidden` error leaves.
 */
@Injectable()
export class AccessService {
  constructor(private readonly audit: AuditService) {}

  canAct(actor: Actor, order: OrderRecord): boolean {
    switch (actor.role) {
      case "admin":
        return true;
      case "customer":
        return order.customerId === actor.identity;
      case "driver":
        return order.dispatch.kind === "assigned" && order.dispatch.driverId === actor.driverId;
    }
  }

  isAllowed(actor: Actor, action: ProtectedAction): boolean {
    return ROLE_GATES[action].includes(actor.role);
  }

  assertRole(actor: Actor, action: ProtectedAction, resourceType = "order", resourceId?: string): void {
    if (this.isAllowed(actor, action)) return;
    this.deny(actor, action, resourceType, resourceId, "role");
    throw new ForbiddenError(`Role ${actor.role} may not perform ${action}`, "RoleNotAllowed");
  }

  assertCanAct(actor: Actor, order: OrderRecord, action: ProtectedAction): void {
    this.assertRole(actor, action, "order", order.orderId);
    if (this.canAct(actor, order)) return;
    this.deny(actor, action, "order", order.orderId, "ownership");
    throw new ForbiddenError(`Not allowed to access order ${order.orderId}`);
  }

  /**
   * A driver id carried in a request body must be the caller's own (for
   * drivers) and must be the driver the order is bound to (for everyone).
   */
  assertDriverClaim(actor: Actor, order: OrderRecord, claimedDriverId: string, action: ProtectedAction): void {
    if (actor.role === "driver" && actor.driverId !== claimedDriverId) {
      this.deny(actor, action, "order", order.orderId, "driver_claim");
      throw new ForbiddenError("Driver id does not match the authenticated driver", "DriverMismatch");
    }
    if (order.dispatch.kind !== "assigned" || order.dispatch.driverId !== claimedDriverId) {
      this.deny(actor, action, "order", order.orderId, "driver_binding");
      throw new ForbiddenError(`Order ${order.orderId} is not assigned to driver ${claimedDriverId}`, "DriverMismatch");
    }
  }

  assertCanManageDriver(actor: Actor, driverId: string, action: ProtectedAction): void {
    this.assertRole(actor, action, "driver", driverId);
    if (actor.role === "admin") return;
    if (actor.role === "driver" && actor.driverId === driverId) return;
    this.deny(actor, action, "driver", driverId, "ownership");
    throw new ForbiddenError(`Not allowed to manage driver ${driverId}`);
  }

  private deny(actor: Actor, action: ProtectedAction, resourceType: string, resourceId: string | undefined, reason: string): void {
    this.audit.recordActor(actor, action, "FAILURE", resourceType, resourceId, { reason });
  }
}
