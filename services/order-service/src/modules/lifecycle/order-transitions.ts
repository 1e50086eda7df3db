import { OrderStatus } from "@dropline/types";

export const ORDER_TRANSITIONS: { readonly [Status in OrderStatus]: readonly OrderStatus[] } = {
  pending: ["confirmed", "cancelled"],
  confirmed: ["assigned", "cancelled"],
  assigned: ["picked_up", "cancelled"],
  picked_up: ["en_route"],
  en_route: ["delivered"],
  delivered: [],
  cancelled: [],
};

/** Statuses during which a driver is on the job and may report location. */
export const ACTIVE_DELIVERY_STATUSES: readonly OrderStatus[] = ["assigned", "picked_up", "en_route"];

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function allowedTargets(from: OrderStatus): readonly OrderStatus[] {
  return ORDER_TRANSITIONS[from];
}

export function isTerminal(status: OrderStatus): boolean {
  return ORDER_TRANSITIONS[status].length === 0;
}
