import { DriverRecord } from "./driver";
import { OrderRecord } from "./order";

export interface RealtimeOrderEvent {
  type: "order.created" | "order.updated";
  order: OrderRecord;
  emittedAtIso: string;
  targetActorKeys: string[];
}

export interface RealtimeDriverEvent {
  type: "driver.updated";
  driver: DriverRecord;
  emittedAtIso: string;
  targetActorKeys: string[];
}

export type RealtimeEvent = RealtimeOrderEvent | RealtimeDriverEvent;
