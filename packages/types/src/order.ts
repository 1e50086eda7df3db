import { ActorRole } from "./auth";

export const ORDER_STATUSES = [
  "pending",
  "confirmed",
  "assigned",
  "picked_up",
  "en_route",
  "delivered",
  "cancelled",
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const DELIVERY_TYPES = ["hand_to_customer", "leave_at_door"] as const;

export type DeliveryType = (typeof DELIVERY_TYPES)[number];

export interface QuoteInputs {
  foodSubtotal: number;
  platformFee: number;
  deliveryFee: number;
}

export interface Quote {
  foodSubtotal: number;
  fees: {
    platformFee: number;
    deliveryFee: number;
  };
  marginPool: number;
  payouts: {
    restaurant: number;
    platformNet: number;
    driverBase: number;
  };
  customerTotal: number;
  valid: true;
}

/**
 * Driver side of an order. An order is either bound to exactly one driver with
 * both payouts locked, or bound to nobody; there is no half-assigned state.
 */
export type DriverBinding =
  | { kind: "unassigned" }
  | {
      kind: "assigned";
      driverId: string;
      driverPayout: number;
      platformPayout: number;
      assignedAtIso: string;
    };

export type DeliveryProof =
  | { kind: "photo"; photoRef: string }
  | { kind: "handoff"; confirmedAtIso: string };

export interface LocationPoint {
  lat: number;
  lng: number;
  accuracy: number | null;
  recordedAtIso: string;
}

export interface FinalizedPayouts {
  driverPayout: number;
  platformPayout: number;
}

export interface OrderRecord {
  orderId: string;
  restaurantId: string;
  customerId: string;
  status: OrderStatus;
  quote: Quote;
  deliveryType: DeliveryType;
  statusTimestamps: Partial<Record<OrderStatus, string>>;
  dispatch: DriverBinding;
  pickupPhotoRef: string | null;
  deliveryStartedAtIso: string | null;
  arrivedAtIso: string | null;
  deliveryProof: DeliveryProof | null;
  deliveredAtIso: string | null;
  payoutsFinalized: FinalizedPayouts | null;
  cancelledBy: ActorRole | null;
  lastLocation: LocationPoint | null;
  locationHistory: LocationPoint[];
  createdAtIso: string;
  updatedAtIso: string;
}

export interface CreateOrderRequest extends QuoteInputs {
  restaurantId: string;
  deliveryType?: DeliveryType;
  customerId?: string;
}

export interface LocationAck {
  orderId: string;
  lastLocation: LocationPoint;
  historySize: number;
}

export interface ArrivalAck {
  orderId: string;
  status: OrderStatus;
  arrivedAtIso: string;
}
