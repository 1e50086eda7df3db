export interface DriverRecord {
  driverId: string;
  name: string;
  phone: string;
  isAvailable: boolean;
  currentOrderId: string | null;
  registeredAtIso: string;
  assignedAtIso: string | null;
  availableAgainAtIso: string | null;
  updatedAtIso: string;
}

export interface RegisterDriverRequest {
  name: string;
  phone: string;
}

export interface DriverAvailabilityRequest {
  available: boolean;
}
