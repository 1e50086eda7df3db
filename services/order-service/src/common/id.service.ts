import { Injectable } from "@nestjs/common";
import { randomUUID } from "crypto";

@Injectable()
export class IdService {
  orderId(): string {
    return `ord_${this.token(20)}`;
  }

  driverId(): string {
    return `drv_${this.token(16)}`;
  }

  auditId(): string {
    return `adt_${this.token(12)}`;
  }

  private token(length: number): string {
    return randomUUID().replace(/-/g, "").slice(0, length);
  }
}
