import { Quote, QuoteInputs } from "@dropline/types";
import { Injectable } from "@nestjs/common";
import { ValidationError } from "../../common/domain-errors";
import { getOrderServiceEnv } from "../../config/env";

const PLATFORM_SHARE_PERCENT = 60;
const DRIVER_SHARE_PERCENT = 40;

/**
 * Splits the fee pool (platform fee + delivery fee) 60/40 between platform
 * and driver. All arithmetic runs in integer cents; the driver share absorbs
 * any rounding remainder so the two shares always add back to the pool.
 */
@Injectable()
export class PricingService {
  private readonly allowZeroMargin: boolean;

  constructor() {
    this.allowZeroMargin = getOrderServiceEnv().allowZeroMarginQuotes;
  }

  quote(inputs: QuoteInputs): Quote {
    const foodSubtotalCents = this.toCents("foodSubtotal", inputs.foodSubtotal);
    const platformFeeCents = this.toCents("platformFee", inputs.platformFee);
    const deliveryFeeCents = this.toCents("deliveryFee", inputs.deliveryFee);

    if (foodSubtotalCents <= 0) throw new ValidationError("foodSubtotal must be greater than 0");
    if (platformFeeCents < 0) throw new ValidationError("platformFee must not be negative");
    if (deliveryFeeCents < 0) throw new ValidationError("deliveryFee must not be negative");

    const marginPoolCents = platformFeeCents + deliveryFeeCents;
    if (marginPoolCents <= 0 && !this.allowZeroMargin) {
      throw new ValidationError("Fee pool is empty; nothing to split", "DegenerateQuote");
    }

    const platformNetCents = Math.round((marginPoolCents * PLATFORM_SHARE_PERCENT) / 100);
    let driverBaseCents = Math.round((marginPoolCents * DRIVER_SHARE_PERCENT) / 100);
    if (platformNetCents + driverBaseCents !== marginPoolCents) {
      driverBaseCents = marginPoolCents - platformNetCents;
    }

    const quote: Quote = {
      foodSubtotal: this.fromCents(foodSubtotalCents),
      fees: {
        platformFee: this.fromCents(platformFeeCents),
        deliveryFee: this.fromCents(deliveryFeeCents),
      },
      marginPool: this.fromCents(marginPoolCents),
      payouts: {
        restaurant: this.fromCents(foodSubtotalCents),
        platformNet: this.fromCents(platformNetCents),
        driverBase: this.fromCents(driverBaseCents),
      },
      customerTotal: this.fromCents(foodSubtotalCents + marginPoolCents),
      valid: true,
    };

    Object.freeze(quote.fees);
    Object.freeze(quote.payouts);
    return Object.freeze(quote);
  }

  private toCents(field: string, value: number): number {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ValidationError(`${field} must be a finite number`);
    }
    const cents = Math.round(value * 100);
    if (Math.abs(value * 100 - cents) > 1e-6) {
      throw new ValidationError(`${field} must have at most 2 decimal places`);
    }
    return cents;
  }

  private fromCents(cents: number): number {
    return cents / 100;
  }
}
