import { PricingService } from "./pricing.service";

describe("PricingService", () => {
  const originalAllowZero = process.env.ALLOW_ZERO_MARGIN_QUOTES;

  afterEach(() => {
    if (originalAllowZero === undefined) delete process.env.ALLOW_ZERO_MARGIN_QUOTES;
    else process.env.ALLOW_ZERO_MARGIN_QUOTES = originalAllowZero;
  });

  it("splits the fee pool 60/40 between platform and driver", () => {
    const quote = new PricingService().quote({ foodSubtotal: 50, platformFee: 3, deliveryFee: 2 });

    expect(quote).toEqual({
      foodSubtotal: 50,
      fees: { platformFee: 3, deliveryFee: 2 },
      marginPool: 5,
      payouts: { restaurant: 50, platformNet: 3, driverBase: 2 },
      customerTotal: 55,
      valid: true,
    });
  });

  it("works in cents so decimal fees do not drift", () => {
    const quote = new PricingService().quote({ foodSubtotal: 12.34, platformFee: 0.1, deliveryFee: 0.2 });

    expect(quote.marginPool).toBe(0.3);
    expect(quote.payouts.platformNet).toBe(0.18);
    expect(quote.payouts.driverBase).toBe(0.12);
    expect(quote.customerTotal).toBe(12.64);
  });

  it("always reconstitutes the pool and the customer total", () => {
    const pricing = new PricingService();
    for (let cents = 1; cents <= 500; cents += 1) {
      const quote = pricing.quote({ foodSubtotal: 10, platformFee: cents / 100, deliveryFee: 0 });
      const poolCents = Math.round(quote.marginPool * 100);
      expect(poolCents).toBe(cents);
      expect(Math.round(quote.payouts.platformNet * 100) + Math.round(quote.payouts.driverBase * 100)).toBe(poolCents);
      expect(Math.round(quote.customerTotal * 100)).toBe(1000 + poolCents);
    }
  });

  it("rounds a single cent to the platform", () => {
    const quote = new PricingService().quote({ foodSubtotal: 1, platformFee: 0.01, deliveryFee: 0 });
    expect(quote.payouts).toEqual({ restaurant: 1, platformNet: 0.01, driverBase: 0 });
  });

  it("returns a frozen snapshot", () => {
    const quote = new PricingService().quote({ foodSubtotal: 20, platformFee: 1, deliveryFee: 1 });
    expect(Object.isFrozen(quote)).toBe(true);
    expect(Object.isFrozen(quote.payouts)).toBe(true);
    expect(Object.isFrozen(quote.fees)).toBe(true);
  });

  it.each([
    ["a zero subtotal", { foodSubtotal: 0, platformFee: 1, deliveryFee: 1 }],
    ["a negative platform fee", { foodSubtotal: 10, platformFee: -1, deliveryFee: 1 }],
    ["a negative delivery fee", { foodSubtotal: 10, platformFee: 1, deliveryFee: -0.5 }],
    ["a fraction of a cent", { foodSubtotal: 10.005, platformFee: 1, deliveryFee: 1 }],
    ["a non-finite amount", { foodSubtotal: Number.POSITIVE_INFINITY, platformFee: 1, deliveryFee: 1 }],
    ["NaN", { foodSubtotal: 10, platformFee: Number.NaN, deliveryFee: 1 }],
  ])("rejects %s", (_label, inputs) => {
    expect(() => new PricingService().quote(inputs)).toThrow(
      expect.objectContaining({ kind: "ValidationError", code: "InvalidInput" }),
    );
  });

  it("rejects an empty fee pool as degenerate", () => {
    expect(() => new PricingService().quote({ foodSubtotal: 10, platformFee: 0, deliveryFee: 0 })).toThrow(
      expect.objectContaining({ kind: "ValidationError", code: "DegenerateQuote" }),
    );
  });

  it("accepts an empty fee pool when zero-margin quotes are enabled", () => {
    process.env.ALLOW_ZERO_MARGIN_QUOTES = "true";
    const quote = new PricingService().quote({ foodSubtotal: 10, platformFee: 0, deliveryFee: 0 });

    expect(quote.marginPool).toBe(0);
    expect(quote.payouts).toEqual({ restaurant: 10, platformNet: 0, driverBase: 0 });
    expect(quote.customerTotal).toBe(10);
  });
});
