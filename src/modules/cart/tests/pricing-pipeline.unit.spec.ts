import { describe, expect, it } from "vitest";
import type {
  ShippingFailureMode,
  TaxFailureMode,
} from "../../shared/infra/config.js";
import type { Coupon } from "../application/ports/outbound/coupon.port.js";
import type { ShippingOption } from "../application/ports/outbound/shipping-rate.port.js";
import { createPricingPipeline } from "../application/pricing/pricing-pipeline.js";
import type { CartEntity, CartItem } from "../domain/cart.entity.js";
import { PricingInputUnavailableError } from "../errors.js";
import {
  createFakeCoupons,
  createFakeCustomers,
  createFakePromotions,
  createFakeShipping,
  createMockLogger,
  makeCart,
  makeItem,
  NOW,
  uuid,
} from "./fakes.js";

describe("PricingPipeline", () => {
  function setup({
    customers = createFakeCustomers(),
    coupons = [],
    shippingOptions,
    taxFailureMode = "fail",
    shippingFailureMode = "fail",
  }: {
    customers?: ReturnType<typeof createFakeCustomers>;
    coupons?: Coupon[];
    shippingOptions?: ShippingOption[];
    taxFailureMode?: TaxFailureMode;
    shippingFailureMode?: ShippingFailureMode;
  } = {}) {
    const promotions = createFakePromotions();
    const shipping = createFakeShipping(shippingOptions);
    const logger = createMockLogger();
    const pipeline = createPricingPipeline({
      customers,
      promotions,
      coupons: createFakeCoupons(coupons),
      shipping,
      logger,
      config: { taxFailureMode, shippingFailureMode, flatShippingRate: 5.99 },
      now: () => NOW,
    });
    return { customers, promotions, shipping, logger, pipeline };
  }

  const guest = (items: CartItem[], overrides: Partial<CartEntity> = {}) =>
    makeCart({
      userId: null,
      sessionId: "session-1",
      cartType: "GUEST",
      items,
      ...overrides,
    });
  const member = (items: CartItem[], overrides: Partial<CartEntity> = {}) =>
    makeCart({ items, ...overrides });

  const twoLines = () => [
    makeItem({ id: uuid(901), productId: "product-a", unitPrice: 10, quantity: 2 }),
    makeItem({ id: uuid(902), productId: "product-b", unitPrice: 20, quantity: 3 }),
  ];

  it("should price the two-line reference cart to 87.08", async () => {
    const { pipeline } = setup();

    const breakdown = await pipeline.price(guest(twoLines()));

    expect(breakdown.subtotal).toBe(80);
    expect(breakdown.discounts.bulk).toEqual({
      amount: 4,
      rate: 0.05,
      degraded: false,
    });
    expect(breakdown.discounts.applied).toBe(4);
    expect(breakdown.subtotalAfterDiscounts).toBe(76);
    expect(breakdown.tax).toMatchObject({
      jurisdiction: "DEFAULT",
      rate: 0.08,
      baseTax: 6.08,
      total: 6.08,
      exempt: false,
    });
    expect(breakdown.shipping).toMatchObject({ option: "STANDARD", cost: 5 });
    expect(breakdown.grandTotal).toBe(87.08);
    expect(breakdown.effectiveDiscountRate).toBe(0.05);
    expect(breakdown.effectiveTaxRate).toBe(0.08);
    expect(breakdown.calculatedAt).toEqual(NOW);
  });

  it.each([
    [4, 0, 0],
    [5, 0.05, 2.5],
    [10, 0.1, 10],
    [20, 0.15, 30],
  ])(
    "should apply the bulk tier for %i units of $10",
    async (quantity, rate, amount) => {
      const { pipeline } = setup();

      const breakdown = await pipeline.price(
        guest([makeItem({ unitPrice: 10, quantity })]),
      );

      expect(breakdown.discounts.bulk.rate).toBe(rate);
      expect(breakdown.discounts.bulk.amount).toBe(amount);
    },
  );

  describe("loyalty", () => {
    it("should use the membership level rate", async () => {
      const { pipeline } = setup({
        customers: createFakeCustomers({ loyalty: { level: "GOLD", points: 0 } }),
      });

      const breakdown = await pipeline.price(
        member([makeItem({ unitPrice: 10, quantity: 2 })]),
      );

      expect(breakdown.discounts.loyalty).toMatchObject({
        amount: 3,
        rate: 0.15,
        level: "GOLD",
      });
    });

    it("should fall back to points for unclassified members", async () => {
      const { pipeline } = setup({
        customers: createFakeCustomers({ loyalty: { level: null, points: 600 } }),
      });

      const breakdown = await pipeline.price(
        member([makeItem({ unitPrice: 10, quantity: 2 })]),
      );

      expect(breakdown.discounts.loyalty).toMatchObject({
        amount: 0.6,
        rate: 0.03,
      });
    });

    it("should price without loyalty when the lookup fails", async () => {
      const customers = createFakeCustomers();
      customers.getLoyalty.mockRejectedValueOnce(new Error("timeout"));
      const { pipeline } = setup({ customers });

      const breakdown = await pipeline.price(
        member([makeItem({ unitPrice: 10, quantity: 2 })]),
      );

      expect(breakdown.discounts.loyalty).toMatchObject({
        amount: 0,
        degraded: true,
      });
      expect(breakdown.grandTotal).toBe(26.6);
    });
  });

  it("should sum promotions per line and skip a line that fails", async () => {
    const { pipeline, promotions } = setup();
    promotions.getActivePromotions.mockImplementation(async (productId) => {
      if (productId === "product-b") throw new Error("promotion service down");
      return [{ id: "promo-1", name: "Spring" }];
    });
    promotions.calculateDiscount.mockResolvedValue(1.5);

    const breakdown = await pipeline.price(guest(twoLines()));

    expect(breakdown.discounts.promotional).toEqual({
      amount: 1.5,
      rate: 0.0188,
      degraded: true,
      lines: [
        {
          itemId: uuid(901),
          productId: "product-a",
          promotionId: "promo-1",
          amount: 1.5,
        },
      ],
    });
  });

  describe("coupons", () => {
    it("should apply a percentage coupon to the subtotal", async () => {
      const { pipeline } = setup({
        coupons: [{ code: "SPRING10", kind: "percentage", rate: 0.1 }],
      });

      const breakdown = await pipeline.price(
        guest([makeItem({ unitPrice: 10, quantity: 2 })], {
          couponCode: "SPRING10",
        }),
      );

      expect(breakdown.discounts.coupon).toEqual({
        amount: 2,
        rate: 0.1,
        degraded: false,
        code: "SPRING10",
        status: "APPLIED",
      });
    });

    it("should report a code that no longer resolves", async () => {
      const { pipeline } = setup();

      const breakdown = await pipeline.price(
        guest([makeItem()], { couponCode: "GONE" }),
      );

      expect(breakdown.discounts.coupon).toMatchObject({
        amount: 0,
        status: "NOT_FOUND",
      });
    });

    it("should never discount below zero", async () => {
      const { pipeline } = setup({
        coupons: [{ code: "BIG", kind: "fixed", amount: 100 }],
      });

      const breakdown = await pipeline.price(
        guest([makeItem({ unitPrice: 10, quantity: 2 })], { couponCode: "BIG" }),
      );

      expect(breakdown.discounts.applied).toBe(20);
      expect(breakdown.subtotalAfterDiscounts).toBe(0);
      expect(breakdown.tax.total).toBe(0);
      expect(breakdown.grandTotal).toBe(5);
    });
  });

  describe("tax", () => {
    it("should charge nothing to a tax-exempt user", async () => {
      const { pipeline } = setup({
        customers: createFakeCustomers({
          address: { country: "US", state: "CA", postalCode: "94105" },
          taxExempt: true,
        }),
      });

      const breakdown = await pipeline.price(
        member([makeItem({ unitPrice: 1500, category: "electronics" })]),
      );

      expect(breakdown.tax).toMatchObject({
        jurisdiction: "US_CA",
        exempt: true,
        exemptionReason: "USER_EXEMPT",
        baseTax: 0,
        total: 0,
      });
    });

    it("should add per-item special taxes to the jurisdiction rate", async () => {
      const { pipeline } = setup({
        customers: createFakeCustomers({
          address: { country: "US", state: "ca", postalCode: null },
        }),
      });

      const breakdown = await pipeline.price(
        member([makeItem({ unitPrice: 1500, quantity: 1 })]),
      );

      expect(breakdown.tax).toMatchObject({
        jurisdiction: "US_CA",
        rate: 0.0975,
        baseTax: 146.25,
        specialTaxes: { luxury: 75, digitalGoods: 0, environmental: 0 },
        total: 221.25,
      });
      expect(breakdown.grandTotal).toBe(1726.25);
    });

    it("should not tax in a tax-free state", async () => {
      const { pipeline } = setup({
        customers: createFakeCustomers({
          address: { country: "US", state: "OR", postalCode: null },
        }),
      });

      const breakdown = await pipeline.price(member([makeItem()]));

      expect(breakdown.tax).toMatchObject({
        exemptionReason: "TAX_FREE_JURISDICTION",
        total: 0,
      });
    });

    it("should fail pricing when tax inputs are unavailable", async () => {
      const customers = createFakeCustomers();
      customers.getTaxProfile.mockRejectedValueOnce(new Error("timeout"));
      const { pipeline } = setup({ customers });

      await expect(pipeline.price(member([makeItem()]))).rejects.toMatchObject({
        name: "PricingInputUnavailableError",
        input: "tax",
      });
    });

    it("should use the default rate when configured to", async () => {
      const customers = createFakeCustomers({
        address: { country: "US", state: "CA", postalCode: null },
      });
      customers.getTaxProfile.mockRejectedValueOnce(new Error("timeout"));
      const { pipeline } = setup({ customers, taxFailureMode: "default-rate" });

      const breakdown = await pipeline.price(
        member([makeItem({ unitPrice: 10, quantity: 2 })]),
      );

      expect(breakdown.tax).toMatchObject({
        jurisdiction: "DEFAULT",
        total: 1.6,
        degraded: true,
      });
    });
  });

  describe("shipping", () => {
    it("should prefer the recommended option over the cheapest", async () => {
      const { pipeline } = setup({
        shippingOptions: [
          { option: "ECONOMY", cost: 3 },
          { option: "STANDARD", cost: 5.99, recommended: true },
        ],
      });

      const breakdown = await pipeline.price(guest([makeItem()]));

      expect(breakdown.shipping.option).toBe("STANDARD");
      expect(breakdown.shipping.cost).toBe(5.99);
    });

    it("should take the cheapest option when none is recommended", async () => {
      const { pipeline } = setup({
        shippingOptions: [
          { option: "EXPRESS", cost: 12.99 },
          { option: "ECONOMY", cost: 3 },
        ],
      });

      const breakdown = await pipeline.price(guest([makeItem()]));

      expect(breakdown.shipping.option).toBe("ECONOMY");
    });

    it("should not quote shipping for an empty cart", async () => {
      const { pipeline, shipping } = setup();

      const breakdown = await pipeline.price(guest([]));

      expect(breakdown.shipping.cost).toBe(0);
      expect(breakdown.grandTotal).toBe(0);
      expect(shipping.quote).not.toHaveBeenCalled();
    });

    it("should fail pricing when no option comes back", async () => {
      const { pipeline } = setup({ shippingOptions: [] });

      await expect(pipeline.price(guest([makeItem()]))).rejects.toThrow(
        PricingInputUnavailableError,
      );
    });

    it("should charge the flat rate when configured to", async () => {
      const { pipeline, shipping } = setup({ shippingFailureMode: "flat-rate" });
      shipping.quote.mockRejectedValueOnce(new Error("timeout"));

      const breakdown = await pipeline.price(guest([makeItem()]));

      expect(breakdown.shipping).toEqual({
        option: "FLAT_RATE",
        cost: 5.99,
        options: [],
        degraded: true,
      });
    });
  });

  it("should leave the cart untouched", async () => {
    const { pipeline } = setup();
    const cart = guest(twoLines());
    const before = structuredClone(cart);

    await pipeline.price(cart);

    expect(cart).toEqual(before);
  });
});
