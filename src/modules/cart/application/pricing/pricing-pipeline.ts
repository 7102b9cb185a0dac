import type {
  ShippingFailureMode,
  TaxFailureMode,
} from "../../../shared/infra/config.js";
import type { Logger } from "../../../shared/infra/logger.js";
import {
  fromCents,
  fromRate4,
  lineTotal,
  ratioOf,
  toCents,
} from "../../../shared/money.js";
import type { CartEntity } from "../../domain/cart.entity.js";
import { PricingInputUnavailableError } from "../../errors.js";
import type { CouponPort } from "../ports/outbound/coupon.port.js";
import type {
  CustomerPort,
  ShippingAddress,
} from "../ports/outbound/customer.port.js";
import type { PromotionPort } from "../ports/outbound/promotion.port.js";
import type { ShippingRatePort } from "../ports/outbound/shipping-rate.port.js";
import {
  bulkDiscount,
  couponDiscount,
  loyaltyDiscount,
  promotionalDiscount,
} from "./discount-stages.js";
import type { PriceBreakdown, ShippingStage } from "./pricing.types.js";
import { selectShippingOption, shippingCost } from "./shipping-stage.js";
import { computeTax } from "./tax-stage.js";

export type PricingPipeline = {
  price(cart: CartEntity): Promise<PriceBreakdown>;
};

type Dependencies = {
  customers: CustomerPort;
  promotions: PromotionPort;
  coupons: CouponPort;
  shipping: ShippingRatePort;
  logger: Logger;
  config: {
    taxFailureMode: TaxFailureMode;
    shippingFailureMode: ShippingFailureMode;
    flatShippingRate: number;
  };
  now?: () => Date;
};

type TaxInputs = {
  address: ShippingAddress | null;
  taxExempt: boolean;
  degraded: boolean;
};

/**
 * Prices a cart snapshot: subtotal, bulk, loyalty, promotional and coupon
 * discounts, tax, shipping, grand total. Loyalty, promotion and coupon
 * lookups fail open. Tax and shipping lookups follow the configured failure
 * mode. The cart itself is never modified.
 */
export function createPricingPipeline({
  customers,
  promotions,
  coupons,
  shipping,
  logger,
  config,
  now = () => new Date(),
}: Dependencies): PricingPipeline {
  async function resolveTaxInputs(cart: CartEntity): Promise<TaxInputs> {
    if (!cart.userId) {
      return { address: null, taxExempt: false, degraded: false };
    }
    try {
      const [address, profile] = await Promise.all([
        customers.getDefaultShippingAddress(cart.userId),
        customers.getTaxProfile(cart.userId),
      ]);
      return { address, taxExempt: profile.taxExempt, degraded: false };
    } catch (error) {
      if (config.taxFailureMode === "fail") {
        throw new PricingInputUnavailableError("tax", error);
      }
      logger.warn(
        { error, cartId: cart.id },
        "cart.pricing.tax.default-rate-used",
      );
      return { address: null, taxExempt: false, degraded: true };
    }
  }

  async function resolveShipping(
    cart: CartEntity,
    subtotalAfterDiscounts: number,
    address: ShippingAddress | null,
  ): Promise<{ cost: number; stage: ShippingStage }> {
    if (cart.items.length === 0) {
      return {
        cost: 0,
        stage: { option: null, cost: 0, options: [], degraded: false },
      };
    }
    try {
      const options = await shipping.quote({
        cartId: cart.id,
        currency: cart.currency,
        subtotal: fromCents(subtotalAfterDiscounts),
        totalQuantity: cart.totalQuantity,
        address,
      });
      const selected = selectShippingOption(options);
      if (!selected) throw new Error("No shipping options returned");
      const cost = shippingCost(selected);
      return {
        cost,
        stage: {
          option: selected.option,
          cost: fromCents(cost),
          options: options.map((option) => ({
            option: option.option,
            cost: option.cost,
            recommended: option.recommended ?? false,
          })),
          degraded: false,
        },
      };
    } catch (error) {
      if (config.shippingFailureMode === "fail") {
        throw new PricingInputUnavailableError("shipping", error);
      }
      logger.warn(
        { error, cartId: cart.id },
        "cart.pricing.shipping.flat-rate-used",
      );
      const cost = toCents(config.flatShippingRate);
      return {
        cost,
        stage: {
          option: "FLAT_RATE",
          cost: fromCents(cost),
          options: [],
          degraded: true,
        },
      };
    }
  }

  return {
    async price(cart) {
      const subtotal = cart.items.reduce(
        (sum, item) => sum + lineTotal(item.unitPrice, item.quantity),
        0,
      );
      const totalQuantity = cart.items.reduce(
        (sum, item) => sum + item.quantity,
        0,
      );

      const bulk = bulkDiscount(subtotal, totalQuantity);
      const loyalty = await loyaltyDiscount(cart, subtotal, {
        customers,
        logger,
      });
      const promotional = await promotionalDiscount(cart, {
        promotions,
        logger,
      });
      const coupon = await couponDiscount(cart, subtotal, { coupons, logger });

      const totalDiscount =
        bulk.amount + loyalty.amount + promotional.amount + coupon.amount;
      const appliedDiscount = Math.min(subtotal, totalDiscount);
      const taxable = subtotal - appliedDiscount;

      const taxInputs = await resolveTaxInputs(cart);
      const tax = computeTax({ cart, taxable, ...taxInputs });
      const ship = await resolveShipping(cart, taxable, taxInputs.address);

      const grandTotal = taxable + tax.total + ship.cost;
      const breakdown: PriceBreakdown = {
        cartId: cart.id,
        currency: cart.currency,
        subtotal: fromCents(subtotal),
        discounts: {
          bulk: {
            amount: fromCents(bulk.amount),
            rate: fromRate4(bulk.rate),
            degraded: false,
          },
          loyalty: {
            amount: fromCents(loyalty.amount),
            rate: fromRate4(loyalty.rate),
            degraded: loyalty.degraded,
            level: loyalty.level,
            points: loyalty.points,
          },
          promotional: {
            amount: fromCents(promotional.amount),
            rate: ratioOf(promotional.amount, subtotal),
            degraded: promotional.degraded,
            lines: promotional.lines,
          },
          coupon: coupon.stage,
          total: fromCents(totalDiscount),
          applied: fromCents(appliedDiscount),
        },
        subtotalAfterDiscounts: fromCents(taxable),
        tax: tax.stage,
        shipping: ship.stage,
        grandTotal: fromCents(grandTotal),
        effectiveDiscountRate: ratioOf(appliedDiscount, subtotal),
        effectiveTaxRate: ratioOf(tax.total, taxable),
        calculatedAt: now(),
      };
      logger.info(
        {
          cartId: cart.id,
          subtotal: breakdown.subtotal,
          discounts: breakdown.discounts.applied,
          tax: breakdown.tax.total,
          shipping: breakdown.shipping.cost,
          grandTotal: breakdown.grandTotal,
        },
        "cart.pricing.calculated",
      );
      return breakdown;
    },
  };
}
