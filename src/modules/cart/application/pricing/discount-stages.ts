import type { Logger } from "../../../shared/infra/logger.js";
import {
  applyRate,
  fromCents,
  fromRate4,
  lineTotal,
  toCents,
  toRate4,
  type Cents,
  type Rate4,
} from "../../../shared/money.js";
import type { CartEntity } from "../../domain/cart.entity.js";
import type { CouponPort } from "../ports/outbound/coupon.port.js";
import type { CustomerPort, Loyalty } from "../ports/outbound/customer.port.js";
import type { PromotionPort } from "../ports/outbound/promotion.port.js";
import type { CouponStage, PromotionLine } from "./pricing.types.js";

const BULK_TIERS: ReadonlyArray<{ minQuantity: number; rate: Rate4 }> = [
  { minQuantity: 20, rate: 1500 },
  { minQuantity: 10, rate: 1000 },
  { minQuantity: 5, rate: 500 },
];

const LOYALTY_LEVEL_RATES: Record<string, Rate4> = {
  PLATINUM: 2000,
  GOLD: 1500,
  SILVER: 1000,
  BRONZE: 500,
};

const LOYALTY_POINT_TIERS: ReadonlyArray<{ minPoints: number; rate: Rate4 }> =
  [
    { minPoints: 1000, rate: 500 },
    { minPoints: 500, rate: 300 },
    { minPoints: 100, rate: 100 },
  ];

export type CentsStage = { amount: Cents; rate: Rate4; degraded: boolean };

export function bulkDiscountRate(totalQuantity: number): Rate4 {
  return (
    BULK_TIERS.find((tier) => totalQuantity >= tier.minQuantity)?.rate ?? 0
  );
}

export function bulkDiscount(subtotal: Cents, totalQuantity: number) {
  const rate = bulkDiscountRate(totalQuantity);
  return { amount: applyRate(subtotal, rate), rate, degraded: false };
}

export function loyaltyDiscountRate(loyalty: Loyalty): Rate4 {
  if (loyalty.level) return LOYALTY_LEVEL_RATES[loyalty.level] ?? 0;
  return (
    LOYALTY_POINT_TIERS.find((tier) => loyalty.points >= tier.minPoints)
      ?.rate ?? 0
  );
}

/** Guests and failed lookups get no loyalty discount. */
export async function loyaltyDiscount(
  cart: CartEntity,
  subtotal: Cents,
  { customers, logger }: { customers: CustomerPort; logger: Logger },
): Promise<CentsStage & Loyalty> {
  if (!cart.userId) {
    return { amount: 0, rate: 0, degraded: false, level: null, points: 0 };
  }
  try {
    const loyalty = await customers.getLoyalty(cart.userId);
    const rate = loyaltyDiscountRate(loyalty);
    return {
      amount: applyRate(subtotal, rate),
      rate,
      degraded: false,
      level: loyalty.level,
      points: loyalty.points,
    };
  } catch (error) {
    logger.warn(
      { error, cartId: cart.id, userId: cart.userId },
      "cart.pricing.loyalty.failed",
    );
    return { amount: 0, rate: 0, degraded: true, level: null, points: 0 };
  }
}

/**
 * Sums every active promotion over every line. A line whose promotions cannot
 * be evaluated is skipped.
 */
export async function promotionalDiscount(
  cart: CartEntity,
  { promotions, logger }: { promotions: PromotionPort; logger: Logger },
): Promise<{ amount: Cents; degraded: boolean; lines: PromotionLine[] }> {
  let amount = 0;
  let degraded = false;
  const lines: PromotionLine[] = [];

  for (const item of cart.items) {
    try {
      const active = await promotions.getActivePromotions(item.productId);
      const itemLines: PromotionLine[] = [];
      for (const promotion of active) {
        const discount = await promotions.calculateDiscount({
          productId: item.productId,
          promotionId: promotion.id,
          quantity: item.quantity,
          unitPrice: item.unitPrice,
        });
        const cents = Math.min(
          Math.max(toCents(discount), 0),
          lineTotal(item.unitPrice, item.quantity),
        );
        if (cents > 0) {
          itemLines.push({
            itemId: item.id,
            productId: item.productId,
            promotionId: promotion.id,
            amount: fromCents(cents),
          });
        }
      }
      for (const line of itemLines) amount += toCents(line.amount);
      lines.push(...itemLines);
    } catch (error) {
      degraded = true;
      logger.warn(
        { error, cartId: cart.id, productId: item.productId },
        "cart.pricing.promotion.failed",
      );
    }
  }

  return { amount, degraded, lines };
}

export function couponAmount(
  coupon: Awaited<ReturnType<CouponPort["resolve"]>>,
  subtotal: Cents,
): { amount: Cents; rate: Rate4 } {
  if (!coupon) return { amount: 0, rate: 0 };
  if (coupon.kind === "percentage") {
    const rate = toRate4(coupon.rate);
    return { amount: Math.min(applyRate(subtotal, rate), subtotal), rate };
  }
  return { amount: Math.min(toCents(coupon.amount), subtotal), rate: 0 };
}

/** A coupon that cannot be resolved contributes nothing. */
export async function couponDiscount(
  cart: CartEntity,
  subtotal: Cents,
  { coupons, logger }: { coupons: CouponPort; logger: Logger },
): Promise<{ amount: Cents; stage: CouponStage }> {
  const code = cart.couponCode;
  if (!code) {
    return {
      amount: 0,
      stage: {
        amount: 0,
        rate: 0,
        degraded: false,
        code: null,
        status: "NONE",
      },
    };
  }
  try {
    const coupon = await coupons.resolve(code);
    const { amount, rate } = couponAmount(coupon, subtotal);
    return {
      amount,
      stage: {
        amount: fromCents(amount),
        rate: fromRate4(rate),
        degraded: false,
        code,
        status: coupon ? "APPLIED" : "NOT_FOUND",
      },
    };
  } catch (error) {
    logger.warn({ error, cartId: cart.id, code }, "cart.pricing.coupon.failed");
    return {
      amount: 0,
      stage: {
        amount: 0,
        rate: 0,
        degraded: true,
        code,
        status: "LOOKUP_FAILED",
      },
    };
  }
}
