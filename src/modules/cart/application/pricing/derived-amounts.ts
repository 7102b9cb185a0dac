import { fromCents, toCents } from "../../../shared/money.js";
import type { Logger } from "../../../shared/infra/logger.js";
import type { CartEntity } from "../../domain/cart.entity.js";
import { rebuildAggregates } from "../../domain/cart.model.js";
import type { CouponPort } from "../ports/outbound/coupon.port.js";
import { couponAmount } from "./discount-stages.js";

export type DerivedAmounts = (cart: CartEntity) => Promise<CartEntity>;

/**
 * Rebuilds a cart whose lines changed. The coupon discount is worked out
 * again from the coupon's terms against the new subtotal, and a code that no
 * longer resolves is dropped. Stored tax and shipping were quoted for the old
 * lines, so they are cleared until the cart is repriced.
 */
export function createDerivedAmounts({
  coupons,
  logger,
}: {
  coupons: CouponPort;
  logger: Logger;
}): DerivedAmounts {
  return async (cart) => {
    const lines = rebuildAggregates({
      ...cart,
      discountAmount: 0,
      taxAmount: 0,
      shippingAmount: 0,
    });
    if (lines.couponCode === null) return lines;

    const coupon = await coupons.resolve(lines.couponCode);
    if (!coupon) {
      logger.info(
        { cartId: cart.id, code: lines.couponCode },
        "cart.coupon.dropped",
      );
      return { ...lines, couponCode: null };
    }
    const { amount } = couponAmount(coupon, toCents(lines.subtotal));
    return rebuildAggregates({ ...lines, discountAmount: fromCents(amount) });
  };
}
