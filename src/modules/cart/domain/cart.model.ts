import { fromCents, lineTotal, toCents } from "../../shared/money.js";
import type {
  CartEntity,
  CartItem,
  CartStatus,
  CartType,
  OwnerKey,
} from "./cart.entity.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type CartTtl = { guestTtlDays: number; userTtlDays: number };

export function expiresAtFor(cartType: CartType, now: Date, ttl: CartTtl) {
  const days = cartType === "USER" ? ttl.userTtlDays : ttl.guestTtlDays;
  return new Date(now.getTime() + days * DAY_MS);
}

export function newCart({
  id,
  owner,
  currency,
  now,
  ttl,
}: {
  id: string;
  owner: OwnerKey;
  currency: string;
  now: Date;
  ttl: CartTtl;
}): CartEntity {
  const cartType: CartType = owner.kind === "user" ? "USER" : "GUEST";
  return {
    id,
    userId: owner.kind === "user" ? owner.userId : null,
    sessionId: owner.kind === "session" ? owner.sessionId : null,
    status: "ACTIVE",
    cartType,
    currency,
    subtotal: 0,
    discountAmount: 0,
    taxAmount: 0,
    shippingAmount: 0,
    totalAmount: 0,
    itemCount: 0,
    totalQuantity: 0,
    couponCode: null,
    createdAt: now,
    updatedAt: now,
    lastActivityAt: now,
    expiresAt: expiresAtFor(cartType, now, ttl),
    deletedAt: null,
    mergedToCartId: null,
    version: 0,
    items: [],
  };
}

/**
 * Recomputes every derived field from the cart's items. Stored aggregates are
 * never incremented in place.
 */
export function rebuildAggregates(cart: CartEntity): CartEntity {
  const subtotal = cart.items.reduce(
    (sum, item) => sum + lineTotal(item.unitPrice, item.quantity),
    0,
  );
  const discount = Math.min(toCents(cart.discountAmount), subtotal);
  const total =
    subtotal -
    discount +
    toCents(cart.taxAmount) +
    toCents(cart.shippingAmount);
  return {
    ...cart,
    subtotal: fromCents(subtotal),
    discountAmount: fromCents(discount),
    totalAmount: fromCents(total),
    itemCount: cart.items.length,
    totalQuantity: cart.items.reduce((sum, item) => sum + item.quantity, 0),
  };
}

/** Marks the cart as touched by its owner. */
export function touch(cart: CartEntity, now: Date): CartEntity {
  return { ...cart, updatedAt: now, lastActivityAt: now };
}

export function ownerKeyOf(cart: CartEntity): OwnerKey {
  if (cart.userId) return { kind: "user", userId: cart.userId };
  if (cart.sessionId) return { kind: "session", sessionId: cart.sessionId };
  throw new Error(`Cart ${cart.id} has no owner`);
}

export function isOwnedBy(cart: CartEntity, owner: OwnerKey): boolean {
  return owner.kind === "user"
    ? cart.userId === owner.userId
    : cart.userId === null && cart.sessionId === owner.sessionId;
}

export function isExpired(cart: CartEntity, now: Date): boolean {
  return cart.expiresAt.getTime() <= now.getTime();
}

/** Carts in these statuses can take part in a merge, if not expired. */
export function isMergeable(cart: CartEntity, now: Date): boolean {
  return (
    (cart.status === "ACTIVE" || cart.status === "SAVED") &&
    !isExpired(cart, now)
  );
}

/**
 * Guest carts are deleted on expiry. User carts keep their history: an
 * active one is abandoned, anything else expires.
 */
export function expiredStatusFor(cart: CartEntity): CartStatus {
  if (cart.cartType === "GUEST") return "DELETED";
  return cart.status === "ACTIVE" ? "ABANDONED" : "EXPIRED";
}

/** Two lines merge when product, variant and price snapshot all match. */
export function isSameLine(
  a: Pick<CartItem, "productId" | "variantId" | "unitPrice">,
  b: Pick<CartItem, "productId" | "variantId" | "unitPrice">,
): boolean {
  return (
    a.productId === b.productId &&
    a.variantId === b.variantId &&
    toCents(a.unitPrice) === toCents(b.unitPrice)
  );
}
