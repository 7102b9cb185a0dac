import {
  CartEntitySchema,
  type CartEntity,
  type OwnerKey,
} from "../../domain/cart.entity.js";

export const cacheKeys = {
  cart: (cartId: string) => `cart:${cartId}`,
  owner: (owner: OwnerKey) =>
    owner.kind === "user"
      ? `cart-owner:user:${owner.userId}`
      : `cart-owner:session:${owner.sessionId}`,
  validation: (cartId: string) => `cart-validation:${cartId}`,
  productInfo: (productId: string) => `product-info:${productId}`,
};

export function serializeCart(cart: CartEntity): string {
  return JSON.stringify(cart);
}

/** Undefined for anything that is not a well-formed cart snapshot. */
export function parseCachedCart(raw: string): CartEntity | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = CartEntitySchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

/** Seconds until the cart expires, capped at `maxSeconds` and at least 1. */
export function cartTtlSeconds(
  cart: CartEntity,
  now: Date,
  maxSeconds: number,
): number {
  const remaining = Math.floor(
    (cart.expiresAt.getTime() - now.getTime()) / 1000,
  );
  return Math.max(1, Math.min(maxSeconds, remaining));
}
