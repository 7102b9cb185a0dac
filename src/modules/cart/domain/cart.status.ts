import { InvalidCartTransitionError } from "../errors.js";
import type { CartEntity, CartStatus } from "./cart.entity.js";

/**
 * Allowed status moves. MERGED, DELETED and CONVERTED are terminal.
 */
const TRANSITIONS: Record<CartStatus, readonly CartStatus[]> = {
  ACTIVE: ["ABANDONED", "CHECKOUT", "EXPIRED", "SAVED", "MERGED", "DELETED"],
  SAVED: ["ACTIVE", "ABANDONED", "EXPIRED", "MERGED", "DELETED"],
  CHECKOUT: ["ACTIVE", "CONVERTED", "ABANDONED", "EXPIRED", "DELETED"],
  ABANDONED: ["EXPIRED", "DELETED"],
  EXPIRED: ["DELETED"],
  MERGED: [],
  DELETED: [],
  CONVERTED: [],
};

export function canTransition(from: CartStatus, to: CartStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: CartStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function transitionTo(
  cart: CartEntity,
  status: CartStatus,
  now: Date,
  changes: Partial<Pick<CartEntity, "mergedToCartId">> = {},
): CartEntity {
  if (!canTransition(cart.status, status)) {
    throw new InvalidCartTransitionError(cart.id, cart.status, status);
  }
  return {
    ...cart,
    ...changes,
    status,
    deletedAt: status === "DELETED" ? now : cart.deletedAt,
    updatedAt: now,
  };
}
