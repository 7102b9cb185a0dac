/**
 * Outbound Port - Defines what the Cart module needs from the durable store
 */

import type { CartEntity, OwnerKey } from "../../../domain/cart.entity.js";

export interface CartRepositoryPort {
  findById(cartId: string): Promise<CartEntity | undefined>;
  findActiveByOwner(owner: OwnerKey): Promise<CartEntity | undefined>;
  /** Keyset page of ACTIVE carts with activity at or after `since`, ordered by id. */
  findActiveUpdatedSince(input: {
    since: Date;
    afterId: string | null;
    limit: number;
  }): Promise<CartEntity[]>;
  /** Keyset page of carts in any other status changed at or after `since`, ordered by id. */
  findInactiveUpdatedSince(input: {
    since: Date;
    afterId: string | null;
    limit: number;
  }): Promise<CartEntity[]>;
  findActiveContainingProduct(productId: string): Promise<CartEntity[]>;
  /** Non-terminal carts past `expiresAt` that still need an expiry status. */
  findExpired(input: { now: Date; limit: number }): Promise<CartEntity[]>;
  /**
   * Writes the cart row and reconciles its items: listed items are upserted
   * (an item id owned by another cart moves to this one), unlisted ones are
   * removed. Version 0 inserts; otherwise the stored version must equal
   * `cart.version` or `ConcurrentCartModificationError` is thrown.
   * Resolves to the cart carrying its new version.
   */
  saveCart(cart: CartEntity): Promise<CartEntity>;
  transaction<A>(fn: (repository: CartRepositoryPort) => Promise<A>): Promise<A>;
}
