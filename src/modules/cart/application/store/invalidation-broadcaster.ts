import { z } from "zod";
import type { Logger } from "../../../shared/infra/logger.js";
import type { TaskQueue } from "../../../shared/infra/task-queue.js";
import type {
  CartEntity,
  CartItem,
  OwnerKey,
  StockIssue,
} from "../../domain/cart.entity.js";
import { ownerKeyOf, rebuildAggregates } from "../../domain/cart.model.js";
import { createDerivedAmounts } from "../pricing/derived-amounts.js";
import type { CacheBackendPort } from "../ports/outbound/cache-backend.port.js";
import type { CartRepositoryPort } from "../ports/outbound/cart-repository.port.js";
import type { CouponPort } from "../ports/outbound/coupon.port.js";
import { cacheKeys } from "./cache-keys.js";
import type { ConsistencySynchronizer } from "./consistency-synchronizer.js";
import type { AvailabilityReader } from "./health-monitor.js";

export const ProductEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("PRICE_CHANGED"),
    productId: z.string().min(1),
    newPrice: z.number().nonnegative(),
  }),
  z.object({
    type: z.literal("STOCK_CHANGED"),
    productId: z.string().min(1),
    stockQuantity: z.number().int().nonnegative(),
  }),
  z.object({
    type: z.literal("AVAILABILITY_CHANGED"),
    productId: z.string().min(1),
    available: z.boolean(),
  }),
]);

export type ProductEvent = z.infer<typeof ProductEventSchema>;

export type ProductChangeResult = {
  cartsUpdated: number;
  itemsFlagged: number;
  failures: number;
};

export type InvalidationBroadcaster = {
  invalidateCart(cart: CartEntity, staleOwners?: OwnerKey[]): Promise<void>;
  /**
   * Queues invalidation followed by a re-sync from the durable store, in
   * order, on the cart's key.
   */
  cartChanged(cart: CartEntity, staleOwners?: OwnerKey[]): void;
  productChanged(event: ProductEvent): Promise<ProductChangeResult>;
};

type Dependencies = {
  cache: CacheBackendPort;
  repository: CartRepositoryPort;
  availability: AvailabilityReader;
  synchronizer: ConsistencySynchronizer;
  coupons: CouponPort;
  queue: TaskQueue;
  logger: Logger;
  now?: () => Date;
};

export function createInvalidationBroadcaster({
  cache,
  repository,
  availability,
  synchronizer,
  coupons,
  queue,
  logger,
  now = () => new Date(),
}: Dependencies): InvalidationBroadcaster {
  const derive = createDerivedAmounts({ coupons, logger });

  async function invalidateCart(
    cart: CartEntity,
    staleOwners: OwnerKey[] = [],
  ): Promise<void> {
    if (!availability.isAvailable()) return;
    const keys = [
      cacheKeys.cart(cart.id),
      cacheKeys.validation(cart.id),
      ...staleOwners.map(cacheKeys.owner),
    ];
    if (cart.status === "ACTIVE") keys.push(cacheKeys.owner(ownerKeyOf(cart)));
    try {
      await cache.del(keys);
      logger.debug({ cartId: cart.id, keys }, "cart.invalidation.cart");
    } catch (error) {
      logger.warn({ error, cartId: cart.id }, "cart.invalidation.failed");
    }
  }

  // A waiting refresh for the same cart is replaced by the newer one, so
  // stale owners collect here until a refresh runs.
  const pendingStaleOwners = new Map<string, OwnerKey[]>();

  function cartChanged(cart: CartEntity, staleOwners: OwnerKey[] = []) {
    pendingStaleOwners.set(cart.id, [
      ...(pendingStaleOwners.get(cart.id) ?? []),
      ...staleOwners,
    ]);
    const queued = queue.enqueue(cart.id, "cart.refresh", async () => {
      const owners = pendingStaleOwners.get(cart.id) ?? [];
      pendingStaleOwners.delete(cart.id);
      await invalidateCart(cart, owners);
      await synchronizer.syncLatestToCache(cart.id);
    });
    if (!queued) pendingStaleOwners.delete(cart.id);
  }

  async function invalidateProduct(productId: string) {
    if (!availability.isAvailable()) return;
    try {
      await cache.del([cacheKeys.productInfo(productId)]);
    } catch (error) {
      logger.warn({ error, productId }, "cart.invalidation.product.failed");
    }
  }

  async function productChanged(
    event: ProductEvent,
  ): Promise<ProductChangeResult> {
    logger.info(event, "cart.invalidation.product-event");
    await invalidateProduct(event.productId);

    const result: ProductChangeResult = {
      cartsUpdated: 0,
      itemsFlagged: 0,
      failures: 0,
    };
    const carts = await repository.findActiveContainingProduct(
      event.productId,
    );

    for (const { id } of carts) {
      try {
        const updated = await repository.transaction(async (tx) => {
          const fresh = await tx.findById(id);
          if (!fresh || fresh.status !== "ACTIVE") return undefined;
          const at = now();
          const items = fresh.items.map((item) =>
            item.productId === event.productId
              ? applyProductEvent(item, event, at)
              : item,
          );
          const flagged = items.filter(
            (item, index) =>
              item.stockIssue !== null &&
              item.stockIssue !== fresh.items[index].stockIssue,
          ).length;
          const changed = { ...fresh, items, updatedAt: at };
          const saved = await tx.saveCart(
            event.type === "PRICE_CHANGED"
              ? await derive(changed)
              : rebuildAggregates(changed),
          );
          return { saved, flagged };
        });
        if (updated) {
          result.cartsUpdated++;
          result.itemsFlagged += updated.flagged;
          cartChanged(updated.saved);
        }
      } catch (error) {
        result.failures++;
        logger.error(
          { error, cartId: id, productId: event.productId },
          "cart.invalidation.product-event.cart-failed",
        );
      }
    }

    logger.info(
      { productId: event.productId, ...result },
      "cart.invalidation.product-event.done",
    );
    return result;
  }

  return { invalidateCart, cartChanged, productChanged };
}

/**
 * Updates a line's product snapshot. A line holding more than the product can
 * supply is flagged, never truncated.
 */
export function applyProductEvent(
  item: CartItem,
  event: ProductEvent,
  now: Date,
): CartItem {
  switch (event.type) {
    case "PRICE_CHANGED":
      return { ...item, unitPrice: event.newPrice, updatedAt: now };
    case "STOCK_CHANGED":
      return {
        ...item,
        stockQuantity: event.stockQuantity,
        stockIssue:
          item.stockIssue === "UNAVAILABLE"
            ? "UNAVAILABLE"
            : stockIssueFor(item.quantity, event.stockQuantity),
        updatedAt: now,
      };
    case "AVAILABILITY_CHANGED":
      return {
        ...item,
        stockIssue: event.available
          ? stockIssueFor(item.quantity, item.stockQuantity)
          : "UNAVAILABLE",
        updatedAt: now,
      };
  }
}

function stockIssueFor(
  quantity: number,
  stock: number | null,
): StockIssue | null {
  return stock !== null && quantity > stock ? "INSUFFICIENT_STOCK" : null;
}
