/**
 * Cart Application Service - Implements the inbound port (use cases)
 * Contains the application logic and orchestrates domain operations
 */

import type { Logger } from "../../../shared/infra/logger.js";
import type { TaskQueue } from "../../../shared/infra/task-queue.js";
import { fromCents, toCents } from "../../../shared/money.js";
import {
  MAX_ITEM_QUANTITY,
  OwnerKeySchema,
  type CartEntity,
  type CartItem,
  type OwnerKey,
} from "../../domain/cart.entity.js";
import {
  expiredStatusFor,
  isExpired,
  isSameLine,
  newCart,
  rebuildAggregates,
  touch,
  type CartTtl,
} from "../../domain/cart.model.js";
import { transitionTo } from "../../domain/cart.status.js";
import {
  CartValidationResultSchema,
  type CartValidationIssue,
  type CartValidationResult,
} from "../../domain/cart-validation.js";
import { CartInvalidInputError, CartNotFoundError } from "../../errors.js";
import type { MergeEngine } from "../merge/merge-engine.js";
import { createDerivedAmounts } from "../pricing/derived-amounts.js";
import { couponAmount } from "../pricing/discount-stages.js";
import type { PricingPipeline } from "../pricing/pricing-pipeline.js";
import {
  AddItemInputSchema,
  ApplyCouponInputSchema,
  GuestMergeInputSchema,
  RemoveItemInputSchema,
  UpdateItemInputSchema,
  UserMergeInputSchema,
  type CartPort,
} from "../ports/inbound/cart.port.js";
import type { CacheBackendPort } from "../ports/outbound/cache-backend.port.js";
import type { CartRepositoryPort } from "../ports/outbound/cart-repository.port.js";
import type { CouponPort } from "../ports/outbound/coupon.port.js";
import type { InventoryPort } from "../ports/outbound/inventory.port.js";
import type { ProductCatalogPort } from "../ports/outbound/product-catalog.port.js";
import { cacheKeys } from "../store/cache-keys.js";
import type { CartStore } from "../store/cart-store.js";
import type { ConsistencySynchronizer } from "../store/consistency-synchronizer.js";
import type { HealthMonitor } from "../store/health-monitor.js";
import {
  ProductEventSchema,
  type InvalidationBroadcaster,
} from "../store/invalidation-broadcaster.js";

type Dependencies = {
  store: CartStore;
  repository: CartRepositoryPort;
  cache: CacheBackendPort;
  healthMonitor: HealthMonitor;
  synchronizer: ConsistencySynchronizer;
  broadcaster: InvalidationBroadcaster;
  mergeEngine: MergeEngine;
  pricing: PricingPipeline;
  catalog: ProductCatalogPort;
  inventory: InventoryPort;
  coupons: CouponPort;
  queue: TaskQueue;
  logger: Logger;
  config: {
    currency: string;
    ttl: CartTtl;
    validationTtlSeconds: number;
    expirationBatchSize: number;
  };
  now: () => Date;
  newId: () => string;
};

export function createCartService(deps: Dependencies): CartPort {
  return {
    getOrCreateCart: createGetOrCreateCartUseCase(deps),
    getActiveCart: createGetActiveCartUseCase(deps),
    addItem: createAddItemUseCase(deps),
    updateItemQuantity: createUpdateItemQuantityUseCase(deps),
    removeItem: createRemoveItemUseCase(deps),
    applyCoupon: createApplyCouponUseCase(deps),
    removeCoupon: createRemoveCouponUseCase(deps),
    clearCart: createClearCartUseCase(deps),
    deleteCart: createDeleteCartUseCase(deps),
    mergeGuestCartToUser: createMergeGuestCartUseCase(deps),
    mergeUserCarts: createMergeUserCartsUseCase(deps),
    calculateCartPricing: createCalculatePricingUseCase(deps),
    repriceCart: createRepriceCartUseCase(deps),
    validateCart: createValidateCartUseCase(deps),
    handleProductEvent: createHandleProductEventUseCase(deps),
    processExpiredCarts: createProcessExpiredCartsUseCase(deps),
    recoverCache: () => deps.synchronizer.recoverToCache(),
    getCacheHealth: () => deps.healthMonitor.report(),
  };
}

function describeOwner(owner: OwnerKey) {
  return owner.kind === "user"
    ? `user ${owner.userId}`
    : `session ${owner.sessionId}`;
}

/**
 * Reads for a write go to the durable store, so the version being written
 * is the latest committed one.
 */
function createLoadForWrite({ store }: Pick<Dependencies, "store">) {
  return async (owner: OwnerKey) => {
    const cart = await store.get(owner, { bypassCache: true });
    if (!cart) {
      throw new CartNotFoundError(`No active cart for ${describeOwner(owner)}`);
    }
    return cart;
  };
}

function createNewCart({
  config,
  now,
  newId,
}: Pick<Dependencies, "config" | "now" | "newId">) {
  return (owner: OwnerKey) =>
    newCart({
      id: newId(),
      owner,
      currency: config.currency,
      now: now(),
      ttl: config.ttl,
    });
}

function createReleaseReservations({
  inventory,
  logger,
}: Pick<Dependencies, "inventory" | "logger">) {
  return async (
    cartId: string,
    lines: Array<Pick<CartItem, "productId" | "variantId" | "quantity">>,
  ) => {
    for (const line of lines) {
      try {
        await inventory.release({
          productId: line.productId,
          variantId: line.variantId,
          quantity: line.quantity,
        });
      } catch (error) {
        logger.error(
          { error, cartId, productId: line.productId },
          "cart.inventory.release-failed",
        );
      }
    }
  };
}

function createGetOrCreateCartUseCase(
  deps: Pick<Dependencies, "store" | "config" | "now" | "newId" | "logger">,
) {
  const create = createNewCart(deps);
  return async (input: OwnerKey) => {
    const owner = OwnerKeySchema.parse(input);
    const existing = await deps.store.get(owner);
    if (existing) return existing;
    const cart = await deps.store.save(create(owner));
    deps.logger.info({ cartId: cart.id, owner }, "cart.service.created");
    return cart;
  };
}

function createGetActiveCartUseCase({ store }: Pick<Dependencies, "store">) {
  return async (input: OwnerKey) => {
    const owner = OwnerKeySchema.parse(input);
    const cart = await store.get(owner);
    if (!cart) {
      throw new CartNotFoundError(`No active cart for ${describeOwner(owner)}`);
    }
    return cart;
  };
}

function createAddItemUseCase(deps: Dependencies) {
  const create = createNewCart(deps);
  const release = createReleaseReservations(deps);
  const derive = createDerivedAmounts(deps);
  return async (input: Parameters<CartPort["addItem"]>[0]) => {
    const owner = OwnerKeySchema.parse(input.owner);
    const parsed = AddItemInputSchema.parse(input);

    const product = await deps.catalog.getProduct(parsed.productId);
    if (!product || !product.available) {
      throw new CartInvalidInputError(
        `Product not available: ${parsed.productId}`,
      );
    }

    const cart =
      (await deps.store.get(owner, { bypassCache: true })) ?? create(owner);
    const at = deps.now();
    const line = {
      productId: parsed.productId,
      variantId: parsed.variantId,
      unitPrice: product.price,
    };
    const existing = cart.items.find((item) => isSameLine(item, line));
    const quantity = (existing?.quantity ?? 0) + parsed.quantity;
    if (quantity > MAX_ITEM_QUANTITY) {
      throw new CartInvalidInputError(
        `A line holds at most ${MAX_ITEM_QUANTITY} units`,
      );
    }
    if (quantity > product.stockQuantity) {
      throw new CartInvalidInputError(
        `Insufficient stock for ${parsed.productId}`,
      );
    }

    const items: CartItem[] = existing
      ? cart.items.map((item) =>
          item.id === existing.id
            ? {
                ...item,
                quantity,
                stockQuantity: product.stockQuantity,
                stockIssue: null,
                updatedAt: at,
              }
            : item,
        )
      : [
          ...cart.items,
          {
            id: deps.newId(),
            cartId: cart.id,
            productId: parsed.productId,
            variantId: parsed.variantId,
            productName: product.name,
            category: product.category,
            quantity: parsed.quantity,
            unitPrice: product.price,
            stockQuantity: product.stockQuantity,
            stockIssue: null,
            specialInstructions: parsed.specialInstructions,
            isGift: parsed.isGift,
            giftMessage: parsed.giftMessage,
            createdAt: at,
            updatedAt: at,
          },
        ];

    const next = await derive(touch({ ...cart, items }, at));
    const reservation = {
      productId: parsed.productId,
      variantId: parsed.variantId,
      quantity: parsed.quantity,
    };
    await deps.inventory.reserve(reservation);
    try {
      return await deps.store.save(next);
    } catch (error) {
      await release(cart.id, [reservation]);
      throw error;
    }
  };
}

function findItem(cart: CartEntity, itemId: string) {
  const item = cart.items.find((candidate) => candidate.id === itemId);
  if (!item) {
    throw new CartNotFoundError(`Cart item not found: ${itemId}`);
  }
  return item;
}

function createUpdateItemQuantityUseCase(deps: Dependencies) {
  const load = createLoadForWrite(deps);
  const release = createReleaseReservations(deps);
  const derive = createDerivedAmounts(deps);
  return async (input: Parameters<CartPort["updateItemQuantity"]>[0]) => {
    const owner = OwnerKeySchema.parse(input.owner);
    const { itemId, quantity } = UpdateItemInputSchema.parse(input);
    const cart = await load(owner);
    const item = findItem(cart, itemId);
    if (item.stockQuantity !== null && quantity > item.stockQuantity) {
      throw new CartInvalidInputError(
        `Insufficient stock for ${item.productId}`,
      );
    }

    const delta = quantity - item.quantity;
    const at = deps.now();
    const items = cart.items.map((candidate) =>
      candidate.id === itemId
        ? {
            ...candidate,
            quantity,
            stockIssue:
              candidate.stockIssue === "INSUFFICIENT_STOCK"
                ? null
                : candidate.stockIssue,
            updatedAt: at,
          }
        : candidate,
    );
    const next = await derive(touch({ ...cart, items }, at));
    const change = {
      productId: item.productId,
      variantId: item.variantId,
      quantity: Math.abs(delta),
    };

    if (delta > 0) await deps.inventory.reserve(change);
    let saved: CartEntity;
    try {
      saved = await deps.store.save(next);
    } catch (error) {
      if (delta > 0) await release(cart.id, [change]);
      throw error;
    }
    if (delta < 0) await release(cart.id, [change]);
    return saved;
  };
}

function createRemoveItemUseCase(deps: Dependencies) {
  const load = createLoadForWrite(deps);
  const release = createReleaseReservations(deps);
  const derive = createDerivedAmounts(deps);
  return async (input: Parameters<CartPort["removeItem"]>[0]) => {
    const owner = OwnerKeySchema.parse(input.owner);
    const { itemId } = RemoveItemInputSchema.parse(input);
    const cart = await load(owner);
    const item = findItem(cart, itemId);
    const at = deps.now();
    const saved = await deps.store.save(
      await derive(
        touch(
          { ...cart, items: cart.items.filter(({ id }) => id !== itemId) },
          at,
        ),
      ),
    );
    await release(cart.id, [item]);
    return saved;
  };
}

function createApplyCouponUseCase(deps: Dependencies) {
  const load = createLoadForWrite(deps);
  return async (input: Parameters<CartPort["applyCoupon"]>[0]) => {
    const owner = OwnerKeySchema.parse(input.owner);
    const code = ApplyCouponInputSchema.parse(input).couponCode.toUpperCase();
    const cart = await load(owner);
    const coupon = await deps.coupons.resolve(code);
    if (!coupon) {
      throw new CartInvalidInputError(`Invalid or expired coupon: ${code}`);
    }
    const { amount } = couponAmount(coupon, toCents(cart.subtotal));
    deps.logger.info(
      { cartId: cart.id, code, discount: fromCents(amount) },
      "cart.service.coupon-applied",
    );
    return deps.store.save(
      rebuildAggregates(
        touch(
          {
            ...cart,
            couponCode: coupon.code,
            discountAmount: fromCents(amount),
          },
          deps.now(),
        ),
      ),
    );
  };
}

function createRemoveCouponUseCase(deps: Dependencies) {
  const load = createLoadForWrite(deps);
  return async (input: OwnerKey) => {
    const cart = await load(OwnerKeySchema.parse(input));
    return deps.store.save(
      rebuildAggregates(
        touch({ ...cart, couponCode: null, discountAmount: 0 }, deps.now()),
      ),
    );
  };
}

function createClearCartUseCase(deps: Dependencies) {
  const load = createLoadForWrite(deps);
  const release = createReleaseReservations(deps);
  return async (input: OwnerKey) => {
    const cart = await load(OwnerKeySchema.parse(input));
    const saved = await deps.store.save(
      rebuildAggregates(
        touch(
          {
            ...cart,
            items: [],
            couponCode: null,
            discountAmount: 0,
            taxAmount: 0,
            shippingAmount: 0,
          },
          deps.now(),
        ),
      ),
    );
    await release(cart.id, cart.items);
    return saved;
  };
}

function createDeleteCartUseCase(deps: Dependencies) {
  const load = createLoadForWrite(deps);
  const release = createReleaseReservations(deps);
  return async (input: OwnerKey) => {
    const cart = await load(OwnerKeySchema.parse(input));
    await deps.store.delete(cart);
    await release(cart.id, cart.items);
  };
}

function createMergeGuestCartUseCase({
  mergeEngine,
}: Pick<Dependencies, "mergeEngine">) {
  return async (input: Parameters<CartPort["mergeGuestCartToUser"]>[0]) => {
    const { sessionId, userId } = GuestMergeInputSchema.parse(input);
    return mergeEngine.mergeGuestCartToUser(sessionId, userId);
  };
}

function createMergeUserCartsUseCase({
  mergeEngine,
}: Pick<Dependencies, "mergeEngine">) {
  return async (input: Parameters<CartPort["mergeUserCarts"]>[0]) => {
    const { userId, sourceCartIds, targetCartId } =
      UserMergeInputSchema.parse(input);
    return mergeEngine.mergeUserCarts(userId, sourceCartIds, targetCartId);
  };
}

function createCalculatePricingUseCase(deps: Dependencies) {
  const getActive = createGetActiveCartUseCase(deps);
  return async (owner: OwnerKey) => deps.pricing.price(await getActive(owner));
}

function createRepriceCartUseCase(deps: Dependencies) {
  const load = createLoadForWrite(deps);
  return async (input: OwnerKey) => {
    const cart = await load(OwnerKeySchema.parse(input));
    const pricing = await deps.pricing.price(cart);
    const saved = await deps.store.save(
      rebuildAggregates({
        ...cart,
        discountAmount: pricing.discounts.applied,
        taxAmount: pricing.tax.total,
        shippingAmount: pricing.shipping.cost,
        updatedAt: deps.now(),
      }),
    );
    return { cart: saved, pricing };
  };
}

function createValidateCartUseCase(deps: Dependencies) {
  const getActive = createGetActiveCartUseCase(deps);

  async function readCached(cart: CartEntity) {
    if (!deps.healthMonitor.isAvailable()) return undefined;
    try {
      const raw = await deps.cache.get(cacheKeys.validation(cart.id));
      if (raw === null) return undefined;
      const parsed = CartValidationResultSchema.safeParse(JSON.parse(raw));
      return parsed.success && parsed.data.version === cart.version
        ? parsed.data
        : undefined;
    } catch (error) {
      deps.logger.warn(
        { error, cartId: cart.id },
        "cart.validation.cache.read-failed",
      );
      return undefined;
    }
  }

  function storeCached(result: CartValidationResult) {
    deps.queue.enqueue(result.cartId, "cart.validation.store", async () => {
      if (!deps.healthMonitor.isAvailable()) return;
      await deps.cache.set(
        cacheKeys.validation(result.cartId),
        JSON.stringify(result),
        deps.config.validationTtlSeconds,
      );
    });
  }

  return async (owner: OwnerKey) => {
    const cart = await getActive(owner);
    const cached = await readCached(cart);
    if (cached) return cached;

    const at = deps.now();
    const issues: CartValidationIssue[] = [];
    if (isExpired(cart, at)) {
      issues.push({
        code: "CART_EXPIRED",
        itemId: null,
        productId: null,
        message: `Cart expired at ${cart.expiresAt.toISOString()}`,
      });
    }
    for (const item of cart.items) {
      issues.push(...(await validateItem(deps.catalog, item)));
    }
    const result: CartValidationResult = {
      cartId: cart.id,
      version: cart.version,
      valid: issues.length === 0,
      issues,
      checkedAt: at,
    };
    storeCached(result);
    return result;
  };
}

async function validateItem(
  catalog: ProductCatalogPort,
  item: CartItem,
): Promise<CartValidationIssue[]> {
  const ref = { itemId: item.id, productId: item.productId };
  const product = await catalog.getProduct(item.productId);
  if (!product) {
    return [
      {
        ...ref,
        code: "PRODUCT_NOT_FOUND",
        message: `Product ${item.productId} no longer exists`,
      },
    ];
  }
  const issues: CartValidationIssue[] = [];
  if (!product.available || item.stockIssue === "UNAVAILABLE") {
    issues.push({
      ...ref,
      code: "PRODUCT_UNAVAILABLE",
      message: `${product.name} is unavailable`,
    });
  } else if (item.quantity > product.stockQuantity) {
    issues.push({
      ...ref,
      code: "INSUFFICIENT_STOCK",
      message: `Only ${product.stockQuantity} of ${product.name} in stock`,
      availableQuantity: product.stockQuantity,
    });
  }
  if (toCents(product.price) !== toCents(item.unitPrice)) {
    issues.push({
      ...ref,
      code: "PRICE_CHANGED",
      message: `${product.name} now costs ${product.price}`,
      currentPrice: product.price,
    });
  }
  return issues;
}

function createHandleProductEventUseCase({
  broadcaster,
}: Pick<Dependencies, "broadcaster">) {
  return async (input: unknown) =>
    broadcaster.productChanged(ProductEventSchema.parse(input));
}

/**
 * Moves one batch of expired carts to their expiry status and releases the
 * stock they held. The worker calls this on a timer.
 */
function createProcessExpiredCartsUseCase(deps: Dependencies) {
  const release = createReleaseReservations(deps);
  return async () => {
    const at = deps.now();
    const expired = await deps.repository.findExpired({
      now: at,
      limit: deps.config.expirationBatchSize,
    });
    let processed = 0;
    let failed = 0;
    for (const cart of expired) {
      try {
        await deps.store.save(transitionTo(cart, expiredStatusFor(cart), at));
        await release(cart.id, cart.items);
        processed++;
      } catch (error) {
        failed++;
        deps.logger.error(
          { error, cartId: cart.id },
          "cart.expiration.cart-failed",
        );
      }
    }
    deps.logger.info({ processed, failed }, "cart.expiration.sweep");
    return { processed, failed };
  };
}
