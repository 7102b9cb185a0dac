import { describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import type { Coupon } from "../application/ports/outbound/coupon.port.js";
import type { ProductSnapshot } from "../application/ports/outbound/product-catalog.port.js";
import { assembleCartModule, type CartModuleConfig } from "../cart.module.js";
import type { CartEntity, OwnerKey } from "../domain/cart.entity.js";
import { CartInvalidInputError, CartNotFoundError } from "../errors.js";
import {
  createFakeCatalog,
  createFakeCoupons,
  createFakeCustomers,
  createFakeInventory,
  createFakePromotions,
  createFakeShipping,
  createIdSequence,
  createInMemoryCache,
  createInMemoryCartRepository,
  createMockLogger,
  makeCart,
  makeItem,
  makeProduct,
  NOW,
  uuid,
} from "./fakes.js";

const CONFIG: CartModuleConfig = {
  cart: { defaultCurrency: "USD", guestTtlDays: 7, userTtlDays: 30 },
  cache: {
    healthIntervalMs: 30_000,
    cartTtlSeconds: 1800,
    productInfoTtlSeconds: 300,
    validationTtlSeconds: 60,
    recoveryWindowMs: 24 * 60 * 60 * 1000,
    recoveryBatchSize: 100,
    recoveryPauseMs: 0,
  },
  tasks: { concurrency: 4, maxPending: 1000 },
  expiration: { sweepIntervalMs: 60_000, batchSize: 100 },
  merge: {
    maxItemCount: 100,
    maxTotalAmount: 10_000,
    quantityOverflow: "drop-line",
  },
  pricing: {
    taxFailureMode: "fail",
    shippingFailureMode: "fail",
    flatShippingRate: 5.99,
  },
};

const user: OwnerKey = { kind: "user", userId: "user-1" };
const guest: OwnerKey = { kind: "session", sessionId: "session-9" };

describe("CartService", () => {
  async function setup({
    carts = [],
    products = [makeProduct()],
    coupons = [],
    probe = true,
  }: {
    carts?: CartEntity[];
    products?: ProductSnapshot[];
    coupons?: Coupon[];
    probe?: boolean;
  } = {}) {
    const repository = createInMemoryCartRepository(carts);
    const cache = createInMemoryCache();
    const catalog = createFakeCatalog(products);
    const inventory = createFakeInventory();
    const couponPort = createFakeCoupons(coupons);
    const logger = createMockLogger();
    const module = assembleCartModule({
      collaborators: {
        repository,
        cache,
        customers: createFakeCustomers(),
        promotions: createFakePromotions(),
        coupons: couponPort,
        catalog,
        inventory,
        shipping: createFakeShipping(),
      },
      config: CONFIG,
      logger,
      now: () => NOW,
      newId: createIdSequence(),
      sleep: async () => {},
    });
    if (probe) {
      await module.healthMonitor.probe();
      await module.queue.drain();
    }
    return {
      ...module,
      service: module.cartPort,
      repository,
      cache,
      catalog,
      inventory,
      coupons: couponPort,
      logger,
    };
  }

  const cartWithLine = (quantity = 2) =>
    makeCart({ items: [makeItem({ id: uuid(901), quantity })] });

  describe("getOrCreateCart", () => {
    it("should create a guest cart once per session", async () => {
      const { service, queue, cache } = await setup();

      const created = await service.getOrCreateCart(guest);
      const again = await service.getOrCreateCart(guest);
      await queue.drain();

      expect(created).toMatchObject({
        id: uuid(1000),
        cartType: "GUEST",
        sessionId: "session-9",
        userId: null,
        version: 1,
        expiresAt: new Date("2026-03-08T12:00:00.000Z"),
      });
      expect(again.id).toBe(created.id);
      expect(cache.value("cart-owner:session:session-9")).toBe(uuid(1000));
    });

    it("should reject a malformed owner", async () => {
      const { service } = await setup();

      await expect(
        service.getOrCreateCart({ kind: "user", userId: "" }),
      ).rejects.toThrow(ZodError);
    });
  });

  describe("addItem", () => {
    it("should reserve stock and add a new line", async () => {
      const { service, inventory } = await setup();

      const cart = await service.addItem({
        owner: user,
        productId: "product-a",
        quantity: 2,
      });

      expect(cart).toMatchObject({
        id: uuid(1000),
        subtotal: 20,
        itemCount: 1,
        totalQuantity: 2,
        version: 1,
      });
      expect(cart.items[0]).toMatchObject({
        id: uuid(1001),
        productName: "Product A",
        unitPrice: 10,
        stockQuantity: 50,
      });
      expect(inventory.reserve).toHaveBeenCalledWith({
        productId: "product-a",
        variantId: null,
        quantity: 2,
      });
    });

    it("should add to a matching line", async () => {
      const { service, inventory } = await setup({ carts: [cartWithLine()] });

      const cart = await service.addItem({
        owner: user,
        productId: "product-a",
        quantity: 3,
      });

      expect(cart.items.map((item) => [item.id, item.quantity])).toEqual([
        [uuid(901), 5],
      ]);
      expect(cart.version).toBe(2);
      expect(inventory.reserve).toHaveBeenCalledWith({
        productId: "product-a",
        variantId: null,
        quantity: 3,
      });
    });

    it("should refuse unavailable products", async () => {
      const { service, inventory } = await setup({
        products: [makeProduct({ available: false })],
      });

      await expect(
        service.addItem({ owner: user, productId: "product-a", quantity: 1 }),
      ).rejects.toThrow(CartInvalidInputError);
      await expect(
        service.addItem({ owner: user, productId: "product-z", quantity: 1 }),
      ).rejects.toThrow("Product not available: product-z");
      expect(inventory.reserve).not.toHaveBeenCalled();
    });

    it("should refuse more than the stock on hand", async () => {
      const { service, inventory } = await setup({
        products: [makeProduct({ stockQuantity: 4 })],
      });

      await expect(
        service.addItem({ owner: user, productId: "product-a", quantity: 5 }),
      ).rejects.toThrow("Insufficient stock for product-a");
      expect(inventory.reserve).not.toHaveBeenCalled();
    });

    it("should cap a line at 99 units", async () => {
      const { service } = await setup({
        carts: [cartWithLine(98)],
        products: [makeProduct({ stockQuantity: 500 })],
      });

      await expect(
        service.addItem({ owner: user, productId: "product-a", quantity: 2 }),
      ).rejects.toThrow("A line holds at most 99 units");
    });

    it("should release the reservation when the save fails", async () => {
      const { service, inventory, repository } = await setup();
      vi.spyOn(repository, "saveCart").mockRejectedValueOnce(
        new Error("connection reset"),
      );

      await expect(
        service.addItem({ owner: user, productId: "product-a", quantity: 2 }),
      ).rejects.toThrow("connection reset");
      expect(inventory.release).toHaveBeenCalledWith({
        productId: "product-a",
        variantId: null,
        quantity: 2,
      });
    });
  });

  describe("updateItemQuantity", () => {
    it("should reserve only the increase", async () => {
      const { service, inventory } = await setup({ carts: [cartWithLine()] });

      const cart = await service.updateItemQuantity({
        owner: user,
        itemId: uuid(901),
        quantity: 5,
      });

      expect(cart.subtotal).toBe(50);
      expect(inventory.reserve).toHaveBeenCalledWith({
        productId: "product-a",
        variantId: null,
        quantity: 3,
      });
      expect(inventory.release).not.toHaveBeenCalled();
    });

    it("should release the decrease after saving", async () => {
      const { service, inventory } = await setup({ carts: [cartWithLine()] });

      const cart = await service.updateItemQuantity({
        owner: user,
        itemId: uuid(901),
        quantity: 1,
      });

      expect(cart.totalQuantity).toBe(1);
      expect(inventory.release).toHaveBeenCalledWith({
        productId: "product-a",
        variantId: null,
        quantity: 1,
      });
      expect(inventory.reserve).not.toHaveBeenCalled();
    });

    it("should refuse a quantity above the line's known stock", async () => {
      const { service } = await setup({ carts: [cartWithLine()] });

      await expect(
        service.updateItemQuantity({
          owner: user,
          itemId: uuid(901),
          quantity: 60,
        }),
      ).rejects.toThrow(CartInvalidInputError);
    });

    it("should report an unknown line", async () => {
      const { service } = await setup({ carts: [cartWithLine()] });

      await expect(
        service.updateItemQuantity({
          owner: user,
          itemId: uuid(999),
          quantity: 1,
        }),
      ).rejects.toThrow(CartNotFoundError);
    });
  });

  it("should remove a line and release its stock", async () => {
    const { service, inventory } = await setup({ carts: [cartWithLine()] });

    const cart = await service.removeItem({ owner: user, itemId: uuid(901) });

    expect(cart).toMatchObject({ items: [], subtotal: 0, totalAmount: 0 });
    expect(inventory.release).toHaveBeenCalledWith({
      productId: "product-a",
      variantId: null,
      quantity: 2,
    });
  });

  describe("coupons", () => {
    it("should apply a coupon by its upper-cased code", async () => {
      const { service, coupons } = await setup({
        carts: [cartWithLine()],
        coupons: [{ code: "SPRING10", kind: "percentage", rate: 0.1 }],
      });

      const cart = await service.applyCoupon({
        owner: user,
        couponCode: " spring10 ",
      });

      expect(coupons.resolve).toHaveBeenCalledWith("SPRING10");
      expect(cart).toMatchObject({
        couponCode: "SPRING10",
        discountAmount: 2,
        totalAmount: 18,
      });
    });

    it("should refuse an unknown code", async () => {
      const { service } = await setup({ carts: [cartWithLine()] });

      await expect(
        service.applyCoupon({ owner: user, couponCode: "nope" }),
      ).rejects.toThrow("Invalid or expired coupon: NOPE");
    });

    it("should work the discount out again when the lines change", async () => {
      const { service } = await setup({
        carts: [
          makeCart({
            items: [makeItem({ id: uuid(901), quantity: 10 })],
            couponCode: "SPRING10",
            discountAmount: 10,
            taxAmount: 7,
            shippingAmount: 5,
            totalAmount: 102,
          }),
        ],
        coupons: [{ code: "SPRING10", kind: "percentage", rate: 0.1 }],
      });

      const cart = await service.updateItemQuantity({
        owner: user,
        itemId: uuid(901),
        quantity: 5,
      });

      expect(cart).toMatchObject({
        subtotal: 50,
        couponCode: "SPRING10",
        discountAmount: 5,
        taxAmount: 0,
        shippingAmount: 0,
        totalAmount: 45,
      });
    });

    it("should drop a coupon that no longer resolves when the lines change", async () => {
      const { service, logger } = await setup({
        carts: [
          makeCart({
            items: [makeItem({ id: uuid(901), quantity: 2 })],
            couponCode: "GONE",
            discountAmount: 2,
            totalAmount: 18,
          }),
        ],
      });

      const cart = await service.addItem({
        owner: user,
        productId: "product-a",
        quantity: 1,
      });

      expect(cart).toMatchObject({
        subtotal: 30,
        couponCode: null,
        discountAmount: 0,
        totalAmount: 30,
      });
      expect(logger.info).toHaveBeenCalledWith(
        { cartId: uuid(1), code: "GONE" },
        "cart.coupon.dropped",
      );
    });

    it("should remove the coupon and its discount", async () => {
      const { service } = await setup({
        carts: [
          makeCart({
            items: [makeItem({ quantity: 2 })],
            couponCode: "SPRING10",
            discountAmount: 2,
            totalAmount: 18,
          }),
        ],
      });

      const cart = await service.removeCoupon(user);

      expect(cart).toMatchObject({
        couponCode: null,
        discountAmount: 0,
        totalAmount: 20,
      });
    });
  });

  it("should clear every line and release them", async () => {
    const { service, inventory } = await setup({
      carts: [
        makeCart({
          items: [
            makeItem({ id: uuid(901), quantity: 2 }),
            makeItem({ id: uuid(902), productId: "product-b", quantity: 1 }),
          ],
        }),
      ],
    });

    const cart = await service.clearCart(user);

    expect(cart).toMatchObject({ items: [], itemCount: 0, totalAmount: 0 });
    expect(inventory.release).toHaveBeenCalledTimes(2);
  });

  it("should delete the cart so the owner has none", async () => {
    const { service, inventory, repository, queue } = await setup({
      carts: [cartWithLine()],
    });

    await service.deleteCart(user);
    await queue.drain();

    expect(repository.stored(uuid(1))).toMatchObject({
      status: "DELETED",
      deletedAt: NOW,
    });
    expect(inventory.release).toHaveBeenCalledTimes(1);
    await expect(service.getActiveCart(user)).rejects.toThrow(
      CartNotFoundError,
    );
  });

  it("should persist the priced totals on reprice", async () => {
    const { service } = await setup({
      carts: [
        makeCart({
          items: [
            makeItem({ id: uuid(901), unitPrice: 10, quantity: 2 }),
            makeItem({
              id: uuid(902),
              productId: "product-b",
              unitPrice: 20,
              quantity: 3,
            }),
          ],
        }),
      ],
    });

    const { cart, pricing } = await service.repriceCart(user);

    expect(pricing.grandTotal).toBe(87.08);
    expect(cart).toMatchObject({
      subtotal: 80,
      discountAmount: 4,
      taxAmount: 6.08,
      shippingAmount: 5,
      totalAmount: 87.08,
      version: 2,
    });
  });

  describe("validateCart", () => {
    it("should report stock and price drift", async () => {
      const { service } = await setup({
        carts: [cartWithLine()],
        products: [makeProduct({ price: 12, stockQuantity: 1 })],
      });

      const result = await service.validateCart(user);

      expect(result).toEqual({
        cartId: uuid(1),
        version: 1,
        valid: false,
        checkedAt: NOW,
        issues: [
          {
            code: "INSUFFICIENT_STOCK",
            itemId: uuid(901),
            productId: "product-a",
            message: "Only 1 of Product A in stock",
            availableQuantity: 1,
          },
          {
            code: "PRICE_CHANGED",
            itemId: uuid(901),
            productId: "product-a",
            message: "Product A now costs 12",
            currentPrice: 12,
          },
        ],
      });
    });

    it("should cache the result for the cart's version", async () => {
      const { service, queue, cache } = await setup({ carts: [cartWithLine()] });

      const first = await service.validateCart(user);
      await queue.drain();
      const second = await service.validateCart(user);

      expect(first.valid).toBe(true);
      expect(cache.entries.get(`cart-validation:${uuid(1)}`)?.ttlSeconds).toBe(
        60,
      );
      expect(second).toEqual(first);
    });

    it("should flag an expired cart", async () => {
      const { service } = await setup({
        carts: [makeCart({ expiresAt: new Date(NOW.getTime() - 1) })],
      });

      const result = await service.validateCart(user);

      expect(result.issues.map((issue) => issue.code)).toEqual([
        "CART_EXPIRED",
      ]);
    });
  });

  describe("handleProductEvent", () => {
    it("should reprice carts holding the product", async () => {
      const { service, repository } = await setup({ carts: [cartWithLine()] });

      const result = await service.handleProductEvent({
        type: "PRICE_CHANGED",
        productId: "product-a",
        newPrice: 12,
      });

      expect(result).toEqual({ cartsUpdated: 1, itemsFlagged: 0, failures: 0 });
      expect(repository.stored(uuid(1))?.subtotal).toBe(24);
    });

    it("should reject a malformed event", async () => {
      const { service } = await setup();

      await expect(
        service.handleProductEvent({ type: "PRICE_CHANGED", productId: "x" }),
      ).rejects.toThrow(ZodError);
    });
  });

  describe("processExpiredCarts", () => {
    const expired = new Date(NOW.getTime() - 1);
    const expiredCarts = () => [
      makeCart({
        id: uuid(20),
        userId: null,
        sessionId: "session-1",
        cartType: "GUEST",
        expiresAt: expired,
        items: [makeItem({ id: uuid(920) })],
      }),
      makeCart({
        id: uuid(21),
        userId: "user-2",
        expiresAt: expired,
        items: [makeItem({ id: uuid(921) })],
      }),
      makeCart({ id: uuid(22), userId: "user-3" }),
    ];

    it("should delete guest carts and abandon user carts", async () => {
      const { service, repository, inventory } = await setup({
        carts: expiredCarts(),
      });

      const result = await service.processExpiredCarts();

      expect(result).toEqual({ processed: 2, failed: 0 });
      expect(repository.stored(uuid(20))?.status).toBe("DELETED");
      expect(repository.stored(uuid(21))?.status).toBe("ABANDONED");
      expect(repository.stored(uuid(22))?.status).toBe("ACTIVE");
      expect(inventory.release).toHaveBeenCalledTimes(2);
    });

    it("should keep going past a cart that fails", async () => {
      const { service, repository, logger } = await setup({
        carts: expiredCarts(),
      });
      vi.spyOn(repository, "saveCart").mockRejectedValueOnce(
        new Error("deadlock detected"),
      );

      const result = await service.processExpiredCarts();

      expect(result).toEqual({ processed: 1, failed: 1 });
      expect(repository.stored(uuid(20))?.status).toBe("ACTIVE");
      expect(logger.error).toHaveBeenCalledWith(
        { error: new Error("deadlock detected"), cartId: uuid(20) },
        "cart.expiration.cart-failed",
      );
    });
  });

  describe("cache lifecycle", () => {
    it("should report unavailable until the first probe", async () => {
      const { service } = await setup({ probe: false });

      expect(service.getCacheHealth().available).toBe(false);
    });

    it("should repopulate the cache once it becomes available", async () => {
      const { service, cache } = await setup({ carts: [cartWithLine()] });

      expect(service.getCacheHealth().available).toBe(true);
      expect(cache.value(`cart:${uuid(1)}`)).toBeDefined();
      expect(cache.value("cart-owner:user:user-1")).toBe(uuid(1));
    });

    it("should rebuild on demand", async () => {
      const { service } = await setup({
        carts: [cartWithLine(), makeCart({ id: uuid(2), userId: "user-2" })],
      });

      await expect(service.recoverCache()).resolves.toEqual({
        scanned: 2,
        synced: 2,
        purged: 0,
        batches: 1,
        completed: true,
      });
    });
  });
});
