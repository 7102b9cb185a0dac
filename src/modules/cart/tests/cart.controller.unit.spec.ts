import { faker } from "@faker-js/faker";
import { describe, expect, it, vi } from "vitest";
import { DatabaseError } from "../../shared/infra/db.js";
import { createCartController } from "../adapters/inbound/http/cart.controller.js";
import { UpstreamServiceError } from "../adapters/outbound/services/http-json.client.js";
import type { CartPort } from "../application/ports/inbound/cart.port.js";
import type { CacheHealthReport } from "../application/store/health-monitor.js";
import {
  CartNotFoundError,
  CartOwnershipError,
  ConcurrentCartModificationError,
  MergeRejectedError,
  PricingInputUnavailableError,
} from "../errors.js";
import { createMockLogger, makeCart } from "./fakes.js";

function createFakeCartPort() {
  return {
    getOrCreateCart: vi.fn<CartPort["getOrCreateCart"]>(),
    getActiveCart: vi.fn<CartPort["getActiveCart"]>(),
    addItem: vi.fn<CartPort["addItem"]>(),
    updateItemQuantity: vi.fn<CartPort["updateItemQuantity"]>(),
    removeItem: vi.fn<CartPort["removeItem"]>(),
    applyCoupon: vi.fn<CartPort["applyCoupon"]>(),
    removeCoupon: vi.fn<CartPort["removeCoupon"]>(),
    clearCart: vi.fn<CartPort["clearCart"]>(),
    deleteCart: vi.fn<CartPort["deleteCart"]>(),
    mergeGuestCartToUser: vi.fn<CartPort["mergeGuestCartToUser"]>(),
    mergeUserCarts: vi.fn<CartPort["mergeUserCarts"]>(),
    calculateCartPricing: vi.fn<CartPort["calculateCartPricing"]>(),
    repriceCart: vi.fn<CartPort["repriceCart"]>(),
    validateCart: vi.fn<CartPort["validateCart"]>(),
    handleProductEvent: vi.fn<CartPort["handleProductEvent"]>(),
    processExpiredCarts: vi.fn<CartPort["processExpiredCarts"]>(),
    recoverCache: vi.fn<CartPort["recoverCache"]>(),
    getCacheHealth: vi.fn<CartPort["getCacheHealth"]>(),
  } satisfies CartPort;
}

function healthReport(available: boolean): CacheHealthReport {
  return {
    available,
    checks: {
      connectivity: available,
      readWrite: available,
      pipeline: available,
    },
    responseTimeMs: available ? 2 : null,
    lastError: available ? null : "Connection is closed.",
    lastCheckedAt: null,
  };
}

describe("Cart HTTP controller", () => {
  function setup() {
    const cartPort = createFakeCartPort();
    const logger = createMockLogger();
    const app = createCartController({ cartPort, logger });
    return { app, cartPort, logger };
  }

  const asUser = { "x-user-id": "user-1" };

  describe("GET /api/carts/current", () => {
    it("should get or create the user's cart", async () => {
      const { app, cartPort } = setup();
      const cart = makeCart({ id: faker.string.uuid() });
      cartPort.getOrCreateCart.mockResolvedValue(cart);

      const response = await app.request("/api/carts/current", {
        headers: { ...asUser, "x-session-id": "session-1" },
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ id: cart.id });
      expect(cartPort.getOrCreateCart).toHaveBeenCalledWith({
        kind: "user",
        userId: "user-1",
      });
    });

    it("should fall back to the guest session and echo the request id", async () => {
      const { app, cartPort } = setup();
      cartPort.getOrCreateCart.mockResolvedValue(
        makeCart({ userId: null, sessionId: "session-1", cartType: "GUEST" }),
      );

      const response = await app.request("/api/carts/current", {
        headers: { "x-session-id": "session-1", "x-request-id": "req-1" },
      });

      expect(response.status).toBe(200);
      expect(response.headers.get("x-request-id")).toBe("req-1");
      expect(cartPort.getOrCreateCart).toHaveBeenCalledWith({
        kind: "session",
        sessionId: "session-1",
      });
    });

    it("should return 404 when asked not to create", async () => {
      const { app, cartPort } = setup();
      cartPort.getActiveCart.mockRejectedValue(
        new CartNotFoundError("No active cart for user user-1"),
      );

      const response = await app.request("/api/carts/current?create=false", {
        headers: asUser,
      });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        message: "No active cart for user user-1",
        code: "CartNotFoundError",
      });
      expect(cartPort.getOrCreateCart).not.toHaveBeenCalled();
    });

    it("should require an owner header", async () => {
      const { app, cartPort } = setup();

      const response = await app.request("/api/carts/current");

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        message: "An X-User-Id or X-Session-Id header is required",
        code: "CartInvalidInputError",
      });
      expect(cartPort.getOrCreateCart).not.toHaveBeenCalled();
    });
  });

  describe("items", () => {
    it("should add an item with 201", async () => {
      const { app, cartPort } = setup();
      cartPort.addItem.mockResolvedValue(makeCart());

      const response = await app.request("/api/carts/current/items", {
        method: "POST",
        headers: asUser,
        body: JSON.stringify({ productId: "product-a", quantity: 2 }),
      });

      expect(response.status).toBe(201);
      expect(cartPort.addItem).toHaveBeenCalledWith({
        owner: { kind: "user", userId: "user-1" },
        productId: "product-a",
        variantId: null,
        quantity: 2,
        specialInstructions: null,
        isGift: false,
        giftMessage: null,
      });
    });

    it("should reject an invalid quantity before calling the service", async () => {
      const { app, cartPort, logger } = setup();

      const response = await app.request("/api/carts/current/items", {
        method: "POST",
        headers: asUser,
        body: JSON.stringify({ productId: "product-a", quantity: 0 }),
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        message: "Invalid request",
        issues: [expect.objectContaining({ path: ["quantity"] })],
      });
      expect(cartPort.addItem).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it("should reject a body that is not JSON", async () => {
      const { app } = setup();

      const response = await app.request("/api/carts/current/items", {
        method: "POST",
        headers: asUser,
        body: "{",
      });

      expect(response.status).toBe(400);
    });

    it("should update the line named in the path", async () => {
      const { app, cartPort } = setup();
      const itemId = faker.string.uuid();
      cartPort.updateItemQuantity.mockResolvedValue(makeCart());

      const response = await app.request(`/api/carts/current/items/${itemId}`, {
        method: "PATCH",
        headers: asUser,
        body: JSON.stringify({ quantity: 4 }),
      });

      expect(response.status).toBe(200);
      expect(cartPort.updateItemQuantity).toHaveBeenCalledWith({
        owner: { kind: "user", userId: "user-1" },
        itemId,
        quantity: 4,
      });
    });
  });

  describe("error mapping", () => {
    it("should report a merge rejection with its reason", async () => {
      const { app, cartPort } = setup();
      cartPort.mergeGuestCartToUser.mockRejectedValue(
        new MergeRejectedError("VALUE_LIMIT_EXCEEDED", "Merged cart too large"),
      );

      const response = await app.request("/api/carts/merge/guest", {
        method: "POST",
        headers: { ...asUser, "x-session-id": "session-1" },
      });

      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({
        message: "Merged cart too large",
        code: "MergeRejectedError",
        reason: "VALUE_LIMIT_EXCEEDED",
        retryable: false,
      });
      expect(cartPort.mergeGuestCartToUser).toHaveBeenCalledWith({
        sessionId: "session-1",
        userId: "user-1",
      });
    });

    it("should mark a version conflict as retryable", async () => {
      const { app, cartPort } = setup();
      const cartId = faker.string.uuid();
      cartPort.clearCart.mockRejectedValue(
        new ConcurrentCartModificationError(cartId, 3),
      );

      const response = await app.request("/api/carts/current/clear", {
        method: "POST",
        headers: asUser,
      });

      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({
        message: `Cart ${cartId} changed since version 3`,
        code: "ConcurrentCartModificationError",
        retryable: true,
      });
    });

    it("should return 403 for a cart owned by someone else", async () => {
      const { app, cartPort } = setup();
      const targetCartId = faker.string.uuid();
      cartPort.mergeUserCarts.mockRejectedValue(
        new CartOwnershipError(targetCartId, "user-1"),
      );

      const response = await app.request("/api/carts/merge", {
        method: "POST",
        headers: asUser,
        body: JSON.stringify({ sourceCartIds: [targetCartId], targetCartId }),
      });

      expect(response.status).toBe(403);
      expect(cartPort.mergeUserCarts).toHaveBeenCalledWith({
        userId: "user-1",
        sourceCartIds: [targetCartId],
        targetCartId,
      });
    });

    it.each([
      ["pricing", new PricingInputUnavailableError("tax", new Error("timeout"))],
      [
        "storage",
        new DatabaseError({ message: "Failed to load cart", cause: null }),
      ],
      [
        "a collaborator",
        new UpstreamServiceError(
          "customer",
          "GET /users/user-1/loyalty returned an unreadable body",
          { cause: new SyntaxError("Unexpected end of JSON input"), status: 200 },
        ),
      ],
    ])(
      "should return a retryable 503 when %s is unavailable",
      async (_, error) => {
        const { app, cartPort, logger } = setup();
        cartPort.calculateCartPricing.mockRejectedValue(error);

        const response = await app.request("/api/carts/current/pricing", {
          headers: asUser,
        });

        expect(response.status).toBe(503);
        expect(await response.json()).toMatchObject({
          message: error.message,
          retryable: true,
        });
        expect(logger.error).toHaveBeenCalledWith(
          expect.objectContaining({ error }),
          "calculateCartPricing",
        );
      },
    );

    it("should hide unexpected failures", async () => {
      const { app, cartPort } = setup();
      cartPort.validateCart.mockRejectedValue(new TypeError("boom"));

      const response = await app.request("/api/carts/current/validation", {
        headers: asUser,
      });

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        message: "Internal server error",
      });
    });

    it("should require a session for a guest merge", async () => {
      const { app, cartPort } = setup();

      const response = await app.request("/api/carts/merge/guest", {
        method: "POST",
        headers: asUser,
      });

      expect(response.status).toBe(400);
      expect(cartPort.mergeGuestCartToUser).not.toHaveBeenCalled();
    });
  });

  it("should accept product events with 202", async () => {
    const { app, cartPort } = setup();
    cartPort.handleProductEvent.mockResolvedValue({
      cartsUpdated: 2,
      itemsFlagged: 0,
      failures: 0,
    });

    const response = await app.request("/api/products/product-a/events", {
      method: "POST",
      body: JSON.stringify({ type: "PRICE_CHANGED", newPrice: 12 }),
    });

    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({
      cartsUpdated: 2,
      itemsFlagged: 0,
      failures: 0,
    });
    expect(cartPort.handleProductEvent).toHaveBeenCalledWith({
      type: "PRICE_CHANGED",
      newPrice: 12,
      productId: "product-a",
    });
  });

  it.each([
    [true, 200],
    [false, 503],
  ])("should report cache health (available: %s)", async (available, status) => {
    const { app, cartPort } = setup();
    cartPort.getCacheHealth.mockReturnValue(healthReport(available));

    const response = await app.request("/api/health/cache");

    expect(response.status).toBe(status);
    expect(await response.json()).toMatchObject({ available });
  });
});
