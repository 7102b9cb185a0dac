/**
 * Cart HTTP Controller - Inbound adapter for HTTP requests
 * Translates HTTP requests to use case calls
 */

import { Hono, type Context } from "hono";
import { ZodError } from "zod";
import {
  createContextMiddleware,
  getContext,
} from "../../../../shared/hono/context-middleware.js";
import { DatabaseError } from "../../../../shared/infra/db.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { OwnerKey } from "../../../domain/cart.entity.js";
import {
  CartInvalidInputError,
  CartNotFoundError,
  CartOwnershipError,
  ConcurrentCartModificationError,
  InvalidCartTransitionError,
  MergeRejectedError,
  PricingInputUnavailableError,
} from "../../../errors.js";
import {
  AddItemInputSchema,
  ApplyCouponInputSchema,
  UpdateItemInputSchema,
  UserMergeInputSchema,
  type CartPort,
} from "../../../application/ports/inbound/cart.port.js";
import { UpstreamServiceError } from "../../outbound/services/http-json.client.js";

type ErrorStatus = 400 | 403 | 404 | 409 | 500 | 503;

function statusFor(error: unknown): ErrorStatus {
  if (
    error instanceof ZodError ||
    error instanceof SyntaxError ||
    error instanceof CartInvalidInputError
  ) {
    return 400;
  }
  if (error instanceof CartOwnershipError) return 403;
  if (error instanceof CartNotFoundError) return 404;
  if (
    error instanceof MergeRejectedError ||
    error instanceof ConcurrentCartModificationError ||
    error instanceof InvalidCartTransitionError
  ) {
    return 409;
  }
  if (
    error instanceof PricingInputUnavailableError ||
    error instanceof DatabaseError ||
    error instanceof UpstreamServiceError
  ) {
    return 503;
  }
  return 500;
}

function isRetryable(error: Error): boolean {
  return (
    error instanceof DatabaseError ||
    error instanceof ConcurrentCartModificationError ||
    error instanceof PricingInputUnavailableError ||
    error instanceof UpstreamServiceError
  );
}

function errorBody(error: unknown, status: ErrorStatus) {
  if (status === 500 || !(error instanceof Error)) {
    return { message: "Internal server error" };
  }
  return {
    message: error instanceof ZodError ? "Invalid request" : error.message,
    code: error.name,
    ...(error instanceof ZodError ? { issues: error.issues } : {}),
    ...(error instanceof MergeRejectedError ? { reason: error.reason } : {}),
    ...(status >= 409 ? { retryable: isRetryable(error) } : {}),
  };
}

function requireOwner(): OwnerKey {
  const { userId, sessionId } = getContext();
  if (userId) return { kind: "user", userId };
  if (sessionId) return { kind: "session", sessionId };
  throw new CartInvalidInputError(
    "An X-User-Id or X-Session-Id header is required",
  );
}

function requireUser(): string {
  const { userId } = getContext();
  if (!userId) {
    throw new CartInvalidInputError("An X-User-Id header is required");
  }
  return userId;
}

export function createCartController({
  cartPort,
  logger,
}: {
  cartPort: CartPort;
  logger: Logger;
}) {
  const app = new Hono();
  app.use(createContextMiddleware());

  function fail(c: Context, error: unknown, event: string) {
    const status = statusFor(error);
    const { requestId } = getContext();
    if (status >= 500) {
      logger.error({ error, requestId }, event);
    } else {
      logger.warn({ error, requestId }, event);
    }
    return c.json(errorBody(error, status), status);
  }

  app.get("/api/carts/current", async (c) => {
    try {
      const owner = requireOwner();
      const cart =
        c.req.query("create") === "false"
          ? await cartPort.getActiveCart(owner)
          : await cartPort.getOrCreateCart(owner);
      return c.json(cart);
    } catch (error) {
      return fail(c, error, "getCurrentCart");
    }
  });

  app.delete("/api/carts/current", async (c) => {
    try {
      await cartPort.deleteCart(requireOwner());
      return c.json({ message: "Deleted" });
    } catch (error) {
      return fail(c, error, "deleteCart");
    }
  });

  app.post("/api/carts/current/items", async (c) => {
    try {
      const owner = requireOwner();
      const item = AddItemInputSchema.parse(await c.req.json());
      const cart = await cartPort.addItem({ ...item, owner });
      return c.json(cart, 201);
    } catch (error) {
      return fail(c, error, "addItem");
    }
  });

  app.patch("/api/carts/current/items/:itemId", async (c) => {
    try {
      const owner = requireOwner();
      const { quantity } = UpdateItemInputSchema.pick({
        quantity: true,
      }).parse(await c.req.json());
      const cart = await cartPort.updateItemQuantity({
        owner,
        itemId: c.req.param("itemId"),
        quantity,
      });
      return c.json(cart);
    } catch (error) {
      return fail(c, error, "updateItemQuantity");
    }
  });

  app.delete("/api/carts/current/items/:itemId", async (c) => {
    try {
      const cart = await cartPort.removeItem({
        owner: requireOwner(),
        itemId: c.req.param("itemId"),
      });
      return c.json(cart);
    } catch (error) {
      return fail(c, error, "removeItem");
    }
  });

  app.post("/api/carts/current/coupon", async (c) => {
    try {
      const owner = requireOwner();
      const { couponCode } = ApplyCouponInputSchema.parse(await c.req.json());
      return c.json(await cartPort.applyCoupon({ owner, couponCode }));
    } catch (error) {
      return fail(c, error, "applyCoupon");
    }
  });

  app.delete("/api/carts/current/coupon", async (c) => {
    try {
      return c.json(await cartPort.removeCoupon(requireOwner()));
    } catch (error) {
      return fail(c, error, "removeCoupon");
    }
  });

  app.post("/api/carts/current/clear", async (c) => {
    try {
      return c.json(await cartPort.clearCart(requireOwner()));
    } catch (error) {
      return fail(c, error, "clearCart");
    }
  });

  app.get("/api/carts/current/pricing", async (c) => {
    try {
      return c.json(await cartPort.calculateCartPricing(requireOwner()));
    } catch (error) {
      return fail(c, error, "calculateCartPricing");
    }
  });

  app.post("/api/carts/current/reprice", async (c) => {
    try {
      return c.json(await cartPort.repriceCart(requireOwner()));
    } catch (error) {
      return fail(c, error, "repriceCart");
    }
  });

  app.get("/api/carts/current/validation", async (c) => {
    try {
      return c.json(await cartPort.validateCart(requireOwner()));
    } catch (error) {
      return fail(c, error, "validateCart");
    }
  });

  // Called on login: both the authenticated user and the guest session are known.
  app.post("/api/carts/merge/guest", async (c) => {
    try {
      const userId = requireUser();
      const { sessionId } = getContext();
      if (!sessionId) {
        throw new CartInvalidInputError("An X-Session-Id header is required");
      }
      return c.json(await cartPort.mergeGuestCartToUser({ sessionId, userId }));
    } catch (error) {
      return fail(c, error, "mergeGuestCart");
    }
  });

  app.post("/api/carts/merge", async (c) => {
    try {
      const userId = requireUser();
      const body: unknown = await c.req.json();
      const outcome = await cartPort.mergeUserCarts(
        UserMergeInputSchema.parse({ ...asObject(body), userId }),
      );
      return c.json(outcome);
    } catch (error) {
      return fail(c, error, "mergeUserCarts");
    }
  });

  app.post("/api/products/:productId/events", async (c) => {
    try {
      const body: unknown = await c.req.json();
      const result = await cartPort.handleProductEvent({
        ...asObject(body),
        productId: c.req.param("productId"),
      });
      return c.json(result, 202);
    } catch (error) {
      return fail(c, error, "handleProductEvent");
    }
  });

  app.post("/api/cache/recovery", async (c) => {
    try {
      return c.json(await cartPort.recoverCache(), 202);
    } catch (error) {
      return fail(c, error, "recoverCache");
    }
  });

  app.get("/api/health/cache", (c) => {
    const report = cartPort.getCacheHealth();
    return c.json(report, report.available ? 200 : 503);
  });

  return app;
}

function asObject(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}
