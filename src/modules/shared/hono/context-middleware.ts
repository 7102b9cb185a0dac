import type { Context } from "hono";
import { AsyncLocalStorage } from "node:async_hooks";
import crypto from "node:crypto";

export interface AppContext {
  requestId: string;
  userId: string | null;
  sessionId: string | null;
}

const als = new AsyncLocalStorage<AppContext>();

/**
 * Stores the request context in AsyncLocalStorage so that anything running
 * for the request can read it through `getContext()`.
 *
 * The cart owner comes from the `X-User-Id` header (authenticated) or the
 * `X-Session-Id` header (guest). Authentication itself happens upstream.
 */
export function createContextMiddleware() {
  return async (c: Context, next: () => Promise<void>) => {
    const appContext: AppContext = {
      requestId: c.req.header("x-request-id") ?? crypto.randomUUID(),
      userId: nonEmpty(c.req.header("x-user-id")),
      sessionId: nonEmpty(c.req.header("x-session-id")),
    };
    c.header("x-request-id", appContext.requestId);
    await als.run(appContext, () => next());
  };
}

export function getContext(): AppContext {
  return (
    als.getStore() ?? {
      requestId: crypto.randomUUID(),
      userId: null,
      sessionId: null,
    }
  );
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
