import type { Logger } from "../../../shared/infra/logger.js";
import type { TaskQueue } from "../../../shared/infra/task-queue.js";
import type { CartEntity } from "../../domain/cart.entity.js";
import { ownerKeyOf } from "../../domain/cart.model.js";
import type {
  CacheBackendPort,
  CacheOperation,
} from "../ports/outbound/cache-backend.port.js";
import type { CartRepositoryPort } from "../ports/outbound/cart-repository.port.js";
import { cacheKeys, cartTtlSeconds, serializeCart } from "./cache-keys.js";
import type { AvailabilityReader } from "./health-monitor.js";

export type RecoveryResult = {
  scanned: number;
  synced: number;
  purged: number;
  batches: number;
  completed: boolean;
};

export type ConsistencySynchronizer = {
  syncCartToCache(cart: CartEntity): Promise<boolean>;
  /** Re-reads the cart from the durable store and syncs what it finds. */
  syncLatestToCache(cartId: string): Promise<boolean>;
  scheduleSync(cart: CartEntity): void;
  syncManyToCache(carts: CartEntity[]): Promise<number>;
  recoverToCache(): Promise<RecoveryResult>;
};

type Dependencies = {
  cache: CacheBackendPort;
  repository: CartRepositoryPort;
  availability: AvailabilityReader;
  queue: TaskQueue;
  logger: Logger;
  config: {
    cartTtlSeconds: number;
    recoveryWindowMs: number;
    recoveryBatchSize: number;
    recoveryPauseMs: number;
  };
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Pushes durable cart state into the cache. Only ACTIVE carts are cached;
 * syncing any other cart removes its entries instead.
 */
export function createConsistencySynchronizer({
  cache,
  repository,
  availability,
  queue,
  logger,
  config,
  now = () => new Date(),
  sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
}: Dependencies): ConsistencySynchronizer {
  function operationsFor(cart: CartEntity, at: Date): CacheOperation[] {
    // The owner index may already point at the owner's next cart, so only
    // the snapshot goes. An index left pointing here reads as a miss.
    if (cart.status !== "ACTIVE") {
      return [{ op: "del", key: cacheKeys.cart(cart.id) }];
    }
    const ownerKey = cacheKeys.owner(ownerKeyOf(cart));
    const ttlSeconds = cartTtlSeconds(cart, at, config.cartTtlSeconds);
    return [
      {
        op: "set",
        key: cacheKeys.cart(cart.id),
        value: serializeCart(cart),
        ttlSeconds,
      },
      { op: "set", key: ownerKey, value: cart.id, ttlSeconds },
    ];
  }

  async function syncCartToCache(cart: CartEntity): Promise<boolean> {
    if (!availability.isAvailable()) {
      logger.debug({ cartId: cart.id }, "cart.sync.skipped");
      return false;
    }
    try {
      await cache.pipeline(operationsFor(cart, now()));
      logger.debug(
        { cartId: cart.id, version: cart.version },
        "cart.sync.synced",
      );
      return true;
    } catch (error) {
      logger.warn({ error, cartId: cart.id }, "cart.sync.failed");
      return false;
    }
  }

  async function syncLatestToCache(cartId: string): Promise<boolean> {
    if (!availability.isAvailable()) {
      logger.debug({ cartId }, "cart.sync.skipped");
      return false;
    }
    let cart: CartEntity | undefined;
    try {
      cart = await repository.findById(cartId);
    } catch (error) {
      logger.warn({ error, cartId }, "cart.sync.reload-failed");
      return false;
    }
    return cart ? syncCartToCache(cart) : false;
  }

  async function syncManyToCache(carts: CartEntity[]): Promise<number> {
    if (carts.length === 0 || !availability.isAvailable()) return 0;
    const at = now();
    try {
      await cache.pipeline(carts.flatMap((cart) => operationsFor(cart, at)));
      return carts.filter((cart) => cart.status === "ACTIVE").length;
    } catch (error) {
      logger.warn({ error, count: carts.length }, "cart.sync.batch.failed");
      return 0;
    }
  }

  /**
   * Drops every entry of carts that left ACTIVE, owner index included. The
   * active pass that follows writes back the index of any owner that still
   * has a cart.
   */
  async function purgeFromCache(carts: CartEntity[]): Promise<number> {
    const keys = carts.flatMap((cart) => [
      cacheKeys.cart(cart.id),
      cacheKeys.validation(cart.id),
      cacheKeys.owner(ownerKeyOf(cart)),
    ]);
    try {
      await cache.del(keys);
      return carts.length;
    } catch (error) {
      logger.warn({ error, count: carts.length }, "cart.recovery.purge-failed");
      return 0;
    }
  }

  /** Keyset pages through `load`; false when the cache went away midway. */
  async function forEachPage(
    load: (afterId: string | null) => Promise<CartEntity[]>,
    handle: (batch: CartEntity[]) => Promise<void>,
    result: RecoveryResult,
  ): Promise<boolean> {
    let afterId: string | null = null;
    while (true) {
      if (!availability.isAvailable()) return false;
      const batch = await load(afterId);
      if (batch.length === 0) return true;

      result.batches++;
      result.scanned += batch.length;
      await handle(batch);
      afterId = batch[batch.length - 1].id;

      if (batch.length < config.recoveryBatchSize) return true;
      await sleep(config.recoveryPauseMs);
    }
  }

  /**
   * Invalidations are dropped while the cache is unavailable, so recovery
   * first purges carts that left ACTIVE inside the window and then rewrites
   * every recently active one.
   */
  async function recoverToCache(): Promise<RecoveryResult> {
    const since = new Date(now().getTime() - config.recoveryWindowMs);
    const limit = config.recoveryBatchSize;
    const result: RecoveryResult = {
      scanned: 0,
      synced: 0,
      purged: 0,
      batches: 0,
      completed: false,
    };
    logger.info({ since }, "cart.recovery.started");

    const purgedAll = await forEachPage(
      (afterId) => repository.findInactiveUpdatedSince({ since, afterId, limit }),
      async (batch) => {
        result.purged += await purgeFromCache(batch);
      },
      result,
    );
    const syncedAll =
      purgedAll &&
      (await forEachPage(
        (afterId) =>
          repository.findActiveUpdatedSince({ since, afterId, limit }),
        async (batch) => {
          result.synced += await syncManyToCache(batch);
        },
        result,
      ));
    if (!syncedAll) {
      logger.warn(result, "cart.recovery.aborted");
      return result;
    }

    result.completed = true;
    logger.info(result, "cart.recovery.completed");
    return result;
  }

  return {
    syncCartToCache,
    syncLatestToCache,
    // The snapshot a read saw may be older than the cache by the time the
    // task runs, so the task writes whatever the durable store holds then.
    scheduleSync(cart) {
      queue.enqueue(cart.id, "cart.sync", async () => {
        await syncLatestToCache(cart.id);
      });
    },
    syncManyToCache,
    recoverToCache,
  };
}
