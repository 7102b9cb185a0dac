import type { Logger } from "../../../shared/infra/logger.js";
import type { CartEntity, OwnerKey } from "../../domain/cart.entity.js";
import { isOwnedBy } from "../../domain/cart.model.js";
import { transitionTo } from "../../domain/cart.status.js";
import type { CacheBackendPort } from "../ports/outbound/cache-backend.port.js";
import type { CartRepositoryPort } from "../ports/outbound/cart-repository.port.js";
import { cacheKeys, parseCachedCart } from "./cache-keys.js";
import type { ConsistencySynchronizer } from "./consistency-synchronizer.js";
import type { AvailabilityReader } from "./health-monitor.js";
import type { InvalidationBroadcaster } from "./invalidation-broadcaster.js";

export type ReadOptions = {
  /** Read the durable store even when the cache is available. */
  bypassCache?: boolean;
};

export type CartStore = {
  get(owner: OwnerKey, options?: ReadOptions): Promise<CartEntity | undefined>;
  getById(
    cartId: string,
    options?: ReadOptions,
  ): Promise<CartEntity | undefined>;
  save(
    cart: CartEntity,
    options?: { staleOwners?: OwnerKey[] },
  ): Promise<CartEntity>;
  delete(cart: CartEntity): Promise<CartEntity>;
};

type Dependencies = {
  cache: CacheBackendPort;
  repository: CartRepositoryPort;
  availability: AvailabilityReader;
  synchronizer: ConsistencySynchronizer;
  broadcaster: InvalidationBroadcaster;
  logger: Logger;
  now?: () => Date;
};

/**
 * Read/write coordinator over the cache and the durable store.
 *
 * The durable store is authoritative: a durable failure fails the call, a
 * cache failure never does. Cache writes always run on the task queue.
 */
export function createCartStore({
  cache,
  repository,
  availability,
  synchronizer,
  broadcaster,
  logger,
  now = () => new Date(),
}: Dependencies): CartStore {
  async function readCachedCart(
    cartId: string,
  ): Promise<CartEntity | undefined> {
    const raw = await cache.get(cacheKeys.cart(cartId));
    if (raw === null) return undefined;
    const cart = parseCachedCart(raw);
    if (!cart) {
      logger.warn({ cartId }, "cart.store.cache.corrupt-entry");
    }
    return cart;
  }

  async function fromCacheByOwner(owner: OwnerKey) {
    try {
      const cartId = await cache.get(cacheKeys.owner(owner));
      if (cartId === null) return undefined;
      const cart = await readCachedCart(cartId);
      if (!cart || cart.status !== "ACTIVE" || !isOwnedBy(cart, owner)) {
        return undefined;
      }
      return cart;
    } catch (error) {
      logger.warn({ error, owner }, "cart.store.cache.read-failed");
      return undefined;
    }
  }

  async function fromCacheById(cartId: string) {
    try {
      return await readCachedCart(cartId);
    } catch (error) {
      logger.warn({ error, cartId }, "cart.store.cache.read-failed");
      return undefined;
    }
  }

  return {
    async get(owner, options = {}) {
      if (!options.bypassCache && availability.isAvailable()) {
        const cached = await fromCacheByOwner(owner);
        if (cached) {
          logger.debug({ cartId: cached.id }, "cart.store.get.cache-hit");
          return cached;
        }
      }
      const cart = await repository.findActiveByOwner(owner);
      if (cart) synchronizer.scheduleSync(cart);
      return cart;
    },

    async getById(cartId, options = {}) {
      if (!options.bypassCache && availability.isAvailable()) {
        const cached = await fromCacheById(cartId);
        if (cached) return cached;
      }
      const cart = await repository.findById(cartId);
      if (cart?.status === "ACTIVE") synchronizer.scheduleSync(cart);
      return cart;
    },

    async save(cart, options = {}) {
      const saved = await repository.saveCart(cart);
      logger.info(
        { cartId: saved.id, status: saved.status, version: saved.version },
        "cart.store.save",
      );
      broadcaster.cartChanged(saved, options.staleOwners);
      return saved;
    },

    async delete(cart) {
      const deleted = await repository.saveCart(
        transitionTo(cart, "DELETED", now()),
      );
      logger.info({ cartId: deleted.id }, "cart.store.delete");
      broadcaster.cartChanged(deleted);
      return deleted;
    },
  };
}
