/**
 * Cart Module - Composition root
 * Wires together all the dependencies following hexagonal architecture
 */

import type { CacheClient } from "../shared/infra/cache.js";
import type { AppConfig } from "../shared/infra/config.js";
import type { DatabaseExecutor } from "../shared/infra/db.js";
import type { Logger } from "../shared/infra/logger.js";
import { createTaskQueue, type TaskQueue } from "../shared/infra/task-queue.js";
import { createCartController } from "./adapters/inbound/http/cart.controller.js";
import { createRedisCacheAdapter } from "./adapters/outbound/cache/redis-cache.adapter.js";
import { createCartRepository } from "./adapters/outbound/persistence/cart.repository.js";
import { createCouponServiceAdapter } from "./adapters/outbound/services/coupon-service.adapter.js";
import { createCustomerServiceAdapter } from "./adapters/outbound/services/customer-service.adapter.js";
import { createHttpJsonClient } from "./adapters/outbound/services/http-json.client.js";
import { createInventoryServiceAdapter } from "./adapters/outbound/services/inventory-service.adapter.js";
import { createProductCatalogAdapter } from "./adapters/outbound/services/product-catalog.adapter.js";
import { createPromotionServiceAdapter } from "./adapters/outbound/services/promotion-service.adapter.js";
import { createTableShippingRateAdapter } from "./adapters/outbound/services/table-shipping-rate.adapter.js";
import { createMergeEngine } from "./application/merge/merge-engine.js";
import type { CartPort } from "./application/ports/inbound/cart.port.js";
import type { CacheBackendPort } from "./application/ports/outbound/cache-backend.port.js";
import type { CartRepositoryPort } from "./application/ports/outbound/cart-repository.port.js";
import type { CouponPort } from "./application/ports/outbound/coupon.port.js";
import type { CustomerPort } from "./application/ports/outbound/customer.port.js";
import type { InventoryPort } from "./application/ports/outbound/inventory.port.js";
import type { ProductCatalogPort } from "./application/ports/outbound/product-catalog.port.js";
import type { PromotionPort } from "./application/ports/outbound/promotion.port.js";
import type { ShippingRatePort } from "./application/ports/outbound/shipping-rate.port.js";
import { createPricingPipeline } from "./application/pricing/pricing-pipeline.js";
import { createCartService } from "./application/services/cart.service.js";
import { createCartStore } from "./application/store/cart-store.js";
import { createConsistencySynchronizer } from "./application/store/consistency-synchronizer.js";
import {
  createHealthMonitor,
  type HealthMonitor,
} from "./application/store/health-monitor.js";
import { createInvalidationBroadcaster } from "./application/store/invalidation-broadcaster.js";
import { createCachedProductCatalog } from "./application/store/product-info-cache.js";

export type CartCollaborators = {
  repository: CartRepositoryPort;
  cache: CacheBackendPort;
  customers: CustomerPort;
  promotions: PromotionPort;
  coupons: CouponPort;
  catalog: ProductCatalogPort;
  inventory: InventoryPort;
  shipping: ShippingRatePort;
};

export type CartModuleConfig = Pick<
  AppConfig,
  "cart" | "cache" | "tasks" | "expiration" | "merge" | "pricing"
>;

export type CartModule = {
  cartPort: CartPort;
  healthMonitor: HealthMonitor;
  queue: TaskQueue;
};

/**
 * Builds the cart engine over its ports. Tests call this with in-process
 * fakes; `createCartModule` calls it with the real adapters.
 */
export function assembleCartModule({
  collaborators,
  config,
  logger,
  now = () => new Date(),
  newId = () => crypto.randomUUID(),
  sleep,
}: {
  collaborators: CartCollaborators;
  config: CartModuleConfig;
  logger: Logger;
  now?: () => Date;
  newId?: () => string;
  sleep?: (ms: number) => Promise<void>;
}): CartModule {
  const { repository, cache } = collaborators;
  const queue = createTaskQueue({ ...config.tasks, logger });
  const healthMonitor = createHealthMonitor({
    cache,
    logger,
    intervalMs: config.cache.healthIntervalMs,
    now,
  });
  const availability = healthMonitor;
  const synchronizer = createConsistencySynchronizer({
    cache,
    repository,
    availability,
    queue,
    logger,
    config: config.cache,
    now,
    sleep,
  });
  const broadcaster = createInvalidationBroadcaster({
    cache,
    repository,
    availability,
    synchronizer,
    coupons: collaborators.coupons,
    queue,
    logger,
    now,
  });
  const store = createCartStore({
    cache,
    repository,
    availability,
    synchronizer,
    broadcaster,
    logger,
    now,
  });
  const ttl = {
    guestTtlDays: config.cart.guestTtlDays,
    userTtlDays: config.cart.userTtlDays,
  };
  const mergeEngine = createMergeEngine({
    store,
    repository,
    broadcaster,
    coupons: collaborators.coupons,
    logger,
    config: { ...config.merge, currency: config.cart.defaultCurrency, ttl },
    now,
    newId,
  });
  const pricing = createPricingPipeline({
    customers: collaborators.customers,
    promotions: collaborators.promotions,
    coupons: collaborators.coupons,
    shipping: collaborators.shipping,
    logger,
    config: config.pricing,
    now,
  });
  const catalog = createCachedProductCatalog({
    catalog: collaborators.catalog,
    cache,
    availability,
    queue,
    logger,
    ttlSeconds: config.cache.productInfoTtlSeconds,
  });

  healthMonitor.onTransition((available) => {
    if (!available) return;
    queue.enqueue("cache-recovery", "cart.recovery", async () => {
      await synchronizer.recoverToCache();
    });
  });

  const cartPort = createCartService({
    store,
    repository,
    cache,
    healthMonitor,
    synchronizer,
    broadcaster,
    mergeEngine,
    pricing,
    catalog,
    inventory: collaborators.inventory,
    coupons: collaborators.coupons,
    queue,
    logger,
    config: {
      currency: config.cart.defaultCurrency,
      ttl,
      validationTtlSeconds: config.cache.validationTtlSeconds,
      expirationBatchSize: config.expiration.batchSize,
    },
    now,
    newId,
  });

  return { cartPort, healthMonitor, queue };
}

/**
 * Creates the Cart module on PostgreSQL, Redis and the HTTP collaborators
 */
export function createCartModule({
  db,
  cacheClient,
  config,
  logger,
}: {
  db: DatabaseExecutor;
  cacheClient: CacheClient;
  config: AppConfig;
  logger: Logger;
}): CartModule {
  const client = (service: string, baseUrl: string) =>
    createHttpJsonClient({
      service,
      baseUrl,
      timeoutMs: config.services.timeoutMs,
      logger,
    });

  return assembleCartModule({
    collaborators: {
      repository: createCartRepository({ db, logger }),
      cache: createRedisCacheAdapter(cacheClient),
      customers: createCustomerServiceAdapter(
        client("customer", config.services.customerUrl),
      ),
      promotions: createPromotionServiceAdapter(
        client("promotion", config.services.promotionUrl),
      ),
      coupons: createCouponServiceAdapter(
        client("coupon", config.services.couponUrl),
      ),
      catalog: createProductCatalogAdapter(
        client("catalog", config.services.catalogUrl),
      ),
      inventory: createInventoryServiceAdapter(
        client("inventory", config.services.inventoryUrl),
      ),
      shipping: createTableShippingRateAdapter(),
    },
    config,
    logger,
  });
}

/**
 * Creates the Cart HTTP Controller
 * This is for HTTP routing and should be mounted in the main app
 */
export function createCartHttpAdapter({
  cartPort,
  logger,
}: {
  cartPort: CartPort;
  logger: Logger;
}) {
  return createCartController({ cartPort, logger });
}

// Re-export the port interface for other modules to use
export type { CartPort } from "./application/ports/inbound/cart.port.js";
