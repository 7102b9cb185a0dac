import type { Logger } from "../../../shared/infra/logger.js";
import type { TaskQueue } from "../../../shared/infra/task-queue.js";
import type { CacheBackendPort } from "../ports/outbound/cache-backend.port.js";
import {
  ProductSnapshotSchema,
  type ProductCatalogPort,
  type ProductSnapshot,
} from "../ports/outbound/product-catalog.port.js";
import { cacheKeys } from "./cache-keys.js";
import type { AvailabilityReader } from "./health-monitor.js";

/**
 * Read-through cache in front of the catalog, keyed `product-info:{id}`.
 * Product events delete the entry.
 */
export function createCachedProductCatalog({
  catalog,
  cache,
  availability,
  queue,
  logger,
  ttlSeconds,
}: {
  catalog: ProductCatalogPort;
  cache: CacheBackendPort;
  availability: AvailabilityReader;
  queue: TaskQueue;
  logger: Logger;
  ttlSeconds: number;
}): ProductCatalogPort {
  async function readCached(productId: string) {
    try {
      const raw = await cache.get(cacheKeys.productInfo(productId));
      if (raw === null) return undefined;
      const parsed = ProductSnapshotSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : undefined;
    } catch (error) {
      logger.warn({ error, productId }, "product-info.cache.read-failed");
      return undefined;
    }
  }

  function store(product: ProductSnapshot) {
    queue.enqueue(
      cacheKeys.productInfo(product.productId),
      "product-info.store",
      async () => {
        if (!availability.isAvailable()) return;
        await cache.set(
          cacheKeys.productInfo(product.productId),
          JSON.stringify(product),
          ttlSeconds,
        );
      },
    );
  }

  return {
    async getProduct(productId) {
      if (availability.isAvailable()) {
        const cached = await readCached(productId);
        if (cached) return cached;
      }
      const product = await catalog.getProduct(productId);
      if (product) store(product);
      return product;
    },
  };
}
