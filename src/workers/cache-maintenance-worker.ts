#!/usr/bin/env node

import { createCartModule } from "../modules/cart/cart.index.js";
import { createCacheClient } from "../modules/shared/infra/cache.js";
import { loadConfig } from "../modules/shared/infra/config.js";
import { createDb } from "../modules/shared/infra/db.js";
import { logger } from "../modules/shared/infra/logger.js";

main().catch((err) => {
  logger.error({ err }, "cache-maintenance-worker error");
  process.exit(1);
});

/**
 * Keeps the cache honest outside the request path: probes cache health
 * (which triggers recovery on every unavailable -> available transition)
 * and sweeps expired carts on a fixed interval.
 */
async function main() {
  const config = loadConfig();
  const db = createDb(config.databaseUrl);
  const cacheClient = createCacheClient(config.redisUrl);
  cacheClient.on("error", (error) => {
    logger.debug({ error }, "cache.client.error");
  });
  const { cartPort, healthMonitor, queue } = createCartModule({
    db,
    cacheClient,
    config,
    logger,
  });

  let running = true;
  process.once("SIGTERM", () => {
    running = false;
  });
  process.once("SIGINT", () => {
    running = false;
  });

  healthMonitor.start();
  while (running) {
    try {
      const result = await cartPort.processExpiredCarts();
      if (result.processed > 0 || result.failed > 0) {
        logger.info(result, "cart.expiration.sweep");
      }
    } catch (error) {
      logger.error({ error }, "cart.expiration.sweep.failed");
    }
    await new Promise((r) => setTimeout(r, config.expiration.sweepIntervalMs));
  }

  healthMonitor.stop();
  await queue.drain();
  cacheClient.disconnect();
  await db.destroy();
}
