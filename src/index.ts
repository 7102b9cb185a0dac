import { serve } from "@hono/node-server";
import { Hono } from "hono";
import {
  createCartHttpAdapter,
  createCartModule,
} from "./modules/cart/cart.index.js";
import { createCacheClient } from "./modules/shared/infra/cache.js";
import { loadConfig } from "./modules/shared/infra/config.js";
import { createDb } from "./modules/shared/infra/db.js";
import { logger } from "./modules/shared/infra/logger.js";

const config = loadConfig();
const db = createDb(config.databaseUrl);
const cacheClient = createCacheClient(config.redisUrl);
cacheClient.on("error", (error) => {
  logger.debug({ error }, "cache.client.error");
});

const app = new Hono();

app.get("/", (c) => {
  return c.text("Cart service");
});

/**
 * Cart module starts here
 */
const { cartPort, healthMonitor, queue } = createCartModule({
  db,
  cacheClient,
  config,
  logger,
});
app.route("", createCartHttpAdapter({ cartPort, logger }));
healthMonitor.start();

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info(`Server is running on http://localhost:${info.port}`);
  },
);

async function shutdown(signal: string) {
  logger.info({ signal }, "server.shutdown");
  healthMonitor.stop();
  server.close();
  await queue.drain();
  cacheClient.disconnect();
  await db.destroy();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error }, "server.shutdown.failed");
        process.exit(1);
      },
    );
  });
}
