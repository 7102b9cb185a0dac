/**
 * Cache Backend Adapter - Implements the cache port on Redis via ioredis
 */

import { CacheError, type CacheClient } from "../../../../shared/infra/cache.js";
import type {
  CacheBackendPort,
  CacheOperation,
} from "../../../application/ports/outbound/cache-backend.port.js";

async function cacheCall<A>(run: () => Promise<A>, message: string) {
  try {
    return await run();
  } catch (error) {
    throw new CacheError({ message, cause: error });
  }
}

export function createRedisCacheAdapter(client: CacheClient): CacheBackendPort {
  return {
    get: (key) => cacheCall(() => client.get(key), `GET ${key} failed`),

    async set(key, value, ttlSeconds) {
      await cacheCall(
        () => client.set(key, value, "EX", ttlSeconds),
        `SET ${key} failed`,
      );
    },

    async del(keys) {
      if (keys.length === 0) return 0;
      return cacheCall(() => client.del(...keys), "DEL failed");
    },

    ping: () => cacheCall(() => client.ping(), "PING failed"),

    async pipeline(operations: CacheOperation[]) {
      if (operations.length === 0) return;
      const pipeline = client.pipeline();
      for (const operation of operations) {
        if (operation.op === "set") {
          pipeline.set(
            operation.key,
            operation.value,
            "EX",
            operation.ttlSeconds,
          );
        } else {
          pipeline.del(operation.key);
        }
      }
      const results = await cacheCall(
        () => pipeline.exec(),
        "Pipeline failed",
      );
      const failed = results?.find(([error]) => error !== null);
      if (failed) {
        throw new CacheError({
          message: "Pipeline command failed",
          cause: failed[0],
        });
      }
    },
  };
}
