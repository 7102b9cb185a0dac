import { Redis } from "ioredis";

export type CacheClient = Redis;

export function createCacheClient(url: string): CacheClient {
  return new Redis(url, {
    // Fail fast while the backend is down; the health monitor owns recovery.
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: false,
  });
}

export class CacheError extends Error {
  constructor({ message, cause }: { message: string; cause?: unknown }) {
    super(message, { cause });
    this.name = "CacheError";
  }
}
