import { CacheError } from "../../../shared/infra/cache.js";
import type { Logger } from "../../../shared/infra/logger.js";
import type { CacheBackendPort } from "../ports/outbound/cache-backend.port.js";

/**
 * Read side of the cache availability flag. Only the health monitor writes
 * it; request paths read it and never probe on their own.
 */
export interface AvailabilityReader {
  isAvailable(): boolean;
}

export type CacheHealthReport = {
  available: boolean;
  checks: {
    connectivity: boolean;
    readWrite: boolean;
    pipeline: boolean;
  };
  responseTimeMs: number | null;
  lastError: string | null;
  lastCheckedAt: Date | null;
};

export type HealthMonitor = AvailabilityReader & {
  start(): void;
  stop(): void;
  probe(): Promise<CacheHealthReport>;
  report(): CacheHealthReport;
  onTransition(listener: (available: boolean) => void): void;
};

const PROBE_KEY_TTL_SECONDS = 10;

export function createHealthMonitor({
  cache,
  logger,
  intervalMs,
  now = () => new Date(),
}: {
  cache: CacheBackendPort;
  logger: Logger;
  intervalMs: number;
  now?: () => Date;
}): HealthMonitor {
  let available = false;
  let timer: NodeJS.Timeout | undefined;
  let inFlight: Promise<CacheHealthReport> | undefined;
  const listeners: Array<(available: boolean) => void> = [];
  let current: CacheHealthReport = {
    available,
    checks: { connectivity: false, readWrite: false, pipeline: false },
    responseTimeMs: null,
    lastError: null,
    lastCheckedAt: null,
  };

  function setAvailable(next: boolean, error: unknown) {
    if (next === available) return;
    available = next;
    if (next) {
      logger.info({}, "cache.health.available");
    } else {
      logger.error({ error }, "cache.health.unavailable");
    }
    for (const listener of listeners) {
      try {
        listener(next);
      } catch (listenerError) {
        logger.error({ error: listenerError }, "cache.health.listener.failed");
      }
    }
  }

  async function runChecks(checks: CacheHealthReport["checks"]) {
    const pong = await cache.ping();
    if (pong !== "PONG") {
      throw new CacheError({ message: `Unexpected ping reply: ${pong}` });
    }
    checks.connectivity = true;

    const stamp = now().getTime();
    const key = `health_check:${stamp}`;
    await cache.set(key, "ok", PROBE_KEY_TTL_SECONDS);
    const value = await cache.get(key);
    await cache.del([key]);
    if (value !== "ok") {
      throw new CacheError({ message: "Round-trip read returned no value" });
    }
    checks.readWrite = true;

    const first = `health_check:${stamp}:1`;
    const second = `health_check:${stamp}:2`;
    await cache.pipeline([
      { op: "set", key: first, value: "1", ttlSeconds: PROBE_KEY_TTL_SECONDS },
      { op: "set", key: second, value: "2", ttlSeconds: PROBE_KEY_TTL_SECONDS },
      { op: "del", key: first },
      { op: "del", key: second },
    ]);
    checks.pipeline = true;
  }

  async function runProbe(): Promise<CacheHealthReport> {
    const startedAt = now();
    const checks = { connectivity: false, readWrite: false, pipeline: false };
    let failure: unknown = null;
    try {
      await runChecks(checks);
    } catch (error) {
      failure = error;
    }
    const healthy = failure === null;
    setAvailable(healthy, failure);
    current = {
      available: healthy,
      checks,
      responseTimeMs: now().getTime() - startedAt.getTime(),
      lastError: failure === null ? null : describe(failure),
      lastCheckedAt: startedAt,
    };
    logger.debug({ report: current }, "cache.health.probe");
    return current;
  }

  function probe(): Promise<CacheHealthReport> {
    if (!inFlight) {
      inFlight = runProbe().finally(() => {
        inFlight = undefined;
      });
    }
    return inFlight;
  }

  return {
    isAvailable: () => available,
    start() {
      if (timer) return;
      void probe();
      timer = setInterval(() => void probe(), intervalMs);
      timer.unref();
    },
    stop() {
      if (timer) clearInterval(timer);
      timer = undefined;
    },
    probe,
    report: () => current,
    onTransition(listener) {
      listeners.push(listener);
    },
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
