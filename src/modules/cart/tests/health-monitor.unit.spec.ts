import { afterEach, describe, expect, it, vi } from "vitest";
import { CacheError } from "../../shared/infra/cache.js";
import { createHealthMonitor } from "../application/store/health-monitor.js";
import { createInMemoryCache, createMockLogger, NOW } from "./fakes.js";

describe("HealthMonitor", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  function setup() {
    const cache = createInMemoryCache();
    const logger = createMockLogger();
    const monitor = createHealthMonitor({
      cache,
      logger,
      intervalMs: 1000,
      now: () => NOW,
    });
    return { cache, logger, monitor };
  }

  it("should start unavailable until the first probe", () => {
    const { monitor } = setup();

    expect(monitor.isAvailable()).toBe(false);
    expect(monitor.report()).toEqual({
      available: false,
      checks: { connectivity: false, readWrite: false, pipeline: false },
      responseTimeMs: null,
      lastError: null,
      lastCheckedAt: null,
    });
  });

  it("should become available after a clean probe and leave no probe keys", async () => {
    const { cache, logger, monitor } = setup();
    const listener = vi.fn();
    monitor.onTransition(listener);

    const report = await monitor.probe();

    expect(report).toEqual({
      available: true,
      checks: { connectivity: true, readWrite: true, pipeline: true },
      responseTimeMs: 0,
      lastError: null,
      lastCheckedAt: NOW,
    });
    expect(monitor.isAvailable()).toBe(true);
    expect(listener).toHaveBeenCalledWith(true);
    expect(logger.info).toHaveBeenCalledWith({}, "cache.health.available");
    expect(cache.entries.size).toBe(0);
  });

  it("should report the failing check and log the transition to unavailable", async () => {
    const { cache, logger, monitor } = setup();
    const listener = vi.fn();
    monitor.onTransition(listener);
    await monitor.probe();

    cache.setDown(true);
    const report = await monitor.probe();

    expect(monitor.isAvailable()).toBe(false);
    expect(report.checks.connectivity).toBe(false);
    expect(report.lastError).toBe("Connection is closed.");
    expect(listener.mock.calls).toEqual([[true], [false]]);
    expect(logger.error).toHaveBeenCalledWith(
      { error: expect.any(CacheError) },
      "cache.health.unavailable",
    );
  });

  it("should treat an unexpected ping reply as unhealthy", async () => {
    const { cache, monitor } = setup();
    vi.spyOn(cache, "ping").mockResolvedValueOnce("LOADING");

    const report = await monitor.probe();

    expect(report.available).toBe(false);
    expect(report.lastError).toBe("Unexpected ping reply: LOADING");
  });

  it("should not log a transition when the state does not change", async () => {
    const { cache, logger, monitor } = setup();
    cache.setDown(true);

    await monitor.probe();

    expect(logger.error).not.toHaveBeenCalled();
  });

  it("should share one probe between concurrent callers", async () => {
    const { cache, monitor } = setup();
    const ping = vi.spyOn(cache, "ping");

    const [first, second] = await Promise.all([
      monitor.probe(),
      monitor.probe(),
    ]);

    expect(ping).toHaveBeenCalledTimes(1);
    expect(first).toBe(second);
  });

  it("should probe on its own timer until stopped", async () => {
    vi.useFakeTimers();
    const { cache, monitor } = setup();
    const ping = vi.spyOn(cache, "ping");

    monitor.start();
    expect(ping).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(ping).toHaveBeenCalledTimes(2);

    monitor.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(ping).toHaveBeenCalledTimes(2);
  });
});
