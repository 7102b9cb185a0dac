import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1).default("redis://localhost:6379"),

  CACHE_HEALTH_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  CART_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  PRODUCT_INFO_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  VALIDATION_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  GUEST_CART_TTL_DAYS: z.coerce.number().int().positive().default(7),
  USER_CART_TTL_DAYS: z.coerce.number().int().positive().default(30),
  DEFAULT_CURRENCY: z.string().length(3).default("USD"),

  RECOVERY_WINDOW_HOURS: z.coerce.number().int().positive().default(24),
  RECOVERY_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  RECOVERY_PAUSE_MS: z.coerce.number().int().nonnegative().default(100),
  TASK_QUEUE_CONCURRENCY: z.coerce.number().int().positive().default(4),
  TASK_QUEUE_MAX_PENDING: z.coerce.number().int().positive().default(1000),
  EXPIRATION_SWEEP_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(300_000),
  EXPIRATION_BATCH_SIZE: z.coerce.number().int().positive().default(100),

  MERGE_MAX_ITEM_COUNT: z.coerce.number().int().positive().default(100),
  MERGE_MAX_TOTAL_AMOUNT: z.coerce.number().positive().default(10_000),
  MERGE_QUANTITY_OVERFLOW: z.enum(["drop-line", "reject"]).default("drop-line"),

  PRICING_TAX_FAILURE_MODE: z.enum(["fail", "default-rate"]).default("fail"),
  PRICING_SHIPPING_FAILURE_MODE: z.enum(["fail", "flat-rate"]).default("fail"),
  FLAT_SHIPPING_RATE: z.coerce.number().nonnegative().default(5.99),

  EXTERNAL_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  CUSTOMER_SERVICE_URL: z.url().default("http://localhost:4001"),
  PROMOTION_SERVICE_URL: z.url().default("http://localhost:4002"),
  COUPON_SERVICE_URL: z.url().default("http://localhost:4003"),
  CATALOG_SERVICE_URL: z.url().default("http://localhost:4004"),
  INVENTORY_SERVICE_URL: z.url().default("http://localhost:4005"),
});

export type QuantityOverflowPolicy = "drop-line" | "reject";
export type TaxFailureMode = "fail" | "default-rate";
export type ShippingFailureMode = "fail" | "flat-rate";

export type AppConfig = {
  env: "development" | "test" | "production";
  port: number;
  databaseUrl: string;
  redisUrl: string;
  cart: {
    defaultCurrency: string;
    guestTtlDays: number;
    userTtlDays: number;
  };
  cache: {
    healthIntervalMs: number;
    cartTtlSeconds: number;
    productInfoTtlSeconds: number;
    validationTtlSeconds: number;
    recoveryWindowMs: number;
    recoveryBatchSize: number;
    recoveryPauseMs: number;
  };
  tasks: {
    concurrency: number;
    maxPending: number;
  };
  expiration: {
    sweepIntervalMs: number;
    batchSize: number;
  };
  merge: {
    maxItemCount: number;
    maxTotalAmount: number;
    quantityOverflow: QuantityOverflowPolicy;
  };
  pricing: {
    taxFailureMode: TaxFailureMode;
    shippingFailureMode: ShippingFailureMode;
    flatShippingRate: number;
  };
  services: {
    timeoutMs: number;
    customerUrl: string;
    promotionUrl: string;
    couponUrl: string;
    catalogUrl: string;
    inventoryUrl: string;
  };
};

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,
    cart: {
      defaultCurrency: parsed.DEFAULT_CURRENCY,
      guestTtlDays: parsed.GUEST_CART_TTL_DAYS,
      userTtlDays: parsed.USER_CART_TTL_DAYS,
    },
    cache: {
      healthIntervalMs: parsed.CACHE_HEALTH_INTERVAL_MS,
      cartTtlSeconds: parsed.CART_CACHE_TTL_SECONDS,
      productInfoTtlSeconds: parsed.PRODUCT_INFO_TTL_SECONDS,
      validationTtlSeconds: parsed.VALIDATION_TTL_SECONDS,
      recoveryWindowMs: parsed.RECOVERY_WINDOW_HOURS * 60 * 60 * 1000,
      recoveryBatchSize: parsed.RECOVERY_BATCH_SIZE,
      recoveryPauseMs: parsed.RECOVERY_PAUSE_MS,
    },
    tasks: {
      concurrency: parsed.TASK_QUEUE_CONCURRENCY,
      maxPending: parsed.TASK_QUEUE_MAX_PENDING,
    },
    expiration: {
      sweepIntervalMs: parsed.EXPIRATION_SWEEP_INTERVAL_MS,
      batchSize: parsed.EXPIRATION_BATCH_SIZE,
    },
    merge: {
      maxItemCount: parsed.MERGE_MAX_ITEM_COUNT,
      maxTotalAmount: parsed.MERGE_MAX_TOTAL_AMOUNT,
      quantityOverflow: parsed.MERGE_QUANTITY_OVERFLOW,
    },
    pricing: {
      taxFailureMode: parsed.PRICING_TAX_FAILURE_MODE,
      shippingFailureMode: parsed.PRICING_SHIPPING_FAILURE_MODE,
      flatShippingRate: parsed.FLAT_SHIPPING_RATE,
    },
    services: {
      timeoutMs: parsed.EXTERNAL_TIMEOUT_MS,
      customerUrl: parsed.CUSTOMER_SERVICE_URL,
      promotionUrl: parsed.PROMOTION_SERVICE_URL,
      couponUrl: parsed.COUPON_SERVICE_URL,
      catalogUrl: parsed.CATALOG_SERVICE_URL,
      inventoryUrl: parsed.INVENTORY_SERVICE_URL,
    },
  };
}
