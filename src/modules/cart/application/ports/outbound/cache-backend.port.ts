/**
 * Outbound Port - Key/value cache backend
 */

export type CacheOperation =
  | { op: "set"; key: string; value: string; ttlSeconds: number }
  | { op: "del"; key: string };

export interface CacheBackendPort {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(keys: string[]): Promise<number>;
  ping(): Promise<string>;
  /** Sends all operations in one round trip; rejects if any of them failed. */
  pipeline(operations: CacheOperation[]): Promise<void>;
}
