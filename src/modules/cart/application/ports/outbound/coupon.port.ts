/**
 * Outbound Port - Coupon lookup
 */

export type Coupon =
  | { code: string; kind: "percentage"; rate: number }
  | { code: string; kind: "fixed"; amount: number };

export interface CouponPort {
  /** Resolves to null for unknown or expired codes. */
  resolve(code: string): Promise<Coupon | null>;
}
