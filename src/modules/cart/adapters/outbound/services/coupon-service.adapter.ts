/**
 * Coupon Service Adapter - Coupon lookup over HTTP
 */

import { z } from "zod";
import type { CouponPort } from "../../../application/ports/outbound/coupon.port.js";
import type { HttpJsonClient } from "./http-json.client.js";

const CouponSchema = z.discriminatedUnion("kind", [
  z.object({
    code: z.string(),
    kind: z.literal("percentage"),
    rate: z.number().min(0).max(1),
  }),
  z.object({
    code: z.string(),
    kind: z.literal("fixed"),
    amount: z.number().nonnegative(),
  }),
]);

export function createCouponServiceAdapter(client: HttpJsonClient): CouponPort {
  return {
    resolve(code) {
      return client.get(`/coupons/${encodeURIComponent(code)}`, CouponSchema);
    },
  };
}
