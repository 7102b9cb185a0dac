/**
 * Promotion Service Adapter - Active promotions and discount quotes over HTTP
 */

import { z } from "zod";
import type { PromotionPort } from "../../../application/ports/outbound/promotion.port.js";
import type { HttpJsonClient } from "./http-json.client.js";

const PromotionsSchema = z.array(z.object({ id: z.string(), name: z.string() }));
const DiscountSchema = z.object({ amount: z.number().nonnegative() });

export function createPromotionServiceAdapter(
  client: HttpJsonClient,
): PromotionPort {
  return {
    async getActivePromotions(productId) {
      const promotions = await client.get(
        `/products/${encodeURIComponent(productId)}/promotions/active`,
        PromotionsSchema,
      );
      return promotions ?? [];
    },
    async calculateDiscount({ productId, promotionId, quantity, unitPrice }) {
      const { amount } = await client.post(
        `/promotions/${encodeURIComponent(promotionId)}/discount`,
        { productId, quantity, unitPrice },
        DiscountSchema,
      );
      return amount;
    },
  };
}
