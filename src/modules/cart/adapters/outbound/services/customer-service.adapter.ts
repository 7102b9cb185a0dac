/**
 * Customer Service Adapter - Loyalty, default address and tax profile over HTTP
 */

import { z } from "zod";
import type { CustomerPort } from "../../../application/ports/outbound/customer.port.js";
import type { HttpJsonClient } from "./http-json.client.js";

const LoyaltySchema = z.object({
  level: z.enum(["PLATINUM", "GOLD", "SILVER", "BRONZE"]).nullable(),
  points: z.number().int().nonnegative(),
});

const AddressSchema = z.object({
  country: z.string().min(2),
  state: z.string().nullable(),
  postalCode: z.string().nullable(),
});

const TaxProfileSchema = z.object({ taxExempt: z.boolean() });

export function createCustomerServiceAdapter(
  client: HttpJsonClient,
): CustomerPort {
  return {
    async getLoyalty(userId) {
      const loyalty = await client.get(
        `/users/${encodeURIComponent(userId)}/loyalty`,
        LoyaltySchema,
      );
      return loyalty ?? { level: null, points: 0 };
    },
    getDefaultShippingAddress(userId) {
      return client.get(
        `/users/${encodeURIComponent(userId)}/addresses/default-shipping`,
        AddressSchema,
      );
    },
    async getTaxProfile(userId) {
      const profile = await client.get(
        `/users/${encodeURIComponent(userId)}/tax-profile`,
        TaxProfileSchema,
      );
      return profile ?? { taxExempt: false };
    },
  };
}
