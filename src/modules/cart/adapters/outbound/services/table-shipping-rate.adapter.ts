/**
 * Shipping Rate Adapter - Flat rate table with free standard shipping above a threshold
 */

import type {
  ShippingOption,
  ShippingRatePort,
} from "../../../application/ports/outbound/shipping-rate.port.js";

export const SHIPPING_RATES = {
  standard: 5.99,
  express: 12.99,
  overnight: 24.99,
} as const;

export const FREE_SHIPPING_THRESHOLD = 50;

export function createTableShippingRateAdapter(): ShippingRatePort {
  return {
    async quote({ subtotal }): Promise<ShippingOption[]> {
      const free = subtotal >= FREE_SHIPPING_THRESHOLD;
      return [
        {
          option: "STANDARD",
          cost: free ? 0 : SHIPPING_RATES.standard,
          recommended: true,
        },
        { option: "EXPRESS", cost: SHIPPING_RATES.express },
        { option: "OVERNIGHT", cost: SHIPPING_RATES.overnight },
      ];
    },
  };
}
