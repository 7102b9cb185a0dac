/**
 * Outbound Port - Shipping cost quotes
 */

import type { ShippingAddress } from "./customer.port.js";

export type ShippingOption = {
  option: string;
  cost: number;
  recommended?: boolean;
};

export type ShippingQuoteRequest = {
  cartId: string;
  currency: string;
  subtotal: number;
  totalQuantity: number;
  address: ShippingAddress | null;
};

export interface ShippingRatePort {
  quote(request: ShippingQuoteRequest): Promise<ShippingOption[]>;
}
