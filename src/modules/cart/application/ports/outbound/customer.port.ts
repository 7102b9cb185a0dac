/**
 * Outbound Port - Membership, address and tax profile lookups for a user
 */

export type LoyaltyLevel = "PLATINUM" | "GOLD" | "SILVER" | "BRONZE";

export type Loyalty = {
  level: LoyaltyLevel | null;
  points: number;
};

export type ShippingAddress = {
  country: string;
  state: string | null;
  postalCode: string | null;
};

export type TaxProfile = {
  taxExempt: boolean;
};

export interface CustomerPort {
  getLoyalty(userId: string): Promise<Loyalty>;
  getDefaultShippingAddress(userId: string): Promise<ShippingAddress | null>;
  getTaxProfile(userId: string): Promise<TaxProfile>;
}
