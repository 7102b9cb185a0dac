/**
 * Outbound Port - Active promotions per product
 */

export type Promotion = {
  id: string;
  name: string;
};

export interface PromotionPort {
  getActivePromotions(productId: string): Promise<Promotion[]>;
  /** Discount amount in cart currency for one line under one promotion. */
  calculateDiscount(input: {
    productId: string;
    promotionId: string;
    quantity: number;
    unitPrice: number;
  }): Promise<number>;
}
