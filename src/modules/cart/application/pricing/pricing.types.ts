export type DiscountStage = {
  amount: number;
  rate: number;
  degraded: boolean;
};

export type PromotionLine = {
  itemId: string;
  productId: string;
  promotionId: string;
  amount: number;
};

export type CouponStage = DiscountStage & {
  code: string | null;
  status: "NONE" | "APPLIED" | "NOT_FOUND" | "LOOKUP_FAILED";
};

export type ItemTax = {
  itemId: string;
  productId: string;
  itemTotal: number;
  luxuryTax: number;
  digitalGoodsTax: number;
  environmentalFee: number;
  total: number;
};

export type TaxStage = {
  jurisdiction: string;
  rate: number;
  taxableAmount: number;
  exempt: boolean;
  exemptionReason: "USER_EXEMPT" | "TAX_FREE_JURISDICTION" | null;
  baseTax: number;
  specialTaxes: {
    luxury: number;
    digitalGoods: number;
    environmental: number;
  };
  items: ItemTax[];
  total: number;
  degraded: boolean;
};

export type ShippingStage = {
  option: string | null;
  cost: number;
  options: Array<{ option: string; cost: number; recommended: boolean }>;
  degraded: boolean;
};

/** Every stage's contribution to a priced cart, kept for audit and display. */
export type PriceBreakdown = {
  cartId: string;
  currency: string;
  subtotal: number;
  discounts: {
    bulk: DiscountStage;
    loyalty: DiscountStage & { level: string | null; points: number };
    promotional: DiscountStage & { lines: PromotionLine[] };
    coupon: CouponStage;
    total: number;
    applied: number;
  };
  subtotalAfterDiscounts: number;
  tax: TaxStage;
  shipping: ShippingStage;
  grandTotal: number;
  effectiveDiscountRate: number;
  effectiveTaxRate: number;
  calculatedAt: Date;
};
