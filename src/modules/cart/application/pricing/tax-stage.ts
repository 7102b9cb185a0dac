import {
  applyRate,
  fromCents,
  fromRate4,
  lineTotal,
  toCents,
  type Cents,
  type Rate4,
} from "../../../shared/money.js";
import type { CartEntity, CartItem } from "../../domain/cart.entity.js";
import type { ShippingAddress } from "../ports/outbound/customer.port.js";
import type { ItemTax, TaxStage } from "./pricing.types.js";

export const DEFAULT_JURISDICTION = "DEFAULT";

const JURISDICTION_RATES: Record<string, Rate4> = {
  US_CA: 975,
  US_NY: 800,
  US_TX: 625,
  US_FL: 600,
  EU: 2000,
  UK: 2000,
  CA: 1300,
  [DEFAULT_JURISDICTION]: 800,
};

// US states without a general sales tax.
const TAX_FREE_JURISDICTIONS = new Set([
  "US_AK",
  "US_DE",
  "US_MT",
  "US_NH",
  "US_OR",
]);

const EU_COUNTRIES = new Set([
  "AT",
  "BE",
  "DE",
  "DK",
  "ES",
  "FI",
  "FR",
  "GR",
  "IE",
  "IT",
  "LU",
  "NL",
  "PT",
  "SE",
]);

const LUXURY_THRESHOLD: Cents = 100_000;
const LUXURY_RATE: Rate4 = 500;
const DIGITAL_GOODS_RATE: Rate4 = 600;
const ENVIRONMENTAL_FEE_PER_UNIT: Cents = 200;
const DIGITAL_CATEGORIES = ["digital", "software", "ebook", "music", "video"];
const ENVIRONMENTAL_CATEGORIES = ["electronics", "automotive", "chemicals"];

export function resolveJurisdiction(address: ShippingAddress | null): string {
  if (!address) return DEFAULT_JURISDICTION;
  const country = address.country.toUpperCase();
  if (country === "US") {
    return address.state
      ? `US_${address.state.toUpperCase()}`
      : DEFAULT_JURISDICTION;
  }
  if (EU_COUNTRIES.has(country)) return "EU";
  if (country === "GB" || country === "UK") return "UK";
  if (country === "CA") return "CA";
  return DEFAULT_JURISDICTION;
}

export function jurisdictionRate(jurisdiction: string): Rate4 {
  if (TAX_FREE_JURISDICTIONS.has(jurisdiction)) return 0;
  return (
    JURISDICTION_RATES[jurisdiction] ?? JURISDICTION_RATES[DEFAULT_JURISDICTION]
  );
}

function categoryMatches(category: string | null, tags: string[]) {
  if (!category) return false;
  const normalized = category.toLowerCase();
  return tags.some((tag) => normalized.includes(tag));
}

export function itemSpecialTaxes(item: CartItem): ItemTax {
  const itemTotal = lineTotal(item.unitPrice, item.quantity);
  const luxury =
    toCents(item.unitPrice) > LUXURY_THRESHOLD
      ? applyRate(itemTotal, LUXURY_RATE)
      : 0;
  const digital = categoryMatches(item.category, DIGITAL_CATEGORIES)
    ? applyRate(itemTotal, DIGITAL_GOODS_RATE)
    : 0;
  const environmental = categoryMatches(
    item.category,
    ENVIRONMENTAL_CATEGORIES,
  )
    ? ENVIRONMENTAL_FEE_PER_UNIT * item.quantity
    : 0;
  return {
    itemId: item.id,
    productId: item.productId,
    itemTotal: fromCents(itemTotal),
    luxuryTax: fromCents(luxury),
    digitalGoodsTax: fromCents(digital),
    environmentalFee: fromCents(environmental),
    total: fromCents(luxury + digital + environmental),
  };
}

/**
 * Base tax on the discounted subtotal plus per-item special taxes. An
 * exemption zeroes all of it.
 */
export function computeTax({
  cart,
  taxable,
  address,
  taxExempt,
  degraded,
}: {
  cart: CartEntity;
  taxable: Cents;
  address: ShippingAddress | null;
  taxExempt: boolean;
  degraded: boolean;
}): { total: Cents; stage: TaxStage } {
  const jurisdiction = resolveJurisdiction(address);
  const rate = jurisdictionRate(jurisdiction);
  const exemptionReason = taxExempt
    ? "USER_EXEMPT"
    : TAX_FREE_JURISDICTIONS.has(jurisdiction)
      ? "TAX_FREE_JURISDICTION"
      : null;

  const items = exemptionReason
    ? cart.items.map((item) => ({
        ...itemSpecialTaxes(item),
        luxuryTax: 0,
        digitalGoodsTax: 0,
        environmentalFee: 0,
        total: 0,
      }))
    : cart.items.map(itemSpecialTaxes);
  const baseTax = exemptionReason ? 0 : applyRate(taxable, rate);
  const luxury = sumCents(items, (item) => item.luxuryTax);
  const digitalGoods = sumCents(items, (item) => item.digitalGoodsTax);
  const environmental = sumCents(items, (item) => item.environmentalFee);
  const total = baseTax + luxury + digitalGoods + environmental;

  return {
    total,
    stage: {
      jurisdiction,
      rate: fromRate4(rate),
      taxableAmount: fromCents(taxable),
      exempt: exemptionReason !== null,
      exemptionReason,
      baseTax: fromCents(baseTax),
      specialTaxes: {
        luxury: fromCents(luxury),
        digitalGoods: fromCents(digitalGoods),
        environmental: fromCents(environmental),
      },
      items,
      total: fromCents(total),
      degraded,
    },
  };
}

function sumCents(items: ItemTax[], pick: (item: ItemTax) => number): Cents {
  return items.reduce((sum, item) => sum + toCents(pick(item)), 0);
}
