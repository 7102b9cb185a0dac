import { toCents, type Cents } from "../../../shared/money.js";
import type { ShippingOption } from "../ports/outbound/shipping-rate.port.js";

/** The recommended option wins; otherwise the cheapest. */
export function selectShippingOption(
  options: ShippingOption[],
): ShippingOption | undefined {
  const recommended = options.find((option) => option.recommended);
  if (recommended) return recommended;
  return options.reduce<ShippingOption | undefined>(
    (cheapest, option) =>
      !cheapest || toCents(option.cost) < toCents(cheapest.cost)
        ? option
        : cheapest,
    undefined,
  );
}

export function shippingCost(option: ShippingOption): Cents {
  return Math.max(toCents(option.cost), 0);
}
