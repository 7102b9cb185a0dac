/**
 * Fixed-point helpers. Amounts are held as integer cents while a calculation
 * runs and rates as integers scaled by 10,000 (4 decimals), so 0.0975 is 975.
 * Every division rounds half-up.
 */

export type Cents = number;
export type Rate4 = number;

const RATE_SCALE = 10_000;

export function toCents(amount: number): Cents {
  return Math.round(Number((amount * 100).toPrecision(15)));
}

export function fromCents(cents: Cents): number {
  return cents / 100;
}

export function toRate4(rate: number): Rate4 {
  return Math.round(Number((rate * RATE_SCALE).toPrecision(15)));
}

export function fromRate4(rate: Rate4): number {
  return rate / RATE_SCALE;
}

function divideHalfUp(numerator: number, denominator: number): number {
  const sign = Math.sign(numerator) * Math.sign(denominator);
  const n = Math.abs(numerator);
  const d = Math.abs(denominator);
  let quotient = Math.floor(n / d);
  const remainder = n - quotient * d;
  if (remainder * 2 >= d) quotient++;
  return sign * quotient;
}

export function applyRate(amount: Cents, rate: Rate4): Cents {
  return divideHalfUp(amount * rate, RATE_SCALE);
}

/** `part / whole` as a 4-decimal rate; 0 when `whole` is 0. */
export function ratioOf(part: Cents, whole: Cents): number {
  if (whole === 0) return 0;
  return fromRate4(divideHalfUp(part * RATE_SCALE, whole));
}

export function lineTotal(unitPrice: number, quantity: number): Cents {
  return toCents(unitPrice) * quantity;
}
