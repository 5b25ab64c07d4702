/**
 * Currency helpers. Amounts travel as numbers in currency units with at
 * most two fraction digits; arithmetic happens in integer cents.
 */

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function sumAmounts(amounts: Iterable<number>): number {
  let cents = 0;
  for (const amount of amounts) {
    cents += toCents(amount);
  }
  return fromCents(cents);
}

export function subtractAmounts(a: number, b: number): number {
  return fromCents(toCents(a) - toCents(b));
}

/** True when the value has no more than two fraction digits. */
export function isCurrencyAmount(value: number): boolean {
  return Number.isFinite(value) && Math.abs(toCents(value) - value * 100) < 1e-6;
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}
