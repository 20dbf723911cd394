/**
 * Price parsing and display precision.
 * Prices keep at least the precision the operator typed; without it a magnitude tier applies.
 */

import { ValidationError } from './errors';

const PLAIN_DECIMAL = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/** Max decimals a formatted price may carry (toFixed accepts up to 100, exchanges stop well before) */
export const MAX_PRICE_DECIMALS = 12;

function stripCurrency(text: string): string {
  return text.trim().replace(/^\$/, '');
}

/** Number of digits after the decimal point in a typed price, or null if it is not a plain decimal. */
export function decimalsOf(text: string): number | null {
  const s = stripCurrency(text);
  if (!PLAIN_DECIMAL.test(s)) return null;
  const dot = s.indexOf('.');
  return dot < 0 ? 0 : s.length - dot - 1;
}

export function parsePrice(text: string, label: string): number {
  const s = stripCurrency(text);
  const value = PLAIN_DECIMAL.test(s) ? Number(s) : NaN;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${label} must be a positive number, got "${text}".`);
  }
  return value;
}

/** Tiered precision: fewer decimals for large prices, more for sub-cent ones. */
export function tieredDecimals(price: number): number {
  const abs = Math.abs(price);
  if (abs >= 100) return 2;
  if (abs >= 1) return 4;
  if (abs >= 0.01) return 5;
  return 8;
}

/**
 * With `minDecimals` the typed precision is a floor: midpoints derived from typed
 * prices need at most two more digits, so up to `max(min + 2, tier)` are kept and
 * trailing zeros past the floor are trimmed.
 */
export function formatPrice(price: number, minDecimals?: number): string {
  if (minDecimals !== undefined) {
    const min = Math.min(Math.max(0, Math.trunc(minDecimals)), MAX_PRICE_DECIMALS);
    const max = Math.min(Math.max(min + 2, tieredDecimals(price)), MAX_PRICE_DECIMALS);
    const fixed = price.toFixed(max);
    const dot = fixed.indexOf('.');
    if (dot < 0) return fixed;
    let end = fixed.length;
    while (end > dot + 1 + min && fixed[end - 1] === '0') end--;
    if (end === dot + 1) end = dot;
    return fixed.slice(0, end);
  }
  const tier = tieredDecimals(price);
  const fixed = price.toFixed(tier);
  if (tier < 8) return fixed;
  return fixed.replace(/0+$/, '').replace(/\.$/, '');
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}
