/**
 * Ticker normalization — single source of truth.
 * Operators type ETH, eth, ETHUSDT or ETH/USDT; internally the base asset (ETH) is stored.
 */

import { ValidationError } from './errors';

const QUOTE = 'USDT';
const TICKER_PATTERN = /^[A-Z0-9]{1,20}$/;

/** Strip whitespace and a USDT quote suffix; empty string when nothing usable remains. */
export function normalizeTicker(raw: string): string {
  if (!raw || typeof raw !== 'string') return '';
  let s = raw.replace(/\s/g, '').toUpperCase();
  s = s.replace(/[-/_:]USDT$/, '');
  if (s.endsWith(QUOTE) && s.length > QUOTE.length) s = s.slice(0, -QUOTE.length);
  return s;
}

export function parseTicker(raw: string): string {
  const ticker = normalizeTicker(raw);
  if (!TICKER_PATTERN.test(ticker)) {
    throw new ValidationError(`"${raw}" is not a valid ticker (1–20 letters or digits).`);
  }
  return ticker;
}

/** Display pair: ETH/USDT */
export function toPair(ticker: string): string {
  return `${ticker}/${QUOTE}`;
}

/** Constructed trade link for tickers without a saved one: <base>ETH-USDT */
export function defaultTradeUrl(base: string, ticker: string): string {
  return `${base}${ticker}-${QUOTE}`;
}

export function isHttpUrl(text: string): boolean {
  try {
    const url = new URL(text);
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}
