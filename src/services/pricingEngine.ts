/**
 * Signal calculation engine.
 *
 * From an entry and a stop loss it derives the second entry (midpoint), the
 * average entry, 1:1 and 1:2 take profits measured from the average entry,
 * leverage (when not given), the holding-time label and the potential profit.
 * Pure: no clock, no store.
 */

import { ValidationError } from '../lib/errors';
import { formatPercent, formatPrice } from '../lib/priceFormat';
import { parseTicker } from '../lib/symbol';
import type { ComputedSignal, Direction, HoldingTime } from '../types/signal';

export const MAX_LEVERAGE = 125;

export interface ComputeOptions {
  /** Minimum decimals to print prices with (the typed precision); omit for the magnitude tiers */
  decimals?: number;
}

/** Branch order matters: >30 and <10 are checked before >=20. */
export function autoLeverage(riskPercent: number): number {
  if (riskPercent > 30) return 2;
  if (riskPercent < 10) return 5;
  if (riskPercent >= 20) return 3;
  return 4;
}

export function holdingTimeFor(riskPercent: number): HoldingTime {
  if (riskPercent <= 5) return '1–2 days';
  if (riskPercent <= 8) return '2–3 days';
  return '5–7 days';
}

export function validateLeverage(leverage: number): number {
  if (!Number.isInteger(leverage) || leverage < 1 || leverage > MAX_LEVERAGE) {
    throw new ValidationError(`Leverage must be a whole number from 1 to ${MAX_LEVERAGE}, got ${leverage}.`);
  }
  return leverage;
}

export function computeSignal(
  ticker: string,
  entry1: number,
  stopLoss: number,
  leverage: number | null,
  options: ComputeOptions = {}
): ComputedSignal {
  const symbol = parseTicker(ticker);
  for (const [label, value] of [['Entry', entry1], ['Stop loss', stopLoss]] as const) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ValidationError(`${label} must be a positive number, got ${value}.`);
    }
  }
  if (entry1 === stopLoss) {
    throw new ValidationError('Entry and stop loss must differ.');
  }

  const direction: Direction = stopLoss < entry1 ? 'LONG' : 'SHORT';
  const entry2 = (entry1 + stopLoss) / 2;
  const averageEntry = (entry1 + entry2) / 2;
  const risk = Math.abs(averageEntry - stopLoss);

  const takeProfit1 = direction === 'LONG' ? averageEntry + risk : averageEntry - risk;
  const takeProfit2 = direction === 'LONG' ? averageEntry + 2 * risk : averageEntry - 2 * risk;

  const riskPercent = (risk / averageEntry) * 100;
  const leverageAuto = leverage === null;
  const lev = leverage === null ? autoLeverage(riskPercent) : validateLeverage(leverage);

  const potentialProfitPercent =
    direction === 'LONG'
      ? ((takeProfit2 - averageEntry) / averageEntry) * 100 * lev
      : ((averageEntry - takeProfit2) / averageEntry) * 100 * lev;

  const fmt = (price: number) => formatPrice(price, options.decimals);

  return {
    ticker: symbol,
    direction,
    entry1,
    entry2,
    averageEntry,
    takeProfit1,
    takeProfit2,
    stopLoss,
    risk,
    riskPercent,
    leverage: lev,
    leverageAuto,
    holdingTime: holdingTimeFor(riskPercent),
    potentialProfitPercent,
    formatted: {
      entry1: fmt(entry1),
      entry2: fmt(entry2),
      averageEntry: fmt(averageEntry),
      takeProfit1: fmt(takeProfit1),
      takeProfit2: fmt(takeProfit2),
      stopLoss: fmt(stopLoss),
      riskPercent: formatPercent(riskPercent),
      potentialProfit: formatPercent(potentialProfitPercent)
    }
  };
}
