/**
 * Read-side reports over published signals. Never mutates the store.
 * Year/month buckets come from each record's stored createdAt in the desk's zone.
 */

import { escapeHtml } from '../lib/html';
import { dayKey, periodOf } from '../lib/time';
import type { Direction, SignalRecord } from '../types/signal';
import type { MemberSnapshot } from '../schemas/storeDocument';
import type { YearRange } from './commandParser';

export const TOP_N = 5;

export interface AggregateFilter {
  years?: YearRange | null;
  /** Lower-case sender name */
  sender?: string | null;
}

export interface SignalAggregate {
  total: number;
  firstAt: string | null;
  lastAt: string | null;
  /** YYYY-MM-DD of firstAt/lastAt in the report zone */
  firstDay: string | null;
  lastDay: string | null;
  /** YYYY-MM -> count, chronological */
  byMonth: Record<string, number>;
  bySender: Record<string, number>;
  byDirection: Record<Direction, number>;
  byTicker: Record<string, number>;
  /** Most signalled tickers; ties keep encounter order */
  topTickers: Array<[ticker: string, count: number]>;
}

export interface ClickAggregate {
  totalClicks: number;
  signals: number;
  byTicker: Record<string, number>;
  topSignals: Array<{ sequenceId: string; ticker: string; clicks: number }>;
}

function inYears(year: string, range: YearRange | null | undefined): boolean {
  if (!range) return true;
  const y = Number(year);
  return y >= range.from && y <= range.to;
}

function increment(map: Record<string, number>, key: string): void {
  map[key] = (map[key] ?? 0) + 1;
}

/** Descending by count; Array.prototype.sort is stable, so ties stay in encounter order */
export function topN(counts: Record<string, number>, n = TOP_N): Array<[string, number]> {
  return Object.entries(counts)
    .sort((a, b) => b[1] - a[1])
    .slice(0, n);
}

export function filterRecords(records: SignalRecord[], filter: AggregateFilter, timeZone: string): SignalRecord[] {
  return records.filter((r) => {
    if (filter.sender && r.sender.toLowerCase() !== filter.sender) return false;
    return inYears(periodOf(new Date(r.createdAt), timeZone).year, filter.years);
  });
}

export function aggregate(records: SignalRecord[], filter: AggregateFilter, timeZone: string): SignalAggregate {
  const selected = filterRecords(records, filter, timeZone);
  const byMonth: Record<string, number> = {};
  const bySender: Record<string, number> = {};
  const byTicker: Record<string, number> = {};
  const byDirection: Record<Direction, number> = { LONG: 0, SHORT: 0 };
  let firstAt: string | null = null;
  let lastAt: string | null = null;

  for (const r of selected) {
    const { year, month } = periodOf(new Date(r.createdAt), timeZone);
    increment(byMonth, `${year}-${month}`);
    increment(bySender, r.sender);
    increment(byTicker, r.ticker);
    byDirection[r.direction]++;
    if (firstAt === null || r.createdAt < firstAt) firstAt = r.createdAt;
    if (lastAt === null || r.createdAt > lastAt) lastAt = r.createdAt;
  }

  const sortedMonths: Record<string, number> = {};
  for (const key of Object.keys(byMonth).sort()) sortedMonths[key] = byMonth[key];

  return {
    total: selected.length,
    firstAt,
    lastAt,
    firstDay: firstAt === null ? null : dayKey(new Date(firstAt), timeZone),
    lastDay: lastAt === null ? null : dayKey(new Date(lastAt), timeZone),
    byMonth: sortedMonths,
    bySender,
    byDirection,
    byTicker,
    topTickers: topN(byTicker)
  };
}

export function aggregateClicks(
  records: SignalRecord[],
  clicksFor: (sequenceId: string) => number,
  filter: AggregateFilter,
  timeZone: string
): ClickAggregate {
  const selected = filterRecords(records, filter, timeZone);
  const byTicker: Record<string, number> = {};
  const perSignal: ClickAggregate['topSignals'] = [];
  let totalClicks = 0;
  for (const r of selected) {
    const clicks = clicksFor(r.sequenceId);
    totalClicks += clicks;
    byTicker[r.ticker] = (byTicker[r.ticker] ?? 0) + clicks;
    perSignal.push({ sequenceId: r.sequenceId, ticker: r.ticker, clicks });
  }
  return {
    totalClicks,
    signals: selected.length,
    byTicker,
    topSignals: perSignal.filter((s) => s.clicks > 0).sort((a, b) => b.clicks - a.clicks).slice(0, TOP_N)
  };
}

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function monthLabel(key: string): string {
  const [year, month] = key.split('-');
  return `${MONTH_NAMES[Number(month) - 1] ?? month} ${year}`;
}

export function describeYears(years: YearRange | null | undefined): string {
  if (!years) return 'all time';
  return years.from === years.to ? String(years.from) : `${years.from}–${years.to}`;
}

export function formatSignalReport(title: string, agg: SignalAggregate): string {
  const lines = [`📈 <b>${title}</b>`, `Total signals: ${agg.total}`];
  if (agg.total === 0) return lines.join('\n');
  lines.push(
    `First: ${agg.firstDay ?? '—'} · Last: ${agg.lastDay ?? '—'}`,
    `LONG: ${agg.byDirection.LONG} · SHORT: ${agg.byDirection.SHORT}`,
    '',
    '<b>By month</b>',
    ...Object.entries(agg.byMonth).map(([k, n]) => `${monthLabel(k)}: ${n}`),
    '',
    '<b>By sender</b>',
    ...topN(agg.bySender, Number.POSITIVE_INFINITY).map(([s, n]) => `${escapeHtml(s)}: ${n}`),
    '',
    `<b>Top ${TOP_N} tickers</b>`,
    ...agg.topTickers.map(([t, n], i) => `${i + 1}. ${t}: ${n}`)
  );
  return lines.join('\n');
}

export function formatClickReport(title: string, agg: ClickAggregate): string {
  const lines = [`👀 <b>${title}</b>`, `Clicks: ${agg.totalClicks} across ${agg.signals} signals`];
  if (agg.totalClicks === 0) return lines.join('\n');
  lines.push(
    '',
    '<b>By ticker</b>',
    ...topN(agg.byTicker).map(([t, n]) => `${t}: ${n}`),
    '',
    '<b>Top signals</b>',
    ...agg.topSignals.map((s) => `#${s.sequenceId} ${s.ticker}: ${s.clicks}`)
  );
  return lines.join('\n');
}

export function formatChannelReport(current: number | null, snapshots: MemberSnapshot[]): string {
  const lines = ['👥 <b>Channel stats</b>'];
  lines.push(current === null ? 'Members now: unavailable' : `Members now: ${current}`);
  const recent = snapshots.slice(-8);
  if (recent.length === 0) {
    lines.push('No daily snapshots yet.');
    return lines.join('\n');
  }
  lines.push('', '<b>Daily snapshots</b>');
  recent.forEach((s, i) => {
    const prev = i > 0 ? recent[i - 1].count : null;
    const delta = prev === null ? '' : ` (${s.count - prev >= 0 ? '+' : ''}${s.count - prev})`;
    lines.push(`${s.date}: ${s.count}${delta}`);
  });
  return lines.join('\n');
}
