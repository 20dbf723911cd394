import { describe, it, expect } from 'vitest';
import {
  aggregate,
  aggregateClicks,
  describeYears,
  formatChannelReport,
  formatClickReport,
  formatSignalReport,
  topN
} from './analyticsService';
import { computeSignal } from './pricingEngine';
import type { SignalRecord } from '../types/signal';

function rec(seq: string, ticker: string, createdAt: string, sender: string, short = false): SignalRecord {
  const base = short ? computeSignal(ticker, 100, 110, 3) : computeSignal(ticker, 100, 90, 3);
  return {
    ...base,
    sequenceId: seq,
    createdAt,
    sender,
    tradeUrl: `https://example.com/${ticker}`,
    creative: 'img',
    messageId: Number(seq)
  };
}

const records: SignalRecord[] = [
  rec('0001', 'BTC', '2023-06-10T08:00:00.000Z', 'alice'),
  rec('0002', 'ETH', '2024-12-15T08:00:00.000Z', 'alice'),
  rec('0003', 'BTC', '2024-12-20T08:00:00.000Z', 'bob', true),
  rec('0004', 'SOL', '2025-01-03T08:00:00.000Z', 'bob'),
  rec('0005', 'BTC', '2025-01-09T08:00:00.000Z', 'alice', true)
];

describe('aggregate', () => {
  it('restricts to a year range across a month boundary', () => {
    const agg = aggregate(records, { years: { from: 2024, to: 2025 } }, 'UTC');
    expect(agg.total).toBe(4);
    expect(agg.byMonth).toEqual({ '2024-12': 2, '2025-01': 2 });
    expect(agg.byDirection).toEqual({ LONG: 2, SHORT: 2 });
    expect(agg.bySender).toEqual({ alice: 2, bob: 2 });
    expect(agg.firstAt).toBe('2024-12-15T08:00:00.000Z');
    expect(agg.lastAt).toBe('2025-01-09T08:00:00.000Z');
    expect(agg.topTickers).toEqual([['BTC', 2], ['ETH', 1], ['SOL', 1]]);
  });

  it('filters by sender', () => {
    const agg = aggregate(records, { sender: 'bob' }, 'UTC');
    expect(agg.total).toBe(2);
    expect(agg.byTicker).toEqual({ BTC: 1, SOL: 1 });
  });

  it('handles an empty selection', () => {
    const agg = aggregate(records, { years: { from: 2030, to: 2030 } }, 'UTC');
    expect(agg).toEqual({
      total: 0,
      firstAt: null,
      lastAt: null,
      firstDay: null,
      lastDay: null,
      byMonth: {},
      bySender: {},
      byDirection: { LONG: 0, SHORT: 0 },
      byTicker: {},
      topTickers: []
    });
  });

  it('buckets by the configured zone', () => {
    const lateNight = [rec('0009', 'BTC', '2024-12-31T20:00:00.000Z', 'alice')];
    expect(aggregate(lateNight, { years: { from: 2025, to: 2025 } }, 'Asia/Kolkata').total).toBe(1);
    expect(aggregate(lateNight, { years: { from: 2025, to: 2025 } }, 'UTC').total).toBe(0);
  });

  it('reports first and last days in the configured zone', () => {
    const lateNight = [rec('0009', 'BTC', '2024-12-31T20:00:00.000Z', 'alice')];
    const report = formatSignalReport('Signals, 2025', aggregate(lateNight, {}, 'Asia/Kolkata'));
    expect(report.split('\n')[2]).toBe('First: 2025-01-01 · Last: 2025-01-01');
    expect(report.split('\n')[6]).toBe('Jan 2025: 1');
  });
});

describe('topN', () => {
  it('keeps encounter order on ties', () => {
    expect(topN({ b: 1, a: 2, c: 1, d: 1 }, 3)).toEqual([['a', 2], ['b', 1], ['c', 1]]);
  });
});

describe('aggregateClicks', () => {
  it('joins click counts to signals', () => {
    const clicks: Record<string, number> = { '0002': 4, '0003': 1, '0005': 7 };
    const agg = aggregateClicks(records, (id) => clicks[id] ?? 0, { years: { from: 2024, to: 2025 } }, 'UTC');
    expect(agg.totalClicks).toBe(12);
    expect(agg.signals).toBe(4);
    expect(agg.byTicker).toEqual({ ETH: 4, BTC: 8, SOL: 0 });
    expect(agg.topSignals).toEqual([
      { sequenceId: '0005', ticker: 'BTC', clicks: 7 },
      { sequenceId: '0002', ticker: 'ETH', clicks: 4 },
      { sequenceId: '0003', ticker: 'BTC', clicks: 1 }
    ]);
  });
});

describe('reports', () => {
  it('describes year ranges', () => {
    expect(describeYears(null)).toBe('all time');
    expect(describeYears({ from: 2025, to: 2025 })).toBe('2025');
    expect(describeYears({ from: 2024, to: 2025 })).toBe('2024–2025');
  });

  it('renders the signal report', () => {
    const text = formatSignalReport('Signals 2024–2025', aggregate(records, { years: { from: 2024, to: 2025 } }, 'UTC'));
    expect(text.split('\n')).toEqual([
      '📈 <b>Signals 2024–2025</b>',
      'Total signals: 4',
      'First: 2024-12-15 · Last: 2025-01-09',
      'LONG: 2 · SHORT: 2',
      '',
      '<b>By month</b>',
      'Dec 2024: 2',
      'Jan 2025: 2',
      '',
      '<b>By sender</b>',
      'alice: 2',
      'bob: 2',
      '',
      '<b>Top 5 tickers</b>',
      '1. BTC: 2',
      '2. ETH: 1',
      '3. SOL: 1'
    ]);
  });

  it('renders a short report when nothing matches', () => {
    expect(formatSignalReport('Signals 2030', aggregate([], {}, 'UTC'))).toBe('📈 <b>Signals 2030</b>\nTotal signals: 0');
    expect(formatClickReport('Views', aggregateClicks([], () => 0, {}, 'UTC'))).toBe('👀 <b>Views</b>\nClicks: 0 across 0 signals');
  });

  it('renders member deltas', () => {
    const text = formatChannelReport(130, [
      { date: '2025-05-01', count: 100 },
      { date: '2025-05-02', count: 120 },
      { date: '2025-05-03', count: 118 }
    ]);
    expect(text.split('\n')).toEqual([
      '👥 <b>Channel stats</b>',
      'Members now: 130',
      '',
      '<b>Daily snapshots</b>',
      '2025-05-01: 100',
      '2025-05-02: 120 (+20)',
      '2025-05-03: 118 (-2)'
    ]);
    expect(formatChannelReport(null, [])).toBe('👥 <b>Channel stats</b>\nMembers now: unavailable\nNo daily snapshots yet.');
  });
});
