import { describe, it, expect, vi } from 'vitest';
import { SheetExporter, sheetRow } from './sheetExporter';
import { computeSignal } from './pricingEngine';
import { DeskEventBus } from '../lib/eventBus';
import { setLogSink } from '../lib/logger';
import type { SignalRecord } from '../types/signal';

const record: SignalRecord = {
  ...computeSignal('ETH', 3450, 3300, 3, { decimals: 0 }),
  sequenceId: '0007',
  createdAt: '2025-01-15T10:00:00.000Z',
  sender: 'alice',
  tradeUrl: 'https://example.com/trade/ETH-USDT',
  creative: 'photo-1',
  messageId: 42
};

function okFetch() {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response('ok'));
}

describe('sheetRow', () => {
  it('lays out the fixed columns', () => {
    expect(sheetRow(record, 'UTC')).toEqual([
      '15 Jan 2025, 10:00 AM',
      'ETH',
      'LONG',
      '3x',
      '3450',
      '3375',
      '3525',
      '3637.5',
      '3300',
      'ACTIVE'
    ]);
  });
});

describe('SheetExporter', () => {
  it('posts the row as JSON', async () => {
    const fetchImpl = okFetch();
    const exporter = new SheetExporter({ webhookUrl: 'https://sheets.example.com/hook', timeZone: 'UTC', fetchImpl });

    await expect(exporter.append(record)).resolves.toBe(true);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://sheets.example.com/hook');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      sequenceId: '0007',
      columns: ['Timestamp', 'Ticker', 'Direction', 'Leverage', 'Entry 1', 'Entry 2', 'TP1', 'TP2', 'Stop Loss', 'Status'],
      row: sheetRow(record, 'UTC')
    });
  });

  it('logs and swallows webhook failures', async () => {
    const lines: string[] = [];
    const restore = setLogSink((_level, line) => lines.push(line));
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response('quota exceeded', { status: 429 })
    );
    const exporter = new SheetExporter({ webhookUrl: 'https://sheets.example.com/hook', timeZone: 'UTC', fetchImpl });

    try {
      await expect(exporter.append(record)).resolves.toBe(false);
    } finally {
      restore();
    }
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[WARN] [SheetExport] Row append failed {"sequenceId":"0007","error":"Sheet webhook 429: quota exceeded"}');
  });

  it('exports on every published event', async () => {
    const fetchImpl = okFetch();
    const bus = new DeskEventBus();
    new SheetExporter({ webhookUrl: 'https://sheets.example.com/hook', timeZone: 'UTC', fetchImpl }).attach(bus);

    bus.emitPublished(record);

    await vi.waitFor(() => expect(fetchImpl).toHaveBeenCalledTimes(1));
  });
});
