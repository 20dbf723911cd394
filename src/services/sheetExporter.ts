/**
 * Spreadsheet export: one row per published signal, POSTed as JSON to a
 * webhook (an Apps Script endpoint or similar). Fire-and-forget; failures
 * are logged and never reach the publishing path.
 */

import { errorMessage } from '../lib/errors';
import type { DeskEventBus } from '../lib/eventBus';
import { createLogger } from '../lib/logger';
import { formatTimestamp } from '../lib/time';
import type { SignalRecord } from '../types/signal';

const log = createLogger('SheetExport');

const REQUEST_TIMEOUT_MS = 10_000;

/** Header the webhook writes on an empty sheet; `row` follows this order */
export const SHEET_COLUMNS = [
  'Timestamp',
  'Ticker',
  'Direction',
  'Leverage',
  'Entry 1',
  'Entry 2',
  'TP1',
  'TP2',
  'Stop Loss',
  'Status'
] as const;

export type SheetRow = string[];

export function sheetRow(record: SignalRecord, timeZone: string): SheetRow {
  const f = record.formatted;
  return [
    formatTimestamp(new Date(record.createdAt), timeZone),
    record.ticker,
    record.direction,
    `${record.leverage}x`,
    f.entry1,
    f.entry2,
    f.takeProfit1,
    f.takeProfit2,
    f.stopLoss,
    'ACTIVE'
  ];
}

export interface SheetExporterOptions {
  webhookUrl: string;
  timeZone: string;
  fetchImpl?: typeof fetch;
}

export class SheetExporter {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: SheetExporterOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** Resolves to whether the row was accepted; never rejects */
  async append(record: SignalRecord): Promise<boolean> {
    try {
      const res = await this.fetchImpl(this.options.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          sequenceId: record.sequenceId,
          columns: SHEET_COLUMNS,
          row: sheetRow(record, this.options.timeZone)
        }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS)
      });
      if (!res.ok) throw new Error(`Sheet webhook ${res.status}: ${await res.text()}`);
      log.debug('Row appended', { sequenceId: record.sequenceId });
      return true;
    } catch (e) {
      log.warn('Row append failed', { sequenceId: record.sequenceId, error: errorMessage(e) });
      return false;
    }
  }

  attach(bus: DeskEventBus): void {
    bus.onPublished((record) => {
      void this.append(record);
    });
  }
}
