/**
 * The desk's single persisted document: creatives, ticker links, the sequence
 * counter, published signals by year/month, click counts, member snapshots
 * and settings.
 *
 * Every mutation updates the in-memory document and rewrites the whole file
 * through the persistence port. One writer process is assumed.
 */

import { PersistenceError, errorMessage } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { periodOf } from '../lib/time';
import {
  defaultStoreDocument,
  storeDocumentSchema,
  type MemberSnapshot,
  type StoreDocument
} from '../schemas/storeDocument';
import type { SignalRecord } from '../types/signal';
import type { StorePersistence } from './jsonFilePersistence';

const log = createLogger('Store');

export const SEQUENCE_WIDTH = 4;

/** How many daily member snapshots are kept */
const MAX_MEMBER_SNAPSHOTS = 400;

export interface SignalStoreOptions {
  /** Zone the year/month partition is derived in */
  timeZone: string;
  /** Read-only ticker -> link table consulted after the operator's links */
  defaultLinks?: Record<string, string>;
}

export function formatSequenceId(n: number): string {
  return String(n).padStart(SEQUENCE_WIDTH, '0');
}

export class SignalStore {
  private doc: StoreDocument = defaultStoreDocument();
  private readonly defaultLinks: Record<string, string>;
  private readonly timeZone: string;
  private lastWriteError: string | null = null;

  constructor(private readonly persistence: StorePersistence, options: SignalStoreOptions) {
    this.timeZone = options.timeZone;
    this.defaultLinks = options.defaultLinks ?? {};
  }

  /**
   * Load and merge with the default shape. No stored document means defaults.
   * A corrupt document is quarantined and replaced with an empty one; an
   * unreadable one (permissions, I/O) throws.
   */
  load(): StoreDocument {
    const raw = this.persistence.read();
    if (raw === null) {
      this.doc = defaultStoreDocument();
      log.info('No store document yet, starting empty', { at: this.persistence.describe() });
      return this.doc;
    }
    try {
      this.doc = this.parse(raw);
    } catch (err) {
      const movedTo = this.persistence.quarantine();
      log.error('Store document is corrupt; quarantined and starting empty', {
        at: this.persistence.describe(),
        movedTo,
        error: errorMessage(err)
      });
      this.doc = defaultStoreDocument();
      this.commit();
    }
    return this.doc;
  }

  private parse(raw: string): StoreDocument {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(`Store document is not valid JSON: ${errorMessage(err)}`, err);
    }
    const result = storeDocumentSchema.safeParse(json);
    if (!result.success) {
      const first = result.error.issues[0];
      const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown shape';
      throw new PersistenceError(`Store document failed validation (${where})`, result.error);
    }
    return result.data;
  }

  /** Full rewrite of the current document */
  save(): void {
    this.persistence.write(JSON.stringify(this.doc, null, 2));
  }

  /** Rewrite after a mutation. On failure the in-memory change stands and the error is logged. */
  private commit(): void {
    try {
      this.save();
      this.lastWriteError = null;
    } catch (err) {
      this.lastWriteError = errorMessage(err);
      log.error('Store write failed; change kept in memory only', { error: this.lastWriteError });
    }
  }

  /** Message of the last failed write, cleared by the next successful one */
  get writeError(): string | null {
    return this.lastWriteError;
  }

  // ---- creatives ----

  getCreative(key: string): string | undefined {
    return this.doc.creatives[key];
  }

  setCreative(key: string, image: string): void {
    this.doc.creatives[key] = image;
    this.commit();
  }

  deleteCreative(key: string): boolean {
    if (!(key in this.doc.creatives)) return false;
    delete this.doc.creatives[key];
    this.commit();
    return true;
  }

  clearCreatives(): number {
    const count = Object.keys(this.doc.creatives).length;
    if (count === 0) return 0;
    this.doc.creatives = {};
    this.commit();
    return count;
  }

  listCreatives(): Array<[key: string, image: string]> {
    return Object.entries(this.doc.creatives).sort(([a], [b]) => a.localeCompare(b, 'en', { numeric: true }));
  }

  // ---- links ----

  /** Operator link first, then the shipped default table */
  getLink(ticker: string): string | undefined {
    return this.doc.links[ticker] ?? this.defaultLinks[ticker];
  }

  setLinks(entries: Array<[ticker: string, url: string]>): void {
    if (entries.length === 0) return;
    for (const [ticker, url] of entries) {
      this.doc.links[ticker] = url;
    }
    this.commit();
  }

  deleteLink(ticker: string): boolean {
    if (!(ticker in this.doc.links)) return false;
    delete this.doc.links[ticker];
    this.commit();
    return true;
  }

  clearLinks(): number {
    const count = Object.keys(this.doc.links).length;
    if (count === 0) return 0;
    this.doc.links = {};
    this.commit();
    return count;
  }

  /** Operator-saved links only */
  listLinks(): Array<[ticker: string, url: string]> {
    return Object.entries(this.doc.links).sort(([a], [b]) => a.localeCompare(b));
  }

  get defaultLinkCount(): number {
    return Object.keys(this.defaultLinks).length;
  }

  // ---- signals ----

  /** Sequence id the next published signal will get */
  nextSequenceId(): string {
    return formatSequenceId(this.doc.signalCounter + 1);
  }

  get signalCounter(): number {
    return this.doc.signalCounter;
  }

  /**
   * Persist a published signal: advance the counter to its sequence number,
   * append it to its year/month partition and mark it as last published.
   */
  recordPublished(record: SignalRecord): void {
    const seq = Number(record.sequenceId);
    if (!Number.isInteger(seq) || seq <= this.doc.signalCounter) {
      throw new PersistenceError(
        `Sequence ${record.sequenceId} is not ahead of the counter (${this.doc.signalCounter})`
      );
    }
    const { year, month } = periodOf(new Date(record.createdAt), this.timeZone);
    const byMonth = (this.doc.signals[year] ??= {});
    (byMonth[month] ??= []).push(record);
    this.doc.signalCounter = seq;
    this.doc.lastPublished = { year, month, sequenceId: record.sequenceId };
    this.commit();
  }

  getLastPublished(): SignalRecord | null {
    const last = this.doc.lastPublished;
    if (!last) return null;
    return this.doc.signals[last.year]?.[last.month]?.find((r) => r.sequenceId === last.sequenceId) ?? null;
  }

  /** Evict the last published record. The counter is never decremented. */
  removeLastPublished(): SignalRecord | null {
    const last = this.doc.lastPublished;
    if (!last) return null;
    const bucket = this.doc.signals[last.year]?.[last.month];
    const index = bucket?.findIndex((r) => r.sequenceId === last.sequenceId) ?? -1;
    if (!bucket || index < 0) {
      this.doc.lastPublished = null;
      this.commit();
      return null;
    }
    const [removed] = bucket.splice(index, 1);
    if (bucket.length === 0) {
      delete this.doc.signals[last.year][last.month];
      if (Object.keys(this.doc.signals[last.year]).length === 0) delete this.doc.signals[last.year];
    }
    delete this.doc.clicks[last.sequenceId];
    this.doc.lastPublished = null;
    this.commit();
    return removed;
  }

  /** All records, oldest partition first */
  allSignals(): SignalRecord[] {
    const out: SignalRecord[] = [];
    for (const year of Object.keys(this.doc.signals).sort()) {
      const months = this.doc.signals[year];
      for (const month of Object.keys(months).sort()) {
        out.push(...months[month]);
      }
    }
    return out;
  }

  findSignal(sequenceId: string): SignalRecord | null {
    for (const months of Object.values(this.doc.signals)) {
      for (const records of Object.values(months)) {
        const hit = records.find((r) => r.sequenceId === sequenceId);
        if (hit) return hit;
      }
    }
    return null;
  }

  // ---- click tracking ----

  /** Count a click on a published signal; null if the id is unknown */
  recordClick(sequenceId: string): SignalRecord | null {
    const record = this.findSignal(sequenceId);
    if (!record) return null;
    this.doc.clicks[sequenceId] = (this.doc.clicks[sequenceId] ?? 0) + 1;
    this.commit();
    return record;
  }

  clicksFor(sequenceId: string): number {
    return this.doc.clicks[sequenceId] ?? 0;
  }

  // ---- channel member snapshots ----

  /** One snapshot per day; a later one on the same day replaces it */
  recordMemberSnapshot(date: string, count: number): void {
    const snapshots = this.doc.memberSnapshots.filter((s) => s.date !== date);
    snapshots.push({ date, count });
    snapshots.sort((a, b) => a.date.localeCompare(b.date));
    this.doc.memberSnapshots = snapshots.slice(-MAX_MEMBER_SNAPSHOTS);
    this.commit();
  }

  listMemberSnapshots(): MemberSnapshot[] {
    return [...this.doc.memberSnapshots];
  }

  // ---- settings ----

  getTemplate(): string | null {
    return this.doc.settings.template;
  }

  /** null restores the built-in template */
  setTemplate(template: string | null): void {
    this.doc.settings.template = template;
    this.commit();
  }

  isTrackingEnabled(): boolean {
    return this.doc.settings.trackingEnabled;
  }

  setTrackingEnabled(enabled: boolean): void {
    this.doc.settings.trackingEnabled = enabled;
    this.commit();
  }
}
