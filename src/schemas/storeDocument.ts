import { z } from 'zod';

export const STORE_VERSION = 1;

const formattedSignalSchema = z.object({
  entry1: z.string(),
  entry2: z.string(),
  averageEntry: z.string(),
  takeProfit1: z.string(),
  takeProfit2: z.string(),
  stopLoss: z.string(),
  riskPercent: z.string(),
  potentialProfit: z.string()
});

export const signalRecordSchema = z.object({
  ticker: z.string().min(1),
  direction: z.enum(['LONG', 'SHORT']),
  entry1: z.number().positive(),
  entry2: z.number().positive(),
  averageEntry: z.number().positive(),
  takeProfit1: z.number(),
  takeProfit2: z.number(),
  stopLoss: z.number().positive(),
  risk: z.number().min(0),
  riskPercent: z.number().min(0),
  leverage: z.number().int().positive(),
  leverageAuto: z.boolean().default(false),
  holdingTime: z.enum(['1–2 days', '2–3 days', '5–7 days']),
  potentialProfitPercent: z.number(),
  formatted: formattedSignalSchema,
  sequenceId: z.string().regex(/^\d+$/),
  createdAt: z.string().datetime({ offset: true }),
  sender: z.string(),
  tradeUrl: z.string(),
  creative: z.string(),
  messageId: z.number().int()
});

const lastPublishedSchema = z.object({
  year: z.string(),
  month: z.string(),
  sequenceId: z.string()
});

const settingsSchema = z
  .object({
    template: z.string().nullable().default(null),
    trackingEnabled: z.boolean().default(false)
  })
  .passthrough();

const memberSnapshotSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  count: z.number().int().min(0)
});

/**
 * Whole persisted document. Missing keys are backfilled with defaults;
 * unknown top-level keys pass through untouched.
 */
export const storeDocumentSchema = z
  .object({
    version: z.number().int().default(STORE_VERSION),
    signalCounter: z.number().int().min(0).default(0),
    creatives: z.record(z.string()).default({}),
    links: z.record(z.string()).default({}),
    /** year -> month -> records, in publish order */
    signals: z.record(z.record(z.array(signalRecordSchema))).default({}),
    lastPublished: lastPublishedSchema.nullable().default(null),
    /** sequenceId -> click count */
    clicks: z.record(z.number().int().min(0)).default({}),
    memberSnapshots: z.array(memberSnapshotSchema).default([]),
    settings: settingsSchema.default({})
  })
  .passthrough();

export type StoreDocument = z.infer<typeof storeDocumentSchema>;
export type MemberSnapshot = z.infer<typeof memberSnapshotSchema>;
export type LastPublished = z.infer<typeof lastPublishedSchema>;

export function defaultStoreDocument(): StoreDocument {
  return storeDocumentSchema.parse({});
}
