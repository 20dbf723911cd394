/**
 * Message composition: the channel caption template, the operator-side
 * preview, the summary box and the design brief sent after publishing.
 * All output is Telegram HTML.
 */

import { ValidationError } from '../lib/errors';
import { escapeHtml } from '../lib/html';
import { toPair } from '../lib/symbol';
import type { ComputedSignal } from '../types/signal';

/** Telegram caption limit, counted on visible text */
export const CAPTION_LIMIT = 1024;

export const DEFAULT_TEMPLATE = `🏆 <a href="{challenge_url}">EXCLUSIVE TG TRADE CHALLENGE</a>

🚨 NEW CRYPTO TRADE ALERT {direction_emoji}🔥

🔹 TRADE: {ticker} {direction}
🔹 Pair: {pair}
🔹 Risk: HIGH
🔹 Leverage: {leverage}x
🔹 Risk Reward Ratio: {rr_ratio}

🕰️ Holding time: {holding_time}

🔸 Entry 1: \${entry1}
🔸 Entry 2: \${entry2}

🎯 Take Profit (TP) 1: \${tp1}
🎯 Take Profit (TP) 2: \${tp2}

🛑 Stop Loss (SL): \${sl}

⚠️ Disclaimer: Crypto assets are unregulated and extremely volatile. Losses are possible, and no regulatory recourse is available. Always DYOR before taking any trade.

<a href="{leaderboard_url}">CHECK THE LEADERBOARD 🚀</a>`;

export const PLACEHOLDERS = {
  ticker: 'ETH, BTC',
  pair: 'ETH/USDT',
  direction: 'LONG / SHORT',
  direction_emoji: '📈 / 📉',
  leverage: '3',
  holding_time: '2–3 days',
  entry1: 'Entry 1',
  entry2: 'Entry 2 (midpoint of entry and SL)',
  avg_entry: 'Average entry',
  tp1: 'Take profit 1 (1:1)',
  tp2: 'Take profit 2 (1:2)',
  sl: 'Stop loss',
  sl_percent: 'Stop-loss distance, 3.30%',
  potential_profit: 'Potential profit at TP2, 19.78%',
  rr_ratio: '1:2',
  sequence_id: 'Signal number, 0042',
  sender: 'Who confirmed the post',
  published_at: '15 Jan 2025, 03:30 PM',
  trade_url: 'Call-to-action link',
  challenge_url: 'CHALLENGE_URL setting',
  leaderboard_url: 'LEADERBOARD_URL setting'
} as const;

const PLACEHOLDER_PATTERN = /\{([a-z0-9_]+)\}/g;

export type PlaceholderKey = keyof typeof PLACEHOLDERS;

export type TemplateVars = Record<PlaceholderKey, string>;

function isPlaceholder(key: string): key is PlaceholderKey {
  return Object.prototype.hasOwnProperty.call(PLACEHOLDERS, key);
}

export interface TemplateContext {
  sequenceId: string;
  sender: string;
  tradeUrl: string;
  publishedAt: string;
  challengeUrl: string;
  leaderboardUrl: string;
}

export function templateVars(signal: ComputedSignal, ctx: TemplateContext): TemplateVars {
  const f = signal.formatted;
  return {
    ticker: signal.ticker,
    pair: toPair(signal.ticker),
    direction: signal.direction,
    direction_emoji: signal.direction === 'LONG' ? '📈' : '📉',
    leverage: String(signal.leverage),
    holding_time: signal.holdingTime,
    entry1: f.entry1,
    entry2: f.entry2,
    avg_entry: f.averageEntry,
    tp1: f.takeProfit1,
    tp2: f.takeProfit2,
    sl: f.stopLoss,
    sl_percent: f.riskPercent,
    potential_profit: f.potentialProfit,
    rr_ratio: '1:2',
    sequence_id: ctx.sequenceId,
    sender: escapeHtml(ctx.sender),
    published_at: ctx.publishedAt,
    trade_url: escapeHtml(ctx.tradeUrl),
    challenge_url: escapeHtml(ctx.challengeUrl),
    leaderboard_url: escapeHtml(ctx.leaderboardUrl)
  };
}

function rendersEmpty(line: string, vars: TemplateVars): boolean {
  return [...line.matchAll(PLACEHOLDER_PATTERN)].some(([, key]) => isPlaceholder(key) && vars[key] === '');
}

/**
 * Unknown placeholders are left as typed. A line with a placeholder that renders
 * empty (an unset challenge or leaderboard link) is dropped.
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  const lines = template.split('\n');
  const kept = lines.filter((line) => !rendersEmpty(line, vars));
  const text = kept
    .join('\n')
    .replace(PLACEHOLDER_PATTERN, (match, key: string) => (isPlaceholder(key) ? vars[key] : match));
  return kept.length === lines.length ? text : text.replace(/\n{3,}/g, '\n\n').trim();
}

export function unknownPlaceholders(template: string): string[] {
  const unknown = new Set<string>();
  for (const [, key] of template.matchAll(PLACEHOLDER_PATTERN)) {
    if (!isPlaceholder(key)) unknown.add(key);
  }
  return [...unknown];
}

export function validateTemplate(template: string): string {
  const trimmed = template.trim();
  if (!trimmed) throw new ValidationError('Template is empty.', 'Send the template text, or reset');
  const unknown = unknownPlaceholders(trimmed);
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown placeholder${unknown.length > 1 ? 's' : ''}: ${unknown.map((k) => `{${k}}`).join(', ')}.`,
      'Send format to see the available placeholders'
    );
  }
  return trimmed;
}

/** Visible length of an HTML caption (tags removed, entities counted once) */
export function visibleLength(html: string): number {
  return html.replace(/<[^>]*>/g, '').replace(/&(?:amp|lt|gt|quot|#\d+);/g, '_').length;
}

export function assertCaptionFits(caption: string): void {
  const length = visibleLength(caption);
  if (length > CAPTION_LIMIT) {
    throw new ValidationError(
      `Caption is ${length} characters; Telegram allows ${CAPTION_LIMIT}. Shorten the template with format.`
    );
  }
}

export function placeholderHelp(): string {
  const lines = Object.entries(PLACEHOLDERS).map(([key, hint]) => `<code>{${key}}</code> ${escapeHtml(hint)}`);
  return lines.join('\n');
}

/** Calculation preview shown right after a signal command */
export function renderCalculationPreview(signal: ComputedSignal, tradeUrl: string): string {
  const f = signal.formatted;
  const lev = signal.leverageAuto ? `${signal.leverage}x (auto)` : `${signal.leverage}x`;
  return [
    '📊 <b>Signal preview</b>',
    `Ticker: ${signal.ticker} ${signal.direction}`,
    `Entry 1: $${f.entry1}`,
    `Entry 2: $${f.entry2}`,
    `Avg entry: $${f.averageEntry}`,
    `TP1: $${f.takeProfit1}`,
    `TP2: $${f.takeProfit2}`,
    `SL: $${f.stopLoss} (${f.riskPercent})`,
    `Leverage: ${lev}`,
    `Holding time: ${signal.holdingTime}`,
    `Potential profit: ${f.potentialProfit}`,
    `Trade URL: ${escapeHtml(tradeUrl)}`
  ].join('\n');
}

/** Summary box for pinning */
export function renderSummaryBox(signal: ComputedSignal, publishedAt: string): string {
  const f = signal.formatted;
  return [
    '📊 <b>SUMMARY BOX</b>',
    '<pre>',
    `Entry 1: $${f.entry1}`,
    `Entry 2: $${f.entry2}`,
    `Average Entry: $${f.averageEntry}`,
    `TP1: $${f.takeProfit1}`,
    `TP2: $${f.takeProfit2}`,
    `SL: $${f.stopLoss}`,
    `⏰ Published On: ${publishedAt}`,
    `Potential Profit: ${f.potentialProfit}`,
    '</pre>'
  ].join('\n');
}

/** Text-field values for the designer's creative frame */
export function renderDesignBrief(signal: ComputedSignal, publishedAt: string): string {
  const f = signal.formatted;
  return [
    '📋 <b>DESIGN BRIEF</b>',
    '',
    'Update only the text fields of the signal frame; leave styles and layout untouched.',
    '<pre>',
    `Asset Name: ${signal.ticker}`,
    `Direction: ${signal.direction}`,
    `Leverage: ${signal.leverage}x`,
    `Entry Price: $${f.entry1} – $${f.entry2}`,
    `TP1: $${f.takeProfit1}`,
    `TP2: $${f.takeProfit2}`,
    `SL: $${f.stopLoss}`,
    `Profit: ${f.potentialProfit}`,
    `Published On: ${publishedAt}`,
    '</pre>'
  ].join('\n');
}
