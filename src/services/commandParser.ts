/**
 * Text -> Command. Pure: no store, no session, no transport.
 *
 * Matching is case-insensitive on the trimmed text; a leading "/" and an
 * "@botname" suffix are optional. Arguments that carry case (URLs, template
 * text) are taken from the original text.
 */

import { ValidationError } from '../lib/errors';
import { decimalsOf, parsePrice } from '../lib/priceFormat';
import { isHttpUrl, parseTicker } from '../lib/symbol';
import type { SignalRequest } from '../types/signal';
import { validateLeverage } from './pricingEngine';

export interface YearRange {
  from: number;
  to: number;
}

export type CreativeTarget = { all: true } | { all: false; key: string };

export type Command =
  | { type: 'help' }
  | { type: 'cancel' }
  | { type: 'signal'; request: SignalRequest }
  | { type: 'signalPrompt' }
  | { type: 'deleteLast' }
  | { type: 'saveCreative'; key: string }
  | { type: 'useCreative'; key: string }
  | { type: 'listCreatives' }
  | { type: 'clearCreative'; target: CreativeTarget }
  | { type: 'listLinks' }
  | { type: 'addLinks'; entries: Array<[ticker: string, url: string]> }
  | { type: 'clearLink'; ticker: string | null }
  | { type: 'tracker'; action: 'on' | 'off' | 'status' }
  | { type: 'periodStats'; years: YearRange | null }
  | { type: 'memberStats'; member: string; years: YearRange | null }
  | { type: 'viewStats'; years: YearRange | null }
  | { type: 'channelStats' }
  | { type: 'editTemplate' }
  | { type: 'setTemplate'; template: string }
  | { type: 'resetTemplate' }
  | { type: 'confirm'; sender: string | null };

export type CommandType = Command['type'];

export const USAGE = {
  signal: 'signal TICKER ENTRY STOPLOSS [LEVERAGEx] [URL]\nExample: signal ETH 3450 3300 3x',
  addlink: 'addlink TICKER URL [TICKER URL ...]',
  clearlink: 'clearlink TICKER | clearlink all',
  clearfix: 'clearfix N | clearfix all',
  use: 'use fixN',
  tracker: 'tracker on | tracker off | tracker status'
} as const;

const READ_ONLY: ReadonlySet<CommandType> = new Set<CommandType>([
  'help',
  'cancel',
  'listCreatives',
  'listLinks',
  'periodStats',
  'memberStats',
  'viewStats',
  'channelStats'
]);

/** Commands that never change the store (tracker status is a read) */
export function isReadOnly(command: Command): boolean {
  if (command.type === 'tracker') return command.action === 'status';
  return READ_ONLY.has(command.type);
}

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

const LEVERAGE_TOKEN = /^x?(\d+(?:\.\d+)?)x?$/i;

/**
 * Signal arguments: TICKER ENTRY STOPLOSS [LEVERAGEx|auto] [URL].
 * Throws ValidationError naming the offending token.
 */
export function parseSignalArgs(args: string[]): SignalRequest {
  if (args.length < 3) {
    throw new ValidationError('Not enough values for a signal.', USAGE.signal);
  }
  if (args.length > 5) {
    throw new ValidationError(`Too many values: "${args.slice(5).join(' ')}".`, USAGE.signal);
  }
  const [tickerRaw, entryRaw, slRaw, ...tail] = args;
  const ticker = parseTicker(tickerRaw);
  const entry1 = parsePrice(entryRaw, 'Entry');
  const stopLoss = parsePrice(slRaw, 'Stop loss');
  if (entry1 === stopLoss) {
    throw new ValidationError('Entry and stop loss must differ.', USAGE.signal);
  }

  let leverage: number | null = null;
  let tradeUrl: string | null = null;
  for (const [i, token] of tail.entries()) {
    const lev = LEVERAGE_TOKEN.exec(token);
    if (i === 0 && lev) {
      leverage = validateLeverage(Number(lev[1]));
    } else if (i === 0 && token.toLowerCase() === 'auto') {
      leverage = null;
    } else if (isHttpUrl(token) && tradeUrl === null) {
      tradeUrl = token;
    } else {
      throw new ValidationError(`"${token}" is neither a leverage like 3x nor an http(s) link.`, USAGE.signal);
    }
  }

  const decimals = Math.max(decimalsOf(entryRaw) ?? 0, decimalsOf(slRaw) ?? 0);
  return { ticker, entry1, stopLoss, leverage, tradeUrl, decimals };
}

function parseYears(first?: string, second?: string): YearRange | null {
  if (!first) return null;
  const a = Number(first);
  const b = second ? Number(second) : a;
  for (const y of [a, b]) {
    if (y < 2000 || y > 2100) throw new ValidationError(`${y} is not a plausible year.`);
  }
  return { from: Math.min(a, b), to: Math.max(a, b) };
}

function creativeKey(token: string): string | null {
  const m = /^(?:fix)?(\d+)$/i.exec(token);
  if (m) return `fix${Number(m[1])}`;
  if (token.toLowerCase() === 'fixed' || token.toLowerCase() === 'fix') return 'fix1';
  return null;
}

function parseStats(compact: string): Command | null {
  let m = /^views(\d{4})?(\d{4})?$/.exec(compact);
  if (m) return { type: 'viewStats', years: parseYears(m[1], m[2]) };
  m = /^totalsignals?(\d{4})?(\d{4})?$/.exec(compact);
  if (m) return { type: 'periodStats', years: parseYears(m[1], m[2]) };
  m = /^total([a-z][a-z0-9_]*?)(\d{4})?(\d{4})?$/.exec(compact);
  if (m) return { type: 'memberStats', member: m[1], years: parseYears(m[2], m[3]) };
  return null;
}

/** Returns null for text that is not a command. */
export function parseCommand(text: string): Command | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  const body = trimmed.replace(/^\//, '');
  const [headRaw, ...args] = tokenize(body);
  if (!headRaw) return null;
  const head = headRaw.toLowerCase().replace(/@\w+$/, '');
  const first = args[0]?.toLowerCase();

  switch (head) {
    case 'start':
    case 'help':
      return { type: 'help' };
    case 'cancel':
      return { type: 'cancel' };
    case 'signal':
      return args.length === 0 ? { type: 'signalPrompt' } : { type: 'signal', request: parseSignalArgs(args) };
    case 'delete':
      return { type: 'deleteLast' };
    case 'list':
      return { type: 'listCreatives' };
    case 'links':
      return { type: 'listLinks' };
    case 'channelstats':
      return { type: 'channelStats' };
    case 'use': {
      const key = args.length === 1 ? creativeKey(args[0]) : null;
      if (!key) throw new ValidationError('Which saved creative?', USAGE.use);
      return { type: 'useCreative', key };
    }
    case 'clearfix': {
      if (args.length !== 1) throw new ValidationError('Say which creative to clear.', USAGE.clearfix);
      if (first === 'all') return { type: 'clearCreative', target: { all: true } };
      const key = creativeKey(args[0]);
      if (!key) throw new ValidationError(`"${args[0]}" is not a creative number.`, USAGE.clearfix);
      return { type: 'clearCreative', target: { all: false, key } };
    }
    case 'addlink': {
      if (args.length === 0 || args.length % 2 !== 0) {
        throw new ValidationError('Links come in TICKER URL pairs.', USAGE.addlink);
      }
      const entries: Array<[string, string]> = [];
      for (let i = 0; i < args.length; i += 2) {
        const ticker = parseTicker(args[i]);
        const url = args[i + 1];
        if (!isHttpUrl(url)) throw new ValidationError(`"${url}" is not an http(s) link.`, USAGE.addlink);
        entries.push([ticker, url]);
      }
      return { type: 'addLinks', entries };
    }
    case 'clearlink': {
      if (args.length !== 1) throw new ValidationError('Say which link to clear.', USAGE.clearlink);
      return { type: 'clearLink', ticker: first === 'all' ? null : parseTicker(args[0]) };
    }
    case 'tracker': {
      if (!first || first === 'status') return { type: 'tracker', action: 'status' };
      if (first === 'on' || first === 'off') return { type: 'tracker', action: first };
      throw new ValidationError(`Unknown tracker action "${args[0]}".`, USAGE.tracker);
    }
    case 'format': {
      if (args.length === 0) return { type: 'editTemplate' };
      if (args.length === 1 && first === 'reset') return { type: 'resetTemplate' };
      return { type: 'setTemplate', template: body.slice(body.indexOf(headRaw) + headRaw.length).trim() };
    }
  }

  const fix = /^fix(\d*)$/.exec(head);
  if (fix && args.length <= 1) {
    const n = fix[1] || args[0] || '1';
    const key = creativeKey(n);
    if (!key) throw new ValidationError(`"${n}" is not a creative number.`, 'fixN');
    return { type: 'saveCreative', key };
  }

  const confirm = /^confirm(?:[-_]?([a-z][a-z0-9_]*))?$/.exec(head);
  if (confirm) {
    return { type: 'confirm', sender: confirm[1] ?? first ?? null };
  }

  if (head.startsWith('total') || head.startsWith('views')) {
    return parseStats([head, ...args].join('').toLowerCase());
  }

  return null;
}
