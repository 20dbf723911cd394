/**
 * Read-only ticker -> trade link table shipped with the bot (data/tickerLinks.json).
 * Operator links saved in the store always take precedence.
 */

import fs from 'fs';
import { z } from 'zod';
import { createLogger } from '../lib/logger';
import { normalizeTicker, isHttpUrl } from '../lib/symbol';
import { errorMessage } from '../lib/errors';

const log = createLogger('DefaultLinks');

const linkTableSchema = z.record(z.string());

export function parseDefaultLinks(raw: unknown): Record<string, string> {
  const table = linkTableSchema.parse(raw);
  const links: Record<string, string> = {};
  for (const [ticker, url] of Object.entries(table)) {
    const key = normalizeTicker(ticker);
    if (key && isHttpUrl(url)) links[key] = url;
  }
  return links;
}

export function loadDefaultLinks(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    log.info('No default link table', { path: filePath });
    return {};
  }
  try {
    const links = parseDefaultLinks(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    log.info(`Loaded ${Object.keys(links).length} default links`, { path: filePath });
    return links;
  } catch (err) {
    log.warn('Default link table ignored', { path: filePath, error: errorMessage(err) });
    return {};
  }
}
