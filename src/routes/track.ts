/**
 * Click tracker: GET /track/:signalId counts a click and sends the reader on
 * to the signal's trade link.
 */

import { Router, Request, Response } from 'express';
import { formatSequenceId, type SignalStore } from '../db/signalStore';
import { ValidationError } from '../lib/errors';
import { escapeHtml } from '../lib/html';
import { logger } from '../lib/logger';

function redirectPage(url: string, ticker: string): string {
  const href = escapeHtml(url);
  return `<!doctype html>
<html><head><meta charset="utf-8"><meta http-equiv="refresh" content="0;url=${href}">
<title>${escapeHtml(ticker)} trade</title></head>
<body><p>Opening the ${escapeHtml(ticker)} trade page… <a href="${href}">Continue</a></p></body></html>`;
}

const NOT_FOUND_PAGE = `<!doctype html>
<html><head><meta charset="utf-8"><title>Signal not found</title></head>
<body><p>This signal link is no longer active.</p></body></html>`;

export function createTrackRouter(store: SignalStore): Router {
  const router = Router();

  /** GET /track/:signalId — accepts 7 or 0007 */
  router.get('/:signalId', (req: Request, res: Response) => {
    const raw = req.params.signalId;
    if (!/^\d{1,9}$/.test(raw)) {
      throw new ValidationError(`"${raw}" is not a signal id`);
    }
    const sequenceId = formatSequenceId(Number(raw));
    const record = store.recordClick(sequenceId);
    if (!record) {
      res.status(404).type('html').send(NOT_FOUND_PAGE);
      return;
    }
    logger.debug('Tracker', `Click on #${sequenceId}`, { ticker: record.ticker, clicks: store.clicksFor(sequenceId) });
    res.set('Cache-Control', 'no-store').type('html').send(redirectPage(record.tradeUrl, record.ticker));
  });

  return router;
}
