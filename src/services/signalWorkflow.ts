/**
 * Signal lifecycle: draft -> creative -> preview -> confirm -> publish, and
 * deletion of the last published post.
 *
 * Publishing and deleting share one mutex, so the sequence id peeked before
 * the channel post is still the next one when the record is committed.
 */

import type { DeskConfig } from '../config';
import type { SignalStore } from '../db/signalStore';
import { NotFoundError, TransportError, ValidationError, errorMessage } from '../lib/errors';
import type { DeskEventBus } from '../lib/eventBus';
import { createLogger } from '../lib/logger';
import { Mutex } from '../lib/mutex';
import { defaultTradeUrl } from '../lib/symbol';
import { formatTimestamp } from '../lib/time';
import type { CallToAction, MessagingEndpoint, Reply } from '../types/messaging';
import type { SignalRecord, SignalRequest } from '../types/signal';
import { USAGE } from './commandParser';
import { type ConfirmationPolicy, type SessionRegistry, type SignalDraft, promptFor } from './conversation';
import { computeSignal } from './pricingEngine';
import {
  DEFAULT_TEMPLATE,
  assertCaptionFits,
  renderCalculationPreview,
  renderDesignBrief,
  renderSummaryBox,
  renderTemplate,
  templateVars
} from './templateService';

const log = createLogger('Workflow');

export interface WorkflowDeps {
  store: SignalStore;
  messenger: MessagingEndpoint;
  bus: DeskEventBus;
  sessions: SessionRegistry;
  config: DeskConfig;
  mutex?: Mutex;
  now?: () => Date;
}

export function callToAction(ticker: string, url: string): CallToAction {
  return { text: `TRADE NOW - ${ticker} 🔥`, url };
}

export class SignalWorkflow {
  private readonly store: SignalStore;
  private readonly messenger: MessagingEndpoint;
  private readonly bus: DeskEventBus;
  private readonly sessions: SessionRegistry;
  private readonly config: DeskConfig;
  private readonly mutex: Mutex;
  private readonly now: () => Date;

  constructor(deps: WorkflowDeps) {
    this.store = deps.store;
    this.messenger = deps.messenger;
    this.bus = deps.bus;
    this.sessions = deps.sessions;
    this.config = deps.config;
    this.mutex = deps.mutex ?? new Mutex();
    this.now = deps.now ?? (() => new Date());
  }

  get policy(): ConfirmationPolicy {
    return this.config.confirmation;
  }

  beginCollecting(userId: number): Reply[] {
    this.sessions.set(userId, { state: 'collectingParameters' });
    return [{ kind: 'text', text: `📝 ${promptFor({ state: 'collectingParameters' }, this.policy)}\nExample: ETH 3450 3300 3x` }];
  }

  /** Compute the signal, resolve its link and wait for a creative. Nothing changes on a validation failure. */
  startDraft(userId: number, request: SignalRequest): Reply[] {
    const signal = computeSignal(request.ticker, request.entry1, request.stopLoss, request.leverage, {
      decimals: request.decimals
    });
    const { url, saved } = this.resolveTradeUrl(signal.ticker, request.tradeUrl);
    const draft: SignalDraft = { signal, tradeUrl: url };
    this.sessions.set(userId, { state: 'awaitingCreative', draft });
    log.info('Draft started', { userId, ticker: signal.ticker, direction: signal.direction });

    const replies: Reply[] = [{ kind: 'text', text: renderCalculationPreview(signal, url), html: true }];
    if (saved) replies.push({ kind: 'text', text: `🔗 Link saved for ${signal.ticker}.` });
    replies.push({ kind: 'text', text: promptFor({ state: 'awaitingCreative', draft }, this.policy) });
    return replies;
  }

  private resolveTradeUrl(ticker: string, explicit: string | null): { url: string; saved: boolean } {
    if (explicit) {
      this.store.setLinks([[ticker, explicit]]);
      return { url: explicit, saved: true };
    }
    const known = this.store.getLink(ticker);
    if (known) return { url: known, saved: false };
    if (this.config.links.fallback === 'reject') {
      throw new NotFoundError(`No trade link for ${ticker}. Add one first or pass it in the signal.`, USAGE.addlink);
    }
    return { url: defaultTradeUrl(this.config.links.tradeUrlBase, ticker), saved: false };
  }

  /** Attach (or replace) the creative and show the channel preview */
  attachCreative(userId: number, image: string): Reply[] {
    const session = this.sessions.get(userId);
    if (!session || (session.state !== 'awaitingCreative' && session.state !== 'awaitingConfirmation')) {
      throw new ValidationError('No draft is waiting for a creative. Start with signal.', USAGE.signal);
    }
    const { draft } = session;
    const caption = this.renderCaption(draft, {
      sequenceId: this.store.nextSequenceId(),
      sender: this.policy.senders.length === 0 ? this.policy.defaultSender : '…',
      publishedAt: formatTimestamp(this.now(), this.config.timeZone)
    });
    assertCaptionFits(caption);
    const next = { state: 'awaitingConfirmation' as const, draft, creative: image };
    this.sessions.set(userId, next);
    return [
      { kind: 'image', image, caption, button: callToAction(draft.signal.ticker, draft.tradeUrl) },
      { kind: 'text', text: `👀 Preview above. ${promptFor(next, this.policy)}` }
    ];
  }

  /** `use fixN`: a missing key leaves the draft where it was */
  useSavedCreative(userId: number, key: string): Reply[] {
    const session = this.sessions.get(userId);
    if (!session || (session.state !== 'awaitingCreative' && session.state !== 'awaitingConfirmation')) {
      throw new ValidationError('Saved creatives are used while a draft waits for its image. Start with signal.', USAGE.signal);
    }
    const image = this.store.getCreative(key);
    if (!image) {
      throw new NotFoundError(`No creative saved as ${key}.`, 'Save one with fixN, or send the image');
    }
    return this.attachCreative(userId, image);
  }

  private renderCaption(
    draft: SignalDraft,
    ctx: { sequenceId: string; sender: string; publishedAt: string }
  ): string {
    const template = this.store.getTemplate() ?? DEFAULT_TEMPLATE;
    return renderTemplate(
      template,
      templateVars(draft.signal, {
        ...ctx,
        tradeUrl: draft.tradeUrl,
        challengeUrl: this.config.template.challengeUrl,
        leaderboardUrl: this.config.template.leaderboardUrl
      })
    );
  }

  private buttonUrl(draft: SignalDraft, sequenceId: string): string {
    if (!this.store.isTrackingEnabled()) return draft.tradeUrl;
    return `${this.config.tracker.baseUrl}/track/${sequenceId}`;
  }

  /**
   * Post the confirmed draft to the channel and record it. A transport
   * failure leaves the session in awaitingConfirmation so the same token
   * can be resent.
   */
  async confirm(userId: number, sender: string): Promise<Reply[]> {
    const session = this.sessions.get(userId);
    if (!session || session.state !== 'awaitingConfirmation') {
      throw new ValidationError('Nothing to confirm. Start with signal.', USAGE.signal);
    }

    return this.mutex.runExclusive(async () => {
      // a second confirm queued behind the first finds the session gone
      if (this.sessions.get(userId) !== session) {
        throw new ValidationError('Nothing to confirm. Start with signal.', USAGE.signal);
      }
      const { draft, creative } = session;
      const sequenceId = this.store.nextSequenceId();
      const now = this.now();
      const publishedAt = formatTimestamp(now, this.config.timeZone);
      const caption = this.renderCaption(draft, { sequenceId, sender, publishedAt });
      assertCaptionFits(caption);

      let messageId: number;
      try {
        messageId = await this.messenger.sendImageMessage(
          this.config.telegram.channelId,
          creative,
          caption,
          callToAction(draft.signal.ticker, this.buttonUrl(draft, sequenceId))
        );
      } catch (err) {
        log.warn('Channel post failed; draft kept for retry', { userId, sequenceId, error: errorMessage(err) });
        throw new TransportError(`Couldn't post to the channel: ${errorMessage(err)}`, err);
      }

      const record: SignalRecord = {
        ...draft.signal,
        sequenceId,
        createdAt: now.toISOString(),
        sender,
        tradeUrl: draft.tradeUrl,
        creative,
        messageId
      };
      this.store.recordPublished(record);
      // a new draft may have been started while the post was in flight
      if (this.sessions.get(userId) === session) this.sessions.clear(userId);
      log.info('Signal published', { sequenceId, ticker: record.ticker, sender, messageId });
      this.bus.emitPublished(record);

      const replies: Reply[] = [
        { kind: 'text', text: `✅ Signal #${sequenceId} (${record.ticker} ${record.direction}) posted to the channel by ${sender}.` },
        { kind: 'text', text: renderSummaryBox(record, publishedAt), html: true },
        { kind: 'text', text: renderDesignBrief(record, publishedAt), html: true }
      ];
      const writeError = this.store.writeError;
      if (writeError) {
        replies.push({ kind: 'text', text: `⚠️ The signal is posted but the store could not be written: ${writeError}` });
      }
      return replies;
    });
  }

  /** Remove the last published post. A transport failure keeps the pointer. */
  async deleteLast(): Promise<Reply[]> {
    return this.mutex.runExclusive(async () => {
      const last = this.store.getLastPublished();
      if (!last) {
        throw new NotFoundError('No published signal to delete.');
      }
      try {
        await this.messenger.deleteMessage(this.config.telegram.channelId, last.messageId);
      } catch (err) {
        log.warn('Channel delete failed', { sequenceId: last.sequenceId, error: errorMessage(err) });
        throw new TransportError(`Couldn't delete signal #${last.sequenceId} from the channel: ${errorMessage(err)}`, err);
      }
      this.store.removeLastPublished();
      log.info('Signal deleted', { sequenceId: last.sequenceId, ticker: last.ticker });
      this.bus.emitDeleted(last);
      return [{ kind: 'text', text: `🗑️ Signal #${last.sequenceId} (${last.ticker} ${last.direction}) deleted from the channel.` }];
    });
  }
}
