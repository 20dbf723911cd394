/**
 * Inbound message dispatcher: authorisation, conversation routing and the
 * command handlers. Every outcome, errors included, comes back as replies.
 */

import type { DeskConfig } from '../config';
import type { SignalStore } from '../db/signalStore';
import { AuthorizationError, NotFoundError, ValidationError, errorMessage, isDeskError } from '../lib/errors';
import type { DeskEventBus } from '../lib/eventBus';
import { escapeHtml } from '../lib/html';
import { createLogger } from '../lib/logger';
import { Mutex } from '../lib/mutex';
import type { InboundMessage, MessagingEndpoint, Reply } from '../types/messaging';
import {
  aggregate,
  aggregateClicks,
  describeYears,
  formatChannelReport,
  formatClickReport,
  formatSignalReport
} from './analyticsService';
import { type Command, type CreativeTarget, USAGE, isReadOnly, parseCommand, parseSignalArgs } from './commandParser';
import { type Session, SessionRegistry, matchConfirmation, promptFor } from './conversation';
import { SignalWorkflow } from './signalWorkflow';
import { DEFAULT_TEMPLATE, placeholderHelp, validateTemplate } from './templateService';

const log = createLogger('Desk');

export const HELP_TEXT = [
  '🤖 Signal desk',
  '',
  'signal TICKER ENTRY STOPLOSS [LEVERAGEx] [URL]: draft a signal',
  'delete: remove the last published signal',
  'fixN, use fixN, list, clearfix N|all: saved creatives',
  'links, addlink TICKER URL ..., clearlink TICKER|all: trade links',
  'tracker on|off|status: click tracking on the trade button',
  'totalsignal[YYYY[YYYY]], total<name>[YYYY[YYYY]]: signal counts',
  'views[YYYY[YYYY]]: button clicks',
  'channelstats: channel members',
  'format, format reset: caption template',
  'cancel: drop the current step'
].join('\n');

const UNAUTHORIZED_READ = "You're not authorized to use this bot.";

export interface DeskDeps {
  store: SignalStore;
  messenger: MessagingEndpoint;
  bus: DeskEventBus;
  config: DeskConfig;
  sessions?: SessionRegistry;
  mutex?: Mutex;
  now?: () => Date;
}

function text(body: string, html = false): Reply {
  return html ? { kind: 'text', text: body, html: true } : { kind: 'text', text: body };
}

export function formatError(err: unknown): string {
  if (isDeskError(err)) {
    return err.usage ? `❌ ${err.message}\nUsage: ${err.usage}` : `❌ ${err.message}`;
  }
  return '❌ Something went wrong. Try again.';
}

function hasDraft(session: Session | undefined): boolean {
  return session?.state === 'awaitingCreative' || session?.state === 'awaitingConfirmation';
}

export class SignalDesk {
  readonly sessions: SessionRegistry;
  readonly workflow: SignalWorkflow;
  private readonly store: SignalStore;
  private readonly messenger: MessagingEndpoint;
  private readonly config: DeskConfig;

  constructor(deps: DeskDeps) {
    this.store = deps.store;
    this.messenger = deps.messenger;
    this.config = deps.config;
    this.sessions = deps.sessions ?? new SessionRegistry();
    this.workflow = new SignalWorkflow({
      store: deps.store,
      messenger: deps.messenger,
      bus: deps.bus,
      sessions: this.sessions,
      config: deps.config,
      mutex: deps.mutex ?? new Mutex(),
      now: deps.now
    });
  }

  isAdmin(userId: number): boolean {
    const { adminIds } = this.config.access;
    return adminIds.length === 0 || adminIds.includes(userId);
  }

  async handle(message: InboundMessage): Promise<Reply[]> {
    try {
      if (message.imageId) return this.handleImage(message.userId, message.imageId);
      return await this.handleText(message.userId, message.text?.trim() ?? '');
    } catch (err) {
      if (!isDeskError(err)) {
        log.error('Unhandled error while handling a message', { userId: message.userId, error: errorMessage(err) });
      }
      return [text(formatError(err))];
    }
  }

  private handleImage(userId: number, imageId: string): Reply[] {
    if (!this.isAdmin(userId)) throw new AuthorizationError();
    const session = this.sessions.get(userId);
    if (session?.state === 'awaitingCreativeUpload') {
      this.store.setCreative(session.key, imageId);
      this.sessions.clear(userId);
      log.info('Creative saved', { userId, key: session.key });
      return [text(`✅ Creative saved as ${session.key}. Send use ${session.key} while a draft waits for its image.`)];
    }
    if (hasDraft(session)) {
      return this.workflow.attachCreative(userId, imageId);
    }
    return [text('🖼️ No draft is waiting for an image. Start with signal, or save a creative with fixN first.')];
  }

  private async handleText(userId: number, body: string): Promise<Reply[]> {
    if (!body) return [];
    const authorized = this.isAdmin(userId);
    const session = authorized ? this.sessions.get(userId) : undefined;

    if (session) {
      const routed = await this.routeInSession(userId, session, body);
      if (routed) return routed;
    }

    const command = parseCommand(body);
    if (!command) {
      if (session) return [text(`🤔 ${promptFor(session, this.workflow.policy)}`)];
      if (!authorized && !this.config.access.publicReadCommands) throw new AuthorizationError(UNAUTHORIZED_READ);
      return [text('🤔 Unknown command. Send help for the list.')];
    }

    if (!authorized && !(this.config.access.publicReadCommands && isReadOnly(command))) {
      log.warn('Rejected command from unlisted user', { userId, command: command.type });
      throw new AuthorizationError();
    }
    return this.dispatch(userId, session, command);
  }

  /** Input a session consumes before ordinary command dispatch; null falls through */
  private async routeInSession(userId: number, session: Session, body: string): Promise<Reply[] | null> {
    if (/^\/?cancel(@\w+)?$/i.test(body)) return null;

    switch (session.state) {
      case 'awaitingConfirmation': {
        const sender = matchConfirmation(body, this.workflow.policy);
        return sender === null ? null : this.workflow.confirm(userId, sender);
      }
      case 'collectingParameters': {
        if (parseCommand(body)) return null;
        return this.workflow.startDraft(userId, parseSignalArgs(body.split(/\s+/)));
      }
      case 'awaitingTemplate': {
        if (body.startsWith('/') || /^format\b/i.test(body)) return null;
        if (/^\/?reset$/i.test(body)) {
          this.sessions.clear(userId);
          return this.resetTemplate();
        }
        const template = validateTemplate(body);
        this.sessions.clear(userId);
        return this.saveTemplate(template);
      }
      case 'awaitingCreative':
      case 'awaitingCreativeUpload':
        return null;
    }
  }

  private async dispatch(userId: number, session: Session | undefined, command: Command): Promise<Reply[]> {
    switch (command.type) {
      case 'help':
        return [text(HELP_TEXT)];
      case 'cancel':
        return [text(this.sessions.clear(userId) ? '❌ Operation cancelled.' : 'Nothing to cancel.')];
      case 'signal':
        return this.workflow.startDraft(userId, command.request);
      case 'signalPrompt':
        return this.workflow.beginCollecting(userId);
      case 'deleteLast':
        return this.workflow.deleteLast();
      case 'saveCreative':
        this.refuseOverDraft(session);
        this.sessions.set(userId, { state: 'awaitingCreativeUpload', key: command.key });
        return [text(`🖼️ Send the image to save as ${command.key}.`)];
      case 'useCreative':
        return this.workflow.useSavedCreative(userId, command.key);
      case 'listCreatives':
        return [text(this.listCreatives())];
      case 'clearCreative':
        return [text(this.clearCreative(command.target))];
      case 'listLinks':
        return [text(this.listLinks())];
      case 'addLinks':
        this.store.setLinks(command.entries);
        return [text(`🔗 Saved ${command.entries.length} link${command.entries.length > 1 ? 's' : ''}: ${command.entries.map(([t]) => t).join(', ')}.`)];
      case 'clearLink':
        return [text(this.clearLink(command.ticker))];
      case 'tracker':
        return [text(this.tracker(command.action))];
      case 'periodStats': {
        const agg = aggregate(this.store.allSignals(), { years: command.years }, this.config.timeZone);
        return [text(formatSignalReport(`Signals, ${describeYears(command.years)}`, agg), true)];
      }
      case 'memberStats': {
        const agg = aggregate(
          this.store.allSignals(),
          { years: command.years, sender: command.member },
          this.config.timeZone
        );
        return [text(formatSignalReport(`Signals by ${command.member}, ${describeYears(command.years)}`, agg), true)];
      }
      case 'viewStats': {
        const agg = aggregateClicks(
          this.store.allSignals(),
          (id) => this.store.clicksFor(id),
          { years: command.years },
          this.config.timeZone
        );
        return [text(formatClickReport(`Button clicks, ${describeYears(command.years)}`, agg), true)];
      }
      case 'channelStats':
        return [text(formatChannelReport(await this.liveMemberCount(), this.store.listMemberSnapshots()), true)];
      case 'editTemplate':
        this.refuseOverDraft(session);
        this.sessions.set(userId, { state: 'awaitingTemplate' });
        return [text(this.templateEditor(), true)];
      case 'setTemplate': {
        const template = validateTemplate(command.template);
        if (session?.state === 'awaitingTemplate') this.sessions.clear(userId);
        return this.saveTemplate(template);
      }
      case 'resetTemplate':
        if (session?.state === 'awaitingTemplate') this.sessions.clear(userId);
        return this.resetTemplate();
      case 'confirm':
        if (session?.state === 'awaitingConfirmation') {
          return [text(`🤔 ${promptFor(session, this.workflow.policy)}`)];
        }
        throw new ValidationError('Nothing to confirm. Start with signal.', USAGE.signal);
    }
  }

  private refuseOverDraft(session: Session | undefined): void {
    if (hasDraft(session)) {
      throw new ValidationError('A signal draft is in progress. Finish it or send cancel first.');
    }
  }

  private listCreatives(): string {
    const creatives = this.store.listCreatives();
    if (creatives.length === 0) return '🖼️ No saved creatives. Save one with fixN.';
    return `🖼️ Saved creatives: ${creatives.map(([key]) => key).join(', ')}`;
  }

  private clearCreative(target: CreativeTarget): string {
    if (target.all) {
      const count = this.store.clearCreatives();
      return count === 0 ? 'No saved creatives to clear.' : `🗑️ Cleared ${count} creative${count > 1 ? 's' : ''}.`;
    }
    if (!this.store.deleteCreative(target.key)) {
      throw new NotFoundError(`No creative saved as ${target.key}.`, USAGE.clearfix);
    }
    return `🗑️ Cleared ${target.key}.`;
  }

  private listLinks(): string {
    const links = this.store.listLinks();
    const lines = links.length === 0 ? ['🔗 No saved links.'] : ['🔗 Saved links:', ...links.map(([t, url]) => `${t}: ${url}`)];
    const defaults = this.store.defaultLinkCount;
    if (defaults > 0) lines.push(`Plus ${defaults} built-in links.`);
    return lines.join('\n');
  }

  private clearLink(ticker: string | null): string {
    if (ticker === null) {
      const count = this.store.clearLinks();
      return count === 0 ? 'No saved links to clear.' : `🗑️ Cleared ${count} link${count > 1 ? 's' : ''}.`;
    }
    if (!this.store.deleteLink(ticker)) {
      throw new NotFoundError(`No link saved for ${ticker}.`, USAGE.clearlink);
    }
    return `🗑️ Cleared the link for ${ticker}.`;
  }

  private tracker(action: 'on' | 'off' | 'status'): string {
    if (action === 'status') {
      return `📍 Click tracking is ${this.store.isTrackingEnabled() ? 'on' : 'off'}.`;
    }
    const enabled = action === 'on';
    this.store.setTrackingEnabled(enabled);
    if (!enabled) return '📍 Click tracking off. Buttons link straight to the trade page.';
    const lines = [`📍 Click tracking on. Buttons will point at ${this.config.tracker.baseUrl}/track/<id>.`];
    if (!this.config.tracker.enabled) lines.push('⚠️ The tracker server is not enabled in this process (TRACKER_ENABLED).');
    return lines.join('\n');
  }

  private async liveMemberCount(): Promise<number | null> {
    try {
      return await this.messenger.getMemberCount(this.config.telegram.channelId);
    } catch (err) {
      log.warn('Member count unavailable', { error: errorMessage(err) });
      return null;
    }
  }

  private templateEditor(): string {
    const current = this.store.getTemplate() ?? DEFAULT_TEMPLATE;
    return [
      '✏️ <b>Current format</b>',
      `<pre>${escapeHtml(current)}</pre>`,
      '',
      'Send the new template, <code>reset</code> for the built-in one, or <code>cancel</code>.',
      '',
      '<b>Placeholders</b>',
      placeholderHelp()
    ].join('\n');
  }

  private saveTemplate(template: string): Reply[] {
    this.store.setTemplate(template);
    log.info('Template updated', { length: template.length });
    return [text('✅ New format saved!')];
  }

  private resetTemplate(): Reply[] {
    this.store.setTemplate(null);
    return [text('✅ Format reset to default!')];
  }
}
