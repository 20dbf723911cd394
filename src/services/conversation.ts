/**
 * Per-operator conversation state. Idle is the absence of a session, so a
 * confirmation with no draft cannot be represented.
 */

import { ValidationError } from '../lib/errors';
import type { ComputedSignal } from '../types/signal';

/** A computed signal waiting for its creative and confirmation */
export interface SignalDraft {
  signal: ComputedSignal;
  /** Resolved trade link (operator link, default table, or constructed) */
  tradeUrl: string;
}

export type Session =
  | { state: 'collectingParameters' }
  | { state: 'awaitingCreative'; draft: SignalDraft }
  | { state: 'awaitingConfirmation'; draft: SignalDraft; creative: string }
  | { state: 'awaitingCreativeUpload'; key: string }
  | { state: 'awaitingTemplate' };

export class SessionRegistry {
  private readonly sessions = new Map<number, Session>();

  get(userId: number): Session | undefined {
    return this.sessions.get(userId);
  }

  set(userId: number, session: Session): void {
    this.sessions.set(userId, session);
  }

  /** Returns true when a session was discarded */
  clear(userId: number): boolean {
    return this.sessions.delete(userId);
  }

  get size(): number {
    return this.sessions.size;
  }
}

export interface ConfirmationPolicy {
  /** Lower-case roster; empty means a plain phrase confirms */
  senders: string[];
  phrase: string;
  defaultSender: string;
}

const ROSTER_TOKEN = /^confirm(?:[\s_-]+([a-z][a-z0-9_]*))?$/;

function normalize(text: string): string {
  return text.trim().replace(/^\//, '').replace(/\s+/g, ' ').toLowerCase();
}

export function confirmationHint(policy: ConfirmationPolicy): string {
  if (policy.senders.length === 0) return policy.phrase;
  return `confirm <${policy.senders.join('|')}>`;
}

/**
 * Sender named by a confirmation token, or null when the text is not one.
 * Throws ValidationError for a roster token naming nobody or a stranger.
 */
export function matchConfirmation(text: string, policy: ConfirmationPolicy): string | null {
  const normalized = normalize(text);
  if (policy.senders.length === 0) {
    return normalized === policy.phrase ? policy.defaultSender : null;
  }
  const m = ROSTER_TOKEN.exec(normalized);
  if (!m) return null;
  const name = m[1];
  if (!name) {
    throw new ValidationError('Say who is confirming.', confirmationHint(policy));
  }
  if (!policy.senders.includes(name)) {
    throw new ValidationError(`"${name}" is not on the sender roster.`, confirmationHint(policy));
  }
  return name;
}

/** What the operator should send next in a given state */
export function promptFor(session: Session, policy: ConfirmationPolicy): string {
  switch (session.state) {
    case 'collectingParameters':
      return 'Send the signal values: TICKER ENTRY STOPLOSS [LEVERAGEx] [URL], or cancel.';
    case 'awaitingCreative':
      return `Send the creative image for ${session.draft.signal.ticker}, or use fixN for a saved one. Send cancel to drop the draft.`;
    case 'awaitingConfirmation':
      return `Send ${confirmationHint(policy)} to publish, a new image to replace the creative, or cancel.`;
    case 'awaitingCreativeUpload':
      return `Send the image to save as ${session.key}, or cancel.`;
    case 'awaitingTemplate':
      return 'Send the new template text, reset for the built-in one, or cancel.';
  }
}
