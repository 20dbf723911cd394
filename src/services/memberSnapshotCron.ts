/**
 * Cron: daily snapshot of the channel's member count.
 * Runs once at start, then every 24 hours. One snapshot per calendar day in the desk's zone.
 */

import type { SignalStore } from '../db/signalStore';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { dayKey } from '../lib/time';
import type { MessagingEndpoint } from '../types/messaging';

const INTERVAL_MS = 24 * 60 * 60 * 1000;

export interface SnapshotDeps {
  store: SignalStore;
  messenger: MessagingEndpoint;
  channelId: string;
  timeZone: string;
  now?: () => Date;
}

let intervalId: ReturnType<typeof setInterval> | null = null;

/** Returns the recorded count, or null when the transport could not provide one */
export async function takeMemberSnapshot(deps: SnapshotDeps): Promise<number | null> {
  const date = dayKey((deps.now ?? (() => new Date()))(), deps.timeZone);
  try {
    const count = await deps.messenger.getMemberCount(deps.channelId);
    deps.store.recordMemberSnapshot(date, count);
    logger.info('MemberSnapshot', `Channel has ${count} members`, { date });
    return count;
  } catch (e) {
    logger.warn('MemberSnapshot', 'Member count failed', { date, error: errorMessage(e) });
    return null;
  }
}

export function startMemberSnapshotCron(deps: SnapshotDeps): void {
  if (intervalId) return;
  logger.info('MemberSnapshot', `Starting member snapshot cron (interval ${INTERVAL_MS / 3600000} h)`);
  void takeMemberSnapshot(deps);
  intervalId = setInterval(() => {
    void takeMemberSnapshot(deps);
  }, INTERVAL_MS);
}

export function stopMemberSnapshotCron(): void {
  if (intervalId) {
    clearInterval(intervalId);
    intervalId = null;
    logger.info('MemberSnapshot', 'Stopped');
  }
}
