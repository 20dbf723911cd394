import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { startMemberSnapshotCron, stopMemberSnapshotCron, takeMemberSnapshot } from './memberSnapshotCron';
import { SignalStore } from '../db/signalStore';
import { MemoryPersistence } from '../db/jsonFilePersistence';
import type { MessagingEndpoint } from '../types/messaging';

function messengerWithCounts(...counts: number[]) {
  const getMemberCount = vi.fn(async (_dest: string) => 0);
  for (const c of counts) getMemberCount.mockResolvedValueOnce(c);
  return {
    sendImageMessage: vi.fn(async () => 1),
    deleteMessage: vi.fn(async () => undefined),
    getMemberCount
  } satisfies MessagingEndpoint;
}

describe('memberSnapshotCron', () => {
  let store: SignalStore;

  beforeEach(() => {
    store = new SignalStore(new MemoryPersistence(), { timeZone: 'UTC' });
    store.load();
  });

  afterEach(() => {
    stopMemberSnapshotCron();
    vi.useRealTimers();
  });

  it('records one snapshot per day, last one wins', async () => {
    const messenger = messengerWithCounts(100, 104);
    const deps = {
      store,
      messenger,
      channelId: '@test-channel',
      timeZone: 'UTC',
      now: () => new Date('2025-03-10T08:00:00.000Z')
    };

    await takeMemberSnapshot(deps);
    await takeMemberSnapshot(deps);

    expect(messenger.getMemberCount).toHaveBeenCalledWith('@test-channel');
    expect(store.listMemberSnapshots()).toEqual([{ date: '2025-03-10', count: 104 }]);
  });

  it('keeps going when the count fails', async () => {
    const messenger = messengerWithCounts();
    messenger.getMemberCount.mockRejectedValueOnce(new Error('Forbidden'));

    await expect(
      takeMemberSnapshot({ store, messenger, channelId: '@test-channel', timeZone: 'UTC' })
    ).resolves.toBeNull();
    expect(store.listMemberSnapshots()).toEqual([]);
  });

  it('runs at start and then daily', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-03-10T12:00:00.000Z'));
    const messenger = messengerWithCounts(100, 110);

    startMemberSnapshotCron({ store, messenger, channelId: '@test-channel', timeZone: 'UTC' });
    await vi.advanceTimersByTimeAsync(0);
    expect(store.listMemberSnapshots()).toEqual([{ date: '2025-03-10', count: 100 }]);

    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    expect(store.listMemberSnapshots()).toEqual([
      { date: '2025-03-10', count: 100 },
      { date: '2025-03-11', count: 110 }
    ]);
  });
});
