import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CursorCell } from '@/lib/delivery/cursorCell';
import { setErrorLogger } from '@/lib/delivery/errorHandler';
import { metrics } from '@/lib/delivery/metrics';
import { PeriodicCursorSync } from '@/lib/delivery/periodicSync';
import type { ClientSyncStateStore } from '@/lib/delivery/syncStateStore';
import type { ClientSyncState } from '@/lib/delivery/types';

const identity = { userId: 'user-1', clientId: 'device-1', conversationId: 'conv-1' };

function recordingStore() {
  const writes: ClientSyncState[] = [];
  const put = vi.fn(async (state: ClientSyncState) => {
    writes.push(state);
  });
  const store: ClientSyncStateStore = { get: vi.fn(async () => null), put };
  return { store, put, writes };
}

describe('PeriodicCursorSync', () => {
  beforeEach(() => {
    metrics.reset();
    setErrorLogger({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('writes the current cursor on every interval', async () => {
    vi.useFakeTimers();
    const { store, writes } = recordingStore();
    const cell = new CursorCell();
    const sync = new PeriodicCursorSync({ store, cell, identity, intervalMs: 5_000, now: () => 42_500 });

    cell.advance('100-0');
    sync.start();
    expect(sync.running).toBe(true);
    await vi.advanceTimersByTimeAsync(4_999);
    expect(writes).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    cell.advance('100-1');
    await vi.advanceTimersByTimeAsync(5_000);
    sync.stop();

    expect(writes).toEqual([
      { client_id: 'device-1', user_id: 'user-1', conversation_id: 'conv-1', last_message_id: '100-0', last_sync_at: 42 },
      { client_id: 'device-1', user_id: 'user-1', conversation_id: 'conv-1', last_message_id: '100-1', last_sync_at: 42 },
    ]);
    expect(metrics.getCounter('delivery.sync.written', { kind: 'periodic' })).toBe(2);

    await vi.advanceTimersByTimeAsync(20_000);
    expect(writes).toHaveLength(2);
    expect(sync.running).toBe(false);
  });

  it('skips a tick while the previous write is still in flight', async () => {
    let finish: () => void = () => undefined;
    const put = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const store: ClientSyncStateStore = { get: vi.fn(async () => null), put };
    const sync = new PeriodicCursorSync({ store, cell: new CursorCell('1-0'), identity });

    const first = sync.tick();
    const second = sync.tick();
    expect(put).toHaveBeenCalledTimes(1);
    expect(metrics.getCounter('delivery.sync.skipped')).toBe(1);

    finish();
    await Promise.all([first, second]);

    const third = sync.tick();
    expect(put).toHaveBeenCalledTimes(2);
    finish();
    await third;
    expect(metrics.getCounter('delivery.sync.written', { kind: 'periodic' })).toBe(2);
  });

  it('keeps going after a failed write', async () => {
    const put = vi
      .fn<(state: ClientSyncState) => Promise<void>>()
      .mockRejectedValueOnce(new Error('redis down'))
      .mockResolvedValue(undefined);
    const store: ClientSyncStateStore = { get: vi.fn(async () => null), put };
    const sync = new PeriodicCursorSync({ store, cell: new CursorCell('1-0'), identity });

    await sync.tick();
    expect(metrics.getCounter('delivery.sync.failed')).toBe(1);
    expect(metrics.getCounter('delivery.errors')).toBe(1);

    await sync.tick();
    expect(put).toHaveBeenCalledTimes(2);
    expect(metrics.getCounter('delivery.sync.written', { kind: 'periodic' })).toBe(1);
  });

  it('final flush lands after an in-flight periodic write', async () => {
    const order: string[] = [];
    let finishPeriodic: () => void = () => undefined;
    const put = vi.fn((state: ClientSyncState) => {
      if (order.length === 0) {
        order.push(`periodic:${state.last_message_id}`);
        return new Promise<void>((resolve) => {
          finishPeriodic = () => {
            order.push('periodic:done');
            resolve();
          };
        });
      }
      order.push(`final:${state.last_message_id}`);
      return Promise.resolve();
    });
    const store: ClientSyncStateStore = { get: vi.fn(async () => null), put };
    const cell = new CursorCell('1-0');
    const sync = new PeriodicCursorSync({ store, cell, identity });

    void sync.tick();
    cell.advance('2-0');
    const flushed = sync.flush();
    finishPeriodic();

    expect(await flushed).toBe(true);
    expect(order).toEqual(['periodic:1-0', 'periodic:done', 'final:2-0']);
  });

  it('reports a failed final flush', async () => {
    const store: ClientSyncStateStore = {
      get: vi.fn(async () => null),
      put: vi.fn(async () => {
        throw new Error('redis down');
      }),
    };
    const sync = new PeriodicCursorSync({ store, cell: new CursorCell('1-0'), identity });
    expect(await sync.flush()).toBe(false);
  });
});
