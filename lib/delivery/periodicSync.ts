/**
 * Periodic cursor persistence for one connection.
 *
 * Every interval the current cursor is written to the sync state store. A
 * failed write is logged and retried on the next tick; it never closes the
 * connection.
 */

import type { CursorCell } from './cursorCell';
import { handleDeliveryError } from './errorHandler';
import { incrementCounter, recordTimer } from './metrics';
import type { ClientSyncStateStore } from './syncStateStore';
import type { ClientId, ConversationId, UserId } from './types';

export const DEFAULT_SYNC_INTERVAL_MS = 5000;

export type SyncIdentity = {
  userId: UserId;
  clientId: ClientId;
  conversationId: ConversationId;
};

export type PeriodicCursorSyncOptions = {
  store: ClientSyncStateStore;
  cell: CursorCell;
  identity: SyncIdentity;
  intervalMs?: number;
  now?: () => number;
};

export class PeriodicCursorSync {
  private readonly store: ClientSyncStateStore;
  private readonly cell: CursorCell;
  private readonly identity: SyncIdentity;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor({ store, cell, identity, intervalMs = DEFAULT_SYNC_INTERVAL_MS, now = Date.now }: PeriodicCursorSyncOptions) {
    this.store = store;
    this.cell = cell;
    this.identity = identity;
    this.intervalMs = intervalMs;
    this.now = now;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One scheduled write. Skipped while the previous one is still in flight. */
  tick(): Promise<void> {
    if (this.inFlight) {
      incrementCounter('delivery.sync.skipped');
      return this.inFlight;
    }

    this.inFlight = this.persist('periodic')
      .then(() => undefined)
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }

  /**
   * Final write at teardown. Waits for a scheduled write that is still in
   * flight so it cannot land after this one. Resolves false on failure.
   */
  async flush(): Promise<boolean> {
    if (this.inFlight) {
      await this.inFlight;
    }
    return this.persist('final');
  }

  private async persist(kind: 'periodic' | 'final'): Promise<boolean> {
    const startTime = this.now();
    const cursor = this.cell.read();
    try {
      await this.store.put({
        client_id: this.identity.clientId,
        user_id: this.identity.userId,
        conversation_id: this.identity.conversationId,
        last_message_id: cursor,
        last_sync_at: Math.floor(this.now() / 1000),
      });
      incrementCounter('delivery.sync.written', { kind });
      recordTimer('delivery.sync.latency', this.now() - startTime);
      return true;
    } catch (error) {
      incrementCounter('delivery.sync.failed');
      handleDeliveryError(error, {
        component: 'PeriodicCursorSync',
        action: kind,
        userId: this.identity.userId,
        clientId: this.identity.clientId,
        conversationId: this.identity.conversationId,
        cursor,
      });
      return false;
    }
  }
}
