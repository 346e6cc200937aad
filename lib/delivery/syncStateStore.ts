/**
 * Persisted per-device read cursors.
 *
 * Records live under `sync_state:{user}:{conversation}:{client}` and expire
 * after 30 days untouched; an expired record reads as "never seen".
 */

import { z } from 'zod';
import { createDeliveryError } from './errorHandler';
import { incrementCounter } from './metrics';
import type { DeliveryRedisClient } from './redisClient';
import { isAfter, parseStreamEntryId } from './streamEntryId';
import type { ClientId, ClientSyncState, ConversationId, DeliveryLogger, UserId } from './types';

export const DEFAULT_CURSOR_TTL_SECONDS = 30 * 24 * 60 * 60;

export interface ClientSyncStateStore {
  get(userId: UserId, clientId: ClientId, conversationId: ConversationId): Promise<ClientSyncState | null>;
  /** Upsert and refresh the TTL. A stored cursor that is further ahead wins. */
  put(state: ClientSyncState): Promise<void>;
}

export function syncStateKey(userId: UserId, conversationId: ConversationId, clientId: ClientId): string {
  return `sync_state:${userId}:${conversationId}:${clientId}`;
}

const SyncStateRecordSchema = z.object({
  client_id: z.string(),
  user_id: z.string(),
  conversation_id: z.string(),
  last_message_id: z
    .string()
    .trim()
    .refine((id) => parseStreamEntryId(id) !== null, 'not a stream entry id'),
  last_sync_at: z.number(),
});

function decodeState(raw: string): ClientSyncState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = SyncStateRecordSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export type RedisSyncStateStoreOptions = {
  ttlSeconds?: number;
  logger?: DeliveryLogger;
};

export function createRedisSyncStateStore(
  client: DeliveryRedisClient,
  { ttlSeconds = DEFAULT_CURSOR_TTL_SECONDS, logger = console }: RedisSyncStateStoreOptions = {}
): ClientSyncStateStore {
  async function get(
    userId: UserId,
    clientId: ClientId,
    conversationId: ConversationId
  ): Promise<ClientSyncState | null> {
    let raw: string | null;
    try {
      raw = await client.get(syncStateKey(userId, conversationId, clientId));
    } catch (error) {
      throw createDeliveryError('Failed to read client sync state', 'SYNC_STATE_READ_FAILED', {
        cause: error,
        context: { component: 'SyncStateStore', action: 'get', userId, clientId, conversationId },
      });
    }
    if (raw === null) return null;

    const state = decodeState(raw);
    if (!state) {
      logger.warn(`[SyncStateStore] discarding unreadable record for ${userId}/${clientId}`);
      incrementCounter('delivery.sync.corrupt_records');
    }
    return state;
  }

  async function put(state: ClientSyncState): Promise<void> {
    const key = syncStateKey(state.user_id, state.conversation_id, state.client_id);
    try {
      let next = state;
      const currentRaw = await client.get(key);
      const current = currentRaw === null ? null : decodeState(currentRaw);
      if (current && isAfter(current.last_message_id, state.last_message_id)) {
        next = { ...state, last_message_id: current.last_message_id };
        incrementCounter('delivery.sync.stale_writes');
      }
      await client.setWithTtl(key, JSON.stringify(next), ttlSeconds);
    } catch (error) {
      throw createDeliveryError('Failed to write client sync state', 'SYNC_STATE_WRITE_FAILED', {
        cause: error,
        context: {
          component: 'SyncStateStore',
          action: 'put',
          userId: state.user_id,
          clientId: state.client_id,
          conversationId: state.conversation_id,
        },
      });
    }
  }

  return { get, put };
}
