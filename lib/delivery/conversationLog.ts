/**
 * Durable Conversation Log on Redis Streams
 *
 * One stream per conversation (`stream:conversation:{id}`) is the source of
 * truth for catch-up. Every append also drops a small notification on the
 * shared fan-out stream so other instances learn that the conversation moved.
 */

import { createDeliveryError } from './errorHandler';
import { incrementCounter, recordTimer } from './metrics';
import { fieldsToRecord, type DeliveryRedisClient, type StreamEntryTuple } from './redisClient';
import { STREAM_BEGINNING, isAfter, retentionCutoffId, type StreamEntryId } from './streamEntryId';
import type { BroadcastEvent, ConversationId, DeliveryLogger } from './types';

export const DEFAULT_FANOUT_STREAM = 'stream:fanout:all-conversations';
export const DEFAULT_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

export function conversationStreamKey(conversationId: ConversationId): string {
  return `stream:conversation:${conversationId}`;
}

export interface ConversationLog {
  /** Resolves with the new entry id; rejects when the entry was not written. */
  append(conversationId: ConversationId, payload: string, producedAt?: number): Promise<StreamEntryId>;
  /** Entries with id strictly greater than `afterId`, ascending. */
  readSince(conversationId: ConversationId, afterId: StreamEntryId): Promise<BroadcastEvent[]>;
  /** Entries with id greater than or equal to `startId`, ascending. */
  readFrom(conversationId: ConversationId, startId: StreamEntryId): Promise<BroadcastEvent[]>;
  /** Newest entry id, or the sentinel for an empty conversation. */
  latestId(conversationId: ConversationId): Promise<StreamEntryId>;
  /** Drop entries older than the retention window. */
  trimExpired(conversationId: ConversationId): Promise<number>;
  /** Whether retention already removed entries newer than `afterId`. */
  trimmedPast(conversationId: ConversationId, afterId: StreamEntryId): Promise<boolean>;
}

export type RedisConversationLogOptions = {
  /** Instance id written into fan-out notifications. */
  origin?: string;
  /** Set to null to skip fan-out notifications (single instance). */
  fanoutStream?: string | null;
  readBatchSize?: number;
  retentionMs?: number;
  /** Trim the conversation stream on every n-th append. */
  trimEvery?: number;
  now?: () => number;
  logger?: DeliveryLogger;
};

export function createRedisConversationLog(
  client: DeliveryRedisClient,
  {
    origin = 'unknown',
    fanoutStream = DEFAULT_FANOUT_STREAM,
    readBatchSize = 100,
    retentionMs = DEFAULT_RETENTION_MS,
    trimEvery = 100,
    now = Date.now,
    logger = console,
  }: RedisConversationLogOptions = {}
): ConversationLog {
  let appendCount = 0;

  function toEvent(conversationId: ConversationId, [id, fields]: StreamEntryTuple): BroadcastEvent | null {
    const record = fieldsToRecord(fields);
    if (record.payload === undefined) {
      logger.warn(`[ConversationLog] entry ${id} in ${conversationId} has no payload; skipping`);
      incrementCounter('delivery.log.malformed_entries');
      return null;
    }
    const producedAt = Number(record.produced_at);
    return {
      conversation_id: conversationId,
      stream_entry_id: id,
      payload: record.payload,
      produced_at: Number.isFinite(producedAt) ? producedAt : 0,
    };
  }

  async function readRange(conversationId: ConversationId, firstStart: string): Promise<BroadcastEvent[]> {
    const key = conversationStreamKey(conversationId);
    const events: BroadcastEvent[] = [];
    const startTime = now();
    let start = firstStart;

    try {
      for (;;) {
        const page = await client.xrange(key, start, '+', readBatchSize);
        for (const entry of page) {
          const event = toEvent(conversationId, entry);
          if (event) events.push(event);
        }

        const last = page[page.length - 1];
        if (!last || page.length < readBatchSize) {
          break;
        }
        start = `(${last[0]}`;
      }
    } catch (error) {
      incrementCounter('delivery.log.read_failed');
      throw createDeliveryError(`Failed to read conversation ${conversationId}`, 'LOG_READ_FAILED', {
        cause: error,
        context: { component: 'ConversationLog', action: 'read', conversationId },
      });
    }

    recordTimer('delivery.log.read.latency', now() - startTime);
    return events;
  }

  async function notifyFanout(conversationId: ConversationId, entryId: StreamEntryId): Promise<void> {
    if (!fanoutStream) return;
    try {
      await client.xadd(fanoutStream, {
        conversation_id: conversationId,
        entry_id: entryId,
        origin,
      });
    } catch (error) {
      // The entry is durable; remote instances pick it up on their clients' next catch-up
      incrementCounter('delivery.log.fanout_failed');
      logger.warn(`[ConversationLog] fan-out notification failed for ${conversationId}/${entryId}:`, error);
    }
  }

  async function trimExpired(conversationId: ConversationId): Promise<number> {
    const removed = await client.xtrimMinId(
      conversationStreamKey(conversationId),
      retentionCutoffId(now(), retentionMs)
    );
    if (removed > 0) {
      incrementCounter('delivery.log.trimmed', undefined, removed);
    }
    return removed;
  }

  async function append(
    conversationId: ConversationId,
    payload: string,
    producedAt: number = now()
  ): Promise<StreamEntryId> {
    const startTime = now();
    let entryId: string | null;
    try {
      entryId = await client.xadd(conversationStreamKey(conversationId), {
        conversation_id: conversationId,
        payload,
        produced_at: String(producedAt),
      });
    } catch (error) {
      incrementCounter('delivery.log.append_failed');
      throw createDeliveryError(`Failed to append to conversation ${conversationId}`, 'LOG_APPEND_FAILED', {
        cause: error,
        context: { component: 'ConversationLog', action: 'append', conversationId },
      });
    }

    if (!entryId) {
      incrementCounter('delivery.log.append_failed');
      throw createDeliveryError(`Append to conversation ${conversationId} returned no id`, 'LOG_APPEND_FAILED', {
        context: { component: 'ConversationLog', action: 'append', conversationId },
      });
    }

    recordTimer('delivery.log.append.latency', now() - startTime);
    incrementCounter('delivery.log.appended');

    await notifyFanout(conversationId, entryId);

    appendCount += 1;
    if (trimEvery > 0 && appendCount % trimEvery === 0) {
      void trimExpired(conversationId).catch((error: unknown) => {
        logger.warn(`[ConversationLog] failed to trim ${conversationId}:`, error);
      });
    }

    return entryId;
  }

  return {
    append,
    readSince(conversationId, afterId) {
      return readRange(conversationId, afterId === STREAM_BEGINNING ? '-' : `(${afterId}`);
    },
    readFrom(conversationId, startId) {
      return readRange(conversationId, startId === STREAM_BEGINNING ? '-' : startId);
    },
    async latestId(conversationId) {
      try {
        const [newest] = await client.xrevrange(conversationStreamKey(conversationId), '+', '-', 1);
        return newest ? newest[0] : STREAM_BEGINNING;
      } catch (error) {
        throw createDeliveryError(`Failed to read latest entry of ${conversationId}`, 'LOG_READ_FAILED', {
          cause: error,
          context: { component: 'ConversationLog', action: 'latest', conversationId },
        });
      }
    },
    trimExpired,
    async trimmedPast(conversationId, afterId) {
      const key = conversationStreamKey(conversationId);
      try {
        const maxDeleted = await client.xinfoMaxDeletedId(key);
        if (maxDeleted !== null) return isAfter(maxDeleted, afterId);

        // Trimming removes a prefix, so an oldest entry past afterId means a gap may exist
        const [oldest] = await client.xrange(key, '-', '+', 1);
        return oldest !== undefined && isAfter(oldest[0], afterId);
      } catch (error) {
        throw createDeliveryError(`Failed to inspect retention of ${conversationId}`, 'LOG_READ_FAILED', {
          cause: error,
          context: { component: 'ConversationLog', action: 'trimmed_past', conversationId },
        });
      }
    },
  };
}
