/**
 * Cross-instance fan-out over Redis Streams
 *
 * Every append leaves a notification on the shared fan-out stream. Each
 * instance tails that stream and, for conversations it has live subscribers
 * for, reads the conversation log from its last high-water mark and feeds the
 * events into the local registry in log order. Reading the log instead of
 * trusting the notification order means two appends racing on different
 * instances cannot leave a hole. Sessions drop whatever they already have.
 */

import type { BroadcastRegistry } from './broadcastRegistry';
import { DEFAULT_FANOUT_STREAM, type ConversationLog } from './conversationLog';
import { incrementCounter } from './metrics';
import { fieldsToRecord, type DeliveryRedisClient, type StreamEntryTuple } from './redisClient';
import { entryTimestamp, isAfter, type StreamEntryId } from './streamEntryId';
import type { ConversationId, DeliveryLogger } from './types';

export type StreamFanoutListenerOptions = {
  stream?: string;
  batchSize?: number;
  blockMs?: number;
  errorBackoffMs?: number;
  /**
   * How far before the first notified entry of a conversation to start
   * reading, to cover notifications that arrive out of order.
   */
  lookbackMs?: number;
  logger?: DeliveryLogger;
};

export interface StreamFanoutListener {
  readonly running: boolean;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** Where the next log read for a conversation starts; inclusive until something was read. */
type HighWaterMark = { id: StreamEntryId; inclusive: boolean };

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createStreamFanoutListener(
  client: DeliveryRedisClient,
  log: ConversationLog,
  registry: BroadcastRegistry,
  {
    stream = DEFAULT_FANOUT_STREAM,
    batchSize = 100,
    blockMs = 5000,
    errorBackoffMs = 500,
    lookbackMs = 5000,
    logger = console,
  }: StreamFanoutListenerOptions = {}
): StreamFanoutListener {
  let running = false;
  let loopPromise: Promise<void> | null = null;
  const highWater = new Map<ConversationId, HighWaterMark>();

  function pruneIdleConversations(): void {
    for (const conversationId of Array.from(highWater.keys())) {
      if (!registry.hasSubscribers(conversationId)) {
        highWater.delete(conversationId);
      }
    }
  }

  async function deliver(conversationId: ConversationId, entryId: StreamEntryId): Promise<void> {
    if (!registry.hasSubscribers(conversationId)) {
      highWater.delete(conversationId);
      return;
    }

    let mark = highWater.get(conversationId);
    if (!mark) {
      // Held even if the read below fails, so the retry starts from here
      mark = { id: `${Math.max(0, entryTimestamp(entryId) - lookbackMs)}-0`, inclusive: true };
      highWater.set(conversationId, mark);
    } else if (!mark.inclusive && !isAfter(entryId, mark.id)) {
      // Already read past this entry while handling an earlier notification
      return;
    }

    try {
      const events = mark.inclusive
        ? await log.readFrom(conversationId, mark.id)
        : await log.readSince(conversationId, mark.id);
      for (const event of events) {
        registry.publish(conversationId, event);
      }
      const last = events[events.length - 1];
      if (last) {
        highWater.set(conversationId, { id: last.stream_entry_id, inclusive: false });
      }
      incrementCounter('delivery.fanout.delivered', undefined, events.length);
    } catch (error) {
      incrementCounter('delivery.fanout.read_failed');
      logger.warn(`[FanoutListener] failed to read ${conversationId} after notification ${entryId}:`, error);
    }
  }

  async function resolveStartId(): Promise<StreamEntryId> {
    const [newest] = await client.xrevrange(stream, '+', '-', 1);
    return newest ? newest[0] : '0';
  }

  async function loop(startId: StreamEntryId): Promise<void> {
    let lastId = startId;
    while (running) {
      let entries: StreamEntryTuple[] | null;
      try {
        entries = await client.xread(stream, lastId, batchSize, blockMs);
      } catch (error) {
        logger.error('[FanoutListener] read error:', error);
        incrementCounter('delivery.fanout.errors');
        await sleep(errorBackoffMs);
        continue;
      }

      if (!entries) continue;

      for (const [id, fields] of entries) {
        lastId = id;
        const notification = fieldsToRecord(fields);
        const conversationId = notification.conversation_id;
        const entryId = notification.entry_id;
        if (!conversationId || !entryId) {
          incrementCounter('delivery.fanout.malformed');
          continue;
        }
        await deliver(conversationId, entryId);
      }
      pruneIdleConversations();
    }
  }

  return {
    get running() {
      return running;
    },
    async start() {
      if (running) return;
      const startId = await resolveStartId();
      running = true;
      loopPromise = loop(startId).catch((error: unknown) => {
        logger.error('[FanoutListener] loop stopped:', error);
        running = false;
      });
      logger.log(`[FanoutListener] tailing ${stream} from ${startId}`);
    },
    async stop() {
      running = false;
      if (loopPromise) {
        await loopPromise;
        loopPromise = null;
      }
    },
  };
}
