/**
 * Publish boundary for producers.
 *
 * The log append is what makes a message delivered. Live fan-out follows it:
 * directly into the local registry when this instance runs alone, or through
 * the fan-out listener (which every instance runs, this one included) when
 * delivery spans several instances.
 */

import type { BroadcastRegistry } from './broadcastRegistry';
import type { ConversationLog } from './conversationLog';
import { incrementCounter } from './metrics';
import type { BroadcastEvent, ConversationId } from './types';

export interface ConversationPublisher {
  /** Rejects when the append failed; the message is then not delivered. */
  publish(conversationId: ConversationId, payload: string): Promise<BroadcastEvent>;
}

export type ConversationPublisherOptions = {
  log: ConversationLog;
  registry: BroadcastRegistry;
  /** False when a fan-out listener feeds the registry. */
  deliverLocally: boolean;
  now?: () => number;
};

export function createConversationPublisher({
  log,
  registry,
  deliverLocally,
  now = Date.now,
}: ConversationPublisherOptions): ConversationPublisher {
  return {
    async publish(conversationId, payload) {
      const producedAt = now();
      const entryId = await log.append(conversationId, payload, producedAt);
      const event: BroadcastEvent = {
        conversation_id: conversationId,
        stream_entry_id: entryId,
        payload,
        produced_at: producedAt,
      };

      if (deliverLocally) {
        registry.publish(conversationId, event);
      }
      incrementCounter('delivery.publisher.published');
      return event;
    },
  };
}
