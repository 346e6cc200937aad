import type { StreamEntryId } from './streamEntryId';

export type ConversationId = string;
export type UserId = string;
export type ClientId = string;

export type BroadcastEvent = {
  conversation_id: ConversationId;
  stream_entry_id: StreamEntryId;
  /** Opaque serialized message; encryption and content format live elsewhere. */
  payload: string;
  /** Epoch milliseconds at append time. */
  produced_at: number;
};

export type ClientSyncState = {
  client_id: ClientId;
  user_id: UserId;
  conversation_id: ConversationId;
  last_message_id: StreamEntryId;
  /** Epoch seconds. */
  last_sync_at: number;
};

export type SessionState = 'connecting' | 'catching_up' | 'live' | 'closing' | 'closed';

export type TypingSignal = {
  kind: 'typing';
  conversation_id: ConversationId;
  user_id: UserId;
  typing: boolean;
};

export type EphemeralSignal = TypingSignal;

export type StaleCursorPolicy = 'resync_from_latest' | 'replay_retained';

export type DeliveryLogger = Pick<Console, 'log' | 'warn' | 'error'>;

// Client -> server
export type InboundFrame = { type: 'ping' } | { type: 'typing'; typing: boolean } | { type: 'get_unacked' };

// Server -> client
export type OutboundFrame =
  | {
      type: 'connected';
      client_id: ClientId;
      conversation_id: ConversationId;
      cursor: StreamEntryId;
    }
  | {
      type: 'event';
      conversation_id: ConversationId;
      stream_entry_id: StreamEntryId;
      payload: string;
      produced_at: number;
      replay: boolean;
    }
  | { type: 'live'; cursor: StreamEntryId }
  | { type: 'resync_required'; reason: 'cursor_expired'; latest: StreamEntryId }
  | { type: 'typing'; conversation_id: ConversationId; user_id: UserId; typing: boolean }
  | {
      /** Entries sent since the last persisted cursor, in log order. */
      type: 'unacked';
      conversation_id: ConversationId;
      since: StreamEntryId;
      events: Array<Pick<BroadcastEvent, 'stream_entry_id' | 'payload' | 'produced_at'>>;
    }
  | { type: 'pong' };

export const CLOSE_NORMAL = 1000;
export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_INTERNAL_ERROR = 1011;
export const CLOSE_TRY_AGAIN_LATER = 1013;
