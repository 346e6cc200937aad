/**
 * One live WebSocket, from upgrade to teardown.
 *
 *   connecting -> catching_up -> live -> closing -> closed
 *
 * The session loads the device cursor, replays everything the log holds after
 * it, then forwards live events from the broadcast registry. The registry
 * subscription is opened before the log is read and held back until replay is
 * done, so an event appended while catch-up runs reaches the client either
 * from the log or live. At the seam it may show up in both; anything at or
 * below the cursor is dropped instead of sent twice.
 */

import type { BroadcastRegistry, RegistryDelivery, Subscription } from "./broadcastRegistry";
import { DEFAULT_RETENTION_MS, type ConversationLog } from "./conversationLog";
import { CursorCell } from "./cursorCell";
import { DeliveryError, createDeliveryError, handleDeliveryError, type ErrorContext } from "./errorHandler";
import { incrementCounter, recordTimer, setGauge } from "./metrics";
import { PeriodicCursorSync, type SyncIdentity } from "./periodicSync";
import { decodeInboundFrame, encodeOutboundFrame } from "./protocol";
import { STREAM_BEGINNING, isAfter, predatesRetention, type StreamEntryId } from "./streamEntryId";
import type { ClientSyncStateStore } from "./syncStateStore";
import type { SessionTransport } from "./transport";
import {
  CLOSE_GOING_AWAY,
  CLOSE_INTERNAL_ERROR,
  CLOSE_NORMAL,
  CLOSE_TRY_AGAIN_LATER,
  type BroadcastEvent,
  type DeliveryLogger,
  type OutboundFrame,
  type SessionState,
  type StaleCursorPolicy,
} from "./types";

const DEFAULT_FINAL_FLUSH_TIMEOUT_MS = 2000;

let activeSessions = 0;

export type ConnectionSessionOptions = {
  transport: SessionTransport;
  identity: SyncIdentity;
  log: ConversationLog;
  store: ClientSyncStateStore;
  registry: BroadcastRegistry;
  syncIntervalMs?: number;
  retentionMs?: number;
  staleCursorPolicy?: StaleCursorPolicy;
  finalFlushTimeoutMs?: number;
  now?: () => number;
  logger?: DeliveryLogger;
};

type CloseRequest = { code: number; reason: string };

export class ConnectionSession {
  private currentState: SessionState = "connecting";
  private readonly transport: SessionTransport;
  private readonly identity: SyncIdentity;
  private readonly log: ConversationLog;
  private readonly store: ClientSyncStateStore;
  private readonly registry: BroadcastRegistry;
  private readonly retentionMs: number;
  private readonly staleCursorPolicy: StaleCursorPolicy;
  private readonly finalFlushTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: DeliveryLogger;

  private readonly cell = new CursorCell();
  private readonly sync: PeriodicCursorSync;
  private subscription: Subscription | null = null;

  private closeRequest: CloseRequest | null = null;
  private runPromise: Promise<void> | null = null;

  constructor(options: ConnectionSessionOptions) {
    this.transport = options.transport;
    this.identity = options.identity;
    this.log = options.log;
    this.store = options.store;
    this.registry = options.registry;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.staleCursorPolicy = options.staleCursorPolicy ?? "resync_from_latest";
    this.finalFlushTimeoutMs = options.finalFlushTimeoutMs ?? DEFAULT_FINAL_FLUSH_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? console;

    this.sync = new PeriodicCursorSync({
      store: this.store,
      cell: this.cell,
      identity: this.identity,
      intervalMs: options.syncIntervalMs,
      now: this.now,
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Last entry id forwarded to (or already seen by) the client. */
  get cursor(): StreamEntryId {
    return this.cell.read();
  }

  get clientId(): string {
    return this.identity.clientId;
  }

  get conversationId(): string {
    return this.identity.conversationId;
  }

  /** Drive the session to completion. Resolves once it is closed. */
  run(): Promise<void> {
    if (!this.runPromise) {
      this.runPromise = this.execute();
    }
    return this.runPromise;
  }

  /** Close from the server side (shutdown, heartbeat) and wait for teardown. */
  close(code: number = CLOSE_GOING_AWAY, reason = "server_shutdown"): Promise<void> {
    this.requestClose(code, reason);
    return this.runPromise ?? Promise.resolve();
  }

  private async execute(): Promise<void> {
    activeSessions += 1;
    setGauge("delivery.sessions.active", activeSessions);
    incrementCounter("delivery.sessions.opened");

    this.transport.onMessage((text) => this.handleInbound(text));
    this.transport.onClose(() => this.requestClose(CLOSE_NORMAL, "client_closed"));
    this.transport.onError((error) => {
      this.logger.warn(`[ConnectionSession] transport error for client ${this.identity.clientId}:`, error);
      this.requestClose(CLOSE_INTERNAL_ERROR, "transport_error");
    });

    try {
      await this.connect();
      if (!this.closeRequest) await this.catchUp();
      if (!this.closeRequest) await this.forwardLive();
    } catch (error) {
      this.fail(error);
    }

    await this.teardown();
  }

  private async connect(): Promise<void> {
    const { userId, clientId, conversationId } = this.identity;
    let cursor: StreamEntryId = STREAM_BEGINNING;
    try {
      const stored = await this.store.get(userId, clientId, conversationId);
      if (stored) cursor = stored.last_message_id;
    } catch (error) {
      // A full catch-up can only add duplicates, never lose events
      handleDeliveryError(error, { component: "ConnectionSession", action: "load_cursor", userId, clientId, conversationId });
    }
    this.cell.advance(cursor);

    await this.sendFrame({
      type: "connected",
      client_id: clientId,
      conversation_id: conversationId,
      cursor,
    });
  }

  private async catchUp(): Promise<void> {
    this.transition("catching_up");
    const startTime = this.now();
    const { conversationId } = this.identity;

    this.subscription = this.registry.subscribe(conversationId);
    this.sync.start();

    const cursor = this.cell.read();
    let events: BroadcastEvent[] = [];
    try {
      if (await this.lostEntriesAfter(cursor)) {
        const latest = await this.log.latestId(conversationId);
        this.cell.advance(latest);
        incrementCounter("delivery.catchup.resync_from_latest");
        await this.sendFrame({ type: "resync_required", reason: "cursor_expired", latest: this.cell.read() });
      } else {
        events = await this.log.readSince(conversationId, cursor);
      }
    } catch (error) {
      if (error instanceof DeliveryError && error.code === "TRANSPORT_SEND_FAILED") throw error;
      throw createDeliveryError(`Catch-up failed for conversation ${conversationId}`, "CATCH_UP_FAILED", {
        cause: error,
      });
    }

    let replayed = 0;
    for (const event of events) {
      if (this.closeRequest) break;
      if (!isAfter(event.stream_entry_id, this.cell.read())) continue;
      await this.forward(event, true);
      replayed += 1;
    }

    incrementCounter("delivery.catchup.events", undefined, replayed);
    recordTimer("delivery.catchup.latency", this.now() - startTime);
  }

  /**
   * Retention only drops entries older than the window, so a cursor inside it
   * cannot have lost anything. An older one resyncs only when the log
   * actually trimmed entries after it.
   */
  private async lostEntriesAfter(cursor: StreamEntryId): Promise<boolean> {
    if (this.staleCursorPolicy !== "resync_from_latest" || cursor === STREAM_BEGINNING) return false;
    if (!predatesRetention(cursor, this.now(), this.retentionMs)) return false;
    return this.log.trimmedPast(this.identity.conversationId, cursor);
  }

  private async forwardLive(): Promise<void> {
    const subscription = this.subscription;
    if (!subscription) return;

    this.transition("live");
    await this.sendFrame({ type: "live", cursor: this.cell.read() });

    while (!this.closeRequest) {
      // requestClose() closes the subscription, which wakes this with null
      const delivery: RegistryDelivery | null = await subscription.next();
      if (this.closeRequest) break;

      if (!delivery) {
        if (subscription.closeReason === "overflow") {
          incrementCounter("delivery.live.slow_consumer");
          handleDeliveryError(
            createDeliveryError(`Client ${this.identity.clientId} fell behind the live stream`, "SLOW_CONSUMER"),
            this.errorContext("live")
          );
          this.requestClose(CLOSE_TRY_AGAIN_LATER, "slow_consumer");
        } else {
          this.requestClose(CLOSE_GOING_AWAY, "unsubscribed");
        }
        break;
      }

      if (delivery.kind === "signal") {
        const { signal } = delivery;
        await this.sendFrame({
          type: "typing",
          conversation_id: signal.conversation_id,
          user_id: signal.user_id,
          typing: signal.typing,
        });
        continue;
      }

      if (!isAfter(delivery.event.stream_entry_id, this.cell.read())) {
        incrementCounter("delivery.live.seam_duplicates");
        continue;
      }
      await this.forward(delivery.event, false);
      incrementCounter("delivery.live.events");
    }
  }

  private async forward(event: BroadcastEvent, replay: boolean): Promise<void> {
    await this.sendFrame({
      type: "event",
      conversation_id: event.conversation_id,
      stream_entry_id: event.stream_entry_id,
      payload: event.payload,
      produced_at: event.produced_at,
      replay,
    });
    this.cell.advance(event.stream_entry_id);
  }

  private async sendFrame(frame: OutboundFrame): Promise<void> {
    try {
      await this.transport.send(encodeOutboundFrame(frame));
    } catch (error) {
      throw createDeliveryError(`Failed to send ${frame.type} frame`, "TRANSPORT_SEND_FAILED", { cause: error });
    }
  }

  private handleInbound(text: string): void {
    if (this.currentState !== "catching_up" && this.currentState !== "live") return;

    const frame = decodeInboundFrame(text);
    if (!frame) {
      incrementCounter("delivery.frames.invalid");
      return;
    }

    switch (frame.type) {
      case "ping":
        void this.sendFrame({ type: "pong" }).catch((error: unknown) => this.fail(error));
        break;
      case "typing":
        this.registry.publishSignal(
          this.identity.conversationId,
          {
            kind: "typing",
            conversation_id: this.identity.conversationId,
            user_id: this.identity.userId,
            typing: frame.typing,
          },
          this.subscription ?? undefined
        );
        break;
      case "get_unacked":
        void this.sendUnacked().catch((error: unknown) => {
          if (error instanceof DeliveryError && error.code === "TRANSPORT_SEND_FAILED") {
            this.fail(error);
          } else {
            handleDeliveryError(error, this.errorContext("get_unacked"));
          }
        });
        break;
    }
  }

  /**
   * Resend what this device was sent after its last persisted cursor, in one
   * frame. Nothing past the session cursor is included and the cursor does
   * not move.
   */
  private async sendUnacked(): Promise<void> {
    const { userId, clientId, conversationId } = this.identity;
    incrementCounter("delivery.unacked.requests");

    const stored = await this.store.get(userId, clientId, conversationId);
    const since = stored?.last_message_id ?? STREAM_BEGINNING;
    const upTo = this.cell.read();
    const events = isAfter(upTo, since)
      ? (await this.log.readSince(conversationId, since)).filter((event) => !isAfter(event.stream_entry_id, upTo))
      : [];

    await this.sendFrame({
      type: "unacked",
      conversation_id: conversationId,
      since,
      events: events.map(({ stream_entry_id, payload, produced_at }) => ({ stream_entry_id, payload, produced_at })),
    });
  }

  private errorContext(action: string): ErrorContext {
    return {
      component: "ConnectionSession",
      action,
      userId: this.identity.userId,
      clientId: this.identity.clientId,
      conversationId: this.identity.conversationId,
    };
  }

  private fail(error: unknown): void {
    const deliveryError = error instanceof DeliveryError ? error : null;
    const code = deliveryError?.code;

    // A send failing after the client already hung up is the expected way out
    if (code === "TRANSPORT_SEND_FAILED" && this.closeRequest) {
      incrementCounter("delivery.sessions.send_after_close");
      return;
    }

    handleDeliveryError(error, this.errorContext(this.currentState));

    if (code === "CATCH_UP_FAILED") {
      this.requestClose(CLOSE_INTERNAL_ERROR, "catch_up_failed");
    } else if (code === "TRANSPORT_SEND_FAILED") {
      this.requestClose(CLOSE_INTERNAL_ERROR, "transport_error");
    } else {
      this.requestClose(CLOSE_INTERNAL_ERROR, "internal_error");
    }
  }

  private requestClose(code: number, reason: string): void {
    if (this.closeRequest) return;
    this.closeRequest = { code, reason };
    if (this.currentState === "catching_up" || this.currentState === "live") {
      this.transition("closing");
    }
    this.subscription?.close();
  }

  private async teardown(): Promise<void> {
    if (this.currentState !== "closing") {
      this.transition("closing");
    }
    const request = this.closeRequest ?? { code: CLOSE_NORMAL, reason: "completed" };

    // Final write first, then stop the timer so a late tick cannot overwrite it
    const flushed = await this.flushWithTimeout();
    if (!flushed) {
      this.logger.warn(
        `[ConnectionSession] final cursor flush failed for client ${this.identity.clientId} at ${this.cell.read()}`
      );
    }
    this.sync.stop();

    this.subscription?.close();
    this.subscription = null;

    if (this.transport.isOpen) {
      this.transport.close(request.code, request.reason);
    }

    this.transition("closed");
    activeSessions -= 1;
    setGauge("delivery.sessions.active", activeSessions);
    incrementCounter("delivery.sessions.closed", { reason: request.reason });
  }

  private flushWithTimeout(): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.finalFlushTimeoutMs);
    });
    return Promise.race([this.sync.flush(), timeout]).finally(() => clearTimeout(timer));
  }

  private transition(next: SessionState): void {
    this.currentState = next;
  }
}
