/**
 * In-process fan-out of freshly appended events to live sessions.
 *
 * Delivery here is best-effort and local to this instance: a subscriber that
 * falls too far behind is cut off and recovers by reading the log on its next
 * connect. Each conversation entry disappears with its last subscriber.
 */

import { incrementCounter, setGauge } from './metrics';
import type { BroadcastEvent, ConversationId, DeliveryLogger, EphemeralSignal } from './types';

export const DEFAULT_SUBSCRIBER_CAPACITY = 1024;

export type RegistryDelivery =
  | { kind: 'event'; event: BroadcastEvent }
  | { kind: 'signal'; signal: EphemeralSignal };

export type SubscriptionCloseReason = 'unsubscribed' | 'overflow';

export class Subscription {
  private queue: RegistryDelivery[] = [];
  private waiter: ((delivery: RegistryDelivery | null) => void) | null = null;
  private closedWith: SubscriptionCloseReason | null = null;

  constructor(
    readonly id: number,
    readonly conversationId: ConversationId,
    private readonly capacity: number,
    private readonly onClose: (subscription: Subscription, reason: SubscriptionCloseReason) => void
  ) {}

  get closeReason(): SubscriptionCloseReason | null {
    return this.closedWith;
  }

  get isClosed(): boolean {
    return this.closedWith !== null;
  }

  /** Deliveries waiting to be taken with next(). */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Hand a delivery to this subscriber. Returns false when it was not taken,
   * either because the subscription is closed or because it just overflowed.
   */
  offer(delivery: RegistryDelivery): boolean {
    if (this.closedWith) return false;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(delivery);
      return true;
    }

    if (this.queue.length >= this.capacity) {
      this.terminate('overflow');
      return false;
    }

    this.queue.push(delivery);
    return true;
  }

  /** Next delivery in publish order, or null once the subscription is closed. */
  next(): Promise<RegistryDelivery | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closedWith) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error('Subscription already has a pending next()'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    this.terminate('unsubscribed');
  }

  private terminate(reason: SubscriptionCloseReason): void {
    if (this.closedWith) return;
    this.closedWith = reason;
    this.queue = [];

    const resolve = this.waiter;
    this.waiter = null;
    resolve?.(null);

    this.onClose(this, reason);
  }
}

export type BroadcastRegistryOptions = {
  capacity?: number;
  logger?: DeliveryLogger;
};

export class BroadcastRegistry {
  private readonly conversations = new Map<ConversationId, Set<Subscription>>();
  private readonly capacity: number;
  private readonly logger: DeliveryLogger;
  private nextSubscriptionId = 1;
  private subscriptionTotal = 0;

  constructor({ capacity = DEFAULT_SUBSCRIBER_CAPACITY, logger = console }: BroadcastRegistryOptions = {}) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Subscriber capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.logger = logger;
  }

  subscribe(conversationId: ConversationId): Subscription {
    const subscription = new Subscription(
      this.nextSubscriptionId++,
      conversationId,
      this.capacity,
      (sub, reason) => this.release(sub, reason)
    );

    let subscribers = this.conversations.get(conversationId);
    if (!subscribers) {
      subscribers = new Set();
      this.conversations.set(conversationId, subscribers);
    }
    subscribers.add(subscription);
    this.subscriptionTotal += 1;

    this.updateGauges();
    return subscription;
  }

  /** Returns the number of subscribers that took the event. */
  publish(conversationId: ConversationId, event: BroadcastEvent): number {
    return this.fanOut(conversationId, { kind: 'event', event });
  }

  publishSignal(conversationId: ConversationId, signal: EphemeralSignal, exclude?: Subscription): number {
    return this.fanOut(conversationId, { kind: 'signal', signal }, exclude);
  }

  subscriberCount(conversationId: ConversationId): number {
    return this.conversations.get(conversationId)?.size ?? 0;
  }

  hasSubscribers(conversationId: ConversationId): boolean {
    return this.subscriberCount(conversationId) > 0;
  }

  conversationCount(): number {
    return this.conversations.size;
  }

  private fanOut(conversationId: ConversationId, delivery: RegistryDelivery, exclude?: Subscription): number {
    const subscribers = this.conversations.get(conversationId);
    if (!subscribers) return 0;

    let delivered = 0;
    for (const subscription of Array.from(subscribers)) {
      if (subscription === exclude) continue;
      if (subscription.offer(delivery)) {
        delivered += 1;
      }
    }

    if (delivery.kind === 'event') {
      incrementCounter('delivery.registry.published');
    }
    return delivered;
  }

  private release(subscription: Subscription, reason: SubscriptionCloseReason): void {
    const subscribers = this.conversations.get(subscription.conversationId);
    if (!subscribers || !subscribers.delete(subscription)) return;

    this.subscriptionTotal -= 1;
    if (subscribers.size === 0) {
      this.conversations.delete(subscription.conversationId);
    }

    if (reason === 'overflow') {
      incrementCounter('delivery.registry.overflows');
      this.logger.warn(
        `[BroadcastRegistry] subscriber ${subscription.id} on ${subscription.conversationId} overflowed; disconnecting`
      );
    }
    this.updateGauges();
  }

  private updateGauges(): void {
    setGauge('delivery.registry.conversations', this.conversations.size);
    setGauge('delivery.registry.subscribers', this.subscriptionTotal);
  }
}
