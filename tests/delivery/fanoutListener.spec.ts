import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BroadcastRegistry } from '@/lib/delivery/broadcastRegistry';
import { DEFAULT_FANOUT_STREAM, conversationStreamKey, createRedisConversationLog } from '@/lib/delivery/conversationLog';
import { createStreamFanoutListener, type StreamFanoutListener } from '@/lib/delivery/fanoutListener';
import { metrics } from '@/lib/delivery/metrics';
import { createConversationPublisher } from '@/lib/delivery/publisher';
import { FakeRedis } from '../support/fakeRedis';

const START = 1_000_000;
const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('stream fan-out listener', () => {
  let clock: number;
  let redis: FakeRedis;
  let listeners: StreamFanoutListener[];

  function instance(origin: string) {
    const log = createRedisConversationLog(redis, { origin, now: () => clock, logger });
    const registry = new BroadcastRegistry({ logger });
    const publisher = createConversationPublisher({ log, registry, deliverLocally: false, now: () => clock });
    const listener = createStreamFanoutListener(redis, log, registry, { blockMs: 20, errorBackoffMs: 5, logger });
    listeners.push(listener);
    return { log, registry, publisher, listener };
  }

  function seedLogEntry(conversationId: string, id: string, payload: string) {
    redis.seed(conversationStreamKey(conversationId), id, {
      conversation_id: conversationId,
      payload,
      produced_at: String(START),
    });
  }

  function seedNotification(id: string, fields: Record<string, string>) {
    redis.seed(DEFAULT_FANOUT_STREAM, id, fields);
  }

  beforeEach(() => {
    clock = START;
    redis = new FakeRedis(() => clock);
    listeners = [];
    metrics.reset();
  });

  afterEach(async () => {
    await Promise.all(listeners.map((listener) => listener.stop()));
  });

  it('delivers an event appended on another instance to local subscribers', async () => {
    const nodeA = instance('node-a');
    const nodeB = instance('node-b');
    const subscription = nodeB.registry.subscribe('c1');
    await nodeB.listener.start();
    expect(nodeB.listener.running).toBe(true);

    const event = await nodeA.publisher.publish('c1', 'hello');

    expect(await subscription.next()).toEqual({ kind: 'event', event });
    expect(metrics.getCounter('delivery.fanout.delivered')).toBe(1);
  });

  it('starts after the newest notification present at startup', async () => {
    const nodeA = instance('node-a');
    const nodeB = instance('node-b');
    await nodeA.publisher.publish('c1', 'before');

    const subscription = nodeB.registry.subscribe('c1');
    await nodeB.listener.start();

    clock = START + 10_000;
    await nodeA.publisher.publish('c1', 'after');

    const delivery = await subscription.next();
    expect(delivery?.kind === 'event' ? delivery.event.payload : null).toBe('after');
    expect(subscription.pending).toBe(0);
  });

  it('publishes in log order when notifications arrive out of order', async () => {
    const node = instance('node-b');
    const subscription = node.registry.subscribe('c1');
    seedLogEntry('c1', '1000000-0', 'first');
    seedLogEntry('c1', '1000000-1', 'second');
    await node.listener.start();

    seedNotification('1000000-0', { conversation_id: 'c1', entry_id: '1000000-1', origin: 'node-x' });
    seedNotification('1000000-1', { conversation_id: 'c1', entry_id: '1000000-0', origin: 'node-y' });

    const first = await subscription.next();
    const second = await subscription.next();
    expect([first, second].map((d) => (d?.kind === 'event' ? d.event.stream_entry_id : null))).toEqual([
      '1000000-0',
      '1000000-1',
    ]);
    await vi.waitFor(() => {
      expect(metrics.getCounter('delivery.fanout.delivered')).toBe(2);
    });
    expect(subscription.pending).toBe(0);
  });

  it('skips conversations without local subscribers and malformed notifications', async () => {
    const node = instance('node-b');
    seedLogEntry('c1', '1000000-0', 'unwatched');
    await node.listener.start();

    seedNotification('1000000-0', { conversation_id: 'c1', entry_id: '1000000-0', origin: 'node-x' });
    seedNotification('1000000-1', { origin: 'node-x' });

    await vi.waitFor(() => {
      expect(metrics.getCounter('delivery.fanout.malformed')).toBe(1);
    });
    expect(redis.calls.filter((call) => call.command === 'xrange')).toHaveLength(0);
  });

  it('recovers from a failed first read on a notification well outside the lookback', async () => {
    const node = instance('node-b');
    const subscription = node.registry.subscribe('c1');
    seedLogEntry('c1', '1000000-0', 'one');
    await node.listener.start();

    redis.fail('xrange');
    seedNotification('1000000-0', { conversation_id: 'c1', entry_id: '1000000-0', origin: 'node-x' });
    await vi.waitFor(() => {
      expect(metrics.getCounter('delivery.fanout.read_failed')).toBe(1);
    });

    redis.heal('xrange');
    seedLogEntry('c1', '1010000-0', 'two');
    seedNotification('1010000-0', { conversation_id: 'c1', entry_id: '1010000-0', origin: 'node-x' });

    const payloads: Array<string | null> = [];
    for (let i = 0; i < 2; i++) {
      const delivery = await subscription.next();
      payloads.push(delivery?.kind === 'event' ? delivery.event.payload : null);
    }
    expect(payloads).toEqual(['one', 'two']);
  });

  it('backs off and keeps tailing after a stream read error', async () => {
    const nodeA = instance('node-a');
    const nodeB = instance('node-b');
    const subscription = nodeB.registry.subscribe('c1');

    redis.fail('xread');
    await nodeB.listener.start();
    await vi.waitFor(() => {
      expect(metrics.getCounter('delivery.fanout.errors')).toBeGreaterThan(0);
    });
    redis.heal('xread');

    const event = await nodeA.publisher.publish('c1', 'after outage');
    expect(await subscription.next()).toEqual({ kind: 'event', event });
  });

  it('stops tailing on stop()', async () => {
    const node = instance('node-b');
    await node.listener.start();
    await node.listener.stop();
    expect(node.listener.running).toBe(false);
  });
});
