import { createServer, type Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WebSocket } from 'ws';
import type { SessionAuthorizer } from '@/lib/delivery/auth';
import { BroadcastRegistry } from '@/lib/delivery/broadcastRegistry';
import { ConnectionSession } from '@/lib/delivery/connectionSession';
import { createRedisConversationLog } from '@/lib/delivery/conversationLog';
import { setErrorLogger } from '@/lib/delivery/errorHandler';
import { authorizeUpgrade, initDeliveryGateway, parseConnectRequest, type DeliveryGateway } from '@/lib/delivery/gateway';
import { metrics } from '@/lib/delivery/metrics';
import { createConversationPublisher } from '@/lib/delivery/publisher';
import { createRedisSyncStateStore } from '@/lib/delivery/syncStateStore';
import type { OutboundFrame } from '@/lib/delivery/types';
import { FakeRedis } from '../support/fakeRedis';

const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

function fakeAuthorizer(members: Record<string, string[]>): SessionAuthorizer {
  return {
    async authenticate(token) {
      return token === 'test-token' ? { userId: 'user-1' } : null;
    },
    async isMember(conversationId, userId) {
      return (members[conversationId] ?? []).includes(userId);
    },
  };
}

describe('parseConnectRequest', () => {
  it('reads the conversation, device and token from the query string', () => {
    expect(parseConnectRequest('/ws?conversation_id=c1&client_id=d1&token=test-token', undefined)).toEqual({
      path: '/ws',
      conversationId: 'c1',
      clientId: 'd1',
      token: 'test-token',
      devUserId: null,
    });
  });

  it('falls back to a bearer token header', () => {
    expect(parseConnectRequest('/ws?conversation_id=c1', 'Bearer test-token').token).toBe('test-token');
    expect(parseConnectRequest('/ws?conversation_id=c1', 'Basic abc').token).toBeNull();
  });

  it('treats blank values as missing', () => {
    const request = parseConnectRequest('/ws?conversation_id=%20&client_id=', undefined);
    expect(request.conversationId).toBeNull();
    expect(request.clientId).toBeNull();
  });

  it('copes with a missing url', () => {
    expect(parseConnectRequest(undefined, undefined).path).toBe('/');
  });
});

describe('authorizeUpgrade', () => {
  const authorizer = fakeAuthorizer({ c1: ['user-1'] });

  beforeEach(() => {
    setErrorLogger(logger);
  });

  it('accepts an authenticated member', async () => {
    const request = parseConnectRequest('/ws?conversation_id=c1&token=test-token', undefined);
    expect(await authorizeUpgrade(request, authorizer)).toEqual({ ok: true, userId: 'user-1', conversationId: 'c1' });
  });

  it.each([
    ['/ws', 400, 'missing conversation_id'],
    ['/ws?conversation_id=c1', 401, 'missing token'],
    ['/ws?conversation_id=c1&token=expired', 401, 'invalid token'],
    ['/ws?conversation_id=c2&token=test-token', 403, 'not a member of this conversation'],
  ])('rejects %s with %i', async (url, status, reason) => {
    expect(await authorizeUpgrade(parseConnectRequest(url, undefined), authorizer)).toEqual({ ok: false, status, reason });
  });

  it('answers 503 when the authorizer is unreachable', async () => {
    const broken: SessionAuthorizer = {
      authenticate: async () => ({ userId: 'user-1' }),
      isMember: async () => {
        throw new Error('membership lookup failed');
      },
    };
    const request = parseConnectRequest('/ws?conversation_id=c1&token=test-token', undefined);
    expect(await authorizeUpgrade(request, broken)).toEqual({ ok: false, status: 503, reason: 'authorization unavailable' });
  });

  it('trusts user_id only when no authorizer is configured', async () => {
    const request = parseConnectRequest('/ws?conversation_id=c1&user_id=dev-user', undefined);
    expect(await authorizeUpgrade(request, null)).toEqual({ ok: true, userId: 'dev-user', conversationId: 'c1' });
    expect(await authorizeUpgrade(parseConnectRequest('/ws?conversation_id=c1', undefined), null)).toEqual({
      ok: false,
      status: 401,
      reason: 'missing user_id',
    });
  });
});

describe('delivery gateway over a real socket', () => {
  let server: Server;
  let gateway: DeliveryGateway;
  let port: number;
  let redis: FakeRedis;
  let registry: BroadcastRegistry;
  const clients: WebSocket[] = [];

  async function boot(authorizer: SessionAuthorizer | null) {
    redis = new FakeRedis();
    const log = createRedisConversationLog(redis, { fanoutStream: null, logger });
    const store = createRedisSyncStateStore(redis, { logger });
    registry = new BroadcastRegistry({ logger });
    const publisher = createConversationPublisher({ log, registry, deliverLocally: true });

    server = createServer();
    gateway = initDeliveryGateway(server, {
      authorizer,
      logger,
      openSession: (transport, identity) =>
        new ConnectionSession({ transport, identity, log, store, registry, logger }),
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    port = address.port;
    return { publisher, store };
  }

  function connect(query: string) {
    const ws = new WebSocket(`ws://127.0.0.1:${port}${query}`);
    clients.push(ws);
    const frames: OutboundFrame[] = [];
    ws.on('message', (data) => {
      frames.push(JSON.parse(data.toString()));
    });
    const closed = new Promise<{ code: number; reason: string }>((resolve) => {
      ws.on('close', (code, reason) => resolve({ code, reason: reason.toString() }));
    });
    const failed = new Promise<string>((resolve) => {
      ws.on('error', (error) => resolve(error.message));
    });
    return { ws, frames, closed, failed };
  }

  beforeEach(() => {
    metrics.reset();
    setErrorLogger(logger);
  });

  afterEach(async () => {
    await gateway.shutdown();
    for (const ws of clients.splice(0)) ws.terminate();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('replays history, goes live and closes with 1001 on shutdown', async () => {
    const { publisher, store } = await boot(null);
    await publisher.publish('c1', 'm1');

    const client = connect('/ws?conversation_id=c1&client_id=dev-1&user_id=user-1');
    await vi.waitFor(() => {
      expect(client.frames.map((frame) => frame.type)).toEqual(['connected', 'event', 'live']);
    });
    expect(gateway.sessionCount).toBe(1);

    const live = await publisher.publish('c1', 'm2');
    await vi.waitFor(() => {
      expect(client.frames.at(-1)).toMatchObject({ type: 'event', payload: 'm2', replay: false });
    });

    await gateway.shutdown();
    expect(await client.closed).toEqual({ code: 1001, reason: 'server_shutdown' });
    expect(gateway.sessionCount).toBe(0);
    expect((await store.get('user-1', 'dev-1', 'c1'))?.last_message_id).toBe(live.stream_entry_id);
  });

  it('mints a device id when the client does not send one', async () => {
    await boot(null);
    const client = connect('/ws?conversation_id=c1&user_id=user-1');
    await vi.waitFor(() => {
      expect(client.frames[0]?.type).toBe('connected');
    });

    const first = client.frames[0];
    expect(first?.type === 'connected' ? first.client_id : '').toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it('refuses non-members before upgrading', async () => {
    await boot(fakeAuthorizer({ c1: ['someone-else'] }));
    const client = connect('/ws?conversation_id=c1&token=test-token');

    expect(await client.failed).toBe('Unexpected server response: 403');
    expect(registry.subscriberCount('c1')).toBe(0);
    expect(metrics.getCounter('delivery.gateway.rejected', { status: '403' })).toBe(1);
  });

  it('answers 404 outside the delivery path', async () => {
    await boot(null);
    const client = connect('/elsewhere?conversation_id=c1&user_id=user-1');
    expect(await client.failed).toBe('Unexpected server response: 404');
  });
});
