/**
 * Conversation delivery server
 *
 * Run with: npm start
 */

import { createServer } from 'http';
import Redis from 'ioredis';
import { createSupabaseAuthorizer } from './lib/delivery/auth';
import { loadDeliveryConfig } from './lib/delivery/config';
import { setErrorLogger } from './lib/delivery/errorHandler';
import { getMetricsSummary } from './lib/delivery/metrics';
import { fromIoredis } from './lib/delivery/redisClient';
import { createDeliveryService } from './lib/delivery/service';

const config = loadDeliveryConfig();
setErrorLogger(console);

const redisClient = new Redis(config.redisUrl, {
  lazyConnect: true,
  maxRetriesPerRequest: null,
});

redisClient.on('error', (err) => {
  console.error('Redis connection error:', err);
});

redisClient.on('connect', () => {
  console.log(`[Redis] connected to ${redisClient.options.host ?? 'localhost'}:${redisClient.options.port ?? 6379}`);
});

redisClient.on('reconnecting', () => {
  console.warn('[Redis] reconnecting...');
});

// XREAD BLOCK holds its connection, so the fan-out listener gets its own
const blockingClient = config.fanoutEnabled ? redisClient.duplicate() : null;
blockingClient?.on('error', (err) => {
  console.error('Redis (fan-out) connection error:', err);
});

const authorizer = config.supabase ? createSupabaseAuthorizer(config.supabase) : null;

const service = createDeliveryService({
  config,
  redis: fromIoredis(redisClient),
  blockingRedis: blockingClient ? fromIoredis(blockingClient) : null,
  authorizer,
  logger: console,
});

const server = createServer((req, res) => {
  const path = new URL(req.url ?? '/', `http://${config.hostname}`).pathname;
  if (req.method === 'GET' && path === '/health') {
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(
      JSON.stringify({
        status: redisClient.status === 'ready' ? 'ok' : 'degraded',
        redis: redisClient.status,
        fanout: service.listener?.running ?? false,
        sessions: gateway.sessionCount,
        metrics: getMetricsSummary(),
      })
    );
    return;
  }
  res.statusCode = 404;
  res.end('not found');
});

const gateway = service.attach(server);

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`> ${signal} received, closing sessions`);

  await service.shutdown();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  redisClient.disconnect();
  blockingClient?.disconnect();
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('Error during shutdown:', err);
        process.exit(1);
      });
  });
}

async function main(): Promise<void> {
  await redisClient.connect();
  if (blockingClient) {
    await blockingClient.connect();
  }
  await service.start();

  server.listen(config.port, () => {
    console.log(`> Ready on http://${config.hostname}:${config.port}`);
    console.log(`> WebSocket delivery available on ws://${config.hostname}:${config.port}${config.wsPath}`);
  });
}

main().catch((err: unknown) => {
  console.error('Error starting server:', err);
  process.exit(1);
});
