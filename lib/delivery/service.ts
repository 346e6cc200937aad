/**
 * Wires the delivery pieces for one server instance.
 *
 * With fan-out enabled every append is announced on the shared fan-out stream
 * and this instance's listener feeds its own registry from it, so local
 * publishes are not delivered twice. Without fan-out the publisher feeds the
 * registry directly.
 */

import type { Server as HTTPServer } from 'http';
import { v4 as uuidv4 } from 'uuid';
import type { SessionAuthorizer } from './auth';
import { BroadcastRegistry } from './broadcastRegistry';
import type { DeliveryConfig } from './config';
import { ConnectionSession } from './connectionSession';
import { createRedisConversationLog, type ConversationLog } from './conversationLog';
import { createStreamFanoutListener, type StreamFanoutListener } from './fanoutListener';
import { initDeliveryGateway, type DeliveryGateway } from './gateway';
import { createConversationPublisher, type ConversationPublisher } from './publisher';
import type { DeliveryRedisClient } from './redisClient';
import { createRedisSyncStateStore, type ClientSyncStateStore } from './syncStateStore';
import type { DeliveryLogger } from './types';

export type DeliveryServiceOptions = {
  config: DeliveryConfig;
  redis: DeliveryRedisClient;
  /** Dedicated connection for the blocking fan-out read; required when fan-out is enabled. */
  blockingRedis: DeliveryRedisClient | null;
  authorizer: SessionAuthorizer | null;
  instanceId?: string;
  logger?: DeliveryLogger;
};

export interface DeliveryService {
  readonly log: ConversationLog;
  readonly store: ClientSyncStateStore;
  readonly registry: BroadcastRegistry;
  readonly publisher: ConversationPublisher;
  readonly listener: StreamFanoutListener | null;
  start(): Promise<void>;
  attach(server: HTTPServer): DeliveryGateway;
  shutdown(): Promise<void>;
}

export function createDeliveryService({
  config,
  redis,
  blockingRedis,
  authorizer,
  instanceId = uuidv4(),
  logger = console,
}: DeliveryServiceOptions): DeliveryService {
  const fanoutClient = config.fanoutEnabled ? blockingRedis : null;
  if (config.fanoutEnabled && !fanoutClient) {
    logger.warn('[DeliveryService] fan-out enabled without a blocking connection; delivering locally only');
  }

  const log = createRedisConversationLog(redis, {
    origin: instanceId,
    fanoutStream: fanoutClient ? config.fanoutStream : null,
    readBatchSize: config.readBatchSize,
    retentionMs: config.retentionMs,
    trimEvery: config.trimEvery,
    logger,
  });
  const store = createRedisSyncStateStore(redis, { ttlSeconds: config.cursorTtlSeconds, logger });
  const registry = new BroadcastRegistry({ capacity: config.subscriberCapacity, logger });
  const listener = fanoutClient
    ? createStreamFanoutListener(fanoutClient, log, registry, {
        stream: config.fanoutStream,
        batchSize: config.readBatchSize,
        blockMs: config.fanoutBlockMs,
        logger,
      })
    : null;
  const publisher = createConversationPublisher({ log, registry, deliverLocally: listener === null });

  let gateway: DeliveryGateway | null = null;

  return {
    log,
    store,
    registry,
    publisher,
    listener,
    async start() {
      if (listener) {
        await listener.start();
      }
    },
    attach(server) {
      if (gateway) return gateway;
      gateway = initDeliveryGateway(server, {
        path: config.wsPath,
        authorizer,
        heartbeatIntervalMs: config.heartbeatIntervalMs,
        heartbeatTimeoutMs: config.heartbeatTimeoutMs,
        logger,
        openSession: (transport, identity) =>
          new ConnectionSession({
            transport,
            identity,
            log,
            store,
            registry,
            syncIntervalMs: config.syncIntervalMs,
            retentionMs: config.retentionMs,
            staleCursorPolicy: config.staleCursorPolicy,
            logger,
          }),
      });
      return gateway;
    },
    async shutdown() {
      // Sessions flush their cursors before the Redis connections go away
      if (gateway) {
        await gateway.shutdown();
        gateway = null;
      }
      if (listener) {
        await listener.stop();
      }
    },
  };
}
