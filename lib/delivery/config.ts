/**
 * Environment configuration for the delivery service.
 */

import { DEFAULT_FANOUT_STREAM, DEFAULT_RETENTION_MS } from './conversationLog';
import { createDeliveryError } from './errorHandler';
import { DEFAULT_SYNC_INTERVAL_MS } from './periodicSync';
import { DEFAULT_SUBSCRIBER_CAPACITY } from './broadcastRegistry';
import { DEFAULT_CURSOR_TTL_SECONDS } from './syncStateStore';
import type { StaleCursorPolicy } from './types';

export type DeliveryConfig = {
  port: number;
  hostname: string;
  wsPath: string;
  redisUrl: string;
  fanoutEnabled: boolean;
  fanoutStream: string;
  fanoutBlockMs: number;
  syncIntervalMs: number;
  cursorTtlSeconds: number;
  retentionMs: number;
  readBatchSize: number;
  trimEvery: number;
  subscriberCapacity: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  staleCursorPolicy: StaleCursorPolicy;
  supabase: { url: string; anonKey: string; serviceRoleKey: string } | null;
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, { min = 0 }: { min?: number } = {}): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw createDeliveryError(`${name} must be an integer >= ${min}, got "${raw}"`, 'CONFIG_ERROR');
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw createDeliveryError(`${name} must be a boolean, got "${raw}"`, 'CONFIG_ERROR');
}

function readPolicy(env: Env): StaleCursorPolicy {
  const raw = env.DELIVERY_STALE_CURSOR_POLICY?.trim();
  if (!raw) return 'resync_from_latest';
  if (raw === 'resync_from_latest' || raw === 'replay_retained') return raw;
  throw createDeliveryError(
    `DELIVERY_STALE_CURSOR_POLICY must be resync_from_latest or replay_retained, got "${raw}"`,
    'CONFIG_ERROR'
  );
}

function readRedisUrl(env: Env): string {
  const raw = env.REDIS_URL?.trim();
  if (!raw) return 'redis://localhost:6379';

  let protocol: string;
  try {
    protocol = new URL(raw).protocol;
  } catch {
    protocol = 'invalid:';
  }
  if (protocol !== 'redis:' && protocol !== 'rediss:') {
    throw createDeliveryError(`REDIS_URL must be a redis:// or rediss:// URL, got "${raw}"`, 'CONFIG_ERROR');
  }
  return raw;
}

export function loadDeliveryConfig(env: Env = process.env): DeliveryConfig {
  const supabaseUrl = env.SUPABASE_URL;
  const anonKey = env.SUPABASE_ANON_KEY;
  const serviceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY;

  const heartbeatIntervalMs = readInt(env, 'DELIVERY_HEARTBEAT_INTERVAL_MS', 5000, { min: 1 });
  const heartbeatTimeoutMs = readInt(env, 'DELIVERY_HEARTBEAT_TIMEOUT_MS', 30000, { min: 1 });
  if (heartbeatTimeoutMs <= heartbeatIntervalMs) {
    throw createDeliveryError('DELIVERY_HEARTBEAT_TIMEOUT_MS must exceed DELIVERY_HEARTBEAT_INTERVAL_MS', 'CONFIG_ERROR');
  }

  return {
    port: readInt(env, 'PORT', 3000, { min: 1 }),
    hostname: env.HOSTNAME || 'localhost',
    wsPath: env.DELIVERY_WS_PATH || '/ws',
    redisUrl: readRedisUrl(env),
    fanoutEnabled: readBool(env, 'DELIVERY_FANOUT_ENABLED', true),
    fanoutStream: env.DELIVERY_FANOUT_STREAM || DEFAULT_FANOUT_STREAM,
    fanoutBlockMs: readInt(env, 'DELIVERY_FANOUT_BLOCK_MS', 5000, { min: 1 }),
    syncIntervalMs: readInt(env, 'DELIVERY_SYNC_INTERVAL_MS', DEFAULT_SYNC_INTERVAL_MS, { min: 1 }),
    cursorTtlSeconds: readInt(env, 'DELIVERY_CURSOR_TTL_SECONDS', DEFAULT_CURSOR_TTL_SECONDS, { min: 1 }),
    retentionMs: readInt(env, 'DELIVERY_RETENTION_MS', DEFAULT_RETENTION_MS, { min: 1 }),
    readBatchSize: readInt(env, 'DELIVERY_READ_BATCH_SIZE', 100, { min: 1 }),
    trimEvery: readInt(env, 'DELIVERY_TRIM_EVERY', 100),
    subscriberCapacity: readInt(env, 'DELIVERY_SUBSCRIBER_CAPACITY', DEFAULT_SUBSCRIBER_CAPACITY, { min: 1 }),
    heartbeatIntervalMs,
    heartbeatTimeoutMs,
    staleCursorPolicy: readPolicy(env),
    supabase:
      supabaseUrl && anonKey && serviceRoleKey ? { url: supabaseUrl, anonKey, serviceRoleKey } : null,
  };
}
