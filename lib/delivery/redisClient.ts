/**
 * The slice of Redis the delivery layer talks to.
 *
 * Components depend on this interface instead of on ioredis directly, so the
 * same log and cursor store run against an in-process stand-in in tests.
 */

import type { Redis } from 'ioredis';

export type StreamEntryTuple = [id: string, fields: string[]];

export interface DeliveryRedisClient {
  /** XADD key * field value ... */
  xadd(key: string, fields: Record<string, string>): Promise<string | null>;
  /** XRANGE key start end COUNT n; `start` may use the "(" exclusive prefix. */
  xrange(key: string, start: string, end: string, count: number): Promise<StreamEntryTuple[]>;
  /** XREVRANGE key end start COUNT n */
  xrevrange(key: string, end: string, start: string, count: number): Promise<StreamEntryTuple[]>;
  /** XREAD COUNT n BLOCK ms STREAMS key id; null on timeout. */
  xread(key: string, afterId: string, count: number, blockMs: number): Promise<StreamEntryTuple[] | null>;
  /** XTRIM key MINID ~ id */
  xtrimMinId(key: string, minId: string): Promise<number>;
  /**
   * `max-deleted-entry-id` from XINFO STREAM. Null when the stream does not
   * exist or the server predates Redis 7 and does not report it.
   */
  xinfoMaxDeletedId(key: string): Promise<string | null>;
  get(key: string): Promise<string | null>;
  /** SET key value EX seconds */
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export function fromIoredis(redis: Redis): DeliveryRedisClient {
  return {
    xadd(key, fields) {
      const args = Object.entries(fields).flat();
      return redis.xadd(key, '*', ...args);
    },
    xrange(key, start, end, count) {
      return redis.xrange(key, start, end, 'COUNT', count);
    },
    xrevrange(key, end, start, count) {
      return redis.xrevrange(key, end, start, 'COUNT', count);
    },
    async xread(key, afterId, count, blockMs) {
      const response = await redis.xread('COUNT', count, 'BLOCK', blockMs, 'STREAMS', key, afterId);
      if (!response) return null;
      const stream = response.find(([name]) => name === key);
      return stream ? stream[1] : [];
    },
    xtrimMinId(key, minId) {
      return redis.xtrim(key, 'MINID', '~', minId);
    },
    async xinfoMaxDeletedId(key) {
      let info: unknown;
      try {
        info = await redis.xinfo('STREAM', key);
      } catch (error) {
        if (error instanceof Error && /no such key/i.test(error.message)) return null;
        throw error;
      }
      if (!Array.isArray(info)) return null;
      for (let i = 0; i + 1 < info.length; i += 2) {
        if (info[i] === 'max-deleted-entry-id') {
          const value: unknown = info[i + 1];
          return typeof value === 'string' ? value : null;
        }
      }
      return null;
    },
    get(key) {
      return redis.get(key);
    },
    async setWithTtl(key, value, ttlSeconds) {
      await redis.set(key, value, 'EX', ttlSeconds);
    },
  };
}

/** Turn the flat [field, value, field, value] list of a stream entry into a record. */
export function fieldsToRecord(fields: string[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      record[key] = value;
    }
  }
  return record;
}
