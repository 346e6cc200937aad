/**
 * Stream entry identifiers as assigned by Redis Streams: "<ms>-<seq>".
 *
 * The string form is opaque to clients, but the server has to compare ids to
 * keep cursors monotonic and to drop duplicates at the catch-up/live seam.
 * Comparison is numeric on (ms, seq); plain string comparison breaks as soon
 * as the sequence part gains a digit.
 */

export type StreamEntryId = string;

/** Beginning of retained history. */
export const STREAM_BEGINNING: StreamEntryId = '0';

type ParsedEntryId = { ms: number; seq: number };

const ENTRY_ID_PATTERN = /^(\d+)(?:-(\d+))?$/;

export function parseStreamEntryId(id: string): ParsedEntryId | null {
  const match = ENTRY_ID_PATTERN.exec(id);
  if (!match) return null;

  const ms = Number(match[1]);
  const seq = match[2] === undefined ? 0 : Number(match[2]);
  if (!Number.isSafeInteger(ms) || !Number.isSafeInteger(seq)) {
    return null;
  }
  return { ms, seq };
}

/**
 * Compare two ids: negative if a < b, 0 if equal, positive if a > b.
 * Unparseable ids sort before everything.
 */
export function compareStreamEntryIds(a: StreamEntryId, b: StreamEntryId): number {
  const pa = parseStreamEntryId(a);
  const pb = parseStreamEntryId(b);
  if (!pa || !pb) {
    if (pa) return 1;
    if (pb) return -1;
    return 0;
  }
  if (pa.ms !== pb.ms) return pa.ms - pb.ms;
  return pa.seq - pb.seq;
}

export function isAfter(candidate: StreamEntryId, reference: StreamEntryId): boolean {
  return compareStreamEntryIds(candidate, reference) > 0;
}

export function maxStreamEntryId(a: StreamEntryId, b: StreamEntryId): StreamEntryId {
  return compareStreamEntryIds(a, b) >= 0 ? a : b;
}

/** Millisecond timestamp encoded in the id (0 for the sentinel). */
export function entryTimestamp(id: StreamEntryId): number {
  return parseStreamEntryId(id)?.ms ?? 0;
}

/** Smallest id still inside a retention window ending at `nowMs`. */
export function retentionCutoffId(nowMs: number, retentionMs: number): StreamEntryId {
  return `${Math.max(0, nowMs - retentionMs)}-0`;
}

/**
 * True when a cursor points at history the log no longer guarantees to keep.
 * The sentinel never predates retention: it means "everything retained".
 */
export function predatesRetention(cursor: StreamEntryId, nowMs: number, retentionMs: number): boolean {
  if (cursor === STREAM_BEGINNING) return false;
  return compareStreamEntryIds(cursor, retentionCutoffId(nowMs, retentionMs)) < 0;
}
