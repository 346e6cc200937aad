import { STREAM_BEGINNING, isAfter, type StreamEntryId } from './streamEntryId';

/**
 * The "last forwarded entry" of one connection.
 *
 * Written by the session after each successful send and read by its periodic
 * sync task. Both run on the same event loop, so a read or an advance is never
 * observed half-done. The value only moves forward.
 */
export class CursorCell {
  private value: StreamEntryId;

  constructor(initial: StreamEntryId = STREAM_BEGINNING) {
    this.value = initial;
  }

  read(): StreamEntryId {
    return this.value;
  }

  /** Returns false (and keeps the current value) when `id` is not newer. */
  advance(id: StreamEntryId): boolean {
    if (!isAfter(id, this.value)) {
      return false;
    }
    this.value = id;
    return true;
  }
}
