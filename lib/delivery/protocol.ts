import { z } from 'zod';
import type { InboundFrame, OutboundFrame } from './types';

const InboundFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('typing'), typing: z.boolean() }),
  z.object({ type: z.literal('get_unacked') }),
]);

/**
 * Decode a client text frame. Anything that is not a frame this server
 * understands comes back as null and is dropped by the caller.
 */
export function decodeInboundFrame(text: string): InboundFrame | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  const result = InboundFrameSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export function encodeOutboundFrame(frame: OutboundFrame): string {
  return JSON.stringify(frame);
}
