import { describe, expect, it } from 'vitest';
import { decodeInboundFrame, encodeOutboundFrame } from '@/lib/delivery/protocol';

describe('decodeInboundFrame', () => {
  it('accepts ping, typing and get_unacked frames', () => {
    expect(decodeInboundFrame('{"type":"ping"}')).toEqual({ type: 'ping' });
    expect(decodeInboundFrame('{"type":"get_unacked"}')).toEqual({ type: 'get_unacked' });
    expect(decodeInboundFrame('{"type":"typing","typing":false}')).toEqual({ type: 'typing', typing: false });
  });

  it('ignores extra fields', () => {
    expect(decodeInboundFrame('{"type":"typing","typing":true,"conversation_id":"x"}')).toEqual({
      type: 'typing',
      typing: true,
    });
  });

  it.each([
    ['not json', 'hello'],
    ['a JSON array', '[{"type":"ping"}]'],
    ['a JSON string', '"ping"'],
    ['null', 'null'],
    ['an unknown type', '{"type":"subscribe"}'],
    ['typing without a boolean', '{"type":"typing","typing":"yes"}'],
  ])('returns null for %s', (_label, text) => {
    expect(decodeInboundFrame(text)).toBeNull();
  });
});

describe('encodeOutboundFrame', () => {
  it('serializes frames as JSON text', () => {
    expect(encodeOutboundFrame({ type: 'live', cursor: '10-2' })).toBe('{"type":"live","cursor":"10-2"}');
    expect(encodeOutboundFrame({ type: 'pong' })).toBe('{"type":"pong"}');
  });
});
