import { describe, it, expect } from 'vitest';
import { DatagramDecoder, encodeDatagram, MAX_DATAGRAM_BYTES } from './datagrams.js';
import { decodeFrame, encodeFrame, FrameKind } from './frames.js';

describe('DatagramDecoder', () => {
  it('restores datagram boundaries from arbitrary chunks', () => {
    const wire = Buffer.concat([encodeDatagram(Buffer.from('ping')), encodeDatagram(Buffer.alloc(0)), encodeDatagram(Buffer.from('pong!'))]);
    const decoder = new DatagramDecoder();

    const first = decoder.push(wire.subarray(0, 5));
    const rest = decoder.push(wire.subarray(5));

    expect(first.map((d) => d.toString())).toEqual([]);
    expect(rest.map((d) => d.toString())).toEqual(['ping', '', 'pong!']);
  });

  it('refuses datagrams that do not fit the length prefix', () => {
    expect(() => encodeDatagram(Buffer.alloc(MAX_DATAGRAM_BYTES + 1))).toThrow('datagram too large: 65536 bytes');
  });
});

describe('frames', () => {
  it('carries kind, stream id and payload', () => {
    const frame = decodeFrame(encodeFrame(FrameKind.DATA, 7, Buffer.from('abc')));

    expect(frame.kind).toBe(FrameKind.DATA);
    expect(frame.streamId).toBe(7);
    expect(frame.payload.toString()).toBe('abc');
  });

  it('rejects short and unknown frames', () => {
    expect(() => decodeFrame(Buffer.from([4, 0, 0]))).toThrow('short frame (3 bytes)');
    expect(() => decodeFrame(Buffer.from([9, 0, 0, 0, 1]))).toThrow('unknown frame kind 9');
  });
});
