import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { encodeMessage, expectOK, readMessage } from './messages.js';
import { MessageType } from '../types/Protocol.js';

describe('control messages', () => {
  it('reads one message split across chunks and keeps the rest', async () => {
    const stream = new PassThrough();
    const encoded = encodeMessage(MessageType.PTYCommand, Buffer.from('{"type":"resize"}'));

    const reading = readMessage(stream);
    stream.write(encoded.subarray(0, 3));
    stream.write(Buffer.concat([encoded.subarray(3), Buffer.from('tail')]));

    const message = await reading;
    expect(message.type).toBe(MessageType.PTYCommand);
    expect(message.payload.toString()).toBe('{"type":"resize"}');
    expect(stream.read()?.toString()).toBe('tail');
  });

  it('returns the payload of an OK reply', async () => {
    const stream = new PassThrough();
    stream.end(encodeMessage(MessageType.OK, Buffer.from('done')));

    const payload = await expectOK(stream);
    expect(payload.toString()).toBe('done');
  });

  it('turns an Error reply into a rejection with its text', async () => {
    const stream = new PassThrough();
    stream.end(encodeMessage(MessageType.Error, Buffer.from('no such session')));

    await expect(expectOK(stream)).rejects.toThrow('no such session');
  });

  it('rejects when the stream ends mid-message', async () => {
    const stream = new PassThrough();
    stream.end(encodeMessage(MessageType.OK, Buffer.from('abcdef')).subarray(0, 7));

    await expect(readMessage(stream)).rejects.toThrow('stream ended before a complete message was received');
  });
});
