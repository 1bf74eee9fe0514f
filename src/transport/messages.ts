import type { Duplex } from 'stream';
import { isMessageType, MessageType } from '../types/Protocol.js';
import { TransportError } from '../utils/errors.js';

/**
 * In-stream control messages: [type u8][length u32 BE][payload].
 * Used on short-lived control streams such as terminal resizes.
 */
const MESSAGE_HEADER_BYTES = 5;

export interface ControlMessage {
  type: MessageType;
  payload: Buffer;
}

export function encodeMessage(type: MessageType, payload: Buffer = Buffer.alloc(0)): Buffer {
  const header = Buffer.allocUnsafe(MESSAGE_HEADER_BYTES);
  header.writeUInt8(type, 0);
  header.writeUInt32BE(payload.length, 1);
  return Buffer.concat([header, payload]);
}

export function writeMessage(stream: Duplex, type: MessageType, payload?: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(encodeMessage(type, payload), (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Reads exactly one control message. Bytes after it are put back on the
 * stream.
 */
export function readMessage(stream: Duplex): Promise<ControlMessage> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed) {
      reject(new TransportError('stream closed before a complete message was received'));
      return;
    }

    let buffered = Buffer.alloc(0);

    const cleanup = () => {
      stream.off('data', onData);
      stream.off('end', onEnd);
      stream.off('error', onError);
      stream.off('close', onClose);
    };

    const onData = (chunk: Buffer) => {
      buffered = Buffer.concat([buffered, chunk]);
      if (buffered.length < MESSAGE_HEADER_BYTES) return;

      const length = buffered.readUInt32BE(1);
      const total = MESSAGE_HEADER_BYTES + length;
      if (buffered.length < total) return;

      cleanup();
      stream.pause();
      if (buffered.length > total) {
        stream.unshift(buffered.subarray(total));
      }

      const type = buffered.readUInt8(0);
      if (!isMessageType(type)) {
        reject(new TransportError(`unknown message type ${type}`));
        return;
      }
      resolve({ type, payload: buffered.subarray(MESSAGE_HEADER_BYTES, total) });
    };

    const onEnd = () => {
      cleanup();
      reject(new TransportError('stream ended before a complete message was received'));
    };

    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    const onClose = () => {
      cleanup();
      reject(new TransportError('stream closed before a complete message was received'));
    };

    stream.on('data', onData);
    stream.once('end', onEnd);
    stream.once('error', onError);
    stream.once('close', onClose);
  });
}

/** Waits for an OK acknowledgement; an Error message becomes a TransportError. */
export async function expectOK(stream: Duplex): Promise<Buffer> {
  const message = await readMessage(stream);

  if (message.type === MessageType.OK) {
    return message.payload;
  }

  if (message.type === MessageType.Error) {
    throw new TransportError(message.payload.toString('utf8'));
  }

  throw new TransportError(`expected OK, got message type ${message.type}`);
}
