import { TransportError } from '../utils/errors.js';

/**
 * UDP flows run over a byte stream, so each datagram is prefixed with its
 * length (u16 BE) to keep message boundaries.
 */
const LENGTH_BYTES = 2;
export const MAX_DATAGRAM_BYTES = 0xffff;

export function encodeDatagram(datagram: Buffer): Buffer {
  if (datagram.length > MAX_DATAGRAM_BYTES) {
    throw new TransportError(`datagram too large: ${datagram.length} bytes`);
  }

  const header = Buffer.allocUnsafe(LENGTH_BYTES);
  header.writeUInt16BE(datagram.length, 0);
  return Buffer.concat([header, datagram]);
}

export class DatagramDecoder {
  private buffered: Buffer = Buffer.alloc(0);

  /** Returns every datagram completed by `chunk`. */
  push(chunk: Buffer): Buffer[] {
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);

    const datagrams: Buffer[] = [];
    while (this.buffered.length >= LENGTH_BYTES) {
      const length = this.buffered.readUInt16BE(0);
      if (this.buffered.length < LENGTH_BYTES + length) break;

      datagrams.push(this.buffered.subarray(LENGTH_BYTES, LENGTH_BYTES + length));
      this.buffered = this.buffered.subarray(LENGTH_BYTES + length);
    }

    return datagrams;
  }
}
