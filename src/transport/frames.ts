import { TransportError } from '../utils/errors.js';

/**
 * Session framing: every WebSocket binary message carries exactly one frame.
 *
 *   [kind u8][streamId u32 BE][payload...]
 */
export const FrameKind = {
  /** payload: [MessageType u8][initial payload] */
  OPEN: 1,
  /** payload: response bytes for the opener */
  OPEN_OK: 2,
  /** payload: UTF-8 reason */
  OPEN_ERR: 3,
  DATA: 4,
  /** sender finished writing */
  CLOSE: 5,
  /** stream aborted; payload: UTF-8 reason */
  RESET: 6,
} as const;

export type FrameKind = (typeof FrameKind)[keyof typeof FrameKind];

export const FRAME_HEADER_BYTES = 5;

const FRAME_KINDS: ReadonlySet<number> = new Set(Object.values(FrameKind));

export interface Frame {
  kind: FrameKind;
  streamId: number;
  payload: Buffer;
}

function isFrameKind(value: number): value is FrameKind {
  return FRAME_KINDS.has(value);
}

export function encodeFrame(kind: FrameKind, streamId: number, payload: Buffer = Buffer.alloc(0)): Buffer {
  if (!Number.isInteger(streamId) || streamId < 0 || streamId > 0xffffffff) {
    throw new TransportError(`invalid stream id ${streamId}`);
  }

  const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.length);
  frame.writeUInt8(kind, 0);
  frame.writeUInt32BE(streamId, 1);
  payload.copy(frame, FRAME_HEADER_BYTES);
  return frame;
}

export function decodeFrame(data: Buffer): Frame {
  if (data.length < FRAME_HEADER_BYTES) {
    throw new TransportError(`short frame (${data.length} bytes)`);
  }

  const kind = data.readUInt8(0);
  if (!isFrameKind(kind)) {
    throw new TransportError(`unknown frame kind ${kind}`);
  }

  return {
    kind,
    streamId: data.readUInt32BE(1),
    payload: data.subarray(FRAME_HEADER_BYTES),
  };
}
