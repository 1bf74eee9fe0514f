/**
 * Multiplexed transport session
 *
 * Carries many independent duplex streams over one WebSocket to an edge
 * gateway. The dialing side allocates odd stream ids and the accepting side
 * even ones, so both can open streams without coordination.
 */

import { Duplex } from 'stream';
import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { decodeFrame, encodeFrame, FrameKind } from './frames.js';
import type { Frame } from './frames.js';
import { isMessageType, MessageType } from '../types/Protocol.js';
import type { IncomingStream, OpenedStream, SessionOptions, TransportSession } from '../types/Protocol.js';
import { errorMessage, toError, TransportError } from '../utils/errors.js';

type Role = 'dialer' | 'listener';

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30000;
/** Writes wait for the socket to flush once this much is queued on it */
const SEND_HIGH_WATER_MARK = 1024 * 1024;
const EMPTY = Buffer.alloc(0);

export class MuxStream extends Duplex {
  private finSent = false;
  private finReceived = false;
  private resetByPeer = false;

  constructor(
    readonly id: number,
    private readonly session: MuxSession,
  ) {
    super({ allowHalfOpen: true });
  }

  _read(): void {
    this.session.unthrottle(this.id);
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    try {
      if (this.session.bufferedAmount < SEND_HIGH_WATER_MARK) {
        this.session.sendFrame(FrameKind.DATA, this.id, chunk);
        callback();
      } else {
        this.session.sendFrame(FrameKind.DATA, this.id, chunk, (err) => callback(err ?? null));
      }
    } catch (err) {
      callback(toError(err));
    }
  }

  _final(callback: (error?: Error | null) => void): void {
    try {
      this.session.sendFrame(FrameKind.CLOSE, this.id);
      this.finSent = true;
      callback();
    } catch (err) {
      callback(toError(err));
    }
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    const graceful = this.finSent && this.finReceived;
    this.session.release(this.id, !graceful && !this.resetByPeer, error);
    callback(error);
  }

  /** @internal */
  receiveData(payload: Buffer): void {
    if (!this.finReceived && !this.push(payload)) {
      this.session.throttle(this.id);
    }
  }

  /** @internal */
  receiveClose(): void {
    if (!this.finReceived) {
      this.finReceived = true;
      this.push(null);
    }
  }

  /** @internal */
  receiveReset(reason: string): void {
    this.resetByPeer = true;
    this.destroy(new TransportError(reason ? `stream reset by peer: ${reason}` : 'stream reset by peer'));
  }
}

interface PendingOpen {
  resolve: (opened: OpenedStream) => void;
  reject: (error: Error) => void;
}

interface Acceptor {
  resolve: (incoming: IncomingStream) => void;
  reject: (error: Error) => void;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class MuxSession implements TransportSession {
  private readonly streams = new Map<number, MuxStream>();
  private readonly pendingOpens = new Map<number, PendingOpen>();
  private readonly backlog: IncomingStream[] = [];
  private readonly acceptors: Acceptor[] = [];
  /** Streams whose read buffer is full; the socket stays paused while any remain */
  private readonly throttled = new Set<number>();
  private nextStreamId: number;
  private closeError: TransportError | null = null;

  constructor(
    private readonly ws: WebSocket,
    role: Role,
  ) {
    this.nextStreamId = role === 'dialer' ? 1 : 2;

    ws.on('message', (data: RawData) => this.handleMessage(toBuffer(data)));
    ws.on('close', (code: number, reason: Buffer) => {
      const detail = reason.length > 0 ? `: ${reason.toString()}` : '';
      this.shutdown(new TransportError(`session closed by peer (code ${code}${detail})`));
    });
    ws.on('error', (err: Error) => {
      this.shutdown(new TransportError(`session error: ${err.message}`));
    });
  }

  get isClosed(): boolean {
    return this.closeError !== null;
  }

  get streamCount(): number {
    return this.streams.size;
  }

  get bufferedAmount(): number {
    return this.ws.bufferedAmount;
  }

  openStream(type: MessageType, payload: Buffer = EMPTY): Promise<OpenedStream> {
    if (this.closeError) {
      return Promise.reject(this.closeError);
    }

    const id = this.nextStreamId;
    this.nextStreamId += 2;

    return new Promise((resolve, reject) => {
      this.pendingOpens.set(id, { resolve, reject });
      try {
        this.sendFrame(FrameKind.OPEN, id, Buffer.concat([Buffer.from([type]), payload]));
      } catch (err) {
        this.pendingOpens.delete(id);
        reject(toError(err));
      }
    });
  }

  async openPlainStream(): Promise<Duplex> {
    const { stream } = await this.openStream(MessageType.Plain);
    return stream;
  }

  acceptStream(): Promise<IncomingStream> {
    const queued = this.backlog.shift();
    if (queued) {
      return Promise.resolve(queued);
    }

    if (this.closeError) {
      return Promise.reject(this.closeError);
    }

    return new Promise((resolve, reject) => {
      this.acceptors.push({ resolve, reject });
    });
  }

  close(): void {
    if (this.closeError) return;
    this.shutdown(new TransportError('session closed'));
    this.ws.close(1000);
  }

  /** @internal */
  sendFrame(kind: FrameKind, streamId: number, payload?: Buffer, onFlushed?: (err?: Error) => void): void {
    if (this.closeError) {
      throw this.closeError;
    }

    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new TransportError('session is not open');
    }

    this.ws.send(encodeFrame(kind, streamId, payload), (err) => {
      if (err) {
        this.shutdown(new TransportError(`session write failed: ${err.message}`));
      }
      onFlushed?.(err);
    });
  }

  /** @internal Stops reading from the socket until the stream drains. */
  throttle(streamId: number): void {
    if (this.throttled.has(streamId)) return;
    this.throttled.add(streamId);
    if (this.throttled.size === 1) {
      this.ws.pause();
    }
  }

  /** @internal */
  unthrottle(streamId: number): void {
    if (this.throttled.delete(streamId) && this.throttled.size === 0) {
      this.ws.resume();
    }
  }

  /** @internal Forgets a destroyed stream, telling the peer when it ended abruptly. */
  release(streamId: number, notifyPeer: boolean, error: Error | null): void {
    if (!this.streams.delete(streamId)) return;
    this.unthrottle(streamId);

    if (notifyPeer && !this.closeError && this.ws.readyState === WebSocket.OPEN) {
      this.sendFrame(FrameKind.RESET, streamId, Buffer.from(error ? error.message : ''));
    }
  }

  private handleMessage(data: Buffer): void {
    let frame: Frame;
    try {
      frame = decodeFrame(data);
    } catch (err) {
      this.shutdown(new TransportError(`protocol error: ${errorMessage(err)}`));
      this.ws.terminate();
      return;
    }

    switch (frame.kind) {
      case FrameKind.OPEN:
        this.handleOpen(frame);
        break;
      case FrameKind.OPEN_OK: {
        const pending = this.pendingOpens.get(frame.streamId);
        if (!pending) break;
        this.pendingOpens.delete(frame.streamId);
        pending.resolve({ stream: this.register(frame.streamId), response: frame.payload });
        break;
      }
      case FrameKind.OPEN_ERR: {
        const pending = this.pendingOpens.get(frame.streamId);
        if (!pending) break;
        this.pendingOpens.delete(frame.streamId);
        pending.reject(new TransportError(`error opening stream: ${frame.payload.toString('utf8')}`));
        break;
      }
      case FrameKind.DATA:
        this.streams.get(frame.streamId)?.receiveData(frame.payload);
        break;
      case FrameKind.CLOSE:
        this.streams.get(frame.streamId)?.receiveClose();
        break;
      case FrameKind.RESET:
        this.streams.get(frame.streamId)?.receiveReset(frame.payload.toString('utf8'));
        break;
    }
  }

  private handleOpen(frame: Frame): void {
    const type = frame.payload.length > 0 ? frame.payload.readUInt8(0) : -1;
    if (!isMessageType(type)) {
      this.sendFrame(FrameKind.OPEN_ERR, frame.streamId, Buffer.from(`unknown message type ${type}`));
      return;
    }

    const stream = this.register(frame.streamId);
    let answered = false;

    const incoming: IncomingStream = {
      type,
      payload: frame.payload.subarray(1),
      stream,
      accept: (response = EMPTY) => {
        if (answered) return;
        answered = true;
        this.sendFrame(FrameKind.OPEN_OK, frame.streamId, response);
      },
      reject: (reason: string) => {
        if (answered) return;
        answered = true;
        this.streams.delete(frame.streamId);
        stream.destroy();
        this.sendFrame(FrameKind.OPEN_ERR, frame.streamId, Buffer.from(reason));
      },
    };

    const acceptor = this.acceptors.shift();
    if (acceptor) {
      acceptor.resolve(incoming);
    } else {
      this.backlog.push(incoming);
    }
  }

  private register(streamId: number): MuxStream {
    const stream = new MuxStream(streamId, this);
    this.streams.set(streamId, stream);
    return stream;
  }

  private shutdown(error: TransportError): void {
    if (this.closeError) return;
    this.closeError = error;

    for (const pending of this.pendingOpens.values()) {
      pending.reject(error);
    }
    this.pendingOpens.clear();

    for (const acceptor of this.acceptors.splice(0)) {
      acceptor.reject(error);
    }

    for (const incoming of this.backlog.splice(0)) {
      incoming.stream.destroy(error);
    }

    for (const stream of [...this.streams.values()]) {
      stream.destroy(error);
    }
    this.streams.clear();
  }
}

/**
 * Opens an authenticated session to an edge URL (`wss://` in production,
 * `ws://` for local edges).
 */
export function connectSession(url: string, options: SessionOptions): Promise<MuxSession> {
  return new Promise((resolve, reject) => {
    const { signal } = options;
    if (signal?.aborted) {
      reject(new TransportError('session establishment aborted'));
      return;
    }

    const ws = new WebSocket(url, {
      headers: { Authorization: `Bearer ${options.token}` },
      rejectUnauthorized: !options.insecure,
      handshakeTimeout: options.handshakeTimeout ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
    });
    let aborted = false;

    const cleanup = () => {
      ws.off('open', onOpen);
      ws.off('error', onError);
      signal?.removeEventListener('abort', onAbort);
    };

    const onOpen = () => {
      const session = new MuxSession(ws, 'dialer');
      cleanup();
      resolve(session);
    };

    const onError = (err: Error) => {
      cleanup();
      reject(
        aborted
          ? new TransportError('session establishment aborted')
          : new TransportError(`error initializing remote access client: ${err.message}`),
      );
    };

    // terminate() during the handshake surfaces as an 'error' event
    const onAbort = () => {
      aborted = true;
      ws.terminate();
    };

    ws.on('open', onOpen);
    ws.on('error', onError);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
