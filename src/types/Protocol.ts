import type { Duplex } from 'stream';

/** Type tag carried by every stream open request and in-stream control message */
export const MessageType = {
  Plain: 0,
  TCPTunnel: 1,
  UDPTunnel: 2,
  PTY: 3,
  PTYCommand: 4,
  OK: 5,
  Error: 6,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

const MESSAGE_TYPES: ReadonlySet<number> = new Set(Object.values(MessageType));

export function isMessageType(value: number): value is MessageType {
  return MESSAGE_TYPES.has(value);
}

/** A stream opened by this side together with the peer's response payload */
export interface OpenedStream {
  stream: Duplex;
  response: Buffer;
}

/** A stream the peer asked to open; it must be accepted or rejected */
export interface IncomingStream {
  type: MessageType;
  payload: Buffer;
  stream: Duplex;
  accept(response?: Buffer): void;
  reject(reason: string): void;
}

/** One authenticated multiplexed connection to an edge gateway */
export interface TransportSession {
  openStream(type: MessageType, payload?: Buffer): Promise<OpenedStream>;
  openPlainStream(): Promise<Duplex>;
  acceptStream(): Promise<IncomingStream>;
  close(): void;
  readonly isClosed: boolean;
}

export interface SessionOptions {
  /** Bearer token presented to the edge */
  token: string;
  /** Skip certificate verification (local and test edges) */
  insecure?: boolean;
  signal?: AbortSignal;
  handshakeTimeout?: number;
}

export type SessionDialer = (url: string, options: SessionOptions) => Promise<TransportSession>;
