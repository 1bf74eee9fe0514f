import dgram from 'dgram';
import net from 'net';
import type { Duplex, Readable, Writable } from 'stream';
import { DatagramDecoder, encodeDatagram } from '../transport/datagrams.js';
import { MessageType } from '../types/Protocol.js';
import type { TransportSession } from '../types/Protocol.js';
import { STDIO_PORT } from '../types/Target.js';
import type { BoundTarget, TargetDescriptor } from '../types/Target.js';
import { errorMessage, ParseError, toError, TransportError, TunnelError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { runScoped, whenAborted } from '../utils/scope.js';
import { bridgeStreams, pipeUntilEnd } from '../utils/streams.js';

export const DEFAULT_UDP_IDLE_TIMEOUT_MS = 60 * 1000;

export interface TunnelBridgeOptions {
  stdin?: Readable;
  stdout?: Writable;
  logger?: Logger;
  /** UDP peers silent in both directions this long lose their stream */
  udpIdleTimeout?: number;
  /** Called once every local listener is bound */
  onReady?: (bound: BoundTarget[]) => void;
}

interface OpenTunnel {
  bound: BoundTarget;
  close(): void;
}

interface UdpFlow {
  stream: Duplex | null;
  queued: Buffer[];
  lastActive: number;
}

function remoteAddress(target: TargetDescriptor): string {
  return `${target.remoteHost}:${target.remotePort}`;
}

function localAddress(target: TargetDescriptor): string {
  return `${target.localHost}:${target.localPort}`;
}

function localPortOf(target: TargetDescriptor): number {
  if (target.localPort === STDIO_PORT) {
    throw new ParseError('stdio is only supported for single target connections');
  }
  return target.localPort;
}

/**
 * Forwards local ports (or stdin/stdout) to a device over one transport
 * session. `run` returns when the signal aborts and throws when the session
 * dies.
 */
export class TunnelBridge {
  private readonly stdin: Readable;
  private readonly stdout: Writable;
  private readonly logger: Logger;
  private readonly udpIdleTimeout: number;
  private readonly onReady?: (bound: BoundTarget[]) => void;

  constructor(
    private readonly session: TransportSession,
    private readonly deviceId: string,
    options: TunnelBridgeOptions = {},
  ) {
    this.stdin = options.stdin ?? process.stdin;
    this.stdout = options.stdout ?? process.stdout;
    this.logger = options.logger ?? silentLogger;
    this.udpIdleTimeout = options.udpIdleTimeout ?? DEFAULT_UDP_IDLE_TIMEOUT_MS;
    this.onReady = options.onReady;
  }

  async run(targets: TargetDescriptor[], signal: AbortSignal): Promise<void> {
    if (targets.length === 0) {
      throw new ParseError(`no targets defined for device ${this.deviceId}`);
    }

    if (targets.length === 1 && targets[0].localPort === STDIO_PORT) {
      await this.runStdio(targets[0], signal);
      return;
    }

    if (targets.some((target) => target.localPort === STDIO_PORT)) {
      throw new ParseError('stdio is only supported for single target connections');
    }

    const tunnels: OpenTunnel[] = [];
    try {
      for (const target of targets) {
        const tunnel = target.protocol === 'udp' ? await this.openUdpTunnel(target) : await this.openTcpTunnel(target);
        tunnels.push(tunnel);
        this.logger.info(
          `Tunneling ${target.protocol} ${target.localHost}:${tunnel.bound.localPort} to ${remoteAddress(target)}`,
        );
      }

      this.onReady?.(tunnels.map((tunnel) => tunnel.bound));
      await this.waitForSessionEnd(signal);
    } finally {
      for (const tunnel of tunnels) {
        tunnel.close();
      }
    }
  }

  private async runStdio(target: TargetDescriptor, signal: AbortSignal): Promise<void> {
    const { stream } = await this.session.openStream(MessageType.TCPTunnel, Buffer.from(remoteAddress(target)));

    try {
      await runScoped(
        [
          async (scope) => {
            await pipeUntilEnd(this.stdin, stream, scope);
            if (!scope.aborted) {
              stream.end();
            }
          },
          (scope) => pipeUntilEnd(stream, this.stdout, scope),
        ],
        signal,
      );
    } finally {
      stream.destroy();
    }
  }

  private async openTcpTunnel(target: TargetDescriptor): Promise<OpenTunnel> {
    const remote = remoteAddress(target);
    const sockets = new Set<net.Socket>();

    const server = net.createServer((socket) => {
      sockets.add(socket);
      socket.once('close', () => sockets.delete(socket));
      void this.forwardConnection(socket, remote);
    });

    const port = await this.listen(server, target);
    server.on('error', (err) => this.logger.error(`TCP tunnel on ${localAddress(target)} failed: ${err.message}`));

    return {
      bound: { target, localAddress: target.localHost, localPort: port },
      close: () => {
        server.close();
        for (const socket of sockets) {
          socket.destroy();
        }
      },
    };
  }

  private listen(server: net.Server, target: TargetDescriptor): Promise<number> {
    return new Promise((resolve, reject) => {
      const fail = (err: Error) => {
        reject(new TunnelError(`error opening TCP tunnel on ${localAddress(target)}: ${err.message}`, { cause: err }));
      };

      server.once('error', fail);
      server.listen(localPortOf(target), target.localHost, () => {
        server.off('error', fail);
        const address = server.address();
        resolve(address !== null && typeof address === 'object' ? address.port : 0);
      });
    });
  }

  private async forwardConnection(socket: net.Socket, remote: string): Promise<void> {
    socket.on('error', (err) => this.logger.debug(`local connection error: ${err.message}`));

    let stream: Duplex;
    try {
      ({ stream } = await this.session.openStream(MessageType.TCPTunnel, Buffer.from(remote)));
    } catch (err) {
      this.logger.warn(`error opening stream to ${remote}: ${errorMessage(err)}`);
      socket.destroy();
      return;
    }

    if (socket.destroyed) {
      stream.destroy();
      return;
    }

    stream.on('error', (err) => this.logger.debug(`tunnel stream error: ${err.message}`));
    await bridgeStreams(socket, stream);
  }

  private async openUdpTunnel(target: TargetDescriptor): Promise<OpenTunnel> {
    const remote = remoteAddress(target);
    const socket = dgram.createSocket(net.isIPv6(target.localHost) ? 'udp6' : 'udp4');
    const flows = new Map<string, UdpFlow>();

    const openFlow = async (key: string, flow: UdpFlow, peer: dgram.RemoteInfo) => {
      let stream: Duplex;
      try {
        ({ stream } = await this.session.openStream(MessageType.UDPTunnel, Buffer.from(remote)));
      } catch (err) {
        this.logger.warn(`error opening UDP stream to ${remote}: ${errorMessage(err)}`);
        flows.delete(key);
        return;
      }

      if (flows.get(key) !== flow) {
        stream.destroy();
        return;
      }

      const decoder = new DatagramDecoder();
      stream.on('data', (chunk: Buffer) => {
        flow.lastActive = Date.now();
        for (const datagram of decoder.push(chunk)) {
          socket.send(datagram, peer.port, peer.address);
        }
      });
      stream.on('error', (err) => this.logger.debug(`UDP stream error: ${err.message}`));
      stream.once('close', () => {
        if (flows.get(key) === flow) flows.delete(key);
      });

      flow.stream = stream;
      for (const datagram of flow.queued.splice(0)) {
        stream.write(encodeDatagram(datagram));
      }
    };

    socket.on('message', (datagram, peer) => {
      const key = `${peer.address}:${peer.port}`;
      const existing = flows.get(key);
      if (existing) {
        existing.lastActive = Date.now();
      }

      if (existing?.stream) {
        existing.stream.write(encodeDatagram(datagram));
        return;
      }

      if (existing) {
        existing.queued.push(datagram);
        return;
      }

      const flow: UdpFlow = { stream: null, queued: [datagram], lastActive: Date.now() };
      flows.set(key, flow);
      void openFlow(key, flow, peer);
    });

    const port = await new Promise<number>((resolve, reject) => {
      const fail = (err: Error) => {
        reject(new TunnelError(`error opening UDP tunnel on ${localAddress(target)}: ${err.message}`, { cause: err }));
      };
      socket.once('error', fail);
      socket.bind(localPortOf(target), target.localHost, () => {
        socket.off('error', fail);
        resolve(socket.address().port);
      });
    });
    socket.on('error', (err) => this.logger.error(`UDP tunnel on ${localAddress(target)} failed: ${err.message}`));

    const sweep = setInterval(() => {
      const idleSince = Date.now() - this.udpIdleTimeout;
      for (const [key, flow] of flows) {
        if (flow.lastActive <= idleSince) {
          this.logger.debug(`closing idle UDP flow from ${key}`);
          flows.delete(key);
          flow.stream?.destroy();
        }
      }
    }, Math.max(this.udpIdleTimeout / 2, 10));
    sweep.unref();

    return {
      bound: { target, localAddress: target.localHost, localPort: port },
      close: () => {
        clearInterval(sweep);
        socket.close();
        for (const flow of flows.values()) {
          flow.stream?.destroy();
        }
        flows.clear();
      },
    };
  }

  /** Refuses inbound streams until the session dies or the signal aborts. */
  private async waitForSessionEnd(signal: AbortSignal): Promise<void> {
    const acceptLoop = async (): Promise<never> => {
      for (;;) {
        const incoming = await this.session.acceptStream();
        incoming.reject('inbound streams are not supported');
      }
    };

    const outcome = await Promise.race([
      acceptLoop().then(
        () => null,
        (err: unknown) => toError(err),
      ),
      whenAborted(signal).then(() => null),
    ]);

    if (outcome !== null) {
      this.session.close();
      throw new TransportError(`session error for device ${this.deviceId}: ${outcome.message}`, { cause: outcome });
    }

    this.logger.info('Connection closed');
  }
}
