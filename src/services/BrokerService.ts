import type { TargetDescriptor } from '../types/Target.js';
import { ParseError, toError, TunnelError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { getFreePort, waitForPort } from '../utils/ports.js';
import { isValidDeviceId, parsePort } from '../utils/targets.js';
import { ConnectionCache, connectionKey, DEFAULT_CLEANUP_INTERVAL_MS } from './ConnectionCache.js';
import type { DeviceStatusResolver } from './DeviceStatusResolver.js';

/** Runs a tunnel for a device until the signal aborts or it fails */
export type TunnelRunner = (deviceId: string, targets: TargetDescriptor[], signal: AbortSignal) => Promise<void>;

export const DEFAULT_REAUTH_INTERVAL_MS = 10 * 60 * 1000;
export const DEFAULT_PORT_READY_TIMEOUT_MS = 30 * 1000;
const PORT_POLL_INTERVAL_MS = 50;

export interface BrokerServiceOptions {
  resolver: Pick<DeviceStatusResolver, 'resolveDeviceIdentifier'>;
  runTunnel: TunnelRunner;
  /** Host the device-side end of every tunnel connects to */
  remoteHost: string;
  cache?: ConnectionCache;
  cleanupInterval?: number;
  portReadyTimeout?: number;
  portPollInterval?: number;
  reauthInterval?: number;
  /** Renews the management login; a failure is passed to `onFatal` */
  reauthenticate?: () => Promise<void>;
  onFatal?: (err: Error) => void;
  allocatePort?: () => Promise<number>;
  logger?: Logger;
}

type EstablishOutcome = { kind: 'ready'; ready: boolean } | { kind: 'ended'; error: Error | null };

/**
 * Keeps one tunnel per device and port alive for the reverse proxy.
 * Tunnels are opened on first use and closed after going idle.
 */
export class BrokerService {
  readonly cache: ConnectionCache;
  private readonly pending = new Map<string, Promise<number>>();
  private readonly logger: Logger;
  private readonly allocatePort: () => Promise<number>;
  private readonly onFatal: (err: Error) => void;
  private stopCleanup: (() => void) | null = null;
  private reauthTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: BrokerServiceOptions) {
    this.cache = options.cache ?? new ConnectionCache();
    this.logger = options.logger ?? silentLogger;
    this.allocatePort = options.allocatePort ?? (() => getFreePort('localhost'));
    this.onFatal =
      options.onFatal ??
      ((err) => {
        this.logger.error(`re-authentication failed: ${err.message}`);
        process.exit(1);
      });
  }

  start(): void {
    if (this.stopCleanup) return;

    this.stopCleanup = this.cache.startCleanup(this.options.cleanupInterval ?? DEFAULT_CLEANUP_INTERVAL_MS, (keys) =>
      this.logger.info(`Closed idle tunnels: ${keys.join(', ')}`),
    );

    const { reauthenticate } = this.options;
    if (reauthenticate) {
      this.reauthTimer = setInterval(() => {
        reauthenticate().catch((err: unknown) => this.onFatal(toError(err)));
      }, this.options.reauthInterval ?? DEFAULT_REAUTH_INTERVAL_MS);
      this.reauthTimer.unref();
    }
  }

  /** Stops the background loops and closes every tunnel. */
  stop(): void {
    this.stopCleanup?.();
    this.stopCleanup = null;
    if (this.reauthTimer) {
      clearInterval(this.reauthTimer);
      this.reauthTimer = null;
    }
    this.cache.clear();
  }

  /**
   * Returns the local port forwarding to `devicePort` on the device,
   * opening the tunnel if needed. Concurrent callers for the same key share
   * one attempt.
   */
  doPortForwarding(deviceId: string, devicePort: string): Promise<number> {
    const key = connectionKey(deviceId, devicePort);

    const cached = this.cache.get(key);
    if (cached) {
      return Promise.resolve(cached.localPort);
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const attempt = this.establish(key, deviceId, devicePort).finally(() => this.pending.delete(key));
    this.pending.set(key, attempt);
    return attempt;
  }

  private async establish(key: string, deviceId: string, devicePort: string): Promise<number> {
    const remotePort = parsePort(devicePort);
    const nodeId = await this.options.resolver.resolveDeviceIdentifier(deviceId);
    if (!isValidDeviceId(nodeId)) {
      throw new ParseError(`invalid device ID ${nodeId}`);
    }

    const localPort = await this.allocatePort();
    const target: TargetDescriptor = {
      protocol: 'tcp',
      localHost: 'localhost',
      localPort,
      remoteHost: this.options.remoteHost,
      remotePort,
    };

    const tunnel = new AbortController();
    const tunnelEnded = this.options.runTunnel(nodeId, [target], tunnel.signal).then(
      () => null,
      (err: unknown) => toError(err),
    );

    const polling = new AbortController();
    const outcome = await Promise.race([
      waitForPort(localPort, {
        interval: this.options.portPollInterval ?? PORT_POLL_INTERVAL_MS,
        timeout: this.options.portReadyTimeout ?? DEFAULT_PORT_READY_TIMEOUT_MS,
        signal: polling.signal,
      }).then((ready): EstablishOutcome => ({ kind: 'ready', ready })),
      tunnelEnded.then((error): EstablishOutcome => ({ kind: 'ended', error })),
    ]);
    polling.abort();

    if (outcome.kind === 'ended') {
      tunnel.abort();
      throw outcome.error ?? new TunnelError(`tunnel to ${key} closed before port ${localPort} was ready`);
    }

    if (!outcome.ready) {
      tunnel.abort();
      throw new TunnelError(`port ${localPort} is not ready`);
    }

    const handle = this.cache.add(key, localPort, () => tunnel.abort());
    this.logger.info(`Forwarding ${key} through local port ${localPort}`);

    void tunnelEnded.then((error) => {
      if (this.cache.remove(key, handle) && error) {
        this.logger.warn(`Tunnel ${key} ended: ${error.message}`);
      }
    });

    return localPort;
  }
}
