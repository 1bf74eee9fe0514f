import { connectSession } from '../transport/MuxSession.js';
import { EdgeVersion } from '../types/Device.js';
import type { SessionDialer, TransportSession } from '../types/Protocol.js';
import type { TargetDescriptor } from '../types/Target.js';
import { UnsupportedError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { edgeUrl, requiresRelaxedTls } from './DeviceStatusResolver.js';
import type { DeviceStatusResolver } from './DeviceStatusResolver.js';
import { TerminalSession } from './TerminalSession.js';
import type { TerminalSessionOptions } from './TerminalSession.js';
import { TunnelBridge } from './TunnelBridge.js';
import type { TunnelBridgeOptions } from './TunnelBridge.js';

export interface DeviceConnectorOptions {
  /** Bearer token for the edge, read at every dial */
  getToken: (signal?: AbortSignal) => string | Promise<string>;
  dial?: SessionDialer;
  logger?: Logger;
}

/** One full connect cycle: resolve, dial the edge, run a bridge or terminal, close. */
export class DeviceConnector {
  private readonly getToken: (signal?: AbortSignal) => string | Promise<string>;
  private readonly dial: SessionDialer;
  private readonly logger: Logger;

  constructor(
    private readonly resolver: Pick<DeviceStatusResolver, 'resolve'>,
    options: DeviceConnectorOptions,
  ) {
    this.getToken = options.getToken;
    this.dial = options.dial ?? connectSession;
    this.logger = options.logger ?? silentLogger;
  }

  async openSession(deviceId: string, signal?: AbortSignal): Promise<TransportSession> {
    const device = await this.resolver.resolve(deviceId, signal);

    if (device.edgeVersion !== EdgeVersion.Native) {
      throw new UnsupportedError(`device ${deviceId} is connected to a legacy edge, which is not supported`);
    }

    const url = edgeUrl(device);
    this.logger.debug(`connecting to ${url}`);

    return this.dial(url, {
      token: await this.getToken(signal),
      insecure: requiresRelaxedTls(device.edgeHost),
      signal,
    });
  }

  async connect(
    deviceId: string,
    targets: TargetDescriptor[],
    signal: AbortSignal,
    options: Omit<TunnelBridgeOptions, 'logger'> = {},
  ): Promise<void> {
    const session = await this.openSession(deviceId, signal);
    try {
      await new TunnelBridge(session, deviceId, { ...options, logger: this.logger }).run(targets, signal);
    } finally {
      session.close();
    }
  }

  async terminal(
    deviceId: string,
    command: string[],
    signal: AbortSignal,
    options: Omit<TerminalSessionOptions, 'logger'> = {},
  ): Promise<void> {
    const session = await this.openSession(deviceId, signal);
    try {
      await new TerminalSession(session, { ...options, logger: this.logger }).run(command, signal);
    } finally {
      session.close();
    }
  }
}
