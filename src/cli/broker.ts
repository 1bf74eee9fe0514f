import { Command } from 'commander';
import { loadConfig, parseRemoteProtocol } from '../config/index.js';
import type { ConfigOverrides } from '../config/index.js';
import { AuthService } from '../services/AuthService.js';
import { BrokerService } from '../services/BrokerService.js';
import { ConnectionCache } from '../services/ConnectionCache.js';
import { DeviceStatusResolver } from '../services/DeviceStatusResolver.js';
import { ManagementClient } from '../services/ManagementClient.js';
import { AuthError } from '../utils/errors.js';
import { whenAborted } from '../utils/scope.js';
import { runAction } from './context.js';
import type { CliContext } from './context.js';

export interface BrokerOptions {
  listenPort?: string;
  remoteHost?: string;
  remotePort?: string;
  remoteProtocol?: string;
  authToken?: string;
  username?: string;
  password?: string;
  baseUrl?: string;
}

export function overridesFromOptions(options: BrokerOptions): ConfigOverrides {
  return {
    broker: {
      listenPort: options.listenPort === undefined ? undefined : Number(options.listenPort),
      remoteHost: options.remoteHost,
      remotePort: options.remotePort,
      remoteProtocol: options.remoteProtocol === undefined ? undefined : parseRemoteProtocol(options.remoteProtocol),
      authToken: options.authToken,
    },
    api: {
      baseUrl: options.baseUrl,
      username: options.username,
      password: options.password,
    },
  };
}

export function brokerCommand(context: CliContext): Command {
  return new Command('broker')
    .description('Start the HTTP broker that proxies requests to devices')
    .option('-u, --username <email>', 'Username for authentication')
    .option('-p, --password <password>', 'Password for authentication')
    .option('-b, --base-url <url>', 'Management API base URL')
    .option('--auth-token <token>', 'Token clients must send in X-Qbee-Authorization')
    .option('--listen-port <port>', 'Port to listen on')
    .option('--remote-host <host>', 'Host on the device to connect to')
    .option('--remote-port <port>', 'Default device port')
    .option('--remote-protocol <protocol>', 'Protocol spoken on the device port (http or https)')
    .action(
      runAction(context, async (options: BrokerOptions) => {
        const config = loadConfig({ env: context.env, overrides: overridesFromOptions(options), logger: context.logger });
        const { broker: settings, api } = config;

        if (!api.password) {
          throw new AuthError('no password provided');
        }
        if (!api.username) {
          throw new AuthError('no username provided');
        }

        const client = new ManagementClient({ baseUrl: api.baseUrl });
        await client.authenticate(api.username, api.password);

        const resolver = new DeviceStatusResolver(client);
        const connector = context.connector(client);

        const broker = new BrokerService({
          resolver,
          runTunnel: (deviceId, targets, signal) => connector.connect(deviceId, targets, signal),
          remoteHost: settings.remoteHost,
          cache: new ConnectionCache({ ttl: settings.connectionTtl }),
          cleanupInterval: settings.cleanupInterval,
          reauthInterval: settings.reauthInterval,
          portReadyTimeout: settings.portReadyTimeout,
          reauthenticate: () => client.reauthenticate(),
          logger: context.logger,
        });

        const app = await context.serve(
          {
            broker,
            authService: new AuthService({ token: settings.authToken }),
            proxy: { defaultDevicePort: settings.remotePort, protocol: settings.remoteProtocol },
          },
          { port: settings.listenPort, host: settings.host },
        );

        context.logger.info(`Broker listening on ${settings.host}:${settings.listenPort}`);
        await whenAborted(context.signal);
        await app.close();
      }),
    );
}
