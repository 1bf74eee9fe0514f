import { Command } from 'commander';
import { loadConnectionsFile } from '../config/connections.js';
import { ConnectionSupervisor, DEFAULT_RETRIES } from '../services/ConnectionSupervisor.js';
import type { DeviceConnection } from '../types/Target.js';
import { ParseError } from '../utils/errors.js';
import { splitTargets } from '../utils/targets.js';
import { runAction } from './context.js';
import type { CliContext } from './context.js';
import { openTerminal } from './term.js';

export interface ConnectOptions {
  device?: string;
  target?: string;
  config?: string;
  allowFailures?: boolean;
  retries: number;
  shell?: boolean;
  command?: string;
}

export async function connectionsFromOptions(options: ConnectOptions): Promise<DeviceConnection[]> {
  if (options.config) {
    return loadConnectionsFile(options.config);
  }
  if (!options.device) {
    throw new ParseError('missing device ID');
  }
  if (!options.target) {
    throw new ParseError('missing target');
  }
  return [{ deviceId: options.device, targets: splitTargets(options.target) }];
}

export function connectCommand(context: CliContext): Command {
  return new Command('connect')
    .description('Forward local ports or stdio to one or more devices')
    .option('-d, --device <id>', 'Device ID (as public key digest)')
    .option('-t, --target <targets>', 'Comma-separated targets <localPort>:<remoteHost>:<remotePort>[/udp]')
    .option('-c, --config <file>', 'JSON file with a list of {device_id, targets}')
    .option('--allow-failures', 'Keep other devices connected when one fails')
    .option('-r, --retries <n>', 'Connect attempts per device, 0 retries forever', Number, DEFAULT_RETRIES)
    .option('--shell', 'Open a terminal on the device instead of forwarding ports')
    .option('--command <json>', 'Command for --shell as JSON list, e.g. ["top", "-b"]')
    .action(
      runAction(context, async (options: ConnectOptions) => {
        if (options.shell || options.command !== undefined) {
          if (!options.device) {
            throw new ParseError('missing device ID');
          }
          await openTerminal(context, options.device, options.command);
          return;
        }

        const connections = await connectionsFromOptions(options);
        const client = await context.login();
        const connector = context.connector(client);

        const supervisor = new ConnectionSupervisor(
          (deviceId, targets, signal) => connector.connect(deviceId, targets, signal),
          { logger: context.logger },
        );

        const { failures } = await supervisor.connectMulti(connections, {
          allowFailures: options.allowFailures,
          retries: options.retries,
          signal: context.signal,
        });

        if (failures.length > 0) {
          context.logger.warn(`${failures.length} of ${connections.length} connections failed`);
        }
      }),
    );
}
