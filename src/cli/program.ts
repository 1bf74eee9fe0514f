import { Command } from 'commander';
import { brokerCommand } from './broker.js';
import { connectCommand } from './connect.js';
import type { CliContext } from './context.js';
import { termCommand } from './term.js';

export function buildProgram(context: CliContext): Command {
  return new Command()
    .name('fleet-tunnel')
    .description('Remote access to fleet devices: port forwarding, terminals and an HTTP broker')
    .version('0.1.0')
    .addCommand(connectCommand(context))
    .addCommand(termCommand(context))
    .addCommand(brokerCommand(context));
}
