import { Command } from 'commander';
import { errorMessage, ParseError } from '../utils/errors.js';
import { runAction } from './context.js';
import type { CliContext } from './context.js';

interface TermOptions {
  device: string;
  command?: string;
}

/** Parses `--command` as a JSON list of arguments. */
export function parseCommand(value: string | undefined): string[] {
  if (!value) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    throw new ParseError(`invalid command: ${errorMessage(err)}`);
  }

  if (!Array.isArray(parsed) || !parsed.every((arg): arg is string => typeof arg === 'string')) {
    throw new ParseError('invalid command: expected a JSON list of strings');
  }
  return parsed;
}

/** Runs an interactive terminal on `device` until it exits or the CLI is interrupted. */
export async function openTerminal(context: CliContext, device: string, commandJson: string | undefined): Promise<void> {
  if (context.platform === 'win32') {
    throw new Error('shell is not supported on Windows');
  }

  const command = parseCommand(commandJson);
  const client = await context.login();
  await context.connector(client).terminal(device, command, context.signal);
}

export function termCommand(context: CliContext): Command {
  return new Command('term')
    .description('Start a terminal session on a device')
    .requiredOption('-d, --device <id>', 'Device ID')
    .option('-c, --command <json>', 'Command to execute as JSON list, e.g. ["top", "-b"]')
    .action(
      runAction(context, (options: TermOptions) => openTerminal(context, options.device, options.command)),
    );
}
