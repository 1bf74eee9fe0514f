import type { Readable, Writable } from 'stream';
import { expectOK, writeMessage } from '../transport/messages.js';
import { MessageType } from '../types/Protocol.js';
import type { OpenedStream, TransportSession } from '../types/Protocol.js';
import type { PTYCommand, TerminalSize } from '../types/Terminal.js';
import { errorMessage, TransportError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { runScoped } from '../utils/scope.js';
import { pipeUntilEnd } from '../utils/streams.js';
import { createResizeWatcher } from './ResizeWatcher.js';
import type { ResizeWatcher } from './ResizeWatcher.js';

const DEFAULT_SIZE: TerminalSize = { cols: 80, rows: 24 };

/** The local side of an interactive session */
export interface TerminalIO {
  input: Readable;
  output: Writable;
  getSize(): TerminalSize;
  isRaw(): boolean;
  setRawMode(raw: boolean): void;
}

export function processTerminal(): TerminalIO {
  const { stdin, stdout } = process;
  return {
    input: stdin,
    output: stdout,
    getSize: () => ({
      cols: stdout.columns || DEFAULT_SIZE.cols,
      rows: stdout.rows || DEFAULT_SIZE.rows,
    }),
    isRaw: () => stdin.isTTY && stdin.isRaw,
    setRawMode: (raw) => {
      if (stdin.isTTY) {
        stdin.setRawMode(raw);
      }
    },
  };
}

export interface TerminalSessionOptions {
  io?: TerminalIO;
  resizeWatcher?: ResizeWatcher;
  logger?: Logger;
}

/** Sends a resize for a running PTY over its own control stream and waits for OK. */
export async function sendResizeCommand(
  session: TransportSession,
  sessionId: string,
  size: TerminalSize,
): Promise<void> {
  const command: PTYCommand = { type: 'resize', session_id: sessionId, cols: size.cols, rows: size.rows };

  try {
    const stream = await session.openPlainStream();
    const failed = new Promise<never>((_resolve, reject) => stream.once('error', reject));
    try {
      await Promise.race([
        writeMessage(stream, MessageType.PTYCommand, Buffer.from(JSON.stringify(command))).then(() => expectOK(stream)),
        failed,
      ]);
    } finally {
      stream.destroy();
    }
  } catch (err) {
    throw new TransportError(`error resizing window: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Interactive shell on a device. The local terminal is in raw mode for the
 * lifetime of `run` and is restored however it ends.
 */
export class TerminalSession {
  private readonly io: TerminalIO;
  private readonly resizeWatcher: ResizeWatcher;
  private readonly logger: Logger;

  constructor(
    private readonly session: TransportSession,
    options: TerminalSessionOptions = {},
  ) {
    this.io = options.io ?? processTerminal();
    this.resizeWatcher = options.resizeWatcher ?? createResizeWatcher(() => this.io.getSize());
    this.logger = options.logger ?? silentLogger;
  }

  /** `command` is an argv; the device's default shell runs when it is empty. */
  async run(command: string[], signal: AbortSignal): Promise<void> {
    const wasRaw = this.io.isRaw();
    this.io.setRawMode(true);

    try {
      const size = this.io.getSize();
      const init: PTYCommand = { type: 'resize', session_id: '', cols: size.cols, rows: size.rows };
      if (command.length > 0) {
        init.command = command[0];
        if (command.length > 1) {
          init.command_args = command.slice(1);
        }
      }

      let opened: OpenedStream;
      try {
        opened = await this.session.openStream(MessageType.PTY, Buffer.from(JSON.stringify(init)));
      } catch (err) {
        throw new TransportError(`error opening shell stream: ${errorMessage(err)}`, { cause: err });
      }

      const { stream } = opened;
      const sessionId = opened.response.toString('utf8');
      this.logger.debug(`terminal session ${sessionId} opened`);

      try {
        await runScoped(
          [
            (scope) => pipeUntilEnd(stream, this.io.output, scope),
            (scope) => pipeUntilEnd(this.io.input, stream, scope),
            (scope) =>
              this.resizeWatcher.watchResize(scope, async (next) => {
                try {
                  await sendResizeCommand(this.session, sessionId, next);
                } catch (err) {
                  this.logger.error(errorMessage(err));
                }
              }),
          ],
          signal,
        );
      } finally {
        stream.destroy();
      }
    } finally {
      this.io.setRawMode(wasRaw);
    }
  }
}
