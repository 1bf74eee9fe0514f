import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { once } from 'events';
import { PassThrough } from 'stream';
import { TerminalSession } from './TerminalSession.js';
import type { TerminalIO } from './TerminalSession.js';
import type { ResizeHandler, ResizeWatcher } from './ResizeWatcher.js';
import { connectSession } from '../transport/MuxSession.js';
import type { MuxSession } from '../transport/MuxSession.js';
import { startFakeEdge } from '../testing/fakeEdge.js';
import type { FakeEdge } from '../testing/fakeEdge.js';
import type { TerminalSize } from '../types/Terminal.js';
import { whenAborted } from '../utils/scope.js';

function fakeTerminal(size: TerminalSize) {
  let raw = false;
  const rawModes: boolean[] = [];
  const io: TerminalIO = {
    input: new PassThrough(),
    output: new PassThrough(),
    getSize: () => size,
    isRaw: () => raw,
    setRawMode: (next) => {
      raw = next;
      rawModes.push(next);
    },
  };
  return { io, rawModes };
}

class ManualResizeWatcher implements ResizeWatcher {
  private handler: ResizeHandler | null = null;

  watchResize(signal: AbortSignal, onChange: ResizeHandler): Promise<void> {
    this.handler = onChange;
    return whenAborted(signal);
  }

  async resize(size: TerminalSize): Promise<void> {
    await this.handler?.(size);
  }
}

describe('TerminalSession', () => {
  let edge: FakeEdge;
  let session: MuxSession;

  beforeEach(async () => {
    edge = await startFakeEdge({ token: 'test-secret', ptySessionId: 'pty-7' });
    session = await connectSession(edge.url, { token: 'test-secret' });
  });

  afterEach(async () => {
    session.close();
    await edge.close();
  });

  it('runs a command in a remote PTY and restores the terminal when it exits', async () => {
    const { io, rawModes } = fakeTerminal({ cols: 120, rows: 40 });
    const terminal = new TerminalSession(session, { io, resizeWatcher: new ManualResizeWatcher() });

    const running = terminal.run(['top', '-d', '5'], new AbortController().signal);

    io.input.push('hi');
    const [echoed] = await once(io.output, 'data');
    expect(echoed.toString()).toBe('hi');
    expect(edge.ptyOpens).toEqual([
      { type: 'resize', session_id: '', cols: 120, rows: 40, command: 'top', command_args: ['-d', '5'] },
    ]);

    io.input.push('exit\n');
    await expect(running).resolves.toBeUndefined();
    expect(rawModes).toEqual([true, false]);
  });

  it('sends resizes for the PTY session and waits for OK', async () => {
    const { io } = fakeTerminal({ cols: 80, rows: 24 });
    const watcher = new ManualResizeWatcher();
    const controller = new AbortController();
    const running = new TerminalSession(session, { io, resizeWatcher: watcher }).run([], controller.signal);

    io.input.push('ready');
    await once(io.output, 'data');
    await watcher.resize({ cols: 100, rows: 30 });

    expect(edge.ptyOpens).toEqual([{ type: 'resize', session_id: '', cols: 80, rows: 24 }]);
    expect(edge.ptyCommands).toEqual([{ type: 'resize', session_id: 'pty-7', cols: 100, rows: 30 }]);

    controller.abort();
    await expect(running).resolves.toBeUndefined();
  });

  it('keeps the session when a resize is rejected', async () => {
    const { io } = fakeTerminal({ cols: 80, rows: 24 });
    const watcher = new ManualResizeWatcher();
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const controller = new AbortController();
    const running = new TerminalSession(session, { io, resizeWatcher: watcher, logger }).run([], controller.signal);

    io.input.push('ready');
    await once(io.output, 'data');
    edge.failControl = true;
    await watcher.resize({ cols: 100, rows: 30 });

    expect(logger.error).toHaveBeenCalledWith('error resizing window: resize rejected');

    io.input.push('still here');
    const [echoed] = await once(io.output, 'data');
    expect(echoed.toString()).toBe('still here');

    controller.abort();
    await running;
  });

  it('restores the terminal when the PTY cannot be opened', async () => {
    const { io, rawModes } = fakeTerminal({ cols: 80, rows: 24 });
    session.close();

    await expect(
      new TerminalSession(session, { io, resizeWatcher: new ManualResizeWatcher() }).run([], new AbortController().signal),
    ).rejects.toThrow('error opening shell stream: session closed');
    expect(rawModes).toEqual([true, false]);
  });
});
