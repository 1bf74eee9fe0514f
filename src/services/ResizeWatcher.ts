import type { TerminalSize } from '../types/Terminal.js';
import { whenAborted } from '../utils/scope.js';

export type ResizeHandler = (size: TerminalSize) => Promise<void>;

/** Reports local terminal size changes until the signal aborts. */
export interface ResizeWatcher {
  watchResize(signal: AbortSignal, onChange: ResizeHandler): Promise<void>;
}

type SignalSource = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

/**
 * Watches SIGWINCH. Handlers run one at a time in signal order, and a
 * signal that leaves the size unchanged is ignored.
 */
export class SigwinchResizeWatcher implements ResizeWatcher {
  constructor(
    private readonly getSize: () => TerminalSize,
    private readonly source: SignalSource = process,
  ) {}

  async watchResize(signal: AbortSignal, onChange: ResizeHandler): Promise<void> {
    let last = this.getSize();
    let queue = Promise.resolve();

    const onWindowChange = () => {
      const size = this.getSize();
      if (size.cols === last.cols && size.rows === last.rows) return;
      last = size;
      queue = queue.then(() => onChange(size));
    };

    this.source.on('SIGWINCH', onWindowChange);
    try {
      await whenAborted(signal);
    } finally {
      this.source.off('SIGWINCH', onWindowChange);
    }
    await queue;
  }
}

/** Platforms without SIGWINCH keep the initial size. */
export class NoopResizeWatcher implements ResizeWatcher {
  watchResize(signal: AbortSignal): Promise<void> {
    return whenAborted(signal);
  }
}

export function createResizeWatcher(
  getSize: () => TerminalSize,
  platform: NodeJS.Platform = process.platform,
): ResizeWatcher {
  return platform === 'win32' ? new NoopResizeWatcher() : new SigwinchResizeWatcher(getSize);
}
