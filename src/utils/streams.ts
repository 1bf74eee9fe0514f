import { finished } from 'stream/promises';
import type { Duplex, Readable, Writable } from 'stream';

/**
 * Copies bytes both ways between two duplex streams. Resolves once either
 * side closes or fails; both are destroyed by then.
 */
export function bridgeStreams(a: Duplex, b: Duplex): Promise<void> {
  return new Promise((resolve) => {
    let settled = false;
    const finish = () => {
      if (settled) return;
      settled = true;
      a.unpipe(b);
      b.unpipe(a);
      a.destroy();
      b.destroy();
      resolve();
    };

    a.once('close', finish);
    b.once('close', finish);
    a.once('error', finish);
    b.once('error', finish);

    a.pipe(b);
    b.pipe(a);
  });
}

/**
 * Pipes `source` into `destination` without ending it, until the source
 * ends, fails or the signal aborts. An abort resolves; a source error rejects.
 */
export async function pipeUntilEnd(source: Readable, destination: Writable, signal: AbortSignal): Promise<void> {
  source.pipe(destination, { end: false });
  try {
    await finished(source, { writable: false, signal });
  } catch (err) {
    if (!signal.aborted) {
      throw err;
    }
  } finally {
    source.unpipe(destination);
  }
}
