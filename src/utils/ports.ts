import { connect, createServer } from 'net';
import { setTimeout as sleep } from 'timers/promises';

const PORT_POLL_INTERVAL_MS = 50;

/** Asks the OS for an unused TCP port on `host`. */
export function getFreePort(host = 'localhost'): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', reject);
    server.listen(0, host, () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new Error(`could not determine a free port on ${host}`));
        return;
      }
      server.close((err) => (err ? reject(err) : resolve(address.port)));
    });
  });
}

/** Resolves true when a TCP connection to `host:port` succeeds. */
export function canConnect(port: number, host = 'localhost'): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = connect({ port, host });
    socket.once('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.once('error', () => {
      socket.destroy();
      resolve(false);
    });
  });
}

export interface WaitForPortOptions {
  host?: string;
  interval?: number;
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Polls until something accepts connections on the port.
 * Resolves false on timeout or abort.
 */
export async function waitForPort(port: number, options: WaitForPortOptions = {}): Promise<boolean> {
  const { host = 'localhost', interval = PORT_POLL_INTERVAL_MS, timeout, signal } = options;
  const deadline = timeout === undefined ? Infinity : Date.now() + timeout;

  while (!signal?.aborted) {
    if (await canConnect(port, host)) {
      return true;
    }

    if (Date.now() >= deadline) {
      return false;
    }

    try {
      await sleep(interval, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) {
        return false;
      }
      throw err;
    }
  }

  return false;
}
