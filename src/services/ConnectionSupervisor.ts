import { setTimeout as delay } from 'timers/promises';
import type { DeviceConnection, TargetDescriptor } from '../types/Target.js';
import { backoffDelay, DEFAULT_BACKOFF, formatDelay, withJitter } from '../utils/backoff.js';
import type { BackoffPolicy } from '../utils/backoff.js';
import { errorMessage, ParseError, toError, TunnelSystemError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { parseDeviceConnection } from '../utils/targets.js';

/** One connect cycle for a device; resolves when it ends cleanly. */
export type ConnectFn = (deviceId: string, targets: TargetDescriptor[], signal: AbortSignal) => Promise<void>;

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SupervisorOptions {
  logger?: Logger;
  backoff?: BackoffPolicy;
  random?: () => number;
  sleep?: SleepFn;
}

export interface ConnectMultiOptions {
  /** Keep the other devices running when one fails */
  allowFailures?: boolean;
  /** Connect cycles per device; 0 retries forever */
  retries?: number;
  signal: AbortSignal;
}

export interface DeviceFailure {
  deviceId: string;
  error: Error;
}

export interface ConnectMultiResult {
  failures: DeviceFailure[];
}

interface ConnectRequest {
  deviceId: string;
  targets: TargetDescriptor[];
}

export const DEFAULT_RETRIES = 1;

function assertRetries(retries: number): void {
  if (!Number.isInteger(retries) || retries < 0) {
    throw new ParseError('retries must be a positive number');
  }
}

/**
 * Runs connections to many devices at once, retrying each with exponential
 * backoff.
 */
export class ConnectionSupervisor {
  private readonly logger: Logger;
  private readonly backoff: BackoffPolicy;
  private readonly random: () => number;
  private readonly sleep: SleepFn;

  constructor(
    private readonly connect: ConnectFn,
    options: SupervisorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
  }

  /**
   * Every request is validated before any device is dialed. Without
   * `allowFailures` the first failure aborts the whole batch and is thrown
   * once every device has stopped.
   */
  async connectMulti(connections: DeviceConnection[], options: ConnectMultiOptions): Promise<ConnectMultiResult> {
    const { allowFailures = false, retries = DEFAULT_RETRIES, signal } = options;
    assertRetries(retries);

    const failures: DeviceFailure[] = [];
    const requests: ConnectRequest[] = [];

    for (const connection of connections) {
      try {
        requests.push({ deviceId: connection.deviceId, targets: parseDeviceConnection(connection) });
      } catch (err) {
        if (!allowFailures) {
          throw err;
        }
        const error = toError(err);
        failures.push({ deviceId: connection.deviceId, error });
        this.logger.error(`error connecting to device ${connection.deviceId}: ${error.message}`);
      }
    }

    const batch = new AbortController();
    const onAbort = () => batch.abort(signal.reason);
    if (signal.aborted) {
      batch.abort(signal.reason);
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    const fatal: Error[] = [];

    try {
      await Promise.all(
        requests.map(async ({ deviceId, targets }) => {
          try {
            await this.connectWithRetry(deviceId, targets, retries, batch.signal);
          } catch (err) {
            const error = toError(err);
            if (allowFailures) {
              failures.push({ deviceId, error });
              this.logger.warn(`giving up on device ${deviceId}`);
              return;
            }
            fatal.push(error);
            batch.abort(error);
          }
        }),
      );
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    if (fatal.length > 0) {
      throw fatal[0];
    }

    return { failures };
  }

  /**
   * Repeats connect cycles until one ends cleanly, the budget runs out or
   * the signal aborts. Parse errors are never retried.
   */
  async connectWithRetry(
    deviceId: string,
    targets: TargetDescriptor[],
    retries: number,
    signal: AbortSignal,
  ): Promise<void> {
    assertRetries(retries);

    let attempts = 0;
    for (;;) {
      if (signal.aborted) {
        return;
      }

      try {
        await this.connect(deviceId, targets, signal);
        return;
      } catch (err) {
        if (err instanceof TunnelSystemError && err.permanent) {
          throw err;
        }
        if (signal.aborted) {
          return;
        }

        this.logger.error(`error connecting to device ${deviceId}: ${errorMessage(err)}`);

        attempts++;
        if (retries > 0 && attempts >= retries) {
          throw err;
        }
      }

      const wait = withJitter(backoffDelay(attempts - 1, this.backoff), this.random);
      this.logger.warn(`Attempt ${attempts} failed. Retrying in ${formatDelay(wait)}...`);

      try {
        await this.sleep(wait, signal);
      } catch (err) {
        if (signal.aborted) {
          return;
        }
        throw err;
      }
    }
  }
}
