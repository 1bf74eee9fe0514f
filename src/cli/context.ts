import type { FastifyInstance } from 'fastify';
import { startServer } from '../server/app.js';
import type { AppDependencies, ServerOptions } from '../server/app.js';
import { DeviceConnector } from '../services/DeviceConnector.js';
import { DeviceStatusResolver } from '../services/DeviceStatusResolver.js';
import { clientFromEnvironment, ManagementClient } from '../services/ManagementClient.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export type Connector = Pick<DeviceConnector, 'connect' | 'terminal'>;

/** Everything a command touches outside its own arguments */
export interface CliContext {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  logger: Logger;
  /** Aborts on SIGINT or SIGTERM */
  signal: AbortSignal;
  /** Logs in with the credentials from the environment */
  login(): Promise<ManagementClient>;
  connector(client: ManagementClient): Connector;
  serve(deps: AppDependencies, options: ServerOptions): Promise<FastifyInstance>;
}

export function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return controller.signal;
}

export function defaultContext(): CliContext {
  const env = process.env;
  return {
    env,
    platform: process.platform,
    logger: log,
    signal: shutdownSignal(),
    login: () => clientFromEnvironment(env),
    connector: (client) =>
      new DeviceConnector(new DeviceStatusResolver(client), {
        getToken: (signal) => client.freshAuthToken(undefined, signal),
        logger: log,
      }),
    serve: startServer,
  };
}

/** Reports a failed command in red and sets a non-zero exit code. */
export function runAction<A extends unknown[]>(
  context: CliContext,
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      context.logger.error(errorMessage(error));
      process.exitCode = 1;
    }
  };
}
