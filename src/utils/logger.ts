/**
 * Logging
 *
 * Services log through the small `Logger` interface. Every command passes
 * `log`, which prints colored lines; the broker's HTTP server keeps
 * Fastify's own request logger alongside it.
 */

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export const log = {
  /** Info message (default) */
  info: (msg: string) => console.log(msg),

  /** Warning message (yellow) */
  warn: (msg: string) => console.error(chalk.yellow(msg)),

  /** Error message (red) */
  error: (msg: string) => console.error(chalk.red(msg)),

  /** Debug output, only with FLEET_TUNNEL_DEBUG set */
  debug: (msg: string) => {
    if (process.env.FLEET_TUNNEL_DEBUG) {
      console.error(chalk.dim(msg));
    }
  },
} satisfies Logger;

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
