import { describe, it, expect, vi, afterEach } from 'vitest';
import chalk from 'chalk';
import { log } from './logger.js';

describe('log', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('prints info on stdout and problems on stderr', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    log.info('Connection closed');
    log.warn('1 of 2 connections failed');
    log.error('missing target');

    expect(stdout).toHaveBeenCalledWith('Connection closed');
    expect(stderr.mock.calls).toEqual([[chalk.yellow('1 of 2 connections failed')], [chalk.red('missing target')]]);
  });

  it('prints debug lines only when FLEET_TUNNEL_DEBUG is set', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    vi.stubEnv('FLEET_TUNNEL_DEBUG', '');
    log.debug('hidden');
    expect(stderr).not.toHaveBeenCalled();

    vi.stubEnv('FLEET_TUNNEL_DEBUG', '1');
    log.debug('connecting to wss://edge.example.test');
    expect(stderr).toHaveBeenCalledWith(chalk.dim('connecting to wss://edge.example.test'));
  });
});
