import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import type { RemoteProtocol } from '../api/proxy.js';
import { DEFAULT_BASE_URL } from '../services/ManagementClient.js';
import { DEFAULT_CLEANUP_INTERVAL_MS, DEFAULT_CONNECTION_TTL_MS } from '../services/ConnectionCache.js';
import { DEFAULT_PORT_READY_TIMEOUT_MS, DEFAULT_REAUTH_INTERVAL_MS } from '../services/BrokerService.js';
import { errorMessage } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface BrokerConfig {
  listenPort: number;
  host: string;
  remoteHost: string;
  /** Device port used when a request names none */
  remotePort: string;
  remoteProtocol: RemoteProtocol;
  /** Token callers must present; empty disables broker auth */
  authToken: string;
  connectionTtl: number;
  cleanupInterval: number;
  reauthInterval: number;
  portReadyTimeout: number;
}

export interface ApiConfig {
  baseUrl: string;
  username: string;
  password: string;
}

export interface AppConfig {
  broker: BrokerConfig;
  api: ApiConfig;
}

export interface ConfigOverrides {
  broker?: Partial<BrokerConfig>;
  api?: Partial<ApiConfig>;
}

export const DEFAULT_CONFIG: AppConfig = {
  broker: {
    listenPort: 8081,
    host: '0.0.0.0',
    remoteHost: 'localhost',
    remotePort: '80',
    remoteProtocol: 'http',
    authToken: '',
    connectionTtl: DEFAULT_CONNECTION_TTL_MS,
    cleanupInterval: DEFAULT_CLEANUP_INTERVAL_MS,
    reauthInterval: DEFAULT_REAUTH_INTERVAL_MS,
    portReadyTimeout: DEFAULT_PORT_READY_TIMEOUT_MS,
  },
  api: {
    baseUrl: DEFAULT_BASE_URL,
    username: '',
    password: '',
  },
};

export const CONFIG_PATHS = [
  join(process.cwd(), 'config', 'broker.json'),
  join(homedir(), '.config', 'fleet-tunnel', 'broker.json'),
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function envInt(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

export function parseRemoteProtocol(value: string): RemoteProtocol {
  if (value === 'http' || value === 'https') {
    return value;
  }
  throw new Error(`Invalid remote protocol ${value}, expected http or https`);
}

function brokerFromFile(raw: unknown): Partial<BrokerConfig> {
  if (!isRecord(raw)) return {};
  const protocol = str(raw.remoteProtocol);
  const remotePort = typeof raw.remotePort === 'number' ? String(raw.remotePort) : str(raw.remotePort);
  return {
    listenPort: num(raw.listenPort),
    host: str(raw.host),
    remoteHost: str(raw.remoteHost),
    remotePort,
    remoteProtocol: protocol === undefined ? undefined : parseRemoteProtocol(protocol),
    authToken: str(raw.authToken),
    connectionTtl: num(raw.connectionTtl),
    cleanupInterval: num(raw.cleanupInterval),
    reauthInterval: num(raw.reauthInterval),
    portReadyTimeout: num(raw.portReadyTimeout),
  };
}

function apiFromFile(raw: unknown): Partial<ApiConfig> {
  if (!isRecord(raw)) return {};
  return { baseUrl: str(raw.baseUrl), username: str(raw.username) };
}

export function loadConfigFile(paths: string[] = CONFIG_PATHS, logger: Logger = silentLogger): ConfigOverrides {
  for (const configPath of paths) {
    if (existsSync(configPath)) {
      try {
        const content: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
        if (!isRecord(content)) {
          throw new Error('expected a JSON object');
        }
        const config = { broker: brokerFromFile(content.broker), api: apiFromFile(content.api) };
        logger.debug(`Loaded config from ${configPath}`);
        return config;
      } catch (err) {
        logger.error(`Failed to load config from ${configPath}: ${errorMessage(err)}`);
      }
    }
  }
  return {};
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  return {
    broker: {
      listenPort: envInt(env.QBEE_LISTEN_PORT),
      remoteHost: env.QBEE_REMOTE_HOST || undefined,
      remotePort: env.QBEE_REMOTE_PORT || undefined,
      remoteProtocol: env.QBEE_REMOTE_PROTOCOL ? parseRemoteProtocol(env.QBEE_REMOTE_PROTOCOL) : undefined,
      authToken: env.QBEE_TOKEN || undefined,
    },
    api: {
      baseUrl: env.QBEE_BASEURL || undefined,
      username: env.QBEE_EMAIL || env.QBEE_USERNAME || undefined,
      password: env.QBEE_PASSWORD || undefined,
    },
  };
}

/** Copies the defined fields of `source` over `target`. */
function mergeSection<T extends object>(target: T, source: Partial<T> | undefined): T {
  const result = { ...target };
  if (!source) return result;

  for (const key in source) {
    const value = source[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

function merge(config: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    broker: mergeSection(config.broker, overrides.broker),
    api: mergeSection(config.api, overrides.api),
  };
}

function isPort(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 65535;
}

export function validateConfig(config: AppConfig): void {
  const { broker } = config;
  if (!isPort(broker.listenPort)) {
    throw new Error('Invalid listen port number');
  }
  if (!isPort(Number(broker.remotePort))) {
    throw new Error('Invalid remote port number');
  }
  if (!broker.remoteHost) {
    throw new Error('Remote host must not be empty');
  }
  for (const [name, value] of [
    ['Connection TTL', broker.connectionTtl],
    ['Cleanup interval', broker.cleanupInterval],
    ['Re-authentication interval', broker.reauthInterval],
    ['Port ready timeout', broker.portReadyTimeout],
  ] as const) {
    if (!Number.isFinite(value) || value < 1000) {
      throw new Error(`${name} must be at least 1000ms`);
    }
  }
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Values from command-line flags, applied last */
  overrides?: ConfigOverrides;
  paths?: string[];
  logger?: Logger;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const fileConfig = loadConfigFile(options.paths, options.logger);
  const envConfig = loadEnvConfig(options.env);

  // Priority: flags > env > file > defaults
  let config = merge(DEFAULT_CONFIG, fileConfig);
  config = merge(config, envConfig);
  config = merge(config, options.overrides ?? {});

  validateConfig(config);

  return config;
}
