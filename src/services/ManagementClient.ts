import jwt from 'jsonwebtoken';
import type { DeviceStatus, InventoryItem, InventoryListResponse, InventorySearch } from '../types/Device.js';
import { ApiError, AuthError, errorMessage } from '../utils/errors.js';

export const DEFAULT_BASE_URL = 'https://www.app.qbee.io';

const LOGIN_PATH = '/api/v2/login';
const REFRESH_PATH = '/api/v2/refresh-jwt';
const INVENTORY_PATH = '/api/v2/inventory';
const REFRESH_COOKIE = 'PHPSESSID';
const REFRESHED_TOKEN_HEADER = 'refreshed-token';
const USER_AGENT = 'fleet-tunnel';
/** Tokens closer than this to expiry are renewed before use */
export const TOKEN_RENEWAL_MARGIN_MS = 60 * 1000;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ManagementClientOptions {
  baseUrl?: string;
  authToken?: string;
  refreshToken?: string;
  fetch?: FetchFn;
}

export interface Credentials {
  email: string;
  password: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDeviceStatus(value: unknown): value is DeviceStatus {
  return (
    isRecord(value) &&
    typeof value.uuid === 'string' &&
    typeof value.remote_access === 'boolean' &&
    (value.edge === undefined || typeof value.edge === 'string') &&
    (value.edge_version === undefined || typeof value.edge_version === 'number')
  );
}

function isInventoryItem(value: unknown): value is InventoryItem {
  return isRecord(value) && typeof value.pub_key_digest === 'string';
}

function isInventoryListResponse(value: unknown): value is InventoryListResponse {
  return (
    isRecord(value) &&
    Array.isArray(value.items) &&
    value.items.every(isInventoryItem) &&
    typeof value.total === 'number'
  );
}

function parseErrorBody(text: string): Record<string, unknown> | null {
  if (text.length === 0) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : { error: text };
  } catch {
    return { error: text };
  }
}

function readCookie(response: Response, name: string): string | undefined {
  for (const header of response.headers.getSetCookie()) {
    const [pair] = header.split(';');
    const separator = pair.indexOf('=');
    if (separator > 0 && pair.slice(0, separator).trim() === name) {
      return pair.slice(separator + 1).trim();
    }
  }
  return undefined;
}

/**
 * Client for the fleet management REST API.
 *
 * Requests carry the bearer token; a 401 triggers one token refresh through
 * the session cookie and a single retry.
 */
export class ManagementClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private authToken: string;
  private refreshToken: string;
  private credentials: Credentials | null = null;

  constructor(options: ManagementClientOptions = {}) {
    this.baseUrl = (options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.authToken = options.authToken ?? '';
    this.refreshToken = options.refreshToken ?? '';
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  getAuthToken(): string {
    return this.authToken;
  }

  getRefreshToken(): string {
    return this.refreshToken;
  }

  /**
   * Expiry of the current auth token, read from its `exp` claim without
   * verifying the signature. Null when there is no token or no claim.
   */
  tokenExpiresAt(): Date | null {
    if (!this.authToken) {
      return null;
    }
    const claims = jwt.decode(this.authToken);
    if (claims === null || typeof claims === 'string' || typeof claims.exp !== 'number') {
      return null;
    }
    return new Date(claims.exp * 1000);
  }

  /**
   * Call an API path. `body` is sent as JSON; the parsed JSON response (or
   * null for an empty body) is returned.
   */
  async call(method: string, path: string, body?: unknown, signal?: AbortSignal): Promise<unknown> {
    if (!path.startsWith('/')) {
      throw new Error(`path ${path} must start with /`);
    }

    let response = await this.send(method, path, body, signal);

    if (response.status === 401 && this.refreshToken) {
      await response.body?.cancel();
      await this.refreshAuthToken(signal);
      response = await this.send(method, path, body, signal);
    }

    const text = await response.text();

    if (response.status >= 400) {
      throw new ApiError(response.status, parseErrorBody(text));
    }

    const cookie = readCookie(response, REFRESH_COOKIE);
    if (cookie) {
      this.refreshToken = cookie;
    }

    if (text.length === 0) {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new Error(`error decoding JSON response (${errorMessage(err)}): ${text}`);
    }
  }

  /** Exchange credentials for an auth token. */
  async login(email: string, password: string, signal?: AbortSignal): Promise<string> {
    let response: unknown;
    try {
      response = await this.call('POST', LOGIN_PATH, { email, password }, signal);
    } catch (err) {
      if (err instanceof ApiError && err.body && 'challenge' in err.body) {
        throw new AuthError('two-factor authentication is required for this account, use a token instead');
      }
      throw err;
    }

    if (!isRecord(response) || typeof response.token !== 'string') {
      throw new AuthError('login response did not contain a token');
    }
    return response.token;
  }

  /** Log in and keep the credentials for later re-authentication. */
  async authenticate(email: string, password: string, signal?: AbortSignal): Promise<void> {
    try {
      this.authToken = await this.login(email, password, signal);
    } catch (err) {
      throw new AuthError(`error authenticating: ${errorMessage(err)}`, { cause: err });
    }
    this.credentials = { email, password };
  }

  /** Log in again with the stored credentials. */
  async reauthenticate(signal?: AbortSignal): Promise<void> {
    if (!this.credentials) {
      throw new AuthError('no credentials to re-authenticate with');
    }
    await this.authenticate(this.credentials.email, this.credentials.password, signal);
  }

  /**
   * The auth token, renewed first when it expires within `margin` ms.
   * Renewal goes through the session cookie when there is one, else the
   * stored credentials; with neither the current token is returned as is.
   */
  async freshAuthToken(margin = TOKEN_RENEWAL_MARGIN_MS, signal?: AbortSignal): Promise<string> {
    const expiresAt = this.tokenExpiresAt();
    if (expiresAt && expiresAt.getTime() - Date.now() < margin) {
      if (this.refreshToken) {
        await this.refreshAuthToken(signal);
      } else if (this.credentials) {
        await this.reauthenticate(signal);
      }
    }
    return this.authToken;
  }

  /** Trade the session cookie for a fresh auth token. */
  async refreshAuthToken(signal?: AbortSignal): Promise<void> {
    if (!this.refreshToken) {
      throw new AuthError('no refresh token set');
    }

    const response = await this.fetchFn(this.baseUrl + REFRESH_PATH, {
      method: 'POST',
      headers: {
        Cookie: `${REFRESH_COOKIE}=${this.refreshToken}`,
        'User-Agent': USER_AGENT,
      },
      signal,
    });

    const text = await response.text();
    if (response.status !== 200) {
      throw new AuthError(`error refreshing token: ${new ApiError(response.status, parseErrorBody(text)).message}`);
    }

    const token = response.headers.get(REFRESHED_TOKEN_HEADER);
    if (!token) {
      throw new AuthError('error refreshing token: response carried no token');
    }
    this.authToken = token;
  }

  async getDeviceStatus(deviceId: string, signal?: AbortSignal): Promise<DeviceStatus> {
    const response = await this.call('GET', `/api/v2/device/${encodeURIComponent(deviceId)}/status`, undefined, signal);
    if (!isDeviceStatus(response)) {
      throw new Error(`unexpected device status response for ${deviceId}`);
    }
    return response;
  }

  async listDeviceInventory(search: InventorySearch, signal?: AbortSignal): Promise<InventoryListResponse> {
    const query = new URLSearchParams({ search: JSON.stringify(search) });
    const response = await this.call('GET', `${INVENTORY_PATH}?${query.toString()}`, undefined, signal);
    if (!isInventoryListResponse(response)) {
      throw new Error('unexpected inventory response');
    }
    return response;
  }

  private send(method: string, path: string, body: unknown, signal?: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.authToken) {
      headers.Authorization = `Bearer ${this.authToken}`;
    }

    return this.fetchFn(this.baseUrl + path, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal,
    });
  }
}

/** Builds a client logged in with QBEE_EMAIL (or QBEE_USERNAME) and QBEE_PASSWORD. */
export async function clientFromEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  options: ManagementClientOptions = {},
): Promise<ManagementClient> {
  const email = env.QBEE_EMAIL || env.QBEE_USERNAME;
  const password = env.QBEE_PASSWORD;

  if (!email || !password) {
    throw new AuthError('QBEE_EMAIL (or QBEE_USERNAME) and QBEE_PASSWORD must be set');
  }

  const client = new ManagementClient({ ...options, baseUrl: options.baseUrl ?? env.QBEE_BASEURL });
  await client.authenticate(email, password);
  return client;
}
