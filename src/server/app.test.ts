import { describe, it, expect, afterEach } from 'vitest';
import http from 'http';
import type { FastifyInstance } from 'fastify';
import { createApp } from './app.js';
import { deviceIdFromHeaders } from '../api/proxy.js';
import { AuthService } from '../services/AuthService.js';
import { BrokerService } from '../services/BrokerService.js';
import type { TunnelRunner } from '../services/BrokerService.js';
import { whenAborted } from '../utils/scope.js';

const DEVICE_ID = 'a'.repeat(64);

/** Tunnel stand-in: an HTTP server on the tunnel's local port that echoes the request. */
const echoTunnel: TunnelRunner = async (_deviceId, targets, signal) => {
  const server = http.createServer((req, res) => {
    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => (body += chunk));
    req.on('end', () => {
      res.setHeader('content-type', 'application/json');
      res.end(
        JSON.stringify({
          method: req.method,
          url: req.url,
          body,
          authorization: req.headers['x-qbee-authorization'] ?? null,
        }),
      );
    });
  });
  const { localPort } = targets[0];
  await new Promise<void>((resolve) => server.listen(typeof localPort === 'number' ? localPort : 0, 'localhost', resolve));
  try {
    await whenAborted(signal);
  } finally {
    server.close();
  }
};

describe('broker app', () => {
  let app: FastifyInstance | undefined;
  let broker: BrokerService | undefined;

  afterEach(async () => {
    broker?.stop();
    await app?.close();
    app = undefined;
    broker = undefined;
  });

  async function build(token = '') {
    broker = new BrokerService({
      resolver: { resolveDeviceIdentifier: async (id) => id },
      runTunnel: echoTunnel,
      remoteHost: 'localhost',
      portPollInterval: 10,
    });
    app = await createApp({
      broker,
      authService: new AuthService({ token }),
      proxy: { defaultDevicePort: '80', protocol: 'http' },
      logger: false,
    });
    return app;
  }

  it('proxies method, path, query and body to the device tunnel', async () => {
    const server = await build();

    const response = await server.inject({
      method: 'POST',
      url: '/api/items?page=2',
      headers: { 'x-qbee-device-id': DEVICE_ID, 'content-type': 'text/plain' },
      payload: 'hello device',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ method: 'POST', url: '/api/items?page=2', body: 'hello device', authorization: null });
    expect(broker?.cache.keys()).toEqual([`${DEVICE_ID}:80`]);
  });

  it('takes the device id from the Host header and the port from its header', async () => {
    const server = await build();

    const response = await server.inject({
      method: 'GET',
      url: '/',
      headers: { host: `${DEVICE_ID}.broker.test:8081`, 'x-qbee-device-port': '8080' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().url).toBe('/');
    expect(broker?.cache.keys()).toEqual([`${DEVICE_ID}:8080`]);
  });

  it('answers 400 without a device id', async () => {
    const server = await build();

    const response = await server.inject({ method: 'GET', url: '/', headers: { host: '.broker.test' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'no device ID provided' });
  });

  it('answers 404 when the tunnel cannot be opened', async () => {
    const server = await build();

    const response = await server.inject({ method: 'GET', url: '/', headers: { 'x-qbee-device-id': 'not-a-device' } });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'invalid device ID not-a-device' });
  });

  it('requires the broker token and then accepts the session cookie', async () => {
    const server = await build('test-secret');
    const headers = { 'x-qbee-device-id': DEVICE_ID };

    const denied = await server.inject({ method: 'GET', url: '/', headers });
    expect(denied.statusCode).toBe(401);
    expect(denied.json()).toEqual({ error: 'Unauthorized' });

    const wrong = await server.inject({
      method: 'GET',
      url: '/',
      headers: { ...headers, 'x-qbee-authorization': 'wrong-secret' },
    });
    expect(wrong.statusCode).toBe(401);

    const granted = await server.inject({
      method: 'GET',
      url: '/',
      headers: { ...headers, 'x-qbee-authorization': 'test-secret' },
    });
    expect(granted.statusCode).toBe(200);
    expect(granted.json().authorization).toBeNull();

    const cookie = granted.cookies.find((c) => c.name === 'session_token');
    expect(cookie).toMatchObject({ path: '/', httpOnly: true, sameSite: 'Strict' });

    const withCookie = await server.inject({
      method: 'GET',
      url: '/',
      headers,
      cookies: { session_token: cookie?.value ?? '' },
    });
    expect(withCookie.statusCode).toBe(200);

    const repeated = await server.inject({
      method: 'GET',
      url: '/',
      headers: { ...headers, 'x-qbee-authorization': 'test-secret' },
      cookies: { session_token: cookie?.value ?? '' },
    });
    expect(repeated.statusCode).toBe(200);
    expect(repeated.cookies.find((c) => c.name === 'session_token')).toBeUndefined();

    const stale = await server.inject({ method: 'GET', url: '/', headers, cookies: { session_token: 'unknown' } });
    expect(stale.statusCode).toBe(401);
  });
});

describe('deviceIdFromHeaders', () => {
  it('prefers the device id header', () => {
    expect(deviceIdFromHeaders({ 'x-qbee-device-id': DEVICE_ID, host: 'other.example.com' })).toBe(DEVICE_ID);
  });

  it('falls back to the first Host label without the port', () => {
    expect(deviceIdFromHeaders({ host: 'dev1.broker.example.com:8081' })).toBe('dev1');
    expect(deviceIdFromHeaders({ host: 'dev1:8081' })).toBe('dev1');
  });

  it('is empty when neither gives an id', () => {
    expect(deviceIdFromHeaders({})).toBe('');
    expect(deviceIdFromHeaders({ host: '.example.com' })).toBe('');
  });
});
