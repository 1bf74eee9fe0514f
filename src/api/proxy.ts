import type { IncomingHttpHeaders } from 'http';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { BrokerService } from '../services/BrokerService.js';
import { errorMessage } from '../utils/errors.js';
import { AUTH_HEADER } from '../middleware/auth.js';

export const DEVICE_ID_HEADER = 'x-qbee-device-id';
export const DEVICE_PORT_HEADER = 'x-qbee-device-port';

export type RemoteProtocol = 'http' | 'https';

export interface ProxyRouteOptions {
  /** Device port used when the request carries no `X-Qbee-Device-Port` */
  defaultDevicePort: string;
  protocol: RemoteProtocol;
}

function headerValue(value: string | string[] | undefined): string {
  return (Array.isArray(value) ? value[0] : value)?.trim() ?? '';
}

/** Device id from the header, else the first label of the Host header. */
export function deviceIdFromHeaders(headers: IncomingHttpHeaders): string {
  const fromHeader = headerValue(headers[DEVICE_ID_HEADER]);
  if (fromHeader) {
    return fromHeader;
  }

  const host = headerValue(headers.host);
  const hostname = host.startsWith('[') ? '' : host.split(':')[0];
  return hostname.split('.')[0];
}

export async function proxyRoutes(app: FastifyInstance, broker: BrokerService, options: ProxyRouteOptions) {
  // Bodies are streamed to the device untouched
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', (_request, payload, done) => done(null, payload));

  const forward = async (request: FastifyRequest, reply: FastifyReply) => {
    const deviceId = deviceIdFromHeaders(request.headers);
    if (!deviceId) {
      return reply.status(400).send({ error: 'no device ID provided' });
    }

    const devicePort = headerValue(request.headers[DEVICE_PORT_HEADER]) || options.defaultDevicePort;

    let localPort: number;
    try {
      localPort = await broker.doPortForwarding(deviceId, devicePort);
    } catch (err) {
      request.log.warn(`error forwarding to ${deviceId}:${devicePort}: ${errorMessage(err)}`);
      return reply.status(404).send({ error: errorMessage(err) });
    }

    return reply.from(`${options.protocol}://localhost:${localPort}${request.url}`, {
      rewriteRequestHeaders: (_request, headers) => {
        const forwarded = { ...headers };
        delete forwarded[AUTH_HEADER];
        return forwarded;
      },
      onError: (errorReply, { error }) => {
        request.log.error(`proxy error for ${deviceId}:${devicePort}: ${error.message}`);
        errorReply.status(502).send({ error: error.message, code: 'PROXY_ERROR' });
      },
    });
  };

  app.all('/', forward);
  app.all('/*', forward);
}
