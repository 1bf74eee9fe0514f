/**
 * Error taxonomy shared by the CLI and the broker.
 *
 * `statusCode` and `code` are read by the Fastify error handler, so a
 * failure thrown anywhere below a route ends up as `{ error, code }` with
 * the matching HTTP status.
 */
export class TunnelSystemError extends Error {
  readonly statusCode: number = 500;
  readonly code: string = 'INTERNAL_ERROR';
  /** Retrying cannot help; supervisors give up at once */
  readonly permanent: boolean = false;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed target, port or device identifier. Never retried. */
export class ParseError extends TunnelSystemError {
  override readonly statusCode = 400;
  override readonly code = 'PARSE_ERROR';
  override readonly permanent = true;
}

/** The device is reachable only through an edge this client cannot talk to. */
export class UnsupportedError extends TunnelSystemError {
  override readonly statusCode = 501;
  override readonly code = 'UNSUPPORTED';
  override readonly permanent = true;
}

/** Device lookup failed or remote access is disabled for it. */
export class ResolutionError extends TunnelSystemError {
  override readonly statusCode = 404;
  override readonly code = 'RESOLUTION_ERROR';
}

/** Session or stream could not be established, or the session died. */
export class TransportError extends TunnelSystemError {
  override readonly statusCode = 502;
  override readonly code = 'TRANSPORT_ERROR';
}

/** Local listener could not be bound or never became ready. */
export class TunnelError extends TunnelSystemError {
  override readonly statusCode = 502;
  override readonly code = 'TUNNEL_ERROR';
}

/** Missing or incorrect broker token. */
export class AuthError extends TunnelSystemError {
  override readonly statusCode = 401;
  override readonly code = 'UNAUTHORIZED';
}

/** Non-2xx answer from the management API. */
export class ApiError extends TunnelSystemError {
  override readonly code = 'API_ERROR';

  constructor(
    readonly status: number,
    readonly body: Record<string, unknown> | null,
  ) {
    super(body ? JSON.stringify(body) : `got an http error with no body: ${status}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
