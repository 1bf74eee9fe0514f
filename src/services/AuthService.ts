import { randomUUID, timingSafeEqual } from 'crypto';

export const SESSION_COOKIE = 'session_token';
export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000;

export interface AuthServiceOptions {
  /** Shared secret callers present in `X-Qbee-Authorization`; empty disables auth */
  token?: string;
  sessionTtl?: number;
  now?: () => number;
}

/**
 * Broker access control. A caller presenting the configured token gets a
 * short-lived session, which the middleware hands out as a cookie.
 */
export class AuthService {
  private readonly token: string;
  private readonly sessionTtl: number;
  private readonly now: () => number;
  private readonly sessions = new Map<string, number>();

  constructor(options: AuthServiceOptions = {}) {
    this.token = options.token ?? '';
    this.sessionTtl = options.sessionTtl ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? (() => Date.now());
  }

  isEnabled(): boolean {
    return this.token !== '';
  }

  validateToken(candidate: string): boolean {
    const expected = Buffer.from(this.token);
    const actual = Buffer.from(candidate);
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }

  createSession(): string {
    this.pruneExpired();
    const id = randomUUID();
    this.sessions.set(id, this.now() + this.sessionTtl);
    return id;
  }

  /** True for a known session that has not expired; expired ones are dropped. */
  verifySession(id: string): boolean {
    const expiresAt = this.sessions.get(id);
    if (expiresAt === undefined) {
      return false;
    }
    if (this.now() >= expiresAt) {
      this.sessions.delete(id);
      return false;
    }
    return true;
  }

  /** Drops every session past its expiry. */
  pruneExpired(): void {
    const now = this.now();
    for (const [id, expiresAt] of this.sessions) {
      if (now >= expiresAt) {
        this.sessions.delete(id);
      }
    }
  }

  get sessionCount(): number {
    return this.sessions.size;
  }
}
