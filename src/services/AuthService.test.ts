import { describe, it, expect } from 'vitest';
import { AuthService, DEFAULT_SESSION_TTL_MS } from './AuthService.js';

describe('AuthService', () => {
  it('is disabled without a token', () => {
    expect(new AuthService().isEnabled()).toBe(false);
    expect(new AuthService({ token: 'test-secret' }).isEnabled()).toBe(true);
  });

  it('compares tokens exactly', () => {
    const auth = new AuthService({ token: 'test-secret' });

    expect(auth.validateToken('test-secret')).toBe(true);
    expect(auth.validateToken('test-secreT')).toBe(false);
    expect(auth.validateToken('test')).toBe(false);
    expect(auth.validateToken('')).toBe(false);
  });

  it('expires sessions after the TTL', () => {
    let now = 1000;
    const auth = new AuthService({ token: 'test-secret', now: () => now });

    const session = auth.createSession();
    expect(auth.verifySession(session)).toBe(true);

    now += DEFAULT_SESSION_TTL_MS - 1;
    expect(auth.verifySession(session)).toBe(true);

    now += 1;
    expect(auth.verifySession(session)).toBe(false);
    expect(auth.sessionCount).toBe(0);
  });

  it('drops expired sessions when a new one is created', () => {
    let now = 1000;
    const auth = new AuthService({ token: 'test-secret', sessionTtl: 100, now: () => now });

    for (let i = 0; i < 10000; i++) {
      auth.createSession();
    }
    expect(auth.sessionCount).toBe(10000);

    now += 100;
    const fresh = auth.createSession();
    expect(auth.sessionCount).toBe(1);
    expect(auth.verifySession(fresh)).toBe(true);
  });

  it('rejects unknown sessions', () => {
    const auth = new AuthService({ token: 'test-secret' });
    auth.createSession();

    expect(auth.verifySession('not-a-session')).toBe(false);
    expect(auth.sessionCount).toBe(1);
  });
});
