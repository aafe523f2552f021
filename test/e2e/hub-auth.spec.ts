import { describe, it, expect, vi } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { createFakeHub } from '../helpers/fake-hub';

/**
 * E2E tests for hub-delegated identity on the single-user endpoints.
 * The hub is an in-process FakeHub; every test asserts how many times it was asked.
 */

const SESSION = { cookie: 'hub-session=cookie-1' };

describe('GET {baseUrl}api/user', () => {
  it('no cookie → 401 and zero hub calls', async () => {
    const { app, hub, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/user/alice/api/user' });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
      expect(hub.calls).toHaveLength(0);
    } finally {
      await close();
    }
  });

  it('matching session → identity, cached for the next request', async () => {
    const hub = createFakeHub({ status: 200, body: { name: 'alice' } });
    const { app, deps, close } = await buildTestApp({ hub });

    try {
      const res = await app.inject({ method: 'GET', url: '/user/alice/api/user', headers: SESSION });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ name: 'alice' });
      expect(deps.hubAuth.cache.lookup('cookie-1')).toEqual({
        hit: true,
        value: { name: 'alice' },
      });
      expect(hub.calls).toEqual([
        {
          url: 'http://hub.test/hub/api/authorizations/cookie/hub-session/cookie-1',
          method: 'GET',
          authorization: 'token test-secret',
        },
      ]);

      const again = await app.inject({ method: 'GET', url: '/user/alice/api/user', headers: SESSION });
      expect(again.statusCode).toBe(200);
      expect(hub.calls).toHaveLength(1);
    } finally {
      await close();
    }
  });

  it('after the cookie cache lifetime passes, the hub is asked again', async () => {
    // Only the interval is faked; Fastify's own scheduling stays real.
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    const hub = createFakeHub({ status: 200, body: { name: 'alice' } });

    try {
      const { app, deps, close } = await buildTestApp({ hub, settings: { cookieCacheLifetimeSeconds: 60 } });

      try {
        const first = await app.inject({ method: 'GET', url: '/user/alice/api/user', headers: SESSION });
        expect(first.statusCode).toBe(200);
        expect(hub.calls).toHaveLength(1);

        vi.advanceTimersByTime(60_000);
        expect(deps.hubAuth.cache.lookup('cookie-1')).toEqual({ hit: false });

        const second = await app.inject({ method: 'GET', url: '/user/alice/api/user', headers: SESSION });
        expect(second.statusCode).toBe(200);
        expect(second.json()).toEqual({ name: 'alice' });
        expect(hub.calls).toHaveLength(2);
      } finally {
        await close();
      }
    } finally {
      vi.useRealTimers();
    }
  });

  it('session of another user → 401, the other name is not revealed', async () => {
    const hub = createFakeHub({ status: 200, body: { name: 'alice' } });
    const { app, close } = await buildTestApp({
      hub,
      settings: { user: 'bob', baseUrl: '/user/bob/' },
    });

    try {
      const res = await app.inject({ method: 'GET', url: '/user/bob/api/user', headers: SESSION });

      expect(res.statusCode).toBe(401);
      expect(res.body).not.toContain('alice');
    } finally {
      await close();
    }
  });

  it('hub answers 403 → 500 with restart hint, error logged, nothing cached', async () => {
    const hub = createFakeHub({ status: 403 });
    const { app, deps, logger, close } = await buildTestApp({ hub });

    try {
      const res = await app.inject({ method: 'GET', url: '/user/alice/api/user', headers: SESSION });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        error: {
          code: 'INTERNAL',
          message:
            'Permission failure checking authorization. This server may need to be restarted.',
        },
      });
      expect(logger.error).toHaveBeenCalledWith('hub_auth.verify.own_credential_invalid', {
        flow: 'hub_auth.verify',
        cookieName: 'hub-session',
        status: 403,
      });
      expect(deps.hubAuth.cache.lookup('cookie-1')).toEqual({ hit: false });

      // token fixed at the hub → the next request retries and succeeds
      hub.reply({ status: 200, body: { name: 'alice' } });
      const retry = await app.inject({ method: 'GET', url: '/user/alice/api/user', headers: SESSION });
      expect(retry.statusCode).toBe(200);
      expect(hub.calls).toHaveLength(2);
    } finally {
      await close();
    }
  });

  it('hub answers 503 → 502 gateway error', async () => {
    const hub = createFakeHub({ status: 503 });
    const { app, close } = await buildTestApp({ hub });

    try {
      const res = await app.inject({ method: 'GET', url: '/user/alice/api/user', headers: SESSION });

      expect(res.statusCode).toBe(502);
      expect(res.json()).toEqual({
        error: {
          code: 'BAD_GATEWAY',
          message: 'Failed to check authorization. There is an upstream problem with the hub.',
        },
      });
    } finally {
      await close();
    }
  });

  it('unknown cookie → 401, and the null verdict is cached', async () => {
    const hub = createFakeHub({ status: 404 });
    const { app, close } = await buildTestApp({ hub });

    try {
      for (let i = 0; i < 3; i++) {
        const res = await app.inject({ method: 'GET', url: '/user/alice/api/user', headers: SESSION });
        expect(res.statusCode).toBe(401);
      }
      expect(hub.calls).toHaveLength(1);
    } finally {
      await close();
    }
  });
});

describe('GET {baseUrl}', () => {
  it('anonymous browser → redirect to hub login with next', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/user/alice/' });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/hub/login?next=%2Fuser%2Falice%2F');
    } finally {
      await close();
    }
  });

  it('expected user → page payload', async () => {
    const hub = createFakeHub({ status: 200, body: { name: 'alice' } });
    const { app, close } = await buildTestApp({ hub });

    try {
      const res = await app.inject({ method: 'GET', url: '/user/alice/', headers: SESSION });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ user: 'alice', baseUrl: '/user/alice/' });
    } finally {
      await close();
    }
  });
});

describe('GET {baseUrl}login', () => {
  it('anonymous → hub login, carrying next', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/user/alice/login?next=%2Fuser%2Falice%2Ftree',
      });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/hub/login?next=%2Fuser%2Falice%2Ftree');
    } finally {
      await close();
    }
  });

  it('already authenticated → straight to next', async () => {
    const hub = createFakeHub({ status: 200, body: { name: 'alice' } });
    const { app, close } = await buildTestApp({ hub });

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/user/alice/login?next=%2Fuser%2Falice%2Ftree',
        headers: SESSION,
      });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/user/alice/tree');
    } finally {
      await close();
    }
  });

  it('ignores off-site next targets', async () => {
    const hub = createFakeHub({ status: 200, body: { name: 'alice' } });
    const { app, close } = await buildTestApp({ hub });

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/user/alice/login?next=%2F%2Fevil.test',
        headers: SESSION,
      });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/user/alice/');
    } finally {
      await close();
    }
  });
});

describe('GET {baseUrl}logout', () => {
  it('redirects to the hub logout page without asking the hub', async () => {
    const hub = createFakeHub({ status: 200, body: { name: 'alice' } });
    const { app, close } = await buildTestApp({
      hub,
      settings: { hubHost: 'https://hub.test' },
    });

    try {
      const res = await app.inject({ method: 'GET', url: '/user/alice/logout', headers: SESSION });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('https://hub.test/hub/logout');
      expect(hub.calls).toHaveLength(0);
    } finally {
      await close();
    }
  });
});
