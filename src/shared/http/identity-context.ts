/**
 * src/shared/http/identity-context.ts
 *
 * WHY:
 * - One request may ask "who is this?" several times (handler, guard, error
 *   handler while rendering a failure). Only the first ask may reach the hub.
 * - The memo lives in an explicit per-request value, created when the request
 *   starts and dropped with it. Nothing is stored on long-lived objects.
 *
 * RULES:
 * - `lookup` holds the first lookup's promise: later asks (even concurrent ones)
 *   await the same promise, so a failure replays as the same AppError and is
 *   logged once.
 * - `settled` is filled once the lookup succeeded; peekIdentity() reads it
 *   synchronously and never starts a lookup.
 * - The resolver itself (modules/hub-auth) only sees IdentityContext; the Fastify
 *   wiring below is the one place that knows about requests.
 *
 * HOW IT WORKS:
 * 1. registerIdentityContext() gives every request a fresh context in onRequest.
 * 2. Routes that need the user call the resolver with req.identityContext.
 * 3. Logs read peekIdentity(), which never resolves anything.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type IdentityContext = {
  /** Parsed request cookies. */
  readonly cookies: ReadonlyMap<string, string>;

  lookup: Promise<string | null> | null;
  settled: { identity: string | null } | null;
};

export function createIdentityContext(cookies: ReadonlyMap<string, string>): IdentityContext {
  return { cookies, lookup: null, settled: null };
}

/** The already-resolved identity, or null if unresolved / anonymous. */
export function peekIdentity(ctx: IdentityContext): string | null {
  return ctx.settled?.identity ?? null;
}

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2".
 * Values are kept verbatim (hub cookies are opaque; we never decode them).
 */
export function parseCookies(raw: string | undefined): Map<string, string> {
  const cookies = new Map<string, string>();
  if (!raw) return cookies;

  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    let value = pair.substring(eqIdx + 1).trim();
    // RFC 6265 allows DQUOTE-wrapped values
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    // first occurrence wins (most specific path is sent first)
    if (key && !cookies.has(key)) cookies.set(key, value);
  }
  return cookies;
}

declare module 'fastify' {
  interface FastifyRequest {
    identityContext: IdentityContext;
  }
}

export function registerIdentityContext(app: FastifyInstance): void {
  app.decorateRequest('identityContext', null, []);

  // Runs AFTER requestContext (server.ts registers it second).
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.identityContext = createIdentityContext(parseCookies(req.headers.cookie));
    done();
  });
}
