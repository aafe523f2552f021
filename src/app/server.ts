/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts (never listens itself).
 * - Global request context (requestId) and the per-request identity memo are
 *   attached here, before any route runs.
 */

import Fastify from 'fastify';

import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { withRequestContext } from '../shared/logger/with-context';
import { registerIdentityContext } from '../shared/http/identity-context';

export function buildServer() {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerIdentityContext(app);
  registerErrorHandler(app);

  // Basic request logging (requestId + host)
  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', {
      method: req.method,
      url: req.url,
    });
    done();
  });

  return app;
}
