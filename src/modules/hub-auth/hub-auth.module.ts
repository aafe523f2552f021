/**
 * src/modules/hub-auth/hub-auth.module.ts
 *
 * WHY:
 * - Encapsulates hub-auth wiring: cache → verifier → resolver, plus the cache
 *   expiry timer and the logout action.
 * - DI passes settings + infra in; module composes domain units.
 *
 * RULES:
 * - No globals/singletons here. One cache per module instance.
 * - start()/stop() own the only background work (the cache expiry timer).
 */

import type { FastifyInstance } from 'fastify';
import type { HubAuthSettings } from '../../app/config';
import type { Logger } from '../../shared/logger/logger';

import { VerificationCache } from './cache/verification-cache';
import { CookieCacheExpiry } from './cache/cookie-cache-expiry';
import { HubClient, type HubFetch } from './hub.client';
import { TokenVerifier } from './token-verifier';
import { HubIdentityResolver, type CurrentIdentityResolver } from './identity-resolver';
import { HubLogoutAction, type LogoutAction } from './logout-action';
import { HubAuthController } from './hub-auth.controller';
import { registerHubAuthRoutes } from './hub-auth.routes';

export type HubAuthModule = ReturnType<typeof createHubAuthModule>;

export function createHubAuthModule(deps: {
  settings: HubAuthSettings;
  logger: Logger;
  fetch?: HubFetch;
}) {
  const { settings, logger } = deps;

  const cache = new VerificationCache();
  const expiry = new CookieCacheExpiry(cache, {
    lifetimeSeconds: settings.cookieCacheLifetimeSeconds,
    logger,
  });

  const hubClient = new HubClient({
    apiUrl: settings.hubApiUrl,
    apiToken: settings.hubApiToken,
    timeoutMs: settings.hubApiTimeoutMs,
    fetch: deps.fetch,
  });

  const verifier = new TokenVerifier({ cache, hubClient, logger });

  const resolver: CurrentIdentityResolver = new HubIdentityResolver({
    verifier,
    expectedUser: settings.user,
    cookieName: settings.cookieName,
    logger,
  });

  const logoutAction: LogoutAction = new HubLogoutAction(settings);

  const controller = new HubAuthController(resolver, logoutAction, settings);

  return {
    cache,
    verifier,
    resolver,
    logoutAction,
    start() {
      expiry.start();
    },
    stop() {
      expiry.stop();
    },
    registerRoutes(app: FastifyInstance) {
      registerHubAuthRoutes(app, controller, settings.baseUrl);
    },
  };
}
