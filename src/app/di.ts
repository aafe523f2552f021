/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Builds the hub-auth module ONCE from the typed settings; nothing reads a
 *   global settings map afterwards.
 * - Keeps modules testable: tests inject a fetch stand-in and a spy logger here.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 */

import type { AppConfig } from './config';

import { configureLogger, logger as defaultLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createHubAuthModule } from '../modules/hub-auth/hub-auth.module';
import type { HubAuthModule } from '../modules/hub-auth/hub-auth.module';
import type { HubFetch } from '../modules/hub-auth/hub.client';

export type AppDeps = {
  logger: Logger;

  // modules
  hubAuth: HubAuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  logger?: Logger;
  fetch?: HubFetch;
};

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  configureLogger(config);
  const logger = overrides.logger ?? defaultLogger;

  const hubAuth = createHubAuthModule({
    settings: config.hubAuth,
    logger,
    fetch: overrides.fetch,
  });

  hubAuth.start();

  return {
    logger,
    hubAuth,
    close: () => {
      hubAuth.stop();
      return Promise.resolve();
    },
  };
}
