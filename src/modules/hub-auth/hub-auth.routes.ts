/**
 * src/modules/hub-auth/hub-auth.routes.ts
 *
 * WHY:
 * - Declares the single-user endpoints under the configured base URL.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { HubAuthController } from './hub-auth.controller';

export function registerHubAuthRoutes(
  app: FastifyInstance,
  controller: HubAuthController,
  baseUrl: string,
) {
  app.get(baseUrl, controller.home.bind(controller));
  app.get(`${baseUrl}api/user`, controller.currentUser.bind(controller));
  app.get(`${baseUrl}login`, controller.login.bind(controller));
  app.get(`${baseUrl}logout`, controller.logout.bind(controller));
}
