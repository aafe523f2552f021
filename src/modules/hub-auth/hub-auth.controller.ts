/**
 * src/modules/hub-auth/hub-auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → identity resolver / logout action for the single-user pages.
 * - Depends on the two extension-point interfaces, not on their hub implementations.
 *
 * RULES:
 * - No hub calls here (the resolver owns them).
 * - Anonymous browsers are sent to the hub's login page with `next` pointing back.
 * - API callers get 401 instead of a redirect.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { HubAuthSettings } from '../../app/config';
import type { CurrentIdentityResolver } from './identity-resolver';
import type { LogoutAction } from './logout-action';
import { HubAuthErrors } from './hub-auth.errors';
import { hubLoginUrl, safeNextPath } from './hub-urls';

const loginQuerySchema = z.object({
  next: z.string().optional(),
});

export class HubAuthController {
  constructor(
    private readonly resolver: CurrentIdentityResolver,
    private readonly logoutAction: LogoutAction,
    private readonly settings: HubAuthSettings,
  ) {}

  /** GET {baseUrl} */
  async home(req: FastifyRequest, reply: FastifyReply) {
    const user = await this.resolver.resolve(req.identityContext);
    if (!user) {
      return reply.redirect(hubLoginUrl(this.settings, req.url));
    }

    return reply.send({ user, baseUrl: this.settings.baseUrl });
  }

  /** GET {baseUrl}api/user */
  async currentUser(req: FastifyRequest, reply: FastifyReply) {
    const user = await this.resolver.resolve(req.identityContext);
    if (!user) throw HubAuthErrors.authenticationRequired();

    return reply.send({ name: user });
  }

  /** GET {baseUrl}login */
  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginQuerySchema.safeParse(req.query);
    const next = safeNextPath(parsed.success ? parsed.data.next : undefined, this.settings.baseUrl);

    const user = await this.resolver.resolve(req.identityContext);
    if (user) return reply.redirect(next);

    return reply.redirect(hubLoginUrl(this.settings, next));
  }

  /** GET {baseUrl}logout */
  logout(_req: FastifyRequest, reply: FastifyReply): void {
    this.logoutAction.logout(reply);
  }
}
