/**
 * src/modules/hub-auth/logout-action.ts
 *
 * WHY:
 * - The "log the user out" extension point of the host server.
 * - Sessions belong to the hub, so logging out here means sending the browser to
 *   the hub's logout page. Nothing is cleared locally: the cookie is the hub's.
 */

import type { HubAuthSettings } from '../../app/config';
import { hubLogoutUrl } from './hub-urls';

/** Anything that can answer a request with a redirect (FastifyReply fits). */
export type RedirectReply = {
  redirect(url: string): unknown;
};

export interface LogoutAction {
  logout(reply: RedirectReply): void;
}

export class HubLogoutAction implements LogoutAction {
  constructor(private readonly settings: Pick<HubAuthSettings, 'hubHost' | 'hubPrefix'>) {}

  logout(reply: RedirectReply): void {
    reply.redirect(hubLogoutUrl(this.settings));
  }
}
