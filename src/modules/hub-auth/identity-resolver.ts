/**
 * src/modules/hub-auth/identity-resolver.ts
 *
 * WHY:
 * - The "current user" extension point of the host server.
 * - Maps a request's cookie to the single identity this instance serves, or null.
 *
 * FLOW:
 * 1) Memo present → return / replay it.
 * 2) No cookie (or empty) → null, no hub call.
 * 3) Ask the TokenVerifier.
 * 4) null verdict → null.
 * 5) record.name === expected user (exact, case-sensitive) → user; otherwise null.
 *
 * RULES:
 * - A valid session for someone else is not an error: it is "not this user".
 *   The other name is never returned (and is not logged either).
 * - Verification failures propagate unchanged (already classified by the verifier).
 */

import type { Logger } from '../../shared/logger/logger';
import type { IdentityContext } from '../../shared/http/identity-context';
import type { TokenVerifier } from './token-verifier';

export interface CurrentIdentityResolver {
  resolve(ctx: IdentityContext): Promise<string | null>;
}

export class HubIdentityResolver implements CurrentIdentityResolver {
  constructor(
    private readonly deps: {
      verifier: TokenVerifier;
      expectedUser: string;
      cookieName: string;
      logger: Logger;
    },
  ) {}

  resolve(ctx: IdentityContext): Promise<string | null> {
    if (!ctx.lookup) ctx.lookup = this.lookup(ctx);
    return ctx.lookup;
  }

  private async lookup(ctx: IdentityContext): Promise<string | null> {
    const identity = await this.identify(ctx);
    ctx.settled = { identity };
    return identity;
  }

  private async identify(ctx: IdentityContext): Promise<string | null> {
    const { cookieName, expectedUser } = this.deps;

    const cookieValue = ctx.cookies.get(cookieName);
    if (!cookieValue) return null;

    const record = await this.deps.verifier.verify(cookieName, cookieValue);
    if (!record) return null;

    if (record.name !== expectedUser) {
      this.deps.logger.warn('hub_auth.identity_mismatch', {
        flow: 'hub_auth.resolve',
        expectedUser,
      });
      return null;
    }

    return record.name;
  }
}
