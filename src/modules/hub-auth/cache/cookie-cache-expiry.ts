/**
 * src/modules/hub-auth/cache/cookie-cache-expiry.ts
 *
 * WHY:
 * - Bounds how long a session revoked at the hub keeps working here:
 *   at most one lifetime after revocation, the next request re-verifies.
 *
 * HOW TO USE:
 * - const expiry = new CookieCacheExpiry(cache, { lifetimeSeconds: 300, logger })
 * - expiry.start() once at startup; expiry.stop() on shutdown.
 *
 * RULES:
 * - lifetimeSeconds = 0 disables the timer; entries then live for the process lifetime.
 * - The interval is unref'd: it must never keep the process alive on its own.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { VerificationCache } from './verification-cache';

export class CookieCacheExpiry {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly cache: VerificationCache,
    private readonly opts: { lifetimeSeconds: number; logger: Logger },
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    if (this.opts.lifetimeSeconds <= 0) {
      this.opts.logger.info('hub_auth.cookie_cache.expiry_disabled', {
        flow: 'hub_auth.cookie_cache',
      });
      return;
    }

    this.timer = setInterval(() => this.expire(), this.opts.lifetimeSeconds * 1000);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  private expire(): void {
    const dropped = this.cache.clear();
    this.opts.logger.debug('hub_auth.cookie_cache.cleared', {
      flow: 'hub_auth.cookie_cache',
      dropped,
    });
  }
}
