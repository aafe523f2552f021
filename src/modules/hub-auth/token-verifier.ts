/**
 * src/modules/hub-auth/token-verifier.ts
 *
 * WHY:
 * - Turns an opaque session cookie into the hub's verdict: a record, or null.
 * - The cache makes the common path (same cookie, next page load) free of I/O.
 *
 * FLOW:
 * 1) Cache hit → return the stored verdict (record or null). No hub call.
 * 2) Miss → exactly one GET to the hub's cookie endpoint.
 * 3) Classify:
 *    - 404          → null (unknown / expired cookie — not an error)
 *    - 403          → our own API token is bad → 500, error log
 *    - >= 500       → hub trouble → 502, error log
 *    - other >= 400 → we sent something wrong → 500, warn log
 *    - 2xx          → body parsed as AuthorizationRecord
 *    - no response, or body lost in transit (network error, timeout) → treated as >= 500
 * 4) Store the verdict (null included) and return it.
 *
 * RULES:
 * - Failures are NOT cached: the next request retries the hub.
 * - A 2xx body that doesn't match the schema is a contract break with the hub and
 *   propagates as-is (ZodError → generic 500).
 * - No retries here. Retry policy belongs to whoever calls the resolver.
 * - Callers guarantee a non-empty cookie value.
 */

import type { Logger } from '../../shared/logger/logger';
import type { VerificationCache } from './cache/verification-cache';
import type { HubClient, HubResponse } from './hub.client';
import { HubAuthErrors } from './hub-auth.errors';
import { authorizationRecordSchema } from './hub-auth.types';
import type { AuthorizationRecord, VerificationOutcome } from './hub-auth.types';

const FLOW = 'hub_auth.verify';

export class TokenVerifier {
  constructor(
    private readonly deps: {
      cache: VerificationCache;
      hubClient: HubClient;
      logger: Logger;
    },
  ) {}

  async verify(cookieName: string, cookieValue: string): Promise<VerificationOutcome> {
    const cached = this.deps.cache.lookup(cookieValue);
    if (cached.hit) return cached.value;

    const response = await this.request(cookieName, cookieValue);
    const outcome = await this.classify(cookieName, response);

    this.deps.cache.store(cookieValue, outcome);
    return outcome;
  }

  private async request(cookieName: string, cookieValue: string): Promise<HubResponse> {
    try {
      return await this.deps.hubClient.getCookieAuthorization(cookieName, cookieValue);
    } catch (err) {
      this.deps.logger.error('hub_auth.verify.hub_unreachable', {
        flow: FLOW,
        cookieName,
        err,
      });
      throw HubAuthErrors.upstreamUnavailable({ cookieName, reason: 'unreachable' });
    }
  }

  private async classify(cookieName: string, response: HubResponse): Promise<VerificationOutcome> {
    const { status } = response;

    if (status === 404) return null;

    if (status === 403) {
      this.deps.logger.error('hub_auth.verify.own_credential_invalid', {
        flow: FLOW,
        cookieName,
        status,
      });
      throw HubAuthErrors.ownCredentialInvalid({ cookieName, status });
    }

    if (status >= 500) {
      this.deps.logger.error('hub_auth.verify.upstream_failure', {
        flow: FLOW,
        cookieName,
        status,
      });
      throw HubAuthErrors.upstreamUnavailable({ cookieName, status });
    }

    if (status >= 400) {
      this.deps.logger.warn('hub_auth.verify.malformed_request', {
        flow: FLOW,
        cookieName,
        status,
      });
      throw HubAuthErrors.malformedRequest({ cookieName, status });
    }

    const body = await this.readBody(cookieName, response);
    const record: AuthorizationRecord = Object.freeze(authorizationRecordSchema.parse(body));
    return record;
  }

  /**
   * The body can still fail in transit after the status arrived (timeout, dropped
   * connection); that is the hub's problem, same as no response at all.
   * A body that arrived but isn't JSON is a contract break and stays unclassified.
   */
  private async readBody(cookieName: string, response: HubResponse): Promise<unknown> {
    try {
      return await response.json();
    } catch (err) {
      if (err instanceof SyntaxError) throw err;

      this.deps.logger.error('hub_auth.verify.hub_unreachable', {
        flow: FLOW,
        cookieName,
        stage: 'body',
        err,
      });
      throw HubAuthErrors.upstreamUnavailable({ cookieName, reason: 'unreachable' });
    }
  }
}
