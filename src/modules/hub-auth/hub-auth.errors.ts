/**
 * src/modules/hub-auth/hub-auth.errors.ts
 *
 * WHY:
 * - Hub-auth module owns the classification of hub failures.
 * - Classification happens once (TokenVerifier); everything above propagates the
 *   AppError unchanged.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Messages are generic: never include the cookie value or the API token.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const HubAuthErrors = {
  /** Hub answered 403: this instance's own API token is invalid or expired. */
  ownCredentialInvalid(meta?: AppErrorMeta) {
    return AppError.internal(
      'Permission failure checking authorization. This server may need to be restarted.',
      meta,
    );
  },

  /** Hub answered >= 500, timed out, or could not be reached. */
  upstreamUnavailable(meta?: AppErrorMeta) {
    return AppError.badGateway(
      'Failed to check authorization. There is an upstream problem with the hub.',
      meta,
    );
  },

  /** Hub answered some other 4xx: the request we built is wrong. */
  malformedRequest(meta?: AppErrorMeta) {
    return AppError.internal('Failed to check authorization.', meta);
  },

  /** Anonymous caller on an endpoint that needs the expected identity. */
  authenticationRequired(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required', meta);
  },
};
