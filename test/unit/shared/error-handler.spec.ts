import { describe, it, expect } from 'vitest';
import { redactMeta } from '../../../src/shared/http/error-handler';
import { HubAuthErrors } from '../../../src/modules/hub-auth/hub-auth.errors';

describe('redactMeta', () => {
  it('hides cookie values and tokens but keeps other fields', () => {
    expect(
      redactMeta({ cookieName: 'hub-session', cookieValue: 'abc', hubApiToken: 'test-secret', status: 403 }),
    ).toEqual({
      cookieName: 'hub-session',
      cookieValue: '[REDACTED]',
      hubApiToken: '[REDACTED]',
      status: 403,
    });
  });

  it('passes non-objects through', () => {
    expect(redactMeta(undefined)).toBeUndefined();
    expect(redactMeta('x')).toBe('x');
  });
});

describe('HubAuthErrors', () => {
  it('classifies hub failures into HTTP statuses', () => {
    expect(HubAuthErrors.ownCredentialInvalid().status).toBe(500);
    expect(HubAuthErrors.upstreamUnavailable().status).toBe(502);
    expect(HubAuthErrors.upstreamUnavailable().code).toBe('BAD_GATEWAY');
    expect(HubAuthErrors.malformedRequest().status).toBe(500);
    expect(HubAuthErrors.authenticationRequired().status).toBe(401);
  });
});
