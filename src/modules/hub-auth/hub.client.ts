/**
 * src/modules/hub-auth/hub.client.ts
 *
 * WHY:
 * - One place that knows the hub's REST shape (URL layout + auth header).
 * - `fetch` is injected so tests can answer for the hub in-process.
 *
 * RULES:
 * - No classification here: the client returns whatever status the hub sent and
 *   throws only when no response arrived (network failure, timeout).
 * - The cookie value is percent-encoded; it is opaque and may hold '/', '=', '|'.
 * - Never log the cookie value or the API token.
 */

export type HubFetch = (
  url: string,
  init: { method: 'GET'; headers: Record<string, string>; signal: AbortSignal },
) => Promise<HubResponse>;

export type HubResponse = {
  status: number;
  json(): Promise<unknown>;
};

export type HubClientOptions = {
  apiUrl: string;
  apiToken: string;
  timeoutMs: number;
  fetch?: HubFetch;
};

export class HubClient {
  private readonly fetchImpl: HubFetch;

  constructor(private readonly opts: HubClientOptions) {
    this.fetchImpl = opts.fetch ?? fetch;
  }

  cookieAuthorizationUrl(cookieName: string, cookieValue: string): string {
    return `${this.opts.apiUrl}/authorizations/cookie/${encodeURIComponent(cookieName)}/${encodeURIComponent(cookieValue)}`;
  }

  /** GET {apiUrl}/authorizations/cookie/{name}/{value} */
  getCookieAuthorization(cookieName: string, cookieValue: string): Promise<HubResponse> {
    return this.fetchImpl(this.cookieAuthorizationUrl(cookieName, cookieValue), {
      method: 'GET',
      headers: {
        Authorization: `token ${this.opts.apiToken}`,
      },
      signal: AbortSignal.timeout(this.opts.timeoutMs),
    });
  }
}
