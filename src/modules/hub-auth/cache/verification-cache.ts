/**
 * src/modules/hub-auth/cache/verification-cache.ts
 *
 * WHY:
 * - Without it every page load costs one hub round-trip.
 * - Keyed by the raw cookie value; stores the hub's verdict, including `null`
 *   (unknown/expired cookie) so garbage cookies don't hammer the hub.
 *
 * RULES:
 * - Synchronous and in-process: a hit must never do I/O.
 * - No per-entry eviction. clear() swaps in a fresh Map, which is the only way
 *   entries leave. A verification that finishes after a clear writes into the
 *   new Map; both outcomes are acceptable.
 * - Cookie values are never logged from here.
 */

import type { VerificationOutcome } from '../hub-auth.types';

export type CacheLookup = { hit: true; value: VerificationOutcome } | { hit: false };

export class VerificationCache {
  private entries = new Map<string, VerificationOutcome>();

  lookup(cookieValue: string): CacheLookup {
    if (!this.entries.has(cookieValue)) return { hit: false };
    return { hit: true, value: this.entries.get(cookieValue) ?? null };
  }

  store(cookieValue: string, value: VerificationOutcome): void {
    this.entries.set(cookieValue, value);
  }

  /** Drops every entry at once. Returns how many were dropped. */
  clear(): number {
    const dropped = this.entries.size;
    this.entries = new Map();
    return dropped;
  }

  get size(): number {
    return this.entries.size;
  }
}
