/**
 * src/modules/hub-auth/hub-auth.types.ts
 *
 * WHY:
 * - Shapes shared by the verifier, the resolver and the routes.
 * - The hub's authorization body is validated with zod at the boundary; the rest
 *   of the module only sees AuthorizationRecord.
 *
 * RULES:
 * - A record is frozen once produced. Re-verification replaces it, nothing mutates it.
 * - `null` means "cookie present but not recognized by the hub".
 */

import { z } from 'zod';

export const authorizationRecordSchema = z
  .object({
    name: z.string(),
  })
  .passthrough();

export type AuthorizationRecord = Readonly<z.infer<typeof authorizationRecordSchema>>;

/** What the verifier yields and the cache stores. */
export type VerificationOutcome = AuthorizationRecord | null;
