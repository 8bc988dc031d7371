/**
 * Profile routes.
 *
 * GET /users/:pubkey/profile          — public fields only
 * GET /users/:pubkey/profile?as=<pk>  — signed by <pk>; the owner sees every field
 * PUT /users/:pubkey/profile          — owner-signed update
 */

import type { AuthResult } from '../auth.js';
import { rejectionResponse, type RouteResult } from '../errors.js';
import type { ServerContext } from '../pipeline.js';
import { applySignedProfileUpdate, getProfileView, renderProfile } from '../profiles.js';

export function getProfile(
  ctx: ServerContext,
  pubkey: string,
  as: string | null,
  auth: () => AuthResult,
): RouteResult {
  let requester: string | null = null;

  if (as !== null) {
    // Claiming to read as a key requires proof of holding it
    const a = auth();
    if (!a.ok) return { status: a.status, body: { error: 'SignatureInvalid', message: a.error } };
    if (a.pubkey !== as) {
      return { status: 403, body: { error: 'Forbidden', message: 'Request is not signed by the ?as key' } };
    }
    requester = as;
  }

  const view = getProfileView(ctx.db, ctx.config.profileSecret, pubkey, requester);
  if (!view) return { status: 404, body: { error: 'NotFound', message: 'No profile for this key' } };
  return { status: 200, body: view };
}

export function putProfile(ctx: ServerContext, pubkey: string, body: unknown): RouteResult {
  const secret = ctx.config.profileSecret;
  const result = applySignedProfileUpdate(ctx.db, secret, pubkey, body);
  if (!result.ok) return rejectionResponse(result);

  console.log(`[esmp] Profile updated for ${pubkey.slice(0, 12)}…`);
  return { status: 200, body: renderProfile(result.profile, secret, pubkey) };
}
