/**
 * Group read routes. Groups change only through system envelopes.
 *
 * GET /groups/:groupId                              — group metadata
 * GET /groups/:groupId/messages?after=&limit=       — group thread, members only (signed)
 */

import type { AuthResult } from '../auth.js';
import { getGroup } from '../groups.js';
import { addressesForKey } from '../identity.js';
import type { RouteResult } from '../errors.js';
import type { ServerContext } from '../pipeline.js';
import { read } from '../thread-log.js';

function unknownGroup(groupId: string): RouteResult {
  return {
    status: 404,
    body: { error: 'UnknownGroup', message: `Group ${groupId} does not exist`, field: 'group_id' },
  };
}

/** Parse a non-negative integer query value; null when present but invalid. */
function queryInt(raw: string | null, fallback: number): number | null {
  if (raw === null || raw === '') return fallback;
  if (!/^\d+$/.test(raw)) return null;
  return parseInt(raw, 10);
}

export function getGroupDetails(ctx: ServerContext, groupId: string): RouteResult {
  const group = getGroup(ctx.db, groupId);
  if (!group) return unknownGroup(groupId);
  return { status: 200, body: group };
}

export function getGroupMessages(
  ctx: ServerContext,
  groupId: string,
  auth: () => AuthResult,
  query: URLSearchParams,
): RouteResult {
  const group = getGroup(ctx.db, groupId);
  if (!group) return unknownGroup(groupId);

  const a = auth();
  if (!a.ok) return { status: a.status, body: { error: 'SignatureInvalid', message: a.error } };

  // Membership is by address; the key must be bound to a current member
  const addresses = addressesForKey(ctx.db, a.pubkey);
  if (!addresses.some((address) => group.members.includes(address))) {
    return { status: 403, body: { error: 'Forbidden', message: `Not a member of ${groupId}` } };
  }

  const after = queryInt(query.get('after'), 0);
  const limit = queryInt(query.get('limit'), 100);
  if (after === null || limit === null) {
    return {
      status: 400,
      body: { error: 'MalformedInput', message: 'after and limit must be non-negative integers' },
    };
  }

  return { status: 200, body: read(ctx.db, groupId, { after, limit }) };
}
