/**
 * POST /envelopes — HTTP ingress for one signed envelope, through the same
 * pipeline as the TCP listener.
 */

import { rejectionResponse, type RouteResult } from '../errors.js';
import { acceptEnvelope, type ServerContext } from '../pipeline.js';

export function postEnvelope(ctx: ServerContext, body: unknown): RouteResult {
  const result = acceptEnvelope(ctx, body);
  if (!result.ok) return rejectionResponse(result);
  return { status: 201, body: { ok: true, threads: result.threads } };
}
