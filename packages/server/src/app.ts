/**
 * ESMP server — HTTP API for profiles, group reads, and envelope ingress.
 *
 * GET  /health
 * GET  /users/:pubkey/profile[?as=<pubkey>]
 * PUT  /users/:pubkey/profile
 * GET  /groups/:groupId
 * GET  /groups/:groupId/messages?after=&limit=
 * POST /envelopes
 *
 * Public keys in paths are URL-encoded (base64 carries '/', '+' and '=').
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';
import { authenticateRequest } from './auth.js';
import type { ServerContext } from './pipeline.js';
import { getProfile, putProfile } from './routes/profiles.js';
import { getGroupDetails, getGroupMessages } from './routes/groups.js';
import { postEnvelope } from './routes/envelopes.js';

export const VERSION = '0.1.0';

/** Read full request body as string. */
function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString()));
    req.on('error', reject);
  });
}

/** Send JSON response. */
function json(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

/**
 * Parse URL path params, percent-decoded. Returns null if the pattern doesn't match.
 */
export function matchPath(
  pattern: string,
  actual: string,
): Record<string, string> | null {
  const patternParts = pattern.split('/');
  const actualParts = actual.split('/');
  if (patternParts.length !== actualParts.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < patternParts.length; i++) {
    const expected = patternParts[i] ?? '';
    const segment = actualParts[i] ?? '';
    if (expected.startsWith(':')) {
      try {
        params[expected.slice(1)] = decodeURIComponent(segment);
      } catch {
        return null;
      }
    } else if (expected !== segment) {
      return null;
    }
  }
  return params;
}

function header(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Build the HTTP server. Call `listen` on the result.
 */
export function createHttpServer(ctx: ServerContext): Server {
  return createServer(async (req, res) => {
    try {
      const urlObj = new URL(req.url || '/', 'http://localhost');
      const path = urlObj.pathname;
      const method = req.method || 'GET';

      // Health check
      if (path === '/health' && method === 'GET') {
        return json(res, 200, { status: 'ok', version: VERSION });
      }

      const body = ['POST', 'PUT'].includes(method) ? await readBody(req) : '';

      // --- Helper: authenticate request ---
      const auth = () =>
        authenticateRequest(
          method,
          path,
          header(req, 'x-timestamp'),
          body,
          header(req, 'authorization'),
          ctx.config.maxClockSkewMs,
        );

      // --- Helper: parse JSON body ---
      const parseBody = (): { ok: true; value: unknown } | { ok: false } => {
        try {
          const value: unknown = JSON.parse(body);
          return { ok: true, value };
        } catch {
          return { ok: false };
        }
      };
      const invalidJson = () => json(res, 400, { error: 'MalformedInput', message: 'Invalid JSON' });

      // ==========================================================
      // PROFILES
      // ==========================================================

      let params = matchPath('/users/:pubkey/profile', path);
      if (params?.pubkey !== undefined && method === 'GET') {
        const result = getProfile(ctx, params.pubkey, urlObj.searchParams.get('as'), auth);
        return json(res, result.status, result.body);
      }
      if (params?.pubkey !== undefined && method === 'PUT') {
        const data = parseBody();
        if (!data.ok) return invalidJson();
        const result = putProfile(ctx, params.pubkey, data.value);
        return json(res, result.status, result.body);
      }

      // ==========================================================
      // GROUPS
      // ==========================================================

      params = matchPath('/groups/:groupId/messages', path);
      if (params?.groupId !== undefined && method === 'GET') {
        const result = getGroupMessages(ctx, params.groupId, auth, urlObj.searchParams);
        return json(res, result.status, result.body);
      }

      params = matchPath('/groups/:groupId', path);
      if (params?.groupId !== undefined && method === 'GET') {
        const result = getGroupDetails(ctx, params.groupId);
        return json(res, result.status, result.body);
      }

      // ==========================================================
      // ENVELOPES
      // ==========================================================

      if (path === '/envelopes' && method === 'POST') {
        const data = parseBody();
        if (!data.ok) return invalidJson();
        const result = postEnvelope(ctx, data.value);
        return json(res, result.status, result.body);
      }

      json(res, 404, { error: 'NotFound', message: 'Not found' });
    } catch (err) {
      const requestId = randomUUID();
      console.error(`Request ${requestId} error:`, err);
      json(res, 500, { error: 'InternalError', message: 'Internal server error', requestId });
    }
  });
}

export { EsmpListener } from './listener.js';
export { acceptEnvelope, authenticateEnvelope, parseLine } from './pipeline.js';
export type { Acceptance, ServerContext } from './pipeline.js';
export { loadConfig } from './config.js';
export type { ServerConfig } from './config.js';
export { initializeDatabase, closeDb, getSchemaVersion } from './db.js';
export { getGroup, replayGroup, groupLog, transition } from './groups.js';
export { getProfileView } from './profiles.js';
export { read as readThread, lastSeq } from './thread-log.js';
