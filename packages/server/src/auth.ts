/**
 * Request authentication for owner-only HTTP reads.
 *
 * Auth header format:
 *   Authorization: Signature <pubkey_base64>:<base64_signature>
 *
 * Signing string:
 *   <METHOD> <PATH>\n<ISO-8601 timestamp>\n<body_sha256_hex>
 *
 * The key is the identity, so there is nothing to look up: a request is
 * authentic when the signature verifies against the key it names and the
 * X-Timestamp header is within the configured skew of server time.
 */

import { buildSigningString, hashBody, verify } from 'esmp-sdk';

export type AuthResult =
  | { ok: true; pubkey: string }
  | { ok: false; status: 401; error: string };

/**
 * Parse the Authorization header.
 * Expected format: "Signature <pubkey>:<signature>". Base64 never contains ':'.
 */
export function parseAuthHeader(header: string): { pubkey: string; signature: string } | null {
  if (!header.startsWith('Signature ')) return null;
  const rest = header.slice('Signature '.length);
  const colonIdx = rest.indexOf(':');
  if (colonIdx <= 0) return null;

  const pubkey = rest.slice(0, colonIdx);
  const signature = rest.slice(colonIdx + 1);
  if (!signature) return null;

  return { pubkey, signature };
}

/**
 * Authenticate a request.
 *
 * @param path - Raw request pathname, without the query string
 * @param body - Raw request body (empty string for bodyless requests)
 * @param now - Current time in ms (injectable for testing)
 */
export function authenticateRequest(
  method: string,
  path: string,
  timestamp: string | undefined,
  body: string,
  authHeader: string | undefined,
  maxSkewMs: number,
  now: number = Date.now(),
): AuthResult {
  if (!authHeader) {
    return { ok: false, status: 401, error: 'Missing Authorization header' };
  }

  const parsed = parseAuthHeader(authHeader);
  if (!parsed) {
    return { ok: false, status: 401, error: 'Malformed Authorization header' };
  }

  // Replay protection
  const tsMs = timestamp ? new Date(timestamp).getTime() : NaN;
  if (isNaN(tsMs) || Math.abs(now - tsMs) > maxSkewMs) {
    return { ok: false, status: 401, error: 'Timestamp expired or invalid' };
  }

  const signingString = buildSigningString(method, path, timestamp ?? '', hashBody(body));
  if (!verify(Buffer.from(signingString), parsed.signature, parsed.pubkey)) {
    return { ok: false, status: 401, error: 'Invalid signature' };
  }

  return { ok: true, pubkey: parsed.pubkey };
}
