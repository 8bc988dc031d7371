/**
 * Server API client — HTTP interface to an ESMP server.
 *
 * Owner-only reads are signed per the server's request auth:
 *   Authorization: Signature <pubkey>:<base64_sig>
 *   X-Timestamp: <ISO-8601>
 *   Signing string: <METHOD> <PATH>\n<TIMESTAMP>\n<BODY_SHA256>
 */

import type { KeyObject } from 'node:crypto';
import { publicKeyToBase64 } from './crypto.js';
import { signProfileUpdate, signRequest } from './envelope.js';
import type {
  GroupMetadata,
  ProfileChanges,
  ProfileView,
  ThreadPosition,
  ThreadRecord,
} from './types.js';

export interface EsmpResponse<T = unknown> {
  ok: boolean;
  status: number;
  data?: T;
  error?: string;
}

/**
 * Abstract server API interface — injectable for testing.
 */
export interface IEsmpAPI {
  health(): Promise<EsmpResponse<{ status: string }>>;

  // Profiles
  getProfile(pubkey: string): Promise<EsmpResponse<ProfileView>>;
  getOwnProfile(): Promise<EsmpResponse<ProfileView>>;
  updateProfile(fields: ProfileChanges): Promise<EsmpResponse<ProfileView>>;

  // Groups
  getGroup(groupId: string): Promise<EsmpResponse<GroupMetadata>>;
  getGroupMessages(groupId: string, after?: number, limit?: number): Promise<EsmpResponse<ThreadRecord[]>>;

  // Envelopes
  submitEnvelope(envelope: object): Promise<EsmpResponse<{ threads: ThreadPosition[] }>>;
}

function errorMessage(data: unknown, fallback: string): string {
  if (typeof data === 'object' && data !== null && 'error' in data) {
    const { error } = data;
    if (typeof error === 'string') {
      const message = 'message' in data && typeof data.message === 'string' ? `: ${data.message}` : '';
      return `${error}${message}`;
    }
  }
  return fallback;
}

/**
 * HTTP-based server API client.
 */
export class HttpEsmpAPI implements IEsmpAPI {
  private readonly pubkey: string;

  constructor(
    private serverUrl: string,
    private privateKey: KeyObject,
    private timeoutMs = 10_000,
  ) {
    this.pubkey = publicKeyToBase64(privateKey);
  }

  private async request<T = unknown>(
    method: string,
    path: string,
    options: { body?: object; signed?: boolean } = {},
  ): Promise<EsmpResponse<T>> {
    // Only reads are retried; a resent envelope would be logged twice
    const maxRetries = method === 'GET' ? 2 : 0;
    const bodyStr = options.body ? JSON.stringify(options.body) : '';
    // Query strings are not part of the signed path
    const signedPath = path.split('?')[0] ?? path;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const headers: Record<string, string> = options.signed
        ? signRequest(method, signedPath, bodyStr, this.privateKey)
        : {};
      if (bodyStr) headers['Content-Type'] = 'application/json';

      let res: Response;
      try {
        res = await fetch(`${this.serverUrl}${path}`, {
          method,
          headers,
          body: bodyStr || undefined,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        if (attempt < maxRetries) {
          await new Promise((r) => setTimeout(r, 200 * (attempt + 1)));
          continue;
        }
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, status: 0, error: message };
      }

      const text = await res.text();
      let parsed: unknown;
      try {
        parsed = text ? JSON.parse(text) : null;
      } catch {
        return { ok: false, status: res.status, error: `Non-JSON response (${text.slice(0, 80)})` };
      }
      if (!res.ok) {
        return { ok: false, status: res.status, error: errorMessage(parsed, res.statusText) };
      }
      // Trusting the server's response shape
      const data: T = JSON.parse(text);
      return { ok: true, status: res.status, data };
    }
    return { ok: false, status: 0, error: 'Max retries exceeded' };
  }

  async health(): Promise<EsmpResponse<{ status: string }>> {
    return this.request<{ status: string }>('GET', '/health');
  }

  async getProfile(pubkey: string): Promise<EsmpResponse<ProfileView>> {
    return this.request<ProfileView>('GET', `/users/${encodeURIComponent(pubkey)}/profile`);
  }

  async getOwnProfile(): Promise<EsmpResponse<ProfileView>> {
    const encoded = encodeURIComponent(this.pubkey);
    return this.request<ProfileView>('GET', `/users/${encoded}/profile?as=${encoded}`, { signed: true });
  }

  async updateProfile(fields: ProfileChanges): Promise<EsmpResponse<ProfileView>> {
    return this.request<ProfileView>('PUT', `/users/${encodeURIComponent(this.pubkey)}/profile`, {
      body: signProfileUpdate(fields, this.privateKey),
    });
  }

  async getGroup(groupId: string): Promise<EsmpResponse<GroupMetadata>> {
    return this.request<GroupMetadata>('GET', `/groups/${encodeURIComponent(groupId)}`);
  }

  async getGroupMessages(groupId: string, after = 0, limit = 100): Promise<EsmpResponse<ThreadRecord[]>> {
    return this.request<ThreadRecord[]>(
      'GET',
      `/groups/${encodeURIComponent(groupId)}/messages?after=${after}&limit=${limit}`,
      { signed: true },
    );
  }

  async submitEnvelope(envelope: object): Promise<EsmpResponse<{ threads: ThreadPosition[] }>> {
    return this.request<{ threads: ThreadPosition[] }>('POST', '/envelopes', { body: envelope });
  }
}
