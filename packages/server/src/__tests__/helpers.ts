/**
 * Shared fixtures for server tests: temp databases, config, and signing users.
 */

import { mkdtempSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { KeyObject } from 'node:crypto';
import { generateKeypair, publicKeyToBase64, signEnvelope, validateEnvelope } from 'esmp-sdk';
import type { Envelope, UnsignedEnvelope } from 'esmp-sdk';
import type { ServerConfig } from '../config.js';
import { initializeDatabase } from '../db.js';

export function setupDb(prefix = 'esmp-test-') {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  const db = initializeDatabase(join(dir, 'esmp.db'));
  return { db, dir };
}

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    port: 0,
    esmpPort: 0,
    host: '127.0.0.1',
    dbPath: '',
    profileSecret: 'test-secret',
    maxLineBytes: 64 * 1024,
    maxClockSkewMs: 5 * 60 * 1000,
    ...overrides,
  };
}

export interface TestUser {
  address: string;
  privateKey: KeyObject;
  pubkey: string;
  /** Sign an unsigned envelope as this user. */
  sign(unsigned: UnsignedEnvelope): Record<string, unknown>;
}

export function makeUser(address: string): TestUser {
  const { privateKey } = generateKeypair();
  return {
    address,
    privateKey,
    pubkey: publicKeyToBase64(privateKey),
    sign: (unsigned) => ({ ...signEnvelope(unsigned, privateKey) }),
  };
}

/** Sign and parse, for tests that work on typed envelopes. */
export function typed(user: TestUser, unsigned: UnsignedEnvelope): Envelope {
  const result = validateEnvelope(user.sign(unsigned));
  if (!result.ok) throw new Error(`Test envelope is invalid: ${result.message}`);
  return result.envelope;
}

/** `2024-01-01T00:00:<n>Z`-style instants, n seconds after a fixed epoch. */
export function at(seconds: number): string {
  return new Date(Date.UTC(2024, 0, 1, 0, 0, seconds)).toISOString();
}
