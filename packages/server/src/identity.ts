/**
 * Address bindings — trust on first use.
 *
 * The first accepted envelope in which an address acts (system `actor`, text
 * `from`) binds that address to the signing key. From then on only that key
 * may act as the address.
 */

import type Database from 'better-sqlite3';
import type { Address, Envelope } from 'esmp-sdk';
import { reject, type Outcome } from './errors.js';

/** The address an envelope claims to act as, if any. */
export function actingAddress(envelope: Envelope): Address | null {
  if (envelope.type === 'text') return envelope.from ?? null;
  return envelope.actor;
}

export function boundKey(db: Database.Database, address: Address): string | null {
  const row = db.prepare<[string], { pubkey: string }>(
    'SELECT pubkey FROM address_bindings WHERE address = ?'
  ).get(address);
  return row?.pubkey ?? null;
}

/**
 * Check that `pubkey` may act as `address`: either nothing is bound yet, or the binding matches.
 */
export function checkBinding(
  db: Database.Database,
  address: Address,
  pubkey: string,
): Outcome<{ bound: boolean }> {
  const existing = boundKey(db, address);
  if (existing === null) return { ok: true, bound: false };
  if (existing !== pubkey) {
    return reject('Forbidden', `${address} is bound to a different key`, 'sender_pubkey');
  }
  return { ok: true, bound: true };
}

/** Record a binding. No-op when the address is already bound. */
export function bindAddress(db: Database.Database, address: Address, pubkey: string): void {
  db.prepare(
    'INSERT OR IGNORE INTO address_bindings (address, pubkey) VALUES (?, ?)'
  ).run(address, pubkey);
}

/** Addresses currently bound to a key. */
export function addressesForKey(db: Database.Database, pubkey: string): Address[] {
  return db.prepare<[string], { address: string }>(
    'SELECT address FROM address_bindings WHERE pubkey = ? ORDER BY address'
  ).all(pubkey).map((row) => row.address);
}
