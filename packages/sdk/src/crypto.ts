/**
 * Cryptographic primitives — Ed25519 signing, HKDF key derivation, AES-256-GCM encryption.
 *
 * Uses Node.js built-in `crypto` module only. Public keys travel as base64 of
 * the raw 32-byte key; signatures as base64 of the 64-byte signature.
 */

import {
  sign as cryptoSign,
  verify as cryptoVerify,
  hkdfSync,
  randomBytes,
  createCipheriv,
  createDecipheriv,
  createPublicKey,
  generateKeyPairSync,
  type KeyObject,
} from 'node:crypto';

// SPKI DER header for an Ed25519 public key; the raw key follows it
const ED25519_SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex');

const ED25519_PUBLIC_KEY_LENGTH = 32;
const ED25519_SIGNATURE_LENGTH = 64;
const GCM_TAG_LENGTH = 16;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Generate a new Ed25519 keypair.
 */
export function generateKeypair(): { publicKey: KeyObject; privateKey: KeyObject } {
  return generateKeyPairSync('ed25519');
}

/**
 * Raw public key bytes as base64 — the form used in `sender_pubkey`.
 * Accepts a public or private key.
 */
export function publicKeyToBase64(key: KeyObject): string {
  const publicKey = key.type === 'private' ? createPublicKey(key) : key;
  const spki = publicKey.export({ type: 'spki', format: 'der' });
  return Buffer.from(spki.subarray(ED25519_SPKI_PREFIX.length)).toString('base64');
}

function decodeBase64(value: string, expectedLength: number): Buffer | null {
  if (!BASE64_PATTERN.test(value)) return null;
  const bytes = Buffer.from(value, 'base64');
  return bytes.length === expectedLength ? bytes : null;
}

/**
 * Parse a base64 raw Ed25519 public key. Returns null when it is not one.
 */
export function publicKeyFromBase64(publicKeyBase64: string): KeyObject | null {
  const raw = decodeBase64(publicKeyBase64, ED25519_PUBLIC_KEY_LENGTH);
  if (!raw) return null;
  try {
    return createPublicKey({
      key: Buffer.concat([ED25519_SPKI_PREFIX, raw]),
      format: 'der',
      type: 'spki',
    });
  } catch {
    return null;
  }
}

/**
 * Sign data with Ed25519.
 * Ed25519 uses its own built-in hash (SHA-512), so algorithm is null.
 */
export function sign(data: Buffer, privateKey: KeyObject): Buffer {
  return Buffer.from(cryptoSign(null, data, privateKey));
}

/** Sign and return base64. */
export function signBase64(data: string, privateKey: KeyObject): string {
  return sign(Buffer.from(data), privateKey).toString('base64');
}

/**
 * Verify an Ed25519 signature. Undecodable keys or signatures verify as false.
 */
export function verify(data: Buffer, signatureBase64: string, publicKeyBase64: string): boolean {
  const publicKey = publicKeyFromBase64(publicKeyBase64);
  const signature = decodeBase64(signatureBase64, ED25519_SIGNATURE_LENGTH);
  if (!publicKey || !signature) return false;
  try {
    return cryptoVerify(null, data, publicKey, signature);
  } catch {
    return false;
  }
}

/**
 * Derive a 32-byte key with HKDF-SHA256.
 */
export function deriveKey(secret: string | Buffer, salt: string, info: string): Buffer {
  return Buffer.from(hkdfSync('sha256', secret, salt, info, 32));
}

/**
 * Encrypt plaintext with AES-256-GCM. The tag is appended to the ciphertext.
 */
export function encrypt(
  plaintext: Buffer,
  key: Buffer,
  aad: string,
): { ciphertext: Buffer; nonce: Buffer } {
  const nonce = randomBytes(12);
  const cipher = createCipheriv('aes-256-gcm', key, nonce);
  cipher.setAAD(Buffer.from(aad));
  const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return {
    ciphertext: Buffer.concat([encrypted, cipher.getAuthTag()]),
    nonce,
  };
}

/**
 * Decrypt AES-256-GCM ciphertext produced by `encrypt`. Throws if the tag does not match.
 */
export function decrypt(ciphertext: Buffer, nonce: Buffer, key: Buffer, aad: string): Buffer {
  const tag = ciphertext.subarray(ciphertext.length - GCM_TAG_LENGTH);
  const data = ciphertext.subarray(0, ciphertext.length - GCM_TAG_LENGTH);
  const decipher = createDecipheriv('aes-256-gcm', key, nonce);
  decipher.setAAD(Buffer.from(aad));
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(data), decipher.final()]);
}
