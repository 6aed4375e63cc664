/**
 * Encryption primitives: PBKDF2-SHA256 key derivation (@noble/hashes),
 * AES-256-GCM sealing, tweetnacl randomness.
 */

import { createCipheriv, createDecipheriv } from 'crypto';
import nacl from 'tweetnacl';
import { pbkdf2 } from '@noble/hashes/pbkdf2.js';
import { sha256 } from '@noble/hashes/sha2.js';

/**
 * PBKDF2 parameters. The iteration count is fixed for stored envelopes;
 * changing it makes every existing credential undecryptable.
 */
export interface KdfParams {
  c: number;      // iterations
  dkLen: number;  // derived key length in bytes
}

export const DEFAULT_KDF_PARAMS: KdfParams = {
  c: 100_000,
  dkLen: 32,
};

export const SALT_LENGTH = 16;
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;

const ALGORITHM = 'aes-256-gcm';

/**
 * Generate a random salt for key derivation (16 bytes)
 */
export function generateSalt(): Uint8Array {
  return nacl.randomBytes(SALT_LENGTH);
}

/**
 * Generate a random nonce for AES-GCM (12 bytes)
 */
export function generateNonce(): Uint8Array {
  return nacl.randomBytes(NONCE_LENGTH);
}

/**
 * Derive a 32-byte key from client key material and the server secret.
 * Neither input alone is enough to reproduce the key.
 */
export function deriveKey(
  keyMaterial: string,
  serverSecret: string,
  salt: Uint8Array,
  params: KdfParams = DEFAULT_KDF_PARAMS
): Uint8Array {
  const combined = new TextEncoder().encode(keyMaterial + serverSecret);
  return pbkdf2(sha256, combined, salt, { c: params.c, dkLen: params.dkLen });
}

/**
 * Seal plaintext with AES-256-GCM. The 16-byte tag is appended to the output.
 */
export function seal(
  plaintext: Uint8Array,
  key: Uint8Array,
  nonce: Uint8Array
): Uint8Array {
  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
  const body = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return new Uint8Array(Buffer.concat([body, cipher.getAuthTag()]));
}

/**
 * Open an AES-256-GCM ciphertext produced by seal()
 * @throws Error if the tag does not verify (wrong key, wrong nonce or tampered data)
 */
export function open(
  sealed: Uint8Array,
  key: Uint8Array,
  nonce: Uint8Array
): Uint8Array {
  if (nonce.length !== NONCE_LENGTH) {
    throw new Error('Invalid nonce size');
  }
  if (sealed.length < TAG_LENGTH) {
    throw new Error('Ciphertext too short');
  }
  const body = sealed.subarray(0, sealed.length - TAG_LENGTH);
  const tag = sealed.subarray(sealed.length - TAG_LENGTH);
  const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
  decipher.setAuthTag(tag);
  try {
    return new Uint8Array(Buffer.concat([decipher.update(body), decipher.final()]));
  } catch {
    throw new Error('Decryption failed: invalid key or corrupted data');
  }
}

export function toBase64(data: Uint8Array): string {
  return Buffer.from(data).toString('base64');
}

export function fromBase64(base64: string): Uint8Array {
  return new Uint8Array(Buffer.from(base64, 'base64'));
}

/**
 * Generate a random hex string (server secrets, session ids)
 */
export function generateRandomId(length: number = 16): string {
  return Buffer.from(nacl.randomBytes(length)).toString('hex');
}

/**
 * Overwrite a buffer with zeros
 */
export function secureWipe(buffer: Uint8Array): void {
  buffer.fill(0);
}
