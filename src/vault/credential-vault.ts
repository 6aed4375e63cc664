/**
 * Credential Vault
 * Seals a target's password or private key under a key derived from the
 * client's key material and the server secret.
 */

import type { Credential, EncryptedCredential, StoredEnvelope } from '../types.js';
import { AuthenticationFailedError, ConfigurationError } from '../errors.js';
import {
  DEFAULT_KDF_PARAMS,
  SALT_LENGTH,
  deriveKey,
  fromBase64,
  generateNonce,
  generateSalt,
  open,
  seal,
  secureWipe,
  toBase64,
  type KdfParams,
} from './encryption.js';

export class CredentialVault {
  private serverSecret: string;
  private kdfParams: KdfParams;

  constructor(serverSecret: string, kdfParams: KdfParams = DEFAULT_KDF_PARAMS) {
    if (!serverSecret) {
      throw new ConfigurationError('Server secret is not configured');
    }
    this.serverSecret = serverSecret;
    this.kdfParams = kdfParams;
  }

  encrypt(credential: Credential, keyMaterial: string): EncryptedCredential {
    const plaintext = new TextEncoder().encode(JSON.stringify(serializeCredential(credential)));
    const salt = generateSalt();
    const nonce = generateNonce();
    const key = deriveKey(keyMaterial, this.serverSecret, salt, this.kdfParams);
    try {
      return { salt, nonce, ciphertext: seal(plaintext, key, nonce) };
    } finally {
      secureWipe(key);
      secureWipe(plaintext);
    }
  }

  /**
   * @throws AuthenticationFailedError for any failure to open or parse the envelope
   */
  decrypt(envelope: EncryptedCredential, keyMaterial: string): Credential {
    if (envelope.salt.length !== SALT_LENGTH) {
      throw new AuthenticationFailedError();
    }
    const key = deriveKey(keyMaterial, this.serverSecret, envelope.salt, this.kdfParams);
    let plaintext: Uint8Array;
    try {
      plaintext = open(envelope.ciphertext, key, envelope.nonce);
    } catch {
      throw new AuthenticationFailedError();
    } finally {
      secureWipe(key);
    }

    try {
      return parseCredential(new TextDecoder().decode(plaintext));
    } finally {
      secureWipe(plaintext);
    }
  }
}

// Persisted JSON uses snake_case keys. Empty fields are omitted, so an
// empty password decrypts as no password.
function serializeCredential(credential: Credential): Record<string, string> {
  const out: Record<string, string> = {};
  if (credential.password) out.password = credential.password;
  if (credential.privateKey) out.private_key = credential.privateKey;
  if (credential.passphrase) out.passphrase = credential.passphrase;
  return out;
}

function parseCredential(json: string): Credential {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new AuthenticationFailedError();
  }
  if (typeof parsed !== 'object' || parsed === null) {
    throw new AuthenticationFailedError();
  }
  const credential: Credential = {};
  if ('password' in parsed && typeof parsed.password === 'string') {
    credential.password = parsed.password;
  }
  if ('private_key' in parsed && typeof parsed.private_key === 'string') {
    credential.privateKey = parsed.private_key;
  }
  if ('passphrase' in parsed && typeof parsed.passphrase === 'string') {
    credential.passphrase = parsed.passphrase;
  }
  return credential;
}

export function envelopeToStored(envelope: EncryptedCredential): StoredEnvelope {
  return {
    salt: toBase64(envelope.salt),
    nonce: toBase64(envelope.nonce),
    ciphertext: toBase64(envelope.ciphertext),
  };
}

export function envelopeFromStored(stored: StoredEnvelope): EncryptedCredential {
  return {
    salt: fromBase64(stored.salt),
    nonce: fromBase64(stored.nonce),
    ciphertext: fromBase64(stored.ciphertext),
  };
}
