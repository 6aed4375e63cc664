/**
 * Host identity: fingerprints and the trust-on-first-use ledger
 */

import { sha256 } from '@noble/hashes/sha2.js';
import type { HostKeyStatus } from '../types.js';
import type { TargetStore } from '../store/target-store.js';
import { createLogger } from '../logger.js';

const log = createLogger('host-key');

/**
 * OpenSSH-style fingerprint of a host public key blob.
 * Format: "SHA256:<base64 without padding>"
 */
export function fingerprintHostKey(publicKey: Uint8Array): string {
  const hash = sha256(publicKey);
  const base64 = Buffer.from(hash).toString('base64').replace(/=+$/, '');
  return `SHA256:${base64}`;
}

export function classify(stored: string, observed: string): HostKeyStatus {
  if (!stored) return 'new';
  return stored === observed ? 'match' : 'mismatch';
}

export function requiresConfirmation(status: HostKeyStatus): boolean {
  return status !== 'match';
}

/**
 * Stored fingerprints per target, backed by the target store.
 *
 * A confirmed fingerprint always replaces the stored one, including after a
 * mismatch: accepting a changed key re-trusts it without further checks.
 */
export class HostIdentityLedger {
  constructor(private store: Pick<TargetStore, 'updateHostFingerprint'>) {}

  async trust(
    targetId: string,
    ownerId: string,
    status: HostKeyStatus,
    fingerprint: string,
    previous: string,
  ): Promise<void> {
    if (status === 'mismatch') {
      log.warn(`Re-trusting changed host key for target ${targetId}: ${previous} -> ${fingerprint}`);
    }
    await this.store.updateHostFingerprint(targetId, ownerId, fingerprint);
  }
}
