/**
 * Add or replace an SSH target in the target store
 *
 * Usage:
 *   SSH_BRIDGE_KEY=<key material> SSH_BRIDGE_SECRET_VALUE=<password or key path> \
 *     node dist/scripts/add-target.js <owner> <name> <user@host[:port]> [--key]
 *
 * With --key the secret value is read as the path of a private key file;
 * SSH_BRIDGE_PASSPHRASE supplies its passphrase.
 */

import { promises as fs } from 'fs';
import { loadConfig, validateConfig } from '../src/config.js';
import { JsonTargetStore } from '../src/store/target-store.js';
import { CredentialVault, envelopeToStored } from '../src/vault/credential-vault.js';
import { generateRandomId } from '../src/vault/encryption.js';
import type { Credential, Target } from '../src/types.js';

function parseDestination(value: string): { username: string; host: string; port: number } {
  const match = /^([^@]+)@([^:]+)(?::(\d+))?$/.exec(value);
  if (!match) {
    throw new Error(`Invalid destination "${value}", expected user@host[:port]`);
  }
  return {
    username: match[1],
    host: match[2],
    port: match[3] ? parseInt(match[3], 10) : 22,
  };
}

async function main() {
  const args = process.argv.slice(2);
  const useKey = args.includes('--key');
  const [ownerId, name, destination] = args.filter(a => a !== '--key');
  const keyMaterial = process.env.SSH_BRIDGE_KEY;
  const secretValue = process.env.SSH_BRIDGE_SECRET_VALUE;

  if (!ownerId || !name || !destination || !keyMaterial || !secretValue) {
    console.error('Usage: SSH_BRIDGE_KEY=... SSH_BRIDGE_SECRET_VALUE=... node dist/scripts/add-target.js <owner> <name> <user@host[:port]> [--key]');
    process.exit(1);
  }

  const config = await loadConfig(process.env.SSH_BRIDGE_CONFIG);
  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error('Configuration errors:', validation.errors.join('; '));
    process.exit(1);
  }

  const credential: Credential = useKey
    ? { privateKey: await fs.readFile(secretValue, 'utf-8'), passphrase: process.env.SSH_BRIDGE_PASSPHRASE }
    : { password: secretValue };

  const vault = new CredentialVault(config.security.serverSecret);
  const store = new JsonTargetStore(config.storage.targetsPath);
  const { username, host, port } = parseDestination(destination);

  const existing = (await store.listTargets(ownerId)).find(t => t.name === name);
  const now = Date.now();
  const target: Target = {
    id: existing?.id ?? generateRandomId(8),
    ownerId,
    name,
    host,
    port,
    username,
    authType: useKey ? 'key' : 'password',
    credential: envelopeToStored(vault.encrypt(credential, keyMaterial)),
    // A changed address must be confirmed again
    hostFingerprint: existing && existing.host === host && existing.port === port ? existing.hostFingerprint : '',
    createdAt: existing?.createdAt ?? now,
    updatedAt: now,
  };

  await store.saveTarget(target);
  console.log(`${existing ? 'Updated' : 'Added'} target ${target.name} (${target.id}) -> ${username}@${host}:${port}`);
}

main().catch((error) => {
  console.error('Failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
