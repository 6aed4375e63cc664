/**
 * Target storage
 * Machine records with their sealed credentials and trusted host fingerprints
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Target, TargetFile } from '../types.js';

export interface TargetStore {
  getTarget(id: string, ownerId: string): Promise<Target | null>;
  listTargets(ownerId: string): Promise<Target[]>;
  saveTarget(target: Target): Promise<void>;
  updateHostFingerprint(id: string, ownerId: string, fingerprint: string): Promise<void>;
}

const StoredEnvelopeSchema = z.object({
  salt: z.string(),
  nonce: z.string(),
  ciphertext: z.string(),
});

const TargetSchema = z.object({
  id: z.string().min(1),
  ownerId: z.string().min(1),
  name: z.string(),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(22),
  username: z.string().min(1),
  authType: z.enum(['password', 'key']),
  credential: StoredEnvelopeSchema,
  hostFingerprint: z.string().default(''),
  createdAt: z.number(),
  updatedAt: z.number(),
});

const TargetFileSchema = z.object({
  version: z.literal(1),
  targets: z.array(TargetSchema),
});

/**
 * JSON file store. Writes go through a single queue so concurrent
 * fingerprint updates from different sessions never overwrite each other.
 */
export class JsonTargetStore implements TargetStore {
  private filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async getTarget(id: string, ownerId: string): Promise<Target | null> {
    const file = await this.read();
    return file.targets.find(t => t.id === id && t.ownerId === ownerId) ?? null;
  }

  async listTargets(ownerId: string): Promise<Target[]> {
    const file = await this.read();
    return file.targets.filter(t => t.ownerId === ownerId);
  }

  async saveTarget(target: Target): Promise<void> {
    await this.mutate(file => {
      const idx = file.targets.findIndex(t => t.id === target.id && t.ownerId === target.ownerId);
      if (idx === -1) {
        file.targets.push(target);
      } else {
        file.targets[idx] = target;
      }
    });
  }

  async updateHostFingerprint(id: string, ownerId: string, fingerprint: string): Promise<void> {
    await this.mutate(file => {
      const target = file.targets.find(t => t.id === id && t.ownerId === ownerId);
      if (!target) {
        throw new Error(`Target not found: ${id}`);
      }
      target.hostFingerprint = fingerprint;
      target.updatedAt = Date.now();
    });
  }

  private async read(): Promise<TargetFile> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { version: 1, targets: [] };
      }
      throw error;
    }
    return TargetFileSchema.parse(JSON.parse(content));
  }

  private mutate(apply: (file: TargetFile) => void): Promise<void> {
    const run = async () => {
      const file = await this.read();
      apply(file);
      await this.write(file);
    };
    const next = this.writeQueue.then(run);
    // Keep the queue alive after a failed write; the caller still sees the error
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  private async write(file: TargetFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    // Write atomically (write to temp, then rename) with restrictive permissions
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(file, null, 2), { mode: 0o600 });
    await fs.rename(tempPath, this.filePath);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
