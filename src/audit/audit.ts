/**
 * Audit events for session lifecycle and file operations.
 * Publishing never blocks or fails the caller.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { createLogger } from '../logger.js';

const log = createLogger('audit');

export type AuditAction =
  | 'ssh.connect'
  | 'ssh.disconnect'
  | 'sftp.list'
  | 'sftp.download'
  | 'sftp.upload'
  | 'sftp.delete'
  | 'sftp.mkdir'
  | 'sftp.rename';

export interface AuditEvent {
  action: AuditAction;
  targetId: string;
  ownerId: string;
  targetName?: string;
  detail?: string;
  reason?: string;
  at: number;
}

export interface AuditSink {
  record(event: AuditEvent): void | Promise<void>;
}

/**
 * Hand an event to the sink without waiting for it.
 */
export function publishAudit(sink: AuditSink, event: AuditEvent): void {
  setImmediate(() => {
    try {
      Promise.resolve(sink.record(event)).catch((err: unknown) => {
        log.warn(`Failed to record ${event.action} for target ${event.targetId}:`, err);
      });
    } catch (err) {
      log.warn(`Failed to record ${event.action} for target ${event.targetId}:`, err);
    }
  });
}

/**
 * Appends one JSON object per line.
 */
export class FileAuditSink implements AuditSink {
  private filePath: string;
  private ready: Promise<unknown> | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async record(event: AuditEvent): Promise<void> {
    this.ready ??= fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await this.ready;
    await fs.appendFile(this.filePath, JSON.stringify(event) + '\n', { mode: 0o600 });
  }
}
