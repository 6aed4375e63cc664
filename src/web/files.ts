/**
 * File transfer over SFTP, one short-lived connection per request.
 */

import { Readable } from 'stream';
import { posix } from 'path';
import type { FileInfo, Target } from '../types.js';
import type { TargetStore } from '../store/target-store.js';
import { envelopeFromStored, type CredentialVault } from '../vault/credential-vault.js';
import type { Connector, RemoteConnection } from '../ssh/connector.js';
import type { FileChannel, FileDownload } from '../ssh/file-channel.js';
import { publishAudit, type AuditAction, type AuditSink } from '../audit/audit.js';
import { HostKeyRejectedError, NotFoundError, TargetNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('files');

export interface FileServiceDeps {
  store: TargetStore;
  vault: CredentialVault;
  connector: Connector;
  audit: AuditSink;
  readyTimeoutMs?: number;
}

export interface FileRequest {
  targetId: string;
  ownerId: string;
  key: string;
}

export interface DirectoryListing {
  cwd: string;
  path: string;
  files: FileInfo[];
}

export interface OpenDownload extends FileDownload {
  filename: string;
  release(): void;
}

interface FileSession {
  target: Target;
  files: FileChannel;
  close(): void;
}

export class FileService {
  constructor(private deps: FileServiceDeps) {}

  async list(req: FileRequest, dir: string): Promise<DirectoryListing> {
    return this.withSession(req, async ({ target, files }) => {
      const entries = await files.list(dir);
      const cwd = await files.cwd();
      // The initial listing (empty path) is not audited
      if (dir) {
        this.audit('sftp.list', req, target, `Listed: ${dir}`);
      }
      return { cwd, path: dir, files: entries };
    });
  }

  async stat(req: FileRequest, remotePath: string): Promise<FileInfo> {
    return this.withSession(req, ({ files }) => files.stat(remotePath));
  }

  /**
   * The connection stays open until the caller has consumed the stream and
   * calls release().
   */
  async download(req: FileRequest, remotePath: string): Promise<OpenDownload> {
    const session = await this.open(req);
    try {
      const { stream, size } = await session.files.read(remotePath);
      this.audit('sftp.download', req, session.target, `Downloaded: ${remotePath}`);
      let released = false;
      return {
        stream,
        size,
        filename: posix.basename(remotePath),
        release: () => {
          if (released) return;
          released = true;
          session.close();
        },
      };
    } catch (error) {
      session.close();
      throw error;
    }
  }

  /**
   * Upload content to remotePath. When remotePath is an existing directory
   * and a filename is given, the file lands inside it.
   * @returns the final remote path
   */
  async upload(req: FileRequest, remotePath: string, content: Buffer, filename?: string): Promise<string> {
    return this.withSession(req, async ({ target, files }) => {
      let destination = remotePath;
      if (filename) {
        const existing = await files.stat(remotePath).catch((error: unknown) => {
          if (error instanceof NotFoundError) return null;
          throw error;
        });
        if (existing?.isDir) {
          destination = posix.join(remotePath, posix.basename(filename));
        }
      }
      await files.write(destination, Readable.from([content]), content.length);
      this.audit('sftp.upload', req, target, `Uploaded: ${destination}`);
      return destination;
    });
  }

  async remove(req: FileRequest, remotePath: string): Promise<void> {
    await this.withSession(req, async ({ target, files }) => {
      await files.remove(remotePath);
      this.audit('sftp.delete', req, target, `Deleted: ${remotePath}`);
    });
  }

  async mkdir(req: FileRequest, remotePath: string): Promise<void> {
    await this.withSession(req, async ({ target, files }) => {
      await files.mkdirAll(remotePath);
      this.audit('sftp.mkdir', req, target, `Created directory: ${remotePath}`);
    });
  }

  async rename(req: FileRequest, oldPath: string, newPath: string): Promise<void> {
    await this.withSession(req, async ({ target, files }) => {
      await files.rename(oldPath, newPath);
      this.audit('sftp.rename', req, target, `Renamed: ${oldPath} -> ${newPath}`);
    });
  }

  private async withSession<T>(req: FileRequest, fn: (session: FileSession) => Promise<T>): Promise<T> {
    const session = await this.open(req);
    try {
      return await fn(session);
    } finally {
      session.close();
    }
  }

  /**
   * Connect and open SFTP. Only an already trusted host key is accepted;
   * new keys are confirmed through the terminal flow or the host-key endpoint.
   */
  private async open(req: FileRequest): Promise<FileSession> {
    const target = await this.deps.store.getTarget(req.targetId, req.ownerId);
    if (!target) {
      throw new TargetNotFoundError();
    }

    const credential = this.deps.vault.decrypt(envelopeFromStored(target.credential), req.key);
    const result = await this.deps.connector.connect({
      host: target.host,
      port: target.port,
      username: target.username,
      credential,
      knownFingerprint: target.hostFingerprint,
      allowMismatch: false,
      readyTimeoutMs: this.deps.readyTimeoutMs,
    });

    const connection: RemoteConnection = result.connection;
    if (result.status !== 'match') {
      connection.close();
      throw new HostKeyRejectedError(result.status, result.fingerprint, target.hostFingerprint);
    }

    let files: FileChannel;
    try {
      files = await connection.openFileChannel();
    } catch (error) {
      connection.close();
      throw error;
    }

    log.debug(`SFTP session opened: target=${target.id}, owner=${req.ownerId}`);
    return {
      target,
      files,
      close: () => {
        files.close();
        connection.close();
      },
    };
  }

  private audit(action: AuditAction, req: FileRequest, target: Target, detail: string): void {
    publishAudit(this.deps.audit, {
      action,
      targetId: target.id,
      ownerId: req.ownerId,
      targetName: target.name,
      detail,
      at: Date.now(),
    });
  }
}
