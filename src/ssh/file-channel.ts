/**
 * SFTP file channel
 * Promise wrappers over an SFTP session opened on an authenticated connection
 */

import path from 'path';
import { pipeline } from 'stream/promises';
import type { Readable, Writable } from 'stream';
import type { FileInfo } from '../types.js';
import { IsDirectoryError, NotFoundError } from '../errors.js';

const posix = path.posix;

// SFTP status code for a missing path
const NO_SUCH_FILE = 2;

const S_IFMT = 0o170000;
const S_IFDIR = 0o040000;
const S_IFLNK = 0o120000;

export interface RemoteStats {
  mode: number;
  size: number;
  mtime: number;
  isDirectory(): boolean;
}

export interface RemoteEntry {
  filename: string;
  attrs: RemoteStats;
}

type DoneCallback = (err?: Error | null) => void;

/**
 * The subset of ssh2's SFTPWrapper this channel relies on.
 */
export interface SftpSession {
  realpath(path: string, callback: (err: Error | undefined, absPath: string) => void): void;
  readdir(path: string, callback: (err: Error | undefined, list: RemoteEntry[]) => void): void;
  stat(path: string, callback: (err: Error | undefined, stats: RemoteStats) => void): void;
  mkdir(path: string, callback: DoneCallback): void;
  rmdir(path: string, callback: DoneCallback): void;
  unlink(path: string, callback: DoneCallback): void;
  rename(src: string, dest: string, callback: DoneCallback): void;
  createReadStream(path: string): Readable;
  createWriteStream(path: string): Writable;
  end(): void;
}

export interface FileDownload {
  stream: Readable;
  size: number;
}

export class FileChannel {
  private closed = false;

  constructor(private sftp: SftpSession) {}

  async cwd(): Promise<string> {
    return new Promise((resolve, reject) => {
      this.sftp.realpath('.', (err, absPath) => {
        if (err) return reject(new Error(`Failed to get working directory: ${err.message}`));
        resolve(absPath);
      });
    });
  }

  /**
   * List a directory, directories first and then by name.
   * An empty path lists the remote working directory.
   */
  async list(dir: string = ''): Promise<FileInfo[]> {
    const absDir = await this.resolve(dir);
    const entries = await new Promise<RemoteEntry[]>((resolve, reject) => {
      this.sftp.readdir(absDir, (err, list) => {
        if (err) return reject(this.mapError(err, absDir, 'Failed to read directory'));
        resolve(list);
      });
    });

    const files = entries
      .filter(e => e.filename !== '.' && e.filename !== '..')
      .map(e => toFileInfo(e.filename, posix.join(absDir, e.filename), e.attrs));

    files.sort((a, b) => {
      if (a.isDir !== b.isDir) return a.isDir ? -1 : 1;
      if (a.name === b.name) return 0;
      return a.name < b.name ? -1 : 1;
    });
    return files;
  }

  async stat(remotePath: string): Promise<FileInfo> {
    const stats = await this.rawStat(remotePath);
    return toFileInfo(posix.basename(remotePath), remotePath, stats);
  }

  async read(remotePath: string): Promise<FileDownload> {
    const stats = await this.rawStat(remotePath);
    if (stats.isDirectory()) {
      throw new IsDirectoryError(remotePath);
    }
    return { stream: this.sftp.createReadStream(remotePath), size: stats.size };
  }

  /**
   * Write a stream to a remote file, creating parent directories first.
   * @returns bytes written
   */
  async write(remotePath: string, content: Readable, size: number): Promise<number> {
    await this.mkdirAll(posix.dirname(remotePath));

    let written = 0;
    content.on('data', (chunk: Buffer) => {
      written += chunk.length;
    });
    await pipeline(content, this.sftp.createWriteStream(remotePath));

    if (written !== size) {
      throw new Error(`Incomplete upload: expected ${size} bytes, received ${written}`);
    }
    return written;
  }

  async remove(remotePath: string): Promise<void> {
    const stats = await this.rawStat(remotePath);
    if (stats.isDirectory()) {
      await this.done(cb => this.sftp.rmdir(remotePath, cb), 'Failed to remove directory');
    } else {
      await this.done(cb => this.sftp.unlink(remotePath, cb), 'Failed to remove file');
    }
  }

  async mkdirAll(remotePath: string): Promise<void> {
    const absPath = await this.resolve(remotePath);
    const parts = absPath.split('/').filter(Boolean);
    let current = '';

    for (const part of parts) {
      current += `/${part}`;
      let stats: RemoteStats | null;
      try {
        stats = await this.rawStat(current);
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
        stats = null;
      }

      if (stats === null) {
        const dir = current;
        await this.done(cb => this.sftp.mkdir(dir, cb), 'Failed to create directory');
      } else if (!stats.isDirectory()) {
        throw new Error(`Not a directory: ${current}`);
      }
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    await this.done(cb => this.sftp.rename(oldPath, newPath, cb), 'Failed to rename');
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.sftp.end();
  }

  private async resolve(remotePath: string): Promise<string> {
    if (!remotePath) return this.cwd();
    if (posix.isAbsolute(remotePath)) return posix.normalize(remotePath);
    return posix.join(await this.cwd(), remotePath);
  }

  private rawStat(remotePath: string): Promise<RemoteStats> {
    return new Promise((resolve, reject) => {
      this.sftp.stat(remotePath, (err, stats) => {
        if (err) return reject(this.mapError(err, remotePath, 'Failed to stat path'));
        resolve(stats);
      });
    });
  }

  private done(op: (cb: DoneCallback) => void, failure: string): Promise<void> {
    return new Promise((resolve, reject) => {
      op((err) => {
        if (err) return reject(new Error(`${failure}: ${err.message}`, { cause: err }));
        resolve();
      });
    });
  }

  private mapError(err: Error, remotePath: string, failure: string): Error {
    if ('code' in err && err.code === NO_SUCH_FILE) {
      return new NotFoundError(remotePath);
    }
    return new Error(`${failure}: ${err.message}`, { cause: err });
  }
}

function toFileInfo(name: string, fullPath: string, stats: RemoteStats): FileInfo {
  return {
    name,
    path: fullPath,
    size: stats.size,
    mode: formatMode(stats.mode),
    modTime: stats.mtime,
    isDir: stats.isDirectory(),
  };
}

/**
 * Render a POSIX mode as "drwxr-xr-x"
 */
export function formatMode(mode: number): string {
  const type = mode & S_IFMT;
  let out = type === S_IFDIR ? 'd' : type === S_IFLNK ? 'l' : '-';
  const symbols = 'rwxrwxrwx';
  for (let i = 0; i < 9; i++) {
    out += mode & (1 << (8 - i)) ? symbols[i] : '-';
  }
  return out;
}
