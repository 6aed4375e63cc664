import type { Readable } from 'stream';
import type { ClientChannel } from 'ssh2';

/**
 * Interactive PTY shell on a remote host. stdout and stderr are separate
 * streams and can be consumed independently.
 */
export interface ShellChannel {
  readonly stdout: Readable;
  readonly stderr: Readable;
  write(data: string | Buffer): void;
  resize(rows: number, cols: number): void;
  close(): void;
  onClose(listener: () => void): void;
}

export class SSHShellChannel implements ShellChannel {
  private closed = false;

  constructor(private channel: ClientChannel) {
    channel.once('close', () => {
      this.closed = true;
    });
  }

  get stdout(): Readable {
    return this.channel;
  }

  get stderr(): Readable {
    return this.channel.stderr;
  }

  write(data: string | Buffer): void {
    if (this.closed) return;
    this.channel.write(data);
  }

  resize(rows: number, cols: number): void {
    if (this.closed) return;
    this.channel.setWindow(rows, cols, 0, 0);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.channel.end();
    this.channel.close();
  }

  onClose(listener: () => void): void {
    this.channel.once('close', listener);
  }
}
