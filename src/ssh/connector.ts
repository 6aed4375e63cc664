/**
 * Remote Session Connector
 * Opens authenticated SSH connections, capturing and classifying the host key
 * during the handshake.
 */

import ssh2 from 'ssh2';
import type { AuthenticationType, Client as SSHClient, ConnectConfig, PseudoTtyOptions } from 'ssh2';
import type { Credential, HostKeyStatus } from '../types.js';
import {
  AuthFailedError,
  DialTimeoutError,
  HostKeyRejectedError,
  KeyParseError,
  NetworkError,
  NoAuthMethodError,
} from '../errors.js';
import { classify, fingerprintHostKey } from './host-key.js';
import { SSHShellChannel, type ShellChannel } from './shell-channel.js';
import { FileChannel } from './file-channel.js';
import { createLogger } from '../logger.js';

const { Client, utils } = ssh2;
const log = createLogger('ssh');

export const DEFAULT_READY_TIMEOUT_MS = 30_000;

export interface ConnectOptions {
  host: string;
  port: number;
  username: string;
  credential: Credential;
  knownFingerprint: string;
  allowMismatch: boolean;
  readyTimeoutMs?: number;
  keepaliveIntervalMs?: number;
}

export interface RemoteConnection {
  openShell(rows: number, cols: number): Promise<ShellChannel>;
  openFileChannel(): Promise<FileChannel>;
  close(): void;
}

export interface ConnectResult {
  connection: RemoteConnection;
  fingerprint: string;
  status: HostKeyStatus;
}

export interface Connector {
  connect(options: ConnectOptions): Promise<ConnectResult>;
}

interface AuthSetup {
  methods: AuthenticationType[];
  config: Pick<ConnectConfig, 'password' | 'privateKey' | 'passphrase'>;
}

/**
 * Password first, then public key.
 * @throws NoAuthMethodError when the credential carries neither
 * @throws KeyParseError when the key/passphrase pair cannot be parsed
 */
export function buildAuth(credential: Credential): AuthSetup {
  const methods: AuthenticationType[] = [];
  const config: AuthSetup['config'] = {};

  if (credential.password) {
    methods.push('password');
    config.password = credential.password;
  }

  if (credential.privateKey) {
    const parsed = utils.parseKey(credential.privateKey, credential.passphrase || undefined);
    if (parsed instanceof Error) {
      throw new KeyParseError(parsed);
    }
    methods.push('publickey');
    config.privateKey = credential.privateKey;
    if (credential.passphrase) {
      config.passphrase = credential.passphrase;
    }
  }

  if (methods.length === 0) {
    throw new NoAuthMethodError();
  }
  return { methods, config };
}

export class SSHConnector implements Connector {
  async connect(options: ConnectOptions): Promise<ConnectResult> {
    const auth = buildAuth(options.credential);
    const readyTimeout = options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;

    return new Promise((resolve, reject) => {
      const client = new Client();
      let fingerprint = '';
      let status: HostKeyStatus = 'new';
      let hostKeyRejected = false;
      let settled = false;

      const connectConfig: ConnectConfig = {
        host: options.host,
        port: options.port,
        username: options.username,
        readyTimeout,
        keepaliveInterval: options.keepaliveIntervalMs,
        authHandler: auth.methods,
        ...auth.config,
        hostVerifier: (key: Buffer): boolean => {
          fingerprint = fingerprintHostKey(key);
          status = classify(options.knownFingerprint, fingerprint);
          if (status === 'mismatch' && !options.allowMismatch) {
            hostKeyRejected = true;
            return false;
          }
          return true;
        },
      };

      client.once('ready', () => {
        settled = true;
        log.debug(`Connected to ${options.host}:${options.port} (host key ${status})`);
        resolve({ connection: new SSHConnection(client), fingerprint, status });
      });

      client.on('error', (err: Error) => {
        if (settled) {
          log.warn(`Connection error on ${options.host}:${options.port}: ${err.message}`);
          return;
        }
        settled = true;
        client.end();
        if (hostKeyRejected) {
          reject(new HostKeyRejectedError(status, fingerprint, options.knownFingerprint));
          return;
        }
        reject(mapConnectError(err, readyTimeout));
      });

      client.connect(connectConfig);
    });
  }
}

function errorLevel(err: Error): string | undefined {
  if ('level' in err && typeof err.level === 'string') {
    return err.level;
  }
  return undefined;
}

function mapConnectError(err: Error, readyTimeout: number): Error {
  switch (errorLevel(err)) {
    case 'client-timeout':
      return new DialTimeoutError(readyTimeout);
    case 'client-authentication':
      return new AuthFailedError(err);
    default:
      return new NetworkError(`Failed to connect: ${err.message}`, err);
  }
}

export class SSHConnection implements RemoteConnection {
  private closed = false;

  constructor(private client: SSHClient) {
    client.once('close', () => {
      this.closed = true;
    });
  }

  openShell(rows: number, cols: number): Promise<ShellChannel> {
    return new Promise((resolve, reject) => {
      const pty: PseudoTtyOptions = {
        term: 'xterm-256color',
        rows,
        cols,
        modes: { ECHO: 1, TTY_OP_ISPEED: 14400, TTY_OP_OSPEED: 14400 },
      };
      this.client.shell(pty, (err, stream) => {
        if (err) {
          reject(new NetworkError(`Failed to start shell: ${err.message}`, err));
          return;
        }
        resolve(new SSHShellChannel(stream));
      });
    });
  }

  openFileChannel(): Promise<FileChannel> {
    return new Promise((resolve, reject) => {
      this.client.sftp((err, sftp) => {
        if (err) {
          reject(new NetworkError(`Failed to create SFTP client: ${err.message}`, err));
          return;
        }
        resolve(new FileChannel(sftp));
      });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.client.end();
  }
}
