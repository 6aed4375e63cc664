/**
 * SSHConnector unit tests
 *
 * Uses a mocked ssh2 Client that runs the host verifier and then emits
 * ready or error, without real SSH connections.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { fingerprintHostKey } from '../../src/ssh/host-key.js';
import {
  AuthFailedError,
  DialTimeoutError,
  HostKeyRejectedError,
  KeyParseError,
  NetworkError,
  NoAuthMethodError,
} from '../../src/errors.js';

// ── Mock ssh2 ──────────────────────────────────────────────

interface MockConfig {
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  privateKey?: string;
  readyTimeout?: number;
  authHandler?: string[];
  hostVerifier?: (key: Buffer) => boolean;
}

class MockChannel extends EventEmitter {
  stderr = new EventEmitter();
  windows: number[][] = [];
  ended = 0;

  setWindow(rows: number, cols: number, height: number, width: number) {
    this.windows.push([rows, cols, height, width]);
  }

  end() {
    this.ended++;
  }

  close() {
    this.emit('close');
  }
}

type Outcome = { kind: 'ready' } | { kind: 'error'; message: string; level?: string };

let hostKey = Buffer.from('ssh-ed25519 host-key-A');
let outcome: Outcome = { kind: 'ready' };

class MockClient extends EventEmitter {
  static instances: MockClient[] = [];
  config: MockConfig = {};
  endCalls = 0;
  shellPty: unknown = null;
  channel = new MockChannel();

  connect(config: MockConfig) {
    this.config = config;
    MockClient.instances.push(this);
    setTimeout(() => {
      const accepted = config.hostVerifier ? config.hostVerifier(hostKey) : true;
      if (!accepted) {
        this.emit('error', Object.assign(new Error('Host denied (verification failed)'), { level: 'client-socket' }));
        return;
      }
      if (outcome.kind === 'ready') {
        this.emit('ready');
      } else {
        this.emit('error', Object.assign(new Error(outcome.message), { level: outcome.level }));
      }
    }, 0);
  }

  shell(pty: unknown, cb: (err: Error | undefined, stream: MockChannel) => void) {
    this.shellPty = pty;
    cb(undefined, this.channel);
  }

  sftp(cb: (err: Error | undefined, sftp: unknown) => void) {
    cb(new Error('subsystem request failed'), undefined);
  }

  end() {
    this.endCalls++;
  }
}

vi.mock('ssh2', () => ({
  default: {
    Client: MockClient,
    utils: {
      parseKey: (key: string) => (key.includes('garbage') ? new Error('Unsupported key format') : { type: 'ssh-ed25519' }),
    },
  },
}));

// Import after mock
const { SSHConnector, buildAuth } = await import('../../src/ssh/connector.js');

// ── Tests ──────────────────────────────────────────────────

const FINGERPRINT_A = fingerprintHostKey(Buffer.from('ssh-ed25519 host-key-A'));

const baseOptions = {
  host: '10.0.0.12',
  port: 2222,
  username: 'deploy',
  credential: { password: 'test-password' },
  knownFingerprint: '',
  allowMismatch: false,
};

describe('buildAuth', () => {
  it('offers password only', () => {
    expect(buildAuth({ password: 'test-password' })).toEqual({
      methods: ['password'],
      config: { password: 'test-password' },
    });
  });

  it('offers password before public key', () => {
    const auth = buildAuth({ password: 'p', privateKey: 'test-private-key', passphrase: 'pp' });
    expect(auth.methods).toEqual(['password', 'publickey']);
    expect(auth.config).toEqual({ password: 'p', privateKey: 'test-private-key', passphrase: 'pp' });
  });

  it('rejects a key that cannot be parsed', () => {
    expect(() => buildAuth({ privateKey: 'garbage' })).toThrow(KeyParseError);
  });

  it('requires at least one method', () => {
    expect(() => buildAuth({})).toThrow(NoAuthMethodError);
    expect(() => buildAuth({ passphrase: 'only-a-passphrase' })).toThrow(NoAuthMethodError);
  });
});

describe('SSHConnector', () => {
  const connector = new SSHConnector();

  beforeEach(() => {
    MockClient.instances = [];
    hostKey = Buffer.from('ssh-ed25519 host-key-A');
    outcome = { kind: 'ready' };
  });

  it('connects and classifies a first-seen host key as new', async () => {
    const result = await connector.connect(baseOptions);

    expect(result.status).toBe('new');
    expect(result.fingerprint).toBe(FINGERPRINT_A);

    const config = MockClient.instances[0].config;
    expect(config.host).toBe('10.0.0.12');
    expect(config.port).toBe(2222);
    expect(config.username).toBe('deploy');
    expect(config.password).toBe('test-password');
    expect(config.authHandler).toEqual(['password']);
    expect(config.readyTimeout).toBe(30_000);
  });

  it('classifies a known host key as match', async () => {
    const result = await connector.connect({ ...baseOptions, knownFingerprint: FINGERPRINT_A });
    expect(result.status).toBe('match');
  });

  it('rejects a changed host key unless mismatches are allowed', async () => {
    hostKey = Buffer.from('ssh-ed25519 host-key-B');
    const fingerprintB = fingerprintHostKey(hostKey);

    const rejection = connector.connect({ ...baseOptions, knownFingerprint: FINGERPRINT_A });
    await expect(rejection).rejects.toBeInstanceOf(HostKeyRejectedError);
    await expect(rejection).rejects.toMatchObject({
      status: 'mismatch',
      fingerprint: fingerprintB,
      storedFingerprint: FINGERPRINT_A,
      message: `Host key mismatch: expected ${FINGERPRINT_A}, got ${fingerprintB}`,
    });
    expect(MockClient.instances[0].endCalls).toBe(1);
  });

  it('returns a mismatch when allowed so the caller can decide', async () => {
    hostKey = Buffer.from('ssh-ed25519 host-key-B');
    const result = await connector.connect({
      ...baseOptions,
      knownFingerprint: FINGERPRINT_A,
      allowMismatch: true,
    });
    expect(result.status).toBe('mismatch');
    expect(result.fingerprint).toBe(fingerprintHostKey(hostKey));
  });

  it('maps a handshake timeout to DialTimeoutError', async () => {
    outcome = { kind: 'error', message: 'Timed out while waiting for handshake', level: 'client-timeout' };
    const attempt = connector.connect({ ...baseOptions, readyTimeoutMs: 5000 });
    await expect(attempt).rejects.toBeInstanceOf(DialTimeoutError);
    await expect(attempt).rejects.toThrow('Connection timed out after 5000ms');
  });

  it('maps rejected credentials to AuthFailedError', async () => {
    outcome = { kind: 'error', message: 'All configured authentication methods failed', level: 'client-authentication' };
    const attempt = connector.connect(baseOptions);
    await expect(attempt).rejects.toBeInstanceOf(AuthFailedError);
    await expect(attempt).rejects.toThrow('SSH authentication failed');
  });

  it('maps other failures to NetworkError', async () => {
    outcome = { kind: 'error', message: 'connect ECONNREFUSED 10.0.0.12:2222', level: 'client-socket' };
    const attempt = connector.connect(baseOptions);
    await expect(attempt).rejects.toBeInstanceOf(NetworkError);
    await expect(attempt).rejects.toThrow('Failed to connect: connect ECONNREFUSED 10.0.0.12:2222');
  });

  it('fails before dialing when no auth method is available', async () => {
    await expect(connector.connect({ ...baseOptions, credential: {} })).rejects.toBeInstanceOf(NoAuthMethodError);
    expect(MockClient.instances).toHaveLength(0);
  });

  describe('connection', () => {
    it('opens an xterm-256color PTY with echo at 14400 baud', async () => {
      const { connection } = await connector.connect(baseOptions);
      await connection.openShell(30, 100);

      expect(MockClient.instances[0].shellPty).toEqual({
        term: 'xterm-256color',
        rows: 30,
        cols: 100,
        modes: { ECHO: 1, TTY_OP_ISPEED: 14400, TTY_OP_OSPEED: 14400 },
      });
    });

    it('resizes through the channel window', async () => {
      const { connection } = await connector.connect(baseOptions);
      const shell = await connection.openShell(24, 80);
      shell.resize(50, 200);

      expect(MockClient.instances[0].channel.windows).toEqual([[50, 200, 0, 0]]);
    });

    it('closes the shell channel once', async () => {
      const { connection } = await connector.connect(baseOptions);
      const shell = await connection.openShell(24, 80);
      const onClose = vi.fn();
      shell.onClose(onClose);

      shell.close();
      shell.close();

      expect(MockClient.instances[0].channel.ended).toBe(1);
      expect(onClose).toHaveBeenCalledTimes(1);
    });

    it('wraps SFTP subsystem failures', async () => {
      const { connection } = await connector.connect(baseOptions);
      await expect(connection.openFileChannel()).rejects.toThrow(
        'Failed to create SFTP client: subsystem request failed',
      );
    });

    it('ends the client exactly once', async () => {
      const { connection } = await connector.connect(baseOptions);
      connection.close();
      connection.close();
      expect(MockClient.instances[0].endCalls).toBe(1);
    });
  });
});
