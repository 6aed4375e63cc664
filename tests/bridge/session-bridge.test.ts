/**
 * SessionBridge tests
 *
 * Drives the bridge through a fake transport and connector; targets live in
 * a JsonTargetStore under a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { SessionBridge, type BridgeDeps, type BridgeOptions } from '../../src/bridge/session-bridge.js';
import { SessionRegistry } from '../../src/bridge/session-registry.js';
import { JsonTargetStore } from '../../src/store/target-store.js';
import { CredentialVault, envelopeToStored } from '../../src/vault/credential-vault.js';
import { HostIdentityLedger } from '../../src/ssh/host-key.js';
import type { Target } from '../../src/types.js';
import { FakeConnector, FakeTransport, RecordingAuditSink } from '../helpers/fakes.js';

const SERVER_SECRET = 'test-server-secret-0123456789abcdef';
const KEY = 'test-key-material';
const FINGERPRINT = 'SHA256:observedHostKeyFingerprint';
const FAST_KDF = { c: 1000, dkLen: 32 };

const OPTIONS: Partial<BridgeOptions> = {
  authTimeoutMs: 500,
  hostKeyTimeoutMs: 500,
  closeGraceMs: 10,
};

describe('SessionBridge', () => {
  let tmpDir: string;
  let store: JsonTargetStore;
  let vault: CredentialVault;
  let connector: FakeConnector;
  let audit: RecordingAuditSink;
  let registry: SessionRegistry;
  let deps: BridgeDeps;

  async function addTarget(id: string, hostFingerprint: string, ownerId = 'alice'): Promise<Target> {
    const target: Target = {
      id,
      ownerId,
      name: `${id}-name`,
      host: `${id}.internal`,
      port: 22,
      username: 'deploy',
      authType: 'password',
      credential: envelopeToStored(vault.encrypt({ password: 'test-password' }, KEY)),
      hostFingerprint,
      createdAt: 1,
      updatedAt: 1,
    };
    await store.saveTarget(target);
    return target;
  }

  function startBridge(targetId: string, options: Partial<BridgeOptions> = OPTIONS) {
    const transport = new FakeTransport();
    const bridge = new SessionBridge(transport, targetId, 'alice', deps, options);
    const done = bridge.run();
    return { transport, bridge, done };
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bridge-test-'));
    store = new JsonTargetStore(path.join(tmpDir, 'targets.json'));
    vault = new CredentialVault(SERVER_SECRET, FAST_KDF);
    connector = new FakeConnector(FINGERPRINT);
    audit = new RecordingAuditSink();
    registry = new SessionRegistry();
    deps = {
      store,
      vault,
      connector,
      ledger: new HostIdentityLedger(store),
      audit,
      registry,
    };
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('handshake', () => {
    it('sends ready first and waits for auth', () => {
      const { transport, bridge } = startBridge('t1');
      expect(transport.messages()).toEqual([{ type: 'ready', data: null }]);
      expect(bridge.currentState).toBe('awaiting_auth');
      transport.close();
    });

    it('new host key: confirm, trust, then relay shell I/O', async () => {
      await addTarget('t1', '');
      const { transport, bridge, done } = startBridge('t1');

      transport.receive({ type: 'auth', data: { key: KEY } });
      await vi.waitFor(() => expect(transport.last()?.type).toBe('host_key_verify'));
      expect(transport.last()).toEqual({
        type: 'host_key_verify',
        data: { status: 'new', fingerprint: FINGERPRINT },
      });
      expect(bridge.currentState).toBe('awaiting_host_key_confirmation');

      transport.receive({ type: 'host_key_confirm', data: { accept: true } });
      await vi.waitFor(() => expect(transport.last()?.type).toBe('connected'));
      expect(transport.last()).toEqual({ type: 'connected', data: { host_key: FINGERPRINT } });
      expect(bridge.currentState).toBe('shell_active');

      const stored = await store.getTarget('t1', 'alice');
      expect(stored?.hostFingerprint).toBe(FINGERPRINT);

      const connection = connector.connections[0];
      expect(connection.shellSize).toEqual([24, 80]);
      expect(connector.calls[0].allowMismatch).toBe(true);
      expect(connector.calls[0].credential).toEqual({ password: 'test-password' });

      transport.receive({ type: 'input', data: { data: 'ls\n' } });
      await vi.waitFor(() => expect(transport.outputText()).toBe('ls\n'));
      expect(connection.shell?.written).toEqual(['ls\n']);
      expect(registry.size).toBe(1);

      transport.receive({ type: 'close' });
      await done;

      expect(bridge.currentState).toBe('closed');
      expect(transport.open).toBe(false);
      expect(connection.shell?.closeCount).toBe(1);
      expect(connection.closeCount).toBe(1);
      expect(registry.size).toBe(0);

      await vi.waitFor(() => expect(audit.actions()).toEqual(['ssh.connect', 'ssh.disconnect']));
      expect(audit.events[1]).toMatchObject({
        targetId: 't1',
        ownerId: 'alice',
        targetName: 't1-name',
        reason: 'closed by client',
      });
    });

    it('matching host key skips confirmation', async () => {
      await addTarget('t1', FINGERPRINT);
      const { transport, done } = startBridge('t1');

      transport.receive({ type: 'auth', data: { key: KEY } });
      await vi.waitFor(() => expect(transport.last()?.type).toBe('connected'));
      expect(transport.types()).toEqual(['ready', 'connected']);

      transport.close();
      await done;
    });

    it('mismatched host key rejected: error, close, ledger unchanged', async () => {
      await addTarget('t1', 'SHA256:previouslyTrustedKey');
      const { transport, bridge, done } = startBridge('t1');

      transport.receive({ type: 'auth', data: { key: KEY } });
      await vi.waitFor(() => expect(transport.last()?.type).toBe('host_key_verify'));
      expect(transport.last()).toEqual({
        type: 'host_key_verify',
        data: { status: 'mismatch', fingerprint: FINGERPRINT, stored_key: 'SHA256:previouslyTrustedKey' },
      });

      transport.receive({ type: 'host_key_confirm', data: { accept: false } });
      await done;

      expect(transport.last()).toEqual({ type: 'error', data: { error: 'Host key rejected by user' } });
      expect(transport.open).toBe(false);
      expect(bridge.currentState).toBe('failed');
      expect(connector.connections[0].closeCount).toBe(1);
      expect(connector.connections[0].shell).toBeNull();

      const stored = await store.getTarget('t1', 'alice');
      expect(stored?.hostFingerprint).toBe('SHA256:previouslyTrustedKey');
    });

    it('mismatched host key accepted: re-trusts the new key', async () => {
      await addTarget('t1', 'SHA256:previouslyTrustedKey');
      const { transport, done } = startBridge('t1');

      transport.receive({ type: 'auth', data: { key: KEY } });
      await vi.waitFor(() => expect(transport.last()?.type).toBe('host_key_verify'));
      transport.receive({ type: 'host_key_confirm', data: { accept: true } });
      await vi.waitFor(() => expect(transport.last()?.type).toBe('connected'));

      const stored = await store.getTarget('t1', 'alice');
      expect(stored?.hostFingerprint).toBe(FINGERPRINT);

      transport.close();
      await done;
    });

    it('no auth in time: error, close, no connection attempt', async () => {
      await addTarget('t1', '');
      const { transport, bridge, done } = startBridge('t1', { ...OPTIONS, authTimeoutMs: 30 });
      await done;

      expect(transport.messages()).toEqual([
        { type: 'ready', data: null },
        { type: 'error', data: { error: 'Timeout waiting for authentication' } },
      ]);
      expect(transport.open).toBe(false);
      expect(bridge.currentState).toBe('failed');
      expect(connector.calls).toHaveLength(0);
    });

    it('host key confirmation timeout fails the session', async () => {
      await addTarget('t1', '');
      const { transport, done } = startBridge('t1', { ...OPTIONS, hostKeyTimeoutMs: 30 });

      transport.receive({ type: 'auth', data: { key: KEY } });
      await done;

      expect(transport.last()).toEqual({
        type: 'error',
        data: { error: 'Timeout waiting for host key confirmation' },
      });
      expect(connector.connections[0].closeCount).toBe(1);
    });

    it('rejects a non-auth message while awaiting auth', async () => {
      const { transport, done } = startBridge('t1');
      transport.receive({ type: 'input', data: { data: 'ls\n' } });
      await done;

      expect(transport.last()).toEqual({ type: 'error', data: { error: 'Expected auth message' } });
      expect(connector.calls).toHaveLength(0);
    });

    it('rejects a malformed auth frame', async () => {
      const { transport, done } = startBridge('t1');
      transport.receive('{not json');
      await done;

      expect(transport.last()).toEqual({ type: 'error', data: { error: 'Expected auth message' } });
    });

    it('ignores unknown message types before auth', async () => {
      await addTarget('t1', FINGERPRINT);
      const { transport, done } = startBridge('t1');

      transport.receive({ type: 'telemetry', data: { fps: 60 } });
      transport.receive({ type: 'auth', data: { key: KEY } });
      await vi.waitFor(() => expect(transport.last()?.type).toBe('connected'));

      transport.close();
      await done;
    });

    it('wrong key material fails without connecting', async () => {
      await addTarget('t1', FINGERPRINT);
      const { transport, done } = startBridge('t1');

      transport.receive({ type: 'auth', data: { key: 'wrong-key' } });
      await done;

      expect(transport.last()).toEqual({ type: 'error', data: { error: 'Failed to decrypt credentials' } });
      expect(connector.calls).toHaveLength(0);
    });

    it('unknown target fails with "Machine not found"', async () => {
      const { transport, done } = startBridge('missing');

      transport.receive({ type: 'auth', data: { key: KEY } });
      await done;

      expect(transport.last()).toEqual({ type: 'error', data: { error: 'Machine not found' } });
    });

    it('does not load a target owned by someone else', async () => {
      await addTarget('t1', FINGERPRINT, 'bob');
      const { transport, done } = startBridge('t1');

      transport.receive({ type: 'auth', data: { key: KEY } });
      await done;

      expect(transport.last()).toEqual({ type: 'error', data: { error: 'Machine not found' } });
    });

    it('client disconnect during confirmation closes the remote connection', async () => {
      await addTarget('t1', '');
      const { transport, bridge, done } = startBridge('t1');

      transport.receive({ type: 'auth', data: { key: KEY } });
      await vi.waitFor(() => expect(transport.last()?.type).toBe('host_key_verify'));
      transport.close();
      await done;

      expect(bridge.currentState).toBe('closed');
      expect(connector.connections[0].closeCount).toBe(1);
      expect(audit.events).toEqual([]);
    });
  });

  describe('active shell', () => {
    async function activeSession(options: Partial<BridgeOptions> = OPTIONS) {
      await addTarget('t1', FINGERPRINT);
      const session = startBridge('t1', options);
      session.transport.receive({ type: 'auth', data: { key: KEY } });
      await vi.waitFor(() => expect(session.transport.last()?.type).toBe('connected'));
      const shell = connector.connections[0].shell;
      if (!shell) throw new Error('shell not opened');
      return { ...session, shell };
    }

    it('applies resize and answers ping', async () => {
      const { transport, shell, done } = await activeSession();

      transport.receive({ type: 'resize', data: { rows: 40, cols: 120 } });
      transport.receive({ type: 'ping' });

      expect(shell.resizes).toEqual([[40, 120]]);
      expect(transport.last()).toEqual({ type: 'pong', data: null });

      transport.close();
      await done;
    });

    it('splits large output into chunks of outputChunkSize bytes', async () => {
      const { transport, shell, done } = await activeSession({ ...OPTIONS, outputChunkSize: 4096 });

      shell.stdout.write(Buffer.alloc(10_000, 0x61));
      await vi.waitFor(() => expect(transport.outputChunks()).toHaveLength(3));
      expect(transport.outputChunks().map(c => c.length)).toEqual([4096, 4096, 1808]);

      transport.close();
      await done;
    });

    it('relays stderr as output', async () => {
      const { transport, shell, done } = await activeSession();

      shell.stderr.write('permission denied\n');
      await vi.waitFor(() => expect(transport.outputText()).toBe('permission denied\n'));

      transport.close();
      await done;
    });

    it('keeps output order within a stream', async () => {
      const { transport, shell, done } = await activeSession();

      shell.stdout.write('one ');
      shell.stdout.write('two ');
      shell.stdout.write('three');
      await vi.waitFor(() => expect(transport.outputText()).toBe('one two three'));

      transport.close();
      await done;
    });

    it('pauses the shell while output frames wait on the socket', async () => {
      const { transport, shell, done } = await activeSession({ ...OPTIONS, outputChunkSize: 10 });
      transport.holdCallbacks = true;

      shell.stdout.write(Buffer.alloc(400, 0x62));
      await vi.waitFor(() => expect(transport.outputChunks()).toHaveLength(40));
      expect(transport.pendingWrites).toBe(40);
      expect(shell.stdout.isPaused()).toBe(true);

      shell.stdout.write('tail');
      await new Promise(resolve => setImmediate(resolve));
      expect(transport.outputChunks()).toHaveLength(40);

      transport.flush();
      expect(shell.stdout.isPaused()).toBe(false);
      await vi.waitFor(() => expect(transport.outputText()).toBe('b'.repeat(400) + 'tail'));

      transport.close();
      await done;
    });

    it('ends the session when a socket write fails', async () => {
      const { transport, shell, bridge, done } = await activeSession();
      transport.holdCallbacks = true;

      shell.stdout.write('x');
      await vi.waitFor(() => expect(transport.pendingWrites).toBe(1));
      transport.flush(new Error('socket reset'));
      await done;

      expect(bridge.currentState).toBe('closed');
      expect(transport.open).toBe(false);
      expect(connector.connections[0].closeCount).toBe(1);
      await vi.waitFor(() => expect(audit.events[1]?.reason).toBe('transport write failed'));
    });

    it('ends the session when the remote shell closes', async () => {
      const { transport, shell, bridge, done } = await activeSession();

      shell.close();
      await done;

      expect(bridge.currentState).toBe('closed');
      expect(transport.open).toBe(false);
      expect(connector.connections[0].closeCount).toBe(1);
      await vi.waitFor(() => expect(audit.events[1]?.reason).toBe('shell closed'));
    });

    it('ends the session when the client disconnects', async () => {
      const { transport, shell, done } = await activeSession();

      transport.close();
      await done;

      expect(shell.closeCount).toBe(1);
      expect(connector.connections[0].closeCount).toBe(1);
      expect(registry.size).toBe(0);
      await vi.waitFor(() => expect(audit.events[1]?.reason).toBe('client disconnected'));
    });

    it('treats a second auth message as a protocol violation', async () => {
      const { transport, bridge, done } = await activeSession();

      transport.receive({ type: 'auth', data: { key: KEY } });
      await done;

      expect(transport.last()).toEqual({ type: 'error', data: { error: 'Unexpected auth message' } });
      expect(bridge.currentState).toBe('failed');
      expect(connector.connections[0].closeCount).toBe(1);
    });

    it('treats a malformed frame as a protocol violation', async () => {
      const { transport, done } = await activeSession();

      transport.receive({ type: 'resize', data: { rows: 0, cols: 80 } });
      await done;

      expect(transport.last()).toEqual({
        type: 'error',
        data: { error: 'Malformed message: invalid resize payload' },
      });
    });

    it('ignores unknown message types', async () => {
      const { transport, bridge, done } = await activeSession();

      transport.receive({ type: 'clipboard', data: 'x' });
      expect(bridge.currentState).toBe('shell_active');

      transport.close();
      await done;
    });

    it('registry close handle ends the session', async () => {
      const { transport, done } = await activeSession();

      registry.closeAll('server shutting down');
      await done;

      expect(transport.open).toBe(false);
      await vi.waitFor(() => expect(audit.events[1]?.reason).toBe('server shutting down'));
    });
  });

  describe('concurrency', () => {
    it('two sessions of one owner do not interfere', async () => {
      await addTarget('t1', FINGERPRINT);
      await addTarget('t2', FINGERPRINT);

      const a = startBridge('t1');
      const b = startBridge('t2');
      a.transport.receive({ type: 'auth', data: { key: KEY } });
      b.transport.receive({ type: 'auth', data: { key: KEY } });
      await vi.waitFor(() => {
        expect(a.transport.last()?.type).toBe('connected');
        expect(b.transport.last()?.type).toBe('connected');
      });
      expect(registry.list('alice').map(s => s.targetId).sort()).toEqual(['t1', 't2']);

      const shellFor = (host: string) => {
        const index = connector.calls.findIndex(c => c.host === host);
        return connector.connections[index].shell;
      };

      a.transport.receive({ type: 'input', data: { data: 'from-a\n' } });
      b.transport.receive({ type: 'input', data: { data: 'from-b\n' } });
      await vi.waitFor(() => {
        expect(a.transport.outputText()).toBe('from-a\n');
        expect(b.transport.outputText()).toBe('from-b\n');
      });
      expect(shellFor('t1.internal')?.written).toEqual(['from-a\n']);
      expect(shellFor('t2.internal')?.written).toEqual(['from-b\n']);

      a.transport.close();
      await a.done;
      expect(b.bridge.currentState).toBe('shell_active');
      expect(registry.list('alice').map(s => s.targetId)).toEqual(['t2']);

      b.transport.close();
      await b.done;
    });

    it('keeps two terminals of one owner on the same target registered', async () => {
      await addTarget('t1', FINGERPRINT);

      const a = startBridge('t1');
      const b = startBridge('t1');
      a.transport.receive({ type: 'auth', data: { key: KEY } });
      b.transport.receive({ type: 'auth', data: { key: KEY } });
      await vi.waitFor(() => {
        expect(a.transport.last()?.type).toBe('connected');
        expect(b.transport.last()?.type).toBe('connected');
      });
      expect(registry.find('t1', 'alice')).toHaveLength(2);

      registry.closeAll('server shutting down');
      await Promise.all([a.done, b.done]);

      expect(a.transport.open).toBe(false);
      expect(b.transport.open).toBe(false);
      expect(registry.size).toBe(0);
    });
  });
});
