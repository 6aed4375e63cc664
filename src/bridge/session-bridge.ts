/**
 * Session Bridge
 * One instance per browser WebSocket: authenticates with client key material,
 * connects to the target, runs host-key confirmation, then relays the shell.
 */

import type { Readable } from 'stream';
import type { Target } from '../types.js';
import type { TargetStore } from '../store/target-store.js';
import type { CredentialVault } from '../vault/credential-vault.js';
import { envelopeFromStored } from '../vault/credential-vault.js';
import type { Connector, RemoteConnection } from '../ssh/connector.js';
import type { ShellChannel } from '../ssh/shell-channel.js';
import { requiresConfirmation, type HostIdentityLedger } from '../ssh/host-key.js';
import { publishAudit, type AuditSink } from '../audit/audit.js';
import {
  BridgeError,
  ProtocolViolationError,
  TargetNotFoundError,
  clientMessage,
} from '../errors.js';
import {
  encodeOutput,
  encodeServerMessage,
  isMessageOfType,
  parseClientFrame,
  type ClientMessage,
  type ClientMessageType,
  type ServerMessage,
} from './protocol.js';
import { MessageReader, ReadDeadlineError, TransportClosedError } from './message-reader.js';
import type { Transport } from './transport.js';
import type { SessionHandle, SessionRegistry } from './session-registry.js';
import { createLogger } from '../logger.js';

const log = createLogger('bridge');

export type BridgeState =
  | 'awaiting_auth'
  | 'connecting'
  | 'awaiting_host_key_confirmation'
  | 'shell_active'
  | 'closed'
  | 'failed';

export interface BridgeOptions {
  authTimeoutMs: number;
  hostKeyTimeoutMs: number;
  closeGraceMs: number;       // delay between an error frame and closing the socket
  outputChunkSize: number;
  initialRows: number;
  initialCols: number;
  readyTimeoutMs?: number;
  keepaliveIntervalMs?: number;
}

export const DEFAULT_BRIDGE_OPTIONS: BridgeOptions = {
  authTimeoutMs: 30_000,
  hostKeyTimeoutMs: 60_000,
  closeGraceMs: 100,
  outputChunkSize: 4096,
  initialRows: 24,
  initialCols: 80,
};

// Output frames awaiting a transport write before the shell stream is paused
const MAX_IN_FLIGHT_FRAMES = 32;

export interface BridgeDeps {
  store: TargetStore;
  vault: CredentialVault;
  connector: Connector;
  ledger: HostIdentityLedger;
  audit: AuditSink;
  registry: SessionRegistry;
}

export class SessionBridge {
  private state: BridgeState = 'awaiting_auth';
  private readonly done = new AbortController();
  private readonly reader: MessageReader;
  private readonly options: BridgeOptions;
  private connection: RemoteConnection | null = null;
  private shell: ShellChannel | null = null;
  private handle: SessionHandle | null = null;
  private target: Target | null = null;
  private finished: Promise<void>;
  private resolveFinished: () => void = () => undefined;

  constructor(
    private transport: Transport,
    private targetId: string,
    private ownerId: string,
    private deps: BridgeDeps,
    options: Partial<BridgeOptions> = {},
  ) {
    this.options = { ...DEFAULT_BRIDGE_OPTIONS, ...options };
    this.reader = new MessageReader(transport);
    this.finished = new Promise((resolve) => {
      this.resolveFinished = resolve;
    });
    transport.onClose(() => this.shutdown('client disconnected'));
  }

  get currentState(): BridgeState {
    return this.state;
  }

  /**
   * Run the session to completion. Never rejects; failures are reported to
   * the client and end in the 'failed' state.
   */
  async run(): Promise<void> {
    log.info(`Session requested: target=${this.targetId}, owner=${this.ownerId}`);
    try {
      await this.handshake();
    } catch (error) {
      await this.fail(error);
    }
    await this.finished;
  }

  private async handshake(): Promise<void> {
    this.send({ type: 'ready' });

    const auth = await this.expect(
      'auth',
      this.options.authTimeoutMs,
      'Timeout waiting for authentication',
      'Expected auth message',
    );

    this.state = 'connecting';
    const target = await this.deps.store.getTarget(this.targetId, this.ownerId);
    if (!target) {
      throw new TargetNotFoundError();
    }
    this.target = target;

    const credential = this.deps.vault.decrypt(envelopeFromStored(target.credential), auth.data.key);

    // The connector never rejects a mismatch here; this bridge decides
    const result = await this.deps.connector.connect({
      host: target.host,
      port: target.port,
      username: target.username,
      credential,
      knownFingerprint: target.hostFingerprint,
      allowMismatch: true,
      readyTimeoutMs: this.options.readyTimeoutMs,
      keepaliveIntervalMs: this.options.keepaliveIntervalMs,
    });
    this.connection = result.connection;
    this.ensureOpen();

    if (requiresConfirmation(result.status)) {
      this.state = 'awaiting_host_key_confirmation';
      this.send({
        type: 'host_key_verify',
        data: {
          status: result.status === 'mismatch' ? 'mismatch' : 'new',
          fingerprint: result.fingerprint,
          ...(target.hostFingerprint ? { stored_key: target.hostFingerprint } : {}),
        },
      });

      const confirm = await this.expect(
        'host_key_confirm',
        this.options.hostKeyTimeoutMs,
        'Timeout waiting for host key confirmation',
        'Expected host key confirmation',
      );
      if (!confirm.data.accept) {
        throw new BridgeError('HOST_KEY_REJECTED', 'Host key rejected by user');
      }

      await this.deps.ledger.trust(
        target.id,
        this.ownerId,
        result.status,
        result.fingerprint,
        target.hostFingerprint,
      );
      this.ensureOpen();
    }

    this.shell = await result.connection.openShell(this.options.initialRows, this.options.initialCols);
    this.ensureOpen();

    this.state = 'shell_active';
    this.send({ type: 'connected', data: { host_key: result.fingerprint } });
    this.activate(target, this.shell);
  }

  /**
   * Await one message of the given type. Unknown types are skipped; any
   * other known type is a protocol violation.
   */
  private async expect<T extends ClientMessageType>(
    type: T,
    timeoutMs: number,
    timeoutMessage: string,
    wrongTypeMessage: string,
  ): Promise<Extract<ClientMessage, { type: T }>> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      let raw: string;
      try {
        raw = await this.reader.next(Math.max(0, deadline - Date.now()));
      } catch (error) {
        if (error instanceof ReadDeadlineError) {
          throw new ProtocolViolationError(timeoutMessage);
        }
        throw error;
      }

      const frame = parseClientFrame(raw);
      if (frame.kind === 'unknown') {
        log.debug(`Ignoring unknown message type "${frame.type}"`);
        continue;
      }
      if (frame.kind === 'malformed' || !isMessageOfType(frame.message, type)) {
        throw new ProtocolViolationError(wrongTypeMessage);
      }
      return frame.message;
    }
  }

  private activate(target: Target, shell: ShellChannel): void {
    const handle: SessionHandle = {
      targetId: target.id,
      ownerId: this.ownerId,
      targetName: target.name,
      host: target.host,
      startedAt: Date.now(),
      close: (reason) => this.shutdown(reason),
    };
    this.handle = handle;
    this.deps.registry.register(handle);
    this.audit('ssh.connect', `Connected to ${target.host}`);
    log.info(`Shell active: target=${target.id}, owner=${this.ownerId}`);

    this.relay(shell.stdout, 'stdout');
    this.relay(shell.stderr, 'stderr');
    shell.onClose(() => this.onRemoteClosed('shell closed'));
    this.reader.stream((payload) => this.onClientFrame(payload));
  }

  /**
   * Forward one shell stream as output frames of at most outputChunkSize
   * bytes. The stream is paused while too many frames wait on the socket.
   */
  private relay(source: Readable, name: 'stdout' | 'stderr'): void {
    const signal = this.done.signal;
    const size = this.options.outputChunkSize;
    let inFlight = 0;

    const onSent = (err?: Error) => {
      inFlight--;
      if (signal.aborted) return;
      if (err) {
        log.warn(`Transport write failed on ${name}: ${err.message}`);
        this.shutdown('transport write failed');
        return;
      }
      if (source.isPaused() && inFlight < MAX_IN_FLIGHT_FRAMES / 2) {
        source.resume();
      }
    };

    const onData = (chunk: Buffer) => {
      for (let offset = 0; offset < chunk.length; offset += size) {
        inFlight++;
        this.transport.send(encodeServerMessage(encodeOutput(chunk.subarray(offset, offset + size))), onSent);
      }
      if (inFlight >= MAX_IN_FLIGHT_FRAMES) {
        source.pause();
      }
    };

    const onEnd = () => {
      if (name === 'stdout') this.onRemoteClosed('shell closed');
    };

    const onError = (err: Error) => {
      log.warn(`Shell ${name} read error: ${err.message}`);
      this.onRemoteClosed(`shell ${name} error`);
    };

    source.on('data', onData);
    source.once('end', onEnd);
    source.on('error', onError);

    signal.addEventListener('abort', () => {
      source.off('data', onData);
      source.off('end', onEnd);
      source.off('error', onError);
    }, { once: true });
  }

  private onClientFrame(payload: string): void {
    const shell = this.shell;
    if (this.state !== 'shell_active' || !shell) return;

    const frame = parseClientFrame(payload);
    if (frame.kind === 'unknown') {
      log.debug(`Ignoring unknown message type "${frame.type}"`);
      return;
    }
    if (frame.kind === 'malformed') {
      void this.fail(new ProtocolViolationError(`Malformed message: ${frame.reason}`));
      return;
    }

    const message = frame.message;
    switch (message.type) {
      case 'input':
        shell.write(message.data.data);
        break;
      case 'resize':
        shell.resize(message.data.rows, message.data.cols);
        break;
      case 'ping':
        this.send({ type: 'pong' });
        break;
      case 'close':
        this.shutdown('closed by client');
        break;
      case 'auth':
      case 'host_key_confirm':
        void this.fail(new ProtocolViolationError(`Unexpected ${message.type} message`));
        break;
      default: {
        const unreachable: never = message;
        return unreachable;
      }
    }
  }

  // fail() closes the session itself once the grace period has passed
  private onRemoteClosed(reason: string): void {
    if (this.state === 'failed') return;
    this.shutdown(reason);
  }

  private ensureOpen(): void {
    if (this.done.signal.aborted) {
      throw new TransportClosedError();
    }
  }

  private send(message: ServerMessage): void {
    this.transport.send(encodeServerMessage(message), (err) => {
      if (err) log.debug(`Dropped ${message.type} frame: ${err.message}`);
    });
  }

  private audit(action: 'ssh.connect' | 'ssh.disconnect', detail: string, reason?: string): void {
    publishAudit(this.deps.audit, {
      action,
      targetId: this.targetId,
      ownerId: this.ownerId,
      targetName: this.target?.name,
      detail,
      reason,
      at: Date.now(),
    });
  }

  /**
   * Report an error to the client, give it closeGraceMs to read it, then close.
   */
  private async fail(error: unknown): Promise<void> {
    if (this.done.signal.aborted) {
      this.releaseRemote();
      return;
    }
    if (this.state === 'failed') return;

    const message = clientMessage(error);
    if (error instanceof BridgeError) {
      log.warn(`Session failed (target=${this.targetId}, owner=${this.ownerId}): ${message}`);
    } else {
      log.error(`Session failed with internal error (target=${this.targetId}, owner=${this.ownerId}):`, error);
    }

    this.state = 'failed';
    this.send({ type: 'error', data: { error: message } });
    this.releaseRemote();
    await new Promise((resolve) => setTimeout(resolve, this.options.closeGraceMs));
    this.shutdown(message);
  }

  private releaseRemote(): void {
    this.reader.stop();
    const shell = this.shell;
    const connection = this.connection;
    this.shell = null;
    this.connection = null;
    shell?.close();
    connection?.close();
  }

  /**
   * Tear the session down exactly once, whichever side ended it.
   */
  private shutdown(reason: string): void {
    if (this.done.signal.aborted) return;
    this.done.abort();
    if (this.state !== 'failed') {
      this.state = 'closed';
    }

    this.releaseRemote();

    const handle = this.handle;
    if (handle) {
      this.handle = null;
      this.deps.registry.unregister(handle);
      this.audit('ssh.disconnect', `Disconnected from ${handle.host}`, reason);
      log.info(`Session closed: target=${this.targetId}, owner=${this.ownerId} (${reason})`);
    }

    this.transport.close();
    this.resolveFinished();
  }
}
