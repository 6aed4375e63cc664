/**
 * HTTP API and WebSocket endpoint for browser terminals and file transfer
 */

import express, { type Request, type Response } from 'express';
import cors from 'cors';
import { createServer, type IncomingMessage, type Server } from 'http';
import type { Duplex } from 'stream';
import { pipeline } from 'stream/promises';
import { WebSocketServer, type WebSocket } from 'ws';
import { z } from 'zod';
import type { Config, Target } from '../types.js';
import type { TargetStore } from '../store/target-store.js';
import { HostKeyRejectedError, TargetNotFoundError, clientMessage, httpStatus } from '../errors.js';
import { SessionBridge, type BridgeDeps, type BridgeOptions } from '../bridge/session-bridge.js';
import { wrapWebSocket } from '../bridge/transport.js';
import type { SessionRegistry } from '../bridge/session-registry.js';
import { extractToken, type Authenticator, type Caller } from './auth.js';
import type { FileRequest, FileService, OpenDownload } from './files.js';
import { createLogger } from '../logger.js';

const log = createLogger('web');

const WS_PATH = /^\/ws\/targets\/([^/]+)$/;
const HEARTBEAT_INTERVAL_MS = 30_000;

export interface WebServerDeps extends BridgeDeps {
  store: TargetStore;
  registry: SessionRegistry;
  authenticator: Authenticator;
  files: FileService;
}

// --- Request bodies ---

const KeyField = z.string().min(1, 'key is required');

const ListBody = z.object({
  key: KeyField,
  path: z.string().default(''),
});

const PathBody = z.object({
  key: KeyField,
  path: z.string().min(1, 'path is required'),
});

const UploadBody = z.object({
  key: KeyField,
  path: z.string().min(1, 'path is required'),
  content: z.string(),
  filename: z.string().optional(),
});

const RenameBody = z.object({
  key: KeyField,
  old_path: z.string().min(1, 'old_path is required'),
  new_path: z.string().min(1, 'new_path is required'),
});

const HostKeyBody = z.object({
  host_key: z.string(),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request, res: Response): T | null {
  const result = schema.safeParse(req.body);
  if (!result.success) {
    const issue = result.error.issues[0];
    res.status(400).json({ error: issue ? issue.message : 'Invalid request body' });
    return null;
  }
  return result.data;
}

function sendError(res: Response, error: unknown): void {
  const status = httpStatus(error);
  if (status === 500) {
    log.error('Request failed:', error);
  }
  if (error instanceof HostKeyRejectedError) {
    res.status(status).json({
      error: clientMessage(error),
      status: error.status,
      fingerprint: error.fingerprint,
      stored_key: error.storedFingerprint,
    });
    return;
  }
  res.status(status).json({ error: clientMessage(error) });
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.once('finish', () => socket.destroy());
  socket.end(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

/**
 * Attachment header with an ASCII `filename` and an RFC 5987 `filename*`
 * carrying the exact UTF-8 name.
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    c => '%' + c.charCodeAt(0).toString(16).toUpperCase(),
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

function targetView(target: Target) {
  return {
    id: target.id,
    name: target.name,
    host: target.host,
    port: target.port,
    username: target.username,
    auth_type: target.authType,
    host_key: target.hostFingerprint,
  };
}

export class WebServer {
  private app: express.Application;
  private httpServer: Server;
  private wss: WebSocketServer;
  private alive = new WeakMap<WebSocket, boolean>();
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private config: Config;
  private deps: WebServerDeps;
  private bridgeOptions: Partial<BridgeOptions>;

  constructor(config: Config, deps: WebServerDeps) {
    this.config = config;
    this.deps = deps;
    this.bridgeOptions = {
      ...config.bridge,
      readyTimeoutMs: config.ssh.readyTimeoutMs,
      keepaliveIntervalMs: config.ssh.keepaliveIntervalMs,
    };

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();

    this.httpServer = createServer(this.app);
    this.wss = new WebSocketServer({ noServer: true, perMessageDeflate: false });
    this.httpServer.on('upgrade', (request, socket, head) => {
      this.handleUpgrade(request, socket, head);
    });
  }

  private setupMiddleware(): void {
    this.app.use(cors({
      origin: this.config.server.corsOrigin,
    }));
    this.app.use(express.json({ limit: '50mb' }));
  }

  private authenticate(req: Request, res: Response): Caller | null {
    const caller = this.deps.authenticator.authenticate(extractToken(req));
    if (!caller) {
      res.status(401).json({ error: 'Unauthorized' });
      return null;
    }
    return caller;
  }

  private setupRoutes(): void {
    // Health check
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', sessions: this.deps.registry.size });
    });

    this.app.get('/api/sessions', (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      res.json({ sessions: this.deps.registry.list(caller.ownerId) });
    });

    this.app.get('/api/targets', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      try {
        const targets = await this.deps.store.listTargets(caller.ownerId);
        res.json({ targets: targets.map(targetView) });
      } catch (error) {
        sendError(res, error);
      }
    });

    // --- Host key ---

    this.app.get('/api/targets/:id/host-key', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      try {
        const target = await this.deps.store.getTarget(req.params.id, caller.ownerId);
        if (!target) throw new TargetNotFoundError();
        res.json({ host_key: target.hostFingerprint });
      } catch (error) {
        sendError(res, error);
      }
    });

    // An empty host_key resets the target to "never seen"
    this.app.put('/api/targets/:id/host-key', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      const body = parseBody(HostKeyBody, req, res);
      if (!body) return;
      try {
        const target = await this.deps.store.getTarget(req.params.id, caller.ownerId);
        if (!target) throw new TargetNotFoundError();
        await this.deps.store.updateHostFingerprint(target.id, caller.ownerId, body.host_key);
        log.info(`Host key for target ${target.id} set by ${caller.ownerId}: ${body.host_key || '(cleared)'}`);
        res.json({ host_key: body.host_key });
      } catch (error) {
        sendError(res, error);
      }
    });

    // --- Files ---

    this.app.post('/api/targets/:id/files/list', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      const body = parseBody(ListBody, req, res);
      if (!body) return;
      try {
        const listing = await this.deps.files.list(this.fileRequest(req, caller, body.key), body.path);
        res.json(listing);
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.post('/api/targets/:id/files/stat', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      const body = parseBody(PathBody, req, res);
      if (!body) return;
      try {
        res.json(await this.deps.files.stat(this.fileRequest(req, caller, body.key), body.path));
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.post('/api/targets/:id/files/download', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      const body = parseBody(PathBody, req, res);
      if (!body) return;

      let download: OpenDownload;
      try {
        download = await this.deps.files.download(this.fileRequest(req, caller, body.key), body.path);
      } catch (error) {
        sendError(res, error);
        return;
      }

      try {
        res.setHeader('Content-Disposition', contentDisposition(download.filename));
        res.setHeader('Content-Type', 'application/octet-stream');
        res.setHeader('Content-Length', String(download.size));
        await pipeline(download.stream, res);
      } catch (error) {
        log.warn(`Download of ${body.path} aborted:`, error);
        res.destroy();
      } finally {
        download.release();
      }
    });

    this.app.post('/api/targets/:id/files/upload', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      const body = parseBody(UploadBody, req, res);
      if (!body) return;
      try {
        const content = Buffer.from(body.content, 'base64');
        const destination = await this.deps.files.upload(
          this.fileRequest(req, caller, body.key),
          body.path,
          content,
          body.filename,
        );
        res.json({ message: 'File uploaded successfully', path: destination });
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.post('/api/targets/:id/files/delete', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      const body = parseBody(PathBody, req, res);
      if (!body) return;
      try {
        await this.deps.files.remove(this.fileRequest(req, caller, body.key), body.path);
        res.json({ message: 'Deleted successfully' });
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.post('/api/targets/:id/files/mkdir', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      const body = parseBody(PathBody, req, res);
      if (!body) return;
      try {
        await this.deps.files.mkdir(this.fileRequest(req, caller, body.key), body.path);
        res.status(201).json({ message: 'Directory created', path: body.path });
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.post('/api/targets/:id/files/rename', async (req: Request, res: Response) => {
      const caller = this.authenticate(req, res);
      if (!caller) return;
      const body = parseBody(RenameBody, req, res);
      if (!body) return;
      try {
        await this.deps.files.rename(this.fileRequest(req, caller, body.key), body.old_path, body.new_path);
        res.json({ message: 'Renamed successfully' });
      } catch (error) {
        sendError(res, error);
      }
    });
  }

  private fileRequest(req: Request, caller: Caller, key: string): FileRequest {
    return { targetId: req.params.id, ownerId: caller.ownerId, key };
  }

  /**
   * Token check happens before the upgrade completes; a rejected request
   * never becomes a WebSocket.
   */
  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const pathname = new URL(request.url || '/', 'http://localhost').pathname;
    const match = WS_PATH.exec(pathname);
    if (!match) {
      rejectUpgrade(socket, 404, 'Not Found');
      return;
    }

    const caller = this.deps.authenticator.authenticate(extractToken(request));
    if (!caller) {
      log.warn(`Rejected WebSocket upgrade for ${pathname}: missing or invalid token`);
      rejectUpgrade(socket, 401, 'Unauthorized');
      return;
    }

    let targetId: string;
    try {
      targetId = decodeURIComponent(match[1]);
    } catch {
      rejectUpgrade(socket, 400, 'Bad Request');
      return;
    }
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.acceptSession(ws, targetId, caller.ownerId);
    });
  }

  private acceptSession(ws: WebSocket, targetId: string, ownerId: string): void {
    this.alive.set(ws, true);
    ws.on('pong', () => {
      this.alive.set(ws, true);
    });
    ws.on('error', (error) => {
      log.warn(`WebSocket error (target=${targetId}, owner=${ownerId}): ${error.message}`);
    });

    const bridge = new SessionBridge(wrapWebSocket(ws), targetId, ownerId, this.deps, this.bridgeOptions);
    bridge.run().catch((error: unknown) => {
      log.error(`Session for target ${targetId} ended unexpectedly:`, error);
    });
  }

  private startHeartbeat(): void {
    this.heartbeat = setInterval(() => {
      for (const ws of this.wss.clients) {
        if (!this.alive.get(ws)) {
          log.debug('Terminating WebSocket that missed a pong');
          ws.terminate();
          continue;
        }
        this.alive.set(ws, false);
        ws.ping();
      }
    }, HEARTBEAT_INTERVAL_MS);
    this.heartbeat.unref();
  }

  /**
   * Listen on the configured port, or on `port` when given (0 picks a free one).
   * @returns the bound port
   */
  async start(port: number = this.config.server.port): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, this.config.server.host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });
    this.startHeartbeat();

    const address = this.httpServer.address();
    const bound = address && typeof address === 'object' ? address.port : port;
    log.info(`Listening on http://${this.config.server.host}:${bound}`);
    return bound;
  }

  async stop(): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    this.deps.registry.closeAll('server shutting down');
    for (const ws of this.wss.clients) {
      ws.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
    if (!this.httpServer.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
