/**
 * Game Server - Express HTTP Routes with WebSocket Upgrades
 *
 * Features:
 * - POST /create opens a lobby for 1-4 players and returns its id as plain text
 * - WebSocket /websocket/:session/:name seats a player in a lobby
 * - WebSocket /rejoin/:session/:code reconnects a dropped player to a running game
 * - GET /sessions and /sessions/:id expose lobby and game status
 * - GET /health for liveness checks, GET / serves the browser client
 * - Heartbeat pings terminate sockets that stop answering
 *
 * Upgrade requests are validated before the WebSocket handshake: unknown paths,
 * malformed ids and unknown sessions get a 400, sessions that no longer take
 * players a 409.
 */

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { createServer, IncomingMessage, Server } from 'http';
import { existsSync } from 'fs';
import path from 'path';
import { Duplex } from 'stream';
import { fileURLToPath } from 'url';
import { validate as uuidValidate } from 'uuid';
import { WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import { createCategoryLogger } from '../core/logger.js';
import { GameSession } from '../core/session.js';
import { SessionManager, SessionManagerOptions } from '../core/session-manager.js';
import { MAX_PLAYERS } from '../core/types.js';
import { WsPlayerSocket } from './ws-connection.js';

const logger = createCategoryLogger('server.http');
const wsLogger = createCategoryLogger('server.ws');

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// server/ when run from source, dist/server/ when built
const DEFAULT_PUBLIC_DIR = [path.resolve(__dirname, '../public'), path.resolve(__dirname, '../../public')]
  .find(dir => existsSync(path.join(dir, 'index.html'))) ?? path.resolve(__dirname, '../public');

const CreateRequestSchema = z.object({
  players: z.number().int().min(1).max(MAX_PLAYERS)
});

export interface GameServerConfig {
  port: number;
  host?: string;
  heartbeatIntervalMs?: number;
  reconnectTimeoutMs?: number;
  lobbyTimeoutMs?: number;
  maxSessions?: number;
  publicDir?: string;
  /** Injected for tests; built from the options above when omitted. */
  sessions?: SessionManager;
}

type UpgradeTarget =
  | { kind: 'join'; session: GameSession; name: string }
  | { kind: 'rejoin'; session: GameSession; code: string };

type UpgradeRejection = { status: number; message: string };

interface TrackedSocket {
  alive: boolean;
}

function sendError(res: Response, status: number, message: string, code?: string, details?: unknown) {
  const error: { error: string; code?: string; details?: unknown } = { error: message };
  if (code) error.code = code;
  if (details !== undefined) error.details = details;
  res.status(status).json(error);
}

function rejectUpgrade(socket: Duplex, rejection: UpgradeRejection): void {
  const reason = rejection.status === 409 ? 'Conflict' : rejection.status === 404 ? 'Not Found' : 'Bad Request';
  socket.write(
    `HTTP/1.1 ${rejection.status} ${reason}\r\n` +
    'Connection: close\r\n' +
    'Content-Type: text/plain\r\n' +
    `Content-Length: ${Buffer.byteLength(rejection.message)}\r\n` +
    '\r\n' +
    rejection.message
  );
  socket.destroy();
}

export class GameServer {
  private app: express.Application;
  private server: Server;
  private wss: WebSocketServer;
  private sessions: SessionManager;
  private clients: Map<WebSocket, TrackedSocket> = new Map();
  private config: GameServerConfig;
  private heartbeatTimer?: NodeJS.Timeout;

  constructor(config: GameServerConfig) {
    this.config = config;

    const managerOptions: SessionManagerOptions = {
      maxSessions: config.maxSessions ?? 0,
      sessionOptions: {
        reconnectTimeoutMs: config.reconnectTimeoutMs ?? 0,
        lobbyTimeoutMs: config.lobbyTimeoutMs ?? 0
      }
    };
    this.sessions = config.sessions ?? new SessionManager(managerOptions);

    this.app = express();
    this.app.use(cors());
    this.app.use(express.json());
    this.app.use((req, _res, next) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
    this.setupRoutes();

    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ noServer: true });
    this.setupWebSocket();
  }

  get sessionManager(): SessionManager {
    return this.sessions;
  }

  private setupRoutes(): void {
    const publicDir = this.config.publicDir ?? DEFAULT_PUBLIC_DIR;

    this.app.get('/', (_req, res) => {
      res.sendFile(path.join(publicDir, 'index.html'));
    });

    this.app.post('/create', (req, res) => {
      const validation = CreateRequestSchema.safeParse(req.body);
      if (!validation.success) {
        sendError(res, 400, 'Invalid request body', 'VALIDATION_ERROR', validation.error.issues);
        return;
      }

      if (this.sessions.isFull()) {
        sendError(res, 503, 'Too many active sessions', 'TOO_MANY_SESSIONS');
        return;
      }

      logger.trace('Create game', validation.data);
      const session = this.sessions.create(validation.data.players);
      res.type('text/plain').send(session.id);
    });

    this.app.get('/sessions', (_req, res) => {
      res.json({ sessions: this.sessions.list() });
    });

    this.app.get('/sessions/:id', (req, res) => {
      const session = this.sessions.get(req.params.id);
      if (!session) {
        sendError(res, 404, 'Session not found', 'SESSION_NOT_FOUND');
        return;
      }
      res.json(session.info());
    });

    this.app.get('/health', (_req, res) => {
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        sessions: this.sessions.size,
        connections: this.clients.size
      });
    });

    this.app.use((_req, res) => {
      sendError(res, 404, 'Endpoint not found', 'NOT_FOUND');
    });

    // Express only treats four-argument middleware as an error handler
    this.app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof SyntaxError) {
        sendError(res, 400, 'Malformed JSON body', 'VALIDATION_ERROR');
        return;
      }
      logger.error('Unhandled error', error);
      sendError(res, 500, 'Internal server error', 'INTERNAL_ERROR');
    });
  }

  /** Maps an upgrade URL to the session it targets, or to the reason it is refused. */
  private resolveUpgrade(url: string | undefined): UpgradeTarget | UpgradeRejection {
    const pathname = new URL(url ?? '/', 'http://localhost').pathname;
    const match = /^\/(websocket|rejoin)\/([^/]+)\/([^/]+)\/?$/.exec(pathname);
    if (!match) {
      return { status: 400, message: 'Unknown WebSocket endpoint' };
    }

    const [, route, sessionId, rawParam] = match;
    if (!route || !sessionId || !rawParam) {
      return { status: 400, message: 'Unknown WebSocket endpoint' };
    }

    let param: string;
    try {
      param = decodeURIComponent(rawParam);
    } catch {
      return { status: 400, message: 'Malformed path segment' };
    }

    if (!uuidValidate(sessionId)) {
      return { status: 400, message: 'Malformed session id' };
    }

    const session = this.sessions.get(sessionId);
    if (!session) {
      return { status: 400, message: 'Unknown session' };
    }

    if (route === 'websocket') {
      if (!session.isJoinable()) {
        return { status: 409, message: 'Session is not accepting players' };
      }
      return { kind: 'join', session, name: param };
    }

    if (!uuidValidate(param)) {
      return { status: 400, message: 'Malformed rejoin code' };
    }
    if (session.getStatus() !== 'running') {
      return { status: 409, message: 'Session is not running' };
    }
    return { kind: 'rejoin', session, code: param };
  }

  private setupWebSocket(): void {
    this.server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      const target = this.resolveUpgrade(request.url);
      if (!('kind' in target)) {
        wsLogger.warn(`Rejected upgrade for ${request.url}: ${target.message}`);
        rejectUpgrade(socket, target);
        return;
      }

      this.wss.handleUpgrade(request, socket, head, (ws) => {
        this.track(ws);
        this.handleConnection(ws, target);
      });
    });
  }

  private handleConnection(ws: WebSocket, target: UpgradeTarget): void {
    if (target.kind === 'join') {
      wsLogger.trace(`WebSocket connection of ${target.name} for ${target.session.id}`);
      const socket = new WsPlayerSocket(ws, target.name);
      if (!target.session.join(target.name, socket)) {
        socket.close(4009, 'session is not accepting players');
        return;
      }
      const { session } = target;
      ws.once('close', () => {
        session.leave(socket);
      });
      return;
    }

    wsLogger.trace(`Rejoin connection for ${target.session.id}`);
    const socket = new WsPlayerSocket(ws, 'rejoin');
    if (!target.session.rejoin(target.code, socket)) {
      socket.close(4009, 'session is not running');
    }
  }

  private track(ws: WebSocket): void {
    const tracked: TrackedSocket = { alive: true };
    this.clients.set(ws, tracked);
    ws.on('pong', () => {
      tracked.alive = true;
    });
    ws.on('close', () => {
      this.clients.delete(ws);
    });
  }

  private startHeartbeat(): void {
    const interval = this.config.heartbeatIntervalMs ?? 30000;
    if (interval <= 0) return;

    this.heartbeatTimer = setInterval(() => {
      for (const [ws, tracked] of this.clients.entries()) {
        if (!tracked.alive) {
          wsLogger.warn('Client heartbeat timeout, terminating connection');
          ws.terminate();
          this.clients.delete(ws);
          continue;
        }
        tracked.alive = false;
        ws.ping();
      }
    }, interval);
    this.heartbeatTimer.unref();
  }

  /** Starts listening and resolves with the bound port. */
  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once('error', onError);
      this.server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        this.server.off('error', onError);
        const address = this.server.address();
        const port = address && typeof address === 'object' ? address.port : this.config.port;
        logger.info(`Game server listening on ${this.config.host ?? '0.0.0.0'}:${port}`);
        this.startHeartbeat();
        resolve(port);
      });
    });
  }

  public async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
    }

    await this.sessions.shutdown();

    for (const ws of this.clients.keys()) {
      ws.terminate();
    }
    this.clients.clear();

    await new Promise<void>((resolve) => {
      this.wss.close(() => resolve());
    });

    await new Promise<void>((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((error) => (error ? reject(error) : resolve()));
    });

    logger.info('Game server stopped');
  }
}
