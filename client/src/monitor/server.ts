/**
 * Monitor Server
 * REST endpoints and a WebSocket feed of status snapshots and log lines for dashboards
 */

import express from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'http';
import { ENV } from '../config/env.js';
import { logger, addLogListener, type LogEntry } from '../utils/logger.js';
import { DisconnectedError, NoImageError } from '../errors.js';
import { ALL_OBJECTS, DEFAULT_OBJECT_COUNT } from '../vision/descriptors.js';
import { queryObjects } from '../vision/pipeline.js';
import type { Frame, MonitorMessage, StatusSnapshot } from '../types/index.js';

/** What the monitor needs from a connected robot */
export interface MonitorTarget {
  readonly host: string;
  getStatus(): StatusSnapshot;
  getCameraImage(): Promise<Frame>;
  onStatus(listener: (snapshot: StatusSnapshot) => void): () => void;
}

export interface MonitorOptions {
  broadcastMs?: number;
}

interface Client {
  id: string;
  ws: WebSocket;
  connectedAt: number;
}

export class MonitorServer {
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Map<string, Client> = new Map();
  private clientIdCounter = 0;
  private unsubscribers: Array<() => void> = [];
  private lastStatusBroadcast = 0;
  private readonly broadcastMs: number;

  constructor(private readonly target: MonitorTarget, options: MonitorOptions = {}) {
    this.broadcastMs = options.broadcastMs ?? ENV.MONITOR_BROADCAST_MS;
  }

  /** Build the express app; exposed for tests that mount it without the socket feed. */
  createApp(): express.Express {
    const app = express();
    app.use(cors());

    app.get('/api/health', (_req, res) => {
      res.json({ ok: true, host: this.target.host, clients: this.clients.size });
    });

    app.get('/api/status', (_req, res) => {
      res.json(this.target.getStatus());
    });

    app.get('/api/vision', (req, res) => {
      const raw = typeof req.query.count === 'string' ? parseInt(req.query.count, 10) : NaN;
      const count = Number.isNaN(raw) ? DEFAULT_OBJECT_COUNT : raw;
      const result = queryObjects(this.target.getStatus().vision, ALL_OBJECTS, count);
      res.json({ count: result.objectCount, objects: result.objects });
    });

    app.get('/api/camera', async (_req, res) => {
      try {
        const frame = await this.target.getCameraImage();
        res.type('image/jpeg').send(frame);
      } catch (err) {
        if (err instanceof NoImageError || err instanceof DisconnectedError) {
          res.status(503).json({ error: err.message });
          return;
        }
        logger.error('Monitor', 'Camera request failed', err);
        res.status(500).json({ error: 'camera request failed' });
      }
    });

    return app;
  }

  /** Listen on `port` (0 picks a free one). Resolves with the bound port. */
  start(port: number): Promise<number> {
    const app = this.createApp();
    return new Promise((resolve, reject) => {
      const httpServer = app.listen(port, () => {
        const address = httpServer.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        logger.info('Monitor', `HTTP server running on http://localhost:${bound}`);
        resolve(bound);
      });
      httpServer.once('error', reject);
      this.httpServer = httpServer;
      this.attach(httpServer);
    });
  }

  private attach(httpServer: HttpServer): void {
    this.wss = new WebSocketServer({ server: httpServer });
    logger.info('Monitor', 'WebSocket server attached to HTTP server');

    this.wss.on('connection', (ws: WebSocket) => {
      const clientId = `client_${++this.clientIdCounter}`;
      this.clients.set(clientId, { id: clientId, ws, connectedAt: Date.now() });
      logger.info('Monitor', `Client connected: ${clientId}`);

      this.send(ws, { type: 'status', payload: this.target.getStatus(), ts: Date.now() });

      ws.on('close', () => {
        this.clients.delete(clientId);
        logger.info('Monitor', `Client disconnected: ${clientId}`);
      });

      ws.on('error', (err) => {
        logger.error('Monitor', `Client error: ${clientId}`, err);
      });
    });

    this.unsubscribers.push(
      this.target.onStatus((snapshot) => {
        const now = Date.now();
        if (now - this.lastStatusBroadcast < this.broadcastMs) return;
        this.lastStatusBroadcast = now;
        this.broadcast({ type: 'status', payload: snapshot, ts: now });
      }),
      addLogListener((entry: LogEntry) => {
        // own log lines would echo forever
        if (entry.category === 'Monitor') return;
        this.broadcast({ type: 'log', payload: entry, ts: entry.ts });
      }),
    );
  }

  /** Tell dashboards the robot program has ended. */
  announceTermination(reason: string): void {
    this.broadcast({ type: 'terminated', payload: { reason }, ts: Date.now() });
  }

  async stop(): Promise<void> {
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers = [];
    for (const client of this.clients.values()) {
      client.ws.terminate();
    }
    this.clients.clear();
    this.wss?.close();
    this.wss = null;

    const httpServer = this.httpServer;
    this.httpServer = null;
    if (httpServer) {
      httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
    }
    logger.info('Monitor', 'Server stopped');
  }

  getClientCount(): number {
    return this.clients.size;
  }

  private send(ws: WebSocket, message: MonitorMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  private broadcast(message: MonitorMessage): void {
    const data = JSON.stringify(message);
    for (const client of this.clients.values()) {
      if (client.ws.readyState === WebSocket.OPEN) {
        client.ws.send(data);
      }
    }
  }
}
