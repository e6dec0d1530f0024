/**
 * In-process stand-in for the robot's four WebSocket endpoints
 */

import { WebSocketServer, WebSocket } from 'ws';
import { statusJson } from './snapshots.js';

export type CommandReply = Record<string, unknown> | string | null;

export interface FakeRobotOptions {
  /** Answer for each status probe; null leaves the probe unanswered */
  status?: () => string | null;
  /** Answer for each command; null leaves it unanswered */
  reply?: (command: Record<string, unknown>) => CommandReply;
  /** Frame streamed after the client asks for images */
  frame?: Buffer;
  frameIntervalMs?: number;
}

export class FakeRobot {
  readonly commands: Array<Record<string, unknown>> = [];
  readonly audioUploads: Buffer[] = [];
  readonly imageRequests: number[] = [];
  statusProbes = 0;

  private wss: WebSocketServer | null = null;
  private sockets: Set<WebSocket> = new Set();
  private streamTimers: Set<NodeJS.Timeout> = new Set();

  constructor(private options: FakeRobotOptions = {}) {}

  /** Start listening on a free port. Resolves with `localhost:<port>`. */
  start(): Promise<string> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port: 0, host: '127.0.0.1' });
      this.wss = wss;
      wss.once('error', reject);
      wss.on('listening', () => {
        const address = wss.address();
        const port = typeof address === 'object' ? address.port : 0;
        resolve(`127.0.0.1:${port}`);
      });
      wss.on('connection', (ws, request) => {
        this.sockets.add(ws);
        ws.on('close', () => this.sockets.delete(ws));
        this.route(ws, request.url ?? '/');
      });
    });
  }

  setOptions(options: FakeRobotOptions): void {
    this.options = { ...this.options, ...options };
  }

  /** Drop every open connection, as a robot going out of range would. */
  dropConnections(): void {
    for (const ws of this.sockets) ws.terminate();
    this.sockets.clear();
  }

  async stop(): Promise<void> {
    for (const timer of this.streamTimers) clearInterval(timer);
    this.streamTimers.clear();
    this.dropConnections();
    const wss = this.wss;
    this.wss = null;
    if (!wss) return;
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private route(ws: WebSocket, url: string): void {
    switch (url) {
      case '/ws_status':
        ws.on('message', () => {
          this.statusProbes += 1;
          const answer = this.options.status ? this.options.status() : statusJson();
          if (answer !== null) ws.send(answer);
        });
        return;
      case '/ws_cmd':
        ws.on('message', (data) => {
          const command: Record<string, unknown> = JSON.parse(data.toString());
          this.commands.push(command);
          const reply = this.options.reply
            ? this.options.reply(command)
            : { cmd_id: command.cmd_id, status: 'complete' };
          if (reply === null) return;
          ws.send(typeof reply === 'string' ? reply : JSON.stringify(reply));
        });
        return;
      case '/ws_img': {
        let timer: NodeJS.Timeout | null = null;
        const stopStream = (): void => {
          if (!timer) return;
          clearInterval(timer);
          this.streamTimers.delete(timer);
          timer = null;
        };
        ws.on('message', (data) => {
          const request = Buffer.isBuffer(data) ? data[0] ?? 0 : 0;
          this.imageRequests.push(request);
          stopStream();
          if (request !== 1) return;
          timer = setInterval(() => {
            if (ws.readyState === WebSocket.OPEN) ws.send(this.options.frame ?? Buffer.from([0xff, 0xd8, 0xff, 0xd9]));
          }, this.options.frameIntervalMs ?? 10);
          this.streamTimers.add(timer);
        });
        ws.on('close', stopStream);
        return;
      }
      case '/ws_audio':
        ws.on('message', (data) => {
          if (Buffer.isBuffer(data)) this.audioUploads.push(data);
        });
        return;
      default:
        ws.close(1008, 'unknown endpoint');
    }
  }
}
