/**
 * Channel Worker
 * One persistent WebSocket to one robot endpoint, plus the loop that keeps it alive.
 *
 * The loop is the only place a connection is re-established. send/receive never retry:
 * a transport failure marks the connection for reset and surfaces as a typed error.
 */

import WebSocket from 'ws';
import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/time.js';
import { ENV } from '../config/env.js';
import { ConnectionFailedError, DisconnectedError, ReceiveError } from '../errors.js';
import type { ChannelName, Frame } from '../types/index.js';

export interface ChannelWorkerOptions {
  host: string;
  scheme?: string;
  connectTimeoutMs?: number;
  /** Pause between loop iterations */
  idleMs?: number;
}

interface PendingReceive {
  resolve: (frame: Frame) => void;
  reject: (err: ReceiveError) => void;
  timer: NodeJS.Timeout | null;
}

function toFrame(data: WebSocket.RawData): Frame {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return data;
}

export abstract class ChannelWorker extends EventEmitter {
  readonly uri: string;
  protected readonly category: string;
  protected readonly idleMs: number;
  private readonly connectTimeoutMs: number;

  private ws: WebSocket | null = null;
  private needsReset = false;
  private inbox: Frame[] = [];
  private waiters: PendingReceive[] = [];
  private loop: Promise<void> | null = null;

  constructor(readonly channel: ChannelName, options: ChannelWorkerOptions) {
    super();
    const scheme = options.scheme ?? ENV.ROBOT_SCHEME;
    this.uri = `${scheme}://${options.host}/${channel}`;
    this.category = `Channel:${channel}`;
    this.connectTimeoutMs = options.connectTimeoutMs ?? ENV.CONNECT_TIMEOUT_MS;
    this.idleMs = options.idleMs ?? ENV.CHANNEL_IDLE_MS;
  }

  // ============== Connection ==============

  /**
   * Initial handshake. There is no retry here: if the robot cannot be reached at startup
   * the caller is expected to give up.
   */
  async connect(timeoutMs: number = this.connectTimeoutMs): Promise<void> {
    try {
      await this.open(timeoutMs);
    } catch (err) {
      throw new ConnectionFailedError(
        `Could not connect to ${this.uri} (${err instanceof Error ? err.message : String(err)}). ` +
          'Check the robot host and that this machine is on the same network (AP mode is 192.168.4.1)',
        { cause: err },
      );
    }
  }

  isConnected(): boolean {
    return !this.needsReset && this.ws?.readyState === WebSocket.OPEN;
  }

  close(): void {
    const ws = this.ws;
    if (!ws) return;
    this.ws = null;
    this.inbox = [];
    this.failWaiters(`${this.channel}: connection closed`);
    try {
      ws.close();
    } catch (err) {
      logger.warn(this.category, 'Failed to close socket; it might already be closed', err);
    }
    this.emit('disconnected');
  }

  private open(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.uri, { handshakeTimeout: timeoutMs });
      let settled = false;

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        ws.terminate();
        reject(new Error('connection timeout'));
      }, timeoutMs);

      ws.on('open', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        this.ws = ws;
        this.needsReset = false;
        this.inbox = [];
        logger.debug(this.category, `Connected to ${this.uri}`);
        this.emit('connected');
        resolve();
      });

      ws.on('message', (data) => {
        if (ws !== this.ws) return;
        this.deliver(toFrame(data));
      });

      ws.on('error', (err) => {
        if (!settled) {
          settled = true;
          clearTimeout(timeout);
          reject(err);
          return;
        }
        if (ws !== this.ws) return;
        logger.warn(this.category, 'Socket error', err);
        this.markForReset(`${this.channel}: socket error: ${err.message}`);
      });

      ws.on('close', (code) => {
        if (ws !== this.ws) return;
        logger.debug(this.category, `Socket closed (${code})`);
        this.markForReset(`${this.channel}: socket closed (${code})`);
      });
    });
  }

  private markForReset(reason: string): void {
    this.needsReset = true;
    this.failWaiters(reason);
  }

  // ============== Send / Receive ==============

  async send(payload: Buffer | string, binary: boolean = true): Promise<void> {
    const ws = this.ws;
    if (!ws || !this.isConnected()) {
      this.needsReset = true;
      throw new DisconnectedError(`${this.channel}: not connected to robot, will try to reconnect`);
    }
    await new Promise<void>((resolve, reject) => {
      ws.send(payload, { binary }, (err) => {
        if (!err) {
          resolve();
          return;
        }
        this.markForReset(`${this.channel}: send failed`);
        reject(
          new DisconnectedError(
            `${this.channel}: error sending data to robot, apparently disconnected, will try to reconnect`,
            { cause: err },
          ),
        );
      });
    });
  }

  /** Next frame from the robot, oldest first. */
  receive(timeoutMs?: number): Promise<Frame> {
    const queued = this.inbox.shift();
    if (queued) return Promise.resolve(queued);

    if (!this.isConnected()) {
      this.needsReset = true;
      return Promise.reject(new ReceiveError(`${this.channel}: not connected to robot`));
    }

    return new Promise<Frame>((resolve, reject) => {
      const pending: PendingReceive = { resolve, reject, timer: null };
      if (timeoutMs !== undefined) {
        pending.timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== pending);
          this.needsReset = true;
          reject(new ReceiveError(`${this.channel}: no data from robot within ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.waiters.push(pending);
    });
  }

  private deliver(frame: Frame): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(frame);
    } else {
      this.inbox.push(frame);
    }
  }

  private failWaiters(reason: string): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.reject(new ReceiveError(reason));
    }
  }

  // ============== Loop ==============

  /** Start the keep-alive loop. It runs until `signal` aborts. */
  start(signal: AbortSignal): void {
    if (this.loop) return;
    // a receive in flight must not hold the loop open after abort
    signal.addEventListener('abort', () => this.close(), { once: true });
    this.loop = this.run(signal);
  }

  /** Resolves once the loop has exited. */
  async stopped(): Promise<void> {
    await this.loop;
  }

  /** Worker-specific work for one iteration while connected. */
  protected abstract dutyCycle(signal: AbortSignal): Promise<void>;

  /** Called when the connection is found lost at the top of an iteration. */
  protected onConnectionLost(): void {}

  protected cycleDelayMs(): number {
    return this.idleMs;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (this.needsReset) {
        this.close();
        this.needsReset = false;
      }

      if (!this.isConnected()) {
        this.onConnectionLost();
        try {
          logger.debug(this.category, 'Reconnecting');
          await this.open(this.connectTimeoutMs);
          logger.info(this.category, 'Reconnected');
        } catch (err) {
          logger.debug(this.category, 'Reconnect failed', err);
          await sleep(this.idleMs, signal);
        }
        continue;
      }

      try {
        await this.dutyCycle(signal);
      } catch (err) {
        logger.warn(this.category, 'Loop iteration failed', err);
      }
      await sleep(this.cycleDelayMs(), signal);
    }
    this.close();
  }
}
