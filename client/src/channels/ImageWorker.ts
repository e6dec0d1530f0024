/**
 * Image Worker
 * Streams camera frames from ws_img into a two-slot buffer.
 *
 * The loop is the only writer: it fills the slot readers are not looking at, then flips
 * `currentIndex`. Readers only ever see a complete frame or the one-byte sentinel.
 */

import { ChannelWorker, type ChannelWorkerOptions } from './ChannelWorker.js';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import type { Frame } from '../types/index.js';

const START_STREAM = Buffer.from([1]);
const STOP_STREAM = Buffer.from([0]);

/** Written in place of a frame when a receive fails. */
export const NO_IMAGE: Frame = Buffer.from([0]);

export function isNoImage(frame: Frame): boolean {
  return frame.length === 1 && frame[0] === 0;
}

export interface ImageWorkerOptions extends ChannelWorkerOptions {
  /** Pause between iterations while not streaming */
  pollMs?: number;
  receiveTimeoutMs?: number;
}

export interface ImageWorkerEvents {
  frame: (frame: Frame) => void;
  connected: () => void;
  disconnected: () => void;
}

export class ImageWorker extends ChannelWorker {
  private slots: [Frame, Frame] = [NO_IMAGE, NO_IMAGE];
  private currentIndex: 0 | 1 = 0;
  private streaming = false;
  private framesReceived = 0;

  private readonly pollMs: number;
  private readonly receiveTimeoutMs: number;

  constructor(options: ImageWorkerOptions) {
    super('ws_img', options);
    this.pollMs = options.pollMs ?? ENV.IMAGE_IDLE_MS;
    this.receiveTimeoutMs = options.receiveTimeoutMs ?? ENV.CONNECT_TIMEOUT_MS;
  }

  isStreaming(): boolean {
    return this.streaming;
  }

  /** Latest published frame, or the sentinel when none is available. */
  currentImage(): Frame {
    return this.slots[this.currentIndex];
  }

  getFramesReceived(): number {
    return this.framesReceived;
  }

  async startStream(): Promise<void> {
    this.streaming = true;
    await this.send(START_STREAM, true);
    logger.debug('Image', 'Stream started');
  }

  async stopStream(): Promise<void> {
    this.streaming = false;
    await this.send(STOP_STREAM, true);
    logger.debug('Image', 'Stream stopped');
  }

  /** Publish a frame: write the idle slot, then flip. */
  storeFrame(frame: Frame): void {
    const next = this.currentIndex === 0 ? 1 : 0;
    this.slots[next] = frame;
    this.currentIndex = next;
    if (!isNoImage(frame)) {
      this.framesReceived += 1;
      this.emit('frame', frame);
    }
  }

  protected async dutyCycle(): Promise<void> {
    if (!this.streaming) return;
    try {
      this.storeFrame(await this.receive(this.receiveTimeoutMs));
    } catch (err) {
      logger.debug('Image', 'Frame receive failed', err);
      this.storeFrame(NO_IMAGE);
    }
  }

  protected override cycleDelayMs(): number {
    return this.streaming ? 0 : this.pollMs;
  }

  protected override onConnectionLost(): void {
    // the robot forgets the stream request with the connection
    this.streaming = false;
  }

  // EventEmitter type overrides
  on<K extends keyof ImageWorkerEvents>(event: K, handler: ImageWorkerEvents[K]): this {
    return super.on(event, handler);
  }

  off<K extends keyof ImageWorkerEvents>(event: K, handler: ImageWorkerEvents[K]): this {
    return super.off(event, handler);
  }
}
