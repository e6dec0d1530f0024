/**
 * AI Vision
 * Object queries over the latest status snapshot, camera frames, and vision settings.
 */

import { logger } from '../utils/logger.js';
import { sleep } from '../utils/time.js';
import { ENV } from '../config/env.js';
import { NoImageError } from '../errors.js';
import { isNoImage } from '../channels/ImageWorker.js';
import * as commands from '../commands/messages.js';
import {
  ALL_MODELS,
  DEFAULT_OBJECT_COUNT,
  type CodeDescriptor,
  type ColorDescriptor,
  type DescriptorQuery,
} from './descriptors.js';
import { queryObjects, type DetectedObject, type VisionQueryResult } from './pipeline.js';
import type { Command, Frame, StatusSnapshot } from '../types/index.js';

// Where a held object sits in the camera frame
const HOLD_MIN_CX = 120;
const HOLD_MAX_CX = 200;
const BARREL_MIN_Y = 160;
const BALL_MIN_Y = 170;

const IMAGE_POLL_MS = 10;

export interface SnapshotSource {
  getSnapshot(): StatusSnapshot;
}

export interface ImageSource {
  isStreaming(): boolean;
  startStream(): Promise<void>;
  currentImage(): Frame;
}

export type CommandSender = (command: Command) => Promise<void>;

export interface AiVisionOptions {
  status: SnapshotSource;
  image: ImageSource;
  send: CommandSender;
  imageWaitMs?: number;
}

export class AiVision {
  private readonly status: SnapshotSource;
  private readonly image: ImageSource;
  private readonly send: CommandSender;
  private readonly imageWaitMs: number;

  private lastCount = 0;
  private lastLargest: DetectedObject | null = null;

  constructor(options: AiVisionOptions) {
    this.status = options.status;
    this.image = options.image;
    this.send = options.send;
    this.imageWaitMs = options.imageWaitMs ?? ENV.IMAGE_WAIT_MS;
  }

  // ============== Object queries ==============

  /**
   * Objects matching `query`, largest first, at most `count` (capped at 24).
   * Also updates `largestObject()` and `objectCount()`.
   */
  getData(query: DescriptorQuery, count: number = DEFAULT_OBJECT_COUNT): DetectedObject[] {
    const result = this.query(query, count);
    this.lastCount = result.objectCount;
    this.lastLargest = result.largest;
    return result.objects;
  }

  /** Largest match of the last `getData` call. */
  largestObject(): DetectedObject | null {
    return this.lastLargest;
  }

  /** Number of objects the last `getData` call returned. */
  objectCount(): number {
    return this.lastCount;
  }

  private query(query: DescriptorQuery, count: number): VisionQueryResult {
    return queryObjects(this.status.getSnapshot().vision, query, count);
  }

  // ============== Held cargo ==============

  hasAnyBarrel(): boolean {
    return this.isHolding(['BlueBarrel', 'OrangeBarrel'], BARREL_MIN_Y);
  }

  hasBlueBarrel(): boolean {
    return this.isHolding(['BlueBarrel'], BARREL_MIN_Y);
  }

  hasOrangeBarrel(): boolean {
    return this.isHolding(['OrangeBarrel'], BARREL_MIN_Y);
  }

  hasSportsBall(): boolean {
    return this.isHolding(['SportsBall'], BALL_MIN_Y);
  }

  // The query here leaves the getData cache alone
  private isHolding(classnames: readonly string[], minY: number): boolean {
    return this.query(ALL_MODELS, DEFAULT_OBJECT_COUNT).objects.some((object) => {
      if (object.kind !== 'model' || !classnames.includes(object.classname)) return false;
      const cx = object.originX + object.width / 2;
      return cx > HOLD_MIN_CX && cx < HOLD_MAX_CX && object.originY > minY;
    });
  }

  // ============== Camera ==============

  /**
   * Latest camera frame (JPEG). The first call starts the stream and waits briefly for
   * a frame; later calls return immediately.
   */
  async getCameraImage(): Promise<Frame> {
    if (!this.image.isStreaming()) {
      logger.debug('Vision', 'Starting image stream');
      await this.image.startStream();
    }
    const deadline = Date.now() + this.imageWaitMs;
    let frame = this.image.currentImage();
    while (isNoImage(frame) && Date.now() < deadline) {
      await sleep(IMAGE_POLL_MS);
      frame = this.image.currentImage();
    }
    if (isNoImage(frame)) {
      throw new NoImageError('no image was received');
    }
    return frame;
  }

  // ============== Settings ==============

  async tagDetection(enable: boolean): Promise<void> {
    await this.send(commands.tagDetection(enable));
  }

  async colorDetection(enable: boolean, merge: boolean = false): Promise<void> {
    await this.send(commands.colorDetection(enable, merge));
  }

  async modelDetection(enable: boolean): Promise<void> {
    await this.send(commands.modelDetection(enable));
  }

  async colorDescription(descriptor: ColorDescriptor): Promise<void> {
    await this.send(
      commands.colorDescription(
        descriptor.id,
        { r: descriptor.red, g: descriptor.green, b: descriptor.blue },
        descriptor.hueRange,
        descriptor.saturation,
      ),
    );
  }

  async codeDescription(descriptor: CodeDescriptor): Promise<void> {
    await this.send(commands.codeDescription(descriptor.id, descriptor.colors.map((c) => c.id)));
  }
}
