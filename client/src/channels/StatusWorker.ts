/**
 * Status Worker
 * Polls ws_status, keeps the latest snapshot, applies shadow flags and fires edge events.
 */

import { ChannelWorker, type ChannelWorkerOptions } from './ChannelWorker.js';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { CancelledError } from '../errors.js';
import {
  EMPTY_SNAPSHOT,
  SYS_FLAGS,
  TOUCH_PRESSED,
  decodeStatus,
  isEmptySnapshot,
  withRobotFlags,
} from '../status/snapshot.js';
import { ShadowFlags, type ShadowFlag } from '../status/ShadowFlags.js';
import type { Frame, StatusSnapshot } from '../types/index.js';

const STATUS_PROBE = Buffer.from([1]);

export type TerminationReason = 'power-button' | 'program-inactive';

export type StatusCallback = () => void;

export interface StatusWorkerOptions extends ChannelWorkerOptions {
  pollMs?: number;
  /** Consecutive losses tolerated before the snapshot is reset to empty */
  lossLimit?: number;
  receiveTimeoutMs?: number;
  maxPendingSnapshots?: number;
}

export interface StatusWorkerEvents {
  status: (snapshot: StatusSnapshot) => void;
  terminate: (reason: TerminationReason) => void;
  connected: () => void;
  disconnected: () => void;
}

export class StatusWorker extends ChannelWorker {
  readonly shadow: ShadowFlags;

  private snapshot: StatusSnapshot = EMPTY_SNAPSHOT;
  private rawFlags = 0;
  private lossCount = 0;
  private heartbeat = 0;
  private lastPressed = false;
  private programActive = false;
  private terminationRequested = false;

  private readonly pollMs: number;
  private readonly lossLimit: number;
  private readonly receiveTimeoutMs: number;

  private pressedCallbacks: Set<StatusCallback> = new Set();
  private releasedCallbacks: Set<StatusCallback> = new Set();
  private crashedCallbacks: Set<StatusCallback> = new Set();

  constructor(options: StatusWorkerOptions) {
    super('ws_status', options);
    this.pollMs = options.pollMs ?? ENV.STATUS_POLL_MS;
    this.lossLimit = options.lossLimit ?? ENV.STATUS_LOSS_LIMIT;
    this.receiveTimeoutMs = options.receiveTimeoutMs ?? Math.max(1000, this.pollMs * 20);
    this.shadow = new ShadowFlags(options.maxPendingSnapshots ?? ENV.SHADOW_MAX_SNAPSHOTS);
  }

  // ============== Readers ==============

  getSnapshot(): StatusSnapshot {
    return this.snapshot;
  }

  isSnapshotEmpty(): boolean {
    return isEmptySnapshot(this.snapshot);
  }

  getLossCount(): number {
    return this.lossCount;
  }

  /** Number of snapshots accepted so far. */
  getHeartbeat(): number {
    return this.heartbeat;
  }

  /** Robot flags as readers should see them, pending shadow overrides included. */
  effectiveFlags(): number {
    return this.shadow.overlay(this.rawFlags);
  }

  isFlagSet(bit: number): boolean {
    return (this.effectiveFlags() & bit) !== 0;
  }

  // ============== Shadow flags ==============

  assertFlag(flag: ShadowFlag): void {
    this.shadow.requestSet(flag);
    this.republish();
  }

  assertCleared(flag: ShadowFlag): void {
    this.shadow.requestClear(flag);
    this.republish();
  }

  releaseFlag(flag: ShadowFlag): void {
    this.shadow.cancel(flag);
    this.republish();
  }

  private republish(): void {
    if (isEmptySnapshot(this.snapshot)) return;
    this.snapshot = withRobotFlags(this.snapshot, this.effectiveFlags());
  }

  // ============== Callbacks ==============

  onPressed(cb: StatusCallback): () => void {
    this.pressedCallbacks.add(cb);
    return () => this.pressedCallbacks.delete(cb);
  }

  onReleased(cb: StatusCallback): () => void {
    this.releasedCallbacks.add(cb);
    return () => this.releasedCallbacks.delete(cb);
  }

  onCrashed(cb: StatusCallback): () => void {
    this.crashedCallbacks.add(cb);
    return () => this.crashedCallbacks.delete(cb);
  }

  /** Resolves after `count` more snapshots have been accepted. */
  waitForUpdates(count: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      let remaining = count;
      const cleanup = (): void => {
        this.off('status', onStatus);
        signal?.removeEventListener('abort', onAbort);
      };
      const onStatus = (): void => {
        remaining -= 1;
        if (remaining <= 0) {
          cleanup();
          resolve();
        }
      };
      const onAbort = (): void => {
        cleanup();
        reject(new CancelledError('waiting for status was cancelled'));
      };
      if (remaining <= 0) {
        resolve();
        return;
      }
      this.on('status', onStatus);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  // ============== Loop ==============

  protected async dutyCycle(): Promise<void> {
    let frame: Frame;
    try {
      await this.send(STATUS_PROBE, true);
      frame = await this.receive(this.receiveTimeoutMs);
    } catch (err) {
      this.recordLoss(err instanceof Error ? err.message : String(err));
      return;
    }
    this.ingest(frame);
  }

  protected override cycleDelayMs(): number {
    return this.pollMs;
  }

  protected override onConnectionLost(): void {
    this.recordLoss('not connected');
  }

  /** Decode one status frame and accept it, or count it as lost. */
  ingest(payload: Frame | string): void {
    const result = decodeStatus(payload);
    if (!result.ok) {
      this.recordLoss(result.reason);
      return;
    }
    this.accept(result.snapshot);
  }

  recordLoss(reason: string): void {
    this.lossCount += 1;
    logger.debug('Status', `Lost a status packet (${this.lossCount}): ${reason}`);
    // Keep the last snapshot through short gaps, then report "unknown"
    if (this.lossCount > this.lossLimit && !isEmptySnapshot(this.snapshot)) {
      logger.warn('Status', `No status for ${this.lossCount} polls, clearing snapshot`);
      this.snapshot = EMPTY_SNAPSHOT;
      this.rawFlags = 0;
    }
  }

  private accept(decoded: StatusSnapshot): void {
    this.lossCount = 0;
    this.rawFlags = decoded.robot.flags;
    const flags = this.shadow.applyToSnapshot(this.rawFlags);
    this.snapshot = withRobotFlags(decoded, flags);
    this.heartbeat += 1;
    this.emit('status', this.snapshot);
    this.runDetectors(this.snapshot);
  }

  private runDetectors(snapshot: StatusSnapshot): void {
    const flags = snapshot.robot.flags;

    if (flags & SYS_FLAGS.HAS_CRASHED) {
      this.fire(this.crashedCallbacks, 'crashed');
    }

    const pressed = (snapshot.robot.touchFlags & TOUCH_PRESSED) !== 0;
    if (pressed && !this.lastPressed) {
      this.fire(this.pressedCallbacks, 'pressed');
    } else if (!pressed && this.lastPressed) {
      this.fire(this.releasedCallbacks, 'released');
    }
    this.lastPressed = pressed;

    if (flags & SYS_FLAGS.POWER_BUTTON) {
      this.requestTermination('power-button');
    }

    const wasActive = this.programActive;
    this.programActive = (flags & SYS_FLAGS.PROGRAM_ACTIVE) !== 0;
    if (wasActive && !this.programActive) {
      this.requestTermination('program-inactive');
    }
  }

  private fire(callbacks: Set<StatusCallback>, name: string): void {
    for (const cb of callbacks) {
      try {
        cb();
      } catch (err) {
        logger.error('Status', `${name} callback threw`, err);
      }
    }
  }

  private requestTermination(reason: TerminationReason): void {
    if (this.terminationRequested) return;
    this.terminationRequested = true;
    logger.info('Status', reason === 'power-button'
      ? 'Detected power button press, ending program'
      : 'Program is no longer active on the robot, ending program');
    this.emit('terminate', reason);
  }

  // EventEmitter type overrides
  on<K extends keyof StatusWorkerEvents>(event: K, handler: StatusWorkerEvents[K]): this {
    return super.on(event, handler);
  }

  off<K extends keyof StatusWorkerEvents>(event: K, handler: StatusWorkerEvents[K]): this {
    return super.off(event, handler);
  }
}
