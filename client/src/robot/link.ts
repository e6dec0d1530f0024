/**
 * What the robot's feature classes (inertial, screen, sound, ...) need from the client
 */

import type { ShadowFlag } from '../status/ShadowFlags.js';
import type { StatusCallback } from '../channels/StatusWorker.js';
import type { Command, StatusSnapshot } from '../types/index.js';

export interface StatusView {
  getSnapshot(): StatusSnapshot;
  isFlagSet(bit: number): boolean;
  assertFlag(flag: ShadowFlag): void;
  assertCleared(flag: ShadowFlag): void;
  releaseFlag(flag: ShadowFlag): void;
  onPressed(cb: StatusCallback): () => void;
  onReleased(cb: StatusCallback): () => void;
  onCrashed(cb: StatusCallback): () => void;
  waitForUpdates(count: number, signal?: AbortSignal): Promise<void>;
}

export interface RobotLink {
  readonly status: StatusView;
  robotSend(command: Command): Promise<void>;
  robotSendAudio(payload: Buffer): Promise<void>;
}
