/**
 * Inertial sensor: heading, rotation, orientation and crash detection
 *
 * Heading and rotation are reported relative to offsets kept here, so resetting them
 * never touches the robot.
 */

import * as commands from '../commands/messages.js';
import { SYS_FLAGS } from '../status/snapshot.js';
import { relativeHeading, roundTo2 } from './velocity.js';
import type { RobotLink } from './link.js';
import type { StatusCallback } from '../channels/StatusWorker.js';
import type { RobotState } from '../types/index.js';

export type Axis = 'x' | 'y' | 'z';

export type CrashSensitivity = 'low' | 'medium' | 'high';

const SENSITIVITY_LEVEL: Record<CrashSensitivity, number> = { low: 0, medium: 1, high: 2 };

export class Inertial {
  private headingOffset = 0;
  private rotationOffset = 0;

  constructor(private readonly link: RobotLink) {}

  async calibrate(): Promise<void> {
    await this.link.robotSend(commands.imuCalibrate());
  }

  isCalibrating(): boolean {
    return this.link.status.isFlagSet(SYS_FLAGS.IMU_CAL);
  }

  // ============== Heading ==============

  getHeadingOffset(): number {
    return this.headingOffset;
  }

  /** Make the current heading read as `heading`. */
  setHeading(heading: number): void {
    this.headingOffset = this.getHeadingRaw() - heading;
  }

  resetHeading(): void {
    this.setHeading(0);
  }

  /** 0 to 359.99 degrees. */
  getHeading(): number {
    return relativeHeading(this.getHeadingRaw(), this.headingOffset);
  }

  getHeadingRaw(): number {
    return this.robot().heading;
  }

  // ============== Rotation ==============

  setRotation(rotation: number): void {
    this.rotationOffset = this.getRotationRaw() - rotation;
  }

  resetRotation(): void {
    this.setRotation(0);
  }

  /** Total rotation since the last reset, unbounded. */
  getRotation(): number {
    return roundTo2(this.getRotationRaw() - this.rotationOffset);
  }

  getRotationRaw(): number {
    return this.robot().rotation;
  }

  // ============== Orientation ==============

  getRoll(): number {
    return roundTo2(this.robot().roll);
  }

  getPitch(): number {
    return roundTo2(this.robot().pitch);
  }

  getYaw(): number {
    return roundTo2(this.robot().yaw);
  }

  /** x forward, y rightward, z downward. */
  getAcceleration(axis: Axis): number {
    return this.robot().acceleration[axis];
  }

  /** deg/s; x roll, y pitch, z yaw. */
  getTurnRate(axis: Axis): number {
    return this.robot().gyroRate[axis];
  }

  // ============== Crash ==============

  async setCrashSensitivity(sensitivity: CrashSensitivity = 'low'): Promise<void> {
    await this.link.robotSend(commands.imuSetCrashThreshold(SENSITIVITY_LEVEL[sensitivity]));
  }

  /** Called on every status update while the robot reports a crash. Returns an unsubscribe. */
  crashed(callback: StatusCallback): () => void {
    return this.link.status.onCrashed(callback);
  }

  private robot(): RobotState {
    return this.link.status.getSnapshot().robot;
  }
}
