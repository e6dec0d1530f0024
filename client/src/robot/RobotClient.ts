/**
 * Robot Client
 * Owns the four channel workers and exposes the robot's features.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { CommandRejectedError, ConnectionFailedError } from '../errors.js';
import { StatusWorker, type StatusCallback, type TerminationReason } from '../channels/StatusWorker.js';
import { ImageWorker } from '../channels/ImageWorker.js';
import { CommandWorker, type CommandOutcome } from '../channels/CommandWorker.js';
import { AudioWorker } from '../channels/AudioWorker.js';
import type { ChannelWorker } from '../channels/ChannelWorker.js';
import * as commands from '../commands/messages.js';
import { IMU_CALIBRATE_ID, isMoveCommand, isTurnCommand, type LedName } from '../commands/messages.js';
import { SYS_FLAGS } from '../status/snapshot.js';
import { blockOn, type BlockOutcome } from '../motion/blockOn.js';
import { AiVision, type ImageSource } from '../vision/AiVision.js';
import { Inertial } from './Inertial.js';
import { Screen } from './Screen.js';
import { Sound } from './Sound.js';
import { Led, Kicker } from './peripherals.js';
import type { ColorValue } from './color.js';
import {
  DEFAULT_DRIVE_MMPS,
  DEFAULT_TURN_DPS,
  toDeviceFrame,
  toDriveSpeed,
  toTurnRate,
  toUserFrame,
  vectorWheelSpeeds,
  type DriveUnits,
  type TurnDirection,
  type TurnUnits,
} from './velocity.js';
import type { RobotLink } from './link.js';
import type { Command, Frame, StatusSnapshot } from '../types/index.js';

export interface CommandChannel {
  send(command: Command): Promise<CommandOutcome>;
}

export interface AudioChannel {
  sendAudio(payload: Buffer): Promise<void>;
}

export interface ImageChannel extends ImageSource {
  stopStream(): Promise<void>;
}

export interface RobotClientParts {
  status: StatusWorker;
  image: ImageChannel;
  command: CommandChannel;
  audio: AudioChannel;
  /** Workers whose loops this client runs; empty when the parts are driven elsewhere */
  channels?: ChannelWorker[];
  host?: string;
  strictCommands?: boolean;
  blockTimeoutMs?: number;
  imageWaitMs?: number;
}

export interface RobotConnectOptions {
  host?: string;
  scheme?: string;
  connectTimeoutMs?: number;
  strictCommands?: boolean;
  blockTimeoutMs?: number;
  statusPollMs?: number;
  commandTimeoutMs?: number;
}

export interface RobotClientEvents {
  terminated: (reason: TerminationReason | 'shutdown') => void;
}

export interface MoveOptions {
  velocity?: number;
  units?: DriveUnits;
}

export interface TurnOptions {
  velocity?: number;
  units?: TurnUnits;
}

export class RobotClient extends EventEmitter implements RobotLink {
  readonly host: string;
  readonly status: StatusWorker;
  readonly inertial: Inertial;
  readonly screen: Screen;
  readonly sound: Sound;
  readonly led: Led;
  readonly kicker: Kicker;
  readonly vision: AiVision;

  private readonly image: ImageChannel;
  private readonly command: CommandChannel;
  private readonly audio: AudioChannel;
  private readonly channels: ChannelWorker[];
  private readonly strictCommands: boolean;
  private readonly blockTimeoutMs: number;
  private readonly abort = new AbortController();

  private driveSpeed = DEFAULT_DRIVE_MMPS;
  private turnRate = DEFAULT_TURN_DPS;
  private terminated = false;

  constructor(parts: RobotClientParts) {
    super();
    this.host = parts.host ?? ENV.ROBOT_HOST;
    this.status = parts.status;
    this.image = parts.image;
    this.command = parts.command;
    this.audio = parts.audio;
    this.channels = parts.channels ?? [];
    this.strictCommands = parts.strictCommands ?? ENV.STRICT_COMMANDS;
    this.blockTimeoutMs = parts.blockTimeoutMs ?? ENV.BLOCK_TIMEOUT_MS;

    this.inertial = new Inertial(this);
    this.screen = new Screen(this);
    this.sound = new Sound(this);
    this.led = new Led(this);
    this.kicker = new Kicker(this);
    this.vision = new AiVision({
      status: this.status,
      image: this.image,
      send: (command) => this.robotSend(command),
      imageWaitMs: parts.imageWaitMs,
    });

    this.status.on('terminate', (reason) => {
      this.terminate(reason).catch((err: unknown) => {
        logger.error('Robot', 'Shutdown after robot termination failed', err);
      });
    });
  }

  /**
   * Connect all four channels, announce the program, and wait for the first status.
   * Throws ConnectionFailedError when any channel cannot be reached.
   */
  static async connect(options: RobotConnectOptions = {}): Promise<RobotClient> {
    const host = options.host || ENV.ROBOT_HOST;
    const base = { host, scheme: options.scheme, connectTimeoutMs: options.connectTimeoutMs };
    logger.info('Robot', `Connecting to ${host}`);

    const status = new StatusWorker({ ...base, pollMs: options.statusPollMs });
    const image = new ImageWorker(base);
    const command = new CommandWorker({ ...base, responseTimeoutMs: options.commandTimeoutMs });
    const audio = new AudioWorker(base);
    const channels: ChannelWorker[] = [status, image, command, audio];

    const results = await Promise.allSettled(channels.map((channel) => channel.connect()));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failed) {
      channels.forEach((channel) => channel.close());
      throw failed.reason instanceof ConnectionFailedError
        ? failed.reason
        : new ConnectionFailedError(`Could not connect to ${host}`, { cause: failed.reason });
    }

    const client = new RobotClient({
      status,
      image,
      command,
      audio,
      channels,
      host,
      strictCommands: options.strictCommands,
      blockTimeoutMs: options.blockTimeoutMs,
    });
    client.start();
    try {
      await client.robotSend(commands.programInit());
      await client.waitForFirstStatus();
    } catch (err) {
      await client.shutdown();
      throw err;
    }
    client.inertial.resetHeading();
    logger.info('Robot', `Connected to ${host}`);
    return client;
  }

  /** Start every channel loop. */
  start(): void {
    for (const channel of this.channels) {
      channel.start(this.abort.signal);
    }
  }

  /** Cancelled when the program is shutting down. */
  get signal(): AbortSignal {
    return this.abort.signal;
  }

  private async waitForFirstStatus(): Promise<void> {
    while (this.status.isSnapshotEmpty()) {
      await this.status.waitForUpdates(1, this.abort.signal);
    }
  }

  /** Stop the loops and close the channels. Safe to call more than once. */
  async shutdown(): Promise<void> {
    await this.terminate('shutdown');
  }

  private async terminate(reason: TerminationReason | 'shutdown'): Promise<void> {
    if (this.terminated) return;
    this.terminated = true;
    logger.info('Robot', `Shutting down (${reason})`);

    if (this.image.isStreaming()) {
      try {
        await this.image.stopStream();
      } catch (err) {
        logger.debug('Robot', 'Could not stop the image stream', err);
      }
    }
    this.abort.abort();
    await Promise.all(this.channels.map((channel) => channel.stopped()));
    this.emit('terminated', reason);
  }

  isTerminated(): boolean {
    return this.terminated;
  }

  // ============== Commands ==============

  /**
   * Send one command and apply its expected effect to the shadow flags.
   * Rejections are logged, or raised as CommandRejectedError in strict mode.
   */
  async robotSend(command: Command): Promise<void> {
    const outcome = await this.command.send(command);
    switch (outcome.kind) {
      case 'unknown':
        logger.warn('Command', `robot did not recognize command: ${command.cmd_id}`);
        return;
      case 'invalid':
        logger.error('Command', `${command.cmd_id}: ${outcome.reason}`);
        return;
      case 'rejected':
        if (this.strictCommands) {
          throw new CommandRejectedError(command.cmd_id, outcome.reason);
        }
        logger.warn('Command', `robot: error processing ${command.cmd_id}, reason: ${outcome.reason}`);
        return;
      case 'accepted':
        this.applyCommandEffects(outcome.commandId);
        return;
    }
  }

  async robotSendAudio(payload: Buffer): Promise<void> {
    await this.audio.sendAudio(payload);
  }

  private applyCommandEffects(commandId: string): void {
    const move = isMoveCommand(commandId);
    const turn = isTurnCommand(commandId);
    if (move) this.status.assertFlag('moveActive');
    if (turn) this.status.assertFlag('turnActive');
    if (move || turn) this.status.assertFlag('moving');
    if (commandId === IMU_CALIBRATE_ID) this.status.assertFlag('imuCalibrating');
  }

  /** Status snapshot currently published by the status channel. */
  getStatus(): StatusSnapshot {
    return this.status.getSnapshot();
  }

  async waitForStatusUpdates(count: number = 1): Promise<void> {
    await this.status.waitForUpdates(count, this.abort.signal);
  }

  // ============== Motion state ==============

  /** A move_at / move_for with nonzero speed is running. */
  isMoveActive(): boolean {
    return this.status.isFlagSet(SYS_FLAGS.MOVE_ACTIVE);
  }

  /** A turn / turn_for / turn_to with nonzero speed is running. */
  isTurnActive(): boolean {
    return this.status.isFlagSet(SYS_FLAGS.TURN_ACTIVE);
  }

  /** No wheel should be moving. */
  isStopped(): boolean {
    return !this.status.isFlagSet(SYS_FLAGS.MOVING);
  }

  getBatteryCapacity(): number {
    return this.getStatus().robot.battery;
  }

  getXPosition(): number {
    const { robotX, robotY } = this.getStatus().robot;
    return toUserFrame(robotX, robotY, this.inertial.getHeadingOffset()).x;
  }

  getYPosition(): number {
    const { robotX, robotY } = this.getStatus().robot;
    return toUserFrame(robotX, robotY, this.inertial.getHeadingOffset()).y;
  }

  // ============== Motion ==============

  setMoveVelocity(velocity: number, units: DriveUnits = 'percent'): void {
    if (velocity < 0) throw new RangeError('velocity must be a positive number');
    this.driveSpeed = toDriveSpeed(velocity, units);
  }

  setTurnVelocity(velocity: number, units: TurnUnits = 'percent'): void {
    if (velocity < 0) throw new RangeError('velocity must be a positive number');
    this.turnRate = toTurnRate(velocity, units);
  }

  getMoveVelocity(): number {
    return this.driveSpeed;
  }

  getTurnVelocity(): number {
    return this.turnRate;
  }

  /** Drive at `angle` degrees (relative to the robot's front) until told otherwise. */
  async moveAt(angle: number, options: MoveOptions = {}): Promise<void> {
    await this.robotSend(commands.moveAt(angle, this.driveSpeedFor(options)));
  }

  /** Drive `distance` mm at `angle`; by default waits until the move finishes. */
  async moveFor(distance: number, angle: number, options: MoveOptions & { wait?: boolean } = {}): Promise<void> {
    let speed = this.driveSpeedFor(options);
    let travel = distance;
    if (speed < 0) {
      speed = -speed;
      travel = -travel;
    }
    await this.robotSend(commands.moveFor(travel, angle, speed, this.turnRate));
    if (options.wait ?? true) {
      await this.waitWhile(() => this.isMoveActive(), 'moveFor');
    }
  }

  /** Percent inputs: forwards, rightwards, clockwise rotation. */
  async moveWithVectors(forwards: number, rightwards: number, rotation: number): Promise<void> {
    const [w1, w2, w3] = vectorWheelSpeeds(forwards, rightwards, rotation);
    await this.spinWheels(w1, w2, w3);
  }

  async turn(direction: TurnDirection, options: TurnOptions = {}): Promise<void> {
    const rate = this.turnRateFor(options);
    await this.robotSend(commands.turn(direction === 'left' ? -rate : rate));
  }

  async turnFor(direction: TurnDirection, angle: number, options: TurnOptions & { wait?: boolean } = {}): Promise<void> {
    const rate = this.turnRateFor(options);
    await this.robotSend(commands.turnFor(direction === 'left' ? -angle : angle, rate));
    if (options.wait ?? true) {
      await this.waitWhile(() => this.isTurnActive(), 'turnFor');
    }
  }

  /** Turn to an absolute heading in (-360, 360), measured from the last heading reset. */
  async turnTo(heading: number, options: TurnOptions & { wait?: boolean } = {}): Promise<void> {
    if (!(heading > -360 && heading < 360)) {
      throw new RangeError('heading must be between -360 and 360');
    }
    const rate = Math.abs(this.turnRateFor(options));
    const target = (this.inertial.getHeadingOffset() + heading) % 360;
    await this.robotSend(commands.turnTo(target, rate));
    if (options.wait ?? true) {
      await this.waitWhile(() => this.isTurnActive(), 'turnTo');
    }
  }

  async spinWheels(velocity1: number, velocity2: number, velocity3: number): Promise<void> {
    await this.robotSend(commands.spinWheels(velocity1, velocity2, velocity3));
  }

  async stopAllMovement(): Promise<void> {
    await this.moveAt(0, { velocity: 0 });
    await this.turn('right', { velocity: 0 });
    this.status.releaseFlag('moveActive');
    this.status.releaseFlag('turnActive');
    this.status.assertCleared('moving');
  }

  /** Redefine the current position, in the frame of the current heading reference. */
  async setXYPosition(x: number, y: number): Promise<void> {
    const device = toDeviceFrame(x, y, this.inertial.getHeadingOffset());
    await this.robotSend(commands.setPose(device.x, device.y));
    // the pose takes a couple of status cycles to show up
    await this.status.waitForUpdates(2, this.abort.signal);
  }

  private driveSpeedFor(options: MoveOptions): number {
    return options.velocity === undefined ? this.driveSpeed : toDriveSpeed(options.velocity, options.units);
  }

  private turnRateFor(options: TurnOptions): number {
    return options.velocity === undefined ? this.turnRate : toTurnRate(options.velocity, options.units);
  }

  private waitWhile(active: () => boolean, label: string): Promise<BlockOutcome> {
    return blockOn(active, {
      onTimeout: () => this.stopAllMovement(),
      timeoutMs: this.blockTimeoutMs,
      signal: this.abort.signal,
      label,
    });
  }

  // ============== Cargo ==============

  hasAnyBarrel(): boolean {
    return this.vision.hasAnyBarrel();
  }

  hasBlueBarrel(): boolean {
    return this.vision.hasBlueBarrel();
  }

  hasOrangeBarrel(): boolean {
    return this.vision.hasOrangeBarrel();
  }

  hasSportsBall(): boolean {
    return this.vision.hasSportsBall();
  }

  // ============== LEDs ==============

  ledOn(led: LedName | number, color: ColorValue | boolean): Promise<void> {
    return this.led.on(led, color);
  }

  ledOff(led: LedName | number): Promise<void> {
    return this.led.off(led);
  }

  /** Latest camera frame, starting the stream on first use. */
  getCameraImage(): Promise<Frame> {
    return this.vision.getCameraImage();
  }

  // ============== Callbacks ==============

  /** Called with every published snapshot. Returns an unsubscribe. */
  onStatus(listener: (snapshot: StatusSnapshot) => void): () => void {
    this.status.on('status', listener);
    return () => {
      this.status.off('status', listener);
    };
  }

  onScreenPressed(callback: StatusCallback): () => void {
    return this.status.onPressed(callback);
  }

  onScreenReleased(callback: StatusCallback): () => void {
    return this.status.onReleased(callback);
  }

  onCrashed(callback: StatusCallback): () => void {
    return this.status.onCrashed(callback);
  }

  // EventEmitter type overrides
  on<K extends keyof RobotClientEvents>(event: K, handler: RobotClientEvents[K]): this {
    return super.on(event, handler);
  }

  once<K extends keyof RobotClientEvents>(event: K, handler: RobotClientEvents[K]): this {
    return super.once(event, handler);
  }
}
