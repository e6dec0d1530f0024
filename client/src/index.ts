/**
 * Robot Link public API
 */

export { RobotClient } from './robot/RobotClient.js';
export type {
  RobotClientParts,
  RobotConnectOptions,
  RobotClientEvents,
  MoveOptions,
  TurnOptions,
  CommandChannel,
  AudioChannel,
  ImageChannel,
} from './robot/RobotClient.js';
export { Inertial, type Axis, type CrashSensitivity } from './robot/Inertial.js';
export { Screen, EMOJI, EMOJI_LOOK } from './robot/Screen.js';
export { Sound, parseNote, NOTE_DURATION_MAX_MS, type SoundName, type ParsedNote } from './robot/Sound.js';
export { Led, Kicker } from './robot/peripherals.js';
export { COLOR, toRgb, type ColorValue } from './robot/color.js';
export * from './robot/velocity.js';

export { StatusWorker, type TerminationReason, type StatusCallback } from './channels/StatusWorker.js';
export { ImageWorker, NO_IMAGE, isNoImage } from './channels/ImageWorker.js';
export { CommandWorker, decodeResponse, UNKNOWN_COMMAND_ID, type CommandOutcome } from './channels/CommandWorker.js';
export { AudioWorker } from './channels/AudioWorker.js';
export { ChannelWorker, type ChannelWorkerOptions } from './channels/ChannelWorker.js';

export { ShadowFlags, type ShadowFlag } from './status/ShadowFlags.js';
export { SYS_FLAGS, EMPTY_SNAPSHOT, decodeStatus, isEmptySnapshot } from './status/snapshot.js';

export * as commands from './commands/messages.js';

export { AiVision } from './vision/AiVision.js';
export * from './vision/descriptors.js';
export * from './vision/pipeline.js';

export { blockOn, type BlockOnOptions, type BlockOutcome } from './motion/blockOn.js';
export { encodeSoundFile, loadSoundFile } from './audio/audioPayload.js';
export { MonitorServer, type MonitorTarget } from './monitor/server.js';

export * from './errors.js';
export type * from './types/index.js';
export { ENV } from './config/env.js';
export { logger, addLogListener, type LogEntry } from './utils/logger.js';
