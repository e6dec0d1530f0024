/**
 * Shared Types for Robot Link
 */

// ============== Channels ==============

export type ChannelName = 'ws_status' | 'ws_img' | 'ws_cmd' | 'ws_audio';

export type Frame = Buffer;

// ============== Status Snapshot ==============

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface ControllerState {
  flags: number;
  stickX: number;
  stickY: number;
  battery: number;
}

export interface RobotState {
  flags: number;       // SYS_FLAGS_* bits
  battery: number;     // percent
  touchFlags: number;
  touchX: number;
  touchY: number;
  robotX: number;      // mm, device frame
  robotY: number;
  roll: number;        // degrees
  pitch: number;
  yaw: number;
  heading: number;
  rotation: number;
  acceleration: Vector3;
  gyroRate: Vector3;   // deg/s
  screen: { row: number; column: number };
}

export interface ClassName {
  index: number;
  name: string;
}

/** Raw detection item as reported by the device; decoded into a DetectedObject per query. */
export interface RawDetection {
  type: number;
  id: number;
  originX: number;
  originY: number;
  width: number;
  height: number;
  score: number;
  angle: number;       // hundredths of a degree (color/code items)
  corners: TagCorners | null;
}

export interface TagCorners {
  x: [number, number, number, number];
  y: [number, number, number, number];
}

export interface VisionState {
  classnames: ClassName[];
  objects: RawDetection[];
}

export interface StatusSnapshot {
  controller: ControllerState;
  robot: RobotState;
  vision: VisionState;
}

// ============== Commands ==============

export type CommandParam =
  | string
  | number
  | boolean
  | { [key: string]: CommandParam };

/** Wire command: `cmd_id` plus flat parameters, serialized as compact JSON. */
export interface Command {
  cmd_id: string;
  [param: string]: CommandParam;
}

export type CommandStatus = 'complete' | 'in_progress' | 'error';

// ============== Monitor ==============

export type MonitorMessageType = 'status' | 'log' | 'terminated';

export interface MonitorMessage {
  type: MonitorMessageType;
  payload: unknown;
  ts: number;
}
