/**
 * Status payload builders for tests, in the device's wire shape
 */

import { SYS_FLAGS } from '../status/snapshot.js';

export interface WireDetection {
  type: number;
  id: number;
  originx: number;
  originy: number;
  width: number;
  height: number;
  score?: number;
  angle?: number;
  [corner: string]: number | undefined;
}

export interface StatusFields {
  flags?: number;
  battery?: number;
  touchFlags?: number;
  touchX?: number;
  touchY?: number;
  robotX?: number;
  robotY?: number;
  heading?: number;
  rotation?: number;
  objects?: WireDetection[];
}

export interface WireStatus {
  controller: Record<string, unknown>;
  robot: Record<string, unknown>;
  aivision: Record<string, unknown>;
}

const hex = (value: number): string => `0x${value.toString(16).padStart(4, '0')}`;

/** A status payload object. Flags default to "program active". */
export function statusPayload(fields: StatusFields = {}): WireStatus {
  const objects = fields.objects ?? [];
  return {
    controller: { flags: hex(0), stick_x: 0, stick_y: 0, battery: 100 },
    robot: {
      flags: hex(fields.flags ?? SYS_FLAGS.PROGRAM_ACTIVE),
      battery: fields.battery ?? 87,
      touch_flags: hex(fields.touchFlags ?? 0),
      touch_x: fields.touchX ?? 0,
      touch_y: fields.touchY ?? 0,
      robot_x: fields.robotX ?? 0,
      robot_y: fields.robotY ?? 0,
      roll: 0,
      pitch: 0,
      yaw: 0,
      heading: fields.heading ?? 0,
      rotation: fields.rotation ?? 0,
      acceleration: { x: 0, y: 0, z: 0 },
      gyro_rate: { x: 0, y: 0, z: 0 },
      screen: { row: 1, column: 1 },
    },
    aivision: {
      classnames: {
        count: 4,
        items: [
          { index: 0, name: 'SportsBall' },
          { index: 1, name: 'BlueBarrel' },
          { index: 2, name: 'OrangeBarrel' },
          { index: 3, name: 'Robot' },
        ],
      },
      objects: {
        count: objects.length,
        items: objects.length > 0 ? objects : [{ type: 0, id: 0, originx: 0, originy: 0, width: 0, height: 0 }],
      },
    },
  };
}

/** The same payload as the JSON text the device sends. */
export function statusJson(fields: StatusFields = {}): string {
  return JSON.stringify(statusPayload(fields));
}

export function modelDetection(id: number, originx: number, originy: number, width: number, height: number): WireDetection {
  return { type: 4, id, originx, originy, width, height, score: 90 };
}

export function colorDetection(id: number, originx: number, originy: number, width: number, height: number): WireDetection {
  return { type: 1, id, originx, originy, width, height, angle: 0 };
}
