/**
 * Status snapshot decoding
 *
 * The device reports numbers either as JSON numbers or numeric strings and packs its
 * flags into hex strings. Decoding validates the whole payload before any field is read,
 * so a reader never sees a half-decoded snapshot.
 */

import { z } from 'zod';
import type { RawDetection, StatusSnapshot, TagCorners } from '../types/index.js';

// ============== Flag bits ==============

export const SYS_FLAGS = {
  SOUND_PLAYING: 1 << 0,
  MOVE_ACTIVE: 1 << 1,   // a move_at / move_for is active
  IMU_CAL: 1 << 3,
  TURN_ACTIVE: 1 << 4,
  MOVING: 1 << 5,        // any wheel movement
  HAS_CRASHED: 1 << 6,
  SHAKE: 1 << 8,
  POWER_BUTTON: 1 << 9,
  PROGRAM_ACTIVE: 1 << 10,
  SOUND_DOWNLOADING: 1 << 16,
} as const;

export const TOUCH_PRESSED = 0x0001;

// ============== Schema ==============

const numeric = z.coerce.number();
const optionalNumeric = numeric.default(0);

const hexFlags = z.union([z.string(), z.number()]).transform((value, ctx) => {
  if (typeof value === 'number') return value;
  const parsed = parseInt(value, 16);
  if (Number.isNaN(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid flag string "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

const vector3Schema = z.object({
  x: numeric,
  y: numeric,
  z: numeric,
});

const detectionSchema = z
  .object({
    type: numeric,
    id: numeric,
    originx: numeric,
    originy: numeric,
    width: numeric,
    height: numeric,
    score: optionalNumeric,
    angle: optionalNumeric,
    x0: numeric.optional(),
    x1: numeric.optional(),
    x2: numeric.optional(),
    x3: numeric.optional(),
    y0: numeric.optional(),
    y1: numeric.optional(),
    y2: numeric.optional(),
    y3: numeric.optional(),
  })
  .transform((item): RawDetection => {
    let corners: TagCorners | null = null;
    if (item.x0 !== undefined && item.y0 !== undefined) {
      corners = {
        x: [item.x0, item.x1 ?? 0, item.x2 ?? 0, item.x3 ?? 0],
        y: [item.y0, item.y1 ?? 0, item.y2 ?? 0, item.y3 ?? 0],
      };
    }
    return {
      type: item.type,
      id: item.id,
      originX: item.originx,
      originY: item.originy,
      width: item.width,
      height: item.height,
      score: item.score,
      angle: item.angle,
      corners,
    };
  });

export const statusPayloadSchema = z
  .object({
    controller: z.object({
      flags: hexFlags,
      stick_x: numeric,
      stick_y: numeric,
      battery: numeric,
    }),
    robot: z.object({
      flags: hexFlags,
      battery: numeric,
      touch_flags: hexFlags,
      touch_x: numeric,
      touch_y: numeric,
      robot_x: numeric,
      robot_y: numeric,
      roll: numeric,
      pitch: numeric,
      yaw: numeric,
      heading: numeric,
      rotation: optionalNumeric,
      acceleration: vector3Schema,
      gyro_rate: vector3Schema,
      screen: z.object({ row: numeric, column: numeric }),
    }),
    aivision: z.object({
      classnames: z.object({
        count: numeric,
        items: z.array(z.object({ index: numeric, name: z.string() })),
      }),
      objects: z.object({
        count: numeric,
        // the device pads the list with a placeholder entry when count is 0
        items: z.array(z.unknown()),
      }),
    }),
  })
  .transform((raw, ctx): StatusSnapshot => {
    const count = Math.min(raw.aivision.objects.count, raw.aivision.objects.items.length);
    const objects: RawDetection[] = [];
    for (let i = 0; i < count; i++) {
      const parsed = detectionSchema.safeParse(raw.aivision.objects.items[i]);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid detection item ${i}`, path: ['aivision', 'objects', 'items', i] });
        return z.NEVER;
      }
      objects.push(parsed.data);
    }
    return {
      controller: {
        flags: raw.controller.flags,
        stickX: raw.controller.stick_x,
        stickY: raw.controller.stick_y,
        battery: raw.controller.battery,
      },
      robot: {
        flags: raw.robot.flags,
        battery: raw.robot.battery,
        touchFlags: raw.robot.touch_flags,
        touchX: raw.robot.touch_x,
        touchY: raw.robot.touch_y,
        robotX: raw.robot.robot_x,
        robotY: raw.robot.robot_y,
        roll: raw.robot.roll,
        pitch: raw.robot.pitch,
        yaw: raw.robot.yaw,
        heading: raw.robot.heading,
        rotation: raw.robot.rotation,
        acceleration: raw.robot.acceleration,
        gyroRate: raw.robot.gyro_rate,
        screen: raw.robot.screen,
      },
      vision: {
        classnames: raw.aivision.classnames.items.slice(0, raw.aivision.classnames.count),
        objects,
      },
    };
  });

export type StatusDecodeResult =
  | { ok: true; snapshot: StatusSnapshot }
  | { ok: false; reason: string };

/** Decode one status frame into a frozen snapshot. Never throws. */
export function decodeStatus(payload: string | Buffer): StatusDecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(payload.toString());
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  const parsed = statusPayloadSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid status payload' };
  }
  return { ok: true, snapshot: deepFreeze(parsed.data) };
}

// ============== Empty snapshot ==============

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Canonical "unknown / disconnected" snapshot. Compared by identity. */
export const EMPTY_SNAPSHOT: StatusSnapshot = deepFreeze({
  controller: { flags: 0, stickX: 0, stickY: 0, battery: 0 },
  robot: {
    flags: 0,
    battery: 0,
    touchFlags: 0,
    touchX: 0,
    touchY: 0,
    robotX: 0,
    robotY: 0,
    roll: 0,
    pitch: 0,
    yaw: 0,
    heading: 0,
    rotation: 0,
    acceleration: { x: 0, y: 0, z: 0 },
    gyroRate: { x: 0, y: 0, z: 0 },
    screen: { row: 1, column: 1 },
  },
  vision: {
    classnames: [
      { index: 0, name: 'SportsBall' },
      { index: 1, name: 'BlueBarrel' },
      { index: 2, name: 'OrangeBarrel' },
      { index: 3, name: 'Robot' },
    ],
    objects: [],
  },
});

export function isEmptySnapshot(snapshot: StatusSnapshot): boolean {
  return snapshot === EMPTY_SNAPSHOT;
}

/** Frozen copy of `snapshot` with different robot flags. The input is never mutated. */
export function withRobotFlags(snapshot: StatusSnapshot, flags: number): StatusSnapshot {
  if (snapshot.robot.flags === flags) return snapshot;
  return Object.freeze({ ...snapshot, robot: Object.freeze({ ...snapshot.robot, flags }) });
}
