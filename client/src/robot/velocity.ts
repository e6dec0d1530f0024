/**
 * Unit conversions for drive and turn commands
 */

export const DRIVE_VELOCITY_MAX_MMPS = 200;
export const TURN_VELOCITY_MAX_DPS = 180;

// defaults until setMoveVelocity / setTurnVelocity
export const DEFAULT_DRIVE_MMPS = 100;
export const DEFAULT_TURN_DPS = 75;

export type DriveUnits = 'percent' | 'mmps';
export type TurnUnits = 'percent' | 'dps';

export type TurnDirection = 'left' | 'right';

/** mm/s for the wire. Percent is capped at 100, mm/s at the drive maximum. */
export function toDriveSpeed(velocity: number, units: DriveUnits = 'percent'): number {
  if (units === 'percent') {
    return Math.trunc(Math.min(velocity, 100) * 2);
  }
  return Math.trunc(Math.min(velocity, DRIVE_VELOCITY_MAX_MMPS));
}

/** deg/s for the wire. Percent is capped at 100, deg/s at the turn maximum. */
export function toTurnRate(velocity: number, units: TurnUnits = 'percent'): number {
  if (units === 'percent') {
    return Math.trunc(Math.min(velocity, 100) * 1.8);
  }
  return Math.trunc(Math.min(velocity, TURN_VELOCITY_MAX_DPS));
}

function clip(value: number): number {
  return Math.max(-100, Math.min(100, value));
}

/**
 * Wheel speeds for a combined drive: `forwards` and `rightwards` in percent of the
 * drive maximum, `rotation` in percent of the turn maximum (clockwise positive).
 */
export function vectorWheelSpeeds(forwards: number, rightwards: number, rotation: number): [number, number, number] {
  const x = clip(rightwards) * 2.0;
  const y = clip(forwards) * 2.0;
  const r = clip(rotation) * 1.8;

  const w1 = 0.5 * x + 0.866 * y + r;
  const w2 = 0.5 * x - 0.866 * y + r;
  const w3 = r - x;
  return [Math.trunc(w1), Math.trunc(w2), Math.trunc(w3)];
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Heading relative to `offset`, in [0, 360). */
export function relativeHeading(rawHeading: number, offset: number): number {
  const heading = roundTo2((((rawHeading - offset) % 360) + 360) % 360);
  // 359.996 rounds up to a full turn
  return heading === 360 ? 0 : heading;
}

/** Rotate a device-frame position into the frame whose zero heading is `offsetDegrees`. */
export function toUserFrame(x: number, y: number, offsetDegrees: number): { x: number; y: number } {
  const radians = -offsetDegrees * (Math.PI / 180);
  return {
    x: x * Math.cos(radians) + y * Math.sin(radians),
    y: y * Math.cos(radians) - x * Math.sin(radians),
  };
}

/** Inverse of `toUserFrame`. */
export function toDeviceFrame(x: number, y: number, offsetDegrees: number): { x: number; y: number } {
  const radians = -offsetDegrees * (Math.PI / 180);
  return {
    x: x * Math.cos(radians) - y * Math.sin(radians),
    y: y * Math.cos(radians) + x * Math.sin(radians),
  };
}
