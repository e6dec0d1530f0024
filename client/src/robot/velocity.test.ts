import { describe, it, expect } from 'vitest';
import {
  relativeHeading,
  roundTo2,
  toDeviceFrame,
  toDriveSpeed,
  toTurnRate,
  toUserFrame,
  vectorWheelSpeeds,
} from './velocity.js';

describe('toDriveSpeed', () => {
  it('converts percent to mm/s', () => {
    expect(toDriveSpeed(50)).toBe(100);
    expect(toDriveSpeed(150)).toBe(200);
    expect(toDriveSpeed(33.3)).toBe(66);
  });

  it('caps mm/s at the drive maximum', () => {
    expect(toDriveSpeed(120, 'mmps')).toBe(120);
    expect(toDriveSpeed(500, 'mmps')).toBe(200);
  });
});

describe('toTurnRate', () => {
  it('converts percent to deg/s', () => {
    expect(toTurnRate(50)).toBe(90);
    expect(toTurnRate(100)).toBe(180);
  });

  it('caps deg/s at the turn maximum', () => {
    expect(toTurnRate(400, 'dps')).toBe(180);
  });
});

describe('vectorWheelSpeeds', () => {
  it('drives straight ahead with the rear wheel idle', () => {
    expect(vectorWheelSpeeds(50, 0, 0)).toEqual([86, -86, 0]);
  });

  it('spins in place with all wheels equal', () => {
    expect(vectorWheelSpeeds(0, 0, 50)).toEqual([90, 90, 90]);
  });

  it('clips inputs to 100 percent', () => {
    expect(vectorWheelSpeeds(0, 200, 0)).toEqual([100, 100, -200]);
  });
});

describe('relativeHeading', () => {
  it('wraps into [0, 360)', () => {
    expect(relativeHeading(10, 30)).toBe(340);
    expect(relativeHeading(370, 0)).toBe(10);
    expect(relativeHeading(90.456, 0)).toBe(90.46);
  });

  it('never reports a full turn or negative zero', () => {
    expect(relativeHeading(359.996, 0)).toBe(0);
    expect(relativeHeading(0, 0.001)).toBe(0);
    expect(relativeHeading(-0.001, 0)).toBe(0);
    expect(relativeHeading(0, 0.02)).toBe(359.98);
  });
});

describe('frames', () => {
  it('rotates positions by the heading offset and back', () => {
    const user = toUserFrame(100, 0, 90);
    expect(roundTo2(user.x)).toBe(0);
    expect(roundTo2(user.y)).toBe(100);

    const device = toDeviceFrame(user.x, user.y, 90);
    expect(roundTo2(device.x)).toBe(100);
    expect(roundTo2(device.y)).toBe(0);
  });
});
