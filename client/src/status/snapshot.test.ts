import { describe, it, expect } from 'vitest';
import { EMPTY_SNAPSHOT, SYS_FLAGS, decodeStatus, isEmptySnapshot, withRobotFlags } from './snapshot.js';
import { modelDetection, statusJson, statusPayload } from '../__fixtures__/snapshots.js';

describe('decodeStatus', () => {
  it('decodes hex flags and numeric fields', () => {
    const result = decodeStatus(statusJson({ flags: SYS_FLAGS.PROGRAM_ACTIVE | SYS_FLAGS.MOVING, battery: 64, heading: 90.5 }));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.snapshot.robot.flags).toBe(0x420);
    expect(result.snapshot.robot.battery).toBe(64);
    expect(result.snapshot.robot.heading).toBe(90.5);
    expect(result.snapshot.vision.classnames.map((c) => c.name)).toEqual(['SportsBall', 'BlueBarrel', 'OrangeBarrel', 'Robot']);
  });

  it('accepts numbers sent as strings', () => {
    const payload = statusPayload();
    const result = decodeStatus(JSON.stringify({ ...payload, robot: { ...payload.robot, battery: '55' } }));
    expect(result.ok && result.snapshot.robot.battery).toBe(55);
  });

  it('ignores the placeholder item when the object count is zero', () => {
    const result = decodeStatus(statusJson());
    expect(result.ok && result.snapshot.vision.objects).toEqual([]);
  });

  it('decodes detection items', () => {
    const result = decodeStatus(Buffer.from(statusJson({ objects: [modelDetection(2, 100, 150, 40, 60)] })));
    expect(result.ok && result.snapshot.vision.objects).toEqual([
      { type: 4, id: 2, originX: 100, originY: 150, width: 40, height: 60, score: 90, angle: 0, corners: null },
    ]);
  });

  it('reads tag corners when present', () => {
    const tagItem = { type: 8, id: 3, originx: 0, originy: 0, width: 10, height: 10, x0: 1, y0: 2, x1: 3, y1: 4, x2: 5, y2: 6, x3: 7, y3: 8 };
    const result = decodeStatus(statusJson({ objects: [tagItem] }));
    expect(result.ok && result.snapshot.vision.objects[0]?.corners).toEqual({ x: [1, 3, 5, 7], y: [2, 4, 6, 8] });
  });

  it('reports invalid JSON', () => {
    const result = decodeStatus('{not json');
    expect(result.ok).toBe(false);
    expect(!result.ok && result.reason.startsWith('invalid JSON')).toBe(true);
  });

  it('reports a missing section', () => {
    const result = decodeStatus(JSON.stringify({ controller: {} }));
    expect(result.ok).toBe(false);
  });

  it('reports an unparseable flag string', () => {
    const payload = statusPayload();
    const result = decodeStatus(JSON.stringify({ ...payload, robot: { ...payload.robot, flags: 'zz' } }));
    expect(result).toEqual({ ok: false, reason: 'robot.flags: invalid flag string "zz"' });
  });

  it('hands out frozen snapshots', () => {
    const result = decodeStatus(statusJson({ objects: [modelDetection(1, 0, 0, 10, 10)] }));
    if (!result.ok) throw new Error(result.reason);
    expect(Object.isFrozen(result.snapshot)).toBe(true);
    expect(Object.isFrozen(result.snapshot.robot.acceleration)).toBe(true);
    expect(Object.isFrozen(result.snapshot.vision.objects[0])).toBe(true);
    expect(() => {
      result.snapshot.robot.battery = 1;
    }).toThrow(TypeError);
  });
});

describe('EMPTY_SNAPSHOT', () => {
  it('is frozen and recognized by identity', () => {
    expect(Object.isFrozen(EMPTY_SNAPSHOT.robot)).toBe(true);
    expect(isEmptySnapshot(EMPTY_SNAPSHOT)).toBe(true);
    expect(isEmptySnapshot(withRobotFlags(EMPTY_SNAPSHOT, 1))).toBe(false);
  });
});

describe('withRobotFlags', () => {
  it('copies instead of mutating', () => {
    const result = decodeStatus(statusJson());
    if (!result.ok) throw new Error(result.reason);
    const updated = withRobotFlags(result.snapshot, 0x20);
    expect(updated.robot.flags).toBe(0x20);
    expect(result.snapshot.robot.flags).toBe(SYS_FLAGS.PROGRAM_ACTIVE);
    expect(withRobotFlags(result.snapshot, SYS_FLAGS.PROGRAM_ACTIVE)).toBe(result.snapshot);
    expect(Object.isFrozen(updated)).toBe(true);
    expect(Object.isFrozen(updated.robot)).toBe(true);
  });
});
