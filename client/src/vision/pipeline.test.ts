import { describe, it, expect } from 'vitest';
import {
  clampCount,
  computeBearing,
  decodeDetection,
  queryObjects,
  rankByArea,
} from './pipeline.js';
import { ALL_MODELS, ALL_OBJECTS, OBJECT_TYPE, model, tag } from './descriptors.js';
import { EMPTY_SNAPSHOT } from '../status/snapshot.js';
import type { RawDetection, VisionState } from '../types/index.js';

const classnames = EMPTY_SNAPSHOT.vision.classnames;

function raw(type: number, id: number, width: number, height: number, originX = 0, originY = 0): RawDetection {
  return { type, id, originX, originY, width, height, score: 0, angle: 0, corners: null };
}

function vision(objects: RawDetection[]): VisionState {
  return { classnames, objects };
}

describe('computeBearing', () => {
  it('evaluates the calibration polynomial', () => {
    expect(computeBearing(320, 240)).toBeCloseTo(32.66032, 8);
  });

  it('reduces to the constant term at the origin', () => {
    expect(computeBearing(0, 0)).toBe(-34.656);
  });
});

describe('decodeDetection', () => {
  it('computes center, area and class name for model items', () => {
    const object = decodeDetection({ ...raw(OBJECT_TYPE.MODEL, 1, 50, 40, 10, 20), score: 87 }, classnames);
    expect(object).toMatchObject({ kind: 'model', centerX: 35, centerY: 40, area: 2000, classname: 'BlueBarrel', score: 87 });
    expect(object.bearing).toBe(computeBearing(35, 40));
  });

  it('truncates odd centers', () => {
    const object = decodeDetection(raw(OBJECT_TYPE.MODEL, 0, 5, 3, 0, 0), classnames);
    expect(object.centerX).toBe(2);
    expect(object.centerY).toBe(1);
  });

  it('scales color angles to degrees', () => {
    const object = decodeDetection({ ...raw(OBJECT_TYPE.COLOR, 2, 10, 10), angle: 4500 }, classnames);
    expect(object.kind).toBe('color');
    expect(object.kind === 'color' && object.angle).toBe(45);
  });

  it('fills missing tag corners with zeros', () => {
    const object = decodeDetection(raw(OBJECT_TYPE.TAG, 7, 10, 10), classnames);
    expect(object.kind === 'tag' && object.corners).toEqual({ x: [0, 0, 0, 0], y: [0, 0, 0, 0] });
  });

  it('leaves the class name empty for ids outside the table', () => {
    const object = decodeDetection(raw(OBJECT_TYPE.MODEL, 9, 10, 10), classnames);
    expect(object.kind === 'model' && object.classname).toBe('');
  });

  it('keeps unrecognized types as unknown objects', () => {
    expect(decodeDetection(raw(16, 1, 10, 10), classnames).kind).toBe('unknown');
  });
});

describe('rankByArea', () => {
  it('orders largest first and keeps ties in input order', () => {
    const ranked = rankByArea([
      { id: 'a', area: 100 },
      { id: 'b', area: 200 },
      { id: 'c', area: 100 },
      { id: 'd', area: 300 },
    ]);
    expect(ranked.map((r) => r.id)).toEqual(['d', 'b', 'a', 'c']);
  });
});

describe('clampCount', () => {
  it('caps at 24 and floors at 0', () => {
    expect(clampCount(50)).toBe(24);
    expect(clampCount(-3)).toBe(0);
    expect(clampCount(3.9)).toBe(3);
  });

  it('treats NaN as no objects', () => {
    expect(clampCount(NaN)).toBe(0);
    expect(clampCount(Infinity)).toBe(24);
  });
});

describe('queryObjects', () => {
  it('returns wildcard model matches largest first', () => {
    const result = queryObjects(
      vision([raw(OBJECT_TYPE.MODEL, 1, 50, 40), raw(OBJECT_TYPE.MODEL, 2, 80, 10)]),
      ALL_MODELS,
      8,
    );
    expect(result.objects.map((o) => o.id)).toEqual([1, 2]);
    expect(result.objects.map((o) => o.area)).toEqual([2000, 800]);
    expect(result.objectCount).toBe(2);
    expect(result.largest?.id).toBe(1);
  });

  it('filters by kind and id', () => {
    const objects = [raw(OBJECT_TYPE.COLOR, 2, 30, 30), raw(OBJECT_TYPE.MODEL, 2, 10, 10), raw(OBJECT_TYPE.MODEL, 1, 20, 20)];
    expect(queryObjects(vision(objects), model(2), 8).objects.map((o) => o.kind)).toEqual(['model']);
    expect(queryObjects(vision(objects), ALL_MODELS, 8).objects.map((o) => o.id)).toEqual([1, 2]);
  });

  it('matches any descriptor of a list', () => {
    const objects = [raw(OBJECT_TYPE.TAG, 3, 10, 10), raw(OBJECT_TYPE.MODEL, 1, 20, 20), raw(OBJECT_TYPE.TAG, 4, 30, 30)];
    const result = queryObjects(vision(objects), [tag(3), model(1)], 8);
    expect(result.objects.map((o) => `${o.kind}:${o.id}`)).toEqual(['model:1', 'tag:3']);
  });

  it('treats a bare number as an id of any kind', () => {
    const objects = [raw(OBJECT_TYPE.COLOR, 5, 10, 10), raw(OBJECT_TYPE.CODE, 5, 20, 20), raw(OBJECT_TYPE.COLOR, 6, 30, 30)];
    expect(queryObjects(vision(objects), 5, 8).objects.map((o) => o.kind)).toEqual(['code', 'color']);
  });

  it('truncates to the requested count but reports the largest overall', () => {
    const objects = Array.from({ length: 30 }, (_, i) => raw(OBJECT_TYPE.TAG, i, i + 1, 1));
    const capped = queryObjects(vision(objects), ALL_OBJECTS, 50);
    expect(capped.objects).toHaveLength(24);
    expect(capped.objectCount).toBe(24);
    expect(capped.objects[0]?.id).toBe(29);

    const none = queryObjects(vision(objects), ALL_OBJECTS, 0);
    expect(none.objects).toEqual([]);
    expect(none.objectCount).toBe(0);
    expect(none.largest?.id).toBe(29);
  });

  it('reports zero objects for a NaN count', () => {
    const result = queryObjects(vision([raw(OBJECT_TYPE.TAG, 1, 10, 10)]), ALL_OBJECTS, NaN);
    expect(result.objectCount).toBe(0);
    expect(result.objects).toEqual([]);
    expect(result.largest?.id).toBe(1);
  });

  it('returns nothing for an empty detection list', () => {
    const result = queryObjects(vision([]), ALL_OBJECTS, 8);
    expect(result.objects).toEqual([]);
    expect(result.largest).toBeNull();
  });

  it('rejects an empty descriptor list', () => {
    expect(() => queryObjects(vision([]), [], 8)).toThrow(RangeError);
  });
});
