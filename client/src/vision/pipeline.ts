/**
 * Perception pipeline
 *
 * Turns the detection list of one status snapshot into typed objects, keeps those that
 * match the query, and ranks them largest first.
 */

import {
  MATCH_ALL_ID,
  MAX_OBJECTS,
  OBJECT_TYPE,
  typeMask,
  type Descriptor,
  type DescriptorQuery,
} from './descriptors.js';
import type { ClassName, RawDetection, TagCorners, VisionState } from '../types/index.js';

// ============== Objects ==============

interface ObjectBase {
  /** Raw `type` value from the device */
  type: number;
  id: number;
  originX: number;
  originY: number;
  width: number;
  height: number;
  centerX: number;
  centerY: number;
  area: number;
  /** Estimated horizontal angle to the object, degrees */
  bearing: number;
}

export interface ColorObject extends ObjectBase {
  kind: 'color';
  angle: number;
}

export interface CodeObject extends ObjectBase {
  kind: 'code';
  angle: number;
}

export interface ModelObject extends ObjectBase {
  kind: 'model';
  classname: string;
  score: number;
}

export interface TagObject extends ObjectBase {
  kind: 'tag';
  corners: TagCorners;
}

export interface UnknownObject extends ObjectBase {
  kind: 'unknown';
}

export type DetectedObject = ColorObject | CodeObject | ModelObject | TagObject | UnknownObject;

const ANGLE_SCALE = 0.01;

const NO_CORNERS: TagCorners = { x: [0, 0, 0, 0], y: [0, 0, 0, 0] };

/** Camera calibration fit, pixel center to degrees. */
export function computeBearing(cx: number, cy: number): number {
  return (
    -34.656 +
    cx * 0.22539 +
    cy * 0.011526 +
    cx * cx * -0.000042011 +
    cx * cy * 0.000010433 +
    cy * cy * -0.00007073
  );
}

function classnameFor(classnames: readonly ClassName[], id: number): string {
  return classnames.find((c) => c.index === id)?.name ?? '';
}

export function decodeDetection(raw: RawDetection, classnames: readonly ClassName[]): DetectedObject {
  const centerX = Math.trunc(raw.originX + raw.width / 2);
  const centerY = Math.trunc(raw.originY + raw.height / 2);
  const base: ObjectBase = {
    type: raw.type,
    id: raw.id,
    originX: raw.originX,
    originY: raw.originY,
    width: raw.width,
    height: raw.height,
    centerX,
    centerY,
    area: raw.width * raw.height,
    bearing: computeBearing(centerX, centerY),
  };

  switch (raw.type) {
    case OBJECT_TYPE.COLOR:
      return { ...base, kind: 'color', angle: raw.angle * ANGLE_SCALE };
    case OBJECT_TYPE.CODE:
      return { ...base, kind: 'code', angle: raw.angle * ANGLE_SCALE };
    case OBJECT_TYPE.MODEL:
      return { ...base, kind: 'model', classname: classnameFor(classnames, raw.id), score: raw.score };
    case OBJECT_TYPE.TAG:
      return { ...base, kind: 'tag', corners: raw.corners ?? NO_CORNERS };
    default:
      return { ...base, kind: 'unknown' };
  }
}

// ============== Matching ==============

function toDescriptors(query: DescriptorQuery): readonly Descriptor[] {
  if (typeof query === 'number') return [{ kind: 'any', id: query }];
  if (isDescriptorList(query)) return query;
  return [query];
}

function isDescriptorList(query: Descriptor | readonly Descriptor[]): query is readonly Descriptor[] {
  return Array.isArray(query);
}

export function matchesDescriptor(object: DetectedObject, descriptor: Descriptor): boolean {
  if ((object.type & typeMask(descriptor)) === 0) return false;
  return descriptor.id === MATCH_ALL_ID || object.id === descriptor.id;
}

export function matchesQuery(object: DetectedObject, descriptors: readonly Descriptor[]): boolean {
  return descriptors.some((d) => matchesDescriptor(object, d));
}

// ============== Ranking ==============

/**
 * Largest area first. Equal areas keep their input order: each object goes in front of
 * the first ranked object that is strictly smaller.
 */
export function rankByArea<T extends { area: number }>(objects: readonly T[]): T[] {
  const ranked: T[] = [];
  for (const object of objects) {
    const at = ranked.findIndex((r) => object.area > r.area);
    if (at === -1) ranked.push(object);
    else ranked.splice(at, 0, object);
  }
  return ranked;
}

// ============== Query ==============

export interface VisionQueryResult {
  /** Ranked matches, at most `count` of them */
  objects: DetectedObject[];
  /** Number of objects returned */
  objectCount: number;
  largest: DetectedObject | null;
}

/** Object limit in 0..MAX_OBJECTS; NaN asks for nothing. */
export function clampCount(count: number): number {
  if (Number.isNaN(count)) return 0;
  return Math.max(0, Math.min(Math.trunc(count), MAX_OBJECTS));
}

export function queryObjects(vision: VisionState, query: DescriptorQuery, count: number): VisionQueryResult {
  const descriptors = toDescriptors(query);
  if (descriptors.length === 0) {
    throw new RangeError('descriptor list passed to getData is empty');
  }
  const limit = clampCount(count);

  const matches = vision.objects
    .map((raw) => decodeDetection(raw, vision.classnames))
    .filter((object) => matchesQuery(object, descriptors));
  const ranked = rankByArea(matches);
  const objectCount = Math.min(ranked.length, limit);

  return {
    objects: ranked.slice(0, objectCount),
    objectCount,
    largest: ranked[0] ?? null,
  };
}
