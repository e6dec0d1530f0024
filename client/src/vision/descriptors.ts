/**
 * Vision descriptors
 * Filters passed to `getData`: which detection kind, and which id (or any id).
 */

export const MATCH_ALL_ID = 0xffff;
export const MAX_OBJECTS = 24;
export const DEFAULT_OBJECT_COUNT = 8;

/** Detection `type` bits as reported by the device. */
export const OBJECT_TYPE = {
  COLOR: 1 << 0,
  CODE: 1 << 1,
  MODEL: 1 << 2,
  TAG: 1 << 3,
  ALL: 0x3f,
} as const;

export interface ColorDescriptor {
  kind: 'color';
  id: number;
  red: number;
  green: number;
  blue: number;
  hueRange: number;
  saturation: number;
}

export interface CodeDescriptor {
  kind: 'code';
  id: number;
  colors: readonly ColorDescriptor[];
}

export interface ModelDescriptor {
  kind: 'model';
  id: number;
}

export interface TagDescriptor {
  kind: 'tag';
  id: number;
}

/** Matches any detection kind by id. */
export interface AnyDescriptor {
  kind: 'any';
  id: number;
}

export type Descriptor = ColorDescriptor | CodeDescriptor | ModelDescriptor | TagDescriptor | AnyDescriptor;

/** One descriptor, several (match any of them), or a bare id of any kind. */
export type DescriptorQuery = Descriptor | readonly Descriptor[] | number;

export function typeMask(descriptor: Descriptor): number {
  switch (descriptor.kind) {
    case 'color':
      return OBJECT_TYPE.COLOR;
    case 'code':
      return OBJECT_TYPE.CODE;
    case 'model':
      return OBJECT_TYPE.MODEL;
    case 'tag':
      return OBJECT_TYPE.TAG;
    case 'any':
      return OBJECT_TYPE.ALL;
  }
}

// ============== Factories ==============

export function colorDescriptor(
  id: number,
  red: number,
  green: number,
  blue: number,
  hueRange: number,
  saturation: number,
): ColorDescriptor {
  return { kind: 'color', id, red, green, blue, hueRange, saturation };
}

/** A color code is built from two to five color signatures. */
export function codeDescriptor(id: number, colors: readonly ColorDescriptor[]): CodeDescriptor {
  if (colors.length < 2 || colors.length > 5) {
    throw new RangeError(`a color code needs 2 to 5 colors, got ${colors.length}`);
  }
  return { kind: 'code', id, colors };
}

export function model(id: number): ModelDescriptor {
  return { kind: 'model', id };
}

export function tag(id: number): TagDescriptor {
  return { kind: 'tag', id };
}

export function anyObject(id: number): AnyDescriptor {
  return { kind: 'any', id };
}

// ============== Constants ==============

export const ALL_TAGS = tag(MATCH_ALL_ID);
export const ALL_COLORS = colorDescriptor(MATCH_ALL_ID, 0, 0, 0, 0, 0);
export const ALL_CODES: CodeDescriptor = { kind: 'code', id: MATCH_ALL_ID, colors: [ALL_COLORS, ALL_COLORS] };
export const ALL_MODELS = model(MATCH_ALL_ID);
export const ALL_OBJECTS = anyObject(MATCH_ALL_ID);

export const SPORTS_BALL = model(0);
export const BLUE_BARREL = model(1);
export const ORANGE_BARREL = model(2);
export const AIM_ROBOT = model(3);

export const ALL_CARGO: readonly Descriptor[] = [SPORTS_BALL, BLUE_BARREL, ORANGE_BARREL];
export const ANY_COLOR_OR_CODE: readonly Descriptor[] = [ALL_COLORS, ALL_CODES];

/** Highest AprilTag id in the device's tag family. */
export const MAX_TAG_ID = 37;
