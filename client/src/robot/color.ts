/**
 * Colors for the screen and LEDs
 */

import type { Rgb } from '../commands/messages.js';

export type ColorValue = Rgb | number;

export const COLOR = {
  BLACK: 0x000000,
  WHITE: 0xffffff,
  RED: 0xff0000,
  GREEN: 0x00ff00,
  BLUE: 0x001871,
  YELLOW: 0xffff00,
  ORANGE: 0xff8500,
  PURPLE: 0xff00ff,
  CYAN: 0x00ffff,
} as const;

/** Accepts `{ r, g, b }` or a 0xRRGGBB number. */
export function toRgb(color: ColorValue): Rgb {
  if (typeof color === 'number') {
    return { r: (color >> 16) & 0xff, g: (color >> 8) & 0xff, b: color & 0xff };
  }
  return { r: color.r, g: color.g, b: color.b };
}
