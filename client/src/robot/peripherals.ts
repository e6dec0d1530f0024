/**
 * LEDs and kicker
 */

import * as commands from '../commands/messages.js';
import { toRgb, type ColorValue } from './color.js';
import type { KickType, LedName } from '../commands/messages.js';
import type { RobotLink } from './link.js';

function ledName(led: LedName | number): LedName {
  if (typeof led !== 'number') return led;
  switch (led) {
    case 0: return 'light1';
    case 1: return 'light2';
    case 2: return 'light3';
    case 3: return 'light4';
    case 4: return 'light5';
    case 5: return 'light6';
    default: return 'all';
  }
}

export class Led {
  constructor(private readonly link: RobotLink) {}

  /**
   * Set one LED (`light1`..`light6`, or index 0..5) or `all`. Any other index means all.
   * `true` is dim white, `false` is off.
   */
  async on(led: LedName | number, color: ColorValue | boolean): Promise<void> {
    const rgb = typeof color === 'boolean'
      ? { r: color ? 128 : 0, g: color ? 128 : 0, b: color ? 128 : 0 }
      : toRgb(color);
    await this.link.robotSend(commands.ledSet(ledName(led), rgb));
  }

  async off(led: LedName | number): Promise<void> {
    await this.on(led, false);
  }
}

export class Kicker {
  constructor(private readonly link: RobotLink) {}

  async kick(type: KickType = 'kick_medium'): Promise<void> {
    await this.link.robotSend(commands.kick(type));
  }

  /** Push the held object out gently. */
  async place(): Promise<void> {
    await this.kick('kick_soft');
  }
}
