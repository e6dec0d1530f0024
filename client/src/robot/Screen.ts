/**
 * Screen: text, emoji, stored images, and touch input
 */

import * as commands from '../commands/messages.js';
import { InvalidImageFileError } from '../errors.js';
import { TOUCH_PRESSED } from '../status/snapshot.js';
import { COLOR, toRgb, type ColorValue } from './color.js';
import type { RobotLink } from './link.js';
import type { StatusCallback } from '../channels/StatusWorker.js';

export const EMOJI = {
  EXCITED: 0, CONFIDENT: 1, SILLY: 2, AMAZED: 3, STRONG: 4, THRILLED: 5,
  HAPPY: 6, PROUD: 7, LAUGHING: 8, OPTIMISTIC: 9, DETERMINED: 10, AFFECTIONATE: 11,
  CALM: 12, QUIET: 13, SHY: 14, CHEERFUL: 15, LOVED: 16, SURPRISED: 17,
  THINKING: 18, TIRED: 19, CONFUSED: 20, BORED: 21, EMBARRASSED: 22, WORRIED: 23,
  SAD: 24, SICK: 25, DISAPPOINTED: 26, NERVOUS: 27, ANNOYED: 28, STRESSED: 29,
  ANGRY: 30, FRUSTRATED: 31, JEALOUS: 32, SHOCKED: 33, FEAR: 34, DISGUST: 35,
} as const;

export const EMOJI_LOOK = { FORWARD: 0, LEFT: 1, RIGHT: 2 } as const;

const IMAGE_EXTENSIONS = ['.bmp', '.png'];

export class Screen {
  constructor(private readonly link: RobotLink) {}

  /** Print at the cursor, which then moves to the end of the text. */
  async print(...values: unknown[]): Promise<void> {
    await this.link.robotSend(commands.screenPrint(values.map(String).join(' ')));
  }

  async clearScreen(color: ColorValue = COLOR.BLUE): Promise<void> {
    await this.link.robotSend(commands.screenClear(toRgb(color)));
  }

  async showEmoji(emoji: number, look: number = EMOJI_LOOK.FORWARD): Promise<void> {
    await this.link.robotSend(commands.showEmoji(emoji, look));
  }

  async hideEmoji(): Promise<void> {
    await this.link.robotSend(commands.hideEmoji());
  }

  /** Draw an image already stored on the robot. Only .bmp and .png files are accepted. */
  async showFile(filename: string, x: number, y: number): Promise<void> {
    const lower = filename.toLowerCase();
    if (!IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
      throw new InvalidImageFileError(`${filename}: expected extension to be bmp or png`);
    }
    await this.link.robotSend(commands.showFile(filename, x, y));
  }

  // ============== Touch ==============

  pressed(callback: StatusCallback): () => void {
    return this.link.status.onPressed(callback);
  }

  released(callback: StatusCallback): () => void {
    return this.link.status.onReleased(callback);
  }

  pressing(): boolean {
    return (this.link.status.getSnapshot().robot.touchFlags & TOUCH_PRESSED) !== 0;
  }

  touchX(): number {
    return this.link.status.getSnapshot().robot.touchX;
  }

  touchY(): number {
    return this.link.status.getSnapshot().robot.touchY;
  }

  /** Cursor position as last reported by the robot. */
  cursor(): { row: number; column: number } {
    return this.link.status.getSnapshot().robot.screen;
  }
}
