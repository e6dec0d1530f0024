/**
 * Sound: built-in sounds, notes, and uploads of local audio files
 */

import * as commands from '../commands/messages.js';
import { SYS_FLAGS } from '../status/snapshot.js';
import { loadSoundFile } from '../audio/audioPayload.js';
import type { RobotLink } from './link.js';

export type SoundName =
  | 'DOORBELL' | 'TADA' | 'FAIL' | 'SPARKLE' | 'FLOURISH'
  | 'FORWARD' | 'REVERSE' | 'RIGHT' | 'LEFT' | 'BLINKER'
  | 'CRASH' | 'BRAKES' | 'HUAH' | 'PICKUP' | 'CHEER'
  | 'SENSING' | 'DETECTED' | 'OBSTACLE' | 'LOOPING' | 'COMPLETE'
  | 'PAUSE' | 'RESUME' | 'SEND' | 'RECEIVE'
  | 'ACT_HAPPY' | 'ACT_SAD' | 'ACT_EXCITED' | 'ACT_ANGRY' | 'ACT_SILLY';

export const NOTE_DURATION_MAX_MS = 4000;

const NOTE_STEPS: Record<string, number> = { c: 0, d: 2, e: 4, f: 5, g: 7, a: 9, b: 11 };

export interface ParsedNote {
  /** Semitone within the octave, 0-11 */
  note: number;
  /** 0 for octave 5 up to 3 for octave 8 */
  octave: number;
}

/** Parse note strings such as "C5", "F#6" or "Bb7". Octaves 5 to 8 are playable. */
export function parseNote(text: string): ParsedNote {
  const match = /^([a-gA-G])([#b]?)([5-8])$/.exec(text);
  const letter = match?.[1];
  const accidental = match?.[2];
  const octaveDigit = match?.[3];
  if (letter === undefined || accidental === undefined || octaveDigit === undefined) {
    throw new TypeError(`invalid note string "${text}"`);
  }
  let note = NOTE_STEPS[letter.toLowerCase()] ?? 0;
  // sharps and flats do not wrap into the next octave
  if (accidental === '#' && note < 11) note += 1;
  else if (accidental === 'b' && note > 0) note -= 1;
  return { note, octave: Number(octaveDigit) - 5 };
}

export class Sound {
  constructor(private readonly link: RobotLink) {}

  /** Play a built-in sound. Returns without waiting for it to finish. */
  async play(sound: SoundName, volume: number = 50): Promise<void> {
    await this.link.robotSend(commands.playSound(sound.toLowerCase(), volume));
  }

  /** Play a sound previously uploaded to the robot by name. */
  async playFile(name: string, volume: number = 50): Promise<void> {
    await this.link.robotSend(commands.playFile(name, volume));
  }

  /** Upload and play a local .wav or .mp3 file (at most 255 KiB). */
  async playLocalFile(filepath: string, volume: number = 100): Promise<void> {
    const payload = await loadSoundFile(filepath, volume);
    await this.link.robotSendAudio(payload);
    this.markActive();
  }

  async playNote(noteText: string, duration: number = 750, volume: number = 50): Promise<void> {
    const { note, octave } = parseNote(noteText);
    const cappedDuration = Math.min(duration, NOTE_DURATION_MAX_MS);
    const clampedVolume = Math.max(0, Math.min(100, volume));
    await this.link.robotSend(commands.playNote(note, octave, cappedDuration, clampedVolume));
    this.markActive();
  }

  /** True while a sound plays or is still being transferred to the robot. */
  isActive(): boolean {
    return this.link.status.isFlagSet(SYS_FLAGS.SOUND_PLAYING) || this.link.status.isFlagSet(SYS_FLAGS.SOUND_DOWNLOADING);
  }

  /** Stop the current sound. The robot takes a moment to go quiet. */
  async stop(): Promise<void> {
    await this.link.robotSend(commands.stopSound());
  }

  private markActive(): void {
    this.link.status.assertFlag('soundPlaying');
    this.link.status.assertFlag('soundDownloading');
  }
}
