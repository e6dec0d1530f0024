/**
 * Command builders
 * Each returns the wire command: `cmd_id` plus its parameters.
 */

import type { Command } from '../types/index.js';

// stacking off: a new motion command replaces the running one
const STACKING_OFF = 0;

export const MOVE_COMMAND_IDS: readonly string[] = ['drive', 'drive_for'];
export const TURN_COMMAND_IDS: readonly string[] = ['turn', 'turn_for', 'turn_to'];
export const IMU_CALIBRATE_ID = 'imu_calibrate';

export type KickType = 'kick_soft' | 'kick_medium' | 'kick_hard';

export type LedName = 'light1' | 'light2' | 'light3' | 'light4' | 'light5' | 'light6' | 'all';

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

// ============== General ==============

export function programInit(): Command {
  return { cmd_id: 'program_init' };
}

// ============== Motion ==============

export function moveAt(angle: number, speed: number): Command {
  return { cmd_id: 'drive', angle, speed, stacking_type: STACKING_OFF };
}

export function moveFor(distance: number, angle: number, driveSpeed: number, turnSpeed: number, finalHeading = 0): Command {
  return {
    cmd_id: 'drive_for',
    distance,
    angle,
    final_heading: finalHeading,
    drive_speed: driveSpeed,
    turn_speed: turnSpeed,
    stacking_type: STACKING_OFF,
  };
}

export function turn(turnRate: number): Command {
  return { cmd_id: 'turn', turn_rate: turnRate, stacking_type: STACKING_OFF };
}

export function turnFor(angle: number, turnRate: number): Command {
  return { cmd_id: 'turn_for', angle, turn_rate: turnRate, stacking_type: STACKING_OFF };
}

export function turnTo(heading: number, turnRate: number): Command {
  return { cmd_id: 'turn_to', heading, turn_rate: turnRate, stacking_type: STACKING_OFF };
}

export function spinWheels(vel1: number, vel2: number, vel3: number): Command {
  return { cmd_id: 'spin_wheels', vel1, vel2, vel3 };
}

export function setPose(x: number, y: number): Command {
  return { cmd_id: 'set_pose', x, y };
}

// ============== Inertial ==============

export function imuCalibrate(): Command {
  return { cmd_id: IMU_CALIBRATE_ID };
}

export function imuSetCrashThreshold(sensitivity: number): Command {
  return { cmd_id: 'imu_set_crash_threshold', sensitivity };
}

// ============== Kicker ==============

export function kick(type: KickType): Command {
  return { cmd_id: type };
}

// ============== Sound ==============

export function playSound(name: string, volume: number): Command {
  return { cmd_id: 'play_sound', name, volume };
}

export function playFile(name: string, volume: number): Command {
  return { cmd_id: 'play_file', name, volume };
}

export function playNote(note: number, octave: number, duration: number, volume: number): Command {
  return { cmd_id: 'play_note', note, octave, duration, volume };
}

export function stopSound(): Command {
  return { cmd_id: 'stop_sound' };
}

// ============== LEDs ==============

export function ledSet(led: LedName, color: Rgb): Command {
  return { cmd_id: 'light_set', [led]: { r: color.r, g: color.g, b: color.b } };
}

// ============== Screen ==============

export function screenPrint(text: string): Command {
  return { cmd_id: 'lcd_print', string: text };
}

export function screenClear(color: Rgb): Command {
  return { cmd_id: 'lcd_clear_screen', r: color.r, g: color.g, b: color.b };
}

export function showEmoji(name: number, look: number): Command {
  return { cmd_id: 'show_emoji', name, look };
}

export function hideEmoji(): Command {
  return { cmd_id: 'hide_emoji' };
}

export function showFile(filename: string, x: number, y: number): Command {
  return { cmd_id: 'lcd_draw_image_from_file', filename, x, y };
}

// ============== Vision ==============

export function tagDetection(enable: boolean): Command {
  return { cmd_id: 'tag_detection', b_enable: enable };
}

export function colorDetection(enable: boolean, merge: boolean): Command {
  return { cmd_id: 'color_detection', b_enable: enable, b_merge: merge };
}

export function modelDetection(enable: boolean): Command {
  return { cmd_id: 'model_detection', b_enable: enable };
}

export function colorDescription(id: number, color: Rgb, hueRange: number, saturation: number): Command {
  return {
    cmd_id: 'color_description',
    id,
    red: color.r,
    green: color.g,
    blue: color.b,
    hangle: hueRange,
    hdsat: saturation,
  };
}

/** A color code is two to five color signature ids; unused slots are -1. */
export function codeDescription(id: number, colorIds: readonly number[]): Command {
  const slot = (i: number): number => colorIds[i] ?? -1;
  return {
    cmd_id: 'code_description',
    id,
    c1: slot(0),
    c2: slot(1),
    c3: slot(2),
    c4: slot(3),
    c5: slot(4),
  };
}

export function isMoveCommand(commandId: string): boolean {
  return MOVE_COMMAND_IDS.includes(commandId);
}

export function isTurnCommand(commandId: string): boolean {
  return TURN_COMMAND_IDS.includes(commandId);
}
