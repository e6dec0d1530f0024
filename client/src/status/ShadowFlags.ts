/**
 * Shadow flags
 *
 * A command's effect is not guaranteed to show up in the very next status snapshot, so
 * the client asserts the expected bit locally until the device agrees. Each flag runs a
 * small state machine:
 *
 *   unset ──requestSet──▶ pending-set ──device bit on──▶ confirmed
 *   unset ──requestClear─▶ pending-clear ─device bit off─▶ confirmed
 *   any ──cancel──▶ unset
 *
 * While pending, the override is re-applied to every snapshot. A pending override the
 * device never confirms lapses after `maxPendingSnapshots` snapshots.
 */

import { SYS_FLAGS } from './snapshot.js';

export type ShadowFlag =
  | 'moveActive'
  | 'turnActive'
  | 'moving'
  | 'imuCalibrating'
  | 'soundPlaying'
  | 'soundDownloading';

export type ShadowState = 'unset' | 'pending-set' | 'pending-clear' | 'confirmed';

export const SHADOW_FLAG_BITS: Record<ShadowFlag, number> = {
  moveActive: SYS_FLAGS.MOVE_ACTIVE,
  turnActive: SYS_FLAGS.TURN_ACTIVE,
  moving: SYS_FLAGS.MOVING,
  imuCalibrating: SYS_FLAGS.IMU_CAL,
  soundPlaying: SYS_FLAGS.SOUND_PLAYING,
  soundDownloading: SYS_FLAGS.SOUND_DOWNLOADING,
};

const ALL_FLAGS: ShadowFlag[] = [
  'moveActive',
  'turnActive',
  'moving',
  'imuCalibrating',
  'soundPlaying',
  'soundDownloading',
];

interface Entry {
  state: ShadowState;
  pendingSnapshots: number;
}

/**
 * Pending overrides are re-applied until the device confirms them or they are cancelled,
 * but no longer than `maxPendingSnapshots` snapshots: after that the raw bit wins again.
 */
export class ShadowFlags {
  private entries: Map<ShadowFlag, Entry> = new Map();

  constructor(private readonly maxPendingSnapshots: number) {
    for (const flag of ALL_FLAGS) {
      this.entries.set(flag, { state: 'unset', pendingSnapshots: 0 });
    }
  }

  getState(flag: ShadowFlag): ShadowState {
    return this.entry(flag).state;
  }

  requestSet(flag: ShadowFlag): void {
    this.entries.set(flag, { state: 'pending-set', pendingSnapshots: 0 });
  }

  requestClear(flag: ShadowFlag): void {
    this.entries.set(flag, { state: 'pending-clear', pendingSnapshots: 0 });
  }

  cancel(flag: ShadowFlag): void {
    this.entries.set(flag, { state: 'unset', pendingSnapshots: 0 });
  }

  /** Raw flags with every pending override applied. Pure: does not advance any state. */
  overlay(rawFlags: number): number {
    let flags = rawFlags;
    for (const [flag, entry] of this.entries) {
      const bit = SHADOW_FLAG_BITS[flag];
      if (entry.state === 'pending-set') flags |= bit;
      else if (entry.state === 'pending-clear') flags &= ~bit;
    }
    return flags;
  }

  /**
   * Called once per freshly decoded snapshot. Advances pending overrides the device now
   * confirms (or that have lapsed) and returns the flags readers should see.
   */
  applyToSnapshot(rawFlags: number): number {
    for (const [flag, entry] of this.entries) {
      const bit = SHADOW_FLAG_BITS[flag];
      const rawSet = (rawFlags & bit) !== 0;
      if (entry.state === 'pending-set' && rawSet) {
        entry.state = 'confirmed';
      } else if (entry.state === 'pending-clear' && !rawSet) {
        entry.state = 'confirmed';
      } else if (entry.state === 'pending-set' || entry.state === 'pending-clear') {
        entry.pendingSnapshots += 1;
        if (entry.pendingSnapshots > this.maxPendingSnapshots) {
          entry.state = 'unset';
        }
      }
    }
    return this.overlay(rawFlags);
  }

  private entry(flag: ShadowFlag): Entry {
    const entry = this.entries.get(flag);
    if (!entry) {
      throw new Error(`unknown shadow flag ${flag}`);
    }
    return entry;
  }
}
