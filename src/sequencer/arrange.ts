// ─── Arrangement ─────────────────────────────────────────────────────────────
//
// Playback modes: how a resolved chord is laid into sequencing steps.
//
//   chord          [C E G]            → [C E G]
//   arpeggio-up    [C E G]            → [C] [E] [G]
//   arpeggio-down  [C E G]            → [G] [E] [C]
//   up-down        [C E G]            → [C] [E] [G] [E] [C]
//   random         [C E G]            → shuffled single notes
//
// Every output group still becomes one step, so arpeggios keep the
// block-chord rule: a group's pitches always share start and duration.
// ─────────────────────────────────────────────────────────────────────────────

import type { PitchGroup } from "../types.js";
import type { Rng } from "../utils/rng.js";

export const PLAYBACK_MODES = ["chord", "arpeggio-up", "arpeggio-down", "up-down", "random"] as const;
export type PlaybackMode = (typeof PLAYBACK_MODES)[number];

/** Expand each chord group according to the playback mode. */
export function arrange(groups: readonly PitchGroup[], mode: PlaybackMode, rng: Rng): PitchGroup[] {
  if (mode === "chord") return [...groups];
  return groups.flatMap((group) => spread(group, mode, rng).map((pitch) => Object.freeze([pitch])));
}

/** Pitch order for one chord under an arpeggio mode. */
function spread(group: PitchGroup, mode: Exclude<PlaybackMode, "chord">, rng: Rng): number[] {
  switch (mode) {
    case "arpeggio-up":
      return [...group];
    case "arpeggio-down":
      return [...group].reverse();
    case "up-down":
      return [...group, ...[...group].reverse().slice(1)];
    case "random":
      return rng.shuffle(group);
  }
}

/** Number of steps one chord occupies under a mode. */
export function stepsPerChord(chordSize: number, mode: PlaybackMode): number {
  if (chordSize === 0) return 0;
  switch (mode) {
    case "chord":
      return 1;
    case "up-down":
      return chordSize * 2 - 1;
    default:
      return chordSize;
  }
}
