// ─── Theory Resolver ─────────────────────────────────────────────────────────
//
// (root, formula, progression?, octave) → ordered pitch groups.
//
//   resolve(0, "maj", undefined, 5)   → [[60, 64, 67]]
//   resolve(0, "maj", "ii-V-I", 5)    → [[62, 66, 69], [67, 71, 74], [60, 64, 67]]
//
// Pitches that leave the MIDI range are folded one octave back towards it;
// if that still misses, the pitch is dropped from its group.
// ─────────────────────────────────────────────────────────────────────────────

import { ConfigError } from "../errors.js";
import { MIDI_MAX, MIDI_MIN } from "../types.js";
import type { Pitch, PitchClass, PitchGroup } from "../types.js";
import type { Catalog } from "./catalog.js";
import { stepOffset } from "./steps.js";

/** Octave that puts pitch class 0 on middle C (60). */
export const BASE_OCTAVE = 5;

/**
 * Expand a formula (optionally along a progression) into pitch groups.
 *
 * @param octave Octave block: pitch = root + octave * 12 + offset.
 */
export function resolve(
  catalog: Catalog,
  root: PitchClass,
  formulaId: string,
  progressionId: string | undefined,
  octave: number
): PitchGroup[] {
  if (!Number.isInteger(root) || root < 0 || root > 11) {
    throw new ConfigError("InvalidConfig", `Root pitch class must be an integer 0–11: got ${root}`);
  }
  if (!Number.isInteger(octave)) {
    throw new ConfigError("InvalidConfig", `Octave must be an integer: got ${octave}`);
  }

  const formula = catalog.formula(formulaId);
  const base = root + octave * 12;

  if (progressionId === undefined) {
    return [buildGroup(base, formula.intervals)];
  }

  const progression = catalog.progression(progressionId);
  const scale = catalog.formula(progression.scale).intervals;
  return progression.steps.map((step) =>
    buildGroup(base + stepOffset(step, scale), formula.intervals)
  );
}

/**
 * Bring a raw pitch into 0–127, moving it at most one octave.
 * Returns undefined when it cannot be placed.
 */
export function fitPitch(raw: number): Pitch | undefined {
  if (raw >= MIDI_MIN && raw <= MIDI_MAX) return raw;
  const moved = raw < MIDI_MIN ? raw + 12 : raw - 12;
  return moved >= MIDI_MIN && moved <= MIDI_MAX ? moved : undefined;
}

function buildGroup(base: number, intervals: readonly number[]): PitchGroup {
  const group: Pitch[] = [];
  for (const interval of intervals) {
    const pitch = fitPitch(base + interval);
    if (pitch !== undefined) group.push(pitch);
  }
  return Object.freeze(group);
}
