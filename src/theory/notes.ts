// ─── chordcraft: Note Names ──────────────────────────────────────────────────
//
// Pitch class ↔ note name, MIDI number → scientific pitch.
//
//   parsePitchClass("F#")  → 6
//   parsePitchClass("Bb")  → 10
//   midiToNoteName(60)     → "C4"
// ─────────────────────────────────────────────────────────────────────────────

import { ConfigError } from "../errors.js";
import type { Formula, Pitch, PitchClass, PitchGroup } from "../types.js";

/** Sharp spellings, indexed by pitch class. */
export const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

/** Semitone offset of each natural from C. */
const NATURALS: Record<string, number> = {
  C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11,
};

/**
 * Parse a note name into a pitch class.
 *
 * Accepts a letter plus an optional accidental (`#`, `♯`, `b`, `♭`),
 * case-insensitive on the letter: "C", "c#", "Bb", "E♭".
 */
export function parsePitchClass(name: string): PitchClass {
  const match = name.trim().match(/^([A-Ga-g])(#|♯|b|♭)?$/);
  if (!match) {
    throw new ConfigError("InvalidNoteName", `Invalid note name: "${name}"`);
  }

  const [, letter, accidental] = match;
  let pc = NATURALS[letter.toUpperCase()];
  if (accidental === "#" || accidental === "♯") pc += 1;
  if (accidental === "b" || accidental === "♭") pc -= 1;

  return mod12(pc);
}

/** Sharp spelling of a pitch class. */
export function pitchClassName(pc: PitchClass): string {
  return NOTE_NAMES[mod12(pc)];
}

/** MIDI note number → scientific pitch ("C4" = 60). */
export function midiToNoteName(pitch: Pitch): string {
  const octave = Math.floor(pitch / 12) - 1;
  return `${NOTE_NAMES[mod12(pitch)]}${octave}`;
}

/** "C4, E4, G4" — the played-notes readout. */
export function formatPitchGroup(group: PitchGroup): string {
  return group.map(midiToNoteName).join(", ");
}

/** Chord symbol as shown next to the chord selector, e.g. "Cmaj7". */
export function chordSymbol(root: PitchClass, formula: Formula): string {
  return `${pitchClassName(root)}${formula.id}`;
}

/** Non-negative modulo 12. */
export function mod12(n: number): number {
  return ((n % 12) + 12) % 12;
}
