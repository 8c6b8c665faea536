// ─── chordcraft: Progression Steps ───────────────────────────────────────────
//
// Parses progression tokens into steps and turns steps into root offsets.
//
//   "IV"   → degree 4            → 5 semitones in major
//   "bVII" → degree 7, flat      → 10 semitones in major
//   "+3"   → fixed interval      → 3 semitones
//
// Numeral case is ignored: the chord quality comes from the chosen formula,
// not from the numeral.
// ─────────────────────────────────────────────────────────────────────────────

import { ConfigError } from "../errors.js";
import type { ProgressionStep } from "../types.js";
import { mod12 } from "./notes.js";

const NUMERALS = ["I", "II", "III", "IV", "V", "VI", "VII"] as const;

/** Parse one progression token. */
export function parseStep(token: string): ProgressionStep {
  const label = token.trim();

  if (/^[+-]?\d+$/.test(label)) {
    return { kind: "interval", semitones: parseInt(label, 10), label };
  }

  const normalized = label.replace(/♭/g, "b").replace(/♯/g, "#");
  const match = normalized.match(/^(b|#)?([ivIV]+)$/);
  const degree = match ? NUMERALS.findIndex((n) => n === match[2].toUpperCase()) + 1 : 0;
  if (!match || degree === 0) {
    throw new ConfigError(
      "InvalidProgressionStep",
      `Invalid progression step: "${token}" (expected a numeral I–VII or a signed semitone offset)`
    );
  }

  const accidental = match[1] === "b" ? -1 : match[1] === "#" ? 1 : 0;
  return { kind: "degree", degree, accidental, label };
}

/** Parse a list of tokens, e.g. `["I", "V", "vi", "IV"]`. */
export function parseSteps(tokens: readonly string[]): ProgressionStep[] {
  return tokens.map(parseStep);
}

/**
 * Semitone offset of a step from the key root.
 *
 * Degree steps read the reference scale and wrap into 0–11, so "bI" is 11
 * rather than -1. Interval steps are taken as written.
 */
export function stepOffset(step: ProgressionStep, scale: readonly number[]): number {
  if (step.kind === "interval") return step.semitones;

  const base = scale[(step.degree - 1) % scale.length] ?? 0;
  return mod12(base + step.accidental);
}
