// ─── Config → Timeline ───────────────────────────────────────────────────────
//
// The full pipeline behind every play/export request:
//
//   config ─▶ resolve ─▶ arrange ─▶ velocity ─▶ sequence ─▶ Timeline
//
// Nothing is cached: each request re-resolves from the settings it is given.
// ─────────────────────────────────────────────────────────────────────────────

import { ConfigError } from "../errors.js";
import type { ControlChange, PitchGroup, Timeline } from "../types.js";
import type { Catalog } from "../theory/catalog.js";
import { parsePitchClass, chordSymbol } from "../theory/notes.js";
import { BASE_OCTAVE, resolve } from "../theory/resolver.js";
import { arrange } from "../sequencer/arrange.js";
import { resolveVelocity } from "../sequencer/velocity.js";
import { noteValueToBeats, sequence } from "../sequencer/sequencer.js";
import { createRng, randomSeed } from "../utils/rng.js";
import type { EngineConfig, ReverbConfig } from "./schema.js";

/** GM effects-1 depth (reverb send). */
export const CC_REVERB_LEVEL = 91;
/** General-purpose controller 1, used for reverb room size. */
export const CC_REVERB_ROOM = 16;
/** General-purpose controller 2, used for reverb damping. */
export const CC_REVERB_DAMPING = 17;

export interface BuiltTimeline {
  timeline: Timeline;
  /** Resolved groups before arrangement, one per chord. */
  chords: PitchGroup[];
  /** "Cmaj7" */
  symbol: string;
  /** Seed actually used for random arpeggios / dynamic velocity. */
  seed: number;
}

/**
 * Turn validated settings into a Timeline.
 *
 * @param withProgression Follow `config.progression`; when false only the
 *   single chord is sequenced (the "Chord" buttons).
 */
export function buildTimeline(
  config: EngineConfig,
  catalog: Catalog,
  withProgression = config.progression !== undefined
): BuiltTimeline {
  const root = parsePitchClass(config.root);
  const formula = catalog.formula(config.formula);

  if (config.chordSize !== undefined && formula.intervals.length !== config.chordSize) {
    throw new ConfigError(
      "InvalidConfig",
      `"${formula.id}" has ${formula.intervals.length} notes, not ${config.chordSize}`
    );
  }
  if (withProgression && config.progression === undefined) {
    throw new ConfigError("InvalidConfig", "No progression selected");
  }

  const instrument = catalog.instrument(config.instrument);
  const seed = config.seed ?? randomSeed();
  const rng = createRng(seed);

  const chords = resolve(
    catalog,
    root,
    formula.id,
    withProgression ? config.progression : undefined,
    BASE_OCTAVE + config.octave
  );
  const groups = arrange(chords, config.mode, rng);
  const velocity = config.velocity ?? resolveVelocity(config.velocityMode, config.volume, rng);

  const timeline = sequence(groups, noteValueToBeats(config.noteValue), config.tacts, velocity, {
    tempo: config.tempo,
    program: instrument.program,
    beatsPerTact: config.beatsPerTact,
  });

  return { timeline, chords, symbol: chordSymbol(root, formula), seed };
}

/** Reverb settings → controller messages (0–1 scaled to 0–127). */
export function reverbControls(reverb: ReverbConfig): ControlChange[] {
  const scale = (v: number) => Math.round(v * 127);
  return [
    { controller: CC_REVERB_ROOM, value: scale(reverb.room) },
    { controller: CC_REVERB_DAMPING, value: scale(reverb.damping) },
    { controller: CC_REVERB_LEVEL, value: scale(reverb.level) },
  ];
}
