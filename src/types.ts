// ─── chordcraft: Core Types ──────────────────────────────────────────────────
//
// Theory tables, timelines, and the synthesizer boundary.
// Everything downstream of the resolver speaks in these types; the scheduler
// and the MIDI writer share nothing but the Timeline.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Pitch Types ────────────────────────────────────────────────────────────

/** Pitch class 0–11. C = 0, C# = 1, … B = 11. */
export type PitchClass = number;

/** MIDI note number (0–127). Middle C = 60. */
export type Pitch = number;

/** Pitches that sound together for one sequencing step. */
export type PitchGroup = readonly Pitch[];

/** Lowest and highest valid MIDI note numbers. */
export const MIDI_MIN = 0;
export const MIDI_MAX = 127;

// ─── Theory Tables ──────────────────────────────────────────────────────────

export const FORMULA_KINDS = ["chord", "scale"] as const;
export type FormulaKind = (typeof FORMULA_KINDS)[number];

/** A chord or scale: semitone offsets from a root. */
export interface Formula {
  /** Lookup key, e.g. "maj7" or "dorian". */
  readonly id: string;
  /** Display name, e.g. "Major 7th". */
  readonly name: string;
  readonly kind: FormulaKind;
  /** Semitone offsets from the root, in voicing order. */
  readonly intervals: readonly number[];
}

/**
 * One progression step.
 *
 * - `degree`: scale-relative ("IV", "bVII"); offset comes from the
 *   progression's reference scale.
 * - `interval`: fixed semitone offset from the root ("+5", "-2").
 */
export type ProgressionStep =
  | {
      readonly kind: "degree";
      /** 1-based scale degree (1–7). */
      readonly degree: number;
      /** -1 = flat, 0 = natural, 1 = sharp. */
      readonly accidental: -1 | 0 | 1;
      readonly label: string;
    }
  | {
      readonly kind: "interval";
      readonly semitones: number;
      readonly label: string;
    };

/** An ordered chain of chord roots relative to the key. */
export interface Progression {
  readonly id: string;
  readonly name: string;
  /** Reference scale id for degree steps. */
  readonly scale: string;
  readonly steps: readonly ProgressionStep[];
}

/** A General MIDI instrument choice. */
export interface Instrument {
  readonly id: string;
  readonly name: string;
  /** GM program number (0–127). */
  readonly program: number;
}

// ─── Timeline Types ─────────────────────────────────────────────────────────

/** A single note with beat-relative timing. */
export interface NoteEvent {
  readonly pitch: Pitch;
  /** Velocity (1–127). */
  readonly velocity: number;
  /** Start offset in beats from the beginning of the timeline. */
  readonly start: number;
  /** Duration in beats. */
  readonly duration: number;
}

/** Ordered note events plus the global settings they were built with. */
export interface Timeline {
  /** Events sorted by start; events of one step are adjacent. */
  readonly events: readonly NoteEvent[];
  /** Tempo in BPM (quarter-note beats). */
  readonly tempo: number;
  /** Step length in beats. */
  readonly noteValue: number;
  /** Number of measures. */
  readonly tactCount: number;
  /** Beats in one measure. */
  readonly beatsPerTact: number;
  /** GM program number. */
  readonly program: number;
}

// ─── Synthesizer Boundary ───────────────────────────────────────────────────

/**
 * Sink for discrete MIDI-style events. Implementations may throw when the
 * device is unavailable; the scheduler turns that into a PlaybackDeviceError.
 */
export interface Synthesizer {
  noteOn(channel: number, pitch: Pitch, velocity: number): void;
  noteOff(channel: number, pitch: Pitch): void;
  programChange(channel: number, program: number): void;
  setControlParameter(channel: number, controller: number, value: number): void;
  loadSoundFont(path: string): Promise<void>;
}

/** A controller message sent after the program change. */
export interface ControlChange {
  controller: number;
  value: number;
}
