// ─── chordcraft ──────────────────────────────────────────────────────────────
//
// Chord and progression explorer: resolves chords along progressions, plays
// them through a pluggable synthesizer, and writes standard MIDI files.
//
// Usage:
//   import { createChordSession, createConsoleSynth } from "chordcraft";
//   const session = createChordSession(createConsoleSynth());
//   await session.playProgression({ root: "C", formula: "maj7", progression: "ii-V-I" });
// ─────────────────────────────────────────────────────────────────────────────

// Export session
export { createChordSession, createInterruptHandler, ChordSession, pinSeed } from "./session.js";
export type { ChordSessionOptions, ExportResult } from "./session.js";

// Export theory
export { loadCatalog, getCatalog, createCatalog, DEFAULT_DATA_DIR } from "./theory/catalog.js";
export type { Catalog, CatalogTables } from "./theory/catalog.js";
export { resolve, fitPitch, BASE_OCTAVE } from "./theory/resolver.js";
export {
  parsePitchClass,
  pitchClassName,
  midiToNoteName,
  formatPitchGroup,
  chordSymbol,
  NOTE_NAMES,
} from "./theory/notes.js";
export { parseStep, parseSteps, stepOffset } from "./theory/steps.js";

// Export sequencing
export {
  sequence,
  noteValueToBeats,
  timelineDurationBeats,
  timelineDurationSeconds,
  estimateDurationSeconds,
  isEmptyTimeline,
  assertTempo,
} from "./sequencer/sequencer.js";
export { arrange, PLAYBACK_MODES } from "./sequencer/arrange.js";
export type { PlaybackMode } from "./sequencer/arrange.js";
export { resolveVelocity, VELOCITY_MODES } from "./sequencer/velocity.js";
export type { VelocityMode } from "./sequencer/velocity.js";

// Export playback
export { PlaybackScheduler, createPlaybackScheduler } from "./playback/scheduler.js";
export type {
  SchedulerState,
  SchedulerEvent,
  SchedulerEventType,
  PlaybackResult,
  PlayOptions,
} from "./playback/scheduler.js";
export { systemClock, createManualClock } from "./playback/timing.js";
export type { Clock, ManualClock } from "./playback/timing.js";

// Export MIDI writer
export { encodeTimeline, exportTimeline, withFlatVelocity, FLAT_VELOCITY, TICKS_PER_BEAT } from "./midi/writer.js";

// Export synthesizers
export { createConsoleSynth } from "./synth/console.js";
export { createRecordingSynth } from "./synth/recording.js";
export type { RecordingSynth, SynthCall } from "./synth/recording.js";

// Export config
export { parseConfig, validateConfig, EngineConfigSchema, NOTE_VALUES } from "./config/schema.js";
export type { EngineConfig, EngineConfigInput } from "./config/schema.js";
export { buildTimeline, reverbControls } from "./config/timeline.js";

// Export errors
export { ChordcraftError, ConfigError, PlaybackDeviceError, IOError } from "./errors.js";

// Export types
export type {
  Pitch,
  PitchClass,
  PitchGroup,
  Formula,
  Progression,
  ProgressionStep,
  Instrument,
  NoteEvent,
  Timeline,
  Synthesizer,
  ControlChange,
} from "./types.js";
