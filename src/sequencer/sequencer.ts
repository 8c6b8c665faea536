// ─── Event Sequencer ─────────────────────────────────────────────────────────
//
// Lays pitch groups into a beat-timed Timeline.
//
// Steps run back to back from beat 0, cycling through the groups until
// tactCount full measures are filled. The final step is shortened to end
// exactly on the last barline; it is never dropped.
// ─────────────────────────────────────────────────────────────────────────────

import { ConfigError } from "../errors.js";
import type { NoteEvent, PitchGroup, Timeline } from "../types.js";

export const DEFAULT_TEMPO = 120;
export const DEFAULT_BEATS_PER_TACT = 4;

/** A setTempo payload is three bytes of microseconds per quarter note. */
export const MAX_MICROSECONDS_PER_BEAT = 0xffffff;

/** Slack for float comparisons on beat positions. */
const EPSILON = 1e-9;

/** Settings carried on the Timeline but not used for layout. */
export interface TimelineMeta {
  /** BPM. Default: 120. */
  tempo?: number;
  /** GM program. Default: 0. */
  program?: number;
  /** Beats per measure. Default: 4. */
  beatsPerTact?: number;
}

/**
 * Build a timeline from pitch groups.
 *
 * @param noteValue Step length in beats (quarter = 1, eighth = 0.5).
 * @param velocity Applied to every note.
 *
 * Degenerate input (no groups, tactCount ≤ 0, noteValue ≤ 0) gives an empty
 * timeline, never an error.
 */
export function sequence(
  pitchGroups: readonly PitchGroup[],
  noteValue: number,
  tactCount: number,
  velocity: number,
  meta: TimelineMeta = {}
): Timeline {
  const beatsPerTact = meta.beatsPerTact ?? DEFAULT_BEATS_PER_TACT;
  const totalBeats = tactCount * beatsPerTact;
  const events: NoteEvent[] = [];

  const degenerate =
    pitchGroups.length === 0 || !(tactCount > 0) || !(noteValue > 0) || !(beatsPerTact > 0);

  if (!degenerate) {
    const stepCount = Math.ceil(totalBeats / noteValue - EPSILON);
    for (let i = 0; i < stepCount; i++) {
      const start = i * noteValue;
      const duration = Math.min(noteValue, totalBeats - start);
      if (duration <= EPSILON) break;

      const group = pitchGroups[i % pitchGroups.length];
      for (const pitch of group) {
        events.push(Object.freeze({ pitch, velocity, start, duration }));
      }
    }
  }

  return Object.freeze({
    events: Object.freeze(events),
    tempo: meta.tempo ?? DEFAULT_TEMPO,
    noteValue,
    tactCount,
    beatsPerTact,
    program: meta.program ?? 0,
  });
}

// ─── Timeline Helpers ───────────────────────────────────────────────────────

/**
 * Throw unless `tempo` can be both played and written: a positive finite BPM
 * whose rounded period is 1 to 0xFFFFFF microseconds per beat.
 */
export function assertTempo(tempo: number): void {
  const microseconds = Math.round(60_000_000 / tempo);
  if (!Number.isFinite(tempo) || !(tempo > 0) || microseconds < 1 || microseconds > MAX_MICROSECONDS_PER_BEAT) {
    throw new ConfigError("InvalidConfig", `Tempo out of range: ${tempo} BPM`, [
      `tempo: must give 1 to ${MAX_MICROSECONDS_PER_BEAT} microseconds per beat`,
    ]);
  }
}

export function isEmptyTimeline(timeline: Timeline): boolean {
  return timeline.events.length === 0;
}

/** End of the last note, in beats. 0 for an empty timeline. */
export function timelineDurationBeats(timeline: Timeline): number {
  let end = 0;
  for (const e of timeline.events) {
    end = Math.max(end, e.start + e.duration);
  }
  return end;
}

/** Wall-clock length at the timeline's tempo. */
export function timelineDurationSeconds(timeline: Timeline): number {
  return timelineDurationBeats(timeline) * (60 / timeline.tempo);
}

/**
 * Note denominator → beats. 1 (whole) = 4, 4 (quarter) = 1, 16 = 0.25.
 */
export function noteValueToBeats(denominator: number): number {
  return 4 / denominator;
}

/** Seconds needed for `tactCount` measures at `tempo`. */
export function estimateDurationSeconds(
  tempo: number,
  tactCount: number,
  beatsPerTact: number = DEFAULT_BEATS_PER_TACT
): number {
  return tempo > 0 ? (tactCount * beatsPerTact * 60) / tempo : 0;
}
