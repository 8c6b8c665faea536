// ─── MIDI File Writer ────────────────────────────────────────────────────────
//
// Serializes a Timeline into a format-0 standard MIDI file.
//
//   MThd  format 0, 1 track, 480 ticks per quarter
//   MTrk  setTempo · timeSignature · programChange · notes… · endOfTrack
//
// Beats become ticks by rounding start and end separately, so back-to-back
// steps never drift apart. At one tick the order is: releases of notes that
// started earlier, then note-ons, then releases of notes that rounded to zero
// length, so every note-on is followed by its own note-off. Output depends
// only on the timeline and tempo: the same input always gives the same bytes.
// ─────────────────────────────────────────────────────────────────────────────

import { rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { writeMidi, type MidiEvent } from "midi-file";
import { IOError, errorMessage } from "../errors.js";
import { assertTempo } from "../sequencer/sequencer.js";
import type { Timeline } from "../types.js";

/** Pulses per quarter note. */
export const TICKS_PER_BEAT = 480;

/** Beats → ticks at the file resolution. */
export function beatsToTicks(beats: number): number {
  return Math.round(beats * TICKS_PER_BEAT);
}

/** BPM → microseconds per quarter note (setTempo payload). Throws ConfigError out of range. */
export function tempoToMicroseconds(bpm: number): number {
  assertTempo(bpm);
  return Math.round(60_000_000 / bpm);
}

/** Velocity written for every note when velocity info is left out. */
export const FLAT_VELOCITY = 100;

/** The same timeline with every note at one velocity. */
export function withFlatVelocity(timeline: Timeline, velocity = FLAT_VELOCITY): Timeline {
  return {
    ...timeline,
    events: timeline.events.map((e) => ({ ...e, velocity })),
  };
}

/** Sort rank at a shared tick. */
const RELEASE = 0;
const ATTACK = 1;
const ZERO_LENGTH_RELEASE = 2;

interface TimedMessage {
  tick: number;
  order: typeof RELEASE | typeof ATTACK | typeof ZERO_LENGTH_RELEASE;
  pitch: number;
  velocity: number;
}

/**
 * Encode a timeline as MIDI bytes.
 *
 * @param tempo BPM for the tempo event. Default: the timeline's tempo.
 */
export function encodeTimeline(timeline: Timeline, tempo: number = timeline.tempo, channel = 0): Uint8Array {
  const microsecondsPerBeat = tempoToMicroseconds(tempo);

  const messages: TimedMessage[] = [];
  for (const e of timeline.events) {
    const startTick = beatsToTicks(e.start);
    const endTick = beatsToTicks(e.start + e.duration);
    messages.push({ tick: startTick, order: ATTACK, pitch: e.pitch, velocity: e.velocity });
    messages.push({
      tick: endTick,
      order: endTick > startTick ? RELEASE : ZERO_LENGTH_RELEASE,
      pitch: e.pitch,
      velocity: 0,
    });
  }
  // Array.prototype.sort is stable, so events of one step keep their order.
  messages.sort((a, b) => a.tick - b.tick || a.order - b.order);

  const track: MidiEvent[] = [
    { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat },
    {
      deltaTime: 0,
      meta: true,
      type: "timeSignature",
      numerator: timeline.beatsPerTact,
      denominator: 4,
      metronome: 24,
      thirtyseconds: 8,
    },
    { deltaTime: 0, type: "programChange", channel, programNumber: timeline.program },
  ];

  let previousTick = 0;
  for (const m of messages) {
    const deltaTime = m.tick - previousTick;
    previousTick = m.tick;
    track.push(
      m.order === ATTACK
        ? { deltaTime, type: "noteOn", channel, noteNumber: m.pitch, velocity: m.velocity }
        : { deltaTime, type: "noteOff", channel, noteNumber: m.pitch, velocity: 0 }
    );
  }
  track.push({ deltaTime: 0, meta: true, type: "endOfTrack" });

  return new Uint8Array(
    writeMidi({
      header: { format: 0, numTracks: 1, ticksPerBeat: TICKS_PER_BEAT },
      tracks: [track],
    })
  );
}

/**
 * Write a timeline to `filePath` as a standard MIDI file.
 *
 * The bytes go to a temporary file beside the destination, which is renamed
 * into place only after the write succeeds. On failure the temporary file is
 * removed and an IOError is thrown; the destination is left untouched.
 * An unwritable tempo throws ConfigError before anything touches the disk.
 */
export async function exportTimeline(timeline: Timeline, tempo: number, filePath: string): Promise<void> {
  const bytes = encodeTimeline(timeline, tempo);
  const tempPath = join(dirname(filePath), `.${basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await writeFile(tempPath, bytes);
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
      console.error(`Could not remove temporary file ${tempPath}: ${errorMessage(cleanupErr)}`);
    });
    throw new IOError(`Cannot write MIDI file ${filePath}: ${errorMessage(err)}`, filePath, err);
  }
}
