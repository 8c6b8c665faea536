// ─── Live Playback Scheduler ─────────────────────────────────────────────────
//
// Walks a Timeline in real time and drives a Synthesizer.
//
//   idle ──play──▶ playing ──stop / done──▶ idle
//                    │
//                  play (while playing)
//                    ▼
//                 replacing ──▶ playing (new timeline)
//
// One stream at a time. Waits between emissions go through the Clock with an
// AbortSignal; stop() and replacement abort that wait and send note-off for
// every pitch still sounding before anything else reaches the synth.
// ─────────────────────────────────────────────────────────────────────────────

import { PlaybackDeviceError, errorMessage } from "../errors.js";
import type { ControlChange, Pitch, Synthesizer, Timeline } from "../types.js";
import { assertTempo } from "../sequencer/sequencer.js";
import { formatPitchGroup, midiToNoteName } from "../theory/notes.js";
import { beatsToMs, systemClock, type Clock } from "./timing.js";

// ─── Event Types ────────────────────────────────────────────────────────────

export type SchedulerState = "idle" | "playing" | "replacing";

export type StopReason = "completed" | "stopped" | "replaced";

export type SchedulerEventType = "stateChange" | "groupStart" | "noteOn" | "noteOff" | "error";

export interface StateChangeEvent {
  type: "stateChange";
  state: SchedulerState;
  previousState: SchedulerState;
}

/** A new set of notes starts sounding. Drives the "notes played" readout. */
export interface GroupStartEvent {
  type: "groupStart";
  pitches: Pitch[];
  /** "C4, E4, G4" */
  label: string;
  positionBeats: number;
}

export interface NoteOnEvent {
  type: "noteOn";
  pitch: Pitch;
  noteName: string;
  velocity: number;
  channel: number;
  positionBeats: number;
}

export interface NoteOffEvent {
  type: "noteOff";
  pitch: Pitch;
  noteName: string;
  channel: number;
  positionBeats: number;
}

export interface ErrorEvent {
  type: "error";
  error: PlaybackDeviceError;
}

export type SchedulerEvent =
  | StateChangeEvent
  | GroupStartEvent
  | NoteOnEvent
  | NoteOffEvent
  | ErrorEvent;

export type SchedulerListener = (event: SchedulerEvent) => void;

// ─── Options ────────────────────────────────────────────────────────────────

export interface SchedulerOptions {
  /** Time source. Default: performance.now() + timers/promises. */
  clock?: Clock;
  /** MIDI channel (0–15). Default: 0. */
  channel?: number;
}

export interface PlayOptions {
  /** Program override. Default: the timeline's program. */
  program?: number;
  /** Controller messages sent right after the program change. */
  controls?: readonly ControlChange[];
  /** Repeat until stopped. */
  loop?: boolean;
}

export interface PlaybackResult {
  reason: StopReason;
  /** Note-ons sent during this call. */
  notesPlayed: number;
  /** Completed passes over the timeline. */
  passes: number;
}

// ─── Plan ───────────────────────────────────────────────────────────────────

/** Everything that happens at one instant. Offs go out before ons. */
interface Slot {
  beats: number;
  ms: number;
  offs: Pitch[];
  ons: Array<{ pitch: Pitch; velocity: number }>;
}

/**
 * Flatten a timeline into time slots, one per distinct instant.
 */
export function buildPlan(timeline: Timeline): Slot[] {
  const slots = new Map<number, Slot>();
  const slotAt = (beats: number): Slot => {
    // Key on a rounded position so float noise can't split one instant in two.
    const key = Math.round(beats * 1e6);
    let slot = slots.get(key);
    if (!slot) {
      slot = { beats, ms: beatsToMs(beats, timeline.tempo), offs: [], ons: [] };
      slots.set(key, slot);
    }
    return slot;
  };

  for (const e of timeline.events) {
    slotAt(e.start).ons.push({ pitch: e.pitch, velocity: e.velocity });
    slotAt(e.start + e.duration).offs.push(e.pitch);
  }

  return [...slots.values()].sort((a, b) => a.beats - b.beats);
}

// ─── Scheduler ──────────────────────────────────────────────────────────────

interface Run {
  controller: AbortController;
  channel: number;
  reason: StopReason;
  sounding: Set<Pitch>;
  /** Beat position of the last emitted slot. */
  position: number;
  notesPlayed: number;
  passes: number;
}

/**
 * Single-stream playback scheduler.
 *
 * `play()` resolves when its timeline ends, is stopped, or is replaced by a
 * later `play()`. It rejects only with PlaybackDeviceError.
 */
export class PlaybackScheduler {
  private _state: SchedulerState = "idle";
  private active: Run | null = null;
  private readonly clock: Clock;
  private readonly channel: number;
  private listeners = new Map<SchedulerEventType | "*", Set<SchedulerListener>>();

  constructor(
    private readonly synth: Synthesizer,
    options: SchedulerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.channel = options.channel ?? 0;
  }

  get state(): SchedulerState {
    return this._state;
  }

  /** Pitches with a note-on and no note-off yet. */
  get soundingPitches(): Pitch[] {
    return this.active ? [...this.active.sounding] : [];
  }

  // ─── Event System ───────────────────────────────────────────────────────

  /** Subscribe to one event type or "*". Returns an unsubscribe function. */
  on(type: SchedulerEventType | "*", listener: SchedulerListener): () => void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
    return () => {
      this.listeners.get(type)?.delete(listener);
    };
  }

  private emit(event: SchedulerEvent): void {
    for (const key of [event.type, "*"] as const) {
      const set = this.listeners.get(key);
      if (!set) continue;
      for (const fn of set) {
        try {
          fn(event);
        } catch (err) {
          console.error(`Playback listener failed on ${event.type}: ${errorMessage(err)}`);
        }
      }
    }
  }

  private setState(next: SchedulerState): void {
    const previousState = this._state;
    if (previousState === next) return;
    this._state = next;
    this.emit({ type: "stateChange", state: next, previousState });
  }

  // ─── Controls ───────────────────────────────────────────────────────────

  /**
   * Play a timeline. If another timeline is playing it is replaced: its
   * sounding notes are released before this one's program change.
   * A timeline with an unplayable tempo is rejected with ConfigError and
   * leaves the current playback alone.
   */
  async play(timeline: Timeline, options: PlayOptions = {}): Promise<PlaybackResult> {
    assertTempo(timeline.tempo);

    if (this.active) {
      this.setState("replacing");
      const failures = this.halt(this.active, "replaced");
      if (failures.length > 0) {
        this.setState("idle");
        throw new PlaybackDeviceError(
          `Could not release ${failures.length} note(s) of the replaced timeline: ${errorMessage(failures[0])}`,
          failures[0]
        );
      }
    }

    const run: Run = {
      controller: new AbortController(),
      channel: this.channel,
      reason: "completed",
      sounding: new Set(),
      position: 0,
      notesPlayed: 0,
      passes: 0,
    };
    this.active = run;
    this.setState("playing");

    const plan = buildPlan(timeline);
    const passMs = plan.length > 0 ? plan[plan.length - 1].ms : 0;

    try {
      const program = options.program ?? timeline.program;
      this.send(() => this.synth.programChange(run.channel, program), "programChange");
      for (const c of options.controls ?? []) {
        this.send(() => this.synth.setControlParameter(run.channel, c.controller, c.value), "setControlParameter");
      }

      let passStart = this.clock.now();
      do {
        await this.playPass(plan, passStart, run);
        if (run.controller.signal.aborted) break;
        run.passes++;
        passStart += passMs;
      } while (options.loop && plan.length > 0);
    } catch (err) {
      if (!(err instanceof PlaybackDeviceError)) {
        if (run.controller.signal.aborted) return this.result(run);
        throw err;
      }
      this.fail(run, err);
      throw err;
    }

    if (this.active === run) {
      this.active = null;
      this.setState("idle");
    }
    return this.result(run);
  }

  /**
   * Stop playback. Every sounding pitch gets a note-off before the state
   * returns to idle. No-op when idle.
   */
  stop(): void {
    const run = this.active;
    if (!run) return;
    const failures = this.halt(run, "stopped");
    this.setState("idle");
    if (failures.length > 0) {
      throw new PlaybackDeviceError(
        `Could not release ${failures.length} note(s) on stop: ${errorMessage(failures[0])}`,
        failures[0]
      );
    }
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  private async playPass(plan: Slot[], passStart: number, run: Run): Promise<void> {
    const signal = run.controller.signal;

    for (const slot of plan) {
      const wait = passStart + slot.ms - this.clock.now();
      if (wait > 0) {
        await this.clock.sleep(wait, signal);
      }
      if (signal.aborted) return;
      run.position = slot.beats;

      for (const pitch of slot.offs) {
        this.send(() => this.synth.noteOff(run.channel, pitch), "noteOff");
        run.sounding.delete(pitch);
        this.emit({
          type: "noteOff",
          pitch,
          noteName: midiToNoteName(pitch),
          channel: run.channel,
          positionBeats: slot.beats,
        });
        if (signal.aborted) return;
      }

      if (slot.ons.length > 0) {
        const pitches = slot.ons.map((n) => n.pitch);
        this.emit({
          type: "groupStart",
          pitches,
          label: formatPitchGroup(pitches),
          positionBeats: slot.beats,
        });
      }

      for (const { pitch, velocity } of slot.ons) {
        if (signal.aborted) return;
        this.send(() => this.synth.noteOn(run.channel, pitch, velocity), "noteOn");
        run.sounding.add(pitch);
        run.notesPlayed++;
        this.emit({
          type: "noteOn",
          pitch,
          noteName: midiToNoteName(pitch),
          velocity,
          channel: run.channel,
          positionBeats: slot.beats,
        });
      }
    }
  }

  /**
   * Abort a run and release its sounding notes.
   * Returns the synth errors hit while releasing.
   */
  private halt(run: Run, reason: StopReason): unknown[] {
    run.reason = reason;
    run.controller.abort();
    if (this.active === run) this.active = null;
    return this.release(run);
  }

  private release(run: Run): unknown[] {
    const failures: unknown[] = [];
    for (const pitch of run.sounding) {
      try {
        this.synth.noteOff(run.channel, pitch);
        this.emit({
          type: "noteOff",
          pitch,
          noteName: midiToNoteName(pitch),
          channel: run.channel,
          positionBeats: run.position,
        });
      } catch (err) {
        failures.push(err);
      }
    }
    run.sounding.clear();
    return failures;
  }

  private fail(run: Run, error: PlaybackDeviceError): void {
    run.reason = "stopped";
    run.controller.abort();
    const failures = this.release(run);
    if (failures.length > 0) {
      console.error(`Could not release ${failures.length} note(s) after device failure: ${errorMessage(failures[0])}`);
    }
    if (this.active === run) {
      this.active = null;
      this.setState("idle");
    }
    this.emit({ type: "error", error });
  }

  private send(call: () => void, what: string): void {
    try {
      call();
    } catch (err) {
      throw new PlaybackDeviceError(`Synthesizer ${what} failed: ${errorMessage(err)}`, err);
    }
  }

  private result(run: Run): PlaybackResult {
    return { reason: run.reason, notesPlayed: run.notesPlayed, passes: run.passes };
  }
}

/**
 * Shorthand for `new PlaybackScheduler(synth, options)`.
 */
export function createPlaybackScheduler(
  synth: Synthesizer,
  options: SchedulerOptions = {}
): PlaybackScheduler {
  return new PlaybackScheduler(synth, options);
}
