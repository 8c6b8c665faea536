// ─── Recording Synthesizer ───────────────────────────────────────────────────
//
// Records every call in order. Used by tests and dry runs; can be armed to
// throw on a chosen call to simulate an unavailable device.
// ─────────────────────────────────────────────────────────────────────────────

import type { Synthesizer } from "../types.js";

export type SynthMethod = "noteOn" | "noteOff" | "programChange" | "setControlParameter" | "loadSoundFont";

export type SynthCall =
  | { method: "noteOn"; channel: number; pitch: number; velocity: number }
  | { method: "noteOff"; channel: number; pitch: number }
  | { method: "programChange"; channel: number; program: number }
  | { method: "setControlParameter"; channel: number; controller: number; value: number }
  | { method: "loadSoundFont"; path: string };

export interface RecordingSynth extends Synthesizer {
  readonly calls: SynthCall[];
  /**
   * Throw on the `nth` call to `method` made after arming, and on every
   * call after that, until `recover()`.
   */
  failOn(method: SynthMethod, nth?: number): void;
  recover(): void;
  /** Pitches with a recorded note-on and no later note-off. */
  sounding(): number[];
  clear(): void;
}

export function createRecordingSynth(): RecordingSynth {
  const calls: SynthCall[] = [];
  const counts = new Map<SynthMethod, number>();
  let failure: { method: SynthMethod; nth: number } | null = null;

  const check = (method: SynthMethod) => {
    const count = (counts.get(method) ?? 0) + 1;
    counts.set(method, count);
    if (failure && failure.method === method && count >= failure.nth) {
      throw new Error(`device unavailable (${method})`);
    }
  };

  return {
    calls,
    noteOn(channel, pitch, velocity) {
      check("noteOn");
      calls.push({ method: "noteOn", channel, pitch, velocity });
    },
    noteOff(channel, pitch) {
      check("noteOff");
      calls.push({ method: "noteOff", channel, pitch });
    },
    programChange(channel, program) {
      check("programChange");
      calls.push({ method: "programChange", channel, program });
    },
    setControlParameter(channel, controller, value) {
      check("setControlParameter");
      calls.push({ method: "setControlParameter", channel, controller, value });
    },
    async loadSoundFont(path) {
      check("loadSoundFont");
      calls.push({ method: "loadSoundFont", path });
    },
    failOn(method, nth = 1) {
      failure = { method, nth };
      counts.set(method, 0);
    },
    recover() {
      failure = null;
    },
    sounding() {
      const on = new Map<number, number>();
      for (const call of calls) {
        if (call.method === "noteOn") on.set(call.pitch, (on.get(call.pitch) ?? 0) + 1);
        if (call.method === "noteOff") on.delete(call.pitch);
      }
      return [...on.keys()].sort((a, b) => a - b);
    },
    clear() {
      calls.length = 0;
      counts.clear();
    },
  };
}
