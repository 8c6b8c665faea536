// ─── Console Synthesizer ─────────────────────────────────────────────────────
//
// Prints what would be played instead of making sound:
//
//   ♪ program 0
//   ♪ C4 E4 G4
//   ♪ F4 A4 C5
//
// Note-ons that arrive together are printed on one line.
// ─────────────────────────────────────────────────────────────────────────────

import type { Synthesizer } from "../types.js";
import { midiToNoteName } from "../theory/notes.js";

export interface ConsoleSynthOptions {
  /** Line sink. Default: console.log. */
  write?: (line: string) => void;
  /** Also print note-offs and control changes. */
  verbose?: boolean;
}

export function createConsoleSynth(options: ConsoleSynthOptions = {}): Synthesizer {
  const write = options.write ?? ((line: string) => console.log(line));
  const verbose = options.verbose ?? false;
  let chord: string[] = [];
  let flushQueued = false;

  const flush = () => {
    flushQueued = false;
    if (chord.length === 0) return;
    write(`♪ ${chord.join(" ")}`);
    chord = [];
  };

  return {
    noteOn(_channel, pitch) {
      chord.push(midiToNoteName(pitch));
      if (!flushQueued) {
        flushQueued = true;
        queueMicrotask(flush);
      }
    },
    noteOff(channel, pitch) {
      if (verbose) write(`  off ${midiToNoteName(pitch)} (ch ${channel})`);
    },
    programChange(channel, program) {
      write(`♪ program ${program} (ch ${channel})`);
    },
    setControlParameter(channel, controller, value) {
      if (verbose) write(`  cc${controller} = ${value} (ch ${channel})`);
    },
    async loadSoundFont(path) {
      write(`♪ soundfont ${path}`);
    },
  };
}
