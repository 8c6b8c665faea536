#!/usr/bin/env node
// ─── chordcraft: CLI Entry Point ─────────────────────────────────────────────
//
// Usage:
//   chordcraft                          # Show help
//   chordcraft chords --size 4          # Chord formulas with four notes
//   chordcraft scales                   # Scale formulas
//   chordcraft progressions             # Progressions and their steps
//   chordcraft instruments              # GM instruments
//   chordcraft show C maj7              # Resolve and describe a chord
//   chordcraft play A m --progression i-iv-v --mode arpeggio-up
//   chordcraft export D 7 --progression 12-bar-blues --out blues.mid
// ─────────────────────────────────────────────────────────────────────────────

import { ChordcraftError } from "./errors.js";
import { PLAYBACK_MODES } from "./sequencer/arrange.js";
import { VELOCITY_MODES } from "./sequencer/velocity.js";
import { NOTE_VALUES } from "./config/schema.js";
import { createChordSession, createInterruptHandler, pinSeed } from "./session.js";
import { createConsoleSynth } from "./synth/console.js";
import { getCatalog } from "./theory/catalog.js";
import type { Formula } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function fail(err: unknown): never {
  console.error(err instanceof ChordcraftError ? `${err.name}: ${err.message}` : err);
  process.exit(1);
}

function padRight(s: string, len: number): string {
  return s.length >= len ? s.substring(0, len) : s + " ".repeat(len - s.length);
}

function truncate(s: string, max: number): string {
  return s.length <= max ? s : s.substring(0, max - 1) + "…";
}

function printFormulaTable(formulas: readonly Formula[], title: string): void {
  console.log("\n" + padRight("ID", 18) + padRight("Name", 32) + padRight("Notes", 7) + "Intervals");
  console.log("─".repeat(80));
  for (const f of formulas) {
    console.log(
      padRight(f.id, 18) +
        padRight(truncate(f.name, 30), 32) +
        padRight(String(f.intervals.length), 7) +
        f.intervals.join(" ")
    );
  }
  console.log(`\n${formulas.length} ${title}.\n`);
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Numeric flag; non-numbers pass through as NaN and fail validation. */
function getNumber(args: string[], flag: string): number | undefined {
  const value = getFlag(args, flag);
  return value === null ? undefined : Number(value);
}

/** Positional arguments: everything that is not a flag or a flag's value. */
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      if (!BOOLEAN_FLAGS.has(args[i])) i++;
      continue;
    }
    out.push(args[i]);
  }
  return out;
}

const BOOLEAN_FLAGS = new Set(["--loop", "--verbose", "--flat-velocity"]);

/**
 * Flags → settings object. Only flags that were given are set, so the
 * schema's defaults apply to the rest; validation happens in the session.
 */
function settingsFromArgs(root: string, formula: string, args: string[]): Record<string, unknown> {
  const settings: Record<string, unknown> = { root, formula };
  const put = (key: string, value: unknown) => {
    if (value !== undefined && value !== null) settings[key] = value;
  };

  put("chordSize", getNumber(args, "--size"));
  put("progression", getFlag(args, "--progression"));
  put("mode", getFlag(args, "--mode"));
  put("noteValue", getNumber(args, "--note"));
  put("instrument", getFlag(args, "--instrument"));
  put("octave", getNumber(args, "--octave"));
  put("velocityMode", getFlag(args, "--velocity-mode"));
  put("volume", getNumber(args, "--volume"));
  put("velocity", getNumber(args, "--velocity"));
  put("tempo", getNumber(args, "--tempo"));
  put("tacts", getNumber(args, "--tacts"));
  put("beatsPerTact", getNumber(args, "--beats"));
  put("seed", getNumber(args, "--seed"));
  put("output", getFlag(args, "--out"));
  if (hasFlag(args, "--loop")) settings.loop = true;
  if (hasFlag(args, "--flat-velocity")) settings.includeVelocity = false;

  const reverb: Record<string, number> = {};
  const room = getNumber(args, "--reverb-room");
  const damping = getNumber(args, "--reverb-damping");
  const level = getNumber(args, "--reverb-level");
  if (room !== undefined) reverb.room = room;
  if (damping !== undefined) reverb.damping = damping;
  if (level !== undefined) reverb.level = level;
  if (Object.keys(reverb).length > 0) settings.reverb = reverb;

  return settings;
}

function requireChord(args: string[], usage: string): [string, string] {
  const [root, formula] = positionals(args);
  if (!root || !formula) {
    console.error(`Usage: ${usage}`);
    process.exit(1);
  }
  return [root, formula];
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdChords(args: string[]): void {
  const catalog = getCatalog();
  const sizeStr = getFlag(args, "--size");
  if (sizeStr === null) {
    printFormulaTable(catalog.formulas("chord"), "chord(s)");
    return;
  }

  const size = parseInt(sizeStr, 10);
  const sizes = catalog.chordSizes();
  if (!sizes.includes(size)) {
    console.error(`No chords with ${sizeStr} notes. Available sizes: ${sizes.join(", ")}`);
    process.exit(1);
  }
  printFormulaTable(catalog.chordsOfSize(size), `${size}-note chord(s)`);
}

function cmdScales(): void {
  printFormulaTable(getCatalog().formulas("scale"), "scale(s)");
}

function cmdProgressions(): void {
  const progressions = getCatalog().progressions();
  console.log("\n" + padRight("ID", 18) + padRight("Name", 24) + padRight("Scale", 16) + "Steps");
  console.log("─".repeat(80));
  for (const p of progressions) {
    console.log(
      padRight(p.id, 18) +
        padRight(truncate(p.name, 22), 24) +
        padRight(p.scale, 16) +
        p.steps.map((s) => s.label).join(" ")
    );
  }
  console.log(`\n${progressions.length} progression(s).\n`);
}

function cmdInstruments(): void {
  const instruments = getCatalog().instruments();
  console.log("\n" + padRight("ID", 20) + padRight("Name", 28) + "Program");
  console.log("─".repeat(56));
  for (const i of instruments) {
    console.log(padRight(i.id, 20) + padRight(i.name, 28) + String(i.program));
  }
  console.log(`\n${instruments.length} instrument(s).\n`);
}

function cmdShow(args: string[]): void {
  const [root, formula] = requireChord(args, "chordcraft show <root> <formula> [--progression ID] [--octave N]");
  const session = createChordSession(createConsoleSynth());
  console.log(`\n${session.describe(settingsFromArgs(root, formula, args))}\n`);
}

async function cmdPlay(args: string[]): Promise<void> {
  const [root, formula] = requireChord(args, "chordcraft play <root> <formula> [flags]");
  const settings = pinSeed(settingsFromArgs(root, formula, args));
  const session = createChordSession(createConsoleSynth({ verbose: hasFlag(args, "--verbose") }));

  console.log(`\n${session.describe(settings)}\n`);
  if (settings.loop === true) console.log("Looping. Press Ctrl+C to stop.\n");

  const onInterrupt = createInterruptHandler(session, fail);
  process.once("SIGINT", onInterrupt);
  try {
    const result = settings.progression !== undefined
      ? await session.playProgression(settings)
      : await session.playChord(settings);
    console.log(`\nFinished (${result.reason}): ${result.notesPlayed} notes played.`);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

async function cmdExport(args: string[]): Promise<void> {
  const [root, formula] = requireChord(args, "chordcraft export <root> <formula> --out FILE [flags]");
  const settings = settingsFromArgs(root, formula, args);
  if (settings.output === undefined) {
    console.error("Missing --out FILE");
    process.exit(1);
  }

  const session = createChordSession(createConsoleSynth());
  const result = settings.progression !== undefined
    ? await session.exportProgression(settings)
    : await session.exportChord(settings);
  console.log(
    `Wrote ${result.path}: ${result.symbol}, ${result.noteCount} notes, ` +
      `${result.durationSeconds.toFixed(1)}s, ${result.byteLength} bytes`
  );
}

function cmdHelp(): void {
  console.log(`
chordcraft — Chord and progression explorer

Commands:
  chords [--size N]             List chord formulas (optionally by note count)
  scales                        List scale formulas
  progressions                  List progressions
  instruments                   List GM instruments
  show <root> <formula>         Resolve and describe a chord
  play <root> <formula>         Play through the console synthesizer
  export <root> <formula>       Write a standard MIDI file (requires --out)
  help                          Show this help

Settings (show, play, export):
  --progression <id>            Follow a progression
  --size <n>                    Require the formula to have n notes
  --mode <mode>                 ${PLAYBACK_MODES.join(", ")}
  --note <value>                Step length as a note value: ${NOTE_VALUES.join(", ")} (default 4)
  --instrument <id>             GM instrument (default acoustic-piano)
  --octave <-4..4>              Octave shift from middle C (default 0)
  --velocity-mode <mode>        ${VELOCITY_MODES.join(", ")} (default normal)
  --volume <1-127>              Master volume (default 100)
  --velocity <1-127>            Fixed velocity, overrides --velocity-mode
  --reverb-room <0-1>           Reverb room size (default 0.5)
  --reverb-damping <0-1>        Reverb damping (default 0.5)
  --reverb-level <0-1>          Reverb level (default 0.5)
  --tempo <20-300>              Tempo in BPM (default 120)
  --tacts <1-32>                Length in measures (default 4)
  --beats <1-12>                Beats per measure (default 4)
  --seed <n>                    Seed for random arpeggios and dynamic velocity
  --loop                        Repeat until Ctrl+C (play only)
  --verbose                     Also print note-offs and controllers (play only)
  --out <file.mid>              Export destination
  --flat-velocity               Export every note at velocity 100

Examples:
  chordcraft show C maj7
  chordcraft play A m --progression i-iv-v --mode arpeggio-up --tempo 90
  chordcraft export D 7 --progression 12-bar-blues --tacts 12 --out blues.mid
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "chords":
      cmdChords(args.slice(1));
      break;
    case "scales":
      cmdScales();
      break;
    case "progressions":
      cmdProgressions();
      break;
    case "instruments":
      cmdInstruments();
      break;
    case "show":
      cmdShow(args.slice(1));
      break;
    case "play":
      await cmdPlay(args.slice(1));
      break;
    case "export":
      await cmdExport(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      console.error(`Unknown command: "${command}". Run 'chordcraft help' for usage.`);
      process.exit(1);
  }
}

main().catch(fail);
