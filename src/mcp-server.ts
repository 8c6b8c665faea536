#!/usr/bin/env node
// ─── chordcraft: MCP Server ──────────────────────────────────────────────────
//
// Exposes the theory catalog and the chord session as MCP tools, so an LLM
// can look up chords, hear them, and write them out as MIDI files.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   list_formulas      — chord and scale formulas, optionally by kind or size
//   list_progressions  — progressions with their steps
//   list_instruments   — GM instruments
//   resolve_chord      — pitches and summary for a chord or progression
//   play               — play in the background (replaces what is playing)
//   stop_playback      — stop and release every sounding note
//   export_midi        — write a standard MIDI file
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { ChordcraftError, errorMessage } from "./errors.js";
import { PLAYBACK_MODES } from "./sequencer/arrange.js";
import { VELOCITY_MODES } from "./sequencer/velocity.js";
import { createChordSession, pinSeed } from "./session.js";
import { createConsoleSynth } from "./synth/console.js";
import { FORMULA_KINDS } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

function errorResult(err: unknown) {
  const prefix = err instanceof ChordcraftError ? `${err.name} (${err.code}): ` : "";
  return {
    content: [{ type: "text" as const, text: `${prefix}${errorMessage(err)}` }],
    isError: true,
  };
}

/** Settings accepted by every tool that builds a timeline. Ranges are checked by the session. */
const settingsShape = {
  root: z.string().describe("Root note name, e.g. 'C', 'F#', 'Bb'"),
  formula: z.string().describe("Chord formula id, e.g. 'maj', 'm7', '9' (see list_formulas)"),
  progression: z.string().optional().describe("Progression id (see list_progressions)"),
  chordSize: z.number().int().optional().describe("Require the formula to have this many notes"),
  mode: z.enum(PLAYBACK_MODES).optional().describe("Playback mode. Default: chord"),
  noteValue: z.number().optional().describe("Step length as a note value: 1, 2, 4, 8 or 16. Default: 4"),
  instrument: z.string().optional().describe("Instrument id (see list_instruments). Default: acoustic-piano"),
  octave: z.number().int().optional().describe("Octave shift from middle C, -4 to 4. Default: 0"),
  velocityMode: z.enum(VELOCITY_MODES).optional().describe("Velocity preset. Default: normal"),
  volume: z.number().int().optional().describe("Master volume 1-127. Default: 100"),
  velocity: z.number().int().optional().describe("Fixed velocity 1-127, overrides velocityMode"),
  reverb: z
    .object({
      room: z.number().optional(),
      damping: z.number().optional(),
      level: z.number().optional(),
    })
    .optional()
    .describe("Reverb settings, each 0-1"),
  tempo: z.number().optional().describe("Tempo in BPM, 20-300. Default: 120"),
  tacts: z.number().int().optional().describe("Length in measures, 1-32. Default: 4"),
  beatsPerTact: z.number().int().optional().describe("Beats per measure, 1-12. Default: 4"),
  seed: z.number().int().optional().describe("Seed for random arpeggios and dynamic velocity"),
};

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "chordcraft",
  version: "0.1.0",
});

// stdout belongs to the transport; the console synth reports on stderr.
const session = createChordSession(createConsoleSynth({ write: (line) => console.error(line) }));

// ─── Tool: list_formulas ────────────────────────────────────────────────────

server.tool(
  "list_formulas",
  "List chord and scale formulas. Filter by kind, or chords by note count.",
  {
    kind: z.enum(FORMULA_KINDS).optional().describe("'chord' or 'scale'"),
    size: z.number().int().optional().describe("Only chords with this many notes"),
  },
  async ({ kind, size }) => {
    const catalog = session.catalog;
    const formulas = size !== undefined ? catalog.chordsOfSize(size) : catalog.formulas(kind);
    if (formulas.length === 0) {
      return textResult(`No formulas found. Chord sizes available: ${catalog.chordSizes().join(", ")}`);
    }
    const lines = formulas.map((f) => `${f.id} — ${f.name} (${f.kind}: ${f.intervals.join(" ")})`);
    return textResult(`Found ${formulas.length} formula(s):\n\n${lines.join("\n")}`);
  }
);

// ─── Tool: list_progressions ────────────────────────────────────────────────

server.tool(
  "list_progressions",
  "List chord progressions with their steps and reference scale.",
  {},
  async () => {
    const lines = session.catalog
      .progressions()
      .map((p) => `${p.id} — ${p.name} [${p.steps.map((s) => s.label).join(" ")}] (${p.scale})`);
    return textResult(`${lines.length} progression(s):\n\n${lines.join("\n")}`);
  }
);

// ─── Tool: list_instruments ─────────────────────────────────────────────────

server.tool(
  "list_instruments",
  "List General MIDI instruments available for playback and export.",
  {},
  async () => {
    const lines = session.catalog.instruments().map((i) => `${i.id} — ${i.name} (program ${i.program})`);
    return textResult(`${lines.length} instrument(s):\n\n${lines.join("\n")}`);
  }
);

// ─── Tool: resolve_chord ────────────────────────────────────────────────────

server.tool(
  "resolve_chord",
  "Resolve a chord (optionally along a progression) to note names and summarize what would play.",
  settingsShape,
  async (settings) => {
    try {
      return textResult(session.describe(settings));
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: play ─────────────────────────────────────────────────────────────

server.tool(
  "play",
  "Play a chord, or a progression when one is given. Runs in the background and replaces anything already playing.",
  {
    ...settingsShape,
    loop: z.boolean().optional().describe("Repeat until stop_playback"),
  },
  async (settings) => {
    try {
      const pinned = pinSeed(settings);
      const summary = session.describe(pinned);
      const playing = settings.progression !== undefined
        ? session.playProgression(pinned)
        : session.playChord(pinned);

      playing
        .then((result) => {
          console.error(`Playback ${result.reason}: ${result.notesPlayed} notes, ${result.passes} pass(es)`);
        })
        .catch((err: unknown) => {
          console.error(`Playback error: ${errorMessage(err)}`);
        });

      return textResult(`Now playing:\n\n${summary}\n\nUse \`stop_playback\` to stop.`);
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: stop_playback ────────────────────────────────────────────────────

server.tool(
  "stop_playback",
  "Stop playback and release every sounding note.",
  {},
  async () => {
    if (session.state === "idle") {
      return textResult("Nothing is playing.");
    }
    try {
      session.stop();
      return textResult("Stopped.");
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: export_midi ──────────────────────────────────────────────────────

server.tool(
  "export_midi",
  "Write a chord, or a progression when one is given, to a standard MIDI file.",
  {
    ...settingsShape,
    path: z.string().describe("Destination .mid file path"),
    includeVelocity: z.boolean().optional().describe("false writes every note at velocity 100. Default: true"),
  },
  async ({ path, ...settings }) => {
    try {
      const result = settings.progression !== undefined
        ? await session.exportProgression(settings, path)
        : await session.exportChord(settings, path);
      return textResult(
        `Wrote ${result.path}\n\n- **Chord:** ${result.symbol}\n- **Notes:** ${result.noteCount}\n` +
          `- **Duration:** ${result.durationSeconds.toFixed(1)}s\n- **Size:** ${result.byteLength} bytes`
      );
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("chordcraft MCP server running on stdio");
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
