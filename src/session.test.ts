import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseMidi } from "midi-file";
import { ConfigError, IOError, PlaybackDeviceError } from "./errors.js";
import { createManualClock } from "./playback/timing.js";
import { createChordSession, createInterruptHandler, pinSeed } from "./session.js";
import { createRecordingSynth } from "./synth/recording.js";

function setup() {
  const synth = createRecordingSynth();
  const clock = createManualClock();
  const session = createChordSession(synth, { clock });
  return { synth, clock, session };
}

const tempDirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "chordcraft-session-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

function noteOns(synth: ReturnType<typeof createRecordingSynth>): number[] {
  return synth.calls.flatMap((c) => (c.method === "noteOn" ? [c.pitch] : []));
}

describe("ChordSession", () => {
  it("starts idle", () => {
    const { session } = setup();
    expect(session.state).toBe("idle");
  });

  it("plays a chord with program, reverb and velocity", async () => {
    const { synth, clock, session } = setup();
    const done = session.playChord({ noteValue: 1, tacts: 1, velocity: 90 });
    await clock.advance(2000);

    await expect(done).resolves.toEqual({ reason: "completed", notesPlayed: 3, passes: 1 });
    expect(synth.calls.slice(0, 5)).toEqual([
      { method: "programChange", channel: 0, program: 0 },
      { method: "setControlParameter", channel: 0, controller: 16, value: 64 },
      { method: "setControlParameter", channel: 0, controller: 17, value: 64 },
      { method: "setControlParameter", channel: 0, controller: 91, value: 64 },
      { method: "noteOn", channel: 0, pitch: 60, velocity: 90 },
    ]);
    expect(synth.sounding()).toEqual([]);
    expect(session.state).toBe("idle");
  });

  it("plays a chord alone even when a progression is selected", async () => {
    const { synth, clock, session } = setup();
    const done = session.playChord({ progression: "ii-V-I", noteValue: 1, tacts: 1 });
    await clock.advance(2000);
    await done;
    expect(noteOns(synth)).toEqual([60, 64, 67]);
  });

  it("plays a progression, cycling to fill the tacts", async () => {
    const { synth, clock, session } = setup();
    const done = session.playProgression({ progression: "ii-V-I", tacts: 1 });
    await clock.advance(2000);

    await expect(done).resolves.toMatchObject({ reason: "completed", notesPlayed: 12 });
    expect(noteOns(synth)).toEqual([62, 66, 69, 67, 71, 74, 60, 64, 67, 62, 66, 69]);
  });

  it("uses the selected instrument", async () => {
    const { synth, session } = setup();
    void session.playChord({ instrument: "cello" });
    await Promise.resolve();
    expect(synth.calls[0]).toEqual({ method: "programChange", channel: 0, program: 42 });
    session.stop();
  });

  it("rejects a progression request without a progression", async () => {
    const { synth, session } = setup();
    await expect(session.playProgression({})).rejects.toBeInstanceOf(ConfigError);
    expect(synth.calls).toEqual([]);
  });

  it("rejects invalid settings before touching the synthesizer", async () => {
    const { synth, session } = setup();
    await expect(session.playChord({ tempo: 1000 })).rejects.toMatchObject({ code: "InvalidConfig" });
    await expect(session.playChord({ root: "X" })).rejects.toMatchObject({ code: "InvalidNoteName" });
    expect(synth.calls).toEqual([]);
  });

  it("stops a looping chord and silences it", async () => {
    const { synth, clock, session } = setup();
    const done = session.playChord({ loop: true, tacts: 1 });
    await clock.advance(3000);
    expect(session.state).toBe("playing");

    session.stop();
    await expect(done).resolves.toMatchObject({ reason: "stopped", passes: 1 });
    expect(synth.sounding()).toEqual([]);
    expect(session.state).toBe("idle");
  });

  it("replaces the current playback when asked to play again", async () => {
    const { synth, clock, session } = setup();
    const first = session.playChord({ noteValue: 1, tacts: 1 });
    await Promise.resolve();
    const second = session.playChord({ root: "D", noteValue: 1, tacts: 1 });

    await expect(first).resolves.toMatchObject({ reason: "replaced" });
    await clock.advance(2000);
    await expect(second).resolves.toMatchObject({ reason: "completed" });
    expect(noteOns(synth)).toEqual([60, 64, 67, 62, 66, 69]);
    expect(synth.sounding()).toEqual([]);
  });

  it("forwards scheduler events", async () => {
    const { clock, session } = setup();
    const labels: string[] = [];
    session.on("groupStart", (e) => {
      if (e.type === "groupStart") labels.push(e.label);
    });
    const done = session.playProgression({ progression: "I-IV-V-I", tacts: 1 });
    await clock.advance(2000);
    await done;
    expect(labels).toEqual(["C4, E4, G4", "F4, A4, C5", "G4, B4, D5", "C4, E4, G4"]);
  });

  it("hands soundfonts to the synthesizer", async () => {
    const { synth, session } = setup();
    await session.loadSoundFont("piano.sf2");
    expect(synth.calls).toEqual([{ method: "loadSoundFont", path: "piano.sf2" }]);

    synth.failOn("loadSoundFont");
    await expect(session.loadSoundFont("broken.sf2")).rejects.toBeInstanceOf(PlaybackDeviceError);
  });

  it("surfaces device failures during playback", async () => {
    const { synth, session } = setup();
    synth.failOn("programChange");
    await expect(session.playChord({})).rejects.toBeInstanceOf(PlaybackDeviceError);
    expect(session.state).toBe("idle");
  });
});

describe("createInterruptHandler", () => {
  it("stops playback", async () => {
    const { session } = setup();
    const done = session.playChord({ loop: true });
    const errors: unknown[] = [];

    createInterruptHandler(session, (err) => errors.push(err))();
    await expect(done).resolves.toMatchObject({ reason: "stopped" });
    expect(errors).toEqual([]);
  });

  it("reports a failed release instead of throwing", async () => {
    const { synth, session } = setup();
    const done = session.playChord({ loop: true });
    synth.failOn("noteOff");
    const errors: unknown[] = [];

    expect(() => createInterruptHandler(session, (err) => errors.push(err))()).not.toThrow();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(PlaybackDeviceError);
    expect(session.state).toBe("idle");
    await expect(done).resolves.toMatchObject({ reason: "stopped" });
  });
});

describe("ChordSession export", () => {
  it("exports a chord", async () => {
    const { session } = setup();
    const dir = await tempDir();
    const path = join(dir, "chord.mid");

    const result = await session.exportChord({ noteValue: 1, tacts: 1 }, path);

    expect(result).toMatchObject({ path, symbol: "Cmaj", noteCount: 3, durationSeconds: 2 });
    expect((await stat(path)).size).toBe(result.byteLength);
    expect([...(await readFile(path)).subarray(0, 4)]).toEqual([0x4d, 0x54, 0x68, 0x64]);
  });

  it("exports a progression to the configured output", async () => {
    const { session } = setup();
    const dir = await tempDir();
    const output = join(dir, "prog.mid");

    const result = await session.exportProgression({ progression: "I-IV-V-I", output });

    expect(result.path).toBe(output);
    expect(result.noteCount).toBe(48);
    expect(result.durationSeconds).toBe(8);
  });

  it("writes the same bytes it encodes", async () => {
    const { session } = setup();
    const dir = await tempDir();
    const path = join(dir, "seeded.mid");
    const settings = { progression: "12-bar-blues", mode: "random", seed: 3, tacts: 12 };

    await session.exportProgression(settings, path);

    expect(new Uint8Array(await readFile(path))).toEqual(session.encode(settings, true));
  });

  it("writes every note at velocity 100 when velocity info is left out", () => {
    const { session } = setup();
    const velocities = (settings: Record<string, unknown>) =>
      parseMidi(session.encode(settings)).tracks[0].flatMap((e) => (e.type === "noteOn" ? [e.velocity] : []));

    expect(velocities({ velocity: 40, noteValue: 1, tacts: 1 })).toEqual([40, 40, 40]);
    expect(velocities({ velocity: 40, noteValue: 1, tacts: 1, includeVelocity: false })).toEqual([100, 100, 100]);
  });

  it("needs a destination", async () => {
    const { session } = setup();
    await expect(session.exportChord({})).rejects.toThrow("No export destination given");
  });

  it("reports unwritable destinations as IOError", async () => {
    const { session } = setup();
    const dir = await tempDir();
    await expect(session.exportChord({}, join(dir, "no", "such", "dir.mid"))).rejects.toBeInstanceOf(IOError);
  });
});

describe("ChordSession.describe", () => {
  it("summarizes a progression", () => {
    const { session } = setup();
    expect(session.describe({ root: "D", formula: "m7", progression: "ii-V-I", tempo: 90, tacts: 2 })).toBe(
      [
        "Chord: Dm7 (Minor 7th)",
        "Progression: Jazz Turnaround (ii-V-I)",
        "Notes: E4, G4, B4, D5 | A4, C5, E5, G5 | D4, F4, A4, C5",
        "Mode: chord (3 step(s) per cycle) | Note value: 1/4",
        "Instrument: Acoustic Piano (program 0) | Velocity: normal @ 100",
        "Tempo: 90 BPM | Length: 2 tact(s) of 4 | Duration: 5.3s",
      ].join("\n")
    );
  });

  it("summarizes a single arpeggiated chord", () => {
    const { session } = setup();
    const lines = session.describe({ root: "A", formula: "m", mode: "up-down", velocity: 70 }).split("\n");
    expect(lines[0]).toBe("Chord: Am (Minor)");
    expect(lines[1]).toBe("Progression: none");
    expect(lines[2]).toBe("Notes: A4, C5, E5");
    expect(lines[3]).toBe("Mode: up-down (5 step(s) per cycle) | Note value: 1/4");
    expect(lines[4]).toBe("Instrument: Acoustic Piano (program 0) | Velocity: 70");
  });

  it("reports the seed when the settings involve chance", () => {
    const { session } = setup();
    const lines = session.describe({ mode: "random", seed: 5 }).split("\n");
    expect(lines).toHaveLength(7);
    expect(lines[6]).toBe("Seed: 5");
    expect(session.describe({ velocityMode: "dynamic", seed: 8 }).split("\n")[6]).toBe("Seed: 8");
  });
});

describe("pinSeed", () => {
  it("keeps a given seed", () => {
    const settings = { mode: "random", seed: 12 };
    expect(pinSeed(settings)).toBe(settings);
  });

  it("picks one seed that describe and play then share", async () => {
    const { synth, clock, session } = setup();
    const pinned = pinSeed({ mode: "random", progression: "I-IV-V-I", tacts: 1 });
    expect(Number.isInteger(pinned.seed)).toBe(true);

    const seedLine = session.describe(pinned).split("\n")[6];
    expect(seedLine).toBe(`Seed: ${String(pinned.seed)}`);

    const done = session.playProgression(pinned);
    await clock.advance(2000);
    await done;
    const expected = parseMidi(session.encode(pinned, true)).tracks[0].flatMap((e) =>
      e.type === "noteOn" ? [e.noteNumber] : []
    );
    expect(noteOns(synth)).toEqual(expected);
  });
});
