import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors.js";
import { parseConfig, validateConfig } from "./schema.js";

function issuesOf(input: unknown): readonly string[] {
  try {
    parseConfig(input);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe("parseConfig", () => {
  it("fills every default", () => {
    expect(parseConfig({})).toEqual({
      root: "C",
      formula: "maj",
      mode: "chord",
      noteValue: 4,
      instrument: "acoustic-piano",
      octave: 0,
      velocityMode: "normal",
      volume: 100,
      reverb: { room: 0.5, damping: 0.5, level: 0.5 },
      tempo: 120,
      tacts: 4,
      beatsPerTact: 4,
      loop: false,
      includeVelocity: true,
    });
  });

  it("treats a missing config as empty", () => {
    expect(parseConfig(undefined)).toEqual(parseConfig({}));
  });

  it("keeps given values", () => {
    const config = parseConfig({
      root: "Eb",
      formula: "m7",
      progression: "ii-V-I",
      mode: "up-down",
      noteValue: 8,
      octave: -1,
      velocity: 64,
      reverb: { level: 0.2 },
      tempo: 95.5,
      seed: 7,
      loop: true,
    });
    expect(config).toMatchObject({
      root: "Eb",
      formula: "m7",
      progression: "ii-V-I",
      mode: "up-down",
      noteValue: 8,
      octave: -1,
      velocity: 64,
      reverb: { room: 0.5, damping: 0.5, level: 0.2 },
      tempo: 95.5,
      seed: 7,
      loop: true,
    });
  });

  it("rejects out-of-range values instead of clamping", () => {
    expect(issuesOf({ tempo: 500 })).toEqual(["tempo: Number must be less than or equal to 300"]);
    expect(issuesOf({ volume: 0 })).toEqual(["volume: Number must be greater than or equal to 1"]);
    expect(issuesOf({ reverb: { level: 2 } })).toEqual(["reverb.level: Number must be less than or equal to 1"]);
  });

  it("rejects note values that are not note denominators", () => {
    expect(issuesOf({ noteValue: 3 })).toEqual(["noteValue: noteValue must be one of 1, 2, 4, 8, 16"]);
  });

  it("lists every bad field", () => {
    const issues = issuesOf({ tempo: 10, tacts: 0, octave: 5 });
    expect(issues).toHaveLength(3);
    expect(issues.map((i) => i.split(":")[0]).sort()).toEqual(["octave", "tacts", "tempo"]);
  });

  it("rejects non-integer counts", () => {
    expect(issuesOf({ tacts: 1.5 })).toEqual(["tacts: Expected integer, received float"]);
  });

  it("rejects unknown modes", () => {
    expect(issuesOf({ mode: "sideways" })).toHaveLength(1);
    expect(issuesOf({ velocityMode: "loud" })).toHaveLength(1);
  });

  it("rejects unknown keys", () => {
    const [issue] = issuesOf({ colour: "red" });
    expect(issue).toMatch(/^\(top level\): Unrecognized key/);
  });

  it("throws ConfigError with code InvalidConfig", () => {
    expect(() => parseConfig({ tempo: "fast" })).toThrow(ConfigError);
    try {
      parseConfig({ tempo: "fast" });
    } catch (err) {
      expect(err).toMatchObject({ code: "InvalidConfig" });
    }
  });
});

describe("validateConfig", () => {
  it("returns no issues for a valid config", () => {
    expect(validateConfig({ root: "A", formula: "m" })).toEqual([]);
  });

  it("returns issues instead of throwing", () => {
    expect(validateConfig({ volume: 128 })).toEqual(["volume: Number must be less than or equal to 127"]);
  });
});
