import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors.js";
import {
  parsePitchClass,
  pitchClassName,
  midiToNoteName,
  formatPitchGroup,
  chordSymbol,
  mod12,
} from "./notes.js";

describe("parsePitchClass", () => {
  it("parses naturals", () => {
    expect(parsePitchClass("C")).toBe(0);
    expect(parsePitchClass("E")).toBe(4);
    expect(parsePitchClass("B")).toBe(11);
  });

  it("handles sharps: F# = 6", () => {
    expect(parsePitchClass("F#")).toBe(6);
    expect(parsePitchClass("C♯")).toBe(1);
  });

  it("handles flats: Bb = 10", () => {
    expect(parsePitchClass("Bb")).toBe(10);
    expect(parsePitchClass("E♭")).toBe(3);
  });

  it("wraps across C: B# = 0, Cb = 11", () => {
    expect(parsePitchClass("B#")).toBe(0);
    expect(parsePitchClass("Cb")).toBe(11);
  });

  it("ignores letter case and surrounding whitespace", () => {
    expect(parsePitchClass("c#")).toBe(1);
    expect(parsePitchClass(" g ")).toBe(7);
  });

  it("rejects unknown names with InvalidNoteName", () => {
    for (const bad of ["H", "C##", "", "Do", "C4"]) {
      try {
        parsePitchClass(bad);
        expect.unreachable(`"${bad}" should not parse`);
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        expect(err).toMatchObject({ code: "InvalidNoteName" });
      }
    }
  });
});

describe("midiToNoteName", () => {
  it("converts 60 to C4 (middle C)", () => {
    expect(midiToNoteName(60)).toBe("C4");
  });

  it("converts 69 to A4", () => {
    expect(midiToNoteName(69)).toBe("A4");
  });

  it("covers the MIDI range ends", () => {
    expect(midiToNoteName(0)).toBe("C-1");
    expect(midiToNoteName(127)).toBe("G9");
  });

  it("spells black keys with sharps", () => {
    expect(midiToNoteName(70)).toBe("A#4");
  });
});

describe("formatPitchGroup", () => {
  it("joins note names for the played-notes readout", () => {
    expect(formatPitchGroup([60, 64, 67])).toBe("C4, E4, G4");
  });

  it("returns an empty string for an empty group", () => {
    expect(formatPitchGroup([])).toBe("");
  });
});

describe("chordSymbol", () => {
  it("joins root and formula id", () => {
    expect(chordSymbol(2, { id: "m7", name: "Minor 7th", kind: "chord", intervals: [0, 3, 7, 10] })).toBe("Dm7");
  });
});

describe("pitchClassName / mod12", () => {
  it("wraps negative and large values", () => {
    expect(mod12(-1)).toBe(11);
    expect(mod12(25)).toBe(1);
    expect(pitchClassName(13)).toBe("C#");
  });
});
