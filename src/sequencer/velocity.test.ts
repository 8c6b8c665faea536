import { describe, it, expect } from "vitest";
import { createRng } from "../utils/rng.js";
import { resolveVelocity } from "./velocity.js";

describe("resolveVelocity", () => {
  const rng = createRng(1);

  it("scales the volume by mode", () => {
    expect(resolveVelocity("light", 100, rng)).toBe(50);
    expect(resolveVelocity("normal", 100, rng)).toBe(75);
    expect(resolveVelocity("strong", 100, rng)).toBe(100);
  });

  it("rounds down", () => {
    expect(resolveVelocity("light", 101, rng)).toBe(50);
    expect(resolveVelocity("normal", 127, rng)).toBe(95);
  });

  it("never goes below 1", () => {
    expect(resolveVelocity("light", 1, rng)).toBe(1);
    expect(resolveVelocity("normal", 1, rng)).toBe(1);
    expect(resolveVelocity("dynamic", 1, rng)).toBe(1);
  });

  it("draws dynamic velocity between half and full volume", () => {
    for (let seed = 0; seed < 50; seed++) {
      const v = resolveVelocity("dynamic", 100, createRng(seed));
      expect(v).toBeGreaterThanOrEqual(50);
      expect(v).toBeLessThanOrEqual(100);
    }
  });

  it("repeats dynamic velocity for the same seed", () => {
    expect(resolveVelocity("dynamic", 120, createRng(9))).toBe(resolveVelocity("dynamic", 120, createRng(9)));
  });
});
