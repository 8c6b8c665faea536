// Velocity presets from a master volume. One value per sequencing call.

import type { Rng } from "../utils/rng.js";

export const VELOCITY_MODES = ["light", "normal", "strong", "dynamic"] as const;
export type VelocityMode = (typeof VELOCITY_MODES)[number];

/**
 * light = 50%, normal = 75%, strong = 100% of volume,
 * dynamic = random between 50% and 100%. Never below 1.
 */
export function resolveVelocity(mode: VelocityMode, volume: number, rng: Rng): number {
  const soft = Math.max(1, Math.floor(volume * 0.5));
  switch (mode) {
    case "light":
      return soft;
    case "normal":
      return Math.max(1, Math.floor(volume * 0.75));
    case "strong":
      return Math.max(1, volume);
    case "dynamic":
      return rng.int(soft, Math.max(soft, volume));
  }
}
