// ─── Engine Config Schema ────────────────────────────────────────────────────
//
// Every knob the interface layer can turn, with its valid range and default.
// Out-of-range values are rejected, never clamped.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { ConfigError } from "../errors.js";
import { PLAYBACK_MODES } from "../sequencer/arrange.js";
import { VELOCITY_MODES } from "../sequencer/velocity.js";
import { formatIssues } from "../theory/schema.js";

/** Note denominators offered for the step length. */
export const NOTE_VALUES = [1, 2, 4, 8, 16] as const;

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const ReverbSchema = z.object({
  room: z.number().min(0).max(1).default(0.5),
  damping: z.number().min(0).max(1).default(0.5),
  level: z.number().min(0).max(1).default(0.5),
});

export const EngineConfigSchema = z
  .object({
    root: z.string().min(1).default("C"),
    formula: z.string().min(1).default("maj"),
    chordSize: z.number().int().min(1).max(12).optional(),
    progression: z.string().min(1).optional(),
    mode: z.enum(PLAYBACK_MODES).default("chord"),
    noteValue: z
      .number()
      .refine((v) => NOTE_VALUES.some((n) => n === v), {
        message: `noteValue must be one of ${NOTE_VALUES.join(", ")}`,
      })
      .default(4),
    instrument: z.string().min(1).default("acoustic-piano"),
    octave: z.number().int().min(-4).max(4).default(0),
    velocityMode: z.enum(VELOCITY_MODES).default("normal"),
    volume: z.number().int().min(1).max(127).default(100),
    velocity: z.number().int().min(1).max(127).optional(),
    reverb: ReverbSchema.default({}),
    tempo: z.number().min(20).max(300).default(120),
    tacts: z.number().int().min(1).max(32).default(4),
    beatsPerTact: z.number().int().min(1).max(12).default(4),
    seed: z.number().int().min(0).optional(),
    loop: z.boolean().default(false),
    output: z.string().min(1).optional(),
    /** false writes every note at velocity 100 on export. */
    includeVelocity: z.boolean().default(true),
  })
  .strict();

// ─── Derived Types ───────────────────────────────────────────────────────────

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type ReverbConfig = z.infer<typeof ReverbSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate and default a config object.
 * Throws ConfigError("InvalidConfig") listing every bad field.
 */
export function parseConfig(input: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError("InvalidConfig", `Invalid settings:\n  ${issues.join("\n  ")}`, issues);
  }
  return result.data;
}

/**
 * Validate without throwing. Returns the issues (empty = valid).
 */
export function validateConfig(input: unknown): string[] {
  const result = EngineConfigSchema.safeParse(input ?? {});
  return result.success ? [] : formatIssues(result.error);
}
