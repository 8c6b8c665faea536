// ─── Theory Table Schema ─────────────────────────────────────────────────────
//
// Shape of the static JSON tables under data/. Tables are validated once at
// load time; everything after that works with the frozen, typed result.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { FORMULA_KINDS } from "../types.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

const idSchema = z.string().min(1).regex(/^\S+$/, "id must not contain whitespace");

export const FormulaSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  kind: z.enum(FORMULA_KINDS),
  intervals: z
    .array(z.number().int().min(0).max(48))
    .min(1)
    .refine((xs) => xs[0] === 0, "intervals must start at the root (0)"),
});

export const ProgressionSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  scale: idSchema.optional(),
  steps: z.array(z.string().min(1)).min(1),
});

export const InstrumentSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  program: z.number().int().min(0).max(127),
});

export const FormulaTableSchema = z.array(FormulaSchema).min(1);
export const ProgressionTableSchema = z.array(ProgressionSchema).min(1);
export const InstrumentTableSchema = z.array(InstrumentSchema).min(1);

/**
 * Flatten zod issues into "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(top level)"}: ${issue.message}`);
}
