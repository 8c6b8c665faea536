// ─── Theory Catalog ──────────────────────────────────────────────────────────
//
// Read-only lookup of chord/scale formulas, progressions and instruments.
// Loaded from the JSON tables in data/ once per process; nothing mutates it
// afterwards.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { z } from "zod";
import { ConfigError } from "../errors.js";
import type { Formula, FormulaKind, Instrument, Progression } from "../types.js";
import {
  FormulaTableSchema,
  InstrumentTableSchema,
  ProgressionTableSchema,
  formatIssues,
} from "./schema.js";
import { parseSteps } from "./steps.js";

/** data/ at the package root, from either src/theory or dist/theory. */
export const DEFAULT_DATA_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "data");

/** Scale used for degree steps when a progression names none. */
export const DEFAULT_REFERENCE_SCALE = "major";

export interface Catalog {
  /** Throws ConfigError("UnknownFormula") for unknown ids. */
  formula(id: string): Formula;
  /** Throws ConfigError("UnknownProgression") for unknown ids. */
  progression(id: string): Progression;
  /** Throws ConfigError("UnknownInstrument") for unknown ids. */
  instrument(id: string): Instrument;
  hasFormula(id: string): boolean;
  formulas(kind?: FormulaKind): readonly Formula[];
  progressions(): readonly Progression[];
  instruments(): readonly Instrument[];
  /** Distinct chord sizes (interval counts), ascending. */
  chordSizes(): number[];
  /** Chord formulas with exactly `size` intervals. */
  chordsOfSize(size: number): readonly Formula[];
}

/** Raw table contents, before validation. */
export interface CatalogTables {
  formulas: unknown;
  progressions: unknown;
  instruments: unknown;
}

/**
 * Load and validate the three tables from a directory.
 */
export function loadCatalog(dir: string = DEFAULT_DATA_DIR): Catalog {
  return createCatalog({
    formulas: readTable(dir, "formulas.json"),
    progressions: readTable(dir, "progressions.json"),
    instruments: readTable(dir, "instruments.json"),
  });
}

let defaultCatalog: Catalog | null = null;

/** The catalog from data/, loaded on first use. */
export function getCatalog(): Catalog {
  defaultCatalog ??= loadCatalog();
  return defaultCatalog;
}

/**
 * Build a catalog from already-parsed tables.
 * Validates shapes, duplicate ids, and progression steps/scales.
 */
export function createCatalog(tables: CatalogTables): Catalog {
  const formulaRecords = validate(FormulaTableSchema, tables.formulas, "formulas");
  const progressionRecords = validate(ProgressionTableSchema, tables.progressions, "progressions");
  const instrumentRecords = validate(InstrumentTableSchema, tables.instruments, "instruments");

  const formulas = indexById(
    formulaRecords.map((f): Formula => Object.freeze({ ...f, intervals: Object.freeze([...f.intervals]) })),
    "formulas"
  );

  const progressions = indexById(
    progressionRecords.map((p): Progression => {
      const scale = p.scale ?? DEFAULT_REFERENCE_SCALE;
      const reference = formulas.get(scale);
      if (!reference || reference.kind !== "scale" || reference.intervals.length < 7) {
        throw new ConfigError(
          "InvalidCatalog",
          `Progression "${p.id}" references "${scale}", which is not a seven-note scale`
        );
      }
      return Object.freeze({
        id: p.id,
        name: p.name,
        scale,
        steps: Object.freeze(parseSteps(p.steps)),
      });
    }),
    "progressions"
  );

  const instruments = indexById(
    instrumentRecords.map((i): Instrument => Object.freeze({ ...i })),
    "instruments"
  );

  const formulaList = Object.freeze([...formulas.values()]);
  const chords = formulaList.filter((f) => f.kind === "chord");

  return {
    formula(id) {
      const found = formulas.get(id);
      if (!found) {
        throw new ConfigError("UnknownFormula", `Unknown chord or scale: "${id}"`);
      }
      return found;
    },
    progression(id) {
      const found = progressions.get(id);
      if (!found) {
        throw new ConfigError("UnknownProgression", `Unknown progression: "${id}"`);
      }
      return found;
    },
    instrument(id) {
      const found = instruments.get(id);
      if (!found) {
        throw new ConfigError("UnknownInstrument", `Unknown instrument: "${id}"`);
      }
      return found;
    },
    hasFormula(id) {
      return formulas.has(id);
    },
    formulas(kind) {
      return kind ? formulaList.filter((f) => f.kind === kind) : formulaList;
    },
    progressions() {
      return [...progressions.values()];
    },
    instruments() {
      return [...instruments.values()];
    },
    chordSizes() {
      return [...new Set(chords.map((f) => f.intervals.length))].sort((a, b) => a - b);
    },
    chordsOfSize(size) {
      return chords.filter((f) => f.intervals.length === size);
    },
  };
}

// ─── Internal ────────────────────────────────────────────────────────────────

function readTable(dir: string, file: string): unknown {
  const filePath = join(dir, file);
  if (!existsSync(filePath)) {
    throw new ConfigError("InvalidCatalog", `Theory table not found: ${filePath}`);
  }
  try {
    return JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError(
      "InvalidCatalog",
      `Theory table ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, raw: unknown, table: string): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(
      "InvalidCatalog",
      `Invalid ${table} table:\n  ${issues.join("\n  ")}`,
      issues
    );
  }
  return result.data;
}

function indexById<T extends { id: string }>(items: T[], table: string): ReadonlyMap<string, T> {
  const map = new Map<string, T>();
  for (const item of items) {
    if (map.has(item.id)) {
      throw new ConfigError("InvalidCatalog", `Duplicate id in ${table}: "${item.id}"`);
    }
    map.set(item.id, item);
  }
  return map;
}
