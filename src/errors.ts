// ─── chordcraft: Errors ──────────────────────────────────────────────────────
//
// Three failure families, all recoverable by the caller:
//   ConfigError          bad input or unknown theory identifiers
//   PlaybackDeviceError  the synthesizer rejected a call
//   IOError              a MIDI export could not be written
// ─────────────────────────────────────────────────────────────────────────────

export type ConfigErrorCode =
  | "InvalidConfig"
  | "InvalidCatalog"
  | "UnknownFormula"
  | "UnknownProgression"
  | "UnknownInstrument"
  | "InvalidNoteName"
  | "InvalidProgressionStep";

export class ChordcraftError extends Error {
  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ChordcraftError";
  }
}

export class ConfigError extends ChordcraftError {
  declare readonly code: ConfigErrorCode;

  constructor(
    code: ConfigErrorCode,
    message: string,
    /** Individual problems, one per invalid field. */
    readonly issues: readonly string[] = []
  ) {
    super(message, code);
    this.name = "ConfigError";
  }
}

export class PlaybackDeviceError extends ChordcraftError {
  constructor(message: string, cause?: unknown) {
    super(message, "PlaybackDevice", { cause });
    this.name = "PlaybackDeviceError";
  }
}

export class IOError extends ChordcraftError {
  constructor(
    message: string,
    readonly path: string,
    cause?: unknown
  ) {
    super(message, "IO", { cause });
    this.name = "IOError";
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
