// ─── chordcraft: Session ─────────────────────────────────────────────────────
//
// The surface the interface layer talks to. One session owns one scheduler
// and one synthesizer, and maps the five controls of the tool onto the
// engine:
//
//   ▶ Chord        playChord(settings)
//   ▶ Progression  playProgression(settings)
//   ⏹ Stop         stop()
//   Chord MIDI     exportChord(settings, path)
//   Prog MIDI      exportProgression(settings, path)
//
// Settings are validated on every call and a fresh Timeline is built each
// time; nothing is remembered between requests.
// ─────────────────────────────────────────────────────────────────────────────

import { ConfigError, PlaybackDeviceError, errorMessage } from "./errors.js";
import type { Synthesizer, Timeline } from "./types.js";
import { parseConfig, type EngineConfig } from "./config/schema.js";
import { buildTimeline, reverbControls, type BuiltTimeline } from "./config/timeline.js";
import { encodeTimeline, exportTimeline, withFlatVelocity } from "./midi/writer.js";
import {
  PlaybackScheduler,
  type PlaybackResult,
  type SchedulerEventType,
  type SchedulerListener,
  type SchedulerState,
} from "./playback/scheduler.js";
import type { Clock } from "./playback/timing.js";
import { stepsPerChord } from "./sequencer/arrange.js";
import { estimateDurationSeconds, isEmptyTimeline, timelineDurationSeconds } from "./sequencer/sequencer.js";
import { getCatalog, type Catalog } from "./theory/catalog.js";
import { formatPitchGroup } from "./theory/notes.js";
import { randomSeed } from "./utils/rng.js";

export interface ChordSessionOptions {
  /** Theory tables. Default: the bundled data/ catalog. */
  catalog?: Catalog;
  /** Scheduler clock. Default: system clock. */
  clock?: Clock;
  /** MIDI channel. Default: 0. */
  channel?: number;
}

export interface ExportResult {
  path: string;
  symbol: string;
  byteLength: number;
  noteCount: number;
  durationSeconds: number;
}

/**
 * Create a session bound to a synthesizer.
 */
export function createChordSession(synth: Synthesizer, options: ChordSessionOptions = {}): ChordSession {
  return new ChordSession(synth, options.catalog ?? getCatalog(), options);
}

export class ChordSession {
  readonly scheduler: PlaybackScheduler;

  constructor(
    private readonly synth: Synthesizer,
    readonly catalog: Catalog,
    options: ChordSessionOptions = {}
  ) {
    this.scheduler = new PlaybackScheduler(synth, {
      clock: options.clock,
      channel: options.channel,
    });
  }

  get state(): SchedulerState {
    return this.scheduler.state;
  }

  /** Subscribe to scheduler events. Returns an unsubscribe function. */
  on(type: SchedulerEventType | "*", listener: SchedulerListener): () => void {
    return this.scheduler.on(type, listener);
  }

  /** Hand a soundfont to the synthesizer. */
  async loadSoundFont(path: string): Promise<void> {
    try {
      await this.synth.loadSoundFont(path);
    } catch (err) {
      throw new PlaybackDeviceError(`Could not load soundfont ${path}: ${errorMessage(err)}`, err);
    }
  }

  // ─── Playback ───────────────────────────────────────────────────────────

  /** Play the selected chord, ignoring any progression. */
  async playChord(settings: unknown): Promise<PlaybackResult> {
    return this.playBuilt(this.build(settings, false));
  }

  /** Play the selected progression with the selected chord type. */
  async playProgression(settings: unknown): Promise<PlaybackResult> {
    return this.playBuilt(this.build(settings, true));
  }

  /** Stop playback, releasing every sounding note. */
  stop(): void {
    this.scheduler.stop();
  }

  // ─── Export ─────────────────────────────────────────────────────────────

  async exportChord(settings: unknown, path?: string): Promise<ExportResult> {
    return this.exportBuilt(this.build(settings, false), path);
  }

  async exportProgression(settings: unknown, path?: string): Promise<ExportResult> {
    return this.exportBuilt(this.build(settings, true), path);
  }

  /** MIDI bytes for the given settings without touching the filesystem. */
  encode(settings: unknown, withProgression?: boolean): Uint8Array {
    const config = parseConfig(settings);
    const built = buildTimeline(config, this.catalog, withProgression);
    return encodeTimeline(exportedTimeline(config, built), config.tempo);
  }

  // ─── Info ───────────────────────────────────────────────────────────────

  /** Human-readable summary of what the settings would play. */
  describe(settings: unknown): string {
    const config = parseConfig(settings);
    const built = buildTimeline(config, this.catalog);
    const instrument = this.catalog.instrument(config.instrument);
    const formula = this.catalog.formula(config.formula);
    const steps = built.chords.reduce((n, c) => n + stepsPerChord(c.length, config.mode), 0);

    const lines = [
      `Chord: ${built.symbol} (${formula.name})`,
      config.progression
        ? `Progression: ${this.catalog.progression(config.progression).name} (${config.progression})`
        : `Progression: none`,
      `Notes: ${built.chords.map((c) => formatPitchGroup(c)).join(" | ")}`,
      `Mode: ${config.mode} (${steps} step(s) per cycle) | Note value: 1/${config.noteValue}`,
      `Instrument: ${instrument.name} (program ${instrument.program}) | Velocity: ${velocityLabel(config)}`,
      `Tempo: ${config.tempo} BPM | Length: ${config.tacts} tact(s) of ${config.beatsPerTact} | ` +
        `Duration: ${estimateDurationSeconds(config.tempo, config.tacts, config.beatsPerTact).toFixed(1)}s`,
    ];
    if (usesRandom(config)) lines.push(`Seed: ${built.seed}`);
    return lines.join("\n");
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  private build(settings: unknown, withProgression: boolean): { config: EngineConfig; built: BuiltTimeline } {
    const config = parseConfig(settings);
    return { config, built: buildTimeline(config, this.catalog, withProgression) };
  }

  private async playBuilt({ config, built }: { config: EngineConfig; built: BuiltTimeline }): Promise<PlaybackResult> {
    if (isEmptyTimeline(built.timeline)) {
      return { reason: "completed", notesPlayed: 0, passes: 0 };
    }
    return this.scheduler.play(built.timeline, {
      controls: reverbControls(config.reverb),
      loop: config.loop,
    });
  }

  private async exportBuilt(
    { config, built }: { config: EngineConfig; built: BuiltTimeline },
    path: string | undefined
  ): Promise<ExportResult> {
    const target = path ?? config.output;
    if (!target) {
      throw new ConfigError("InvalidConfig", "No export destination given");
    }
    const timeline = exportedTimeline(config, built);
    await exportTimeline(timeline, config.tempo, target);
    return {
      path: target,
      symbol: built.symbol,
      byteLength: encodeTimeline(timeline, config.tempo).length,
      noteCount: built.timeline.events.length,
      durationSeconds: timelineDurationSeconds(built.timeline),
    };
  }
}

/**
 * Settings with a concrete seed. Passing the result to both describe() and a
 * play call makes the summary match the random choices that play.
 */
export function pinSeed(settings: Record<string, unknown>): Record<string, unknown> {
  return settings.seed === undefined ? { ...settings, seed: randomSeed() } : settings;
}

/**
 * A stop() for signal handlers: a release failure goes to `report` instead of
 * escaping as an uncaught exception.
 */
export function createInterruptHandler(session: ChordSession, report: (err: unknown) => void): () => void {
  return () => {
    try {
      session.stop();
    } catch (err) {
      report(err);
    }
  };
}

function usesRandom(config: EngineConfig): boolean {
  return config.mode === "random" || (config.velocity === undefined && config.velocityMode === "dynamic");
}

function exportedTimeline(config: EngineConfig, built: BuiltTimeline): Timeline {
  return config.includeVelocity ? built.timeline : withFlatVelocity(built.timeline);
}

function velocityLabel(config: EngineConfig): string {
  return config.velocity !== undefined ? String(config.velocity) : `${config.velocityMode} @ ${config.volume}`;
}
