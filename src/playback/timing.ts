// ─── Timing & Clocks ─────────────────────────────────────────────────────────
//
// Beat → wall-clock conversion, and the clocks the scheduler waits on.
// The system clock sleeps on node:timers/promises with an AbortSignal, so a
// pending wait ends the moment playback is stopped. The manual clock only
// moves when told to, which lets tests step through playback without a
// real timer.
// ─────────────────────────────────────────────────────────────────────────────

import { setTimeout as delay } from "node:timers/promises";
import { performance } from "node:perf_hooks";

/** Seconds per beat at a tempo. */
export function secondsPerBeat(tempo: number): number {
  return 60 / tempo;
}

/** Beats → milliseconds at a tempo. */
export function beatsToMs(beats: number, tempo: number): number {
  return beats * secondsPerBeat(tempo) * 1000;
}

/** Time source plus an interruptible wait. */
export interface Clock {
  /** Milliseconds since an arbitrary origin. */
  now(): number;
  /** Resolve after `ms`, or reject once `signal` aborts. */
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  async sleep(ms, signal) {
    await delay(ms, undefined, { signal });
  },
};

// ─── Manual Clock ───────────────────────────────────────────────────────────

interface PendingSleep {
  target: number;
  resolve: () => void;
}

/** A clock driven by `advance()`. */
export interface ManualClock extends Clock {
  /**
   * Move time forward, waking sleepers in order and letting the code they
   * release run before moving on.
   */
  advance(ms: number): Promise<void>;
  /** Number of sleeps currently waiting. */
  pending(): number;
}

export function createManualClock(start = 0): ManualClock {
  let time = start;
  const sleepers = new Set<PendingSleep>();

  const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

  return {
    now: () => time,

    sleep(ms, signal) {
      return new Promise<void>((resolve, reject) => {
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        const entry: PendingSleep = {
          target: time + Math.max(0, ms),
          resolve: () => {
            signal.removeEventListener("abort", onAbort);
            resolve();
          },
        };
        const onAbort = () => {
          sleepers.delete(entry);
          reject(signal.reason);
        };
        signal.addEventListener("abort", onAbort, { once: true });
        sleepers.add(entry);
      });
    },

    async advance(ms) {
      const end = time + ms;
      await settle();
      for (;;) {
        let next: PendingSleep | undefined;
        for (const s of sleepers) {
          if (s.target <= end && (!next || s.target < next.target)) next = s;
        }
        if (!next) break;
        sleepers.delete(next);
        time = Math.max(time, next.target);
        next.resolve();
        await settle();
      }
      time = end;
      await settle();
    },

    pending: () => sleepers.size,
  };
}
