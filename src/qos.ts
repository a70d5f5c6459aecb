import type { CotWireConfig } from "./config";

export type PacingMode = "yield" | "fixed" | "dos-avoidance";

export interface PacingOptions {
  mode: PacingMode;
  /** Seconds between sends in `fixed` mode. */
  sleepSeconds?: number;
  /** Upper bound in seconds for the random pause in `dos-avoidance` mode. */
  maxSleepSeconds?: number;
  /** Minimum pause per iteration, in milliseconds. */
  minYieldMs?: number;
}

/** Sleeps for `ms`, resolving early (never rejecting) when `signal` aborts. */
export const delay = (ms: number, signal?: AbortSignal) =>
  new Promise<void>(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Decides how long a worker pauses after each unit of work. `yield` only
 * gives the event loop a turn; `fixed` waits a constant interval;
 * `dos-avoidance` waits a uniformly random interval so a burst of senders
 * does not hit a server in lockstep.
 */
export class Pacer {
  readonly mode: PacingMode;
  private readonly sleepMs: number;
  private readonly maxSleepMs: number;
  private readonly minYieldMs: number;
  private readonly random: () => number;

  constructor(options: PacingOptions, random: () => number = Math.random) {
    this.mode = options.mode;
    this.sleepMs = Math.max(0, (options.sleepSeconds ?? 0) * 1000);
    this.maxSleepMs = Math.max(0, (options.maxSleepSeconds ?? 0) * 1000);
    this.minYieldMs = Math.max(0, options.minYieldMs ?? 0);
    this.random = random;
  }

  /** Pause after a completed send. */
  nextDelayMs(): number {
    switch (this.mode) {
      case "fixed":
        return Math.max(this.sleepMs, this.minYieldMs);
      case "dos-avoidance":
        return Math.max(this.random() * this.maxSleepMs, this.minYieldMs);
      default:
        return this.minYieldMs;
    }
  }

  /** Pause when an iteration found nothing to do. */
  idleDelayMs(): number {
    return this.minYieldMs;
  }

  pace(signal?: AbortSignal): Promise<void> {
    return delay(this.nextDelayMs(), signal);
  }

  yield(signal?: AbortSignal): Promise<void> {
    return delay(this.idleDelayMs(), signal);
  }
}

/** `PYTAK_SLEEP` wins over `FTS_COMPAT`; neither set means plain yielding. */
export function pacingFromConfig(
  config: Pick<
    CotWireConfig,
    "FTS_COMPAT" | "FTS_COMPAT_MAX_SLEEP" | "PYTAK_SLEEP" | "PYTAK_MIN_YIELD_MS"
  >,
): PacingOptions {
  const minYieldMs = config.PYTAK_MIN_YIELD_MS;
  if (config.PYTAK_SLEEP > 0) {
    return { mode: "fixed", sleepSeconds: config.PYTAK_SLEEP, minYieldMs };
  }
  if (config.FTS_COMPAT) {
    return {
      mode: "dos-avoidance",
      maxSleepSeconds: config.FTS_COMPAT_MAX_SLEEP,
      minYieldMs,
    };
  }
  return { mode: "yield", minYieldMs };
}
