import { getScopeConfig } from "./config.js";

/**
 * A single pending timer that calls back once an absolute instant elapses.
 *
 * Invariants:
 * - At most one host timer is pending per clock.
 * - `onElapsed` runs at most once, and never after `disarm()`.
 * - An instant that is already due fires synchronously inside `armDeadline()`
 *   without scheduling anything.
 */
export interface DeadlineClock {
  /** Absolute instant, in epoch milliseconds. */
  readonly at: number;
  /** True while a timer is pending. */
  readonly armed: boolean;
  /** Cancel the pending timer. Idempotent. */
  disarm(): void;
}

let armedClocks = 0;

/** Number of clocks currently holding a pending timer (leak diagnostics). */
export function activeDeadlineCount(): number {
  return armedClocks;
}

/**
 * Run `fn` once the clock reaches `at`. Host timers clamp long delays, so far
 * instants are reached in steps of at most `maxTimerDelayMs`. A due instant
 * still waits for the next timer turn. Returns an idempotent cancel function.
 */
export function scheduleAt(at: number, fn: () => void): () => void {
  const { clock, maxTimerDelayMs } = getScopeConfig();
  let active = true;
  let cancelTimer: (() => void) | null = null;

  const delayUntilDue = () => Math.min(Math.max(0, at - clock.now()), maxTimerDelayMs);

  const tick = () => {
    cancelTimer = null;
    if (!active) return;
    if (at - clock.now() > 0) {
      cancelTimer = clock.schedule(tick, delayUntilDue());
      return;
    }
    active = false;
    fn();
  };

  cancelTimer = clock.schedule(tick, delayUntilDue());

  return () => {
    if (!active) return;
    active = false;
    if (cancelTimer) {
      cancelTimer();
      cancelTimer = null;
    }
  };
}

export function armDeadline(at: number, onElapsed: () => void): DeadlineClock {
  if (at <= getScopeConfig().clock.now()) {
    onElapsed();
    return { at, armed: false, disarm() {} };
  }

  let armed = true;
  armedClocks++;

  const release = () => {
    armed = false;
    armedClocks--;
  };

  const cancelTimer = scheduleAt(at, () => {
    release();
    onElapsed();
  });

  return {
    at,
    get armed() {
      return armed;
    },
    disarm() {
      if (!armed) return;
      release();
      cancelTimer();
    },
  };
}
