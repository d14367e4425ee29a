/**
 * Testing utilities for deadline-driven code.
 * @internal
 */
import type { Clock } from '../core/config.js';
import { __resetWarningsForTests } from '../core/dev.js';

export function resetWarnings(): void {
  __resetWarningsForTests();
}

export interface ManualClock extends Clock {
  /** Move time forward, running every timer that falls due, in due order. */
  advance(ms: number): void;
  /** Number of scheduled callbacks not yet run or cancelled. */
  pending(): number;
}

interface ManualTimer {
  at: number;
  seq: number;
  fn: () => void;
}

/**
 * A clock that only moves when told to. Timers scheduled for the same
 * instant run in scheduling order; timers scheduled by a running callback
 * run in the same `advance()` if they fall due within it.
 */
export function createManualClock(start = 0): ManualClock {
  let now = start;
  let seq = 0;
  const timers = new Set<ManualTimer>();

  const nextDue = (limit: number): ManualTimer | null => {
    let next: ManualTimer | null = null;
    for (const timer of timers) {
      if (timer.at > limit) continue;
      if (!next || timer.at < next.at || (timer.at === next.at && timer.seq < next.seq)) {
        next = timer;
      }
    }
    return next;
  };

  return {
    now: () => now,

    schedule(fn, delayMs) {
      const timer: ManualTimer = { at: now + Math.max(0, delayMs), seq: seq++, fn };
      timers.add(timer);
      return () => {
        timers.delete(timer);
      };
    },

    advance(ms) {
      const target = now + ms;
      let timer = nextDue(target);
      while (timer) {
        timers.delete(timer);
        now = Math.max(now, timer.at);
        timer.fn();
        timer = nextDue(target);
      }
      now = target;
    },

    pending: () => timers.size,
  };
}
