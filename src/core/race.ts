import { getScopeConfig } from "./config.js";
import { scheduleAt } from "./deadline.js";
import type { Scope } from "./scope.js";

/**
 * Work raced against a scope: a promise already in flight, or a function
 * that starts it and receives the scope's AbortSignal.
 */
export type Work<T> = Promise<T> | ((signal: AbortSignal) => Promise<T>);

/**
 * Race `work` against `scope`.
 *
 * - Work settles first: resolves/rejects with the work's outcome.
 * - Scope fires first: rejects with `scope.err()`; the work's later outcome is ignored.
 * - Scope already fired: rejects at once and a work function is never called.
 *
 * The subscription on the scope is dropped in every case.
 *
 * @example
 * ```ts
 * try {
 *   const user = await race(scope, (signal) => loadUser(id, signal));
 * } catch (err) {
 *   if (isScopeError(err)) return abandon(err.kind);
 *   throw err;
 * }
 * ```
 */
export function race<T>(scope: Scope, work: Work<T>): Promise<T> {
  const err = scope.err();
  if (err) return Promise.reject(err);

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const stop = scope.onDone((reason) => {
      if (settled) return;
      settled = true;
      reject(reason);
    });

    let pending: Promise<T>;
    try {
      pending = typeof work === "function" ? work(scope.signal) : work;
    } catch (error) {
      settled = true;
      stop();
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        if (settled) return;
        settled = true;
        stop();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        settled = true;
        stop();
        reject(error);
      }
    );
  });
}

/**
 * Wait `ms` milliseconds, or reject with `scope.err()` as soon as the scope
 * fires. The timer is cleared either way. Durations beyond the host timer
 * limit are waited out in steps.
 */
export function sleep(scope: Scope, ms: number): Promise<void> {
  if (typeof ms !== "number" || !Number.isFinite(ms) || ms < 0) {
    return Promise.reject(
      new RangeError(`[Scopeline] sleep() expects a non-negative duration in milliseconds, got ${String(ms)}.`)
    );
  }
  const err = scope.err();
  if (err) return Promise.reject(err);

  const at = getScopeConfig().clock.now() + ms;
  return new Promise<void>((resolve, reject) => {
    let stop: () => void = () => {};
    const cancelTimer = scheduleAt(at, () => {
      stop();
      resolve();
    });
    stop = scope.onDone((reason) => {
      cancelTimer();
      reject(reason);
    });
  });
}

/** Throw `scope.err()` if the scope has fired; for synchronous checkpoints. */
export function throwIfDone(scope: Scope): void {
  const err = scope.err();
  if (err) throw err;
}
