import { toError } from "./errors.js";
import { getScopeConfig } from "./config.js";
import { reportScopeError } from "./dev.js";
import { notifyScopeCreate } from "./lifecycle.js";
import {
  CancelScope,
  DetachedScope,
  ValueScope,
  isScopeLike,
  type Scope,
} from "./scope.js";
import type { ScopeKey } from "../context/key.js";

/**
 * Releases a cancel-capable scope. Idempotent.
 *
 * Must be called by whoever created the scope, on every exit path (success
 * included): it is what drops the parent subscription and the pending timer.
 */
export type CancelFn = () => void;

/** Like `CancelFn`, but records `cause` (see `causeOf`) when it is the first to fire. */
export type CancelCauseFn = (cause?: Error) => void;

function assertParent(parent: unknown, caller: string): asserts parent is Scope {
  if (!isScopeLike(parent)) {
    throw new TypeError(
      `[Scopeline] ${caller}() requires a parent scope. ` +
        `Use background() as the root of a new tree.`
    );
  }
}

/** Largest magnitude a Date can hold, in epoch milliseconds. */
const MAX_DATE_MS = 8.64e15;

function toEpochMs(at: Date | number, caller: string): number {
  const ms = at instanceof Date ? at.getTime() : at;
  if (typeof ms !== "number" || !Number.isFinite(ms) || Math.abs(ms) > MAX_DATE_MS) {
    throw new RangeError(`[Scopeline] ${caller}() received an invalid deadline: ${String(at)}.`);
  }
  return ms;
}

function startCancelScope(parent: Scope, segment: string, deadlineAt: number | null): CancelScope {
  const scope = new CancelScope(parent, segment, deadlineAt);
  notifyScopeCreate(scope);
  // Parent first: a parent that already fired wins over an elapsed deadline.
  scope.link();
  scope.arm();
  return scope;
}

/**
 * Derive a scope that fires with `CanceledError` when `cancel()` is called,
 * or with the parent's reason when the parent fires.
 *
 * @example
 * ```ts
 * const [scope, cancel] = withCancel(background());
 * try {
 *   await Promise.all(workers.map((w) => w(scope)));
 * } finally {
 *   cancel();
 * }
 * ```
 */
export function withCancel(parent: Scope): [Scope, CancelFn] {
  assertParent(parent, "withCancel");
  const scope = startCancelScope(parent, "withCancel", null);
  return [scope, () => scope.cancel()];
}

/**
 * Like `withCancel`, but the cancel function accepts the error that explains
 * why. `err()` still reports `CanceledError`; `causeOf(scope)` reports the cause.
 */
export function withCancelCause(parent: Scope): [Scope, CancelCauseFn] {
  assertParent(parent, "withCancelCause");
  const scope = startCancelScope(parent, "withCancel", null);
  return [scope, (cause?: Error) => scope.cancel(cause)];
}

/**
 * Derive a scope that fires with `DeadlineExceededError` at `at` (a Date or
 * epoch milliseconds), unless it is cancelled or its parent fires first.
 *
 * The effective deadline is never later than the parent's: when the parent's
 * deadline comes first, no timer is armed and the parent's fire reaches this
 * scope. An instant already in the past fires the scope before it is returned.
 */
export function withDeadline(parent: Scope, at: Date | number): [Scope, CancelFn] {
  assertParent(parent, "withDeadline");
  const atMs = toEpochMs(at, "withDeadline");

  const inherited = parent.deadline();
  const ownDeadline = inherited !== null && inherited.getTime() <= atMs ? null : atMs;

  const scope = startCancelScope(parent, "withDeadline", ownDeadline);
  return [scope, () => scope.cancel()];
}

/**
 * `withDeadline(parent, now + ms)`.
 *
 * @example
 * ```ts
 * const [scope, cancel] = withTimeout(background(), 5_000);
 * try {
 *   return await race(scope, (signal) => fetch(url, { signal }));
 * } finally {
 *   cancel();
 * }
 * ```
 */
export function withTimeout(parent: Scope, ms: number): [Scope, CancelFn] {
  assertParent(parent, "withTimeout");
  if (typeof ms !== "number" || !Number.isFinite(ms) || ms < 0) {
    throw new RangeError(
      `[Scopeline] withTimeout() expects a non-negative duration in milliseconds, got ${String(ms)}.`
    );
  }
  const at = getScopeConfig().clock.now() + ms;
  if (at > MAX_DATE_MS) {
    throw new RangeError(
      `[Scopeline] withTimeout() duration ${ms} ms puts the deadline past the latest representable Date.`
    );
  }
  const [scope, cancel] = withDeadline(parent, at);
  return [scope, cancel];
}

/**
 * Derive a view of `parent` that also binds `key` to `value`.
 * It is done exactly when the parent is and needs no release.
 */
export function withValue<T>(parent: Scope, key: ScopeKey<T>, value: T): Scope {
  assertParent(parent, "withValue");
  if (!key || typeof key.readFrom !== "function") {
    throw new TypeError("[Scopeline] withValue() requires a key created with createKey().");
  }
  const scope = new ValueScope(parent, key, value);
  notifyScopeCreate(scope);
  return scope;
}

/**
 * Derive a scope that keeps `parent`'s values but never fires and has no
 * deadline, for work that must outlive the operation that started it.
 */
export function withoutCancel(parent: Scope): Scope {
  assertParent(parent, "withoutCancel");
  const scope = new DetachedScope(parent);
  notifyScopeCreate(scope);
  return scope;
}

/**
 * Derive a cancel scope that also fires when `signal` aborts. The abort
 * reason becomes the scope's cause.
 */
export function withAbortSignal(parent: Scope, signal: AbortSignal): [Scope, CancelFn] {
  assertParent(parent, "withAbortSignal");
  const [scope, cancel] = withCancelCause(parent);

  if (signal.aborted) {
    cancel(toError(signal.reason));
    return [scope, () => cancel()];
  }

  const onAbort = () => cancel(toError(signal.reason));
  signal.addEventListener("abort", onAbort, { once: true });
  scope.onDone(() => signal.removeEventListener("abort", onAbort));
  return [scope, () => cancel()];
}

/**
 * Run `fn` once, after `scope` fires (immediately if it already has).
 *
 * Returns `stop()`, which deregisters `fn` and returns true if that prevented
 * the call; false once `fn` has run or was already stopped.
 */
export function afterDone(scope: Scope, fn: () => void): () => boolean {
  assertParent(scope, "afterDone");
  let state: "pending" | "ran" | "stopped" = "pending";

  const unsubscribe = scope.onDone(() => {
    if (state !== "pending") return;
    state = "ran";
    try {
      fn();
    } catch (err) {
      reportScopeError(err, "afterDone() callback");
    }
  });

  return () => {
    if (state !== "pending") return false;
    state = "stopped";
    unsubscribe();
    return true;
  };
}
