/**
 * Terminal reasons recorded by a scope when it fires.
 *
 * A scope fires exactly once, with exactly one of these. Shared instances
 * (`canceled`, `deadlineExceeded`) are what the derivation functions record,
 * so identity comparison works as well as the guards below.
 */
export type ScopeErrorKind = "canceled" | "deadline-exceeded";

export abstract class ScopeError extends Error {
  abstract readonly kind: ScopeErrorKind;
}

/** Recorded when a scope's cancel function runs first. */
export class CanceledError extends ScopeError {
  readonly kind = "canceled" as const;

  constructor() {
    super("[Scopeline] scope canceled");
    this.name = "CanceledError";
  }
}

/** Recorded when a scope's deadline elapses before it is cancelled. */
export class DeadlineExceededError extends ScopeError {
  readonly kind = "deadline-exceeded" as const;
  readonly timeout = true as const;

  constructor() {
    super("[Scopeline] scope deadline exceeded");
    this.name = "DeadlineExceededError";
  }
}

export const canceled: CanceledError = new CanceledError();
export const deadlineExceeded: DeadlineExceededError = new DeadlineExceededError();

export function isScopeError(value: unknown): value is ScopeError {
  return value instanceof ScopeError;
}

export function isCanceled(value: unknown): value is CanceledError {
  return value instanceof CanceledError;
}

export function isDeadlineExceeded(value: unknown): value is DeadlineExceededError {
  return value instanceof DeadlineExceededError;
}

/** Normalizes unknown throws (abort reasons, listener failures) into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
