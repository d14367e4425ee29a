import { toError } from "./errors.js";

let isDevMode = true;

export function setDevMode(enabled: boolean): void {
  isDevMode = enabled;
}

export function isInDevMode(): boolean {
  return isDevMode;
}

/**
 * Optional global handler for errors thrown by scope listeners
 * (`onDone`, `afterDone`, lifecycle hooks).
 *
 * A throwing listener never stops propagation. If no handler is set,
 * errors are logged to the console.
 *
 * @example
 * setScopeErrorHandler((err, src) => report(err, { source: src }));
 */
let scopeErrorHandler: ((error: Error, source: string) => void) | null = null;

export function setScopeErrorHandler(handler: ((error: Error, source: string) => void) | null): void {
  scopeErrorHandler = handler;
}

export function reportScopeError(error: unknown, source: string): void {
  const err = toError(error);
  if (scopeErrorHandler) scopeErrorHandler(err, source);
  else console.error(`[Scopeline] Error in ${source}:`, err);
}

/**
 * One-time warning flags to avoid flooding the console.
 */
const warned = new Set<string>();

/** Warns once per `id`, and only in dev mode. */
export function warnOnce(id: string, message: string): void {
  if (!isDevMode) return;
  if (warned.has(id)) return;
  warned.add(id);
  console.warn(`[Scopeline] ${message}`);
}

/**
 * Reset warning flags (used by src/internal/scope-testing.ts for deterministic tests).
 * @internal
 */
export function __resetWarningsForTests(): void {
  warned.clear();
}
