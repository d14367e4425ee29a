import type { ScopeError } from "./errors.js";
import type { Scope } from "./scope.js";
import { reportScopeError } from "./dev.js";

const scopeCreateListeners = new Set<(scope: Scope) => void>();
const scopeDoneListeners = new Set<(scope: Scope, reason: ScopeError) => void>();

/**
 * Subscribe to scope creation events (every derived scope; the two roots
 * exist before anyone can subscribe).
 * Returns an unsubscribe function.
 */
export function onScopeCreate(fn: (scope: Scope) => void): () => void {
  scopeCreateListeners.add(fn);
  return () => scopeCreateListeners.delete(fn);
}

/**
 * Subscribe to scopes firing. Only scopes that own a signal report here;
 * value scopes fire through their parent and are not reported twice.
 * Returns an unsubscribe function.
 */
export function onScopeDone(fn: (scope: Scope, reason: ScopeError) => void): () => void {
  scopeDoneListeners.add(fn);
  return () => scopeDoneListeners.delete(fn);
}

export function notifyScopeCreate(scope: Scope): void {
  for (const listener of scopeCreateListeners) {
    try {
      listener(scope);
    } catch (err) {
      reportScopeError(err, "onScopeCreate() listener");
    }
  }
}

export function notifyScopeDone(scope: Scope, reason: ScopeError): void {
  for (const listener of scopeDoneListeners) {
    try {
      listener(scope, reason);
    } catch (err) {
      reportScopeError(err, "onScopeDone() listener");
    }
  }
}
