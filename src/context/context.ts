import { isInDevMode } from "../core/dev.js";
import { localBindingKey, resolveBinding, type Scope } from "../core/scope.js";
import type { ScopeKey } from "./key.js";

/**
 * Lookup helpers over a scope's value chain.
 *
 * Mental model:
 * - Each `withValue()` scope holds exactly one binding of its own.
 * - Lookups walk from the given scope to the root; the nearest binding wins,
 *   so a rebinding shadows an ancestor's value only within its own subtree.
 * - A key's `defaultValue` applies when nothing in the chain binds it.
 */

/**
 * Result of lookup - distinguishes between "not found" and "found with undefined value".
 */
export type LookupResult<T> =
  | { found: true; value: T }
  | { found: false; value: undefined };

export function lookup<T>(scope: Scope, key: ScopeKey<T>): LookupResult<T> {
  const res = resolveBinding(scope, key);
  if (res) return { found: true, value: res.value };

  if (key.defaultValue !== undefined) {
    return { found: true, value: key.defaultValue };
  }
  return { found: false, value: undefined };
}

/**
 * Resolve `key` and report where it was bound: the owning scope and how many
 * parents were walked to reach it. `undefined` when nothing binds the key
 * (defaults do not count as a binding).
 */
export function lookupMeta<T>(
  scope: Scope,
  key: ScopeKey<T>
): { value: T; ownerScope: Scope; depth: number } | undefined {
  return resolveBinding(scope, key);
}

/**
 * Resolve `key` or throw.
 *
 * The error names the key; in dev mode it also lists the keys bound at each
 * depth of the chain.
 */
export function requireValue<T>(scope: Scope, key: ScopeKey<T>): T {
  const res = lookup(scope, key);
  if (res.found) return res.value;

  let message = `[Scopeline] Value "${key.label}" not found in scope chain.`;

  if (isInDevMode()) {
    const levels = listBindings(scope, 8);
    message += `\n\nBound keys by depth:\n`;
    for (const level of levels) {
      const names = level.keys.map((k) => k.label).join(", ") || "(none)";
      message += `  depth ${level.depth}: ${names}\n`;
    }
  }

  throw new Error(message);
}

export interface BindingLevel {
  depth: number;
  scope: Scope;
  keys: ScopeKey<unknown>[];
}

/**
 * Debug helper: the keys bound at each depth, from `scope` (depth 0) to the root.
 * `maxLevels` caps how many levels are listed.
 */
export function listBindings(scope: Scope, maxLevels?: number): BindingLevel[] {
  const levels: BindingLevel[] = [];

  let depth = 0;
  let current: Scope | null = scope;
  while (current) {
    if (maxLevels != null && levels.length >= maxLevels) break;
    const key = localBindingKey(current);
    levels.push({ depth, scope: current, keys: key ? [key] : [] });
    current = current.parent;
    depth++;
  }

  return levels;
}
