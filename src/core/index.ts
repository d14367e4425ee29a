export * from "./errors.js";
export * from "./signal.js";
export * from "./deadline.js";

export {
  background,
  todo,
  causeOf,
  isScopeLike,
  type Scope,
  type ResolvedBinding,
} from "./scope.js";

export * from "./derive.js";
export * from "./race.js";

export { onScopeCreate, onScopeDone } from "./lifecycle.js";
export { setDevMode, isInDevMode, setScopeErrorHandler } from "./dev.js";
export {
  configureScopes,
  getScopeConfig,
  resetScopeConfig,
  systemClock,
  MAX_TIMER_DELAY_MS,
  type Clock,
  type ScopeConfig,
} from "./config.js";
