import { canceled, deadlineExceeded, type ScopeError } from "./errors.js";
import { createSignal, type FireListener } from "./signal.js";
import { armDeadline, type DeadlineClock } from "./deadline.js";
import { getScopeConfig } from "./config.js";
import { warnOnce } from "./dev.js";
import { notifyScopeDone } from "./lifecycle.js";
import type { ScopeKey } from "../context/key.js";

/**
 * A Scope is one logical operation's lifetime: a stop signal, an optional
 * deadline and a chain of request-scoped values.
 *
 * Scopes are immutable views handed to workers. Only the creator of a
 * cancel-capable scope (through the cancel function returned alongside it)
 * or an ancestor firing can end it. A scope is always passed explicitly;
 * there is no "current" scope.
 */
export interface Scope {
  /** Parent scope (null only for the roots). */
  readonly parent: Scope | null;

  /** Debug label, e.g. `background.withTimeout.withValue(user)`. */
  readonly name: string;

  /** Effective deadline: the earliest across this scope and its ancestors. */
  deadline(): Date | null;

  /**
   * Resolves with the terminal reason once the scope fires.
   * Never rejects; never settles for scopes that cannot fire.
   */
  done(): Promise<ScopeError>;

  /** `null` while active, then the permanent reason. */
  err(): ScopeError | null;

  /** Nearest binding of `key` up the parent chain, else the key's default. */
  value<T>(key: ScopeKey<T>): T | undefined;

  /**
   * Register a synchronous listener for the fire.
   * Runs immediately if the scope already fired. Returns an unsubscribe function.
   */
  onDone(listener: FireListener): () => void;

  /** An AbortSignal aborted (with `err()` as reason) when the scope fires. */
  readonly signal: AbortSignal;
}

export function isScopeLike(value: unknown): value is Scope {
  if (!value || typeof value !== "object") return false;
  return (
    "parent" in value &&
    "err" in value &&
    typeof value.err === "function" &&
    "done" in value &&
    typeof value.done === "function" &&
    "onDone" in value &&
    typeof value.onDone === "function" &&
    "deadline" in value &&
    typeof value.deadline === "function"
  );
}

const noop = () => {};

/** Shared by every scope that can never fire. */
const NEVER = new Promise<ScopeError>(noop);

let neverAbortedSignal: AbortSignal | null = null;

function getNeverAbortedSignal(): AbortSignal {
  if (!neverAbortedSignal) neverAbortedSignal = new AbortController().signal;
  return neverAbortedSignal;
}

export interface ResolvedBinding<T> {
  value: T;
  ownerScope: Scope;
  depth: number;
}

/**
 * Walk from `scope` towards the root and return the first binding of `key`.
 */
export function resolveBinding<T>(scope: Scope, key: ScopeKey<T>): ResolvedBinding<T> | undefined {
  let depth = 0;
  let current: Scope | null = scope;
  let result: ResolvedBinding<T> | undefined;

  while (current) {
    const hit = key.readFrom(current);
    if (hit) {
      result = { value: hit.value, ownerScope: current, depth };
      break;
    }
    current = current.parent;
    depth++;
  }

  if (depth >= getScopeConfig().deepLookupWarnDepth) {
    warnOnce(
      "deep-lookup",
      `Value lookup traversed ${depth} parent scopes. ` +
        `Consider binding related values together under a single key.`
    );
  }
  return result;
}

function resolveValue<T>(scope: Scope, key: ScopeKey<T>): T | undefined {
  const hit = resolveBinding(scope, key);
  return hit ? hit.value : key.defaultValue;
}

/**
 * The nearest scope at or above `scope` that is not a value view: the one
 * whose signal and deadline a value view reports.
 */
function signalOwner(scope: Scope): Scope {
  let current = scope;
  while (current instanceof ValueScope) current = current.parent;
  return current;
}

/**
 * Dotted label built from each scope's own segment, e.g.
 * `background.withCancel.withValue(user)`. Scopes store only their segment;
 * the full label is assembled on demand.
 */
function chainName(scope: Scope): string {
  const segments: string[] = [];
  let current: Scope = scope;
  while (current instanceof CancelScope || current instanceof ValueScope || current instanceof DetachedScope) {
    segments.push(current.segment);
    current = current.parent;
  }
  segments.push(current.name);
  return segments.reverse().join(".");
}

/** The key a scope binds itself, or null for scopes without a binding. */
export function localBindingKey(scope: Scope): ScopeKey<unknown> | null {
  return scope instanceof ValueScope ? scope.key : null;
}

/**
 * `background()` and `todo()`: no parent, no deadline, no values, never fires.
 */
class RootScope implements Scope {
  readonly parent = null;

  constructor(readonly name: string) {}

  deadline(): Date | null {
    return null;
  }

  done(): Promise<ScopeError> {
    return NEVER;
  }

  err(): ScopeError | null {
    return null;
  }

  value<T>(key: ScopeKey<T>): T | undefined {
    return resolveValue(this, key);
  }

  onDone(_listener: FireListener): () => void {
    return noop;
  }

  get signal(): AbortSignal {
    return getNeverAbortedSignal();
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Cancel, timeout and deadline scopes: owns a signal, optionally a deadline
 * clock, and a subscription to its parent's fire.
 *
 * Propagation is "child observes parent": the parent never tracks its
 * children, and a child drops its subscription as soon as it fires or is
 * cancelled.
 */
export class CancelScope implements Scope {
  readonly parent: Scope;
  /** This scope's part of `name`, e.g. `withCancel`. */
  readonly segment: string;

  private readonly sig = createSignal();
  private readonly ownDeadline: number | null;
  private clock: DeadlineClock | null = null;
  private unlinkParent: (() => void) | null = null;
  private controller: AbortController | null = null;
  private causeValue: Error | null = null;

  constructor(parent: Scope, segment: string, ownDeadline: number | null) {
    this.parent = parent;
    this.segment = segment;
    this.ownDeadline = ownDeadline;
  }

  get name(): string {
    return chainName(this);
  }

  /**
   * Inherit the parent's state: fire now if it already fired, otherwise
   * subscribe to its fire.
   * @internal
   */
  link(): void {
    const parentErr = this.parent.err();
    if (parentErr) {
      this.fire(parentErr, causeOf(this.parent));
      return;
    }
    this.unlinkParent = this.parent.onDone((reason) => {
      this.unlinkParent = null;
      this.fire(reason, causeOf(this.parent));
    });
  }

  /**
   * Arm the deadline clock, unless the scope already fired through its parent.
   * A deadline already in the past fires synchronously.
   * @internal
   */
  arm(): void {
    if (this.ownDeadline === null || this.sig.fired) return;
    this.clock = armDeadline(this.ownDeadline, () => {
      this.fire(deadlineExceeded, null);
    });
  }

  /**
   * Transition to fired. The first call wins; later calls return false and
   * change nothing. Releases the clock and the parent subscription.
   * @internal
   */
  fire(reason: ScopeError, cause: Error | null): boolean {
    if (this.sig.fired) return false;
    this.causeValue = cause ?? reason;

    // Listeners run inside fire(): descendants are fired before this returns.
    this.sig.fire(reason);

    if (this.clock) {
      this.clock.disarm();
      this.clock = null;
    }
    if (this.unlinkParent) {
      const unlink = this.unlinkParent;
      this.unlinkParent = null;
      unlink();
    }
    this.controller?.abort(reason);
    notifyScopeDone(this, reason);
    return true;
  }

  /** @internal */
  cancel(cause?: Error): void {
    this.fire(canceled, cause ?? null);
  }

  /** Cause recorded with the fire (the reason itself when none was given). */
  get cause(): Error | null {
    return this.causeValue;
  }

  deadline(): Date | null {
    let earliest = this.ownDeadline;
    let current: Scope | null = this.parent;
    while (current) {
      if (current instanceof CancelScope) {
        const own = current.ownDeadline;
        if (own !== null && (earliest === null || own < earliest)) earliest = own;
        current = current.parent;
      } else if (current instanceof ValueScope) {
        current = current.parent;
      } else {
        const inherited = current.deadline();
        if (inherited !== null && (earliest === null || inherited.getTime() < earliest)) {
          earliest = inherited.getTime();
        }
        break;
      }
    }
    return earliest === null ? null : new Date(earliest);
  }

  done(): Promise<ScopeError> {
    return this.sig.wait();
  }

  err(): ScopeError | null {
    return this.sig.reason;
  }

  value<T>(key: ScopeKey<T>): T | undefined {
    return resolveValue(this, key);
  }

  onDone(listener: FireListener): () => void {
    return this.sig.subscribe(listener);
  }

  get signal(): AbortSignal {
    if (!this.controller) {
      this.controller = new AbortController();
      const reason = this.sig.reason;
      if (reason) this.controller.abort(reason);
    }
    return this.controller.signal;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * A view over its parent that adds one binding. It has no signal of its own:
 * it is done exactly when the parent is.
 */
export class ValueScope<T> implements Scope {
  readonly parent: Scope;
  readonly segment: string;
  readonly key: ScopeKey<T>;

  constructor(parent: Scope, key: ScopeKey<T>, value: T) {
    this.parent = parent;
    this.key = key;
    this.segment = `withValue(${key.label})`;
    key.bindTo(this, value);
  }

  get name(): string {
    return chainName(this);
  }

  deadline(): Date | null {
    return signalOwner(this.parent).deadline();
  }

  done(): Promise<ScopeError> {
    return signalOwner(this.parent).done();
  }

  err(): ScopeError | null {
    return signalOwner(this.parent).err();
  }

  value<U>(key: ScopeKey<U>): U | undefined {
    return resolveValue(this, key);
  }

  onDone(listener: FireListener): () => void {
    return signalOwner(this.parent).onDone(listener);
  }

  get signal(): AbortSignal {
    return signalOwner(this.parent).signal;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Keeps the parent's values but none of its cancellation or deadline.
 */
export class DetachedScope implements Scope {
  readonly parent: Scope;
  readonly segment = "withoutCancel";

  constructor(parent: Scope) {
    this.parent = parent;
  }

  get name(): string {
    return chainName(this);
  }

  deadline(): Date | null {
    return null;
  }

  done(): Promise<ScopeError> {
    return NEVER;
  }

  err(): ScopeError | null {
    return null;
  }

  value<T>(key: ScopeKey<T>): T | undefined {
    return resolveValue(this, key);
  }

  onDone(_listener: FireListener): () => void {
    return noop;
  }

  get signal(): AbortSignal {
    return getNeverAbortedSignal();
  }

  toString(): string {
    return this.name;
  }
}

const backgroundScope = new RootScope("background");
const todoScope = new RootScope("todo");

/**
 * The root of every scope tree. Never fires, has no deadline and no values.
 */
export function background(): Scope {
  return backgroundScope;
}

/**
 * Behaves exactly like `background()`. Use it where the right scope has not
 * been threaded through yet, so those call sites are easy to find.
 */
export function todo(): Scope {
  return todoScope;
}

/**
 * The cause recorded when `scope` fired: the error passed to a cause-aware
 * cancel function, or `err()` when none was given. `null` while active.
 */
export function causeOf(scope: Scope): Error | null {
  const err = scope.err();
  if (err === null) return null;

  const owner = signalOwner(scope);
  if (owner instanceof CancelScope) return owner.cause ?? err;
  return err;
}
