import type { ScopeError } from "./errors.js";
import { reportScopeError } from "./dev.js";

export type FireListener = (reason: ScopeError) => void;

/**
 * A one-shot, many-reader broadcast.
 *
 * - `fire()` transitions the signal exactly once; the first reason wins.
 * - Any number of `wait()` callers share one promise, released by that fire.
 * - `subscribe()` listeners run synchronously inside `fire()`, in FIFO order,
 *   so anything derived from this signal is fired before `fire()` returns.
 *
 * A `fire()` made by a listener does not run its own listeners in place: they
 * join the queue drained by the outermost `fire()`, so propagation through a
 * chain of any depth uses constant stack.
 */
export interface Signal {
  readonly fired: boolean;
  readonly reason: ScopeError | null;

  /** Number of subscribed listeners still waiting for the fire. */
  readonly listenerCount: number;

  /** Returns true only for the call that performed the transition. */
  fire(reason: ScopeError): boolean;

  /** Resolves with the reason once fired. Never rejects. */
  wait(): Promise<ScopeError>;

  /**
   * Register a listener called once with the reason.
   * Subscribing to a fired signal calls the listener immediately.
   * Returns an idempotent unsubscribe function.
   */
  subscribe(listener: FireListener): () => void;
}

interface ListenerEntry {
  fn: FireListener;
}

const noop = () => {};

function runListener(fn: FireListener, reason: ScopeError): void {
  try {
    fn(reason);
  } catch (err) {
    reportScopeError(err, "onDone() listener");
  }
}

interface PendingCall {
  fn: FireListener;
  reason: ScopeError;
}

/** Listener calls of the propagation in progress, in FIFO order. */
const pendingCalls: PendingCall[] = [];
let draining = false;

function drainPendingCalls(): void {
  if (draining) return;
  draining = true;
  let head = 0;
  try {
    while (head < pendingCalls.length) {
      const call = pendingCalls[head++];
      runListener(call.fn, call.reason);
    }
  } finally {
    pendingCalls.splice(0, head);
    draining = false;
  }
}

export function createSignal(): Signal {
  let reason: ScopeError | null = null;

  /** Entries (not functions) so the same function can subscribe twice. */
  let listeners: Set<ListenerEntry> | null = null;

  /** Created on first wait() so signals nobody awaits allocate no promise. */
  let waiter: Promise<ScopeError> | null = null;
  let resolveWaiter: ((reason: ScopeError) => void) | null = null;

  return {
    get fired() {
      return reason !== null;
    },

    get reason() {
      return reason;
    },

    get listenerCount() {
      return listeners ? listeners.size : 0;
    },

    fire(next) {
      if (reason !== null) return false;
      reason = next;

      if (resolveWaiter) {
        resolveWaiter(next);
        resolveWaiter = null;
      }

      const snapshot = listeners;
      listeners = null;
      if (snapshot) {
        for (const entry of snapshot) pendingCalls.push({ fn: entry.fn, reason: next });
        drainPendingCalls();
      }
      return true;
    },

    wait() {
      if (reason !== null) return Promise.resolve(reason);
      if (!waiter) {
        waiter = new Promise<ScopeError>((resolve) => {
          resolveWaiter = resolve;
        });
      }
      return waiter;
    },

    subscribe(fn) {
      if (reason !== null) {
        runListener(fn, reason);
        return noop;
      }
      const entry: ListenerEntry = { fn };
      if (!listeners) listeners = new Set();
      listeners.add(entry);
      return () => {
        listeners?.delete(entry);
      };
    },
  };
}
