import { test, afterEach } from "node:test";
import assert from "node:assert/strict";
import { background } from "../src/core/scope.js";
import { withCancel, withTimeout } from "../src/core/derive.js";
import { race, sleep, throwIfDone } from "../src/core/race.js";
import { canceled, deadlineExceeded } from "../src/core/errors.js";
import { configureScopes, resetScopeConfig } from "../src/core/config.js";
import { createManualClock } from "../src/internal/scope-testing.js";
import { createFakeParent } from "./fake-scope.js";

afterEach(() => {
  resetScopeConfig();
});

test("race resolves with the work's value and drops its subscription", async () => {
  const { scope, signal } = createFakeParent();

  const result = race(scope, Promise.resolve(42));
  assert.equal(signal.listenerCount, 1);

  assert.equal(await result, 42);
  assert.equal(signal.listenerCount, 0);
});

test("race rejects with the scope's reason when the scope fires first", async () => {
  const [scope, cancel] = withCancel(background());
  let finish: (value: string) => void = () => {};
  const work = new Promise<string>((resolve) => {
    finish = resolve;
  });

  const result = race(scope, work);
  cancel();
  finish("too late");

  await assert.rejects(result, (err) => err === canceled);
});

test("race does not start work on a scope that already fired", async () => {
  const [scope, cancel] = withCancel(background());
  cancel();
  let started = false;

  await assert.rejects(
    race(scope, async () => {
      started = true;
      return 1;
    }),
    (err) => err === canceled
  );
  assert.equal(started, false);
});

test("race hands the scope's AbortSignal to the work", async () => {
  const [scope, cancel] = withCancel(background());
  let received: AbortSignal | null = null;

  const result = race(scope, (signal) => {
    received = signal;
    return new Promise<never>((_, reject) => {
      signal.addEventListener("abort", () => reject(signal.reason), { once: true });
    });
  });

  cancel();
  await assert.rejects(result, (err) => err === canceled);
  assert.equal(received, scope.signal);
  assert.equal(scope.signal.aborted, true);
});

test("race passes through the work's own failure", async () => {
  const { scope, signal } = createFakeParent();

  await assert.rejects(race(scope, Promise.reject(new Error("lookup failed"))), /lookup failed/);
  await assert.rejects(
    race(scope, () => {
      throw new Error("sync failure");
    }),
    /sync failure/
  );
  assert.equal(signal.listenerCount, 0);
});

test("sleep resolves after the duration and clears its subscription", async () => {
  const clock = createManualClock(0);
  configureScopes({ clock });
  const { scope, signal } = createFakeParent();

  const pending = sleep(scope, 100);
  assert.equal(clock.pending(), 1);
  assert.equal(signal.listenerCount, 1);

  clock.advance(100);
  await pending;
  assert.equal(signal.listenerCount, 0);
});

test("sleep rejects with DeadlineExceededError when the deadline comes first", async () => {
  const clock = createManualClock(0);
  configureScopes({ clock });
  const [scope, cancel] = withTimeout(background(), 50);

  const pending = sleep(scope, 200);
  assert.equal(clock.pending(), 2);

  clock.advance(50);
  await assert.rejects(pending, (err) => err === deadlineExceeded);
  assert.equal(clock.pending(), 0);
  cancel();
});

test("sleep waits out durations beyond the timer limit in steps", async () => {
  const clock = createManualClock(0);
  configureScopes({ clock, maxTimerDelayMs: 100 });
  const flush = () => new Promise<void>((resolve) => setImmediate(resolve));
  let resolved = false;

  const pending = sleep(background(), 250).then(() => {
    resolved = true;
  });

  clock.advance(100);
  await flush();
  assert.equal(resolved, false);
  assert.equal(clock.pending(), 1);

  clock.advance(149);
  await flush();
  assert.equal(resolved, false);

  clock.advance(1);
  await pending;
  assert.equal(resolved, true);
  assert.equal(clock.pending(), 0);
});

test("a long sleep still rejects when its scope is cancelled between steps", async () => {
  const clock = createManualClock(0);
  configureScopes({ clock, maxTimerDelayMs: 100 });
  const [scope, cancel] = withCancel(background());

  const pending = sleep(scope, 3_000_000_000);
  clock.advance(250);
  assert.equal(clock.pending(), 1);

  cancel();
  await assert.rejects(pending, (err) => err === canceled);
  assert.equal(clock.pending(), 0);
});

test("sleep validates its duration and honors a fired scope", async () => {
  await assert.rejects(sleep(background(), -5), /non-negative duration in milliseconds, got -5/);

  const [scope, cancel] = withCancel(background());
  cancel();
  await assert.rejects(sleep(scope, 10), (err) => err === canceled);
});

test("throwIfDone throws the reason once the scope fired", () => {
  const [scope, cancel] = withCancel(background());
  assert.doesNotThrow(() => throwIfDone(scope));

  cancel();
  assert.throws(() => throwIfDone(scope), (err) => err === canceled);
});
