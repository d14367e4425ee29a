import { test, afterEach } from "node:test";
import assert from "node:assert/strict";
import { background, todo } from "../src/core/scope.js";
import { withCancel, withDeadline, withTimeout } from "../src/core/derive.js";
import {
  canceled,
  deadlineExceeded,
  isCanceled,
  isDeadlineExceeded,
  isScopeError,
} from "../src/core/errors.js";
import { activeDeadlineCount } from "../src/core/deadline.js";
import { configureScopes, resetScopeConfig } from "../src/core/config.js";
import { createKey } from "../src/context/key.js";
import { createManualClock } from "../src/internal/scope-testing.js";

afterEach(() => {
  resetScopeConfig();
});

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

test("background and todo are inert roots that behave alike", async () => {
  const Key = createKey<string>("k");

  for (const root of [background(), todo()]) {
    assert.equal(root.parent, null);
    assert.equal(root.err(), null);
    assert.equal(root.deadline(), null);
    assert.equal(root.value(Key), undefined);
    assert.equal(root.signal.aborted, false);

    let called = false;
    root.onDone(() => {
      called = true;
    });
    const state = await Promise.race([root.done().then(() => "done"), tick().then(() => "pending")]);
    assert.equal(state, "pending");
    assert.equal(called, false);
  }

  assert.equal(background(), background());
  assert.notEqual(background(), todo());
  assert.equal(background().name, "background");
  assert.equal(todo().name, "todo");
});

test("withCancel fires with CanceledError and cancel is idempotent", async () => {
  const [scope, cancel] = withCancel(background());
  assert.equal(scope.err(), null);
  assert.equal(scope.name, "background.withCancel");

  cancel();
  cancel();

  assert.equal(scope.err(), canceled);
  assert.ok(isCanceled(scope.err()));
  assert.ok(isScopeError(scope.err()));
  assert.equal(await scope.done(), canceled);
  assert.equal(scope.signal.aborted, true);
  assert.equal(scope.signal.reason, canceled);
});

test("withTimeout fires with DeadlineExceededError once the duration elapses", () => {
  const clock = createManualClock(10_000);
  configureScopes({ clock });

  const [scope, cancel] = withTimeout(background(), 5_000);
  assert.equal(scope.deadline()?.getTime(), 15_000);
  assert.equal(scope.name, "background.withDeadline");

  clock.advance(4_999);
  assert.equal(scope.err(), null);

  clock.advance(1);
  assert.equal(scope.err(), deadlineExceeded);
  assert.ok(isDeadlineExceeded(scope.err()));

  // Cancelling after the deadline fired keeps the recorded reason.
  cancel();
  assert.equal(scope.err(), deadlineExceeded);
  assert.equal(clock.pending(), 0);
});

test("withTimeout(0) fires before it returns", () => {
  const clock = createManualClock(0);
  configureScopes({ clock });

  const [scope, cancel] = withTimeout(background(), 0);
  assert.equal(scope.err(), deadlineExceeded);
  assert.equal(clock.pending(), 0);
  cancel();
});

test("a deadline already in the past fires immediately without a timer", () => {
  const baseline = activeDeadlineCount();
  const [scope, cancel] = withDeadline(background(), new Date(Date.now() - 1_000));

  assert.equal(scope.err(), deadlineExceeded);
  assert.equal(activeDeadlineCount(), baseline);
  cancel();
  assert.equal(scope.err(), deadlineExceeded);
});

test("cancel before the deadline wins and disarms the timer", () => {
  const clock = createManualClock(0);
  configureScopes({ clock });
  const baseline = activeDeadlineCount();

  const [scope, cancel] = withTimeout(background(), 1_000);
  assert.equal(activeDeadlineCount(), baseline + 1);

  clock.advance(500);
  cancel();
  assert.equal(scope.err(), canceled);
  assert.equal(activeDeadlineCount(), baseline);
  assert.equal(clock.pending(), 0);

  clock.advance(1_000);
  assert.equal(scope.err(), canceled);
});

test("a child deadline later than the parent's fires with the parent", () => {
  const clock = createManualClock(0);
  configureScopes({ clock });

  const [parent, cancelParent] = withDeadline(background(), 3_000);
  const [child, cancelChild] = withDeadline(parent, 5_000);

  assert.equal(child.deadline()?.getTime(), 3_000);
  // Only the parent arms a timer.
  assert.equal(clock.pending(), 1);

  clock.advance(2_999);
  assert.equal(child.err(), null);

  clock.advance(1);
  assert.equal(parent.err(), deadlineExceeded);
  assert.equal(child.err(), deadlineExceeded);

  cancelChild();
  cancelParent();
});

test("a child deadline earlier than the parent's fires on its own", () => {
  const clock = createManualClock(0);
  configureScopes({ clock });

  const [parent, cancelParent] = withDeadline(background(), new Date(5_000));
  const [child, cancelChild] = withDeadline(parent, new Date(2_000));

  assert.equal(child.deadline()?.getTime(), 2_000);
  assert.equal(parent.deadline()?.getTime(), 5_000);

  clock.advance(2_000);
  assert.equal(child.err(), deadlineExceeded);
  assert.equal(parent.err(), null);

  clock.advance(3_000);
  assert.equal(parent.err(), deadlineExceeded);

  cancelChild();
  cancelParent();
});

test("a cancel scope reports its parent's deadline", () => {
  const clock = createManualClock(0);
  configureScopes({ clock });

  const [parent, cancelParent] = withTimeout(background(), 750);
  const [child, cancelChild] = withCancel(parent);

  assert.equal(child.deadline()?.getTime(), 750);
  assert.equal(withCancel(background())[0].deadline(), null);

  cancelChild();
  cancelParent();
});

test("invalid durations and instants are rejected", () => {
  assert.throws(() => withTimeout(background(), -1), /non-negative duration in milliseconds, got -1/);
  assert.throws(() => withTimeout(background(), Number.NaN), /non-negative duration/);
  assert.throws(() => withTimeout(background(), Number.POSITIVE_INFINITY), /non-negative duration/);
  assert.throws(() => withDeadline(background(), new Date("not a date")), /invalid deadline/);
  assert.throws(() => withDeadline(background(), 8.64e15 + 1), /invalid deadline: 8640000000000001/);
});

test("a timeout past the latest representable Date is rejected", () => {
  const clock = createManualClock(1_000);
  configureScopes({ clock });
  const baseline = activeDeadlineCount();

  assert.throws(
    () => withTimeout(background(), 8.64e15),
    /withTimeout\(\) duration 8640000000000000 ms puts the deadline past the latest representable Date/
  );
  assert.equal(activeDeadlineCount(), baseline);
  assert.equal(clock.pending(), 0);

  const [scope, cancel] = withTimeout(background(), 8.64e15 - 1_000);
  assert.equal(scope.deadline()?.getTime(), 8.64e15);
  cancel();
});
