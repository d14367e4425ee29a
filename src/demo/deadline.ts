import { isScopeError, type ScopeError } from "../core/errors.js";
import { getScopeConfig } from "../core/config.js";
import { background, type Scope } from "../core/scope.js";
import { withDeadline } from "../core/derive.js";
import { sleep } from "../core/race.js";
import { delay, elapsedSince, resolveDemoOptions, timestamp, type DemoOptions } from "./shared.js";

const JOB_UNITS = 5;
const DEADLINE_UNITS = 3;

export interface DeadlineOutcome {
  completed: boolean;
  reason: ScopeError | null;
  elapsedMs: number;
}

export async function operationWithoutDeadline(options?: DemoOptions): Promise<void> {
  const { log, unitMs } = resolveDemoOptions(options);
  log(`This operation will run exactly for ${JOB_UNITS} units without interruption`);
  log(`[${timestamp()}] Operation starts`);
  await delay(JOB_UNITS * unitMs);
  log(`[${timestamp()}] Operation finishes`);
}

/**
 * A job designed to take JOB_UNITS, raced against the scope's deadline.
 */
export async function operationWithDeadline(
  scope: Scope,
  options?: DemoOptions
): Promise<{ completed: boolean; reason: ScopeError | null }> {
  const { log, unitMs } = resolveDemoOptions(options);
  log(
    `This operation is designed to run for ${JOB_UNITS} units, but will be interrupted in ${DEADLINE_UNITS} units`
  );
  log(`[${timestamp()}] Operation starts`);

  try {
    await sleep(scope, JOB_UNITS * unitMs);
  } catch (err) {
    if (!isScopeError(err)) throw err;
    log(`[${timestamp()}] Operation cancelled: ${err.message}`);
    return { completed: false, reason: err };
  }
  log(`[${timestamp()}] Operation finishes`);
  return { completed: true, reason: null };
}

export async function simulateWithoutDeadline(options?: DemoOptions): Promise<DeadlineOutcome> {
  const { log } = resolveDemoOptions(options);
  log("Simulate operation without scope deadline");
  const start = getScopeConfig().clock.now();
  await operationWithoutDeadline(options);
  const elapsedMs = elapsedSince(start);
  log(`Elapsed time: ${elapsedMs}ms`);
  return { completed: true, reason: null, elapsedMs };
}

export async function simulateWithDeadline(options?: DemoOptions): Promise<DeadlineOutcome> {
  const { log, unitMs } = resolveDemoOptions(options);
  const start = getScopeConfig().clock.now();
  const deadline = start + DEADLINE_UNITS * unitMs;
  log("Simulate operation with scope deadline");

  const [scope, cancel] = withDeadline(background(), deadline);
  try {
    const result = await operationWithDeadline(scope, options);
    const elapsedMs = elapsedSince(start);
    log(`Elapsed time: ${elapsedMs}ms`);
    return { ...result, elapsedMs };
  } finally {
    cancel();
  }
}
