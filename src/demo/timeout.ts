import type { ScopeError } from "../core/errors.js";
import { background, type Scope } from "../core/scope.js";
import { withTimeout } from "../core/derive.js";
import { delay, resolveDemoOptions, timestamp, type DemoOptions } from "./shared.js";

const ITERATIONS = 10;
const STOP_AFTER_UNITS = 5;

/** Stop flag the driver flips by hand (the pattern scopes replace). */
export interface ManualStop {
  requested: boolean;
}

export interface TimeoutOutcome {
  /** Iterations started before the loop stopped. */
  iterations: number;
  completed: boolean;
  reason: ScopeError | null;
}

/**
 * Loops once per unit and checks a hand-managed flag between iterations.
 */
export async function operationWithoutTimeout(
  stop: ManualStop,
  options?: DemoOptions
): Promise<TimeoutOutcome> {
  const { log, unitMs } = resolveDemoOptions(options);
  log(
    `Simulate long running operation (${ITERATIONS} units) that will be cancelled manually after ${STOP_AFTER_UNITS} units`
  );

  for (let i = 0; i < ITERATIONS; i++) {
    if (stop.requested) {
      log(`[${timestamp()}] : Operation ${i} cancelled`);
      return { iterations: i, completed: false, reason: null };
    }
    log(`[${timestamp()}] : Operation ${i} running`);
    await delay(unitMs);
  }

  log(`[${timestamp()}] : Simulation complete`);
  return { iterations: ITERATIONS, completed: true, reason: null };
}

/**
 * Same loop, but it checks the scope between iterations and stops once the
 * scope fires.
 */
export async function operationWithTimeout(scope: Scope, options?: DemoOptions): Promise<TimeoutOutcome> {
  const { log, unitMs } = resolveDemoOptions(options);
  log(
    `Simulate long running operation (${ITERATIONS} units) that will be cancelled via withTimeout() in ${STOP_AFTER_UNITS} units`
  );

  for (let i = 0; i < ITERATIONS; i++) {
    const err = scope.err();
    if (err) {
      log(`[${timestamp()}] : Operation ${i} stopped: ${err.message}`);
      return { iterations: i, completed: false, reason: err };
    }
    log(`[${timestamp()}] : Operation ${i} running`);
    await delay(unitMs);
  }

  log(`[${timestamp()}] : Simulation complete`);
  return { iterations: ITERATIONS, completed: true, reason: null };
}

export async function simulateWithoutTimeout(options?: DemoOptions): Promise<TimeoutOutcome> {
  const { unitMs } = resolveDemoOptions(options);
  const stop: ManualStop = { requested: false };
  const worker = operationWithoutTimeout(stop, options);
  await delay(STOP_AFTER_UNITS * unitMs);
  stop.requested = true;
  return worker;
}

export async function simulateWithTimeout(options?: DemoOptions): Promise<TimeoutOutcome> {
  const { unitMs } = resolveDemoOptions(options);
  const [scope, cancel] = withTimeout(background(), STOP_AFTER_UNITS * unitMs);
  try {
    const worker = operationWithTimeout(scope, options);
    await scope.done();
    return await worker;
  } finally {
    cancel();
  }
}

export async function simulateTimeout(
  options?: DemoOptions
): Promise<{ withoutTimeout: TimeoutOutcome; withTimeout: TimeoutOutcome }> {
  const withoutTimeout = await simulateWithoutTimeout(options);
  const withTimeoutOutcome = await simulateWithTimeout(options);
  return { withoutTimeout, withTimeout: withTimeoutOutcome };
}
