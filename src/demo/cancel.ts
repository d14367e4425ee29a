import { isScopeError } from "../core/errors.js";
import { background, type Scope } from "../core/scope.js";
import { withCancel } from "../core/derive.js";
import { sleep } from "../core/race.js";
import { createDeferred, delay, resolveDemoOptions, type DemoOptions } from "./shared.js";

const WORKERS = 10;

export type WorkerOutcome = "found" | "finished" | "canceled";

export interface CancelOutcome {
  /** First worker that found the key, or null if none did. */
  foundBy: number | null;
  /** Outcome per worker id. */
  outcomes: WorkerOutcome[];
}

/** Each worker draws the key it will "find" and how many units the search takes. */
function drawWork(options: Required<DemoOptions>): { keyFound: number; workMs: number } {
  const keyFound = options.randomInt(1, 5);
  const workMs = options.randomInt(1, 5) * options.unitMs;
  return { keyFound, workMs };
}

/**
 * Works for its full duration no matter what the other workers do.
 */
export async function operationWithoutCancel(
  id: number,
  onFound: (id: number) => void,
  options?: DemoOptions
): Promise<WorkerOutcome> {
  const resolved = resolveDemoOptions(options);
  const { log } = resolved;
  log(`Worker ${id} start`);
  const { keyFound, workMs } = drawWork(resolved);
  await delay(workMs);

  let outcome: WorkerOutcome = "finished";
  if (keyFound === id) {
    log(`Worker ${id} found the key`);
    onFound(id);
    outcome = "found";
  }
  log(`Worker ${id} finish`);
  return outcome;
}

/**
 * Races its work against `scope`; abandons the search once the scope fires.
 */
export async function operationWithCancel(
  scope: Scope,
  id: number,
  onFound: (id: number) => void,
  options?: DemoOptions
): Promise<WorkerOutcome> {
  const resolved = resolveDemoOptions(options);
  const { log } = resolved;
  log(`Worker ${id} start`);
  const { keyFound, workMs } = drawWork(resolved);

  try {
    await sleep(scope, workMs);
  } catch (err) {
    if (!isScopeError(err)) throw err;
    log(`Worker ${id} cancelled`);
    return "canceled";
  }

  let outcome: WorkerOutcome = "finished";
  if (keyFound === id) {
    log(`Worker ${id} found the key`);
    onFound(id);
    outcome = "found";
  }
  log(`Worker ${id} finish`);
  return outcome;
}

/**
 * Resolves with the first finder, or null once every worker is done without one.
 */
function firstFinder(workers: Promise<WorkerOutcome[]>, found: Promise<number>): Promise<number | null> {
  return Promise.race([found, workers.then(() => null)]);
}

export async function simulateWithoutCancel(options?: DemoOptions): Promise<CancelOutcome> {
  const { log } = resolveDemoOptions(options);
  log("Simulate work without cancel");

  const found = createDeferred<number>();
  const ids = Array.from({ length: WORKERS }, (_, i) => i);
  const workers = Promise.all(ids.map((id) => operationWithoutCancel(id, found.resolve, options)));

  const foundBy = await firstFinder(workers, found.promise);
  if (foundBy !== null) {
    log(`Got result from worker ${foundBy}, other workers still running`);
  } else {
    log("No worker found the key");
  }

  const outcomes = await workers;
  log("Simulation finishes");
  return { foundBy, outcomes };
}

export async function simulateWithCancel(options?: DemoOptions): Promise<CancelOutcome> {
  const { log } = resolveDemoOptions(options);
  log("Simulate work with cancel");

  const [scope, cancel] = withCancel(background());
  try {
    const found = createDeferred<number>();
    const ids = Array.from({ length: WORKERS }, (_, i) => i);
    const workers = Promise.all(
      ids.map((id) => operationWithCancel(scope, id, found.resolve, options))
    );

    const foundBy = await firstFinder(workers, found.promise);
    cancel();
    if (foundBy !== null) {
      log(`Got result from worker ${foundBy}, other workers cancelled`);
    } else {
      log("No worker found the key");
    }

    const outcomes = await workers;
    log("Simulation finishes");
    return { foundBy, outcomes };
  } finally {
    cancel();
  }
}
