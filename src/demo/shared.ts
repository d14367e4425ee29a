import { getScopeConfig } from "../core/config.js";
import { background } from "../core/scope.js";
import { sleep } from "../core/race.js";

/** Line sink for demo output. */
export type DemoLogger = (line: string) => void;

export interface DemoOptions {
  /** Where demo lines go. Default: console.log. */
  log?: DemoLogger;
  /** Length of one simulated "second", in milliseconds. Default: 1000. */
  unitMs?: number;
  /** Random integer in [min, max], both inclusive. Default: Math.random based. */
  randomInt?: (min: number, max: number) => number;
}

export const consoleLogger: DemoLogger = (line) => console.log(line);

export function defaultRandomInt(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

export function resolveDemoOptions(options: DemoOptions = {}): Required<DemoOptions> {
  const unitMs = options.unitMs ?? 1000;
  if (!Number.isFinite(unitMs) || unitMs <= 0) {
    throw new RangeError(`[Scopeline] unitMs must be a positive number, got ${unitMs}.`);
  }
  return {
    log: options.log ?? consoleLogger,
    unitMs,
    randomInt: options.randomInt ?? defaultRandomInt,
  };
}

export function timestamp(): string {
  return new Date(getScopeConfig().clock.now()).toISOString();
}

export function elapsedSince(start: number): number {
  return getScopeConfig().clock.now() - start;
}

/** Plain wait that nothing can interrupt (the "without scope" side of each demo). */
export function delay(ms: number): Promise<void> {
  return sleep(background(), ms);
}

type Deferred<T> = { promise: Promise<T>; resolve: (value: T) => void };

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  const promise = new Promise<T>((r) => (resolve = r));
  return { promise, resolve };
}
