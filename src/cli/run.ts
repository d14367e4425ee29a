import { simulateTimeout } from '../demo/timeout.js';
import { simulateWithCancel, simulateWithoutCancel } from '../demo/cancel.js';
import { simulateWithDeadline, simulateWithoutDeadline } from '../demo/deadline.js';
import { simulateValue } from '../demo/value.js';
import type { DemoOptions } from '../demo/shared.js';

export const DEMO_NAMES = ['timeout', 'cancel', 'deadline', 'value'] as const;
export type DemoName = (typeof DEMO_NAMES)[number];

export const DEMO_CREDENTIALS = { username: 'demo-user', password: 'test-secret' };

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'demo'; demos: DemoName[]; unitMs: number; quiet: boolean }
  | { kind: 'error'; message: string };

function isDemoName(value: string): value is DemoName {
  return DEMO_NAMES.some((name) => name === value);
}

function hasHelpFlag(list: string[]): boolean {
  return list.includes('--help') || list.includes('-h') || list.includes('help');
}

/**
 * Parse `scopeline <command> [...]` arguments (process.argv without node and script).
 */
export function parseCliArgs(args: string[]): CliCommand {
  const command = args[0];
  if (!command || hasHelpFlag(args)) return { kind: 'help' };
  if (command !== 'demo') return { kind: 'error', message: `Unknown command: ${command}` };

  const rest = args.slice(1);
  let unitMs = 1000;
  let quiet = false;
  const demos: DemoName[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--quiet') {
      quiet = true;
    } else if (arg === '--unit') {
      const raw = rest[i + 1];
      const parsed = raw === undefined ? NaN : Number(raw);
      if (!Number.isFinite(parsed) || parsed <= 0) {
        return { kind: 'error', message: '--unit requires a positive number of milliseconds' };
      }
      unitMs = parsed;
      i++;
    } else if (arg === 'all') {
      demos.push(...DEMO_NAMES);
    } else if (isDemoName(arg)) {
      demos.push(arg);
    } else {
      return { kind: 'error', message: `Unknown demo: ${arg}` };
    }
  }

  if (demos.length === 0) {
    return { kind: 'error', message: `Missing demo name (one of: ${DEMO_NAMES.join(', ')}, all)` };
  }
  return { kind: 'demo', demos: [...new Set(demos)], unitMs, quiet };
}

export async function runDemo(name: DemoName, options: DemoOptions): Promise<void> {
  switch (name) {
    case 'timeout':
      await simulateTimeout(options);
      return;
    case 'cancel':
      await simulateWithoutCancel(options);
      await simulateWithCancel(options);
      return;
    case 'deadline':
      await simulateWithoutDeadline(options);
      await simulateWithDeadline(options);
      return;
    case 'value':
      simulateValue(DEMO_CREDENTIALS, options);
      return;
  }
}
