#!/usr/bin/env node

import { parseCliArgs, runDemo } from './run.js';
import type { DemoOptions } from '../demo/shared.js';

function showHelp() {
  console.log(`
Scopeline CLI

Usage:
  scopeline demo <name...> [options]   Run one or more demonstrations
  scopeline help                       Show this help message

Demos:
  timeout     A loop stopped by a manual flag, then by withTimeout()
  cancel      Ten workers searching for a key, without and with withCancel()
  deadline    A job interrupted by withDeadline()
  value       Request values passed by hand, then through withValue()
  all         Every demo above, in order

Options:
  --unit <ms>   Length of one simulated second (default: 1000)
  --quiet       Suppress demo output

Examples:
  npx scopeline demo timeout
  npx scopeline demo cancel deadline --unit 100
  npx scopeline demo all --unit 50
`);
}

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.kind === 'help') {
    showHelp();
    return;
  }

  if (command.kind === 'error') {
    console.error(`❌ ${command.message}`);
    showHelp();
    process.exitCode = 1;
    return;
  }

  const options: DemoOptions = {
    unitMs: command.unitMs,
    log: command.quiet ? () => {} : (line) => console.log(line),
  };

  for (const name of command.demos) {
    if (!command.quiet) console.log(`\n== ${name} ==`);
    await runDemo(name, options);
  }
}

main().catch((error) => {
  console.error('❌ Demo failed:', error);
  process.exit(1);
});
