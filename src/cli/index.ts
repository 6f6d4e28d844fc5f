#!/usr/bin/env node

import { Command } from 'commander';
import { registerConfigCommand } from './commands/config.js';
import { registerScrubCommand } from './commands/scrub.js';
import { registerTestCommand } from './commands/test.js';
import { defaultDeps, type CliDeps } from './context.js';

export function buildProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('scrubber')
    .description('Bulk delete your social media posts')
    .version('0.1.0');

  registerScrubCommand(program, deps);
  registerConfigCommand(program, deps);
  registerTestCommand(program, deps);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch(error => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
