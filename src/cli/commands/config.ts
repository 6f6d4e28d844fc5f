// src/cli/commands/config.ts
import { Command } from 'commander';
import { redactConfig } from '../../core/config/env.js';
import { addCommonOptions, defaultDeps, resolveConfig, type CliDeps, type CommonOptions } from '../context.js';

function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.length > 0 ? value.join(', ') : '(none)';
  }
  if (value === '') {
    return '(not set)';
  }
  return String(value);
}

/** `key: value` lines, nested objects flattened with dotted keys. */
export function formatConfigLines(values: Record<string, unknown>, prefix: string = ''): string[] {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(values)) {
    const name = prefix ? `${prefix}.${key}` : key;
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      lines.push(...formatConfigLines(Object.fromEntries(Object.entries(value)), name));
    } else {
      lines.push(`${name}: ${formatValue(value)}`);
    }
  }

  return lines;
}

export function runConfig(options: CommonOptions, deps: CliDeps = defaultDeps): number {
  const resolved = resolveConfig(options, {}, deps);
  if (!resolved.ok) {
    return resolved.exitCode;
  }

  const view = redactConfig(resolved.config);

  if (options.json) {
    console.log(JSON.stringify(view, null, 2));
  } else {
    console.log(formatConfigLines(view).join('\n'));
  }

  return 0;
}

export function registerConfigCommand(program: Command, deps: CliDeps = defaultDeps): void {
  const command = program
    .command('config')
    .description('Print the resolved configuration (secrets masked)');

  addCommonOptions(command).action((options: CommonOptions) => {
    process.exitCode = runConfig(options, deps);
  });
}
