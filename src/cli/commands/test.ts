// src/cli/commands/test.ts
import { Command } from 'commander';
import chalk from 'chalk';
import { ScrubError } from '../../core/errors.js';
import { PLATFORMS, type Platform } from '../../core/types/index.js';
import { addCommonOptions, defaultDeps, resolveConfig, type CliDeps, type CommonOptions } from '../context.js';

export interface AuthCheck {
  platform: Platform;
  configured: boolean;
  authenticated: boolean;
  handle?: string;
  error?: string;
}

export function formatAuthCheck(check: AuthCheck): string {
  const name = check.platform.charAt(0).toUpperCase() + check.platform.slice(1);
  if (check.authenticated) {
    return `${chalk.green('✓')} ${name}: Ready (@${check.handle})`;
  }
  if (check.configured) {
    return `${chalk.yellow('!')} ${name}: Configured but not authenticated (${check.error})`;
  }
  return `${chalk.red('✗')} ${name}: Not configured`;
}

/** Authenticates each selected platform without listing or deleting anything. */
export async function runTest(options: CommonOptions, deps: CliDeps = defaultDeps): Promise<number> {
  const resolved = resolveConfig(options, {}, deps);
  if (!resolved.ok) {
    return resolved.exitCode;
  }

  const { config, logger } = resolved;
  const platforms = config.enabledPlatforms.length > 0 ? config.enabledPlatforms : [...PLATFORMS];
  const checks: AuthCheck[] = [];

  for (const adapter of deps.createAdapters(config, logger, platforms)) {
    const check: AuthCheck = {
      platform: adapter.platform,
      configured: adapter.isConfigured(),
      authenticated: false,
    };

    try {
      const session = await adapter.authenticate();
      check.authenticated = true;
      check.handle = session.handle;
    } catch (error) {
      if (!(error instanceof ScrubError)) {
        throw error;
      }
      check.error = error.message;
    }

    checks.push(check);
  }

  if (options.json) {
    console.log(JSON.stringify(checks, null, 2));
  } else {
    for (const check of checks) {
      console.log(formatAuthCheck(check));
    }
  }

  return checks.every(check => check.authenticated) ? 0 : 1;
}

export function registerTestCommand(program: Command, deps: CliDeps = defaultDeps): void {
  const command = program
    .command('test')
    .description('Check credentials by authenticating with each platform (no listing or deletion)');

  addCommonOptions(command).action(async (options: CommonOptions) => {
    process.exitCode = await runTest(options, deps);
  });
}
