// src/cli/context.ts
import { Command } from 'commander';
import { ConfigError } from '../core/errors.js';
import { loadConfig, loadEnvFile } from '../core/config/env.js';
import { createLogger, type Logger } from '../core/logger.js';
import { PlatformRegistry } from '../core/platforms/registry.js';
import type { PlatformAdapter } from '../core/platforms/types.js';
import type { ConfigOverrides, ScrubConfig } from '../core/config/types.js';
import type { Platform } from '../core/types/index.js';
import { confirm, type ConfirmPrompt } from './prompt.js';

export interface CommonOptions {
  envFile?: string;
  platforms?: string;
  json?: boolean;
}

/** Seams the commands reach the outside world through. */
export interface CliDeps {
  env: NodeJS.ProcessEnv;
  loadEnvFile: (path?: string) => void;
  createAdapters: (
    config: ScrubConfig,
    logger: Logger,
    platforms: readonly Platform[],
    signal?: AbortSignal
  ) => PlatformAdapter[];
  confirm: ConfirmPrompt;
  now: () => Date;
}

export const defaultDeps: CliDeps = {
  env: process.env,
  loadEnvFile,
  createAdapters: (config, logger, platforms, signal) =>
    PlatformRegistry.fromConfig(config, { logger, signal }).select(platforms),
  confirm,
  now: () => new Date(),
};

export function addCommonOptions(command: Command): Command {
  return command
    .option('--env-file <path>', 'Load environment variables from this file (default: ./.env)')
    .option('--platforms <list>', 'Comma-separated platforms to process (bluesky,mastodon,twitter)')
    .option('--json', 'Output JSON to stdout', false);
}

export type ConfigResult =
  | { ok: true; config: ScrubConfig; logger: Logger }
  | { ok: false; exitCode: number };

/**
 * Loads configuration for a command. Configuration errors are printed here
 * and turned into exit code 1.
 */
export function resolveConfig(
  options: CommonOptions,
  overrides: ConfigOverrides,
  deps: CliDeps
): ConfigResult {
  deps.loadEnvFile(options.envFile);

  let config: ScrubConfig;
  try {
    config = loadConfig(deps.env, { ...overrides, platforms: options.platforms }, deps.now());
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return { ok: false, exitCode: 1 };
    }
    throw error;
  }

  // JSON output owns stdout; only warnings and errors are logged (to stderr)
  const level = options.json && (config.logLevel === 'debug' || config.logLevel === 'info') ? 'warn' : config.logLevel;
  return { ok: true, config, logger: createLogger({ level }) };
}
