/**
 * warm command - Warm up accessibility trees (default command)
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { getLogsDir, loadConfig, type Config } from '../../config/index.js';
import { createBinding, resolveBridgeScript } from '../../core/binding.js';
import { UsageError, describeError } from '../../core/errors.js';
import { createAttemptLogger } from '../../core/logger.js';
import { createConsoleReporter, type LogLevel } from '../../core/reporter.js';
import { runWarmUp, type WarmUpRequest } from '../../core/runner.js';
import type { SelectionMode } from '../../core/selector.js';
import { printApplicationList } from './list.js';

export interface WarmCommandOptions {
  apps?: string[];
  targets?: string[];
  allRunning?: boolean;
  list?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  delay?: string;
}

const DelaySecondsSchema = z.coerce.number().finite().min(0).max(600);

export function parseDelay(value: string): number {
  const parsed = DelaySecondsSchema.safeParse(value.trim() === '' ? Number.NaN : value);
  if (!parsed.success) {
    throw new UsageError(`Invalid --delay value "${value}": expected seconds between 0 and 600`);
  }
  return parsed.data;
}

export function resolveLogLevel(options: WarmCommandOptions, config: Pick<Config, 'logLevel'>): LogLevel {
  if (options.quiet && options.verbose) {
    throw new UsageError('--quiet and --verbose cannot be used together');
  }
  if (options.verbose) return 'debug';
  if (options.quiet) return 'warn';
  return config.logLevel;
}

export function buildWarmRequest(
  options: WarmCommandOptions,
  config: Pick<Config, 'defaultDelaySeconds'>
): WarmUpRequest {
  const fragments = [...(options.apps ?? []), ...(options.targets ?? [])];

  if (options.allRunning && fragments.length > 0) {
    throw new UsageError('--all-running cannot be combined with --apps/--targets');
  }

  let mode: SelectionMode;
  if (fragments.length > 0) {
    mode = { kind: 'fragments', fragments };
  } else if (options.allRunning) {
    mode = { kind: 'all-running' };
  } else {
    mode = { kind: 'known-defaults' };
  }

  const delaySeconds = options.delay === undefined ? config.defaultDelaySeconds : parseDelay(options.delay);
  return { mode, delaySeconds };
}

export function warmCommand(): Command {
  return new Command('warm')
    .description('Warm up accessibility trees of running applications (default: known Electron apps)')
    .option('-a, --apps <names...>', 'App name fragments to target (case-insensitive)')
    .option('-t, --targets <names...>', 'Alias of --apps')
    .option('--all-running', 'Warm up every running application')
    .option('--list', 'List running applications and exit')
    .option('-q, --quiet', 'Errors and warnings only')
    .option('-v, --verbose', 'Show debug output')
    .option('-d, --delay <seconds>', 'Pause before each warm-up (useful right after app launch)')
    .action(async (options: WarmCommandOptions) => {
      const config = loadConfig();

      let level: LogLevel;
      let request: WarmUpRequest;
      try {
        level = resolveLogLevel(options, config);
        request = buildWarmRequest(options, config);
      } catch (error) {
        console.error(chalk.red(describeError(error)));
        process.exit(1);
      }

      const reporter = createConsoleReporter({ level });

      if (process.platform !== 'darwin') {
        reporter.error('axwarm only runs on macOS');
        process.exitCode = 1;
        return;
      }

      const binding = createBinding(config);

      if (options.list) {
        process.exitCode = await printApplicationList(binding, {
          quiet: level === 'warn' || level === 'error',
          verbose: level === 'debug',
        });
        return;
      }

      reporter.info(chalk.bold('macOS Accessibility Warm-Up'));
      reporter.debug(`Bridge: ${config.swiftPath} ${resolveBridgeScript(config.bridgeScript)}`);

      try {
        const result = await runWarmUp(binding, request, reporter, {
          knownApps: config.knownApps,
          helperMarkers: config.helperMarkers,
          interTargetDelayMs: config.interTargetDelayMs,
          onAttempt: createAttemptLogger(config, getLogsDir(), reporter),
        });
        process.exitCode = result.exitCode;
      } catch (error) {
        console.error(chalk.red('Warm-up failed'));
        console.error(describeError(error));
        process.exit(1);
      }
    });
}
