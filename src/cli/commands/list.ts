/**
 * list command - List running applications
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../../config/index.js';
import { createBinding, type AccessibilityBinding } from '../../core/binding.js';
import type { ApplicationRecord } from '../../core/directory.js';
import { AxWarmError, describeError } from '../../core/errors.js';
import { listApplications } from '../../core/runner.js';
import type { ExitCode } from '../../core/summary.js';

export function formatApplicationList(
  records: readonly ApplicationRecord[],
  options: { verbose?: boolean } = {}
): string[] {
  return records.map((record) => {
    const line = `${record.name.padEnd(30)} (PID: ${record.processId})`;
    return options.verbose && record.bundleIdentifier ? `${line} ${record.bundleIdentifier}` : line;
  });
}

/**
 * Print running applications sorted by name. No attribute is read.
 */
export async function printApplicationList(
  binding: AccessibilityBinding,
  options: { quiet?: boolean; verbose?: boolean } = {}
): Promise<ExitCode> {
  const spinner = ora({ text: 'Querying running applications...', isSilent: options.quiet ?? false }).start();

  try {
    const apps = await listApplications(binding);
    spinner.stop();

    console.log();
    console.log(chalk.bold('Running Applications:'));
    console.log('─'.repeat(50));
    for (const line of formatApplicationList(apps, { verbose: options.verbose ?? false })) {
      console.log(line);
    }
    console.log();
    console.log(`Total: ${apps.length} applications`);
    return 0;
  } catch (error) {
    spinner.fail(chalk.red('Failed to list applications'));
    console.error(describeError(error));
    if (error instanceof AxWarmError) {
      return 1;
    }
    throw error;
  }
}

export function listCommand(): Command {
  return new Command('list')
    .description('List running applications and exit')
    .option('-q, --quiet', 'Errors and warnings only')
    .option('-v, --verbose', 'Include bundle identifiers')
    .action(async (options: { quiet?: boolean; verbose?: boolean }) => {
      if (process.platform !== 'darwin') {
        console.error(chalk.red('axwarm only runs on macOS'));
        process.exitCode = 1;
        return;
      }
      const binding = createBinding(loadConfig());
      process.exitCode = await printApplicationList(binding, options);
    });
}
