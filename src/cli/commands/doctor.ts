/**
 * doctor command - Check the prerequisites of an accessibility warm-up
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { loadConfig } from '../../config/index.js';
import { createBinding, resolveBridgeScript, type AccessibilityBinding } from '../../core/binding.js';
import { hasAccessibilityPermission } from '../../core/permission.js';

export interface CheckResult {
  name: string;
  status: 'ok' | 'error';
  message: string;
  fix?: string;
}

export function checkPlatform(platform: NodeJS.Platform = process.platform): CheckResult {
  if (platform === 'darwin') {
    return { name: 'Platform', status: 'ok', message: 'macOS' };
  }
  return {
    name: 'Platform',
    status: 'error',
    message: `${platform} (requires macOS)`,
    fix: 'Accessibility warm-up only applies to macOS applications.',
  };
}

/**
 * Check that the Swift interpreter runs
 */
export function checkSwift(swiftPath: string): CheckResult {
  const result = spawnSync(swiftPath, ['--version'], { encoding: 'utf8', timeout: 10000 });
  const output = `${result.stdout ?? ''}${result.stderr ?? ''}`.trim();

  if (!result.error && result.status === 0) {
    return { name: 'Swift', status: 'ok', message: output.split('\n')[0] ?? output };
  }
  return {
    name: 'Swift',
    status: 'error',
    message: result.error ? `${swiftPath} not found` : `${swiftPath} exited with ${result.status}`,
    fix: 'Run: xcode-select --install',
  };
}

export function checkBridgeScript(scriptPath: string): CheckResult {
  if (existsSync(scriptPath)) {
    return { name: 'Bridge script', status: 'ok', message: scriptPath };
  }
  return {
    name: 'Bridge script',
    status: 'error',
    message: `Missing: ${scriptPath}`,
    fix: 'Reinstall axwarm, or point "bridgeScript" in the config file at ax_bridge.swift',
  };
}

export async function checkAccessibility(binding: AccessibilityBinding): Promise<CheckResult> {
  if (await hasAccessibilityPermission(binding)) {
    return { name: 'Accessibility', status: 'ok', message: 'Permission granted' };
  }
  return {
    name: 'Accessibility',
    status: 'error',
    message: 'Permission not granted',
    fix: 'System Settings → Privacy & Security → Accessibility → enable your terminal application',
  };
}

export function doctorCommand(): Command {
  return new Command('doctor')
    .description('Check platform, Swift bridge and accessibility permission')
    .action(async () => {
      const config = loadConfig();
      const scriptPath = resolveBridgeScript(config.bridgeScript);

      console.log();
      console.log(chalk.bold('🩺 axwarm doctor'));
      console.log(chalk.gray('Checking prerequisites...\n'));

      const checks: CheckResult[] = [
        checkPlatform(),
        checkSwift(config.swiftPath),
        checkBridgeScript(scriptPath),
      ];

      // The permission query needs a working bridge
      if (checks.every((check) => check.status === 'ok')) {
        const spinner = ora('Querying accessibility permission...').start();
        checks.push(await checkAccessibility(createBinding(config)));
        spinner.stop();
      }

      let hasErrors = false;
      for (const check of checks) {
        let icon: string;
        let color: typeof chalk.green;

        switch (check.status) {
          case 'ok':
            icon = '✓';
            color = chalk.green;
            break;
          case 'error':
            icon = '✗';
            color = chalk.red;
            hasErrors = true;
            break;
        }

        console.log(`${color(icon)} ${chalk.bold(check.name)}: ${check.message}`);
      }

      console.log();

      if (hasErrors) {
        console.log(chalk.yellow.bold("Issues found. Here's how to fix them:\n"));
        for (const check of checks) {
          if (check.fix && check.status !== 'ok') {
            console.log(chalk.bold(`📌 ${check.name}:`));
            console.log(chalk.gray(check.fix));
            console.log();
          }
        }
        process.exit(1);
      }

      console.log(chalk.green.bold('✅ Ready to warm up accessibility trees'));
      console.log();
    });
}
