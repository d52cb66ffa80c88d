/**
 * init command - Write the default configuration file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getConfigPath, saveConfig } from '../../config/index.js';

export function initCommand(): Command {
  return new Command('init').description('Create the axwarm configuration file').action(() => {
    const spinner = ora('Initializing axwarm...').start();

    try {
      const config = saveConfig({});

      spinner.succeed(chalk.green('axwarm initialized'));
      console.log();
      console.log(`Config file: ${chalk.cyan(getConfigPath())}`);
      console.log(chalk.gray(`Known apps: ${config.knownApps.join(', ')}`));

      console.log();
      console.log('Next steps:');
      console.log(`  ${chalk.yellow('axwarm doctor')}     Check prerequisites`);
      console.log(`  ${chalk.yellow('axwarm --list')}     See running applications`);
      console.log(`  ${chalk.yellow('axwarm')}            Warm up known Electron apps`);
    } catch (error) {
      spinner.fail(chalk.red('Failed to initialize axwarm'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
}
