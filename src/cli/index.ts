/**
 * CLI commands registration
 */

import type { Command } from 'commander';
import { warmCommand } from './commands/warm.js';
import { listCommand } from './commands/list.js';
import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';

export function registerCommands(program: Command): void {
  // `axwarm --apps slack` runs `warm`
  program.addCommand(warmCommand(), { isDefault: true });
  program.addCommand(listCommand());
  program.addCommand(doctorCommand());
  program.addCommand(initCommand());
}
