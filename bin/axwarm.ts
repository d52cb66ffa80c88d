#!/usr/bin/env node

/**
 * axwarm CLI - Warm up macOS accessibility trees
 */

import 'dotenv/config';
import { Command } from 'commander';
import { registerCommands } from '../src/cli/index.js';

const program = new Command();

program
  .name('axwarm')
  .description('Warm up macOS accessibility trees for apps that build them lazily')
  .version('0.1.0');

registerCommands(program);

await program.parseAsync();
