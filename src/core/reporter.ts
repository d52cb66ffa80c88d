/**
 * Progress reporting
 *
 * The warm-up pipeline never logs through a global; every stage takes a
 * ProgressReporter so callers decide where output goes.
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ProgressReporter {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

/**
 * Console reporter. info/debug go to stdout, warn/error to stderr.
 */
export function createConsoleReporter(options: { level: LogLevel }): ProgressReporter {
  const enabled = (level: LogLevel): boolean => isLevelEnabled(options.level, level);

  return {
    debug: (message) => {
      if (enabled('debug')) console.log(chalk.gray(message));
    },
    info: (message) => {
      if (enabled('info')) console.log(message);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(chalk.yellow(message));
    },
    error: (message) => {
      if (enabled('error')) console.error(chalk.red(message));
    },
  };
}

export const silentReporter: ProgressReporter = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface ReporterEntry {
  level: LogLevel;
  message: string;
}

export interface MemoryReporter extends ProgressReporter {
  readonly entries: ReporterEntry[];
  messages(level?: LogLevel): string[];
}

/**
 * Reporter that keeps every entry in memory
 */
export function createMemoryReporter(): MemoryReporter {
  const entries: ReporterEntry[] = [];
  const push = (level: LogLevel) => (message: string): void => {
    entries.push({ level, message });
  };

  return {
    entries,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    messages: (level) =>
      entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message),
  };
}
