/**
 * Action logging - wide events pattern
 * One JSON event per warm-up attempt, for audit and debugging
 */

import { existsSync, mkdirSync, appendFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Config } from '../config/index.js';
import type { ApplicationRecord } from './directory.js';
import { describeError } from './errors.js';
import { silentReporter, type ProgressReporter } from './reporter.js';
import type { WarmUpOutcome } from './warmup.js';

export interface WarmUpEvent {
  timestamp: string;
  action: 'warm-up';
  app: string;
  pid: number;
  bundle_id: string;
  status: WarmUpOutcome['status'];
  code: number | undefined;
  role: string | undefined;
  duration_ms: number;
  platform: typeof process.platform;
}

export function getLogPath(logsDir: string, date: Date = new Date()): string {
  const day = date.toISOString().split('T')[0];
  return join(logsDir, `warmup-${day}.jsonl`); // JSONL = 1 JSON per line
}

export function appendEvent(logsDir: string, event: WarmUpEvent): void {
  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true });
  }
  appendFileSync(getLogPath(logsDir, new Date(event.timestamp)), JSON.stringify(event) + '\n');
}

export function toWarmUpEvent(
  record: ApplicationRecord,
  outcome: WarmUpOutcome,
  durationMs: number,
  now: Date = new Date()
): WarmUpEvent {
  return {
    timestamp: now.toISOString(),
    action: 'warm-up',
    app: record.name,
    pid: record.processId,
    bundle_id: record.bundleIdentifier,
    status: outcome.status,
    code: outcome.status === 'success' ? undefined : outcome.code,
    role: outcome.status === 'success' ? outcome.role : undefined,
    duration_ms: durationMs,
    platform: process.platform,
  };
}

export type AttemptLogger = (record: ApplicationRecord, outcome: WarmUpOutcome, durationMs: number) => void;

/**
 * Build the per-attempt hook for warmUpAll.
 * Returns undefined when the action log is off or logLevel is warn/error.
 * A write failure is reported once and never reaches the warm-up batch.
 */
export function createAttemptLogger(
  config: Pick<Config, 'actionLog' | 'logLevel'>,
  logsDir: string,
  reporter: ProgressReporter = silentReporter
): AttemptLogger | undefined {
  if (!config.actionLog || config.logLevel === 'warn' || config.logLevel === 'error') {
    return undefined;
  }
  let failed = false;
  return (record, outcome, durationMs) => {
    if (failed) return;
    try {
      appendEvent(logsDir, toWarmUpEvent(record, outcome, durationMs));
    } catch (error) {
      failed = true;
      reporter.warn(`Action log disabled for this run: ${describeError(error)}`);
    }
  };
}
