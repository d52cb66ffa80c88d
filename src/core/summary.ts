/**
 * Session summary and exit status
 */

import type { ProgressReporter } from './reporter.js';
import type { WarmUpSession } from './warmup.js';

export type ExitCode = 0 | 1;

export interface WarmUpSummary {
  attemptedCount: number;
  successCount: number;
  partialCount: number;
  failureCount: number;
  skippedCount: number;
  anySuccess: boolean;
  successes: string[];
  partials: string[];
  failures: string[];
  skipped: string[];
}

export function summarize(session: WarmUpSession): WarmUpSummary {
  const successes: string[] = [];
  const partials: string[] = [];
  const failures: string[] = [];

  for (const { record, outcome } of session.attempted) {
    switch (outcome.status) {
      case 'success':
        successes.push(record.name);
        break;
      case 'partial':
        partials.push(record.name);
        break;
      case 'failure':
        failures.push(record.name);
        break;
    }
  }

  return {
    attemptedCount: session.attempted.length,
    successCount: successes.length,
    partialCount: partials.length,
    failureCount: failures.length,
    skippedCount: session.skipped.length,
    anySuccess: successes.length > 0,
    successes,
    partials,
    failures,
    skipped: session.skipped.map((record) => record.name),
  };
}

/**
 * 0 when something was warmed up or there was nothing to do; 1 when
 * at least one target was attempted and none succeeded
 */
export function exitCodeFor(summary: WarmUpSummary): ExitCode {
  return summary.anySuccess || summary.attemptedCount === 0 ? 0 : 1;
}

export function formatSummary(summary: WarmUpSummary): string[] {
  const lines = [
    `Accessibility initialization complete: ${summary.successCount}/${summary.attemptedCount} successful`,
  ];
  const groups: Array<[string, string[]]> = [
    ['Success', summary.successes],
    ['Partial', summary.partials],
    ['Failed', summary.failures],
    ['Skipped', summary.skipped],
  ];
  for (const [label, names] of groups) {
    if (names.length > 0) {
      lines.push(`  ${label} (${names.length}): ${names.join(', ')}`);
    }
  }
  return lines;
}

export function reportSummary(summary: WarmUpSummary, reporter: ProgressReporter): void {
  for (const line of formatSummary(summary)) {
    reporter.info(line);
  }
  if (summary.anySuccess) {
    reporter.info('Accessibility state should now be available for this session.');
  } else if (summary.attemptedCount > 0) {
    reporter.warn('No applications were warmed up.');
  }
}
