/**
 * Warm-up run: permission gate → directory → selection → warm-up → summary
 *
 * Only PermissionDeniedError, DirectoryUnavailableError and NoMatchError end
 * a run early; everything per-target lands in the session summary.
 */

import type { AccessibilityBinding } from './binding.js';
import { listRunningApplications, sortByName, type ApplicationRecord } from './directory.js';
import { AxWarmError, NoMatchError } from './errors.js';
import { assertAccessibilityPermission } from './permission.js';
import type { ProgressReporter } from './reporter.js';
import { selectTargets, type SelectionMode, type SelectionOptions, type TargetSelection } from './selector.js';
import { exitCodeFor, reportSummary, summarize, type ExitCode, type WarmUpSummary } from './summary.js';
import { warmUpAll, type WarmUpAllOptions } from './warmup.js';

export interface WarmUpRequest {
  mode: SelectionMode;
  /** Pause before each target's read */
  delaySeconds: number;
}

export interface RunnerOptions extends SelectionOptions {
  interTargetDelayMs?: number;
  sleep?: WarmUpAllOptions['sleep'];
  onAttempt?: WarmUpAllOptions['onAttempt'];
}

export interface RunResult {
  exitCode: ExitCode;
  selection?: TargetSelection;
  summary?: WarmUpSummary;
  error?: AxWarmError;
}

function describeTarget(record: ApplicationRecord): string {
  return `${record.name} (PID: ${record.processId})`;
}

async function executeRun(
  binding: AccessibilityBinding,
  request: WarmUpRequest,
  reporter: ProgressReporter,
  options: RunnerOptions
): Promise<RunResult> {
  await assertAccessibilityPermission(binding, reporter);
  reporter.info('✓ Accessibility permissions confirmed');

  const records = await listRunningApplications(binding);
  const { mode } = request;
  const selection = selectTargets(records, mode, options);

  for (const record of selection.skipped) {
    reporter.debug(`Skipping helper process ${describeTarget(record)}`);
  }

  if (selection.targets.length === 0) {
    if (records.length === 0) {
      reporter.info('No running applications found.');
    } else if (mode.kind === 'fragments') {
      throw new NoMatchError(mode.fragments, selection.skipped.length);
    } else if (mode.kind === 'known-defaults') {
      reporter.info('No known lazily-initializing applications running.');
    } else {
      reporter.info('Nothing to warm up.');
    }
    const summary = summarize({ attempted: [], skipped: selection.skipped });
    return { exitCode: exitCodeFor(summary), selection, summary };
  }

  if (mode.kind === 'known-defaults') {
    reporter.info(
      `Found ${selection.targets.length} application(s): ${selection.targets.map((record) => record.name).join(', ')}`
    );
  }

  const session = await warmUpAll(binding, selection.targets, {
    perAttemptDelayMs: Math.round(request.delaySeconds * 1000),
    skipped: selection.skipped,
    reporter,
    interTargetDelayMs: options.interTargetDelayMs,
    sleep: options.sleep,
    onAttempt: options.onAttempt,
  });

  const summary = summarize(session);
  reportSummary(summary, reporter);
  return { exitCode: exitCodeFor(summary), selection, summary };
}

/**
 * Run one warm-up invocation. Fatal conditions are reported through
 * `reporter` and turned into exit code 1; unexpected errors propagate.
 */
export async function runWarmUp(
  binding: AccessibilityBinding,
  request: WarmUpRequest,
  reporter: ProgressReporter,
  options: RunnerOptions = {}
): Promise<RunResult> {
  try {
    return await executeRun(binding, request, reporter, options);
  } catch (error) {
    if (error instanceof AxWarmError) {
      reporter.error(error.message);
      return { exitCode: 1, error };
    }
    throw error;
  }
}

/**
 * Running applications sorted by name. Performs no attribute read.
 *
 * @throws PermissionDeniedError | DirectoryUnavailableError
 */
export async function listApplications(
  binding: AccessibilityBinding,
  reporter?: ProgressReporter
): Promise<ApplicationRecord[]> {
  await assertAccessibilityPermission(binding, reporter);
  return sortByName(await listRunningApplications(binding));
}
