/**
 * Warm-up engine
 *
 * Reading AXRole from an application's root element makes the system
 * accessibility daemon build and cache that application's tree for the
 * rest of the session. One warm-up is exactly one attribute read.
 */

import {
  AX_ERROR_BINDING_FAILURE,
  AX_ERROR_SUCCESS,
  AX_ERROR_TREE_NOT_READY,
  AX_ROLE_ATTRIBUTE,
  describeAXError,
  readAttribute,
  type BindingResult,
} from './attribute.js';
import type { AccessibilityBinding } from './binding.js';
import type { ApplicationRecord } from './directory.js';
import { describeError } from './errors.js';
import { silentReporter, type ProgressReporter } from './reporter.js';

// Pause between consecutive targets so AX calls never run in a tight loop
export const DEFAULT_INTER_TARGET_DELAY_MS = 100;

export type WarmUpOutcome =
  | { status: 'success'; role: string }
  | { status: 'partial'; code: number }
  | { status: 'failure'; code: number; reason?: string };

export type WarmUpStatus = WarmUpOutcome['status'];

export interface WarmUpAttempt {
  record: ApplicationRecord;
  outcome: WarmUpOutcome;
}

export interface WarmUpSession {
  attempted: WarmUpAttempt[];
  skipped: ApplicationRecord[];
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function createSession(skipped: readonly ApplicationRecord[] = []): WarmUpSession {
  return { attempted: [], skipped: [...skipped] };
}

function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || String(value).length === 0;
}

export function classifyResult(result: BindingResult): WarmUpOutcome {
  if (result.ok) {
    if (isEmptyValue(result.value)) {
      return { status: 'failure', code: AX_ERROR_SUCCESS, reason: 'empty role' };
    }
    return { status: 'success', role: String(result.value) };
  }

  if (result.code === AX_ERROR_TREE_NOT_READY) {
    return { status: 'partial', code: result.code };
  }

  return result.reason === undefined
    ? { status: 'failure', code: result.code }
    : { status: 'failure', code: result.code, reason: result.reason };
}

function reportOutcome(target: ApplicationRecord, outcome: WarmUpOutcome, reporter: ProgressReporter): void {
  switch (outcome.status) {
    case 'success':
      reporter.info(`✓ Accessibility initialized for ${target.name} (role: ${outcome.role})`);
      break;
    case 'partial':
      reporter.warn(
        `⚠ ${target.name}: error ${describeAXError(outcome.code)}, accessibility tree may be incomplete`
      );
      break;
    case 'failure': {
      const detail = outcome.reason ? `: ${outcome.reason}` : '';
      reporter.warn(`✗ ${target.name}: accessibility init failed with ${describeAXError(outcome.code)}${detail}`);
      break;
    }
  }
}

export interface WarmUpOptions {
  /** Pause before the read, for apps whose process exists but whose AX side has not attached yet */
  delayMs?: number;
  reporter?: ProgressReporter;
  sleep?: Sleep;
}

/**
 * Warm up one application. Never retries and never rejects.
 */
export async function warmUp(
  binding: AccessibilityBinding,
  target: ApplicationRecord,
  options: WarmUpOptions = {}
): Promise<WarmUpOutcome> {
  const reporter = options.reporter ?? silentReporter;
  const delayMs = options.delayMs ?? 0;

  if (delayMs > 0) {
    await (options.sleep ?? sleep)(delayMs);
  }

  reporter.info(`Initializing accessibility for ${target.name} (PID: ${target.processId})`);

  let outcome: WarmUpOutcome;
  try {
    const handle = binding.createApplicationElement(target.processId);
    outcome = classifyResult(await readAttribute(binding, handle, AX_ROLE_ATTRIBUTE, reporter));
  } catch (error) {
    outcome = { status: 'failure', code: AX_ERROR_BINDING_FAILURE, reason: describeError(error) };
  }

  reportOutcome(target, outcome, reporter);
  return outcome;
}

export interface WarmUpAllOptions {
  perAttemptDelayMs?: number;
  interTargetDelayMs?: number;
  skipped?: readonly ApplicationRecord[];
  reporter?: ProgressReporter;
  sleep?: Sleep;
  onAttempt?: (record: ApplicationRecord, outcome: WarmUpOutcome, durationMs: number) => void;
}

/**
 * Warm up every target in order, one at a time. Neither a failed target
 * nor a throwing onAttempt hook stops the batch.
 */
export async function warmUpAll(
  binding: AccessibilityBinding,
  targets: readonly ApplicationRecord[],
  options: WarmUpAllOptions = {}
): Promise<WarmUpSession> {
  const reporter = options.reporter ?? silentReporter;
  const pause = options.sleep ?? sleep;
  const interTargetDelayMs = options.interTargetDelayMs ?? DEFAULT_INTER_TARGET_DELAY_MS;
  const session = createSession(options.skipped);

  if (targets.length > 0) {
    reporter.info(`Initializing accessibility for ${targets.length} application(s)...`);
  }

  for (const [index, target] of targets.entries()) {
    if (index > 0 && interTargetDelayMs > 0) {
      await pause(interTargetDelayMs);
    }

    const start = Date.now();
    const outcome = await warmUp(binding, target, {
      delayMs: options.perAttemptDelayMs ?? 0,
      reporter,
      sleep: pause,
    });
    session.attempted.push({ record: target, outcome });
    try {
      options.onAttempt?.(target, outcome, Date.now() - start);
    } catch (error) {
      reporter.debug(`Attempt hook failed for ${target.name}: ${describeError(error)}`);
    }
  }

  return session;
}
