/**
 * Accessibility permission gate
 */

import type { AccessibilityBinding } from './binding.js';
import { PermissionDeniedError, describeError } from './errors.js';
import { silentReporter, type ProgressReporter } from './reporter.js';

/**
 * Check whether this process is trusted for accessibility.
 * Fails closed: a trust query that errors counts as "not granted".
 */
export async function hasAccessibilityPermission(
  binding: AccessibilityBinding,
  reporter: ProgressReporter = silentReporter
): Promise<boolean> {
  try {
    return (await binding.isProcessTrusted()) === true;
  } catch (error) {
    reporter.debug(`Accessibility trust check failed: ${describeError(error)}`);
    return false;
  }
}

/**
 * Throws PermissionDeniedError unless accessibility access is granted
 */
export async function assertAccessibilityPermission(
  binding: AccessibilityBinding,
  reporter: ProgressReporter = silentReporter
): Promise<void> {
  if (!(await hasAccessibilityPermission(binding, reporter))) {
    throw new PermissionDeniedError();
  }
}
