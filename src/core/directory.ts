/**
 * Running application directory
 */

import type { AccessibilityBinding, RawApplication } from './binding.js';
import { DirectoryUnavailableError, describeError } from './errors.js';

export interface ApplicationRecord {
  readonly name: string;
  readonly processId: number;
  readonly bundleIdentifier: string;
}

/**
 * Entries without a display name or a usable pid are dropped
 */
export function toApplicationRecord(raw: RawApplication): ApplicationRecord | null {
  if (!raw.name || !Number.isInteger(raw.pid) || raw.pid <= 0) {
    return null;
  }
  return Object.freeze({
    name: raw.name,
    processId: raw.pid,
    bundleIdentifier: raw.bundleId ?? '',
  });
}

/**
 * Enumerate running applications, in whatever order the platform reports them.
 *
 * @throws DirectoryUnavailableError if the platform list cannot be queried
 */
export async function listRunningApplications(binding: AccessibilityBinding): Promise<ApplicationRecord[]> {
  let rows: RawApplication[];
  try {
    rows = await binding.runningApplications();
  } catch (error) {
    throw new DirectoryUnavailableError(describeError(error));
  }

  const records: ApplicationRecord[] = [];
  for (const row of rows) {
    const record = toApplicationRecord(row);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

/**
 * Case-insensitive name order, pid as tie-breaker
 */
export function sortByName(records: readonly ApplicationRecord[]): ApplicationRecord[] {
  return [...records].sort((a, b) => {
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    if (left !== right) {
      return left < right ? -1 : 1;
    }
    return a.processId - b.processId;
  });
}
