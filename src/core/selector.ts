/**
 * Warm-up target selection
 *
 * Two stages, applied the same way in every mode:
 * 1. candidate selection (fragments, all running, or the known-app list)
 * 2. helper exclusion (background subprocesses move to `skipped`)
 */

import type { ApplicationRecord } from './directory.js';

/**
 * Applications known to build their accessibility tree lazily (mostly Electron)
 */
export const DEFAULT_KNOWN_APPS: readonly string[] = [
  'claude',
  'chatgpt',
  'slack',
  'discord',
  'notion',
  'cursor',
  'visual studio code',
  'spotify',
  'whatsapp',
  'telegram',
  'figma',
  'obsidian',
  'typora',
  'mark text',
];

/**
 * Name markers of helper/background subprocesses, which have no
 * accessibility surface of their own
 */
export const DEFAULT_HELPER_MARKERS: readonly string[] = [
  'helper',
  'renderer',
  'gpu process',
  'plugin',
  'networking',
  'network service',
  'crashpad',
  'web content',
  'background service',
];

export type SelectionMode =
  | { kind: 'fragments'; fragments: readonly string[] }
  | { kind: 'all-running' }
  | { kind: 'known-defaults' };

export interface SelectionOptions {
  knownApps?: readonly string[];
  helperMarkers?: readonly string[];
}

export interface TargetSelection {
  /** Records matched by the mode, before helper exclusion */
  candidates: ApplicationRecord[];
  targets: ApplicationRecord[];
  skipped: ApplicationRecord[];
}

function normalizeNeedles(needles: readonly string[]): string[] {
  return needles.map((needle) => needle.trim().toLowerCase()).filter((needle) => needle.length > 0);
}

/**
 * True if `name` contains any needle, case-insensitively
 */
export function nameContainsAny(name: string, needles: readonly string[]): boolean {
  const haystack = name.toLowerCase();
  return normalizeNeedles(needles).some((needle) => haystack.includes(needle));
}

export function isHelperProcess(
  record: ApplicationRecord,
  helperMarkers: readonly string[] = DEFAULT_HELPER_MARKERS
): boolean {
  return nameContainsAny(record.name, helperMarkers);
}

function selectCandidates(
  records: readonly ApplicationRecord[],
  mode: SelectionMode,
  knownApps: readonly string[]
): ApplicationRecord[] {
  switch (mode.kind) {
    case 'fragments':
      return records.filter((record) => nameContainsAny(record.name, mode.fragments));
    case 'all-running':
      return [...records];
    case 'known-defaults':
      return records.filter((record) => nameContainsAny(record.name, knownApps));
  }
}

/**
 * Select warm-up targets. Result order follows `records`, and every match
 * is kept (several instances of one app may share a name).
 * An empty selection is a valid result, not an error.
 */
export function selectTargets(
  records: readonly ApplicationRecord[],
  mode: SelectionMode,
  options: SelectionOptions = {}
): TargetSelection {
  const knownApps = options.knownApps ?? DEFAULT_KNOWN_APPS;
  const helperMarkers = options.helperMarkers ?? DEFAULT_HELPER_MARKERS;

  const candidates = selectCandidates(records, mode, knownApps);
  const targets: ApplicationRecord[] = [];
  const skipped: ApplicationRecord[] = [];

  for (const record of candidates) {
    if (isHelperProcess(record, helperMarkers)) {
      skipped.push(record);
    } else {
      targets.push(record);
    }
  }

  return { candidates, targets, skipped };
}
