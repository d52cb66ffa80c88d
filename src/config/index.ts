/**
 * Configuration management for axwarm
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { LOG_LEVELS } from '../core/reporter.js';
import { DEFAULT_HELPER_MARKERS, DEFAULT_KNOWN_APPS } from '../core/selector.js';
import { DEFAULT_INTER_TARGET_DELAY_MS } from '../core/warmup.js';

export const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('info'),
  // One JSONL event per warm-up attempt under <configDir>/logs
  actionLog: z.boolean().default(true),
  knownApps: z.array(z.string().min(1)).default([...DEFAULT_KNOWN_APPS]),
  helperMarkers: z.array(z.string().min(1)).default([...DEFAULT_HELPER_MARKERS]),
  interTargetDelayMs: z.number().int().min(0).max(5000).default(DEFAULT_INTER_TARGET_DELAY_MS),
  defaultDelaySeconds: z.number().min(0).max(60).default(0),
  // Bridge
  swiftPath: z.string().min(1).default('swift'),
  bridgeScript: z.string().optional(),
  bridgeTimeoutMs: z.number().int().min(1000).max(120000).default(15000),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

export function getConfigDir(): string {
  return process.env['AXWARM_CONFIG_DIR'] ?? join(homedir(), '.axwarm');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

export function getLogsDir(): string {
  return join(getConfigDir(), 'logs');
}

export function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function loadConfig(): Config {
  const file = getConfigPath();
  if (!existsSync(file)) {
    return DEFAULT_CONFIG;
  }

  try {
    const raw = readFileSync(file, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return ConfigSchema.parse(parsed);
  } catch {
    return DEFAULT_CONFIG;
  }
}

export function saveConfig(config: Partial<Config>): Config {
  ensureConfigDir();

  const current = loadConfig();
  const merged = { ...current, ...config };
  const validated = ConfigSchema.parse(merged);

  writeFileSync(getConfigPath(), JSON.stringify(validated, null, 2));
  return validated;
}
