/**
 * macOS accessibility binding via Swift bridge script
 *
 * The bridge exposes the four platform calls axwarm needs: the trust
 * check, the NSWorkspace application list, and an AXRole read against an
 * application's root element in either calling convention.
 */

import { execFile } from 'node:child_process';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { Config } from '../config/index.js';
import { BridgeError, ConventionMismatchError } from './errors.js';

const execFileAsync = promisify(execFile);

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Attribute-read calling conventions.
 * - out-param: three-argument form, answers with an [error, value] pair
 * - return-value: two-argument form, answers with the bare value
 */
export type CallingConvention = 'out-param' | 'return-value';

export const CALLING_CONVENTIONS: readonly CallingConvention[] = ['out-param', 'return-value'];

export interface AXHandle {
  readonly pid: number;
}

export interface RawApplication {
  name: string | null;
  pid: number;
  bundleId: string | null;
}

export interface AccessibilityBinding {
  isProcessTrusted(): Promise<boolean>;
  runningApplications(): Promise<RawApplication[]>;
  createApplicationElement(pid: number): AXHandle;
  /**
   * Rejects with ConventionMismatchError when the convention is not supported.
   */
  copyAttributeValue(handle: AXHandle, attribute: string, convention: CallingConvention): Promise<unknown>;
}

const RawApplicationSchema = z.object({
  name: z.string().nullable(),
  pid: z.number().int(),
  bundleId: z.string().nullable(),
});

// sysexits EX_USAGE, returned by the bridge for commands it does not know
export const BRIDGE_EXIT_USAGE = 64;

const BRIDGE_COMMANDS: Record<CallingConvention, string> = {
  'out-param': 'copy-attribute',
  'return-value': 'copy-attribute-value',
};

export type ExecFileRunner = (
  file: string,
  args: readonly string[],
  options: { timeout: number; maxBuffer: number }
) => Promise<{ stdout: string; stderr: string }>;

const defaultRunner: ExecFileRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], { ...options, encoding: 'utf8' });
  return { stdout, stderr };
};

export interface SwiftBridgeOptions {
  swiftPath: string;
  scriptPath: string;
  timeoutMs: number;
  run?: ExecFileRunner;
}

// Works from both src/core/ (tests) and dist/src/core/ (built CLI)
const BRIDGE_SCRIPT_CANDIDATES = [
  path.join(__dirname, '../../scripts/macos/ax_bridge.swift'),
  path.join(__dirname, '../../../scripts/macos/ax_bridge.swift'),
];

export function resolveBridgeScript(override?: string): string {
  if (override) {
    return path.resolve(override);
  }
  for (const candidate of BRIDGE_SCRIPT_CANDIDATES) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return path.join(__dirname, '../../scripts/macos/ax_bridge.swift');
}

function exitStatusOf(error: unknown): number | string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'number' || typeof code === 'string') {
      return code;
    }
  }
  return undefined;
}

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr.trim();
  }
  return '';
}

function wasKilled(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'killed' in error && error.killed === true;
}

export class SwiftBridgeBinding implements AccessibilityBinding {
  private readonly run: ExecFileRunner;

  constructor(private readonly options: SwiftBridgeOptions) {
    this.run = options.run ?? defaultRunner;
  }

  async isProcessTrusted(): Promise<boolean> {
    const output = await this.invoke(['trusted']);
    return output === true;
  }

  async runningApplications(): Promise<RawApplication[]> {
    const output = await this.invoke(['apps']);
    const parsed = z.array(RawApplicationSchema).safeParse(output);
    if (!parsed.success) {
      throw new BridgeError(`Unexpected application list from bridge: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  createApplicationElement(pid: number): AXHandle {
    if (!Number.isInteger(pid) || pid <= 0) {
      throw new BridgeError(`Invalid process id: ${pid}`);
    }
    return Object.freeze({ pid });
  }

  async copyAttributeValue(handle: AXHandle, attribute: string, convention: CallingConvention): Promise<unknown> {
    try {
      return await this.invoke([BRIDGE_COMMANDS[convention], String(handle.pid), attribute]);
    } catch (error) {
      if (error instanceof BridgeError && error.status === BRIDGE_EXIT_USAGE) {
        throw new ConventionMismatchError(convention);
      }
      throw error;
    }
  }

  private async invoke(args: readonly string[]): Promise<unknown> {
    let stdout: string;
    try {
      ({ stdout } = await this.run(this.options.swiftPath, [this.options.scriptPath, ...args], {
        timeout: this.options.timeoutMs,
        maxBuffer: 4 * 1024 * 1024,
      }));
    } catch (error) {
      const command = args[0] ?? '';
      if (wasKilled(error)) {
        throw new BridgeError(`Bridge command "${command}" timed out after ${this.options.timeoutMs}ms`);
      }
      const status = exitStatusOf(error);
      const stderr = stderrOf(error);
      if (status === 'ENOENT') {
        throw new BridgeError(`Swift executable not found: ${this.options.swiftPath}`, status, stderr);
      }
      throw new BridgeError(
        `Bridge command "${command}" failed${stderr ? `: ${stderr}` : ''}`,
        status,
        stderr
      );
    }

    try {
      const parsed: unknown = JSON.parse(stdout);
      return parsed;
    } catch {
      throw new BridgeError(`Unreadable bridge output: ${stdout.trim().slice(0, 200)}`);
    }
  }
}

export function createBinding(config: Pick<Config, 'swiftPath' | 'bridgeScript' | 'bridgeTimeoutMs'>): SwiftBridgeBinding {
  return new SwiftBridgeBinding({
    swiftPath: config.swiftPath,
    scriptPath: resolveBridgeScript(config.bridgeScript),
    timeoutMs: config.bridgeTimeoutMs,
  });
}
