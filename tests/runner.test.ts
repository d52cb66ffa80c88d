import { describe, it, expect, vi } from 'vitest';
import { formatApplicationList } from '../src/cli/commands/list.js';
import { DirectoryUnavailableError, NoMatchError, PermissionDeniedError } from '../src/core/errors.js';
import { createMemoryReporter } from '../src/core/reporter.js';
import { listApplications, runWarmUp, type WarmUpRequest } from '../src/core/runner.js';
import type { Sleep } from '../src/core/warmup.js';
import { StubBinding, app, noSleep } from './helpers/stub-binding.js';

const DIRECTORY = [app('Slack Helper', 100), app('Slack', 101), app('Finder', 102)];

const knownDefaults: WarmUpRequest = { mode: { kind: 'known-defaults' }, delaySeconds: 0 };
const allRunning: WarmUpRequest = { mode: { kind: 'all-running' }, delaySeconds: 0 };
const fragments = (...names: string[]): WarmUpRequest => ({
  mode: { kind: 'fragments', fragments: names },
  delaySeconds: 0,
});

describe('runWarmUp', () => {
  it('warms the known app and skips its helper', async () => {
    const binding = new StubBinding({ apps: DIRECTORY });
    const reporter = createMemoryReporter();

    const result = await runWarmUp(binding, knownDefaults, reporter, { sleep: noSleep });

    expect(result.exitCode).toBe(0);
    expect(binding.copyCalls.map((call) => call.pid)).toEqual([101]);
    expect(result.summary?.successes).toEqual(['Slack']);
    expect(result.summary?.skipped).toEqual(['Slack Helper']);
    expect(reporter.messages('info')).toContain('Found 1 application(s): Slack');
    expect(reporter.messages('debug')).toContain('Skipping helper process Slack Helper (PID: 100)');
  });

  it('fails with NoMatch when requested fragments match nothing', async () => {
    const binding = new StubBinding({ apps: DIRECTORY });
    const reporter = createMemoryReporter();

    const result = await runWarmUp(binding, fragments('zzzznoapp'), reporter);

    expect(result.exitCode).toBe(1);
    expect(result.error).toBeInstanceOf(NoMatchError);
    expect(result.selection).toBeUndefined();
    expect(binding.copyCalls).toEqual([]);
    expect(reporter.messages('error')).toEqual(['No running applications found matching: zzzznoapp']);
  });

  it('fails with NoMatch when fragments only match helpers', async () => {
    const binding = new StubBinding({ apps: DIRECTORY });
    const reporter = createMemoryReporter();

    const result = await runWarmUp(binding, fragments('helper'), reporter);

    expect(result.exitCode).toBe(1);
    expect(binding.copyCalls).toEqual([]);
    expect(reporter.messages('error')).toEqual([
      'No running applications found matching: helper (1 helper process skipped)',
    ]);
  });

  it('stops before enumeration without permission', async () => {
    const binding = new StubBinding({ apps: DIRECTORY, trusted: false });
    const reporter = createMemoryReporter();

    const result = await runWarmUp(binding, knownDefaults, reporter);

    expect(result.exitCode).toBe(1);
    expect(result.error).toBeInstanceOf(PermissionDeniedError);
    expect(binding.directoryCalls).toBe(0);
    expect(binding.copyCalls).toEqual([]);
    expect(reporter.messages('error')[0]).toMatch(/^Accessibility permission not granted\./);
  });

  it('aborts when the directory is unavailable', async () => {
    const binding = new StubBinding({ directoryError: new Error('NSWorkspace unavailable') });
    const reporter = createMemoryReporter();

    const result = await runWarmUp(binding, allRunning, reporter);

    expect(result.exitCode).toBe(1);
    expect(result.error).toBeInstanceOf(DirectoryUnavailableError);
    expect(result.summary).toBeUndefined();
    expect(reporter.messages('error')).toEqual(['Could not list running applications: NSWorkspace unavailable']);
  });

  it('treats an empty directory as nothing to do', async () => {
    for (const request of [allRunning, knownDefaults, fragments('slack')]) {
      const reporter = createMemoryReporter();
      const result = await runWarmUp(new StubBinding({ apps: [] }), request, reporter);

      expect(result.exitCode).toBe(0);
      expect(result.summary?.attemptedCount).toBe(0);
      expect(reporter.messages('info')).toContain('No running applications found.');
    }
  });

  it('treats no running known apps as nothing to do', async () => {
    const reporter = createMemoryReporter();
    const result = await runWarmUp(new StubBinding({ apps: [app('Finder', 102)] }), knownDefaults, reporter);

    expect(result.exitCode).toBe(0);
    expect(reporter.messages('info')).toContain('No known lazily-initializing applications running.');
  });

  it('exits 1 when every attempt fails', async () => {
    const binding = new StubBinding({
      apps: DIRECTORY,
      roles: { 101: { raw: [-25212, null] }, 102: { raw: [-25211, null] } },
    });

    const result = await runWarmUp(binding, allRunning, createMemoryReporter(), { sleep: noSleep });

    expect(result.exitCode).toBe(1);
    expect(result.summary).toMatchObject({ partialCount: 1, failureCount: 1, skippedCount: 1 });
  });

  it('exits 0 when at least one attempt succeeds', async () => {
    const binding = new StubBinding({ apps: DIRECTORY, roles: { 102: { raw: [-25211, null] } } });
    const result = await runWarmUp(binding, allRunning, createMemoryReporter(), { sleep: noSleep });

    expect(result.exitCode).toBe(0);
    expect(result.summary).toMatchObject({ successes: ['Slack'], failures: ['Finder'] });
  });

  it('converts the delay to milliseconds', async () => {
    const sleep = vi.fn<Sleep>(noSleep);
    await runWarmUp(new StubBinding({ apps: DIRECTORY }), { ...fragments('slack'), delaySeconds: 0.25 }, createMemoryReporter(), {
      sleep,
    });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([250]);
  });

  it('passes configured known apps through to selection', async () => {
    const binding = new StubBinding({ apps: DIRECTORY });
    const result = await runWarmUp(binding, knownDefaults, createMemoryReporter(), {
      knownApps: ['finder'],
      sleep: noSleep,
    });

    expect(result.summary?.successes).toEqual(['Finder']);
  });
});

describe('listApplications', () => {
  it('lists applications sorted by name without reading any attribute', async () => {
    const binding = new StubBinding({ apps: [app('Slack', 101), app('finder', 102), app('Arc', 103)] });

    const records = await listApplications(binding);
    const lines = formatApplicationList(records);

    expect(lines).toEqual([
      `${'Arc'.padEnd(30)} (PID: 103)`,
      `${'finder'.padEnd(30)} (PID: 102)`,
      `${'Slack'.padEnd(30)} (PID: 101)`,
    ]);
    expect(binding.copyCalls).toEqual([]);
  });

  it('requires permission', async () => {
    const binding = new StubBinding({ apps: [app('Slack', 101)], trusted: false });
    await expect(listApplications(binding)).rejects.toBeInstanceOf(PermissionDeniedError);
    expect(binding.directoryCalls).toBe(0);
  });
});
