import { describe, it, expect, vi, afterEach } from 'vitest';
import { printApplicationList } from '../src/cli/commands/list.js';
import { StubBinding, app } from './helpers/stub-binding.js';

describe('printApplicationList', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the sorted listing with a total and returns 0', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const binding = new StubBinding({ apps: [app('Slack', 101), app('Arc', 103)] });

    const exitCode = await printApplicationList(binding, { quiet: true });

    expect(exitCode).toBe(0);
    const lines = log.mock.calls.map((args) => args[0]);
    expect(lines).toContain(`${'Arc'.padEnd(30)} (PID: 103)`);
    expect(lines.indexOf(`${'Arc'.padEnd(30)} (PID: 103)`)).toBeLessThan(
      lines.indexOf(`${'Slack'.padEnd(30)} (PID: 101)`)
    );
    expect(log).toHaveBeenLastCalledWith('Total: 2 applications');
    expect(binding.copyCalls).toEqual([]);
  });

  it('returns 1 without listing when permission is missing', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const binding = new StubBinding({ apps: [app('Slack', 101)], trusted: false });

    const exitCode = await printApplicationList(binding, { quiet: true });

    expect(exitCode).toBe(1);
    expect(binding.directoryCalls).toBe(0);
    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith(expect.stringContaining('Accessibility permission not granted.'));
  });

  it('returns 1 when the application list is unavailable', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const binding = new StubBinding({ directoryError: new Error('workspace offline') });

    expect(await printApplicationList(binding, { quiet: true })).toBe(1);
    expect(error).toHaveBeenCalledWith('Could not list running applications: workspace offline');
  });
});
