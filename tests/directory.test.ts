import { describe, it, expect } from 'vitest';
import { listRunningApplications, sortByName, toApplicationRecord } from '../src/core/directory.js';
import { DirectoryUnavailableError } from '../src/core/errors.js';
import { StubBinding, app } from './helpers/stub-binding.js';

describe('toApplicationRecord', () => {
  it('defaults a missing bundle identifier to an empty string', () => {
    expect(toApplicationRecord(app('Finder', 102))).toEqual({
      name: 'Finder',
      processId: 102,
      bundleIdentifier: '',
    });
  });

  it('drops entries without a name or a positive pid', () => {
    expect(toApplicationRecord(app(null, 5))).toBeNull();
    expect(toApplicationRecord(app('', 5))).toBeNull();
    expect(toApplicationRecord(app('kernel_task', 0))).toBeNull();
    expect(toApplicationRecord(app('Ghost', -1))).toBeNull();
  });

  it('returns frozen records', () => {
    expect(Object.isFrozen(toApplicationRecord(app('Slack', 101)))).toBe(true);
  });
});

describe('listRunningApplications', () => {
  it('keeps platform order and filters unnamed entries', async () => {
    const binding = new StubBinding({
      apps: [app('Slack', 101, 'com.tinyspeck.slackmacgap'), app(null, 103), app('Finder', 102, 'com.apple.finder')],
    });

    expect(await listRunningApplications(binding)).toEqual([
      { name: 'Slack', processId: 101, bundleIdentifier: 'com.tinyspeck.slackmacgap' },
      { name: 'Finder', processId: 102, bundleIdentifier: 'com.apple.finder' },
    ]);
  });

  it('builds fresh records on every query', async () => {
    const binding = new StubBinding({ apps: [app('Slack', 101)] });
    const [first] = await listRunningApplications(binding);
    const [second] = await listRunningApplications(binding);

    expect(first).toEqual(second);
    expect(first).not.toBe(second);
  });

  it('raises DirectoryUnavailableError when the platform list fails', async () => {
    const binding = new StubBinding({ directoryError: new Error('NSWorkspace unavailable') });

    await expect(listRunningApplications(binding)).rejects.toBeInstanceOf(DirectoryUnavailableError);
    await expect(listRunningApplications(binding)).rejects.toThrow(
      'Could not list running applications: NSWorkspace unavailable'
    );
  });
});

describe('sortByName', () => {
  it('sorts case-insensitively without mutating the input', () => {
    const records = [
      { name: 'slack', processId: 3, bundleIdentifier: '' },
      { name: 'Finder', processId: 2, bundleIdentifier: '' },
      { name: 'Arc', processId: 1, bundleIdentifier: '' },
    ];

    expect(sortByName(records).map((r) => r.name)).toEqual(['Arc', 'Finder', 'slack']);
    expect(records.map((r) => r.name)).toEqual(['slack', 'Finder', 'Arc']);
  });

  it('breaks name ties by pid', () => {
    const records = [
      { name: 'Code', processId: 20, bundleIdentifier: '' },
      { name: 'code', processId: 10, bundleIdentifier: '' },
    ];
    expect(sortByName(records).map((r) => r.processId)).toEqual([10, 20]);
  });
});
