import { describe, it, expect } from 'vitest';
import { HomebrewPackageManager } from '../../../src/core/installer/homebrew.js';
import { CommandError } from '../../../src/core/errors.js';
import { fakeRunner } from './fakes.js';

describe('HomebrewPackageManager', () => {
  it('should query casks with the cask flag', async () => {
    const { run, calls } = fakeRunner({ 'brew list --cask emacs': { code: 1 } });
    const brew = new HomebrewPackageManager(run);

    expect(await brew.isInstalled('emacs', { cask: true })).toBe(false);
    expect(calls).toEqual([{ command: 'brew', args: ['list', '--cask', 'emacs'] }]);
  });

  it('should upgrade a package that is already installed', async () => {
    const { run, calls } = fakeRunner();
    const brew = new HomebrewPackageManager(run);

    const outcome = await brew.installOrUpgrade('vim');

    expect(outcome).toEqual({ ok: true, action: 'upgraded', message: 'vim upgraded successfully' });
    expect(calls[1]).toEqual({ command: 'brew', args: ['upgrade', 'vim'] });
  });

  it('should install a missing package and report the first stderr line on failure', async () => {
    const { run, calls } = fakeRunner({
      'brew list tree': { code: 1 },
      'brew install tree': { code: 1, stderr: 'Error: No available formula\nmore detail\n' },
    });
    const brew = new HomebrewPackageManager(run);

    const outcome = await brew.installOrUpgrade('tree');

    expect(calls[1]).toEqual({ command: 'brew', args: ['install', 'tree'] });
    expect(outcome).toEqual({ ok: false, action: 'installed', message: 'Error: No available formula' });
  });

  it('should update itself when already present', async () => {
    const { run, calls } = fakeRunner();
    const brew = new HomebrewPackageManager(run);

    const outcome = await brew.bootstrap();

    expect(outcome).toEqual({ ok: true, action: 'updated', message: 'Homebrew updated successfully' });
    expect(calls.map(c => c.command)).toEqual(['which', 'brew']);
    expect(calls[1].args).toEqual(['update']);
  });

  it('should run the install script when missing', async () => {
    const { run, calls } = fakeRunner({ 'which brew': { code: 1 } });
    const brew = new HomebrewPackageManager(run);

    const outcome = await brew.bootstrap();

    expect(outcome.action).toBe('installed');
    expect(calls[1].command).toBe('/bin/bash');
    expect(calls[1].args).toEqual([
      '-c',
      expect.stringMatching(/^\/bin\/bash -c "\$\(curl -fsSL https:\/\/\S+\/install\.sh\)"$/),
    ]);
  });

  it('should throw a CommandError when cleanup fails', async () => {
    const { run } = fakeRunner({ 'brew cleanup': { code: 2, stderr: 'locked' } });
    const brew = new HomebrewPackageManager(run);

    await expect(brew.cleanup()).rejects.toThrow(CommandError);
    await expect(brew.cleanup()).rejects.toThrow('brew cleanup exited with code 2: locked');
  });
});
