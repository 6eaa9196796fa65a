import type { RunOptions, RunResult } from '@modegreet/core';
import { CommandFailedError, UserCreationError } from '../errors';
import { filterSudoNoise, LiveOnboardService } from '../service/live';

interface Call {
  command: string;
  args: string[];
  options?: RunOptions;
}

function fakeRunner(results: Array<Partial<RunResult> | Error> = []) {
  const calls: Call[] = [];
  const run = async (command: string, args: string[], options?: RunOptions): Promise<RunResult> => {
    calls.push({ command, args, options });
    const next = results.shift() ?? {};
    if (next instanceof Error) throw next;
    return { exitCode: 0, stdout: '', stderr: '', ...next };
  };
  return { calls, run };
}

describe('LiveOnboardService', () => {
  describe('createUser', () => {
    it('runs useradd, then chpasswd with the password on stdin', async () => {
      const { calls, run } = fakeRunner();
      const service = new LiveOnboardService({ run });

      await service.createUser('alice', 'test-secret', { groups: ['wheel', 'audio'], shell: '/bin/zsh' });

      expect(calls).toEqual([
        { command: 'useradd', args: ['-m', '-s', '/bin/zsh', '-G', 'wheel,audio', 'alice'], options: undefined },
        { command: 'chpasswd', args: [], options: { input: 'alice:test-secret\n' } },
      ]);
    });

    it('omits -G without groups', async () => {
      const { calls, run } = fakeRunner();
      await new LiveOnboardService({ run }).createUser('bob', 'test-secret', { groups: [], shell: '/bin/bash' });
      expect(calls[0]?.args).toEqual(['-m', '-s', '/bin/bash', 'bob']);
    });

    it('fails with the useradd exit code', async () => {
      const { calls, run } = fakeRunner([{ exitCode: 9 }]);
      const promise = new LiveOnboardService({ run }).createUser('alice', 'test-secret', { groups: [], shell: '/bin/bash' });

      await expect(promise).rejects.toThrow(UserCreationError);
      await expect(promise).rejects.toThrow('useradd failed with code 9');
      expect(calls).toHaveLength(1);
    });

    it('wraps launch failures', async () => {
      const { run } = fakeRunner([new Error('spawn useradd ENOENT')]);
      const promise = new LiveOnboardService({ run }).createUser('alice', 'test-secret', { groups: [], shell: '/bin/bash' });

      await expect(promise).rejects.toThrow(CommandFailedError);
      await expect(promise).rejects.toThrow('Failed to run useradd: spawn useradd ENOENT');
    });
  });

  describe('runAsUser', () => {
    it('quotes argv into a login shell command', async () => {
      const { calls, run } = fakeRunner([{ stdout: 'done\n' }]);
      const output = await new LiveOnboardService({ run }).runAsUser('alice', ['flatpak', 'install', 'my app']);

      expect(output).toBe('done\n');
      expect(calls[0]).toEqual({ command: 'su', args: ['-l', 'alice', '-c', "flatpak install 'my app'"], options: undefined });
    });

    it('reports stderr on failure', async () => {
      const { run } = fakeRunner([{ exitCode: 1, stderr: 'not found\n' }]);
      await expect(new LiveOnboardService({ run }).runAsUser('alice', ['nope'])).rejects.toThrow('Command failed: not found');
    });

    it('rejects an empty argv', async () => {
      const { calls, run } = fakeRunner();
      await expect(new LiveOnboardService({ run }).runAsUser('alice', [])).rejects.toThrow('Empty command');
      expect(calls).toHaveLength(0);
    });
  });

  describe('runSudoAsUser', () => {
    it('passes the password on stdin and never in argv', async () => {
      const { calls, run } = fakeRunner();
      await new LiveOnboardService({ run }).runSudoAsUser('alice', ['pacman', '-S', 'git'], 'test-secret');

      expect(calls[0]).toEqual({
        command: 'su',
        args: ['-l', 'alice', '-c', "sudo -S -p '' pacman -S git"],
        options: { input: 'test-secret\n' },
      });
      expect(calls[0]?.args.join(' ')).not.toContain('test-secret');
    });

    it('drops sudo prompt lines from the failure message', async () => {
      const { run } = fakeRunner([
        { exitCode: 1, stderr: '[sudo] password for alice: \nerror: target not found: nope\n' },
      ]);
      await expect(new LiveOnboardService({ run }).runSudoAsUser('alice', ['pacman', '-S', 'nope'], 'test-secret')).rejects.toThrow(
        'Command failed: error: target not found: nope',
      );
    });
  });

  describe('system settings', () => {
    it('applies locale, keymap and timezone', async () => {
      const { calls, run } = fakeRunner();
      const service = new LiveOnboardService({ run });

      await service.setLocale('de_DE.UTF-8');
      await service.setKeymap('de');
      await service.setTimezone('Europe/Berlin');

      expect(calls.map((c) => [c.command, ...c.args])).toEqual([
        ['localectl', 'set-locale', 'LANG=de_DE.UTF-8'],
        ['localectl', 'set-keymap', 'de'],
        ['timedatectl', 'set-timezone', 'Europe/Berlin'],
      ]);
    });

    it('names the failing subcommand', async () => {
      const { run } = fakeRunner([{ exitCode: 1 }]);
      await expect(new LiveOnboardService({ run }).setLocale('xx')).rejects.toThrow(
        'localectl set-locale failed with code 1',
      );
    });
  });

  describe('lists', () => {
    it('splits command output into lines', async () => {
      const { run } = fakeRunner([{ stdout: 'Europe/Berlin\nUTC\n' }]);
      await expect(new LiveOnboardService({ run }).listTimezones()).resolves.toEqual(['Europe/Berlin', 'UTC']);
    });

    it('falls back when the command fails or cannot run', async () => {
      const failing = fakeRunner([{ exitCode: 1 }]);
      await expect(new LiveOnboardService({ run: failing.run }).listLocales()).resolves.toEqual(['en_US.UTF-8']);

      const missing = fakeRunner([new Error('spawn localectl ENOENT')]);
      await expect(new LiveOnboardService({ run: missing.run }).listKeymaps()).resolves.toEqual(['us']);
    });
  });

  describe('checkConnectivity', () => {
    it('is connected when ping succeeds', async () => {
      const { calls, run } = fakeRunner();
      await expect(new LiveOnboardService({ run }).checkConnectivity()).resolves.toBe(true);
      expect(calls[0]?.command).toBe('ping');
    });

    it('is disconnected when ping fails or cannot run', async () => {
      await expect(new LiveOnboardService({ run: fakeRunner([{ exitCode: 2 }]).run }).checkConnectivity()).resolves.toBe(false);
      await expect(
        new LiveOnboardService({ run: fakeRunner([new Error('spawn ping ENOENT')]).run }).checkConnectivity(),
      ).resolves.toBe(false);
    });
  });
});

describe('filterSudoNoise', () => {
  it('keeps only diagnostic lines', () => {
    expect(filterSudoNoise('[sudo] password for alice: \nSorry, try again.\n')).toBe('Sorry, try again.');
    expect(filterSudoNoise('warning: one\nwarning: two\n')).toBe('warning: one\nwarning: two');
  });
});
