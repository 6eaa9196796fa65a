/**
 * Onboarding service backed by systemd tools and shadow-utils
 */

import { quote } from 'shell-quote';
import { errorMessage, getLogger, runProcess, type RunOptions, type RunResult } from '@modegreet/core';
import { CommandFailedError, UserCreationError } from '../errors.js';
import { GREETD_CONFIG_PATH, removeInitialSessionFrom } from './greetd-config.js';
import type { CreateUserOptions, OnboardService } from './types.js';

const CONNECTIVITY_CHECK = ['ping', '-c', '1', '-W', '2', '1.1.1.1'];

/**
 * Drop stderr lines that would echo sudo's prompt.
 */
export function filterSudoNoise(stderr: string): string {
  return stderr
    .split('\n')
    .filter((line) => !line.includes('[sudo]') && !line.includes('password'))
    .join('\n')
    .trim();
}

export interface LiveOnboardServiceOptions {
  greetdConfigPath?: string;
  /** Process runner, replaceable in tests */
  run?: (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;
}

export class LiveOnboardService implements OnboardService {
  readonly dryRun = false;
  private readonly greetdConfigPath: string;
  private readonly run: (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;
  private readonly log = getLogger('onboard-service');

  constructor(options: LiveOnboardServiceOptions = {}) {
    this.greetdConfigPath = options.greetdConfigPath || GREETD_CONFIG_PATH;
    this.run = options.run || runProcess;
  }

  async checkConnectivity(): Promise<boolean> {
    const [command = 'ping', ...args] = CONNECTIVITY_CHECK;
    try {
      const result = await this.run(command, args);
      return result.exitCode === 0;
    } catch (err) {
      this.log.debug({ err }, 'Connectivity check could not run');
      return false;
    }
  }

  listLocales(): Promise<string[]> {
    return this.listOutput('localectl', ['list-locales'], 'en_US.UTF-8');
  }

  listKeymaps(): Promise<string[]> {
    return this.listOutput('localectl', ['list-keymaps'], 'us');
  }

  listTimezones(): Promise<string[]> {
    return this.listOutput('timedatectl', ['list-timezones'], 'UTC');
  }

  async setLocale(locale: string): Promise<void> {
    await this.checked('localectl', ['set-locale', `LANG=${locale}`]);
  }

  async setKeymap(keymap: string): Promise<void> {
    await this.checked('localectl', ['set-keymap', keymap]);
  }

  async setTimezone(timezone: string): Promise<void> {
    await this.checked('timedatectl', ['set-timezone', timezone]);
  }

  async createUser(username: string, password: string, options: CreateUserOptions): Promise<void> {
    const args = ['-m', '-s', options.shell];
    if (options.groups.length > 0) {
      args.push('-G', options.groups.join(','));
    }
    args.push(username);

    this.log.info({ username, groups: options.groups }, 'Creating user');
    const added = await this.spawn('useradd', args);
    if (added.exitCode !== 0) {
      throw new UserCreationError(`useradd failed with code ${added.exitCode}`, username);
    }

    const passwd = await this.spawn('chpasswd', [], { input: `${username}:${password}\n` });
    if (passwd.exitCode !== 0) {
      throw new UserCreationError(`chpasswd failed with code ${passwd.exitCode}`, username);
    }
    this.log.info({ username }, 'User created');
  }

  async runAsUser(username: string, argv: string[]): Promise<string> {
    if (argv.length === 0) {
      throw new CommandFailedError('Empty command', '');
    }
    const script = quote(argv);
    this.log.info({ username, argv }, 'Running command as user');
    const result = await this.spawn('su', ['-l', username, '-c', script]);
    if (result.exitCode !== 0) {
      throw new CommandFailedError(`Command failed: ${result.stderr.trim() || result.stdout.trim()}`, script);
    }
    return result.stdout;
  }

  async runSudoAsUser(username: string, argv: string[], password: string): Promise<string> {
    if (argv.length === 0) {
      throw new CommandFailedError('Empty command', '');
    }
    const script = `sudo -S -p '' ${quote(argv)}`;
    this.log.info({ username, argv }, 'Running sudo command as user');
    const result = await this.spawn('su', ['-l', username, '-c', script], { input: `${password}\n` });
    if (result.exitCode !== 0) {
      const diagnostics = filterSudoNoise(result.stderr) || result.stdout.trim();
      throw new CommandFailedError(`Command failed: ${diagnostics}`, script);
    }
    return result.stdout;
  }

  async removeInitialSession(): Promise<void> {
    const removed = await removeInitialSessionFrom(this.greetdConfigPath);
    this.log.info({ path: this.greetdConfigPath, removed }, 'Checked greetd initial_session');
  }

  private async listOutput(command: string, args: string[], fallback: string): Promise<string[]> {
    try {
      const result = await this.run(command, args);
      if (result.exitCode === 0) {
        return result.stdout.split('\n').filter((line) => line.length > 0);
      }
      this.log.warn({ command, exitCode: result.exitCode }, 'Listing failed, using fallback');
    } catch (err) {
      this.log.warn({ err, command }, 'Listing failed, using fallback');
    }
    return [fallback];
  }

  private async checked(command: string, args: string[]): Promise<void> {
    const result = await this.spawn(command, args);
    if (result.exitCode !== 0) {
      const [subcommand = ''] = args;
      throw new CommandFailedError(`${command} ${subcommand} failed with code ${result.exitCode}`, command);
    }
  }

  /** Run, turning launch failures into CommandFailedError */
  private async spawn(command: string, args: string[], options?: RunOptions): Promise<RunResult> {
    try {
      return await this.run(command, args, options);
    } catch (err) {
      throw new CommandFailedError(`Failed to run ${command}: ${errorMessage(err)}`, command);
    }
  }
}
