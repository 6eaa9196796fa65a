/**
 * Onboarding service that touches nothing
 *
 * Reports connectivity, returns fixed lists and succeeds at everything.
 */

import { getLogger } from '@modegreet/core';
import type { CreateUserOptions, OnboardService } from './types.js';

export const DRY_RUN_LOCALES = [
  'en_US.UTF-8',
  'en_GB.UTF-8',
  'de_DE.UTF-8',
  'fr_FR.UTF-8',
  'es_ES.UTF-8',
  'it_IT.UTF-8',
  'pt_BR.UTF-8',
  'ja_JP.UTF-8',
  'zh_CN.UTF-8',
  'ko_KR.UTF-8',
];

export const DRY_RUN_KEYMAPS = ['us', 'uk', 'de', 'fr', 'es', 'it', 'pt', 'ru', 'jp', 'cn', 'dvorak', 'colemak'];

export const DRY_RUN_TIMEZONES = [
  'UTC',
  'America/New_York',
  'America/Chicago',
  'America/Denver',
  'America/Los_Angeles',
  'America/Sao_Paulo',
  'Europe/London',
  'Europe/Paris',
  'Europe/Berlin',
  'Asia/Tokyo',
  'Asia/Shanghai',
  'Asia/Kolkata',
  'Australia/Sydney',
];

export class DryRunOnboardService implements OnboardService {
  readonly dryRun = true;
  private readonly log = getLogger('onboard-service');

  constructor(private readonly connected = true) {}

  async checkConnectivity(): Promise<boolean> {
    return this.connected;
  }

  async listLocales(): Promise<string[]> {
    return [...DRY_RUN_LOCALES];
  }

  async listKeymaps(): Promise<string[]> {
    return [...DRY_RUN_KEYMAPS];
  }

  async listTimezones(): Promise<string[]> {
    return [...DRY_RUN_TIMEZONES];
  }

  async setLocale(locale: string): Promise<void> {
    this.log.info({ locale }, 'Dry run: locale not applied');
  }

  async setKeymap(keymap: string): Promise<void> {
    this.log.info({ keymap }, 'Dry run: keymap not applied');
  }

  async setTimezone(timezone: string): Promise<void> {
    this.log.info({ timezone }, 'Dry run: timezone not applied');
  }

  async createUser(username: string, _password: string, options: CreateUserOptions): Promise<void> {
    this.log.info({ username, groups: options.groups }, 'Dry run: user not created');
  }

  async runAsUser(username: string, argv: string[]): Promise<string> {
    this.log.info({ username, argv }, 'Dry run: command not run');
    return '';
  }

  async runSudoAsUser(username: string, argv: string[]): Promise<string> {
    this.log.info({ username, argv }, 'Dry run: sudo command not run');
    return '';
  }

  async removeInitialSession(): Promise<void> {
    this.log.info('Dry run: greetd configuration left unchanged');
  }
}
