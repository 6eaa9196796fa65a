/**
 * System operations used by the wizard
 */

export interface CreateUserOptions {
  groups: string[];
  shell: string;
}

export interface OnboardService {
  readonly dryRun: boolean;

  checkConnectivity(): Promise<boolean>;

  listLocales(): Promise<string[]>;
  listKeymaps(): Promise<string[]>;
  listTimezones(): Promise<string[]>;

  setLocale(locale: string): Promise<void>;
  setKeymap(keymap: string): Promise<void>;
  setTimezone(timezone: string): Promise<void>;

  createUser(username: string, password: string, options: CreateUserOptions): Promise<void>;

  /** Run argv in a login shell of `username`; resolves with stdout */
  runAsUser(username: string, argv: string[]): Promise<string>;

  /** Like runAsUser, through `sudo -S` with the password on stdin */
  runSudoAsUser(username: string, argv: string[], password: string): Promise<string>;

  /** Drop the auto-login block from the greetd configuration */
  removeInitialSession(): Promise<void>;
}
