/**
 * Onboarding wizard controller
 *
 * Owns every piece of wizard state: panel focus, the step ledger, form
 * buffers, picker, package selection, task list and simulation clock.
 * Keys and ticks come from the event loop. Background work is started
 * here but only reports back through the execution channel, which the
 * loop drains with `processMessages()` once per iteration.
 *
 * Actions the controller cannot perform itself (running the network
 * helper on the terminal, powering off, handing over to the login screen)
 * are returned from `handleKey` for the loop to carry out.
 */

import {
  getLogger,
  isChar,
  isCtrl,
  ModalInput,
  TextBuffer,
  type EditMode,
  type KeyEvent,
  type NavigateDirection,
} from '@modegreet/core';
import { parseWizardCommand, type WizardCommand } from './commands.js';
import type { OnboardConfig } from './config/schema.js';
import {
  ExecutionChannel,
  pendingTasks,
  type ExecutionMessage,
  type PickerStep,
  type TaskStatus,
} from './execution.js';
import { PackageSelection } from './packages.js';
import type { OnboardService } from './service/types.js';
import { SimulationClock } from './simulation.js';
import { buildMenu, StepLedger, type MenuItem, type StepId } from './steps.js';
import { runReview, runUpdate, runUserCreation } from './tasks.js';
import { validateUserForm } from './validation.js';

export type PanelFocus = 'welcome' | 'sidebar' | 'content';

export type ContentFocus = { kind: 'picker' } | { kind: 'field'; index: number } | { kind: 'none' };

export type ConfirmAction = 'reboot' | 'poweroff' | 'cancel';

export type OnboardAction =
  | { type: 'launch-external'; program: string; args: string[] }
  | { type: 'reboot' }
  | { type: 'poweroff' }
  | { type: 'transition-to-login' };

export interface StatusMessage {
  text: string;
  isError: boolean;
}

export interface StatusHints {
  left: string;
  right: string;
}

export interface OnboardControllerOptions {
  config: OnboardConfig;
  service: OnboardService;
  channel?: ExecutionChannel;
}

export const SPINNER_FRAMES = ['|', '/', '-', '\\'];

/** Ticks between background connectivity checks */
const CHECK_INTERVAL = 4;

const LOCKED_MESSAGE = 'This step is locked. Complete previous steps first.';

export class OnboardController {
  readonly config: OnboardConfig;
  readonly menu: MenuItem[];
  readonly ledger: StepLedger;
  readonly packages: PackageSelection;
  readonly channel: ExecutionChannel;
  readonly input = new ModalInput({ initialMode: 'normal', keymap: 'panel' });

  readonly username = new TextBuffer();
  readonly password = TextBuffer.masked();
  readonly passwordConfirm = TextBuffer.masked();
  readonly sudoPassword = TextBuffer.masked();
  readonly pickerFilter = new TextBuffer();

  panelFocus: PanelFocus = 'welcome';
  contentFocus: ContentFocus = { kind: 'none' };
  selectedStep = 0;

  pickerItems: string[] = [];
  pickerSelected = 0;

  selectedLocale?: string;
  selectedKeyboard?: string;
  selectedTimezone?: string;

  sudoNeeded = false;
  sudoEntered = false;
  updateCategory = 0;
  /** null while the category header is focused */
  updatePackage: number | null = null;

  tasks: TaskStatus[] = [];
  isExecuting = false;
  createdUsername: string | null = null;
  networkConnected = false;

  message: StatusMessage | null = null;
  confirm: ConfirmAction | null = null;
  showHelp = false;
  shouldExit = false;
  setupStarted = false;
  setupComplete = false;
  spinnerFrame = 0;

  private readonly service: OnboardService;
  private readonly clock = new SimulationClock();
  private readonly pending = new Set<Promise<void>>();
  private probing = false;
  private readonly log = getLogger('onboard');

  constructor(options: OnboardControllerOptions) {
    this.config = options.config;
    this.service = options.service;
    this.channel = options.channel ?? new ExecutionChannel();
    this.menu = buildMenu(options.config);
    this.ledger = new StepLedger(this.menu);
    this.packages = new PackageSelection(options.config.updates);
  }

  get dryRun(): boolean {
    return this.service.dryRun;
  }

  get mode(): EditMode {
    return this.input.mode;
  }

  get currentItem(): MenuItem | undefined {
    return this.menu[this.selectedStep];
  }

  get currentStepId(): StepId | undefined {
    return this.currentItem?.id;
  }

  get spinner(): string {
    return SPINNER_FRAMES[this.spinnerFrame] ?? '|';
  }

  get simulating(): boolean {
    return this.clock.active;
  }

  /** Check connectivity once before the first screen */
  init(): void {
    this.checkNetwork(this.config.network.skip_if_connected);
  }

  /** Wipe every secret field; called when the wizard goes away */
  dispose(): void {
    this.password.dispose();
    this.passwordConfirm.dispose();
    this.sudoPassword.dispose();
  }

  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  /**
   * Apply everything background work has posted, in arrival order.
   */
  processMessages(): number {
    const messages = this.channel.drain();
    for (const message of messages) {
      this.applyMessage(message);
    }
    return messages.length;
  }

  tick(): void {
    this.spinnerFrame = (this.spinnerFrame + 1) % SPINNER_FRAMES.length;
    if (this.spinnerFrame % CHECK_INTERVAL === 0) {
      this.checkNetwork(false);
    }
    this.clock.tick(this.tasks);
  }

  filteredPickerItems(): string[] {
    const filter = this.pickerFilter.content().toLowerCase();
    if (filter.length === 0) {
      return this.pickerItems;
    }
    return this.pickerItems.filter((item) => item.toLowerCase().includes(filter));
  }

  /**
   * Buffer under the cursor in the content panel, if any.
   */
  focusedBuffer(): TextBuffer | null {
    if (this.panelFocus !== 'content') return null;
    if (this.contentFocus.kind === 'picker') return this.pickerFilter;
    if (this.contentFocus.kind !== 'field') return null;

    const index = this.contentFocus.index;
    switch (this.currentStepId) {
      case 'user':
        return [this.username, this.password, this.passwordConfirm][index] ?? null;
      case 'update':
        return index === 0 ? this.sudoPassword : null;
      default:
        return null;
    }
  }

  handleKey(key: KeyEvent): OnboardAction | null {
    if (this.message && !this.isExecuting) {
      this.message = null;
    }

    if (this.confirm !== null) {
      return this.handleConfirmKey(key, this.confirm);
    }

    if (this.showHelp) {
      if (key.code === 'escape' || isChar(key, 'q')) {
        this.showHelp = false;
      }
      return null;
    }

    if (this.isExecuting) {
      return null;
    }

    switch (this.input.mode) {
      case 'normal':
        return this.handleNormalKey(key);
      case 'insert':
        return this.handleInsertKey(key);
      case 'command':
        return this.handleCommandKey(key);
    }
  }

  /**
   * Report the outcome of a launched network helper.
   */
  externalFinished(program: string, outcome: { exitCode: number } | { error: string }): void {
    if ('error' in outcome) {
      this.setError(`Failed to launch ${program}: ${outcome.error}`);
    } else if (outcome.exitCode !== 0) {
      this.setError(`${program} exited with code ${outcome.exitCode}`);
    }
    this.checkNetwork(true);
  }

  statusHints(): StatusHints {
    if (this.isExecuting) return { left: 'Please wait...', right: '' };
    if (this.input.mode === 'command') return { left: '', right: 'Enter: run  Esc: cancel' };

    switch (this.panelFocus) {
      case 'welcome':
        return { left: '', right: 'Enter: start setup' };
      case 'sidebar':
        return { left: 'j/k: navigate', right: 'l/Enter: edit  :help' };
      case 'content':
        return this.contentHints();
    }
  }

  // Key handling

  private handleNormalKey(key: KeyEvent): OnboardAction | null {
    if (isCtrl(key, 'h')) {
      this.focusSidebar();
      return null;
    }
    if (isCtrl(key, 'l')) {
      this.focusContent();
      return null;
    }

    const intent = this.input.handleKey(key, this.focusedBuffer());
    switch (intent.type) {
      case 'none':
      case 'edited':
        return null;
      case 'submit':
        return this.handleEnter();
      case 'execute':
        return this.executeCommand(intent.command);
      case 'navigate':
        return this.navigateNormal(intent.direction);
      case 'unhandled':
        return this.handleNormalExtra(intent.key);
    }
  }

  private navigateNormal(direction: NavigateDirection): OnboardAction | null {
    switch (direction) {
      case 'down':
      case 'next':
        this.navigate(1);
        return null;
      case 'up':
      case 'prev':
        this.navigate(-1);
        return null;
      case 'left':
        if (this.panelFocus === 'content') this.focusSidebar();
        return null;
      case 'right':
        if (this.panelFocus === 'sidebar') {
          if (this.ledger.isLocked(this.selectedStep)) {
            this.setError(LOCKED_MESSAGE);
          } else {
            this.focusContent();
          }
          return null;
        }
        return this.handleEnter();
    }
  }

  private handleNormalExtra(key: KeyEvent): OnboardAction | null {
    if (key.code === 'escape') {
      if (this.panelFocus === 'content') this.focusSidebar();
      return null;
    }
    if (key.code === 'f1' || isChar(key, '?')) {
      this.showHelp = true;
      return null;
    }
    if (key.code === 'f12') {
      this.confirm = 'poweroff';
      return null;
    }
    if (key.code !== 'char' || key.ctrl) {
      return null;
    }

    if (/^[1-9]$/.test(key.char)) {
      const index = Number(key.char) - 1;
      if (this.setupStarted && this.panelFocus === 'sidebar' && index < this.menu.length) {
        this.selectedStep = index;
        this.loadStepContent();
      }
      return null;
    }

    if (key.char === ' ') {
      if (this.panelFocus === 'content' && this.currentStepId === 'update') {
        this.toggleUpdateItem();
      }
      return null;
    }

    if (this.panelFocus === 'content' && this.contentFocus.kind === 'picker') {
      this.input.setMode('insert');
      this.pickerFilter.insert(key.char);
      this.pickerSelected = 0;
    }
    return null;
  }

  private handleInsertKey(key: KeyEvent): OnboardAction | null {
    const intent = this.input.handleKey(key, this.focusedBuffer());
    switch (intent.type) {
      case 'none':
        return null;
      case 'edited':
        if (this.contentFocus.kind === 'picker') this.pickerSelected = 0;
        return null;
      case 'navigate':
        if (intent.direction === 'next') this.moveField(1);
        if (intent.direction === 'prev') this.moveField(-1);
        return null;
      case 'submit':
        return this.submitInsert();
      case 'execute':
        return null;
      case 'unhandled':
        if (isCtrl(intent.key, 'h')) {
          this.input.setMode('normal');
          this.focusSidebar();
        } else if (intent.key.code === 'down' && this.contentFocus.kind === 'picker') {
          this.navigate(1);
        } else if (intent.key.code === 'up' && this.contentFocus.kind === 'picker') {
          this.navigate(-1);
        }
        return null;
    }
  }

  private submitInsert(): OnboardAction | null {
    const focus = this.contentFocus;

    if (focus.kind === 'picker') {
      // Selecting may advance onto another picker, which re-enters Insert
      this.input.setMode('normal');
      this.selectPickerItem();
      return null;
    }

    if (focus.kind === 'field' && this.currentStepId === 'user') {
      if (focus.index < 2) {
        this.contentFocus = { kind: 'field', index: focus.index + 1 };
        return null;
      }
      this.input.setMode('normal');
      this.executeUserStep();
      return null;
    }

    if (focus.kind === 'field' && this.currentStepId === 'update') {
      if (!this.sudoPassword.isEmpty()) {
        this.sudoEntered = true;
        this.input.setMode('normal');
        this.contentFocus = { kind: 'none' };
        this.executeUpdate();
      }
      return null;
    }

    this.input.setMode('normal');
    return null;
  }

  private handleCommandKey(key: KeyEvent): OnboardAction | null {
    const intent = this.input.handleKey(key, null);
    if (intent.type === 'execute') {
      return this.executeCommand(intent.command);
    }
    return null;
  }

  private handleConfirmKey(key: KeyEvent, action: ConfirmAction): OnboardAction | null {
    if (isChar(key, 'y') || isChar(key, 'Y') || key.code === 'enter') {
      this.confirm = null;
      if (action === 'cancel') {
        this.shouldExit = true;
        return null;
      }
      if (this.dryRun && this.setupComplete) {
        return { type: 'transition-to-login' };
      }
      return action === 'reboot' ? { type: 'reboot' } : { type: 'poweroff' };
    }
    if (isChar(key, 'n') || isChar(key, 'N') || key.code === 'escape') {
      this.confirm = null;
    }
    return null;
  }

  private executeCommand(line: string): OnboardAction | null {
    const parsed = parseWizardCommand(line);
    if (!parsed.success) {
      this.setError(parsed.error);
      return null;
    }
    return this.runCommand(parsed.command);
  }

  private runCommand(command: WizardCommand): OnboardAction | null {
    switch (command) {
      case 'start':
        if (!this.setupStarted) this.startSetup();
        return null;
      case 'next':
        this.advance();
        return null;
      case 'skip':
        this.skipCurrentStep();
        return null;
      case 'cancel':
        this.confirm = 'cancel';
        return null;
      case 'reboot':
      case 'poweroff':
        this.confirm = command;
        return null;
      case 'help':
        this.showHelp = true;
        return null;
      case 'submit':
        this.executeCurrentStep();
        return null;
      case 'finish':
        this.finishSetup();
        return null;
    }
  }

  // Focus and navigation

  private focusSidebar(): void {
    if (this.setupStarted && !this.setupComplete) {
      this.panelFocus = 'sidebar';
      this.contentFocus = { kind: 'none' };
    }
  }

  private focusContent(): void {
    if (!this.setupStarted || this.setupComplete) return;

    this.panelFocus = 'content';
    const item = this.currentItem;
    if (!item) return;

    if (item.hasPicker) {
      this.contentFocus = { kind: 'picker' };
      this.input.setMode('insert');
    } else if (item.id === 'user') {
      this.contentFocus = { kind: 'field', index: 0 };
    } else {
      // The sudo field of the update step is focused on demand
      this.contentFocus = { kind: 'none' };
    }
  }

  private handleEnter(): OnboardAction | null {
    if (this.panelFocus === 'welcome') {
      this.startSetup();
      return null;
    }

    if (this.ledger.isLocked(this.selectedStep)) {
      this.setError(LOCKED_MESSAGE);
      return null;
    }

    if (this.panelFocus === 'sidebar') {
      this.focusContent();
      if (this.contentFocus.kind === 'field') {
        this.input.setMode('insert');
      }
      return null;
    }

    const focus = this.contentFocus;
    if (focus.kind === 'picker') {
      this.selectPickerItem();
      return null;
    }
    if (focus.kind === 'field') {
      this.input.setMode('insert');
      return null;
    }

    switch (this.currentStepId) {
      case 'network':
        if (!this.networkConnected) {
          return { type: 'launch-external', program: this.config.network.program, args: [...this.config.network.args] };
        }
        this.ledger.set('network', 'completed');
        this.advance();
        return null;
      case 'review':
        this.executeReview();
        return null;
      case 'update':
        this.executeUpdate();
        return null;
      case 'reboot':
        this.finishSetup();
        return null;
      default:
        return null;
    }
  }

  private navigate(delta: 1 | -1): void {
    if (this.panelFocus === 'sidebar') {
      const next = this.selectedStep + delta;
      if (next >= 0 && next < this.menu.length) {
        this.selectedStep = next;
        this.loadStepContent();
      }
      return;
    }
    if (this.panelFocus !== 'content') return;

    if (this.currentStepId === 'update' && this.tasks.length === 0 && this.packages.categories.length > 0) {
      if (delta === 1) this.navigateUpdateDown();
      else this.navigateUpdateUp();
      return;
    }

    if (this.contentFocus.kind === 'picker') {
      const count = this.filteredPickerItems().length;
      this.pickerSelected = Math.min(Math.max(this.pickerSelected + delta, 0), Math.max(count - 1, 0));
    } else if (this.contentFocus.kind === 'field') {
      this.moveField(delta);
    }
  }

  private moveField(delta: number): void {
    if (this.contentFocus.kind !== 'field') return;
    const count = this.currentStepId === 'user' ? 3 : 1;
    const index = this.contentFocus.index + delta;
    if (index >= 0 && index < count) {
      this.contentFocus = { kind: 'field', index };
    }
  }

  private navigateUpdateDown(): void {
    const categories = this.packages.categories;
    const category = categories[this.updateCategory];
    if (!category) return;
    const isLastCategory = this.updateCategory >= categories.length - 1;

    if (this.updatePackage === null) {
      if (category.packages.length > 0) {
        this.updatePackage = 0;
      } else if (!isLastCategory) {
        this.updateCategory++;
      }
    } else if (this.updatePackage < category.packages.length - 1) {
      this.updatePackage++;
    } else if (!isLastCategory) {
      this.updateCategory++;
      this.updatePackage = null;
    }
  }

  private navigateUpdateUp(): void {
    if (this.updatePackage !== null) {
      this.updatePackage = this.updatePackage > 0 ? this.updatePackage - 1 : null;
      return;
    }
    if (this.updateCategory === 0) return;

    this.updateCategory--;
    const previous = this.packages.categories[this.updateCategory];
    if (previous && previous.packages.length > 0) {
      this.updatePackage = previous.packages.length - 1;
    }
  }

  private toggleUpdateItem(): void {
    if (this.updatePackage === null) {
      this.packages.toggleCategory(this.updateCategory);
    } else {
      this.packages.togglePackage(this.updateCategory, this.updatePackage);
    }
    this.sudoNeeded = this.packages.needsSudo();
  }

  // Steps

  private startSetup(): void {
    this.setupStarted = true;
    this.selectedStep = 0;
    this.loadStepContent();
    if (this.networkConnected && this.config.network.skip_if_connected && this.ledger.has('network')) {
      this.ledger.set('network', 'completed');
    }
    this.focusContent();
  }

  private loadStepContent(): void {
    const id = this.currentStepId;
    switch (id) {
      case 'locale':
      case 'keyboard':
      case 'preferences':
        this.pickerItems = [];
        this.pickerSelected = 0;
        this.pickerFilter.clear();
        this.loadPickerItems(id);
        return;
      case 'update':
        this.sudoNeeded = this.packages.needsSudo();
        this.sudoPassword.clear();
        this.sudoEntered = false;
        return;
      default:
        return;
    }
  }

  private loadPickerItems(step: PickerStep): void {
    const list =
      step === 'locale'
        ? this.service.listLocales()
        : step === 'keyboard'
          ? this.service.listKeymaps()
          : this.service.listTimezones();
    this.track(list.then((items) => this.channel.post({ type: 'picker-items', step, items })));
  }

  private pickerDefault(step: StepId): string | undefined {
    switch (step) {
      case 'locale':
        return this.selectedLocale ?? this.config.locale.default_locale;
      case 'keyboard':
        return this.selectedKeyboard ?? this.config.keyboard.default_layout;
      case 'preferences':
        return this.selectedTimezone ?? this.config.preferences.default_timezone;
      default:
        return undefined;
    }
  }

  private selectPickerItem(): void {
    const value = this.filteredPickerItems()[this.pickerSelected];
    const id = this.currentStepId;
    if (value === undefined || id === undefined) return;

    switch (id) {
      case 'locale':
        this.selectedLocale = value;
        this.setInfo(`Locale selected: ${value}`);
        break;
      case 'keyboard':
        this.selectedKeyboard = value;
        this.setInfo(`Keyboard selected: ${value}`);
        break;
      case 'preferences':
        this.selectedTimezone = value;
        this.setInfo(`Timezone selected: ${value}`);
        break;
      default:
        return;
    }
    this.ledger.set(id, 'completed');
    this.advance();
  }

  private advance(): void {
    if (this.selectedStep < this.menu.length - 1) {
      this.selectedStep++;
      this.loadStepContent();
    }
    this.focusContent();
  }

  private skipCurrentStep(): void {
    if (this.ledger.isLocked(this.selectedStep)) {
      this.setError(LOCKED_MESSAGE);
      return;
    }
    const item = this.currentItem;
    if (!item || item.required) {
      this.setError('This step is required');
      return;
    }
    this.ledger.set(item.id, 'skipped');
    this.advance();
  }

  private executeCurrentStep(): void {
    if (this.ledger.isLocked(this.selectedStep)) {
      this.setError(LOCKED_MESSAGE);
      return;
    }
    switch (this.currentStepId) {
      case 'user':
        this.executeUserStep();
        return;
      case 'review':
        this.executeReview();
        return;
      case 'update':
        this.executeUpdate();
        return;
      default:
        return;
    }
  }

  private validateForm(): boolean {
    const error = validateUserForm(
      {
        username: this.username.content(),
        password: this.password.content(),
        confirm: this.passwordConfirm.content(),
      },
      this.config.user.min_password_length,
    );
    if (error !== null) {
      this.setError(error);
      return false;
    }
    return true;
  }

  private executeUserStep(): void {
    if (this.isExecuting || !this.validateForm()) return;

    const username = this.username.content();
    const password = this.takeAccountPassword();
    this.tasks = [{ name: `Creating user '${username}'`, state: 'running' }];

    if (this.dryRun) {
      this.tasks = [{ name: `Creating user '${username}'`, state: 'success' }];
      this.createdUsername = username;
      this.ledger.set('user', 'completed');
      this.advance();
      return;
    }

    this.isExecuting = true;
    this.track(
      runUserCreation(this.service, this.channel, {
        username,
        password,
        groups: [...this.config.user.groups],
        shell: this.config.user.shell,
      }),
    );
  }

  private executeReview(): void {
    if (this.isExecuting) return;

    const username = this.username.content();
    const alreadyCreated = this.createdUsername !== null && this.createdUsername === username;
    if (!alreadyCreated && !this.validateForm()) return;
    const password = alreadyCreated ? '' : this.takeAccountPassword();
    const names = [`Creating user '${username}'`];
    if (this.selectedLocale !== undefined) names.push(`Setting locale to ${this.selectedLocale}`);
    if (this.selectedKeyboard !== undefined) names.push(`Setting keyboard to ${this.selectedKeyboard}`);
    if (this.selectedTimezone !== undefined) names.push(`Setting timezone to ${this.selectedTimezone}`);

    this.isExecuting = true;

    if (this.dryRun) {
      this.tasks = pendingTasks(names, 0);
      this.createdUsername = username;
      this.clock.start(() => this.completeSimulatedReview());
      return;
    }

    this.tasks = pendingTasks(names);
    this.track(
      runReview(this.service, this.channel, {
        username,
        password,
        groups: [...this.config.user.groups],
        shell: this.config.user.shell,
        locale: this.selectedLocale,
        keymap: this.selectedKeyboard,
        timezone: this.selectedTimezone,
        alreadyCreated,
      }),
    );
  }

  private executeUpdate(): void {
    if (this.isExecuting) return;

    const commands = this.packages.selectedCommands();
    if (commands.length === 0) {
      this.ledger.set('update', 'skipped');
      this.setInfo('No packages selected. Continuing to finish.');
      this.advance();
      return;
    }

    if (this.dryRun) {
      this.tasks = pendingTasks(
        commands.map((c) => c.name),
        0,
      );
      this.isExecuting = true;
      this.clock.start(() => this.completeSimulatedUpdate());
      return;
    }

    const username = this.createdUsername;
    if (username === null) {
      this.setError('User must be created before running commands');
      return;
    }

    if (this.packages.needsSudo() && !this.sudoEntered) {
      this.sudoNeeded = true;
      this.setError('Enter your password for sudo commands');
      this.contentFocus = { kind: 'field', index: 0 };
      this.input.setMode('insert');
      return;
    }

    // A retry after failure asks for the password again
    const sudoPassword = this.sudoPassword.content();
    this.sudoPassword.clear();
    this.sudoEntered = false;

    this.tasks = pendingTasks(commands.map((c) => c.name));
    this.isExecuting = true;
    this.track(runUpdate(this.service, this.channel, { username, commands, sudoPassword }));
  }

  /** Copy the account password out and wipe both password fields */
  private takeAccountPassword(): string {
    const secret = this.password.content();
    this.password.clear();
    this.passwordConfirm.clear();
    return secret;
  }

  private finishSetup(): void {
    if (this.isExecuting) return;
    if (this.ledger.resultOf('review') !== 'completed') {
      this.setError('Complete the Review step first');
      return;
    }

    this.isExecuting = true;
    this.tasks = [{ name: 'Finishing setup', state: 'running' }];
    const removeInitialSession = !this.dryRun && this.config.completion.remove_initial_session;

    this.track(
      (async () => {
        if (removeInitialSession) {
          try {
            await this.service.removeInitialSession();
          } catch (err) {
            this.log.warn({ err }, 'Failed to remove initial session');
          }
        }
        this.channel.post({ type: 'setup-finished' });
      })(),
    );
  }

  private completeSimulatedReview(): void {
    this.isExecuting = false;
    this.tasks = [];
    this.ledger.set('review', 'completed');
    this.setInfo('Configuration applied! Select packages to install.');
    this.advance();
  }

  private completeSimulatedUpdate(): void {
    this.isExecuting = false;
    this.tasks = [];
    this.ledger.set('update', 'completed');
    this.setInfo('Installation complete! Reboot to finish setup.');
    this.advance();
  }

  // Execution messages

  private applyMessage(message: ExecutionMessage): void {
    switch (message.type) {
      case 'task-started':
        this.updateTask(message.index, { state: 'running' });
        return;
      case 'task-succeeded':
        this.updateTask(message.index, { state: 'success', output: message.output });
        return;
      case 'task-failed':
        this.updateTask(message.index, { state: 'failed', output: message.error });
        return;
      case 'user-created':
        this.createdUsername = message.username;
        return;
      case 'step-complete':
        this.isExecuting = false;
        this.ledger.set('user', message.result);
        if (message.result === 'completed') {
          this.advance();
        } else {
          this.reportFailures('user creation');
        }
        return;
      case 'review-complete':
        this.isExecuting = false;
        if (message.anyFailed) {
          this.ledger.set('review', 'failed');
          this.reportFailures('configuration');
        } else {
          this.ledger.set('review', 'completed');
          this.setInfo('Configuration applied! You can now install packages.');
          this.advance();
        }
        return;
      case 'update-complete':
        this.isExecuting = false;
        if (message.anyFailed) {
          this.ledger.set('update', 'failed');
          this.reportFailures('installation');
        } else {
          this.ledger.set('update', 'completed');
          this.setInfo('Commands completed! Reboot to finish setup.');
          this.advance();
        }
        return;
      case 'network-status':
        this.networkConnected = message.connected;
        if (message.markStep && message.connected && this.ledger.has('network')) {
          this.ledger.set('network', 'completed');
        }
        return;
      case 'picker-items':
        if (message.step !== this.currentStepId) return;
        this.pickerItems = message.items;
        this.pickerSelected = this.pickerFilter.isEmpty() ? this.defaultPickerIndex(message.step, message.items) : 0;
        return;
      case 'setup-finished':
        this.finishComplete();
        return;
    }
  }

  private finishComplete(): void {
    this.updateTask(this.tasks.length - 1, { state: 'success' });
    this.isExecuting = false;
    this.setupComplete = true;

    if (this.dryRun) {
      this.confirm = 'reboot';
      return;
    }

    const action = this.config.completion.action;
    if (action === 'reboot' || action === 'poweroff') {
      this.confirm = action;
    } else {
      this.shouldExit = true;
    }
  }

  private defaultPickerIndex(step: StepId, items: string[]): number {
    const preferred = this.pickerDefault(step);
    const index = preferred === undefined ? -1 : items.indexOf(preferred);
    return Math.max(index, 0);
  }

  private updateTask(index: number, patch: Partial<TaskStatus>): void {
    const task = this.tasks[index];
    if (task) {
      Object.assign(task, patch);
    }
  }

  private reportFailures(operation: string): void {
    const failed = this.tasks.filter((t) => t.state === 'failed').length;
    this.setError(`${failed} task(s) failed during ${operation}`);
  }

  private checkNetwork(markStep: boolean): void {
    if (this.probing && !markStep) return;
    this.probing = true;
    this.track(
      this.service
        .checkConnectivity()
        .then((connected) => this.channel.post({ type: 'network-status', connected, markStep }))
        .finally(() => {
          this.probing = false;
        }),
    );
  }

  private contentHints(): StatusHints {
    if (this.ledger.isLocked(this.selectedStep)) {
      return { left: 'Step locked', right: 'Complete previous steps first' };
    }

    const insert = this.input.mode === 'insert';
    switch (this.currentStepId) {
      case 'user':
        return insert
          ? { left: 'Type to enter text', right: 'Esc: normal  Tab: next field' }
          : { left: 'j/k: fields  i: edit', right: 'Enter: submit  Ctrl+h: sidebar' };
      case 'locale':
      case 'keyboard':
      case 'preferences':
        return insert
          ? { left: 'Type to filter', right: 'Esc: normal  Enter: select' }
          : { left: 'j/k: navigate  Enter: select', right: 'i: filter  Ctrl+h: sidebar' };
      case 'network':
        return this.networkConnected
          ? { left: 'Network connected', right: 'Enter: next  Ctrl+h: sidebar' }
          : { left: 'Network not connected', right: 'Enter: configure  :skip' };
      case 'review':
        return { left: 'Review your settings', right: 'Enter: apply  Ctrl+h: sidebar' };
      case 'update': {
        const needsPassword = this.packages.needsSudo() && !this.sudoEntered && !this.dryRun;
        if (insert && needsPassword) {
          return { left: 'Type to enter text', right: 'Esc: normal  Enter: run' };
        }
        return needsPassword
          ? { left: 'Space: toggle  Password required', right: 'Enter: run  :skip' }
          : { left: 'Space: toggle  j/k: navigate', right: 'Enter: run  :skip' };
      }
      case 'reboot':
        return { left: 'Setup complete!', right: 'Enter: finish' };
      default:
        return { left: '', right: '' };
    }
  }

  private setError(text: string): void {
    this.message = { text, isError: true };
  }

  private setInfo(text: string): void {
    this.message = { text, isError: false };
  }

  private track(operation: Promise<void>): void {
    const tracked = operation
      .catch((err: unknown) => {
        this.log.error({ err }, 'Background operation failed');
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}
