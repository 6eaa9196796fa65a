/**
 * Wizard steps and their results
 *
 * The step sequence is built once from the configuration. The ledger keeps
 * one result per configured step and applies the unlock rules:
 * - update unlocks when review completes
 * - reboot unlocks when update completes or is skipped, or directly after
 *   review when there is no update step
 *
 * Unlocking only goes one way, and a completed or skipped step never
 * returns to pending or locked.
 */

import type { OnboardConfig } from './config/schema.js';

export type StepId = 'user' | 'locale' | 'keyboard' | 'network' | 'preferences' | 'review' | 'update' | 'reboot';

export type StepResult = 'pending' | 'completed' | 'skipped' | 'failed' | 'locked';

export interface MenuItem {
  id: StepId;
  required: boolean;
  hasPicker: boolean;
  hasForm: boolean;
}

export const STEP_LABELS: Record<StepId, string> = {
  user: 'User',
  locale: 'Locale',
  keyboard: 'Keyboard',
  network: 'Network',
  preferences: 'Prefs',
  review: 'Review',
  update: 'Update',
  reboot: 'Reboot',
};

function item(id: StepId, flags: Partial<Omit<MenuItem, 'id'>> = {}): MenuItem {
  return { id, required: false, hasPicker: false, hasForm: false, ...flags };
}

export function buildMenu(config: OnboardConfig): MenuItem[] {
  const menu: MenuItem[] = [item('user', { required: true, hasForm: true })];

  if (config.locale.enabled) menu.push(item('locale', { hasPicker: true }));
  if (config.keyboard.enabled) menu.push(item('keyboard', { hasPicker: true }));
  if (config.network.enabled) menu.push(item('network'));
  if (config.preferences.timezone_enabled) menu.push(item('preferences', { hasPicker: true }));
  menu.push(item('review', { required: true }));
  if (config.updates.length > 0) menu.push(item('update', { hasForm: true }));
  menu.push(item('reboot', { required: true }));

  return menu;
}

export class StepLedger {
  private readonly results: StepResult[];

  constructor(readonly menu: MenuItem[]) {
    this.results = menu.map((m) => (m.id === 'update' || m.id === 'reboot' ? 'locked' : 'pending'));
  }

  get length(): number {
    return this.menu.length;
  }

  indexOf(id: StepId): number {
    return this.menu.findIndex((m) => m.id === id);
  }

  has(id: StepId): boolean {
    return this.indexOf(id) !== -1;
  }

  item(index: number): MenuItem | undefined {
    return this.menu[index];
  }

  result(index: number): StepResult {
    return this.results[index] ?? 'pending';
  }

  resultOf(id: StepId): StepResult | undefined {
    const index = this.indexOf(id);
    return index === -1 ? undefined : this.results[index];
  }

  isLocked(index: number): boolean {
    return this.results[index] === 'locked';
  }

  snapshot(): StepResult[] {
    return [...this.results];
  }

  /**
   * Record a result and apply the unlock rules. Locked steps only leave
   * that state through an unlock, and completed or skipped steps keep
   * their result.
   */
  set(id: StepId, result: StepResult): void {
    const index = this.indexOf(id);
    const current = this.results[index];
    if (current === undefined || current === 'locked') return;
    if ((current === 'completed' || current === 'skipped') && (result === 'pending' || result === 'locked')) return;

    this.results[index] = result;

    if (id === 'review' && result === 'completed') {
      if (this.has('update')) {
        this.unlock('update');
      } else {
        this.unlock('reboot');
      }
    }
    if (id === 'update' && (result === 'completed' || result === 'skipped')) {
      this.unlock('reboot');
    }
  }

  private unlock(id: StepId): void {
    const index = this.indexOf(id);
    if (this.results[index] === 'locked') {
      this.results[index] = 'pending';
    }
  }
}
