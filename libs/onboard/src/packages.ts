/**
 * Package selection for the update step
 */

import { isDefaultEnabled, type CommandConfig, type UpdateCategory } from './config/schema.js';

export class PackageSelection {
  private readonly selected: boolean[][];

  constructor(readonly categories: UpdateCategory[]) {
    this.selected = categories.map((category) =>
      category.packages.map((pkg) => isDefaultEnabled(pkg, category.enabled_by_default)),
    );
  }

  isSelected(category: number, pkg: number): boolean {
    return this.selected[category]?.[pkg] ?? false;
  }

  /**
   * Flip one package. Required packages stay selected.
   */
  togglePackage(category: number, pkg: number): void {
    const row = this.selected[category];
    const item = this.categories[category]?.packages[pkg];
    if (!row || !item || item.required) return;
    row[pkg] = !row[pkg];
  }

  /**
   * Select every package of a category unless all are selected already,
   * in which case deselect all but the required ones.
   */
  toggleCategory(category: number): void {
    const row = this.selected[category];
    const packages = this.categories[category]?.packages;
    if (!row || !packages) return;

    const value = !row.every(Boolean);
    packages.forEach((pkg, index) => {
      row[index] = pkg.required || value;
    });
  }

  isCategoryFullySelected(category: number): boolean {
    const row = this.selected[category] ?? [];
    return row.length > 0 && row.every(Boolean);
  }

  isCategoryPartiallySelected(category: number): boolean {
    const row = this.selected[category] ?? [];
    return row.some(Boolean) && !row.every(Boolean);
  }

  isCategoryAnySelected(category: number): boolean {
    return (this.selected[category] ?? []).some(Boolean);
  }

  anySelected(): boolean {
    return this.selected.some((row) => row.some(Boolean));
  }

  /** Commands of the selected packages in declaration order */
  selectedCommands(): CommandConfig[] {
    const commands: CommandConfig[] = [];
    this.categories.forEach((category, c) => {
      category.packages.forEach((pkg, p) => {
        if (this.isSelected(c, p)) commands.push(...pkg.commands);
      });
    });
    return commands;
  }

  needsSudo(): boolean {
    return this.selectedCommands().some((command) => command.sudo);
  }
}
