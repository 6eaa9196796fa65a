import type { UpdateCategory } from '../config/schema';
import { PackageSelection } from '../packages';

const CATEGORIES: UpdateCategory[] = [
  {
    name: 'Base',
    description: '',
    enabled_by_default: false,
    packages: [
      {
        title: 'Firmware',
        description: '',
        required: true,
        commands: [{ name: 'Install firmware', command: ['pacman', '-S', 'linux-firmware'], sudo: true }],
      },
      {
        title: 'Editor',
        description: '',
        enabled_by_default: true,
        required: false,
        commands: [{ name: 'Install editor', command: ['flatpak', 'install', 'editor'], sudo: false }],
      },
      {
        title: 'Games',
        description: '',
        required: false,
        commands: [
          { name: 'Install games', command: ['flatpak', 'install', 'games'], sudo: false },
          { name: 'Configure games', command: ['games-setup'], sudo: false },
        ],
      },
    ],
  },
  {
    name: 'Extras',
    description: '',
    enabled_by_default: false,
    packages: [],
  },
];

describe('PackageSelection', () => {
  it('starts from required and default-enabled packages', () => {
    const selection = new PackageSelection(CATEGORIES);
    expect([0, 1, 2].map((p) => selection.isSelected(0, p))).toEqual([true, true, false]);
    expect(selection.isCategoryPartiallySelected(0)).toBe(true);
    expect(selection.isCategoryFullySelected(0)).toBe(false);
  });

  it('selects every package, then deselects all but the required ones', () => {
    const selection = new PackageSelection(CATEGORIES);

    selection.toggleCategory(0);
    expect([0, 1, 2].map((p) => selection.isSelected(0, p))).toEqual([true, true, true]);
    expect(selection.isCategoryFullySelected(0)).toBe(true);

    selection.toggleCategory(0);
    expect([0, 1, 2].map((p) => selection.isSelected(0, p))).toEqual([true, false, false]);
  });

  it('keeps required packages selected when toggled', () => {
    const selection = new PackageSelection(CATEGORIES);
    selection.togglePackage(0, 0);
    expect(selection.isSelected(0, 0)).toBe(true);

    selection.togglePackage(0, 1);
    expect(selection.isSelected(0, 1)).toBe(false);
  });

  it('collects commands in declaration order', () => {
    const selection = new PackageSelection(CATEGORIES);
    selection.togglePackage(0, 2);

    expect(selection.selectedCommands().map((c) => c.name)).toEqual([
      'Install firmware',
      'Install editor',
      'Install games',
      'Configure games',
    ]);
  });

  it('needs sudo only while a sudo command is selected', () => {
    expect(new PackageSelection(CATEGORIES).needsSudo()).toBe(true);

    const userOnly = new PackageSelection([
      { ...CATEGORIES[0], packages: CATEGORIES[0].packages.slice(1) },
    ]);
    expect(userOnly.needsSudo()).toBe(false);
  });

  it('treats an empty category as unselected', () => {
    const selection = new PackageSelection(CATEGORIES);
    expect(selection.isCategoryAnySelected(1)).toBe(false);
    expect(selection.isCategoryFullySelected(1)).toBe(false);
    selection.toggleCategory(1);
    expect(selection.anySelected()).toBe(true);
  });
});
