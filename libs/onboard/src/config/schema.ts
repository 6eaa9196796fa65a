/**
 * Zod schemas for the onboarding configuration file
 *
 * Keys are snake_case as written in the TOML document. Every section is
 * optional and filled with its defaults.
 */

import { z } from 'zod';

export const GeneralConfigSchema = z
  .object({
    title: z.string().default('System Setup'),
    subtitle: z.string().default('Welcome to your new system'),
    /** Simulate every operation; reboot returns to the login screen */
    dryrun: z.boolean().default(false),
  })
  .prefault({});

export const NetworkConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    program: z.string().min(1).default('wifitui'),
    args: z.array(z.string()).default([]),
    skip_if_connected: z.boolean().default(true),
  })
  .prefault({});

export const UserConfigSchema = z
  .object({
    groups: z.array(z.string().min(1)).default(['wheel']),
    shell: z.string().min(1).default('/bin/bash'),
    min_password_length: z.number().int().min(1).default(8),
  })
  .prefault({});

export const LocaleConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    default_locale: z.string().default('en_US.UTF-8'),
  })
  .prefault({});

export const KeyboardConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    default_layout: z.string().default('us'),
  })
  .prefault({});

export const PreferencesConfigSchema = z
  .object({
    timezone_enabled: z.boolean().default(true),
    default_timezone: z.string().default('UTC'),
  })
  .prefault({});

export const CompletionConfigSchema = z
  .object({
    /** `reboot` or `poweroff`; anything else exits the wizard */
    action: z.string().default('reboot'),
    remove_initial_session: z.boolean().default(true),
  })
  .prefault({});

export const CommandConfigSchema = z.object({
  name: z.string().min(1),
  command: z.array(z.string()).min(1),
  sudo: z.boolean().default(false),
});

export const PackageItemSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(''),
  /** Overrides the category default when set */
  enabled_by_default: z.boolean().optional(),
  required: z.boolean().default(false),
  commands: z.array(CommandConfigSchema),
});

export const UpdateCategorySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  enabled_by_default: z.boolean().default(false),
  packages: z.array(PackageItemSchema).default([]),
});

export const OnboardConfigSchema = z.object({
  general: GeneralConfigSchema,
  network: NetworkConfigSchema,
  user: UserConfigSchema,
  locale: LocaleConfigSchema,
  keyboard: KeyboardConfigSchema,
  preferences: PreferencesConfigSchema,
  completion: CompletionConfigSchema,
  updates: z.array(UpdateCategorySchema).default([]),
});

export type OnboardConfig = z.infer<typeof OnboardConfigSchema>;
export type UpdateCategory = z.infer<typeof UpdateCategorySchema>;
export type PackageItem = z.infer<typeof PackageItemSchema>;
export type CommandConfig = z.infer<typeof CommandConfigSchema>;

/**
 * Whether a package starts selected. Required packages always do.
 */
export function isDefaultEnabled(pkg: PackageItem, categoryDefault: boolean): boolean {
  if (pkg.required) {
    return true;
  }
  return pkg.enabled_by_default ?? categoryDefault;
}

export function defaultConfig(): OnboardConfig {
  return OnboardConfigSchema.parse({});
}
