/**
 * @modegreet/onboard
 *
 * First-boot setup wizard: configuration, step gating, package selection,
 * background task runners and the system service behind them.
 */

export {
  OnboardController,
  SPINNER_FRAMES,
  type ConfirmAction,
  type ContentFocus,
  type OnboardAction,
  type OnboardControllerOptions,
  type PanelFocus,
  type StatusHints,
  type StatusMessage,
} from './controller.js';
export {
  OnboardConfigSchema,
  defaultConfig,
  isDefaultEnabled,
  type CommandConfig,
  type OnboardConfig,
  type PackageItem,
  type UpdateCategory,
} from './config/schema.js';
export { DEFAULT_CONFIG_PATH, loadConfig, parseConfig } from './config/loader.js';
export { ConfigError, CommandFailedError, UserCreationError } from './errors.js';
export { buildMenu, StepLedger, STEP_LABELS, type MenuItem, type StepId, type StepResult } from './steps.js';
export { PackageSelection } from './packages.js';
export { validateUserForm, userFormSchema, type UserForm } from './validation.js';
export {
  ExecutionChannel,
  pendingTasks,
  type ExecutionMessage,
  type PickerStep,
  type TaskState,
  type TaskStatus,
} from './execution.js';
export { SimulationClock, PROGRESS_STEP } from './simulation.js';
export { parseWizardCommand, type WizardCommand } from './commands.js';
export { runReview, runUpdate, runUserCreation } from './tasks.js';
export type { CreateUserOptions, OnboardService } from './service/types.js';
export { LiveOnboardService, filterSudoNoise, type LiveOnboardServiceOptions } from './service/live.js';
export { DryRunOnboardService } from './service/dry-run.js';
export { GREETD_CONFIG_PATH, removeInitialSessionFrom, stripInitialSession } from './service/greetd-config.js';
