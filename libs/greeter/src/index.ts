/**
 * @modegreet/greeter
 *
 * Login screen state: authentication controller, session and user discovery,
 * power control.
 */

export {
  GreeterController,
  type FocusField,
  type GreeterControllerOptions,
  type Overlay,
  type StatusMessage,
} from './controller.js';
export { PowerError } from './errors.js';
export {
  discoverSessions,
  parseDesktopEntry,
  buildCommand,
  buildEnv,
  findSession,
  type SessionRecord,
  type SessionType,
  type DiscoverSessionsOptions,
} from './system/sessions.js';
export {
  discoverUsers,
  parsePasswd,
  parseLoginDefs,
  findUser,
  DEFAULT_UID_RANGE,
  type UserRecord,
  type UidRange,
  type DiscoverUsersOptions,
} from './system/users.js';
export {
  SystemctlPower,
  DemoPower,
  createPowerControl,
  type PowerAction,
  type PowerControl,
} from './system/power.js';
