/**
 * CLI Commands
 */

export { createGreetCommand } from './greet.js';
export { createOnboardCommand } from './onboard.js';
