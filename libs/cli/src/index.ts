/**
 * modegreet CLI library
 *
 * Terminal runtime (event loop, terminal guard, key translation) and the
 * ink views behind the `greet` and `onboard` commands.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

export { EventLoop, TICK_INTERVAL, type LoopEvent, type EventLoopOptions } from './runtime/event-loop.js';
export { TerminalGuard, type TerminalStreams } from './runtime/terminal.js';
export { fromInkInput } from './runtime/keys.js';
export { TerminalError } from './errors.js';
export { runGreeter, type GreeterRunOptions, type GreeterOutcome } from './greeter/run.js';
export { runOnboard, type OnboardRunOptions, type OnboardOutcome } from './onboard/run.js';

// Command creators (for extending the CLI)
export * from './commands/index.js';
