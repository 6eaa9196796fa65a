/**
 * `:` command grammar of the login screen
 */

export type LoginCommand =
  | { kind: 'reboot' }
  | { kind: 'poweroff' }
  | { kind: 'session'; name?: string }
  | { kind: 'user'; name?: string }
  | { kind: 'login' }
  | { kind: 'cancel' }
  | { kind: 'help' }
  | { kind: 'quit' };

export type ParseResult<T> = { success: true; command: T } | { success: false; error: string };

/**
 * Split a command line into a lower-cased keyword and an optional argument.
 */
export function splitCommandLine(input: string): { keyword: string; argument?: string } {
  const trimmed = input.trim();
  const space = trimmed.search(/\s/);
  if (space === -1) {
    return { keyword: trimmed.toLowerCase() };
  }
  const argument = trimmed.slice(space + 1).trim();
  return {
    keyword: trimmed.slice(0, space).toLowerCase(),
    argument: argument.length > 0 ? argument : undefined,
  };
}

export function parseCommand(input: string): ParseResult<LoginCommand> {
  const { keyword, argument } = splitCommandLine(input);

  switch (keyword) {
    case 'reboot':
    case 'rb':
      return { success: true, command: { kind: 'reboot' } };
    case 'poweroff':
    case 'shutdown':
    case 'po':
      return { success: true, command: { kind: 'poweroff' } };
    case 'session':
    case 's':
      return { success: true, command: { kind: 'session', name: argument } };
    case 'user':
    case 'u':
      return { success: true, command: { kind: 'user', name: argument } };
    case 'login':
    case 'l':
      return { success: true, command: { kind: 'login' } };
    case 'cancel':
    case 'c':
      return { success: true, command: { kind: 'cancel' } };
    case 'help':
    case 'h':
    case '?':
      return { success: true, command: { kind: 'help' } };
    case 'q':
    case 'quit':
    case 'exit':
      return { success: true, command: { kind: 'quit' } };
    case '':
      return { success: false, error: 'Unknown command: empty command' };
    default:
      return { success: false, error: `Unknown command: ${keyword}` };
  }
}
