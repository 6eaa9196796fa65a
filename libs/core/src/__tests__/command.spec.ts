import { parseCommand, splitCommandLine } from '../modal/command';

describe('parseCommand', () => {
  it('parses short aliases', () => {
    expect(parseCommand('rb')).toEqual({ success: true, command: { kind: 'reboot' } });
    expect(parseCommand('po')).toEqual({ success: true, command: { kind: 'poweroff' } });
    expect(parseCommand('shutdown')).toEqual({ success: true, command: { kind: 'poweroff' } });
    expect(parseCommand('l')).toEqual({ success: true, command: { kind: 'login' } });
    expect(parseCommand('c')).toEqual({ success: true, command: { kind: 'cancel' } });
    expect(parseCommand('?')).toEqual({ success: true, command: { kind: 'help' } });
    expect(parseCommand('exit')).toEqual({ success: true, command: { kind: 'quit' } });
  });

  it('keeps the argument of session and user', () => {
    expect(parseCommand('s gnome')).toEqual({ success: true, command: { kind: 'session', name: 'gnome' } });
    expect(parseCommand('user  Alice ')).toEqual({ success: true, command: { kind: 'user', name: 'Alice' } });
  });

  it('leaves the argument out when none is given', () => {
    expect(parseCommand('u')).toEqual({ success: true, command: { kind: 'user', name: undefined } });
    expect(parseCommand('session')).toEqual({ success: true, command: { kind: 'session', name: undefined } });
  });

  it('matches keywords case-insensitively', () => {
    expect(parseCommand('REBOOT')).toEqual({ success: true, command: { kind: 'reboot' } });
    expect(parseCommand('Session KDE')).toEqual({ success: true, command: { kind: 'session', name: 'KDE' } });
  });

  it('rejects empty input', () => {
    expect(parseCommand('')).toEqual({ success: false, error: 'Unknown command: empty command' });
    expect(parseCommand('   ')).toEqual({ success: false, error: 'Unknown command: empty command' });
  });

  it('rejects unknown keywords', () => {
    expect(parseCommand('bogus')).toEqual({ success: false, error: 'Unknown command: bogus' });
  });
});

describe('splitCommandLine', () => {
  it('splits at the first whitespace', () => {
    expect(splitCommandLine('  session  Plasma Wayland ')).toEqual({
      keyword: 'session',
      argument: 'Plasma Wayland',
    });
  });
});
