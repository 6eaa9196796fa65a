import { parseWizardCommand } from '../commands';

describe('parseWizardCommand', () => {
  it.each([
    ['start', 'start'],
    ['n', 'next'],
    ['skip', 'skip'],
    ['q', 'cancel'],
    ['shutdown', 'poweroff'],
    ['reboot', 'reboot'],
    ['h', 'help'],
    ['install', 'submit'],
    ['done', 'finish'],
  ])('maps %s to %s', (input, command) => {
    expect(parseWizardCommand(input)).toEqual({ success: true, command });
  });

  it('ignores case and arguments', () => {
    expect(parseWizardCommand('  SKIP now ')).toEqual({ success: true, command: 'skip' });
  });

  it('reports unknown keywords', () => {
    expect(parseWizardCommand('frobnicate')).toEqual({ success: false, error: 'Unknown command: frobnicate' });
  });

  it('does not resolve object prototype keys', () => {
    expect(parseWizardCommand('constructor')).toEqual({ success: false, error: 'Unknown command: constructor' });
  });
});
