import { ModalInput } from '../modal/engine';
import { charKey, namedKey } from '../modal/keys';
import { TextBuffer } from '../buffer/text-buffer';

function typeInto(engine: ModalInput, buffer: TextBuffer | null, text: string): void {
  for (const ch of text) {
    engine.handleKey(charKey(ch), buffer);
  }
}

describe('ModalInput', () => {
  describe('normal mode, field keymap', () => {
    let engine: ModalInput;
    let buffer: TextBuffer;

    beforeEach(() => {
      engine = new ModalInput({ initialMode: 'normal', keymap: 'field' });
      buffer = new TextBuffer({ initial: 'alice' });
    });

    it('enters insert mode with i, a, A and I', () => {
      buffer.moveStart();
      engine.handleKey(charKey('a'), buffer);
      expect(engine.mode).toBe('insert');
      expect(buffer.cursor).toBe(1);

      engine.setMode('normal');
      engine.handleKey(charKey('A'), buffer);
      expect(buffer.cursor).toBe(5);

      engine.setMode('normal');
      engine.handleKey(charKey('I'), buffer);
      expect(buffer.cursor).toBe(0);
      expect(engine.mode).toBe('insert');
    });

    it('moves the cursor with h, l, 0 and $', () => {
      engine.handleKey(charKey('h'), buffer);
      engine.handleKey(namedKey('left'), buffer);
      expect(buffer.cursor).toBe(3);
      engine.handleKey(charKey('0'), buffer);
      expect(buffer.cursor).toBe(0);
      engine.handleKey(charKey('l'), buffer);
      expect(buffer.cursor).toBe(1);
      engine.handleKey(charKey('$'), buffer);
      expect(buffer.cursor).toBe(5);
    });

    it('deletes under the cursor with x', () => {
      buffer.moveStart();
      expect(engine.handleKey(charKey('x'), buffer)).toEqual({ type: 'edited' });
      expect(buffer.content()).toBe('lice');
    });

    it('clears the field on dd', () => {
      expect(engine.handleKey(charKey('d'), buffer)).toEqual({ type: 'none' });
      expect(buffer.content()).toBe('alice');
      expect(engine.handleKey(charKey('d'), buffer)).toEqual({ type: 'edited' });
      expect(buffer.content()).toBe('');
    });

    it('resets the pending d on any other key', () => {
      engine.handleKey(charKey('d'), buffer);
      engine.handleKey(charKey('h'), buffer);
      engine.handleKey(charKey('d'), buffer);
      expect(buffer.content()).toBe('alice');
    });

    it('maps j, k, Tab and arrows to navigation', () => {
      expect(engine.handleKey(charKey('j'), buffer)).toEqual({ type: 'navigate', direction: 'down' });
      expect(engine.handleKey(namedKey('tab'), buffer)).toEqual({ type: 'navigate', direction: 'down' });
      expect(engine.handleKey(charKey('k'), buffer)).toEqual({ type: 'navigate', direction: 'up' });
      expect(engine.handleKey(namedKey('backtab'), buffer)).toEqual({ type: 'navigate', direction: 'up' });
    });

    it('submits on Enter', () => {
      expect(engine.handleKey(namedKey('enter'), buffer)).toEqual({ type: 'submit' });
    });

    it('passes other keys to the controller', () => {
      expect(engine.handleKey(namedKey('f2'), buffer)).toEqual({ type: 'unhandled', key: namedKey('f2') });
      expect(engine.handleKey(charKey('q'), buffer)).toEqual({ type: 'unhandled', key: charKey('q') });
    });
  });

  describe('normal mode, panel keymap', () => {
    it('turns h and l into panel navigation', () => {
      const engine = new ModalInput({ keymap: 'panel' });
      const buffer = new TextBuffer({ initial: 'en' });
      expect(engine.handleKey(charKey('h'), buffer)).toEqual({ type: 'navigate', direction: 'left' });
      expect(engine.handleKey(namedKey('right'), buffer)).toEqual({ type: 'navigate', direction: 'right' });
      expect(buffer.cursor).toBe(2);
    });

    it('leaves digits and letters to the controller', () => {
      const engine = new ModalInput({ keymap: 'panel' });
      expect(engine.handleKey(charKey('3'), null)).toEqual({ type: 'unhandled', key: charKey('3') });
      expect(engine.handleKey(charKey('x'), null)).toEqual({ type: 'unhandled', key: charKey('x') });
    });

    it('does not enter insert mode without a focused buffer', () => {
      const engine = new ModalInput({ keymap: 'panel' });
      engine.handleKey(charKey('i'), null);
      expect(engine.mode).toBe('normal');
    });
  });

  describe('insert mode', () => {
    let engine: ModalInput;
    let buffer: TextBuffer;

    beforeEach(() => {
      engine = new ModalInput({ initialMode: 'insert' });
      buffer = new TextBuffer();
    });

    it('inserts printable characters', () => {
      typeInto(engine, buffer, 'bob');
      expect(buffer.content()).toBe('bob');
      expect(engine.mode).toBe('insert');
    });

    it('stays in insert mode for every key except Escape', () => {
      engine.handleKey(namedKey('left'), buffer);
      engine.handleKey(namedKey('enter'), buffer);
      engine.handleKey(charKey('x', true), buffer);
      expect(engine.mode).toBe('insert');
      engine.handleKey(namedKey('escape'), buffer);
      expect(engine.mode).toBe('normal');
    });

    it('handles the Ctrl chords', () => {
      typeInto(engine, buffer, 'hello world');
      engine.handleKey(charKey('w', true), buffer);
      expect(buffer.content()).toBe('hello ');
      engine.handleKey(charKey('a', true), buffer);
      expect(buffer.cursor).toBe(0);
      engine.handleKey(charKey('e', true), buffer);
      expect(buffer.cursor).toBe(6);
      engine.handleKey(charKey('u', true), buffer);
      expect(buffer.content()).toBe('');
    });

    it('edits with Backspace, Delete, Home and End', () => {
      typeInto(engine, buffer, 'abc');
      engine.handleKey(namedKey('backspace'), buffer);
      engine.handleKey(namedKey('home'), buffer);
      engine.handleKey(namedKey('delete'), buffer);
      expect(buffer.content()).toBe('b');
      engine.handleKey(namedKey('end'), buffer);
      expect(buffer.cursor).toBe(1);
    });

    it('maps Tab and Shift-Tab to field navigation', () => {
      expect(engine.handleKey(namedKey('tab'), buffer)).toEqual({ type: 'navigate', direction: 'next' });
      expect(engine.handleKey(namedKey('backtab'), buffer)).toEqual({ type: 'navigate', direction: 'prev' });
    });

    it('reports unknown Ctrl chords', () => {
      expect(engine.handleKey(charKey('h', true), buffer)).toEqual({ type: 'unhandled', key: charKey('h', true) });
    });
  });

  describe('command mode', () => {
    it('accumulates and executes the trimmed command', () => {
      const engine = new ModalInput();
      engine.handleKey(charKey(':'), null);
      expect(engine.mode).toBe('command');
      typeInto(engine, null, ' s gnome ');
      expect(engine.commandLine.content()).toBe(' s gnome ');
      expect(engine.handleKey(namedKey('enter'), null)).toEqual({ type: 'execute', command: 's gnome' });
      expect(engine.mode).toBe('normal');
      expect(engine.commandLine.isEmpty()).toBe(true);
    });

    it('leaves on Escape and clears the line', () => {
      const engine = new ModalInput();
      engine.handleKey(charKey(':'), null);
      typeInto(engine, null, 'reb');
      engine.handleKey(namedKey('escape'), null);
      expect(engine.mode).toBe('normal');
      expect(engine.commandLine.isEmpty()).toBe(true);
    });

    it('leaves on Backspace once the line is empty', () => {
      const engine = new ModalInput();
      engine.handleKey(charKey(':'), null);
      typeInto(engine, null, 'q');
      engine.handleKey(namedKey('backspace'), null);
      expect(engine.mode).toBe('command');
      engine.handleKey(namedKey('backspace'), null);
      expect(engine.mode).toBe('normal');
    });

    it('clears a stale command line when entered again', () => {
      const engine = new ModalInput();
      engine.handleKey(charKey(':'), null);
      typeInto(engine, null, 'abc');
      engine.setMode('normal');
      engine.handleKey(charKey(':'), null);
      expect(engine.commandLine.content()).toBe('');
    });
  });
});
