import { TextBuffer } from '../buffer/text-buffer';

/** Small deterministic PRNG so the operation sequence is reproducible */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

describe('TextBuffer', () => {
  it('inserts at the cursor and tracks code points', () => {
    const buffer = new TextBuffer();
    buffer.insert('helo');
    buffer.moveLeft();
    buffer.insert('l');
    expect(buffer.content()).toBe('hello');
    expect(buffer.cursor).toBe(4);
    expect(buffer.length).toBe(5);
  });

  it('counts astral characters as one position', () => {
    const buffer = new TextBuffer({ initial: 'a😀b' });
    expect(buffer.length).toBe(3);
    buffer.moveLeft();
    expect(buffer.deleteBack()).toBe(true);
    expect(buffer.content()).toBe('ab');
    expect(buffer.cursor).toBe(1);
  });

  it('reports whether a delete happened', () => {
    const buffer = new TextBuffer({ initial: 'ab' });
    expect(buffer.deleteForward()).toBe(false);
    buffer.moveStart();
    expect(buffer.deleteBack()).toBe(false);
    expect(buffer.deleteForward()).toBe(true);
    expect(buffer.content()).toBe('b');
    expect(buffer.cursor).toBe(0);
  });

  it('deletes the previous word including trailing whitespace', () => {
    const buffer = new TextBuffer({ initial: 'sudo pacman  ' });
    expect(buffer.deleteWordBack()).toBe(true);
    expect(buffer.content()).toBe('sudo ');
    expect(buffer.deleteWordBack()).toBe(true);
    expect(buffer.content()).toBe('');
    expect(buffer.deleteWordBack()).toBe(false);
  });

  it('places the cursor at the end after set', () => {
    const buffer = new TextBuffer({ initial: 'old value' });
    buffer.moveStart();
    buffer.set('new');
    expect(buffer.content()).toBe('new');
    expect(buffer.cursor).toBe(3);
  });

  it('keeps 0 <= cursor <= length across random operations', () => {
    const random = lcg(42);
    const buffer = new TextBuffer();
    const operations: Array<(b: TextBuffer) => void> = [
      (b) => b.insert('x'),
      (b) => b.insert('ü'),
      (b) => b.deleteBack(),
      (b) => b.deleteForward(),
      (b) => b.deleteWordBack(),
      (b) => b.moveLeft(),
      (b) => b.moveRight(),
      (b) => b.moveStart(),
      (b) => b.moveEnd(),
      (b) => b.insert(' '),
    ];

    for (let i = 0; i < 2000; i++) {
      const op = operations[Math.floor(random() * operations.length)];
      op?.(buffer);
      expect(buffer.cursor).toBeGreaterThanOrEqual(0);
      expect(buffer.cursor).toBeLessThanOrEqual(buffer.length);
      expect(Array.from(buffer.content()).length).toBe(buffer.length);
    }
  });

  describe('masked', () => {
    it('displays one mask character per character', () => {
      const buffer = TextBuffer.masked();
      buffer.insert('hunter2');
      expect(buffer.display('*')).toBe('*******');
      expect(buffer.content()).toBe('hunter2');
    });

    it('shows the real content when not masked', () => {
      const buffer = new TextBuffer({ initial: 'alice' });
      expect(buffer.display('*')).toBe('alice');
    });

    it('zeroes the storage on clear', () => {
      const buffer = TextBuffer.masked();
      buffer.insert('test-secret');
      buffer.clear();
      expect(buffer.snapshotStorage().every((slot) => slot === 0)).toBe(true);
      expect(buffer.length).toBe(0);
      expect(buffer.cursor).toBe(0);
    });

    it('zeroes the old content on set', () => {
      const buffer = TextBuffer.masked();
      buffer.insert('test-secret');
      buffer.set('ab');
      const storage = buffer.snapshotStorage();
      expect(Array.from(storage.subarray(0, 2))).toEqual([0x61, 0x62]);
      expect(storage.subarray(2).every((slot) => slot === 0)).toBe(true);
    });

    it('zeroes vacated slots on delete', () => {
      const buffer = TextBuffer.masked();
      buffer.insert('abc');
      buffer.deleteBack();
      expect(buffer.snapshotStorage()[2]).toBe(0);
    });

    it('leaves nothing behind after dispose', () => {
      const buffer = TextBuffer.masked();
      buffer.insert('x'.repeat(100));
      buffer.dispose();
      expect(buffer.snapshotStorage().every((slot) => slot === 0)).toBe(true);
    });
  });
});
