/**
 * Cursor-addressable text buffer
 *
 * Content is kept as Unicode code points in a Uint32Array so that secret
 * input can be overwritten in place. Whenever content is cleared, replaced
 * or the storage is reallocated, the old storage is zeroed first.
 */

const INITIAL_CAPACITY = 32;

export interface TextBufferOptions {
  /** Render as mask characters instead of the real content */
  masked?: boolean;
  /** Initial content, cursor placed at the end */
  initial?: string;
}

function isWhitespace(codePoint: number): boolean {
  return /\s/u.test(String.fromCodePoint(codePoint));
}

export class TextBuffer {
  readonly masked: boolean;
  private storage: Uint32Array;
  private size = 0;
  private position = 0;

  constructor(options: TextBufferOptions = {}) {
    this.masked = options.masked ?? false;
    this.storage = new Uint32Array(INITIAL_CAPACITY);
    if (options.initial) {
      this.insert(options.initial);
    }
  }

  /** Create a buffer for passwords and other secrets */
  static masked(): TextBuffer {
    return new TextBuffer({ masked: true });
  }

  /** Number of code points */
  get length(): number {
    return this.size;
  }

  /** Cursor position in code points, always within [0, length] */
  get cursor(): number {
    return this.position;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  content(): string {
    let out = '';
    for (let i = 0; i < this.size; i++) {
      out += String.fromCodePoint(this.storage[i] ?? 0);
    }
    return out;
  }

  /**
   * Text to render. Masked buffers yield one mask character per code point.
   */
  display(maskChar = '*'): string {
    return this.masked ? maskChar.repeat(this.size) : this.content();
  }

  /**
   * Insert text at the cursor. Multi-code-point strings are inserted in order.
   */
  insert(text: string): void {
    for (const ch of text) {
      const codePoint = ch.codePointAt(0);
      if (codePoint !== undefined) {
        this.insertCodePoint(codePoint);
      }
    }
  }

  /** Delete the code point before the cursor */
  deleteBack(): boolean {
    if (this.position === 0) return false;
    this.storage.copyWithin(this.position - 1, this.position, this.size);
    this.size--;
    this.storage[this.size] = 0;
    this.position--;
    return true;
  }

  /** Delete the code point under the cursor */
  deleteForward(): boolean {
    if (this.position >= this.size) return false;
    this.storage.copyWithin(this.position, this.position + 1, this.size);
    this.size--;
    this.storage[this.size] = 0;
    return true;
  }

  /**
   * Delete the word before the cursor: trailing whitespace first, then the
   * run of non-whitespace in front of it.
   */
  deleteWordBack(): boolean {
    let deleted = false;
    while (this.position > 0 && isWhitespace(this.storage[this.position - 1] ?? 0)) {
      deleted = this.deleteBack() || deleted;
    }
    while (this.position > 0 && !isWhitespace(this.storage[this.position - 1] ?? 0)) {
      deleted = this.deleteBack() || deleted;
    }
    return deleted;
  }

  moveLeft(): void {
    if (this.position > 0) this.position--;
  }

  moveRight(): void {
    if (this.position < this.size) this.position++;
  }

  moveStart(): void {
    this.position = 0;
  }

  moveEnd(): void {
    this.position = this.size;
  }

  /** Zero the storage and empty the buffer */
  clear(): void {
    this.storage.fill(0);
    this.size = 0;
    this.position = 0;
  }

  /** Replace the content, cursor at the end */
  set(text: string): void {
    this.clear();
    this.insert(text);
  }

  /** End of life: wipe whatever is left */
  dispose(): void {
    this.clear();
  }

  /**
   * Copy of the whole backing store, including unused capacity.
   */
  snapshotStorage(): Uint32Array {
    return Uint32Array.from(this.storage);
  }

  private insertCodePoint(codePoint: number): void {
    this.ensureCapacity(this.size + 1);
    this.storage.copyWithin(this.position + 1, this.position, this.size);
    this.storage[this.position] = codePoint;
    this.size++;
    this.position++;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.storage.length) return;
    const next = new Uint32Array(Math.max(required, this.storage.length * 2));
    next.set(this.storage.subarray(0, this.size));
    this.storage.fill(0);
    this.storage = next;
  }
}
