import type { Buffer, Position } from './types.js';

export type ChangeListener = (buffer: TextBuffer) => void;

export type LineEnding = '\n' | '\r\n';

/** `\r\n` if the text has any CRLF break, `\n` otherwise. */
export function detectLineEnding(text: string): LineEnding {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * In-memory `Buffer` backed by an array of lines.
 *
 * Used by the CLI and by tests. Cursor positions are clamped into the
 * buffer, and change listeners fire once per outermost edit.
 */
export class TextBuffer implements Buffer {
  private lines: string[];
  private cursor: Position = { line: 0, column: 0 };
  private listeners = new Set<ChangeListener>();
  private editDepth = 0;
  private dirty = false;
  private changeCount = 0;

  constructor(lines: string[] = ['']) {
    this.lines = lines.length > 0 ? [...lines] : [''];
  }

  static fromText(text: string): TextBuffer {
    return new TextBuffer(text.split(/\r?\n/));
  }

  /** Number of change notifications fired so far. */
  get version(): number {
    return this.changeCount;
  }

  lineCount(): number {
    return this.lines.length;
  }

  lineText(line: number): string {
    return this.lines[line] ?? '';
  }

  getLines(): string[] {
    return [...this.lines];
  }

  getText(lineEnding: LineEnding = '\n'): string {
    return this.lines.join(lineEnding);
  }

  cursorPosition(): Position {
    return { ...this.cursor };
  }

  setCursorPosition(line: number, column: number): void {
    const clampedLine = clamp(line, 0, this.lines.length - 1);
    this.cursor = {
      line: clampedLine,
      column: clamp(column, 0, this.lines[clampedLine].length),
    };
  }

  insertText(text: string): void {
    if (text.length === 0) return;
    this.mutate(() => {
      const pieces = text.split('\n');
      pieces.forEach((piece, i) => {
        if (i > 0) this.splitAtCursor();
        const { line, column } = this.cursor;
        const current = this.lines[line];
        this.lines[line] = current.slice(0, column) + piece + current.slice(column);
        this.cursor = { line, column: column + piece.length };
      });
    });
  }

  insertLineBreak(): void {
    this.mutate(() => this.splitAtCursor());
  }

  /**
   * Replace the cursor line's leading whitespace with `level` spaces.
   * A cursor inside the old indentation lands at the end of the new one;
   * otherwise it stays on the same character.
   */
  indentLineTo(level: number): void {
    const target = Math.max(0, Math.floor(level));
    const { line, column } = this.cursor;
    const current = this.lines[line];
    const oldIndent = (/^[ \t]*/.exec(current) ?? [''])[0].length;
    const next = ' '.repeat(target) + current.slice(oldIndent);
    const nextColumn = column <= oldIndent ? target : column + (target - oldIndent);

    if (next === current) {
      this.cursor = { line, column: nextColumn };
      return;
    }

    this.mutate(() => {
      this.lines[line] = next;
      this.cursor = { line, column: nextColumn };
    });
  }

  atomic<T>(edit: () => T): T {
    const snapshot = { lines: [...this.lines], cursor: { ...this.cursor }, dirty: this.dirty };
    this.editDepth++;
    try {
      return edit();
    } catch (error) {
      this.lines = snapshot.lines;
      this.cursor = snapshot.cursor;
      this.dirty = snapshot.dirty;
      throw error;
    } finally {
      this.editDepth--;
      if (this.editDepth === 0) this.flush();
    }
  }

  /**
   * Subscribe to change notifications.
   * @returns A function that removes the listener
   */
  onDidChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private splitAtCursor(): void {
    const { line, column } = this.cursor;
    const current = this.lines[line];
    this.lines.splice(line, 1, current.slice(0, column), current.slice(column));
    this.cursor = { line: line + 1, column: 0 };
  }

  private mutate(change: () => void): void {
    change();
    this.dirty = true;
    if (this.editDepth === 0) this.flush();
  }

  private flush(): void {
    if (!this.dirty) return;
    this.dirty = false;
    this.changeCount++;
    for (const listener of this.listeners) {
      listener(this);
    }
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
