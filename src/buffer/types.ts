/**
 * 0-based line/column position inside a buffer.
 */
export interface Position {
  line: number;
  column: number;
}

/**
 * Abstract text buffer consumed by the editing engine.
 *
 * The engine never owns text storage. Every editing operation goes
 * through this interface, and the cursor is the buffer's, not the
 * engine's.
 */
export interface Buffer {
  lineCount(): number;
  /** Text of a line without its line break. */
  lineText(line: number): string;
  cursorPosition(): Position;
  setCursorPosition(line: number, column: number): void;
  /** Insert text at the cursor and move the cursor past it. */
  insertText(text: string): void;
  /** Split the cursor line at the cursor; the cursor moves to the start of the new line. */
  insertLineBreak(): void;
  /** Replace the leading whitespace of the cursor line with `level` spaces. */
  indentLineTo(level: number): void;
  /**
   * Run several mutations as one logical edit. Implementations must roll
   * back everything `edit` did if it throws.
   */
  atomic<T>(edit: () => T): T;
}
