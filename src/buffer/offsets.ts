import type { Buffer, Position } from './types.js';

/**
 * Character offset of the start of `line`, counting one character per
 * line break.
 */
export function lineStartOffset(buffer: Buffer, line: number): number {
  let offset = 0;
  const last = Math.min(line, buffer.lineCount());
  for (let i = 0; i < last; i++) {
    offset += buffer.lineText(i).length + 1;
  }
  return offset;
}

export function positionToOffset(buffer: Buffer, position: Position): number {
  return lineStartOffset(buffer, position.line) + position.column;
}

export function comparePositions(a: Position, b: Position): number {
  return a.line !== b.line ? a.line - b.line : a.column - b.column;
}

/**
 * Leading text of the cursor line up to the cursor.
 */
export function textBeforeCursor(buffer: Buffer): string {
  const { line, column } = buffer.cursorPosition();
  return buffer.lineText(line).slice(0, column);
}
