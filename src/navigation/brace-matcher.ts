import type { Buffer, Position } from '../buffer/types.js';
import { stripComment } from '../scanner.js';

/**
 * Balanced-brace scanning for defun navigation.
 *
 * Unlike the indentation heuristic this walks character by character
 * across lines and tracks depth. Braces after `//` are ignored.
 */

/**
 * First `{` at or after `from`, outside comments.
 */
export function findNextOpenBrace(buffer: Buffer, from: Position): Position | null {
  const lineCount = buffer.lineCount();
  for (let line = Math.max(0, from.line); line < lineCount; line++) {
    const code = stripComment(buffer.lineText(line));
    const startColumn = line === from.line ? Math.max(0, from.column) : 0;
    const column = code.indexOf('{', startColumn);
    if (column !== -1) return { line, column };
  }
  return null;
}

/**
 * Position of the `}` that closes the `{` at `open`, or null when the
 * buffer ends first.
 */
export function findMatchingCloseBrace(buffer: Buffer, open: Position): Position | null {
  const lineCount = buffer.lineCount();
  let depth = 0;

  for (let line = open.line; line < lineCount; line++) {
    const code = stripComment(buffer.lineText(line));
    for (let column = line === open.line ? open.column : 0; column < code.length; column++) {
      const char = code[column];
      if (char === '{') {
        depth++;
      } else if (char === '}') {
        depth--;
        if (depth === 0) return { line, column };
      }
    }
  }

  return null;
}
