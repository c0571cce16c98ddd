import type { Buffer, Position } from '../buffer/types.js';
import { isFunctionDefinitionLine } from '../scanner.js';
import { findMatchingCloseBrace, findNextOpenBrace } from './brace-matcher.js';

/**
 * - `ok`: every requested repetition moved
 * - `no-match`: a repetition found no defun (or no `{`); earlier moves are kept
 * - `unbalanced`: a `{` was never closed; the cursor is where it started
 */
export type NavigationOutcome = 'ok' | 'no-match' | 'unbalanced';

export interface NavigationResult {
  position: Position;
  /** Repetitions that moved the cursor. */
  steps: number;
  outcome: NavigationOutcome;
}

/**
 * Start of the nearest function definition beginning strictly before
 * `position`.
 */
export function findPreviousDefunStart(buffer: Buffer, position: Position): Position | null {
  const firstCandidate = position.column > 0 ? position.line : position.line - 1;
  for (let line = Math.min(firstCandidate, buffer.lineCount() - 1); line >= 0; line--) {
    if (isFunctionDefinitionLine(buffer.lineText(line))) {
      return { line, column: 0 };
    }
  }
  return null;
}

/**
 * Move backward to the start of a function definition, `count` times.
 * Running out of definitions is a no-op for the remaining repetitions.
 */
export function beginningOfDefun(buffer: Buffer, cursor: Position, count = 1): NavigationResult {
  let position = cursor;
  let steps = 0;

  while (steps < count) {
    const start = findPreviousDefunStart(buffer, position);
    if (!start) {
      return { position, steps, outcome: 'no-match' };
    }
    position = start;
    steps++;
  }

  return { position, steps, outcome: 'ok' };
}

/**
 * Move forward to the `}` closing the next block, `count` times.
 *
 * Each repetition finds the next `{` from the current position and then
 * the brace that balances it, skipping nested blocks and anything in
 * `//` comments. An unclosed block aborts the whole command and reports
 * the starting cursor.
 */
export function endOfDefun(buffer: Buffer, cursor: Position, count = 1): NavigationResult {
  let position = cursor;
  let steps = 0;

  while (steps < count) {
    const open = findNextOpenBrace(buffer, position);
    if (!open) {
      return { position, steps, outcome: 'no-match' };
    }
    const close = findMatchingCloseBrace(buffer, open);
    if (!close) {
      return { position: cursor, steps: 0, outcome: 'unbalanced' };
    }
    position = close;
    steps++;
  }

  return { position, steps, outcome: 'ok' };
}
