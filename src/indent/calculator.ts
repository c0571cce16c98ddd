import type { Buffer } from '../buffer/types.js';
import { DEFAULT_INDENT_OFFSET } from '../constants.js';
import { indentationOf, isBlankLine, isClosingBraceLine, opensBlock } from '../scanner.js';

/**
 * Computes the indentation a line should have.
 *
 * The editing commands only talk to this interface, so the one-line
 * look-back heuristic can be swapped for a real incremental parser
 * without touching them.
 */
export interface IndentationStrategy {
  /** Indent unit in columns. */
  readonly indentOffset: number;
  computeIndent(buffer: Buffer, lineIndex: number): number;
}

/**
 * Index of the nearest non-blank line strictly above `lineIndex`, or -1.
 */
export function findPreviousNonBlankLine(buffer: Buffer, lineIndex: number): number {
  let line = Math.min(lineIndex, buffer.lineCount()) - 1;
  while (line >= 0) {
    if (!isBlankLine(buffer.lineText(line))) return line;
    line--;
  }
  return -1;
}

/**
 * Indentation for `lineIndex`, derived from the nearest non-blank line
 * above it:
 *
 * - no such line (or the first line) → 0
 * - that line ends in `{` → its indentation + one unit, otherwise its indentation
 * - the target line starts with `}` → one unit less, floored at 0
 *
 * The base is the previous line's current indentation, not its nesting
 * depth, so a manually mis-indented line shifts everything computed after it.
 */
export function computeIndent(
  buffer: Buffer,
  lineIndex: number,
  indentOffset: number = DEFAULT_INDENT_OFFSET,
): number {
  if (lineIndex <= 0) return 0;

  const previous = findPreviousNonBlankLine(buffer, lineIndex);
  if (previous === -1) return 0;

  const previousText = buffer.lineText(previous);
  const base = indentationOf(previousText);
  let level = opensBlock(previousText) ? base + indentOffset : base;

  if (lineIndex < buffer.lineCount() && isClosingBraceLine(buffer.lineText(lineIndex))) {
    level = Math.max(0, level - indentOffset);
  }

  return level;
}

/**
 * Default strategy: one-line look-back over the structural scanner.
 */
export function createLookbackIndenter(
  indentOffset: number = DEFAULT_INDENT_OFFSET,
): IndentationStrategy {
  return {
    indentOffset,
    computeIndent: (buffer, lineIndex) => computeIndent(buffer, lineIndex, indentOffset),
  };
}
