import type { Buffer } from '../buffer/types.js';
import { textBeforeCursor } from '../buffer/offsets.js';
import { DEFAULT_INDENT_OFFSET } from '../constants.js';
import { indentationOf, isClosingBraceLine, opensBlock } from '../scanner.js';
import type { IndentationStrategy } from './calculator.js';

const CURSOR_AFTER_OPEN_BRACE = /\{\s*$/;

export type NewlineBranch = 'brace-pair' | 'plain';

export interface NewlineResult {
  branch: NewlineBranch;
  /** Indentation of the line the cursor ends on. */
  indent: number;
}

/**
 * Newline keystroke.
 *
 * With the cursor right after `{` (only whitespace in between) the
 * command materializes an empty block: an indented body line for the
 * cursor and a closing `}` at the opener's indentation below it.
 * Anywhere else it splits the line and indents the new one from the
 * current line alone.
 *
 * Runs as a single atomic edit.
 */
export function handleNewline(
  buffer: Buffer,
  indentOffset: number = DEFAULT_INDENT_OFFSET,
): NewlineResult {
  const { line } = buffer.cursorPosition();
  const currentText = buffer.lineText(line);
  const currentIndent = indentationOf(currentText);

  if (CURSOR_AFTER_OPEN_BRACE.test(textBeforeCursor(buffer))) {
    return buffer.atomic(() => splitBracePair(buffer, currentIndent, indentOffset));
  }

  const target = opensBlock(currentText) ? currentIndent + indentOffset : currentIndent;
  return buffer.atomic((): NewlineResult => {
    buffer.insertLineBreak();
    buffer.indentLineTo(target);
    return { branch: 'plain', indent: target };
  });
}

function splitBracePair(buffer: Buffer, indent: number, indentOffset: number): NewlineResult {
  const bodyIndent = indent + indentOffset;

  buffer.insertLineBreak();
  buffer.indentLineTo(bodyIndent);
  const body = buffer.cursorPosition();

  buffer.insertLineBreak();
  buffer.indentLineTo(indent);
  buffer.insertText('}');

  buffer.setCursorPosition(body.line, body.column);
  return { branch: 'brace-pair', indent: bodyIndent };
}

/**
 * Electric `}`: insert the brace and, when that makes the cursor line a
 * closing-brace line, re-indent it.
 */
export function insertClosingBrace(buffer: Buffer, indenter: IndentationStrategy): void {
  buffer.atomic(() => {
    buffer.insertText('}');
    const { line } = buffer.cursorPosition();
    if (isClosingBraceLine(buffer.lineText(line))) {
      buffer.indentLineTo(indenter.computeIndent(buffer, line));
    }
  });
}
