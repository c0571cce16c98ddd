import type { Buffer } from '../buffer/types.js';
import { DEFAULT_INDENT_OFFSET, JADE_FILE_EXTENSIONS, JADE_MODE_ID, JADE_MODE_NAME } from '../constants.js';
import { TOKEN_RULES } from '../highlight/token-rules.js';
import { createLookbackIndenter, type IndentationStrategy } from '../indent/calculator.js';
import { handleNewline, insertClosingBrace } from '../indent/newline.js';
import { silentLogger, type Logger } from '../logger.js';
import { beginningOfDefun, endOfDefun, type NavigationResult } from '../navigation/defun.js';
import { buildSymbolIndex } from '../symbols/symbol-index.js';
import type { EditingCommands, LanguageMode } from './types.js';

export interface JadeModeOptions {
  /** Columns per indent unit (default: 4). Ignored when `indenter` is given. */
  indentOffset?: number;
  /** Replacement for the one-line look-back indenter. */
  indenter?: IndentationStrategy;
  logger?: Logger;
}

/**
 * Create the editing mode for `.jade` files.
 */
export function createJadeMode(options: JadeModeOptions = {}): LanguageMode {
  const indenter =
    options.indenter ?? createLookbackIndenter(options.indentOffset ?? DEFAULT_INDENT_OFFSET);
  const logger = options.logger ?? silentLogger;

  return {
    id: JADE_MODE_ID,
    name: JADE_MODE_NAME,
    extensions: JADE_FILE_EXTENSIONS,
    tokenRules: TOKEN_RULES,
    attach: buffer => attachCommands(buffer, indenter, logger),
  };
}

function attachCommands(
  buffer: Buffer,
  indenter: IndentationStrategy,
  logger: Logger,
): EditingCommands {
  const moveTo = (command: string, result: NavigationResult): NavigationResult => {
    buffer.setCursorPosition(result.position.line, result.position.column);
    if (result.outcome === 'unbalanced') {
      logger.debug(`${command}: no matching end found, cursor left in place`);
    } else if (result.outcome === 'no-match') {
      logger.debug(`${command}: stopped after ${result.steps} step(s), nothing further`);
    }
    return result;
  };

  return {
    indentCurrentLine() {
      const { line } = buffer.cursorPosition();
      const level = indenter.computeIndent(buffer, line);
      buffer.atomic(() => buffer.indentLineTo(level));
      return level;
    },

    handleNewline() {
      const result = handleNewline(buffer, indenter.indentOffset);
      logger.debug(`newline: ${result.branch} split, indent ${result.indent}`);
      return result;
    },

    insertClosingBrace() {
      insertClosingBrace(buffer, indenter);
    },

    jumpToDefunStart(count = 1) {
      return moveTo('beginning-of-defun', beginningOfDefun(buffer, buffer.cursorPosition(), count));
    },

    jumpToDefunEnd(count = 1) {
      return moveTo('end-of-defun', endOfDefun(buffer, buffer.cursorPosition(), count));
    },

    buildSymbolIndex() {
      return buildSymbolIndex(buffer);
    },
  };
}
