import type { Buffer } from '../buffer/types.js';
import type { TokenRule } from '../highlight/token-rules.js';
import type { NewlineResult } from '../indent/newline.js';
import type { NavigationResult } from '../navigation/defun.js';
import type { FunctionDefinition } from '../symbols/symbol-index.js';

/**
 * Commands a mode exposes to the host editor for one buffer.
 */
export interface EditingCommands {
  /** Re-indent the cursor line; returns the level applied. */
  indentCurrentLine(): number;
  handleNewline(): NewlineResult;
  /** Electric `}`. */
  insertClosingBrace(): void;
  jumpToDefunStart(count?: number): NavigationResult;
  jumpToDefunEnd(count?: number): NavigationResult;
  buildSymbolIndex(): FunctionDefinition[];
}

/**
 * Definition of an editing mode.
 */
export interface LanguageMode {
  /** Mode identifier (e.g., 'jade') */
  id: string;
  /** Human-readable name */
  name: string;
  /** File extensions without dots (e.g., ['jade']) */
  extensions: readonly string[];
  /** Highlighting rules, in the order they must be applied */
  tokenRules: readonly TokenRule[];
  /** Bind the mode's commands to a buffer */
  attach(buffer: Buffer): EditingCommands;
}
