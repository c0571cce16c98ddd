// jade-mode - structural indentation, defun navigation and outline indexing for .jade sources

// =============================================================================
// LINE MODEL
// =============================================================================

export type { Buffer, Position } from './buffer/types.js';
export { TextBuffer, detectLineEnding } from './buffer/text-buffer.js';
export type { ChangeListener, LineEnding } from './buffer/text-buffer.js';
export {
  lineStartOffset,
  positionToOffset,
  comparePositions,
  textBeforeCursor,
} from './buffer/offsets.js';

// =============================================================================
// STRUCTURAL SCANNER
// =============================================================================

export {
  FUNCTION_DEFINITION_PATTERN,
  matchFunctionDefinition,
  isFunctionDefinitionLine,
  opensBlock,
  isBlankLine,
  isClosingBraceLine,
  indentationOf,
  stripComment,
} from './scanner.js';

// =============================================================================
// INDENTATION
// =============================================================================

export {
  computeIndent,
  createLookbackIndenter,
  findPreviousNonBlankLine,
} from './indent/calculator.js';
export type { IndentationStrategy } from './indent/calculator.js';
export { handleNewline, insertClosingBrace } from './indent/newline.js';
export type { NewlineBranch, NewlineResult } from './indent/newline.js';

// =============================================================================
// NAVIGATION
// =============================================================================

export { beginningOfDefun, endOfDefun, findPreviousDefunStart } from './navigation/defun.js';
export type { NavigationOutcome, NavigationResult } from './navigation/defun.js';
export { findNextOpenBrace, findMatchingCloseBrace } from './navigation/brace-matcher.js';

// =============================================================================
// SYMBOLS & HIGHLIGHTING
// =============================================================================

export { buildSymbolIndex, findSymbol } from './symbols/symbol-index.js';
export type { FunctionDefinition } from './symbols/symbol-index.js';
export { TOKEN_RULES, classifyLine } from './highlight/token-rules.js';
export type { Token, TokenCategory, TokenRule } from './highlight/token-rules.js';

// =============================================================================
// MODE REGISTRATION
// =============================================================================

export { createJadeMode } from './mode/jade-mode.js';
export type { JadeModeOptions } from './mode/jade-mode.js';
export { ModeRegistry } from './mode/registry.js';
export type { EditingCommands, LanguageMode } from './mode/types.js';

// =============================================================================
// CONFIG, ERRORS, LOGGING
// =============================================================================

export { loadConfig, mergeConfig } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export { jadeModeConfigSchema, defaultConfig } from './config/schema.js';
export type { JadeModeConfig } from './config/schema.js';
export {
  JadeModeError,
  JadeModeErrorCode,
  ConfigError,
  InputError,
  wrapError,
  isJadeModeError,
  getErrorMessage,
  getErrorStack,
} from './errors/index.js';
export type { ErrorSeverity } from './errors/index.js';
export { consoleLogger, silentLogger, createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

export {
  DEFAULT_INDENT_OFFSET,
  JADE_MODE_ID,
  JADE_FILE_EXTENSIONS,
  CONFIG_FILENAME,
} from './constants.js';
