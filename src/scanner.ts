/**
 * Structural scanner: regex predicates over a single line of text.
 *
 * These are the only source of structural truth for indentation. Nothing
 * here tracks brace depth across lines.
 */

/** Start-of-line `fn`, whitespace, identifier, optional whitespace, `()`. */
export const FUNCTION_DEFINITION_PATTERN = /^fn\s+([A-Za-z_]\w*)\s*\(\)/;

const OPENS_BLOCK_PATTERN = /\{\s*$/;
const CLOSING_BRACE_PATTERN = /^\s*\}/;
const BLANK_LINE_PATTERN = /^\s*$/;
const LEADING_SPACES_PATTERN = /^ */;

/**
 * Name of the function defined on this line, or null. Only the empty
 * parameter list `()` is recognised.
 */
export function matchFunctionDefinition(text: string): string | null {
  const match = FUNCTION_DEFINITION_PATTERN.exec(text);
  return match ? match[1] : null;
}

/** Boolean form of `matchFunctionDefinition`; use that one to get the name. */
export function isFunctionDefinitionLine(text: string): boolean {
  return FUNCTION_DEFINITION_PATTERN.test(text);
}

/** Line ends with `{`, optionally followed by whitespace. */
export function opensBlock(text: string): boolean {
  return OPENS_BLOCK_PATTERN.test(text);
}

export function isBlankLine(text: string): boolean {
  return BLANK_LINE_PATTERN.test(text);
}

/** Line starts (after whitespace) with `}`. */
export function isClosingBraceLine(text: string): boolean {
  return CLOSING_BRACE_PATTERN.test(text);
}

/**
 * Number of leading space characters. Tabs do not count.
 */
export function indentationOf(text: string): number {
  return (LEADING_SPACES_PATTERN.exec(text) ?? [''])[0].length;
}

/**
 * Text before the first `//`. The language has no string literals, so
 * every `//` starts a comment.
 */
export function stripComment(text: string): string {
  const start = text.indexOf('//');
  return start === -1 ? text : text.slice(0, start);
}
