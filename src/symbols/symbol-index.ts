import type { Buffer } from '../buffer/types.js';
import { matchFunctionDefinition } from '../scanner.js';

/**
 * A function definition found in a buffer.
 */
export interface FunctionDefinition {
  name: string;
  /** 0-based line of the `fn` keyword. */
  line: number;
  /** Character offset of the definition start from the start of the buffer. */
  offset: number;
}

/**
 * Collect every function definition in buffer order.
 *
 * Single top-to-bottom pass with no state kept between calls, so it can
 * be rerun on every change notification. Duplicate names are kept.
 */
export function buildSymbolIndex(buffer: Buffer): FunctionDefinition[] {
  const definitions: FunctionDefinition[] = [];
  let offset = 0;

  for (let line = 0; line < buffer.lineCount(); line++) {
    const text = buffer.lineText(line);
    const name = matchFunctionDefinition(text);
    if (name !== null) {
      definitions.push({ name, line, offset });
    }
    offset += text.length + 1;
  }

  return definitions;
}

/**
 * Every definition with the given name, for jump-to-symbol.
 */
export function findSymbol(
  index: readonly FunctionDefinition[],
  name: string,
): FunctionDefinition[] {
  return index.filter(definition => definition.name === name);
}
