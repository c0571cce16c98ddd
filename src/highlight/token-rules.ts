import { FUNCTION_DEFINITION_PATTERN } from '../scanner.js';

export type TokenCategory = 'comment' | 'function-name' | 'keyword' | 'type';

export interface TokenRule {
  category: TokenCategory;
  pattern: RegExp;
  /** Capture group that holds the token; the whole match when omitted. */
  group?: number;
}

export interface Token {
  category: TokenCategory;
  /** Start column, inclusive. */
  start: number;
  /** End column, exclusive. */
  end: number;
}

/**
 * Highlighting rules, most specific first. A later rule never claims
 * text an earlier one already matched, so the function name in
 * `fn return_value()` stays a function name.
 */
export const TOKEN_RULES: readonly TokenRule[] = [
  { category: 'comment', pattern: /\/\/.*$/ },
  { category: 'function-name', pattern: FUNCTION_DEFINITION_PATTERN, group: 1 },
  { category: 'keyword', pattern: /\b(?:fn|return)\b/ },
  { category: 'type', pattern: /\bi32\b/ },
];

/**
 * Classify one line with the given rules. Tokens come back sorted by
 * start column.
 */
export function classifyLine(text: string, rules: readonly TokenRule[] = TOKEN_RULES): Token[] {
  const tokens: Token[] = [];

  for (const rule of rules) {
    // global for matchAll, `d` for capture-group offsets
    const flags = new Set([...rule.pattern.flags, 'g', 'd']);
    const pattern = new RegExp(rule.pattern.source, [...flags].join(''));

    for (const match of text.matchAll(pattern)) {
      const span = match.indices?.[rule.group ?? 0];
      if (!span || span[0] === span[1]) continue;

      const [start, end] = span;
      if (tokens.some(token => start < token.end && token.start < end)) continue;
      tokens.push({ category: rule.category, start, end });
    }
  }

  return tokens.sort((a, b) => a.start - b.start);
}
