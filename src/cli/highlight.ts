import chalk, { type ChalkInstance } from 'chalk';
import { classifyLine, type TokenCategory, type TokenRule } from '../highlight/token-rules.js';
import { loadSource, runCommand, type CommonOptions } from './utils.js';

function paint(colors: ChalkInstance, category: TokenCategory, text: string): string {
  switch (category) {
    case 'comment':
      return colors.gray(text);
    case 'function-name':
      return colors.blue(text);
    case 'keyword':
      return colors.magenta(text);
    case 'type':
      return colors.cyan(text);
  }
}

/**
 * Colour one line by its tokens; text between tokens is left plain.
 */
export function renderHighlightedLine(
  text: string,
  rules: readonly TokenRule[],
  colors: ChalkInstance = chalk,
): string {
  let output = '';
  let column = 0;

  for (const token of classifyLine(text, rules)) {
    output += text.slice(column, token.start);
    output += paint(colors, token.category, text.slice(token.start, token.end));
    column = token.end;
  }

  return output + text.slice(column);
}

export async function highlightCommand(file: string, options: CommonOptions): Promise<void> {
  await runCommand(options, async () => {
    const { buffer, mode } = await loadSource(file, options);

    for (const line of buffer.getLines()) {
      console.log(renderHighlightedLine(line, mode.tokenRules));
    }
  });
}
