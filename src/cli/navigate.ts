import chalk from 'chalk';
import type { NavigationResult } from '../navigation/defun.js';
import { InputError } from '../errors/index.js';
import { loadSource, parsePositiveInt, pluralize, runCommand, type CommonOptions } from './utils.js';

export interface NavigateOptions extends CommonOptions {
  line: string;
  column?: string;
  end?: boolean;
  count?: string;
}

/**
 * `file:line:column` (1-based) plus the outcome.
 */
export function formatNavigation(file: string, result: NavigationResult): string {
  const { line, column } = result.position;
  const location = `${file}:${line + 1}:${column + 1}`;
  switch (result.outcome) {
    case 'ok':
      return `${location} (${pluralize(result.steps, 'step')})`;
    case 'no-match':
      return `${location} (stopped after ${pluralize(result.steps, 'step')}: no further definition)`;
    case 'unbalanced':
      return `${location} (no matching end found)`;
  }
}

export async function navigateCommand(file: string, options: NavigateOptions): Promise<void> {
  await runCommand(options, async () => {
    const line = parsePositiveInt(options.line, '--line');
    const column = options.column !== undefined ? parsePositiveInt(options.column, '--column') : 1;
    const count = options.count !== undefined ? parsePositiveInt(options.count, '--count') : 1;

    const { buffer, commands } = await loadSource(file, options);
    if (line > buffer.lineCount()) {
      throw new InputError(`--line ${line} is past the end of ${file} (${buffer.lineCount()} lines)`);
    }
    buffer.setCursorPosition(line - 1, column - 1);

    const result = options.end ? commands.jumpToDefunEnd(count) : commands.jumpToDefunStart(count);

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      const message = formatNavigation(file, result);
      console.log(result.outcome === 'ok' ? message : chalk.yellow(message));
    }
  });
}
