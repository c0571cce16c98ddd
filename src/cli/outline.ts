import chalk, { type ChalkInstance } from 'chalk';
import type { FunctionDefinition } from '../symbols/symbol-index.js';
import { loadSource, pluralize, runCommand, type CommonOptions } from './utils.js';

export type OutlineOptions = CommonOptions;

/**
 * One row per definition: name, 1-based line, buffer offset.
 */
export function formatOutline(
  index: readonly FunctionDefinition[],
  colors: ChalkInstance = chalk,
): string[] {
  const width = Math.max(0, ...index.map(definition => definition.name.length));
  return index.map(
    definition =>
      `${colors.blue(definition.name.padEnd(width))}  ${colors.dim(
        `line ${definition.line + 1}, offset ${definition.offset}`,
      )}`,
  );
}

export async function outlineCommand(file: string, options: OutlineOptions): Promise<void> {
  await runCommand(options, async () => {
    const { commands, logger } = await loadSource(file, options);
    const index = commands.buildSymbolIndex();
    logger.debug(`${file}: ${pluralize(index.length, 'definition')}`);

    if (options.json) {
      console.log(JSON.stringify(index, null, 2));
      return;
    }

    if (index.length === 0) {
      console.log(chalk.yellow('No function definitions found'));
      return;
    }

    for (const row of formatOutline(index)) {
      console.log(row);
    }
  });
}
