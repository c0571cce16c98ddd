import fs from 'fs/promises';
import chalk from 'chalk';
import type { TextBuffer } from '../buffer/text-buffer.js';
import { isBlankLine } from '../scanner.js';
import type { EditingCommands } from '../mode/types.js';
import { loadSource, pluralize, runCommand, type CommonOptions } from './utils.js';

export interface IndentOptions extends CommonOptions {
  check?: boolean;
  write?: boolean;
}

export interface ReindentResult {
  lines: string[];
  /** 0-based lines whose text changed. */
  changed: number[];
}

/**
 * Issue an explicit re-indent request for every non-blank line, top to
 * bottom. Each line is computed from the already re-indented line above
 * it. Blank lines are left as they are.
 */
export function reindentBuffer(buffer: TextBuffer, commands: EditingCommands): ReindentResult {
  const original = buffer.getLines();
  const changed: number[] = [];

  original.forEach((text, line) => {
    if (isBlankLine(text)) return;
    buffer.setCursorPosition(line, 0);
    commands.indentCurrentLine();
    if (buffer.lineText(line) !== text) changed.push(line);
  });

  return { lines: buffer.getLines(), changed };
}

export async function indentCommand(file: string, options: IndentOptions): Promise<void> {
  await runCommand(options, async () => {
    const { buffer, lineEnding, commands, logger } = await loadSource(file, options);
    const { changed } = reindentBuffer(buffer, commands);
    logger.debug(`${file}: ${pluralize(changed.length, 'line')} re-indented`);

    if (options.check) {
      if (changed.length === 0) {
        console.log(chalk.green(`✓ ${file} is correctly indented`));
        return;
      }
      for (const line of changed) {
        console.log(`${file}:${line + 1}: ${chalk.yellow('indentation differs')}`);
      }
      console.log(chalk.yellow(`\n${pluralize(changed.length, 'line')} would be re-indented`));
      process.exitCode = 1;
      return;
    }

    if (options.write) {
      await fs.writeFile(file, buffer.getText(lineEnding), 'utf-8');
      console.log(chalk.green(`✓ Re-indented ${pluralize(changed.length, 'line')} in ${file}`));
      return;
    }

    process.stdout.write(buffer.getText(lineEnding));
  });
}
