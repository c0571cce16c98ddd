import { Command } from 'commander';
import { createRequire } from 'module';
import { highlightCommand } from './highlight.js';
import { indentCommand } from './indent-cmd.js';
import { navigateCommand } from './navigate.js';
import { outlineCommand } from './outline.js';

// Same relative path from src/cli and dist/cli
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to a .jade-mode.yml config file')
    .option('--indent-offset <n>', 'Columns per indentation unit (overrides config)')
    .option('-v, --verbose', 'Show debug logging and error details');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('jade-mode')
    .description('Indentation, defun navigation and outlines for .jade sources')
    .version(packageJson.version);

  withCommonOptions(
    program
      .command('outline')
      .description('List function definitions in buffer order')
      .argument('<file>', '.jade file to index')
      .option('--json', 'Print the symbol index as JSON'),
  ).action(outlineCommand);

  withCommonOptions(
    program
      .command('indent')
      .description('Re-indent every line, top to bottom')
      .argument('<file>', '.jade file to re-indent')
      .option('--check', 'List lines that would change and exit 1 if any')
      .option('-w, --write', 'Write the result back to the file'),
  ).action(indentCommand);

  withCommonOptions(
    program
      .command('highlight')
      .description('Print the file with token colours')
      .argument('<file>', '.jade file to highlight'),
  ).action(highlightCommand);

  withCommonOptions(
    program
      .command('navigate')
      .description('Jump to the start (or end) of a function definition')
      .argument('<file>', '.jade file to navigate')
      .requiredOption('-l, --line <n>', 'Cursor line (1-based)')
      .option('--column <n>', 'Cursor column (1-based)', '1')
      .option('-e, --end', 'Jump to the end of the definition instead of its start')
      .option('-n, --count <n>', 'Repeat count', '1')
      .option('--json', 'Print the navigation result as JSON'),
  ).action(navigateCommand);

  return program;
}

export const program = createProgram();
