import fs from 'fs/promises';
import chalk from 'chalk';
import { TextBuffer, detectLineEnding, type LineEnding } from '../buffer/text-buffer.js';
import { loadConfig, mergeConfig } from '../config/loader.js';
import type { JadeModeConfig } from '../config/schema.js';
import {
  InputError,
  JadeModeErrorCode,
  getErrorMessage,
  getErrorStack,
  isJadeModeError,
  wrapError,
} from '../errors/index.js';
import { createLogger, type Logger } from '../logger.js';
import { createJadeMode } from '../mode/jade-mode.js';
import { ModeRegistry } from '../mode/registry.js';
import type { EditingCommands, LanguageMode } from '../mode/types.js';

/**
 * Options shared by every command
 */
export interface CommonOptions {
  config?: string;
  indentOffset?: string;
  verbose?: boolean;
  /** Report results, and failures, as JSON on stdout. */
  json?: boolean;
}

/**
 * A `.jade` file loaded into a buffer with the mode attached.
 */
export interface LoadedSource {
  filePath: string;
  buffer: TextBuffer;
  /** Line break used by the file on disk, kept when writing it back. */
  lineEnding: LineEnding;
  mode: LanguageMode;
  commands: EditingCommands;
  config: JadeModeConfig;
  logger: Logger;
}

/**
 * Parse a positive integer option.
 *
 * @throws InputError if the value is not a positive integer
 */
export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InputError(`${name} must be a positive integer, got "${value}"`, undefined, {
      option: name,
      value,
    });
  }
  return parsed;
}

/**
 * Resolve config from file + flags, create the mode and read the file
 * into a buffer.
 *
 * @throws InputError for missing, unreadable or non-.jade files
 */
export async function loadSource(filePath: string, options: CommonOptions): Promise<LoadedSource> {
  const logger = createLogger({ verbose: options.verbose });
  const config = mergeConfig(loadConfig({ configPath: options.config }), {
    indentOffset:
      options.indentOffset !== undefined
        ? parsePositiveInt(options.indentOffset, '--indent-offset')
        : undefined,
  });
  logger.debug(`indent offset: ${config.indentOffset}`);

  const registry = new ModeRegistry().register(
    createJadeMode({ indentOffset: config.indentOffset, logger }),
  );
  const mode = registry.detectMode(filePath);
  if (!mode) {
    throw new InputError(
      `Unsupported file type: ${filePath} (expected one of: ${registry
        .getSupportedExtensions()
        .map(ext => `.${ext}`)
        .join(', ')})`,
      JadeModeErrorCode.INVALID_INPUT,
      { filePath },
    );
  }

  const text = await readSourceFile(filePath);
  const buffer = TextBuffer.fromText(text);
  return {
    filePath,
    buffer,
    lineEnding: detectLineEnding(text),
    mode,
    commands: mode.attach(buffer),
    config,
    logger,
  };
}

async function readSourceFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new InputError(`File not found: ${filePath}`, JadeModeErrorCode.FILE_NOT_FOUND, {
        filePath,
      });
    }
    throw new InputError(
      `Cannot read ${filePath}: ${getErrorMessage(error)}`,
      JadeModeErrorCode.FILE_NOT_READABLE,
      { filePath },
    );
  }
}

/**
 * Handles command errors with consistent formatting
 * Distinguishes between jade-mode errors and unexpected errors
 */
export function handleCommandError(error: unknown, verbose: boolean = false): void {
  const errorMessage = getErrorMessage(error);

  if (isJadeModeError(error)) {
    console.error(chalk.red(`\n❌ ${errorMessage}\n`));

    if (error.context && verbose) {
      console.error(chalk.dim('Context:'));
      console.error(chalk.dim(JSON.stringify(error.context, null, 2)));
    }
  } else {
    console.error(chalk.red(`\n❌ Unexpected error: ${errorMessage}\n`));

    const stack = getErrorStack(error);
    if (stack && verbose) {
      console.error(chalk.dim('Stack trace:'));
      console.error(chalk.dim(stack));
    }
  }

  if (!verbose) {
    console.error(chalk.dim('Run with --verbose for more details\n'));
  }
}

/**
 * Run a command body, reporting failures and setting a non-zero exit code.
 * Under `--json` the failure is printed as the error's JSON form instead.
 */
export async function runCommand(
  options: CommonOptions,
  body: () => Promise<void>,
): Promise<void> {
  try {
    await body();
  } catch (error) {
    if (options.json) {
      const failure = isJadeModeError(error) ? error : wrapError(error, 'Unexpected error');
      console.log(JSON.stringify(failure.toJSON(), null, 2));
    } else {
      handleCommandError(error, options.verbose);
    }
    process.exitCode = 1;
  }
}

/**
 * Formats a count with proper pluralization
 * @returns Formatted string (e.g., "1 line", "5 lines")
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
