/**
 * Constants shared by the editing engine, the mode registry and the CLI.
 */

// Indentation
export const DEFAULT_INDENT_OFFSET = 4;
export const MAX_INDENT_OFFSET = 16;

// Mode identity
export const JADE_MODE_ID = 'jade';
export const JADE_MODE_NAME = 'Jade';
export const JADE_FILE_EXTENSIONS = ['jade'] as const;

// Configuration
export const CONFIG_FILENAME = '.jade-mode.yml';
