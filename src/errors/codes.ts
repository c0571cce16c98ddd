/**
 * Error codes for all jade-mode errors.
 * Used to identify error types programmatically.
 */
export enum JadeModeErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // File System
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  FILE_NOT_READABLE = 'FILE_NOT_READABLE',

  // Command Input
  INVALID_INPUT = 'INVALID_INPUT',

  // Mode Registry
  DUPLICATE_MODE = 'DUPLICATE_MODE',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
