import { z } from 'zod';
import { DEFAULT_INDENT_OFFSET, MAX_INDENT_OFFSET } from '../constants.js';

/**
 * Schema for `.jade-mode.yml`.
 */
export const jadeModeConfigSchema = z
  .object({
    indentOffset: z
      .number()
      .int()
      .positive()
      .max(MAX_INDENT_OFFSET)
      .default(DEFAULT_INDENT_OFFSET)
      .describe('Columns per indentation unit'),
  })
  .strict();

export type JadeModeConfig = z.infer<typeof jadeModeConfigSchema>;

export const defaultConfig: JadeModeConfig = jadeModeConfigSchema.parse({});
