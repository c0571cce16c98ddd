import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { CONFIG_FILENAME } from '../constants.js';
import { ConfigError, getErrorMessage } from '../errors/index.js';
import { defaultConfig, jadeModeConfigSchema, type JadeModeConfig } from './schema.js';

export interface LoadConfigOptions {
  /** Directory searched for `.jade-mode.yml` (default: cwd). */
  rootDir?: string;
  /** Explicit config file; must exist. */
  configPath?: string;
}

/**
 * Load and validate the mode configuration.
 * Returns defaults when no config file exists.
 *
 * @throws ConfigError on unreadable files, YAML syntax errors or schema violations
 */
export function loadConfig(options: LoadConfigOptions = {}): JadeModeConfig {
  const explicit = options.configPath !== undefined;
  const configPath = options.configPath ?? path.join(options.rootDir ?? process.cwd(), CONFIG_FILENAME);

  if (!fs.existsSync(configPath)) {
    if (explicit) {
      throw new ConfigError(`Config file not found: ${configPath}`, { configPath });
    }
    return { ...defaultConfig };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${getErrorMessage(error)}`, {
      configPath,
    });
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return { ...defaultConfig };
  }

  const result = jadeModeConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  - ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config in ${configPath}:\n${issues}`, { configPath });
  }

  return result.data;
}

/**
 * Apply command-line overrides on top of a loaded config.
 */
export function mergeConfig(
  base: JadeModeConfig,
  overrides: Partial<JadeModeConfig>,
): JadeModeConfig {
  const merged = { ...base };
  if (overrides.indentOffset !== undefined) {
    merged.indentOffset = overrides.indentOffset;
  }

  const result = jadeModeConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new ConfigError(`Invalid option override: ${issues}`, { overrides });
  }
  return result.data;
}
