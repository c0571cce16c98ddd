import { extname } from 'path';
import { JadeModeErrorCode, JadeModeError } from '../errors/index.js';
import type { LanguageMode } from './types.js';

/**
 * Registry of editing modes keyed by id and by file extension.
 *
 * Hosts create their own registry; there is no process-wide instance.
 */
export class ModeRegistry {
  private readonly modes = new Map<string, LanguageMode>();
  private readonly extensionMap = new Map<string, string>();

  /**
   * @throws JadeModeError (DUPLICATE_MODE) if the id or an extension is already taken
   */
  register(mode: LanguageMode): this {
    if (this.modes.has(mode.id)) {
      throw new JadeModeError(
        `Duplicate mode ID in registry: ${mode.id}`,
        JadeModeErrorCode.DUPLICATE_MODE,
        { id: mode.id },
      );
    }

    const extensions = mode.extensions.map(ext => ext.replace(/^\./, '').toLowerCase());
    for (const ext of extensions) {
      const owner = this.extensionMap.get(ext);
      if (owner) {
        throw new JadeModeError(
          `Duplicate extension "${ext}" registered by "${mode.id}" (already claimed by "${owner}")`,
          JadeModeErrorCode.DUPLICATE_MODE,
          { id: mode.id, extension: ext, owner },
        );
      }
    }

    this.modes.set(mode.id, mode);
    for (const ext of extensions) {
      this.extensionMap.set(ext, mode.id);
    }
    return this;
  }

  get(id: string): LanguageMode | null {
    return this.modes.get(id) ?? null;
  }

  /**
   * Mode for a file path, based on its extension.
   *
   * @returns The mode or null if no mode claims the extension
   */
  detectMode(filePath: string): LanguageMode | null {
    const ext = extname(filePath).slice(1).toLowerCase();
    const id = this.extensionMap.get(ext);
    return id ? this.get(id) : null;
  }

  getAll(): readonly LanguageMode[] {
    return [...this.modes.values()];
  }

  getSupportedExtensions(): string[] {
    return [...this.extensionMap.keys()];
  }
}
