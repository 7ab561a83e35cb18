/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of config.json to the local filesystem.
 * Also provides a static helper for locating the tasktally root.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../../errors/errors';
import type { TallyConfig } from '../../config_manager/config_manager.types';
import { ConfigManager, TALLY_DIRECTORY } from '../../config_manager/config_manager';
import { conformsTo, schemaError } from '../../schemas/schema_cache';
import { isNotFound } from '../../utils/fs_errors';
import type { ConfigStore } from '../config_store';

const CONFIG_FILE = 'config.json';

function isTallyConfig(data: unknown): data is TallyConfig {
  return conformsTo('tally_config_schema', data);
}

/**
 * Filesystem-based ConfigStore implementation.
 *
 * Stores configuration in .tasktally/config.json.
 * A missing file reads as null; a file that is present but malformed is an
 * error rather than silently ignored.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/root');
 * const config = store.loadConfig();
 * if (config) {
 *   console.log(config.dataFile);
 * }
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly configPath: string;

  constructor(rootPath: string) {
    this.configPath = path.join(rootPath, TALLY_DIRECTORY, CONFIG_FILE);
  }

  /**
   * Load configuration from .tasktally/config.json
   *
   * @throws ConfigError for invalid JSON
   * @throws DetailedValidationError for a config that fails its schema
   */
  loadConfig(): TallyConfig | null {
    let content: string;
    try {
      content = fs.readFileSync(this.configPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    let config: unknown;
    try {
      config = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid JSON in config file: ${reason}`, this.configPath);
    }
    if (!isTallyConfig(config)) {
      throw schemaError('tally_config_schema', 'Tracker config', this.configPath);
    }
    return config;
  }

  /**
   * Save configuration to .tasktally/config.json
   */
  saveConfig(config: TallyConfig): void {
    if (!isTallyConfig(config)) {
      throw schemaError('tally_config_schema', 'Tracker config', this.configPath);
    }
    fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  // ==================== Static Utility Methods ====================

  /**
   * Finds the closest directory, starting at `startPath` and walking up,
   * that contains a .tasktally directory.
   *
   * @returns Absolute path, or null when there is none up to the filesystem root
   */
  static findTallyRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);

    for (;;) {
      if (fs.existsSync(path.join(currentPath, TALLY_DIRECTORY))) {
        return currentPath;
      }
      const parent = path.dirname(currentPath);
      if (parent === currentPath) {
        return null;
      }
      currentPath = parent;
    }
  }
}

/**
 * Create a ConfigManager backed by `.tasktally/config.json`.
 *
 * Auto-detects the root when none is given, falling back to the
 * working directory.
 */
export function createConfigManager(rootPath?: string): ConfigManager {
  const resolvedRoot = rootPath ?? FsConfigStore.findTallyRoot() ?? process.cwd();
  return new ConfigManager(new FsConfigStore(resolvedRoot), resolvedRoot);
}
