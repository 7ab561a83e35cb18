/**
 * ConfigManager - Tracker Configuration Manager
 *
 * Provides typed access to the tasktally configuration (config.json) with
 * defaults applied. Uses ConfigStore abstraction for backend-agnostic
 * persistence.
 */

import * as path from 'path';
import type { ConfigStore } from '../config_store/config_store';
import type { ImportStrategy } from '../import_engine/import_engine.types';
import { resolveLogLevel } from '../logger/logger';
import type { LogLevel } from '../logger/logger';
import type {
  IConfigManager,
  ResolvedTallyConfig,
  TallyConfig,
} from './config_manager.types';

export const TALLY_DIRECTORY = '.tasktally';
export const DEFAULT_DATA_FILE = 'tasktally.json';
export const DEFAULT_IMPORT_STRATEGY: ImportStrategy = 'abort';

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@tasktally/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore(root), root);
 *
 * // Test usage
 * import { MemoryConfigStore } from '@tasktally/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ defaultImportStrategy: 'merge' });
 * const configManager = new ConfigManager(configStore, '/work');
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  readonly rootPath: string;

  constructor(configStore: ConfigStore, rootPath: string) {
    this.configStore = configStore;
    this.rootPath = path.resolve(rootPath);
  }

  /**
   * Load tasktally configuration
   * @throws ConfigError when a stored config is malformed
   */
  loadConfig(): TallyConfig | null {
    return this.configStore.loadConfig();
  }

  /**
   * Absolute path of the project store document.
   * Defaults to `<root>/.tasktally/tasktally.json`.
   */
  getDataFilePath(): string {
    const dataFile = this.loadConfig()?.dataFile;
    return dataFile
      ? path.resolve(this.rootPath, dataFile)
      : path.join(this.rootPath, TALLY_DIRECTORY, DEFAULT_DATA_FILE);
  }

  getDefaultImportStrategy(): ImportStrategy {
    return this.loadConfig()?.defaultImportStrategy ?? DEFAULT_IMPORT_STRATEGY;
  }

  /**
   * Configured level, else the environment's (silent under test,
   * TASKTALLY_LOG_LEVEL, info).
   */
  getLogLevel(): LogLevel {
    return this.loadConfig()?.logLevel ?? resolveLogLevel();
  }

  getResolvedConfig(): ResolvedTallyConfig {
    return {
      rootPath: this.rootPath,
      dataFile: this.getDataFilePath(),
      defaultImportStrategy: this.getDefaultImportStrategy(),
      logLevel: this.getLogLevel(),
    };
  }

  /**
   * Merges `update` into the stored config (creating it if missing) and
   * saves the result.
   */
  updateConfig(update: TallyConfig): TallyConfig {
    const next: TallyConfig = { ...(this.loadConfig() ?? {}), ...update };
    this.configStore.saveConfig(next);
    return next;
  }
}
