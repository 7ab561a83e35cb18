/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence, so the tracker configuration can
 * live on the filesystem or in memory for tests.
 */

import type { TallyConfig } from '../config_manager/config_manager.types';

/**
 * Interface for tracker configuration persistence.
 *
 * Implementations:
 * - FsConfigStore: Filesystem-based (.tasktally/config.json)
 * - MemoryConfigStore: In-memory for tests
 *
 * @example
 * ```typescript
 * // Production with filesystem
 * const store = new FsConfigStore('/path/to/root');
 * const config = store.loadConfig();
 *
 * // Tests with memory
 * const store = new MemoryConfigStore();
 * store.setConfig({ logLevel: 'debug' });
 * ```
 */
export interface ConfigStore {
  /**
   * Load configuration from config.json
   *
   * @returns TallyConfig, or null when none has been saved
   * @throws ConfigError when a stored config is malformed
   */
  loadConfig(): TallyConfig | null;

  /**
   * Save configuration to config.json
   */
  saveConfig(config: TallyConfig): void;
}
