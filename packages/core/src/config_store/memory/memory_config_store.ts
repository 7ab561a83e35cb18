/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Useful for testing and embedding where filesystem access is not wanted.
 */

import type { ConfigStore } from '../config_store';
import type { TallyConfig } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ defaultImportStrategy: 'merge' });
 *
 * const manager = new ConfigManager(configStore, '/work');
 * manager.getDefaultImportStrategy(); // 'merge'
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: TallyConfig | null;

  constructor(initial: TallyConfig | null = null) {
    this.config = initial;
  }

  loadConfig(): TallyConfig | null {
    return this.config ? { ...this.config } : null;
  }

  saveConfig(config: TallyConfig): void {
    this.config = { ...config };
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set configuration directly (for test setup); null clears it
   */
  setConfig(config: TallyConfig | null): void {
    this.config = config;
  }

  /**
   * Get current configuration (for test assertions)
   */
  getConfig(): TallyConfig | null {
    return this.config;
  }
}
