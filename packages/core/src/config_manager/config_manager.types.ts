/**
 * ConfigManager Types
 */

import type { ImportStrategy } from '../import_engine/import_engine.types';
import type { LogLevel } from '../logger/logger';

/**
 * tasktally configuration, stored in `.tasktally/config.json`.
 * Every field is optional; ConfigManager fills in defaults.
 */
export type TallyConfig = {
  /** Project store document; relative paths resolve against the root */
  dataFile?: string;
  defaultImportStrategy?: ImportStrategy;
  logLevel?: LogLevel;
};

/** Effective configuration with defaults applied. */
export type ResolvedTallyConfig = {
  rootPath: string;
  /** Absolute path */
  dataFile: string;
  defaultImportStrategy: ImportStrategy;
  logLevel: LogLevel;
};

export interface IConfigManager {
  loadConfig(): TallyConfig | null;
  getDataFilePath(): string;
  getDefaultImportStrategy(): ImportStrategy;
  getLogLevel(): LogLevel;
  getResolvedConfig(): ResolvedTallyConfig;
  updateConfig(update: TallyConfig): TallyConfig;
}
