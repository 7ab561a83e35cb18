/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use @tasktally/core/memory for in-memory alternatives.
 */

// ConfigStore + ConfigManager factory
export { FsConfigStore, createConfigManager } from './config_store/fs';

// ProjectStore
export { FsProjectStore } from './project_store/fs';
export type { FsProjectStoreOptions, DocumentSerializer } from './project_store/fs';

// SchemaLoader
export { FileSchemaLoader } from './schema_loader/fs';

// Tracker factory (config + store + engine for a root directory)
export { createTracker } from './tracker/fs';
