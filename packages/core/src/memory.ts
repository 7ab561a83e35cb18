/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and for embedding the tracker without a data file.
 */

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// ProjectStore
export { MemoryProjectStore } from './project_store/memory';
export type { MemoryProjectStoreOptions } from './project_store/memory';

// SchemaLoader
export { DocumentSchemaLoader, FactorySchemaLoader } from './schema_loader/memory';
