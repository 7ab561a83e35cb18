export { parseProjectDefinitions } from './schema_loader';
export type { SchemaLoader, SchemaLoaderOptions } from './schema_loader';
export type {
  DefinitionScalar,
  MetricDefinitionEntry,
  ProjectDefinitionEntry,
  ProjectDefinitionsDocument,
} from './schema_loader.types';
