export { ImportEngine, mergeProject } from './import_engine';
export { IMPORT_STRATEGIES, isImportStrategy } from './import_engine.types';
export type {
  ImportStrategy,
  ImportReport,
  MergeWarning,
  ImportEngineDependencies,
} from './import_engine.types';
