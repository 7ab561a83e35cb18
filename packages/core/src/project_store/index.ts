export type { ProjectStore, TransactionScope } from './project_store';
export type {
  ProjectRow,
  MetricRow,
  TaskRow,
  DataPointRow,
  ProjectStoreDocument,
  ProjectTables,
} from './project_store.types';
export { TableProjectStore } from './table_project_store';
