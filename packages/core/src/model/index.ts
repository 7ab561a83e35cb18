export { Project } from './project';
export { Metric } from './metric';
export { Task } from './task';
export {
  ORGANIZATION_SEPARATOR,
  formatQualifiedName,
  splitQualifiedName,
  normalizeMetricName,
} from './names';
export type {
  MetricDefinition,
  MetricUpdate,
  MetricInit,
  ProjectInit,
  TaskInit,
  DataPoint,
  ScalarDataPoint,
  HistogramDataPoint,
  RecordOptions,
  QualifiedName,
} from './model.types';
