import type { SerializedValue, ValueKind } from '../units/units.types';

/*
 * Normalized rows. The aggregate is flattened into these on save and
 * rebuilt from them on every read.
 */

export type ProjectRow = {
  id: string;
  name: string;
  organization: string | null;
  description: string | null;
};

export type MetricRow = {
  id: string;
  projectId: string;
  name: string;
  valueKind: ValueKind;
  description: string | null;
  allowedValues: SerializedValue[] | null;
  defaultValue: SerializedValue | null;
};

export type TaskRow = {
  id: string;
  projectId: string;
  name: string;
  description: string | null;
  /** ISO-8601 */
  createdAt: string;
  /** ISO-8601 */
  lastUpdatedAt: string;
};

export type DataPointRow = {
  kind: 'scalar' | 'histogram';
  taskId: string;
  metricId: string;
  /** Set for histogram entries only. */
  entryId: string | null;
  value: SerializedValue;
  /** ISO-8601 */
  timestamp: string;
};

/** On-disk shape of `FsProjectStore`. */
export type ProjectStoreDocument = {
  version: 1;
  projects: ProjectRow[];
  metrics: MetricRow[];
  tasks: TaskRow[];
  dataPoints: DataPointRow[];
};

/** Row tables keyed by id (data points by `dataPointKey`). */
export type ProjectTables = {
  projects: Map<string, ProjectRow>;
  metrics: Map<string, MetricRow>;
  tasks: Map<string, TaskRow>;
  dataPoints: Map<string, DataPointRow>;
};
