import type { MetricValue, ValueKind } from '../units/units.types';

/**
 * Declarative shape of a metric, as read from a project definition or
 * produced by `Metric.toDefinition()`.
 */
export type MetricDefinition = {
  name: string;
  valueKind: ValueKind;
  description?: string | null;
  /** Finite set of permitted values; null or absent means unrestricted. */
  allowedValues?: readonly MetricValue[] | null;
  defaultValue?: MetricValue | null;
};

/** Fields of a metric that can change without changing its identity. */
export type MetricUpdate = Pick<MetricDefinition, 'description' | 'allowedValues' | 'defaultValue'>;

export type MetricInit = MetricDefinition & {
  id?: string;
  projectId: string;
};

export type ProjectInit = {
  id?: string;
  name: string;
  organization?: string | null;
  description?: string | null;
};

export type TaskInit = {
  id?: string;
  projectId: string;
  name: string;
  description?: string | null;
  createdAt?: Date;
  lastUpdatedAt?: Date;
  dataPoints?: readonly DataPoint[];
};

type DataPointBase = {
  readonly metricId: string;
  readonly value: MetricValue;
  readonly timestamp: Date;
};

/** The single current value of a scalar metric on one task. */
export type ScalarDataPoint = DataPointBase & {
  readonly kind: 'scalar';
};

/** One immutable histogram entry; a task may hold any number per metric. */
export type HistogramDataPoint = DataPointBase & {
  readonly kind: 'histogram';
  readonly entryId: string;
};

export type DataPoint = ScalarDataPoint | HistogramDataPoint;

export type RecordOptions = {
  /** Overwrite an accumulating scalar instead of adding to it. */
  replace?: boolean;
  /** Time of the observation; defaults to now. */
  at?: Date;
};

export type QualifiedName = {
  organization: string | null;
  name: string;
};

