import { ModelError } from '../errors/errors';
import { describeValue } from '../units/units';
import type { MetricValue } from '../units/units.types';
import { generateId } from '../utils/id_generator';
import type { Metric } from './metric';
import type {
  DataPoint,
  HistogramDataPoint,
  RecordOptions,
  ScalarDataPoint,
  TaskInit,
} from './model.types';

function latest(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

/**
 * A unit of work inside a project. Holds the data points recorded against
 * the project's metrics.
 */
export class Task {
  readonly id: string;
  readonly projectId: string;
  readonly name: string;
  description: string | null;
  readonly createdAt: Date;

  private _lastUpdatedAt: Date;
  // metricId -> current value
  private readonly scalars = new Map<string, ScalarDataPoint>();
  private readonly histogram: HistogramDataPoint[] = [];

  constructor(init: TaskInit) {
    const name = init.name.trim();
    if (!name) {
      throw new ModelError('Task name must not be empty');
    }
    this.id = init.id ?? generateId();
    this.projectId = init.projectId;
    this.name = name;
    this.description = init.description ?? null;
    this.createdAt = init.createdAt ?? new Date();
    this._lastUpdatedAt = latest(this.createdAt, init.lastUpdatedAt ?? this.createdAt);

    for (const point of init.dataPoints ?? []) {
      if (point.kind === 'histogram') {
        this.histogram.push(point);
        continue;
      }
      if (this.scalars.has(point.metricId)) {
        throw new ModelError(`Task "${this.name}" has two values for metric ${point.metricId}`);
      }
      this.scalars.set(point.metricId, point);
    }
  }

  get lastUpdatedAt(): Date {
    return this._lastUpdatedAt;
  }

  /**
   * Records a value against a metric of the same project.
   *
   * Accumulating scalars add to the current value unless `replace` is set,
   * overwriting scalars replace it, and histogram metrics get a new entry.
   * Validation happens before any change, so a rejected value leaves the
   * task untouched.
   *
   * @throws ModelError when the value has the wrong kind, is not allowed
   *   by the metric, or the metric belongs to another project or was removed
   */
  record(metric: Metric, value: MetricValue, options: RecordOptions = {}): DataPoint {
    this.assertOwnMetric(metric);
    const unit = metric.unit;

    if (!unit.isValue(value)) {
      throw new ModelError(
        `Metric "${metric.name}" expects a ${metric.valueKind} value, got ${describeValue(value)}`,
        'INVALID_VALUE'
      );
    }
    if (!metric.allows(value)) {
      const allowed = (metric.allowedValues ?? []).map(v => unit.format(v)).join(', ');
      throw new ModelError(
        `Value ${unit.format(value)} is not allowed for metric "${metric.name}" (allowed: ${allowed})`,
        'VALUE_NOT_ALLOWED'
      );
    }

    const timestamp = new Date((options.at ?? new Date()).getTime());
    const point = this.apply(metric, value, timestamp, options.replace ?? false);

    this._lastUpdatedAt = latest(this._lastUpdatedAt, timestamp);
    return point;
  }

  /**
   * Parses `text` with the metric's unit, then records it.
   * @throws ParsingError
   */
  recordText(metric: Metric, text: string, options: RecordOptions = {}): DataPoint {
    return this.record(metric, metric.parse(text), options);
  }

  /**
   * Current value of a scalar metric (null when never recorded), or the
   * sum of all histogram entries (the unit's zero when there are none).
   */
  total(metric: Metric): MetricValue | null {
    this.assertOwnMetric(metric);

    if (metric.aggregation !== 'histogram-append') {
      return this.scalars.get(metric.id)?.value ?? null;
    }

    const unit = metric.unit;
    const add = unit.add;
    if (!add || unit.zero === undefined) {
      throw new ModelError(`Metric "${metric.name}" cannot be summed`);
    }
    return this.histogram
      .filter(point => point.metricId === metric.id)
      .reduce((sum, point) => add(sum, point.value), unit.zero);
  }

  /** Histogram entries in recording order, or the single scalar point. */
  dataPoints(metric?: Metric): DataPoint[] {
    const all: DataPoint[] = [...this.scalars.values(), ...this.histogram];
    return metric ? all.filter(point => point.metricId === metric.id) : all;
  }

  /** Drops every data point of a metric; used when the metric is removed. */
  dropMetric(metricId: string): number {
    let removed = this.scalars.delete(metricId) ? 1 : 0;
    for (let i = this.histogram.length - 1; i >= 0; i--) {
      if (this.histogram[i]?.metricId === metricId) {
        this.histogram.splice(i, 1);
        removed++;
      }
    }
    return removed;
  }

  private apply(metric: Metric, value: MetricValue, timestamp: Date, replace: boolean): DataPoint {
    switch (metric.aggregation) {
      case 'histogram-append': {
        const entry: HistogramDataPoint = { kind: 'histogram', entryId: generateId(), metricId: metric.id, value, timestamp };
        this.histogram.push(entry);
        return entry;
      }

      case 'scalar-overwrite': {
        const point: ScalarDataPoint = { kind: 'scalar', metricId: metric.id, value, timestamp };
        this.scalars.set(metric.id, point);
        return point;
      }

      case 'scalar-accumulate': {
        const current = this.scalars.get(metric.id);
        const add = metric.unit.add;
        if (current && !replace && !add) {
          throw new ModelError(`Metric "${metric.name}" cannot accumulate values`);
        }
        const next = current && !replace && add ? add(current.value, value) : value;
        const point: ScalarDataPoint = { kind: 'scalar', metricId: metric.id, value: next, timestamp };
        this.scalars.set(metric.id, point);
        return point;
      }
    }
  }

  private assertOwnMetric(metric: Metric): void {
    if (metric.detached) {
      throw new ModelError(
        `Metric "${metric.name}" was removed from the project of task "${this.name}"`,
        'FOREIGN_METRIC'
      );
    }
    if (metric.projectId !== this.projectId) {
      throw new ModelError(
        `Metric "${metric.name}" does not belong to the project of task "${this.name}"`,
        'FOREIGN_METRIC'
      );
    }
  }
}
