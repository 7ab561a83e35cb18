import { ConfigError } from '../errors/errors';
import { describeValue, unitFor } from '../units/units';
import type { AggregationPolicy, MetricValue, Unit, ValueKind } from '../units/units.types';
import { generateId } from '../utils/id_generator';
import type { MetricDefinition, MetricInit, MetricUpdate } from './model.types';

/**
 * A named, typed measurement declared on a project.
 *
 * The value kind is fixed at creation; it selects the unit used to parse,
 * format and aggregate every value recorded against the metric.
 */
export class Metric {
  readonly id: string;
  readonly projectId: string;
  readonly name: string;
  readonly valueKind: ValueKind;

  private _description: string | null;
  private _allowedValues: readonly MetricValue[] | null;
  private _defaultValue: MetricValue | null;
  private _detached = false;

  constructor(init: MetricInit) {
    const name = init.name.trim();
    if (!name) {
      throw new ConfigError('Metric name must not be empty');
    }
    this.id = init.id ?? generateId();
    this.projectId = init.projectId;
    this.name = name;
    this.valueKind = init.valueKind;

    const checked = this.check(init);
    this._description = checked.description;
    this._allowedValues = checked.allowedValues;
    this._defaultValue = checked.defaultValue;
  }

  get unit(): Unit {
    return unitFor(this.valueKind);
  }

  get aggregation(): AggregationPolicy {
    return this.unit.aggregation;
  }

  get description(): string | null {
    return this._description;
  }

  get allowedValues(): readonly MetricValue[] | null {
    return this._allowedValues;
  }

  get defaultValue(): MetricValue | null {
    return this._defaultValue;
  }

  /** True once the owning project has removed this metric. */
  get detached(): boolean {
    return this._detached;
  }

  /** Called by `Project.removeMetric`; a detached metric accepts no data. */
  detach(): void {
    this._detached = true;
  }

  /**
   * Parses text with this metric's unit.
   * @throws ParsingError
   */
  parse(text: string): MetricValue {
    return this.unit.parse(text);
  }

  format(value: MetricValue): string {
    return this.unit.format(value);
  }

  /** True when the value has this metric's kind and passes its allowed set. */
  allows(value: MetricValue): boolean {
    const unit = this.unit;
    if (!unit.isValue(value)) return false;
    if (this._allowedValues === null) return true;
    return this._allowedValues.some(allowed => unit.equals(allowed, value));
  }

  /**
   * Replaces description, allowed values and default together.
   * Nothing changes if the new combination is invalid.
   * @throws ConfigError
   */
  update(update: MetricUpdate): void {
    const checked = this.check(update);
    this._description = checked.description;
    this._allowedValues = checked.allowedValues;
    this._defaultValue = checked.defaultValue;
  }

  toDefinition(): MetricDefinition {
    return {
      name: this.name,
      valueKind: this.valueKind,
      description: this._description,
      allowedValues: this._allowedValues ? [...this._allowedValues] : null,
      defaultValue: this._defaultValue,
    };
  }

  private check(update: MetricUpdate): {
    description: string | null;
    allowedValues: readonly MetricValue[] | null;
    defaultValue: MetricValue | null;
  } {
    const unit = this.unit;
    const allowedValues = update.allowedValues ?? null;
    const defaultValue = update.defaultValue ?? null;

    if (allowedValues) {
      for (const value of allowedValues) {
        if (!unit.isValue(value)) {
          throw new ConfigError(
            `Allowed value ${describeValue(value)} of metric "${this.name}" is not a ${this.valueKind}`
          );
        }
      }
    }

    if (defaultValue !== null) {
      if (!unit.isValue(defaultValue)) {
        throw new ConfigError(
          `Default value ${describeValue(defaultValue)} of metric "${this.name}" is not a ${this.valueKind}`
        );
      }
      if (allowedValues && !allowedValues.some(allowed => unit.equals(allowed, defaultValue))) {
        throw new ConfigError(
          `Default value ${unit.format(defaultValue)} of metric "${this.name}" is not among its allowed values`
        );
      }
    }

    return {
      description: update.description ?? null,
      allowedValues: allowedValues ? [...allowedValues] : null,
      defaultValue,
    };
  }
}
