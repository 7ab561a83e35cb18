import type Decimal from 'decimal.js';

/**
 * The four kinds of value a metric can hold. Declared once on the metric and
 * used to select its unit deterministically.
 */
export type ValueKind = 'Integer' | 'Decimal' | 'Duration' | 'String';

export const VALUE_KINDS: readonly ValueKind[] = ['Integer', 'Decimal', 'Duration', 'String'];

/**
 * Runtime representation of each value kind.
 * Duration values are exact seconds.
 */
export interface ValueKindMap {
  Integer: number;
  Decimal: Decimal;
  Duration: Decimal;
  String: string;
}

export type ValueOf<K extends ValueKind> = ValueKindMap[K];

/** Any parsed metric value. */
export type MetricValue = ValueKindMap[ValueKind];

/**
 * How repeated writes of the same (task, metric) pair combine.
 * - scalar-accumulate: one value per task, new writes are added to it
 * - scalar-overwrite: one value per task, new writes replace it
 * - histogram-append: one immutable entry per write, total is their sum
 */
export type AggregationPolicy = 'scalar-accumulate' | 'scalar-overwrite' | 'histogram-append';

/** Storage form of a value (integers as numbers, decimals as plain strings). */
export type SerializedValue = string | number;

/**
 * Parser/formatter pair for one value kind.
 *
 * `add` and `zero` exist only for units whose aggregation sums values.
 */
export interface Unit<V extends MetricValue = MetricValue> {
  readonly kind: ValueKind;
  readonly displayName: string;
  readonly aggregation: AggregationPolicy;
  readonly zero?: V;

  /**
   * Parses user or config text.
   * @throws ParsingError when the text does not match the unit's grammar
   */
  parse(text: string): V;
  format(value: V): string;
  isValue(value: unknown): value is V;
  equals(a: V, b: V): boolean;
  add?(a: V, b: V): V;
  serialize(value: V): SerializedValue;
  deserialize(raw: SerializedValue): V;
}
