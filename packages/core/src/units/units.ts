import type Decimal from 'decimal.js';
import { ConfigError, ModelError, ParsingError } from '../errors/errors';
import { formatDuration, parseDuration } from './duration';
import { ExactDecimal, isDecimal } from './exact_decimal';
import type {
  AggregationPolicy,
  MetricValue,
  SerializedValue,
  Unit,
  ValueKind,
} from './units.types';

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

function isSafeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value);
}

function deserializeDecimal(kind: ValueKind, raw: SerializedValue): Decimal {
  const text = String(raw);
  if (!DECIMAL_RE.test(text)) {
    throw new ModelError(`Stored ${kind} value is not a decimal: ${text}`);
  }
  return new ExactDecimal(text);
}

export const IntegerUnit: Unit<number> = {
  kind: 'Integer',
  displayName: 'Integer',
  aggregation: 'scalar-accumulate',
  zero: 0,

  parse(text: string): number {
    const trimmed = text.trim();
    if (!INTEGER_RE.test(trimmed)) {
      throw new ParsingError(`Invalid int expression: ${text}`, 'Integer', text);
    }
    const value = Number(trimmed);
    if (!Number.isSafeInteger(value)) {
      throw new ParsingError(`Integer out of range: ${text}`, 'Integer', text);
    }
    return value;
  },

  format: (value) => value.toString(),
  isValue: isSafeInteger,
  equals: (a, b) => a === b,

  add(a: number, b: number): number {
    const sum = a + b;
    if (!Number.isSafeInteger(sum)) {
      throw new ModelError(`Integer total out of range: ${a} + ${b}`);
    }
    return sum;
  },

  serialize: (value) => value,

  deserialize(raw: SerializedValue): number {
    if (!isSafeInteger(raw)) {
      throw new ModelError(`Stored Integer value is not an integer: ${raw}`);
    }
    return raw;
  },
};

export const DecimalUnit: Unit<Decimal> = {
  kind: 'Decimal',
  displayName: 'Decimal',
  aggregation: 'scalar-accumulate',
  zero: new ExactDecimal(0),

  parse(text: string): Decimal {
    const trimmed = text.trim();
    if (!DECIMAL_RE.test(trimmed)) {
      throw new ParsingError(`Invalid float expression: ${text}`, 'Decimal', text);
    }
    return new ExactDecimal(trimmed);
  },

  format: (value) => value.toFixed(),
  isValue: isDecimal,
  equals: (a, b) => a.equals(b),
  // Summed at ExactDecimal precision even when `a` came from plain decimal.js
  add: (a, b) => new ExactDecimal(a).plus(b),
  serialize: (value) => value.toFixed(),
  deserialize: (raw) => deserializeDecimal('Decimal', raw),
};

export const DurationUnit: Unit<Decimal> = {
  kind: 'Duration',
  displayName: 'Duration',
  aggregation: 'histogram-append',
  zero: new ExactDecimal(0),
  parse: parseDuration,
  format: formatDuration,
  isValue: isDecimal,
  equals: (a, b) => a.equals(b),
  // Summed at ExactDecimal precision even when `a` came from plain decimal.js
  add: (a, b) => new ExactDecimal(a).plus(b),
  serialize: (value) => value.toFixed(),
  deserialize: (raw) => deserializeDecimal('Duration', raw),
};

export const StringUnit: Unit<string> = {
  kind: 'String',
  displayName: 'String',
  aggregation: 'scalar-overwrite',
  parse: (text) => text,
  format: (value) => value,
  isValue: (value): value is string => typeof value === 'string',
  equals: (a, b) => a === b,
  serialize: (value) => value,

  deserialize(raw: SerializedValue): string {
    if (typeof raw !== 'string') {
      throw new ModelError(`Stored String value is not a string: ${raw}`);
    }
    return raw;
  },
};

/**
 * Concrete units keyed by kind, e.g. `Units.Duration.parse('2 hrs')`.
 */
export const Units = {
  Integer: IntegerUnit,
  Decimal: DecimalUnit,
  Duration: DurationUnit,
  String: StringUnit,
} as const;

/**
 * Wraps a concrete unit so it accepts any MetricValue, rejecting values of
 * another kind with a ModelError instead of relying on the caller's types.
 */
function eraseUnit<V extends MetricValue>(unit: Unit<V>): Unit {
  const narrow = (value: MetricValue): V => {
    if (unit.isValue(value)) return value;
    throw new ModelError(`Expected a ${unit.displayName} value, got ${describeValue(value)}`);
  };
  const add = unit.add;

  return {
    kind: unit.kind,
    displayName: unit.displayName,
    aggregation: unit.aggregation,
    zero: unit.zero,
    parse: (text) => unit.parse(text),
    format: (value) => unit.format(narrow(value)),
    isValue: (value: unknown): value is MetricValue => unit.isValue(value),
    equals: (a, b) => unit.equals(narrow(a), narrow(b)),
    add: add ? (a, b) => add.call(unit, narrow(a), narrow(b)) : undefined,
    serialize: (value) => unit.serialize(narrow(value)),
    deserialize: (raw) => unit.deserialize(raw),
  };
}

const UNITS_BY_KIND: Record<ValueKind, Unit> = {
  Integer: eraseUnit(IntegerUnit),
  Decimal: eraseUnit(DecimalUnit),
  Duration: eraseUnit(DurationUnit),
  String: eraseUnit(StringUnit),
};

/**
 * Selects the unit for a declared value kind.
 */
export function unitFor(kind: ValueKind): Unit {
  return UNITS_BY_KIND[kind];
}

export function aggregationFor(kind: ValueKind): AggregationPolicy {
  return UNITS_BY_KIND[kind].aggregation;
}

export function isValueOfKind(kind: ValueKind, value: unknown): value is MetricValue {
  return UNITS_BY_KIND[kind].isValue(value);
}

/** Short human description of a value, used in error messages. */
export function describeValue(value: unknown): string {
  if (isDecimal(value)) return `decimal ${value.toFixed()}`;
  if (typeof value === 'string') return `string "${value}"`;
  return `${typeof value} ${String(value)}`;
}

// Metric-type identifiers accepted in project definitions (lower-cased).
const KIND_ALIASES: Record<string, ValueKind> = {
  integer: 'Integer',
  int: 'Integer',
  decimal: 'Decimal',
  number: 'Decimal',
  float: 'Decimal',
  duration: 'Duration',
  string: 'String',
  str: 'String',
  text: 'String',
};

/**
 * Maps a `metric_type` identifier (or alias) to its value kind.
 * @throws ConfigError for unknown identifiers
 */
export function resolveValueKind(identifier: string, source?: string): ValueKind {
  const key = identifier.trim().toLowerCase();
  const kind = Object.hasOwn(KIND_ALIASES, key) ? KIND_ALIASES[key] : undefined;
  if (!kind) {
    throw new ConfigError(`Unknown metric type: ${identifier}`, source);
  }
  return kind;
}
