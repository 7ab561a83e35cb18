export {
  Units,
  IntegerUnit,
  DecimalUnit,
  DurationUnit,
  StringUnit,
  unitFor,
  aggregationFor,
  isValueOfKind,
  describeValue,
  resolveValueKind,
} from './units';
export { parseDuration, parseClock, formatDuration } from './duration';
export { ExactDecimal, isDecimal } from './exact_decimal';
export { VALUE_KINDS } from './units.types';
export type {
  ValueKind,
  ValueKindMap,
  ValueOf,
  MetricValue,
  AggregationPolicy,
  SerializedValue,
  Unit,
} from './units.types';
