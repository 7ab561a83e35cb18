import Decimal from 'decimal.js';

/**
 * Decimal constructor used for every parsed and accumulated value.
 * 64 significant digits keeps story-point and duration totals exact; the
 * library default (20) would round long accumulations.
 */
export const ExactDecimal = Decimal.clone({ precision: 64 });

export function isDecimal(value: unknown): value is Decimal {
  return Decimal.isDecimal(value);
}
