/**
 * Natural Sort
 *
 * Orders names the way people read them: digit runs compare by numeric
 * value, everything else case-insensitively.
 *
 * @module utils/natural_sort
 */

const CHUNK_RE = /(\d+)/;

function chunks(value: string): string[] {
  return value.toLowerCase().split(CHUNK_RE).filter(part => part.length > 0);
}

function isDigits(part: string): boolean {
  return /^\d+$/.test(part);
}

/**
 * Compares two strings in natural order.
 *
 * @example
 * ['task10', 'task2', 'Task1'].sort(compareNatural) // ['Task1', 'task2', 'task10']
 */
export function compareNatural(a: string, b: string): number {
  const left = chunks(a);
  const right = chunks(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? '';
    const y = right[i] ?? '';
    if (x === y) continue;

    if (isDigits(x) && isDigits(y)) {
      const byValue = BigInt(x) < BigInt(y) ? -1 : BigInt(x) > BigInt(y) ? 1 : 0;
      if (byValue !== 0) return byValue;
      // "007" and "7" are equal by value; shorter run first
      return x.length - y.length;
    }
    return x < y ? -1 : 1;
  }

  if (left.length !== right.length) {
    return left.length - right.length;
  }
  // Same text apart from case
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Returns a naturally sorted copy of `items`.
 */
export function sortNaturally<T>(items: Iterable<T>, key: (item: T) => string): T[] {
  return [...items].sort((a, b) => compareNatural(key(a), key(b)));
}
