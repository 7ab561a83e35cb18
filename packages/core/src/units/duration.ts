import type Decimal from 'decimal.js';
import { ParsingError } from '../errors/errors';
import { ExactDecimal } from './exact_decimal';

const SECONDS_PER_DAY = 86400;
const SECONDS_PER_HOUR = 3600;
const SECONDS_PER_MINUTE = 60;

/** Unit synonyms mapped to their length in seconds. */
const DURATION_UNITS: ReadonlyArray<{ names: ReadonlySet<string>; seconds: number }> = [
  { names: new Set(['days', 'day', 'd']), seconds: SECONDS_PER_DAY },
  { names: new Set(['hours', 'hour', 'hrs', 'hr', 'h']), seconds: SECONDS_PER_HOUR },
  { names: new Set(['minutes', 'minute', 'mins', 'min', 'm']), seconds: SECONDS_PER_MINUTE },
  { names: new Set(['seconds', 'second', 'secs', 'sec', 's']), seconds: 1 },
];

const CLOCK_RE = /^(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?$/;

// `<unit><number>` or `<number><unit>`
const TOKEN_RE = /([A-Za-z]+)\s*(\d+(?:\.\d*)?)|(\d+(?:\.\d*)?)\s*([A-Za-z]+)/g;

const SEPARATOR_RE = /^[\s,]*$/;

/**
 * Parses `H:MM:SS` / `H:MM`. Returns null when the text is not in clock
 * format (including out-of-range fields such as `25:00`).
 */
export function parseClock(text: string): Decimal | null {
  const match = CLOCK_RE.exec(text.trim());
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  return new ExactDecimal(hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE + seconds);
}

function multiplierFor(unit: string): number | undefined {
  const name = unit.toLowerCase();
  return DURATION_UNITS.find(entry => entry.names.has(name))?.seconds;
}

function assertSeparator(text: string, between: string): void {
  if (!SEPARATOR_RE.test(between)) {
    const fragment = between.trim();
    throw new ParsingError(
      `Invalid duration expression: "${fragment}" in "${text}"`,
      'Duration',
      text,
      fragment
    );
  }
}

/**
 * Parses a duration into exact seconds.
 *
 * Clock format wins when it matches; otherwise the text must be one or more
 * unit/number tokens (`2 hrs, 5 mins`, `hrs 2`, `525s`, `4.5 hours`).
 *
 * @throws ParsingError for unknown units, stray text, or no tokens at all
 */
export function parseDuration(text: string): Decimal {
  const clock = parseClock(text);
  if (clock !== null) {
    return clock;
  }

  let total = new ExactDecimal(0);
  let tokens = 0;
  let cursor = 0;

  for (const match of text.matchAll(TOKEN_RE)) {
    const fragment = match[0];
    const index = match.index ?? cursor;
    const unit = match[1] ?? match[4];
    const amount = match[2] ?? match[3];

    assertSeparator(text, text.slice(cursor, index));

    const multiplier = unit === undefined ? undefined : multiplierFor(unit);
    if (multiplier === undefined || amount === undefined) {
      throw new ParsingError(
        `Invalid duration expression: ${fragment}`,
        'Duration',
        text,
        fragment
      );
    }

    total = total.plus(new ExactDecimal(amount).times(multiplier));
    tokens += 1;
    cursor = index + fragment.length;
  }

  assertSeparator(text, text.slice(cursor));

  if (tokens === 0) {
    throw new ParsingError(`Invalid duration expression: "${text}"`, 'Duration', text);
  }

  return total;
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Renders seconds as `[N day(s), ]H:MM:SS[.ffffff]`, e.g. `1 day, 0:01:40`.
 * Display only; the output is not guaranteed to parse back.
 */
export function formatDuration(value: Decimal): string {
  const negative = value.isNegative() && !value.isZero();
  let remaining = value.abs();

  const days = remaining.dividedToIntegerBy(SECONDS_PER_DAY).toNumber();
  remaining = remaining.minus(days * SECONDS_PER_DAY);
  const hours = remaining.dividedToIntegerBy(SECONDS_PER_HOUR).toNumber();
  remaining = remaining.minus(hours * SECONDS_PER_HOUR);
  const minutes = remaining.dividedToIntegerBy(SECONDS_PER_MINUTE).toNumber();
  remaining = remaining.minus(minutes * SECONDS_PER_MINUTE);

  const wholeSeconds = remaining.floor();
  const fraction = remaining.minus(wholeSeconds);

  let clock = `${hours}:${pad2(minutes)}:${pad2(wholeSeconds.toNumber())}`;
  if (!fraction.isZero()) {
    const micros = fraction.times(1_000_000).floor().toNumber();
    clock += `.${micros.toString().padStart(6, '0')}`;
  }

  const dayPart = days > 0 ? `${days} ${days === 1 ? 'day' : 'days'}, ` : '';
  return `${negative ? '-' : ''}${dayPart}${clock}`;
}
