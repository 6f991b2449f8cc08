/**
 * Monthly period helpers.
 *
 * A period is always a `YYYY-MM-01` string. Arithmetic is done on
 * (year, month) pairs so no timezone ever leaks into a period.
 */

const PERIOD_PATTERN = /^(\d{4})-(\d{2})(?:-(\d{2}))?(?:[T ].*)?$/;

const DAYS_IN_MONTH = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

interface YearMonth {
  year: number;
  month: number;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function toPeriod({ year, month }: YearMonth): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-01`;
}

function toYearMonth(period: string): YearMonth {
  const match = PERIOD_PATTERN.exec(period);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Not a period: ${period}`);
  }
  return {
    year: Number.parseInt(match[1], 10),
    month: Number.parseInt(match[2], 10),
  };
}

/**
 * Parse a raw date cell into its normalized period.
 *
 * Accepts `YYYY-MM-DD`, `YYYY-MM` and ISO timestamps; the day is dropped.
 * Returns null when the value is not a real calendar date.
 */
export function parsePeriod(raw: string): string | null {
  const match = PERIOD_PATTERN.exec(raw.trim());
  if (!match?.[1] || !match[2]) {
    return null;
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  if (month < 1 || month > 12) {
    return null;
  }

  if (match[3] !== undefined) {
    const day = Number.parseInt(match[3], 10);
    const maxDay =
      month === 2 && !isLeapYear(year) ? 28 : (DAYS_IN_MONTH[month - 1] ?? 31);
    if (day < 1 || day > maxDay) {
      return null;
    }
  }

  return toPeriod({ year, month });
}

/**
 * Shift a period by a number of months (negative goes back)
 */
export function addMonths(period: string, months: number): string {
  const { year, month } = toYearMonth(period);
  const index = year * 12 + (month - 1) + months;
  return toPeriod({ year: Math.floor(index / 12), month: (index % 12) + 1 });
}

/**
 * Number of months from `from` to `to` (negative when `to` is earlier)
 */
export function monthsBetween(from: string, to: string): number {
  const a = toYearMonth(from);
  const b = toYearMonth(to);
  return (b.year - a.year) * 12 + (b.month - a.month);
}

/**
 * True when `next` is the calendar month right after `previous`
 */
export function isNextMonth(previous: string, next: string): boolean {
  return monthsBetween(previous, next) === 1;
}

/**
 * Normalize a stored DATE value to a period
 */
export function toStoredPeriod(value: string): string {
  const period = parsePeriod(value);
  if (period === null) {
    throw new Error(`Not a period: ${value}`);
  }
  return period;
}
