import { createError } from '../errors';

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

const DURATION_UNITS: Record<string, number> = {
  w: WEEK_MS,
  d: DAY_MS,
  h: HOUR_MS,
  m: MINUTE_MS,
};

// speedup ratios also take seconds, e.g. "1h/1s"
const SPEEDUP_UNITS: Record<string, number> = {
  ...DURATION_UNITS,
  s: 1000,
};

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})$/;
const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
// anything other than letters, digits, ':' and '-' separates date from time
const SEPARATOR_RUN = /[^0-9A-Za-z:-]+/;

/** Local date and time; unlike the Date constructor, years 0-99 are taken literally. */
export function localDateTime(year: number, monthIndex: number, day: number, hours = 0, minutes = 0, seconds = 0) {
  const date = new Date(2000, 0, 1, hours, minutes, seconds, 0);
  date.setFullYear(year, monthIndex, day);
  return date;
}

const malformedTimestamp = (message: string) => createError('MalformedTimestamp', message, 'parse');

const parseTimeOfDay = (fragment: string) => {
  const match = TIME_OF_DAY.exec(fragment);
  if (!match) {
    throw malformedTimestamp(`invalid time format: ${fragment} (must be HH:MM)`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw malformedTimestamp(`invalid time of day: ${fragment}`);
  }
  return { hours, minutes };
};

const parseCalendarDate = (fragment: string) => {
  const match = CALENDAR_DATE.exec(fragment);
  if (!match) {
    throw malformedTimestamp(`invalid date format: ${fragment} (must be YYYY-MM-DD)`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const calendar = localDateTime(year, month - 1, day);
  if (calendar.getFullYear() !== year || calendar.getMonth() !== month - 1 || calendar.getDate() !== day) {
    throw malformedTimestamp(`invalid calendar date: ${fragment}`);
  }
  return { year, month, day };
};

/**
 * Parses `HH:MM` (today), `YYYY-MM-DD` (local midnight) or a date and a time
 * joined by any run of separator characters. Empty input means "not given".
 */
export function parseTimestamp(value: string, now: Date = new Date()): Date | undefined {
  if (value === '') return undefined;

  if (value.includes(':') && !value.includes('-')) {
    const { hours, minutes } = parseTimeOfDay(value);
    return localDateTime(now.getFullYear(), now.getMonth(), now.getDate(), hours, minutes);
  }

  const parts = value.split(SEPARATOR_RUN).filter((part) => part.length > 0);
  if (parts.length === 0) {
    throw malformedTimestamp(`invalid time value: ${JSON.stringify(value)} is empty after splitting`);
  }
  if (parts.length > 2) {
    throw malformedTimestamp(
      `invalid time value: ${value} (must be 'HH:MM', 'YYYY-MM-DD' or 'YYYY-MM-DD HH:MM')`,
    );
  }

  const { year, month, day } = parseCalendarDate(parts[0]);
  if (parts.length === 1) {
    return localDateTime(year, month - 1, day);
  }
  const { hours, minutes } = parseTimeOfDay(parts[1]);
  return localDateTime(year, month - 1, day, hours, minutes);
}

const sumUnitTerms = (value: string, units: Record<string, number>, onError: (message: string) => Error) => {
  let total = 0;
  let digits = '';
  for (const ch of value) {
    if (ch >= '0' && ch <= '9') {
      digits += ch;
      continue;
    }
    const unitMs = units[ch];
    if (unitMs === undefined) {
      throw onError(`invalid character in duration: ${ch} (must be digits or units ${Object.keys(units).join(',')})`);
    }
    if (digits === '') {
      throw onError(`unit ${ch} has no quantity in ${value}`);
    }
    total += Number(digits) * unitMs;
    digits = '';
  }
  if (digits !== '') {
    throw onError(`incomplete duration: missing unit after ${digits}`);
  }
  if (!Number.isSafeInteger(total)) {
    throw onError(`duration out of range: ${value}`);
  }
  return total;
};

/** Parses compound durations such as `2w3d6h30m` into milliseconds. Empty input means "not given". */
export function parseDuration(value: string): number | undefined {
  if (value === '') return undefined;
  return sumUnitTerms(value, DURATION_UNITS, (message) => createError('MalformedDuration', message, 'parse'));
}

/**
 * Parses a speedup ratio: either `<real>/<output>` durations (`1h/1s`, `1d/30s`)
 * or a bare number of real seconds per output second.
 */
export function parseSpeedup(value: string): number {
  const malformed = (message: string) => createError('MalformedSpeedup', message, 'parse');
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    const ratio = Number(trimmed);
    if (ratio <= 0) {
      throw malformed(`speedup must be positive: ${value}`);
    }
    return ratio;
  }

  const halves = trimmed.split('/');
  if (halves.length !== 2 || halves[0] === '' || halves[1] === '') {
    throw malformed(`speedup must look like '1h/1s': ${value}`);
  }
  const [real, output] = halves.map((half) => sumUnitTerms(half, SPEEDUP_UNITS, malformed));
  if (real <= 0 || output <= 0) {
    throw malformed(`both sides of a speedup must be positive: ${value}`);
  }
  return real / output;
}
