import { createError } from '../errors';

export interface TimeInterval {
  readonly start: Date;
  readonly end: Date;
}

/** Earliest instant a Date can hold; stands in for an open lower bound. */
export const BEGINNING_OF_TIME = new Date(-8.64e15);

export function createInterval(start: Date, end: Date): TimeInterval {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw createError('InvalidArgument', 'interval bound is outside the representable date range', 'interval');
  }
  if (end.getTime() < start.getTime()) {
    throw createError(
      'InvertedInterval',
      `end time ${end.toISOString()} is before start time ${start.toISOString()}`,
      'interval',
    );
  }
  return { start: new Date(start.getTime()), end: new Date(end.getTime()) };
}

export function containsInstant(interval: TimeInterval, instant: Date) {
  const t = instant.getTime();
  return t >= interval.start.getTime() && t <= interval.end.getTime();
}

/**
 * Combines optional start, end and duration into an interval.
 *
 * start+end uses them as given (a duration on top is rejected); one bound plus
 * a duration derives the other; a lone duration is a window ending now; a
 * missing end is now and a missing start is the beginning of time.
 */
export function makeInterval(
  start?: Date,
  end?: Date,
  durationMs?: number,
  now: Date = new Date(),
): TimeInterval {
  if (start && end) {
    if (durationMs !== undefined) {
      throw createError(
        'OverdeterminedInterval',
        'cannot provide a duration when both start and end times are specified',
        'interval',
      );
    }
    return createInterval(start, end);
  }

  if (durationMs !== undefined) {
    if (start) {
      return createInterval(start, new Date(start.getTime() + durationMs));
    }
    if (end) {
      return createInterval(new Date(end.getTime() - durationMs), end);
    }
    return createInterval(new Date(now.getTime() - durationMs), now);
  }

  return createInterval(start ?? BEGINNING_OF_TIME, end ?? now);
}
