import { Injectable } from '@nestjs/common';
import {
  TimeAnchor,
  TimeInterval,
  TimeUnit,
  TimeframeForm,
  UpstreamResolution,
} from '@trendlens/shared-types';
import {
  MalformedTimeframeError,
  UnsupportedPrecisionError,
} from '../errors/trends.errors';
import {
  DAY_MS,
  HOUR_MS,
  TrendDate,
  addMonthsUTC,
  floorToDay,
  floorToHour,
  formatDate,
  formatDateHour,
  monthsBetween,
  parseTrendDate,
} from '../utils/trend-dates';
import { environment } from '../environments/environment';

export type ParseOptions = {
  now?: Date;
};

type OffsetUnit = 'H' | 'd' | 'm' | 'y';

type Offset = {
  count: number;
  unit: OffsetUnit;
};

/**
 * Timeframes the upstream accepts verbatim
 */
export const FIXED_TIMEFRAMES: ReadonlySet<string> = new Set([
  'now 1-H',
  'now 4-H',
  'now 1-d',
  'now 7-d',
  'today 1-m',
  'today 3-m',
  'today 12-m',
  'today 5-y',
  'all',
]);

const OFFSET_PATTERN = /^(\d+)-?([Hdmy])$/;

// Hour-level data is only served for ranges shorter than this
const HOURLY_LIMIT_MS = 8 * DAY_MS;

const RESOLUTION_THRESHOLDS: Array<[number, UpstreamResolution]> = [
  [5 * HOUR_MS, '1 minute'],
  [36 * HOUR_MS, '8 minutes'],
  [72 * HOUR_MS, '16 minutes'],
  [8 * DAY_MS, '1 hour'],
  [270 * DAY_MS, '1 day'],
  [1900 * DAY_MS, '1 week'],
];

/**
 * Upstream granularity for a resolved duration
 */
export function resolutionFor(durationMs: number): UpstreamResolution {
  for (const [limit, resolution] of RESOLUTION_THRESHOLDS) {
    if (durationMs < limit) return resolution;
  }
  return '1 month';
}

function isOffsetUnit(value: string): value is OffsetUnit {
  return value === 'H' || value === 'd' || value === 'm' || value === 'y';
}

function parseOffset(token: string): Offset | null {
  const match = OFFSET_PATTERN.exec(token);
  if (!match || !isOffsetUnit(match[2])) return null;
  return { count: Number(match[1]), unit: match[2] };
}

function instant(raw: string, date: Date): TimeAnchor {
  if (!Number.isFinite(date.getTime())) {
    throw new MalformedTimeframeError(raw, 'offset out of range');
  }
  return { kind: 'instant', value: date.toISOString() };
}

@Injectable()
export class TimeframeParserService {
  /**
   * Parse a timeframe string into a canonical interval.
   * Relative forms are resolved against `options.now` (default: the clock).
   */
  parse(input: string, options: ParseOptions = {}): TimeInterval {
    const now = options.now ?? new Date();
    const tokens = input.trim().split(/\s+/).filter((t) => t.length > 0);

    if (tokens.length === 1 && tokens[0] === 'all') {
      return this.allTime(input, now);
    }
    if (tokens.length !== 2) {
      throw new MalformedTimeframeError(
        input,
        "expected '<date> <offset>', '<date> <date>' or 'all'"
      );
    }

    const [first, second] = tokens;
    const offset = parseOffset(second);

    if (offset && offset.count < 1) {
      throw new MalformedTimeframeError(input, 'offset must be at least 1');
    }
    if (first === 'now' && offset) return this.fromNow(input, offset, now);
    if (first === 'today' && offset) return this.fromToday(input, offset, now);

    const anchor = parseTrendDate(first);
    if (anchor && offset) return this.fromAnchor(input, anchor, offset, now);

    const end = parseTrendDate(second);
    if (anchor && end) return this.fromDatePair(input, anchor, end, now);

    throw new MalformedTimeframeError(input, 'unrecognized date or offset');
  }

  parseMany(input: string | string[], options: ParseOptions = {}): TimeInterval[] {
    const list = Array.isArray(input) ? input : [input];
    const now = options.now ?? new Date();
    return list.map((timeframe) => this.parse(timeframe, { now }));
  }

  /**
   * Resolve both ends of an interval to instants
   */
  resolve(interval: TimeInterval, now: Date = new Date()): { start: Date; end: Date } {
    return {
      start: this.resolveAnchor(interval.start, now),
      end: this.resolveAnchor(interval.end, now),
    };
  }

  /**
   * Render the interval as the upstream 'time' field
   */
  toUpstream(interval: TimeInterval, now: Date = new Date()): string {
    if (FIXED_TIMEFRAMES.has(interval.canonical)) {
      return interval.canonical;
    }
    const { start, end } = this.resolve(interval, now);
    // ranges counted back from 'now' end mid-day
    const hourly =
      interval.unit === 'hour' ||
      (interval.start.kind === 'relative' && interval.start.base === 'now');
    const format = hourly ? formatDateHour : formatDate;
    return `${format(start)} ${format(end)}`;
  }

  private resolveAnchor(anchor: TimeAnchor, now: Date): Date {
    if (anchor.kind === 'instant') {
      return new Date(anchor.value);
    }

    const base = anchor.base === 'now' ? floorToHour(now) : floorToDay(now);
    switch (anchor.unit) {
      case 'hour':
        return new Date(base.getTime() - anchor.amount * HOUR_MS);
      case 'day':
        return new Date(base.getTime() - anchor.amount * DAY_MS);
      case 'month':
        return addMonthsUTC(base, -anchor.amount);
    }
  }

  private fromNow(raw: string, offset: Offset, now: Date): TimeInterval {
    if (offset.unit !== 'H' && offset.unit !== 'd') {
      throw new MalformedTimeframeError(raw, "'now' offsets take hours (H) or days (d)");
    }

    // day offsets stay daily; hour offsets of 8 days or more are served per day
    const daily = offset.unit === 'd' || offset.count * HOUR_MS >= HOURLY_LIMIT_MS;

    return this.build(raw, now, {
      canonical: `now ${offset.count}-${offset.unit}`,
      form: 'relative',
      start: {
        kind: 'relative',
        base: 'now',
        amount: offset.count,
        unit: offset.unit === 'H' ? 'hour' : 'day',
      },
      end: { kind: 'relative', base: 'now', amount: 0, unit: 'hour' },
      unit: daily ? 'day' : 'hour',
      span: offset.unit === 'd' ? offset.count : daily ? offset.count / 24 : offset.count,
    });
  }

  private fromToday(raw: string, offset: Offset, now: Date): TimeInterval {
    if (offset.unit === 'H') {
      throw new MalformedTimeframeError(
        raw,
        "hour offsets need 'now' or an hour-precision date"
      );
    }

    const { unit, amount } = this.calendarOffset(offset);
    return this.build(raw, now, {
      canonical: `today ${offset.count}-${offset.unit}`,
      form: 'relative',
      start: { kind: 'relative', base: 'today', amount, unit },
      end: { kind: 'relative', base: 'today', amount: 0, unit: 'day' },
      unit,
      span: amount,
    });
  }

  /**
   * '<date> <N>-<u>': the offset always runs backward from the date
   */
  private fromAnchor(
    raw: string,
    anchor: TrendDate,
    offset: Offset,
    now: Date
  ): TimeInterval {
    const end = anchor.date;

    if (anchor.hasHour) {
      if (offset.unit === 'm' || offset.unit === 'y') {
        throw new UnsupportedPrecisionError(
          raw,
          'hourly data is limited to ranges under 8 days'
        );
      }
      const hours = offset.unit === 'H' ? offset.count : offset.count * 24;
      if (hours * HOUR_MS >= HOURLY_LIMIT_MS) {
        throw new UnsupportedPrecisionError(
          raw,
          'hourly data is limited to ranges under 8 days'
        );
      }
      return this.build(raw, now, {
        canonical: `${formatDateHour(end)} ${offset.count}-${offset.unit}`,
        form: 'anchored-offset',
        start: instant(raw, new Date(end.getTime() - hours * HOUR_MS)),
        end: instant(raw, end),
        unit: 'hour',
        span: hours,
      });
    }

    if (offset.unit === 'H') {
      throw new MalformedTimeframeError(
        raw,
        "hour offsets need 'now' or an hour-precision date"
      );
    }

    const { unit, amount } = this.calendarOffset(offset);
    const start =
      unit === 'day'
        ? new Date(end.getTime() - amount * DAY_MS)
        : addMonthsUTC(end, -amount);

    return this.build(raw, now, {
      canonical: `${formatDate(end)} ${offset.count}-${offset.unit}`,
      form: 'anchored-offset',
      start: instant(raw, start),
      end: instant(raw, end),
      unit,
      span: amount,
    });
  }

  private fromDatePair(
    raw: string,
    first: TrendDate,
    second: TrendDate,
    now: Date
  ): TimeInterval {
    if (!first.hasHour && !second.hasHour) {
      const days = (second.date.getTime() - first.date.getTime()) / DAY_MS;
      if (days < 0) {
        throw new MalformedTimeframeError(raw, 'start date is after end date');
      }
      return this.build(raw, now, {
        canonical: `${formatDate(first.date)} ${formatDate(second.date)}`,
        form: 'date-range',
        start: instant(raw, first.date),
        end: instant(raw, second.date),
        unit: 'day',
        span: days,
      });
    }

    // A bare end date covers that whole day
    const start = first.date;
    const end = second.hasHour
      ? second.date
      : new Date(second.date.getTime() + DAY_MS);
    const durationMs = end.getTime() - start.getTime();

    if (durationMs < 0) {
      throw new MalformedTimeframeError(raw, 'start date is after end date');
    }
    if (durationMs >= HOURLY_LIMIT_MS) {
      throw new UnsupportedPrecisionError(
        raw,
        'hour-precision ranges must be shorter than 8 days'
      );
    }

    return this.build(raw, now, {
      canonical: `${formatDateHour(start)} ${formatDateHour(end)}`,
      form: 'hour-range',
      start: instant(raw, start),
      end: instant(raw, end),
      unit: 'hour',
      span: durationMs / HOUR_MS,
    });
  }

  private allTime(raw: string, now: Date): TimeInterval {
    const start = new Date(`${environment.trends.allTimeStart}T00:00:00Z`);
    return this.build(raw, now, {
      canonical: 'all',
      form: 'all',
      start: instant(raw, start),
      end: { kind: 'relative', base: 'today', amount: 0, unit: 'day' },
      unit: 'month',
      span: monthsBetween(start, floorToDay(now)),
    });
  }

  private calendarOffset(offset: Offset): { unit: TimeUnit; amount: number } {
    switch (offset.unit) {
      case 'd':
        return { unit: 'day', amount: offset.count };
      case 'y':
        return { unit: 'month', amount: offset.count * 12 };
      default:
        return { unit: 'month', amount: offset.count };
    }
  }

  private build(
    raw: string,
    now: Date,
    parts: {
      canonical: string;
      form: TimeframeForm;
      start: TimeAnchor;
      end: TimeAnchor;
      unit: TimeUnit;
      span: number;
    }
  ): TimeInterval {
    const start = this.resolveAnchor(parts.start, now);
    const end = this.resolveAnchor(parts.end, now);
    if (!Number.isFinite(start.getTime()) || !Number.isFinite(end.getTime())) {
      throw new MalformedTimeframeError(raw, 'offset out of range');
    }
    return {
      raw,
      ...parts,
      resolution: resolutionFor(end.getTime() - start.getTime()),
    };
  }
}
