import { Injectable } from '@nestjs/common';
import {
  BatchWindow,
  RequestPlan,
  TimeInterval,
} from '@trendlens/shared-types';
import {
  InconsistentResolutionError,
  ShapeMismatchError,
  SpanRatioExceededError,
} from '../errors/trends.errors';
import { TimeframeParserService } from './timeframe-parser.service';
import { BATCH_WINDOWS } from './batch-windows';

// The upstream only co-normalizes ranges whose lengths are within this ratio
const MAX_SPAN_RATIO = 2;

@Injectable()
export class MultirangeValidatorService {
  constructor(private readonly timeframeParser: TimeframeParserService) {}

  /**
   * Check that intervals (and geos) can go into one comparable request
   */
  validate(
    intervals: TimeInterval[],
    geos: string[],
    category?: string
  ): RequestPlan {
    if (intervals.length === 0) {
      throw new ShapeMismatchError('At least one timeframe is required');
    }
    if (geos.length === 0) {
      throw new ShapeMismatchError('At least one geo is required');
    }

    if (intervals.length === 1) {
      return { mode: 'single-range', intervals, geos, category };
    }

    const raws = intervals.map((iv) => iv.raw);

    const units = intervals.map((iv) => iv.unit);
    if (new Set(units).size > 1) {
      throw new InconsistentResolutionError(raws, units);
    }

    const resolutions = intervals.map((iv) => iv.resolution);
    if (new Set(resolutions).size > 1) {
      throw new InconsistentResolutionError(raws, resolutions);
    }

    this.checkSpanRatio(intervals);

    let pairedGeos = geos;
    if (geos.length === 1) {
      pairedGeos = intervals.map(() => geos[0]);
    } else if (geos.length !== intervals.length) {
      throw new ShapeMismatchError(
        `Cannot pair ${intervals.length} timeframes with ${geos.length} geos`,
        { timeframes: raws, geos }
      );
    }

    return { mode: 'multirange', intervals, geos: pairedGeos, category };
  }

  /**
   * Plan for the batch showcase endpoint; the window fixes the interval
   */
  validateShowcase(window: BatchWindow, geo: string, now?: Date): RequestPlan {
    const interval = this.timeframeParser.parse(BATCH_WINDOWS[window].timeframe, {
      now,
    });
    return { mode: 'batch-showcase', intervals: [interval], geos: [geo], window };
  }

  private checkSpanRatio(intervals: TimeInterval[]): void {
    let shortest = intervals[0];
    let longest = intervals[0];
    for (const interval of intervals) {
      if (interval.span < shortest.span) shortest = interval;
      if (interval.span > longest.span) longest = interval;
    }

    // exactly 2x is still accepted
    if (longest.span > MAX_SPAN_RATIO * shortest.span) {
      const ratio =
        shortest.span === 0 ? Number.POSITIVE_INFINITY : longest.span / shortest.span;
      throw new SpanRatioExceededError(longest.raw, shortest.raw, ratio);
    }
  }
}
