import { Injectable } from '@nestjs/common';
import {
  BatchShowcaseCall,
  ColumnDescriptor,
  ExploreCall,
  ExploreWidget,
  GeoResolution,
  GoogleProperty,
  RequestPlan,
  SuggestionsCall,
  TrendingNowCall,
  UpstreamCall,
} from '@trendlens/shared-types';
import {
  BatchSizeExceededError,
  MalformedTimeframeError,
  ShapeMismatchError,
  UnresolvedCodeError,
} from '../errors/trends.errors';
import { TimeframeParserService } from './timeframe-parser.service';
import { environment } from '../environments/environment';

export type BuildOptions = {
  keywords: string[];
  category?: string;
  property?: GoogleProperty;
  widgets?: ExploreWidget[];
  resolution?: GeoResolution;
  includeLowVolume?: boolean;
};

// '', 'US', 'US-NY', 'US-NY-501'
const GEO_CODE_PATTERN = /^([a-z]{2}(-[a-z0-9]{1,3}){0,2})?$/i;
const CATEGORY_PATTERN = /^\d+$/;

const MAX_TRENDING_HOURS = 191;

/**
 * Accept an already-resolved geo code; free text was never looked up
 */
export function normalizeGeoCode(geo: string): string {
  const trimmed = geo.trim();
  if (!GEO_CODE_PATTERN.test(trimmed)) {
    throw new UnresolvedCodeError('geo', geo);
  }
  return trimmed.toUpperCase();
}

export function normalizeCategory(category?: string): number {
  if (category === undefined || category.trim() === '') return 0;
  if (!CATEGORY_PATTERN.test(category.trim())) {
    throw new UnresolvedCodeError('category', category);
  }
  return Number(category.trim());
}

function geoLabel(geo: string): string {
  return geo === '' ? 'Worldwide' : geo;
}

/**
 * Stretch every list to `length`; a list must hold 1 or `length` items
 */
function broadcast<T>(name: string, values: T[], length: number): T[] {
  if (values.length === length) return values;
  if (values.length === 1) return Array.from({ length }, () => values[0]);
  throw new ShapeMismatchError(
    `Cannot broadcast ${values.length} ${name} to ${length} comparison items`,
    { [name]: values }
  );
}

@Injectable()
export class RequestPlanBuilderService {
  constructor(private readonly timeframeParser: TimeframeParserService) {}

  /**
   * Turn a validated plan into the upstream calls that fetch it
   */
  build(
    plan: RequestPlan,
    options: BuildOptions,
    now: Date = new Date()
  ): UpstreamCall[] {
    const keywords = options.keywords.map((k) => k.trim());
    if (keywords.length === 0 || keywords.some((k) => k.length === 0)) {
      throw new ShapeMismatchError('At least one non-empty keyword is required', {
        keywords: options.keywords,
      });
    }
    const geos = plan.geos.map(normalizeGeoCode);

    if (plan.mode === 'batch-showcase') {
      return [this.buildShowcase(plan, geos, keywords)];
    }

    const category = normalizeCategory(options.category ?? plan.category);
    const columns = this.columns(plan, geos, keywords, now);
    const widgets = options.widgets ?? ['TIMESERIES'];

    return widgets.map((widget) => {
      if (widget.startsWith('RELATED_') && columns.length !== 1) {
        throw new ShapeMismatchError(
          `${widget} supports a single keyword, geo and timeframe`,
          { items: columns.map((c) => c.label) }
        );
      }

      const call: ExploreCall = {
        kind: 'explore',
        widget,
        request: {
          comparisonItem: columns.map((c) => ({
            keyword: c.keyword,
            geo: c.geo,
            time: c.timeframe,
          })),
          category,
          property: options.property ?? '',
        },
        columns,
      };

      if (widget === 'GEO_MAP') {
        call.resolution =
          options.resolution ?? (geos.every((g) => g === '') ? 'COUNTRY' : 'REGION');
        call.includeLowSearchVolumeGeos = options.includeLowVolume ?? false;
      }
      return call;
    });
  }

  buildTrendingNow(geo: string, hours: number, language: string): TrendingNowCall {
    if (!Number.isInteger(hours) || hours < 1 || hours > MAX_TRENDING_HOURS) {
      throw new MalformedTimeframeError(
        String(hours),
        `trending window must be 1-${MAX_TRENDING_HOURS} hours`
      );
    }
    return {
      kind: 'trending-now',
      rpcId: 'i0OFE',
      geo: normalizeGeoCode(geo),
      language,
      hours,
    };
  }

  /**
   * Autocomplete for a partial term; apostrophes are dropped from the path
   */
  buildSuggestions(keyword: string, language: string): SuggestionsCall {
    const term = keyword.replace(/'/g, '').trim();
    if (!term) {
      throw new ShapeMismatchError('A keyword is required for suggestions', { keyword });
    }
    return { kind: 'suggestions', keyword: term, language };
  }

  private buildShowcase(
    plan: RequestPlan,
    geos: string[],
    keywords: string[]
  ): BatchShowcaseCall {
    if (!plan.window) {
      throw new ShapeMismatchError('Batch showcase plan has no window');
    }
    if (geos.length !== 1) {
      throw new ShapeMismatchError('Batch showcase takes exactly one geo', { geos });
    }

    const limit = environment.trends.batchKeywordLimit;
    if (keywords.length > limit) {
      throw new BatchSizeExceededError('Batch showcase', keywords.length, limit);
    }

    return {
      kind: 'batch-showcase',
      rpcId: 'jpdkv',
      geo: geos[0],
      window: plan.window,
      keywords,
    };
  }

  private columns(
    plan: RequestPlan,
    geos: string[],
    keywords: string[],
    now: Date
  ): ColumnDescriptor[] {
    const length = Math.max(keywords.length, plan.intervals.length, geos.length);
    const limit = environment.trends.maxComparisonItems;
    if (length > limit) {
      throw new BatchSizeExceededError('Explore', length, limit);
    }

    const keywordList = broadcast('keywords', keywords, length);
    const intervalList = broadcast('timeframes', plan.intervals, length);
    const geoList = broadcast('geos', geos, length);
    const distinctGeos = new Set(geoList).size > 1;

    const columns = keywordList.map((keyword, i) => {
      const interval = intervalList[i];
      const geo = geoList[i];

      let label = keyword;
      if (plan.mode === 'multirange') {
        label = `${keyword} | ${geoLabel(geo)} | ${interval.canonical}`;
      } else if (distinctGeos) {
        label = `${keyword} | ${geoLabel(geo)}`;
      }

      return {
        keyword,
        geo,
        timeframe: this.timeframeParser.toUpstream(interval, now),
        label,
      };
    });

    const labels = columns.map((c) => c.label);
    const duplicate = labels.find((label, i) => labels.indexOf(label) !== i);
    if (duplicate !== undefined) {
      throw new ShapeMismatchError(`Duplicate comparison item "${duplicate}"`, {
        items: labels,
      });
    }
    return columns;
  }
}
