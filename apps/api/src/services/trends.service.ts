import { Injectable, Logger } from '@nestjs/common';
import {
  BatchWindow,
  ExploreWidget,
  GeoResolution,
  GoogleProperty,
  InterestByRegionResult,
  InterestOverTimeResult,
  RelatedSearchesResult,
  ShowcaseTimelineResult,
  TimeframePreview,
  TrendingTopic,
  UpstreamCall,
} from '@trendlens/shared-types';
import { ShapeMismatchError } from '../errors/trends.errors';
import { TrendsTransport } from '../transport/trends-transport';
import { TimeframeParserService } from './timeframe-parser.service';
import { MultirangeValidatorService } from './multirange-validator.service';
import { RequestPlanBuilderService } from './request-plan-builder.service';
import { ResponseDecoderService } from './response-decoder.service';
import { SeriesAlignerService } from './series-aligner.service';
import { environment } from '../environments/environment';

type ExploreQuery = {
  category?: string;
  property?: GoogleProperty;
  now?: Date;
};

export type InterestOverTimeQuery = ExploreQuery & {
  keywords: string[];
  timeframes: string[];
  geos: string[];
};

export type InterestByRegionQuery = ExploreQuery & {
  keywords: string[];
  timeframe: string;
  geos: string[];
  resolution?: GeoResolution;
  includeLowVolume?: boolean;
};

export type RelatedQuery = ExploreQuery & {
  keyword: string;
  timeframe: string;
  geo: string;
};

export type ShowcaseQuery = {
  keywords: string[];
  geo: string;
  window: BatchWindow;
  now?: Date;
};

export type TrendingQuery = {
  geo: string;
  hours: number;
  language?: string;
};

function pick<K extends UpstreamCall['kind']>(
  calls: UpstreamCall[],
  kind: K
): Extract<UpstreamCall, { kind: K }> {
  const call = calls.find((c): c is Extract<UpstreamCall, { kind: K }> => c.kind === kind);
  if (!call) {
    throw new ShapeMismatchError(`Request plan produced no ${kind} call`);
  }
  return call;
}

/**
 * Runs parse -> validate -> build -> fetch -> decode -> align. Every call
 * reads the clock once and shares nothing with other calls.
 */
@Injectable()
export class TrendsService {
  private readonly logger = new Logger(TrendsService.name);

  constructor(
    private readonly timeframeParser: TimeframeParserService,
    private readonly validator: MultirangeValidatorService,
    private readonly planBuilder: RequestPlanBuilderService,
    private readonly decoder: ResponseDecoderService,
    private readonly aligner: SeriesAlignerService,
    private readonly transport: TrendsTransport
  ) {}

  async interestOverTime(query: InterestOverTimeQuery): Promise<InterestOverTimeResult> {
    const now = query.now ?? new Date();
    const intervals = this.timeframeParser.parseMany(query.timeframes, { now });
    const plan = this.validator.validate(intervals, query.geos, query.category);
    const call = pick(
      this.planBuilder.build(
        plan,
        { keywords: query.keywords, property: query.property, widgets: ['TIMESERIES'] },
        now
      ),
      'explore'
    );

    this.logger.log(
      `Interest over time (${plan.mode}): ${call.columns.map((c) => c.label).join(', ')}`
    );

    const text = await this.transport.execute(call);
    // the upstream switches to its multirange chart once the ranges differ
    const ranges = new Set(call.request.comparisonItem.map((item) => item.time));
    const series = this.decoder.decodeTime(
      text,
      call.columns,
      ranges.size > 1 ? 'multirange' : 'multiline'
    );

    return {
      mode: plan.mode,
      timeframes: intervals.map((iv) => iv.canonical),
      geos: plan.geos,
      series,
      table: this.aligner.align(series, plan.mode),
    };
  }

  async interestByRegion(query: InterestByRegionQuery): Promise<InterestByRegionResult> {
    const now = query.now ?? new Date();
    const interval = this.timeframeParser.parse(query.timeframe, { now });
    const plan = this.validator.validate([interval], query.geos, query.category);
    const call = pick(
      this.planBuilder.build(
        plan,
        {
          keywords: query.keywords,
          property: query.property,
          widgets: ['GEO_MAP'],
          resolution: query.resolution,
          includeLowVolume: query.includeLowVolume,
        },
        now
      ),
      'explore'
    );

    this.logger.log(
      `Interest by region (${call.resolution}): ${call.columns.map((c) => c.label).join(', ')}`
    );

    const series = this.decoder.decodeRegion(await this.transport.execute(call), call.columns);
    return {
      timeframe: interval.canonical,
      geo: plan.geos.join(','),
      resolution: call.resolution ?? 'COUNTRY',
      series,
      table: this.aligner.alignRegions(series),
    };
  }

  async relatedQueries(query: RelatedQuery): Promise<RelatedSearchesResult> {
    return this.related(query, 'RELATED_QUERIES');
  }

  async relatedTopics(query: RelatedQuery): Promise<RelatedSearchesResult> {
    return this.related(query, 'RELATED_TOPICS');
  }

  async showcaseTimeline(query: ShowcaseQuery): Promise<ShowcaseTimelineResult> {
    const now = query.now ?? new Date();
    const plan = this.validator.validateShowcase(query.window, query.geo, now);
    const call = pick(
      this.planBuilder.build(plan, { keywords: query.keywords }, now),
      'batch-showcase'
    );

    this.logger.log(
      `Showcase ${call.window} for ${call.keywords.length} keywords in ${call.geo || 'Worldwide'}`
    );

    const text = await this.transport.execute(call);
    const series = this.decoder.decodeBatch(text, call.window, now);
    return {
      geo: call.geo,
      window: call.window,
      requestedAt: now.toISOString(),
      series,
      table: this.aligner.align(series, plan.mode),
    };
  }

  async trendingNow(query: TrendingQuery): Promise<TrendingTopic[]> {
    const call = this.planBuilder.buildTrendingNow(
      query.geo,
      query.hours,
      query.language ?? environment.trends.language
    );
    const topics = this.decoder.decodeTrending(await this.transport.execute(call), call.geo);
    this.logger.log(`Received ${topics.length} trending searches for ${call.geo}`);
    return topics;
  }

  /**
   * Parse a timeframe without fetching anything
   */
  previewTimeframe(timeframe: string, now: Date = new Date()): TimeframePreview {
    const interval = this.timeframeParser.parse(timeframe, { now });
    const { start, end } = this.timeframeParser.resolve(interval, now);
    return {
      interval,
      upstream: this.timeframeParser.toUpstream(interval, now),
      start: start.toISOString(),
      end: end.toISOString(),
    };
  }

  private async related(
    query: RelatedQuery,
    widget: ExploreWidget
  ): Promise<RelatedSearchesResult> {
    const now = query.now ?? new Date();
    const interval = this.timeframeParser.parse(query.timeframe, { now });
    const plan = this.validator.validate([interval], [query.geo], query.category);
    const call = pick(
      this.planBuilder.build(
        plan,
        { keywords: [query.keyword], property: query.property, widgets: [widget] },
        now
      ),
      'explore'
    );

    this.logger.log(`${widget} for "${call.columns[0].keyword}" (${interval.canonical})`);

    const result = this.decoder.decodeRelated(
      await this.transport.execute(call),
      query.keyword
    );
    return {
      keyword: call.columns[0].keyword,
      timeframe: interval.canonical,
      geo: call.columns[0].geo,
      ...result,
    };
  }
}
