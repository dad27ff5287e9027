import { Controller, Get, Query, Logger } from '@nestjs/common';
import {
  ApiErrorResponse,
  ApiResponse,
  InterestByRegionResult,
  InterestOverTimeResult,
  RelatedSearchesResult,
  ShowcaseTimelineResult,
  TimeframePreview,
  TrendingTopic,
} from '@trendlens/shared-types';
import { TrendsService } from '../services/trends.service';
import { toErrorResponse } from './error-response';
import {
  interestQuerySchema,
  invalidQuery,
  regionQuerySchema,
  relatedQuerySchema,
  showcaseQuerySchema,
  timeframeQuerySchema,
  trendingQuerySchema,
} from './query.schemas';

type Result<T> = ApiResponse<T> | ApiErrorResponse;

@Controller('trends')
export class TrendsController {
  private readonly logger = new Logger(TrendsController.name);

  constructor(private readonly trendsService: TrendsService) {}

  /**
   * GET /api/trends/interest
   * Interest over time. Several timeframes compare ranges (multirange),
   * several geos compare places.
   */
  @Get('interest')
  async getInterestOverTime(
    @Query() query: Record<string, string>
  ): Promise<Result<InterestOverTimeResult>> {
    const parsed = interestQuerySchema.safeParse(query);
    if (!parsed.success) return invalidQuery(parsed.error);
    const { keywords, timeframe, geo, category, property } = parsed.data;

    this.logger.log(
      `Interest for ${keywords.join(', ')} over ${timeframe.join(' | ')} in ${geo.join(',') || 'Worldwide'}`
    );

    try {
      const data = await this.trendsService.interestOverTime({
        keywords,
        timeframes: timeframe,
        geos: geo,
        category,
        property,
      });
      return { success: true, data };
    } catch (error) {
      return toErrorResponse(error, this.logger);
    }
  }

  /**
   * GET /api/trends/region
   * Interest by region for one timeframe
   */
  @Get('region')
  async getInterestByRegion(
    @Query() query: Record<string, string>
  ): Promise<Result<InterestByRegionResult>> {
    const parsed = regionQuerySchema.safeParse(query);
    if (!parsed.success) return invalidQuery(parsed.error);
    const { geo, ...rest } = parsed.data;

    try {
      const data = await this.trendsService.interestByRegion({ ...rest, geos: geo });
      return { success: true, data };
    } catch (error) {
      return toErrorResponse(error, this.logger);
    }
  }

  /**
   * GET /api/trends/related
   * Top and rising related queries (type=queries) or topics (type=topics)
   */
  @Get('related')
  async getRelated(
    @Query() query: Record<string, string>
  ): Promise<Result<RelatedSearchesResult>> {
    const parsed = relatedQuerySchema.safeParse(query);
    if (!parsed.success) return invalidQuery(parsed.error);
    const { type, ...rest } = parsed.data;

    try {
      const data =
        type === 'topics'
          ? await this.trendsService.relatedTopics(rest)
          : await this.trendsService.relatedQueries(rest);
      return { success: true, data };
    } catch (error) {
      return toErrorResponse(error, this.logger);
    }
  }

  /**
   * GET /api/trends/showcase
   * Self-normalized timelines for many keywords at once
   */
  @Get('showcase')
  async getShowcase(
    @Query() query: Record<string, string>
  ): Promise<Result<ShowcaseTimelineResult>> {
    const parsed = showcaseQuerySchema.safeParse(query);
    if (!parsed.success) return invalidQuery(parsed.error);

    try {
      const data = await this.trendsService.showcaseTimeline(parsed.data);
      return { success: true, data };
    } catch (error) {
      return toErrorResponse(error, this.logger);
    }
  }

  /**
   * GET /api/trends/trending
   * Searches trending in a geo over the past `hours`
   */
  @Get('trending')
  async getTrending(@Query() query: Record<string, string>): Promise<Result<TrendingTopic[]>> {
    const parsed = trendingQuerySchema.safeParse(query);
    if (!parsed.success) return invalidQuery(parsed.error);

    try {
      const data = await this.trendsService.trendingNow(parsed.data);
      return { success: true, data };
    } catch (error) {
      return toErrorResponse(error, this.logger);
    }
  }

  /**
   * GET /api/trends/timeframe
   * Show how a timeframe string is understood, without calling upstream
   */
  @Get('timeframe')
  previewTimeframe(@Query() query: Record<string, string>): Result<TimeframePreview> {
    const parsed = timeframeQuerySchema.safeParse(query);
    if (!parsed.success) return invalidQuery(parsed.error);

    try {
      return { success: true, data: this.trendsService.previewTimeframe(parsed.data.timeframe) };
    } catch (error) {
      return toErrorResponse(error, this.logger);
    }
  }
}
