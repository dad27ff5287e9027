import {
  AlignedTable,
  KeywordSeries,
  RegionSeries,
  RelatedResult,
  TimeInterval,
} from './trends.types';
import { BatchWindow, RequestMode } from './request-plan.types';

/**
 * API response envelopes and pipeline results
 */

export type ApiResponse<T> = {
  success: true;
  data: T;
};

export type ApiErrorResponse = {
  success: false;
  error: string;
  code: string;
  empty?: boolean;
};

export type InterestOverTimeResult = {
  mode: RequestMode;
  timeframes: string[];
  geos: string[];
  series: KeywordSeries[];
  table: AlignedTable;
};

export type InterestByRegionResult = {
  timeframe: string;
  geo: string;
  resolution: string;
  series: RegionSeries[];
  table: AlignedTable;
};

export type RelatedSearchesResult = RelatedResult & {
  keyword: string;
  timeframe: string;
  geo: string;
};

export type ShowcaseTimelineResult = {
  geo: string;
  window: BatchWindow;
  requestedAt: string;
  series: KeywordSeries[];
  table: AlignedTable;
};

export type TimeframePreview = {
  interval: TimeInterval;
  upstream: string;
  start: string;
  end: string;
};
