import { TimeInterval } from './trends.types';

/**
 * Request plan and upstream call types
 */

export type RequestMode = 'single-range' | 'multirange' | 'batch-showcase';

export type BatchWindow = 'Past4H' | 'Past24H' | 'Past48H' | 'Past7D';

export type GeoResolution = 'COUNTRY' | 'REGION' | 'CITY' | 'DMA';

/**
 * Google property filter ('' is web search)
 */
export type GoogleProperty = '' | 'images' | 'news' | 'youtube' | 'froogle';

export type ExploreWidget =
  | 'TIMESERIES'
  | 'GEO_MAP'
  | 'RELATED_QUERIES'
  | 'RELATED_TOPICS';

export type RequestPlan = {
  mode: RequestMode;
  intervals: TimeInterval[];
  geos: string[];
  category?: string;
  window?: BatchWindow;
};

/**
 * Identity of one comparison item, used as a column by the aligner
 */
export type ColumnDescriptor = {
  keyword: string;
  geo: string;
  timeframe: string;
  label: string;
};

export type ComparisonItem = {
  keyword: string;
  geo: string;
  time: string;
};

export type ExploreRequest = {
  comparisonItem: ComparisonItem[];
  category: number;
  property: GoogleProperty;
};

export type ExploreCall = {
  kind: 'explore';
  widget: ExploreWidget;
  request: ExploreRequest;
  columns: ColumnDescriptor[];
  resolution?: GeoResolution;
  includeLowSearchVolumeGeos?: boolean;
};

export type BatchShowcaseCall = {
  kind: 'batch-showcase';
  rpcId: 'jpdkv';
  geo: string;
  window: BatchWindow;
  keywords: string[];
};

export type TrendingNowCall = {
  kind: 'trending-now';
  rpcId: 'i0OFE';
  geo: string;
  language: string;
  hours: number;
};

export type PickerCall = {
  kind: 'picker';
  picker: 'geo' | 'category';
  language: string;
};

/**
 * Keyword/topic autocomplete for a partial search term
 */
export type SuggestionsCall = {
  kind: 'suggestions';
  keyword: string;
  language: string;
};

export type UpstreamCall =
  | ExploreCall
  | BatchShowcaseCall
  | TrendingNowCall
  | PickerCall
  | SuggestionsCall;
