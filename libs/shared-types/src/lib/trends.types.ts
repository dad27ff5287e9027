/**
 * Google Trends Types
 */

/**
 * Unit a timeframe is measured in
 */
export type TimeUnit = 'hour' | 'day' | 'month';

/**
 * Upstream data granularity for a resolved duration
 */
export type UpstreamResolution =
  | '1 minute'
  | '8 minutes'
  | '16 minutes'
  | '1 hour'
  | '1 day'
  | '1 week'
  | '1 month';

export type TimeframeForm =
  | 'relative'
  | 'anchored-offset'
  | 'date-range'
  | 'hour-range'
  | 'all';

/**
 * One end of an interval: a fixed instant, or `base` minus `amount` units
 */
export type TimeAnchor =
  | { kind: 'instant'; value: string } // ISO-8601, UTC
  | { kind: 'relative'; base: 'now' | 'today'; amount: number; unit: TimeUnit };

/**
 * Canonical interval parsed from a timeframe string
 */
export type TimeInterval = {
  raw: string;
  canonical: string;
  form: TimeframeForm;
  start: TimeAnchor;
  end: TimeAnchor;
  unit: TimeUnit;
  span: number; // length in `unit`
  resolution: UpstreamResolution;
};

/**
 * Time-indexed data point
 */
export type SeriesPoint = {
  timestamp: string; // ISO-8601, UTC
  value: number; // 0-100 relative interest
  isPartial: boolean;
};

/**
 * `global`: co-normalized with every series of the same response.
 * `self`: scaled 0-100 against its own maximum (batch showcase).
 */
export type NormalizationScope = 'global' | 'self';

export type KeywordSeries = {
  keyword: string;
  label: string;
  geo?: string;
  timeframe?: string;
  points: SeriesPoint[];
  normalizationScope: NormalizationScope;
};

/**
 * Interest by region data point
 */
export type RegionPoint = {
  regionCode: string;
  regionName: string;
  value: number;
  coordinates?: { lat: number; lng: number };
};

export type RegionSeries = {
  keyword: string;
  label: string;
  geo?: string;
  timeframe?: string;
  points: RegionPoint[];
};

/**
 * Related query or topic from Google Trends
 */
export type RelatedEntry = {
  query: string;
  value: number;
  formattedValue: string;
  isBreakout: boolean;
  topicType?: string;
  mid?: string;
};

export type RelatedResult = {
  top: RelatedEntry[];
  rising: RelatedEntry[];
};

/**
 * Trending search from the "trending now" feed
 */
export type TrendingTopic = {
  keyword: string;
  geo: string;
  startedAt: string | null;
  endedAt: string | null;
  volume: number;
  volumeGrowthPct: number;
  relatedKeywords: string[];
  topicIds: number[];
};

export type AlignedRow = {
  key: string; // ISO timestamp, region code or ordinal position
  name?: string; // region name for region-indexed tables
  values: Record<string, number | null>;
  timestamps?: Record<string, string>; // per-column instants (position index)
  isPartial: boolean;
};

/**
 * Aligned series, one column per keyword/geo/timeframe combination
 */
export type AlignedTable = {
  index: 'timestamp' | 'region' | 'position';
  columns: string[];
  rows: AlignedRow[];
};
