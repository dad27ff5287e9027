import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  BatchWindow,
  ColumnDescriptor,
  KeywordSeries,
  PickerNode,
  RegionSeries,
  RelatedEntry,
  RelatedResult,
  Suggestion,
  TrendingTopic,
} from '@trendlens/shared-types';
import {
  DecodeError,
  EmptyResultError,
  PointCountMismatchError,
} from '../errors/trends.errors';
import { BATCH_WINDOWS } from './batch-windows';
import {
  RankedKeyword,
  batchEnvelopeSchema,
  geoMapSchema,
  multilineSchema,
  multirangeSchema,
  pickerNodeSchema,
  relatedSchema,
  showcaseSchema,
  suggestionsSchema,
  trendingSchema,
  userConfigSchema,
  widgetTokenSchema,
} from './trends-payload.schemas';

export type TimeLayout = 'multiline' | 'multirange';

/**
 * Bootstrap token scraped from an explore embed page
 */
export type WidgetToken = {
  token: string;
  type: string; // fe_line_chart, fe_multi_range_chart, ...
  request: Record<string, unknown>;
  overQuota: boolean;
};

export type DecodeRequest =
  | { shape: 'time'; layout: TimeLayout; columns: ColumnDescriptor[] }
  | { shape: 'region'; columns: ColumnDescriptor[] }
  | { shape: 'batch'; window: BatchWindow; requestedAt: Date }
  | { shape: 'related'; keyword: string }
  | { shape: 'trending'; geo: string }
  | { shape: 'picker' }
  | { shape: 'suggestions' }
  | { shape: 'token' };

export type DecodedPayload =
  | { shape: 'time'; series: KeywordSeries[] }
  | { shape: 'region'; series: RegionSeries[] }
  | { shape: 'batch'; series: KeywordSeries[] }
  | { shape: 'related'; result: RelatedResult }
  | { shape: 'trending'; topics: TrendingTopic[] }
  | { shape: 'picker'; tree: PickerNode }
  | { shape: 'suggestions'; suggestions: Suggestion[] }
  | { shape: 'token'; token: WidgetToken };

const PROTECTED_PREFIX = ")]}'";

// The batch endpoint publishes its newest sample up to a minute late
const PUBLISH_GRACE_MS = 60 * 1000;

const EMBED_PAYLOAD_PATTERN = /JSON\.parse\('([^']+)'\)/;

const ESCAPED_CHARS: Array<[string, string]> = [
  ['\\x7b', '{'],
  ['\\x7d', '}'],
  ['\\x22', '"'],
  ['\\x5d', ']'],
  ['\\x5b', '['],
  ['\\\\', '\\'],
];

function toText(payload: string | Buffer): string {
  return typeof payload === 'string' ? payload : payload.toString('utf8');
}

/**
 * Undo the JS string escaping the embed page applies to its JSON
 */
export function unescapeEmbedded(text: string): string {
  let result = text;
  for (const [escaped, char] of ESCAPED_CHARS) {
    result = result.split(escaped).join(char);
  }
  return result.replace(/\\x([0-9a-fA-F]{2})/g, (_, hex: string) =>
    String.fromCharCode(parseInt(hex, 16))
  );
}

function parseJson(text: string, shape: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodeError(shape, `invalid JSON (${reason})`);
  }
}

function validate<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  shape: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new DecodeError(shape, `${path}: ${issue.message}`);
  }
  return result.data;
}

function isoFromSeconds(seconds: number, shape: string): string {
  const date = new Date(seconds * 1000);
  if (!Number.isFinite(date.getTime())) {
    throw new DecodeError(shape, `timestamp ${seconds} is out of range`);
  }
  return date.toISOString();
}

// 'Breakout' (or its translation) carries no digits
function toRelatedEntry(item: RankedKeyword): RelatedEntry {
  const entry: RelatedEntry = {
    query: item.topic ? item.topic.title : item.query ?? '',
    value: item.value,
    formattedValue: item.formattedValue,
    isBreakout: !/\d/.test(item.formattedValue),
  };
  if (item.topic) {
    entry.topicType = item.topic.type;
    entry.mid = item.topic.mid;
  }
  return entry;
}

@Injectable()
export class ResponseDecoderService {
  private readonly logger = new Logger(ResponseDecoderService.name);

  /**
   * Decode a raw upstream payload according to the shape tag
   */
  decode(payload: string | Buffer, request: DecodeRequest): DecodedPayload {
    const text = toText(payload);
    switch (request.shape) {
      case 'time':
        return {
          shape: 'time',
          series: this.decodeTime(text, request.columns, request.layout),
        };
      case 'region':
        return { shape: 'region', series: this.decodeRegion(text, request.columns) };
      case 'batch':
        return {
          shape: 'batch',
          series: this.decodeBatch(text, request.window, request.requestedAt),
        };
      case 'related':
        return { shape: 'related', result: this.decodeRelated(text, request.keyword) };
      case 'trending':
        return { shape: 'trending', topics: this.decodeTrending(text, request.geo) };
      case 'picker':
        return { shape: 'picker', tree: this.decodePicker(text) };
      case 'suggestions':
        return { shape: 'suggestions', suggestions: this.decodeSuggestions(text) };
      case 'token':
        return { shape: 'token', token: this.decodeToken(text) };
    }
  }

  /**
   * Payload after the `)]}'` guard: the last non-empty line
   */
  unprotect(text: string, shape: string): unknown {
    const lines = text
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    let body = lines.length > 0 ? lines[lines.length - 1] : '';
    if (body.startsWith(PROTECTED_PREFIX)) {
      body = body.slice(PROTECTED_PREFIX.length).replace(/^,/, '').trim();
    }
    if (body.length === 0) {
      throw new DecodeError(shape, 'empty response body');
    }
    return parseJson(body, shape);
  }

  decodeTime(text: string, columns: ColumnDescriptor[], layout: TimeLayout): KeywordSeries[] {
    return layout === 'multirange'
      ? this.decodeMultirange(text, columns)
      : this.decodeMultiline(text, columns);
  }

  decodeMultiline(text: string, columns: ColumnDescriptor[]): KeywordSeries[] {
    const payload = validate(multilineSchema, this.unprotect(text, 'time'), 'time');
    const timeline = payload.default.timelineData;
    if (timeline.length === 0) {
      throw new EmptyResultError('time', columns.map((c) => c.label));
    }

    const mismatch = timeline.find((entry) => entry.value.length !== columns.length);
    if (mismatch) {
      throw new DecodeError(
        'time',
        `entry at ${mismatch.time} has ${mismatch.value.length} values for ${columns.length} columns`
      );
    }

    const sorted = [...timeline].sort((a, b) => a.time - b.time);
    return columns.map((column, i): KeywordSeries => ({
      keyword: column.keyword,
      label: column.label,
      geo: column.geo,
      timeframe: column.timeframe,
      normalizationScope: 'global',
      points: sorted.map((entry) => ({
        timestamp: isoFromSeconds(entry.time, 'time'),
        value: entry.value[i],
        isPartial: entry.isPartial ?? false,
      })),
    }));
  }

  /**
   * Each column of a multirange payload is an independent range with its
   * own timestamps
   */
  decodeMultirange(text: string, columns: ColumnDescriptor[]): KeywordSeries[] {
    const payload = validate(multirangeSchema, this.unprotect(text, 'time'), 'time');
    const timeline = payload.default.timelineData;
    if (timeline.length === 0) {
      throw new EmptyResultError('time', columns.map((c) => c.label));
    }

    const mismatch = timeline.find((entry) => entry.columnData.length !== columns.length);
    if (mismatch) {
      throw new DecodeError(
        'time',
        `entry has ${mismatch.columnData.length} columns, expected ${columns.length}`
      );
    }

    const series = columns.map((column, i): KeywordSeries => ({
      keyword: column.keyword,
      label: column.label,
      geo: column.geo,
      timeframe: column.timeframe,
      normalizationScope: 'global',
      points: timeline
        .map((entry) => entry.columnData[i])
        .filter((cell) => cell.value !== -1)
        .sort((a, b) => a.time - b.time)
        .map((cell) => ({
          timestamp: isoFromSeconds(cell.time, 'time'),
          value: cell.value,
          isPartial: cell.isPartial ?? false,
        })),
    }));

    if (series.every((s) => s.points.length === 0)) {
      throw new EmptyResultError('time', columns.map((c) => c.label));
    }
    return series;
  }

  decodeRegion(text: string, columns: ColumnDescriptor[]): RegionSeries[] {
    const payload = validate(geoMapSchema, this.unprotect(text, 'region'), 'region');
    const rows = payload.default.geoMapData;

    const malformed = rows.find(
      (row) => row.value.length !== columns.length || row.hasData.length !== columns.length
    );
    if (malformed) {
      throw new DecodeError(
        'region',
        `"${malformed.geoName}" has ${malformed.value.length} values and ${malformed.hasData.length} flags for ${columns.length} columns`
      );
    }

    const series = columns.map((column, i): RegionSeries => ({
      keyword: column.keyword,
      label: column.label,
      geo: column.geo,
      timeframe: column.timeframe,
      points: rows
        .filter((row) => row.hasData[i] === true)
        .map((row) => ({
          regionCode: row.geoCode ?? '',
          regionName: row.geoName,
          value: row.value[i],
          ...(row.coordinates ? { coordinates: row.coordinates } : {}),
        })),
    }));

    if (series.every((s) => s.points.length === 0)) {
      throw new EmptyResultError('region', columns.map((c) => c.label));
    }
    return series;
  }

  /**
   * Self-normalized showcase series. Timestamps are synthesized from the
   * request time because the payload carries values only.
   */
  decodeBatch(text: string, window: BatchWindow, requestedAt: Date): KeywordSeries[] {
    const items = validate(showcaseSchema, this.rpcPayload(text, 'jpdkv', 'batch'), 'batch')[0];
    if (items.length === 0) {
      throw new EmptyResultError('batch', []);
    }

    const { points: expected, stepSeconds } = BATCH_WINDOWS[window];
    const step = stepSeconds * 1000;
    const requestMs = requestedAt.getTime();
    const boundary = Math.floor(requestMs / step) * step;
    // right after a boundary nothing covers the newest step yet
    const settling = requestMs - boundary <= PUBLISH_GRACE_MS;

    return items.map(([keyword, values]): KeywordSeries => {
      if (values.length !== expected && values.length !== expected - 1) {
        throw new PointCountMismatchError(keyword, expected, values.length);
      }
      // a series one short is missing the newest sample
      const end = settling || values.length < expected ? boundary - step : boundary;

      const last = values.length - 1;
      return {
        keyword,
        label: keyword,
        normalizationScope: 'self',
        points: values.map((value, i) => ({
          timestamp: new Date(end - (last - i) * step).toISOString(),
          value,
          isPartial: false,
        })),
      };
    });
  }

  decodeRelated(text: string, keyword: string): RelatedResult {
    const payload = validate(relatedSchema, this.unprotect(text, 'related'), 'related');
    const ranked = payload.default.rankedList ?? [];
    const top = (ranked[0]?.rankedKeyword ?? []).map(toRelatedEntry);
    const rising = (ranked[1]?.rankedKeyword ?? []).map(toRelatedEntry);

    if (top.length === 0 && rising.length === 0) {
      throw new EmptyResultError('related', [keyword]);
    }
    return { top, rising };
  }

  decodeTrending(text: string, geo: string): TrendingTopic[] {
    const [, items] = validate(
      trendingSchema,
      this.rpcPayload(text, 'i0OFE', 'trending'),
      'trending'
    );
    if (items.length === 0) {
      throw new EmptyResultError('trending', [geo]);
    }

    return items.map((item): TrendingTopic => {
      const [keyword, , itemGeo, started, ended, , volume, , growth, related, topics] = item;
      return {
        keyword,
        geo: itemGeo,
        startedAt: started ? isoFromSeconds(started[0], 'trending') : null,
        endedAt: ended ? isoFromSeconds(ended[0], 'trending') : null,
        volume: volume ?? 0,
        volumeGrowthPct: growth ?? 0,
        relatedKeywords: related ?? [],
        topicIds: topics ?? [],
      };
    });
  }

  decodePicker(text: string): PickerNode {
    return validate(pickerNodeSchema, this.unprotect(text, 'picker'), 'picker');
  }

  /**
   * Autocomplete topics; no match is an empty list, not an error
   */
  decodeSuggestions(text: string): Suggestion[] {
    return validate(suggestionsSchema, this.unprotect(text, 'suggestions'), 'suggestions').default
      .topics;
  }

  /**
   * Pull the widget bootstrap token out of an embed page
   */
  decodeToken(html: string): WidgetToken {
    const match = EMBED_PAYLOAD_PATTERN.exec(html);
    if (!match) {
      throw new DecodeError('token', 'embed page carries no widget payload');
    }

    const widget = validate(
      widgetTokenSchema,
      parseJson(unescapeEmbedded(match[1]), 'token'),
      'token'
    );
    const config = userConfigSchema.safeParse(widget.request);
    const userType = config.success ? config.data.userConfig?.userType : undefined;

    if (userType === 'USER_TYPE_EMBED_OVER_QUOTA') {
      this.logger.warn(`Embed token for ${widget.type} is over quota`);
    }

    return {
      token: widget.token,
      type: widget.type,
      request: widget.request,
      overQuota: userType === 'USER_TYPE_EMBED_OVER_QUOTA',
    };
  }

  /**
   * Inner JSON of the batchexecute frame answering `rpcId`
   */
  private rpcPayload(text: string, rpcId: string, shape: string): unknown {
    const frames = validate(batchEnvelopeSchema, this.unprotect(text, shape), shape);
    const frame =
      frames.find((f) => f[0] === 'wrb.fr' && f[1] === rpcId) ??
      frames.find((f) => f[0] === 'wrb.fr');
    if (!frame) {
      throw new DecodeError(shape, `no response frame for ${rpcId}`);
    }

    const inner = frame[2];
    if (inner === null || inner === undefined) {
      throw new EmptyResultError(shape, []);
    }
    if (typeof inner !== 'string') {
      throw new DecodeError(shape, `frame payload for ${rpcId} is not a string`);
    }
    return parseJson(inner, shape);
  }
}
