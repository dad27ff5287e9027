import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  BatchShowcaseCall,
  ExploreCall,
  PickerCall,
  SuggestionsCall,
  TrendingNowCall,
  UpstreamCall,
} from '@trendlens/shared-types';
import {
  DecodeError,
  QuotaExceededError,
  TrendsError,
  UpstreamRequestError,
} from '../errors/trends.errors';
import { ResponseDecoderService } from '../services/response-decoder.service';
import { BATCH_WINDOWS } from '../services/batch-windows';
import { environment } from '../environments/environment';
import { TrendsTransport } from './trends-transport';

const TRENDS_BASE = 'https://trends.google.com';
const EMBED_URL = `${TRENDS_BASE}/trends/embed/explore`;
const WIDGET_DATA_URL = `${TRENDS_BASE}/trends/api/widgetdata`;
const PICKER_URL = `${TRENDS_BASE}/trends/api/explore/pickers`;
const AUTOCOMPLETE_URL = `${TRENDS_BASE}/trends/api/autocomplete`;
const BATCH_URL = `${TRENDS_BASE}/_/TrendsUi/data/batchexecute`;

// Widget type named in the embed token -> data endpoint
const WIDGET_ENDPOINTS: Record<string, string> = {
  fe_line_chart: `${WIDGET_DATA_URL}/multiline`,
  fe_multi_range_chart: `${WIDGET_DATA_URL}/multirange`,
  fe_multi_heat_map: `${WIDGET_DATA_URL}/comparedgeo`,
  fe_geo_chart_explore: `${WIDGET_DATA_URL}/comparedgeo`,
  fe_related_searches: `${WIDGET_DATA_URL}/relatedsearches`,
};

export const TRANSPORT_OPTIONS = 'TRENDS_TRANSPORT_OPTIONS';

export type TransportOptions = {
  language: string;
  tzOffsetMinutes: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

@Injectable()
export class HttpTrendsTransport extends TrendsTransport {
  private readonly logger = new Logger(HttpTrendsTransport.name);
  private readonly options: TransportOptions;
  private nextSlot = 0;

  constructor(
    private readonly decoder: ResponseDecoderService,
    @Optional()
    @Inject(TRANSPORT_OPTIONS)
    options: Partial<TransportOptions> = {}
  ) {
    super();
    this.options = {
      language: environment.trends.language,
      tzOffsetMinutes: environment.trends.tzOffsetMinutes,
      requestDelayMs: environment.trends.requestDelayMs,
      requestTimeoutMs: environment.trends.requestTimeoutMs,
      ...options,
    };
  }

  async execute(call: UpstreamCall): Promise<string> {
    switch (call.kind) {
      case 'explore':
        return this.explore(call);
      case 'batch-showcase':
        return this.showcase(call);
      case 'trending-now':
        return this.trendingNow(call);
      case 'picker':
        return this.picker(call);
      case 'suggestions':
        return this.suggestions(call);
    }
  }

  /**
   * Explore widgets take two hops: the embed page hands out a token for the
   * widget, which then unlocks the data endpoint
   */
  private async explore(call: ExploreCall): Promise<string> {
    const embedUrl = this.url(`${EMBED_URL}/${call.widget}`, {
      req: JSON.stringify(call.request),
    });
    const html = await this.request(embedUrl);

    const token = this.decoder.decodeToken(html);
    if (token.overQuota) {
      throw new QuotaExceededError(call.widget);
    }

    const endpoint = WIDGET_ENDPOINTS[token.type];
    if (!endpoint) {
      throw new DecodeError('token', `unknown widget type "${token.type}"`);
    }

    const request =
      call.widget === 'GEO_MAP'
        ? {
            ...token.request,
            resolution: call.resolution,
            includeLowSearchVolumeGeos: call.includeLowSearchVolumeGeos ?? false,
          }
        : token.request;

    this.logger.log(
      `Fetching ${call.widget} for ${call.columns.map((c) => c.label).join(', ')}`
    );
    return this.request(
      this.url(endpoint, { req: JSON.stringify(request), token: token.token })
    );
  }

  private showcase(call: BatchShowcaseCall): Promise<string> {
    const code = BATCH_WINDOWS[call.window].code;
    const payload = [null, null, call.keywords.map((k) => [call.geo, k, code, 0, 3])];
    this.logger.log(
      `Fetching ${call.window} showcase for ${call.keywords.length} keywords (${call.geo})`
    );
    return this.batchExecute(call.rpcId, payload);
  }

  private trendingNow(call: TrendingNowCall): Promise<string> {
    const payload = [null, null, call.geo, 0, call.language, call.hours, 1];
    this.logger.log(`Fetching trending searches for ${call.geo} (${call.hours}h)`);
    return this.batchExecute(call.rpcId, payload, call.language);
  }

  private picker(call: PickerCall): Promise<string> {
    return this.request(this.url(`${PICKER_URL}/${call.picker}`, {}, call.language));
  }

  private suggestions(call: SuggestionsCall): Promise<string> {
    const path = `${AUTOCOMPLETE_URL}/${encodeURIComponent(call.keyword)}`;
    return this.request(this.url(path, {}, call.language));
  }

  private batchExecute(rpcId: string, payload: unknown[], language?: string): Promise<string> {
    const body = new URLSearchParams({
      'f.req': JSON.stringify([[[rpcId, JSON.stringify(payload), null, 'generic']]]),
    });
    return this.request(this.url(BATCH_URL, {}, language), {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded;charset=UTF-8' },
      body: body.toString(),
    });
  }

  private url(base: string, params: Record<string, string>, language?: string): string {
    const query = new URLSearchParams({
      ...params,
      hl: language ?? this.options.language,
      tz: String(this.options.tzOffsetMinutes),
    });
    return `${base}?${query.toString()}`;
  }

  /**
   * Requests are spaced at least `requestDelayMs` apart, including
   * concurrent ones
   */
  private async throttle(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.options.requestDelayMs;

    if (slot > now) {
      this.logger.debug(`Throttling upstream request for ${slot - now}ms`);
      await sleep(slot - now);
    }
  }

  private async request(url: string, init: RequestInit = {}): Promise<string> {
    await this.throttle();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        throw new UpstreamRequestError(url, response.status, response.statusText);
      }
      return await response.text();
    } catch (error) {
      if (error instanceof TrendsError) {
        this.logger.error(error.message);
        throw error;
      }

      const reason =
        error instanceof Error && error.name === 'AbortError'
          ? `timed out after ${this.options.requestTimeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      this.logger.error(`Upstream request to ${url} failed: ${reason}`);
      throw new UpstreamRequestError(url, 0, reason);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
