import { Injectable, Logger } from '@nestjs/common';
import { LookupItem, Suggestion } from '@trendlens/shared-types';
import { CacheService } from './cache.service';
import { HierarchicalIndex } from './hierarchical-index';
import { ResponseDecoderService } from './response-decoder.service';
import { RequestPlanBuilderService } from './request-plan-builder.service';
import { TrendsTransport } from '../transport/trends-transport';
import { environment } from '../environments/environment';

export type PickerKind = 'geo' | 'category';

export type LookupQuery = {
  find?: string;
  id?: string;
  exact?: boolean;
  language?: string;
};

/**
 * Resolves place and category names to the codes the explore endpoint takes
 */
@Injectable()
export class LookupService {
  private readonly logger = new Logger(LookupService.name);

  constructor(
    private readonly transport: TrendsTransport,
    private readonly decoder: ResponseDecoderService,
    private readonly cacheService: CacheService,
    private readonly planBuilder: RequestPlanBuilderService
  ) {}

  async geo(query: LookupQuery = {}): Promise<LookupItem[]> {
    return this.search('geo', query);
  }

  async categories(query: LookupQuery = {}): Promise<LookupItem[]> {
    return this.search('category', query);
  }

  /**
   * Search terms and topics upstream offers for a partial keyword; not cached
   */
  async suggestions(keyword: string, language?: string): Promise<Suggestion[]> {
    const lang = language ?? environment.trends.language;
    const call = this.planBuilder.buildSuggestions(keyword, lang);
    const suggestions = this.decoder.decodeSuggestions(await this.transport.execute(call));
    this.logger.log(`${suggestions.length} suggestions for "${call.keyword}"`);
    return suggestions;
  }

  /**
   * One index per picker and language, kept for the lookup TTL
   */
  async index(picker: PickerKind, language?: string): Promise<HierarchicalIndex> {
    const lang = language ?? environment.trends.language;

    return this.cacheService.getOrSet(
      this.cacheKey(picker, lang),
      async () => {
        const text = await this.transport.execute({ kind: 'picker', picker, language: lang });
        // geo ids nest under their parent, category ids are global
        const index = HierarchicalIndex.fromTree(
          this.decoder.decodePicker(text),
          picker === 'geo'
        );
        this.logger.log(`Indexed ${index.size} ${picker} entries (${lang})`);
        return index;
      },
      environment.cache.lookupTtl
    );
  }

  /**
   * Forget a cached index, e.g. after the upstream renamed regions
   */
  invalidate(picker: PickerKind, language?: string): void {
    this.cacheService.del(this.cacheKey(picker, language ?? environment.trends.language));
  }

  private async search(picker: PickerKind, query: LookupQuery): Promise<LookupItem[]> {
    const index = await this.index(picker, query.language);

    if (query.id) {
      return index.idSearch(query.id);
    }
    if (query.find && query.exact) {
      const item = index.exactSearch(query.find);
      return item ? [item] : [];
    }
    return index.find(query.find ?? '');
  }

  private cacheKey(picker: PickerKind, language: string): string {
    return `lookup:${picker}:${language}`;
  }
}
