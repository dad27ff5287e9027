import { Controller, Get, Query, Logger } from '@nestjs/common';
import { ApiErrorResponse, ApiResponse, LookupItem, Suggestion } from '@trendlens/shared-types';
import { LookupService, PickerKind } from '../services/lookup.service';
import { toErrorResponse } from './error-response';
import { invalidQuery, lookupQuerySchema, suggestionsQuerySchema } from './query.schemas';

@Controller('lookup')
export class LookupController {
  private readonly logger = new Logger(LookupController.name);

  constructor(private readonly lookupService: LookupService) {}

  /**
   * GET /api/lookup/geo?find=york
   * Geo codes for place names ("New York" -> "US-NY")
   */
  @Get('geo')
  async findGeo(
    @Query() query: Record<string, string>
  ): Promise<ApiResponse<LookupItem[]> | ApiErrorResponse> {
    return this.lookup('geo', query);
  }

  /**
   * GET /api/lookup/categories?find=sports
   */
  @Get('categories')
  async findCategories(
    @Query() query: Record<string, string>
  ): Promise<ApiResponse<LookupItem[]> | ApiErrorResponse> {
    return this.lookup('category', query);
  }

  /**
   * GET /api/lookup/suggestions?keyword=tea
   * Autocomplete terms and topics for a partial keyword
   */
  @Get('suggestions')
  async getSuggestions(
    @Query() query: Record<string, string>
  ): Promise<ApiResponse<Suggestion[]> | ApiErrorResponse> {
    const parsed = suggestionsQuerySchema.safeParse(query);
    if (!parsed.success) return invalidQuery(parsed.error);

    try {
      const data = await this.lookupService.suggestions(parsed.data.keyword, parsed.data.language);
      return { success: true, data };
    } catch (error) {
      return toErrorResponse(error, this.logger);
    }
  }

  private async lookup(
    picker: PickerKind,
    query: Record<string, string>
  ): Promise<ApiResponse<LookupItem[]> | ApiErrorResponse> {
    const parsed = lookupQuerySchema.safeParse(query);
    if (!parsed.success) return invalidQuery(parsed.error);
    const { refresh, ...lookupQuery } = parsed.data;

    if (refresh) {
      this.logger.log(`Refreshing ${picker} index`);
      this.lookupService.invalidate(picker, lookupQuery.language);
    }

    try {
      const data =
        picker === 'geo'
          ? await this.lookupService.geo(lookupQuery)
          : await this.lookupService.categories(lookupQuery);
      return { success: true, data };
    } catch (error) {
      return toErrorResponse(error, this.logger);
    }
  }
}
