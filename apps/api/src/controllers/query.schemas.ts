import { z } from 'zod';
import { ApiErrorResponse } from '@trendlens/shared-types';

/**
 * Query-string schemas. List parameters are comma-separated.
 */

const DEFAULT_TIMEFRAME = 'today 12-m';

const keywordList = z
  .string({ required_error: 'Missing required parameter: keywords' })
  .transform((value) =>
    value
      .split(',')
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
  )
  .refine((list) => list.length > 0, 'Missing required parameter: keywords');

// An absent geo means worldwide ('')
const geoList = z
  .string()
  .optional()
  .transform((value) => (value === undefined ? [''] : value.split(',').map((g) => g.trim())));

const timeframeList = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? [DEFAULT_TIMEFRAME]
      : value
          .split(',')
          .map((t) => t.trim())
          .filter((t) => t.length > 0)
  );

const flag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const exploreParams = {
  category: z.string().optional(),
  property: z.enum(['', 'images', 'news', 'youtube', 'froogle']).optional(),
};

export const interestQuerySchema = z.object({
  keywords: keywordList,
  timeframe: timeframeList,
  geo: geoList,
  ...exploreParams,
});

export const regionQuerySchema = z.object({
  keywords: keywordList,
  timeframe: z.string().default(DEFAULT_TIMEFRAME),
  geo: geoList,
  resolution: z.enum(['COUNTRY', 'REGION', 'CITY', 'DMA']).optional(),
  includeLowVolume: flag,
  ...exploreParams,
});

export const relatedQuerySchema = z.object({
  keyword: z.string({ required_error: 'Missing required parameter: keyword' }).trim().min(1),
  timeframe: z.string().default(DEFAULT_TIMEFRAME),
  geo: z.string().default(''),
  type: z.enum(['queries', 'topics']).default('queries'),
  ...exploreParams,
});

export const showcaseQuerySchema = z.object({
  keywords: keywordList,
  geo: z.string().default('US'),
  window: z.enum(['Past4H', 'Past24H', 'Past48H', 'Past7D']).default('Past24H'),
});

export const trendingQuerySchema = z.object({
  geo: z.string().default('US'),
  hours: z.coerce.number().int().default(24),
  language: z.string().optional(),
});

export const timeframeQuerySchema = z.object({
  timeframe: z.string({ required_error: 'Missing required parameter: timeframe' }).min(1),
});

export const lookupQuerySchema = z.object({
  find: z.string().optional(),
  id: z.string().optional(),
  exact: flag,
  refresh: flag,
  language: z.string().optional(),
});

export const suggestionsQuerySchema = z.object({
  keyword: z.string({ required_error: 'Missing required parameter: keyword' }).trim().min(1, {
    message: 'Missing required parameter: keyword',
  }),
  language: z.string().optional(),
});

export const exportQuerySchema = z.object({
  report: z.enum(['interest', 'region', 'showcase']).default('interest'),
});

export type ExportReport = z.infer<typeof exportQuerySchema>['report'];

/**
 * Turn a failed query parse into the API error envelope
 */
export function invalidQuery(error: z.ZodError): ApiErrorResponse {
  const issue = error.issues[0];
  const field = issue.path.join('.');
  return {
    success: false,
    error: issue.message.startsWith('Missing')
      ? issue.message
      : `Invalid parameter ${field}: ${issue.message}`,
    code: 'InvalidParameter',
  };
}
