import { z } from 'zod';
import { PickerNode } from '@trendlens/shared-types';

/**
 * Wire schemas for the upstream payloads. Everything not listed here is
 * ignored so new upstream fields don't break decoding.
 */

// Epoch seconds, sent as a string by the widget endpoints
const epochSchema = z
  .union([z.string().regex(/^\d+$/), z.number().int()])
  .transform(Number);

export const multilineSchema = z.object({
  default: z.object({
    timelineData: z.array(
      z.object({
        time: epochSchema,
        value: z.array(z.number()),
        isPartial: z.boolean().optional(),
      })
    ),
  }),
});
export type MultilinePayload = z.infer<typeof multilineSchema>;

export const multirangeSchema = z.object({
  default: z.object({
    timelineData: z.array(
      z.object({
        columnData: z.array(
          z.object({
            time: epochSchema,
            value: z.number(), // -1 marks a missing point
            isPartial: z.boolean().optional(),
          })
        ),
      })
    ),
  }),
});
export type MultirangePayload = z.infer<typeof multirangeSchema>;

export const geoMapSchema = z.object({
  default: z.object({
    geoMapData: z.array(
      z.object({
        geoCode: z.string().optional(),
        geoName: z.string(),
        value: z.array(z.number()),
        hasData: z.array(z.boolean()),
        coordinates: z.object({ lat: z.number(), lng: z.number() }).optional(),
      })
    ),
  }),
});
export type GeoMapPayload = z.infer<typeof geoMapSchema>;

const rankedKeywordSchema = z.object({
  query: z.string().optional(),
  topic: z
    .object({
      mid: z.string(),
      title: z.string(),
      type: z.string(),
    })
    .optional(),
  value: z.number(),
  formattedValue: z.string(),
});
export type RankedKeyword = z.infer<typeof rankedKeywordSchema>;

export const relatedSchema = z.object({
  default: z.object({
    rankedList: z
      .array(z.object({ rankedKeyword: z.array(rankedKeywordSchema) }))
      .optional(),
  }),
});

// [[ "wrb.fr", rpcId, "<inner json>", ... ], ...]
export const batchEnvelopeSchema = z.array(z.array(z.unknown()));

export const showcaseSchema = z
  .array(z.array(z.tuple([z.string(), z.array(z.number())]).rest(z.unknown())))
  .min(1);

// [seconds, nanos]
const trendTimestampSchema = z.array(z.number()).min(1);

export const trendingItemSchema = z
  .tuple([
    z.string(), // keyword
    z.unknown(), // news
    z.string(), // geo
    trendTimestampSchema.nullable(), // started
    trendTimestampSchema.nullable(), // ended
    z.unknown(),
    z.number().nullable(), // volume
    z.unknown(),
    z.number().nullable(), // growth, percent
    z.array(z.string()).nullable(), // related keywords
    z.array(z.number()).nullable(), // topic ids
  ])
  .rest(z.unknown());

export const trendingSchema = z
  .tuple([z.unknown(), z.array(trendingItemSchema)])
  .rest(z.unknown());

export const pickerNodeSchema: z.ZodType<PickerNode, z.ZodTypeDef, unknown> = z.lazy(
  () =>
    z.object({
      name: z.string(),
      // category ids arrive as numbers
      id: z.union([z.string(), z.number()]).transform(String),
      children: z.array(pickerNodeSchema).optional(),
    })
);

export const suggestionsSchema = z.object({
  default: z.object({
    topics: z.array(
      z.object({
        mid: z.string(),
        title: z.string(),
        type: z.string(),
      })
    ),
  }),
});

export const widgetTokenSchema = z.object({
  token: z.string(),
  type: z.string(),
  request: z.record(z.string(), z.unknown()),
});

export const userConfigSchema = z.object({
  userConfig: z.object({ userType: z.string() }).optional(),
});
