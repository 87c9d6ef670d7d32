import { z } from 'zod';
import { RELATION_KINDS, type JsonValue, type Metadata, type TemporalOrderWarning } from './index.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const MetadataSchema: z.ZodType<Metadata> = z.record(JsonValueSchema);

export const RelationKindSchema = z.enum(RELATION_KINDS);

export const TemporalOrderWarningSchema: z.ZodType<TemporalOrderWarning> = z.object({
  kind: z.literal('TemporalOrderWarning'),
  relation: RelationKindSchema,
  fromTimestamp: z.string(),
  toTimestamp: z.string(),
  message: z.string(),
});
