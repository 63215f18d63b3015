import { z } from 'zod';

export const Vec3TupleSchema = z.tuple([z.number(), z.number(), z.number()]);

export const DestinationSeedSchema = z.object({
  name: z.string().min(1),
  coordinates: Vec3TupleSchema.nullable().default(null),
  price: z.number().int().nonnegative().nullable().default(null),
  enabled: z.boolean().default(true),
  visited: z.boolean().default(false),
  sceneId: z.string().min(1).nullable().default(null),
  anchorName: z.string().min(1).nullable().default(null),
  description: z.string().default(''),
});

export const DestinationSeedFileSchema = z.object({
  destinations: z.array(DestinationSeedSchema),
});

export const DestinationOverrideSchema = z.object({
  enabled: z.boolean().optional(),
  price: z.number().int().nonnegative().nullable().optional(),
});

export const VisitedRecordSchema = z.object({
  visited: z.boolean(),
  coordinates: Vec3TupleSchema.nullable(),
});

export type DestinationSeed = z.input<typeof DestinationSeedSchema>;
export type DestinationOverride = z.infer<typeof DestinationOverrideSchema>;
export type VisitedRecord = z.infer<typeof VisitedRecordSchema>;
