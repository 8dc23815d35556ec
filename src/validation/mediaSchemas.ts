import { z } from 'zod';
import { mediaMetadataSchema } from '../types/metadata.js';

/**
 * Media Validation Schemas
 */

const filePathSchema = z.string().min(1).nullable();

export const createMediaSchema = z.object({
  source_id: z.number().int().positive(),
  key: z.string().min(1).max(100),
  metadata: mediaMetadataSchema.nullable().default(null),
  manual_skip: z.boolean().default(false),
  skip: z.boolean().default(false),
  media_file: filePathSchema.default(null),
  thumb: filePathSchema.default(null),
});

export const updateMediaSchema = z
  .object({
    metadata: mediaMetadataSchema.nullable(),
    manual_skip: z.boolean(),
    skip: z.boolean(),
    downloaded: z.boolean(),
    downloaded_format: z.string().min(1).nullable(),
    media_file: filePathSchema,
    thumb: filePathSchema,
  })
  .partial();

export type CreateMediaInput = z.input<typeof createMediaSchema>;
export type UpdateMediaInput = z.input<typeof updateMediaSchema>;
