import { z } from 'zod';
import {
  AUDIO_CODECS,
  FORMAT_FALLBACKS,
  SOURCE_RESOLUTIONS,
  SOURCE_TYPES,
  VIDEO_CODECS,
} from '../types/models.js';

/**
 * Source Validation Schemas
 */

// Relative to the download root, and never climbing out of it
const directorySchema = z
  .string()
  .min(1)
  .max(255)
  .refine(value => !value.startsWith('/') && !value.split(/[\\/]/).includes('..'), {
    message: 'Directory must be relative to the download root',
  });

export const createSourceSchema = z.object({
  name: z.string().min(1).max(100),
  key: z.string().min(1).max(100),
  source_type: z.enum(SOURCE_TYPES),
  directory: directorySchema,
  index_schedule: z.number().int().min(0).default(86400),
  copy_channel_images: z.boolean().default(false),
  download_media: z.boolean().default(true),
  delete_files_on_disk: z.boolean().default(false),
  filter_text: z.string().max(200).default(''),
  filter_text_invert: z.boolean().default(false),
  filter_seconds: z.number().int().positive().nullable().default(null),
  filter_seconds_min: z.boolean().default(true),
  download_cap: z.number().int().min(0).default(0),
  source_resolution: z.enum(SOURCE_RESOLUTIONS).default('1080p'),
  source_vcodec: z.enum(VIDEO_CODECS).default('VP9'),
  source_acodec: z.enum(AUDIO_CODECS).default('OPUS'),
  prefer_60fps: z.boolean().default(true),
  fallback: z.enum(FORMAT_FALLBACKS).default('next-best'),
});

/**
 * Partial update; has_failed is only ever set through updates
 */
export const updateSourceSchema = createSourceSchema.partial().extend({
  has_failed: z.boolean().optional(),
});

export type CreateSourceInput = z.input<typeof createSourceSchema>;
export type UpdateSourceInput = z.input<typeof updateSourceSchema>;
