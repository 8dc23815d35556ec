import { z } from 'zod';
import { MEDIA_SERVER_TYPES } from '../types/models.js';

/**
 * Media Server Validation Schemas
 */

export const mediaServerOptionsSchema = z.object({
  token: z.string().min(1),
  libraries: z
    .string()
    .regex(/^[\w-]*(,\s*[\w-]+)*$/, 'Libraries must be a comma-separated list of ids')
    .default(''),
});

export const createMediaServerSchema = z.object({
  server_type: z.enum(MEDIA_SERVER_TYPES),
  host: z.string().min(1).max(200),
  port: z.number().int().min(1).max(65535),
  use_https: z.boolean().default(false),
  verify_https: z.boolean().default(true),
  options: mediaServerOptionsSchema,
});

export const updateMediaServerSchema = createMediaServerSchema.partial();

export type CreateMediaServerInput = z.input<typeof createMediaServerSchema>;
export type UpdateMediaServerInput = z.input<typeof updateMediaServerSchema>;
