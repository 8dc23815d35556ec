import { z } from 'zod';

/**
 * Media metadata descriptor
 *
 * Only the fields the lifecycle rules read are declared; everything else an
 * indexer hands over is kept as-is.
 */
export const thumbnailSchema = z
  .object({
    url: z.string().min(1),
    width: z.number().optional(),
    height: z.number().optional(),
    preference: z.number().optional(),
  })
  .passthrough();

export const mediaFormatSchema = z
  .object({
    format_id: z.string().min(1),
    vcodec: z.string().optional(),
    acodec: z.string().optional(),
    height: z.number().nullable().optional(),
    fps: z.number().nullable().optional(),
    ext: z.string().optional(),
  })
  .passthrough();

export const mediaMetadataSchema = z
  .object({
    title: z.string().optional(),
    upload_date: z.string().optional(), // YYYYMMDD
    duration: z.number().nullable().optional(),
    thumbnail: z.string().optional(),
    thumbnails: z.array(thumbnailSchema).optional(),
    formats: z.array(mediaFormatSchema).optional(),
  })
  .passthrough();

export type MediaThumbnail = z.infer<typeof thumbnailSchema>;
export type MediaFormat = z.infer<typeof mediaFormatSchema>;
export type MediaMetadata = z.infer<typeof mediaMetadataSchema>;

/**
 * Thumbnail URL of an item, or null when the metadata names none
 */
export function resolveThumbnailUrl(metadata: MediaMetadata | null): string | null {
  if (!metadata) {
    return null;
  }
  if (metadata.thumbnail) {
    return metadata.thumbnail;
  }

  const candidates = [...(metadata.thumbnails ?? [])].sort(
    (a, b) => (b.preference ?? 0) - (a.preference ?? 0) || (b.width ?? 0) - (a.width ?? 0)
  );
  return candidates[0]?.url ?? null;
}

/**
 * Publish date from an upload_date of the form YYYYMMDD
 */
export function parseUploadDate(metadata: MediaMetadata | null): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(metadata?.upload_date ?? '');
  if (!match) {
    return null;
  }
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return Number.isNaN(date.getTime()) ? null : date;
}
