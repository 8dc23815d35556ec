import { Job, MEDIA_JOB_TYPES, MediaJobType, SOURCE_JOB_TYPES, parseJobPayload } from '../jobQueue/types.js';
import { Media, Source } from '../../types/models.js';

/**
 * Entity a failed job was working on
 */
export type JobTarget =
  | { kind: 'source'; source: Source }
  | { kind: 'media'; media: Media; jobType: MediaJobType }
  | { kind: 'unknown'; reason: string };

export interface JobTargetLookups {
  sources: { getById(id: number): Promise<Source | null> };
  media: { getById(id: number): Promise<Media | null> };
}

/**
 * Resolve the entity behind a job from its type and key
 *
 * Jobs whose entity no longer exists resolve to `unknown`.
 */
export async function decodeJobTarget(job: Job, lookups: JobTargetLookups): Promise<JobTarget> {
  const sourceJobType = SOURCE_JOB_TYPES.find(type => type === job.type);
  if (sourceJobType) {
    const { sourceId } = parseJobPayload(sourceJobType, job.payload);
    const source = await lookups.sources.getById(sourceId);
    return source ? { kind: 'source', source } : { kind: 'unknown', reason: `source ${sourceId} no longer exists` };
  }

  const mediaJobType = MEDIA_JOB_TYPES.find(type => type === job.type);
  if (mediaJobType) {
    const { mediaId } = parseJobPayload(mediaJobType, job.payload);
    const media = await lookups.media.getById(mediaId);
    return media
      ? { kind: 'media', media, jobType: mediaJobType }
      : { kind: 'unknown', reason: `media ${mediaId} no longer exists` };
  }

  return { kind: 'unknown', reason: `job type ${job.type} targets no source or media` };
}
