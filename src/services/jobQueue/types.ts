import { z } from 'zod';

/**
 * Job Queue Type Definitions
 *
 * Jobs are addressed by (type, task_key), where task_key is the JSON encoding
 * of the job's argument tuple. Storage backends are pluggable through
 * IJobQueueStorage; the reconciler only sees ITaskRegistry.
 */

/**
 * Job priority constants
 * Lower number = served first, ties broken by enqueue order
 */
export const JOB_PRIORITY = {
  BOOKKEEPING: 0, // Directory checks, image copies, bulk re-saves, media server rescans
  NORMAL: 5, // Indexing, metadata
  THUMBNAIL: 10,
  DOWNLOAD: 15,
} as const;

export const SOURCE_JOB_TYPES = [
  'index-source',
  'check-source-directory',
  'copy-channel-images',
  'save-all-media',
] as const;

export const MEDIA_JOB_TYPES = ['download-metadata', 'download-thumbnail', 'download-media'] as const;

export const JOB_TYPES = [...SOURCE_JOB_TYPES, ...MEDIA_JOB_TYPES, 'rescan-media-server'] as const;

export type SourceJobType = (typeof SOURCE_JOB_TYPES)[number];
export type MediaJobType = (typeof MEDIA_JOB_TYPES)[number];
export type JobType = (typeof JOB_TYPES)[number];

interface SourceJobPayload {
  sourceId: number;
}

interface MediaJobPayload {
  mediaId: number;
}

/**
 * Type-safe job payload mapping
 */
export type JobPayloadMap = {
  'index-source': SourceJobPayload;
  'check-source-directory': SourceJobPayload;
  'copy-channel-images': SourceJobPayload;
  'save-all-media': SourceJobPayload;
  'download-metadata': MediaJobPayload;
  'download-thumbnail': MediaJobPayload & { thumbnailUrl: string };
  'download-media': MediaJobPayload;
  'rescan-media-server': { serverId: number };
};

const entityId = z.number().int().positive();
const sourcePayloadSchema = z.object({ sourceId: entityId });
const mediaPayloadSchema = z.object({ mediaId: entityId });

export const jobTypeSchema = z.enum(JOB_TYPES);

/**
 * Payload validators, applied whenever a payload is read back from storage
 */
export const JOB_PAYLOAD_SCHEMAS: { [K in JobType]: z.ZodType<JobPayloadMap[K]> } = {
  'index-source': sourcePayloadSchema,
  'check-source-directory': sourcePayloadSchema,
  'copy-channel-images': sourcePayloadSchema,
  'save-all-media': sourcePayloadSchema,
  'download-metadata': mediaPayloadSchema,
  'download-thumbnail': mediaPayloadSchema.extend({ thumbnailUrl: z.string().min(1) }),
  'download-media': mediaPayloadSchema,
  'rescan-media-server': z.object({ serverId: entityId }),
};

const sourceArgs = (payload: SourceJobPayload): string[] => [String(payload.sourceId)];
const mediaArgs = (payload: MediaJobPayload): string[] => [String(payload.mediaId)];

const JOB_ARGUMENTS: { [K in JobType]: (payload: JobPayloadMap[K]) => string[] } = {
  'index-source': sourceArgs,
  'check-source-directory': sourceArgs,
  'copy-channel-images': sourceArgs,
  'save-all-media': sourceArgs,
  'download-metadata': mediaArgs,
  'download-thumbnail': payload => [String(payload.mediaId), payload.thumbnailUrl],
  'download-media': mediaArgs,
  'rescan-media-server': payload => [String(payload.serverId)],
};

/**
 * Task key of a job: its argument tuple, JSON encoded
 *
 * @example
 * taskKeyFor('download-thumbnail', { mediaId: 7, thumbnailUrl: 'https://img.test/7.jpg' })
 * // => '["7","https://img.test/7.jpg"]'
 */
export function taskKeyFor<T extends JobType>(type: T, payload: JobPayloadMap[T]): string {
  const toArguments: (payload: JobPayloadMap[T]) => string[] = JOB_ARGUMENTS[type];
  return JSON.stringify(toArguments(payload));
}

/**
 * Validate a payload read back from storage against its job type
 */
export function parseJobPayload<T extends JobType>(type: T, payload: unknown): JobPayloadMap[T] {
  const schema: z.ZodType<JobPayloadMap[T]> = JOB_PAYLOAD_SCHEMAS[type];
  return schema.parse(payload);
}

export type JobStatus = 'pending' | 'processing';

/**
 * Job in active queue
 * Completed one-shot jobs are removed; recurring jobs return to pending
 */
export interface Job<T extends JobType = JobType> {
  id: number;
  type: T;
  task_key: string;
  queue: string | null; // Partition: one processing job per queue at a time
  priority: number;
  payload: JobPayloadMap[T];
  status: JobStatus;
  verbose_name: string | null;
  error?: string | null;
  retry_count: number;
  max_retries: number;
  repeat_seconds: number; // 0 = one-shot
  run_at: number; // epoch ms
  created_at: string;
  started_at?: string | null;
  updated_at?: string;
}

export type NewJob<T extends JobType = JobType> = Pick<
  Job<T>,
  'type' | 'task_key' | 'queue' | 'priority' | 'payload' | 'verbose_name' | 'max_retries' | 'repeat_seconds' | 'run_at'
>;

/**
 * Result of recording a failed attempt
 */
export type JobFailureOutcome =
  | { status: 'retrying'; retryCount: number; runAt: number }
  | { status: 'failed'; job: Job }
  | { status: 'missing' };

/**
 * Filters for listing active jobs
 */
export interface JobFilters {
  type?: JobType;
  status?: JobStatus;
  queue?: string;
  limit?: number;
}

/**
 * Queue statistics
 */
export interface QueueStats {
  pending: number;
  processing: number;
  totalActive: number;
  oldestPendingAge: number | null; // milliseconds
}

/**
 * Job Queue Storage Interface
 */
export interface IJobQueueStorage {
  /**
   * Insert a pending job. With replaceExisting, pending jobs sharing the
   * job's (type, task_key) are removed in the same transaction.
   * @returns Job ID
   */
  addJob(job: NewJob, options?: { replaceExisting?: boolean }): Promise<number>;

  /**
   * Pick the next due job whose partition is idle
   * Changes state: pending → processing
   */
  pickNextJob(now: number): Promise<Job | null>;

  /**
   * One-shot jobs are removed; recurring jobs are rescheduled
   * repeat_seconds after `now` unless another job already holds their key.
   */
  completeJob(jobId: number, now: number): Promise<void>;

  /**
   * Record a failed attempt. With retries left the job returns to pending at
   * retryAt; otherwise it is removed and returned as permanently failed.
   */
  failJob(jobId: number, error: string, retryAt: number): Promise<JobFailureOutcome>;

  /**
   * Remove pending jobs by key; processing jobs are left alone
   * @returns Count of removed jobs
   */
  cancelJobs(type: JobType, taskKey: string): Promise<number>;

  /**
   * Count pending and processing jobs holding a key
   */
  countOutstanding(type: JobType, taskKey: string): Promise<number>;

  getJob(jobId: number): Promise<Job | null>;

  listJobs(filters?: JobFilters): Promise<Job[]>;

  /**
   * Crash recovery: Reset all 'processing' jobs to 'pending'
   * @returns Count of reset jobs
   */
  resetStalledJobs(): Promise<number>;

  getStats(): Promise<QueueStats>;
}

export interface EnqueueOptions {
  priority: number;
  queue?: string | null;
  repeatSeconds?: number;
  replaceExisting?: boolean;
  verboseName?: string;
}

/**
 * Keyed task registry used by the lifecycle rules
 */
export interface ITaskRegistry {
  enqueue<T extends JobType>(type: T, payload: JobPayloadMap[T], options: EnqueueOptions): Promise<number>;
  cancel<T extends JobType>(type: T, payload: JobPayloadMap[T]): Promise<number>;
  existsPending<T extends JobType>(type: T, payload: JobPayloadMap[T]): Promise<boolean>;
}
