import { LifecycleEventBus } from '../../src/services/lifecycle/LifecycleEventBus.js';
import { JobQueueService } from '../../src/services/jobQueue/JobQueueService.js';
import { SQLiteJobQueueStorage } from '../../src/services/jobQueue/storage/SQLiteJobQueueStorage.js';
import { Job, JobType, MediaJobType } from '../../src/services/jobQueue/types.js';
import { SourceService } from '../../src/services/sources/sourceService.js';
import { MediaService } from '../../src/services/media/mediaService.js';
import { MediaServerService } from '../../src/services/mediaServers/mediaServerService.js';
import { IMediaFileStore } from '../../src/services/files/MediaFileStore.js';
import { FilterEngine } from '../../src/services/filtering/FilterEngine.js';
import { FormatSelector } from '../../src/services/filtering/FormatSelector.js';
import { LifecycleReconciler } from '../../src/services/reconciler/LifecycleReconciler.js';
import { MediaMetadata } from '../../src/types/metadata.js';
import { TestDatabase, createTestDatabase } from './testDatabase.js';

export const NOW = Date.UTC(2026, 9, 18, 12, 0, 0);

/**
 * File store backed by a set of paths
 */
export class InMemoryFileStore implements IMediaFileStore {
  readonly files = new Set<string>();
  readonly directories = new Set<string>();
  readonly deleted: string[] = [];

  add(...paths: string[]): this {
    for (const filePath of paths) {
      this.files.add(filePath);
    }
    return this;
  }

  async fileExists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async listFilesMatching(stemPath: string): Promise<string[]> {
    return [...this.files].filter(filePath => filePath.startsWith(`${stemPath}.`)).sort();
  }

  async deleteFile(filePath: string): Promise<void> {
    this.files.delete(filePath);
    this.deleted.push(filePath);
  }

  async ensureDirectory(dirPath: string): Promise<void> {
    this.directories.add(dirPath);
  }
}

export interface ReconcilerHarness {
  testDb: TestDatabase;
  events: LifecycleEventBus;
  jobQueue: JobQueueService;
  sources: SourceService;
  media: MediaService;
  mediaServers: MediaServerService;
  files: InMemoryFileStore;
  reconciler: LifecycleReconciler;
  /** Pending and running jobs, in pickup order */
  jobs(type?: JobType): Promise<Job[]>;
  destroy(): Promise<void>;
}

export async function createReconcilerHarness(
  options: { escalateMediaFailures?: MediaJobType[]; maxRetries?: number } = {}
): Promise<ReconcilerHarness> {
  const testDb = await createTestDatabase();
  const events = new LifecycleEventBus();
  const jobQueue = new JobQueueService(
    new SQLiteJobQueueStorage(testDb.getConnection()),
    { workers: 1, pollIntervalMs: 10, maxRetries: options.maxRetries ?? 1, retryDelays: [0] },
    () => NOW
  );
  const sources = new SourceService(testDb.manager, events);
  const media = new MediaService(testDb.manager, events, sources);
  const mediaServers = new MediaServerService(testDb.manager);
  const files = new InMemoryFileStore();

  const reconciler = new LifecycleReconciler({
    events,
    jobQueue,
    sources,
    media,
    mediaServers,
    files,
    filter: new FilterEngine(() => new Date(NOW)),
    formats: new FormatSelector(),
    config: { escalateMediaFailures: options.escalateMediaFailures ?? ['download-metadata'] },
  });

  return {
    testDb,
    events,
    jobQueue,
    sources,
    media,
    mediaServers,
    files,
    reconciler,
    jobs: type => jobQueue.getActiveJobs(type ? { type } : undefined),
    destroy: async () => {
      await jobQueue.stop();
      await testDb.destroy();
    },
  };
}

/**
 * Metadata that passes default capture rules and offers a 1080p VP9 + Opus pair
 */
export function downloadableMetadata(overrides: Partial<MediaMetadata> = {}): MediaMetadata {
  return {
    title: 'Building a birdhouse',
    upload_date: '20261010',
    duration: 600,
    thumbnail: 'https://img.test/birdhouse.jpg',
    formats: [
      { format_id: '251', acodec: 'opus', vcodec: 'none' },
      { format_id: '248', vcodec: 'vp9', acodec: 'none', height: 1080, fps: 30 },
    ],
    ...overrides,
  };
}
