import path from 'path';
import { Job } from '../jobQueue/types.js';
import { JobQueueService } from '../jobQueue/JobQueueService.js';
import { SourceService } from '../sources/sourceService.js';
import { MediaService } from '../media/mediaService.js';
import { IMediaFileStore } from '../files/MediaFileStore.js';
import { logger } from '../../utils/logging.js';

/**
 * SourceJobHandlers
 *
 * Bookkeeping jobs queued by the source rules:
 * - save-all-media: re-save every media item of a source so its flags and jobs are re-derived
 * - check-source-directory: make sure the source's download directory exists
 *
 * A source deleted after the job was queued turns the job into a no-op.
 */
export class SourceJobHandlers {
  constructor(
    private readonly sources: SourceService,
    private readonly media: MediaService,
    private readonly files: IMediaFileStore,
    private readonly downloadRoot: string
  ) {}

  registerHandlers(jobQueue: JobQueueService): void {
    jobQueue.registerHandler('save-all-media', this.handleSaveAllMedia.bind(this));
    jobQueue.registerHandler('check-source-directory', this.handleCheckSourceDirectory.bind(this));
  }

  private async handleSaveAllMedia(job: Job<'save-all-media'>): Promise<void> {
    const { sourceId } = job.payload;
    const source = await this.sources.getById(sourceId);
    if (!source) {
      logger.info('[SourceJobHandlers] Source no longer exists, nothing to save', {
        service: 'SourceJobHandlers',
        handler: 'handleSaveAllMedia',
        sourceId,
      });
      return;
    }

    const items = await this.media.getBySource(sourceId);
    for (const item of items) {
      await this.media.save(item.id);
    }

    logger.info(`[SourceJobHandlers] Checked all media for source: ${source.name}`, {
      service: 'SourceJobHandlers',
      handler: 'handleSaveAllMedia',
      sourceId,
      count: items.length,
    });
  }

  private async handleCheckSourceDirectory(job: Job<'check-source-directory'>): Promise<void> {
    const { sourceId } = job.payload;
    const source = await this.sources.getById(sourceId);
    if (!source) {
      return;
    }

    const directory = path.join(this.downloadRoot, source.directory);
    await this.files.ensureDirectory(directory);

    logger.info(`[SourceJobHandlers] Download directory ready for source: ${source.name}`, {
      service: 'SourceJobHandlers',
      handler: 'handleCheckSourceDirectory',
      sourceId,
      directory,
    });
  }
}
