import { Source } from '../../types/models.js';
import { ITaskRegistry, JOB_PRIORITY } from '../jobQueue/types.js';
import { LifecycleEventBus } from '../lifecycle/LifecycleEventBus.js';
import { logger } from '../../utils/logging.js';

/**
 * Owned-media access the source rules need
 */
export interface SourceMediaStore {
  getBySource(sourceId: number): Promise<Array<{ id: number; key: string }>>;
  delete(id: number): Promise<void>;
}

/**
 * Source Lifecycle Rules
 *
 * Keeps a source's provisioning, indexing and bulk re-check jobs in line
 * with its stored state.
 */
export class SourceLifecycleRules {
  constructor(
    private readonly tasks: ITaskRegistry,
    private readonly media: SourceMediaStore
  ) {}

  register(events: LifecycleEventBus): void {
    events.on('source:before-update', ({ previous, next }) => this.beforeUpdate(previous, next));
    events.on('source:after-create', ({ source }) => this.afterCreate(source));
    events.on('source:after-update', async ({ source, resave }) => {
      if (resave) {
        await this.afterSave(source);
      }
    });
    events.on('source:before-delete', ({ source }) => this.beforeDelete(source));
    events.on('source:after-delete', ({ source }) => this.afterDelete(source));
  }

  /**
   * A changed index schedule replaces the recurring index job
   */
  async beforeUpdate(previous: Source | null, next: Source): Promise<void> {
    if (!previous || previous.index_schedule === next.index_schedule) {
      return;
    }

    logger.info('Index schedule changed, replacing index job', {
      service: 'SourceLifecycleRules',
      operation: 'beforeUpdate',
      sourceId: next.id,
      from: previous.index_schedule,
      to: next.index_schedule,
    });

    await this.tasks.cancel('index-source', { sourceId: next.id });
    // A schedule of 0 disables indexing
    if (next.index_schedule > 0) {
      await this.scheduleIndexing(next);
    }
  }

  async afterCreate(source: Source): Promise<void> {
    await this.tasks.enqueue(
      'check-source-directory',
      { sourceId: source.id },
      {
        priority: JOB_PRIORITY.BOOKKEEPING,
        verboseName: `Check download directory exists for source "${source.name}"`,
      }
    );

    if (source.source_type !== 'playlist' && source.copy_channel_images) {
      await this.tasks.enqueue(
        'copy-channel-images',
        { sourceId: source.id },
        {
          priority: JOB_PRIORITY.BOOKKEEPING,
          verboseName: `Copy channel images for source "${source.name}"`,
        }
      );
    }

    if (source.index_schedule > 0) {
      logger.info(`Scheduling media indexing for source: ${source.name}`, {
        service: 'SourceLifecycleRules',
        operation: 'afterCreate',
        sourceId: source.id,
        indexSchedule: source.index_schedule,
      });
      await this.tasks.cancel('index-source', { sourceId: source.id });
      await this.scheduleIndexing(source);
    }

    await this.afterSave(source);
  }

  /**
   * Every save re-checks all of the source's media
   */
  async afterSave(source: Source): Promise<void> {
    await this.tasks.enqueue(
      'save-all-media',
      { sourceId: source.id },
      {
        priority: JOB_PRIORITY.BOOKKEEPING,
        replaceExisting: true,
        verboseName: `Checking all media for source "${source.name}"`,
      }
    );
  }

  /**
   * Owned media go through the media delete path one at a time, so each
   * item's own delete rules run
   */
  async beforeDelete(source: Source): Promise<void> {
    for (const item of await this.media.getBySource(source.id)) {
      logger.info(`Deleting media for source: ${source.name} item: ${item.key}`, {
        service: 'SourceLifecycleRules',
        operation: 'beforeDelete',
        sourceId: source.id,
        mediaId: item.id,
      });
      await this.media.delete(item.id);
    }
  }

  async afterDelete(source: Source): Promise<void> {
    logger.info(`Deleting tasks for source: ${source.name}`, {
      service: 'SourceLifecycleRules',
      operation: 'afterDelete',
      sourceId: source.id,
    });
    await this.tasks.cancel('index-source', { sourceId: source.id });
  }

  private async scheduleIndexing(source: Source): Promise<void> {
    await this.tasks.enqueue(
      'index-source',
      { sourceId: source.id },
      {
        priority: JOB_PRIORITY.NORMAL,
        queue: String(source.id),
        repeatSeconds: source.index_schedule,
        replaceExisting: true,
        verboseName: `Index media from source "${source.name}"`,
      }
    );
  }
}
