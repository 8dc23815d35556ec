import { Media, MediaDraft, MediaServer, Source } from '../../types/models.js';
import { resolveThumbnailUrl } from '../../types/metadata.js';
import { ITaskRegistry, JOB_PRIORITY } from '../jobQueue/types.js';
import { LifecycleEventBus } from '../lifecycle/LifecycleEventBus.js';
import { FilterEngine } from '../filtering/FilterEngine.js';
import { FormatSelector } from '../filtering/FormatSelector.js';
import { IMediaFileStore, fileStem } from '../files/MediaFileStore.js';
import { logger } from '../../utils/logging.js';

export interface MediaServerDirectory {
  getAll(): Promise<MediaServer[]>;
}

/**
 * Media Lifecycle Rules
 *
 * beforeSave derives the stored flags of a media item on the draft that is
 * about to be written; afterSave schedules the work the written state still
 * needs. Nothing here writes the item back.
 */
export class MediaLifecycleRules {
  constructor(
    private readonly tasks: ITaskRegistry,
    private readonly files: IMediaFileStore,
    private readonly filter: FilterEngine,
    private readonly formats: FormatSelector,
    private readonly mediaServers: MediaServerDirectory
  ) {}

  register(events: LifecycleEventBus): void {
    events.on('media:before-save', ({ draft, source, refilter }) => this.beforeSave(draft, source, refilter));
    events.on('media:after-create', ({ media, source }) => this.afterSave(media, source));
    events.on('media:after-update', ({ media, source }) => this.afterSave(media, source));
    events.on('media:before-delete', ({ media, source }) => this.beforeDelete(media, source));
    events.on('media:after-delete', () => this.afterDelete());
  }

  async beforeSave(draft: MediaDraft, source: Source, refilter: boolean = true): Promise<void> {
    // Manually skipped items keep whatever state they were given
    if (draft.manual_skip) {
      return;
    }

    // Downloaded items are not re-filtered
    if (refilter && !draft.downloaded && draft.metadata) {
      draft.skip = this.filter.shouldSkip(draft, source);
    }

    if (draft.metadata) {
      draft.can_download = this.formats.hasValidFormat(draft, source);
    }

    if (draft.thumb && !(await this.files.fileExists(draft.thumb))) {
      draft.thumb = null;
    }

    if (draft.media_file && !(await this.files.fileExists(draft.media_file))) {
      draft.media_file = null;
    }
    if (!draft.media_file) {
      draft.downloaded = false;
    }
  }

  async afterSave(media: Media, source: Source): Promise<void> {
    if (media.manual_skip) {
      return;
    }

    if (
      !media.metadata &&
      !media.skip &&
      !(await this.tasks.existsPending('download-metadata', { mediaId: media.id }))
    ) {
      logger.info(`Scheduling task to download metadata for: ${media.key}`, {
        service: 'MediaLifecycleRules',
        operation: 'afterSave',
        mediaId: media.id,
      });
      await this.tasks.enqueue(
        'download-metadata',
        { mediaId: media.id },
        {
          priority: JOB_PRIORITY.NORMAL,
          replaceExisting: true,
          verboseName: `Downloading metadata for "${media.id}"`,
        }
      );
    }

    const thumbnailUrl = resolveThumbnailUrl(media.metadata);
    if (!media.thumb && !media.skip && thumbnailUrl) {
      logger.info(`Scheduling task to download thumbnail for: ${media.key}`, {
        service: 'MediaLifecycleRules',
        operation: 'afterSave',
        mediaId: media.id,
        thumbnailUrl,
      });
      await this.tasks.enqueue(
        'download-thumbnail',
        { mediaId: media.id, thumbnailUrl },
        {
          priority: JOB_PRIORITY.THUMBNAIL,
          queue: String(source.id),
          replaceExisting: true,
          verboseName: `Downloading thumbnail for "${media.title ?? media.key}"`,
        }
      );
    }

    if (!media.downloaded && media.can_download && !media.skip && source.download_media) {
      await this.tasks.cancel('download-media', { mediaId: media.id });
      await this.tasks.enqueue(
        'download-media',
        { mediaId: media.id },
        {
          priority: JOB_PRIORITY.DOWNLOAD,
          queue: String(source.id),
          replaceExisting: true,
          verboseName: `Downloading media for "${media.title ?? media.key}"`,
        }
      );
    }
  }

  async beforeDelete(media: Media, source: Source): Promise<void> {
    logger.info(`Deleting tasks for media: ${media.key}`, {
      service: 'MediaLifecycleRules',
      operation: 'beforeDelete',
      mediaId: media.id,
    });

    await this.tasks.cancel('download-media', { mediaId: media.id });

    const thumbnailUrl = resolveThumbnailUrl(media.metadata);
    if (thumbnailUrl) {
      await this.tasks.cancel('download-thumbnail', { mediaId: media.id, thumbnailUrl });
    }

    const filePath = media.media_file ?? media.thumb;
    if (source.delete_files_on_disk && filePath) {
      // Everything sharing the file's stem: video, thumbnail, subtitles, info files
      for (const file of await this.files.listFilesMatching(fileStem(filePath))) {
        logger.info(`Deleting file for: ${media.key} path: ${file}`, {
          service: 'MediaLifecycleRules',
          operation: 'beforeDelete',
          mediaId: media.id,
        });
        await this.files.deleteFile(file);
      }
    }
  }

  /**
   * Every media server is asked to rescan after any deletion
   */
  async afterDelete(): Promise<void> {
    for (const server of await this.mediaServers.getAll()) {
      logger.info('Scheduling media server updates', {
        service: 'MediaLifecycleRules',
        operation: 'afterDelete',
        serverId: server.id,
      });
      await this.tasks.enqueue(
        'rescan-media-server',
        { serverId: server.id },
        {
          priority: JOB_PRIORITY.BOOKKEEPING,
          replaceExisting: true,
          verboseName: `Request media server rescan for "${server.server_type} ${server.host}:${server.port}"`,
        }
      );
    }
  }
}
