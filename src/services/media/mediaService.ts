import { DatabaseManager } from '../../database/DatabaseManager.js';
import { Media, MediaDraft } from '../../types/models.js';
import { MediaMetadata, mediaMetadataSchema, parseUploadDate } from '../../types/metadata.js';
import { LifecycleEventBus } from '../lifecycle/LifecycleEventBus.js';
import { SourceService } from '../sources/sourceService.js';
import { logger } from '../../utils/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { assignDefined } from '../../utils/objects.js';
import { DatabaseError, ResourceNotFoundError } from '../../errors/index.js';
import { SqlParam } from '../../types/database.js';
import { validateInput } from '../../validation/validate.js';
import {
  CreateMediaInput,
  UpdateMediaInput,
  createMediaSchema,
  updateMediaSchema,
} from '../../validation/mediaSchemas.js';

interface MediaRow {
  id: number;
  source_id: number;
  key: string;
  title: string | null;
  published: string | null;
  metadata: string | null;
  skip: number;
  manual_skip: number;
  can_download: number;
  downloaded: number;
  downloaded_format: string | null;
  media_file: string | null;
  thumb: string | null;
  created_at: string;
  updated_at: string;
}

const WRITABLE_COLUMNS = [
  'source_id',
  'key',
  'title',
  'published',
  'metadata',
  'skip',
  'manual_skip',
  'can_download',
  'downloaded',
  'downloaded_format',
  'media_file',
  'thumb',
] as const satisfies ReadonlyArray<keyof MediaDraft>;

const UPDATABLE_FIELDS = [
  'metadata',
  'manual_skip',
  'skip',
  'downloaded',
  'downloaded_format',
  'media_file',
  'thumb',
] as const satisfies ReadonlyArray<keyof MediaDraft>;

type UpdatableField = (typeof UPDATABLE_FIELDS)[number];

export interface MediaSaveOptions {
  /**
   * Apply the source's capture rules to this save (default true)
   */
  refilter?: boolean;
}

/**
 * Media Service
 *
 * Every save is computed once and written once: the draft passes through
 * the media:before-save handlers, the row is written, then
 * media:after-create or media:after-update is raised. A handler that throws
 * aborts the save before anything is written.
 *
 * Saves and deletes of one item run one at a time, from the read of the
 * stored row until their after-events have run.
 */
export class MediaService {
  private readonly locks = new Map<number, Promise<void>>();

  constructor(
    private readonly dbManager: DatabaseManager,
    private readonly events: LifecycleEventBus,
    private readonly sources: SourceService
  ) {}

  async getById(id: number): Promise<Media | null> {
    const db = this.dbManager.getConnection();
    const row = await db.get<MediaRow>('SELECT * FROM media WHERE id = ?', [id]);
    return row ? this.mapRowToMedia(row) : null;
  }

  async requireById(id: number): Promise<Media> {
    const media = await this.getById(id);
    if (!media) {
      throw new ResourceNotFoundError('Media', id);
    }
    return media;
  }

  async getBySource(sourceId: number): Promise<Media[]> {
    const db = this.dbManager.getConnection();
    const rows = await db.query<MediaRow>('SELECT * FROM media WHERE source_id = ? ORDER BY id ASC', [
      sourceId,
    ]);
    return rows.map(row => this.mapRowToMedia(row));
  }

  async create(input: CreateMediaInput): Promise<Media> {
    const data = validateInput(createMediaSchema, input, 'Media');
    const source = await this.sources.requireById(data.source_id);

    const draft = this.withDerivedFields({
      source_id: data.source_id,
      key: data.key,
      title: null,
      published: null,
      metadata: data.metadata,
      skip: data.skip,
      manual_skip: data.manual_skip,
      can_download: false,
      downloaded: false,
      downloaded_format: null,
      media_file: data.media_file,
      thumb: data.thumb,
    });

    await this.events.emit('media:before-save', { draft, source, created: true, refilter: true });

    const db = this.dbManager.getConnection();
    const result = await db.execute(
      `INSERT INTO media (${WRITABLE_COLUMNS.join(', ')})
       VALUES (${WRITABLE_COLUMNS.map(() => '?').join(', ')})`,
      this.toParams(draft)
    );

    if (!result.insertId) {
      throw new DatabaseError('Failed to create media: no insert ID', undefined, false, {
        service: 'MediaService',
        operation: 'create',
      });
    }

    const media = await this.requireById(result.insertId);

    logger.info(`Created media: ${media.key}`, {
      service: 'MediaService',
      operation: 'create',
      mediaId: media.id,
      sourceId: source.id,
      skip: media.skip,
      canDownload: media.can_download,
    });

    await this.events.emit('media:after-create', { media, source });
    return media;
  }

  async update(id: number, changes: UpdateMediaInput, options: MediaSaveOptions = {}): Promise<Media> {
    const validated = validateInput(updateMediaSchema, changes, 'Media');
    return this.withItemLock(id, () => this.applyUpdate(id, validated, options));
  }

  private async applyUpdate(
    id: number,
    validated: Partial<Pick<MediaDraft, UpdatableField>>,
    options: MediaSaveOptions
  ): Promise<Media> {
    const current = await this.requireById(id);
    const source = await this.sources.requireById(current.source_id);

    const draft = this.withDerivedFields(
      assignDefined<MediaDraft, UpdatableField>(this.toDraft(current), validated, UPDATABLE_FIELDS)
    );

    await this.events.emit('media:before-save', {
      draft,
      source,
      created: false,
      refilter: options.refilter ?? true,
    });

    const db = this.dbManager.getConnection();
    const result = await db.execute(
      `UPDATE media
       SET ${WRITABLE_COLUMNS.map(column => `${column} = ?`).join(', ')}, updated_at = CURRENT_TIMESTAMP
       WHERE id = ?`,
      [...this.toParams(draft), id]
    );

    if (result.affectedRows === 0) {
      throw new ResourceNotFoundError('Media', id);
    }

    const media = await this.requireById(id);

    logger.debug('Updated media', {
      service: 'MediaService',
      operation: 'update',
      mediaId: id,
      skip: media.skip,
      canDownload: media.can_download,
      downloaded: media.downloaded,
    });

    await this.events.emit('media:after-update', { media, source });
    return media;
  }

  /**
   * Save without changes, re-deriving every flag
   */
  async save(id: number): Promise<Media> {
    return this.update(id, {});
  }

  /**
   * Set skip without letting the capture rules reconsider it in the same save
   */
  async markSkipped(id: number): Promise<Media> {
    return this.update(id, { skip: true }, { refilter: false });
  }

  async delete(id: number): Promise<void> {
    await this.withItemLock(id, () => this.applyDelete(id));
  }

  private async applyDelete(id: number): Promise<void> {
    const media = await this.requireById(id);
    const source = await this.sources.requireById(media.source_id);

    await this.events.emit('media:before-delete', { media, source });

    const db = this.dbManager.getConnection();
    await db.execute('DELETE FROM media WHERE id = ?', [id]);

    logger.info(`Deleted media: ${media.key}`, {
      service: 'MediaService',
      operation: 'delete',
      mediaId: id,
      sourceId: source.id,
    });

    await this.events.emit('media:after-delete', { media, source });
  }

  private withItemLock<T>(id: number, work: () => Promise<T>): Promise<T> {
    const run = (this.locks.get(id) ?? Promise.resolve()).then(work);
    const settled: Promise<void> = run.then(
      () => undefined,
      () => undefined
    ).then(() => {
      if (this.locks.get(id) === settled) {
        this.locks.delete(id);
      }
    });
    this.locks.set(id, settled);
    return run;
  }

  private withDerivedFields(draft: MediaDraft): MediaDraft {
    const published = parseUploadDate(draft.metadata);
    return {
      ...draft,
      title: draft.metadata?.title ?? draft.title,
      published: published ? published.toISOString().slice(0, 10) : draft.published,
    };
  }

  private toDraft(media: Media): MediaDraft {
    return {
      source_id: media.source_id,
      key: media.key,
      title: media.title,
      published: media.published,
      metadata: media.metadata,
      skip: media.skip,
      manual_skip: media.manual_skip,
      can_download: media.can_download,
      downloaded: media.downloaded,
      downloaded_format: media.downloaded_format,
      media_file: media.media_file,
      thumb: media.thumb,
    };
  }

  private toParams(draft: MediaDraft): SqlParam[] {
    return WRITABLE_COLUMNS.map((column): SqlParam => {
      if (column === 'metadata') {
        return draft.metadata ? JSON.stringify(draft.metadata) : null;
      }
      const value = draft[column];
      return typeof value === 'boolean' ? (value ? 1 : 0) : value;
    });
  }

  private parseMetadata(row: MediaRow): MediaMetadata | null {
    if (!row.metadata) {
      return null;
    }

    try {
      const parsed = mediaMetadataSchema.safeParse(JSON.parse(row.metadata));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn('Stored media metadata failed validation, treating as absent', {
        service: 'MediaService',
        operation: 'parseMetadata',
        mediaId: row.id,
        issues: parsed.error.issues.length,
      });
    } catch (error) {
      logger.warn('Stored media metadata is not valid JSON, treating as absent', {
        service: 'MediaService',
        operation: 'parseMetadata',
        mediaId: row.id,
        error: getErrorMessage(error),
      });
    }
    return null;
  }

  private mapRowToMedia(row: MediaRow): Media {
    return {
      id: row.id,
      source_id: row.source_id,
      key: row.key,
      title: row.title,
      published: row.published,
      metadata: this.parseMetadata(row),
      skip: row.skip === 1,
      manual_skip: row.manual_skip === 1,
      can_download: row.can_download === 1,
      downloaded: row.downloaded === 1,
      downloaded_format: row.downloaded_format,
      media_file: row.media_file,
      thumb: row.thumb,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }
}
