import { DatabaseManager } from '../../database/DatabaseManager.js';
import { Source, SourceType, SourceResolution, VideoCodec, AudioCodec, FormatFallback } from '../../types/models.js';
import { LifecycleEventBus } from '../lifecycle/LifecycleEventBus.js';
import { logger } from '../../utils/logging.js';
import { DatabaseError, ResourceNotFoundError } from '../../errors/index.js';
import { validateInput } from '../../validation/validate.js';
import {
  CreateSourceInput,
  UpdateSourceInput,
  createSourceSchema,
  updateSourceSchema,
} from '../../validation/sourceSchemas.js';
import { SqlParam } from '../../types/database.js';
import { assignDefined } from '../../utils/objects.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export interface SourceRow {
  id: number;
  name: string;
  key: string;
  source_type: SourceType;
  directory: string;
  index_schedule: number;
  copy_channel_images: number;
  download_media: number;
  delete_files_on_disk: number;
  has_failed: number;
  filter_text: string;
  filter_text_invert: number;
  filter_seconds: number | null;
  filter_seconds_min: number;
  download_cap: number;
  source_resolution: SourceResolution;
  source_vcodec: VideoCodec;
  source_acodec: AudioCodec;
  prefer_60fps: number;
  fallback: FormatFallback;
  created_at: string;
  updated_at: string;
}

// Columns written on insert and update, in statement order
const WRITABLE_COLUMNS = [
  'name',
  'key',
  'source_type',
  'directory',
  'index_schedule',
  'copy_channel_images',
  'download_media',
  'delete_files_on_disk',
  'has_failed',
  'filter_text',
  'filter_text_invert',
  'filter_seconds',
  'filter_seconds_min',
  'download_cap',
  'source_resolution',
  'source_vcodec',
  'source_acodec',
  'prefer_60fps',
  'fallback',
] as const satisfies ReadonlyArray<keyof Source>;

type WritableColumn = (typeof WRITABLE_COLUMNS)[number];
type WritableSource = Pick<Source, WritableColumn>;

export interface SourceSaveOptions {
  /**
   * Queue a re-check of every owned media item after the save (default true)
   */
  resave?: boolean;
}

/**
 * Source Service
 *
 * Persistence for sources. Every mutation raises its lifecycle events on the
 * bus and resolves only after the handlers ran.
 */
export class SourceService {
  constructor(
    private readonly dbManager: DatabaseManager,
    private readonly events: LifecycleEventBus
  ) {}

  async getAll(): Promise<Source[]> {
    const db = this.dbManager.getConnection();
    const rows = await db.query<SourceRow>('SELECT * FROM sources ORDER BY name ASC');
    return rows.map(row => this.mapRowToSource(row));
  }

  async getById(id: number): Promise<Source | null> {
    const db = this.dbManager.getConnection();
    const row = await db.get<SourceRow>('SELECT * FROM sources WHERE id = ?', [id]);
    return row ? this.mapRowToSource(row) : null;
  }

  async requireById(id: number): Promise<Source> {
    const source = await this.getById(id);
    if (!source) {
      throw new ResourceNotFoundError('Source', id);
    }
    return source;
  }

  /**
   * Create a source
   * Raises source:after-create
   */
  async create(input: CreateSourceInput): Promise<Source> {
    const data: WritableSource = { ...validateInput(createSourceSchema, input, 'Source'), has_failed: false };
    const db = this.dbManager.getConnection();

    const result = await db.execute(
      `INSERT INTO sources (${WRITABLE_COLUMNS.join(', ')})
       VALUES (${WRITABLE_COLUMNS.map(() => '?').join(', ')})`,
      this.toParams(data)
    );

    if (!result.insertId) {
      throw new DatabaseError('Failed to create source: no insert ID', undefined, false, {
        service: 'SourceService',
        operation: 'create',
      });
    }

    const source = await this.requireById(result.insertId);

    logger.info(`Created source: ${source.name}`, {
      service: 'SourceService',
      operation: 'create',
      sourceId: source.id,
      sourceType: source.source_type,
    });

    await this.events.emit('source:after-create', { source });
    return source;
  }

  /**
   * Update a source
   * Raises source:before-update with the stored and the new state, then source:after-update.
   * When the write fails, source:before-update runs again from the new state
   * back to whatever is stored, so the job queue follows the row.
   */
  async update(id: number, changes: UpdateSourceInput, options: SourceSaveOptions = {}): Promise<Source> {
    const validated = validateInput(updateSourceSchema, changes, 'Source');
    const previous = await this.requireById(id);
    const next = assignDefined<Source, WritableColumn>({ ...previous }, validated, WRITABLE_COLUMNS);

    await this.events.emit('source:before-update', { previous, next });

    try {
      await this.write(id, next);
    } catch (error) {
      logger.error(`Failed to update source: ${previous.name}`, {
        service: 'SourceService',
        operation: 'update',
        sourceId: id,
        error: getErrorMessage(error),
      });
      const stored = await this.getById(id);
      // A source that is gone keeps no index job
      await this.events.emit('source:before-update', {
        previous: next,
        next: stored ?? { ...next, index_schedule: 0 },
      });
      throw error;
    }

    const source = await this.requireById(id);

    logger.info(`Updated source: ${source.name}`, {
      service: 'SourceService',
      operation: 'update',
      sourceId: id,
      fields: Object.keys(validated),
    });

    await this.events.emit('source:after-update', { source, resave: options.resave ?? true });
    return source;
  }

  /**
   * Flag a source as failed without queueing another re-check of its media
   */
  async markFailed(id: number): Promise<Source> {
    return this.update(id, { has_failed: true }, { resave: false });
  }

  private async write(id: number, next: Source): Promise<void> {
    const db = this.dbManager.getConnection();
    const result = await db.execute(
      `UPDATE sources
       SET ${WRITABLE_COLUMNS.map(column => `${column} = ?`).join(', ')}, updated_at = CURRENT_TIMESTAMP
       WHERE id = ?`,
      [...this.toParams(next), id]
    );

    if (result.affectedRows === 0) {
      throw new ResourceNotFoundError('Source', id);
    }
  }

  /**
   * Delete a source
   * source:before-delete handlers remove the owned media first; the row
   * delete fails while any media still references the source.
   */
  async delete(id: number): Promise<void> {
    const source = await this.requireById(id);

    await this.events.emit('source:before-delete', { source });

    const db = this.dbManager.getConnection();
    await db.execute('DELETE FROM sources WHERE id = ?', [id]);

    logger.info(`Deleted source: ${source.name}`, {
      service: 'SourceService',
      operation: 'delete',
      sourceId: id,
    });

    await this.events.emit('source:after-delete', { source });
  }

  private toParams(data: WritableSource): SqlParam[] {
    return WRITABLE_COLUMNS.map(column => {
      const value = data[column];
      return typeof value === 'boolean' ? (value ? 1 : 0) : value;
    });
  }

  private mapRowToSource(row: SourceRow): Source {
    return {
      id: row.id,
      name: row.name,
      key: row.key,
      source_type: row.source_type,
      directory: row.directory,
      index_schedule: row.index_schedule,
      copy_channel_images: row.copy_channel_images === 1,
      download_media: row.download_media === 1,
      delete_files_on_disk: row.delete_files_on_disk === 1,
      has_failed: row.has_failed === 1,
      filter_text: row.filter_text,
      filter_text_invert: row.filter_text_invert === 1,
      filter_seconds: row.filter_seconds,
      filter_seconds_min: row.filter_seconds_min === 1,
      download_cap: row.download_cap,
      source_resolution: row.source_resolution,
      source_vcodec: row.source_vcodec,
      source_acodec: row.source_acodec,
      prefer_60fps: row.prefer_60fps === 1,
      fallback: row.fallback,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }
}
