import { DatabaseManager } from '../../database/DatabaseManager.js';
import { MediaServer, MediaServerOptions, MediaServerType } from '../../types/models.js';
import { logger } from '../../utils/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { assignDefined } from '../../utils/objects.js';
import { DatabaseError, ResourceNotFoundError } from '../../errors/index.js';
import { validateInput } from '../../validation/validate.js';
import {
  CreateMediaServerInput,
  UpdateMediaServerInput,
  createMediaServerSchema,
  mediaServerOptionsSchema,
  updateMediaServerSchema,
} from '../../validation/mediaServerSchemas.js';

interface MediaServerRow {
  id: number;
  server_type: MediaServerType;
  host: string;
  port: number;
  use_https: number;
  verify_https: number;
  options: string;
  created_at: string;
}

const UPDATABLE_FIELDS = ['server_type', 'host', 'port', 'use_https', 'verify_https', 'options'] as const;

export class MediaServerService {
  constructor(private readonly dbManager: DatabaseManager) {}

  async getAll(): Promise<MediaServer[]> {
    const db = this.dbManager.getConnection();
    const rows = await db.query<MediaServerRow>('SELECT * FROM media_servers ORDER BY id ASC');
    return rows.map(row => this.mapRowToServer(row));
  }

  async getById(id: number): Promise<MediaServer | null> {
    const db = this.dbManager.getConnection();
    const row = await db.get<MediaServerRow>('SELECT * FROM media_servers WHERE id = ?', [id]);
    return row ? this.mapRowToServer(row) : null;
  }

  async create(input: CreateMediaServerInput): Promise<MediaServer> {
    const data = validateInput(createMediaServerSchema, input, 'MediaServer');
    const db = this.dbManager.getConnection();

    const result = await db.execute(
      `INSERT INTO media_servers (server_type, host, port, use_https, verify_https, options)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        data.server_type,
        data.host,
        data.port,
        data.use_https ? 1 : 0,
        data.verify_https ? 1 : 0,
        JSON.stringify(data.options),
      ]
    );

    if (!result.insertId) {
      throw new DatabaseError('Failed to create media server: no insert ID', undefined, false, {
        service: 'MediaServerService',
        operation: 'create',
      });
    }

    logger.info(`Created media server: ${data.server_type} ${data.host}:${data.port}`, {
      service: 'MediaServerService',
      operation: 'create',
      serverId: result.insertId,
    });

    return this.requireById(result.insertId);
  }

  async update(id: number, changes: UpdateMediaServerInput): Promise<MediaServer> {
    const validated = validateInput(updateMediaServerSchema, changes, 'MediaServer');
    const next = assignDefined({ ...(await this.requireById(id)) }, validated, UPDATABLE_FIELDS);

    const db = this.dbManager.getConnection();
    await db.execute(
      `UPDATE media_servers
       SET server_type = ?, host = ?, port = ?, use_https = ?, verify_https = ?, options = ?
       WHERE id = ?`,
      [
        next.server_type,
        next.host,
        next.port,
        next.use_https ? 1 : 0,
        next.verify_https ? 1 : 0,
        JSON.stringify(next.options),
        id,
      ]
    );

    return this.requireById(id);
  }

  async delete(id: number): Promise<void> {
    const db = this.dbManager.getConnection();
    const result = await db.execute('DELETE FROM media_servers WHERE id = ?', [id]);
    if (result.affectedRows === 0) {
      throw new ResourceNotFoundError('MediaServer', id);
    }
    logger.info('Deleted media server', {
      service: 'MediaServerService',
      operation: 'delete',
      serverId: id,
    });
  }

  private async requireById(id: number): Promise<MediaServer> {
    const server = await this.getById(id);
    if (!server) {
      throw new ResourceNotFoundError('MediaServer', id);
    }
    return server;
  }

  private parseOptions(row: MediaServerRow): MediaServerOptions {
    try {
      const parsed = mediaServerOptionsSchema.safeParse(JSON.parse(row.options));
      if (parsed.success) {
        return parsed.data;
      }
    } catch (error) {
      logger.warn('Stored media server options are not valid JSON', {
        service: 'MediaServerService',
        operation: 'parseOptions',
        serverId: row.id,
        error: getErrorMessage(error),
      });
    }
    return { token: '', libraries: '' };
  }

  private mapRowToServer(row: MediaServerRow): MediaServer {
    return {
      id: row.id,
      server_type: row.server_type,
      host: row.host,
      port: row.port,
      use_https: row.use_https === 1,
      verify_https: row.verify_https === 1,
      options: this.parseOptions(row),
      created_at: row.created_at,
    };
  }
}
