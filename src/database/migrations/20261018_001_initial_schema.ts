import { DatabaseConnection, MigrationInterface } from '../../types/database.js';

/**
 * Initial schema
 *
 * Sources own media through a plain (non-cascading) foreign key: removing a
 * source that still has media fails at the storage layer, so owned media can
 * only disappear through the media delete path and its lifecycle events.
 */
export const InitialSchemaMigration: MigrationInterface = {
  version: '20261018_001',
  migrationName: 'initial_schema',

  async up(db: DatabaseConnection): Promise<void> {
    await db.execute(`
      CREATE TABLE sources (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        key TEXT NOT NULL,
        source_type TEXT NOT NULL CHECK(source_type IN ('channel', 'channel-id', 'playlist')),
        directory TEXT NOT NULL,
        index_schedule INTEGER NOT NULL DEFAULT 86400,
        copy_channel_images INTEGER NOT NULL DEFAULT 0,
        download_media INTEGER NOT NULL DEFAULT 1,
        delete_files_on_disk INTEGER NOT NULL DEFAULT 0,
        has_failed INTEGER NOT NULL DEFAULT 0,
        filter_text TEXT NOT NULL DEFAULT '',
        filter_text_invert INTEGER NOT NULL DEFAULT 0,
        filter_seconds INTEGER,
        filter_seconds_min INTEGER NOT NULL DEFAULT 1,
        download_cap INTEGER NOT NULL DEFAULT 0,
        source_resolution TEXT NOT NULL DEFAULT '1080p',
        source_vcodec TEXT NOT NULL DEFAULT 'VP9',
        source_acodec TEXT NOT NULL DEFAULT 'OPUS',
        prefer_60fps INTEGER NOT NULL DEFAULT 1,
        fallback TEXT NOT NULL DEFAULT 'next-best',
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.execute(`
      CREATE TABLE media (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        source_id INTEGER NOT NULL,
        key TEXT NOT NULL,
        title TEXT,
        published TEXT,
        metadata TEXT,
        skip INTEGER NOT NULL DEFAULT 0,
        manual_skip INTEGER NOT NULL DEFAULT 0,
        can_download INTEGER NOT NULL DEFAULT 0,
        downloaded INTEGER NOT NULL DEFAULT 0,
        downloaded_format TEXT,
        media_file TEXT,
        thumb TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        FOREIGN KEY (source_id) REFERENCES sources(id),
        UNIQUE (source_id, key)
      )
    `);

    await db.execute('CREATE INDEX idx_media_source ON media(source_id)');

    await db.execute(`
      CREATE TABLE media_servers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        server_type TEXT NOT NULL CHECK(server_type IN ('plex', 'jellyfin')),
        host TEXT NOT NULL,
        port INTEGER NOT NULL,
        use_https INTEGER NOT NULL DEFAULT 0,
        verify_https INTEGER NOT NULL DEFAULT 1,
        options TEXT NOT NULL DEFAULT '{}',
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (host, port)
      )
    `);

    // run_at is epoch milliseconds so due jobs can be compared numerically.
    // A null queue means the job belongs to no partition.
    await db.execute(`
      CREATE TABLE job_queue (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        type TEXT NOT NULL,
        task_key TEXT NOT NULL,
        queue TEXT,
        priority INTEGER NOT NULL DEFAULT 5,
        status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'processing')),
        payload TEXT NOT NULL,
        verbose_name TEXT,
        error TEXT,
        retry_count INTEGER NOT NULL DEFAULT 0,
        max_retries INTEGER NOT NULL DEFAULT 3,
        repeat_seconds INTEGER NOT NULL DEFAULT 0,
        run_at INTEGER NOT NULL,
        started_at TIMESTAMP,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.execute('CREATE INDEX idx_jobs_key ON job_queue(type, task_key)');
    await db.execute('CREATE INDEX idx_jobs_pickup ON job_queue(status, priority, id)');
    await db.execute('CREATE INDEX idx_jobs_queue ON job_queue(queue, status)');
  },

  async down(db: DatabaseConnection): Promise<void> {
    await db.execute('DROP TABLE IF EXISTS job_queue');
    await db.execute('DROP TABLE IF EXISTS media_servers');
    await db.execute('DROP TABLE IF EXISTS media');
    await db.execute('DROP TABLE IF EXISTS sources');
  },
};
