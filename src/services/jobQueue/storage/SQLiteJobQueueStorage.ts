import { DatabaseConnection, SqlParam } from '../../../types/database.js';
import {
  IJobQueueStorage,
  Job,
  JobFailureOutcome,
  JobFilters,
  JobType,
  NewJob,
  QueueStats,
  jobTypeSchema,
  parseJobPayload,
} from '../types.js';
import { logger } from '../../../utils/logging.js';
import { DatabaseError } from '../../../errors/index.js';

interface JobRow {
  id: number;
  type: string;
  task_key: string;
  queue: string | null;
  priority: number;
  status: string;
  payload: string;
  verbose_name: string | null;
  error: string | null;
  retry_count: number;
  max_retries: number;
  repeat_seconds: number;
  run_at: number;
  created_at: string;
  started_at: string | null;
  updated_at: string;
}

interface StatsRow {
  pending: number | null;
  processing: number | null;
  oldest_pending_age: number | null;
}

function buildJob<T extends JobType>(type: T, row: JobRow): Job<T> {
  return {
    id: row.id,
    type,
    task_key: row.task_key,
    queue: row.queue,
    priority: row.priority,
    payload: parseJobPayload(type, JSON.parse(row.payload)),
    status: row.status === 'processing' ? 'processing' : 'pending',
    verbose_name: row.verbose_name,
    error: row.error,
    retry_count: row.retry_count,
    max_retries: row.max_retries,
    repeat_seconds: row.repeat_seconds,
    run_at: row.run_at,
    created_at: row.created_at,
    started_at: row.started_at,
    updated_at: row.updated_at,
  };
}

function rowToJob(row: JobRow): Job {
  return buildJob(jobTypeSchema.parse(row.type), row);
}

/**
 * SQLite-based job queue storage
 *
 * - Active queue (job_queue table): pending and processing jobs
 * - Mutations run one at a time through an in-process lock, so a
 *   replace-existing enqueue (delete + insert) is never interleaved
 * - Crash recovery: Reset processing jobs on startup
 */
export class SQLiteJobQueueStorage implements IJobQueueStorage {
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly db: DatabaseConnection) {}

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.lock.then(work);
    // The lock only orders work; the caller still receives the rejection
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async addJob(job: NewJob, options: { replaceExisting?: boolean } = {}): Promise<number> {
    const { jobId, replaced } = await this.exclusive(async () => {
      await this.db.beginTransaction();
      try {
        let removed = 0;
        if (options.replaceExisting) {
          const result = await this.db.execute(
            `DELETE FROM job_queue WHERE type = ? AND task_key = ? AND status = 'pending'`,
            [job.type, job.task_key]
          );
          removed = result.affectedRows;
        }

        const result = await this.db.execute(
          `INSERT INTO job_queue (
            type, task_key, queue, priority, payload, status, verbose_name,
            retry_count, max_retries, repeat_seconds, run_at, created_at, updated_at
          ) VALUES (?, ?, ?, ?, ?, 'pending', ?, 0, ?, ?, ?, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)`,
          [
            job.type,
            job.task_key,
            job.queue,
            job.priority,
            JSON.stringify(job.payload),
            job.verbose_name,
            job.max_retries,
            job.repeat_seconds,
            job.run_at,
          ]
        );

        if (result.insertId === undefined) {
          throw new DatabaseError('Job insert returned no id', undefined, false, {
            service: 'SQLiteJobQueueStorage',
            operation: 'addJob',
          });
        }

        await this.db.commit();
        return { jobId: result.insertId, replaced: removed };
      } catch (error) {
        await this.db.rollback();
        throw error;
      }
    });

    logger.debug('[SQLiteJobQueueStorage] Job created', {
      service: 'SQLiteJobQueueStorage',
      operation: 'addJob',
      jobId,
      type: job.type,
      taskKey: job.task_key,
      priority: job.priority,
      replaced,
    });

    return jobId;
  }

  async pickNextJob(now: number): Promise<Job | null> {
    // Atomic UPDATE...RETURNING: a partition with a processing job is skipped
    const rows = await this.exclusive(() =>
      this.db.query<JobRow>(
        `UPDATE job_queue
         SET status = 'processing',
             started_at = CURRENT_TIMESTAMP,
             updated_at = CURRENT_TIMESTAMP
         WHERE id = (
           SELECT j.id FROM job_queue j
           WHERE j.status = 'pending'
             AND j.run_at <= ?
             AND NOT EXISTS (
               SELECT 1 FROM job_queue p
               WHERE p.queue = j.queue AND p.status = 'processing'
             )
           ORDER BY j.priority ASC, j.id ASC
           LIMIT 1
         )
         RETURNING *`,
        [now]
      )
    );

    const row = rows[0];
    if (!row) {
      return null;
    }

    logger.debug('[SQLiteJobQueueStorage] Job picked', {
      service: 'SQLiteJobQueueStorage',
      operation: 'pickNextJob',
      jobId: row.id,
      type: row.type,
      queue: row.queue,
      waitTime: `${Math.max(0, now - row.run_at)}ms`,
    });

    return rowToJob(row);
  }

  async completeJob(jobId: number, now: number): Promise<void> {
    await this.exclusive(async () => {
      const row = await this.db.get<JobRow>('SELECT * FROM job_queue WHERE id = ?', [jobId]);

      if (!row) {
        logger.warn('[SQLiteJobQueueStorage] Job not found for completion', {
          service: 'SQLiteJobQueueStorage',
          operation: 'completeJob',
          jobId,
        });
        return;
      }

      if (row.repeat_seconds > 0) {
        // A replacement enqueued while this run was in flight takes over the key
        const superseded = await this.db.get<{ count: number }>(
          'SELECT COUNT(*) AS count FROM job_queue WHERE type = ? AND task_key = ? AND id != ?',
          [row.type, row.task_key, jobId]
        );

        if (!superseded || superseded.count === 0) {
          const runAt = now + row.repeat_seconds * 1000;
          await this.db.execute(
            `UPDATE job_queue
             SET status = 'pending', run_at = ?, retry_count = 0, error = NULL,
                 started_at = NULL, updated_at = CURRENT_TIMESTAMP
             WHERE id = ?`,
            [runAt, jobId]
          );

          logger.debug('[SQLiteJobQueueStorage] Recurring job rescheduled', {
            service: 'SQLiteJobQueueStorage',
            operation: 'completeJob',
            jobId,
            type: row.type,
            runAt,
          });
          return;
        }
      }

      await this.db.execute('DELETE FROM job_queue WHERE id = ?', [jobId]);
    });
  }

  async failJob(jobId: number, error: string, retryAt: number): Promise<JobFailureOutcome> {
    return this.exclusive(async (): Promise<JobFailureOutcome> => {
      const row = await this.db.get<JobRow>('SELECT * FROM job_queue WHERE id = ?', [jobId]);

      if (!row) {
        logger.warn('[SQLiteJobQueueStorage] Job not found for failure', {
          service: 'SQLiteJobQueueStorage',
          operation: 'failJob',
          jobId,
        });
        return { status: 'missing' };
      }

      const retryCount = row.retry_count + 1;

      if (retryCount < row.max_retries) {
        await this.db.execute(
          `UPDATE job_queue
           SET status = 'pending', retry_count = ?, error = ?, run_at = ?,
               started_at = NULL, updated_at = CURRENT_TIMESTAMP
           WHERE id = ?`,
          [retryCount, error, retryAt, jobId]
        );

        logger.warn('[SQLiteJobQueueStorage] Job failed, will retry', {
          service: 'SQLiteJobQueueStorage',
          operation: 'failJob',
          jobId,
          type: row.type,
          retryCount,
          maxRetries: row.max_retries,
          error,
        });

        return { status: 'retrying', retryCount, runAt: retryAt };
      }

      await this.db.execute('DELETE FROM job_queue WHERE id = ?', [jobId]);

      logger.error('[SQLiteJobQueueStorage] Job permanently failed and removed from queue', {
        service: 'SQLiteJobQueueStorage',
        operation: 'failJob',
        jobId,
        type: row.type,
        taskKey: row.task_key,
        retryCount,
        error,
      });

      return { status: 'failed', job: rowToJob({ ...row, retry_count: retryCount, error }) };
    });
  }

  /**
   * Removes pending rows for the key. A run already in flight is left to
   * finish but loses its repeat, so completeJob deletes it instead of
   * rescheduling it.
   */
  async cancelJobs(type: JobType, taskKey: string): Promise<number> {
    return this.exclusive(async () => {
      const result = await this.db.execute(
        `DELETE FROM job_queue WHERE type = ? AND task_key = ? AND status = 'pending'`,
        [type, taskKey]
      );
      await this.db.execute(
        `UPDATE job_queue SET repeat_seconds = 0, updated_at = CURRENT_TIMESTAMP
         WHERE type = ? AND task_key = ? AND status = 'processing' AND repeat_seconds > 0`,
        [type, taskKey]
      );
      return result.affectedRows;
    });
  }

  async countOutstanding(type: JobType, taskKey: string): Promise<number> {
    const row = await this.db.get<{ count: number }>(
      'SELECT COUNT(*) AS count FROM job_queue WHERE type = ? AND task_key = ?',
      [type, taskKey]
    );
    return row ? row.count : 0;
  }

  async getJob(jobId: number): Promise<Job | null> {
    const row = await this.db.get<JobRow>('SELECT * FROM job_queue WHERE id = ?', [jobId]);
    return row ? rowToJob(row) : null;
  }

  async listJobs(filters?: JobFilters): Promise<Job[]> {
    let query = 'SELECT * FROM job_queue WHERE 1=1';
    const params: SqlParam[] = [];

    if (filters?.type) {
      query += ' AND type = ?';
      params.push(filters.type);
    }

    if (filters?.status) {
      query += ' AND status = ?';
      params.push(filters.status);
    }

    if (filters?.queue) {
      query += ' AND queue = ?';
      params.push(filters.queue);
    }

    query += ' ORDER BY priority ASC, id ASC';

    if (filters?.limit) {
      query += ' LIMIT ?';
      params.push(filters.limit);
    }

    const rows = await this.db.query<JobRow>(query, params);
    return rows.map(rowToJob);
  }

  async resetStalledJobs(): Promise<number> {
    const result = await this.exclusive(() =>
      this.db.execute(
        `UPDATE job_queue
         SET status = 'pending', started_at = NULL, updated_at = CURRENT_TIMESTAMP
         WHERE status = 'processing'`
      )
    );

    const count = result.affectedRows;

    if (count > 0) {
      logger.warn('[SQLiteJobQueueStorage] Reset stalled jobs on startup', {
        service: 'SQLiteJobQueueStorage',
        operation: 'resetStalledJobs',
        count,
      });
    }

    return count;
  }

  async getStats(): Promise<QueueStats> {
    const row = await this.db.get<StatsRow>(
      `SELECT
        SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END) as pending,
        SUM(CASE WHEN status = 'processing' THEN 1 ELSE 0 END) as processing,
        MAX(CASE WHEN status = 'pending'
          THEN (strftime('%s', 'now') - strftime('%s', created_at)) * 1000
          ELSE NULL END) as oldest_pending_age
       FROM job_queue`
    );

    const pending = row?.pending ?? 0;
    const processing = row?.processing ?? 0;

    return {
      pending,
      processing,
      totalActive: pending + processing,
      oldestPendingAge: row?.oldest_pending_age ?? null,
    };
  }
}
