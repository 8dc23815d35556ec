import {
  EnqueueOptions,
  IJobQueueStorage,
  ITaskRegistry,
  Job,
  JobFilters,
  JobPayloadMap,
  JobType,
  QueueStats,
  parseJobPayload,
  taskKeyFor,
} from './types.js';
import { JobConfig } from '../../config/types.js';
import { logger } from '../../utils/logging.js';
import { createErrorLogContext, getErrorMessage } from '../../utils/errorHandling.js';

/**
 * Job Queue Service
 *
 * Background job processing with priority-based execution on top of a
 * pluggable storage backend. Doubles as the keyed task registry the
 * lifecycle rules talk to.
 *
 * Priorities (lower first): 0 bookkeeping, 5 index/metadata,
 * 10 thumbnails, 15 media downloads.
 */

export interface JobHandler<T extends JobType = JobType> {
  (job: Job<T>): Promise<void>;
}

/**
 * Called after a job exhausted its retry budget and left the queue
 */
export type PermanentFailureListener = (job: Job) => Promise<void>;

export class JobQueueService implements ITaskRegistry {
  private readonly storage: IJobQueueStorage;
  private readonly config: JobConfig;
  private readonly now: () => number;
  private handlers: Map<JobType, JobHandler> = new Map();
  private failureListeners: PermanentFailureListener[] = [];
  private isProcessing: boolean = false;
  private processingInterval: NodeJS.Timeout | null = null;

  // Worker pool
  private activeWorkers: number = 0;
  private inFlight: Set<Promise<void>> = new Set();

  // Circuit breaker state
  private consecutiveFailures: number = 0;
  private readonly MAX_CONSECUTIVE_FAILURES = 5;
  private circuitBroken: boolean = false;
  private circuitResetTimeout: NodeJS.Timeout | null = null;
  private readonly CIRCUIT_RESET_DELAY_MS = 60000; // 1 minute

  constructor(storage: IJobQueueStorage, config: JobConfig, now: () => number = Date.now) {
    this.storage = storage;
    this.config = config;
    this.now = now;
  }

  /**
   * Initialize job queue
   * - Reset stalled jobs (crash recovery)
   * - Log queue statistics
   */
  async initialize(): Promise<void> {
    const resetCount = await this.storage.resetStalledJobs();

    if (resetCount > 0) {
      logger.warn('[JobQueueService] Recovered stalled jobs from previous run', {
        service: 'JobQueueService',
        operation: 'initialize',
        count: resetCount,
      });
    }

    const stats = await this.storage.getStats();
    logger.info('[JobQueueService] Job queue initialized', {
      service: 'JobQueueService',
      operation: 'initialize',
      ...stats,
    });
  }

  /**
   * Register a job handler
   * The payload is validated against the job type before the handler runs.
   */
  registerHandler<T extends JobType>(type: T, handler: JobHandler<T>): void {
    this.handlers.set(type, (job: Job) =>
      handler({ ...job, type, payload: parseJobPayload(type, job.payload) })
    );
    logger.debug('[JobQueueService] Registered job handler', {
      service: 'JobQueueService',
      operation: 'registerHandler',
      type,
    });
  }

  onPermanentFailure(listener: PermanentFailureListener): void {
    this.failureListeners.push(listener);
  }

  async enqueue<T extends JobType>(
    type: T,
    payload: JobPayloadMap[T],
    options: EnqueueOptions
  ): Promise<number> {
    const taskKey = taskKeyFor(type, payload);
    const jobId = await this.storage.addJob(
      {
        type,
        task_key: taskKey,
        queue: options.queue ?? null,
        priority: options.priority,
        payload,
        verbose_name: options.verboseName ?? null,
        max_retries: this.config.maxRetries,
        repeat_seconds: options.repeatSeconds ?? 0,
        run_at: this.now(),
      },
      { replaceExisting: options.replaceExisting ?? false }
    );

    logger.info('[JobQueueService] Job added to queue', {
      service: 'JobQueueService',
      operation: 'enqueue',
      jobId,
      type,
      taskKey,
      queue: options.queue ?? null,
      priority: options.priority,
      repeatSeconds: options.repeatSeconds ?? 0,
    });

    return jobId;
  }

  async cancel<T extends JobType>(type: T, payload: JobPayloadMap[T]): Promise<number> {
    const taskKey = taskKeyFor(type, payload);
    const removed = await this.storage.cancelJobs(type, taskKey);

    logger.info('[JobQueueService] Cancelled pending jobs', {
      service: 'JobQueueService',
      operation: 'cancel',
      type,
      taskKey,
      removed,
    });

    return removed;
  }

  /**
   * True while a job holding the key is pending or running
   */
  async existsPending<T extends JobType>(type: T, payload: JobPayloadMap[T]): Promise<boolean> {
    const count = await this.storage.countOutstanding(type, taskKeyFor(type, payload));
    return count > 0;
  }

  /**
   * Start processing jobs with worker pool
   */
  start(): void {
    if (this.isProcessing) {
      logger.warn('[JobQueueService] Job queue processor already running', {
        service: 'JobQueueService',
        operation: 'start',
      });
      return;
    }

    this.isProcessing = true;
    this.processingInterval = setInterval(() => {
      if (this.circuitBroken) {
        return;
      }

      while (this.activeWorkers < this.config.workers) {
        this.activeWorkers++;

        const worker: Promise<void> = this.processNextJob()
          .then(() => {
            this.consecutiveFailures = 0;
          })
          .catch((error: unknown) => {
            logger.error('[JobQueueService] Error in job processing loop', {
              service: 'JobQueueService',
              operation: 'processNextJob',
              error: getErrorMessage(error),
            });
            this.handleProcessingLoopError(error);
          })
          .finally(() => {
            this.activeWorkers--;
            this.inFlight.delete(worker);
          });
        this.inFlight.add(worker);
      }
    }, this.config.pollIntervalMs);

    logger.info('[JobQueueService] Job queue processor started', {
      service: 'JobQueueService',
      operation: 'start',
      maxWorkers: this.config.workers,
    });
  }

  /**
   * Stop polling and wait for running jobs to settle
   */
  async stop(): Promise<void> {
    if (!this.isProcessing) {
      return;
    }

    this.isProcessing = false;
    if (this.processingInterval) {
      clearInterval(this.processingInterval);
      this.processingInterval = null;
    }
    if (this.circuitResetTimeout) {
      clearTimeout(this.circuitResetTimeout);
      this.circuitResetTimeout = null;
    }

    await Promise.all(this.inFlight);

    logger.info('[JobQueueService] Job queue processor stopped', {
      service: 'JobQueueService',
      operation: 'stop',
    });
  }

  /**
   * Process next due job in queue
   * @returns false when nothing was due
   */
  async processNextJob(): Promise<boolean> {
    const job = await this.storage.pickNextJob(this.now());

    if (!job) {
      return false;
    }

    const handler = this.handlers.get(job.type);

    if (!handler) {
      logger.error('[JobQueueService] No handler for job type', {
        service: 'JobQueueService',
        operation: 'processNextJob',
        jobId: job.id,
        type: job.type,
      });

      await this.recordFailure(job, `No handler registered for job type: ${job.type}`);
      return true;
    }

    logger.info('[JobQueueService] Processing job', {
      service: 'JobQueueService',
      operation: 'processNextJob',
      jobId: job.id,
      type: job.type,
      taskKey: job.task_key,
      priority: job.priority,
      retryCount: job.retry_count,
    });

    const startTime = Date.now();

    try {
      await handler(job);
    } catch (error) {
      logger.error(
        '[JobQueueService] Job failed',
        createErrorLogContext(error, {
          service: 'JobQueueService',
          operation: 'processNextJob',
          jobId: job.id,
          type: job.type,
          retryCount: job.retry_count,
          maxRetries: job.max_retries,
        })
      );

      await this.recordFailure(job, getErrorMessage(error));
      return true;
    }

    await this.storage.completeJob(job.id, this.now());

    logger.info('[JobQueueService] Job completed', {
      service: 'JobQueueService',
      operation: 'processNextJob',
      jobId: job.id,
      type: job.type,
      duration: `${Date.now() - startTime}ms`,
    });

    return true;
  }

  /**
   * Process due jobs until none is left
   * @returns Count of processed jobs
   */
  async drain(maxJobs: number = 1000): Promise<number> {
    let processed = 0;
    while (processed < maxJobs && (await this.processNextJob())) {
      processed++;
    }
    return processed;
  }

  async getJob(jobId: number): Promise<Job | null> {
    return await this.storage.getJob(jobId);
  }

  async getActiveJobs(filters?: JobFilters): Promise<Job[]> {
    return await this.storage.listJobs(filters);
  }

  async getStats(): Promise<QueueStats> {
    return await this.storage.getStats();
  }

  private async recordFailure(job: Job, message: string): Promise<void> {
    const delays = this.config.retryDelays;
    const delay = delays[Math.min(job.retry_count, delays.length - 1)] ?? 0;
    const outcome = await this.storage.failJob(job.id, message, this.now() + delay);

    if (outcome.status !== 'failed') {
      return;
    }

    for (const listener of this.failureListeners) {
      try {
        await listener(outcome.job);
      } catch (error) {
        logger.error('[JobQueueService] Permanent failure listener failed', {
          service: 'JobQueueService',
          operation: 'recordFailure',
          jobId: outcome.job.id,
          type: outcome.job.type,
          error: getErrorMessage(error),
        });
      }
    }
  }

  /**
   * Handle error in processing loop (circuit breaker)
   */
  private handleProcessingLoopError(error: unknown): void {
    this.consecutiveFailures++;

    logger.error('[JobQueueService] Job processing loop error', {
      service: 'JobQueueService',
      operation: 'handleProcessingLoopError',
      consecutiveFailures: this.consecutiveFailures,
      maxConsecutiveFailures: this.MAX_CONSECUTIVE_FAILURES,
      error: getErrorMessage(error),
    });

    if (this.consecutiveFailures >= this.MAX_CONSECUTIVE_FAILURES && !this.circuitBroken) {
      this.openCircuitBreaker();
    }
  }

  /**
   * Open circuit breaker (stop processing jobs temporarily)
   */
  private openCircuitBreaker(): void {
    this.circuitBroken = true;

    logger.error('[JobQueueService] Circuit breaker OPENED - stopping job processing', {
      service: 'JobQueueService',
      operation: 'openCircuitBreaker',
      consecutiveFailures: this.consecutiveFailures,
      resetDelayMs: this.CIRCUIT_RESET_DELAY_MS,
    });

    if (this.circuitResetTimeout) {
      clearTimeout(this.circuitResetTimeout);
    }

    this.circuitResetTimeout = setTimeout(() => {
      this.resetCircuitBreaker();
    }, this.CIRCUIT_RESET_DELAY_MS);
  }

  /**
   * Reset circuit breaker (allow jobs to process again)
   */
  private resetCircuitBreaker(): void {
    logger.info('[JobQueueService] Circuit breaker RESET - resuming job processing', {
      service: 'JobQueueService',
      operation: 'resetCircuitBreaker',
    });

    this.circuitBroken = false;
    this.consecutiveFailures = 0;
    this.circuitResetTimeout = null;
  }
}
