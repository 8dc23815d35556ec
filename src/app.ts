import { ConfigManager } from './config/ConfigManager.js';
import { AppConfig } from './config/types.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { MigrationRunner } from './database/MigrationRunner.js';
import { JobQueueService } from './services/jobQueue/JobQueueService.js';
import { SQLiteJobQueueStorage } from './services/jobQueue/storage/SQLiteJobQueueStorage.js';
import { LifecycleEventBus } from './services/lifecycle/LifecycleEventBus.js';
import { SourceService } from './services/sources/sourceService.js';
import { MediaService } from './services/media/mediaService.js';
import { MediaServerService } from './services/mediaServers/mediaServerService.js';
import { createMediaServerClient } from './services/mediaServers/mediaServerClientFactory.js';
import { MediaFileStore } from './services/files/MediaFileStore.js';
import { FilterEngine } from './services/filtering/FilterEngine.js';
import { FormatSelector } from './services/filtering/FormatSelector.js';
import { LifecycleReconciler } from './services/reconciler/LifecycleReconciler.js';
import { registerAllJobHandlers } from './services/jobHandlers/index.js';
import { InvalidStateError } from './errors/index.js';
import { initializeLogger, logger } from './utils/logging.js';
import { getErrorMessage } from './utils/errorHandling.js';

/**
 * Services available once the application has started
 */
export interface AppServices {
  events: LifecycleEventBus;
  jobQueue: JobQueueService;
  sources: SourceService;
  media: MediaService;
  mediaServers: MediaServerService;
  reconciler: LifecycleReconciler;
}

export class App {
  private config: AppConfig;
  private dbManager: DatabaseManager;
  private started: AppServices | null = null;

  constructor(config: AppConfig = ConfigManager.getInstance().getConfig()) {
    this.config = config;
    this.dbManager = new DatabaseManager(this.config.database);
  }

  get services(): AppServices {
    if (!this.started) {
      throw new InvalidStateError('started', 'stopped', 'Application has not been started', {
        service: 'App',
        operation: 'services',
      });
    }
    return this.started;
  }

  public async start(): Promise<void> {
    initializeLogger(this.config.logging);

    // Connect to database
    await this.dbManager.connect();
    logger.info('Database connected successfully');

    // Run migrations
    const migrationRunner = new MigrationRunner(this.dbManager.getConnection());
    await migrationRunner.migrate();
    logger.info('Database migrations completed');

    // Initialize job queue service with modular storage
    const jobQueueStorage = new SQLiteJobQueueStorage(this.dbManager.getConnection());
    const jobQueue = new JobQueueService(jobQueueStorage, this.config.jobs);
    await jobQueue.initialize();
    logger.info('Job queue initialized (crash recovery complete)');

    // Entity services raise lifecycle events on a shared bus
    const events = new LifecycleEventBus();
    const sources = new SourceService(this.dbManager, events);
    const media = new MediaService(this.dbManager, events, sources);
    const mediaServers = new MediaServerService(this.dbManager);
    const files = new MediaFileStore();

    const reconciler = new LifecycleReconciler({
      events,
      jobQueue,
      sources,
      media,
      mediaServers,
      files,
      filter: new FilterEngine(),
      formats: new FormatSelector(),
      config: this.config.reconciler,
    });
    logger.info('Lifecycle reconciler registered', {
      escalateMediaFailures: this.config.reconciler.escalateMediaFailures,
    });

    registerAllJobHandlers(jobQueue, {
      sources,
      media,
      mediaServers,
      files,
      createMediaServerClient: server => createMediaServerClient(server),
      downloadRoot: this.config.storage.downloadRoot,
    });
    logger.info('Job handlers registered');

    jobQueue.start();
    logger.info('Job queue service started');

    this.started = { events, jobQueue, sources, media, mediaServers, reconciler };
  }

  public async stop(): Promise<void> {
    try {
      if (this.started) {
        await this.started.jobQueue.stop();
        logger.info('Job queue service stopped');
        this.started = null;
      }

      await this.dbManager.disconnect();
      logger.info('Stopped gracefully');
    } catch (error) {
      logger.error('Error during shutdown', { error: getErrorMessage(error) });
      throw error;
    }
  }
}
