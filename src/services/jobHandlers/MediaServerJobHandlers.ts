import { Job } from '../jobQueue/types.js';
import { JobQueueService } from '../jobQueue/JobQueueService.js';
import { MediaServerService } from '../mediaServers/mediaServerService.js';
import { MediaServerClientFactory } from '../mediaServers/mediaServerClientFactory.js';
import { logger } from '../../utils/logging.js';

/**
 * MediaServerJobHandlers
 *
 * Handles rescan-media-server: asks a Plex or Jellyfin server to refresh
 * its libraries after media was removed.
 */
export class MediaServerJobHandlers {
  constructor(
    private readonly mediaServers: MediaServerService,
    private readonly createClient: MediaServerClientFactory
  ) {}

  registerHandlers(jobQueue: JobQueueService): void {
    jobQueue.registerHandler('rescan-media-server', this.handleRescanMediaServer.bind(this));
  }

  private async handleRescanMediaServer(job: Job<'rescan-media-server'>): Promise<void> {
    const { serverId } = job.payload;
    const server = await this.mediaServers.getById(serverId);

    // Server removed after the rescan was queued
    if (!server) {
      logger.info('[MediaServerJobHandlers] Media server no longer exists, skipping rescan', {
        service: 'MediaServerJobHandlers',
        handler: 'handleRescanMediaServer',
        serverId,
      });
      return;
    }

    await this.createClient(server).rescan();
  }
}
