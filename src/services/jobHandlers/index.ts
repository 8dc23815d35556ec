/**
 * Job Handlers Registry
 *
 * Wires the bookkeeping handlers into the job queue. Content jobs (indexing,
 * metadata, thumbnails, media and channel image downloads) are registered by
 * whoever embeds the queue; until then those jobs fail and go through the
 * normal retry and escalation path.
 */

import { JobQueueService } from '../jobQueue/JobQueueService.js';
import { SourceService } from '../sources/sourceService.js';
import { MediaService } from '../media/mediaService.js';
import { MediaServerService } from '../mediaServers/mediaServerService.js';
import { IMediaFileStore } from '../files/MediaFileStore.js';
import { MediaServerClientFactory } from '../mediaServers/mediaServerClientFactory.js';
import { SourceJobHandlers } from './SourceJobHandlers.js';
import { MediaServerJobHandlers } from './MediaServerJobHandlers.js';

export interface HandlerDependencies {
  sources: SourceService;
  media: MediaService;
  mediaServers: MediaServerService;
  files: IMediaFileStore;
  createMediaServerClient: MediaServerClientFactory;
  downloadRoot: string;
}

export function registerAllJobHandlers(jobQueue: JobQueueService, deps: HandlerDependencies): void {
  new SourceJobHandlers(deps.sources, deps.media, deps.files, deps.downloadRoot).registerHandlers(jobQueue);
  new MediaServerJobHandlers(deps.mediaServers, deps.createMediaServerClient).registerHandlers(jobQueue);
}

export { SourceJobHandlers, MediaServerJobHandlers };
