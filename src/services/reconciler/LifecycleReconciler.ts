import { LifecycleEventBus } from '../lifecycle/LifecycleEventBus.js';
import { JobQueueService } from '../jobQueue/JobQueueService.js';
import { SourceService } from '../sources/sourceService.js';
import { MediaService } from '../media/mediaService.js';
import { MediaServerService } from '../mediaServers/mediaServerService.js';
import { IMediaFileStore } from '../files/MediaFileStore.js';
import { FilterEngine } from '../filtering/FilterEngine.js';
import { FormatSelector } from '../filtering/FormatSelector.js';
import { ReconcilerConfig } from '../../config/types.js';
import { SourceLifecycleRules } from './SourceLifecycleRules.js';
import { MediaLifecycleRules } from './MediaLifecycleRules.js';
import { FailureEscalationRules } from './FailureEscalationRules.js';

export interface ReconcilerDependencies {
  events: LifecycleEventBus;
  jobQueue: JobQueueService;
  sources: SourceService;
  media: MediaService;
  mediaServers: MediaServerService;
  files: IMediaFileStore;
  filter: FilterEngine;
  formats: FormatSelector;
  config: ReconcilerConfig;
}

/**
 * Lifecycle Reconciler
 *
 * Registers the source, media and failure escalation rules on the lifecycle
 * bus and the job queue.
 */
export class LifecycleReconciler {
  readonly sourceRules: SourceLifecycleRules;
  readonly mediaRules: MediaLifecycleRules;
  readonly escalation: FailureEscalationRules;

  constructor(deps: ReconcilerDependencies) {
    this.sourceRules = new SourceLifecycleRules(deps.jobQueue, deps.media);
    this.mediaRules = new MediaLifecycleRules(deps.jobQueue, deps.files, deps.filter, deps.formats, deps.mediaServers);
    this.escalation = new FailureEscalationRules(
      { sources: deps.sources, media: deps.media },
      deps.config.escalateMediaFailures
    );

    this.sourceRules.register(deps.events);
    this.mediaRules.register(deps.events);
    deps.jobQueue.onPermanentFailure(job => this.escalation.onPermanentFailure(job));
  }
}
