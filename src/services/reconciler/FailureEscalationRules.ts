import { Job, MediaJobType } from '../jobQueue/types.js';
import { Media, Source } from '../../types/models.js';
import { JobTargetLookups, decodeJobTarget } from './jobTarget.js';
import { logger } from '../../utils/logging.js';

export interface EscalationTargets extends JobTargetLookups {
  sources: JobTargetLookups['sources'] & {
    markFailed(id: number): Promise<Source>;
  };
  media: JobTargetLookups['media'] & {
    markSkipped(id: number): Promise<Media>;
  };
}

/**
 * Failure Escalation Rules
 *
 * Turns a job that used up its retries into a persisted flag on the entity
 * it was working on: sources are marked failed, media items are skipped
 * for the configured job kinds.
 */
export class FailureEscalationRules {
  private readonly escalateMediaFailures: ReadonlySet<MediaJobType>;

  constructor(
    private readonly targets: EscalationTargets,
    escalateMediaFailures: readonly MediaJobType[]
  ) {
    this.escalateMediaFailures = new Set(escalateMediaFailures);
  }

  async onPermanentFailure(job: Job): Promise<void> {
    const target = await decodeJobTarget(job, this.targets);

    switch (target.kind) {
      case 'source':
        if (target.source.has_failed) {
          logger.warn(`Source already marked failed: ${target.source.name} task: ${job.type}`, {
            service: 'FailureEscalationRules',
            operation: 'onPermanentFailure',
            jobId: job.id,
            sourceId: target.source.id,
          });
          return;
        }
        logger.error(`Permanent failure for source: ${target.source.name} task: ${job.type}`, {
          service: 'FailureEscalationRules',
          operation: 'onPermanentFailure',
          jobId: job.id,
          sourceId: target.source.id,
        });
        await this.targets.sources.markFailed(target.source.id);
        return;

      case 'media':
        if (!this.escalateMediaFailures.has(target.jobType)) {
          logger.warn(`Media task failed permanently, not escalated: ${job.type}`, {
            service: 'FailureEscalationRules',
            operation: 'onPermanentFailure',
            jobId: job.id,
            mediaId: target.media.id,
          });
          return;
        }
        logger.error(`Permanent failure for media: ${target.media.key} task: ${job.type}`, {
          service: 'FailureEscalationRules',
          operation: 'onPermanentFailure',
          jobId: job.id,
          mediaId: target.media.id,
        });
        await this.targets.media.markSkipped(target.media.id);
        return;

      case 'unknown':
        logger.warn(`Permanent failure with no entity to flag: ${target.reason}`, {
          service: 'FailureEscalationRules',
          operation: 'onPermanentFailure',
          jobId: job.id,
          type: job.type,
        });
        return;
    }
  }
}
