import { jest } from '@jest/globals';
import { FailureEscalationRules, EscalationTargets } from '../../src/services/reconciler/FailureEscalationRules.js';
import { decodeJobTarget } from '../../src/services/reconciler/jobTarget.js';
import { Job, JobPayloadMap, JobType, taskKeyFor } from '../../src/services/jobQueue/types.js';
import { Media, Source } from '../../src/types/models.js';
import { makeMedia, makeSource } from '../utils/fixtures.js';

function failedJob<T extends JobType>(type: T, payload: JobPayloadMap[T]): Job<T> {
  return {
    id: 42,
    type,
    task_key: taskKeyFor(type, payload),
    queue: null,
    priority: 5,
    payload,
    status: 'processing',
    verbose_name: null,
    error: 'boom',
    retry_count: 3,
    max_retries: 3,
    repeat_seconds: 0,
    run_at: 0,
    created_at: '2026-10-18 12:00:00',
  };
}

function targets(source: Source | null, media: Media | null) {
  const stored: EscalationTargets = {
    sources: {
      getById: async () => source,
      markFailed: jest.fn(async (id: number) => makeSource({ id, has_failed: true })),
    },
    media: {
      getById: async () => media,
      markSkipped: jest.fn(async (id: number) => makeMedia({ id, skip: true })),
    },
  };
  return stored;
}

describe('decodeJobTarget', () => {
  it('resolves source jobs to their source', async () => {
    const source = makeSource({ id: 3 });

    const target = await decodeJobTarget(failedJob('index-source', { sourceId: 3 }), targets(source, null));

    expect(target).toEqual({ kind: 'source', source });
  });

  it('resolves media jobs to their item and job kind', async () => {
    const media = makeMedia({ id: 7 });

    const target = await decodeJobTarget(
      failedJob('download-thumbnail', { mediaId: 7, thumbnailUrl: 'https://img.test/7.jpg' }),
      targets(null, media)
    );

    expect(target).toEqual({ kind: 'media', media, jobType: 'download-thumbnail' });
  });

  it('resolves jobs whose entity is gone to unknown', async () => {
    const target = await decodeJobTarget(failedJob('download-media', { mediaId: 7 }), targets(null, null));

    expect(target).toEqual({ kind: 'unknown', reason: 'media 7 no longer exists' });
  });

  it('resolves media server jobs to unknown', async () => {
    const target = await decodeJobTarget(failedJob('rescan-media-server', { serverId: 2 }), targets(null, null));

    expect(target).toEqual({ kind: 'unknown', reason: 'job type rescan-media-server targets no source or media' });
  });
});

describe('FailureEscalationRules', () => {
  it('marks the source failed', async () => {
    const lookups = targets(makeSource({ id: 3 }), null);
    const rules = new FailureEscalationRules(lookups, ['download-metadata']);

    await rules.onPermanentFailure(failedJob('check-source-directory', { sourceId: 3 }));

    expect(lookups.sources.markFailed).toHaveBeenCalledWith(3);
  });

  it('does not write a source that is already marked failed', async () => {
    const lookups = targets(makeSource({ id: 3, has_failed: true }), null);
    const rules = new FailureEscalationRules(lookups, ['download-metadata']);

    await rules.onPermanentFailure(failedJob('save-all-media', { sourceId: 3 }));

    expect(lookups.sources.markFailed).not.toHaveBeenCalled();
  });

  it('skips the item after a metadata failure', async () => {
    const lookups = targets(null, makeMedia({ id: 7 }));
    const rules = new FailureEscalationRules(lookups, ['download-metadata']);

    await rules.onPermanentFailure(failedJob('download-metadata', { mediaId: 7 }));

    expect(lookups.media.markSkipped).toHaveBeenCalledWith(7);
  });

  it('leaves the item alone after a download failure unless configured', async () => {
    const lookups = targets(null, makeMedia({ id: 7 }));

    await new FailureEscalationRules(lookups, ['download-metadata']).onPermanentFailure(
      failedJob('download-media', { mediaId: 7 })
    );
    expect(lookups.media.markSkipped).not.toHaveBeenCalled();

    await new FailureEscalationRules(lookups, ['download-metadata', 'download-media']).onPermanentFailure(
      failedJob('download-media', { mediaId: 7 })
    );
    expect(lookups.media.markSkipped).toHaveBeenCalledWith(7);
  });

  it('flags nothing when the entity is gone', async () => {
    const lookups = targets(null, null);

    await new FailureEscalationRules(lookups, ['download-metadata']).onPermanentFailure(
      failedJob('download-metadata', { mediaId: 7 })
    );

    expect(lookups.media.markSkipped).not.toHaveBeenCalled();
    expect(lookups.sources.markFailed).not.toHaveBeenCalled();
  });
});
