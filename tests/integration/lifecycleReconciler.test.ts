import { jest } from '@jest/globals';
import { SourceJobHandlers } from '../../src/services/jobHandlers/SourceJobHandlers.js';
import { Source } from '../../src/types/models.js';
import { CreateSourceInput } from '../../src/validation/sourceSchemas.js';
import { SchemaValidationError } from '../../src/errors/index.js';
import { FilterEngine } from '../../src/services/filtering/FilterEngine.js';
import { ReconcilerHarness, createReconcilerHarness, downloadableMetadata } from '../utils/reconcilerHarness.js';

const VIDEO = '/downloads/woodworking/birdhouse.mkv';

describe('Lifecycle reconciler', () => {
  let h: ReconcilerHarness;

  async function createSource(overrides: Partial<CreateSourceInput> = {}): Promise<Source> {
    return h.sources.create({
      name: 'Woodworking',
      key: 'UCwoodworking',
      source_type: 'channel',
      directory: 'woodworking',
      index_schedule: 0,
      ...overrides,
    });
  }

  async function jobTypes(): Promise<string[]> {
    return (await h.jobs()).map(job => job.type);
  }

  beforeEach(async () => {
    h = await createReconcilerHarness();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await h.destroy();
  });

  describe('source rules', () => {
    it('queues only the directory check and the media re-check for an unscheduled source', async () => {
      await createSource({ index_schedule: 0, copy_channel_images: false });

      expect(await jobTypes()).toEqual(['check-source-directory', 'save-all-media']);
    });

    it('queues image copying and recurring indexing for a scheduled channel', async () => {
      const source = await createSource({ index_schedule: 86400, copy_channel_images: true });

      const jobs = await h.jobs();
      expect(jobs.map(job => job.type)).toEqual([
        'check-source-directory',
        'copy-channel-images',
        'save-all-media',
        'index-source',
      ]);
      const index = jobs[3];
      expect(index?.queue).toBe(String(source.id));
      expect(index?.repeat_seconds).toBe(86400);
      expect(index?.priority).toBe(5);
    });

    it('does not copy channel images for a playlist', async () => {
      await createSource({ source_type: 'playlist', copy_channel_images: true });

      expect(await jobTypes()).toEqual(['check-source-directory', 'save-all-media']);
    });

    it('replaces the index job when the schedule changes', async () => {
      const source = await createSource({ index_schedule: 0 });

      await h.sources.update(source.id, { index_schedule: 3600 });

      const indexJobs = await h.jobs('index-source');
      expect(indexJobs).toHaveLength(1);
      expect(indexJobs[0]?.repeat_seconds).toBe(3600);
      expect(indexJobs[0]?.queue).toBe(String(source.id));

      await h.sources.update(source.id, { index_schedule: 7200 });

      const rescheduled = await h.jobs('index-source');
      expect(rescheduled.map(job => job.repeat_seconds)).toEqual([7200]);
    });

    it('cancels indexing when the schedule drops to 0', async () => {
      const source = await createSource({ index_schedule: 3600 });

      await h.sources.update(source.id, { index_schedule: 0 });

      expect(await h.jobs('index-source')).toHaveLength(0);
    });

    it('leaves the index job alone when other fields change', async () => {
      const source = await createSource({ index_schedule: 3600 });
      const [before] = await h.jobs('index-source');

      await h.sources.update(source.id, { name: 'Woodworking Weekly' });

      const after = await h.jobs('index-source');
      expect(after.map(job => job.id)).toEqual([before?.id]);
    });

    it('keeps a single pending media re-check across saves', async () => {
      const source = await createSource();

      await h.sources.update(source.id, { filter_text: 'birdhouse' });
      await h.sources.update(source.id, { filter_text: 'shed' });

      expect(await h.jobs('save-all-media')).toHaveLength(1);
    });

    it('does nothing before an update when there is no stored source', async () => {
      const source = await createSource({ index_schedule: 0 });
      const before = await h.jobs();

      await h.reconciler.sourceRules.beforeUpdate(null, { ...source, index_schedule: 3600 });

      expect(await h.jobs()).toEqual(before);
    });

    it('deletes owned media through the media path and cancels indexing', async () => {
      await h.mediaServers.create({ server_type: 'plex', host: 'plex.local', port: 32400, options: { token: 'test-secret' } });
      const source = await createSource({ index_schedule: 3600 });
      const first = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });
      await h.media.create({ source_id: source.id, key: 'vid-2' });

      await h.sources.delete(source.id);

      expect(await h.sources.getById(source.id)).toBeNull();
      expect(await h.media.getById(first.id)).toBeNull();
      expect(await h.jobs('index-source')).toHaveLength(0);
      expect(await h.jobs('download-media')).toHaveLength(0);
      expect(await h.jobs('download-thumbnail')).toHaveLength(0);
      expect((await h.jobs('rescan-media-server')).map(job => job.payload)).toEqual([{ serverId: 1 }]);
    });

    it('restores the index job when the source write fails', async () => {
      const source = await createSource({ index_schedule: 3600 });
      await h.testDb
        .getConnection()
        .execute(`CREATE TRIGGER sources_read_only BEFORE UPDATE ON sources BEGIN SELECT RAISE(ABORT, 'read only'); END`);

      await expect(h.sources.update(source.id, { index_schedule: 60 })).rejects.toThrow();

      expect((await h.jobs('index-source')).map(job => job.repeat_seconds)).toEqual([3600]);
      expect((await h.sources.requireById(source.id)).index_schedule).toBe(3600);
    });

    it('does not reschedule indexing that was disabled while it ran', async () => {
      const source = await createSource({ index_schedule: 3600 });
      new SourceJobHandlers(h.sources, h.media, h.files, '/downloads').registerHandlers(h.jobQueue);
      h.jobQueue.registerHandler('index-source', async job => {
        await h.sources.update(job.payload.sourceId, { index_schedule: 0 });
      });

      expect(await h.jobQueue.drain()).toBe(4);

      expect((await h.sources.requireById(source.id)).index_schedule).toBe(0);
      expect(await h.jobs('index-source')).toHaveLength(0);
    });

    it('does not reschedule indexing for a source deleted while it ran', async () => {
      const source = await createSource({ index_schedule: 3600 });
      new SourceJobHandlers(h.sources, h.media, h.files, '/downloads').registerHandlers(h.jobQueue);
      h.jobQueue.registerHandler('index-source', async job => {
        await h.sources.delete(job.payload.sourceId);
      });

      expect(await h.jobQueue.drain()).toBe(3);

      expect(await h.sources.getById(source.id)).toBeNull();
      expect(await h.jobs()).toHaveLength(0);
    });

    it('rejects a directory outside the download root', async () => {
      await expect(createSource({ directory: '../elsewhere' })).rejects.toBeInstanceOf(SchemaValidationError);
      expect(await h.jobs()).toHaveLength(0);
    });
  });

  describe('media rules', () => {
    let source: Source;

    beforeEach(async () => {
      source = await createSource();
    });

    it('queues one metadata fetch for an item without metadata', async () => {
      const media = await h.media.create({ source_id: source.id, key: 'vid-1' });

      await h.media.save(media.id);
      await h.media.save(media.id);

      const jobs = await h.jobs('download-metadata');
      expect(jobs).toHaveLength(1);
      expect(jobs[0]?.task_key).toBe(`["${media.id}"]`);
      expect(jobs[0]?.queue).toBeNull();
    });

    it('derives flags and queues the thumbnail and the download once metadata arrives', async () => {
      const created = await h.media.create({ source_id: source.id, key: 'vid-1' });

      const media = await h.media.update(created.id, { metadata: downloadableMetadata() });

      expect(media.skip).toBe(false);
      expect(media.can_download).toBe(true);
      expect(media.title).toBe('Building a birdhouse');
      expect(media.published).toBe('2026-10-10');

      const [thumbnail] = await h.jobs('download-thumbnail');
      expect(thumbnail?.task_key).toBe(`["${media.id}","https://img.test/birdhouse.jpg"]`);
      expect(thumbnail?.queue).toBe(String(source.id));
      expect(thumbnail?.priority).toBe(10);

      const [download] = await h.jobs('download-media');
      expect(download?.queue).toBe(String(source.id));
      expect(download?.priority).toBe(15);
    });

    it('keeps one pending download per item however often it is saved', async () => {
      const media = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });

      for (let i = 0; i < 5; i++) {
        await h.media.save(media.id);
      }

      expect(await h.jobs('download-media')).toHaveLength(1);
    });

    it('does not queue downloads when the source has them disabled', async () => {
      await h.sources.update(source.id, { download_media: false });

      await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });

      expect(await h.jobs('download-media')).toHaveLength(0);
    });

    it('skips items the capture rules reject', async () => {
      await h.sources.update(source.id, { filter_text: 'shed' });

      const media = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });

      expect(media.skip).toBe(true);
      expect(await h.jobs('download-thumbnail')).toHaveLength(0);
      expect(await h.jobs('download-media')).toHaveLength(0);
    });

    it('sets can_download whenever a valid format exists', async () => {
      const withFormats = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });
      const withoutFormats = await h.media.create({
        source_id: source.id,
        key: 'vid-2',
        metadata: downloadableMetadata({ formats: [] }),
      });

      expect(withFormats.can_download).toBe(true);
      expect(withoutFormats.can_download).toBe(false);
    });

    it('never touches a manually skipped item', async () => {
      const media = await h.media.create({
        source_id: source.id,
        key: 'vid-1',
        manual_skip: true,
        metadata: downloadableMetadata({ upload_date: undefined }),
      });

      expect(media.skip).toBe(false);
      expect(media.can_download).toBe(false);

      const resaved = await h.media.save(media.id);
      expect(resaved.skip).toBe(false);
      expect(await h.jobs('download-metadata')).toHaveLength(0);
      expect(await h.jobs('download-thumbnail')).toHaveLength(0);
      expect(await h.jobs('download-media')).toHaveLength(0);
    });

    it('writes an item once per save and settles on the same state', async () => {
      let writes = 0;
      h.events.on('media:after-update', async () => {
        writes++;
      });
      const media = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });

      const first = await h.media.save(media.id);
      const second = await h.media.save(media.id);

      expect(writes).toBe(2);
      expect({ ...second, updated_at: first.updated_at }).toEqual(first);
    });

    it('clears a downloaded file that went missing and queues a fresh download', async () => {
      const created = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });
      h.files.add(VIDEO);
      const downloaded = await h.media.update(created.id, {
        downloaded: true,
        downloaded_format: '248+251',
        media_file: VIDEO,
      });
      expect(downloaded.downloaded).toBe(true);
      await h.jobQueue.cancel('download-media', { mediaId: created.id });

      h.files.files.delete(VIDEO);
      const media = await h.media.save(created.id);

      expect(media.downloaded).toBe(false);
      expect(media.media_file).toBeNull();
      expect(await h.jobs('download-media')).toHaveLength(1);
    });

    it('clears a thumbnail that went missing and queues it again', async () => {
      const created = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });
      await h.jobQueue.cancel('download-thumbnail', {
        mediaId: created.id,
        thumbnailUrl: 'https://img.test/birdhouse.jpg',
      });

      const media = await h.media.update(created.id, { thumb: '/downloads/woodworking/birdhouse.jpg' });

      expect(media.thumb).toBeNull();
      expect(await h.jobs('download-thumbnail')).toHaveLength(1);
    });

    it('does not re-filter an item that is already downloaded', async () => {
      const created = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });
      h.files.add(VIDEO);
      await h.media.update(created.id, { downloaded: true, media_file: VIDEO });

      await h.sources.update(source.id, { filter_text: 'shed' });
      const media = await h.media.save(created.id);

      expect(media.skip).toBe(false);
      expect(media.downloaded).toBe(true);
    });

    it('writes nothing when a capture rule throws', async () => {
      const created = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });
      jest.spyOn(FilterEngine.prototype, 'shouldSkip').mockImplementation(() => {
        throw new Error('filter unavailable');
      });

      await expect(
        h.media.update(created.id, { metadata: downloadableMetadata({ title: 'Shed roof' }) })
      ).rejects.toThrow('filter unavailable');

      const stored = await h.media.requireById(created.id);
      expect(stored.title).toBe('Building a birdhouse');
      expect(stored.metadata).toEqual(created.metadata);
      expect(stored.skip).toBe(false);
      expect(stored.can_download).toBe(true);
      expect(stored.updated_at).toBe(created.updated_at);
    });

    it('writes nothing when a file check throws', async () => {
      h.files.add('/downloads/woodworking/birdhouse.jpg', VIDEO);
      const created = await h.media.create({
        source_id: source.id,
        key: 'vid-1',
        metadata: downloadableMetadata(),
        thumb: '/downloads/woodworking/birdhouse.jpg',
      });
      jest.spyOn(h.files, 'fileExists').mockRejectedValueOnce(new Error('disk offline'));

      await expect(h.media.update(created.id, { downloaded: true, media_file: VIDEO })).rejects.toThrow(
        'disk offline'
      );

      const stored = await h.media.requireById(created.id);
      expect(stored.downloaded).toBe(false);
      expect(stored.media_file).toBeNull();
      expect(stored.thumb).toBe('/downloads/woodworking/birdhouse.jpg');
    });

    it('does not let a slow save overwrite a save that started after it', async () => {
      const thumb = '/downloads/woodworking/birdhouse.jpg';
      h.files.add(thumb, VIDEO);
      const created = await h.media.create({
        source_id: source.id,
        key: 'vid-1',
        metadata: downloadableMetadata(),
        thumb,
      });
      let release: () => void = () => undefined;
      const gate = new Promise<void>(resolve => {
        release = () => resolve();
      });
      const fileExists = h.files.fileExists.bind(h.files);
      jest.spyOn(h.files, 'fileExists').mockImplementationOnce(async (filePath: string) => {
        await gate;
        return fileExists(filePath);
      });

      const slowSave = h.media.save(created.id);
      const download = h.media.update(created.id, { downloaded: true, downloaded_format: '248+251', media_file: VIDEO });
      setTimeout(release, 50);
      await slowSave;
      const downloaded = await download;

      expect(downloaded.downloaded).toBe(true);
      const stored = await h.media.requireById(created.id);
      expect(stored.downloaded).toBe(true);
      expect(stored.media_file).toBe(VIDEO);
      expect(stored.downloaded_format).toBe('248+251');
    });

    it('deletes the item files and asks every media server to rescan once', async () => {
      await h.sources.update(source.id, { delete_files_on_disk: true });
      await h.mediaServers.create({ server_type: 'plex', host: 'plex.local', port: 32400, options: { token: 'test-secret' } });
      await h.mediaServers.create({ server_type: 'jellyfin', host: 'jellyfin.local', port: 8096, options: { token: 'test-secret' } });
      h.files.add(
        VIDEO,
        '/downloads/woodworking/birdhouse.en.vtt',
        '/downloads/woodworking/birdhouse.info.json',
        '/downloads/woodworking/birdhouse.jpg',
        '/downloads/woodworking/birdhouse-2.mkv'
      );
      const first = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });
      await h.media.update(first.id, { downloaded: true, media_file: VIDEO });
      const second = await h.media.create({ source_id: source.id, key: 'vid-2' });

      await h.media.delete(first.id);
      await h.media.delete(second.id);

      expect(h.files.deleted).toEqual([
        '/downloads/woodworking/birdhouse.en.vtt',
        '/downloads/woodworking/birdhouse.info.json',
        '/downloads/woodworking/birdhouse.jpg',
        '/downloads/woodworking/birdhouse.mkv',
      ]);
      expect([...h.files.files]).toEqual(['/downloads/woodworking/birdhouse-2.mkv']);
      expect((await h.jobs('rescan-media-server')).map(job => job.payload)).toEqual([
        { serverId: 1 },
        { serverId: 2 },
      ]);
      expect(await h.jobs('download-media')).toHaveLength(0);
      expect(await h.jobs('download-thumbnail')).toHaveLength(0);
    });

    it('keeps files on disk when the source does not delete them', async () => {
      h.files.add(VIDEO, '/downloads/woodworking/birdhouse.en.vtt');
      const media = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });
      await h.media.update(media.id, { downloaded: true, media_file: VIDEO });

      await h.media.delete(media.id);

      expect(h.files.deleted).toEqual([]);
    });
  });

  describe('permanent failures', () => {
    it('skips an item whose metadata fetch failed for good and stops asking for metadata', async () => {
      const source = await createSource();
      new SourceJobHandlers(h.sources, h.media, h.files, '/downloads').registerHandlers(h.jobQueue);
      h.jobQueue.registerHandler('download-metadata', async () => {
        throw new Error('extractor exploded');
      });
      const created = await h.media.create({ source_id: source.id, key: 'vid-1' });

      expect(await h.jobQueue.drain()).toBe(3);

      const media = await h.media.requireById(created.id);
      expect(media.skip).toBe(true);
      expect(media.manual_skip).toBe(false);
      expect(await h.jobs('download-metadata')).toHaveLength(0);

      await h.media.save(created.id);
      expect(await h.jobs('download-metadata')).toHaveLength(0);
      expect((await h.sources.requireById(source.id)).has_failed).toBe(false);
    });

    it('does not flag an item when another media job fails for good', async () => {
      const source = await createSource({ download_media: false });
      new SourceJobHandlers(h.sources, h.media, h.files, '/downloads').registerHandlers(h.jobQueue);
      h.jobQueue.registerHandler('download-thumbnail', async () => {
        throw new Error('HTTP 404');
      });
      const created = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });

      await h.jobQueue.drain();

      expect((await h.media.requireById(created.id)).skip).toBe(false);
    });

    it('marks a source failed when its indexing fails for good', async () => {
      const source = await createSource({ index_schedule: 3600 });
      new SourceJobHandlers(h.sources, h.media, h.files, '/downloads').registerHandlers(h.jobQueue);
      h.jobQueue.registerHandler('index-source', async () => {
        throw new Error('channel not found');
      });

      expect(await h.jobQueue.drain()).toBe(3);

      expect((await h.sources.requireById(source.id)).has_failed).toBe(true);
      expect(await h.jobs('index-source')).toHaveLength(0);
      expect(h.files.directories.has('/downloads/woodworking')).toBe(true);
    });

    it('marks a source failed without queueing the failing re-check again', async () => {
      const source = await createSource();
      new SourceJobHandlers(h.sources, h.media, h.files, '/downloads').registerHandlers(h.jobQueue);
      h.jobQueue.registerHandler('save-all-media', async () => {
        throw new Error('database locked');
      });

      expect(await h.jobQueue.drain(40)).toBe(2);

      expect((await h.sources.requireById(source.id)).has_failed).toBe(true);
      expect(await h.jobs()).toHaveLength(0);

      await h.sources.update(source.id, { filter_text: 'birdhouse' });

      expect(await h.jobQueue.drain(40)).toBe(1);
      expect(await h.jobs()).toHaveLength(0);
    });
  });
});

describe('Lifecycle reconciler with thumbnail failures escalated', () => {
  let h: ReconcilerHarness;

  beforeEach(async () => {
    h = await createReconcilerHarness({ escalateMediaFailures: ['download-metadata', 'download-thumbnail'] });
  });

  afterEach(async () => {
    await h.destroy();
  });

  it('skips the item', async () => {
    const source = await h.sources.create({
      name: 'Woodworking',
      key: 'UCwoodworking',
      source_type: 'channel',
      directory: 'woodworking',
      index_schedule: 0,
      download_media: false,
    });
    h.jobQueue.registerHandler('check-source-directory', async () => undefined);
    h.jobQueue.registerHandler('save-all-media', async () => undefined);
    h.jobQueue.registerHandler('download-thumbnail', async () => {
      throw new Error('HTTP 404');
    });
    const created = await h.media.create({ source_id: source.id, key: 'vid-1', metadata: downloadableMetadata() });

    await h.jobQueue.drain();

    expect((await h.media.requireById(created.id)).skip).toBe(true);
  });
});
