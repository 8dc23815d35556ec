import { ResourceNotFoundError, SchemaValidationError } from '../../src/errors/index.js';
import { ReconcilerHarness, createReconcilerHarness, downloadableMetadata } from '../utils/reconcilerHarness.js';

describe('MediaService', () => {
  let h: ReconcilerHarness;
  let sourceId: number;

  beforeEach(async () => {
    h = await createReconcilerHarness();
    const source = await h.sources.create({
      name: 'Woodworking',
      key: 'UCwoodworking',
      source_type: 'channel',
      directory: 'woodworking',
      index_schedule: 0,
    });
    sourceId = source.id;
  });

  afterEach(async () => {
    await h.destroy();
  });

  it('refuses items for unknown sources', async () => {
    await expect(h.media.create({ source_id: 99, key: 'vid-1' })).rejects.toBeInstanceOf(ResourceNotFoundError);
  });

  it('validates input', async () => {
    await expect(h.media.create({ source_id: sourceId, key: '' })).rejects.toBeInstanceOf(SchemaValidationError);
  });

  it('lists the items of a source in creation order', async () => {
    await h.media.create({ source_id: sourceId, key: 'vid-1' });
    await h.media.create({ source_id: sourceId, key: 'vid-2' });

    expect((await h.media.getBySource(sourceId)).map(item => item.key)).toEqual(['vid-1', 'vid-2']);
  });

  it('keeps metadata fields it does not know about', async () => {
    const created = await h.media.create({
      source_id: sourceId,
      key: 'vid-1',
      metadata: downloadableMetadata({ uploader: 'Test Channel' }),
    });

    expect((await h.media.requireById(created.id)).metadata?.uploader).toBe('Test Channel');
  });

  it('treats unreadable stored metadata as missing', async () => {
    const created = await h.media.create({ source_id: sourceId, key: 'vid-1' });
    await h.testDb.getConnection().execute('UPDATE media SET metadata = ? WHERE id = ?', ['{not json', created.id]);

    expect((await h.media.requireById(created.id)).metadata).toBeNull();
  });

  it('marks an item skipped without re-filtering it', async () => {
    const created = await h.media.create({ source_id: sourceId, key: 'vid-1', metadata: downloadableMetadata() });
    expect(created.skip).toBe(false);

    const skipped = await h.media.markSkipped(created.id);

    expect(skipped.skip).toBe(true);
    expect(skipped.manual_skip).toBe(false);
  });
});
