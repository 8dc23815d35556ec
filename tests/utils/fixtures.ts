import { Media, Source } from '../../src/types/models.js';

export function makeSource(overrides: Partial<Source> = {}): Source {
  return {
    id: 3,
    name: 'Woodworking',
    key: 'UCwoodworking',
    source_type: 'channel',
    directory: 'woodworking',
    index_schedule: 86400,
    copy_channel_images: false,
    download_media: true,
    delete_files_on_disk: false,
    has_failed: false,
    filter_text: '',
    filter_text_invert: false,
    filter_seconds: null,
    filter_seconds_min: true,
    download_cap: 0,
    source_resolution: '1080p',
    source_vcodec: 'VP9',
    source_acodec: 'OPUS',
    prefer_60fps: true,
    fallback: 'next-best',
    created_at: '2026-10-18 12:00:00',
    updated_at: '2026-10-18 12:00:00',
    ...overrides,
  };
}

export function makeMedia(overrides: Partial<Media> = {}): Media {
  return {
    id: 7,
    source_id: 3,
    key: 'vid-7',
    title: null,
    published: null,
    metadata: null,
    skip: false,
    manual_skip: false,
    can_download: false,
    downloaded: false,
    downloaded_format: null,
    media_file: null,
    thumb: null,
    created_at: '2026-10-18 12:00:00',
    updated_at: '2026-10-18 12:00:00',
    ...overrides,
  };
}
