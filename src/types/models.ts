import { MediaMetadata } from './metadata.js';

export const SOURCE_TYPES = ['channel', 'channel-id', 'playlist'] as const;
export const SOURCE_RESOLUTIONS = ['audio', '360p', '480p', '720p', '1080p', '1440p', '2160p'] as const;
export const VIDEO_CODECS = ['AVC1', 'VP9'] as const;
export const AUDIO_CODECS = ['MP4A', 'OPUS'] as const;
export const FORMAT_FALLBACKS = ['fail', 'next-best'] as const;
export const MEDIA_SERVER_TYPES = ['plex', 'jellyfin'] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];
export type SourceResolution = (typeof SOURCE_RESOLUTIONS)[number];
export type VideoCodec = (typeof VIDEO_CODECS)[number];
export type AudioCodec = (typeof AUDIO_CODECS)[number];
export type FormatFallback = (typeof FORMAT_FALLBACKS)[number];
export type MediaServerType = (typeof MEDIA_SERVER_TYPES)[number];

export interface Source {
  id: number;
  name: string;
  key: string; // Upstream channel or playlist key
  source_type: SourceType;
  directory: string; // Relative to the download root

  // Scheduling
  index_schedule: number; // Seconds between indexing runs, 0 = disabled
  copy_channel_images: boolean;
  download_media: boolean;
  delete_files_on_disk: boolean;
  has_failed: boolean;

  // Capture rules
  filter_text: string;
  filter_text_invert: boolean;
  filter_seconds: number | null;
  filter_seconds_min: boolean;
  download_cap: number; // Days, 0 = no cap

  // Format preferences
  source_resolution: SourceResolution;
  source_vcodec: VideoCodec;
  source_acodec: AudioCodec;
  prefer_60fps: boolean;
  fallback: FormatFallback;

  created_at: string;
  updated_at: string;
}

export interface Media {
  id: number;
  source_id: number;
  key: string; // Upstream item key
  title: string | null;
  published: string | null; // ISO date
  metadata: MediaMetadata | null;

  // Derived flags
  skip: boolean;
  manual_skip: boolean;
  can_download: boolean;
  downloaded: boolean;
  downloaded_format: string | null;

  // File references (absolute paths)
  media_file: string | null;
  thumb: string | null;

  created_at: string;
  updated_at: string;
}

export interface MediaServerOptions {
  token: string;
  libraries: string; // Comma-separated section or library ids
}

export interface MediaServer {
  id: number;
  server_type: MediaServerType;
  host: string;
  port: number;
  use_https: boolean;
  verify_https: boolean;
  options: MediaServerOptions;
  created_at: string;
}

/**
 * Media state before it is written: what the before-save rules see and adjust
 */
export type MediaDraft = Omit<Media, 'id' | 'created_at' | 'updated_at'>;
