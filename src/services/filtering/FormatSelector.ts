import { MediaDraft, Source, SourceResolution } from '../../types/models.js';
import { MediaFormat } from '../../types/metadata.js';

const RESOLUTION_HEIGHTS: Record<Exclude<SourceResolution, 'audio'>, number> = {
  '360p': 360,
  '480p': 480,
  '720p': 720,
  '1080p': 1080,
  '1440p': 1440,
  '2160p': 2160,
};

const VIDEO_CODEC_PREFIXES: Record<Source['source_vcodec'], string[]> = {
  AVC1: ['avc1'],
  VP9: ['vp9', 'vp09'],
};

const AUDIO_CODEC_PREFIXES: Record<Source['source_acodec'], string[]> = {
  MP4A: ['mp4a'],
  OPUS: ['opus'],
};

const HIGH_FRAME_RATE = 50;

function hasCodec(codec: string | undefined): boolean {
  return codec !== undefined && codec !== '' && codec !== 'none';
}

function codecMatches(codec: string | undefined, prefixes: string[]): boolean {
  const normalized = (codec ?? '').toLowerCase();
  return prefixes.some(prefix => normalized.startsWith(prefix));
}

function lastOf<T>(items: T[]): T | null {
  return items.length > 0 ? items[items.length - 1] : null;
}

/**
 * Format Selector
 *
 * Picks the download format string for a media item from the formats its
 * metadata lists. Formats are taken to be listed worst to best, so among
 * equal candidates the last one wins.
 */
export class FormatSelector {
  hasValidFormat(media: Pick<MediaDraft, 'metadata'>, source: Source): boolean {
    return this.selectFormat(media, source) !== null;
  }

  /**
   * @returns `<video>+<audio>` format ids, a single audio format id, or null
   */
  selectFormat(media: Pick<MediaDraft, 'metadata'>, source: Source): string | null {
    const formats = media.metadata?.formats ?? [];
    const nextBest = source.fallback === 'next-best';

    const audio = this.selectAudio(formats, source.source_acodec, nextBest);
    if (source.source_resolution === 'audio') {
      return audio ? audio.format_id : null;
    }
    if (!audio) {
      return null;
    }

    const video = this.selectVideo(formats, source, RESOLUTION_HEIGHTS[source.source_resolution], nextBest);
    return video ? `${video.format_id}+${audio.format_id}` : null;
  }

  private selectAudio(
    formats: MediaFormat[],
    acodec: Source['source_acodec'],
    nextBest: boolean
  ): MediaFormat | null {
    const audioOnly = formats.filter(format => hasCodec(format.acodec) && !hasCodec(format.vcodec));
    const matching = audioOnly.filter(format => codecMatches(format.acodec, AUDIO_CODEC_PREFIXES[acodec]));
    return lastOf(matching) ?? (nextBest ? lastOf(audioOnly) : null);
  }

  private selectVideo(
    formats: MediaFormat[],
    source: Source,
    targetHeight: number,
    nextBest: boolean
  ): MediaFormat | null {
    const videoOnly = formats.filter(
      format => hasCodec(format.vcodec) && !hasCodec(format.acodec) && typeof format.height === 'number'
    );
    const matchingCodec = videoOnly.filter(format =>
      codecMatches(format.vcodec, VIDEO_CODEC_PREFIXES[source.source_vcodec])
    );

    const exact = this.byFrameRate(
      matchingCodec.filter(format => format.height === targetHeight),
      source.prefer_60fps
    );
    if (exact || !nextBest) {
      return exact;
    }

    // Closest lower height in the preferred codec, then the closest height in any codec
    const lowerHeights = matchingCodec.filter(format => (format.height ?? 0) < targetHeight);
    const closestLower = this.closestToHeight(lowerHeights, targetHeight, source.prefer_60fps);
    return closestLower ?? this.closestToHeight(videoOnly, targetHeight, source.prefer_60fps);
  }

  private closestToHeight(candidates: MediaFormat[], targetHeight: number, prefer60fps: boolean): MediaFormat | null {
    if (candidates.length === 0) {
      return null;
    }
    // Lower heights rank ahead of higher ones at the same distance
    const rank = (format: MediaFormat): number => {
      const height = format.height ?? 0;
      return height <= targetHeight ? targetHeight - height : height - targetHeight + 0.5;
    };
    const best = Math.min(...candidates.map(rank));
    return this.byFrameRate(
      candidates.filter(format => rank(format) === best),
      prefer60fps
    );
  }

  private byFrameRate(candidates: MediaFormat[], prefer60fps: boolean): MediaFormat | null {
    const highFrameRate = candidates.filter(format => (format.fps ?? 0) >= HIGH_FRAME_RATE);
    const standard = candidates.filter(format => (format.fps ?? 0) < HIGH_FRAME_RATE);
    return prefer60fps
      ? lastOf(highFrameRate) ?? lastOf(standard)
      : lastOf(standard) ?? lastOf(highFrameRate);
  }
}
