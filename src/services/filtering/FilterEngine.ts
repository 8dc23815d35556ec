import { MediaDraft, Source } from '../../types/models.js';
import { parseUploadDate } from '../../types/metadata.js';
import { logger } from '../../utils/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export type SkipReason = 'unpublished' | 'older-than-cap' | 'title-filter' | 'too-short' | 'too-long';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Filter Engine
 *
 * Applies a source's capture rules to a media item. Only the item's
 * metadata and the source's rule fields are read.
 */
export class FilterEngine {
  constructor(private readonly now: () => Date = () => new Date()) {}

  shouldSkip(media: Pick<MediaDraft, 'metadata' | 'title'>, source: Source): boolean {
    return this.skipReason(media, source) !== null;
  }

  /**
   * First capture rule the item fails, or null when it passes all of them
   */
  skipReason(media: Pick<MediaDraft, 'metadata' | 'title'>, source: Source): SkipReason | null {
    const published = parseUploadDate(media.metadata);
    if (!published) {
      return 'unpublished';
    }

    if (source.download_cap > 0) {
      const cutoff = this.now().getTime() - source.download_cap * DAY_MS;
      if (published.getTime() < cutoff) {
        return 'older-than-cap';
      }
    }

    if (source.filter_text) {
      const matched = this.matchesTitle(source.filter_text, media.metadata?.title ?? media.title ?? '');
      if (matched !== null && matched === source.filter_text_invert) {
        return 'title-filter';
      }
    }

    const duration = media.metadata?.duration;
    if (source.filter_seconds !== null && typeof duration === 'number') {
      if (source.filter_seconds_min && duration < source.filter_seconds) {
        return 'too-short';
      }
      if (!source.filter_seconds_min && duration > source.filter_seconds) {
        return 'too-long';
      }
    }

    return null;
  }

  /**
   * @returns null when the pattern does not compile
   */
  private matchesTitle(pattern: string, title: string): boolean | null {
    try {
      return new RegExp(pattern).test(title);
    } catch (error) {
      logger.warn('Ignoring invalid title filter', {
        service: 'FilterEngine',
        operation: 'matchesTitle',
        pattern,
        error: getErrorMessage(error),
      });
      return null;
    }
  }
}
