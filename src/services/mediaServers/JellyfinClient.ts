import { MediaServer } from '../../types/models.js';
import { MediaServerClientOptions, MediaServerHttpClient } from './MediaServerClient.js';
import { logger } from '../../utils/logging.js';

/**
 * Jellyfin client
 * Without configured libraries the whole server is refreshed.
 */
export class JellyfinClient extends MediaServerHttpClient {
  constructor(server: MediaServer, options?: MediaServerClientOptions) {
    super(server, 'X-Emby-Token', options);
  }

  async rescan(): Promise<void> {
    if (this.libraries.length === 0) {
      await this.request<unknown>('POST', '/Library/Refresh');
    } else {
      for (const library of this.libraries) {
        await this.request<unknown>('POST', `/Items/${encodeURIComponent(library)}/Refresh`, {
          Recursive: true,
        });
      }
    }

    logger.info('Requested Jellyfin library refresh', {
      service: 'JellyfinClient',
      operation: 'rescan',
      libraries: this.libraries,
    });
  }
}
