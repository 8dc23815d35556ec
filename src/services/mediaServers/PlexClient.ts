import { z } from 'zod';
import { MediaServer } from '../../types/models.js';
import { MediaServerClientOptions, MediaServerHttpClient } from './MediaServerClient.js';
import { logger } from '../../utils/logging.js';

const sectionsResponseSchema = z.object({
  MediaContainer: z.object({
    Directory: z.array(z.object({ key: z.string(), title: z.string().optional() }).passthrough()).default([]),
  }),
});

/**
 * Plex Media Server client
 * Sections are refreshed one by one through /library/sections/{key}/refresh.
 */
export class PlexClient extends MediaServerHttpClient {
  constructor(server: MediaServer, options?: MediaServerClientOptions) {
    super(server, 'X-Plex-Token', options);
  }

  async listSectionKeys(): Promise<string[]> {
    const data = await this.request<unknown>('GET', '/library/sections');
    return sectionsResponseSchema.parse(data).MediaContainer.Directory.map(section => section.key);
  }

  async rescan(): Promise<void> {
    const sections = this.libraries.length > 0 ? this.libraries : await this.listSectionKeys();

    for (const section of sections) {
      await this.request<unknown>('GET', `/library/sections/${encodeURIComponent(section)}/refresh`);
    }

    logger.info('Requested Plex library refresh', {
      service: 'PlexClient',
      operation: 'rescan',
      sections,
    });
  }
}
