import { MediaServer } from '../../types/models.js';
import { MediaServerClient, MediaServerClientOptions } from './MediaServerClient.js';
import { PlexClient } from './PlexClient.js';
import { JellyfinClient } from './JellyfinClient.js';

export type MediaServerClientFactory = (server: MediaServer) => MediaServerClient;

export function createMediaServerClient(
  server: MediaServer,
  options?: MediaServerClientOptions
): MediaServerClient {
  switch (server.server_type) {
    case 'plex':
      return new PlexClient(server, options);
    case 'jellyfin':
      return new JellyfinClient(server, options);
  }
}
