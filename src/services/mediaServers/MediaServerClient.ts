import axios, { AxiosAdapter, AxiosInstance, Method } from 'axios';
import https from 'https';
import { MediaServer } from '../../types/models.js';
import { ErrorCode, NetworkError } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { logger } from '../../utils/logging.js';

export interface MediaServerClientOptions {
  timeoutMs?: number;
  /** Replaces the HTTP transport, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
}

export interface MediaServerClient {
  /**
   * Ask the server to rescan its configured libraries (all of them when none are configured)
   */
  rescan(): Promise<void>;
}

/**
 * Shared HTTP plumbing for media server clients
 */
export abstract class MediaServerHttpClient implements MediaServerClient {
  protected readonly client: AxiosInstance;
  protected readonly libraries: string[];
  private readonly serverName: string;

  constructor(
    server: MediaServer,
    tokenHeader: string,
    options: MediaServerClientOptions = {}
  ) {
    const scheme = server.use_https ? 'https' : 'http';
    this.serverName = `${server.server_type} ${server.host}:${server.port}`;
    this.libraries = server.options.libraries
      .split(',')
      .map(library => library.trim())
      .filter(library => library.length > 0);

    this.client = axios.create({
      baseURL: `${scheme}://${server.host}:${server.port}`,
      timeout: options.timeoutMs ?? 10000,
      headers: {
        Accept: 'application/json',
        [tokenHeader]: server.options.token,
      },
      ...(server.use_https ? { httpsAgent: new https.Agent({ rejectUnauthorized: server.verify_https }) } : {}),
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  abstract rescan(): Promise<void>;

  protected async request<T>(method: Method, url: string, params?: Record<string, string | boolean>): Promise<T> {
    try {
      const response = await this.client.request<T>({ method, url, params });

      logger.debug('Media server request successful', {
        service: 'MediaServerClient',
        operation: 'request',
        server: this.serverName,
        method,
        url,
        status: response.status,
      });

      return response.data;
    } catch (error) {
      throw this.convertToApplicationError(error, url);
    }
  }

  private convertToApplicationError(error: unknown, url: string): NetworkError {
    const context = {
      service: 'MediaServerClient',
      operation: 'request',
      metadata: { server: this.serverName, url },
    };
    const cause = error instanceof Error ? error : undefined;

    if (axios.isAxiosError(error) && error.response) {
      const status = error.response.status;
      const code = status === 401 || status === 403 ? ErrorCode.NETWORK_AUTH_FAILED : ErrorCode.NETWORK_CONNECTION_FAILED;
      return new NetworkError(
        `${this.serverName} responded with HTTP ${status}`,
        code,
        url,
        { ...context, metadata: { ...context.metadata, status } },
        cause
      );
    }

    if (axios.isAxiosError(error) && error.code === 'ECONNABORTED') {
      return new NetworkError(`${this.serverName} timed out`, ErrorCode.NETWORK_TIMEOUT, url, context, cause);
    }

    return new NetworkError(
      `${this.serverName} request failed: ${getErrorMessage(error)}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      url,
      context,
      cause
    );
  }
}
