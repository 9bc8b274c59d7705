/**
 * Playlist HTTP Client
 * Downloads the source M3U playlist in a single attempt
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { FetchError } from '../utils/errors';

export class PlaylistClient {
  private readonly axiosInstance: AxiosInstance;

  constructor(timeoutMs: number, adapter?: AxiosAdapter) {
    this.axiosInstance = axios.create({
      timeout: timeoutMs,
      responseType: 'text',
      // Keep the body as-is; playlists are not JSON
      transformResponse: (data: unknown) => data,
      headers: {
        Accept: 'audio/x-mpegurl, application/vnd.apple.mpegurl, text/plain, */*',
      },
      ...(adapter ? { adapter } : {}),
    });
  }

  /**
   * Fetch playlist text. No retry: any failure surfaces as FetchError.
   */
  async fetchPlaylist(url: string): Promise<string> {
    console.log(`Fetching playlist from ${url}`);

    try {
      const response = await this.axiosInstance.get<unknown>(url);

      if (typeof response.data !== 'string') {
        throw new FetchError(url, 'response body is not text', response.status);
      }

      console.log(`Downloaded playlist (${Math.round(response.data.length / 1024)} KB)`);
      return response.data;
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }

      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const reason = status ? `HTTP ${status}` : error.code || error.message;
        throw new FetchError(url, reason, status);
      }

      throw new FetchError(url, String(error));
    }
  }
}
