import { Readable } from 'node:stream';
import { DownloadError, errorMessage } from '../errors/custom-errors.js';
import { DEFAULT_USER_AGENT } from '../feed/feed-source.js';

/**
 * Byte-transfer collaborator of the download scheduler
 */
export interface MediaDownloader {
  /**
   * Open a media URL for reading
   *
   * @throws DownloadError for HTTP errors (including 404) and network failures
   */
  download(url: string, signal?: AbortSignal): Promise<Readable>;
}

export type HttpMediaDownloaderOptions = {
  fetch?: typeof fetch;
  userAgent?: string;
};

/**
 * MediaDownloader over HTTP(S), following redirects
 */
export class HttpMediaDownloader implements MediaDownloader {
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;

  constructor(options: HttpMediaDownloaderOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async download(url: string, signal?: AbortSignal): Promise<Readable> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent },
        redirect: 'follow',
        signal,
      });
    } catch (error) {
      throw new DownloadError(`Request failed: ${errorMessage(error)}`, url);
    }

    if (!response.ok) {
      throw new DownloadError(`HTTP ${response.status}: ${response.statusText}`, url, response.status);
    }
    if (!response.body) {
      throw new DownloadError('Response has no body', url, response.status);
    }

    return Readable.fromWeb(response.body);
  }
}
