import { Logger } from 'homebridge';
import axios, { AxiosInstance } from 'axios';
import { HTTP_TIMEOUT_MS } from '../api/constants';
import { FetchError } from '../api/errors';
import { isMediaExpired } from '../api/parsers';
import { MediaReference } from '../api/types';

/**
 * Bytes held for a device and the reference they were downloaded from. `error` is set when
 * a newer reference could not be downloaded and these bytes are the previous photo.
 */
export interface MediaFetch {
  readonly bytes: Buffer;
  readonly reference: MediaReference;
  readonly error?: FetchError;
}

export interface MediaCacheOptions {
  now?: () => number;
}

export function toFetchError(error: unknown, deviceId: string): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return new FetchError('Forbidden', `Photo for ${deviceId}: HTTP ${status}`, status, error);
    }
    if (status === 404 || status === 410) {
      return new FetchError('Gone', `Photo for ${deviceId}: HTTP ${status}`, status, error);
    }
    const detail = status !== undefined ? `HTTP ${status}` : error.code ?? error.message;
    return new FetchError('NetworkError', `Photo for ${deviceId}: ${detail}`, status, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FetchError('NetworkError', `Photo for ${deviceId}: ${message}`, undefined, error);
}

/**
 * Latest photo bytes per device, keyed by the pre-signed URL they came from.
 */
export class MediaCache {
  private readonly entries = new Map<string, MediaFetch>();
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(
    private readonly log: Logger,
    options: MediaCacheOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.http = axios.create({
      timeout: HTTP_TIMEOUT_MS,
      responseType: 'arraybuffer',
      proxy: false,
    });
  }

  /**
   * Returns cached bytes while `candidate` names the same unexpired URL, otherwise downloads.
   * A failed download falls back to the previous bytes with `error` set, or throws when
   * nothing is cached.
   */
  public async getOrRefresh(deviceId: string, candidate: MediaReference): Promise<MediaFetch> {
    const cached = this.entries.get(deviceId);
    if (cached
      && cached.reference.remote_url === candidate.remote_url
      && !isMediaExpired(candidate, this.now())) {
      return cached;
    }

    try {
      const response = await this.http.get<ArrayBuffer>(candidate.remote_url);
      const entry: MediaFetch = { bytes: Buffer.from(response.data), reference: candidate };
      this.entries.set(deviceId, entry);
      this.log.debug(`Cached ${entry.bytes.length} bytes of photo for camera ${deviceId}.`);
      return entry;
    } catch (error) {
      const fetchError = toFetchError(error, deviceId);
      if (cached) {
        this.log.warn(`${fetchError.message}; serving previously cached photo.`);
        return { bytes: cached.bytes, reference: cached.reference, error: fetchError };
      }
      throw fetchError;
    }
  }

  public peek(deviceId: string): Buffer | undefined {
    return this.entries.get(deviceId)?.bytes;
  }
}
