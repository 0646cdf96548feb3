import { Logger } from 'homebridge';
import axios, { AxiosInstance } from 'axios';
import { API_HOST, API_VERSION, DEFAULT_PHOTO_SAMPLE_SIZE, HTTP_TIMEOUT_MS, PORTAL_ORIGIN, USER_AGENT } from './constants';
import { ApiError } from './errors';
import { buildDeviceState, createMediaReference, isRecord, parseCamera, toText } from './parsers';
import { Device, DeviceStateResult, Session } from './types';

/**
 * Catalog and per-device state access. The coordinator depends on this, not on the HTTP client.
 */
export interface DeviceApi {
  listDevices(session: Session): Promise<Device[]>;
  fetchState(session: Session, deviceId: string): Promise<DeviceStateResult>;
}

export interface RevealApiOptions {
  baseURL?: string;
  photoSampleSize?: number;
  now?: () => number;
}

export function toApiError(error: unknown, context: string): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return new ApiError('Unauthorized', `${context}: HTTP ${status}`, status, error);
    }
    if (status === 404) {
      return new ApiError('NotFound', `${context}: HTTP 404`, status, error);
    }
    if (status !== undefined) {
      return new ApiError('Unavailable', `${context}: HTTP ${status}`, status, error);
    }
    return new ApiError('Unavailable', `${context}: ${error.code ?? error.message}`, undefined, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ApiError('Unavailable', `${context}: ${message}`, undefined, error);
}

export class RevealApi implements DeviceApi {
  private readonly http: AxiosInstance;
  private readonly photoSampleSize: number;
  private readonly now: () => number;

  constructor(
    private readonly log: Logger,
    options: RevealApiOptions = {},
  ) {
    this.photoSampleSize = options.photoSampleSize ?? DEFAULT_PHOTO_SAMPLE_SIZE;
    this.now = options.now ?? Date.now;

    this.http = axios.create({
      baseURL: `${options.baseURL ?? API_HOST}/${API_VERSION}`,
      timeout: HTTP_TIMEOUT_MS,
      headers: {
        'reveal-user-agent': USER_AGENT,
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        'Origin': PORTAL_ORIGIN,
        'Referer': `${PORTAL_ORIGIN}/`,
      },
      proxy: false,
    });

    this.http.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        const url = axios.isAxiosError(error) ? error.config?.url ?? 'request' : 'request';
        return Promise.reject(toApiError(error, `GET ${url}`));
      },
    );
  }

  private async get(path: string, session: Session, params?: Record<string, string | number>): Promise<unknown> {
    const response = await this.http.get<unknown>(path, {
      params,
      headers: { Authorization: `Bearer ${session.accessToken}` },
    });
    return response.data;
  }

  public async listDevices(session: Session): Promise<Device[]> {
    this.log.debug('Fetching camera list...');
    const data = await this.get('/cameras', session);

    const response = isRecord(data) ? data.response : undefined;
    const cameras = isRecord(response) ? response.cameras : undefined;
    if (!Array.isArray(cameras)) {
      throw new ApiError('Malformed', 'Camera list response has no cameras array.');
    }

    const devices: Device[] = [];
    for (const camera of cameras) {
      const device = isRecord(camera) ? parseCamera(camera) : undefined;
      if (device) {
        devices.push(device);
      } else {
        this.log.warn('Skipping camera entry without a cameraId.');
      }
    }

    this.log.debug(`Found ${devices.length} cameras.`);
    return devices;
  }

  public async fetchState(session: Session, deviceId: string): Promise<DeviceStateResult> {
    const data = await this.get('/photos', session, {
      size: this.photoSampleSize,
      page: 0,
      includeWeatherData: 'true',
      cameraId: deviceId,
    });

    const response = isRecord(data) ? data.response : undefined;
    const photos = isRecord(response) ? response.photos : undefined;
    if (!Array.isArray(photos)) {
      throw new ApiError('Malformed', `Photo response for ${deviceId} has no photos array.`);
    }

    const records = photos.filter(isRecord);
    const state = buildDeviceState(records);
    const photoUrl = toText(records[0]?.photoUrl);
    const media = photoUrl
      ? createMediaReference(deviceId, photoUrl, this.now())
      : undefined;

    this.log.debug(`Camera ${deviceId}: ${records.length} photos, latest ${state.last_photo_time ?? 'none'}.`);
    return { state, media };
  }
}
