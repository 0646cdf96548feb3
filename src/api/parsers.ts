import { AVERAGE_WINDOW, MEDIA_URL_LIFETIME_MS } from './constants';
import { Device, DeviceHealth, DeviceState, GpsCoordinates, MediaReference, WeatherSnapshot } from './types';

/** A JSON object as decoded from the wire; every field is checked before use. */
export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(record: RawRecord | undefined, key: string): RawRecord | undefined {
  const value = record?.[key];
  return isRecord(value) ? value : undefined;
}

export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function toText(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function firstDefined<T>(...values: (T | undefined)[]): T | undefined {
  return values.find((v) => v !== undefined);
}

export function cameraDisplayName(camera: RawRecord, deviceId: string): string {
  return toText(camera.cameraName)
    ?? toText(camera.cameraLocation)
    ?? toText(camera.name)
    ?? `Camera ${deviceId.slice(-4)}`;
}

function cameraStatus(status: unknown): string {
  if (typeof status === 'string' && status.length > 0) {
    return status;
  }
  if (isRecord(status)) {
    // Some accounts return a status object rather than a label.
    const label = toText(status.status) ?? toText(status.state);
    if (label) {
      return label;
    }
  }
  return 'active';
}

/** Accepts `12.6`, `"12.6"` and `"12.6V"`. */
export function toVoltage(value: unknown): number | undefined {
  if (typeof value === 'string') {
    return toNumber(value.replace(/v/gi, '').trim());
  }
  return toNumber(value);
}

function toCount(value: unknown): number | undefined {
  const n = toNumber(value);
  return n === undefined ? undefined : Math.trunc(n);
}

function activeCarrier(status: RawRecord): string | undefined {
  const sims = status.eSim;
  if (!Array.isArray(sims)) {
    return undefined;
  }
  const active = sims.filter(isRecord).find((sim) => toNumber(sim.activeFlag) === 1);
  return toText(active?.carrier);
}

/**
 * Reads the `status` and `usage` objects of a camera entry. Undefined when the entry has neither.
 */
export function parseHealth(camera: RawRecord): DeviceHealth | undefined {
  const status = child(camera, 'status');
  const usage = child(camera, 'usage');
  if (!status && !usage) {
    return undefined;
  }

  // "FDD LTE,311480,LTE BAND 4,2350,-79,221,-15"
  const cell = toText(status?.servingCell)?.split(',');
  const hasCell = cell !== undefined && cell.length >= 3;

  return {
    memory_used_mb: toNumber(status?.memory),
    memory_total_mb: toNumber(status?.memoryLimit),
    power_source: toText(status?.voltagesource),
    external_voltage: toVoltage(status?.voltageexternal),
    internal_voltage: toVoltage(status?.voltageinternal),
    last_transmission: toNumber(status?.lastTransmissionTimestamp),
    camera_temperature: toNumber(status?.temperature),
    sim_carrier: (status ? activeCarrier(status) : undefined) ?? toText(camera.phoneCarrier),
    network_type: hasCell ? toText(cell[0].trim()) : undefined,
    network_band: hasCell ? toText(cell[2].trim()) : undefined,
    mcu_version: toText(status?.mcuVersion),
    app_version: toText(status?.appVersion),
    photos_taken: toCount(usage?.photos),
    photos_stored: toCount(usage?.storedPhotos),
  };
}

export function parseCamera(camera: RawRecord): Device | undefined {
  const deviceId = toText(camera.cameraId);
  if (!deviceId) {
    return undefined;
  }
  return {
    device_id: deviceId,
    display_name: cameraDisplayName(camera, deviceId),
    location_label: toText(camera.cameraLocation),
    model: toText(camera.cameraModel),
    hardware_version: toText(camera.hardwareVersion),
    firmware_version: toText(camera.firmwareVersion),
    status: cameraStatus(camera.status),
    health: parseHealth(camera),
  };
}

export function parseWeather(raw: RawRecord | undefined): WeatherSnapshot {
  if (!raw) {
    return {};
  }
  const wind = raw.windDirection;
  const windRecord = isRecord(wind) ? wind : undefined;
  const range = child(raw, 'temperatureRange12Hours');

  return {
    temperature: firstDefined(toNumber(raw.currentTemp), toNumber(raw.temperature), toNumber(raw.temp)),
    conditions: toText(raw.weather) ?? toText(raw.weatherLabel) ?? toText(raw.conditions),
    wind_speed: firstDefined(toNumber(raw.windSpeed), toNumber(windRecord?.speed)),
    wind_direction: toText(wind) ?? toText(windRecord?.cardinalLabel) ?? toText(windRecord?.direction),
    wind_gust: toNumber(raw.windGust),
    pressure: firstDefined(toNumber(raw.barometricPressure), toNumber(raw.pressure)),
    pressure_tendency: toText(raw.pressureTendency),
    moon_phase: toText(raw.moonPhase),
    sun_phase: toText(raw.sunPhase),
    temp_min_12h: firstDefined(toNumber(raw.tempMin12hr), toNumber(range?.min)),
    temp_max_12h: firstDefined(toNumber(raw.tempMax12hr), toNumber(range?.max)),
    // The service spells this key "Depature".
    temp_departure_24h: firstDefined(toNumber(raw.tempDepature24hr), toNumber(raw.past24HoursTemperatureDeparture)),
  };
}

function parseGps(photo: RawRecord): GpsCoordinates | undefined {
  const location = child(photo, 'gpsLocation');
  const metadata = child(photo, 'metadata');
  const latitude = firstDefined(toNumber(location?.lat), toNumber(metadata?.gpsLatitude));
  const longitude = firstDefined(toNumber(location?.lon), toNumber(metadata?.gpsLongitude));
  if (latitude === undefined || longitude === undefined) {
    return undefined;
  }
  return { latitude, longitude };
}

/**
 * Mean over the most recent photos that carry a non-zero reading.
 */
export function recentAverage(values: (number | undefined)[], window = AVERAGE_WINDOW): number | undefined {
  const sample = values
    .slice(0, window)
    .filter((v): v is number => v !== undefined && v !== 0);
  if (sample.length === 0) {
    return undefined;
  }
  return sample.reduce((sum, v) => sum + v, 0) / sample.length;
}

function metadataInteger(photo: RawRecord, key: string): number | undefined {
  const n = toNumber(child(photo, 'metadata')?.[key]);
  return n === undefined ? undefined : Math.trunc(n);
}

/**
 * Builds a device state from photos ordered newest first.
 */
export function buildDeviceState(photos: RawRecord[]): DeviceState {
  const latest: RawRecord | undefined = photos[0];
  const batteries = photos.map((p) => metadataInteger(p, 'batteryLevel'));
  const signals = photos.map((p) => metadataInteger(p, 'signal'));
  const weather = child(latest, 'weatherData') ?? child(latest, 'weatherRecord') ?? child(latest, 'weather');

  return {
    battery_level: batteries[0],
    battery_level_avg: recentAverage(batteries),
    signal_strength: signals[0],
    signal_strength_avg: recentAverage(signals),
    gps_coordinates: latest ? parseGps(latest) : undefined,
    total_photo_count: photos.length,
    last_photo_time: toText(latest?.photoDateUtc),
    last_photo_filename: toText(latest?.filename),
    weather: parseWeather(weather),
  };
}

const AMZ_DATE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

/**
 * Signing time of a pre-signed S3 URL, from its `X-Amz-Date` parameter.
 */
export function presignedIssuedAt(remoteUrl: string): number | undefined {
  let signed: string | null;
  try {
    signed = new URL(remoteUrl).searchParams.get('X-Amz-Date');
  } catch {
    return undefined;
  }
  const match = signed ? AMZ_DATE.exec(signed) : null;
  if (!match) {
    return undefined;
  }
  const [, y, mo, d, h, mi, s] = match.map(Number);
  return Date.UTC(y, mo - 1, d, h, mi, s);
}

export function createMediaReference(deviceId: string, remoteUrl: string, observedAt: number): MediaReference {
  const issuedAt = presignedIssuedAt(remoteUrl) ?? observedAt;
  return Object.freeze({
    device_id: deviceId,
    remote_url: remoteUrl,
    issued_at: issuedAt,
    expires_at: issuedAt + MEDIA_URL_LIFETIME_MS,
  });
}

export function isMediaExpired(reference: MediaReference, now: number): boolean {
  return now >= reference.expires_at;
}
