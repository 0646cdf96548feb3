import { SnapshotEntry } from './sync/SyncCoordinator';
import { hasExternalPower, hoursSinceTransmission, isOnline, networkLabel, sdUsagePercent } from './api/health';

export type AttributeValue = string | number | boolean | null;

function round1(value: number | undefined): number | null {
  return value === undefined ? null : Math.round(value * 10) / 10;
}

/**
 * Flat attribute set shown for one camera.
 */
export function toEntityAttributes(entry: SnapshotEntry, now = Date.now()): Record<string, AttributeValue> {
  const { device, state } = entry;
  const health = device.health;
  const lastTransmission = health?.last_transmission;
  const weather = state?.weather ?? {};
  const gps = state?.gps_coordinates;

  return {
    camera_id: device.device_id,
    camera_name: device.display_name,
    location: device.location_label ?? null,
    status: device.status,
    firmware_version: device.firmware_version ?? null,
    hardware_version: device.hardware_version ?? null,
    total_photos: state?.total_photo_count ?? null,
    battery_level: state?.battery_level ?? null,
    signal_strength: state?.signal_strength ?? null,
    temperature: weather.temperature ?? null,
    weather: weather.conditions ?? null,
    moon_phase: weather.moon_phase ?? null,
    sun_phase: weather.sun_phase ?? null,
    wind_speed: weather.wind_speed ?? null,
    wind_direction: weather.wind_direction ?? null,
    wind_gust: weather.wind_gust ?? null,
    barometric_pressure: weather.pressure ?? null,
    pressure_tendency: weather.pressure_tendency ?? null,
    temperature_range_12h_min: weather.temp_min_12h ?? null,
    temperature_range_12h_max: weather.temp_max_12h ?? null,
    temperature_departure_24h: weather.temp_departure_24h ?? null,
    gps_coordinates: gps ? `${gps.latitude}, ${gps.longitude}` : null,
    last_photo_time: state?.last_photo_time ?? null,
    last_photo_filename: state?.last_photo_filename ?? null,
    average_battery: round1(state?.battery_level_avg),
    average_signal: round1(state?.signal_strength_avg),
    sd_usage_percent: (health && sdUsagePercent(health)) ?? null,
    sd_used_mb: health?.memory_used_mb ?? null,
    sd_total_mb: health?.memory_total_mb ?? null,
    power_source: health?.power_source ?? null,
    external_power: health ? hasExternalPower(health) : null,
    external_voltage: health?.external_voltage ?? null,
    internal_voltage: health?.internal_voltage ?? null,
    camera_temperature: health?.camera_temperature ?? null,
    sim_carrier: health?.sim_carrier ?? null,
    network: (health && networkLabel(health)) ?? null,
    last_transmission: lastTransmission === undefined ? null : new Date(lastTransmission).toISOString(),
    hours_since_transmission: (health && hoursSinceTransmission(health, now)) ?? null,
    online: health ? isOnline(health, now) : null,
    photos_taken: health?.photos_taken ?? null,
    photos_stored: health?.photos_stored ?? null,
    stale: !entry.fresh,
    error: entry.error ? `${entry.error.kind}: ${entry.error.message}` : null,
  };
}
