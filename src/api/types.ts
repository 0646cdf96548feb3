export interface Credential {
  readonly identifier: string;
  readonly secret: string;
}

/**
 * Token set held by the session manager. Times are epoch milliseconds.
 */
export interface Session {
  readonly accessToken: string;
  readonly idToken: string;
  readonly refreshToken: string;
  readonly issuedAt: number;
  readonly expiresAt: number;
}

export const MISSING_STATUS = 'missing';

/**
 * Camera-reported condition from the camera list. Voltages in volts, temperature in Celsius,
 * `last_transmission` in epoch milliseconds.
 */
export interface DeviceHealth {
  memory_used_mb?: number;
  memory_total_mb?: number;
  power_source?: string;
  external_voltage?: number;
  internal_voltage?: number;
  last_transmission?: number;
  camera_temperature?: number;
  sim_carrier?: string;
  network_type?: string;
  network_band?: string;
  mcu_version?: string;
  app_version?: string;
  photos_taken?: number;
  photos_stored?: number;
}

export interface Device {
  device_id: string;
  display_name: string;
  location_label?: string;
  model?: string;
  hardware_version?: string;
  firmware_version?: string;
  status: string;
  health?: DeviceHealth;
}

export interface GpsCoordinates {
  latitude: number;
  longitude: number;
}

export interface WeatherSnapshot {
  temperature?: number;
  conditions?: string;
  wind_speed?: number;
  wind_direction?: string;
  wind_gust?: number;
  pressure?: number;
  pressure_tendency?: string;
  moon_phase?: string;
  sun_phase?: string;
  temp_min_12h?: number;
  temp_max_12h?: number;
  temp_departure_24h?: number;
}

export interface DeviceState {
  battery_level?: number;
  battery_level_avg?: number;
  signal_strength?: number;
  signal_strength_avg?: number;
  gps_coordinates?: GpsCoordinates;
  total_photo_count: number;
  last_photo_time?: string;
  last_photo_filename?: string;
  weather: WeatherSnapshot;
}

export interface MediaReference {
  readonly device_id: string;
  readonly remote_url: string;
  readonly issued_at: number;
  readonly expires_at: number;
}

export interface DeviceStateResult {
  state: DeviceState;
  media?: MediaReference;
}
