import { DeviceHealth } from './types';

const HOUR_MS = 3_600_000;
const ONLINE_WINDOW_MS = 24 * HOUR_MS;
const MAX_UPTIME_HOURS = 8760;

export function sdUsagePercent(health: DeviceHealth): number | undefined {
  const { memory_used_mb: used, memory_total_mb: total } = health;
  if (used === undefined || total === undefined || total <= 0) {
    return undefined;
  }
  return Math.round((used / total) * 1000) / 10;
}

/**
 * A named source other than the backup battery counts as external power; without one, any
 * external rail above half a volt does.
 */
export function hasExternalPower(health: DeviceHealth): boolean {
  if (health.power_source) {
    return health.power_source !== 'Backup';
  }
  return (health.external_voltage ?? 0) > 0.5;
}

export function isOnline(health: DeviceHealth, now: number): boolean {
  return health.last_transmission !== undefined && now - health.last_transmission < ONLINE_WINDOW_MS;
}

/** Undefined for a timestamp in the future or more than a year old. */
export function hoursSinceTransmission(health: DeviceHealth, now: number): number | undefined {
  if (health.last_transmission === undefined) {
    return undefined;
  }
  const hours = (now - health.last_transmission) / HOUR_MS;
  if (hours < 0 || hours > MAX_UPTIME_HOURS) {
    return undefined;
  }
  return Math.round(hours * 100) / 100;
}

export function networkLabel(health: DeviceHealth): string | undefined {
  if (health.network_type && health.network_band) {
    return `${health.network_type} - ${health.network_band}`;
  }
  return health.network_type;
}
