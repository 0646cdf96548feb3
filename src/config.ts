import { PlatformConfig } from 'homebridge';
import { z } from 'zod';
import {
  DEFAULT_MAX_CONCURRENT_FETCHES,
  DEFAULT_PHOTO_SAMPLE_SIZE,
  DEFAULT_POLL_INTERVAL_SECONDS,
  MIN_POLL_INTERVAL_SECONDS,
} from './api/constants';

const CellCamConfigSchema = z.object({
  username: z.string().trim().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  pollInterval: z.coerce.number()
    .int()
    .min(MIN_POLL_INTERVAL_SECONDS, `pollInterval must be at least ${MIN_POLL_INTERVAL_SECONDS} seconds`)
    .default(DEFAULT_POLL_INTERVAL_SECONDS),
  maxConcurrentFetches: z.coerce.number().int().min(1).max(10).default(DEFAULT_MAX_CONCURRENT_FETCHES),
  photoSampleSize: z.coerce.number().int().min(1).max(1000).default(DEFAULT_PHOTO_SAMPLE_SIZE),
  userPoolId: z.string().regex(/^[\w-]+_[0-9a-zA-Z]+$/, 'userPoolId must look like region_id').optional(),
});

export type CellCamConfig = z.infer<typeof CellCamConfigSchema>;

export type ConfigResult =
  | { ok: true; config: CellCamConfig }
  | { ok: false; errors: string[] };

/**
 * Validates the platform block from config.json. Falls back to `email` when `username` is absent.
 */
export function parseConfig(raw: PlatformConfig): ConfigResult {
  const input = { ...raw, username: raw.username ?? raw.email };
  const result = CellCamConfigSchema.safeParse(input);
  if (!result.success) {
    return {
      ok: false,
      errors: result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    };
  }
  return { ok: true, config: result.data };
}
