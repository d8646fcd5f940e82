import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((v) => v === 'true' || v === '1');

export const serverEnv = createEnv({
  server: {
    DATABASE_URL: z.string().min(1),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    MONITOR_SYNC_API_ENDPOINT: z.url().optional(),
    // aes-256-gcm ciphertext (v1:...) of the monitoring API token; decrypted with SECRET_ENCRYPTION_KEY.
    MONITOR_SYNC_API_TOKEN_ENC: z.string().min(1).optional(),
    MONITOR_SYNC_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    MONITOR_SYNC_API_TLS_VERIFY: booleanFlag.default(true),
    // aes-256-gcm ciphertext of the TLS pre-shared key, required when sync settings enable psk.
    MONITOR_SYNC_TLS_PSK_ENC: z.string().min(1).optional(),
    SECRET_ENCRYPTION_KEY: z.string().min(1).optional(),

    MONITOR_SYNC_SETTINGS_PATH: z.string().min(1).default('config/sync-settings.json'),

    MONITOR_SYNC_SCHEDULER_TICK_MS: z.coerce.number().int().positive().default(60_000),
    MONITOR_SYNC_WORKER_POLL_MS: z.coerce.number().int().positive().default(2_000),
    MONITOR_SYNC_WORKER_BATCH_SIZE: z.coerce.number().int().positive().default(1),
    MONITOR_SYNC_REFRESH_INTERVAL_MINUTES: z.coerce.number().int().positive().default(60),
    MONITOR_SYNC_CATALOG_INTERVAL_MINUTES: z.coerce.number().int().positive().default(24 * 60),
    MONITOR_SYNC_MAINTENANCE_GRACE_MINUTES: z.coerce.number().int().nonnegative().default(60),
    MONITOR_SYNC_JOB_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
    MONITOR_SYNC_JOB_RECYCLE_AFTER_MS: z.coerce.number().int().positive().default(30 * 60_000),
  },
  runtimeEnv: process.env,
  skipValidation: !!process.env.SKIP_ENV_VALIDATION,
  emptyStringAsUndefined: true,
});
