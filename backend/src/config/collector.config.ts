import { registerAs } from '@nestjs/config';
import { z } from 'zod';

/**
 * Points the live view keeps. 'all' keeps everything; the others match a
 * keyword in the label, case-insensitively.
 */
export const TRACK_FILTERS = ['all', 'pumps', 'valves', 'ahu', 'temp'] as const;
export type TrackFilter = (typeof TRACK_FILTERS)[number];

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((flag) => flag === 'true' || flag === '1' || flag === 'yes');

const positiveInt = z.coerce.number().int().positive();

/**
 * Collector environment schema.
 *
 * BMS_URL and BMS_TOKEN have no defaults: the service refuses to start
 * without them rather than polling nothing.
 */
export const CollectorEnvSchema = z
  .object({
    BMS_URL: z.string().url(),
    BMS_TOKEN: z.string().min(1),
    BMS_INSTALLATION_ID: z.string().min(1).default('bms-live'),
    BMS_POLL_INTERVAL_SECONDS: positiveInt.default(300),
    BMS_REQUEST_TIMEOUT_SECONDS: positiveInt.default(30),
    BMS_VERIFY_TLS: booleanFlag.default('false'),
    LIVE_HISTORY_CAPACITY: positiveInt.default(1000),
    LIVE_TRACK_FILTER: z.enum(TRACK_FILTERS).default('all'),
    LIVE_STALE_AFTER_POLLS: positiveInt.default(3),
    POLLER_SHUTDOWN_GRACE_SECONDS: positiveInt.default(10),
  })
  .refine(
    (env) => env.BMS_REQUEST_TIMEOUT_SECONDS < env.BMS_POLL_INTERVAL_SECONDS,
    {
      message:
        'BMS_REQUEST_TIMEOUT_SECONDS must be shorter than BMS_POLL_INTERVAL_SECONDS',
      path: ['BMS_REQUEST_TIMEOUT_SECONDS'],
    },
  );

/**
 * Collector settings, in the units the code works with.
 */
export interface CollectorConfig {
  bmsUrl: string;
  bmsToken: string;
  installationId: string;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  verifyTls: boolean;
  historyCapacity: number;
  trackFilter: TrackFilter;
  staleAfterPolls: number;
  shutdownGraceMs: number;
}

/**
 * Validate raw environment variables and convert them to a CollectorConfig.
 *
 * @throws Error listing every invalid variable
 */
export function parseCollectorConfig(
  env: Record<string, string | undefined>,
): CollectorConfig {
  const result = CollectorEnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid collector configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    bmsUrl: parsed.BMS_URL,
    bmsToken: parsed.BMS_TOKEN,
    installationId: parsed.BMS_INSTALLATION_ID,
    pollIntervalMs: parsed.BMS_POLL_INTERVAL_SECONDS * 1000,
    requestTimeoutMs: parsed.BMS_REQUEST_TIMEOUT_SECONDS * 1000,
    verifyTls: parsed.BMS_VERIFY_TLS,
    historyCapacity: parsed.LIVE_HISTORY_CAPACITY,
    trackFilter: parsed.LIVE_TRACK_FILTER,
    staleAfterPolls: parsed.LIVE_STALE_AFTER_POLLS,
    shutdownGraceMs: parsed.POLLER_SHUTDOWN_GRACE_SECONDS * 1000,
  };
}

export const collectorConfig = registerAs(
  'collector',
  (): CollectorConfig => parseCollectorConfig(process.env),
);
