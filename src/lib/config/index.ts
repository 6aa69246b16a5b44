import { z } from 'zod';
import { ConfigurationError } from '../errors';

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().min(0);
const ratio = z.number().min(0).max(1);

export const TrackerConfigSchema = z.object({
  minHits: z.number().int().min(1).default(3),
  maxAge: z.number().int().min(0).default(30),
  iouThreshold: ratio.default(0.3)
});

export const CounterConfigSchema = z.object({
  axis: z.enum(['x', 'y']).default('x'),
  linePosition: nonNegative.optional(),
  lineRatio: ratio.default(0.5),
  minDistance: nonNegative.default(15),
  cooldownMs: nonNegative.default(5000),
  historySize: z.number().int().min(2).default(15),
  countDirection: z
    .enum(['both', 'left-to-right', 'right-to-left', 'top-to-bottom', 'bottom-to-top'])
    .default('both')
});

export const SchedulerConfigSchema = z.object({
  suspendMs: positive.default(300_000),
  pollIntervalMs: nonNegative.default(30_000),
  readRetryMs: nonNegative.default(100),
  maxReadFailures: z.number().int().min(1).default(10),
  maxRetries: z.number().int().min(1).default(5),
  backoffBase: positive.default(2),
  maxBackoffMs: positive.default(60_000)
});

function isTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export const LocationConfigSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  timeZone: z
    .string()
    .min(1)
    .refine(isTimeZone, timeZone => ({ message: `Unknown time zone "${timeZone}"` })),
  useTwilight: z.boolean().default(true)
});

export const PipelineConfigSchema = z
  .object({
    classFilter: z.string().min(1).optional(),
    confidenceThreshold: ratio.default(0.35),
    frameWidth: z.number().int().positive().default(640),
    frameHeight: z.number().int().positive().default(360),
    tracker: TrackerConfigSchema.default({}),
    counter: CounterConfigSchema.default({}),
    scheduler: SchedulerConfigSchema.default({}),
    location: LocationConfigSchema.optional()
  })
  .refine(
    config =>
      config.counter.linePosition === undefined ||
      config.counter.linePosition <= (config.counter.axis === 'x' ? config.frameWidth : config.frameHeight),
    { message: 'linePosition must lie inside the frame', path: ['counter', 'linePosition'] }
  );

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type CounterConfig = z.infer<typeof CounterConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type LocationConfig = z.infer<typeof LocationConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export function parseConfig(input: unknown): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError([`${key}: expected a number, got "${raw}"`]);
  }
  return parsed;
}

function readString(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ConfigurationError([`${key}: expected true or false, got "${raw}"`]);
}

/**
 * Read `COUNTER_*` environment variables and validate them together with
 * explicit overrides. Overrides win; anything unset falls back to defaults.
 */
export function loadConfig(env: Env = process.env, overrides: PipelineConfigInput = {}): PipelineConfig {
  const latitude = readNumber(env, 'COUNTER_LATITUDE');
  const longitude = readNumber(env, 'COUNTER_LONGITUDE');
  const timeZone = readString(env, 'COUNTER_TIMEZONE');

  const fromEnv = {
    classFilter: readString(env, 'COUNTER_CLASS_FILTER'),
    confidenceThreshold: readNumber(env, 'COUNTER_CONFIDENCE_THRESHOLD'),
    frameWidth: readNumber(env, 'COUNTER_FRAME_WIDTH'),
    frameHeight: readNumber(env, 'COUNTER_FRAME_HEIGHT'),
    tracker: {
      minHits: readNumber(env, 'COUNTER_MIN_HITS'),
      maxAge: readNumber(env, 'COUNTER_MAX_AGE'),
      iouThreshold: readNumber(env, 'COUNTER_IOU_THRESHOLD')
    },
    counter: {
      axis: readString(env, 'COUNTER_LINE_AXIS'),
      linePosition: readNumber(env, 'COUNTER_LINE_POSITION'),
      lineRatio: readNumber(env, 'COUNTER_LINE_RATIO'),
      minDistance: readNumber(env, 'COUNTER_MIN_DISTANCE'),
      cooldownMs: readNumber(env, 'COUNTER_COOLDOWN_MS'),
      historySize: readNumber(env, 'COUNTER_HISTORY_SIZE'),
      countDirection: readString(env, 'COUNTER_COUNT_DIRECTION')
    },
    scheduler: {
      suspendMs: readNumber(env, 'COUNTER_SUSPEND_MS'),
      pollIntervalMs: readNumber(env, 'COUNTER_POLL_INTERVAL_MS'),
      readRetryMs: readNumber(env, 'COUNTER_READ_RETRY_MS'),
      maxReadFailures: readNumber(env, 'COUNTER_MAX_READ_FAILURES'),
      maxRetries: readNumber(env, 'COUNTER_MAX_RETRIES'),
      backoffBase: readNumber(env, 'COUNTER_BACKOFF_BASE'),
      maxBackoffMs: readNumber(env, 'COUNTER_MAX_BACKOFF_MS')
    },
    location:
      latitude !== undefined || longitude !== undefined || timeZone !== undefined
        ? { latitude, longitude, timeZone, useTwilight: readBoolean(env, 'COUNTER_USE_TWILIGHT') }
        : undefined
  };

  return parseConfig({
    ...fromEnv,
    ...overrides,
    tracker: { ...fromEnv.tracker, ...overrides.tracker },
    counter: { ...fromEnv.counter, ...overrides.counter },
    scheduler: { ...fromEnv.scheduler, ...overrides.scheduler },
    location: overrides.location ?? fromEnv.location
  });
}
