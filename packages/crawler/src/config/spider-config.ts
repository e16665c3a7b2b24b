import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { ConfigError } from '../errors/spider-error.js';

const DEFAULT_RETRY_CODES = [500, 502, 503, 504, 408, 429];

const delayFactorSchema = z.number().positive('Delay factors must be > 0');

const spiderConfigSchema = z.object({
  /** Concurrent executors. */
  workers: z
    .number()
    .int()
    .positive('workers must be a positive integer')
    .default(() => availableParallelism() * 2),
  timeoutMs: z.number().positive('timeoutMs must be > 0').default(30_000),
  /** Pause each worker takes before a physical fetch. */
  downloadDelayMs: z.number().min(0, 'downloadDelayMs must be >= 0').default(0),
  /**
   * `true` draws the pause from [0.5, 1.5] × downloadDelayMs, a tuple gives
   * other factors, `false` uses the base delay as is.
   */
  randomDownloadDelay: z
    .union([z.boolean(), z.tuple([delayFactorSchema, delayFactorSchema])])
    .default(true),
  retryTimes: z.number().int().min(0, 'retryTimes must be >= 0').default(3),
  retryCodes: z
    .array(
      z
        .number()
        .int()
        .min(400, 'retryCodes must be HTTP error codes (400-599)')
        .max(599, 'retryCodes must be HTTP error codes (400-599)'),
    )
    .default(DEFAULT_RETRY_CODES),
  retryDelayMs: z.number().min(0, 'retryDelayMs must be >= 0').default(3_000),
  defaultHeaders: z
    .record(z.string(), z.string())
    .default({ 'User-Agent': 'hookspider' }),
  /** What happens to in-flight Tasks once the run is stopped. */
  abortMode: z.enum(['drain', 'abandon']).default('drain'),
  /** Stop the run on SIGINT/SIGTERM. */
  handleSignals: z.boolean().default(true),
  /** Period of the progress log line; 0 disables it. */
  statsIntervalMs: z.number().int().min(0).default(0),
});

type ParsedConfig = z.output<typeof spiderConfigSchema>;

type SpiderConfig = Readonly<
  Omit<ParsedConfig, 'retryCodes' | 'defaultHeaders'> & {
    retryCodes: readonly number[];
    defaultHeaders: Readonly<Record<string, string>>;
  }
>;
type SpiderConfigInput = z.input<typeof spiderConfigSchema>;

/**
 * Validates user settings, fills defaults and freezes the result.
 */
export function parseSpiderConfig(input: SpiderConfigInput = {}): SpiderConfig {
  const parsed = spiderConfigSchema.safeParse(input);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }

  return Object.freeze({
    ...parsed.data,
    retryCodes: Object.freeze([...parsed.data.retryCodes]),
    defaultHeaders: Object.freeze({ ...parsed.data.defaultHeaders }),
  });
}

export type { SpiderConfig, SpiderConfigInput };
