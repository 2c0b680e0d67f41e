import { z } from 'zod';

const DEFAULT_REVIEW_SOURCE_URLS = [
  'https://map.naver.com/p/search/분당제일여성병원/place/11830416?placePath=/review',
  'https://map.naver.com/p/search/분당제일여성병원/place/11830416?placePath=/review&entry=pll',
  'https://map.naver.com/p/search/분당제일여성병원/place/11830416',
  'https://map.naver.com/p/search/분당제일여성병원',
].join(',');

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[]> = {},
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Unset and blank variables both fall back to the schema default.
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function flag(defaultValue: boolean) {
  return z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
        message: 'Expected true or false',
      })
      .transform((value) => TRUE_VALUES.includes(value))
      .optional()
      .transform((value) => value ?? defaultValue),
  );
}

function integer(defaultValue: number, minimum: number) {
  return z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^-?\d+$/, 'Expected a whole number')
      .transform(Number)
      .pipe(z.number().int().min(minimum))
      .optional()
      .transform((value) => value ?? defaultValue),
  );
}

function optionalInteger() {
  return z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^\d+$/, 'Expected a non-negative whole number')
      .transform(Number)
      .optional(),
  );
}

function optionalString() {
  return z.preprocess(blankToUndefined, z.string().trim().min(1).optional());
}

const envSchema = z
  .object({
    // Notification target and transport
    RECIPIENT_EMAIL: z.preprocess(blankToUndefined, z.string().email().optional()),
    GMAIL_ADDRESS: z.preprocess(blankToUndefined, z.string().email().optional()),
    GMAIL_PASSWORD: optionalString(),
    SMTP_HOST: z.preprocess(blankToUndefined, z.string().default('smtp.gmail.com')),
    SMTP_PORT: integer(587, 1),
    SMTP_TIMEOUT_MS: integer(30_000, 1),

    // Result persistence
    GITHUB_TOKEN: optionalString(),
    GITHUB_REPOSITORY: optionalString(),
    PERSIST_RESULTS: flag(false),
    GIT_AUTHOR_NAME: z.preprocess(blankToUndefined, z.string().default('GitHub Actions Bot')),
    GIT_AUTHOR_EMAIL: z.preprocess(
      blankToUndefined,
      z.string().default('github-actions[bot]@users.noreply.github.com'),
    ),
    HISTORY_FILE: z.preprocess(blankToUndefined, z.string().default('review_history.json')),
    LOG_FILE: z.preprocess(blankToUndefined, z.string().default('monitor.log')),

    // Notification policy
    TEST_MODE: flag(false),
    MIN_CHANGE_THRESHOLD: integer(1, 0),
    QUIET_MODE: flag(true),
    NOTIFY_NO_CHANGE: flag(false),
    NOTIFY_STARTUP: flag(false),

    // Review source
    BUSINESS_NAME: z.preprocess(blankToUndefined, z.string().default('분당제일여성병원')),
    REVIEW_SOURCE_URLS: z.preprocess(
      blankToUndefined,
      z
        .string()
        .default(DEFAULT_REVIEW_SOURCE_URLS)
        .transform((value) =>
          value
            .split(',')
            .map((url) => url.trim())
            .filter((url) => url.length > 0),
        )
        .pipe(z.array(z.string().url()).min(1, 'At least one source URL is required')),
    ),
    REVIEW_PAGE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    REVIEW_COUNT_MIN: optionalInteger(),
    REVIEW_COUNT_MAX: optionalInteger(),
    FETCH_TIMEOUT_MS: integer(30_000, 1),
    DISPLAY_TIMEZONE: z.preprocess(blankToUndefined, z.string().default('Asia/Seoul')),

    // Daemon mode
    MONITOR_INTERVAL_SECONDS: integer(300, 1),
    MONITOR_HEALTH_PORT: integer(3002, 1),
    MONITOR_LOG_LEVEL: z.preprocess(
      blankToUndefined,
      z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    ),

    // Node
    NODE_ENV: z.preprocess(
      blankToUndefined,
      z.enum(['development', 'production', 'test']).default('production'),
    ),
  })
  .superRefine((env, ctx) => {
    if (
      env.REVIEW_COUNT_MIN !== undefined &&
      env.REVIEW_COUNT_MAX !== undefined &&
      env.REVIEW_COUNT_MIN > env.REVIEW_COUNT_MAX
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REVIEW_COUNT_MAX'],
        message: 'Must not be lower than REVIEW_COUNT_MIN',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.flatten().fieldErrors;
    const fieldErrors: Record<string, string[]> = {};
    for (const [key, errors] of Object.entries(formatted)) {
      if (errors && errors.length > 0) fieldErrors[key] = errors;
    }
    const messages = Object.entries(fieldErrors)
      .map(([key, errors]) => `  ${key}: ${errors.join(', ')}`)
      .join('\n');
    throw new ConfigError(`Environment validation failed:\n${messages}`, fieldErrors);
  }

  return result.data;
}

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  if (_env) return _env;

  _env = parseEnv(source);
  return _env;
}

export function getEnv(): Env {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnv() first.');
  }
  return _env;
}

export function resetEnv(): void {
  _env = null;
}
