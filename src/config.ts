/**
 * Typed configuration for the momentum pipeline.
 *
 * Values come from the environment (a `.env` file is loaded by the CLI through
 * `dotenv/config`). Everything except the Supabase credentials has a default,
 * so tests and the `score`/`publish` commands run without a populated env.
 */
import { z } from 'zod';

const DAY_MS = 24 * 60 * 60 * 1000;

const optionalInt = z
  .string()
  .trim()
  .transform((v) => (v === '' ? undefined : Number(v)))
  .pipe(z.number().int().nonnegative().optional())
  .optional();

const octalMode = (fallback: number) =>
  z
    .string()
    .trim()
    .regex(/^[0-7]{3,4}$/, 'expected an octal file mode such as 755')
    .transform((v) => parseInt(v, 8))
    .optional()
    .transform((v) => v ?? fallback);

const EnvSchema = z.object({
  SUPABASE_URL: z.string().trim().optional(),
  SUPABASE_SERVICE_KEY: z.string().trim().optional(),
  TRENDS_GEO: z.string().trim().default(''),
  TRENDS_TIMEFRAME: z.string().trim().min(1).default('today 5-y'),
  TRENDS_HL: z.string().trim().min(1).default('en-US'),
  TRENDS_TZ: z.coerce.number().int().default(360),
  TRENDS_CACHE_TTL_DAYS: z.coerce.number().positive().default(7),
  TRENDS_MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  TRENDS_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  TRENDS_BACKOFF_MS: z.coerce.number().int().nonnegative().default(2000),
  KEYWORD_SOURCE_GEO: z.string().trim().min(2).default('US'),
  PUBLIC_DIR: z.string().trim().min(1).default('public'),
  PUBLIC_FILE_MODE: octalMode(0o644),
  PUBLIC_DIR_MODE: octalMode(0o755),
  PUBLIC_UID: optionalInt,
  PUBLIC_GID: optionalInt,
  PUBLISH_FORBIDDEN_TERMS: z
    .string()
    .default('')
    .transform((v) => v.split(',').map((t) => t.trim()).filter((t) => t !== '')),
  SITE_URL: z.string().trim().url().default('https://example.com'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AppConfig {
  supabase: {
    url?: string;
    serviceKey?: string;
  };
  trends: {
    geo: string;
    timeframe: string;
    hl: string;
    tz: number;
    cacheTtlMs: number;
    minDelayMs: number;
    maxAttempts: number;
    backoffMs: number;
  };
  keywordSourceGeo: string;
  publish: {
    publicDir: string;
    fileMode: number;
    dirMode: number;
    uid?: number;
    gid?: number;
    forbiddenTerms: string[];
  };
  siteUrl: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    supabase: {
      url: e.SUPABASE_URL || undefined,
      serviceKey: e.SUPABASE_SERVICE_KEY || undefined,
    },
    trends: {
      geo: e.TRENDS_GEO,
      timeframe: e.TRENDS_TIMEFRAME,
      hl: e.TRENDS_HL,
      tz: e.TRENDS_TZ,
      cacheTtlMs: e.TRENDS_CACHE_TTL_DAYS * DAY_MS,
      minDelayMs: e.TRENDS_MIN_DELAY_MS,
      maxAttempts: e.TRENDS_MAX_ATTEMPTS,
      backoffMs: e.TRENDS_BACKOFF_MS,
    },
    keywordSourceGeo: e.KEYWORD_SOURCE_GEO,
    publish: {
      publicDir: e.PUBLIC_DIR,
      fileMode: e.PUBLIC_FILE_MODE,
      dirMode: e.PUBLIC_DIR_MODE,
      uid: e.PUBLIC_UID,
      gid: e.PUBLIC_GID,
      forbiddenTerms: e.PUBLISH_FORBIDDEN_TERMS,
    },
    siteUrl: e.SITE_URL.replace(/\/+$/, ''),
    logLevel: e.LOG_LEVEL,
  };
}
