import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { LogLevel } from './logger';
import type { ProjectionAssumptions } from '../types';

export const DEFAULT_GROWTH_RATE = 0.05;

export const DEFAULT_ASSUMPTIONS: ProjectionAssumptions = {
  growth: { kind: 'flat', rate: DEFAULT_GROWTH_RATE },
  discount_rate: 0.1,
  terminal_growth: 0.025,
  horizon_years: 5,
};

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  FMP_API_KEY: optionalString,
  APIKEY: optionalString,
  FMP_BASE_URL: z.string().url().default('https://financialmodelingprep.com/api/v3'),
  GEMINI_API_KEY: optionalString,
  API_KEY: optionalString,
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-pro'),
  DCF_CACHE_DIR: z.string().min(1).default('.cache'),
  DCF_CACHE_TTL_HOURS: z.coerce.number().positive().default(24),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  HTTP_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface AppConfig {
  api: {
    baseUrl: string;
    apiKey: string | undefined;
    timeoutMs: number;
    maxRetries: number;
  };
  gemini: {
    apiKey: string | undefined;
    model: string;
  };
  cache: {
    directory: string;
    ttlHours: number;
  };
  logLevel: LogLevel;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${problems}`);
  }
  const e = parsed.data;

  return {
    api: {
      baseUrl: e.FMP_BASE_URL.replace(/\/+$/, ''),
      apiKey: e.FMP_API_KEY ?? e.APIKEY,
      timeoutMs: e.HTTP_TIMEOUT_MS,
      maxRetries: e.HTTP_MAX_RETRIES,
    },
    gemini: {
      apiKey: e.GEMINI_API_KEY ?? e.API_KEY,
      model: e.GEMINI_MODEL,
    },
    cache: {
      directory: e.DCF_CACHE_DIR,
      ttlHours: e.DCF_CACHE_TTL_HOURS,
    },
    logLevel: e.LOG_LEVEL,
  };
};
