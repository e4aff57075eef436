import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import path from 'path';
import type { LogLevel } from './utils/logger';

// Load environment variables from .env file
dotenvConfig({ path: path.resolve(process.cwd(), '.env') });

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1, 'must not be empty'),
  OPENAI_MODEL: z.preprocess(emptyAsUndefined, z.string().default('gpt-4o-mini')),
  OPENAI_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  OPENAI_TIMEOUT_MS: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(60000)),
  LOG_LEVEL: z.preprocess(
    emptyAsUndefined,
    z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info')
  ),
  LOG_FILE: z.preprocess(emptyAsUndefined, z.string().optional()),
});

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  baseURL?: string;
  timeoutMs: number;
}

export interface AppConfig {
  openai: OpenAIConfig;
  logLevel: LogLevel;
  logFile?: string;
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Resolves the process-wide configuration once, at startup.
 * Throws a ConfigurationError listing every missing or malformed variable.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
      baseURL: vars.OPENAI_BASE_URL,
      timeoutMs: vars.OPENAI_TIMEOUT_MS,
    },
    logLevel: vars.LOG_LEVEL,
    logFile: vars.LOG_FILE,
  };
};
