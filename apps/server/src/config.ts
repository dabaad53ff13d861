import { GAME_TTL_SECONDS, MAX_GAMES } from '@landgrab/shared';
import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const rawEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.string().default('development'),
  MAX_GAMES: z.coerce.number().int().positive().default(MAX_GAMES),
  GAME_TTL_SECONDS: z.coerce.number().int().positive().default(GAME_TTL_SECONDS),
});

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  nodeEnv: string;
  isProduction: boolean;
  maxGames: number;
  gameTtlSeconds: number;
}

export const parseConfigFromEnv = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = rawEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`invalid environment: ${problems.join('; ')}`);
  }

  const raw = parsed.data;
  return {
    port: raw.PORT,
    host: raw.HOST,
    logLevel: raw.LOG_LEVEL,
    nodeEnv: raw.NODE_ENV,
    isProduction: raw.NODE_ENV === 'production',
    maxGames: raw.MAX_GAMES,
    gameTtlSeconds: raw.GAME_TTL_SECONDS,
  };
};
