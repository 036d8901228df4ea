import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config({
  quiet: process.env.NODE_ENV === 'test',
});

const envSchema = z.object({
  SERVER_PORT: z.string().regex(/^\d+$/).default('3000'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  GEOCODING_API_URL: z
    .string()
    .url()
    .default('https://geocoding-api.open-meteo.com/v1/search'),
  FORECAST_API_URL: z
    .string()
    .url()
    .default('https://api.open-meteo.com/v1/forecast'),
  FORECAST_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: Env['NODE_ENV'];
  geocodingUrl: string;
  forecastUrl: string;
  forecastTtlMs: number;
  httpTimeoutMs: number;
}

/**
 * Parses and validates the process environment.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  return {
    port: Number(env.SERVER_PORT),
    nodeEnv: env.NODE_ENV,
    geocodingUrl: env.GEOCODING_API_URL,
    forecastUrl: env.FORECAST_API_URL,
    forecastTtlMs: env.FORECAST_CACHE_TTL_SECONDS * 1000,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
  };
}
