/**
 * Runtime configuration
 *
 * Read once from the environment when the service container is built.
 * Upstream URLs and timeouts are fixed constants, only keys are configurable.
 */

export const NASA_BASE_URL = 'https://api.nasa.gov';
export const DONKI_BASE_URL = `${NASA_BASE_URL}/DONKI`;
export const SWPC_BASE_URL = 'https://services.swpc.noaa.gov';

export const REQUEST_TIMEOUT = 30000; // 30 seconds per upstream call

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:3001'];

export interface AppConfig {
  nasaApiKey: string;
  openaiApiKey: string | null;
  openaiModel: string;
  aiInsightsEnabled: boolean;
  corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

export function parseCorsOrigins(value: string | undefined): string[] {
  if (!value) return DEFAULT_CORS_ORIGINS;
  const origins = value
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : DEFAULT_CORS_ORIGINS;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    nasaApiKey: env.NASA_API_KEY?.trim() || 'DEMO_KEY',
    openaiApiKey: env.OPENAI_API_KEY?.trim() || null,
    openaiModel: env.OPENAI_MODEL?.trim() || 'gpt-4o-mini',
    aiInsightsEnabled: env.AI_INSIGHTS?.trim().toLowerCase() !== 'off',
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
  };
}
